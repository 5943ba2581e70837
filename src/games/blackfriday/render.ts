/**
 * Terminal rendering for Black Friday Rush
 *
 * The field is FIELD_WIDTH x FIELD_HEIGHT units; it is drawn on a
 * GRID_COLS x GRID_ROWS cell grid inside a border. renderFrame is pure,
 * the terminal renderer adds popups and a hit flash on top.
 */

import {
  DIFFICULTY_STEP,
  FIELD_HEIGHT,
  FIELD_WIDTH,
  GOOD_DEAL_POINTS,
  STARTING_HEALTH,
} from './constants';
import type { GameView, TickReport } from './machine';
import type { LeaderboardEntry } from './leaderboard';
import { playerCount } from './round';
import type { FallingObject, PlayerSlot, RoundState, SlotIndex, Vec2 } from './types';
import {
  addScorePopup,
  createFlashState,
  isFlashVisible,
  triggerFlash,
  updateFlash,
  updatePopups,
  type FlashState,
  type ScorePopup,
} from '../shared/effects';
import { renderMenuHint, renderSimpleMenu, type SimpleMenuItem } from '../shared/menu';
import { centerColumn, getCurrentThemeColor, getSubtleBackgroundColor, getVerticalAnchor, type GameTerminal } from '../utils';

// ============================================================================
// Layout
// ============================================================================

export const GRID_COLS = 55;
export const GRID_ROWS = 20;
export const MIN_COLS = 60;
export const MIN_ROWS = 26;

const UNITS_PER_COL = FIELD_WIDTH / GRID_COLS;
const UNITS_PER_ROW = FIELD_HEIGHT / GRID_ROWS;

const GOOD_STYLE = '\x1b[1;92m';
const BAD_STYLE = '\x1b[1;91m';
const PLAYER_STYLES: Record<SlotIndex, string> = { 0: '\x1b[1;96m', 1: '\x1b[1;95m' };
const HIT_FLASH_FRAMES = 12;

export const MODE_ITEMS: SimpleMenuItem[] = [
  { label: '1P SOLO SHOPPER', shortcut: '1' },
  { label: '2P SHOP WITH A FRIEND', shortcut: '2' },
];

export interface Cell {
  col: number;
  row: number;
}

export function toCell(position: Vec2): Cell {
  return {
    col: Math.floor(position.x / UNITS_PER_COL),
    row: Math.floor(position.y / UNITS_PER_ROW),
  };
}

interface Layout {
  left: number;
  top: number;
  centerX: number;
}

function computeLayout(cols: number, rows: number): Layout {
  const left = Math.floor((cols - (GRID_COLS + 2)) / 2) + 1;
  const top = getVerticalAnchor(rows, GRID_ROWS + 2, { headerRows: 3, footerRows: 2, minTop: 4 });
  return { left, top, centerX: Math.floor(cols / 2) };
}

/** Screen position of a grid cell */
function at(layout: Layout, cell: Cell): string {
  return `\x1b[${layout.top + 1 + cell.row};${layout.left + 1 + cell.col}H`;
}

function text(row: number, col: number, style: string, content: string): string {
  return `\x1b[${row};${col}H${style}${content}\x1b[0m`;
}

function centered(layout: Layout, row: number, style: string, content: string): string {
  return text(row, centerColumn(layout.centerX, content), style, content);
}

// ============================================================================
// Frame
// ============================================================================

export interface RenderEffects {
  popups: readonly ScorePopup[];
  flash: FlashState;
}

export interface RenderOptions {
  cols: number;
  rows: number;
  effects?: RenderEffects;
}

/**
 * Build one full frame as an ANSI string
 */
export function renderFrame(view: GameView, options: RenderOptions): string {
  const { cols, rows } = options;
  let output = '\x1b[2J\x1b[H';

  if (cols < MIN_COLS || rows < MIN_ROWS) {
    return output + renderTooSmall(cols, rows);
  }

  const layout = computeLayout(cols, rows);
  switch (view.phase) {
    case 'modeSelect':
      output += renderModeSelect(view, layout);
      break;
    case 'playing':
      output += renderPlaying(view, layout, options.effects);
      break;
    case 'nameEntry':
      output += renderNameEntry(view, layout);
      break;
    case 'gameOver':
      output += renderGameOver(view, layout);
      break;
  }
  return output;
}

function renderTooSmall(cols: number, rows: number): string {
  const themeColor = getCurrentThemeColor();
  const needWidth = cols < MIN_COLS;
  const needHeight = rows < MIN_ROWS;
  let hint: string;
  if (needWidth && needHeight) {
    hint = 'Make pane larger';
  } else if (needWidth) {
    hint = 'Make pane wider →';
  } else {
    hint = 'Make pane taller ↓';
  }
  const msg1 = 'Terminal too small!';
  const msg2 = `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.max(2, Math.floor(rows / 2));

  return text(centerY - 1, centerColumn(centerX, msg1), themeColor, msg1)
    + text(centerY + 1, centerColumn(centerX, msg2), '\x1b[2m', msg2)
    + text(centerY + 3, centerColumn(centerX, hint), `\x1b[1m${themeColor}`, hint);
}

function renderTitle(layout: Layout): string {
  return centered(layout, Math.max(1, layout.top - 2), `\x1b[1m${getCurrentThemeColor()}`, '$ BLACK FRIDAY RUSH $');
}

function renderLeaderboard(entries: readonly LeaderboardEntry[], layout: Layout, startY: number): string {
  const themeColor = getCurrentThemeColor();
  let output = centered(layout, startY, `\x1b[1m${themeColor}`, 'TOP SHOPPERS');

  const top = entries.slice(0, 5);
  if (top.length === 0) {
    return output + centered(layout, startY + 2, '\x1b[2m', 'NO SCORES YET');
  }

  top.forEach((entry, i) => {
    output += centered(layout, startY + 2 + i, themeColor, formatLeaderboardLine(entry, i + 1));
  });
  return output;
}

export function formatLeaderboardLine(entry: LeaderboardEntry, rank: number): string {
  const tag = entry.mode === 'single' ? '1P' : '2P';
  return `${String(rank).padStart(2)}. ${entry.name}  ${String(entry.score).padStart(5)}  ${tag}`;
}

function renderModeSelect(view: GameView, layout: Layout): string {
  const selection = view.menuSelection === 'single' ? 0 : 1;
  const menuY = layout.top + 4;

  return renderTitle(layout)
    + centered(layout, layout.top + 1, '\x1b[2m', 'CATCH THE DEALS. DODGE THE JUNK.')
    + renderSimpleMenu(MODE_ITEMS, selection, {
      centerX: layout.centerX,
      startY: menuY,
      showShortcuts: false,
      layout: 'row',
    })
    + renderMenuHint('←→ CHOOSE  ENTER START  1/2 QUICK START  Q QUIT', layout.centerX, menuY + 2)
    + renderMenuHint('P1 ←→ MOVE    P2 D/G MOVE', layout.centerX, menuY + 3)
    + renderLeaderboard(view.leaderboard, layout, menuY + 6);
}

// ============================================================================
// Playing
// ============================================================================

export function difficultyLevel(multiplier: number): number {
  return Math.round((multiplier - 1) / DIFFICULTY_STEP) + 1;
}

function hearts(health: number): string {
  return '♥'.repeat(health) + '♡'.repeat(Math.max(0, STARTING_HEALTH - health));
}

export function formatHud(round: RoundState): string {
  const parts: string[] = [];
  for (let i = 0; i < playerCount(round.mode); i++) {
    const slotIndex: SlotIndex = i === 0 ? 0 : 1;
    const live = round.players.find(slot => slot.slotIndex === slotIndex);
    if (live) {
      parts.push(`P${slotIndex + 1} ${String(live.score).padStart(4, '0')} ${hearts(live.health)}`);
    } else {
      parts.push(`P${slotIndex + 1} OUT`);
    }
  }
  parts.push(`LVL ${difficultyLevel(round.difficultyMultiplier)}`);
  return parts.join('   ');
}

function renderBorder(layout: Layout, color: string): string {
  const { left, top } = layout;
  let output = text(top, left, color, `╔${'═'.repeat(GRID_COLS)}╗`);
  for (let y = 1; y <= GRID_ROWS; y++) {
    output += text(top + y, left, color, '║');
    output += text(top + y, left + GRID_COLS + 1, color, '║');
  }
  output += text(top + GRID_ROWS + 1, left, color, `╚${'═'.repeat(GRID_COLS)}╝`);
  return output;
}

function inGrid(cell: Cell): boolean {
  return cell.row >= 0 && cell.row < GRID_ROWS && cell.col >= 0 && cell.col < GRID_COLS;
}

function renderObject(object: FallingObject, layout: Layout): string {
  const cell = toCell(object.position);
  if (!inGrid(cell)) return '';
  const glyph = object.kind === 'goodDeal' ? '$' : 'X';
  const style = object.kind === 'goodDeal' ? GOOD_STYLE : BAD_STYLE;
  return `${at(layout, cell)}${style}${glyph}\x1b[0m`;
}

function renderPlayer(slot: PlayerSlot, layout: Layout): string {
  const cell = toCell(slot.position);
  const style = PLAYER_STYLES[slot.slotIndex];
  const label = `P${slot.slotIndex + 1}`;
  let output = `${at(layout, cell)}${style}║${label} ║\x1b[0m`;
  if (cell.row + 1 < GRID_ROWS) {
    output += `${at(layout, { col: cell.col, row: cell.row + 1 })}${style}╚═══╝\x1b[0m`;
  }
  return output;
}

function renderPlaying(view: GameView, layout: Layout, effects?: RenderEffects): string {
  const themeColor = getCurrentThemeColor();
  const round = view.round;
  const flashing = effects ? isFlashVisible(effects.flash) : false;

  let output = renderTitle(layout);
  if (round) {
    output += text(layout.top - 1, layout.left, themeColor, formatHud(round));
  }
  output += renderBorder(layout, flashing ? BAD_STYLE : themeColor);

  // Floor line under the shoppers
  output += `${at(layout, { col: 0, row: GRID_ROWS - 1 })}${getSubtleBackgroundColor()}${'░'.repeat(GRID_COLS)}\x1b[0m`;

  if (!round) return output;

  for (const object of round.objects) {
    output += renderObject(object, layout);
  }
  for (const slot of round.players) {
    output += renderPlayer(slot, layout);
  }

  for (const popup of effects?.popups ?? []) {
    const cell = { col: Math.round(popup.x), row: Math.round(popup.y) };
    if (!inGrid(cell)) continue;
    const alpha = popup.frames > 10 ? '\x1b[1m' : '\x1b[2m';
    output += `${at(layout, cell)}${alpha}${popup.color}${popup.text}\x1b[0m`;
  }

  output += text(layout.top + GRID_ROWS + 2, layout.left, `\x1b[2m${themeColor}`, 'P1 ←→   P2 D/G');
  return output;
}

// ============================================================================
// Name entry & game over
// ============================================================================

function renderNameEntry(view: GameView, layout: Layout): string {
  const themeColor = getCurrentThemeColor();
  const entry = view.nameEntry;
  const pending = entry?.pending[0];
  let output = renderTitle(layout);
  if (!entry || !pending) return output;

  const y = layout.top + 4;
  output += centered(layout, y, '\x1b[1;93m', 'NEW SCORE!');
  output += centered(layout, y + 2, themeColor, `P${pending.slotIndex + 1} SCORE: ${pending.score}`);

  // Each letter is drawn as " X ", the cursor letter in reverse video
  const lettersWidth = entry.letters.length * 3;
  let x = layout.centerX - Math.floor(lettersWidth / 2);
  entry.letters.forEach((letter, i) => {
    const style = i === entry.cursor ? '\x1b[1;7m' : `\x1b[1m${themeColor}`;
    output += text(y + 4, x, style, ` ${letter} `);
    x += 3;
  });

  if (entry.pending.length > 1) {
    output += centered(layout, y + 6, '\x1b[2m', `${entry.pending.length - 1} MORE TO GO`);
  }
  output += renderMenuHint('↑↓ LETTER  ←→ MOVE  ENTER SAVE', layout.centerX, y + 8);
  return output;
}

function renderGameOver(view: GameView, layout: Layout): string {
  const themeColor = getCurrentThemeColor();
  const y = layout.top + 2;
  let output = renderTitle(layout);
  output += centered(layout, y, BAD_STYLE, '══ SOLD OUT ══');

  const scores = [...view.finalScores].sort((a, b) => a.slotIndex - b.slotIndex);
  scores.forEach((final, i) => {
    output += centered(layout, y + 2 + i, themeColor, `P${final.slotIndex + 1} SCORE: ${final.score}`);
  });

  output += renderLeaderboard(view.leaderboard, layout, y + 5);
  output += renderMenuHint('[ENTER] MENU  [1]/[2] RESTART  [Q] QUIT', layout.centerX, y + 14);
  return output;
}

// ============================================================================
// Terminal renderer
// ============================================================================

export interface TerminalRenderer {
  /** Draw the view, feeding this tick's report into the effects first */
  render(view: GameView, report?: TickReport): void;
  reset(): void;
}

export function createTerminalRenderer(terminal: GameTerminal): TerminalRenderer {
  let popups: ScorePopup[] = [];
  let flash = createFlashState();

  function applyReport(report: TickReport): void {
    if (report.transitioned) {
      popups = [];
      flash = createFlashState();
    }
    for (const hit of report.hits) {
      const cell = toCell(hit.position);
      if (hit.kind === 'goodDeal') {
        addScorePopup(popups, cell.col, cell.row - 1, `+${GOOD_DEAL_POINTS}`, GOOD_STYLE);
      } else {
        addScorePopup(popups, cell.col, cell.row - 1, '-♥', BAD_STYLE);
        triggerFlash(flash, HIT_FLASH_FRAMES);
      }
    }
  }

  return {
    render(view, report) {
      if (report) applyReport(report);
      terminal.write(renderFrame(view, {
        cols: terminal.cols,
        rows: terminal.rows,
        effects: { popups, flash },
      }));
      updatePopups(popups);
      updateFlash(flash);
    },
    reset() {
      popups = [];
      flash = createFlashState();
    },
  };
}
