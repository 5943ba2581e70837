/**
 * Black Friday Rush for xterm.js and the terminal
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runBlackFridayGame(terminal, { leaderboard })
 * 3. Or drive the core yourself: createGame() + tick() + renderFrame()
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  getSubtleBackgroundColor,
  getVerticalAnchor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
} from './utils';

export type { GameTerminal, ThemeMode } from './utils';

export { renderSimpleMenu, renderMenuHint } from './shared/menu';
export type { RenderMenuOptions, SimpleMenuItem } from './shared/menu';

export {
  addScorePopup,
  updatePopups,
  createFlashState,
  triggerFlash,
  updateFlash,
  isFlashVisible,
} from './shared/effects';
export type { ScorePopup, FlashState } from './shared/effects';

// Game
export { runBlackFridayGame, FRAME_MS } from './blackfriday';
export type { BlackFridayController, BlackFridayOptions } from './blackfriday';

export { createGame } from './blackfriday/machine';
export type { Game, GameOptions, GameView, TickReport } from './blackfriday/machine';

export * from './blackfriday/constants';
export type * from './blackfriday/types';

export { BUTTONS, EMPTY_SNAPSHOT, createSnapshot, mergeInputs, readSources } from './blackfriday/input';
export type { Button, InputSnapshot, InputSource } from './blackfriday/input';

export { detectEdges, createEdgeTracker, isHeld } from './blackfriday/edges';
export type { Action, EdgeSet, EdgeTracker } from './blackfriday/edges';

export { KEY_BINDINGS, HOLD_RELEASE_MS, createKeyboardSource, attachTerminalKeyboard } from './blackfriday/keyboard';
export type { KeyboardSource, KeyEventSource, TerminalKeyEvent, Disposable } from './blackfriday/keyboard';

export { createRoundState, createPlayerSlot, movePlayer, playerCount, isAlive } from './blackfriday/round';
export { advanceRound, effectiveSpawnInterval, goodDealChance, multiplierForTick } from './blackfriday/scheduler';
export { resolveCollisions, overlaps } from './blackfriday/collisions';
export type { CollisionHit, CollisionOutcome } from './blackfriday/collisions';

export { createNameEntry, cycleLetter, moveCursor, commitName, currentName } from './blackfriday/name-entry';
export type { NameEntryState } from './blackfriday/name-entry';

export {
  LEADERBOARD_KEY,
  addEntry,
  qualifies,
  parseLeaderboard,
  serializeLeaderboard,
  createStoreGateway,
  createMemoryStore,
} from './blackfriday/leaderboard';
export type { LeaderboardEntry, LeaderboardGateway, KeyValueStore } from './blackfriday/leaderboard';

export { renderFrame, createTerminalRenderer, GRID_COLS, GRID_ROWS, MIN_COLS, MIN_ROWS } from './blackfriday/render';
export type { RenderOptions, TerminalRenderer } from './blackfriday/render';
