/**
 * Shared terminal utilities
 *
 * The theme is process-wide and set by the host (the CLI's --theme flag,
 * or an embedding app) via setTheme().
 */

import type { KeyEventSource } from './blackfriday/keyboard';
import {
  type ThemeMode,
  DEFAULT_THEME,
  getAnsiColor,
  getSubtleColor,
  isLightTheme as checkLightTheme,
} from '../themes';

/**
 * The parts of an xterm.js Terminal a game draws to and listens on.
 * An xterm Terminal satisfies it as is, so does the CLI's Node adapter.
 */
export interface GameTerminal extends KeyEventSource {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
}

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: ThemeMode = DEFAULT_THEME;

export function setTheme(mode: ThemeMode): void {
  currentTheme = mode;
}

export function getTheme(): ThemeMode {
  return currentTheme;
}

export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

/**
 * Muted color for field details that should sit behind the action
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, with who put them there
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter the alternate screen buffer. A second call warns instead of
 * entering twice.
 *
 * @returns true if the buffer was entered
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H');

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * @returns true if the buffer was exited
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}

/**
 * Column where text of the given width starts when centred on centerX
 */
export function centerColumn(centerX: number, text: string): number {
  return Math.max(1, centerX - Math.floor(text.length / 2));
}

export type { ThemeMode } from '../themes';
