/**
 * Shared Visual Effects
 *
 * Score popups that float up from a catch, and a strobing hit flash.
 * Positions are in screen cells, not field units.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface ScorePopup {
  x: number;
  y: number;
  text: string;
  frames: number;
  color: string;
}

export interface FlashState {
  frames: number;
}

export const POPUP_FRAMES = 18;

// ============================================================================
// SCORE POPUPS
// ============================================================================

/**
 * Add a floating text popup that rises and fades.
 */
export function addScorePopup(
  popups: ScorePopup[],
  x: number,
  y: number,
  text: string,
  color: string = '\x1b[1;33m',
): void {
  popups.push({ x, y, text, frames: POPUP_FRAMES, color });
}

/**
 * Float popups upward and drop expired ones.
 */
export function updatePopups(popups: ScorePopup[]): void {
  for (let i = popups.length - 1; i >= 0; i--) {
    const popup = popups[i];
    if (!popup) continue;
    popup.y -= 0.25;
    popup.frames--;
    if (popup.frames <= 0) popups.splice(i, 1);
  }
}

// ============================================================================
// FLASH EFFECTS
// ============================================================================

export function createFlashState(): FlashState {
  return { frames: 0 };
}

export function triggerFlash(state: FlashState, frames: number): void {
  state.frames = Math.max(state.frames, frames);
}

/**
 * Count down one frame. Returns true while the flash is active.
 */
export function updateFlash(state: FlashState): boolean {
  if (state.frames > 0) {
    state.frames--;
    return true;
  }
  return false;
}

/**
 * Alternating visibility for a strobing border.
 */
export function isFlashVisible(state: FlashState): boolean {
  return state.frames > 0 && state.frames % 4 < 2;
}
