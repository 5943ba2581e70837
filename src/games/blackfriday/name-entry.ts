/**
 * Initials entry for pending high scores
 */

import { DEFAULT_NAME, NAME_LENGTH } from './constants';
import type { FinalScore } from './types';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export interface NameEntryState {
  /** Scores still waiting for initials, first one is being edited */
  pending: FinalScore[];
  letters: string[];
  cursor: number;
}

export function createNameEntry(pending: readonly FinalScore[]): NameEntryState {
  return {
    pending: pending.map(entry => ({ ...entry })),
    letters: DEFAULT_NAME.split(''),
    cursor: 0,
  };
}

export function currentName(state: NameEntryState): string {
  return state.letters.join('');
}

export function currentPending(state: NameEntryState): FinalScore | undefined {
  return state.pending[0];
}

/**
 * Step the letter under the cursor, wrapping A <-> Z.
 * A cursor outside the name leaves everything as is.
 */
export function cycleLetter(state: NameEntryState, step: -1 | 1): void {
  if (state.pending.length === 0) return;
  if (state.cursor < 0 || state.cursor >= NAME_LENGTH) return;

  const index = ALPHABET.indexOf(state.letters[state.cursor] ?? '');
  const from = index === -1 ? 0 : index;
  const next = (from + step + ALPHABET.length) % ALPHABET.length;
  state.letters[state.cursor] = ALPHABET.charAt(next);
}

export function moveCursor(state: NameEntryState, step: -1 | 1): void {
  if (state.pending.length === 0) return;
  state.cursor = Math.min(Math.max(state.cursor + step, 0), NAME_LENGTH - 1);
}

/**
 * Pop the first pending score with the current initials and reset the
 * editor for the next one. Returns undefined when nothing is pending.
 */
export function commitName(state: NameEntryState): { entry: FinalScore; name: string } | undefined {
  const entry = state.pending.shift();
  if (!entry) return undefined;

  const name = currentName(state);
  state.letters = DEFAULT_NAME.split('');
  state.cursor = 0;
  return { entry, name };
}
