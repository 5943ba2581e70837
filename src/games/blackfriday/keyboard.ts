/**
 * Keyboard input source
 *
 * Terminals only report key presses (no key-up), so a key counts as held
 * from its press until HOLD_RELEASE_MS after its last repeat.
 */

import type { Button, InputSnapshot, InputSource } from './input';
import { createSnapshot } from './input';

/**
 * Default key bindings, keyed by KeyboardEvent.key
 */
export const KEY_BINDINGS: Readonly<Record<string, Button>> = {
  '1': 'systemOnePlayer',
  '2': 'systemTwoPlayer',
  ArrowLeft: 'player1Left',
  ArrowRight: 'player1Right',
  ArrowUp: 'player1Up',
  ArrowDown: 'player1Down',
  Enter: 'player1Confirm',
  ' ': 'player1Confirm',
  d: 'player2Left',
  g: 'player2Right',
  a: 'player2Confirm',
};

export const HOLD_RELEASE_MS = 120;

export interface KeyboardSource extends InputSource {
  /** Returns false when the key has no binding */
  press(key: string): boolean;
  release(key: string): boolean;
  releaseAll(): void;
}

function normalizeKey(key: string): string {
  return key.length === 1 ? key.toLowerCase() : key;
}

export function createKeyboardSource(
  bindings: Readonly<Record<string, Button>> = KEY_BINDINGS
): KeyboardSource {
  const held = new Set<string>();

  const lookup = (key: string): Button | undefined => {
    const normalized = normalizeKey(key);
    return Object.prototype.hasOwnProperty.call(bindings, normalized) ? bindings[normalized] : undefined;
  };

  return {
    press(key) {
      if (!lookup(key)) return false;
      held.add(normalizeKey(key));
      return true;
    },
    release(key) {
      if (!lookup(key)) return false;
      held.delete(normalizeKey(key));
      return true;
    },
    releaseAll() {
      held.clear();
    },
    snapshot(): InputSnapshot {
      const pressed: Partial<Record<Button, boolean>> = {};
      for (const key of held) {
        const button = lookup(key);
        if (button) pressed[button] = true;
      }
      return createSnapshot(pressed);
    },
  };
}

// ============================================================================
// Terminal wiring
// ============================================================================

export interface Disposable {
  dispose(): void;
}

export interface TerminalKeyEvent {
  key: string;
  domEvent: { key: string };
}

/**
 * The key-event half of an xterm.js Terminal
 */
export interface KeyEventSource {
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
}

export interface AttachKeyboardOptions {
  holdMs?: number;
}

/**
 * Feed terminal key presses into a keyboard source with auto-release.
 * Disposing clears pending releases and lets go of every key.
 */
export function attachTerminalKeyboard(
  terminal: KeyEventSource,
  keyboard: KeyboardSource,
  options: AttachKeyboardOptions = {}
): Disposable {
  const holdMs = options.holdMs ?? HOLD_RELEASE_MS;
  const releaseTimers = new Map<string, ReturnType<typeof setTimeout>>();

  const listener = terminal.onKey(({ domEvent }) => {
    const key = domEvent.key;
    if (!keyboard.press(key)) return;

    const pending = releaseTimers.get(key);
    if (pending !== undefined) clearTimeout(pending);

    releaseTimers.set(key, setTimeout(() => {
      releaseTimers.delete(key);
      keyboard.release(key);
    }, holdMs));
  });

  return {
    dispose() {
      listener.dispose();
      for (const timer of releaseTimers.values()) clearTimeout(timer);
      releaseTimers.clear();
      keyboard.releaseAll();
    },
  };
}
