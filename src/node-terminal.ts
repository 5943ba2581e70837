/**
 * Node.js terminal adapter
 *
 * Maps raw-mode stdin and stdout onto the small xterm.js-shaped surface
 * the game draws to, so the same game code runs in any terminal emulator.
 */

import type { Disposable, TerminalKeyEvent } from './games/blackfriday/keyboard';
import type { GameTerminal } from './games/utils';

export interface NodeTerminal extends GameTerminal {
  /** Restore the cooked terminal and show the cursor again */
  cleanup(): void;
}

/**
 * Parse one raw stdin key sequence into a KeyboardEvent.key value
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

const ESCAPE_SEQUENCE = /^\x1b(?:\[[0-9;]*[A-Za-z~]|O[A-Za-z])/;

/**
 * Split a stdin chunk into individual key sequences. Fast key repeat can
 * deliver several keys in one chunk.
 */
export function splitKeys(data: string): string[] {
  const keys: string[] = [];
  let rest = data;
  while (rest.length > 0) {
    const match = ESCAPE_SEQUENCE.exec(rest);
    const sequence = match ? match[0] : Array.from(rest)[0] ?? rest;
    keys.push(sequence);
    rest = rest.slice(sequence.length);
  }
  return keys;
}

// Synchronized output: the terminal paints clear + redraw in one go
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout
): NodeTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];

  if (stdin.isTTY) {
    stdin.setRawMode(true);
  }
  stdin.resume();
  stdin.setEncoding('utf8');

  const onData = (chunk: string | Buffer) => {
    const data = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    for (const sequence of splitKeys(data)) {
      if (sequence === '\x03') {
        cleanup();
        process.exit(0);
      }

      const key = parseKey(sequence);
      for (const listener of [...keyListeners]) {
        listener({ key, domEvent: { key } });
      }
    }
  };
  stdin.on('data', onData);

  let cleanedUp = false;
  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    stdin.off('data', onData);
    if (stdin.isTTY) {
      stdin.setRawMode(false);
    }
    stdin.pause();
    stdout.write('\x1b[?1049l');
    stdout.write('\x1b[?25h');
    stdout.write('\x1b[0m');
  }

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return {
    write: (data: string) => {
      stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return stdout.columns || 80; },
    get rows() { return stdout.rows || 24; },
    onKey: (callback: (event: TerminalKeyEvent) => void): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        },
      };
    },
    cleanup,
  };
}
