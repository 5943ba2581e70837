import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { FRAME_MS, runBlackFridayGame } from './index';
import { createSnapshot } from './input';
import { createMemoryStore, createStoreGateway, LEADERBOARD_KEY } from './leaderboard';
import type { Disposable, TerminalKeyEvent } from './keyboard';
import type { GameTerminal } from '../utils';

interface FakeTerminal extends GameTerminal {
  writes: string[];
  emit(key: string): void;
  listenerCount(): number;
  lastWrite(): string;
}

function createFakeTerminal(): FakeTerminal {
  const writes: string[] = [];
  const listeners: ((event: TerminalKeyEvent) => void)[] = [];
  return {
    cols: 80,
    rows: 30,
    writes,
    write: data => {
      writes.push(data);
    },
    onKey: (listener): Disposable => {
      listeners.push(listener);
      return {
        dispose: () => {
          const idx = listeners.indexOf(listener);
          if (idx !== -1) listeners.splice(idx, 1);
        },
      };
    },
    emit(key) {
      for (const listener of [...listeners]) listener({ key, domEvent: { key } });
    },
    listenerCount: () => listeners.length,
    lastWrite: () => writes[writes.length - 1] ?? '',
  };
}

describe('runBlackFridayGame', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('opens the alternate buffer and draws the menu', () => {
    const terminal = createFakeTerminal();
    const game = runBlackFridayGame(terminal, { random: () => 0.5 });

    expect(terminal.writes[0]).toBe('\x1b[?1049h');
    expect(terminal.lastWrite()).toContain('► 1P SOLO SHOPPER ◄');
    expect(game.isRunning).toBe(true);
    game.stop();
  });

  it('starts a two-player round from the 2 key', () => {
    const terminal = createFakeTerminal();
    const game = runBlackFridayGame(terminal, { random: () => 0.5 });

    terminal.emit('2');
    vi.advanceTimersByTime(Math.ceil(FRAME_MS));

    expect(terminal.lastWrite()).toContain('P1 0000 ♥♥♥   P2 0000 ♥♥♥   LVL 1');
    game.stop();
  });

  it('shows the saved leaderboard on the menu', () => {
    const store = createMemoryStore({ [LEADERBOARD_KEY]: '[{"score":80,"mode":1,"name":"ANN"}]' });
    const terminal = createFakeTerminal();
    const game = runBlackFridayGame(terminal, { leaderboard: createStoreGateway(store) });

    expect(terminal.lastWrite()).toContain(' 1. ANN     80  2P');
    game.stop();
  });

  it('quits from the menu on Q', () => {
    const terminal = createFakeTerminal();
    const onQuit = vi.fn();
    const game = runBlackFridayGame(terminal, { onQuit });

    terminal.emit('q');

    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(game.isRunning).toBe(false);
    expect(terminal.writes.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(terminal.listenerCount()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('ignores Q mid-round', () => {
    const terminal = createFakeTerminal();
    const onQuit = vi.fn();
    const game = runBlackFridayGame(terminal, { onQuit, random: () => 0.5 });

    terminal.emit('1');
    vi.advanceTimersByTime(Math.ceil(FRAME_MS));
    terminal.emit('q');

    expect(onQuit).not.toHaveBeenCalled();
    expect(game.isRunning).toBe(true);
    game.stop();
  });

  it('stops ticking and lets go of held keys', () => {
    const terminal = createFakeTerminal();
    const game = runBlackFridayGame(terminal);

    terminal.emit('ArrowLeft');
    game.stop();
    game.stop();

    const writes = terminal.writes.length;
    vi.advanceTimersByTime(1000);
    expect(terminal.writes.length).toBe(writes);
    expect(vi.getTimerCount()).toBe(0);
    expect(terminal.writes.filter(data => data === '\x1b[?1049l')).toHaveLength(1);
  });

  it('reads an attached controller', async () => {
    const terminal = createFakeTerminal();
    const controller = { snapshot: () => createSnapshot({ systemOnePlayer: true }) };
    const game = runBlackFridayGame(terminal, {
      acquireController: async () => controller,
      random: () => 0.5,
    });

    await vi.advanceTimersByTimeAsync(Math.ceil(FRAME_MS));

    expect(terminal.lastWrite()).toContain('P1 0000 ♥♥♥   LVL 1');
    expect(terminal.lastWrite()).not.toContain('P2 0000');
    game.stop();
  });

  it('keeps playing on the keyboard when no controller attaches', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failure = new Error('no gamepad');
    const terminal = createFakeTerminal();
    const game = runBlackFridayGame(terminal, {
      acquireController: () => Promise.reject(failure),
    });

    await vi.advanceTimersByTimeAsync(1);

    expect(warn).toHaveBeenCalledWith('[Controller] Could not attach controller:', failure);
    expect(game.isRunning).toBe(true);
    game.stop();
  });
});
