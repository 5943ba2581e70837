/**
 * Black Friday Rush
 *
 * Shoppers catch falling deals ($) and dodge junk (X) as the sale gets
 * faster. One player, or two sharing the floor.
 */

import type { Terminal } from '@xterm/xterm';
import { TICKS_PER_SECOND } from './constants';
import type { Button, InputSource } from './input';
import { readSources } from './input';
import { attachTerminalKeyboard, createKeyboardSource } from './keyboard';
import { createMemoryStore, createStoreGateway, type LeaderboardGateway } from './leaderboard';
import { createGame } from './machine';
import { createTerminalRenderer } from './render';
import type { RandomSource } from './types';
import { enterAlternateBuffer, exitAlternateBuffer, type GameTerminal } from '../utils';

/**
 * Black Friday Rush Game Controller
 */
export interface BlackFridayController {
  stop: () => void;
  isRunning: boolean;
}

export interface BlackFridayOptions {
  /** Defaults to an in-memory board that lasts as long as the process */
  leaderboard?: LeaderboardGateway;
  /** Resolves once with a gamepad-like source, or null when there is none */
  acquireController?: () => Promise<InputSource | null>;
  keyBindings?: Readonly<Record<string, Button>>;
  /** How long a key counts as held after its last press event */
  holdMs?: number;
  random?: RandomSource;
  onQuit?: () => void;
}

export const FRAME_MS = 1000 / TICKS_PER_SECOND;

export function runBlackFridayGame(
  terminal: Terminal | GameTerminal,
  options: BlackFridayOptions = {}
): BlackFridayController {
  const game = createGame({
    leaderboard: options.leaderboard ?? createStoreGateway(createMemoryStore()),
    random: options.random,
  });
  const renderer = createTerminalRenderer(terminal);
  const keyboard = createKeyboardSource(options.keyBindings);
  let gamepad: InputSource | null = null;
  let running = true;

  enterAlternateBuffer(terminal, 'black-friday');
  const keyAttachment = attachTerminalKeyboard(terminal, keyboard, { holdMs: options.holdMs });

  const tickInterval = setInterval(() => {
    if (!running) return;
    const report = game.tick(readSources([keyboard, gamepad]));
    renderer.render(game.view(), report);
  }, FRAME_MS);

  const controller: BlackFridayController = {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(tickInterval);
      keyAttachment.dispose();
      quitListener.dispose();
      exitAlternateBuffer(terminal, 'black-friday');
    },
    get isRunning() { return running; },
  };

  // Q leaves from the menus, never mid-round
  const quitListener = terminal.onKey(({ domEvent }) => {
    if (!running || domEvent.key.toLowerCase() !== 'q') return;
    const phase = game.view().phase;
    if (phase === 'modeSelect' || phase === 'gameOver') {
      controller.stop();
      options.onQuit?.();
    }
  });

  if (options.acquireController) {
    options.acquireController().then(
      source => {
        if (running) gamepad = source;
      },
      (err: unknown) => {
        console.warn('[Controller] Could not attach controller:', err);
      },
    );
  }

  renderer.render(game.view());
  return controller;
}

export { createGame } from './machine';
export type { Game, GameOptions, GameView, TickReport } from './machine';
export { renderFrame, createTerminalRenderer } from './render';
export type { RenderOptions, TerminalRenderer } from './render';
