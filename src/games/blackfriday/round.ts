/**
 * Round model: player slots, round creation, movement
 */

import {
  FIELD_HEIGHT,
  FIELD_WIDTH,
  PLAYER_FLOOR_MARGIN,
  PLAYER_HEIGHT,
  PLAYER_SPEED,
  PLAYER_WIDTH,
  STARTING_HEALTH,
} from './constants';
import type { PlayerMode, PlayerSlot, RoundState, SlotIndex } from './types';

export function playerCount(mode: PlayerMode): 1 | 2 {
  return mode === 'two' ? 2 : 1;
}

export function slotIndicesFor(mode: PlayerMode): SlotIndex[] {
  return mode === 'two' ? [0, 1] : [0];
}

export function isAlive(slot: PlayerSlot): boolean {
  return slot.health > 0;
}

/**
 * A fresh slot, centred on its share of the field width
 */
export function createPlayerSlot(slotIndex: SlotIndex, totalPlayers: number): PlayerSlot {
  const spacing = FIELD_WIDTH / (totalPlayers + 1);
  const center = spacing * (slotIndex + 1);
  return {
    slotIndex,
    position: {
      x: clampPlayerX(center - PLAYER_WIDTH / 2),
      y: FIELD_HEIGHT - PLAYER_HEIGHT - PLAYER_FLOOR_MARGIN,
    },
    score: 0,
    health: STARTING_HEALTH,
  };
}

export function createRoundState(mode: PlayerMode): RoundState {
  const total = playerCount(mode);
  return {
    mode,
    players: slotIndicesFor(mode).map(index => createPlayerSlot(index, total)),
    objects: [],
    tickCount: 0,
    difficultyMultiplier: 1,
    spawnAccumulator: 0,
    finalScores: [],
  };
}

export function clampPlayerX(x: number): number {
  return Math.min(Math.max(x, 0), FIELD_WIDTH - PLAYER_WIDTH);
}

export function findPlayer(round: RoundState, slotIndex: SlotIndex): PlayerSlot | undefined {
  return round.players.find(slot => slot.slotIndex === slotIndex && isAlive(slot));
}

/**
 * Move a living player by slot (not array position, the roster shrinks).
 * Returns false when that slot has been eliminated.
 */
export function movePlayer(round: RoundState, slotIndex: SlotIndex, direction: -1 | 1): boolean {
  const slot = findPlayer(round, slotIndex);
  if (!slot) return false;
  slot.position.x = clampPlayerX(slot.position.x + direction * PLAYER_SPEED);
  return true;
}
