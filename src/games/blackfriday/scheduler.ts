/**
 * Difficulty scheduler
 *
 * A spawn meter fills at the difficulty multiplier each tick and releases
 * one object every time it crosses the (shrinking) spawn interval, which
 * allows fractional spawn rates without frame-modulo logic.
 */

import {
  BASE_GOOD_CHANCE,
  BASE_SPAWN_INTERVAL,
  BONUS_SPAWN_CHANCE,
  BONUS_SPAWN_MULTIPLIER,
  DIFFICULTY_STEP,
  DIFFICULTY_STEP_TICKS,
  FIELD_WIDTH,
  GOOD_CHANCE_DECAY,
  MIN_GOOD_CHANCE,
  MIN_SPAWN_INTERVAL,
  OBJECT_HEIGHT,
  OBJECT_SPEED,
  OBJECT_WIDTH,
} from './constants';
import type { FallingObject, RandomSource, RoundState } from './types';

export function effectiveSpawnInterval(multiplier: number): number {
  return Math.max(MIN_SPAWN_INTERVAL, BASE_SPAWN_INTERVAL / multiplier);
}

export function goodDealChance(multiplier: number): number {
  return Math.max(MIN_GOOD_CHANCE, BASE_GOOD_CHANCE - GOOD_CHANCE_DECAY * (multiplier - 1));
}

/**
 * Multiplier for a tick count. Derived from the step count rather than
 * accumulated so repeated +0.2 never drifts below a threshold like 2.0.
 */
export function multiplierForTick(tickCount: number): number {
  return 1 + Math.floor(tickCount / DIFFICULTY_STEP_TICKS) * DIFFICULTY_STEP;
}

export function spawnObject(multiplier: number, random: RandomSource = Math.random): FallingObject {
  const x = random() * (FIELD_WIDTH - OBJECT_WIDTH);
  const kind = random() < goodDealChance(multiplier) ? 'goodDeal' : 'badItem';
  return { position: { x, y: -OBJECT_HEIGHT }, kind };
}

/**
 * One scheduler tick: ramp difficulty, spawn, then drop every object.
 * Returns the objects spawned this tick (already added to the round).
 */
export function advanceRound(round: RoundState, random: RandomSource = Math.random): FallingObject[] {
  round.tickCount += 1;
  if (round.tickCount % DIFFICULTY_STEP_TICKS === 0) {
    round.difficultyMultiplier = Math.max(round.difficultyMultiplier, multiplierForTick(round.tickCount));
  }

  const multiplier = round.difficultyMultiplier;
  round.spawnAccumulator += multiplier;

  const interval = effectiveSpawnInterval(multiplier);
  const spawned: FallingObject[] = [];
  while (round.spawnAccumulator >= interval) {
    round.spawnAccumulator -= interval;
    spawned.push(spawnObject(multiplier, random));

    // Past 2x, occasionally double up
    if (multiplier >= BONUS_SPAWN_MULTIPLIER && random() < BONUS_SPAWN_CHANCE) {
      spawned.push(spawnObject(multiplier, random));
    }
  }
  round.objects.push(...spawned);

  const fall = OBJECT_SPEED * multiplier;
  for (const object of round.objects) {
    object.position.y += fall;
  }

  return spawned;
}
