/**
 * Collision resolution for one tick
 *
 * Order matters: hits are applied before off-screen culling, and
 * eliminations are archived before the caller checks for round over.
 */

import {
  FIELD_HEIGHT,
  GOOD_DEAL_POINTS,
  OBJECT_HEIGHT,
  OBJECT_WIDTH,
  PLAYER_HEIGHT,
  PLAYER_WIDTH,
} from './constants';
import { isAlive } from './round';
import type { FallingObject, FinalScore, ObjectKind, PlayerSlot, Rect, RoundState, SlotIndex, Vec2 } from './types';

export interface CollisionHit {
  slotIndex: SlotIndex;
  kind: ObjectKind;
  /** Where the object was when it was caught */
  position: Vec2;
}

export interface CollisionOutcome {
  hits: CollisionHit[];
  eliminated: FinalScore[];
  rosterEmpty: boolean;
}

export function overlaps(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width
    && a.x + a.width > b.x
    && a.y < b.y + b.height
    && a.y + a.height > b.y;
}

export function playerRect(slot: PlayerSlot): Rect {
  return { x: slot.position.x, y: slot.position.y, width: PLAYER_WIDTH, height: PLAYER_HEIGHT };
}

export function objectRect(object: FallingObject): Rect {
  return { x: object.position.x, y: object.position.y, width: OBJECT_WIDTH, height: OBJECT_HEIGHT };
}

function applyHit(slot: PlayerSlot, kind: ObjectKind): void {
  if (kind === 'goodDeal') {
    slot.score += GOOD_DEAL_POINTS;
  } else {
    slot.health = Math.max(0, slot.health - 1);
  }
}

export function resolveCollisions(round: RoundState): CollisionOutcome {
  const hits: CollisionHit[] = [];
  const consumed = new Set<FallingObject>();

  for (const object of round.objects) {
    const bounds = objectRect(object);
    // First living player in roster order takes it
    const catcher = round.players.find(slot => isAlive(slot) && overlaps(bounds, playerRect(slot)));
    if (!catcher) continue;

    applyHit(catcher, object.kind);
    hits.push({ slotIndex: catcher.slotIndex, kind: object.kind, position: { ...object.position } });
    consumed.add(object);
  }

  round.objects = round.objects
    .filter(object => !consumed.has(object))
    .filter(object => object.position.y < FIELD_HEIGHT);

  const eliminated: FinalScore[] = [];
  for (const slot of round.players) {
    if (slot.health === 0) {
      eliminated.push({ slotIndex: slot.slotIndex, score: slot.score });
    }
  }
  if (eliminated.length > 0) {
    round.finalScores.push(...eliminated);
    round.players = round.players.filter(slot => slot.health > 0);
  }

  return { hits, eliminated, rosterEmpty: round.players.length === 0 };
}
