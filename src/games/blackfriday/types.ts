/**
 * Shared Black Friday Rush types
 */

export type PlayerMode = 'single' | 'two';

export type SlotIndex = 0 | 1;

export type ObjectKind = 'goodDeal' | 'badItem';

export type Phase = 'modeSelect' | 'playing' | 'nameEntry' | 'gameOver';

export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PlayerSlot {
  slotIndex: SlotIndex; // survives roster compaction
  position: Vec2;
  score: number;
  health: number;
}

export interface FallingObject {
  position: Vec2;
  kind: ObjectKind;
}

export interface FinalScore {
  slotIndex: SlotIndex;
  score: number;
}

export interface RoundState {
  mode: PlayerMode;
  players: PlayerSlot[];
  objects: FallingObject[];
  tickCount: number;
  difficultyMultiplier: number;
  spawnAccumulator: number;
  finalScores: FinalScore[];
}

/** A 0..1 random source, Math.random by default */
export type RandomSource = () => number;
