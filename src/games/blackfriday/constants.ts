/**
 * Black Friday Rush tuning
 *
 * Playfield units are abstract "pixels"; the renderer scales them to
 * terminal cells. Every value here is observable difficulty behavior.
 */

// ============================================================================
// Playfield
// ============================================================================

export const FIELD_WIDTH = 330;
export const FIELD_HEIGHT = 250;

export const PLAYER_WIDTH = 30;
export const PLAYER_HEIGHT = 30;
export const PLAYER_SPEED = 3; // units per tick while a direction is held
export const PLAYER_FLOOR_MARGIN = 20; // gap between the shoppers and the bottom edge

export const OBJECT_WIDTH = 20;
export const OBJECT_HEIGHT = 20;
export const OBJECT_SPEED = 3; // fall speed at multiplier 1.0

// ============================================================================
// Difficulty
// ============================================================================

export const TICKS_PER_SECOND = 60;
export const DIFFICULTY_STEP_TICKS = 600; // ~10s at 60 ticks/s
export const DIFFICULTY_STEP = 0.2;

export const BASE_SPAWN_INTERVAL = 45;
export const MIN_SPAWN_INTERVAL = 10;

export const BONUS_SPAWN_MULTIPLIER = 2.0;
export const BONUS_SPAWN_CHANCE = 0.25;

export const BASE_GOOD_CHANCE = 0.6;
export const GOOD_CHANCE_DECAY = 0.15;
export const MIN_GOOD_CHANCE = 0.25;

// ============================================================================
// Scoring
// ============================================================================

export const GOOD_DEAL_POINTS = 10;
export const STARTING_HEALTH = 3;

export const LEADERBOARD_SIZE = 10;
export const NAME_LENGTH = 3;
export const DEFAULT_NAME = 'AAA';
