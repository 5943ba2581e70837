/**
 * Black Friday Rush phase machine
 *
 * ModeSelect -> Playing -> (NameEntry ->) GameOver -> ModeSelect
 *
 * One call to tick() is one frame: edges are derived first, then the
 * current phase handles them, then a live round advances and resolves.
 */

import { advanceRound } from './scheduler';
import { resolveCollisions, type CollisionHit } from './collisions';
import { createEdgeTracker, type EdgeSet } from './edges';
import type { InputSnapshot } from './input';
import { addEntry, type LeaderboardEntry, type LeaderboardGateway } from './leaderboard';
import { commitName, createNameEntry, cycleLetter, moveCursor, type NameEntryState } from './name-entry';
import { createRoundState, movePlayer } from './round';
import type { FallingObject, FinalScore, Phase, PlayerMode, RandomSource, RoundState, SlotIndex } from './types';

// ============================================================================
// Types
// ============================================================================

export interface GameOptions {
  leaderboard: LeaderboardGateway;
  random?: RandomSource;
}

export interface GameView {
  readonly phase: Phase;
  /** Mode of the current or most recent round */
  readonly mode: PlayerMode;
  readonly menuSelection: PlayerMode;
  readonly round: RoundState | null;
  readonly nameEntry: NameEntryState | null;
  readonly finalScores: readonly FinalScore[];
  readonly leaderboard: readonly LeaderboardEntry[];
}

export interface TickReport {
  /** Phase after the tick */
  phase: Phase;
  hits: CollisionHit[];
  eliminated: FinalScore[];
  spawned: FallingObject[];
  committed: LeaderboardEntry | null;
  transitioned: boolean;
}

export interface Game {
  tick(input: InputSnapshot): TickReport;
  view(): GameView;
  startRound(mode: PlayerMode): void;
  returnToMenu(): void;
}

interface GameState {
  phase: Phase;
  mode: PlayerMode;
  menuSelection: PlayerMode;
  round: RoundState | null;
  nameEntry: NameEntryState | null;
  finalScores: FinalScore[];
  leaderboard: LeaderboardEntry[];
}

// ============================================================================
// Game
// ============================================================================

export function createGame(options: GameOptions): Game {
  const gateway = options.leaderboard;
  const random = options.random ?? Math.random;

  // Menus and game over read one tracker; name entry gets its own so a
  // button held across the phase change doesn't count as a fresh press
  const controlEdges = createEdgeTracker();
  const nameEdges = createEdgeTracker();

  const state: GameState = {
    phase: 'modeSelect',
    mode: 'single',
    menuSelection: 'single',
    round: null,
    nameEntry: null,
    finalScores: [],
    leaderboard: gateway.load(),
  };

  function startRound(mode: PlayerMode): void {
    state.mode = mode;
    state.round = createRoundState(mode);
    state.finalScores = [];
    state.nameEntry = null;
    state.phase = 'playing';
  }

  function returnToMenu(): void {
    state.phase = 'modeSelect';
    state.menuSelection = 'single';
    state.round = null;
    state.nameEntry = null;
    state.finalScores = [];
    state.leaderboard = gateway.load();
  }

  function endRound(round: RoundState, input: InputSnapshot): void {
    state.finalScores = [...round.finalScores];
    state.round = null;

    if (state.finalScores.length > 0) {
      state.nameEntry = createNameEntry(state.finalScores);
      nameEdges.reset(input);
      state.phase = 'nameEntry';
    } else {
      state.phase = 'gameOver';
    }
  }

  /** Start a round from a system button, two-player first */
  function startFromSystem(edges: EdgeSet): boolean {
    if (edges.systemTwoPlayer) {
      startRound('two');
      return true;
    }
    if (edges.systemOnePlayer) {
      startRound('single');
      return true;
    }
    return false;
  }

  function handleModeSelect(edges: EdgeSet): void {
    if (edges.left) state.menuSelection = 'single';
    if (edges.right) state.menuSelection = 'two';

    if (startFromSystem(edges)) return;
    if (edges.confirm) startRound(state.menuSelection);
  }

  function handleGameOver(edges: EdgeSet): void {
    if (startFromSystem(edges)) return;
    if (edges.confirm) returnToMenu();
  }

  function steer(round: RoundState, slotIndex: SlotIndex, left: boolean, right: boolean): void {
    if (left) movePlayer(round, slotIndex, -1);
    if (right) movePlayer(round, slotIndex, 1);
  }

  function playRound(round: RoundState, input: InputSnapshot, report: TickReport): void {
    steer(round, 0, input.player1Left, input.player1Right);
    if (round.mode === 'two') {
      steer(round, 1, input.player2Left, input.player2Right);
    }

    report.spawned = advanceRound(round, random);

    const outcome = resolveCollisions(round);
    report.hits = outcome.hits;
    report.eliminated = outcome.eliminated;

    if (outcome.rosterEmpty) endRound(round, input);
  }

  function handleNameEntry(input: InputSnapshot, report: TickReport): void {
    const edges = nameEdges.update(input);
    const entry = state.nameEntry;
    if (!entry) return;

    if (edges.up) cycleLetter(entry, -1);
    if (edges.down) cycleLetter(entry, 1);
    if (edges.left) moveCursor(entry, -1);
    if (edges.right) moveCursor(entry, 1);

    if (!edges.confirm) return;
    const result = commitName(entry);
    if (!result) return;

    const committed: LeaderboardEntry = { score: result.entry.score, mode: state.mode, name: result.name };
    state.leaderboard = addEntry(state.leaderboard, committed);
    gateway.save(state.leaderboard);
    report.committed = committed;

    if (entry.pending.length === 0) {
      state.nameEntry = null;
      state.phase = 'gameOver';
    }
  }

  function tick(input: InputSnapshot): TickReport {
    const startPhase = state.phase;
    const edges = controlEdges.update(input);
    const report: TickReport = {
      phase: state.phase,
      hits: [],
      eliminated: [],
      spawned: [],
      committed: null,
      transitioned: false,
    };

    switch (state.phase) {
      case 'modeSelect':
        handleModeSelect(edges);
        break;
      case 'nameEntry':
        handleNameEntry(input, report);
        break;
      case 'gameOver':
        handleGameOver(edges);
        break;
      case 'playing':
        break;
    }

    // A round started above plays its first frame now
    if (state.phase === 'playing' && state.round) {
      playRound(state.round, input, report);
    }

    report.phase = state.phase;
    report.transitioned = state.phase !== startPhase;
    return report;
  }

  return {
    tick,
    view: () => state,
    startRound,
    returnToMenu,
  };
}
