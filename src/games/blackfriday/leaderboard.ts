/**
 * Leaderboard
 *
 * A ranked top-10 list plus the gateway that persists it through a
 * key-value store (localStorage in a browser host, a file store in the CLI).
 */

import { DEFAULT_NAME, LEADERBOARD_SIZE } from './constants';
import type { PlayerMode } from './types';

// ============================================================================
// Types
// ============================================================================

export interface LeaderboardEntry {
  score: number;
  mode: PlayerMode;
  name: string;
}

export interface LeaderboardGateway {
  load(): LeaderboardEntry[];
  save(entries: readonly LeaderboardEntry[]): void;
}

/**
 * The part of the Web Storage API the gateway needs
 */
export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export const LEADERBOARD_KEY = 'black_friday_leaderboard';

// ============================================================================
// Ranking
// ============================================================================

function rank(entries: LeaderboardEntry[]): LeaderboardEntry[] {
  // Array.prototype.sort is stable, so equal scores keep insertion order
  return entries.sort((a, b) => b.score - a.score).slice(0, LEADERBOARD_SIZE);
}

export function addEntry(entries: readonly LeaderboardEntry[], entry: LeaderboardEntry): LeaderboardEntry[] {
  return rank([...entries, { ...entry }]);
}

export function qualifies(entries: readonly LeaderboardEntry[], score: number): boolean {
  if (entries.length < LEADERBOARD_SIZE) return true;
  const last = entries[entries.length - 1];
  return last === undefined || score > last.score;
}

// ============================================================================
// Persisted format
// ============================================================================

const NAME_PATTERN = /^[A-Z]{3}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readEntry(raw: unknown): LeaderboardEntry | null {
  if (!isRecord(raw)) return null;
  const { score, mode, name } = raw;
  if (typeof score !== 'number' || !Number.isFinite(score)) return null;
  if (typeof mode !== 'number' || !Number.isFinite(mode)) return null;

  return {
    score: Math.trunc(score),
    mode: mode === 0 ? 'single' : 'two',
    name: typeof name === 'string' && NAME_PATTERN.test(name) ? name : DEFAULT_NAME,
  };
}

/**
 * Absent or unparsable data reads as an empty leaderboard
 */
export function parseLeaderboard(raw: string | null): LeaderboardEntry[] {
  if (raw === null || raw === '') return [];

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(data)) return [];

  const entries: LeaderboardEntry[] = [];
  for (const item of data) {
    const entry = readEntry(item);
    if (entry) entries.push(entry);
  }
  return rank(entries);
}

export function serializeLeaderboard(entries: readonly LeaderboardEntry[]): string {
  return JSON.stringify(entries.map(({ score, mode, name }) => ({
    score,
    mode: mode === 'single' ? 0 : 1,
    name,
  })));
}

// ============================================================================
// Gateways
// ============================================================================

export function createStoreGateway(store: KeyValueStore, key: string = LEADERBOARD_KEY): LeaderboardGateway {
  return {
    load() {
      try {
        return parseLeaderboard(store.getItem(key));
      } catch (err) {
        console.warn('[Leaderboard] Could not read scores:', err);
        return [];
      }
    },
    save(entries) {
      try {
        store.setItem(key, serializeLeaderboard(entries));
      } catch (err) {
        console.warn('[Leaderboard] Could not save scores:', err);
      }
    },
  };
}

export function createMemoryStore(initial: Record<string, string> = {}): KeyValueStore {
  const items = new Map(Object.entries(initial));
  return {
    getItem: key => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
  };
}
