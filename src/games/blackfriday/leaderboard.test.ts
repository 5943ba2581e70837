import { describe, it, expect, vi } from 'vitest';
import {
  addEntry,
  createMemoryStore,
  createStoreGateway,
  LEADERBOARD_KEY,
  parseLeaderboard,
  qualifies,
  serializeLeaderboard,
  type LeaderboardEntry,
} from './leaderboard';

function entry(score: number, name = 'AAA'): LeaderboardEntry {
  return { score, mode: 'single', name };
}

describe('addEntry', () => {
  it('keeps the list sorted by score', () => {
    let entries: LeaderboardEntry[] = [];
    entries = addEntry(entries, entry(30));
    entries = addEntry(entries, entry(50));
    entries = addEntry(entries, entry(40));
    expect(entries.map(e => e.score)).toEqual([50, 40, 30]);
  });

  it('keeps insertion order for ties', () => {
    let entries: LeaderboardEntry[] = [];
    entries = addEntry(entries, entry(50, 'ONE'));
    entries = addEntry(entries, entry(50, 'TWO'));
    expect(entries.map(e => e.name)).toEqual(['ONE', 'TWO']);
  });

  it('caps the list at ten, evicting the lowest scores', () => {
    let entries: LeaderboardEntry[] = [];
    for (let score = 10; score <= 110; score += 10) {
      entries = addEntry(entries, entry(score));
    }
    expect(entries).toHaveLength(10);
    expect(entries[0]?.score).toBe(110);
    expect(entries[9]?.score).toBe(20);
  });

  it('does not mutate the input list', () => {
    const entries = [entry(10)];
    addEntry(entries, entry(20));
    expect(entries).toEqual([entry(10)]);
  });
});

describe('qualifies', () => {
  it('accepts anything while the board has room', () => {
    expect(qualifies([entry(100)], 0)).toBe(true);
  });

  it('requires beating the last place on a full board', () => {
    const full = Array.from({ length: 10 }, (_, i) => entry(100 - i * 10));
    expect(qualifies(full, 10)).toBe(false);
    expect(qualifies(full, 11)).toBe(true);
  });
});

describe('parseLeaderboard', () => {
  it('reads missing or unparsable data as empty', () => {
    expect(parseLeaderboard(null)).toEqual([]);
    expect(parseLeaderboard('')).toEqual([]);
    expect(parseLeaderboard('not json')).toEqual([]);
    expect(parseLeaderboard('{"score":1}')).toEqual([]);
  });

  it('decodes mode tags and sorts', () => {
    const raw = '[{"score":10,"mode":0,"name":"ABC"},{"score":30,"mode":1,"name":"XYZ"}]';
    expect(parseLeaderboard(raw)).toEqual([
      { score: 30, mode: 'two', name: 'XYZ' },
      { score: 10, mode: 'single', name: 'ABC' },
    ]);
  });

  it('skips records without a numeric score or mode', () => {
    const raw = '[{"score":"high","mode":0,"name":"ABC"},{"score":5,"name":"DEF"},{"score":7,"mode":0,"name":"GHI"}]';
    expect(parseLeaderboard(raw)).toEqual([{ score: 7, mode: 'single', name: 'GHI' }]);
  });

  it('replaces malformed names with the default', () => {
    const raw = '[{"score":1,"mode":0,"name":"toolong"},{"score":2,"mode":0}]';
    expect(parseLeaderboard(raw).map(e => e.name)).toEqual(['AAA', 'AAA']);
  });

  it('caps an oversized list', () => {
    const raw = JSON.stringify(Array.from({ length: 12 }, (_, i) => ({ score: i, mode: 0, name: 'AAA' })));
    const entries = parseLeaderboard(raw);
    expect(entries).toHaveLength(10);
    expect(entries[9]?.score).toBe(2);
  });
});

describe('serializeLeaderboard', () => {
  it('writes numeric mode tags', () => {
    expect(serializeLeaderboard([{ score: 100, mode: 'single', name: 'BAA' }, { score: 90, mode: 'two', name: 'CAB' }]))
      .toBe('[{"score":100,"mode":0,"name":"BAA"},{"score":90,"mode":1,"name":"CAB"}]');
  });
});

describe('createStoreGateway', () => {
  it('saves and loads through the store key', () => {
    const store = createMemoryStore();
    const gateway = createStoreGateway(store);

    gateway.save([{ score: 20, mode: 'two', name: 'BOB' }]);

    expect(store.getItem(LEADERBOARD_KEY)).toBe('[{"score":20,"mode":1,"name":"BOB"}]');
    expect(gateway.load()).toEqual([{ score: 20, mode: 'two', name: 'BOB' }]);
  });

  it('loads an empty board from an empty store', () => {
    expect(createStoreGateway(createMemoryStore()).load()).toEqual([]);
  });

  it('warns and carries on when the store rejects a write', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failure = new Error('quota exceeded');
    const gateway = createStoreGateway({
      getItem: () => null,
      setItem: () => {
        throw failure;
      },
    });

    expect(() => gateway.save([entry(1)])).not.toThrow();
    expect(warn).toHaveBeenCalledWith('[Leaderboard] Could not save scores:', failure);
    warn.mockRestore();
  });

  it('warns and returns an empty board when the store cannot be read', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const gateway = createStoreGateway({
      getItem: () => {
        throw new Error('denied');
      },
      setItem: () => {},
    });

    expect(gateway.load()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
