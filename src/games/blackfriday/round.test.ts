import { describe, it, expect } from 'vitest';
import { createPlayerSlot, createRoundState, findPlayer, isAlive, movePlayer, playerCount } from './round';

describe('createRoundState', () => {
  it('starts a solo round with one centred shopper', () => {
    const round = createRoundState('single');
    expect(round.players).toEqual([
      { slotIndex: 0, position: { x: 150, y: 200 }, score: 0, health: 3 },
    ]);
    expect(round.tickCount).toBe(0);
    expect(round.difficultyMultiplier).toBe(1);
    expect(round.spawnAccumulator).toBe(0);
    expect(round.objects).toEqual([]);
    expect(round.finalScores).toEqual([]);
  });

  it('spaces two shoppers evenly', () => {
    const round = createRoundState('two');
    expect(round.players.map(slot => slot.slotIndex)).toEqual([0, 1]);
    expect(round.players.map(slot => slot.position.x)).toEqual([95, 205]);
  });
});

describe('playerCount', () => {
  it('maps modes to roster sizes', () => {
    expect(playerCount('single')).toBe(1);
    expect(playerCount('two')).toBe(2);
  });
});

describe('movePlayer', () => {
  it('moves by player speed', () => {
    const round = createRoundState('single');
    movePlayer(round, 0, 1);
    expect(round.players[0]?.position.x).toBe(153);
  });

  it('clamps at the left wall', () => {
    const round = createRoundState('single');
    const slot = createPlayerSlot(0, 1);
    slot.position.x = 1;
    round.players = [slot];
    movePlayer(round, 0, -1);
    expect(slot.position.x).toBe(0);
  });

  it('clamps at the right wall', () => {
    const round = createRoundState('single');
    const slot = createPlayerSlot(0, 1);
    slot.position.x = 299;
    round.players = [slot];
    movePlayer(round, 0, 1);
    expect(slot.position.x).toBe(300);
  });

  it('addresses players by slot after the roster shrinks', () => {
    const round = createRoundState('two');
    round.players = round.players.filter(slot => slot.slotIndex === 1);

    expect(movePlayer(round, 0, 1)).toBe(false);
    expect(movePlayer(round, 1, -1)).toBe(true);
    expect(round.players[0]?.position.x).toBe(202);
  });
});

describe('findPlayer', () => {
  it('skips slots with no health left', () => {
    const round = createRoundState('single');
    const slot = round.players[0];
    if (slot) slot.health = 0;
    expect(findPlayer(round, 0)).toBeUndefined();
  });
});

describe('isAlive', () => {
  it('is true while health remains', () => {
    const slot = createPlayerSlot(0, 1);
    expect(isAlive(slot)).toBe(true);
    slot.health = 0;
    expect(isAlive(slot)).toBe(false);
  });
});
