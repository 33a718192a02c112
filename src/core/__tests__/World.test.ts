import { describe, expect, it } from 'vitest';
import { World, createSnapshot } from '../World';
import { PRNG } from '../PRNG';
import { addArmy, makeUnit } from '../../__tests__/support';

describe('World', () => {
  it('places castles at both ends of the lane, facing each other', () => {
    const world = new World(new PRNG(1), { laneLength: 10 });

    expect(world.getCastle('PLAYER').position).toBe(0);
    expect(world.getCastle('PLAYER').facing).toBe(1);
    expect(world.getCastle('ENEMY').position).toBe(11);
    expect(world.getCastle('ENEMY').facing).toBe(-1);
    expect(world.getEnemyPlayer('PLAYER')).toBe(world.getPlayer('ENEMY'));
  });

  it('gives both players the starting gold', () => {
    const world = new World(new PRNG(1), { startingGold: 250 });

    expect(world.getPlayer('PLAYER').gold).toBe(250);
    expect(world.getPlayer('ENEMY').goldEarned).toBe(250);
  });

  it('resolves unit and castle handles until a unit is released', () => {
    const world = new World(new PRNG(1));
    const unit = makeUnit(world, 'ENEMY');
    addArmy(world, 'ENEMY', 71, [unit]);

    expect(world.resolveUnitTarget({ kind: 'unit', id: unit.id })).toBe(unit);
    expect(world.resolveUnitTarget({ kind: 'castle', side: 'PLAYER' })).toBe(world.getCastle('PLAYER'));

    world.releaseUnit(unit.id);
    expect(world.resolveUnitTarget({ kind: 'unit', id: unit.id })).toBeUndefined();
    expect(world.unitCount).toBe(0);
  });

  it('finds armies of either side', () => {
    const world = new World(new PRNG(1));
    const mine = addArmy(world, 'PLAYER', 0, [makeUnit(world, 'PLAYER')]);
    const theirs = addArmy(world, 'ENEMY', 71, [makeUnit(world, 'ENEMY')]);

    expect(world.findArmy(mine.id)).toBe(mine);
    expect(world.findArmy(theirs.id)).toBe(theirs);
    expect(world.findArmy(999)).toBeUndefined();
  });

  it('rejects registering a unit twice', () => {
    const world = new World(new PRNG(1));
    const unit = makeUnit(world, 'PLAYER');
    world.registerUnits([unit]);

    expect(() => world.registerUnits([unit])).toThrow(`unit ${unit.id} registered twice`);
  });
});

describe('createSnapshot', () => {
  it('returns a detached copy', () => {
    const state = { gold: 5, levels: { health: 1 } };
    const snapshot = createSnapshot(state);
    state.levels.health = 9;

    expect(snapshot).toEqual({ gold: 5, levels: { health: 1 } });
  });
});
