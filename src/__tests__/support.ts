import { UNIT_BASE_STATS, type Side } from '../config/gameBalance';
import type { RandomSource } from '../core/PRNG';
import type { World } from '../core/World';
import { Army } from '../entities/Army';
import { Unit, type UnitStats } from '../entities/Unit';
import type { GameLogger } from '../GameEngine';

/**
 * Returns the given draws in order, then 0 forever
 */
export class ScriptedRandom implements RandomSource {
  constructor(private draws: number[] = []) {}

  next(): number {
    return this.draws.shift() ?? 0;
  }
}

export const silentLogger: GameLogger = {
  log: () => undefined,
  warn: () => undefined,
};

export const makeUnit = (world: World, side: Side, stats: Partial<UnitStats> = {}): Unit =>
  new Unit(world.allocateId(), side, {
    health: UNIT_BASE_STATS.health,
    damage: UNIT_BASE_STATS.damage,
    speed: UNIT_BASE_STATS.speed,
    attackSpeed: UNIT_BASE_STATS.attackSpeed,
    regen: UNIT_BASE_STATS.regen,
    goldReward: 1,
    ...stats,
  });

/**
 * Register the units and put a new army for them on the field
 */
export function addArmy(world: World, side: Side, position: number, units: Unit[]): Army {
  world.registerUnits(units);
  const army = new Army(world.allocateId(), side, position, world.getCastle(side).facing, units);
  world.getPlayer(side).armies.push(army);
  return army;
}
