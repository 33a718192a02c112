import { ECONOMY_CONFIG, SIDES, type Side } from '../config/gameBalance';
import type { World } from '../core/World';
import { Army } from '../entities/Army';

/**
 * Land a side holds: from its castle to its furthest army
 */
export interface Territory {
  from: number;
  to: number;
  cells: number;
}

export class EconomySystem {
  public static creditIncome(world: World): void {
    for (const side of SIDES) {
      const player = world.getPlayer(side);
      player.receiveGold(player.income);
    }
  }

  public static getTerritory(world: World, side: Side): Territory {
    const castle = world.getCastle(side);
    let frontier = castle.position;
    for (const army of world.getPlayer(side).armies) {
      if ((army.position - frontier) * castle.facing > 0) {
        frontier = army.position;
      }
    }
    return { from: castle.position, to: frontier, cells: Math.abs(frontier - castle.position) };
  }

  /**
   * Income = castle income + land income for every owned cell
   */
  public static updateIncome(world: World): void {
    for (const side of SIDES) {
      const player = world.getPlayer(side);
      const territory = EconomySystem.getTerritory(world, side);
      player.income = player.castleIncome + ECONOMY_CONFIG.landIncome * territory.cells;
    }
  }

  /**
   * Every side spawns what its slots and gold allow; a non-empty spawn
   * becomes a new army on the castle cell. Returns the new armies.
   */
  public static spawnArmies(world: World): Army[] {
    const spawned: Army[] = [];
    for (const side of SIDES) {
      const player = world.getPlayer(side);
      const units = player.spawnUnits(world.allocateId);
      if (units.length === 0) continue;

      world.registerUnits(units);
      const castle = player.castle;
      const army = new Army(world.allocateId(), side, castle.position, castle.facing, units);
      player.armies.push(army);
      spawned.push(army);
    }
    return spawned;
  }
}
