import { SIDES, type Side } from '../config/gameBalance';
import type { World } from '../core/World';
import { StatsSystem, type BattleStats } from './StatsSystem';

/**
 * One time tick of fighting: each side's armies move or fight in order,
 * then its castle fires; afterwards the dead are purged for both sides.
 */
export class BattleSystem {
  public static runTick(world: World, stats: BattleStats): void {
    for (const side of SIDES) {
      BattleSystem.advanceArmies(world, side, stats);
      BattleSystem.fireCastle(world, side, stats);
    }
    BattleSystem.purgeDead(world);
  }

  private static advanceArmies(world: World, side: Side, stats: BattleStats): void {
    const player = world.getPlayer(side);
    const enemyArmies = world.getEnemyPlayer(side).armies;

    // Iterate a copy: collisions remove merged armies from the player
    for (const army of [...player.armies]) {
      if (army.members.length === 0) continue;

      // An enemy army in reach is preferred over a castle already under siege
      if (army.hasTarget(world) && army.currentTarget?.kind === 'castle') {
        army.acquireTarget(world, enemyArmies);
      }

      if (army.hasTarget(world) || army.acquireTarget(world, enemyArmies)) {
        const targetKind = army.currentTarget?.kind === 'castle' ? 'castle' : 'units';
        StatsSystem.recordDamage(stats, side, targetKind, army.fight(world));
      } else {
        army.move();
        army.refreshAttackRate();
        player.resolveArmyCollisions(army, world);
      }
    }
  }

  private static fireCastle(world: World, side: Side, stats: BattleStats): void {
    const castle = world.getCastle(side);
    const enemyArmies = world.getEnemyPlayer(side).armies;
    if (castle.hasTarget(enemyArmies) || castle.acquireTarget(enemyArmies)) {
      StatsSystem.recordDamage(stats, side, 'units', castle.attack(enemyArmies));
    }
  }

  /**
   * The only place deaths are settled: rewards and kills go to the enemy,
   * deaths to the owner
   */
  private static purgeDead(world: World): void {
    for (const side of SIDES) {
      const player = world.getPlayer(side);
      for (const army of player.armies) {
        player.deaths += army.purgeDeadMembers(world);
      }
      player.purgeEmptyArmies();
    }
  }

  /**
   * Winner once a castle has fallen. The PLAYER castle is checked first.
   */
  public static checkWinner(world: World): Side | null {
    if (!world.getCastle('PLAYER').isAlive()) return 'ENEMY';
    if (!world.getCastle('ENEMY').isAlive()) return 'PLAYER';
    return null;
  }
}
