import type { Side } from '../config/gameBalance';
import type { World } from '../core/World';

export interface DamageStats {
  toUnits: number;
  toCastle: number;
}

export type BattleStats = Record<Side, DamageStats>;

/**
 * End-of-game statistics for one side
 */
export interface SideStatistics {
  kills: number;
  deaths: number;
  goldEarned: number;
  damageDealtToUnits: number;
  damageDealtToCastle: number;
}

export class StatsSystem {
  public static create(): BattleStats {
    return {
      PLAYER: { toUnits: 0, toCastle: 0 },
      ENEMY: { toUnits: 0, toCastle: 0 },
    };
  }

  public static recordDamage(stats: BattleStats, dealer: Side, target: 'units' | 'castle', amount: number): void {
    if (target === 'units') {
      stats[dealer].toUnits += amount;
    } else {
      stats[dealer].toCastle += amount;
    }
  }

  public static report(stats: BattleStats, world: World): Record<Side, SideStatistics> {
    const forSide = (side: Side): SideStatistics => {
      const player = world.getPlayer(side);
      return {
        kills: player.kills,
        deaths: player.deaths,
        goldEarned: player.goldEarned,
        damageDealtToUnits: stats[side].toUnits,
        damageDealtToCastle: stats[side].toCastle,
      };
    };
    return { PLAYER: forSide('PLAYER'), ENEMY: forSide('ENEMY') };
  }
}
