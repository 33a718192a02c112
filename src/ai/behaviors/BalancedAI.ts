/**
 * Balanced AI Behavior
 * Grows the economy first, keeps pace with the enemy's unit upgrades and
 * turns to the castle when it is under siege
 */

import type { IAIBehavior, OpponentView, StrategySelection } from '../AIBehavior';
import { OPPONENT_STRATEGIES, type OpponentStrategies } from '../../config/aiConfig';
import { CASTLE_CONFIG } from '../../config/gameBalance';

export class BalancedAI implements IAIBehavior {
  private name = 'BalancedAI';
  private lastRule: string | null = null;

  constructor(private strategies: OpponentStrategies = OPPONENT_STRATEGIES) {}

  getName(): string {
    return this.name;
  }

  getParameters(): Record<string, unknown> {
    return { lastRule: this.lastRule };
  }

  reset(): void {
    this.lastRule = null;
  }

  /**
   * Later rules override earlier ones:
   * economy stage, then enemy unit power, then the spawn cadence, then castle rescue
   */
  selectStrategy(view: OpponentView): StrategySelection {
    let selection = this.selectEconomyStage(view);

    // Tiers are ascending; each crossed one replaces the previous
    for (const tier of this.strategies.enemyUnitPower) {
      if (view.enemyUnitLevelSum > tier.levelsAbove) {
        selection = { table: tier.table, rule: `enemyUnitLevels>${tier.levelsAbove}` };
      }
    }

    // Off a spawn turn, gold is saved for the next spawn
    if (view.turnsToSpawn > 0) {
      selection = { table: this.strategies.accumulate, rule: 'accumulate' };
    }

    for (const rescue of this.strategies.castleRescue) {
      if (view.castleHealth < CASTLE_CONFIG.baseHealth * rescue.healthBelow) {
        selection = { table: rescue.table, rule: `castleHealth<${rescue.healthBelow}` };
      }
    }

    this.lastRule = selection.rule;
    return selection;
  }

  // First matching rule wins
  private selectEconomyStage(view: OpponentView): StrategySelection {
    const { strategies } = this;

    if (view.spawnSlots === 0) {
      return { table: strategies.noSpawnSlots, rule: 'noSpawnSlots' };
    }

    const tier = strategies.incomeTiers.find((candidate) => view.income < candidate.incomeBelow);
    if (tier) {
      return { table: tier.table, rule: `income<${tier.incomeBelow}` };
    }

    if (view.unitLevels.health < strategies.unitHealthCatchUp.levelBelow) {
      return { table: strategies.unitHealthCatchUp.table, rule: 'unitHealthCatchUp' };
    }

    if (view.spawnSlots > strategies.manySpawnSlots.slotsAbove) {
      return { table: strategies.manySpawnSlots.table, rule: 'manySpawnSlots' };
    }

    return { table: strategies.baseline, rule: 'baseline' };
  }
}
