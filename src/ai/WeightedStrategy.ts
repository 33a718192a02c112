/**
 * Weighted random choice over opponent actions.
 *
 * A percentage table such as { BUILD_SPAWN: 20, UPGRADE_INCOME: 50, UNIT_HEALTH: 30 }
 * becomes ascending cumulative thresholds 20 -> BUILD_SPAWN, 50 -> UNIT_HEALTH,
 * 100 -> UPGRADE_INCOME. A draw in [1, total] selects the first threshold it
 * does not exceed, so each action is chosen in proportion to its percentage.
 */

import { AI_ACTIONS, AI_ACTION_COSTS, type AIAction, type PercentageTable } from '../config/aiConfig';
import { invariant } from '../core/invariant';
import { nextIntInclusive, type RandomSource } from '../core/PRNG';

export interface StrategyThreshold {
  threshold: number;
  action: AIAction;
}

export interface AffordableStrategy {
  thresholds: StrategyThreshold[];
  total: number; // Sum of the affordable percentages, at most 100
}

const tableEntries = (table: PercentageTable): Array<[AIAction, number]> =>
  AI_ACTIONS.flatMap((action): Array<[AIAction, number]> => {
    const percent = table[action];
    return percent !== undefined && percent > 0 ? [[action, percent]] : [];
  });

export function convertPercentage(table: PercentageTable): StrategyThreshold[] {
  // Array.prototype.sort is stable: equal percentages keep catalog order
  const sorted = tableEntries(table).sort(([, a], [, b]) => a - b);
  const thresholds: StrategyThreshold[] = [];
  let running = 0;
  for (const [action, percent] of sorted) {
    running += percent;
    invariant(running <= 100, `strategy percentages exceed 100 (${running})`);
    thresholds.push({ threshold: running, action });
  }
  return thresholds;
}

/**
 * Keep only actions whose cost the gold covers; the draw range shrinks with them
 */
export function buildAffordableStrategy(
  table: PercentageTable,
  gold: number,
  costs: Record<AIAction, number> = AI_ACTION_COSTS
): AffordableStrategy {
  const affordable: PercentageTable = {};
  let total = 0;
  for (const [action, percent] of tableEntries(table)) {
    if (costs[action] <= gold) {
      affordable[action] = percent;
      total += percent;
    }
  }
  return { thresholds: convertPercentage(affordable), total };
}

export function selectByDraw(strategy: AffordableStrategy, draw: number): AIAction | null {
  return strategy.thresholds.find((entry) => draw <= entry.threshold)?.action ?? null;
}

/**
 * Null when nothing in the table is affordable
 */
export function pickAction(strategy: AffordableStrategy, random: RandomSource): AIAction | null {
  if (strategy.total === 0) return null;
  return selectByDraw(strategy, nextIntInclusive(random, 1, strategy.total));
}
