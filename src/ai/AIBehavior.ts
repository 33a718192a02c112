/**
 * AI Behavior Interface
 * Defines the contract for pluggable opponent behaviors
 */

import type { AIAction, PercentageTable } from '../config/aiConfig';
import type { UnitAttribute } from '../config/gameBalance';

/**
 * What the opponent sees of the game when it decides
 */
export interface OpponentView {
  // Own economy
  gold: number;
  income: number;
  spawnSlots: number;
  unitPrice: number;
  unitLevels: Record<UnitAttribute, number>;

  // Own castle
  castleHealth: number;

  // Sum of the other side's unit upgrade levels
  enemyUnitLevelSum: number;

  // 0 on a spawn turn
  turnsToSpawn: number;
}

/**
 * AI Decision output
 */
export interface AIDecision {
  action: AIAction | 'WAIT';
  reasoning?: string; // For debugging/explanation
}

/**
 * A percentage table together with the rule that chose it
 */
export interface StrategySelection {
  table: PercentageTable;
  rule: string;
}

/**
 * Base interface for all opponent behaviors
 */
export interface IAIBehavior {
  /**
   * Get the name/type of this behavior
   */
  getName(): string;

  /**
   * Pick the percentage table to draw the next action from
   */
  selectStrategy(view: OpponentView): StrategySelection;

  /**
   * Reset behavior state (for new game)
   */
  reset?(): void;

  /**
   * Get current strategy parameters (for debugging)
   */
  getParameters?(): Record<string, unknown>;
}
