/**
 * AI Configuration and Parameters
 * Opponent action catalog, action costs and the strategy tables the
 * rule cascade switches between
 */

import { z } from 'zod';
import rawStrategies from './opponentStrategies.json';
import { CASTLE_UPGRADES, ECONOMY_CONFIG, UNIT_UPGRADES } from './gameBalance';

// Catalog order breaks ties between equal percentages
export const AI_ACTIONS = [
  'BUILD_SPAWN',
  'UPGRADE_INCOME',
  'UNIT_ATTACK_SPEED',
  'UNIT_DAMAGE',
  'UNIT_HEALTH',
  'UNIT_REGEN',
  'CASTLE_DAMAGE',
  'CASTLE_REGEN',
  'CASTLE_HEALTH',
] as const;

export type AIAction = (typeof AI_ACTIONS)[number];

/**
 * Desired frequency (percent) per action. Entries must sum to at most 100.
 */
export type PercentageTable = Partial<Record<AIAction, number>>;

/**
 * Fixed gold cost of one opponent action
 */
export const AI_ACTION_COSTS: Record<AIAction, number> = {
  BUILD_SPAWN: ECONOMY_CONFIG.spawnSlotCost,
  UPGRADE_INCOME: CASTLE_UPGRADES.income.price,
  UNIT_HEALTH: UNIT_UPGRADES.health.price,
  UNIT_DAMAGE: UNIT_UPGRADES.damage.price,
  UNIT_ATTACK_SPEED: UNIT_UPGRADES.attackSpeed.price,
  UNIT_REGEN: UNIT_UPGRADES.regen.price,
  CASTLE_DAMAGE: CASTLE_UPGRADES.damage.price,
  CASTLE_REGEN: CASTLE_UPGRADES.regen.price,
  CASTLE_HEALTH: CASTLE_UPGRADES.health.price,
};

// Below this the opponent cannot buy anything at all
export const CHEAPEST_AI_ACTION_COST = Math.min(...Object.values(AI_ACTION_COSTS));

const AIActionSchema = z.enum(AI_ACTIONS);

const PercentageTableSchema = z
  .record(AIActionSchema, z.number().int().nonnegative())
  .refine((table) => Object.values(table).reduce((sum, percent) => sum + (percent ?? 0), 0) <= 100, {
    message: 'strategy percentages must not sum above 100',
  });

const OpponentStrategiesSchema = z.object({
  baseline: PercentageTableSchema,
  noSpawnSlots: PercentageTableSchema,
  incomeTiers: z.array(z.object({ incomeBelow: z.number(), table: PercentageTableSchema })),
  unitHealthCatchUp: z.object({ levelBelow: z.number().int(), table: PercentageTableSchema }),
  manySpawnSlots: z.object({ slotsAbove: z.number().int(), table: PercentageTableSchema }),
  enemyUnitPower: z.array(z.object({ levelsAbove: z.number().int(), table: PercentageTableSchema })),
  accumulate: PercentageTableSchema,
  // healthBelow is a fraction of the starting castle health
  castleRescue: z.array(z.object({ healthBelow: z.number().positive(), table: PercentageTableSchema })),
});

export type OpponentStrategies = z.infer<typeof OpponentStrategiesSchema>;

export const OPPONENT_STRATEGIES: OpponentStrategies = OpponentStrategiesSchema.parse(rawStrategies);

/**
 * Controller tuning
 */
export const AI_TUNING = {
  // Number of past decisions kept for debugging
  decisionHistoryLimit: 100,
} as const;
