import { z } from 'zod';
import type { AIAction } from './config/aiConfig';
import { CASTLE_ATTRIBUTES, UNIT_ATTRIBUTES } from './config/gameBalance';
import type { PlayerStats } from './entities/Player';

/**
 * A positive number of purchases, or 'max' for as many as gold allows
 */
export const PurchaseCountSchema = z.union([z.number().int().positive(), z.literal('max')]);

export const GameCommandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('END_TURN') }),
  z.object({
    type: z.literal('BUILD_SPAWN'),
    count: PurchaseCountSchema.default(1),
  }),
  z.object({
    type: z.literal('UPGRADE_UNIT'),
    attribute: z.enum(UNIT_ATTRIBUTES),
    count: PurchaseCountSchema.default(1),
  }),
  z.object({
    type: z.literal('UPGRADE_CASTLE'),
    attribute: z.enum(CASTLE_ATTRIBUTES),
    count: PurchaseCountSchema.default(1),
  }),
  z.object({ type: z.literal('QUERY_OPPONENT') }),
]);

export type GameCommand = z.infer<typeof GameCommandSchema>;

// What callers may send: counts may be omitted
export type GameCommandInput = z.input<typeof GameCommandSchema>;

export type CommandRejection = 'INSUFFICIENT_FUNDS' | 'INVALID_COMMAND' | 'GAME_OVER' | 'TURN_IN_PROGRESS';

export type CommandResult =
  | { ok: true; command: GameCommand; opponent?: PlayerStats }
  | { ok: false; reason: CommandRejection; message: string };

/**
 * The command each opponent action is carried out with
 */
export const AI_ACTION_COMMANDS: Record<AIAction, GameCommand> = {
  BUILD_SPAWN: { type: 'BUILD_SPAWN', count: 1 },
  UPGRADE_INCOME: { type: 'UPGRADE_CASTLE', attribute: 'income', count: 1 },
  UNIT_ATTACK_SPEED: { type: 'UPGRADE_UNIT', attribute: 'attackSpeed', count: 1 },
  UNIT_DAMAGE: { type: 'UPGRADE_UNIT', attribute: 'damage', count: 1 },
  UNIT_HEALTH: { type: 'UPGRADE_UNIT', attribute: 'health', count: 1 },
  UNIT_REGEN: { type: 'UPGRADE_UNIT', attribute: 'regen', count: 1 },
  CASTLE_DAMAGE: { type: 'UPGRADE_CASTLE', attribute: 'damage', count: 1 },
  CASTLE_REGEN: { type: 'UPGRADE_CASTLE', attribute: 'regen', count: 1 },
  CASTLE_HEALTH: { type: 'UPGRADE_CASTLE', attribute: 'health', count: 1 },
};

/**
 * Validate an external command. The zod issues are flattened into one message.
 */
export function parseCommand(input: unknown): { ok: true; command: GameCommand } | { ok: false; message: string } {
  const parsed = GameCommandSchema.safeParse(input);
  if (parsed.success) {
    return { ok: true, command: parsed.data };
  }
  const message = parsed.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { ok: false, message };
}
