export { GameEngine, DEFAULT_GAME_CONFIG } from './GameEngine';
export type { GameConfig, GameCallbacks, GameLogger, GameSnapshot, SideSnapshot, ArmySnapshot } from './GameEngine';
export { GameCommandSchema, PurchaseCountSchema, parseCommand } from './commands';
export type { CommandResult, CommandRejection, GameCommand, GameCommandInput } from './commands';
export { CoreLoop } from './core/CoreLoop';
export { PRNG } from './core/PRNG';
export type { RandomSource } from './core/PRNG';
export { World } from './core/World';
export { AIController } from './ai/AIController';
export { BalancedAI } from './ai/behaviors';
export { convertPercentage, buildAffordableStrategy, pickAction } from './ai/WeightedStrategy';
export type { Side, UnitAttribute, CastleAttribute } from './config/gameBalance';
export type { PlayerStats, PurchaseCount } from './entities/Player';
export type { SideStatistics } from './systems/StatsSystem';
