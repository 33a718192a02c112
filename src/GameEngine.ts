import { CoreLoop } from './core/CoreLoop';
import { invariant } from './core/invariant';
import { PRNG, type RandomSource } from './core/PRNG';
import { World, createSnapshot } from './core/World';

import { BattleSystem } from './systems/BattleSystem';
import { EconomySystem, type Territory } from './systems/EconomySystem';
import { StatsSystem, type BattleStats, type DamageStats, type SideStatistics } from './systems/StatsSystem';

import {
  BATTLEFIELD_CONFIG,
  ECONOMY_CONFIG,
  SIDES,
  type CastleAttribute,
  type Side,
  type UnitAttribute,
} from './config/gameBalance';
import { AIController } from './ai/AIController';
import { BalancedAI } from './ai/behaviors';
import type { AIDecision, OpponentView } from './ai/AIBehavior';
import { AI_ACTION_COMMANDS, parseCommand, type CommandResult, type GameCommand } from './commands';
import type { PurchaseCount } from './entities/Player';

export type GameLogger = Pick<Console, 'log' | 'warn'>;

export interface GameConfig {
  seed: number;
  laneLength: number;
  startingGold: number;
  ticksPerTurn: number;
  spawnIntervalTurns: number;
  opponent: 'AI' | 'MANUAL'; // MANUAL: ENEMY acts only through execute()
  logger: GameLogger;
  random?: RandomSource; // Replaces the seeded generator
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  seed: 1,
  laneLength: BATTLEFIELD_CONFIG.laneLength,
  startingGold: ECONOMY_CONFIG.startingGold,
  ticksPerTurn: BATTLEFIELD_CONFIG.ticksPerTurn,
  spawnIntervalTurns: BATTLEFIELD_CONFIG.spawnIntervalTurns,
  opponent: 'AI',
  logger: console,
};

export interface GameCallbacks {
  onTick?: (snapshot: GameSnapshot) => void;
  onGameOver?: (winner: Side) => void;
}

export interface ArmySnapshot {
  id: number;
  position: number;
  health: number;
  size: number;
  engaged: boolean;
}

export interface SideSnapshot {
  gold: number;
  income: number;
  castleIncome: number;
  goldEarned: number;
  spawnSlots: number;
  kills: number;
  deaths: number;
  unitPrice: number;
  unitGoldReward: number;
  unitLevels: Record<UnitAttribute, number>;
  unitStats: Record<UnitAttribute, number>;
  castleLevels: Record<CastleAttribute, number>;
  castleStats: Record<CastleAttribute, number>;
  castle: { position: number; health: number; maxHealth: number; damage: number; regen: number };
  armies: ArmySnapshot[];
  territory: Territory;
  damage: DamageStats;
}

export interface GameSnapshot {
  turn: number;
  tick: number;
  turnsToSpawn: number;
  winner: Side | null;
  sides: Record<Side, SideSnapshot>;
}

/**
 * Turn-based orchestrator. Each turn: the opponent spends its gold, income
 * is credited, armies spawn on the spawn cadence, a fixed number of ticks
 * run, then survivors and castles regenerate.
 */
export class GameEngine {
  private readonly config: GameConfig;
  private readonly logger: GameLogger;
  private readonly world: World;
  private readonly stats: BattleStats = StatsSystem.create();
  private readonly aiController: AIController;
  private coreLoop: CoreLoop | null = null;

  private turn = 0;
  private tick = 0;
  private spawnCounter: number;
  private turnInProgress = false;
  private winner: Side | null = null;

  constructor(
    config: Partial<GameConfig> = {},
    private callbacks: GameCallbacks = {}
  ) {
    this.config = { ...DEFAULT_GAME_CONFIG, ...config };
    invariant(this.config.laneLength >= 1, `lane needs at least one cell, got ${this.config.laneLength}`);
    invariant(this.config.ticksPerTurn >= 1, `a turn needs at least one tick, got ${this.config.ticksPerTurn}`);
    invariant(this.config.spawnIntervalTurns >= 0, `negative spawn interval ${this.config.spawnIntervalTurns}`);

    this.logger = this.config.logger;
    const random = this.config.random ?? new PRNG(this.config.seed);
    this.world = new World(random, { laneLength: this.config.laneLength, startingGold: this.config.startingGold });

    // The first turn is a spawn turn
    this.spawnCounter = this.config.spawnIntervalTurns;
    this.aiController = new AIController(new BalancedAI(), random);
  }

  public getAIController(): AIController {
    return this.aiController;
  }

  public getWorld(): World {
    return this.world;
  }

  public getWinner(): Side | null {
    return this.winner;
  }

  public get turnsToSpawn(): number {
    return this.config.spawnIntervalTurns - this.spawnCounter;
  }

  // ---------------------------------------------------------------------------
  // Action API
  // ---------------------------------------------------------------------------

  /**
   * Validate and carry out a command for a side. Nothing changes unless
   * the result is ok.
   */
  public execute(command: unknown, side: Side = 'PLAYER'): CommandResult {
    const parsed = parseCommand(command);
    if (!parsed.ok) {
      this.logger.warn(`${side} sent an invalid command: ${parsed.message}`);
      return { ok: false, reason: 'INVALID_COMMAND', message: parsed.message };
    }
    // Queries stay open after the game and between ticks
    if (parsed.command.type === 'QUERY_OPPONENT') {
      return this.apply(parsed.command, side);
    }
    if (this.winner !== null) {
      return { ok: false, reason: 'GAME_OVER', message: `${this.winner} already won` };
    }
    if (this.turnInProgress) {
      return { ok: false, reason: 'TURN_IN_PROGRESS', message: `turn ${this.turn} is still being played` };
    }
    return this.apply(parsed.command, side);
  }

  public buildSpawnSlots(count: PurchaseCount = 1, side: Side = 'PLAYER'): CommandResult {
    return this.execute({ type: 'BUILD_SPAWN', count }, side);
  }

  public upgradeUnit(attribute: UnitAttribute, count: PurchaseCount = 1, side: Side = 'PLAYER'): CommandResult {
    return this.execute({ type: 'UPGRADE_UNIT', attribute, count }, side);
  }

  public upgradeCastle(attribute: CastleAttribute, count: PurchaseCount = 1, side: Side = 'PLAYER'): CommandResult {
    return this.execute({ type: 'UPGRADE_CASTLE', attribute, count }, side);
  }

  public getOpponentStats(side: Side = 'PLAYER'): CommandResult {
    return this.execute({ type: 'QUERY_OPPONENT' }, side);
  }

  public endTurn(): CommandResult {
    return this.execute({ type: 'END_TURN' });
  }

  private apply(command: GameCommand, side: Side): CommandResult {
    const player = this.world.getPlayer(side);

    switch (command.type) {
      case 'END_TURN':
        this.playTurn();
        return { ok: true, command };

      case 'QUERY_OPPONENT':
        return { ok: true, command, opponent: this.world.getEnemyPlayer(side).getStats() };

      case 'BUILD_SPAWN':
        if (!player.buildSpawnSlots(command.count)) return this.insufficientFunds(side, 'spawn slots');
        this.logger.log(`${side} now has ${player.spawnSlots} spawn slots, gold left ${player.gold}`);
        return { ok: true, command };

      case 'UPGRADE_UNIT':
        if (!player.upgradeUnitAttribute(command.attribute, command.count)) {
          return this.insufficientFunds(side, `unit ${command.attribute}`);
        }
        this.logger.log(
          `${side} upgraded unit ${command.attribute} to level ${player.unitLevels[command.attribute]}, unit price now ${player.unitPrice}g, gold left ${player.gold}`
        );
        return { ok: true, command };

      case 'UPGRADE_CASTLE':
        if (!player.upgradeCastleAttribute(command.attribute, command.count)) {
          return this.insufficientFunds(side, `castle ${command.attribute}`);
        }
        this.logger.log(
          `${side} upgraded castle ${command.attribute} to level ${player.castleLevels[command.attribute]}, gold left ${player.gold}`
        );
        return { ok: true, command };
    }
  }

  private insufficientFunds(side: Side, what: string): CommandResult {
    const message = `Insufficient gold for ${what} (${this.world.getPlayer(side).gold}g)`;
    this.logger.log(`${side} purchase failed: ${message}`);
    return { ok: false, reason: 'INSUFFICIENT_FUNDS', message };
  }

  // ---------------------------------------------------------------------------
  // Turn flow
  // ---------------------------------------------------------------------------

  private playTurn(): void {
    this.beginTurn();
    this.completeTurn();
  }

  // Remaining ticks of the running turn, then its end
  private completeTurn(): void {
    let ticking = this.winner === null && this.tick < this.config.ticksPerTurn;
    while (ticking) {
      ticking = this.stepTick();
    }
    this.finishTurn();
  }

  /**
   * Opponent actions, income and spawning. Ticks follow through stepTick().
   */
  public beginTurn(): void {
    invariant(this.winner === null, 'cannot start a turn after the game is over');
    invariant(!this.turnInProgress, `turn ${this.turn} is still in progress`);

    if (this.config.opponent === 'AI') {
      this.runOpponentTurn();
    }

    this.turn += 1;
    this.tick = 0;
    this.turnInProgress = true;

    EconomySystem.creditIncome(this.world);

    if (this.spawnCounter === this.config.spawnIntervalTurns) {
      this.spawnCounter = 0;
      for (const army of EconomySystem.spawnArmies(this.world)) {
        this.logger.log(`${army.owner} spawned army ${army.id} with ${army.members.length} units at ${army.position}`);
      }
    } else {
      this.spawnCounter += 1;
    }
  }

  /**
   * One time tick. Returns true while the turn has ticks left and nobody won.
   */
  public stepTick(): boolean {
    invariant(this.turnInProgress, 'no turn in progress');
    invariant(this.winner === null, 'cannot step a finished game');

    BattleSystem.runTick(this.world, this.stats);
    this.tick += 1;
    const winner = BattleSystem.checkWinner(this.world);
    EconomySystem.updateIncome(this.world);
    this.callbacks.onTick?.(this.getSnapshot());

    if (winner !== null) {
      this.declareWinner(winner);
      return false;
    }
    return this.tick < this.config.ticksPerTurn;
  }

  /**
   * Survivors and castles regenerate, unless the game ended this turn
   */
  public finishTurn(): void {
    invariant(this.turnInProgress, 'no turn in progress');
    invariant(
      this.winner !== null || this.tick >= this.config.ticksPerTurn,
      `turn ${this.turn} finished after ${this.tick} of ${this.config.ticksPerTurn} ticks`
    );
    this.turnInProgress = false;
    if (this.winner !== null) return;

    for (const side of SIDES) {
      const player = this.world.getPlayer(side);
      for (const army of player.armies) {
        army.regenerateMembers();
      }
      player.castle.regenerate();
    }
  }

  private declareWinner(winner: Side): void {
    this.winner = winner;
    this.logger.log(`${winner} wins on turn ${this.turn}, tick ${this.tick}`);
    this.callbacks.onGameOver?.(winner);
  }

  private runOpponentTurn(): void {
    const taken: AIDecision[] = this.aiController.takeTurn(
      () => this.getOpponentView('ENEMY'),
      (action) => this.apply(AI_ACTION_COMMANDS[action], 'ENEMY').ok
    );
    if (taken.length > 0) {
      this.logger.log(`ENEMY took ${taken.length} actions: ${taken.map((decision) => decision.action).join(', ')}`);
    }
  }

  private getOpponentView(side: Side): OpponentView {
    const player = this.world.getPlayer(side);
    return {
      gold: player.gold,
      income: player.income,
      spawnSlots: player.spawnSlots,
      unitPrice: player.unitPrice,
      unitLevels: { ...player.unitLevels },
      castleHealth: player.castle.health.current,
      enemyUnitLevelSum: this.world.getEnemyPlayer(side).unitLevelSum,
      turnsToSpawn: this.turnsToSpawn,
    };
  }

  // ---------------------------------------------------------------------------
  // Paced playback
  // ---------------------------------------------------------------------------

  /**
   * Play one turn with ticks spread over time, for a renderer to follow
   * through onTick. By default a turn lasts one second.
   */
  public startPacedTurn(tickRateHz: number = this.config.ticksPerTurn): void {
    invariant(this.coreLoop === null, 'a paced turn is already running');
    this.beginTurn();
    this.coreLoop = new CoreLoop(tickRateHz, () => {
      if (this.stepTick()) return true;
      this.coreLoop = null;
      this.finishTurn();
      return false;
    });
    this.coreLoop.start();
  }

  public get isPlaying(): boolean {
    return this.coreLoop !== null;
  }

  /**
   * Stop pacing and play the rest of the running turn at once
   */
  public stopPlayback(): void {
    if (this.coreLoop === null) return;
    this.coreLoop.stop();
    this.coreLoop = null;
    this.completeTurn();
  }

  // ---------------------------------------------------------------------------
  // Read-only views
  // ---------------------------------------------------------------------------

  public getSnapshot(): GameSnapshot {
    const sideSnapshot = (side: Side): SideSnapshot => {
      const player = this.world.getPlayer(side);
      const castle = player.castle;
      return {
        gold: player.gold,
        income: player.income,
        castleIncome: player.castleIncome,
        goldEarned: player.goldEarned,
        spawnSlots: player.spawnSlots,
        kills: player.kills,
        deaths: player.deaths,
        unitPrice: player.unitPrice,
        unitGoldReward: player.unitGoldReward,
        unitLevels: player.unitLevels,
        unitStats: player.unitStats,
        castleLevels: player.castleLevels,
        castleStats: player.castleStats,
        castle: {
          position: castle.position,
          health: castle.health.current,
          maxHealth: castle.health.max,
          damage: castle.damage,
          regen: castle.regenPerTurn,
        },
        armies: player.armies.map((army) => ({
          id: army.id,
          position: army.position,
          health: army.aggregateHealth,
          size: army.members.length,
          engaged: army.currentTarget !== null,
        })),
        territory: EconomySystem.getTerritory(this.world, side),
        damage: this.stats[side],
      };
    };

    return createSnapshot({
      turn: this.turn,
      tick: this.tick,
      turnsToSpawn: this.turnsToSpawn,
      winner: this.winner,
      sides: { PLAYER: sideSnapshot('PLAYER'), ENEMY: sideSnapshot('ENEMY') },
    });
  }

  public getStatistics(): Record<Side, SideStatistics> {
    return StatsSystem.report(this.stats, this.world);
  }
}
