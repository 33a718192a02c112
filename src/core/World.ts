import { BATTLEFIELD_CONFIG, ECONOMY_CONFIG, getEnemySide, type Side } from '../config/gameBalance';
import type { Army, BattleContext } from '../entities/Army';
import { Castle } from '../entities/Castle';
import type { Combatant } from '../entities/Combatant';
import { Player } from '../entities/Player';
import type { Unit, UnitTarget } from '../entities/Unit';
import { invariant } from './invariant';
import type { RandomSource } from './PRNG';

export interface WorldOptions {
  laneLength?: number;
  startingGold?: number;
}

/**
 * Owning registry of every player, castle, army and unit. Entities only keep
 * ids and sides of each other; this is where those handles resolve.
 */
export class World implements BattleContext {
  readonly players: Record<Side, Player>;
  readonly laneLength: number;
  private readonly units = new Map<number, Unit>();
  private nextEntityId = 1;

  constructor(
    readonly random: RandomSource,
    options: WorldOptions = {}
  ) {
    this.laneLength = options.laneLength ?? BATTLEFIELD_CONFIG.laneLength;
    const startingGold = options.startingGold ?? ECONOMY_CONFIG.startingGold;
    this.players = {
      PLAYER: new Player('PLAYER', new Castle('PLAYER', 0, 1), startingGold),
      ENEMY: new Player('ENEMY', new Castle('ENEMY', this.laneLength + 1, -1), startingGold),
    };
  }

  allocateId = (): number => this.nextEntityId++;

  getPlayer(side: Side): Player {
    return this.players[side];
  }

  getEnemyPlayer(side: Side): Player {
    return this.players[getEnemySide(side)];
  }

  getCastle(side: Side): Castle {
    return this.players[side].castle;
  }

  findArmy(id: number): Army | undefined {
    return this.players.PLAYER.armies.find((army) => army.id === id) ?? this.players.ENEMY.armies.find((army) => army.id === id);
  }

  findUnit(id: number): Unit | undefined {
    return this.units.get(id);
  }

  registerUnits(units: readonly Unit[]): void {
    for (const unit of units) {
      invariant(!this.units.has(unit.id), `unit ${unit.id} registered twice`);
      this.units.set(unit.id, unit);
    }
  }

  releaseUnit(id: number): void {
    this.units.delete(id);
  }

  get unitCount(): number {
    return this.units.size;
  }

  resolveUnitTarget(target: UnitTarget): Combatant | undefined {
    return target.kind === 'castle' ? this.getCastle(target.side) : this.units.get(target.id);
  }
}

// Detached deep copy handed to read-only consumers
export function createSnapshot<T>(state: T): T {
  return structuredClone(state);
}
