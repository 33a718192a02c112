import { ATTACK_RATE_THRESHOLD, roundStat, type Side } from '../config/gameBalance';
import { invariant } from '../core/invariant';
import { dealDamage, regenerateHealth, type Combatant, type Health } from './Combatant';

/**
 * Personal target of a unit: a handle, never an owning reference
 */
export type UnitTarget = { kind: 'unit'; id: number } | { kind: 'castle'; side: Side };

export interface TargetResolver {
  resolveUnitTarget(target: UnitTarget): Combatant | undefined;
}

/**
 * Stats stamped into a unit when it spawns
 */
export interface UnitStats {
  health: number;
  damage: number;
  speed: number;
  attackSpeed: number; // Attack rate gained per tick without a hit
  regen: number;
  goldReward: number; // Paid to the killer's owner
}

export class Unit implements Combatant {
  readonly health: Health;
  readonly damage: number;
  readonly speed: number;
  readonly attackSpeed: number;
  regenPerTurn: number;
  readonly goldReward: number;
  accumulatedAttackRate: number;
  target: UnitTarget | null = null;

  constructor(
    readonly id: number,
    readonly owner: Side,
    stats: UnitStats
  ) {
    this.health = { current: stats.health, max: stats.health };
    this.damage = stats.damage;
    this.speed = stats.speed;
    this.attackSpeed = stats.attackSpeed;
    this.regenPerTurn = stats.regen;
    this.goldReward = stats.goldReward;
    this.accumulatedAttackRate = Math.max(ATTACK_RATE_THRESHOLD, stats.attackSpeed);
  }

  applyDamage(amount: number): number {
    return dealDamage(this.health, amount);
  }

  regenerate(): void {
    regenerateHealth(this.health, this.regenPerTurn);
  }

  isAlive(): boolean {
    return this.health.current > 0;
  }

  setTarget(target: UnitTarget | null): void {
    this.target = target;
  }

  hasLiveTarget(resolver: TargetResolver): boolean {
    if (!this.target) return false;
    const target = resolver.resolveUnitTarget(this.target);
    return target !== undefined && target.isAlive();
  }

  /**
   * Hit the target once per full threshold of accumulated attack rate.
   * A call that lands no hit charges the accumulator instead.
   * Returns the damage actually applied.
   */
  attack(resolver: TargetResolver): number {
    invariant(this.target, `unit ${this.id} attacks without a target`);
    const target = resolver.resolveUnitTarget(this.target);
    invariant(target && target.isAlive(), `unit ${this.id} attacks a dead or missing target`);

    let dealt = 0;
    let hit = false;
    while (this.accumulatedAttackRate >= ATTACK_RATE_THRESHOLD) {
      dealt += target.applyDamage(this.damage);
      this.accumulatedAttackRate = roundStat(this.accumulatedAttackRate - ATTACK_RATE_THRESHOLD);
      hit = true;
    }
    if (!hit) {
      this.accumulatedAttackRate = roundStat(this.accumulatedAttackRate + this.attackSpeed);
    }
    return dealt;
  }

  /**
   * Drop any partial charge when the unit leaves combat
   */
  refreshAttackRate(): void {
    this.accumulatedAttackRate = Math.max(ATTACK_RATE_THRESHOLD, this.attackSpeed);
  }
}
