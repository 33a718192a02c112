import { getEnemySide, type Side } from '../config/gameBalance';
import { invariant } from '../core/invariant';
import { pick, type RandomSource } from '../core/PRNG';
import type { Castle, Facing } from './Castle';
import type { Player } from './Player';
import type { TargetResolver, Unit, UnitTarget } from './Unit';

/**
 * What an army is engaged with: a handle to an enemy army or castle
 */
export type ArmyTarget = { kind: 'army'; id: number } | { kind: 'castle'; side: Side };

/**
 * Lookups an army needs to reach the enemy. Implemented by the World registry.
 */
export interface BattleContext extends TargetResolver {
  readonly random: RandomSource;
  findArmy(id: number): Army | undefined;
  getCastle(side: Side): Castle;
  getPlayer(side: Side): Player;
  releaseUnit(id: number): void;
}

/**
 * Uniform draw over the currently alive members of an enemy army
 */
export function drawLiveUnitTarget(enemy: Army, random: RandomSource): UnitTarget {
  const alive = enemy.members.filter((unit) => unit.isAlive());
  invariant(alive.length > 0, `army ${enemy.id} has no live unit to target`);
  return { kind: 'unit', id: pick(random, alive).id };
}

export class Army {
  // Fixed for now; reserved for per-army speed upgrades
  readonly speed = 1;
  currentTarget: ArmyTarget | null = null;

  constructor(
    readonly id: number,
    readonly owner: Side,
    public position: number,
    readonly direction: Facing,
    public members: Unit[]
  ) {}

  get enemySide(): Side {
    return getEnemySide(this.owner);
  }

  /**
   * Sum of member health, shown as the army's hp
   */
  get aggregateHealth(): number {
    return this.members.reduce((sum, unit) => sum + unit.health.current, 0);
  }

  move(): void {
    this.position += this.direction * this.speed;
  }

  isCastleInRange(ctx: BattleContext): boolean {
    return Math.abs(this.position - ctx.getCastle(this.enemySide).position) <= 1;
  }

  private getTargetHealth(target: ArmyTarget, ctx: BattleContext): number {
    if (target.kind === 'castle') {
      return ctx.getCastle(target.side).health.current;
    }
    return ctx.findArmy(target.id)?.aggregateHealth ?? 0;
  }

  /**
   * Clears a target that has been wiped out, then reports whether one remains
   */
  hasTarget(ctx: BattleContext): boolean {
    if (this.currentTarget && this.getTargetHealth(this.currentTarget, ctx) === 0) {
      this.currentTarget = null;
    }
    return this.currentTarget !== null;
  }

  /**
   * Target order: enemy army on this cell, enemy army on the next cell,
   * enemy castle in range. Enemy armies always win over the castle.
   */
  acquireTarget(ctx: BattleContext, enemyArmies: readonly Army[]): boolean {
    const living = enemyArmies.filter((army) => army.aggregateHealth > 0);
    const enemy =
      living.find((army) => army.position === this.position) ??
      living.find((army) => army.position === this.position + this.direction);

    if (enemy) {
      this.currentTarget = { kind: 'army', id: enemy.id };
      for (const unit of this.members) {
        unit.setTarget(drawLiveUnitTarget(enemy, ctx.random));
      }
      return true;
    }

    if (this.isCastleInRange(ctx)) {
      this.currentTarget = { kind: 'castle', side: this.enemySide };
      for (const unit of this.members) {
        unit.setTarget({ kind: 'castle', side: this.enemySide });
      }
      return true;
    }

    this.currentTarget = null;
    return false;
  }

  /**
   * Give every member a fresh personal target taken from another army's target
   */
  copyTargetFrom(target: ArmyTarget | null, ctx: BattleContext): void {
    if (target?.kind === 'castle') {
      for (const unit of this.members) {
        unit.setTarget({ kind: 'castle', side: target.side });
      }
      return;
    }

    const enemy = target ? ctx.findArmy(target.id) : undefined;
    for (const unit of this.members) {
      unit.setTarget(enemy && enemy.aggregateHealth > 0 ? drawLiveUnitTarget(enemy, ctx.random) : null);
    }
  }

  /**
   * Members whose target died draw a new one from the enemy army.
   * Castle targets are left alone: a dead castle ends the game.
   */
  refreshUnitsTargets(ctx: BattleContext): void {
    if (this.currentTarget?.kind !== 'army') return;
    const enemy = ctx.findArmy(this.currentTarget.id);
    if (!enemy || enemy.aggregateHealth === 0) return;

    for (const unit of this.members) {
      if (!unit.hasLiveTarget(ctx) && unit.target?.kind !== 'castle') {
        unit.setTarget(drawLiveUnitTarget(enemy, ctx.random));
      }
    }
  }

  private retarget(unit: Unit, ctx: BattleContext): boolean {
    const target = this.currentTarget;
    if (!target || this.getTargetHealth(target, ctx) === 0) return false;
    if (target.kind === 'castle') {
      unit.setTarget({ kind: 'castle', side: target.side });
      return true;
    }
    const enemy = ctx.findArmy(target.id);
    invariant(enemy, `army ${this.id} targets missing army ${target.id}`);
    unit.setTarget(drawLiveUnitTarget(enemy, ctx.random));
    return true;
  }

  /**
   * One combat exchange. Units fall only when the tick's dead are purged,
   * so every member swings, even one struck down earlier in the tick.
   * Returns total damage applied.
   */
  fight(ctx: BattleContext): number {
    let dealt = 0;
    for (const unit of this.members) {
      if (!unit.hasLiveTarget(ctx) && !this.retarget(unit, ctx)) continue;
      dealt += unit.attack(ctx);
    }
    this.refreshUnitsTargets(ctx);
    return dealt;
  }

  refreshAttackRate(): void {
    for (const unit of this.members) {
      unit.refreshAttackRate();
    }
  }

  regenerateMembers(): void {
    for (const unit of this.members) {
      unit.regenerate();
    }
  }

  /**
   * Remove dead members, paying each one's reward to the enemy player and
   * crediting the enemy's kills. Returns how many died.
   */
  purgeDeadMembers(ctx: BattleContext): number {
    const alive: Unit[] = [];
    const enemy = ctx.getPlayer(this.enemySide);
    let dead = 0;

    for (const unit of this.members) {
      if (unit.isAlive()) {
        alive.push(unit);
        continue;
      }
      enemy.receiveGold(unit.goldReward);
      ctx.releaseUnit(unit.id);
      dead += 1;
    }

    this.members = alive;
    enemy.kills += dead;
    return dead;
  }
}
