import { CASTLE_CONFIG, type Side } from '../config/gameBalance';
import type { Army } from './Army';
import { dealDamage, regenerateHealth, type Combatant, type Health } from './Combatant';

export type Facing = 1 | -1;

/**
 * Damage a castle actually takes from a raw hit
 */
export function mitigateCastleDamage(rawDamage: number): number {
  return Math.max(CASTLE_CONFIG.minimumDamageTaken, Math.round(rawDamage * CASTLE_CONFIG.damageTakenFactor));
}

export class Castle implements Combatant {
  readonly health: Health;
  damage: number;
  regenPerTurn: number;
  target: number | null = null; // Army id

  constructor(
    readonly side: Side,
    readonly position: number,
    readonly facing: Facing
  ) {
    this.health = { current: CASTLE_CONFIG.baseHealth, max: CASTLE_CONFIG.baseHealth };
    this.damage = CASTLE_CONFIG.baseDamage;
    this.regenPerTurn = CASTLE_CONFIG.baseRegen;
  }

  applyDamage(amount: number): number {
    return dealDamage(this.health, mitigateCastleDamage(amount));
  }

  regenerate(): void {
    regenerateHealth(this.health, this.regenPerTurn);
  }

  isAlive(): boolean {
    return this.health.current > 0;
  }

  private canReach(army: Army): boolean {
    return army.position === this.position || army.position === this.position + this.facing;
  }

  /**
   * Current target if it is still alive and within reach; clears it otherwise
   */
  getTarget(enemyArmies: readonly Army[]): Army | null {
    if (this.target === null) return null;
    const army = enemyArmies.find((candidate) => candidate.id === this.target);
    if (!army || army.aggregateHealth === 0 || !this.canReach(army)) {
      this.target = null;
      return null;
    }
    return army;
  }

  hasTarget(enemyArmies: readonly Army[]): boolean {
    return this.getTarget(enemyArmies) !== null;
  }

  /**
   * Target an army on the castle cell, else one on the adjacent cell it faces
   */
  acquireTarget(enemyArmies: readonly Army[]): boolean {
    const target =
      enemyArmies.find((army) => army.position === this.position) ??
      enemyArmies.find((army) => army.position === this.position + this.facing);
    this.target = target ? target.id : null;
    return target !== undefined;
  }

  /**
   * Hit every unit of the target army at once. Returns total damage applied.
   */
  attack(enemyArmies: readonly Army[]): number {
    const army = this.getTarget(enemyArmies);
    if (!army) return 0;

    let dealt = 0;
    for (const unit of army.members) {
      dealt += unit.applyDamage(this.damage);
    }
    if (army.aggregateHealth === 0) {
      this.target = null;
    }
    return dealt;
  }
}
