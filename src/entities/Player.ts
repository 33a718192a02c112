import {
  CASTLE_UPGRADES,
  ECONOMY_CONFIG,
  UNIT_ATTRIBUTES,
  UNIT_BASE_STATS,
  UNIT_UPGRADES,
  getCastleStatAtLevel,
  getUnitStatAtLevel,
  type CastleAttribute,
  type Side,
  type UnitAttribute,
} from '../config/gameBalance';
import { invariant } from '../core/invariant';
import type { Army, BattleContext } from './Army';
import type { Castle } from './Castle';
import { Unit } from './Unit';

/**
 * How many of something to buy. 'max' resolves against gold at call time.
 */
export type PurchaseCount = number | 'max';

/**
 * Upgrades and buildings of a player, as the other side may inspect them
 */
export interface PlayerStats {
  spawnSlots: number;
  unitLevels: Record<UnitAttribute, number>;
  unitStats: Record<UnitAttribute, number>;
  castleLevels: Record<CastleAttribute, number>;
  castleStats: Record<CastleAttribute, number>;
}

const unitStatsAtLevel = (level: number): Record<UnitAttribute, number> => ({
  health: getUnitStatAtLevel('health', level),
  damage: getUnitStatAtLevel('damage', level),
  attackSpeed: getUnitStatAtLevel('attackSpeed', level),
  regen: getUnitStatAtLevel('regen', level),
});

const castleStatsAtLevel = (level: number): Record<CastleAttribute, number> => ({
  income: getCastleStatAtLevel('income', level),
  damage: getCastleStatAtLevel('damage', level),
  regen: getCastleStatAtLevel('regen', level),
  health: getCastleStatAtLevel('health', level),
});

export class Player {
  gold: number;
  goldEarned: number;
  income = 0;
  castleIncome = 0;
  spawnSlots = 0;
  kills = 0;
  deaths = 0;
  unitPrice: number = ECONOMY_CONFIG.unitPrice;
  unitGoldReward: number = ECONOMY_CONFIG.killReward;
  armies: Army[] = [];

  readonly unitLevels: Record<UnitAttribute, number> = { health: 0, damage: 0, attackSpeed: 0, regen: 0 };
  readonly unitStats: Record<UnitAttribute, number> = unitStatsAtLevel(0);
  readonly castleLevels: Record<CastleAttribute, number> = { income: 0, damage: 0, regen: 0, health: 0 };
  readonly castleStats: Record<CastleAttribute, number> = castleStatsAtLevel(0);

  constructor(
    readonly side: Side,
    readonly castle: Castle,
    startingGold: number = ECONOMY_CONFIG.startingGold
  ) {
    this.gold = startingGold;
    this.goldEarned = startingGold;
  }

  /**
   * Sum of all unit upgrade levels, the opponent's measure of unit power
   */
  get unitLevelSum(): number {
    return UNIT_ATTRIBUTES.reduce((sum, key) => sum + this.unitLevels[key], 0);
  }

  /**
   * One unit per spawn slot, stamped with current upgrades, while gold lasts
   */
  spawnUnits(allocateId: () => number): Unit[] {
    const units: Unit[] = [];
    for (let slot = 0; slot < this.spawnSlots; slot++) {
      if (this.gold < this.unitPrice) break;
      units.push(
        new Unit(allocateId(), this.side, {
          health: this.unitStats.health,
          damage: this.unitStats.damage,
          speed: UNIT_BASE_STATS.speed,
          attackSpeed: this.unitStats.attackSpeed,
          regen: this.unitStats.regen,
          goldReward: this.unitGoldReward,
        })
      );
      this.gold -= this.unitPrice;
    }
    return units;
  }

  /**
   * Resolve a purchase count against a unit price. Null means insufficient funds.
   */
  private resolveCount(count: PurchaseCount, price: number): number | null {
    if (count === 'max') {
      const affordable = Math.floor(this.gold / price);
      return affordable > 0 ? affordable : null;
    }
    invariant(Number.isInteger(count) && count > 0, `purchase count must be a positive integer, got ${count}`);
    return this.gold >= price * count ? count : null;
  }

  /**
   * Returns false, changing nothing, when gold does not cover the purchase
   */
  buildSpawnSlots(count: PurchaseCount = 1): boolean {
    const resolved = this.resolveCount(count, ECONOMY_CONFIG.spawnSlotCost);
    if (resolved === null) return false;

    this.spawnSlots += resolved;
    this.gold -= ECONOMY_CONFIG.spawnSlotCost * resolved;
    return true;
  }

  /**
   * Stronger units cost more and are worth more to the killer
   */
  upgradeUnitAttribute(attribute: UnitAttribute, count: PurchaseCount = 1): boolean {
    const { price } = UNIT_UPGRADES[attribute];
    const resolved = this.resolveCount(count, price);
    if (resolved === null) return false;

    this.unitLevels[attribute] += resolved;
    this.unitStats[attribute] = getUnitStatAtLevel(attribute, this.unitLevels[attribute]);
    this.gold -= price * resolved;
    this.unitPrice += resolved * ECONOMY_CONFIG.upgradeGoldStep;
    this.unitGoldReward += resolved * ECONOMY_CONFIG.upgradeGoldStep;
    return true;
  }

  upgradeCastleAttribute(attribute: CastleAttribute, count: PurchaseCount = 1): boolean {
    const { price, delta } = CASTLE_UPGRADES[attribute];
    const resolved = this.resolveCount(count, price);
    if (resolved === null) return false;

    this.castleLevels[attribute] += resolved;
    this.castleStats[attribute] = getCastleStatAtLevel(attribute, this.castleLevels[attribute]);
    this.gold -= price * resolved;

    switch (attribute) {
      case 'income':
        this.castleIncome += delta * resolved;
        this.income += delta * resolved;
        break;
      case 'damage':
        this.castle.damage = this.castleStats.damage;
        break;
      case 'regen':
        this.castle.regenPerTurn = this.castleStats.regen;
        break;
      case 'health':
        // Only the cap grows; current health is not topped up
        this.castle.health.max += delta * resolved;
        break;
    }
    return true;
  }

  receiveGold(amount: number): void {
    this.gold += amount;
    this.goldEarned += amount;
  }

  /**
   * Fold one army into another on the same cell. The absorbed army's
   * members take fresh targets from the survivor's target.
   */
  mergeArmies(absorbed: Army, survivor: Army, ctx: BattleContext): void {
    invariant(absorbed !== survivor, `army ${absorbed.id} cannot merge into itself`);
    absorbed.copyTargetFrom(survivor.currentTarget, ctx);
    survivor.members.push(...absorbed.members);
    absorbed.members = [];
    absorbed.currentTarget = null;
    this.armies = this.armies.filter((army) => army !== absorbed);
  }

  /**
   * Merge the army into the first sibling on its cell. Returns whether it merged.
   */
  resolveArmyCollisions(army: Army, ctx: BattleContext): boolean {
    const sibling = this.armies.find((other) => other !== army && other.position === army.position);
    if (!sibling) return false;
    this.mergeArmies(army, sibling, ctx);
    return true;
  }

  /**
   * Drop armies with no members left. Returns how many were dropped.
   */
  purgeEmptyArmies(): number {
    const before = this.armies.length;
    this.armies = this.armies.filter((army) => army.members.length > 0);
    return before - this.armies.length;
  }

  getStats(): PlayerStats {
    return {
      spawnSlots: this.spawnSlots,
      unitLevels: { ...this.unitLevels },
      unitStats: { ...this.unitStats },
      castleLevels: { ...this.castleLevels },
      castleStats: { ...this.castleStats },
    };
  }
}
