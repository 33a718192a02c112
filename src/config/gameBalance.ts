/**
 * Game Balance Configuration
 * All costs, income rates, unit/castle stats and upgrade tables in one place
 * Tune these values to balance the game without touching core logic
 */

export type Side = 'PLAYER' | 'ENEMY';

export const SIDES: readonly Side[] = ['PLAYER', 'ENEMY'];

export const getEnemySide = (side: Side): Side => (side === 'PLAYER' ? 'ENEMY' : 'PLAYER');

/**
 * Battlefield and turn structure
 */
export const BATTLEFIELD_CONFIG = {
  // Cells between the two castles. PLAYER castle is at 0, ENEMY castle at laneLength + 1
  laneLength: 70,

  // Time ticks evaluated per turn
  ticksPerTurn: 15,

  // Turns waited between two spawns (spawns happen on turn 1, then every interval + 1 turns)
  spawnIntervalTurns: 3,
} as const;

/**
 * Castle Configuration
 */
export const CASTLE_CONFIG = {
  baseHealth: 10000,
  baseDamage: 0,
  baseRegen: 0,

  // Castles only take this fraction of incoming damage, never less than 1 point
  damageTakenFactor: 0.1,
  minimumDamageTaken: 1,
} as const;

/**
 * Base unit stats, stamped into each unit at spawn time
 */
export const UNIT_BASE_STATS = {
  health: 5,
  damage: 1,
  speed: 1,
  attackSpeed: 1,
  regen: 0,
} as const;

// A unit needs this much accumulated attack rate to land one hit
export const ATTACK_RATE_THRESHOLD = 5;

/**
 * Economy
 */
export const ECONOMY_CONFIG = {
  startingGold: 1000,
  unitPrice: 5,
  killReward: 1,

  // Each unit upgrade level adds this to both unit price and kill reward
  upgradeGoldStep: 1,

  // Income per owned piece of land
  landIncome: 10,

  spawnSlotCost: 200,
} as const;

export type UnitAttribute = 'health' | 'damage' | 'attackSpeed' | 'regen';
export type CastleAttribute = 'income' | 'damage' | 'regen' | 'health';

export const UNIT_ATTRIBUTES = ['health', 'damage', 'attackSpeed', 'regen'] as const satisfies readonly UnitAttribute[];
export const CASTLE_ATTRIBUTES = ['income', 'damage', 'regen', 'health'] as const satisfies readonly CastleAttribute[];

export interface UpgradeDef {
  delta: number; // Effective value gained per level
  price: number; // Gold per level
}

export const UNIT_UPGRADES: Record<UnitAttribute, UpgradeDef> = {
  health: { delta: 5, price: 100 },
  damage: { delta: 1, price: 100 },
  attackSpeed: { delta: 0.1, price: 100 },
  regen: { delta: 1, price: 100 },
};

export const CASTLE_UPGRADES: Record<CastleAttribute, UpgradeDef> = {
  income: { delta: 10, price: 100 },
  damage: { delta: 5, price: 300 },
  regen: { delta: 10, price: 200 },
  health: { delta: 1000, price: 500 },
};

export const getUnitBaseValue = (attribute: UnitAttribute): number => UNIT_BASE_STATS[attribute];

export const getCastleBaseValue = (attribute: CastleAttribute): number => {
  switch (attribute) {
    case 'income':
      return 0;
    case 'damage':
      return CASTLE_CONFIG.baseDamage;
    case 'regen':
      return CASTLE_CONFIG.baseRegen;
    case 'health':
      return CASTLE_CONFIG.baseHealth;
  }
};

// Fractional deltas (attack speed) would otherwise drift: 1 + 0.1 * 3 !== 1.3
export const roundStat = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Effective value of an attribute at a given upgrade level
 */
export const getUnitStatAtLevel = (attribute: UnitAttribute, level: number): number =>
  roundStat(getUnitBaseValue(attribute) + UNIT_UPGRADES[attribute].delta * level);

export const getCastleStatAtLevel = (attribute: CastleAttribute, level: number): number =>
  roundStat(getCastleBaseValue(attribute) + CASTLE_UPGRADES[attribute].delta * level);
