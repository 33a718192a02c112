import { describe, expect, it } from 'vitest';
import { Unit, type TargetResolver, type UnitStats } from '../Unit';
import type { Combatant } from '../Combatant';

const stats = (overrides: Partial<UnitStats> = {}): UnitStats => ({
  health: 5,
  damage: 1,
  speed: 1,
  attackSpeed: 1,
  regen: 0,
  goldReward: 1,
  ...overrides,
});

const resolverFor = (...units: Unit[]): TargetResolver => ({
  resolveUnitTarget: (target): Combatant | undefined =>
    target.kind === 'unit' ? units.find((unit) => unit.id === target.id) : undefined,
});

describe('Unit', () => {
  it('starts charged and hits on the first swing', () => {
    const attacker = new Unit(1, 'PLAYER', stats());
    const defender = new Unit(2, 'ENEMY', stats());
    attacker.setTarget({ kind: 'unit', id: 2 });

    expect(attacker.accumulatedAttackRate).toBe(5);
    expect(attacker.attack(resolverFor(defender))).toBe(1);
    expect(attacker.accumulatedAttackRate).toBe(0);
    expect(defender.health.current).toBe(4);
  });

  it('recharges by its attack speed on every swing without a hit', () => {
    const attacker = new Unit(1, 'PLAYER', stats());
    const defender = new Unit(2, 'ENEMY', stats({ health: 50 }));
    attacker.setTarget({ kind: 'unit', id: 2 });
    const resolver = resolverFor(defender);

    const dealt = Array.from({ length: 7 }, () => attacker.attack(resolver));

    expect(dealt).toEqual([1, 0, 0, 0, 0, 0, 1]);
    expect(defender.health.current).toBe(48);
  });

  it('lands several hits in one call when the accumulator allows', () => {
    const attacker = new Unit(1, 'PLAYER', stats({ attackSpeed: 12 }));
    const defender = new Unit(2, 'ENEMY', stats({ health: 50 }));
    attacker.setTarget({ kind: 'unit', id: 2 });
    const resolver = resolverFor(defender);

    expect(attacker.attack(resolver)).toBe(2);
    expect(attacker.accumulatedAttackRate).toBe(2);
    expect(attacker.attack(resolver)).toBe(0);
    expect(attacker.accumulatedAttackRate).toBe(14);
    expect(attacker.attack(resolver)).toBe(2);
    expect(attacker.accumulatedAttackRate).toBe(4);
  });

  it('keeps fractional attack speed exact', () => {
    const attacker = new Unit(1, 'PLAYER', stats({ attackSpeed: 1.3 }));
    const defender = new Unit(2, 'ENEMY', stats({ health: 50 }));
    attacker.setTarget({ kind: 'unit', id: 2 });
    const resolver = resolverFor(defender);

    attacker.attack(resolver);
    attacker.attack(resolver);
    attacker.attack(resolver);

    expect(attacker.accumulatedAttackRate).toBe(2.6);
  });

  it('reports only the damage that was applied', () => {
    const attacker = new Unit(1, 'PLAYER', stats({ damage: 3 }));
    const defender = new Unit(2, 'ENEMY', stats({ health: 1 }));
    attacker.setTarget({ kind: 'unit', id: 2 });

    expect(attacker.attack(resolverFor(defender))).toBe(1);
    expect(defender.isAlive()).toBe(false);
  });

  it('refuses to attack without a live target', () => {
    const attacker = new Unit(1, 'PLAYER', stats());
    const defender = new Unit(2, 'ENEMY', stats());
    expect(() => attacker.attack(resolverFor(defender))).toThrow('unit 1 attacks without a target');

    attacker.setTarget({ kind: 'unit', id: 2 });
    defender.health.current = 0;
    expect(attacker.hasLiveTarget(resolverFor(defender))).toBe(false);
    expect(() => attacker.attack(resolverFor(defender))).toThrow('unit 1 attacks a dead or missing target');
  });

  it('drops a partial charge when leaving combat', () => {
    const attacker = new Unit(1, 'PLAYER', stats());
    const defender = new Unit(2, 'ENEMY', stats());
    attacker.setTarget({ kind: 'unit', id: 2 });
    attacker.attack(resolverFor(defender));
    attacker.attack(resolverFor(defender));

    attacker.refreshAttackRate();

    expect(attacker.accumulatedAttackRate).toBe(5);
  });

  it('regenerates between turns up to its maximum', () => {
    const unit = new Unit(1, 'PLAYER', stats({ health: 10, regen: 3 }));
    unit.applyDamage(4);
    unit.regenerate();
    expect(unit.health.current).toBe(9);
    unit.regenerate();
    expect(unit.health.current).toBe(10);
  });
});
