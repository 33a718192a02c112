import { describe, expect, it } from 'vitest';
import { buildAffordableStrategy, convertPercentage, pickAction, selectByDraw } from '../WeightedStrategy';
import { PRNG } from '../../core/PRNG';
import { ScriptedRandom } from '../../__tests__/support';

describe('convertPercentage', () => {
  it('turns percentages into ascending cumulative thresholds', () => {
    const thresholds = convertPercentage({
      BUILD_SPAWN: 35,
      UPGRADE_INCOME: 30,
      UNIT_HEALTH: 10,
      UNIT_DAMAGE: 10,
      UNIT_ATTACK_SPEED: 10,
      UNIT_REGEN: 5,
    });

    expect(thresholds).toEqual([
      { threshold: 5, action: 'UNIT_REGEN' },
      { threshold: 15, action: 'UNIT_ATTACK_SPEED' },
      { threshold: 25, action: 'UNIT_DAMAGE' },
      { threshold: 35, action: 'UNIT_HEALTH' },
      { threshold: 65, action: 'UPGRADE_INCOME' },
      { threshold: 100, action: 'BUILD_SPAWN' },
    ]);
  });

  it('drops actions with no weight', () => {
    expect(convertPercentage({ BUILD_SPAWN: 0, UPGRADE_INCOME: 100 })).toEqual([
      { threshold: 100, action: 'UPGRADE_INCOME' },
    ]);
  });

  it('refuses tables above 100 percent', () => {
    expect(() => convertPercentage({ BUILD_SPAWN: 60, UPGRADE_INCOME: 50 })).toThrow(
      'strategy percentages exceed 100 (110)'
    );
  });
});

describe('buildAffordableStrategy', () => {
  const table = { BUILD_SPAWN: 20, UPGRADE_INCOME: 30, CASTLE_DAMAGE: 40, CASTLE_HEALTH: 10 };

  it('keeps only actions the gold covers and shrinks the total with them', () => {
    const strategy = buildAffordableStrategy(table, 250);

    expect(strategy).toEqual({
      thresholds: [
        { threshold: 20, action: 'BUILD_SPAWN' },
        { threshold: 50, action: 'UPGRADE_INCOME' },
      ],
      total: 50,
    });
  });

  it('never selects a filtered action for any draw', () => {
    const strategy = buildAffordableStrategy(table, 250);
    const chosen = new Set(Array.from({ length: strategy.total }, (_, index) => selectByDraw(strategy, index + 1)));

    expect([...chosen].sort()).toEqual(['BUILD_SPAWN', 'UPGRADE_INCOME']);
  });

  it('takes costs from the caller', () => {
    const strategy = buildAffordableStrategy(table, 250, {
      BUILD_SPAWN: 1000,
      UPGRADE_INCOME: 1000,
      UNIT_ATTACK_SPEED: 1000,
      UNIT_DAMAGE: 1000,
      UNIT_HEALTH: 1000,
      UNIT_REGEN: 1000,
      CASTLE_DAMAGE: 250,
      CASTLE_REGEN: 1000,
      CASTLE_HEALTH: 1000,
    });

    expect(strategy.total).toBe(40);
  });
});

describe('pickAction', () => {
  const strategy = buildAffordableStrategy({ BUILD_SPAWN: 20, UPGRADE_INCOME: 30 }, 1000);

  it('maps the lowest and highest draws onto the first and last thresholds', () => {
    expect(pickAction(strategy, new ScriptedRandom([0]))).toBe('BUILD_SPAWN');
    expect(pickAction(strategy, new ScriptedRandom([0.39]))).toBe('BUILD_SPAWN');
    expect(pickAction(strategy, new ScriptedRandom([0.41]))).toBe('UPGRADE_INCOME');
    expect(pickAction(strategy, new ScriptedRandom([0.999]))).toBe('UPGRADE_INCOME');
  });

  it('returns null when nothing is affordable', () => {
    expect(pickAction(buildAffordableStrategy({ CASTLE_HEALTH: 100 }, 50), new PRNG(1))).toBeNull();
  });
});
