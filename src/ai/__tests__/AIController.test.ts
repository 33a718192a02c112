import { describe, expect, it } from 'vitest';
import { AIController } from '../AIController';
import type { IAIBehavior, OpponentView } from '../AIBehavior';
import type { PercentageTable } from '../../config/aiConfig';
import { PRNG } from '../../core/PRNG';

const view = (overrides: Partial<OpponentView> = {}): OpponentView => ({
  gold: 1000,
  income: 0,
  spawnSlots: 0,
  unitPrice: 5,
  unitLevels: { health: 0, damage: 0, attackSpeed: 0, regen: 0 },
  castleHealth: 10000,
  enemyUnitLevelSum: 0,
  turnsToSpawn: 0,
  ...overrides,
});

const fixedBehavior = (table: PercentageTable): IAIBehavior => ({
  getName: () => 'Fixed',
  selectStrategy: () => ({ table, rule: 'fixed' }),
});

describe('AIController', () => {
  it('keeps gold for a unit in every spawn slot, counting income still due', () => {
    const budget = { income: 5, turnsToSpawn: 2, spawnSlots: 4, unitPrice: 5 };
    expect(AIController.hasSpawnBudgetSurplus(view({ ...budget, gold: 10 }))).toBe(true);
    expect(AIController.hasSpawnBudgetSurplus(view({ ...budget, gold: 9 }))).toBe(false);
  });

  it('waits when gold is below the cheapest action', () => {
    const controller = new AIController(fixedBehavior({ UPGRADE_INCOME: 100 }), new PRNG(1));
    expect(controller.makeDecision(view({ gold: 99 }))).toEqual({ action: 'WAIT', reasoning: 'out of gold' });
  });

  it('waits when nothing in the table is affordable', () => {
    const controller = new AIController(fixedBehavior({ CASTLE_HEALTH: 100 }), new PRNG(1));
    expect(controller.makeDecision(view({ gold: 300 }))).toEqual({
      action: 'WAIT',
      reasoning: 'nothing affordable under fixed',
    });
  });

  it('spends gold action by action until it runs out', () => {
    const controller = new AIController(fixedBehavior({ BUILD_SPAWN: 100 }), new PRNG(1));
    const state = view();

    const taken = controller.takeTurn(
      () => ({ ...state }),
      (action) => {
        expect(action).toBe('BUILD_SPAWN');
        state.gold -= 200;
        state.spawnSlots += 1;
        return true;
      }
    );

    expect(taken).toHaveLength(5);
    expect(state).toMatchObject({ gold: 0, spawnSlots: 5 });
  });

  it('stops once gold plus income due no longer covers the spawn budget', () => {
    const controller = new AIController(fixedBehavior({ UPGRADE_INCOME: 100 }), new PRNG(1));
    const state = view({ spawnSlots: 10, unitPrice: 50 });

    const taken = controller.takeTurn(
      () => ({ ...state }),
      () => {
        state.gold -= 100;
        return true;
      }
    );

    expect(taken).toHaveLength(6);
    expect(state.gold).toBe(400);
  });

  it('stops when an action is rejected', () => {
    const controller = new AIController(fixedBehavior({ UPGRADE_INCOME: 100 }), new PRNG(1));
    const taken = controller.takeTurn(
      () => view(),
      () => false
    );
    expect(taken).toEqual([{ action: 'UPGRADE_INCOME', reasoning: 'fixed' }]);
  });

  it('keeps a bounded decision history', () => {
    const controller = new AIController(fixedBehavior({ UPGRADE_INCOME: 100 }), new PRNG(1));
    for (let i = 0; i < 105; i++) {
      controller.makeDecision(view({ gold: 0 }));
    }
    expect(controller.getState().recentActions).toHaveLength(100);

    controller.reset();
    expect(controller.getState()).toEqual({ behaviorName: 'Fixed', lastRule: null, recentActions: [] });
  });
});
