/**
 * AI Controller
 * Runs the opponent's turn: asks the behavior for a strategy, draws an
 * affordable action from it and hands it to the engine, while gold lasts
 */

import { AI_TUNING, CHEAPEST_AI_ACTION_COST, type AIAction } from '../config/aiConfig';
import type { RandomSource } from '../core/PRNG';
import type { AIDecision, IAIBehavior, OpponentView } from './AIBehavior';
import { buildAffordableStrategy, pickAction } from './WeightedStrategy';

/**
 * Carries out one action for the opponent. Returns false when it was rejected.
 */
export type ActionExecutor = (action: AIAction) => boolean;

/**
 * AI Controller State
 */
export interface AIState {
  behaviorName: string;
  lastRule: string | null;
  recentActions: AIDecision[];
}

export class AIController {
  private state: AIState;

  constructor(
    private behavior: IAIBehavior,
    private random: RandomSource
  ) {
    this.state = {
      behaviorName: behavior.getName(),
      lastRule: null,
      recentActions: [],
    };
  }

  /**
   * True while gold plus the income still due before the next spawn covers
   * a unit for every spawn slot
   */
  public static hasSpawnBudgetSurplus(view: OpponentView): boolean {
    return view.gold + view.income * view.turnsToSpawn >= view.spawnSlots * view.unitPrice;
  }

  /**
   * One decision. WAIT when gold is below every price or nothing in the
   * chosen table is affordable.
   */
  public makeDecision(view: OpponentView): AIDecision {
    if (view.gold < CHEAPEST_AI_ACTION_COST) {
      return this.record({ action: 'WAIT', reasoning: 'out of gold' });
    }

    const selection = this.behavior.selectStrategy(view);
    this.state.lastRule = selection.rule;

    const action = pickAction(buildAffordableStrategy(selection.table, view.gold), this.random);
    if (action === null) {
      return this.record({ action: 'WAIT', reasoning: `nothing affordable under ${selection.rule}` });
    }
    return this.record({ action, reasoning: selection.rule });
  }

  /**
   * Spend gold action by action. The view is re-read after every action.
   * Returns the actions taken, in order.
   */
  public takeTurn(getView: () => OpponentView, execute: ActionExecutor): AIDecision[] {
    const taken: AIDecision[] = [];
    for (let view = getView(); AIController.hasSpawnBudgetSurplus(view); view = getView()) {
      const decision = this.makeDecision(view);
      if (decision.action === 'WAIT') break;
      taken.push(decision);
      if (!execute(decision.action)) break;
    }
    return taken;
  }

  public reset(): void {
    this.state.lastRule = null;
    this.state.recentActions = [];
    this.behavior.reset?.();
  }

  public getState(): Readonly<AIState> {
    return { ...this.state, recentActions: [...this.state.recentActions] };
  }

  private record(decision: AIDecision): AIDecision {
    this.state.recentActions.push(decision);
    if (this.state.recentActions.length > AI_TUNING.decisionHistoryLimit) {
      this.state.recentActions.shift();
    }
    return decision;
  }
}
