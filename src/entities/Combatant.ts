/**
 * Health capability shared by units and castles.
 * Castles take damage differently, so this is an interface plus helpers
 * rather than a common base class.
 */

export interface Health {
  current: number;
  max: number;
}

export interface Combatant {
  readonly health: Health;
  regenPerTurn: number;

  /**
   * Receive damage. Returns the health actually removed.
   */
  applyDamage(amount: number): number;

  regenerate(): void;

  isAlive(): boolean;
}

/**
 * Subtract damage, clamped at zero. Returns the health actually removed.
 */
export function dealDamage(health: Health, amount: number): number {
  const removed = Math.min(health.current, Math.max(0, amount));
  health.current -= removed;
  return removed;
}

export function regenerateHealth(health: Health, regen: number): void {
  if (health.current < health.max) {
    health.current = Math.min(health.max, health.current + regen);
  }
}
