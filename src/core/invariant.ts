/**
 * Structural invariants of the simulation. A failure here is a programming
 * defect in the caller, never a condition to recover from.
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violated: ${message}`);
  }
}
