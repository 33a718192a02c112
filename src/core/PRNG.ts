import { invariant } from './invariant';

/**
 * Anything the simulation draws randomness from. Tests may script it.
 */
export interface RandomSource {
  // Returns float in [0,1)
  next(): number;
}

// Small deterministic PRNG (mulberry32-like) for repeatable matches
export class PRNG implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // normalize seed to 32-bit unsigned
    this.state = seed >>> 0;
    if (this.state === 0) this.state = 1;
  }

  // Returns float in [0,1)
  next(): number {
    let t = (this.state += 0x6d2b79f5) >>> 0;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const r = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    this.state = t >>> 0;
    return r;
  }

  nextInt(maxExclusive: number): number {
    return nextInt(this, maxExclusive);
  }
}

export function nextInt(random: RandomSource, maxExclusive: number): number {
  return Math.floor(random.next() * maxExclusive);
}

/**
 * Uniform integer in [min, max], both ends included
 */
export function nextIntInclusive(random: RandomSource, min: number, max: number): number {
  invariant(max >= min, `empty random range [${min}, ${max}]`);
  return min + nextInt(random, max - min + 1);
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  invariant(items.length > 0, 'cannot pick from an empty pool');
  const item = items[nextInt(random, items.length)];
  invariant(item !== undefined, 'random index out of range');
  return item;
}
