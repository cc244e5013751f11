// glyphproof/random - Seedable random number generator

import type { Seed } from './types.js';

/** FNV-1a over the seed's string form, so 12, "12" and 12.5 all work */
function hashSeed(seed: Seed): number {
  const text = typeof seed === 'number' ? `n:${seed}` : `s:${seed}`;
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function entropySeed(): number {
  return Math.floor(Math.random() * 0x100000000);
}

/**
 * Mulberry32 generator. Each ProofGenerator owns one instance; reseeding
 * it makes every following draw reproducible.
 */
export class Random {
  private state = 0;

  constructor(seed?: Seed) {
    this.seed(seed ?? entropySeed());
  }

  seed(seed: Seed): void {
    this.state = hashSeed(seed);
  }

  /** Float in [0, 1) */
  random(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], both ends included */
  randint(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  /** Integer in [start, stop) */
  randrange(start: number, stop: number): number {
    return start + Math.floor(this.random() * (stop - start));
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[Math.floor(this.random() * items.length)];
  }

  /** Inverse-CDF pick over precomputed cumulative weights */
  choiceCumulative<T>(items: readonly T[], cumulative: readonly number[]): T {
    if (items.length === 0 || items.length !== cumulative.length) {
      throw new RangeError('Items and cumulative weights must be non-empty and the same length');
    }
    const total = cumulative[cumulative.length - 1];
    const target = this.random() * total;

    let lo = 0;
    let hi = cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (target < cumulative[mid]) hi = mid;
      else lo = mid + 1;
    }
    return items[lo];
  }

  weightedChoice<T>(items: readonly T[], weights: readonly number[]): T {
    return this.choiceCumulative(items, accumulate(weights));
  }
}

export function accumulate(weights: readonly number[]): number[] {
  const result: number[] = [];
  let sum = 0;
  for (const weight of weights) {
    sum += weight;
    result.push(sum);
  }
  return result;
}
