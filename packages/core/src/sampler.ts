// glyphproof/sampler - Frequency-weighted word sampling

import { LRUCache } from 'lru-cache';
import { IndexError, NoMatchError, ValidationError } from './errors.js';
import { accumulate, type Random } from './random.js';
import type { FilteredCollection } from './types.js';

// Cumulative weights per collection and randomness. Filter results are
// cached, so the same collection object comes back for repeated draws.
const RANDOMNESS_VALUES_PER_COLLECTION = 4;
const cumulativeCache = new WeakMap<FilteredCollection, LRUCache<number, number[]>>();

export function checkProbability(value: number, name: string): void {
  if (!(value >= 0 && value <= 1)) {
    throw new ValidationError(`'${name}' must be between 0 and 1, got ${value}`);
  }
}

/**
 * Pull each count toward the collection maximum: 0 keeps the corpus
 * frequencies, 1 makes every weight equal.
 */
export function interpolateCounts(counts: readonly number[], randomness: number): number[] {
  let max = -Infinity;
  for (const c of counts) {
    if (c > max) max = c;
  }
  return counts.map(c => (1 - randomness) * c + randomness * max);
}

/** Restrict to the `topK` most frequent entries; 0 or absent keeps all */
export function truncate(collection: FilteredCollection, topK?: number): FilteredCollection {
  if (topK === undefined || topK === 0) return collection;
  if (!Number.isInteger(topK) || topK < 0) {
    throw new ValidationError(`'topK' must be a non-negative integer, got ${topK}`);
  }
  return collection.slice(0, topK);
}

function cumulativeWeights(collection: FilteredCollection, randomness: number): number[] {
  let byRandomness = cumulativeCache.get(collection);
  if (!byRandomness) {
    byRandomness = new LRUCache({ max: RANDOMNESS_VALUES_PER_COLLECTION });
    cumulativeCache.set(collection, byRandomness);
  }
  let cumulative = byRandomness.get(randomness);
  if (!cumulative) {
    cumulative = accumulate(interpolateCounts(collection.map(([, count]) => count), randomness));
    byRandomness.set(randomness, cumulative);
  }
  return cumulative;
}

export function sampleWord(
  collection: FilteredCollection,
  rng: Random,
  randomness = 0,
  topK?: number
): string {
  checkProbability(randomness, 'randomness');
  const candidates = truncate(collection, topK);
  if (candidates.length === 0) {
    throw new NoMatchError('sample');
  }
  const words = candidates.map(([word]) => word);
  return rng.choiceCumulative(words, cumulativeWeights(candidates, randomness));
}

/** The word at `index` in descending-frequency order (0 = most common) */
export function nthWord(collection: FilteredCollection, index: number, topK?: number): string {
  const candidates = truncate(collection, topK);
  if (!Number.isInteger(index) || index < 0) {
    throw new ValidationError(`'index' must be a non-negative integer, got ${index}`);
  }
  if (index >= candidates.length) {
    throw new IndexError(index, candidates.length);
  }
  return candidates[index][0];
}
