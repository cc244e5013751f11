// glyphproof/filter - Combined case and structural filtering with memoization

import { LRUCache } from 'lru-cache';
import { resolveCaseWith } from './caseResolver.js';
import { GlyphSet } from './glyphs.js';
import { applyStructural, validateCriteria } from './structuralFilter.js';
import type { WordTable } from './wordTable.js';
import type { CaseMode, FilteredCollection, GlyphsInput, StructuralCriteria } from './types.js';

let filterCache: LRUCache<string, FilteredCollection> = new LRUCache({ max: 1000 });
let filterCacheHits = 0;
let filterCacheMisses = 0;

/**
 * Clear memoized filter results. Tables and glyph sets never change once
 * built, so entries are otherwise kept for the life of the process.
 */
export function clearFilterCache(): void {
  filterCache.clear();
  filterCacheHits = 0;
  filterCacheMisses = 0;
}

export function setFilterCacheCapacity(capacity: number): void {
  if (Number.isFinite(capacity) && capacity > 0) {
    filterCache = new LRUCache({ max: Math.floor(capacity) });
  }
}

export function getFilterCacheStats(): { hits: number; misses: number; size: number } {
  return { hits: filterCacheHits, misses: filterCacheMisses, size: filterCache.size };
}

function list(value: string | readonly string[] | undefined): readonly string[] | null {
  if (value === undefined) return null;
  return typeof value === 'string' ? [value] : value;
}

function cacheKey(
  table: WordTable,
  glyphs: GlyphSet,
  mode: CaseMode,
  minimumResults: number,
  criteria: StructuralCriteria
): string {
  return JSON.stringify([
    table.id,
    glyphs.limited ? glyphs.key : null,
    mode,
    minimumResults,
    criteria.minLength ?? null,
    criteria.maxLength ?? null,
    criteria.exactLength ?? null,
    criteria.startsWith ?? null,
    criteria.endsWith ?? null,
    list(criteria.contains),
    list(criteria.inner),
    criteria.regex ?? null,
  ]);
}

/**
 * Words of `table` displayable with `glyphs` in `mode` that satisfy
 * `criteria`. Structural criteria run inside each `any` cascade stage.
 *
 * @throws NoMatchError when no word survives
 * @throws ConfigurationError when the glyphs lack a letter class `mode` needs
 * @throws ValidationError for malformed criteria
 */
export function filterWords(
  table: WordTable,
  glyphs: GlyphsInput | GlyphSet,
  mode: CaseMode = 'any',
  criteria: StructuralCriteria = {},
  minimumResults = 1
): FilteredCollection {
  const glyphSet = GlyphSet.from(glyphs);
  const key = cacheKey(table, glyphSet, mode, minimumResults, criteria);

  const cached = filterCache.get(key);
  if (cached) {
    filterCacheHits++;
    return cached;
  }

  validateCriteria(criteria);
  const result = resolveCaseWith(table, glyphSet, mode, minimumResults, collection =>
    applyStructural(collection, criteria)
  );
  filterCache.set(key, result);
  filterCacheMisses++;
  return result;
}
