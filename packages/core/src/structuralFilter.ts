// glyphproof/structuralFilter - Length, substring and pattern constraints

import { NoMatchError, ValidationError } from './errors.js';
import { chars } from './glyphs.js';
import type { FilteredCollection, StructuralCriteria, WordCount } from './types.js';

const ALPHABETIC = /^\p{L}+$/u;

/** Empty strings count as unset */
function toList(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return (typeof value === 'string' ? [value] : value).filter(v => v !== '');
}

function checkAlpha(value: string, name: string) {
  if (!ALPHABETIC.test(value)) {
    throw new ValidationError(`${name} must be a string of alphabetic characters, got '${value}'`);
  }
}

function checkLength(value: number | undefined, name: string) {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function compileRegex(pattern: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})$`, 'u');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid regex '${pattern}': ${message}`);
  }
}

/**
 * Validate criteria up front so a malformed value is reported even when
 * an earlier sub-filter would already have emptied the collection.
 */
export function validateCriteria(criteria: StructuralCriteria): RegExp | null {
  if (criteria.startsWith) checkAlpha(criteria.startsWith, 'startsWith');
  if (criteria.endsWith) checkAlpha(criteria.endsWith, 'endsWith');
  for (const c of toList(criteria.contains)) checkAlpha(c, 'contains');
  for (const i of toList(criteria.inner)) checkAlpha(i, 'inner');

  checkLength(criteria.minLength, 'minLength');
  checkLength(criteria.maxLength, 'maxLength');
  checkLength(criteria.exactLength, 'exactLength');
  if (
    criteria.minLength !== undefined &&
    criteria.maxLength !== undefined &&
    criteria.minLength > criteria.maxLength
  ) {
    throw new ValidationError(
      `minLength (${criteria.minLength}) must be less than or equal to maxLength (${criteria.maxLength})`
    );
  }

  return criteria.regex ? compileRegex(criteria.regex) : null;
}

function step(
  collection: readonly WordCount[],
  stage: string,
  details: string,
  keep: (word: string) => boolean
): readonly WordCount[] {
  const result = collection.filter(([word]) => keep(word));
  if (result.length === 0) {
    throw new NoMatchError(stage, details);
  }
  return result;
}

/** Characters of the word without the first and last one */
function innerPart(word: string): string {
  return chars(word).slice(1, -1).join('');
}

/**
 * Apply structural criteria in a fixed order: prefix, suffix,
 * substrings, length, regex. The first sub-filter that leaves nothing
 * raises NoMatchError. Entries are kept as the same objects, in order.
 */
export function applyStructural(
  collection: FilteredCollection,
  criteria: StructuralCriteria = {}
): FilteredCollection {
  const pattern = validateCriteria(criteria);
  let result: readonly WordCount[] = collection;

  const { startsWith, endsWith } = criteria;
  if (startsWith) {
    result = step(result, 'startsWith', `startsWith='${startsWith}'`, w => w.startsWith(startsWith));
  }
  if (endsWith) {
    result = step(result, 'endsWith', `endsWith='${endsWith}'`, w => w.endsWith(endsWith));
  }
  for (const c of toList(criteria.contains)) {
    result = step(result, 'contains', `contains='${c}'`, w => w.includes(c));
  }
  for (const i of toList(criteria.inner)) {
    result = step(result, 'inner', `inner='${i}'`, w => innerPart(w).includes(i));
  }

  const { exactLength, minLength, maxLength } = criteria;
  if (exactLength !== undefined) {
    result = step(result, 'length', `exactLength=${exactLength}`, w => chars(w).length === exactLength);
  } else if (minLength !== undefined || maxLength !== undefined) {
    const min = minLength ?? 0;
    const max = maxLength ?? Infinity;
    result = step(result, 'length', `minLength=${min}, maxLength=${maxLength ?? 'none'}`, w => {
      const length = chars(w).length;
      return length >= min && length <= max;
    });
  }

  if (pattern) {
    result = step(result, 'regex', `regex='${criteria.regex}'`, w => pattern.test(w));
  }

  return result;
}
