// glyphproof/caseModes - Dispatch table for explicit case modes

import { capitalize, chars, type GlyphSet } from './glyphs.js';
import type { CaseMode } from './types.js';

/** Glyph classes derived once per filter call */
export interface CaseGlyphs {
  all: GlyphSet;
  lower: ReadonlySet<string>;
  upper: ReadonlySet<string>;
  /** lower ∪ upper-cased lower */
  lowerAnyCase: ReadonlySet<string>;
  /** upper ∪ lower-cased upper */
  upperAnyCase: ReadonlySet<string>;
}

export interface CaseRule {
  needsLower: boolean;
  needsUpper: boolean;
  /** Source words accepted when glyphs are limited */
  acceptsWithGlyphs: (word: string, glyphs: CaseGlyphs) => boolean;
  /** Source words accepted when every glyph is available */
  acceptsUnconstrained: (word: string) => boolean;
  transform?: (word: string) => string;
}

export function caseGlyphs(all: GlyphSet): CaseGlyphs {
  const lower = new Set(all.lowercase());
  const upper = new Set(all.uppercase());
  const lowerAnyCase = new Set(lower);
  for (const c of lower) for (const u of chars(c.toUpperCase())) lowerAnyCase.add(u);
  const upperAnyCase = new Set(upper);
  for (const c of upper) for (const l of chars(c.toLowerCase())) upperAnyCase.add(l);
  return { all, lower, upper, lowerAnyCase, upperAnyCase };
}

function allIn(word: string, set: ReadonlySet<string>): boolean {
  for (const c of chars(word)) {
    if (!set.has(c)) return false;
  }
  return true;
}

function headTail(word: string, head: ReadonlySet<string>, tail: ReadonlySet<string>): boolean {
  const [first, ...rest] = chars(word);
  if (first === undefined || !head.has(first)) return false;
  return rest.every(c => tail.has(c));
}

const ALL_LOWER = /^\p{Ll}+$/u;
const ALL_UPPER = /^\p{Lu}+$/u;
const TITLE = /^\p{Lu}\p{Ll}*$/u;
const LOWER_TAIL = /^.\p{Ll}*$/u;
const CAMEL = /\p{Ll}\p{Lu}/u;
const UPPER_RUN_THEN_LOWER = /\p{Lu}{2,}\p{Ll}/u;

/** Mixed-case words like "iPhone" or "PCIe" are left alone by `uc` */
function upperCasable(word: string): boolean {
  return !CAMEL.test(word) && !UPPER_RUN_THEN_LOWER.test(word);
}

const always = () => true;
const toLower = (word: string) => word.toLowerCase();
const toUpper = (word: string) => word.toUpperCase();

export const CASE_RULES: Record<Exclude<CaseMode, 'any'>, CaseRule> = {
  any_og: {
    needsLower: false,
    needsUpper: false,
    acceptsWithGlyphs: (w, g) => g.all.spells(w),
    acceptsUnconstrained: always,
  },
  lc: {
    needsLower: true,
    needsUpper: false,
    acceptsWithGlyphs: (w, g) => allIn(w, g.lower),
    acceptsUnconstrained: w => ALL_LOWER.test(w),
  },
  lc_force: {
    needsLower: true,
    needsUpper: false,
    acceptsWithGlyphs: (w, g) => allIn(w, g.lowerAnyCase),
    acceptsUnconstrained: always,
    transform: toLower,
  },
  cap: {
    needsLower: true,
    needsUpper: true,
    acceptsWithGlyphs: (w, g) => headTail(w, g.upperAnyCase, g.lower),
    acceptsUnconstrained: w => LOWER_TAIL.test(w),
    transform: capitalize,
  },
  cap_og: {
    needsLower: true,
    needsUpper: true,
    acceptsWithGlyphs: (w, g) => headTail(w, g.upper, g.lower),
    acceptsUnconstrained: w => TITLE.test(w),
  },
  cap_force: {
    needsLower: true,
    needsUpper: true,
    acceptsWithGlyphs: (w, g) => headTail(w, g.upperAnyCase, g.lowerAnyCase),
    acceptsUnconstrained: always,
    transform: capitalize,
  },
  uc: {
    needsLower: false,
    needsUpper: true,
    acceptsWithGlyphs: (w, g) => upperCasable(w) && allIn(w, g.upperAnyCase),
    acceptsUnconstrained: upperCasable,
    transform: toUpper,
  },
  uc_og: {
    needsLower: false,
    needsUpper: true,
    acceptsWithGlyphs: (w, g) => allIn(w, g.upper),
    acceptsUnconstrained: w => ALL_UPPER.test(w),
  },
  uc_force: {
    needsLower: false,
    needsUpper: true,
    acceptsWithGlyphs: (w, g) => allIn(w, g.upperAnyCase),
    acceptsUnconstrained: always,
    transform: toUpper,
  },
};

/** Which glyph class a rule is missing, if any */
export function missingGlyphClass(rule: CaseRule, glyphs: CaseGlyphs): 'lowercase' | 'uppercase' | null {
  if (!glyphs.all.limited) return null;
  if (rule.needsLower && glyphs.lower.size === 0) return 'lowercase';
  if (rule.needsUpper && glyphs.upper.size === 0) return 'uppercase';
  return null;
}
