// glyphproof/types - Shared types for filtering, sampling and punctuation

/** A word and its occurrence count in a vocabulary. */
export type WordCount = readonly [word: string, count: number];

/**
 * Ordered (word, count) pairs produced by filtering.
 * Never empty: an empty result is raised as a NoMatchError instead.
 */
export type FilteredCollection = readonly WordCount[];

export const CASE_MODES = [
  'any',
  'any_og',
  'lc',
  'lc_force',
  'cap',
  'cap_og',
  'cap_force',
  'uc',
  'uc_og',
  'uc_force',
] as const;

/**
 * Letter case requested for filtered words.
 *
 * - `*_og` keeps only words already in that case in the vocabulary
 * - `*_force` transforms every word into that case
 * - `lc`, `cap`, `uc` transform only words whose source case is compatible
 * - `any` tries unmodified words first, then capitalized, then uppercased
 */
export type CaseMode = (typeof CASE_MODES)[number];

export function isCaseMode(value: string): value is CaseMode {
  return (CASE_MODES as readonly string[]).includes(value);
}

/** Glyph constraint accepted by public operations; empty or absent means unconstrained. */
export type GlyphsInput = string | null | undefined;

export interface StructuralCriteria {
  minLength?: number;
  maxLength?: number;
  /** Overrides minLength/maxLength when set */
  exactLength?: number;
  startsWith?: string;
  endsWith?: string;
  /** Every substring must be present */
  contains?: string | readonly string[];
  /** Like contains, but never matching the first or last character */
  inner?: string | readonly string[];
  /** Pattern the whole word must match (unicode flag, implicit anchors) */
  regex?: string;
}

export interface InsertOption {
  text: string;
  weight: number;
}

export interface WrapOption {
  prefix: string;
  suffix: string;
  weight: number;
}

export interface PunctuationProfile {
  /** Separators placed between two words, plain space included */
  insert: readonly InsertOption[];
  /** Pairs placed around the whole sentence */
  wrapSentence: readonly WrapOption[];
  /** Pairs placed around a span of words inside the sentence */
  wrapInner: readonly WrapOption[];
}

export type Seed = number | string;

/** Options shared by every word-producing operation. */
export interface FilterOptions extends StructuralCriteria {
  vocab?: string;
  glyphs?: GlyphsInput;
  case?: CaseMode;
  raiseErrors?: boolean;
}
