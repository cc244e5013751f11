// glyphproof/glyphs - Glyph sets and character class helpers

import type { GlyphsInput } from './types.js';

const UPPERCASE = /^\p{Lu}$/u;
const LOWERCASE = /^\p{Ll}$/u;
const DIGIT = /^[0-9]$/;

export function isUppercase(char: string): boolean {
  return UPPERCASE.test(char);
}

export function isLowercase(char: string): boolean {
  return LOWERCASE.test(char);
}

/** Split into code points so astral characters count as one glyph */
export function chars(text: string): string[] {
  return Array.from(text);
}

/** First character upper-cased, the rest lower-cased */
export function capitalize(word: string): string {
  const [first = '', ...rest] = chars(word);
  return first.toUpperCase() + rest.join('').toLowerCase();
}

/**
 * The characters a typeface currently supports.
 * An unconstrained set (no glyphs given) accepts every character.
 */
export class GlyphSet {
  readonly limited: boolean;
  private readonly set: ReadonlySet<string>;
  /** Canonical string form, used in cache keys */
  readonly key: string;

  constructor(glyphs: GlyphsInput) {
    this.limited = Boolean(glyphs);
    const unique = Array.from(new Set(chars(glyphs ?? '')));
    this.set = new Set(unique);
    this.key = unique.slice().sort().join('');
  }

  static from(glyphs: GlyphsInput | GlyphSet): GlyphSet {
    return glyphs instanceof GlyphSet ? glyphs : new GlyphSet(glyphs);
  }

  has(char: string): boolean {
    return !this.limited || this.set.has(char);
  }

  /** Can every character of the text be displayed? */
  spells(text: string, extra = ''): boolean {
    if (!this.limited) return true;
    for (const char of chars(text)) {
      if (!this.set.has(char) && !extra.includes(char)) return false;
    }
    return true;
  }

  toArray(): string[] {
    return Array.from(this.set);
  }

  private pick(test: (char: string) => boolean): string[] {
    return this.toArray().filter(test);
  }

  uppercase(): string[] {
    return this.pick(isUppercase);
  }

  lowercase(): string[] {
    return this.pick(isLowercase);
  }

  digits(): string[] {
    return this.pick(c => DIGIT.test(c));
  }
}
