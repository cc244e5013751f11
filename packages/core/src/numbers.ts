// glyphproof/numbers - Numerals spelled from the available digits

import { NoMatchError, ValidationError } from './errors.js';
import { GlyphSet } from './glyphs.js';
import type { Random } from './random.js';
import type { GlyphsInput } from './types.js';

export const ALL_DIGITS = '0123456789';
export const DEFAULT_NUMBER_MAX_LENGTH = 4;

export interface NumberLength {
  /** Overrides minLength/maxLength when set */
  length?: number;
  minLength?: number;
  maxLength?: number;
}

export function availableDigits(glyphs: GlyphsInput | GlyphSet): string[] {
  const glyphSet = GlyphSet.from(glyphs);
  return glyphSet.limited ? glyphSet.digits().sort() : Array.from(ALL_DIGITS);
}

/**
 * A random run of digits. Without an explicit maximum the length tops out
 * at 4, or at minLength when that is larger.
 */
export function generateNumber(
  rng: Random,
  glyphs: GlyphsInput | GlyphSet,
  { length, minLength = 1, maxLength }: NumberLength = {}
): string {
  let min = minLength;
  let max = maxLength ?? Math.max(DEFAULT_NUMBER_MAX_LENGTH, minLength);
  if (length !== undefined) {
    min = length;
    max = length;
  }

  for (const [name, value] of [['minLength', min], ['maxLength', max]] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError(`'${name}' for numbers must be a positive integer, got ${value}`);
    }
  }
  if (min > max) {
    throw new ValidationError(`'minLength' (${min}) must be less than or equal to 'maxLength' (${max})`);
  }

  const digits = availableDigits(glyphs);
  if (digits.length === 0) {
    throw new NoMatchError('numeral', 'no numerals available in glyphs');
  }

  const size = rng.randint(min, max);
  let result = '';
  for (let i = 0; i < size; i++) {
    result += rng.choice(digits);
  }
  return result;
}
