// glyphproof/punctuation - Glyph-aware sentence punctuation

import fs from 'fs';
import { z } from 'zod';
import { GlyphSet } from './glyphs.js';
import { dp } from './log.js';
import type { Random } from './random.js';
import { checkProbability } from './sampler.js';
import type { GlyphsInput, InsertOption, PunctuationProfile, WrapOption } from './types.js';

const weight = z.number().nonnegative();

export const InsertOptionSchema = z.object({ text: z.string(), weight });
export const WrapOptionSchema = z.object({ prefix: z.string(), suffix: z.string(), weight });

export const PunctuationProfileSchema = z.object({
  insert: z.array(InsertOptionSchema),
  wrapSentence: z.array(WrapOptionSchema),
  wrapInner: z.array(WrapOptionSchema),
});

const ProfileFileSchema = z.record(PunctuationProfileSchema);

const DEFAULT_PROFILES_URL = new URL('../data/punctuation.json', import.meta.url);

let defaultProfiles: Record<string, PunctuationProfile> | null = null;

function loadDefaultProfiles(): Record<string, PunctuationProfile> {
  if (!defaultProfiles) {
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_PROFILES_URL, 'utf-8'));
    defaultProfiles = ProfileFileSchema.parse(raw);
    dp(`Loaded punctuation profiles: ${Object.keys(defaultProfiles).join(', ')}`);
  }
  return defaultProfiles;
}

/** Bundled punctuation frequencies for a language, if there are any */
export function defaultPunctuation(language: string): PunctuationProfile | undefined {
  return loadDefaultProfiles()[language];
}

export function defaultPunctuationLanguages(): string[] {
  return Object.keys(loadDefaultProfiles());
}

const NO_WRAP: WrapOption = { prefix: '', suffix: '', weight: 1 };
const PLAIN_SPACE: InsertOption = { text: ' ', weight: 1 };

/**
 * Weighted pick among the options the glyphs can display. Spaces never
 * count against the glyph set. Returns undefined when nothing fits.
 */
export function pickAvailable<T>(
  options: readonly T[],
  textOf: (option: T) => string,
  weightOf: (option: T) => number,
  glyphs: GlyphSet,
  randomness: number,
  rng: Random
): T | undefined {
  const available = options.filter(option => glyphs.spells(textOf(option), ' '));
  if (available.length === 0) return undefined;
  const weights = available.map(option => (1 - randomness) * weightOf(option) + randomness);
  return rng.weightedChoice(available, weights);
}

/**
 * Join words into a sentence: one inner wrap around a span of words,
 * one separator in place of a space, and a wrap around the whole
 * sentence. Categories with no displayable option are left out.
 *
 * @param randomness 0 follows the profile's frequencies, 1 picks uniformly
 */
export function composeSentence(
  words: readonly string[],
  glyphs: GlyphsInput | GlyphSet,
  profile: PunctuationProfile,
  randomness: number,
  rng: Random
): string {
  checkProbability(randomness, 'punctuationRandomness');
  if (words.length === 0) return '';

  const glyphSet = GlyphSet.from(glyphs);
  const wrapText = (o: WrapOption) => o.prefix + o.suffix;
  const weightOf = (o: { weight: number }) => o.weight;

  const insert =
    pickAvailable(profile.insert, o => o.text, weightOf, glyphSet, randomness, rng) ?? PLAIN_SPACE;
  const wrapSentence =
    pickAvailable(profile.wrapSentence, wrapText, weightOf, glyphSet, randomness, rng) ?? NO_WRAP;
  const wrapInner =
    pickAvailable(profile.wrapInner, wrapText, weightOf, glyphSet, randomness, rng) ?? NO_WRAP;

  let sentence: string;
  if (words.length > 2) {
    const n = words.length;
    const placed = [...words];

    const left = rng.randrange(0, n - 1);
    const right = rng.randrange(left, n - 1);
    placed[left] = wrapInner.prefix + placed[left];
    placed[right] = placed[right] + wrapInner.suffix;

    // The separator goes before word k; keep it off the wrapped words
    const positions: number[] = [];
    for (let k = 1; k < n; k++) positions.push(k);
    const free = positions.filter(k => k !== left && k !== right);
    const insertBefore = rng.choice(free.length > 0 ? free : positions);

    sentence = placed[0];
    for (let k = 1; k < n; k++) {
      sentence += (k === insertBefore ? insert.text : ' ') + placed[k];
    }
  } else {
    sentence = words.join(' ');
  }

  return wrapSentence.prefix + sentence + wrapSentence.suffix;
}
