// glyphproof/wordTable - Immutable vocabulary of words and counts

import { ValidationError } from './errors.js';
import type { PunctuationProfile, WordCount } from './types.js';

export interface WordTableOptions {
  language: string;
  bicameral: boolean;
  punctuation?: PunctuationProfile;
  meta?: Readonly<Record<string, unknown>>;
}

/** Entry as handed over by a loader; a missing count means 1 */
export type WordCountInput = readonly [word: string, count?: number] | string;

let nextTableId = 1;

/**
 * Ordered (word, count) pairs plus the language facts the filters need.
 * The source order is kept; vocab files are expected to list words by
 * descending frequency.
 */
export class WordTable {
  readonly id: number;
  readonly language: string;
  readonly bicameral: boolean;
  readonly punctuation: PunctuationProfile | undefined;
  readonly meta: Readonly<Record<string, unknown>>;
  readonly entries: readonly WordCount[];

  constructor(entries: Iterable<WordCountInput>, options: WordTableOptions) {
    const normalized: WordCount[] = [];
    for (const entry of entries) {
      const [word, count] = typeof entry === 'string' ? [entry, undefined] : entry;
      if (!word) {
        throw new ValidationError('Vocabulary words must be non-empty strings');
      }
      if (count !== undefined && (!Number.isFinite(count) || count < 0)) {
        throw new ValidationError(`Invalid count for "${word}": ${count}`);
      }
      normalized.push(Object.freeze([word, count ? count : 1] as const));
    }

    if (normalized.length === 0) {
      throw new ValidationError(`Vocabulary for language "${options.language}" is empty`);
    }

    this.id = nextTableId++;
    this.language = options.language;
    this.bicameral = options.bicameral;
    this.punctuation = options.punctuation;
    this.meta = Object.freeze({ ...options.meta });
    this.entries = Object.freeze(normalized);
  }

  get size(): number {
    return this.entries.length;
  }
}
