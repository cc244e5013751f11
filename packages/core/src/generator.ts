// glyphproof/generator - Words, sentences and paragraphs from filtered vocabularies

import { ConfigurationError, ValidationError, isRecoverable } from './errors.js';
import { filterWords } from './filter.js';
import { GlyphSet } from './glyphs.js';
import { dp, warn } from './log.js';
import { generateNumber } from './numbers.js';
import { composeSentence, defaultPunctuation } from './punctuation.js';
import { Random } from './random.js';
import { checkProbability, nthWord, sampleWord } from './sampler.js';
import type { WordTable } from './wordTable.js';
import type { CaseMode, FilterOptions, GlyphsInput, Seed, StructuralCriteria } from './types.js';

export const DEFAULT_MIN_WORDS = 10;
export const DEFAULT_MAX_WORDS = 20;
export const DEFAULT_TOP_WORDS = 10;
export const DEFAULT_MIN_SENTENCES = 4;
export const DEFAULT_MAX_SENTENCES = 7;
export const DEFAULT_PARAGRAPHS = 3;

export interface ProofGeneratorOptions {
  /** Glyphs used when a call passes none */
  glyphs?: GlyphsInput;
  /** Vocab used when a call passes none */
  vocab?: string;
  vocabs?: Record<string, WordTable>;
  /** Raise NoMatchError/IndexError instead of warning and returning "" */
  raiseErrors?: boolean;
  seed?: Seed;
}

export interface NumberOptions {
  glyphs?: GlyphsInput;
  seed?: Seed;
  exactLength?: number;
  minLength?: number;
  maxLength?: number;
  raiseErrors?: boolean;
}

export interface WordOptions extends FilterOptions {
  /** 0 samples by corpus frequency, 1 uniformly */
  randomness?: number;
  seed?: Seed;
  /** Only sample from the k most frequent matches */
  topK?: number;
}

export interface TopWordOptions extends FilterOptions {
  /** 0 is the most common word */
  index?: number;
}

export interface TopWordsOptions extends TopWordOptions {
  count?: number;
}

export interface WordsOptions extends WordOptions {
  wordCount?: number;
  minWords?: number;
  maxWords?: number;
  /** Probability of a numeral in place of each word */
  numberProbability?: number;
  /** Capitalize the first word; by default only when the glyphs have both cases */
  capFirst?: boolean;
}

export interface SentenceOptions extends WordsOptions {
  punctuate?: boolean;
  punctuationRandomness?: number;
}

export interface SentencesOptions extends SentenceOptions {
  sentenceCount?: number;
  minSentences?: number;
  maxSentences?: number;
}

export interface ParagraphOptions extends SentencesOptions {
  sentenceSeparator?: string;
}

export interface ParagraphsOptions extends ParagraphOptions {
  paragraphCount?: number;
}

export interface TextOptions extends ParagraphsOptions {
  paragraphSeparator?: string;
}

function criteriaOf(options: StructuralCriteria, defaultMinLength: number): StructuralCriteria {
  return {
    minLength: options.minLength ?? defaultMinLength,
    maxLength: options.maxLength,
    exactLength: options.exactLength,
    startsWith: options.startsWith,
    endsWith: options.endsWith,
    contains: options.contains,
    inner: options.inner,
    regex: options.regex,
  };
}

/** Capitalizing needs both an uppercase and a lowercase glyph */
function canCapitalize(glyphs: GlyphsInput): boolean {
  if (!glyphs) return true;
  const glyphSet = new GlyphSet(glyphs);
  return glyphSet.uppercase().length > 0 && glyphSet.lowercase().length > 0;
}

/**
 * Generates proofing text from registered vocabularies. Owns its random
 * generator: a `seed` option reseeds it before the call, otherwise state
 * carries over between calls. Not safe to share across concurrent sessions.
 */
export class ProofGenerator {
  defaultGlyphs: GlyphsInput;
  defaultVocab: string | undefined;
  raiseErrors: boolean;
  readonly rng: Random;
  private readonly vocabs = new Map<string, WordTable>();

  constructor(options: ProofGeneratorOptions = {}) {
    this.defaultGlyphs = options.glyphs;
    this.defaultVocab = options.vocab;
    this.raiseErrors = options.raiseErrors ?? false;
    this.rng = new Random(options.seed);
    for (const [name, table] of Object.entries(options.vocabs ?? {})) {
      this.addVocab(name, table);
    }
  }

  // ===========================================================================
  // Settings and vocab registry
  // ===========================================================================

  seed(seed: Seed): void {
    this.rng.seed(seed);
  }

  setGlyphs(glyphs: GlyphsInput): void {
    this.defaultGlyphs = glyphs;
  }

  setVocab(name: string): void {
    this.defaultVocab = name;
  }

  addVocab(name: string, table: WordTable): void {
    this.vocabs.set(name, table);
  }

  listVocabs(): string[] {
    return Array.from(this.vocabs.keys());
  }

  getVocab(name?: string): WordTable {
    const key = name ?? this.defaultVocab;
    if (!key) {
      throw new ConfigurationError('No vocab specified and no default vocab set');
    }
    const table = this.vocabs.get(key);
    if (!table) {
      throw new ConfigurationError(`Unknown vocab "${key}" (available: ${this.listVocabs().join(', ') || 'none'})`);
    }
    return table;
  }

  private glyphsFor(glyphs: GlyphsInput): GlyphsInput {
    return glyphs ? glyphs : this.defaultGlyphs;
  }

  private reseed(seed: Seed | undefined): void {
    if (seed !== undefined) this.rng.seed(seed);
  }

  /** Run `produce`, turning "ran out of words" errors into "" unless raising */
  private recover(raiseErrors: boolean | undefined, produce: () => string): string {
    try {
      return produce();
    } catch (error) {
      if (isRecoverable(error) && !(raiseErrors ?? this.raiseErrors)) {
        warn(error.message);
        return '';
      }
      throw error;
    }
  }

  // ===========================================================================
  // Single tokens
  // ===========================================================================

  number(options: NumberOptions = {}): string {
    const glyphs = this.glyphsFor(options.glyphs);
    this.reseed(options.seed);
    return this.recover(options.raiseErrors, () =>
      generateNumber(this.rng, glyphs, {
        length: options.exactLength,
        minLength: options.minLength,
        maxLength: options.maxLength,
      })
    );
  }

  word(options: WordOptions = {}): string {
    const glyphs = this.glyphsFor(options.glyphs);
    const table = this.getVocab(options.vocab);
    const randomness = options.randomness ?? 0;
    checkProbability(randomness, 'randomness');
    this.reseed(options.seed);

    return this.recover(options.raiseErrors, () => {
      const collection = filterWords(table, glyphs, options.case ?? 'any', criteriaOf(options, 1));
      return sampleWord(collection, this.rng, randomness, options.topK);
    });
  }

  topWord(options: TopWordOptions = {}): string {
    const glyphs = this.glyphsFor(options.glyphs);
    const table = this.getVocab(options.vocab);

    return this.recover(options.raiseErrors, () => {
      const collection = filterWords(table, glyphs, options.case ?? 'any', criteriaOf(options, 2));
      return nthWord(collection, options.index ?? 0);
    });
  }

  topWords(options: TopWordsOptions = {}): string[] {
    const start = options.index ?? 0;
    const count = options.count ?? DEFAULT_TOP_WORDS;
    const result: string[] = [];
    for (let index = start; index < start + count; index++) {
      const word = this.topWord({ ...options, index });
      if (word) result.push(word);
    }
    return result;
  }

  // ===========================================================================
  // Word lists and prose
  // ===========================================================================

  private drawCount(minName: string, min: number, maxName: string, max: number): number {
    for (const [name, value] of [[minName, min], [maxName, max]] as const) {
      if (!Number.isInteger(value) || value < 0) {
        throw new ValidationError(`'${name}' must be a non-negative integer, got ${value}`);
      }
    }
    if (min > max) {
      throw new ValidationError(`'${minName}' (${min}) must be less than or equal to '${maxName}' (${max})`);
    }
    return this.rng.randint(min, max);
  }

  words(options: WordsOptions = {}): string[] {
    const glyphs = this.glyphsFor(options.glyphs);
    this.reseed(options.seed);

    const numberProbability = options.numberProbability ?? 0;
    checkProbability(numberProbability, 'numberProbability');

    const count =
      options.wordCount ??
      this.drawCount(
        'minWords',
        options.minWords ?? DEFAULT_MIN_WORDS,
        'maxWords',
        options.maxWords ?? DEFAULT_MAX_WORDS
      );

    const capFirst = options.capFirst ?? canCapitalize(glyphs);
    const mode: CaseMode = options.case ?? 'any';

    const result: string[] = [];
    let last: string | null = null;

    for (let i = 0; i < count; i++) {
      const wordCase: CaseMode = capFirst && mode === 'any' && i === 0 ? 'cap' : mode;
      const isNumber = this.rng.random() < numberProbability;

      let token: string;
      if (isNumber) {
        token = this.number({
          glyphs,
          exactLength: options.exactLength,
          minLength: options.minLength,
          maxLength: options.maxLength,
          raiseErrors: options.raiseErrors,
        });
      } else {
        const wordOptions: WordOptions = { ...options, glyphs, case: wordCase, seed: undefined };
        token = this.word(wordOptions);
        // One retry to avoid an immediate repeat
        if (token && token === last) {
          dp(`words: redrawing repeated "${token}"`);
          token = this.word(wordOptions);
        }
      }

      // Empty when nothing matched and errors are not raised
      if (token) {
        result.push(token);
        last = token;
      }
    }

    return result;
  }

  sentence(options: SentenceOptions = {}): string {
    const glyphs = this.glyphsFor(options.glyphs);
    const table = this.getVocab(options.vocab);
    this.reseed(options.seed);

    const words = this.words({ ...options, glyphs, seed: undefined });

    if (options.punctuate === false) {
      return words.join(' ');
    }

    const punctuationRandomness = options.punctuationRandomness ?? 0;
    checkProbability(punctuationRandomness, 'punctuationRandomness');

    const profile = table.punctuation ?? defaultPunctuation(table.language);
    if (!profile) {
      dp(`No punctuation profile for language "${table.language}"`);
      return words.join(' ');
    }
    return composeSentence(words, glyphs, profile, punctuationRandomness, this.rng);
  }

  sentences(options: SentencesOptions = {}): string[] {
    this.reseed(options.seed);
    const count =
      options.sentenceCount ??
      this.drawCount(
        'minSentences',
        options.minSentences ?? DEFAULT_MIN_SENTENCES,
        'maxSentences',
        options.maxSentences ?? DEFAULT_MAX_SENTENCES
      );

    const result: string[] = [];
    for (let i = 0; i < count; i++) {
      result.push(this.sentence({ ...options, seed: undefined }));
    }
    return result;
  }

  paragraph(options: ParagraphOptions = {}): string {
    this.reseed(options.seed);
    return this.sentences({ ...options, seed: undefined }).join(options.sentenceSeparator ?? ' ');
  }

  paragraphs(options: ParagraphsOptions = {}): string[] {
    this.reseed(options.seed);
    const count = options.paragraphCount ?? DEFAULT_PARAGRAPHS;
    const result: string[] = [];
    for (let i = 0; i < count; i++) {
      result.push(this.paragraph({ ...options, seed: undefined }));
    }
    return result;
  }

  text(options: TextOptions = {}): string {
    this.reseed(options.seed);
    return this.paragraphs({ ...options, seed: undefined }).join(options.paragraphSeparator ?? '\n\n');
  }
}
