// @glyphproof/core - Glyph-constrained filtering, sampling and proofing text generation

// Logging
export { setDebug, dp, DEBUG, setWarnings, warn } from './log.js';

// Errors
export {
  GlyphproofError,
  NoMatchError,
  ConfigurationError,
  ValidationError,
  IndexError,
  isRecoverable
} from './errors.js';

// Vocabulary and glyph primitives
export { WordTable, type WordTableOptions, type WordCountInput } from './wordTable.js';
export { GlyphSet, isUppercase, isLowercase, capitalize, chars } from './glyphs.js';

// Filtering
export { CASE_RULES, type CaseRule, type CaseGlyphs } from './caseModes.js';
export { resolveCase, resolveCaseWith, ANY_CASCADE, type StageRefinement } from './caseResolver.js';
export { applyStructural, validateCriteria } from './structuralFilter.js';
export {
  filterWords,
  clearFilterCache,
  setFilterCacheCapacity,
  getFilterCacheStats
} from './filter.js';

// Sampling and composition
export { Random, accumulate } from './random.js';
export { sampleWord, nthWord, interpolateCounts, truncate, checkProbability } from './sampler.js';
export {
  composeSentence,
  defaultPunctuation,
  defaultPunctuationLanguages,
  InsertOptionSchema,
  WrapOptionSchema,
  PunctuationProfileSchema
} from './punctuation.js';
export { generateNumber, availableDigits, ALL_DIGITS, DEFAULT_NUMBER_MAX_LENGTH, type NumberLength } from './numbers.js';

// Orchestration
export {
  ProofGenerator,
  DEFAULT_MIN_WORDS,
  DEFAULT_MAX_WORDS,
  DEFAULT_TOP_WORDS,
  DEFAULT_MIN_SENTENCES,
  DEFAULT_MAX_SENTENCES,
  DEFAULT_PARAGRAPHS,
  type ProofGeneratorOptions,
  type NumberOptions,
  type WordOptions,
  type TopWordOptions,
  type TopWordsOptions,
  type WordsOptions,
  type SentenceOptions,
  type SentencesOptions,
  type ParagraphOptions,
  type ParagraphsOptions,
  type TextOptions
} from './generator.js';

// Default instance
export {
  getDefaultGenerator,
  setDefaultGenerator,
  setDefaultGeneratorFactory,
  setGlyphs,
  setVocab,
  addVocab,
  listVocabs,
  seed,
  number,
  word,
  topWord,
  topWords,
  words,
  sentence,
  sentences,
  paragraph,
  paragraphs,
  text
} from './defaultInstance.js';

// Shared types
export {
  CASE_MODES,
  isCaseMode,
  type WordCount,
  type FilteredCollection,
  type CaseMode,
  type GlyphsInput,
  type StructuralCriteria,
  type InsertOption,
  type WrapOption,
  type PunctuationProfile,
  type Seed,
  type FilterOptions
} from './types.js';
