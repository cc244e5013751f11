// glyphproof/defaultInstance - Module-level convenience functions over one shared generator

import {
  ProofGenerator,
  type NumberOptions,
  type ParagraphOptions,
  type ParagraphsOptions,
  type SentenceOptions,
  type SentencesOptions,
  type TextOptions,
  type TopWordOptions,
  type TopWordsOptions,
  type WordOptions,
  type WordsOptions,
} from './generator.js';
import type { WordTable } from './wordTable.js';
import type { GlyphsInput, Seed } from './types.js';

let defaultGenerator: ProofGenerator | null = null;
let defaultFactory: () => ProofGenerator = () => new ProofGenerator();

/**
 * Choose how the shared generator is built on first use. Data packages
 * call this to preload their vocabularies.
 */
export function setDefaultGeneratorFactory(factory: () => ProofGenerator): void {
  defaultFactory = factory;
  defaultGenerator = null;
}

export function getDefaultGenerator(): ProofGenerator {
  if (!defaultGenerator) {
    defaultGenerator = defaultFactory();
  }
  return defaultGenerator;
}

export function setDefaultGenerator(generator: ProofGenerator | null): void {
  defaultGenerator = generator;
}

export const setGlyphs = (glyphs: GlyphsInput) => getDefaultGenerator().setGlyphs(glyphs);
export const setVocab = (name: string) => getDefaultGenerator().setVocab(name);
export const addVocab = (name: string, table: WordTable) => getDefaultGenerator().addVocab(name, table);
export const listVocabs = () => getDefaultGenerator().listVocabs();
export const seed = (value: Seed) => getDefaultGenerator().seed(value);

export const number = (options?: NumberOptions) => getDefaultGenerator().number(options);
export const word = (options?: WordOptions) => getDefaultGenerator().word(options);
export const topWord = (options?: TopWordOptions) => getDefaultGenerator().topWord(options);
export const topWords = (options?: TopWordsOptions) => getDefaultGenerator().topWords(options);
export const words = (options?: WordsOptions) => getDefaultGenerator().words(options);
export const sentence = (options?: SentenceOptions) => getDefaultGenerator().sentence(options);
export const sentences = (options?: SentencesOptions) => getDefaultGenerator().sentences(options);
export const paragraph = (options?: ParagraphOptions) => getDefaultGenerator().paragraph(options);
export const paragraphs = (options?: ParagraphsOptions) => getDefaultGenerator().paragraphs(options);
export const text = (options?: TextOptions) => getDefaultGenerator().text(options);
