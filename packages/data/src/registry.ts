// Bundled sample vocabularies and generators preloaded with them

import { fileURLToPath } from 'url';
import {
  ProofGenerator,
  setDefaultGeneratorFactory,
  type ProofGeneratorOptions,
  type WordTable
} from '@glyphproof/core';
import { loadVocabDirectory } from './load.js';

export const BUNDLED_VOCAB_DIR = fileURLToPath(new URL('../vocabs', import.meta.url));
export const DEFAULT_VOCAB = 'en_sample';

let bundled: Record<string, WordTable> | null = null;

/** Vocabularies shipped with the package, loaded once on first use */
export function bundledVocabs(): Record<string, WordTable> {
  if (!bundled) {
    bundled = loadVocabDirectory(BUNDLED_VOCAB_DIR);
  }
  return bundled;
}

/**
 * A generator with the bundled vocabularies registered and `en_sample` as
 * the default vocab. Vocabs passed in `options` are added on top.
 */
export function createDefaultGenerator(options: ProofGeneratorOptions = {}): ProofGenerator {
  return new ProofGenerator({
    ...options,
    vocab: options.vocab ?? DEFAULT_VOCAB,
    vocabs: { ...bundledVocabs(), ...options.vocabs },
  });
}

/** Make the core's module-level functions use the bundled vocabularies */
export function installBundledVocabs(): void {
  setDefaultGeneratorFactory(() => createDefaultGenerator());
}
