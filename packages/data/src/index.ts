// @glyphproof/data - Vocabulary parsing, loading and bundled word lists

export { parseWordCounts, detectLayout, type VocabLayout } from './parse.js';
export { VocabMetaSchema, parseVocabMeta, parseVocabMetaJson, type VocabMeta } from './meta.js';
export { createVocab, loadVocabFile, loadVocabDirectory } from './load.js';
export {
  BUNDLED_VOCAB_DIR,
  DEFAULT_VOCAB,
  bundledVocabs,
  createDefaultGenerator,
  installBundledVocabs
} from './registry.js';
