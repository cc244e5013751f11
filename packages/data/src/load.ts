/**
 * Vocabulary loading from disk
 *
 * A vocab directory holds pairs of files sharing a name:
 *   en_sample.tsv        word<TAB>count lines, most frequent first
 *   en_sample.meta.json  language, bicameral flag, optional punctuation
 */

import fs from 'fs';
import path from 'path';
import { WordTable, ValidationError, dp } from '@glyphproof/core';
import { parseWordCounts } from './parse.js';
import { parseVocabMeta, parseVocabMetaJson, type VocabMeta } from './meta.js';

const DATA_EXTENSIONS = ['.tsv', '.txt'];

export function createVocab(content: string, meta: VocabMeta): WordTable {
  const { lang, bicameral, punctuation, ...rest } = parseVocabMeta(meta, describeMeta(meta));
  return new WordTable(parseWordCounts(content), {
    language: lang,
    bicameral,
    punctuation,
    meta: rest,
  });
}

function describeMeta(meta: VocabMeta): string {
  return meta.name ? `vocab "${meta.name}"` : 'vocab metadata';
}

export function loadVocabFile(filePath: string, meta: VocabMeta): WordTable {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Vocab file not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  dp(`Loading vocab ${filePath}`);
  return createVocab(content, meta);
}

/**
 * Load every `<name>.tsv` (or `.txt`) in `dir` together with its
 * `<name>.meta.json`, keyed by name.
 */
export function loadVocabDirectory(dir: string): Record<string, WordTable> {
  if (!fs.existsSync(dir)) {
    throw new ValidationError(`Vocab directory not found: ${dir}`);
  }

  const vocabs: Record<string, WordTable> = {};
  for (const file of fs.readdirSync(dir).sort()) {
    const ext = path.extname(file);
    if (!DATA_EXTENSIONS.includes(ext)) continue;

    const name = path.basename(file, ext);
    const metaPath = path.join(dir, `${name}.meta.json`);
    if (!fs.existsSync(metaPath)) {
      throw new ValidationError(`Missing metadata file for vocab "${name}": ${metaPath}`);
    }

    const meta = parseVocabMetaJson(fs.readFileSync(metaPath, 'utf-8'), metaPath);
    vocabs[name] = loadVocabFile(path.join(dir, file), meta);
  }
  return vocabs;
}
