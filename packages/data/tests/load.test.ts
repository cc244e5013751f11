import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ProofGenerator,
  ValidationError,
  listVocabs,
  setDefaultGeneratorFactory,
  setWarnings
} from '@glyphproof/core';
import { createVocab, loadVocabDirectory, loadVocabFile } from '../src/load.js';
import { bundledVocabs, createDefaultGenerator, installBundledVocabs } from '../src/registry.js';

let tmpDir: string;

beforeAll(() => {
  setWarnings(false);
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'glyphproof-vocabs-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function makeDir(name: string, files: Record<string, string>): string {
  const dir = path.join(tmpDir, name);
  fs.mkdirSync(dir);
  for (const [file, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, file), content);
  }
  return dir;
}

describe('Loading vocabularies', () => {
  test('createVocab builds a table from text and metadata', () => {
    const table = createVocab('bonjour\t4\nmerci\t2\n', { lang: 'fr', bicameral: true, name: 'French' });
    expect(table.language).toBe('fr');
    expect(table.bicameral).toBe(true);
    expect(table.entries).toEqual([
      ['bonjour', 4],
      ['merci', 2],
    ]);
    expect(table.meta).toEqual({ name: 'French' });
  });

  test('loadVocabDirectory pairs data and metadata files', () => {
    const dir = makeDir('pairs', {
      'fr.tsv': 'bonjour\t4\nmerci\t2\n',
      'fr.meta.json': JSON.stringify({
        lang: 'fr',
        bicameral: true,
        punctuation: {
          insert: [{ text: ' ', weight: 1 }],
          wrapSentence: [{ prefix: '', suffix: ' !', weight: 1 }],
          wrapInner: [],
        },
      }),
      'words.txt': 'un\ndeux\n',
      'words.meta.json': '{"lang": "fr", "bicameral": true}',
      'notes.md': 'ignored',
    });

    const vocabs = loadVocabDirectory(dir);
    expect(Object.keys(vocabs)).toEqual(['fr', 'words']);
    expect(vocabs.fr.punctuation?.wrapSentence).toEqual([{ prefix: '', suffix: ' !', weight: 1 }]);
    expect(vocabs.words.entries).toEqual([
      ['un', 1],
      ['deux', 1],
    ]);
  });

  test('a data file without metadata is an error', () => {
    const dir = makeDir('orphan', { 'it.tsv': 'ciao\t1\n' });
    expect(() => loadVocabDirectory(dir)).toThrow('Missing metadata file for vocab "it"');
  });

  test('missing paths are validation errors', () => {
    expect(() => loadVocabDirectory(path.join(tmpDir, 'nope'))).toThrow(ValidationError);
    expect(() => loadVocabFile(path.join(tmpDir, 'nope.tsv'), { lang: 'en', bicameral: true })).toThrow(
      ValidationError
    );
  });
});

describe('Bundled vocabularies', () => {
  test('are registered by name', () => {
    const vocabs = bundledVocabs();
    expect(Object.keys(vocabs)).toEqual(['ar_sample', 'en_sample', 'es_sample']);
    expect(vocabs.en_sample.entries[0]).toEqual(['the', 60000]);
    expect(vocabs.ar_sample.bicameral).toBe(false);
    expect(bundledVocabs()).toBe(vocabs);
  });

  test('default generator uses en_sample', () => {
    const gen = createDefaultGenerator({ seed: 1 });
    expect(gen.topWord()).toBe('the');
    expect(gen.topWord({ vocab: 'es_sample' })).toBe('de');
    expect(gen.topWords({ glyphs: 'HOT', count: 2 })).toEqual(['TO', 'HOT']);
  });

  test('extra vocabs can be added on top', () => {
    const gen = createDefaultGenerator({
      vocabs: { mini: createVocab('zoo\t1\n', { lang: 'en', bicameral: true }) },
      vocab: 'mini',
    });
    expect(gen.listVocabs()).toContain('en_sample');
    expect(gen.topWord()).toBe('zoo');
  });

  test('installBundledVocabs feeds the module-level functions', () => {
    installBundledVocabs();
    expect(listVocabs()).toEqual(['ar_sample', 'en_sample', 'es_sample']);
    setDefaultGeneratorFactory(() => new ProofGenerator());
  });
});
