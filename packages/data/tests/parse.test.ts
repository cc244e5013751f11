import { describe, test, expect } from 'vitest';
import { ValidationError } from '@glyphproof/core';
import { detectLayout, parseWordCounts } from '../src/parse.js';
import { parseVocabMeta, parseVocabMetaJson } from '../src/meta.js';

describe('parseWordCounts', () => {
  test('reads word and count columns', () => {
    expect(parseWordCounts('apple\t5\nBart\t3\n')).toEqual([
      ['apple', 5],
      ['Bart', 3],
    ]);
  });

  test('plain word lists get a count of 1', () => {
    expect(detectLayout('apple\nbart\n')).toBe('words');
    expect(parseWordCounts('apple\nbart\n')).toEqual([
      ['apple', 1],
      ['bart', 1],
    ]);
  });

  test('handles CRLF line endings and blank lines', () => {
    expect(parseWordCounts('a\t2\r\n\r\nb\t1\r\n')).toEqual([
      ['a', 2],
      ['b', 1],
    ]);
  });

  test('non-Latin words', () => {
    expect(parseWordCounts('سلام\t3\nكتاب\t1')).toEqual([
      ['سلام', 3],
      ['كتاب', 1],
    ]);
  });

  test('rejects an unrecognised first line', () => {
    expect(() => parseWordCounts('1234\n')).toThrow(ValidationError);
    expect(() => parseWordCounts('apple 5\n')).toThrow('The vocab file is formatted incorrectly.');
  });

  test('rejects a bad count further down', () => {
    expect(() => parseWordCounts('apple\t5\nbart\tx\n')).toThrow('Invalid count "x" for "bart" on line 2');
  });

  test('rejects empty data', () => {
    expect(() => parseWordCounts('  \n')).toThrow('Vocabulary data is empty');
  });
});

describe('Vocab metadata', () => {
  test('accepts the minimal fields', () => {
    expect(parseVocabMeta({ lang: 'en', bicameral: true }, 'test')).toEqual({ lang: 'en', bicameral: true });
  });

  test('reports missing fields', () => {
    expect(() => parseVocabMeta({ lang: 'en' }, 'test')).toThrow(
      'Invalid vocab metadata in test: bicameral: Required'
    );
  });

  test('validates the punctuation profile', () => {
    const meta = {
      lang: 'en',
      bicameral: true,
      punctuation: { insert: [{ text: ', ' }], wrapSentence: [], wrapInner: [] },
    };
    expect(() => parseVocabMeta(meta, 'test')).toThrow(ValidationError);
  });

  test('reports broken JSON', () => {
    expect(() => parseVocabMetaJson('{', 'broken.meta.json')).toThrow('Invalid JSON in broken.meta.json');
  });
});
