import { describe, test, expect } from 'vitest';
import { ProofGenerator } from '../src/generator.js';
import {
  getDefaultGenerator,
  setDefaultGenerator,
  setDefaultGeneratorFactory,
  setGlyphs,
  word as defaultWord,
  words as defaultWords
} from '../src/defaultInstance.js';
import { ConfigurationError, IndexError, NoMatchError, ValidationError } from '../src/errors.js';
import { WordTable } from '../src/wordTable.js';
import { arabicTable, englishTable, setupTests } from './test-setup.js';

setupTests();

const GLYPHS = 'thequickbrownfox';
const SPELLABLE = ['the', 'quick', 'brown', 'fox'];

function generator(options: { glyphs?: string; seed?: number } = {}) {
  return new ProofGenerator({
    vocabs: { en: englishTable(), ar: arabicTable() },
    vocab: 'en',
    ...options,
  });
}

describe('Vocab registry', () => {
  test('lists registered vocabs', () => {
    expect(generator().listVocabs()).toEqual(['en', 'ar']);
  });

  test('unknown vocab is a configuration error', () => {
    expect(() => generator().word({ vocab: 'xx' })).toThrow(ConfigurationError);
  });

  test('missing default vocab is a configuration error', () => {
    const gen = new ProofGenerator();
    expect(() => gen.word()).toThrow('No vocab specified and no default vocab set');
  });

  test('setVocab changes the default', () => {
    const gen = generator();
    gen.setVocab('ar');
    expect(['سلام', 'عليكم']).toContain(gen.word());
  });
});

describe('word', () => {
  test('respects the glyph set', () => {
    const gen = generator({ seed: 1 });
    for (let i = 0; i < 20; i++) {
      expect(SPELLABLE).toContain(gen.word({ glyphs: GLYPHS }));
    }
  });

  test('glyphs passed to a call win over the default glyphs', () => {
    const gen = generator({ glyphs: 'fox' });
    expect(gen.word()).toBe('fox');
    expect(SPELLABLE).toContain(gen.word({ glyphs: GLYPHS }));
  });

  test('same seed gives the same word', () => {
    const gen = generator();
    const first = gen.word({ seed: 42 });
    expect(gen.word({ seed: 42 })).toBe(first);
  });

  test('without reseeding the state carries over', () => {
    const gen = generator({ seed: 42 });
    const seen = new Set<string>();
    for (let i = 0; i < 30; i++) seen.add(gen.word());
    expect(seen.size).toBeGreaterThan(1);
  });

  test('no match returns an empty string unless errors are raised', () => {
    const gen = generator();
    expect(gen.word({ startsWith: 'z' })).toBe('');
    expect(() => gen.word({ startsWith: 'z', raiseErrors: true })).toThrow(NoMatchError);

    gen.raiseErrors = true;
    expect(() => gen.word({ startsWith: 'z' })).toThrow(NoMatchError);
  });

  test('validation errors always propagate', () => {
    expect(() => generator().word({ randomness: 2 })).toThrow(ValidationError);
    expect(() => generator().word({ startsWith: '1' })).toThrow(ValidationError);
  });
});

describe('topWord and topWords', () => {
  test('return words in frequency order', () => {
    const gen = generator();
    expect(gen.topWord()).toBe('the');
    expect(gen.topWord({ index: 1 })).toBe('quick');
    expect(gen.topWords({ count: 3 })).toEqual(['the', 'quick', 'brown']);
    expect(gen.topWords({ count: 2, index: 2 })).toEqual(['brown', 'fox']);
  });

  test('out of range index', () => {
    const gen = generator();
    expect(gen.topWord({ index: 99 })).toBe('');
    expect(() => gen.topWord({ index: 99, raiseErrors: true })).toThrow(IndexError);
    expect(gen.topWords({ count: 12 })).toHaveLength(10);
  });

  test('default minimum length skips one-letter words', () => {
    const gen = new ProofGenerator({
      vocabs: { en: new WordTable([['a', 100], ['an', 50]], { language: 'en', bicameral: true }) },
      vocab: 'en',
    });
    expect(gen.topWord()).toBe('an');
    expect(gen.topWord({ minLength: 1 })).toBe('a');
  });
});

describe('number', () => {
  test('spells digits from the glyph set', () => {
    expect(generator().number({ glyphs: '7', exactLength: 3 })).toBe('777');
  });

  test('no digits', () => {
    expect(generator().number({ glyphs: 'abc' })).toBe('');
    expect(() => generator().number({ glyphs: 'abc', raiseErrors: true })).toThrow(NoMatchError);
  });
});

describe('words', () => {
  test('exact count with a capitalized first word', () => {
    const result = generator({ seed: 5 }).words({ wordCount: 5 });
    expect(result).toHaveLength(5);
    expect(result[0]).toMatch(/^\p{Lu}\p{Ll}*$/u);
  });

  test('count drawn between minWords and maxWords', () => {
    const gen = generator({ seed: 5 });
    for (let i = 0; i < 10; i++) {
      const n = gen.words({ minWords: 2, maxWords: 4 }).length;
      expect(n).toBeGreaterThanOrEqual(2);
      expect(n).toBeLessThanOrEqual(4);
    }
  });

  test('lowercase glyphs turn off the capitalized first word', () => {
    const result = generator({ seed: 5 }).words({ wordCount: 4, glyphs: GLYPHS });
    for (const w of result) expect(SPELLABLE).toContain(w);
  });

  test('explicit capFirst without capitals is a configuration error', () => {
    expect(() => generator().words({ wordCount: 2, glyphs: GLYPHS, capFirst: true })).toThrow(ConfigurationError);
  });

  test('numberProbability 1 gives only numerals', () => {
    const result = generator({ seed: 5 }).words({ wordCount: 6, numberProbability: 1 });
    expect(result).toHaveLength(6);
    for (const w of result) expect(w).toMatch(/^[0-9]{1,4}$/);
  });

  test('numberProbability outside [0, 1] is rejected', () => {
    expect(() => generator().words({ numberProbability: 1.5 })).toThrow(ValidationError);
  });

  test('minWords above maxWords is rejected', () => {
    expect(() => generator().words({ minWords: 10, maxWords: 5 })).toThrow(
      "'minWords' (10) must be less than or equal to 'maxWords' (5)"
    );
    expect(() => generator().words({ minWords: 25 })).toThrow(ValidationError);
    expect(generator().words({ minWords: 10, maxWords: 5, wordCount: 2 })).toHaveLength(2);
  });

  test('words that cannot be produced are skipped', () => {
    expect(generator().words({ wordCount: 3, startsWith: 'z' })).toEqual([]);
  });
});

describe('sentence and larger units', () => {
  const SENTENCE = /^(The|Quick|Brown|Fox)( (the|quick|brown|fox)){5}\.$/;

  test('punctuates with the glyphs available', () => {
    const gen = generator({ seed: 11 });
    expect(gen.sentence({ wordCount: 6, glyphs: GLYPHS + 'TQBF.' })).toMatch(SENTENCE);
  });

  test('punctuate false joins with spaces', () => {
    const result = generator({ seed: 11 }).sentence({ wordCount: 3, glyphs: GLYPHS + 'TQBF.', punctuate: false });
    expect(result).toMatch(/^(The|Quick|Brown|Fox)( (the|quick|brown|fox)){2}$/);
  });

  test('unicameral vocab without punctuation glyphs', () => {
    const result = generator().sentence({ vocab: 'ar', wordCount: 3, glyphs: 'سلامعيكم' });
    expect(result).toMatch(/^(سلام|عليكم)( (سلام|عليكم)){2}$/u);
  });

  test('sentences honours the count', () => {
    const gen = generator({ seed: 3 });
    expect(gen.sentences({ sentenceCount: 3, wordCount: 2 })).toHaveLength(3);
    const n = gen.sentences({ wordCount: 2 }).length;
    expect(n).toBeGreaterThanOrEqual(4);
    expect(n).toBeLessThanOrEqual(7);
  });

  test('minSentences above maxSentences is rejected', () => {
    expect(() => generator().sentences({ minSentences: 5, maxSentences: 2, wordCount: 2 })).toThrow(ValidationError);
    expect(() => generator().paragraph({ maxSentences: 1, wordCount: 2 })).toThrow(
      "'minSentences' (4) must be less than or equal to 'maxSentences' (1)"
    );
  });

  test('paragraph joins sentences with the separator', () => {
    const paragraph = generator({ seed: 3 }).paragraph({
      sentenceCount: 2,
      wordCount: 6,
      glyphs: GLYPHS + 'TQBF.',
      sentenceSeparator: '\n',
    });
    const lines = paragraph.split('\n');
    expect(lines).toHaveLength(2);
    for (const line of lines) expect(line).toMatch(SENTENCE);
  });

  test('paragraphs and text', () => {
    const gen = generator({ seed: 3 });
    expect(gen.paragraphs({ paragraphCount: 2, sentenceCount: 1, wordCount: 3 })).toHaveLength(2);
    expect(gen.text({ sentenceCount: 1, wordCount: 3 }).split('\n\n')).toHaveLength(3);
    expect(gen.text({ paragraphCount: 2, sentenceCount: 1, wordCount: 3, paragraphSeparator: '|' }).split('|')).toHaveLength(2);
  });

  test('seeded text is reproducible', () => {
    const gen = generator();
    const first = gen.text({ seed: 'proof' });
    expect(gen.text({ seed: 'proof' })).toBe(first);
  });
});

describe('Default instance', () => {
  test('wrappers use the shared generator', () => {
    setDefaultGenerator(generator({ seed: 1 }));
    expect(SPELLABLE).toContain(defaultWord({ glyphs: GLYPHS }));
    setGlyphs('fox');
    expect(defaultWord()).toBe('fox');
    expect(defaultWords({ wordCount: 2 })).toEqual(['fox', 'fox']);
    setDefaultGenerator(null);
  });

  test('factory builds the generator lazily', () => {
    let built = 0;
    setDefaultGeneratorFactory(() => {
      built++;
      return generator();
    });
    expect(built).toBe(0);
    const gen = getDefaultGenerator();
    expect(getDefaultGenerator()).toBe(gen);
    expect(built).toBe(1);
    setDefaultGeneratorFactory(() => new ProofGenerator());
  });
});
