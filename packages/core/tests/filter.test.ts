import { describe, test, expect, beforeEach } from 'vitest';
import {
  clearFilterCache,
  filterWords,
  getFilterCacheStats,
  setFilterCacheCapacity
} from '../src/filter.js';
import { NoMatchError, ValidationError } from '../src/errors.js';
import { WordTable } from '../src/wordTable.js';
import { englishTable, setupTests } from './test-setup.js';

setupTests();

describe('filterWords', () => {
  beforeEach(() => {
    clearFilterCache();
  });

  test('case and structural criteria together', () => {
    const table = new WordTable(
      [
        ['pa', 20],
        ['Paris', 5],
      ],
      { language: 'en', bicameral: true }
    );
    expect(filterWords(table, 'PARIS', 'any', { minLength: 5 })).toEqual([['PARIS', 5]]);
  });

  test('structural criteria run inside each cascade stage', () => {
    const table = new WordTable([['zoo', 10], ['oz', 30]], { language: 'en', bicameral: true });
    expect(filterWords(table, 'ZO', 'any', { minLength: 3 })).toEqual([['ZOO', 10]]);
  });

  test('repeated calls are served from the cache', () => {
    const table = englishTable();
    const first = filterWords(table, 'thequickbrownfox', 'any', { minLength: 3 });
    const second = filterWords(table, 'xofnworbkciuqeht', 'any', { minLength: 3 });

    expect(second).toBe(first);
    expect(first.map(([w]) => w)).toEqual(['the', 'quick', 'brown', 'fox']);
    expect(getFilterCacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  test('different criteria get their own entries', () => {
    const table = englishTable();
    filterWords(table, null, 'any', { startsWith: 'b' });
    filterWords(table, null, 'any', { startsWith: 'f' });
    expect(getFilterCacheStats()).toEqual({ hits: 0, misses: 2, size: 2 });
  });

  test('capacity limits the number of cached results', () => {
    const table = englishTable();
    setFilterCacheCapacity(1);
    filterWords(table, null, 'lc');
    filterWords(table, null, 'uc');
    expect(getFilterCacheStats().size).toBe(1);
    setFilterCacheCapacity(1000);
  });

  test('failures are not cached', () => {
    const table = englishTable();
    expect(() => filterWords(table, null, 'any', { startsWith: 'zz' })).toThrow(NoMatchError);
    expect(() => filterWords(table, null, 'any', { regex: '[' })).toThrow(ValidationError);
    expect(getFilterCacheStats().size).toBe(0);
  });
});
