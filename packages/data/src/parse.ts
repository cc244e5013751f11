/**
 * Vocabulary text parsing
 *
 * Two layouts are accepted, decided by the first line:
 * - TSV with a word and its count per line
 * - a plain newline-delimited word list (every count is 1)
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ValidationError, type WordCount } from '@glyphproof/core';

const COUNTED_LINE = /^\p{L}+\t\d+$/u;
const WORD_LINE = /^\p{L}+$/u;
const COUNT = /^\d+$/;

const RecordsSchema = z.array(z.array(z.string()));

export type VocabLayout = 'counts' | 'words';

export function detectLayout(content: string): VocabLayout {
  const firstLine = content.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0];
  if (COUNTED_LINE.test(firstLine)) return 'counts';
  if (WORD_LINE.test(firstLine)) return 'words';
  throw new ValidationError(
    'The vocab file is formatted incorrectly. ' +
      'Should be a TSV file with words and counts as columns, or a newline-delimited list of words.'
  );
}

export function parseWordCounts(content: string): WordCount[] {
  if (!content.trim()) {
    throw new ValidationError('Vocabulary data is empty');
  }
  const layout = detectLayout(content);

  const parsed = RecordsSchema.safeParse(
    parse(content, {
      delimiter: '\t',
      quote: false,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );
  if (!parsed.success) {
    throw new ValidationError(`Unreadable vocabulary data: ${parsed.error.message}`);
  }

  return parsed.data.map(([word = '', count], index) => {
    if (!word) {
      throw new ValidationError(`Missing word on line ${index + 1}`);
    }
    if (layout === 'words' || count === undefined) {
      return [word, 1] as const;
    }
    if (!COUNT.test(count)) {
      throw new ValidationError(`Invalid count "${count}" for "${word}" on line ${index + 1}`);
    }
    return [word, parseInt(count, 10)] as const;
  });
}
