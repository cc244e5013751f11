// Request bodies for the generation endpoints

import { z } from 'zod';
import { CASE_MODES } from '@glyphproof/core';

// Upper bounds keep one request from tying up the server
export const MAX_WORDS = 200;
export const MAX_SENTENCES = 50;
export const MAX_PARAGRAPHS = 20;

const length = z.number().int().nonnegative();
const count = (max: number) => z.number().int().positive().max(max);
const probability = z.number().min(0).max(1);
const substrings = z.union([z.string(), z.array(z.string())]);

const WordBody = z
  .object({
    vocab: z.string().optional(),
    glyphs: z.string().optional(),
    seed: z.union([z.number(), z.string()]).optional(),
    case: z.enum(CASE_MODES).optional(),
    randomness: probability.optional(),
    topK: length.optional(),
    minLength: length.optional(),
    maxLength: length.optional(),
    exactLength: length.optional(),
    startsWith: z.string().optional(),
    endsWith: z.string().optional(),
    contains: substrings.optional(),
    inner: substrings.optional(),
    regex: z.string().optional(),
    raiseErrors: z.boolean().optional(),
  })
  .strict();

const WordsBody = WordBody.extend({
  wordCount: count(MAX_WORDS).optional(),
  minWords: count(MAX_WORDS).optional(),
  maxWords: count(MAX_WORDS).optional(),
  numberProbability: probability.optional(),
  capFirst: z.boolean().optional(),
}).strict();

const SentenceBody = WordsBody.extend({
  punctuate: z.boolean().optional(),
  punctuationRandomness: probability.optional(),
}).strict();

const ParagraphBody = SentenceBody.extend({
  sentenceCount: count(MAX_SENTENCES).optional(),
  minSentences: count(MAX_SENTENCES).optional(),
  maxSentences: count(MAX_SENTENCES).optional(),
  sentenceSeparator: z.string().optional(),
}).strict();

const TextBody = ParagraphBody.extend({
  paragraphCount: count(MAX_PARAGRAPHS).optional(),
  paragraphSeparator: z.string().optional(),
}).strict();

const RANGES = [
  ['minLength', 'maxLength'],
  ['minWords', 'maxWords'],
  ['minSentences', 'maxSentences'],
] as const;

type RangeKey = (typeof RANGES)[number][number];

function checkRanges(body: Partial<Record<RangeKey, number>>, ctx: z.RefinementCtx): void {
  for (const [minKey, maxKey] of RANGES) {
    const min = body[minKey];
    const max = body[maxKey];
    if (min !== undefined && max !== undefined && min > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [minKey],
        message: `must be less than or equal to ${maxKey}`,
      });
    }
  }
}

export const WordBodySchema = WordBody.superRefine(checkRanges);
export const WordsBodySchema = WordsBody.superRefine(checkRanges);
export const SentenceBodySchema = SentenceBody.superRefine(checkRanges);
export const ParagraphBodySchema = ParagraphBody.superRefine(checkRanges);
export const TextBodySchema = TextBody.superRefine(checkRanges);

/** One line per issue, e.g. `randomness: Number must be less than or equal to 1` */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`).join('; ');
}
