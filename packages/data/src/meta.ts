// Vocab metadata files (<name>.meta.json)

import { z } from 'zod';
import { PunctuationProfileSchema, ValidationError } from '@glyphproof/core';

export const VocabMetaSchema = z.object({
  lang: z.string().min(1),
  bicameral: z.boolean(),
  name: z.string().optional(),
  description: z.string().optional(),
  source: z.string().optional(),
  punctuation: PunctuationProfileSchema.optional(),
});

export type VocabMeta = z.infer<typeof VocabMetaSchema>;

export function parseVocabMeta(raw: unknown, origin: string): VocabMeta {
  const result = VocabMetaSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid vocab metadata in ${origin}: ${issues}`);
  }
  return result.data;
}

export function parseVocabMetaJson(content: string, origin: string): VocabMeta {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid JSON in ${origin}: ${message}`);
  }
  return parseVocabMeta(raw, origin);
}
