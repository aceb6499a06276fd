import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { LogVocabulary } from '../../domain/index.js';
import { ConfigError } from '../../domain/index.js';

/** Vocabulary shipped with the package. */
export const DEFAULT_VOCABULARY_PATH = fileURLToPath(
  new URL('../../../config/log-vocabulary.json', import.meta.url),
);

/**
 * Zod schema for the vocabulary file.
 *
 * Category names end up inside a regular expression (escaped), thread
 * prefixes likewise, so only empty strings are rejected here.
 */
export const vocabularyFileSchema = z.object({
  categories: z.array(z.string().min(1)).min(1, 'At least one category is required'),
  threads: z.array(z.string().min(1)).default([]),
  numbered_thread_prefixes: z.array(z.string().min(1)).default([]),
});

export type VocabularyFile = z.infer<typeof vocabularyFileSchema>;

export function toVocabulary(file: VocabularyFile): LogVocabulary {
  return {
    categories: new Set(file.categories),
    threads: new Set(file.threads),
    numberedThreadPrefixes: [...file.numbered_thread_prefixes],
  };
}

/**
 * Loads and validates a vocabulary file.
 *
 * Unlike optional settings there is no fallback: without the category list
 * no line can be parsed, so a missing or invalid file throws ConfigError.
 */
export function loadVocabulary(path: string = DEFAULT_VOCABULARY_PATH): LogVocabulary {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read vocabulary file ${path}`, path, err);
  }

  const parsed = vocabularyFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid vocabulary file ${path}: ${issues}`, path, parsed.error);
  }

  return toVocabulary(parsed.data);
}
