// Import fs to read the sample file at startup
import { readFileSync } from 'node:fs';
// Import zod for runtime validation
import { z } from 'zod';
// Import error raised for invalid startup configuration
import { ConfigurationError } from '../common/errors/catalog-errors';
// Import book shapes
import type { BookDraft } from './book.types';
// Import repository contract
import type { BookRepository } from './book.repository';

const sampleBooksSchema = z.array(
  z.object({
    title: z.string().min(1),
    author: z.string().min(1),
    publicationYear: z.number().int()
  })
);

/**
 * Read the sample books file
 * @throws ConfigurationError when the file is missing or malformed
 */
export function readSampleBooks(path: string): BookDraft[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read sample books file ${path}: ${reason}`);
  }

  const result = sampleBooksSchema.safeParse(raw);
  if (!result.success) throw new ConfigurationError(`Invalid sample books file ${path}.`);
  return result.data;
}

/**
 * Insert every draft into the repository, in order
 * @returns Number of books created
 */
export async function seedBooks(repository: BookRepository, drafts: readonly BookDraft[]): Promise<number> {
  for (const draft of drafts) {
    await repository.create(draft);
  }
  return drafts.length;
}
