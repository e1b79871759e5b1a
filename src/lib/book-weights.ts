/**
 * Per-book reliability weights kept in a JSON file
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import { Logger } from './logger';

const logger = new Logger('book-weights');

const weightsSchema = z.record(z.string(), z.number().finite().nonnegative());

export type BookWeightMap = Record<string, number>;

export function defaultWeights(books: readonly string[]): BookWeightMap {
  return Object.fromEntries(books.map(b => [b, 1.0]));
}

export class BookWeights {
  constructor(private weights: BookWeightMap = {}) {}

  /** Unknown books weigh 1.0 */
  weightOf(book: string): number {
    return this.weights[book] ?? 1.0;
  }

  toJSON(): BookWeightMap {
    return { ...this.weights };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stored weights, or null when the file does not exist. Throws ConfigError
 * when the file is not a valid weight map.
 */
async function readWeightsFile(file: string): Promise<BookWeightMap | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Malformed book weights at ${file}: ${errorMessage(error)}`);
  }
  const parsed = weightsSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown';
    throw new ConfigError(`Invalid book weights at ${file}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Read weights from disk, filling missing books with defaults. A missing
 * file is created with the defaults; an unreadable one is left as it is.
 */
export async function loadBookWeights(file: string, books: readonly string[]): Promise<BookWeights> {
  const defaults = defaultWeights(books);

  let stored: BookWeightMap | null;
  try {
    stored = await readWeightsFile(file);
  } catch (error) {
    logger.warn(`${errorMessage(error)}; using default weights`);
    return new BookWeights(defaults);
  }

  if (stored === null) {
    try {
      await saveBookWeights(file, defaults);
      logger.info(`Wrote default book weights to ${file}`);
    } catch (error) {
      logger.warn(`Could not write default book weights to ${file}: ${errorMessage(error)}`);
    }
    return new BookWeights(defaults);
  }

  return new BookWeights({ ...defaults, ...stored });
}

export async function saveBookWeights(file: string, weights: BookWeightMap): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(weightsSchema.parse(weights), null, 2) + '\n', 'utf-8');
}

/** Refuses to overwrite a file it cannot parse */
export async function setBookWeight(
  file: string,
  books: readonly string[],
  book: string,
  weight: number
): Promise<BookWeightMap> {
  const current = { ...defaultWeights(books), ...(await readWeightsFile(file)) };
  const next = { ...current, [book.toLowerCase()]: weight };
  await saveBookWeights(file, next);
  return next;
}
