/**
 * Data Loader Service - Lexicon and Tag-Sequence Files
 *
 * Reads the two CSV inputs of the generator and validates them before any
 * generation starts. Problems here are fatal: they surface as
 * DataIntegrityError and abort startup or the CLI run.
 *
 * Expected files:
 * - Lexicon: header with `Word` and `Tag` columns (extra columns ignored)
 * - Tag sequences: header with `Good_Sequence` and `Bad_Sequence` columns
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { LexiconIndex } from './lexicon.service';
import { splitTags } from '../utils/tags';
import { DataIntegrityError } from '../utils/generation.errors';
import type {
  LexiconEntry,
  TagSequencePair,
} from '../types/generation.types';

const LEXICON_COLUMNS = ['Word', 'Tag'] as const;
const SEQUENCE_COLUMNS = ['Good_Sequence', 'Bad_Sequence'] as const;

/**
 * Parses CSV text into rows of trimmed cells.
 */
function parseRows(content: string, source: string): string[][] {
  let rows: unknown;
  try {
    rows = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new DataIntegrityError(
      `Malformed CSV in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }

  if (!Array.isArray(rows)) {
    throw new DataIntegrityError(`Malformed CSV in ${source}`, source);
  }

  return rows.map(row =>
    Array.isArray(row) ? row.map(cell => String(cell)) : []
  );
}

/**
 * Locates required header columns, returning their indices in the given order.
 */
function columnIndices(
  header: readonly string[] | undefined,
  required: readonly string[],
  source: string
): number[] {
  if (!header) {
    throw new DataIntegrityError(`${source} is empty`, source);
  }

  const missing = required.filter(column => !header.includes(column));
  if (missing.length > 0) {
    throw new DataIntegrityError(
      `${source} must contain ${required.map(c => `'${c}'`).join(' and ')} columns (missing: ${missing.join(', ')})`,
      source
    );
  }

  return required.map(column => header.indexOf(column));
}

/**
 * Parses lexicon CSV text. Rows with an empty word or tag are skipped.
 *
 * @throws {DataIntegrityError} If columns are missing or no row is usable
 *
 * @example
 * ```typescript
 * const lexicon = parseLexiconCsv('Word,Tag\nil,DET\ngatto,NOUN_SING\n');
 * lexicon.words('DET'); // ['il']
 * ```
 */
export function parseLexiconCsv(
  content: string,
  source: string = 'lexicon'
): LexiconIndex {
  const [header, ...rows] = parseRows(content, source);
  const [wordIndex, tagIndex] = columnIndices(header, LEXICON_COLUMNS, source);

  const entries: LexiconEntry[] = [];
  for (const row of rows) {
    const word = row[wordIndex] ?? '';
    const tag = row[tagIndex] ?? '';
    if (word.length > 0 && tag.length > 0) {
      entries.push({ word, tag });
    }
  }

  if (entries.length === 0) {
    throw new DataIntegrityError(`No valid lexicon entries found in ${source}`, source);
  }

  return LexiconIndex.fromEntries(entries);
}

/**
 * Parses tag-sequence CSV text. Rows with an empty side are skipped; rows
 * whose sides have different tag counts are rejected.
 *
 * @throws {DataIntegrityError} If columns are missing, a row is misaligned,
 *   or no row is usable
 */
export function parseTagSequencesCsv(
  content: string,
  source: string = 'tag sequences'
): TagSequencePair[] {
  const [header, ...rows] = parseRows(content, source);
  const [goodIndex, badIndex] = columnIndices(header, SEQUENCE_COLUMNS, source);

  const sequences: TagSequencePair[] = [];
  rows.forEach((row, i) => {
    const good = row[goodIndex] ?? '';
    const bad = row[badIndex] ?? '';
    if (good.length === 0 || bad.length === 0) return;

    const goodLength = splitTags(good).length;
    const badLength = splitTags(bad).length;
    if (goodLength !== badLength) {
      // Header is line 1
      throw new DataIntegrityError(
        `${source} row ${i + 2}: good sequence has ${goodLength} tags but bad sequence has ${badLength}`,
        source
      );
    }

    sequences.push({ good, bad });
  });

  if (sequences.length === 0) {
    throw new DataIntegrityError(`No valid sequences found in ${source}`, source);
  }

  return sequences;
}

export class DataLoaderService {
  /**
   * @param baseDir - Directory relative paths are resolved against
   */
  constructor(private readonly baseDir: string = process.cwd()) {}

  /**
   * Loads the lexicon CSV.
   *
   * @throws {Error} If the file is missing or invalid (message includes the path)
   */
  loadLexicon(filePath: string): LexiconIndex {
    return this.load('loadLexicon', filePath, (content, source) => {
      const lexicon = parseLexiconCsv(content, source);
      console.log(
        JSON.stringify({
          operation: 'loadLexicon',
          path: filePath,
          tags: lexicon.tagCount,
          words: lexicon.wordCount,
          timestamp: new Date().toISOString(),
        })
      );
      return lexicon;
    });
  }

  /**
   * Loads the tag-sequence CSV.
   *
   * @throws {Error} If the file is missing or invalid (message includes the path)
   */
  loadTagSequences(filePath: string): TagSequencePair[] {
    return this.load('loadTagSequences', filePath, (content, source) => {
      const sequences = parseTagSequencesCsv(content, source);
      console.log(
        JSON.stringify({
          operation: 'loadTagSequences',
          path: filePath,
          sequences: sequences.length,
          timestamp: new Date().toISOString(),
        })
      );
      return sequences;
    });
  }

  private load<T>(
    operation: string,
    filePath: string,
    parseContent: (content: string, source: string) => T
  ): T {
    const fullPath = path.resolve(this.baseDir, filePath);
    try {
      const content = fs.readFileSync(fullPath, 'utf-8');
      return parseContent(content, filePath);
    } catch (error) {
      console.error(
        JSON.stringify({
          operation,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          path: filePath,
          timestamp: new Date().toISOString(),
        })
      );
      if (error instanceof DataIntegrityError) {
        throw error;
      }
      throw new DataIntegrityError(
        `Failed to load ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }
  }
}
