/**
 * Lexicon Index
 *
 * Immutable lookup from base tag to the words filed under it. Built once per
 * process from (word, tag) records; duplicates are kept since selection is
 * uniform over the list.
 */

import type { LexiconEntry } from '../types/generation.types';

export class LexiconIndex {
  private readonly byTag: ReadonlyMap<string, readonly string[]>;

  private constructor(byTag: Map<string, readonly string[]>) {
    this.byTag = byTag;
  }

  /**
   * Groups lexicon records by tag, preserving file order within each tag.
   *
   * @example
   * ```typescript
   * const lexicon = LexiconIndex.fromEntries([
   *   { word: 'il', tag: 'DET' },
   *   { word: 'gatto', tag: 'NOUN_SING' },
   * ]);
   * lexicon.words('DET'); // ['il']
   * ```
   */
  static fromEntries(entries: readonly LexiconEntry[]): LexiconIndex {
    const grouped = new Map<string, string[]>();
    for (const { word, tag } of entries) {
      const bucket = grouped.get(tag);
      if (bucket) {
        bucket.push(word);
      } else {
        grouped.set(tag, [word]);
      }
    }
    return new LexiconIndex(new Map(grouped));
  }

  /**
   * Builds an index from a plain tag → words record. Mostly for tests and
   * callers that already hold grouped data.
   */
  static fromRecord(record: Record<string, readonly string[]>): LexiconIndex {
    const byTag = new Map<string, readonly string[]>();
    for (const [tag, words] of Object.entries(record)) {
      byTag.set(tag, [...words]);
    }
    return new LexiconIndex(byTag);
  }

  /** Words for a base tag, or undefined when the tag is not in the lexicon. */
  words(tag: string): readonly string[] | undefined {
    return this.byTag.get(tag);
  }

  get tagCount(): number {
    return this.byTag.size;
  }

  get wordCount(): number {
    let total = 0;
    for (const words of this.byTag.values()) total += words.length;
    return total;
  }
}
