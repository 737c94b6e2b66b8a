/**
 * Verb Pairing Service - Root-Matched Singular/Plural Forms
 *
 * Agreement contrasts need the bad sentence's verb to be the same verb as the
 * good sentence's, inflected differently ("corre" / "corrono"), not an
 * unrelated plural. Forms are related through a root produced by a
 * MorphologyStrategy, so another language only needs its own strategy.
 */

import { LexiconIndex } from './lexicon.service';
import type { RandomSource } from './prng.service';
import type { VerbPair } from '../types/generation.types';

function isDebugEnabled(): boolean {
  return process.env.DEBUG_GENERATION === 'true';
}

/**
 * Maps an inflected verb form to the root shared by its inflections.
 */
export interface MorphologyStrategy {
  root(word: string): string;
}

/**
 * Italian present-tense endings: 3rd plural -ano/-ono, 3rd singular -a/-e.
 */
export const ITALIAN_VERB_SUFFIXES: readonly string[] = ['ano', 'ono', 'a', 'e'];

/**
 * Strips the first matching suffix, longest suffixes first. A word with no
 * matching suffix is its own root. Only one suffix is removed.
 *
 * @example
 * ```typescript
 * const morphology = new SuffixMorphology(ITALIAN_VERB_SUFFIXES);
 * morphology.root('corrono'); // 'corr'
 * morphology.root('corre');   // 'corr'
 * ```
 */
export class SuffixMorphology implements MorphologyStrategy {
  private readonly suffixes: readonly string[];

  constructor(suffixes: readonly string[] = ITALIAN_VERB_SUFFIXES) {
    // Array.prototype.sort is stable, so equal lengths keep their given order
    this.suffixes = suffixes
      .filter(suffix => suffix.length > 0)
      .slice()
      .sort((a, b) => b.length - a.length);
  }

  root(word: string): string {
    for (const suffix of this.suffixes) {
      if (word.endsWith(suffix)) {
        return word.slice(0, word.length - suffix.length);
      }
    }
    return word;
  }
}

export class VerbPairingService {
  constructor(
    private readonly lexicon: LexiconIndex,
    private readonly morphology: MorphologyStrategy,
    private readonly random: RandomSource
  ) {}

  /**
   * Finds a singular form and a plural form sharing a root.
   *
   * Singular candidates are visited in shuffled order; the first one with at
   * least one root-matched plural wins, and the plural is chosen uniformly
   * among its matches. The lexicon is never reordered.
   *
   * @param singularTag - Base tag holding singular forms
   * @param pluralTag - Base tag holding plural forms
   * @returns The pair, or null when either tag is missing/empty or no root matches
   */
  findMatchingPair(singularTag: string, pluralTag: string): VerbPair | null {
    const singulars = this.lexicon.words(singularTag) ?? [];
    const plurals = this.lexicon.words(pluralTag) ?? [];

    if (singulars.length === 0 || plurals.length === 0) {
      return null;
    }

    const pluralRoots = plurals.map(word => ({
      word,
      root: this.morphology.root(word),
    }));

    for (const singular of this.random.shuffle(singulars)) {
      const root = this.morphology.root(singular);
      const matches = pluralRoots
        .filter(candidate => candidate.root === root)
        .map(candidate => candidate.word);

      if (matches.length > 0) {
        const plural = this.random.choice(matches);

        if (isDebugEnabled()) {
          console.log(
            JSON.stringify({
              debug: 'findMatchingPair',
              singularTag,
              pluralTag,
              root,
              singular,
              plural,
              matchesCount: matches.length,
              timestamp: new Date().toISOString(),
            })
          );
        }

        return { singular, plural };
      }
    }

    return null;
  }
}
