/**
 * Pair Generator Service - Fills a Sequence Pair with Words
 *
 * Turns one (good tag sequence, bad tag sequence) into one (good sentence,
 * bad sentence). Ordinary slots go through the WordSelectionService; verb
 * link groups are filled with a root-matched singular/plural pair from the
 * VerbPairingService.
 *
 * Generation Flow:
 * 1. Find verb link groups (same marker, "VERB" on both sides)
 * 2. Fill ordinary good positions
 * 3. Fill ordinary bad positions, copying the good word where the tags agree
 * 4. Fill each verb link group, or fail the whole pair
 * 5. Join tokens with single spaces
 *
 * Positions are consumed pairwise up to the shorter of the two sequences.
 */

import { WordSelectionService } from './word-selection.service';
import { VerbPairingService } from './verb-pairing.service';
import { baseTag, linkMarker, splitTags, DEFAULT_LINK_MARKERS } from '../utils/tags';
import { VerbPairNotFoundError } from '../utils/generation.errors';
import type {
  SentencePair,
  VerbLinkGroup,
  VerbPair,
} from '../types/generation.types';

export const DEFAULT_VERB_CATEGORY = 'VERB';
export const DEFAULT_MAX_VERB_PAIR_ATTEMPTS = 50;
export const MISSING_PLACEHOLDER = '[MISSING]';

function isDebugEnabled(): boolean {
  return process.env.DEBUG_GENERATION === 'true';
}

export interface PairGeneratorOptions {
  linkMarkers?: readonly string[];
  verbCategory?: string;
  maxVerbPairAttempts?: number;
}

/**
 * Groups the positions whose good and bad tags both contain `verbCategory`
 * and end in the same link marker. Groups come out in order of first
 * appearance; each remembers the tags at its first position.
 *
 * @example
 * ```typescript
 * findVerbLinkGroups(['NOUN', 'VERB_SING₁'], ['NOUN', 'VERB_PL₁']);
 * // [{ marker: '₁', positions: [1], goodTag: 'VERB_SING₁', badTag: 'VERB_PL₁' }]
 * ```
 */
export function findVerbLinkGroups(
  goodTags: readonly string[],
  badTags: readonly string[],
  verbCategory: string = DEFAULT_VERB_CATEGORY,
  linkMarkers: readonly string[] = DEFAULT_LINK_MARKERS
): VerbLinkGroup[] {
  const groups = new Map<string, VerbLinkGroup>();
  const length = Math.min(goodTags.length, badTags.length);

  for (let i = 0; i < length; i++) {
    const goodTag = goodTags[i];
    const badTag = badTags[i];
    if (!goodTag.includes(verbCategory) || !badTag.includes(verbCategory)) {
      continue;
    }

    const marker = linkMarker(goodTag, linkMarkers);
    if (marker === null || marker !== linkMarker(badTag, linkMarkers)) {
      continue;
    }

    const group = groups.get(marker);
    if (group) {
      group.positions.push(i);
    } else {
      groups.set(marker, { marker, positions: [i], goodTag, badTag });
    }
  }

  return Array.from(groups.values());
}

export class PairGeneratorService {
  private readonly linkMarkers: readonly string[];
  private readonly verbCategory: string;
  private readonly maxVerbPairAttempts: number;

  constructor(
    private readonly wordSelection: WordSelectionService,
    private readonly verbPairing: VerbPairingService,
    options: PairGeneratorOptions = {}
  ) {
    this.linkMarkers = options.linkMarkers ?? DEFAULT_LINK_MARKERS;
    this.verbCategory = options.verbCategory ?? DEFAULT_VERB_CATEGORY;
    this.maxVerbPairAttempts =
      options.maxVerbPairAttempts ?? DEFAULT_MAX_VERB_PAIR_ATTEMPTS;
  }

  /**
   * Generates one sentence pair.
   *
   * @param goodSequence - Whitespace-separated grammatical tag sequence
   * @param badSequence - Whitespace-separated ungrammatical tag sequence
   * @returns Good and bad sentences with one word per consumed position
   * @throws {VerbPairNotFoundError} If a verb link group cannot be filled
   * @throws {DataIntegrityError} If a selected tag has an empty lexicon entry
   *
   * @example
   * ```typescript
   * generator.generate('DET NOUN_SING VERB_SING₁', 'DET NOUN_SING VERB_PL₁');
   * // { good: 'il gatto dorme', bad: 'il gatto dormono' }
   * ```
   */
  generate(goodSequence: string, badSequence: string): SentencePair {
    const allGood = splitTags(goodSequence);
    const allBad = splitTags(badSequence);
    const length = Math.min(allGood.length, allBad.length);
    const goodTags = allGood.slice(0, length);
    const badTags = allBad.slice(0, length);

    const groups = findVerbLinkGroups(
      goodTags,
      badTags,
      this.verbCategory,
      this.linkMarkers
    );
    const linked = new Set<number>();
    for (const group of groups) {
      for (const position of group.positions) linked.add(position);
    }

    const pairUsedWords = new Set<string>();
    const goodWords = new Array<string | null>(length).fill(null);
    const badWords = new Array<string | null>(length).fill(null);

    goodTags.forEach((tag, i) => {
      if (!linked.has(i)) {
        goodWords[i] = this.wordSelection.select(tag, pairUsedWords);
      }
    });

    badTags.forEach((tag, i) => {
      if (linked.has(i)) return;
      badWords[i] =
        tag === goodTags[i]
          ? goodWords[i]
          : this.wordSelection.select(tag, pairUsedWords);
    });

    for (const group of groups) {
      const verbs = this.fillVerbGroup(group);
      for (const position of group.positions) {
        goodWords[position] = verbs.singular;
        badWords[position] = verbs.plural;
      }
    }

    const result: SentencePair = {
      good: goodWords.map(word => word ?? MISSING_PLACEHOLDER).join(' '),
      bad: badWords.map(word => word ?? MISSING_PLACEHOLDER).join(' '),
    };

    if (isDebugEnabled()) {
      console.log(
        JSON.stringify({
          debug: 'generatePair',
          goodSequence,
          badSequence,
          verbGroups: groups.map(g => ({ marker: g.marker, positions: g.positions })),
          ...result,
          timestamp: new Date().toISOString(),
        })
      );
    }

    return result;
  }

  private fillVerbGroup(group: VerbLinkGroup): VerbPair {
    const singularTag = baseTag(group.goodTag, this.linkMarkers);
    const pluralTag = baseTag(group.badTag, this.linkMarkers);

    for (let attempt = 0; attempt < this.maxVerbPairAttempts; attempt++) {
      const pair = this.verbPairing.findMatchingPair(singularTag, pluralTag);
      if (pair) return pair;
    }

    throw new VerbPairNotFoundError(
      singularTag,
      pluralTag,
      this.maxVerbPairAttempts
    );
  }
}
