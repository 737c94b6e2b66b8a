/**
 * Word Selection Service - Varied Word Choice per Tag
 *
 * Picks a word for a tag so that:
 * - Pair Variety: no word repeats across ordinary slots of one sentence pair
 * - Run Rotation: a word is not reused for a tag until every word for that
 *   tag has appeared since the tag's last reset
 *
 * Candidate resolution is a three-tier strategy over a snapshot of the
 * current state (see resolveCandidates()). The service applies the tier's
 * side effects: resetting the run history, then recording the chosen word.
 *
 * @example
 * ```typescript
 * const selector = new WordSelectionService(lexicon, new GenerationContext(), new PRNG(1n));
 * const pairUsed = new Set<string>();
 * selector.select('NOUN_SING', pairUsed); // e.g. 'gatto'
 * selector.select('NOUN_SING', pairUsed); // never 'gatto' again in this pair
 * ```
 */

import { LexiconIndex } from './lexicon.service';
import { GenerationContext } from './generation-context';
import type { RandomSource } from './prng.service';
import { baseTag, DEFAULT_LINK_MARKERS } from '../utils/tags';
import { DataIntegrityError } from '../utils/generation.errors';

/**
 * Check if debug logging is enabled via DEBUG_GENERATION environment variable.
 */
function isDebugEnabled(): boolean {
  return process.env.DEBUG_GENERATION === 'true';
}

/**
 * Which tier produced the candidate pool.
 * - unused-in-run: not used in this pair nor since the tag's last reset
 * - unused-in-pair: run history exhausted and reset; only the pair is excluded
 * - any: the whole lexicon entry, repeats within the pair allowed
 */
export type CandidateTier = 'unused-in-run' | 'unused-in-pair' | 'any';

export interface CandidateResolution {
  tier: CandidateTier;
  candidates: readonly string[];
  /** True when the tag's run history must be cleared before choosing */
  resetRunHistory: boolean;
}

/**
 * Resolves the candidate pool for one selection. Pure: inputs are not
 * modified.
 *
 * @param words - Lexicon entry for the base tag
 * @param pairUsed - Words already used in the current sentence pair
 * @param runUsed - Words used for this tag since its last reset
 *
 * @example
 * ```typescript
 * resolveCandidates(['a', 'b'], new Set(['a']), new Set(['b']));
 * // { tier: 'unused-in-pair', candidates: ['b'], resetRunHistory: true }
 * ```
 */
export function resolveCandidates(
  words: readonly string[],
  pairUsed: ReadonlySet<string>,
  runUsed: ReadonlySet<string>
): CandidateResolution {
  const unusedInRun = words.filter(w => !pairUsed.has(w) && !runUsed.has(w));
  if (unusedInRun.length > 0) {
    return {
      tier: 'unused-in-run',
      candidates: unusedInRun,
      resetRunHistory: false,
    };
  }

  const unusedInPair = words.filter(w => !pairUsed.has(w));
  if (unusedInPair.length > 0) {
    return {
      tier: 'unused-in-pair',
      candidates: unusedInPair,
      resetRunHistory: true,
    };
  }

  return { tier: 'any', candidates: words, resetRunHistory: true };
}

/**
 * Placeholder emitted for a tag the lexicon does not know. A single token,
 * so both sentences keep one word per position.
 */
export function unknownTagPlaceholder(tag: string): string {
  return `[UNKNOWN:${tag}]`;
}

export class WordSelectionService {
  constructor(
    private readonly lexicon: LexiconIndex,
    private readonly context: GenerationContext,
    private readonly random: RandomSource,
    private readonly linkMarkers: readonly string[] = DEFAULT_LINK_MARKERS
  ) {}

  /**
   * Selects a word for `tag` and records it in `pairUsedWords` and in the
   * run history.
   *
   * Unknown tags do not fail the pair: a placeholder is returned and a
   * warning logged.
   *
   * @param tag - Tag as it appears in the sequence (may carry a link marker)
   * @param pairUsedWords - Words used so far in this pair (mutated)
   * @returns The chosen word, or the unknown-tag placeholder
   * @throws {DataIntegrityError} If the lexicon entry for the tag is empty
   */
  select(tag: string, pairUsedWords: Set<string>): string {
    const key = baseTag(tag, this.linkMarkers);
    const words = this.lexicon.words(key);

    if (words === undefined) {
      console.warn(
        JSON.stringify({
          operation: 'selectWord',
          warning: 'unknown_tag',
          message: `Tag not found in lexicon: '${key}' (original tag: '${tag}')`,
          tag,
          baseTag: key,
          timestamp: new Date().toISOString(),
        })
      );
      return unknownTagPlaceholder(tag);
    }

    if (words.length === 0) {
      throw new DataIntegrityError(
        `Lexicon entry for tag '${key}' is empty`,
        key
      );
    }

    const resolution = resolveCandidates(
      words,
      pairUsedWords,
      this.context.usedWords(key)
    );
    if (resolution.resetRunHistory) {
      this.context.reset(key);
    }

    const word = this.random.choice(resolution.candidates);
    pairUsedWords.add(word);
    this.context.markUsed(key, word);

    if (isDebugEnabled()) {
      console.log(
        JSON.stringify({
          debug: 'selectWord',
          tag,
          baseTag: key,
          word,
          tier: resolution.tier,
          candidatesCount: resolution.candidates.length,
          timestamp: new Date().toISOString(),
        })
      );
    }

    return word;
  }
}
