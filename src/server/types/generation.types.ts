/**
 * TypeScript type definitions for the minimal pair generator.
 * These types describe tag sequences, lexicon records, verb link groups
 * and the shapes produced by single-pair and batch generation.
 */

/**
 * A single row of the tagged lexicon.
 *
 * @example
 * { word: "corre", tag: "VERB_SING" }
 */
export interface LexiconEntry {
  /** Surface form emitted into sentences */
  word: string;
  /** Base tag the word is filed under (never carries a link marker) */
  tag: string;
}

/**
 * A (good, bad) pair of whitespace-separated tag sequences.
 *
 * @example
 * { good: "DET NOUN_SING VERB_SING₁", bad: "DET NOUN_SING VERB_PL₁" }
 */
export interface TagSequencePair {
  good: string;
  bad: string;
}

/**
 * Positions in a sequence pair that share a link marker and are verbs on
 * both sides. Every position of the group receives the same form per sentence.
 */
export interface VerbLinkGroup {
  /** The shared link marker (e.g. "₁") */
  marker: string;
  /** Zero-based positions belonging to the group, ascending */
  positions: number[];
  /** Good-side tag at the first position */
  goodTag: string;
  /** Bad-side tag at the first position */
  badTag: string;
}

/**
 * A root-matched singular/plural verb pair.
 */
export interface VerbPair {
  singular: string;
  plural: string;
}

/**
 * Filled sentences for one sequence pair.
 */
export interface SentencePair {
  good: string;
  bad: string;
}

/**
 * A generated pair together with the sequences it was filled from.
 */
export interface GeneratedPair extends SentencePair {
  goodSequence: string;
  badSequence: string;
}

/**
 * Options accepted by BatchService.generateBatch().
 */
export interface BatchRequest {
  /** Number of unique pairs wanted */
  count: number;
  /** Seed phrase; the same phrase and data reproduce the same batch */
  seed?: string;
  /** Sequence pairs to sample from; defaults to the loaded sequences */
  sequences?: TagSequencePair[];
}

/**
 * Outcome of a batch run.
 */
export interface BatchResult {
  pairs: GeneratedPair[];
  requested: number;
  generated: number;
  /** Generation attempts consumed, including duplicates and verb failures */
  attempts: number;
  /** requested - generated */
  shortfall: number;
  /** Seed phrase or hex seed used, so the batch can be replayed */
  seed: string;
}

/**
 * Options accepted by BatchService.generatePair().
 */
export interface PairRequest extends TagSequencePair {
  seed?: string;
}

/**
 * Tunables shared by the generator, the batch loop and the HTTP layer.
 */
export interface GeneratorOptions {
  /** Single-character link markers recognised at the end of a tag */
  linkMarkers: readonly string[];
  /** Substring identifying verb tags for link-group detection */
  verbCategory: string;
  /** Suffixes stripped to find a verb root, checked longest-first */
  verbSuffixes: readonly string[];
  /** Verb-pair searches per link group before giving up */
  maxVerbPairAttempts: number;
  /** Batch attempts allowed per requested pair */
  attemptsPerPair: number;
}
