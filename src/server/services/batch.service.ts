/**
 * Batch Service - Orchestrator for Minimal Pair Generation
 *
 * Coordinates the generation engine to produce a batch of unique sentence
 * pairs. It combines:
 * - SeedService for reproducible seeds
 * - PRNG for every random decision in the batch
 * - GenerationContext for run-lifetime word rotation
 * - WordSelectionService, VerbPairingService and PairGeneratorService
 *
 * Batch Flow:
 * 1. Resolve the seed and build a fresh engine (context, PRNG, services)
 * 2. Sample a sequence pair uniformly and generate a sentence pair
 * 3. Discard attempts whose verb groups cannot be filled
 * 4. Keep the pair only if its (good, bad) sentences are new
 * 5. Stop at the requested count or after count × attemptsPerPair attempts
 *
 * Every batch owns its engine, so concurrent batches never share state.
 *
 * @example
 * ```typescript
 * const batchService = new BatchService(lexicon, sequences);
 * const result = batchService.generateBatch({ count: 120, seed: 'test-seed' });
 * // result.pairs.length <= 120, no duplicate (good, bad) pairs
 * ```
 */

import { LexiconIndex } from './lexicon.service';
import { GenerationContext } from './generation-context';
import { PRNG } from './prng.service';
import { SeedService } from './seed.service';
import { WordSelectionService } from './word-selection.service';
import {
  ITALIAN_VERB_SUFFIXES,
  SuffixMorphology,
  VerbPairingService,
  type MorphologyStrategy,
} from './verb-pairing.service';
import {
  DEFAULT_MAX_VERB_PAIR_ATTEMPTS,
  DEFAULT_VERB_CATEGORY,
  PairGeneratorService,
} from './pair-generator.service';
import { DEFAULT_LINK_MARKERS } from '../utils/tags';
import { VerbPairNotFoundError } from '../utils/generation.errors';
import {
  DEFAULT_ATTEMPTS_PER_PAIR,
  MAX_PAIR_COUNT,
} from '../utils/config';
import type {
  BatchRequest,
  BatchResult,
  GeneratedPair,
  GeneratorOptions,
  PairRequest,
  SentencePair,
  TagSequencePair,
} from '../types/generation.types';

const MIN_PAIR_COUNT = 1;

function isDebugEnabled(): boolean {
  return process.env.DEBUG_GENERATION === 'true';
}

export interface BatchServiceOptions extends Partial<GeneratorOptions> {
  /** Seed phrase used when a request does not bring its own */
  defaultSeed?: string;
  /** Overrides the suffix morphology built from verbSuffixes */
  morphology?: MorphologyStrategy;
}

interface Engine {
  seed: string;
  prng: PRNG;
  context: GenerationContext;
  generator: PairGeneratorService;
}

export class BatchService {
  private readonly seedService = new SeedService();
  private readonly options: GeneratorOptions;
  private readonly morphology: MorphologyStrategy;
  private readonly defaultSeed?: string;

  /**
   * @param lexicon - Lexicon index shared (read-only) by every batch
   * @param sequences - Sequence pairs sampled when a request brings none
   */
  constructor(
    private readonly lexicon: LexiconIndex,
    private readonly sequences: readonly TagSequencePair[],
    options: BatchServiceOptions = {}
  ) {
    this.options = {
      linkMarkers: options.linkMarkers ?? DEFAULT_LINK_MARKERS,
      verbCategory: options.verbCategory ?? DEFAULT_VERB_CATEGORY,
      verbSuffixes: options.verbSuffixes ?? ITALIAN_VERB_SUFFIXES,
      maxVerbPairAttempts:
        options.maxVerbPairAttempts ?? DEFAULT_MAX_VERB_PAIR_ATTEMPTS,
      attemptsPerPair: options.attemptsPerPair ?? DEFAULT_ATTEMPTS_PER_PAIR,
    };
    this.morphology =
      options.morphology ?? new SuffixMorphology(this.options.verbSuffixes);
    this.defaultSeed = options.defaultSeed;
  }

  /**
   * Generates up to `count` unique sentence pairs.
   *
   * Verb-pair failures are retried with a different sample; any other error
   * aborts the batch. A shortfall is reported in the result and logged as a
   * warning.
   *
   * @throws {Error} If count is out of range or there is nothing to sample
   * @throws {DataIntegrityError} If the lexicon has an empty entry in use
   */
  generateBatch(request: BatchRequest): BatchResult {
    const { count } = request;
    const sequences = request.sequences ?? this.sequences;

    try {
      this.validateCount(count);
      if (sequences.length === 0) {
        throw new Error('sequences must contain at least one sequence pair');
      }

      const engine = this.createEngine(request.seed);
      const maxAttempts = count * this.options.attemptsPerPair;
      const seen = new Set<string>();
      const pairs: GeneratedPair[] = [];
      let attempts = 0;

      while (pairs.length < count && attempts < maxAttempts) {
        attempts++;
        const sequence = engine.prng.choice(sequences);

        let sentences: SentencePair;
        try {
          sentences = engine.generator.generate(sequence.good, sequence.bad);
        } catch (error) {
          if (error instanceof VerbPairNotFoundError) {
            if (isDebugEnabled()) {
              console.log(
                JSON.stringify({
                  debug: 'generateBatch:retry',
                  reason: error.message,
                  attempt: attempts,
                  timestamp: new Date().toISOString(),
                })
              );
            }
            continue;
          }
          throw error;
        }

        // Tab cannot occur inside a space-joined sentence
        const key = `${sentences.good}\t${sentences.bad}`;
        if (seen.has(key)) continue;

        seen.add(key);
        pairs.push({
          ...sentences,
          goodSequence: sequence.good,
          badSequence: sequence.bad,
        });
      }

      const result: BatchResult = {
        pairs,
        requested: count,
        generated: pairs.length,
        attempts,
        shortfall: count - pairs.length,
        seed: engine.seed,
      };

      if (result.shortfall > 0) {
        console.warn(
          JSON.stringify({
            operation: 'generateBatch',
            warning: 'shortfall',
            message: `Could only generate ${result.generated} unique pairs out of ${count} requested`,
            attempts,
            seed: engine.seed,
            timestamp: new Date().toISOString(),
          })
        );
      }

      if (isDebugEnabled()) {
        console.log(
          JSON.stringify({
            debug: 'generateBatch:usedWords',
            usedWords: engine.context.toJSON(),
            timestamp: new Date().toISOString(),
          })
        );
      }

      console.log(
        JSON.stringify({
          operation: 'generateBatch',
          requested: count,
          generated: result.generated,
          attempts,
          seed: engine.seed,
          timestamp: new Date().toISOString(),
        })
      );

      return result;
    } catch (error) {
      console.error(
        JSON.stringify({
          operation: 'generateBatch',
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          inputs: { count, seed: request.seed, sequences: sequences.length },
          timestamp: new Date().toISOString(),
        })
      );
      throw error;
    }
  }

  /**
   * Generates one pair for explicit sequences with a fresh context.
   *
   * @throws {VerbPairNotFoundError} If a verb link group cannot be filled
   */
  generatePair(request: PairRequest): GeneratedPair {
    const engine = this.createEngine(request.seed);
    const sentences = engine.generator.generate(request.good, request.bad);

    console.log(
      JSON.stringify({
        operation: 'generatePair',
        goodSequence: request.good,
        badSequence: request.bad,
        seed: engine.seed,
        timestamp: new Date().toISOString(),
      })
    );

    return {
      ...sentences,
      goodSequence: request.good,
      badSequence: request.bad,
    };
  }

  private createEngine(seedPhrase?: string): Engine {
    const seed = this.seedService.resolve(seedPhrase ?? this.defaultSeed);
    const prng = new PRNG(seed.value);
    const context = new GenerationContext();

    const wordSelection = new WordSelectionService(
      this.lexicon,
      context,
      prng,
      this.options.linkMarkers
    );
    const verbPairing = new VerbPairingService(
      this.lexicon,
      this.morphology,
      prng
    );
    const generator = new PairGeneratorService(wordSelection, verbPairing, {
      linkMarkers: this.options.linkMarkers,
      verbCategory: this.options.verbCategory,
      maxVerbPairAttempts: this.options.maxVerbPairAttempts,
    });

    return { seed: seed.label, prng, context, generator };
  }

  private validateCount(count: number): void {
    if (
      typeof count !== 'number' ||
      !Number.isInteger(count) ||
      count < MIN_PAIR_COUNT ||
      count > MAX_PAIR_COUNT
    ) {
      throw new Error(
        `count must be an integer between ${MIN_PAIR_COUNT} and ${MAX_PAIR_COUNT} (got ${count})`
      );
    }
  }
}
