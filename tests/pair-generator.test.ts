/**
 * Pair Generator Service Tests
 *
 * Tests sentence-pair generation from aligned tag sequences:
 * - Shared slots carry the same word in both sentences
 * - Verb link groups get a root-matched singular/plural pair
 * - Unfillable verb groups fail the pair instead of emitting placeholders
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  DEFAULT_MAX_VERB_PAIR_ATTEMPTS,
  findVerbLinkGroups,
  PairGeneratorService,
} from '../src/server/services/pair-generator.service';
import { WordSelectionService } from '../src/server/services/word-selection.service';
import {
  SuffixMorphology,
  VerbPairingService,
} from '../src/server/services/verb-pairing.service';
import { LexiconIndex } from '../src/server/services/lexicon.service';
import { GenerationContext } from '../src/server/services/generation-context';
import { PRNG, type RandomSource } from '../src/server/services/prng.service';
import { VerbPairNotFoundError } from '../src/server/utils/generation.errors';
import { ScriptedRandom } from './helpers/scripted-random';

const LEXICON = {
  DET: ['il'],
  NOUN_SING: ['gatto', 'cane'],
  NOUN_PL: ['gatti'],
  VERB_SING: ['corre', 'dorme'],
  VERB_PL: ['corrono', 'dormono'],
  ADV: ['spesso'],
  CONJ: ['e'],
};

function createGenerator(
  record: Record<string, readonly string[]>,
  random: RandomSource,
  maxVerbPairAttempts?: number
): { generator: PairGeneratorService; verbPairing: VerbPairingService } {
  const lexicon = LexiconIndex.fromRecord(record);
  const wordSelection = new WordSelectionService(
    lexicon,
    new GenerationContext(),
    random
  );
  const verbPairing = new VerbPairingService(
    lexicon,
    new SuffixMorphology(),
    random
  );
  const generator = new PairGeneratorService(wordSelection, verbPairing, {
    maxVerbPairAttempts,
  });
  return { generator, verbPairing };
}

describe('findVerbLinkGroups()', () => {
  it('should group a linked verb position', () => {
    expect(
      findVerbLinkGroups(['NOUN', 'VERB_SING₁'], ['NOUN', 'VERB_PL₁'])
    ).toEqual([
      { marker: '₁', positions: [1], goodTag: 'VERB_SING₁', badTag: 'VERB_PL₁' },
    ]);
  });

  it('should collect positions per marker in order of first appearance', () => {
    const groups = findVerbLinkGroups(
      ['VERB_A₂', 'VERB_B₁', 'VERB_C₂'],
      ['VERB_X₂', 'VERB_Y₁', 'VERB_Z₂']
    );

    expect(groups.map(g => [g.marker, g.positions])).toEqual([
      ['₂', [0, 2]],
      ['₁', [1]],
    ]);
    expect(groups[0].goodTag).toBe('VERB_A₂');
    expect(groups[0].badTag).toBe('VERB_X₂');
  });

  it('should require the verb category on both sides', () => {
    expect(findVerbLinkGroups(['VERB_SING₁'], ['NOUN₁'])).toEqual([]);
  });

  it('should require the same marker on both sides', () => {
    expect(findVerbLinkGroups(['VERB_SING₁'], ['VERB_PL₂'])).toEqual([]);
    expect(findVerbLinkGroups(['VERB_SING'], ['VERB_PL'])).toEqual([]);
  });

  it('should match the verb category case-sensitively as a substring', () => {
    expect(findVerbLinkGroups(['verb_sing₁'], ['verb_pl₁'])).toEqual([]);
    expect(findVerbLinkGroups(['AUXVERB₁'], ['AUXVERB_PL₁'])).toHaveLength(1);
  });

  it('should stop at the shorter sequence', () => {
    expect(findVerbLinkGroups(['DET', 'VERB_SING₁'], ['DET'])).toEqual([]);
  });

  it('should honour a custom verb category', () => {
    expect(findVerbLinkGroups(['V_SG₁'], ['V_PL₁'], 'V_')).toHaveLength(1);
  });
});

describe('PairGeneratorService', () => {
  let random: ScriptedRandom;
  let generator: PairGeneratorService;

  beforeEach(() => {
    random = new ScriptedRandom();
    ({ generator } = createGenerator(LEXICON, random));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fill an agreement contrast with one verb in two forms', () => {
    expect(
      generator.generate('DET NOUN_SING VERB_SING₁', 'DET NOUN_SING VERB_PL₁')
    ).toEqual({ good: 'il gatto corre', bad: 'il gatto corrono' });
  });

  it('should select separately where the tags differ', () => {
    expect(
      generator.generate('DET NOUN_SING ADV', 'DET NOUN_PL ADV')
    ).toEqual({ good: 'il gatto spesso', bad: 'il gatti spesso' });
  });

  it('should not repeat a word within a pair while alternatives exist', () => {
    expect(
      generator.generate('NOUN_SING NOUN_SING', 'NOUN_SING NOUN_SING')
    ).toEqual({ good: 'gatto cane', bad: 'gatto cane' });
  });

  it('should fill every position of a link group with the same pair', () => {
    expect(
      generator.generate('VERB_SING₁ CONJ VERB_SING₁', 'VERB_PL₁ CONJ VERB_PL₁')
    ).toEqual({ good: 'corre e corre', bad: 'corrono e corrono' });
  });

  it('should truncate to the shorter sequence', () => {
    expect(generator.generate('DET NOUN_SING ADV', 'DET NOUN_SING')).toEqual({
      good: 'il gatto',
      bad: 'il gatto',
    });
  });

  it('should emit a placeholder for an unknown tag and keep going', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(generator.generate('DET FOO', 'DET FOO')).toEqual({
      good: 'il [UNKNOWN:FOO]',
      bad: 'il [UNKNOWN:FOO]',
    });
    // The bad side copies the good word for an identical tag
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should keep one word per position when one side has an unknown tag', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const pair = generator.generate('DET FOO', 'DET NOUN_SING');

    expect(pair).toEqual({ good: 'il [UNKNOWN:FOO]', bad: 'il gatto' });
    expect(pair.good.split(' ')).toHaveLength(2);
    expect(pair.bad.split(' ')).toHaveLength(2);
  });

  describe('with one verb tag on both sides', () => {
    const record = { DET: ['il'], NOUN: ['gatto'], VERB: ['corre', 'dorme', 'corrono'] };

    it('should draw both forms from the same bucket by root', () => {
      const last = new ScriptedRandom(length => length - 1);
      const { generator: shared } = createGenerator(record, last);

      expect(
        shared.generate('DET NOUN VERB₁', 'DET NOUN VERB₁')
      ).toEqual({ good: 'il gatto corre', bad: 'il gatto corrono' });
    });

    it('should keep shared slots identical and verbs root-matched over seeds', () => {
      const morphology = new SuffixMorphology();

      for (let seed = 0n; seed < 20n; seed++) {
        const { generator: seeded } = createGenerator(record, new PRNG(seed));
        const pair = seeded.generate('DET NOUN VERB₁', 'DET NOUN VERB₁');
        const good = pair.good.split(' ');
        const bad = pair.bad.split(' ');

        expect(bad.slice(0, 2)).toEqual(good.slice(0, 2));
        expect(record.VERB).toContain(good[2]);
        expect(record.VERB).toContain(bad[2]);
        expect(morphology.root(bad[2])).toBe(morphology.root(good[2]));
      }
    });

    it('should pair a lone verb with itself', () => {
      const { generator: lone } = createGenerator(
        { ...record, VERB: ['dorme'] },
        random
      );

      expect(lone.generate('DET NOUN VERB₁', 'DET NOUN VERB₁')).toEqual({
        good: 'il gatto dorme',
        bad: 'il gatto dorme',
      });
    });

    it('should fail the whole call when the bucket yields no pair', () => {
      const setup = createGenerator({ ...record, VERB: [] }, random);
      const spy = vi.spyOn(setup.verbPairing, 'findMatchingPair');

      let result: unknown;
      let caught: unknown;
      try {
        result = setup.generator.generate('DET NOUN VERB₁', 'DET NOUN VERB₁');
      } catch (error) {
        caught = error;
      }

      expect(result).toBeUndefined();
      expect(caught).toBeInstanceOf(VerbPairNotFoundError);
      expect(caught).toMatchObject({
        singularTag: 'VERB',
        pluralTag: 'VERB',
        attempts: DEFAULT_MAX_VERB_PAIR_ATTEMPTS,
      });
      expect(spy).toHaveBeenCalledTimes(DEFAULT_MAX_VERB_PAIR_ATTEMPTS);
    });
  });

  it('should throw VerbPairNotFoundError when no verb pair matches', () => {
    ({ generator } = createGenerator(
      { ...LEXICON, VERB_SING: ['corre'], VERB_PL: ['dormono'] },
      random
    ));

    expect(() =>
      generator.generate('DET VERB_SING₁', 'DET VERB_PL₁')
    ).toThrow(
      `Could not find matching verb pair for VERB_SING/VERB_PL after ${DEFAULT_MAX_VERB_PAIR_ATTEMPTS} attempts`
    );
  });

  it('should stop after the configured number of verb attempts', () => {
    const setup = createGenerator({ VERB_SING: ['corre'], VERB_PL: [] }, random, 3);
    const spy = vi.spyOn(setup.verbPairing, 'findMatchingPair');

    let caught: unknown;
    try {
      setup.generator.generate('VERB_SING₁', 'VERB_PL₁');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(VerbPairNotFoundError);
    expect(caught).toMatchObject({
      singularTag: 'VERB_SING',
      pluralTag: 'VERB_PL',
      attempts: 3,
    });
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('should fill unlinked verb positions like any other slot', () => {
    expect(generator.generate('VERB_SING', 'VERB_SING')).toEqual({
      good: 'corre',
      bad: 'corre',
    });
  });

  describe('properties over seeds', () => {
    const record = {
      DET: ['il', 'lo', 'un'],
      NOUN_SING: ['gatto', 'cane', 'ragazzo', 'maestro'],
      VERB_SING: ['corre', 'dorme', 'parla', 'legge'],
      VERB_PL: ['corrono', 'dormono', 'parlano', 'leggono'],
      ADV: ['spesso', 'sempre'],
    };
    const morphology = new SuffixMorphology();

    it('should keep shared slots identical and verbs root-matched', () => {
      for (let seed = 0n; seed < 30n; seed++) {
        const { generator: seeded } = createGenerator(record, new PRNG(seed));
        const pair = seeded.generate(
          'DET NOUN_SING VERB_SING₁ ADV',
          'DET NOUN_SING VERB_PL₁ ADV'
        );
        const good = pair.good.split(' ');
        const bad = pair.bad.split(' ');

        expect(good).toHaveLength(4);
        expect(bad).toHaveLength(4);
        expect([bad[0], bad[1], bad[3]]).toEqual([good[0], good[1], good[3]]);
        expect(record.VERB_SING).toContain(good[2]);
        expect(record.VERB_PL).toContain(bad[2]);
        expect(morphology.root(bad[2])).toBe(morphology.root(good[2]));
      }
    });

    it('should replay the same pair for the same seed', () => {
      const sequence: [string, string] = [
        'DET NOUN_SING VERB_SING₁ ADV',
        'DET NOUN_SING VERB_PL₁ ADV',
      ];
      const first = createGenerator(record, new PRNG(99n)).generator.generate(...sequence);
      const second = createGenerator(record, new PRNG(99n)).generator.generate(...sequence);

      expect(second).toEqual(first);
    });
  });
});
