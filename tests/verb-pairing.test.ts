/**
 * Verb Pairing Service Tests
 *
 * Root matching between singular and plural verb forms: the bad sentence
 * must carry the same verb as the good one, differently inflected.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  ITALIAN_VERB_SUFFIXES,
  SuffixMorphology,
  VerbPairingService,
  type MorphologyStrategy,
} from '../src/server/services/verb-pairing.service';
import { LexiconIndex } from '../src/server/services/lexicon.service';
import { PRNG, type RandomSource } from '../src/server/services/prng.service';
import { ScriptedRandom } from './helpers/scripted-random';

/** Visits singulars in reverse order. */
class ReversingRandom implements RandomSource {
  choice<T>(items: readonly T[]): T {
    return items[0];
  }

  shuffle<T>(items: readonly T[]): T[] {
    return [...items].reverse();
  }
}

describe('SuffixMorphology', () => {
  const morphology = new SuffixMorphology(ITALIAN_VERB_SUFFIXES);

  it('should strip third-person endings to a shared root', () => {
    expect(morphology.root('corre')).toBe('corr');
    expect(morphology.root('corrono')).toBe('corr');
    expect(morphology.root('parla')).toBe('parl');
    expect(morphology.root('parlano')).toBe('parl');
  });

  it('should try longer suffixes first', () => {
    // 'a' would leave 'parlan'
    expect(morphology.root('parlano')).toBe('parl');
  });

  it('should leave a word without a listed suffix unchanged', () => {
    expect(morphology.root('bevi')).toBe('bevi');
  });

  it('should be idempotent on ordinary stems', () => {
    for (const verb of ['corre', 'corrono', 'dorme', 'dormono', 'legge', 'leggono']) {
      const root = morphology.root(verb);
      expect(morphology.root(root)).toBe(root);
    }
  });

  it('should strip only one suffix', () => {
    expect(morphology.root('parlae')).toBe('parla');
  });

  it('should not be idempotent on a stem ending in a listed suffix', () => {
    expect(morphology.root('crea')).toBe('cre');
    expect(morphology.root('cre')).toBe('cr');
  });

  it('should accept a custom suffix list and ignore empty suffixes', () => {
    const english = new SuffixMorphology(['s', '', 'es']);

    expect(english.root('boxes')).toBe('box');
    expect(english.root('runs')).toBe('run');
    expect(english.root('run')).toBe('run');
  });
});

describe('VerbPairingService', () => {
  const morphology = new SuffixMorphology();

  const createLexicon = (): LexiconIndex =>
    LexiconIndex.fromRecord({
      VERB_SING: ['corre', 'dorme'],
      VERB_PL: ['dormono', 'corrono'],
      EMPTY: [],
    });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.DEBUG_GENERATION;
  });

  it('should pair a singular with the plural of the same verb', () => {
    const service = new VerbPairingService(
      createLexicon(),
      morphology,
      new ScriptedRandom()
    );

    expect(service.findMatchingPair('VERB_SING', 'VERB_PL')).toEqual({
      singular: 'corre',
      plural: 'corrono',
    });
  });

  it('should follow the shuffled order of singulars', () => {
    const service = new VerbPairingService(
      createLexicon(),
      morphology,
      new ReversingRandom()
    );

    expect(service.findMatchingPair('VERB_SING', 'VERB_PL')).toEqual({
      singular: 'dorme',
      plural: 'dormono',
    });
  });

  it('should never pair forms of different verbs', () => {
    const lexicon = createLexicon();
    const allowed = [
      { singular: 'corre', plural: 'corrono' },
      { singular: 'dorme', plural: 'dormono' },
    ];

    for (let seed = 0n; seed < 40n; seed++) {
      const service = new VerbPairingService(lexicon, morphology, new PRNG(seed));
      expect(allowed).toContainEqual(service.findMatchingPair('VERB_SING', 'VERB_PL'));
    }
  });

  it('should skip singulars without a plural and keep looking', () => {
    const lexicon = LexiconIndex.fromRecord({
      VERB_SING: ['ride', 'corre'],
      VERB_PL: ['corrono'],
    });
    const service = new VerbPairingService(lexicon, morphology, new ScriptedRandom());

    expect(service.findMatchingPair('VERB_SING', 'VERB_PL')).toEqual({
      singular: 'corre',
      plural: 'corrono',
    });
  });

  it('should choose among several matching plurals', () => {
    const lexicon = LexiconIndex.fromRecord({
      VERB_SING: ['parla'],
      VERB_PL: ['parlano', 'parlono'],
    });
    const random = new ScriptedRandom(length => length - 1);
    const service = new VerbPairingService(lexicon, morphology, random);

    expect(service.findMatchingPair('VERB_SING', 'VERB_PL')).toEqual({
      singular: 'parla',
      plural: 'parlono',
    });
    expect(random.choices).toEqual([['parlano', 'parlono']]);
  });

  it('should return null when no root matches', () => {
    const lexicon = LexiconIndex.fromRecord({
      VERB_SING: ['corre'],
      VERB_PL: ['dormono'],
    });
    const service = new VerbPairingService(lexicon, morphology, new ScriptedRandom());

    expect(service.findMatchingPair('VERB_SING', 'VERB_PL')).toBeNull();
  });

  it('should return null for missing or empty tags', () => {
    const service = new VerbPairingService(
      createLexicon(),
      morphology,
      new ScriptedRandom()
    );

    expect(service.findMatchingPair('VERB_SING', 'VERB_MISSING')).toBeNull();
    expect(service.findMatchingPair('VERB_MISSING', 'VERB_PL')).toBeNull();
    expect(service.findMatchingPair('EMPTY', 'VERB_PL')).toBeNull();
  });

  it('should not reorder the lexicon', () => {
    const lexicon = createLexicon();
    const service = new VerbPairingService(lexicon, morphology, new PRNG(3n));

    for (let i = 0; i < 10; i++) {
      service.findMatchingPair('VERB_SING', 'VERB_PL');
    }

    expect(lexicon.words('VERB_SING')).toEqual(['corre', 'dorme']);
    expect(lexicon.words('VERB_PL')).toEqual(['dormono', 'corrono']);
  });

  it('should use a pluggable morphology', () => {
    const firstLetter: MorphologyStrategy = { root: word => word.charAt(0) };
    const lexicon = LexiconIndex.fromRecord({
      SG: ['walks'],
      PL: ['talk', 'walk'],
    });
    const service = new VerbPairingService(lexicon, firstLetter, new ScriptedRandom());

    expect(service.findMatchingPair('SG', 'PL')).toEqual({
      singular: 'walks',
      plural: 'walk',
    });
  });

  it('should log the match when debug is enabled', () => {
    process.env.DEBUG_GENERATION = 'true';
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const service = new VerbPairingService(
      createLexicon(),
      morphology,
      new ScriptedRandom()
    );

    service.findMatchingPair('VERB_SING', 'VERB_PL');

    const record: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(record).toMatchObject({
      debug: 'findMatchingPair',
      root: 'corr',
      singular: 'corre',
      plural: 'corrono',
      matchesCount: 1,
    });
  });
});
