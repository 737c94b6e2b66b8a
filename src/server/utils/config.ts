/**
 * Environment configuration for the server and the CLI.
 *
 * Values come from process.env (populated from .env by dotenv at the entry
 * points). Invalid values throw ConfigurationError; entry points treat that
 * as fatal.
 */

import { ConfigurationError } from './generation.errors';
import { ITALIAN_VERB_SUFFIXES } from '../services/verb-pairing.service';
import { DEFAULT_MAX_VERB_PAIR_ATTEMPTS } from '../services/pair-generator.service';

export const DEFAULT_LEXICON_PATH = 'data/lexicon.csv';
export const DEFAULT_SEQUENCES_PATH = 'data/tag-sequences.csv';
export const DEFAULT_PAIR_COUNT = 120;
export const MAX_PAIR_COUNT = 1000;
export const DEFAULT_ATTEMPTS_PER_PAIR = 10;
export const DEFAULT_PORT = 3000;

export interface GeneratorConfig {
  lexiconPath: string;
  sequencesPath: string;
  pairCount: number;
  seed?: string;
  verbSuffixes: readonly string[];
  maxVerbPairAttempts: number;
  attemptsPerPair: number;
  port: number;
}

function readString(
  env: NodeJS.ProcessEnv,
  name: string
): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim().length === 0) return undefined;
  return value.trim();
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value < min || value > max) {
    throw new ConfigurationError(
      `${name} must be an integer between ${min} and ${max} (got "${raw}")`,
      name
    );
  }
  return value;
}

/**
 * Reads generator settings from the environment.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigurationError} If a value is present but invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig({ PAIR_COUNT: '40', GENERATION_SEED: 'test-seed' });
 * config.pairCount; // 40
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): GeneratorConfig {
  const suffixes = readString(env, 'VERB_SUFFIXES');
  const verbSuffixes =
    suffixes === undefined
      ? ITALIAN_VERB_SUFFIXES
      : suffixes
          .split(',')
          .map(suffix => suffix.trim())
          .filter(suffix => suffix.length > 0);

  if (verbSuffixes.length === 0) {
    throw new ConfigurationError(
      'VERB_SUFFIXES must list at least one suffix (comma-separated)',
      'VERB_SUFFIXES'
    );
  }

  return {
    lexiconPath: readString(env, 'LEXICON_PATH') ?? DEFAULT_LEXICON_PATH,
    sequencesPath: readString(env, 'SEQUENCES_PATH') ?? DEFAULT_SEQUENCES_PATH,
    pairCount: readInteger(env, 'PAIR_COUNT', DEFAULT_PAIR_COUNT, 1, MAX_PAIR_COUNT),
    seed: readString(env, 'GENERATION_SEED'),
    verbSuffixes,
    maxVerbPairAttempts: readInteger(
      env,
      'MAX_VERB_PAIR_ATTEMPTS',
      DEFAULT_MAX_VERB_PAIR_ATTEMPTS,
      1,
      10000
    ),
    attemptsPerPair: readInteger(
      env,
      'ATTEMPTS_PER_PAIR',
      DEFAULT_ATTEMPTS_PER_PAIR,
      1,
      1000
    ),
    port: readInteger(env, 'PORT', DEFAULT_PORT, 1, 65535),
  };
}
