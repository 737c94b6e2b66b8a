/**
 * Input validation module for the generation API.
 *
 * Provides validation for:
 * - Pair count (integer within the batch limit)
 * - Seed phrase (optional non-empty string)
 * - Tag sequences (non-empty, equal tag counts on both sides)
 * - Structured errors with machine-readable codes
 */

import { splitTags } from '../utils/tags';
import { MAX_PAIR_COUNT } from '../utils/config';

export const MIN_PAIR_COUNT = 1;

/**
 * Longest accepted seed phrase.
 */
export const MAX_SEED_LENGTH = 256;

/**
 * Enumeration of API validation error codes.
 */
export enum APIErrorCode {
  /** Required parameter is missing from the request */
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  /** Parameter has wrong type (e.g., string instead of number) */
  INVALID_TYPE = 'INVALID_TYPE',
  /** Pair count is not an integer in range */
  INVALID_COUNT = 'INVALID_COUNT',
  /** Tag sequence is empty or misaligned with its partner */
  INVALID_SEQUENCE = 'INVALID_SEQUENCE',
  /** Seed phrase is empty or too long */
  INVALID_SEED = 'INVALID_SEED',
}

/**
 * Detailed validation error information.
 */
export interface ValidationError {
  code: APIErrorCode;
  message: string;
  field: string;
  details?: {
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the parsed JSON body as a record, or an empty record when the body
 * is absent or not an object.
 */
export function readBody(req: { body?: unknown }): Record<string, unknown> {
  return isRecord(req.body) ? req.body : {};
}

function invalid(error: ValidationError): ValidationResult {
  return { isValid: false, errors: [error] };
}

function valid(): ValidationResult {
  return { isValid: true, errors: [] };
}

/**
 * Validates the number of pairs requested. Undefined is accepted: the
 * configured default applies.
 *
 * @example
 * ```typescript
 * validatePairCount(120).isValid;  // true
 * validatePairCount(0).isValid;    // false (INVALID_COUNT)
 * validatePairCount('5').isValid;  // false (INVALID_TYPE)
 * ```
 */
export function validatePairCount(
  count: unknown,
  fieldName: string = 'count'
): ValidationResult {
  if (count === undefined) {
    return valid();
  }

  if (typeof count !== 'number') {
    return invalid({
      code: APIErrorCode.INVALID_TYPE,
      message: `${fieldName} must be a number`,
      field: fieldName,
      details: { expected: 'integer', received: typeof count },
    });
  }

  if (!Number.isInteger(count) || count < MIN_PAIR_COUNT || count > MAX_PAIR_COUNT) {
    return invalid({
      code: APIErrorCode.INVALID_COUNT,
      message: `${fieldName} must be an integer between ${MIN_PAIR_COUNT} and ${MAX_PAIR_COUNT}`,
      field: fieldName,
      details: {
        expected: `integer in [${MIN_PAIR_COUNT}, ${MAX_PAIR_COUNT}]`,
        received: count,
      },
    });
  }

  return valid();
}

/**
 * Validates an optional seed phrase.
 */
export function validateSeed(
  seed: unknown,
  fieldName: string = 'seed'
): ValidationResult {
  if (seed === undefined) {
    return valid();
  }

  if (typeof seed !== 'string') {
    return invalid({
      code: APIErrorCode.INVALID_TYPE,
      message: `${fieldName} must be a string`,
      field: fieldName,
      details: { expected: 'string', received: typeof seed },
    });
  }

  if (seed.trim().length === 0 || seed.length > MAX_SEED_LENGTH) {
    return invalid({
      code: APIErrorCode.INVALID_SEED,
      message: `${fieldName} must be a non-empty string of at most ${MAX_SEED_LENGTH} characters`,
      field: fieldName,
      details: { received: seed.length },
    });
  }

  return valid();
}

/**
 * Validates a single whitespace-separated tag sequence.
 */
export function validateTagSequence(
  sequence: unknown,
  fieldName: string
): ValidationResult {
  if (sequence === undefined || sequence === null) {
    return invalid({
      code: APIErrorCode.MISSING_PARAMETER,
      message: `${fieldName} is required`,
      field: fieldName,
      details: { expected: 'whitespace-separated tags', received: sequence },
    });
  }

  if (typeof sequence !== 'string') {
    return invalid({
      code: APIErrorCode.INVALID_TYPE,
      message: `${fieldName} must be a string`,
      field: fieldName,
      details: { expected: 'string', received: typeof sequence },
    });
  }

  if (splitTags(sequence).length === 0) {
    return invalid({
      code: APIErrorCode.INVALID_SEQUENCE,
      message: `${fieldName} must contain at least one tag`,
      field: fieldName,
      details: { received: sequence },
    });
  }

  return valid();
}

/**
 * Validates a (good, bad) sequence pair: both present and aligned.
 *
 * @example
 * ```typescript
 * validateSequencePair('DET NOUN', 'DET NOUN VERB').errors[0].code;
 * // 'INVALID_SEQUENCE'
 * ```
 */
export function validateSequencePair(
  good: unknown,
  bad: unknown
): ValidationResult {
  const errors = [
    ...validateTagSequence(good, 'good').errors,
    ...validateTagSequence(bad, 'bad').errors,
  ];
  if (errors.length > 0) {
    return { isValid: false, errors };
  }

  const goodLength = splitTags(String(good)).length;
  const badLength = splitTags(String(bad)).length;
  if (goodLength !== badLength) {
    return invalid({
      code: APIErrorCode.INVALID_SEQUENCE,
      message: 'good and bad sequences must have the same number of tags',
      field: 'bad',
      details: { expected: `${goodLength} tags`, received: badLength },
    });
  }

  return valid();
}
