/**
 * Error types raised by the generation engine.
 *
 * - DataIntegrityError: the lexicon or sequence data cannot be used. Fatal for a batch.
 * - VerbPairNotFoundError: no root-matched verb pair exists for a link group.
 *   The batch loop discards the attempt and samples another sequence pair.
 * - ConfigurationError: an environment setting is missing or out of range.
 */

export class DataIntegrityError extends Error {
  constructor(
    message: string,
    readonly source?: string
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export class VerbPairNotFoundError extends Error {
  constructor(
    readonly singularTag: string,
    readonly pluralTag: string,
    readonly attempts: number
  ) {
    super(
      `Could not find matching verb pair for ${singularTag}/${pluralTag} after ${attempts} attempts`
    );
    this.name = 'VerbPairNotFoundError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
