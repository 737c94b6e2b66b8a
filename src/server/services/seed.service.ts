/**
 * Seed Service for Reproducible Batches
 *
 * Turns a caller-supplied seed phrase into the 64-bit seed the PRNG needs,
 * or mints a fresh one when no phrase is given. The phrase (or the minted
 * hex) is echoed back in batch results so any batch can be replayed.
 *
 * Seed Flow:
 * 1. No phrase: 8 random bytes as hex become the phrase
 * 2. SHA-256(phrase) as hex
 * 3. PRNG seed: first 64 bits of the digest as BigInt
 */

import crypto from 'crypto';

const HASH_ALGORITHM = 'sha256';
const SEED_ENCODING = 'hex';
const SEED_TO_INT64_CHARS = 16;
const RANDOM_SEED_BYTES = 8;

/**
 * A resolved seed: the label to report and the PRNG seed derived from it.
 */
export interface ResolvedSeed {
  label: string;
  value: bigint;
}

export class SeedService {
  /**
   * Hashes a seed phrase to a 64-character hex string.
   *
   * @throws {Error} If phrase is empty
   *
   * @example
   * ```typescript
   * seedService.hashPhrase('test-seed') === seedService.hashPhrase('test-seed'); // true
   * ```
   */
  hashPhrase(phrase: string): string {
    if (!phrase || phrase.trim().length === 0) {
      throw new Error('seed phrase must be a non-empty string');
    }

    return crypto
      .createHash(HASH_ALGORITHM)
      .update(phrase)
      .digest(SEED_ENCODING);
  }

  /**
   * Converts the first 64 bits of a hex seed to a BigInt.
   *
   * @throws {Error} If seedHex is shorter than 16 characters or not hex
   */
  seedToInt64(seedHex: string): bigint {
    if (seedHex.length < SEED_TO_INT64_CHARS) {
      throw new Error(
        `seedHex must be at least ${SEED_TO_INT64_CHARS} characters long`
      );
    }

    const hexSubstring = seedHex.substring(0, SEED_TO_INT64_CHARS);
    if (!/^[0-9a-fA-F]+$/.test(hexSubstring)) {
      throw new Error('seedHex must be a hexadecimal string');
    }

    return BigInt('0x' + hexSubstring);
  }

  /**
   * Resolves the seed for a batch. A phrase always maps to the same seed;
   * without one a random hex phrase is minted, so passing the returned
   * label back in replays the batch.
   */
  resolve(phrase?: string): ResolvedSeed {
    const label =
      phrase ?? crypto.randomBytes(RANDOM_SEED_BYTES).toString(SEED_ENCODING);
    return { label, value: this.seedToInt64(this.hashPhrase(label)) };
  }
}
