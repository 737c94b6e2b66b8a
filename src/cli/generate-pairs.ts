#!/usr/bin/env node
// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { createBatchService } from '../server/bootstrap';
import { loadConfig, MAX_PAIR_COUNT } from '../server/utils/config';
import type { GeneratedPair } from '../server/types/generation.types';

/**
 * Parses the optional count argument. Returns undefined when absent.
 *
 * @throws {Error} If the argument is not an integer in range
 */
export function parseCountArgument(arg: string | undefined): number | undefined {
  if (arg === undefined) return undefined;
  const count = Number(arg);
  if (!/^\d+$/.test(arg) || count < 1 || count > MAX_PAIR_COUNT) {
    throw new Error(
      `count must be an integer between 1 and ${MAX_PAIR_COUNT} (got "${arg}")`
    );
  }
  return count;
}

export function formatPair(pair: GeneratedPair, index: number): string {
  return [
    `Pair ${index + 1}:`,
    `Good: ${pair.good}`,
    `Bad: ${pair.bad}`,
    `Good Sequence: ${pair.goodSequence}`,
    `Bad Sequence: ${pair.badSequence}`,
    '',
  ].join('\n');
}

export function main(argv: readonly string[] = process.argv.slice(2)): number {
  try {
    const config = loadConfig();
    const count = parseCountArgument(argv[0]) ?? config.pairCount;
    const batchService = createBatchService(config);
    const result = batchService.generateBatch({ count });

    result.pairs.forEach((pair, index) => {
      process.stdout.write(`${formatPair(pair, index)}\n`);
    });
    process.stdout.write(
      `Generated ${result.generated} of ${result.requested} pairs (seed: ${result.seed})\n`
    );
    return 0;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(
      '✗ Generation failed:',
      error instanceof Error ? error.message : error
    );
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
