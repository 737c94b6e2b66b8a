/**
 * Builds the batch service from configuration: loads both data files and
 * wires the generator options. Shared by the HTTP server and the CLI.
 */

import { DataLoaderService } from './services/data-loader.service';
import { BatchService } from './services/batch.service';
import type { GeneratorConfig } from './utils/config';

export function createBatchService(
  config: GeneratorConfig,
  loader: DataLoaderService = new DataLoaderService()
): BatchService {
  const lexicon = loader.loadLexicon(config.lexiconPath);
  const sequences = loader.loadTagSequences(config.sequencesPath);

  return new BatchService(lexicon, sequences, {
    verbSuffixes: config.verbSuffixes,
    maxVerbPairAttempts: config.maxVerbPairAttempts,
    attemptsPerPair: config.attemptsPerPair,
    defaultSeed: config.seed,
  });
}
