/**
 * /api/generate endpoint implementation
 *
 * Generates a batch of unique minimal pairs from the loaded tag sequences:
 * 1. Validate `count` (optional, defaults to the configured pair count)
 * 2. Validate `seed` (optional; replaying a seed replays the batch)
 * 3. Run the batch and return pairs with the shortfall report
 */

import type { BatchService } from '../services/batch.service';
import {
  readBody,
  validatePairCount,
  validateSeed,
} from '../validation/api.validation';
import {
  sendSuccessResponse,
  sendErrorResponse,
  createAPIError,
  type JsonResponse,
} from '../utils/response.formatter';
import {
  createRequestId,
  extractErrorContext,
  logError,
  toAPIError,
  type APIRequest,
} from '../utils/error-handler';
import type { BatchResult } from '../types/generation.types';

/**
 * Request structure for /api/generate
 */
export interface GenerateRequest {
  /** Number of unique pairs wanted */
  count?: number;
  /** Seed phrase for a reproducible batch */
  seed?: string;
}

/**
 * Response structure for /api/generate (before timestamp/requestId)
 */
export type GenerateResponse = BatchResult;

/**
 * Handles POST /api/generate requests.
 *
 * @param defaultCount - Pair count used when the body has none
 */
export function handleGenerate(
  req: APIRequest,
  res: JsonResponse,
  batchService: Pick<BatchService, 'generateBatch'>,
  defaultCount: number
): void {
  const requestId = createRequestId('generate');
  const body = readBody(req);
  const { count, seed } = body;

  const validation = [
    ...validatePairCount(count).errors,
    ...validateSeed(seed).errors,
  ];
  const firstError = validation[0];
  if (firstError) {
    const apiError = createAPIError(firstError.code, firstError.message, {
      field: firstError.field,
      errors: validation,
    });
    logError(
      firstError.message,
      extractErrorContext(req, requestId, 'generate'),
      apiError.code
    );
    return sendErrorResponse(res, apiError, apiError.code, requestId);
  }

  try {
    const result: GenerateResponse = batchService.generateBatch({
      count: typeof count === 'number' ? count : defaultCount,
      seed: typeof seed === 'string' ? seed : undefined,
    });
    sendSuccessResponse(res, result, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(
      error,
      extractErrorContext(req, requestId, 'generate', { count, seed }),
      apiError.code
    );
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}
