/**
 * /api/pair endpoint implementation
 *
 * Fills one caller-supplied sequence pair. Unlike the batch endpoint there is
 * no resampling: if a verb link group cannot be filled the request fails
 * with VERB_PAIR_NOT_FOUND (422).
 */

import type { BatchService } from '../services/batch.service';
import {
  readBody,
  validateSeed,
  validateSequencePair,
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

/**
 * Handles POST /api/pair requests.
 */
export function handlePair(
  req: APIRequest,
  res: JsonResponse,
  batchService: Pick<BatchService, 'generatePair'>
): void {
  const requestId = createRequestId('pair');
  const { good, bad, seed } = readBody(req);

  const validation = [
    ...validateSequencePair(good, bad).errors,
    ...validateSeed(seed).errors,
  ];
  const firstError = validation[0];
  if (firstError) {
    const apiError = createAPIError(firstError.code, firstError.message, {
      field: firstError.field,
      errors: validation,
    });
    logError(
      apiError.message,
      extractErrorContext(req, requestId, 'pair'),
      apiError.code
    );
    return sendErrorResponse(res, apiError, apiError.code, requestId);
  }

  try {
    // Validation above guarantees both sequences are strings
    const pair = batchService.generatePair({
      good: String(good),
      bad: String(bad),
      seed: typeof seed === 'string' ? seed : undefined,
    });
    sendSuccessResponse(res, pair, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(
      error,
      extractErrorContext(req, requestId, 'pair', { good, bad }),
      apiError.code
    );
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}
