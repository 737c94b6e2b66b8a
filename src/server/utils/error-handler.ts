/**
 * Error handling utilities for the generation API.
 *
 * Provides centralized error handling with:
 * - Error classification (4xx vs 5xx)
 * - Mapping of generation errors to API errors
 * - Structured error logging with request context
 * - Request ID tracing for debugging
 */

import type { NextFunction, Request } from 'express';
import {
  APIErrorCode,
  createAPIError,
  sendErrorResponse,
  type APIError,
  type JsonResponse,
} from './response.formatter';
import {
  DataIntegrityError,
  VerbPairNotFoundError,
} from './generation.errors';

/**
 * The request fields the handlers read.
 */
export type APIRequest = Pick<Request, 'method' | 'path'> & { body?: unknown };

/**
 * Error context information for structured logging.
 */
export interface ErrorContext {
  /** Request ID for tracing */
  requestId?: string;
  method: string;
  path: string;
  /** Operation being performed */
  operation?: string;
  /** Additional context-specific data */
  metadata?: Record<string, unknown>;
  /** ISO timestamp when error occurred */
  timestamp: string;
}

export enum ErrorClass {
  /** Client errors (4xx) - validation, unfillable sequences, unknown routes */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) - data integrity, unexpected failures */
  SERVER_ERROR = 'SERVER_ERROR',
}

const CLIENT_ERROR_CODES: ReadonlySet<APIErrorCode> = new Set<APIErrorCode>([
  APIErrorCode.MISSING_PARAMETER,
  APIErrorCode.INVALID_TYPE,
  APIErrorCode.INVALID_COUNT,
  APIErrorCode.INVALID_SEQUENCE,
  APIErrorCode.INVALID_SEED,
  APIErrorCode.VERB_PAIR_NOT_FOUND,
  APIErrorCode.ROUTE_NOT_FOUND,
]);

export function classifyError(errorCode: APIErrorCode): ErrorClass {
  return CLIENT_ERROR_CODES.has(errorCode)
    ? ErrorClass.CLIENT_ERROR
    : ErrorClass.SERVER_ERROR;
}

/**
 * Generates a request ID of the form `<prefix>_<ms>_<random>`.
 */
export function createRequestId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Extracts error context from an Express request for structured logging.
 */
export function extractErrorContext(
  req: APIRequest,
  requestId?: string,
  operation?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  return {
    requestId,
    method: req.method,
    path: req.path,
    operation,
    metadata,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Maps an error thrown by the generation engine to an API error.
 *
 * - VerbPairNotFoundError → VERB_PAIR_NOT_FOUND (422)
 * - DataIntegrityError → INTERNAL_ERROR (the loaded data is at fault)
 * - malformed JSON body → INVALID_TYPE (400)
 * - anything else → INTERNAL_ERROR with a generic message
 */
export function toAPIError(error: unknown, requestId?: string): APIError {
  if (error instanceof VerbPairNotFoundError) {
    return createAPIError(APIErrorCode.VERB_PAIR_NOT_FOUND, error.message, {
      singularTag: error.singularTag,
      pluralTag: error.pluralTag,
      attempts: error.attempts,
    });
  }

  // express.json() rejects unparseable bodies with a SyntaxError carrying `body`
  if (error instanceof SyntaxError && 'body' in error) {
    return createAPIError(
      APIErrorCode.INVALID_TYPE,
      'Request body must be valid JSON',
      { expected: 'JSON object' }
    );
  }

  if (error instanceof DataIntegrityError) {
    return createAPIError(
      APIErrorCode.INTERNAL_ERROR,
      'Generator data is invalid',
      { requestId, source: error.source }
    );
  }

  return createAPIError(
    APIErrorCode.INTERNAL_ERROR,
    'An unexpected error occurred',
    { requestId, timestamp: Date.now() }
  );
}

/**
 * Logs an error with structured context.
 *
 * Client errors are expected and logged at info level; server errors are
 * logged at error level with their stack.
 */
export function logError(
  error: unknown,
  context: ErrorContext,
  errorCode: APIErrorCode
): void {
  const errorClass = classifyError(errorCode);
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;

  const logData = {
    errorCode,
    errorClass,
    message: errorMessage,
    context,
    ...(errorClass === ErrorClass.SERVER_ERROR && errorStack
      ? { stack: errorStack }
      : {}),
  };

  if (errorClass === ErrorClass.CLIENT_ERROR) {
    // eslint-disable-next-line no-console
    console.log('[CLIENT_ERROR]', JSON.stringify(logData));
  } else {
    // eslint-disable-next-line no-console
    console.error('[SERVER_ERROR]', JSON.stringify(logData));
  }
}

/**
 * Express error handling middleware, registered last. Catches errors thrown
 * by route handlers, logs them and sends a formatted error response.
 */
export function errorHandlingMiddleware(
  error: unknown,
  req: APIRequest,
  res: JsonResponse,
  // Express recognises error middleware by its four parameters
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void {
  const requestId = createRequestId('error');
  const context = extractErrorContext(req, requestId);
  const apiError = toAPIError(error, requestId);

  logError(error, context, apiError.code);
  sendErrorResponse(res, apiError, apiError.code, requestId);
}
