/**
 * Response formatter utility for the generation API.
 *
 * Provides standardized response formatting for:
 * - Success responses with data spread into the response root
 * - Error responses with structured error codes
 * - HTTP status code mapping for each error code
 * - Response timestamps and request tracing
 */

import { APIErrorCode as ValidationErrorCode } from '../validation/api.validation';

/**
 * Error codes raised outside input validation.
 */
export enum AdditionalAPIErrorCode {
  /** The sequences cannot be filled: no root-matched verb pair exists */
  VERB_PAIR_NOT_FOUND = 'VERB_PAIR_NOT_FOUND',
  /** No API route matches the method and path */
  ROUTE_NOT_FOUND = 'ROUTE_NOT_FOUND',
  /** Internal server error or unexpected failure */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const APIErrorCode = {
  MISSING_PARAMETER: ValidationErrorCode.MISSING_PARAMETER,
  INVALID_TYPE: ValidationErrorCode.INVALID_TYPE,
  INVALID_COUNT: ValidationErrorCode.INVALID_COUNT,
  INVALID_SEQUENCE: ValidationErrorCode.INVALID_SEQUENCE,
  INVALID_SEED: ValidationErrorCode.INVALID_SEED,
  VERB_PAIR_NOT_FOUND: AdditionalAPIErrorCode.VERB_PAIR_NOT_FOUND,
  ROUTE_NOT_FOUND: AdditionalAPIErrorCode.ROUTE_NOT_FOUND,
  INTERNAL_ERROR: AdditionalAPIErrorCode.INTERNAL_ERROR,
} as const;

export type APIErrorCode = ValidationErrorCode | AdditionalAPIErrorCode;

/**
 * Structured API error information.
 */
export interface APIError {
  /** Machine-readable error code for client handling */
  code: APIErrorCode;
  /** Human-readable error message */
  message: string;
  details?: {
    field?: string;
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

export interface ErrorResponseData {
  error: APIError;
  timestamp: number;
  requestId?: string;
}

/**
 * The part of an Express response the formatter writes to.
 */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export type SuccessResponse<T> = T & { timestamp: number; requestId?: string };

const ERROR_STATUS_MAP: Record<APIErrorCode, number> = {
  // 400 Bad Request - Client validation errors
  [APIErrorCode.MISSING_PARAMETER]: 400,
  [APIErrorCode.INVALID_TYPE]: 400,
  [APIErrorCode.INVALID_COUNT]: 400,
  [APIErrorCode.INVALID_SEQUENCE]: 400,
  [APIErrorCode.INVALID_SEED]: 400,

  // 404 Not Found
  [APIErrorCode.ROUTE_NOT_FOUND]: 404,

  // 422 Unprocessable - well-formed sequences the lexicon cannot fill
  [APIErrorCode.VERB_PAIR_NOT_FOUND]: 422,

  // 500 Internal Server Error
  [APIErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Formats a successful API response.
 *
 * @example
 * ```typescript
 * formatSuccessResponse({ generated: 3 }, 'generate_1');
 * // { generated: 3, timestamp: 1728950400000, requestId: 'generate_1' }
 * ```
 */
export function formatSuccessResponse<T extends object>(
  data: T,
  requestId?: string
): SuccessResponse<T> {
  const response: SuccessResponse<T> = {
    ...data,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * Formats an error API response.
 *
 * Accepts an APIError (used as-is), an Error or a string (wrapped with
 * `defaultCode`), or anything else (generic internal error).
 */
export function formatErrorResponse(
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): ErrorResponseData {
  let apiError: APIError;

  if (isAPIError(error)) {
    apiError = error;
  } else if (error instanceof Error) {
    apiError = {
      code: defaultCode,
      message: error.message || 'An unexpected error occurred',
    };
  } else if (typeof error === 'string') {
    apiError = {
      code: defaultCode,
      message: error || 'An unexpected error occurred',
    };
  } else {
    apiError = {
      code: APIErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    };
  }

  const response: ErrorResponseData = {
    error: apiError,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * HTTP status for an API error code (500 for unknown codes).
 */
export function getHttpStatusForError(errorCode: APIErrorCode): number {
  return ERROR_STATUS_MAP[errorCode] ?? 500;
}

const KNOWN_CODES = new Set<string>(Object.values(APIErrorCode));

function isAPIErrorCode(value: unknown): value is APIErrorCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

function isAPIError(error: unknown): error is APIError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    'message' in error &&
    isAPIErrorCode(error.code) &&
    typeof error.message === 'string'
  );
}

export function createAPIError(
  code: APIErrorCode,
  message: string,
  details?: APIError['details']
): APIError {
  const error: APIError = { code, message };

  if (details) {
    error.details = details;
  }

  return error;
}

export function sendSuccessResponse<T extends object>(
  res: JsonResponse,
  data: T,
  requestId?: string
): void {
  res.json(formatSuccessResponse(data, requestId));
}

/**
 * Formats an error, maps its status code and sends it.
 *
 * @example
 * ```typescript
 * sendErrorResponse(res, createAPIError(APIErrorCode.INVALID_COUNT, 'count must be an integer'));
 * // 400 with { error: { code: 'INVALID_COUNT', ... }, timestamp }
 * ```
 */
export function sendErrorResponse(
  res: JsonResponse,
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): void {
  const response = formatErrorResponse(error, defaultCode, requestId);
  const statusCode = getHttpStatusForError(response.error.code);

  res.status(statusCode).json(response);
}
