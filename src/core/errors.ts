/**
 * Structured error codes and helpers for consistent API error responses
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - VALIDATION: Input validation errors
 * - PAYLOAD: Request body size errors
 * - SUMMARY: Summarization errors
 * - RESOURCE: Resource/service availability errors
 */

export const ErrorCode = {
  // Validation (400)
  VALIDATION_MISSING_FIELD: 'VALIDATION_MISSING_FIELD',
  VALIDATION_INVALID_FORMAT: 'VALIDATION_INVALID_FORMAT',
  VALIDATION_INVALID_OPTION: 'VALIDATION_INVALID_OPTION',

  // Payload (413)
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // Summary (500)
  SUMMARY_FAILED: 'SUMMARY_FAILED',

  // Resource (429)
  RESOURCE_RATE_LIMITED: 'RESOURCE_RATE_LIMITED',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Structured API error response
 */
export interface ApiError {
  error: string;
  code: ErrorCodeType;
  message?: string;
  details?: Record<string, unknown>;
}

export function createError(
  code: ErrorCodeType,
  error: string,
  options?: {
    message?: string;
    details?: Record<string, unknown>;
  }
): ApiError {
  return {
    error,
    code,
    ...(options?.message && { message: options.message }),
    ...(options?.details && { details: options.details }),
  };
}

/**
 * Common error responses
 */
export const Errors = {
  missingField: (field: string) =>
    createError(ErrorCode.VALIDATION_MISSING_FIELD, `${field} is required`, {
      details: { field },
    }),

  invalidOption: (field: string, validOptions: readonly string[]) =>
    createError(ErrorCode.VALIDATION_INVALID_OPTION, `Invalid ${field}. Must be one of: ${validOptions.join(', ')}`, {
      details: { field, valid_options: [...validOptions] },
    }),

  invalidFormat: (field: string, expected: string) =>
    createError(ErrorCode.VALIDATION_INVALID_FORMAT, `Invalid ${field}. ${expected}`, {
      details: { field, expected },
    }),

  payloadTooLarge: (limit: string) =>
    createError(ErrorCode.PAYLOAD_TOO_LARGE, `Request body exceeds ${limit}`, {
      details: { limit },
    }),

  summaryFailed: (message?: string, scanId?: string) =>
    createError(ErrorCode.SUMMARY_FAILED, 'Summarization failed', {
      message,
      details: scanId ? { scan_id: scanId } : undefined,
    }),

  rateLimited: () =>
    createError(ErrorCode.RESOURCE_RATE_LIMITED, 'Rate limit exceeded'),
} as const;

/**
 * Thrown by request parsers; the HTTP layer answers `status` with the carried body
 */
export class RequestValidationError extends Error {
  readonly apiError: ApiError;
  readonly status: number;

  constructor(apiError: ApiError, status = 400) {
    super(apiError.error);
    this.name = 'RequestValidationError';
    this.apiError = apiError;
    this.status = status;
  }
}
