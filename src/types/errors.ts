/**
 * Error Codes for the budget ledger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Budget denials (expected outcomes callers branch on)
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_TOKEN_AMOUNT = 2002,

  // Budget denials (3xxx)
  INSUFFICIENT_BUDGET = 3001,
  COST_EXCEEDS_MAXIMUM = 3002,
  NO_SUCH_RESERVATION = 3003,
  DUPLICATE_SETTLEMENT = 3004,
  MESSAGE_NOT_FOUND = 3005,
  RESOURCE_NOT_FOUND = 3006,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  STORAGE_UNAVAILABLE = 5002,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_TOKEN_AMOUNT]: 400,

  // Budget denials -> 400/402/404/409
  [ErrorCode.INSUFFICIENT_BUDGET]: 402,
  [ErrorCode.COST_EXCEEDS_MAXIMUM]: 400,
  [ErrorCode.NO_SUCH_RESERVATION]: 404,
  [ErrorCode.DUPLICATE_SETTLEMENT]: 409,
  [ErrorCode.MESSAGE_NOT_FOUND]: 404,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.STORAGE_UNAVAILABLE]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    correlationId?: string;
  };
}

