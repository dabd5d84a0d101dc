/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { RecordFormatError, StorageUnavailableError } from '../store/store.types';
import { BudgetDenial, BudgetDenialKind } from '../types/ledger';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  details?: Record<string, unknown>;
}

const denialToErrorCode: Record<BudgetDenialKind, ErrorCode> = {
  INSUFFICIENT_BUDGET: ErrorCode.INSUFFICIENT_BUDGET,
  COST_EXCEEDS_MAXIMUM: ErrorCode.COST_EXCEEDS_MAXIMUM,
  NO_SUCH_RESERVATION: ErrorCode.NO_SUCH_RESERVATION,
  DUPLICATE_SETTLEMENT: ErrorCode.DUPLICATE_SETTLEMENT,
};

/**
 * Fatal storage failures surface as 503 rather than a generic 500
 */
const normalizeError = (err: Error): AppError => {
  if (err instanceof StorageUnavailableError) {
    return ApiError.storageUnavailable(err.message);
  }
  if (err instanceof RecordFormatError) {
    return ApiError.internal(err.message);
  }
  return err;
};

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const err = normalizeError(error);
  const correlationId = getCorrelationId() || 'unknown';

  // Determine error code and status
  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  // Denials and validation failures are expected outcomes
  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500 && errorCode !== ErrorCode.STORAGE_UNAVAILABLE
      ? 'Internal server error'
      : err.message || 'An error occurred';

  // Build error response
  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.details) {
    response.error.details = err.details;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  details?: Record<string, unknown>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      details?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.details = options?.details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      details: validationErrors,
    });
  }

  static invalidTokenAmount(field: string, value: unknown): ApiError {
    return new ApiError(
      ErrorCode.INVALID_TOKEN_AMOUNT,
      `${field} must be a non-negative integer, got ${String(value)}`
    );
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      message: ErrorCode.MESSAGE_NOT_FOUND,
      reservation: ErrorCode.NO_SUCH_RESERVATION,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  /**
   * HTTP form of an expected budget denial; the denial fields become details
   */
  static fromDenial(denial: BudgetDenial): ApiError {
    const { kind, message, ...details } = denial;
    return new ApiError(denialToErrorCode[kind], message, {
      details: { kind, ...details },
    });
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static storageUnavailable(message = 'Storage unavailable'): ApiError {
    return new ApiError(ErrorCode.STORAGE_UNAVAILABLE, message);
  }
}

