// Standardized error handling utilities for the HTTP layer

export enum ErrorCode {
  INTERNAL_ERROR = 'internal_error',
  RATE_LIMITED = 'rate_limited',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static rateLimited(retryAfter: number, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  static from(error: unknown): AppError {
    if (error instanceof AppError) return error;
    return AppError.internal(error instanceof Error ? error.message : String(error));
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  retry_after_seconds?: number;
}

function hasRetryAfter(details: unknown): details is { retryAfter: number } {
  return typeof details === 'object' && details !== null && 'retryAfter' in details
    && typeof details.retryAfter === 'number';
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  if (error.code === ErrorCode.RATE_LIMITED && hasRetryAfter(error.details)) {
    response.retry_after_seconds = error.details.retryAfter;
  }

  return response;
}
