/**
 * Application error classes
 * Every failure a tool reports carries a stable code and a retry hint
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'UNSUPPORTED_OPERATION'
  | 'MISSING_OR_INVALID_PARAMETER'
  | 'QUERY_EXECUTION_ERROR'
  | 'DECODE_ERROR'
  | 'CURSOR_ERROR'
  | 'CANCELLED'
  | 'TIMEOUT_ERROR'
  | 'INTERNAL_ERROR';

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    retryable: boolean;
    details?: ErrorDetail[];
    correlationId?: string;
  };
}

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly retryable: boolean,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(correlationId?: string): ErrorResponse {
    return {
      error: {
        code: this.code,
        message: this.message,
        retryable: this.retryable,
        details: this.details,
        correlationId,
      },
    };
  }
}

/**
 * Unknown source, incompatible source, or malformed tool configuration.
 * Raised once while binding a tool.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super('CONFIGURATION_ERROR', message, false, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Bad, missing or unknown parameter
 */
export class ValidationError extends AppError {
  constructor(message: string, public readonly parameter?: string) {
    super(
      'VALIDATION_ERROR',
      message,
      false,
      parameter ? [{ field: parameter, message }] : undefined
    );
    this.name = 'ValidationError';
  }
}

/**
 * Caller has not proven any of the tool's required auth services
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, false);
    this.name = 'UnauthorizedError';
  }
}

/**
 * Tool doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super('NOT_FOUND', `${resource} not found`, false);
    this.name = 'NotFoundError';
  }
}

/**
 * Unknown operation kind, or an operation that is declared but not executable
 */
export class UnsupportedOperationError extends AppError {
  constructor(message: string, public readonly operation: string) {
    super('UNSUPPORTED_OPERATION', message, false);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * An operation-specific parameter is absent or has the wrong shape
 */
export class MissingOrInvalidParameterError extends AppError {
  constructor(public readonly parameter: string, reason: string) {
    super(
      'MISSING_OR_INVALID_PARAMETER',
      `${reason}: "${parameter}"`,
      false,
      [{ field: parameter, message: reason }]
    );
    this.name = 'MissingOrInvalidParameterError';
  }
}

/**
 * The store rejected the filter or pipeline
 */
export class QueryExecutionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('QUERY_EXECUTION_ERROR', message, true, undefined, { cause });
    this.name = 'QueryExecutionError';
  }
}

/**
 * A streamed item is not a document
 */
export class DecodeError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('DECODE_ERROR', message, false, undefined, { cause });
    this.name = 'DecodeError';
  }
}

/**
 * The result stream terminated abnormally
 */
export class CursorError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CURSOR_ERROR', message, true, undefined, { cause });
    this.name = 'CursorError';
  }
}

/**
 * Caller aborted the invocation
 */
export class CancelledError extends AppError {
  constructor(message = 'Invocation cancelled', cause?: unknown) {
    super('CANCELLED', message, false, undefined, { cause });
    this.name = 'CancelledError';
  }
}

/**
 * Invocation exceeded its deadline
 */
export class TimeoutError extends AppError {
  constructor(message = 'Invocation timed out') {
    super('TIMEOUT_ERROR', message, true);
    this.name = 'TimeoutError';
  }
}

/**
 * Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal error', cause?: unknown) {
    super('INTERNAL_ERROR', message, false, undefined, { cause });
    this.name = 'InternalError';
  }
}

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
