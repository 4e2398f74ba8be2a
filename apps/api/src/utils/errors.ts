// =====================================================
// Custom Error Classes
// =====================================================

import { ErrorCode, ERROR_CODES, DegradedOperation } from '@rankline/shared-types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    isOperational: boolean = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
    super(message, 400, code);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.NOT_FOUND) {
    super(message, 404, code);
  }
}

// ===========================================
// Leaderboard Errors
// ===========================================

/**
 * Thrown for arguments that can never succeed: empty or over-long
 * player ids, zero deltas, non-positive N or window sizes.
 */
export class InvalidInputError extends BadRequestError {
  constructor(message: string) {
    super(message, ERROR_CODES.VALIDATION_ERROR);
    this.name = 'InvalidInputError';
  }
}

/**
 * The player is absent from the queried store. An expected outcome,
 * not a fault.
 */
export class PlayerNotFoundError extends NotFoundError {
  public readonly playerId: string;

  constructor(playerId: string) {
    super(`Player ${playerId} is not ranked`, ERROR_CODES.PLAYER_NOT_FOUND);
    this.playerId = playerId;
    this.name = 'PlayerNotFoundError';
  }
}

export type StoreName = 'durable' | 'ranking';

/**
 * Transport or driver failure talking to one of the two stores.
 */
export class StoreUnavailableError extends AppError {
  public readonly store: StoreName;
  public readonly originalError?: Error;

  constructor(store: StoreName, operation: string, originalError?: unknown) {
    const cause = originalError instanceof Error ? originalError : undefined;
    super(
      `${store} store unavailable during ${operation}${cause ? `: ${cause.message}` : ''}`,
      503,
      ERROR_CODES.STORE_UNAVAILABLE
    );
    this.store = store;
    this.originalError = cause;
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A non-authoritative step failed while the authoritative one committed.
 * Logged, never thrown to callers.
 */
export class DegradedError extends AppError {
  public readonly operation: DegradedOperation;
  public readonly playerId: string;
  public readonly originalError?: Error;

  constructor(operation: DegradedOperation, playerId: string, originalError?: unknown) {
    const cause = originalError instanceof Error ? originalError : undefined;
    super(
      `${operation} failed for player ${playerId}${cause ? `: ${cause.message}` : ''}`,
      500,
      ERROR_CODES.STORE_DEGRADED
    );
    this.operation = operation;
    this.playerId = playerId;
    this.originalError = cause;
    this.name = 'DegradedError';
  }
}

/**
 * The caller's AbortSignal fired before the store call settled.
 */
export class OperationCancelledError extends AppError {
  constructor(operation: string) {
    super(`Operation ${operation} was cancelled`, 408, ERROR_CODES.REQUEST_CANCELLED);
    this.name = 'OperationCancelledError';
  }
}
