// =====================================================
// Error Handling Middleware
// =====================================================
// Turns thrown errors into the standard ApiResponse envelope.

import { Request, Response, NextFunction } from 'express';
import { ApiResponse, ERROR_CODES } from '@rankline/shared-types';
import { AppError, InvalidInputError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ErrorHandlerOptions {
  /** Include stack traces and raw messages of unexpected errors */
  exposeDetails: boolean;
}

/**
 * body-parser rejects malformed JSON with an error carrying this type.
 */
function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

// 404 handler
export function notFoundHandler(req: Request, res: Response): void {
  const response: ApiResponse = {
    success: false,
    error: {
      code: ERROR_CODES.NOT_FOUND,
      message: 'The requested resource was not found',
    },
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };
  res.status(404).json(response);
}

// Global error handler
export function createErrorHandler(options: ErrorHandlerOptions) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const error = isBodyParseError(err) ? new InvalidInputError('Malformed JSON body') : err;

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error(`[HTTP] ${req.method} ${req.path} failed:`, error);
      } else {
        logger.warn(`[HTTP] ${req.method} ${req.path} rejected: ${error.message}`);
      }
    } else {
      logger.error('Unhandled error:', error);
    }

    const statusCode = error instanceof AppError ? error.statusCode : 500;
    const errorCode = error instanceof AppError ? error.code : ERROR_CODES.INTERNAL_ERROR;
    const message =
      error instanceof AppError
        ? error.message
        : options.exposeDetails && error instanceof Error
          ? error.message
          : 'An unexpected error occurred';

    const response: ApiResponse = {
      success: false,
      error: {
        code: errorCode,
        message,
        details: options.exposeDetails && error instanceof Error ? error.stack : undefined,
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };

    if (res.headersSent) {
      return;
    }
    res.status(statusCode).json(response);
  };
}
