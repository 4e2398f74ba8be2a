// =====================================================
// Request ID Middleware
// =====================================================
// Generates or propagates a unique request ID for each request.
// Uses x-request-id header if provided, otherwise generates a UUID.

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId =
    typeof header === 'string' && header.length > 0 && header.length <= MAX_REQUEST_ID_LENGTH
      ? header
      : randomUUID();

  req.id = requestId;
  res.setHeader('x-request-id', requestId);

  next();
}
