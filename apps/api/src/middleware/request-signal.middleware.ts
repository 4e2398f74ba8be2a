// =====================================================
// Request Signal Middleware
// =====================================================
// Attaches an AbortSignal to each request. It fires when the client
// goes away before the response is sent, or when the request outlives
// its timeout (reads and writes have separate budgets).

import { Request, Response, NextFunction } from 'express';

declare global {
  namespace Express {
    interface Request {
      signal: AbortSignal;
    }
  }
}

export interface RequestTimeouts {
  readTimeoutMs: number;
  writeTimeoutMs: number;
}

const READ_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export function requestSignalMiddleware(timeouts: RequestTimeouts) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    const timeoutMs = READ_METHODS.has(req.method) ? timeouts.readTimeoutMs : timeouts.writeTimeoutMs;

    const timer = setTimeout(() => controller.abort(), timeoutMs);
    timer.unref();

    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => {
      clearTimeout(timer);
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    req.signal = controller.signal;
    next();
  };
}
