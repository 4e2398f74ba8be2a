// =====================================================
// Response Helpers
// =====================================================

import { Request, Response } from 'express';
import { ApiResponse } from '@rankline/shared-types';

/**
 * Writes the success envelope. `degraded` lists best-effort steps
 * that failed while the request itself succeeded.
 */
export function sendSuccess<T>(
  req: Request,
  res: Response,
  data: T,
  statusCode = 200,
  degraded?: string[]
): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
      ...(degraded && degraded.length > 0 ? { degraded } : {}),
    },
  };
  res.status(statusCode).json(response);
}
