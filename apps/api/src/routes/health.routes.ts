// =====================================================
// Health Check Routes
// =====================================================

import { Router, Request, Response } from 'express';
import { ApiResponse, HealthResponse } from '@rankline/shared-types';
import { LeaderboardService } from '../modules/leaderboard/leaderboard.service';

export function createHealthRouter(service: LeaderboardService): Router {
  const router: Router = Router();

  // GET /health
  // Always 200; a failing store is reported, not escalated
  router.get('/', async (req: Request, res: Response) => {
    const [durableUp, rankingUp] = await Promise.all([
      service.checkDurableHealth({ signal: req.signal }),
      service.checkRankingHealth({ signal: req.signal }),
    ]);

    const healthStatus: HealthResponse = {
      status: durableUp && rankingUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        durable: durableUp ? 'healthy' : 'unhealthy',
        ranking: rankingUp ? 'healthy' : 'unhealthy',
      },
    };

    const response: ApiResponse<HealthResponse> = {
      success: true,
      data: healthStatus,
    };

    res.json(response);
  });

  // GET /health/ready (Kubernetes readiness probe)
  // Writes cannot succeed without the system of record
  router.get('/ready', async (req: Request, res: Response) => {
    const ready = await service.checkDurableHealth({ signal: req.signal });
    res.status(ready ? 200 : 503).json({ ready });
  });

  // GET /health/live (Kubernetes liveness probe)
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ alive: true });
  });

  return router;
}
