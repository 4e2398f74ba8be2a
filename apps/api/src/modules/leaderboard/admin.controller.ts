// =====================================================
// Leaderboard Admin Controller
// =====================================================
// Operational endpoints: rebuild, cache control and reads from the
// system of record. Expected to sit behind an internal network boundary.

import { Router, Request, Response, NextFunction } from 'express';
import { parseRequest } from '../../middleware/validation.middleware';
import { sendSuccess } from '../../utils/response';
import { createTopNParamsSchema, rebuildQuerySchema } from './leaderboard.schemas';
import { LeaderboardService } from './leaderboard.service';

export function createAdminRouter(service: LeaderboardService, limits: { maxTopN: number }): Router {
  const router = Router();
  const topNParamsSchema = createTopNParamsSchema(limits.maxTopN);

  /**
   * POST /api/v1/admin/rebuild
   * Re-project every durable player into the ranking store.
   * Query: clearCache=true also drops the local cache afterwards.
   */
  router.post('/rebuild', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { clearCache } = parseRequest(rebuildQuerySchema, req.query);
      const result = await service.rebuildLeaderboard({ clearCache, signal: req.signal });

      sendSuccess(req, res, result);
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/admin/cache/stats
  router.get('/cache/stats', (req: Request, res: Response) => {
    sendSuccess(req, res, service.getCacheStats());
  });

  // DELETE /api/v1/admin/cache
  router.delete('/cache', (req: Request, res: Response) => {
    service.clearCache();
    sendSuccess(req, res, service.getCacheStats());
  });

  // GET /api/v1/admin/players/top/:n
  router.get('/players/top/:n', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { n } = parseRequest(topNParamsSchema, req.params);
      const players = await service.getDurableTopN(n, { signal: req.signal });

      sendSuccess(req, res, { count: players.length, players });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/admin/snapshots/latest
  router.get('/snapshots/latest', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      // data is null until the first snapshot has been taken
      const snapshot = await service.getLatestSnapshot({ signal: req.signal });
      sendSuccess(req, res, snapshot);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
