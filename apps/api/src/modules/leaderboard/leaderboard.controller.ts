// =====================================================
// Leaderboard Controller
// =====================================================
// HTTP layer for leaderboard endpoints.
// Handles request validation and response formatting.

import { Router, Request, Response, NextFunction } from 'express';
import { RankRangeResponse, ScoreUpdateResult, TopNResponse } from '@rankline/shared-types';
import { parseRequest } from '../../middleware/validation.middleware';
import { sendSuccess } from '../../utils/response';
import {
  createRangeQuerySchema,
  createTopNParamsSchema,
  historyQuerySchema,
  playerParamsSchema,
  updateScoreSchema,
} from './leaderboard.schemas';
import { LeaderboardService } from './leaderboard.service';

export interface LeaderboardRouteLimits {
  maxTopN: number;
  maxRangeWindow: number;
}

export function createLeaderboardRouter(service: LeaderboardService, limits: LeaderboardRouteLimits): Router {
  const router = Router();
  const topNParamsSchema = createTopNParamsSchema(limits.maxTopN);
  const rangeQuerySchema = createRangeQuerySchema(limits.maxRangeWindow);

  // ===========================================
  // POST /api/v1/leaderboard/scores
  // Apply a score delta to a player
  // ===========================================

  router.post('/scores', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseRequest(updateScoreSchema, req.body);
      const result = await service.updateScore(body, { signal: req.signal });

      sendSuccess<ScoreUpdateResult>(req, res, result, 200, result.degraded);
    } catch (error) {
      next(error);
    }
  });

  // ===========================================
  // GET /api/v1/leaderboard/top/:n
  // ===========================================

  router.get('/top/:n', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { n } = parseRequest(topNParamsSchema, req.params);
      const rankings = await service.getTopN(n, { signal: req.signal });

      sendSuccess<TopNResponse>(req, res, { count: rankings.length, rankings });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================
  // GET /api/v1/leaderboard/players/:playerId/rank
  // ===========================================

  router.get('/players/:playerId/rank', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { playerId } = parseRequest(playerParamsSchema, req.params);
      const entry = await service.getPlayerRank(playerId, { signal: req.signal });

      sendSuccess(req, res, entry);
    } catch (error) {
      next(error);
    }
  });

  // ===========================================
  // GET /api/v1/leaderboard/players/:playerId/range?window=
  // Neighbors around a player
  // ===========================================

  router.get('/players/:playerId/range', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { playerId } = parseRequest(playerParamsSchema, req.params);
      const { window } = parseRequest(rangeQuerySchema, req.query);
      const rankings = await service.getPlayerRankRange(playerId, window, { signal: req.signal });

      sendSuccess<RankRangeResponse>(req, res, { playerId, window, rankings });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================
  // GET /api/v1/leaderboard/players/:playerId/history?limit=
  // Score change log, newest first
  // ===========================================

  router.get('/players/:playerId/history', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { playerId } = parseRequest(playerParamsSchema, req.params);
      const { limit } = parseRequest(historyQuerySchema, req.query);
      const history = await service.getPlayerHistory(playerId, limit, { signal: req.signal });

      sendSuccess(req, res, history);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
