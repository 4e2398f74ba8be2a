import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { logger } from './utils/logger';
import { sendSuccess } from './utils/response';
import {
  createErrorHandler,
  notFoundHandler,
  requestIdMiddleware,
  requestSignalMiddleware,
} from './middleware';
import { createHealthRouter } from './routes/health.routes';
import {
  LeaderboardService,
  createAdminRouter,
  createLeaderboardRouter,
} from './modules/leaderboard';

export interface AppOptions {
  nodeEnv: 'development' | 'production' | 'test';
  readTimeoutMs: number;
  writeTimeoutMs: number;
  maxTopN: number;
  maxRangeWindow: number;
  /** Allowed CORS origins in production; '*' elsewhere. Empty allows none. */
  corsOrigins: string[];
}

export function createApp(service: LeaderboardService, options: AppOptions): Express {
  const app: Express = express();

  // ===========================================
  // Middleware
  // ===========================================

  // Security headers
  app.use(helmet());

  // CORS configuration
  app.use(cors({
    origin: options.nodeEnv === 'production' ? (options.corsOrigins.length > 0 ? options.corsOrigins : false) : '*',
  }));

  // Parse JSON bodies
  app.use(express.json({ limit: '10kb' }));

  // Compress responses
  app.use(compression());

  app.use(requestIdMiddleware);
  app.use(requestSignalMiddleware({
    readTimeoutMs: options.readTimeoutMs,
    writeTimeoutMs: options.writeTimeoutMs,
  }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} ${res.statusCode} - ${duration}ms`, { requestId: req.id });
    });

    next();
  });

  // ===========================================
  // Routes
  // ===========================================

  // Health check
  app.use('/health', createHealthRouter(service));

  // API v1 routes
  app.use('/api/v1/leaderboard', createLeaderboardRouter(service, {
    maxTopN: options.maxTopN,
    maxRangeWindow: options.maxRangeWindow,
  }));
  app.use('/api/v1/admin', createAdminRouter(service, { maxTopN: options.maxTopN }));

  // Root endpoint
  app.get('/', (req: Request, res: Response) => {
    sendSuccess(req, res, {
      message: 'Rankline leaderboard API',
      version: '0.1.0',
      rankingMethod: service.rankingMethod,
    });
  });

  // ===========================================
  // Error Handling
  // ===========================================

  app.use(notFoundHandler);
  app.use(createErrorHandler({ exposeDetails: options.nodeEnv === 'development' }));

  return app;
}
