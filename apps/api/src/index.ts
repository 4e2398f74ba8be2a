import 'dotenv/config';
import { createApp } from './app';
import { config } from './config';
import { KeyedMutex } from './lib/keyed-mutex';
import {
  LeaderboardCache,
  LeaderboardMaintenance,
  LeaderboardService,
} from './modules/leaderboard';
import { createDurableStore, createRankingStore } from './stores';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function main(): Promise<void> {
  const durable = createDurableStore(config);
  const ranking = createRankingStore(config);

  const service = new LeaderboardService({
    durable,
    ranking,
    cache: config.cache.enabled
      ? new LeaderboardCache({
          capacity: config.cache.capacity,
          ttlMs: config.cache.ttlMs,
          sweepIntervalMs: config.cache.sweepIntervalMs,
        })
      : null,
    rankingMethod: config.leaderboard.rankingMethod,
    writeLock: config.leaderboard.serializePlayerWrites
      ? new KeyedMutex(config.leaderboard.shardCount)
      : null,
  });
  service.start();

  // An in-memory ranking store starts empty and has to be filled from the durable store
  if (config.maintenance.rebuildOnStart || config.ranking.driver === 'memory') {
    try {
      await service.rebuildLeaderboard();
    } catch (error) {
      logger.error('[Leaderboard] Startup rebuild failed, serving without it:', error);
    }
  }

  const maintenance = new LeaderboardMaintenance(service, {
    tickMs: config.maintenance.tickMs,
    snapshotIntervalMs: config.maintenance.snapshotIntervalMs,
    rebuildIntervalMs: config.maintenance.rebuildIntervalMs,
  });
  maintenance.start();

  const app = createApp(service, {
    nodeEnv: config.nodeEnv,
    readTimeoutMs: config.http.readTimeoutMs,
    writeTimeoutMs: config.http.writeTimeoutMs,
    maxTopN: config.http.maxTopN,
    maxRangeWindow: config.http.maxRangeWindow,
    corsOrigins: config.http.corsOrigins,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Rankline API Server running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`Stores: durable=${durable.driver} ranking=${ranking.driver} method=${service.rankingMethod}`);
    logger.info(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  let shuttingDown = false;
  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    // Force close after the timeout
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    server.close(() => {
      logger.info('HTTP server closed.');
      maintenance
        .stop()
        .then(() => {
          service.stop();
          return Promise.allSettled([durable.close(), ranking.close()]);
        })
        .then(() => {
          logger.info('Store connections closed.');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Shutdown failed:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
