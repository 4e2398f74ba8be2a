// =====================================================
// Redis Connection
// =====================================================
// Connection for the ranking store.

import { Redis, RedisOptions } from 'ioredis';
import { logger } from '../utils/logger';

export const MAX_RETRY_DELAY_MS = 3000;

export interface RedisConnectionConfig {
  url?: string;
  host: string;
  port: number;
  password?: string;
  db: number;
}

// ===========================================
// Connection Configuration
// ===========================================

export const getRedisOptions = (config: RedisConnectionConfig): RedisOptions => {
  const baseOptions: RedisOptions = {
    maxRetriesPerRequest: 1, // Fail fast; callers treat errors as store-unavailable
    enableReadyCheck: false, // Faster startup
    // Retries forever at a capped delay
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 100, MAX_RETRY_DELAY_MS);
      logger.warn(`[Redis] Connection retry #${times} in ${delay}ms`);
      return delay;
    },
  };

  if (config.url) {
    logger.info(`[Redis] Using REDIS_URL: ${config.url.replace(/:[^:@]+@/, ':***@')}`);
    return baseOptions;
  }

  return {
    ...baseOptions,
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
  };
};

// ===========================================
// Connection Factory
// ===========================================

/**
 * Create the Redis connection used by the ranking store. The store owns
 * it and quits it on close().
 */
export function createRedisConnection(config: RedisConnectionConfig): Redis {
  const options = getRedisOptions(config);
  const connection = config.url ? new Redis(config.url, options) : new Redis(options);

  connection.on('connect', () => {
    logger.info('[Redis] Connection established');
  });

  connection.on('error', (err) => {
    logger.error('[Redis] Connection error:', err);
  });

  connection.on('close', () => {
    logger.warn('[Redis] Connection closed');
  });

  return connection;
}
