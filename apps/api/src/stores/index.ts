// =====================================================
// Store Factory
// =====================================================

import { createMySqlPool } from '../lib/mysql';
import { createRedisConnection } from '../lib/redis';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';
import { MemoryDurableStore } from './memory-durable.store';
import { MemoryRankingStore } from './memory-ranking.store';
import { MySqlDurableStore } from './mysql-durable.store';
import { createRedisRankingStore } from './redis-ranking.store';
import type { DurableStore, RankingStore } from './types';

export function createDurableStore(config: AppConfig): DurableStore {
  if (config.durable.driver === 'memory') {
    logger.warn('[Stores] Using in-memory durable store; data is lost on restart');
    return new MemoryDurableStore();
  }

  return new MySqlDurableStore(
    createMySqlPool({
      url: config.durable.url,
      connectionLimit: config.durable.connectionLimit,
    })
  );
}

export function createRankingStore(config: AppConfig): RankingStore {
  if (config.ranking.driver === 'memory') {
    logger.warn('[Stores] Using in-memory ranking store; rebuild runs at startup');
    return new MemoryRankingStore({ metaTtlMs: config.ranking.metaTtlSeconds * 1000 });
  }

  return createRedisRankingStore(createRedisConnection(config.ranking.redis), {
    keyPrefix: config.ranking.keyPrefix,
    metaTtlSeconds: config.ranking.metaTtlSeconds,
  });
}

export { MemoryDurableStore } from './memory-durable.store';
export { MemoryRankingStore } from './memory-ranking.store';
export { MySqlDurableStore } from './mysql-durable.store';
export { RedisRankingStore, createRedisRankingStore } from './redis-ranking.store';
export { compareRanked, neighborWindow } from './types';
export type { DurableStore, RankingStore, PlayerUpsert, NewScoreHistoryEntry } from './types';
