// =====================================================
// Redis Ranking Store
// =====================================================
// Sorted-set projection of player totals. Ties on score fall back to
// ZREVRANGE member order (player id, descending).
//
// Keys (prefix defaults to "leaderboard"):
//   <prefix>:global        ZSET  playerId -> score
//   <prefix>:distinct      ZSET  score -> score, one member per distinct score
//   <prefix>:counts        HASH  score -> number of players holding it
//   <prefix>:player:<id>   HASH  name, updated_at (expires independently)

import type { Redis, Result } from 'ioredis';
import type { RankEntry } from '@rankline/shared-types';
import type { CallOptions } from '../utils/abort';
import { logger } from '../utils/logger';
import { callStore } from './store-call';
import { neighborWindow, RankingStore } from './types';

declare module 'ioredis' {
  interface RedisCommander<Context> {
    rankingUpsert(
      boardKey: string,
      distinctKey: string,
      countsKey: string,
      metaKey: string,
      playerId: string,
      score: string,
      name: string,
      updatedAt: string,
      ttlSeconds: string
    ): Result<string | null, Context>;
  }
}

// ===========================================
// Upsert Script
// ===========================================

/**
 * Overwrites the player's score and keeps the distinct-score index in
 * step, in one atomic script. Returns the previous score or nil.
 */
const RANKING_UPSERT_LUA = `
local previous = redis.call('ZSCORE', KEYS[1], ARGV[1])
local score = ARGV[2]
if (not previous) or tonumber(previous) ~= tonumber(score) then
  if previous then
    local remaining = redis.call('HINCRBY', KEYS[3], previous, -1)
    if remaining <= 0 then
      redis.call('HDEL', KEYS[3], previous)
      redis.call('ZREM', KEYS[2], previous)
    end
  end
  redis.call('ZADD', KEYS[1], score, ARGV[1])
  redis.call('HINCRBY', KEYS[3], score, 1)
  redis.call('ZADD', KEYS[2], score, score)
end
redis.call('HSET', KEYS[4], 'name', ARGV[3], 'updated_at', ARGV[4])
redis.call('EXPIRE', KEYS[4], ARGV[5])
return previous
`;

export type RankingRedisClient = Pick<
  Redis,
  'rankingUpsert' | 'zrevrank' | 'zscore' | 'zcount' | 'zrevrange' | 'zcard' | 'pipeline' | 'ping' | 'quit'
>;

export interface RedisRankingStoreOptions {
  keyPrefix?: string;
  metaTtlSeconds?: number;
}

const DEFAULT_META_TTL_SECONDS = 7 * 24 * 60 * 60;

/**
 * Register the upsert script on a connection. Must run once before the
 * connection is handed to RedisRankingStore.
 */
export function defineRankingCommands(redis: Redis): void {
  redis.defineCommand('rankingUpsert', {
    numberOfKeys: 4,
    lua: RANKING_UPSERT_LUA,
  });
}

export function createRedisRankingStore(redis: Redis, options: RedisRankingStoreOptions = {}): RedisRankingStore {
  defineRankingCommands(redis);
  return new RedisRankingStore(redis, options);
}

// ===========================================
// Store
// ===========================================

export class RedisRankingStore implements RankingStore {
  readonly driver = 'redis';

  private readonly boardKey: string;
  private readonly distinctKey: string;
  private readonly countsKey: string;
  private readonly keyPrefix: string;
  private readonly metaTtlSeconds: number;

  constructor(
    private readonly client: RankingRedisClient,
    options: RedisRankingStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? 'leaderboard';
    this.boardKey = `${this.keyPrefix}:global`;
    this.distinctKey = `${this.keyPrefix}:distinct`;
    this.countsKey = `${this.keyPrefix}:counts`;
    this.metaTtlSeconds = options.metaTtlSeconds ?? DEFAULT_META_TTL_SECONDS;
  }

  updateScore(playerId: string, score: number, name: string, options?: CallOptions): Promise<void> {
    return callStore('ranking', 'updateScore', options, async () => {
      await this.client.rankingUpsert(
        this.boardKey,
        this.distinctKey,
        this.countsKey,
        this.metaKey(playerId),
        playerId,
        String(score),
        name,
        String(Date.now()),
        String(this.metaTtlSeconds)
      );

      logger.debug('[RedisRanking] Updated player score', { playerId, score });
    });
  }

  getRank(playerId: string, options?: CallOptions): Promise<number | null> {
    return callStore('ranking', 'getRank', options, async () => {
      // ZREVRANK is 0-based, highest score first
      const rank = await this.client.zrevrank(this.boardKey, playerId);
      return rank === null ? null : rank + 1;
    });
  }

  getScore(playerId: string, options?: CallOptions): Promise<number | null> {
    return callStore('ranking', 'getScore', options, async () => {
      const score = await this.client.zscore(this.boardKey, playerId);
      return score === null ? null : Number(score);
    });
  }

  getDenseRank(score: number, options?: CallOptions): Promise<number> {
    return callStore('ranking', 'getDenseRank', options, async () => {
      const higher = await this.client.zcount(this.distinctKey, `(${score}`, '+inf');
      return higher + 1;
    });
  }

  getTopPlayers(n: number, options?: CallOptions): Promise<RankEntry[]> {
    return callStore('ranking', 'getTopPlayers', options, () => this.block(0, n - 1));
  }

  getNeighborRange(playerId: string, windowSize: number, options?: CallOptions): Promise<RankEntry[] | null> {
    return callStore('ranking', 'getNeighborRange', options, async () => {
      const zeroBased = await this.client.zrevrank(this.boardKey, playerId);
      if (zeroBased === null) {
        return null;
      }
      const { start, end } = neighborWindow(zeroBased + 1, windowSize);
      return this.block(start, end);
    });
  }

  size(options?: CallOptions): Promise<number> {
    return callStore('ranking', 'size', options, () => this.client.zcard(this.boardKey));
  }

  healthCheck(options?: CallOptions): Promise<void> {
    return callStore('ranking', 'healthCheck', options, async () => {
      await this.client.ping();
    });
  }

  async close(): Promise<void> {
    await this.client.quit();
    logger.info('[RedisRanking] Connection closed');
  }

  // ===========================================
  // Helpers
  // ===========================================

  private metaKey(playerId: string): string {
    return `${this.keyPrefix}:player:${playerId}`;
  }

  /**
   * Fetch offsets start..end (inclusive) with scores, then names.
   */
  private async block(start: number, end: number): Promise<RankEntry[]> {
    const flat = await this.client.zrevrange(this.boardKey, start, end, 'WITHSCORES');

    const members: Array<{ playerId: string; score: number }> = [];
    for (let i = 0; i + 1 < flat.length; i += 2) {
      members.push({ playerId: flat[i], score: Number(flat[i + 1]) });
    }

    const meta = await this.loadMeta(members.map((m) => m.playerId));

    return members.map((member, i) => ({
      playerId: member.playerId,
      rank: start + i + 1,
      score: member.score,
      name: meta[i].name,
      updatedAt: meta[i].updatedAt,
    }));
  }

  private async loadMeta(playerIds: string[]): Promise<Array<{ name: string; updatedAt?: Date }>> {
    if (playerIds.length === 0) {
      return [];
    }

    const pipeline = this.client.pipeline();
    for (const playerId of playerIds) {
      pipeline.hmget(this.metaKey(playerId), 'name', 'updated_at');
    }
    const results = (await pipeline.exec()) ?? [];

    return playerIds.map((playerId, i) => {
      const [error, value] = results[i] ?? [null, null];
      if (error) {
        logger.warn('[RedisRanking] Failed to get player metadata', { playerId, error });
        return { name: '' };
      }
      return parseMeta(value);
    });
  }
}

function parseMeta(value: unknown): { name: string; updatedAt?: Date } {
  if (!Array.isArray(value)) {
    return { name: '' };
  }
  const [name, updatedAt]: unknown[] = value;
  return {
    name: typeof name === 'string' ? name : '',
    updatedAt: typeof updatedAt === 'string' ? new Date(Number(updatedAt)) : undefined,
  };
}
