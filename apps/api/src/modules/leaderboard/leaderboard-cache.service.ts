// =====================================================
// Leaderboard Cache Service
// =====================================================
// Typed accessors over the local cache for rank lookups and top-N pages.

import type { CacheStats, RankEntry } from '@rankline/shared-types';
import { LocalCache, LocalCacheOptions } from '../../lib/local-cache';
import { logger } from '../../utils/logger';

// ===========================================
// Cache Keys
// ===========================================

export const CACHE_KEYS = {
  playerRank: (playerId: string) => `rank:${playerId}`,
  topPrefix: 'top:',
  topN: (n: number) => `top:${n}`,
} as const;

type CachedValue = RankEntry | RankEntry[];

// ===========================================
// Service
// ===========================================

export class LeaderboardCache {
  private readonly cache: LocalCache<CachedValue>;

  constructor(options: LocalCacheOptions) {
    this.cache = new LocalCache<CachedValue>(options);
  }

  getPlayerRank(playerId: string): RankEntry | undefined {
    const cached = this.cache.get(CACHE_KEYS.playerRank(playerId));
    if (cached === undefined || Array.isArray(cached)) {
      return undefined;
    }
    logger.debug(`[Leaderboard] cache_hit key=${CACHE_KEYS.playerRank(playerId)}`);
    return cached;
  }

  setPlayerRank(entry: RankEntry): void {
    this.cache.set(CACHE_KEYS.playerRank(entry.playerId), entry);
  }

  getTopN(n: number): RankEntry[] | undefined {
    const cached = this.cache.get(CACHE_KEYS.topN(n));
    if (cached === undefined || !Array.isArray(cached)) {
      return undefined;
    }
    logger.debug(`[Leaderboard] cache_hit key=${CACHE_KEYS.topN(n)}`);
    // Callers get their own array; the cached one stays untouched
    return [...cached];
  }

  setTopN(n: number, entries: RankEntry[]): void {
    this.cache.set(CACHE_KEYS.topN(n), [...entries]);
  }

  invalidatePlayer(playerId: string): void {
    this.cache.delete(CACHE_KEYS.playerRank(playerId));
  }

  invalidateTopN(): void {
    const removed = this.cache.clearByPrefix(CACHE_KEYS.topPrefix);
    if (removed > 0) {
      logger.debug(`[Leaderboard] invalidated ${removed} top-N pages`);
    }
  }

  clear(): void {
    this.cache.clear();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  start(): void {
    this.cache.start();
  }

  stop(): void {
    this.cache.stop();
  }
}
