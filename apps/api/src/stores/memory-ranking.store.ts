// =====================================================
// In-Memory Ranking Store
// =====================================================
// Single-process ranking store for development and tests. Keeps the
// same ordering and metadata expiry semantics as the Redis adapter.

import type { RankEntry } from '@rankline/shared-types';
import { IndexableSkipList } from '../lib/skip-list';
import type { CallOptions } from '../utils/abort';
import { callStore } from './store-call';
import { compareRanked, neighborWindow, RankingStore } from './types';

interface RankedMember {
  playerId: string;
  score: number;
}

interface PlayerMeta {
  name: string;
  updatedAt: Date;
  expiresAt: number;
}

export interface MemoryRankingStoreOptions {
  /** Expiry of the auxiliary name/updated-at metadata */
  metaTtlMs?: number;
  random?: () => number;
}

const DEFAULT_META_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export class MemoryRankingStore implements RankingStore {
  readonly driver = 'memory';

  private readonly order: IndexableSkipList<RankedMember>;
  private readonly distinctScores: IndexableSkipList<number>;
  private readonly scores = new Map<string, number>();
  private readonly scoreCounts = new Map<number, number>();
  private readonly meta = new Map<string, PlayerMeta>();
  private readonly metaTtlMs: number;

  constructor(options: MemoryRankingStoreOptions = {}) {
    this.metaTtlMs = options.metaTtlMs ?? DEFAULT_META_TTL_MS;
    this.order = new IndexableSkipList<RankedMember>(compareRanked, options.random);
    this.distinctScores = new IndexableSkipList<number>((a, b) => b - a, options.random);
  }

  updateScore(playerId: string, score: number, name: string, options?: CallOptions): Promise<void> {
    return callStore('ranking', 'updateScore', options, async () => {
      const previous = this.scores.get(playerId);

      if (previous !== score) {
        if (previous !== undefined) {
          this.order.remove({ playerId, score: previous });
          this.releaseScore(previous);
        }
        this.order.insert({ playerId, score });
        this.scores.set(playerId, score);
        this.retainScore(score);
      }

      this.meta.set(playerId, {
        name,
        updatedAt: new Date(),
        expiresAt: Date.now() + this.metaTtlMs,
      });
    });
  }

  getRank(playerId: string, options?: CallOptions): Promise<number | null> {
    return callStore('ranking', 'getRank', options, async () => {
      const score = this.scores.get(playerId);
      if (score === undefined) {
        return null;
      }
      return this.order.rankOf({ playerId, score });
    });
  }

  getScore(playerId: string, options?: CallOptions): Promise<number | null> {
    return callStore('ranking', 'getScore', options, async () => this.scores.get(playerId) ?? null);
  }

  getDenseRank(score: number, options?: CallOptions): Promise<number> {
    return callStore('ranking', 'getDenseRank', options, async () => this.distinctScores.countBefore(score) + 1);
  }

  getTopPlayers(n: number, options?: CallOptions): Promise<RankEntry[]> {
    return callStore('ranking', 'getTopPlayers', options, async () => this.block(0, n - 1));
  }

  getNeighborRange(playerId: string, windowSize: number, options?: CallOptions): Promise<RankEntry[] | null> {
    return callStore('ranking', 'getNeighborRange', options, async () => {
      const score = this.scores.get(playerId);
      if (score === undefined) {
        return null;
      }
      const rank = this.order.rankOf({ playerId, score });
      if (rank === null) {
        return null;
      }
      const { start, end } = neighborWindow(rank, windowSize);
      return this.block(start, end);
    });
  }

  size(options?: CallOptions): Promise<number> {
    return callStore('ranking', 'size', options, async () => this.order.size);
  }

  healthCheck(options?: CallOptions): Promise<void> {
    return callStore('ranking', 'healthCheck', options, async () => undefined);
  }

  async close(): Promise<void> {
    this.meta.clear();
  }

  private block(start: number, end: number): RankEntry[] {
    return this.order.range(start, end).map((member, i) => {
      const meta = this.readMeta(member.playerId);
      return {
        playerId: member.playerId,
        rank: start + i + 1,
        score: member.score,
        name: meta?.name ?? '',
        updatedAt: meta?.updatedAt,
      };
    });
  }

  private readMeta(playerId: string): PlayerMeta | null {
    const meta = this.meta.get(playerId);
    if (!meta) {
      return null;
    }
    if (meta.expiresAt <= Date.now()) {
      this.meta.delete(playerId);
      return null;
    }
    return meta;
  }

  private retainScore(score: number): void {
    const count = this.scoreCounts.get(score) ?? 0;
    if (count === 0) {
      this.distinctScores.insert(score);
    }
    this.scoreCounts.set(score, count + 1);
  }

  private releaseScore(score: number): void {
    const count = this.scoreCounts.get(score) ?? 0;
    if (count <= 1) {
      this.scoreCounts.delete(score);
      this.distinctScores.remove(score);
    } else {
      this.scoreCounts.set(score, count - 1);
    }
  }
}
