// =====================================================
// Leaderboard Service
// =====================================================
// Coordinates the durable store (system of record), the ranking store
// (ordered projection) and the local cache.
//
// Writes go to the durable store first. History and projection are
// best-effort: their failures are logged and reported in the result,
// and a rebuild brings the ranking store back in line.

import {
  PLAYER_ID_MAX_LENGTH,
  CacheStatsResponse,
  DegradedOperation,
  LeaderboardSnapshot,
  Player,
  RankEntry,
  RankingMethod,
  RebuildResult,
  ScoreHistoryEntry,
  ScoreUpdateResult,
} from '@rankline/shared-types';
import { KeyedMutex } from '../../lib/keyed-mutex';
import type { DurableStore, RankingStore } from '../../stores/types';
import { CallOptions, throwIfAborted } from '../../utils/abort';
import {
  DegradedError,
  InvalidInputError,
  OperationCancelledError,
  PlayerNotFoundError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { LeaderboardCache } from './leaderboard-cache.service';

// ===========================================
// Constants
// ===========================================

export const PLAYER_NAME_MAX_LENGTH = 255;
export const REASON_MAX_LENGTH = 255;

// ===========================================
// Types
// ===========================================

export interface LeaderboardServiceOptions {
  durable: DurableStore;
  ranking: RankingStore;
  /** null disables caching */
  cache: LeaderboardCache | null;
  rankingMethod: RankingMethod;
  /** null disables per-player write serialization */
  writeLock: KeyedMutex | null;
}

export interface UpdateScoreInput {
  playerId: string;
  delta: number;
  name?: string;
  reason?: string;
}

export interface RebuildOptions extends CallOptions {
  clearCache?: boolean;
}

// ===========================================
// Helper Functions
// ===========================================

function codePointLength(value: string): number {
  return Array.from(value).length;
}

export function validatePlayerId(playerId: string): void {
  if (playerId.length === 0) {
    throw new InvalidInputError('playerId must not be empty');
  }
  if (codePointLength(playerId) > PLAYER_ID_MAX_LENGTH) {
    throw new InvalidInputError(`playerId must be at most ${PLAYER_ID_MAX_LENGTH} characters`);
  }
}

function validatePositiveInt(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidInputError(`${field} must be a positive integer`);
  }
}

function validateUpdate(input: UpdateScoreInput): void {
  validatePlayerId(input.playerId);

  if (!Number.isSafeInteger(input.delta)) {
    throw new InvalidInputError('delta must be an integer within the safe range');
  }
  if (input.delta === 0) {
    throw new InvalidInputError('delta must not be zero');
  }
  if (input.name !== undefined && codePointLength(input.name) > PLAYER_NAME_MAX_LENGTH) {
    throw new InvalidInputError(`name must be at most ${PLAYER_NAME_MAX_LENGTH} characters`);
  }
  if (input.reason !== undefined && codePointLength(input.reason) > REASON_MAX_LENGTH) {
    throw new InvalidInputError(`reason must be at most ${REASON_MAX_LENGTH} characters`);
  }
}

/**
 * Rewrites ranks so equal scores share a rank and ranks stay contiguous.
 * `firstRank` is the dense rank of the first entry on the whole board,
 * so a block from the middle of the board keeps its global ranks.
 */
export function applyDenseRanking(entries: RankEntry[], firstRank: number): RankEntry[] {
  if (entries.length === 0) {
    return entries;
  }

  let rank = firstRank;
  let lastScore = entries[0].score;

  return entries.map((entry) => {
    if (entry.score !== lastScore) {
      rank++;
      lastScore = entry.score;
    }
    return { ...entry, rank };
  });
}

// ===========================================
// Service
// ===========================================

export class LeaderboardService {
  readonly rankingMethod: RankingMethod;

  private readonly durable: DurableStore;
  private readonly ranking: RankingStore;
  private readonly cache: LeaderboardCache | null;
  private readonly writeLock: KeyedMutex | null;

  constructor(options: LeaderboardServiceOptions) {
    this.durable = options.durable;
    this.ranking = options.ranking;
    this.cache = options.cache;
    this.rankingMethod = options.rankingMethod;
    this.writeLock = options.writeLock;
  }

  // ===========================================
  // Writes
  // ===========================================

  /**
   * Applies a score delta. Resolves once the durable write has committed,
   * even when history or projection failed (see `degraded`).
   */
  async updateScore(input: UpdateScoreInput, options: CallOptions = {}): Promise<ScoreUpdateResult> {
    validateUpdate(input);

    return this.withPlayerLock(input.playerId, () => this.applyScoreUpdate(input, options));
  }

  private withPlayerLock<T>(playerId: string, work: () => Promise<T>): Promise<T> {
    return this.writeLock ? this.writeLock.runExclusive(playerId, work) : work();
  }

  private async applyScoreUpdate(input: UpdateScoreInput, options: CallOptions): Promise<ScoreUpdateResult> {
    const { playerId, delta } = input;
    const reason = input.reason ?? '';

    throwIfAborted('updateScore', options.signal);

    const current = await this.durable.getPlayer(playerId, options);
    const previousTotal = current?.totalScore ?? 0;
    const total = previousTotal + delta;

    if (!Number.isSafeInteger(total)) {
      throw new InvalidInputError(`Total score for ${playerId} would leave the safe integer range`);
    }

    // An empty name keeps the stored one
    const name = input.name !== undefined && input.name !== '' ? input.name : current?.name ?? '';

    await this.durable.upsertPlayer({ id: playerId, name: input.name ?? '', totalScore: total }, options);

    const degraded: DegradedOperation[] = [];

    try {
      await this.durable.recordHistory(
        { playerId, scoreChange: delta, finalScore: total, reason },
        options
      );
    } catch (error) {
      this.reportDegraded('history', playerId, error);
      degraded.push('history');
    }

    try {
      await this.ranking.updateScore(playerId, total, name, options);
    } catch (error) {
      this.reportDegraded('projection', playerId, error);
      degraded.push('projection');
    }

    if (this.cache) {
      this.cache.invalidatePlayer(playerId);
      this.cache.invalidateTopN();
    }

    logger.debug(`[Leaderboard] ${playerId} ${previousTotal} -> ${total} (delta ${delta})`);

    return { playerId, delta, previousTotal, total, name, degraded };
  }

  private reportDegraded(operation: DegradedOperation, playerId: string, error: unknown): void {
    // Cancellation is the caller's choice, not a store fault
    const level = error instanceof OperationCancelledError ? 'warn' : 'error';
    const degradedError = new DegradedError(operation, playerId, error);
    logger[level](`[Leaderboard] ${degradedError.message}`, { playerId, operation, error });
  }

  // ===========================================
  // Reads
  // ===========================================

  async getPlayerRank(playerId: string, options: CallOptions = {}): Promise<RankEntry> {
    validatePlayerId(playerId);

    const cached = this.cache?.getPlayerRank(playerId);
    if (cached) {
      return cached;
    }

    const rank = await this.ranking.getRank(playerId, options);
    if (rank === null) {
      throw new PlayerNotFoundError(playerId);
    }

    const score = await this.ranking.getScore(playerId, options);
    if (score === null) {
      // Removed between the two reads
      throw new PlayerNotFoundError(playerId);
    }

    const player = await this.durable.getPlayer(playerId, options);

    const entry: RankEntry = {
      playerId,
      rank: this.rankingMethod === 'dense' ? await this.ranking.getDenseRank(score, options) : rank,
      score,
      name: player?.name ?? '',
      updatedAt: player?.updatedAt,
    };

    this.cache?.setPlayerRank(entry);
    return entry;
  }

  async getTopN(n: number, options: CallOptions = {}): Promise<RankEntry[]> {
    validatePositiveInt('n', n);

    const cached = this.cache?.getTopN(n);
    if (cached) {
      return cached;
    }

    const entries = await this.ranking.getTopPlayers(n, options);
    const rankings = await this.applyPolicy(entries, options);

    this.cache?.setTopN(n, rankings);
    return rankings;
  }

  /**
   * Contiguous block of the board around a player. Not cached.
   */
  async getPlayerRankRange(playerId: string, window: number, options: CallOptions = {}): Promise<RankEntry[]> {
    validatePlayerId(playerId);
    validatePositiveInt('window', window);

    const entries = await this.ranking.getNeighborRange(playerId, window, options);
    if (entries === null) {
      throw new PlayerNotFoundError(playerId);
    }

    return this.applyPolicy(entries, options);
  }

  private async applyPolicy(entries: RankEntry[], options: CallOptions): Promise<RankEntry[]> {
    if (this.rankingMethod !== 'dense' || entries.length === 0) {
      return entries;
    }
    const firstRank = await this.ranking.getDenseRank(entries[0].score, options);
    return applyDenseRanking(entries, firstRank);
  }

  // ===========================================
  // Audit reads (system of record)
  // ===========================================

  async getPlayerHistory(playerId: string, limit: number, options: CallOptions = {}): Promise<ScoreHistoryEntry[]> {
    validatePlayerId(playerId);
    validatePositiveInt('limit', limit);

    const player = await this.durable.getPlayer(playerId, options);
    if (!player) {
      throw new PlayerNotFoundError(playerId);
    }

    return this.durable.getPlayerHistory(playerId, limit, options);
  }

  async getDurableTopN(n: number, options: CallOptions = {}): Promise<Player[]> {
    validatePositiveInt('n', n);
    return this.durable.getTopPlayers(n, options);
  }

  getLatestSnapshot(options: CallOptions = {}): Promise<LeaderboardSnapshot | null> {
    return this.durable.getLatestSnapshot(options);
  }

  // ===========================================
  // Maintenance
  // ===========================================

  /**
   * Re-projects every durable player into the ranking store. Safe to run
   * repeatedly; the ranking store only ever receives full overwrites.
   * Each player is re-read under its write lock, so a score update that
   * commits while the rebuild runs is never replaced by an older total.
   */
  async rebuildLeaderboard(options: RebuildOptions = {}): Promise<RebuildResult> {
    const startTime = Date.now();
    logger.info('[Leaderboard] Starting rebuild from durable store');

    const players = await this.durable.getAllPlayers(options);
    let projected = 0;
    let failed = 0;

    for (const player of players) {
      throwIfAborted('rebuildLeaderboard', options.signal);

      try {
        if (await this.withPlayerLock(player.id, () => this.reprojectPlayer(player.id, options))) {
          projected++;
        }
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        failed++;
        logger.warn(`[Leaderboard] Rebuild skipped player ${player.id}`, error);
      }
    }

    if (options.clearCache) {
      this.clearCache();
    }

    const result: RebuildResult = {
      playerCount: players.length,
      projected,
      failed,
      durationMs: Date.now() - startTime,
    };

    logger.info('[Leaderboard] Rebuild complete', result);
    return result;
  }

  private async reprojectPlayer(playerId: string, options: CallOptions): Promise<boolean> {
    const player = await this.durable.getPlayer(playerId, options);
    if (!player) {
      return false;
    }
    await this.ranking.updateScore(player.id, player.totalScore, player.name, options);
    return true;
  }

  /**
   * Persists every durable player as one JSON snapshot.
   */
  async takeSnapshot(options: CallOptions = {}): Promise<number> {
    const players = await this.durable.getAllPlayers(options);
    await this.durable.saveSnapshot(JSON.stringify(players), players.length, options);
    logger.info(`[Leaderboard] Snapshot saved (${players.length} players)`);
    return players.length;
  }

  getCacheStats(): CacheStatsResponse {
    if (!this.cache) {
      return { enabled: false };
    }
    return { enabled: true, ...this.cache.stats() };
  }

  clearCache(): void {
    if (this.cache) {
      this.cache.clear();
      logger.info('[Leaderboard] Local cache cleared');
    }
  }

  async checkDurableHealth(options: CallOptions = {}): Promise<boolean> {
    try {
      await this.durable.healthCheck(options);
      return true;
    } catch (error) {
      logger.error('[Leaderboard] Durable store health check failed', error);
      return false;
    }
  }

  async checkRankingHealth(options: CallOptions = {}): Promise<boolean> {
    try {
      await this.ranking.healthCheck(options);
      return true;
    } catch (error) {
      logger.error('[Leaderboard] Ranking store health check failed', error);
      return false;
    }
  }

  /**
   * Starts the cache sweep. Store connections are owned by the caller.
   */
  start(): void {
    this.cache?.start();
  }

  stop(): void {
    this.cache?.stop();
  }
}
