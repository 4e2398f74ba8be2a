// =====================================================
// Leaderboard Types
// =====================================================

/**
 * Rank computation policy.
 * - standard: position in the ranking order, ties are not collapsed
 * - dense: equal scores share a rank, ranks are contiguous
 */
export const RANKING_METHODS = ['standard', 'dense'] as const;

export type RankingMethod = (typeof RANKING_METHODS)[number];

/** Maximum length of a player id, in code points. */
export const PLAYER_ID_MAX_LENGTH = 64;

// ===========================================
// Durable Records
// ===========================================

export interface Player {
  id: string;
  name: string;
  totalScore: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ScoreHistoryEntry {
  id: number;
  playerId: string;
  scoreChange: number;
  finalScore: number;
  reason: string;
  createdAt: Date;
}

export interface LeaderboardSnapshot {
  id: number;
  playerCount: number;
  /** JSON array of players at the time of the snapshot */
  data: string;
  createdAt: Date;
}

// ===========================================
// Computed Views
// ===========================================

/**
 * A ranked row. Never persisted; derived from the ranking store
 * (plus durable enrichment) or served from the local cache.
 */
export interface RankEntry {
  readonly playerId: string;
  readonly rank: number;
  readonly score: number;
  readonly name?: string;
  readonly updatedAt?: Date;
}

export type DegradedOperation = 'history' | 'projection';

export interface ScoreUpdateResult {
  playerId: string;
  delta: number;
  previousTotal: number;
  total: number;
  name: string;
  /** Non-authoritative steps that failed while the durable write committed */
  degraded: DegradedOperation[];
}

export interface RebuildResult {
  playerCount: number;
  projected: number;
  failed: number;
  durationMs: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Percentage, 0-100 */
  hitRate: number;
  size: number;
  capacity: number;
  /** Percentage, 0-100 */
  utilization: number;
}

export type CacheStatsResponse = ({ enabled: true } & CacheStats) | { enabled: false };

// ===========================================
// Request / Response Contracts
// ===========================================

export interface UpdateScoreRequest {
  playerId: string;
  delta: number;
  name?: string;
  reason?: string;
}

export interface TopNResponse {
  count: number;
  rankings: RankEntry[];
}

export interface RankRangeResponse {
  playerId: string;
  window: number;
  rankings: RankEntry[];
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  services: {
    durable: 'healthy' | 'unhealthy';
    ranking: 'healthy' | 'unhealthy';
  };
}
