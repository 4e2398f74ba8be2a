// =====================================================
// Store Contracts
// =====================================================
// The orchestrator only sees these interfaces. The durable store is the
// system of record; the ranking store is a rebuildable projection of it.

import type {
  LeaderboardSnapshot,
  Player,
  RankEntry,
  ScoreHistoryEntry,
} from '@rankline/shared-types';
import type { CallOptions } from '../utils/abort';

export interface PlayerUpsert {
  id: string;
  /** Empty keeps the stored display name */
  name: string;
  totalScore: number;
}

export interface NewScoreHistoryEntry {
  playerId: string;
  scoreChange: number;
  finalScore: number;
  reason: string;
}

export interface DurableStore {
  readonly driver: string;

  upsertPlayer(player: PlayerUpsert, options?: CallOptions): Promise<void>;
  recordHistory(entry: NewScoreHistoryEntry, options?: CallOptions): Promise<void>;
  /** Resolves null when the player does not exist. */
  getPlayer(playerId: string, options?: CallOptions): Promise<Player | null>;
  /** Full corpus in one pass. */
  getAllPlayers(options?: CallOptions): Promise<Player[]>;
  getTopPlayers(limit: number, options?: CallOptions): Promise<Player[]>;
  getPlayerHistory(playerId: string, limit: number, options?: CallOptions): Promise<ScoreHistoryEntry[]>;
  saveSnapshot(data: string, playerCount: number, options?: CallOptions): Promise<void>;
  getLatestSnapshot(options?: CallOptions): Promise<LeaderboardSnapshot | null>;
  healthCheck(options?: CallOptions): Promise<void>;
  close(): Promise<void>;
}

export interface RankingStore {
  readonly driver: string;

  /** Full overwrite with the post-update total. */
  updateScore(playerId: string, score: number, name: string, options?: CallOptions): Promise<void>;
  /** 1-based position rank, or null when not ranked. */
  getRank(playerId: string, options?: CallOptions): Promise<number | null>;
  getScore(playerId: string, options?: CallOptions): Promise<number | null>;
  /** 1 + number of distinct scores strictly greater than score. */
  getDenseRank(score: number, options?: CallOptions): Promise<number>;
  getTopPlayers(n: number, options?: CallOptions): Promise<RankEntry[]>;
  /** Contiguous block around the player, or null when not ranked. */
  getNeighborRange(playerId: string, windowSize: number, options?: CallOptions): Promise<RankEntry[] | null>;
  size(options?: CallOptions): Promise<number>;
  healthCheck(options?: CallOptions): Promise<void>;
  close(): Promise<void>;
}

/**
 * 0-based inclusive offsets of the neighbor window for a 1-based rank.
 * Not symmetric near the top: the window shifts down instead of
 * crossing offset zero.
 */
export function neighborWindow(rank: number, windowSize: number): { start: number; end: number } {
  const start = Math.max(0, rank - Math.floor(windowSize / 2) - 1);
  return { start, end: start + windowSize - 1 };
}

/**
 * Ranking order shared by every adapter: score descending, then player id
 * descending by UTF-8 bytes. Matches ZREVRANGE on equal scores.
 */
export function compareRanked(
  a: { playerId: string; score: number },
  b: { playerId: string; score: number }
): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.playerId === b.playerId) {
    return 0;
  }
  return Buffer.compare(Buffer.from(b.playerId, 'utf8'), Buffer.from(a.playerId, 'utf8'));
}
