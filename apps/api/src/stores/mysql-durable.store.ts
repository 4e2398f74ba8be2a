// =====================================================
// MySQL Durable Store
// =====================================================
// System of record: player totals, append-only history, snapshots.
// Schema: migrations/001_init_schema.sql

import type { Pool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import type { LeaderboardSnapshot, Player, ScoreHistoryEntry } from '@rankline/shared-types';
import type { CallOptions } from '../utils/abort';
import { logger } from '../utils/logger';
import { callStore } from './store-call';
import { DurableStore, NewScoreHistoryEntry, PlayerUpsert } from './types';

// ===========================================
// Raw Row Types
// ===========================================

interface PlayerRow extends RowDataPacket {
  id: string;
  name: string;
  total_score: number | string;
  created_at: Date;
  updated_at: Date;
}

interface HistoryRow extends RowDataPacket {
  id: number | string;
  player_id: string;
  score_change: number | string;
  final_score: number | string;
  reason: string;
  created_at: Date;
}

interface SnapshotRow extends RowDataPacket {
  id: number | string;
  snapshot_data: unknown;
  player_count: number;
  created_at: Date;
}

export type DurablePool = Pick<Pool, 'execute' | 'query' | 'getConnection' | 'end'>;

// ===========================================
// SQL
// ===========================================

const PLAYER_COLUMNS = 'id, name, total_score, created_at, updated_at';

const UPSERT_PLAYER_SQL = `
  INSERT INTO players (id, name, total_score, created_at, updated_at)
  VALUES (?, ?, ?, NOW(3), NOW(3))
  ON DUPLICATE KEY UPDATE
    name = IF(VALUES(name) = '', name, VALUES(name)),
    total_score = VALUES(total_score),
    updated_at = NOW(3)
`;

const INSERT_HISTORY_SQL = `
  INSERT INTO player_score_history (player_id, score_change, final_score, reason, created_at)
  VALUES (?, ?, ?, ?, NOW(3))
`;

// ===========================================
// Row Mappers
// ===========================================

export function toPlayer(row: PlayerRow): Player {
  return {
    id: row.id,
    name: row.name,
    totalScore: Number(row.total_score),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toHistoryEntry(row: HistoryRow): ScoreHistoryEntry {
  return {
    id: Number(row.id),
    playerId: row.player_id,
    scoreChange: Number(row.score_change),
    finalScore: Number(row.final_score),
    reason: row.reason,
    createdAt: row.created_at,
  };
}

function toSnapshot(row: SnapshotRow): LeaderboardSnapshot {
  // mysql2 decodes JSON columns; hand the blob back as text
  const data = typeof row.snapshot_data === 'string' ? row.snapshot_data : JSON.stringify(row.snapshot_data);
  return {
    id: Number(row.id),
    playerCount: row.player_count,
    data,
    createdAt: row.created_at,
  };
}

// ===========================================
// Store
// ===========================================

export class MySqlDurableStore implements DurableStore {
  readonly driver = 'mysql';

  constructor(private readonly pool: DurablePool) {}

  upsertPlayer(player: PlayerUpsert, options?: CallOptions): Promise<void> {
    return callStore('durable', 'upsertPlayer', options, async () => {
      await this.pool.execute<ResultSetHeader>(UPSERT_PLAYER_SQL, [player.id, player.name, player.totalScore]);
    });
  }

  recordHistory(entry: NewScoreHistoryEntry, options?: CallOptions): Promise<void> {
    return callStore('durable', 'recordHistory', options, async () => {
      await this.pool.execute<ResultSetHeader>(INSERT_HISTORY_SQL, [
        entry.playerId,
        entry.scoreChange,
        entry.finalScore,
        entry.reason,
      ]);
    });
  }

  getPlayer(playerId: string, options?: CallOptions): Promise<Player | null> {
    return callStore('durable', 'getPlayer', options, async () => {
      const [rows] = await this.pool.execute<PlayerRow[]>(
        `SELECT ${PLAYER_COLUMNS} FROM players WHERE id = ?`,
        [playerId]
      );
      return rows.length > 0 ? toPlayer(rows[0]) : null;
    });
  }

  getAllPlayers(options?: CallOptions): Promise<Player[]> {
    return callStore('durable', 'getAllPlayers', options, async () => {
      const [rows] = await this.pool.query<PlayerRow[]>(`SELECT ${PLAYER_COLUMNS} FROM players`);
      return rows.map(toPlayer);
    });
  }

  getTopPlayers(limit: number, options?: CallOptions): Promise<Player[]> {
    return callStore('durable', 'getTopPlayers', options, async () => {
      // LIMIT placeholders go through query(), not execute()
      const [rows] = await this.pool.query<PlayerRow[]>(
        `SELECT ${PLAYER_COLUMNS} FROM players
         ORDER BY total_score DESC, updated_at ASC, id ASC
         LIMIT ?`,
        [limit]
      );
      return rows.map(toPlayer);
    });
  }

  getPlayerHistory(playerId: string, limit: number, options?: CallOptions): Promise<ScoreHistoryEntry[]> {
    return callStore('durable', 'getPlayerHistory', options, async () => {
      const [rows] = await this.pool.query<HistoryRow[]>(
        `SELECT id, player_id, score_change, final_score, reason, created_at
         FROM player_score_history
         WHERE player_id = ?
         ORDER BY created_at DESC, id DESC
         LIMIT ?`,
        [playerId, limit]
      );
      return rows.map(toHistoryEntry);
    });
  }

  saveSnapshot(data: string, playerCount: number, options?: CallOptions): Promise<void> {
    return callStore('durable', 'saveSnapshot', options, async () => {
      await this.pool.execute<ResultSetHeader>(
        'INSERT INTO leaderboard_snapshots (snapshot_data, player_count, created_at) VALUES (?, ?, NOW(3))',
        [data, playerCount]
      );
    });
  }

  getLatestSnapshot(options?: CallOptions): Promise<LeaderboardSnapshot | null> {
    return callStore('durable', 'getLatestSnapshot', options, async () => {
      const [rows] = await this.pool.query<SnapshotRow[]>(
        `SELECT id, snapshot_data, player_count, created_at
         FROM leaderboard_snapshots
         ORDER BY created_at DESC, id DESC
         LIMIT 1`
      );
      return rows.length > 0 ? toSnapshot(rows[0]) : null;
    });
  }

  healthCheck(options?: CallOptions): Promise<void> {
    return callStore('durable', 'healthCheck', options, async () => {
      const connection = await this.pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('[MySqlDurable] Pool closed');
  }
}
