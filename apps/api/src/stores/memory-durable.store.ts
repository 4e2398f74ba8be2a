// =====================================================
// In-Memory Durable Store
// =====================================================
// Process-local system of record for development and tests.
// Same contract as the MySQL store, nothing survives a restart.

import type { LeaderboardSnapshot, Player, ScoreHistoryEntry } from '@rankline/shared-types';
import type { CallOptions } from '../utils/abort';
import { callStore } from './store-call';
import { DurableStore, NewScoreHistoryEntry, PlayerUpsert } from './types';

export class MemoryDurableStore implements DurableStore {
  readonly driver = 'memory';

  private readonly players = new Map<string, Player>();
  private readonly history: ScoreHistoryEntry[] = [];
  private readonly snapshots: LeaderboardSnapshot[] = [];
  private historySequence = 0;
  private snapshotSequence = 0;

  upsertPlayer(player: PlayerUpsert, options?: CallOptions): Promise<void> {
    return callStore('durable', 'upsertPlayer', options, async () => {
      const now = new Date();
      const existing = this.players.get(player.id);

      this.players.set(player.id, {
        id: player.id,
        name: player.name === '' && existing ? existing.name : player.name,
        totalScore: player.totalScore,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      });
    });
  }

  recordHistory(entry: NewScoreHistoryEntry, options?: CallOptions): Promise<void> {
    return callStore('durable', 'recordHistory', options, async () => {
      this.history.push({
        id: ++this.historySequence,
        ...entry,
        createdAt: new Date(),
      });
    });
  }

  getPlayer(playerId: string, options?: CallOptions): Promise<Player | null> {
    return callStore('durable', 'getPlayer', options, async () => {
      const player = this.players.get(playerId);
      return player ? { ...player } : null;
    });
  }

  getAllPlayers(options?: CallOptions): Promise<Player[]> {
    return callStore('durable', 'getAllPlayers', options, async () =>
      Array.from(this.players.values(), (player) => ({ ...player }))
    );
  }

  getTopPlayers(limit: number, options?: CallOptions): Promise<Player[]> {
    return callStore('durable', 'getTopPlayers', options, async () =>
      Array.from(this.players.values())
        .sort(
          (a, b) =>
            b.totalScore - a.totalScore ||
            a.updatedAt.getTime() - b.updatedAt.getTime() ||
            (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
        )
        .slice(0, limit)
        .map((player) => ({ ...player }))
    );
  }

  getPlayerHistory(playerId: string, limit: number, options?: CallOptions): Promise<ScoreHistoryEntry[]> {
    return callStore('durable', 'getPlayerHistory', options, async () =>
      this.history
        .filter((entry) => entry.playerId === playerId)
        .reverse()
        .slice(0, limit)
        .map((entry) => ({ ...entry }))
    );
  }

  saveSnapshot(data: string, playerCount: number, options?: CallOptions): Promise<void> {
    return callStore('durable', 'saveSnapshot', options, async () => {
      this.snapshots.push({
        id: ++this.snapshotSequence,
        data,
        playerCount,
        createdAt: new Date(),
      });
    });
  }

  getLatestSnapshot(options?: CallOptions): Promise<LeaderboardSnapshot | null> {
    return callStore('durable', 'getLatestSnapshot', options, async () => {
      const latest = this.snapshots[this.snapshots.length - 1];
      return latest ? { ...latest } : null;
    });
  }

  healthCheck(options?: CallOptions): Promise<void> {
    return callStore('durable', 'healthCheck', options, async () => undefined);
  }

  async close(): Promise<void> {
    this.players.clear();
  }
}
