import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryRankingStore } from './memory-ranking.store';
import { compareRanked, neighborWindow } from './types';
import { OperationCancelledError } from '../utils/errors';
import { seededRandom } from '../../test/helpers/leaderboard.helper';

async function seed(store: MemoryRankingStore, scores: Array<[string, number]>): Promise<void> {
  for (const [playerId, score] of scores) {
    await store.updateScore(playerId, score, `name-${playerId}`);
  }
}

const TIED_BOARD: Array<[string, number]> = [
  ['p1', 100],
  ['p2', 100],
  ['p3', 80],
  ['p4', 50],
  ['p5', 50],
  ['p6', 50],
];

describe('neighborWindow', () => {
  it('centers the window on the player', () => {
    expect(neighborWindow(5, 5)).toEqual({ start: 2, end: 6 });
  });

  it('shifts down at the top of the board', () => {
    expect(neighborWindow(1, 5)).toEqual({ start: 0, end: 4 });
    expect(neighborWindow(2, 4)).toEqual({ start: 0, end: 3 });
  });
});

describe('compareRanked', () => {
  it('breaks ties by UTF-8 byte order, descending', () => {
    // U+1F600 encodes as F0 9F 98 80, above EF BF BD for U+FFFD,
    // although its first UTF-16 code unit (D83D) is lower
    const members = [
      { playerId: '\uFFFD', score: 10 },
      { playerId: '\u{1F600}', score: 10 },
    ];

    expect(members.sort(compareRanked).map((m) => m.playerId)).toEqual(['\u{1F600}', '\uFFFD']);
  });

  it('orders higher scores first regardless of id', () => {
    expect(compareRanked({ playerId: 'a', score: 20 }, { playerId: 'z', score: 10 })).toBeLessThan(0);
    expect(compareRanked({ playerId: 'p1', score: 5 }, { playerId: 'p1', score: 5 })).toBe(0);
  });
});

describe('MemoryRankingStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('ordering', () => {
    it('orders by score descending, then player id descending', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TIED_BOARD);

      const top = await store.getTopPlayers(6);

      expect(top.map((e) => [e.playerId, e.rank, e.score])).toEqual([
        ['p2', 1, 100],
        ['p1', 2, 100],
        ['p3', 3, 80],
        ['p6', 4, 50],
        ['p5', 5, 50],
        ['p4', 6, 50],
      ]);
      expect(top[0].name).toBe('name-p2');
    });

    it('reports position ranks and scores', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TIED_BOARD);

      expect(await store.getRank('p3')).toBe(3);
      expect(await store.getScore('p3')).toBe(80);
      expect(await store.size()).toBe(6);
    });

    it('returns null for unranked players', async () => {
      const store = new MemoryRankingStore();

      expect(await store.getRank('ghost')).toBeNull();
      expect(await store.getScore('ghost')).toBeNull();
      expect(await store.getNeighborRange('ghost', 5)).toBeNull();
    });

    it('moves a player when the score is overwritten', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TIED_BOARD);

      await store.updateScore('p4', 150, 'name-p4');

      expect(await store.getRank('p4')).toBe(1);
      expect(await store.getRank('p2')).toBe(2);
      expect(await store.size()).toBe(6);
    });
  });

  describe('getDenseRank', () => {
    it('counts distinct higher scores', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TIED_BOARD);

      expect(await store.getDenseRank(100)).toBe(1);
      expect(await store.getDenseRank(80)).toBe(2);
      expect(await store.getDenseRank(50)).toBe(3);
      expect(await store.getDenseRank(90)).toBe(2);
      expect(await store.getDenseRank(10)).toBe(4);
    });

    it('drops a score from the index once nobody holds it', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TIED_BOARD);

      await store.updateScore('p3', 100, 'name-p3');

      expect(await store.getDenseRank(50)).toBe(2);
    });

    it('keeps a shared score while one holder remains', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TIED_BOARD);

      await store.updateScore('p1', 10, 'name-p1');

      expect(await store.getDenseRank(80)).toBe(2);
      expect(await store.getDenseRank(10)).toBe(4);
    });
  });

  describe('getNeighborRange', () => {
    const TEN: Array<[string, number]> = Array.from({ length: 10 }, (_, i) => [
      `p${String(i + 1).padStart(2, '0')}`,
      100 - i * 10,
    ]);

    it('returns the window around a mid-board player', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TEN);

      const range = await store.getNeighborRange('p05', 5);

      expect(range?.map((e) => [e.playerId, e.rank])).toEqual([
        ['p03', 3],
        ['p04', 4],
        ['p05', 5],
        ['p06', 6],
        ['p07', 7],
      ]);
    });

    it('starts at rank 1 for the leader', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TEN);

      const range = await store.getNeighborRange('p01', 5);

      expect(range?.map((e) => e.rank)).toEqual([1, 2, 3, 4, 5]);
    });

    it('is cut short at the bottom of the board', async () => {
      const store = new MemoryRankingStore({ random: seededRandom() });
      await seed(store, TEN);

      const range = await store.getNeighborRange('p10', 5);

      expect(range?.map((e) => e.rank)).toEqual([8, 9, 10]);
    });
  });

  describe('metadata', () => {
    it('expires names independently of the score', async () => {
      vi.useFakeTimers();
      const store = new MemoryRankingStore({ metaTtlMs: 1000, random: seededRandom() });
      await store.updateScore('p1', 10, 'Alice');

      vi.advanceTimersByTime(1000);
      const [entry] = await store.getTopPlayers(1);

      expect(entry).toMatchObject({ playerId: 'p1', score: 10, name: '' });
      expect(entry.updatedAt).toBeUndefined();
    });
  });

  describe('cancellation', () => {
    it('rejects when the signal has already fired', async () => {
      const store = new MemoryRankingStore();
      const controller = new AbortController();
      controller.abort();

      await expect(store.getRank('p1', { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError
      );
    });
  });
});
