// =====================================================
// Redis Ranking Store Test Suite
// =====================================================
// Runs against a mocked ioredis client; no Redis server involved.

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RedisRankingStore } from './redis-ranking.store';
import { StoreUnavailableError } from '../utils/errors';

// ===========================================
// Mock Redis Client
// ===========================================

const mockPipeline = {
  hmget: vi.fn(),
  exec: vi.fn(),
};

const mockRedis = {
  rankingUpsert: vi.fn(),
  zrevrank: vi.fn(),
  zscore: vi.fn(),
  zcount: vi.fn(),
  zrevrange: vi.fn(),
  zcard: vi.fn(),
  pipeline: vi.fn(),
  ping: vi.fn(),
  quit: vi.fn(),
};

let store: RedisRankingStore;

beforeEach(() => {
  vi.clearAllMocks();
  mockRedis.pipeline.mockReturnValue(mockPipeline);
  mockPipeline.hmget.mockReturnValue(mockPipeline);
  store = new RedisRankingStore(mockRedis, { keyPrefix: 'lb', metaTtlSeconds: 60 });
});

afterEach(() => {
  vi.useRealTimers();
});

// ===========================================
// Writes
// ===========================================

describe('updateScore', () => {
  it('runs the upsert script with every key and argument', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_000_000);
    mockRedis.rankingUpsert.mockResolvedValue(null);

    await store.updateScore('p1', 120, 'Alice');

    expect(mockRedis.rankingUpsert).toHaveBeenCalledWith(
      'lb:global',
      'lb:distinct',
      'lb:counts',
      'lb:player:p1',
      'p1',
      '120',
      'Alice',
      '1700000000000',
      '60'
    );
  });

  it('wraps driver failures as StoreUnavailableError', async () => {
    mockRedis.rankingUpsert.mockRejectedValue(new Error('ECONNREFUSED'));

    const error = await store.updateScore('p1', 1, '').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({
      store: 'ranking',
      statusCode: 503,
      message: 'ranking store unavailable during updateScore: ECONNREFUSED',
    });
  });
});

// ===========================================
// Reads
// ===========================================

describe('getRank / getScore', () => {
  it('converts the 0-based reverse rank', async () => {
    mockRedis.zrevrank.mockResolvedValue(0);

    expect(await store.getRank('p1')).toBe(1);
    expect(mockRedis.zrevrank).toHaveBeenCalledWith('lb:global', 'p1');
  });

  it('returns null for absent members', async () => {
    mockRedis.zrevrank.mockResolvedValue(null);
    mockRedis.zscore.mockResolvedValue(null);

    expect(await store.getRank('ghost')).toBeNull();
    expect(await store.getScore('ghost')).toBeNull();
  });

  it('parses scores', async () => {
    mockRedis.zscore.mockResolvedValue('-42');

    expect(await store.getScore('p1')).toBe(-42);
  });
});

describe('getDenseRank', () => {
  it('counts distinct scores strictly above', async () => {
    mockRedis.zcount.mockResolvedValue(2);

    expect(await store.getDenseRank(50)).toBe(3);
    expect(mockRedis.zcount).toHaveBeenCalledWith('lb:distinct', '(50', '+inf');
  });
});

describe('getNeighborRange', () => {
  it('reads the window and joins names from metadata', async () => {
    mockRedis.zrevrank.mockResolvedValue(4);
    mockRedis.zrevrange.mockResolvedValue(['p3', '80', 'p4', '70']);
    mockPipeline.exec.mockResolvedValue([
      [null, ['Carol', '1700000000000']],
      [new Error('timeout'), null],
    ]);

    const range = await store.getNeighborRange('p5', 5);

    expect(mockRedis.zrevrange).toHaveBeenCalledWith('lb:global', 2, 6, 'WITHSCORES');
    expect(mockPipeline.hmget).toHaveBeenCalledWith('lb:player:p3', 'name', 'updated_at');
    expect(range).toEqual([
      { playerId: 'p3', rank: 3, score: 80, name: 'Carol', updatedAt: new Date(1_700_000_000_000) },
      { playerId: 'p4', rank: 4, score: 70, name: '', updatedAt: undefined },
    ]);
  });

  it('returns null when the player is not ranked', async () => {
    mockRedis.zrevrank.mockResolvedValue(null);

    expect(await store.getNeighborRange('ghost', 5)).toBeNull();
    expect(mockRedis.zrevrange).not.toHaveBeenCalled();
  });
});

describe('getTopPlayers', () => {
  it('skips the metadata round trip for an empty board', async () => {
    mockRedis.zrevrange.mockResolvedValue([]);

    expect(await store.getTopPlayers(10)).toEqual([]);
    expect(mockRedis.zrevrange).toHaveBeenCalledWith('lb:global', 0, 9, 'WITHSCORES');
    expect(mockRedis.pipeline).not.toHaveBeenCalled();
  });

  it('gives missing metadata an empty name', async () => {
    mockRedis.zrevrange.mockResolvedValue(['p1', '10']);
    mockPipeline.exec.mockResolvedValue([[null, [null, null]]]);

    expect(await store.getTopPlayers(1)).toEqual([
      { playerId: 'p1', rank: 1, score: 10, name: '', updatedAt: undefined },
    ]);
  });
});

describe('healthCheck / close', () => {
  it('pings and quits', async () => {
    mockRedis.ping.mockResolvedValue('PONG');
    mockRedis.quit.mockResolvedValue('OK');

    await store.healthCheck();
    await store.close();

    expect(mockRedis.ping).toHaveBeenCalledTimes(1);
    expect(mockRedis.quit).toHaveBeenCalledTimes(1);
  });

  it('reports an unreachable server', async () => {
    mockRedis.ping.mockRejectedValue(new Error('Connection is closed.'));

    await expect(store.healthCheck()).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
