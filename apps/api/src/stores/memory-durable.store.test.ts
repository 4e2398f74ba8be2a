import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryDurableStore } from './memory-durable.store';

describe('MemoryDurableStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns null for a missing player', async () => {
    const store = new MemoryDurableStore();

    expect(await store.getPlayer('nobody')).toBeNull();
  });

  it('keeps the stored name when an update carries an empty one', async () => {
    const store = new MemoryDurableStore();
    await store.upsertPlayer({ id: 'p1', name: 'Alice', totalScore: 10 });
    await store.upsertPlayer({ id: 'p1', name: '', totalScore: 25 });

    expect(await store.getPlayer('p1')).toMatchObject({ id: 'p1', name: 'Alice', totalScore: 25 });
  });

  it('hands out copies', async () => {
    const store = new MemoryDurableStore();
    await store.upsertPlayer({ id: 'p1', name: 'Alice', totalScore: 10 });

    const player = await store.getPlayer('p1');
    if (player) player.totalScore = 999;

    expect((await store.getPlayer('p1'))?.totalScore).toBe(10);
  });

  it('orders top players by total, then earliest update, then id', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const store = new MemoryDurableStore();

    await store.upsertPlayer({ id: 'late', name: '', totalScore: 50 });
    vi.setSystemTime(new Date('2026-01-01T00:00:05Z'));
    await store.upsertPlayer({ id: 'b', name: '', totalScore: 50 });
    await store.upsertPlayer({ id: 'a', name: '', totalScore: 50 });
    await store.upsertPlayer({ id: 'top', name: '', totalScore: 90 });

    const top = await store.getTopPlayers(3);

    expect(top.map((p) => p.id)).toEqual(['top', 'late', 'a']);
  });

  it('returns history newest first, limited', async () => {
    const store = new MemoryDurableStore();
    await store.upsertPlayer({ id: 'p1', name: '', totalScore: 0 });
    await store.recordHistory({ playerId: 'p1', scoreChange: 10, finalScore: 10, reason: 'win' });
    await store.recordHistory({ playerId: 'p2', scoreChange: 5, finalScore: 5, reason: 'other' });
    await store.recordHistory({ playerId: 'p1', scoreChange: -3, finalScore: 7, reason: 'penalty' });

    const history = await store.getPlayerHistory('p1', 1);

    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ id: 3, playerId: 'p1', scoreChange: -3, finalScore: 7, reason: 'penalty' });
  });

  it('returns the most recent snapshot', async () => {
    const store = new MemoryDurableStore();

    expect(await store.getLatestSnapshot()).toBeNull();

    await store.saveSnapshot('[]', 0);
    await store.saveSnapshot('[{"id":"p1"}]', 1);

    expect(await store.getLatestSnapshot()).toMatchObject({ id: 2, playerCount: 1, data: '[{"id":"p1"}]' });
  });
});
