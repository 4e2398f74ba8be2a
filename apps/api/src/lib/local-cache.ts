// =====================================================
// Local Cache
// =====================================================
// In-process LRU cache with absolute per-entry TTL.
// A Map keeps insertion order, so re-inserting on access moves an entry
// to the most-recent end and the first key is always the LRU victim.
// Every method is synchronous and runs to completion on the event loop.

import type { CacheStats } from '@rankline/shared-types';
import { logger } from '../utils/logger';

// ===========================================
// Types
// ===========================================

export interface LocalCacheOptions {
  capacity: number;
  ttlMs: number;
  sweepIntervalMs: number;
  now?: () => number;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

// ===========================================
// Cache
// ===========================================

export class LocalCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;
  private hits = 0;
  private misses = 0;

  constructor(options: LocalCacheOptions) {
    if (options.capacity < 1) {
      throw new Error('LocalCache capacity must be at least 1');
    }
    this.capacity = options.capacity;
    this.ttlMs = options.ttlMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.now = options.now ?? (() => Date.now());
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictOldest();
    }

    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drops every entry and resets the hit/miss counters.
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  clearByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of Array.from(this.entries.entries())) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug(`[LocalCache] swept ${removed} expired entries`);
    }
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : (this.hits / lookups) * 100,
      size: this.entries.size,
      capacity: this.capacity,
      utilization: (this.entries.size / this.capacity) * 100,
    };
  }

  // ===========================================
  // Sweep lifecycle
  // ===========================================

  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => this.sweepExpired(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
    }
  }
}
