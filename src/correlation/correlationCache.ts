/**
 * Process-wide correlation ledger.
 *
 * Maps a hex trace identifier to the in-flight tracing context so that
 * callbacks which share no call stack can find the trace of their request.
 * Entries are removed when the server span completes; the LRU bound only
 * reclaims entries whose request never reached that point.
 *
 * Every operation is synchronous, so each one runs to completion on the
 * event loop before any other request's callback can observe the map.
 */

import type { Context } from '@opentelemetry/api';

export interface CorrelationCache<T> {
  /** Non-destructive lookup. Refreshes the entry's recency. */
  get(key: string): T | undefined;
  /** Insert or overwrite (last write wins). */
  store(key: string, value: T): void;
  /** Take the entry out. Returns `undefined` once it is gone. */
  remove(key: string): T | undefined;
  readonly size: number;
}

export interface CorrelationCacheConfig {
  /** Maximum number of entries. Defaults to 1,000,000. */
  capacity?: number;
}

export const DEFAULT_CACHE_CAPACITY = 1_000_000;

export class LruCorrelationCache<T extends NonNullable<unknown>> implements CorrelationCache<T> {
  readonly capacity: number;
  // Map iteration order is insertion order: the first key is the least recently used.
  private readonly entries = new Map<string, T>();
  private evictionCount = 0;

  constructor(config: CorrelationCacheConfig = {}) {
    const capacity = config.capacity ?? DEFAULT_CACHE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Correlation cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get(key: string): T | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  store(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictLRU();
    }
    this.entries.set(key, value);
  }

  remove(key: string): T | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }
    this.entries.delete(key);
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Entries dropped for capacity since construction. */
  get evictions(): number {
    return this.evictionCount;
  }

  private evictLRU(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictionCount++;
    }
  }
}

// ─── Process-wide instance ───────────────────────────────────────────────────

let sharedCache: LruCorrelationCache<Context> | undefined;

/**
 * Returns the process-wide cache, creating it on first use.
 */
export function getCorrelationCache(): LruCorrelationCache<Context> {
  if (!sharedCache) {
    sharedCache = new LruCorrelationCache<Context>();
  }
  return sharedCache;
}

/**
 * Replaces the process-wide cache with an empty one.
 */
export function resetCorrelationCache(config?: CorrelationCacheConfig): LruCorrelationCache<Context> {
  sharedCache = new LruCorrelationCache<Context>(config);
  return sharedCache;
}
