/**
 * KeyedCache: in-memory TTL cache with a broadcast notifier
 *
 * Holds at most one entry per key. Every mutation is committed to the map
 * before its event is published, so a listener reading the cache from inside
 * its callback always sees the state the event describes.
 *
 * STALENESS:
 * An entry older than `ttlMs` is still served. Reading it schedules one
 * background refresh through the retry wrapper; a failed refresh leaves the
 * stale value in place.
 *
 * LOADS:
 * Concurrent loads of the same key share one in-flight call. A load only
 * writes its result back if nothing was set or invalidated for that key while
 * it was running.
 *
 * Construct one per consumer graph (e.g. at the application's composition
 * root) and pass it down; there is no global instance.
 */

import {CacheEntry, CacheEvent, RetryPolicy} from '../types';
import {RetryOptions, withRetry} from '../resilience/withRetry';
import {toError} from '../resilience/errors';

export type CacheListener<V> = (event: CacheEvent<V>) => void;
export type Unsubscribe = () => void;

export type KeyedCacheOptions<V> = {
  readonly ttlMs?: number;
  // epoch milliseconds
  readonly now?: () => number;
  readonly loader?: (key: string) => Promise<V>;
  readonly retryPolicy?: RetryPolicy;
  readonly sleep?: RetryOptions<V>['sleep'];
  readonly onRefreshError?: (key: string, error: Error) => void;
};

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

const DEFAULT_LOAD_POLICY: RetryPolicy = {maxAttempts: 3, baseDelayMs: 500, backoffMultiplier: 2};

export class KeyedCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly listeners = new Set<CacheListener<V>>();
  // a set or invalidate detaches the key's load, which then discards its result
  private readonly inflight = new Map<string, Promise<V>>();

  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly options: KeyedCacheOptions<V> = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? (() => Date.now());
    this.retryPolicy = options.retryPolicy ?? DEFAULT_LOAD_POLICY;
    if (!(this.ttlMs > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${this.ttlMs}ms`);
    }
  }

  /**
   * Current entry for the key. A stale entry is returned as is and a
   * background refresh is scheduled.
   */
  get(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (entry && this.isStale(entry)) {
      this.refreshInBackground(key);
    }
    return entry;
  }

  /** Like get, without scheduling a refresh. */
  peek(key: string): CacheEntry<V> | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V): void {
    this.inflight.delete(key);
    this.entries.set(key, {key, value, lastUpdated: this.now(), ttlMs: this.ttlMs});
    this.publish({type: 'set', key, value});
  }

  invalidate(key: string): void {
    this.inflight.delete(key);
    this.entries.delete(key);
    this.publish({type: 'invalidate', key});
  }

  invalidateAll(): void {
    this.inflight.clear();
    this.entries.clear();
    this.publish({type: 'reset'});
  }

  /**
   * Registers a listener for every event published from now on.
   * Call the returned function on teardown.
   */
  subscribe(listener: CacheListener<V>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Read-through: cached value (fresh or stale) or a load on miss. */
  async fetch(key: string): Promise<V> {
    const entry = this.get(key);
    if (entry) {
      return entry.value;
    }
    return this.load(key);
  }

  /** Loads the key now, sharing any load already in flight. */
  refresh(key: string): Promise<V> {
    return this.load(key);
  }

  isStale(entry: CacheEntry<V>): boolean {
    return this.now() - entry.lastUpdated > entry.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  dispose(): void {
    this.listeners.clear();
  }

  // ============== PRIVATE HELPERS ==============

  private load(key: string): Promise<V> {
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }
    const loader = this.options.loader;
    if (!loader) {
      return Promise.reject(new Error(`No loader configured for cache key "${key}"`));
    }

    const promise: Promise<V> = withRetry(() => loader(key), this.retryPolicy, {sleep: this.options.sleep})
      .then(value => {
        if (this.inflight.get(key) === promise) {
          this.set(key, value);
        }
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === promise) {
          this.inflight.delete(key);
        }
      });
    this.inflight.set(key, promise);
    return promise;
  }

  private refreshInBackground(key: string): void {
    if (!this.options.loader || this.inflight.has(key)) {
      return;
    }
    void this.load(key).catch((error: unknown) => {
      const err = toError(error);
      console.warn(`⚠️  Background refresh failed for "${key}", serving stale value: ${err.message}`);
      this.options.onRefreshError?.(key, err);
    });
  }

  private publish(event: CacheEvent<V>): void {
    // Snapshot so listeners may unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error(`❌ Cache listener threw on "${event.type}" event:`, error);
      }
    }
  }
}
