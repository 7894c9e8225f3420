import { getLogger } from "../util/logger";
import { currentYear, systemClock, type Clock } from "../util/clock";
import type { CacheKey } from "./cache_key";

const logger = getLogger("cache/ttl_cache");

/** Returns the TTL in milliseconds for a key. Infinity never expires. */
export type TtlPolicy = (key: CacheKey) => number;

export interface CacheEntry<V> {
  key: string;
  value: V;
  fetchedAt: number;
  ttlMs: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  inFlight: number;
}

export function fixedTtlPolicy(ttlMs: number): TtlPolicy {
  return () => ttlMs;
}

/**
 * Past-year keys get `historicalTtlMs` (default: never expire); keys about the
 * current year or later, or carrying no year, get `liveTtlMs`.
 */
export function temporalTtlPolicy(options: {
  liveTtlMs: number;
  historicalTtlMs?: number;
  clock?: Clock;
}): TtlPolicy {
  const clock = options.clock ?? systemClock;
  const historical = options.historicalTtlMs ?? Number.POSITIVE_INFINITY;
  return (key) => {
    if (key.latestYear === undefined) return options.liveTtlMs;
    return key.latestYear < currentYear(clock) ? historical : options.liveTtlMs;
  };
}

export interface TtlCacheOptions {
  policy: TtlPolicy;
  clock?: Clock;
  name?: string;
}

/**
 * In-process memoization with lazy expiry and at-most-one-in-flight fetch per
 * key. Failed fetches are not stored and leave any prior entry untouched.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly policy: TtlPolicy;
  private readonly clock: Clock;
  private readonly name: string;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions) {
    this.policy = options.policy;
    this.clock = options.clock ?? systemClock;
    this.name = options.name ?? "cache";
  }

  /** Fresh cached value, or undefined. Expired entries stay until replaced. */
  peek(key: CacheKey): V | undefined {
    const entry = this.entries.get(key.id);
    if (!entry) return undefined;
    const age = this.clock.now().getTime() - entry.fetchedAt;
    return age < entry.ttlMs ? entry.value : undefined;
  }

  has(key: CacheKey): boolean {
    return this.peek(key) !== undefined || this.inFlight.has(key.id);
  }

  async getOrFetch<A extends unknown[]>(
    key: CacheKey,
    fetchFn: (...args: A) => Promise<V>,
    ...args: A
  ): Promise<V> {
    const entry = this.entries.get(key.id);
    if (entry) {
      const age = this.clock.now().getTime() - entry.fetchedAt;
      if (age < entry.ttlMs) {
        this.hits += 1;
        return entry.value;
      }
    }

    const pending = this.inFlight.get(key.id);
    if (pending) {
      this.hits += 1;
      return pending;
    }

    this.misses += 1;
    logger.debug({ cache: this.name, key: key.id }, "Cache miss");

    const promise = Promise.resolve()
      .then(() => fetchFn(...args))
      .then((value) => {
        this.entries.set(key.id, {
          key: key.id,
          value,
          fetchedAt: this.clock.now().getTime(),
          ttlMs: this.policy(key),
        });
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key.id) === promise) this.inFlight.delete(key.id);
      });

    this.inFlight.set(key.id, promise);
    return promise;
  }

  invalidate(key: CacheKey): boolean {
    return this.entries.delete(key.id);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      inFlight: this.inFlight.size,
    };
  }
}
