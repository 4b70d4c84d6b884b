/**
 * @fileoverview Read-through TTL cache
 *
 * One `TtlCache` memoizes one operation. Entries are keyed by the operation's
 * argument tuple, expire `ttlSeconds` after they were stored, and are evicted
 * in insertion order once `maxEntries` is reached.
 *
 * @module cache/ttl-cache
 *
 * @example
 * ```typescript
 * const userById = new TtlCache<[string], User | null>('userById', { ttlSeconds: 300, maxEntries: 100 });
 *
 * const user = await userById.getOrCompute([id], () => admin.getUser(id));
 * userById.invalidate([id]);
 * ```
 */

/**
 * Lifetime and size bound of a cache.
 */
export interface CachePolicy {
  /** Seconds an entry stays fresh after it is stored. */
  ttlSeconds: number;
  /** Entry count at which the oldest insertion is evicted. */
  maxEntries: number;
}

/**
 * The part of a cache the registry needs.
 */
export interface InvalidatableCache {
  readonly name: string;
  readonly size: number;
  /** Drop every entry. */
  invalidate(): void;
}

export interface TtlCacheOptions<A extends readonly unknown[]> {
  /**
   * Derives the storage key from an argument tuple.
   * Defaults to `JSON.stringify(args)`.
   */
  keyOf?: (args: A) => string;
}

interface CacheEntry<A, V> {
  args: A;
  value: V;
  /** Epoch milliseconds at and after which the entry is stale. */
  expiresAt: number;
}

export class TtlCache<A extends readonly unknown[], V> implements InvalidatableCache {
  public readonly name: string;
  public readonly policy: Readonly<CachePolicy>;
  private readonly entries = new Map<string, CacheEntry<A, V>>();
  private readonly keyOf: (args: A) => string;
  // Bumped by every invalidation; a computation that started under an older
  // generation does not store its result.
  private generation = 0;

  constructor(name: string, policy: CachePolicy, options: TtlCacheOptions<A> = {}) {
    if (!Number.isFinite(policy.ttlSeconds) || policy.ttlSeconds <= 0) {
      throw new RangeError(`Cache ${name}: ttlSeconds must be a positive number`);
    }
    if (!Number.isInteger(policy.maxEntries) || policy.maxEntries < 1) {
      throw new RangeError(`Cache ${name}: maxEntries must be a positive integer`);
    }

    this.name = name;
    this.policy = { ...policy };
    this.keyOf = options.keyOf ?? ((args) => JSON.stringify(args));
  }

  /** Number of stored entries, stale ones included. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the fresh cached value for `args`, or calls `compute`, stores its
   * result and returns it. A rejected `compute` stores nothing.
   */
  async getOrCompute(args: A, compute: () => Promise<V>): Promise<V> {
    const key = this.keyOf(args);
    const entry = this.entries.get(key);
    if (entry && Date.now() < entry.expiresAt) {
      return entry.value;
    }

    const generation = this.generation;
    const value = await compute();
    if (generation === this.generation) {
      this.store(key, args, value);
    }
    return value;
  }

  /**
   * True when a fresh entry exists for `args`.
   */
  has(args: A): boolean {
    const entry = this.entries.get(this.keyOf(args));
    return entry !== undefined && Date.now() < entry.expiresAt;
  }

  /**
   * Drops the entry for `args`, or every entry when called without arguments.
   */
  invalidate(args?: A): void {
    this.generation++;
    if (args === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(this.keyOf(args));
    }
  }

  /**
   * Drops every entry whose argument tuple matches.
   *
   * @returns number of entries removed
   */
  invalidateWhere(predicate: (args: A) => boolean): number {
    this.generation++;
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (predicate(entry.args)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private store(key: string, args: A, value: V): void {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);

    if (this.entries.size >= this.policy.maxEntries) {
      this.purgeExpired();
    }
    while (this.entries.size >= this.policy.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, {
      args,
      value,
      expiresAt: Date.now() + this.policy.ttlSeconds * 1000,
    });
  }

  private purgeExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }
}
