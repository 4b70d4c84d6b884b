import type { Logger } from '../logging/logger';
import { TtlCache, CachePolicy, InvalidatableCache, TtlCacheOptions } from './ttl-cache';

/**
 * Explicit set of named caches owned by one adapter instance.
 *
 * Caches register themselves at construction time; clearing "everything"
 * walks this registry.
 */
export class CacheRegistry {
  private readonly caches = new Map<string, InvalidatableCache>();
  private readonly logger?: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger;
  }

  /**
   * Registers an existing cache. Names are unique per registry.
   */
  register<C extends InvalidatableCache>(cache: C): C {
    if (this.caches.has(cache.name)) {
      throw new Error(`Cache ${cache.name} is already registered`);
    }
    this.caches.set(cache.name, cache);
    return cache;
  }

  /**
   * Creates and registers a cache in one step.
   */
  create<A extends readonly unknown[], V>(
    name: string,
    policy: CachePolicy,
    options?: TtlCacheOptions<A>
  ): TtlCache<A, V> {
    return this.register(new TtlCache<A, V>(name, policy, options));
  }

  get(name: string): InvalidatableCache | undefined {
    return this.caches.get(name);
  }

  names(): string[] {
    return [...this.caches.keys()];
  }

  /**
   * Clears every entry of the named cache.
   *
   * @returns false when no cache has that name
   */
  invalidate(name: string): boolean {
    const cache = this.caches.get(name);
    if (!cache) {
      return false;
    }
    cache.invalidate();
    this.logger?.debug({ cache: name }, 'cache invalidated');
    return true;
  }

  invalidateAll(): void {
    for (const cache of this.caches.values()) {
      cache.invalidate();
    }
    this.logger?.debug({ caches: this.caches.size }, 'all caches invalidated');
  }

  /**
   * Entry count per cache.
   */
  stats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [name, cache] of this.caches) {
      stats[name] = cache.size;
    }
    return stats;
  }
}
