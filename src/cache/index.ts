export { TtlCache } from './ttl-cache';
export type { CachePolicy, InvalidatableCache, TtlCacheOptions } from './ttl-cache';
export { CacheRegistry } from './registry';
