/**
 * gatehouse - Cache Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { CacheRegistry } from '../../src/cache/registry';
import { TtlCache } from '../../src/cache/ttl-cache';

describe('CacheRegistry', () => {
  it('should create and register caches by name', () => {
    const registry = new CacheRegistry();

    const cache = registry.create<[string], string>('users', { ttlSeconds: 60, maxEntries: 10 });

    expect(registry.get('users')).toBe(cache);
    expect(registry.names()).toEqual(['users']);
  });

  it('should refuse duplicate names', () => {
    const registry = new CacheRegistry();
    registry.create('users', { ttlSeconds: 60, maxEntries: 10 });

    expect(() => registry.register(new TtlCache('users', { ttlSeconds: 1, maxEntries: 1 }))).toThrow(
      'Cache users is already registered'
    );
  });

  it('should invalidate a single cache by name', async () => {
    const registry = new CacheRegistry();
    const users = registry.create<[string], string>('users', { ttlSeconds: 60, maxEntries: 10 });
    const roles = registry.create<[string], string>('roles', { ttlSeconds: 60, maxEntries: 10 });
    await users.getOrCompute(['u1'], async () => 'ada');
    await roles.getOrCompute(['u1'], async () => 'admin');

    expect(registry.invalidate('users')).toBe(true);

    expect(registry.stats()).toEqual({ users: 0, roles: 1 });
  });

  it('should report unknown names', () => {
    expect(new CacheRegistry().invalidate('nope')).toBe(false);
  });

  it('should invalidate every cache', async () => {
    const registry = new CacheRegistry();
    const users = registry.create<[string], string>('users', { ttlSeconds: 60, maxEntries: 10 });
    const roles = registry.create<[string], string>('roles', { ttlSeconds: 60, maxEntries: 10 });
    await users.getOrCompute(['u1'], async () => 'ada');
    await roles.getOrCompute(['u1'], async () => 'admin');

    registry.invalidateAll();

    expect(registry.stats()).toEqual({ users: 0, roles: 0 });
  });
});
