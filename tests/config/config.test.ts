/**
 * gatehouse - Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  describeValue,
  loadConfig,
  parseDatabaseConfig,
  parseIdentityConfig,
} from '../../src/config';
import { ConfigurationError } from '../../src/types';

describe('parseIdentityConfig', () => {
  it('should apply defaults', () => {
    expect(
      parseIdentityConfig({ serverUrl: 'https://id.test', realmName: 'demo', clientId: 'backend' })
    ).toEqual({
      serverUrl: 'https://id.test',
      realmName: 'demo',
      clientId: 'backend',
      verifySsl: true,
      timeoutSeconds: 10,
      leaseMarginSeconds: 30,
    });
  });

  it('should name expected and received types', () => {
    try {
      parseIdentityConfig({ serverUrl: 'https://id.test', realmName: 'demo', clientId: 'backend', verifySsl: 'yes' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        expected: 'boolean',
        received: 'string',
        message: 'Invalid IdentityConfig: verifySsl: expected boolean, got string',
      });
    }
  });

  it('should reject a non-object', () => {
    expect(() => parseIdentityConfig(42)).toThrow('Expected IdentityConfig, got number');
  });
});

describe('parseDatabaseConfig', () => {
  it('should fill pool defaults for sqlite', () => {
    expect(parseDatabaseConfig({ kind: 'sqlite' })).toEqual({
      kind: 'sqlite',
      database: ':memory:',
      poolSize: 20,
      poolMaxOverflow: 0,
      poolRecycleSeconds: 600,
      poolPrePing: true,
      poolTimeoutSeconds: 30,
      poolUseLifo: true,
      echo: false,
    });
  });

  it('should reject a pool option of the wrong type', () => {
    expect(() =>
      parseDatabaseConfig({ kind: 'postgres', database: 'app', username: 'svc', poolSize: '20' })
    ).toThrow('Invalid DatabaseConfig: poolSize: expected number, got string');
  });

  it('should reject an unknown kind', () => {
    expect(() => parseDatabaseConfig({ kind: 'oracle' })).toThrow(ConfigurationError);
  });
});

describe('describeValue', () => {
  it('should name database configs by their kind', () => {
    expect(describeValue({ kind: 'starrocks' })).toBe('StarrocksConfig');
    expect(describeValue({ kind: 'other' })).toBe('object');
  });

  it('should distinguish null and arrays', () => {
    expect(describeValue(null)).toBe('null');
    expect(describeValue([])).toBe('array');
    expect(describeValue('x')).toBe('string');
  });
});

describe('loadConfig', () => {
  it('should default to info logging and no adapters', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info' });
  });

  it('should read identity settings', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      IDENTITY_SERVER_URL: 'https://id.test',
      IDENTITY_REALM: 'demo',
      IDENTITY_CLIENT_ID: 'backend',
      IDENTITY_CLIENT_SECRET: 'test-secret',
      IDENTITY_VERIFY_SSL: 'false',
      IDENTITY_TIMEOUT_SECONDS: '5',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      identity: {
        serverUrl: 'https://id.test',
        realmName: 'demo',
        clientId: 'backend',
        clientSecret: 'test-secret',
        verifySsl: false,
        timeoutSeconds: 5,
        leaseMarginSeconds: 30,
      },
    });
  });

  it('should read database settings', () => {
    const config = loadConfig({
      DATABASE_KIND: 'postgres',
      DATABASE_HOST: 'db.internal',
      DATABASE_NAME: 'app',
      DATABASE_USER: 'svc',
      DATABASE_PASSWORD: 'test-secret',
      DATABASE_POOL_SIZE: '5',
      DATABASE_POOL_PRE_PING: 'false',
    });

    expect(config.database).toMatchObject({
      kind: 'postgres',
      host: 'db.internal',
      port: 5432,
      database: 'app',
      username: 'svc',
      poolSize: 5,
      poolPrePing: false,
    });
  });

  it('should reject a malformed number', () => {
    expect(() => loadConfig({ DATABASE_KIND: 'postgres', DATABASE_PORT: 'abc' })).toThrow(ConfigurationError);
  });
});
