/**
 * gatehouse - StarRocks Backend
 *
 * StarRocks speaks the MySQL protocol, so sessions run on a `mysql2` pool.
 * When a catalog is configured every checkout switches to
 * `<catalog>.<database>` before use.
 */

import { createPool, PoolOptions } from 'mysql2/promise';
import { StarrocksConfig, starrocksConfigSchema } from '../config';
import type { Logger } from '../logging/logger';
import { Connection, DatabaseBackend, Engine, isRow, QueryResult, redactUrl } from './types';

// ============================================================================
// DRIVER SURFACE
// ============================================================================

export interface MysqlConnection {
  query(sql: string, values?: unknown[]): Promise<[unknown, unknown]>;
  release(): void;
  destroy(): void;
}

export interface MysqlPool {
  getConnection(): Promise<MysqlConnection>;
  end(): Promise<void>;
}

export type MysqlPoolFactory = (options: PoolOptions, logger: Logger) => MysqlPool;

function createMysqlPool(options: PoolOptions): MysqlPool {
  return createPool(options);
}

/**
 * Reads a `mysql2` result: an array of rows for reads, a header carrying
 * `affectedRows` for writes.
 */
export function toQueryResult(result: unknown): QueryResult {
  if (Array.isArray(result)) {
    const rows = result.filter(isRow);
    return { rows, rowCount: rows.length };
  }
  if (isRow(result)) {
    const affected = result.affectedRows;
    return { rows: [], rowCount: typeof affected === 'number' ? affected : 0 };
  }
  return { rows: [], rowCount: 0 };
}

function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

// ============================================================================
// BACKEND
// ============================================================================

/**
 * Maps pool settings onto `mysql2` options. Recycling maps to the idle
 * timeout, the only connection age limit `mysql2` offers.
 */
export function starrocksPoolOptions(config: StarrocksConfig): PoolOptions {
  const options: PoolOptions = {
    host: config.host,
    port: config.port,
    user: config.username,
    password: config.password,
    database: config.catalog ? undefined : config.database,
    connectionLimit: config.poolSize + config.poolMaxOverflow,
    maxIdle: config.poolSize,
    connectTimeout: config.poolTimeoutSeconds * 1000,
    waitForConnections: true,
    queueLimit: 0,
  };
  if (config.poolRecycleSeconds > 0) {
    options.idleTimeout = config.poolRecycleSeconds * 1000;
  }
  return options;
}

class StarrocksEngine implements Engine {
  readonly url: string;
  private readonly useStatement: string | null;

  constructor(url: string, config: StarrocksConfig, private readonly pool: MysqlPool) {
    this.url = redactUrl(url);
    this.useStatement = config.catalog
      ? `USE ${quoteIdentifier(config.catalog)}.${quoteIdentifier(config.database)}`
      : null;
  }

  async connect(): Promise<Connection> {
    const connection = await this.pool.getConnection();
    if (this.useStatement) {
      try {
        await connection.query(this.useStatement);
      } catch (error) {
        connection.destroy();
        throw error;
      }
    }

    return {
      async query(sql, params) {
        const [result] = await connection.query(sql, [...params]);
        return toQueryResult(result);
      },
      release(destroy) {
        if (destroy) {
          connection.destroy();
        } else {
          connection.release();
        }
      },
    };
  }

  end(): Promise<void> {
    return this.pool.end();
  }
}

export function createStarrocksBackend(
  createPoolFn: MysqlPoolFactory = createMysqlPool
): DatabaseBackend<StarrocksConfig> {
  return {
    expectedConfigType: () => ({ name: 'StarrocksConfig', kind: 'starrocks', schema: starrocksConfigSchema }),

    buildUrl(config) {
      const credentials = config.password === undefined
        ? encodeURIComponent(config.username)
        : `${encodeURIComponent(config.username)}:${encodeURIComponent(config.password)}`;
      const path = config.catalog ? `${config.catalog}.${config.database}` : config.database;
      return `starrocks://${credentials}@${config.host}:${config.port}/${path}`;
    },

    createEngine(url, config, logger) {
      if (config.poolUseLifo) {
        logger.debug('mysql2 hands out idle connections in its own order; poolUseLifo is advisory');
      }
      return new StarrocksEngine(url, config, createPoolFn(starrocksPoolOptions(config), logger));
    },
  };
}

export const starrocksBackend = createStarrocksBackend();
