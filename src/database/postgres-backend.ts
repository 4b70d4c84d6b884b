/**
 * gatehouse - PostgreSQL Backend
 *
 * Runs sessions on a `pg` connection pool.
 */

import { Pool, PoolConfig } from 'pg';
import { PostgresConfig, postgresConfigSchema } from '../config';
import type { Logger } from '../logging/logger';
import { Connection, DatabaseBackend, Engine, isRow, redactUrl } from './types';

// ============================================================================
// DRIVER SURFACE
// ============================================================================

/**
 * The subset of `pg.PoolClient` a session uses.
 */
export interface PgClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  release(destroy?: Error | boolean): void;
}

/**
 * The subset of `pg.Pool` the engine uses.
 */
export interface PgPool {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export type PgPoolFactory = (options: PoolConfig, logger: Logger) => PgPool;

function createPgPool(options: PoolConfig, logger: Logger): PgPool {
  const pool = new Pool(options);
  // Idle clients that lose their server emit here; without a listener the process exits.
  pool.on('error', (error) => {
    logger.warn({ err: error }, 'idle postgres client failed');
  });
  return pool;
}

// ============================================================================
// BACKEND
// ============================================================================

/**
 * Maps pool settings onto `pg` options. `pg` has no overflow tier, so the
 * pool may grow to `poolSize + poolMaxOverflow` clients.
 */
export function postgresPoolOptions(url: string, config: PostgresConfig): PoolConfig {
  return {
    connectionString: url,
    max: config.poolSize + config.poolMaxOverflow,
    connectionTimeoutMillis: config.poolTimeoutSeconds * 1000,
    maxLifetimeSeconds: config.poolRecycleSeconds > 0 ? config.poolRecycleSeconds : 0,
  };
}

class PgEngine implements Engine {
  readonly url: string;

  constructor(url: string, private readonly pool: PgPool) {
    this.url = redactUrl(url);
  }

  async connect(): Promise<Connection> {
    const client = await this.pool.connect();
    return {
      async query(sql, params) {
        const result = await client.query(sql, [...params]);
        const rows = result.rows.filter(isRow);
        return { rows, rowCount: result.rowCount ?? rows.length };
      },
      release(destroy) {
        client.release(destroy === true);
      },
    };
  }

  end(): Promise<void> {
    return this.pool.end();
  }
}

export function createPostgresBackend(createPool: PgPoolFactory = createPgPool): DatabaseBackend<PostgresConfig> {
  return {
    expectedConfigType: () => ({ name: 'PostgresConfig', kind: 'postgres', schema: postgresConfigSchema }),

    buildUrl(config) {
      const credentials = config.password === undefined
        ? encodeURIComponent(config.username)
        : `${encodeURIComponent(config.username)}:${encodeURIComponent(config.password)}`;
      return `postgresql://${credentials}@${config.host}:${config.port}/${encodeURIComponent(config.database)}`;
    },

    createEngine(url, config, logger) {
      if (!config.poolUseLifo) {
        logger.warn('pg hands out idle clients most-recent first; poolUseLifo=false is ignored');
      }
      return new PgEngine(url, createPool(postgresPoolOptions(url, config), logger));
    },
  };
}

export const postgresBackend = createPostgresBackend();
