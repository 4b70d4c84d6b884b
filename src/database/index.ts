/**
 * gatehouse - Database Module
 */

import { DatabaseConfig, parseDatabaseConfig } from '../config';
import type { Logger } from '../logging/logger';
import { postgresBackend } from './postgres-backend';
import { SessionManager } from './session-manager';
import { sqliteBackend } from './sqlite-backend';
import { starrocksBackend } from './starrocks-backend';

export * from './types';
export { DatabaseSession } from './session';
export { SessionManager } from './session-manager';
export type { SessionManagerOptions } from './session-manager';
export { createPostgresBackend, postgresBackend, postgresPoolOptions } from './postgres-backend';
export type { PgClient, PgPool, PgPoolFactory } from './postgres-backend';
export { createSqliteBackend, sqliteBackend } from './sqlite-backend';
export { createStarrocksBackend, starrocksBackend, starrocksPoolOptions, toQueryResult } from './starrocks-backend';
export type { MysqlConnection, MysqlPool, MysqlPoolFactory } from './starrocks-backend';

/**
 * Builds a session manager for whichever backend `config.kind` names.
 */
export function createSessionManager(config: unknown, logger?: Logger): SessionManager<DatabaseConfig> {
  const parsed = parseDatabaseConfig(config);
  switch (parsed.kind) {
    case 'postgres':
      return new SessionManager(postgresBackend, parsed, { logger });
    case 'sqlite':
      return new SessionManager(sqliteBackend, parsed, { logger });
    case 'starrocks':
      return new SessionManager(starrocksBackend, parsed, { logger });
  }
}
