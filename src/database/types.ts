/**
 * gatehouse - Database Types
 *
 * Contracts shared by the session manager and the database backends. A
 * backend turns a validated configuration into an `Engine`; the session
 * manager checks connections out of the engine and wraps them in sessions.
 *
 * SQL is passed to the driver untouched, so statements use the driver's own
 * placeholder syntax (`$1` for PostgreSQL, `?` for SQLite and StarRocks).
 */

import type { z } from 'zod';
import type { Logger } from '../logging/logger';
import type { DatabaseConfig } from '../config';

// ============================================================================
// ROWS & RESULTS
// ============================================================================

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  /** Rows returned, or rows affected for statements that return none. */
  rowCount: number;
}

export function isRow(value: unknown): value is Row {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ============================================================================
// ENGINE
// ============================================================================

/**
 * One checked-out driver connection.
 */
export interface Connection {
  query(sql: string, params: readonly unknown[]): Promise<QueryResult>;
  /** Returns the connection to the pool; `destroy` closes it instead. */
  release(destroy?: boolean): void;
}

/**
 * Driver pool built by a backend.
 */
export interface Engine {
  /** Connection URL with the password masked. */
  readonly url: string;
  connect(): Promise<Connection>;
  end(): Promise<void>;
}

// ============================================================================
// BACKENDS
// ============================================================================

export interface ConfigType<C> {
  /** Type name used in configuration errors. */
  name: string;
  kind: DatabaseConfig['kind'];
  schema: z.ZodType<C, z.ZodTypeDef, unknown>;
}

/**
 * Capabilities a database backend contributes to `SessionManager`.
 */
export interface DatabaseBackend<C extends DatabaseConfig> {
  expectedConfigType(): ConfigType<C>;
  buildUrl(config: C): string;
  createEngine(url: string, config: C, logger: Logger): Engine;
}

// ============================================================================
// SESSIONS
// ============================================================================

export interface Session {
  readonly inTransaction: boolean;
  readonly closed: boolean;
  query(sql: string, params?: readonly unknown[]): Promise<Row[]>;
  execute(sql: string, params?: readonly unknown[]): Promise<{ rowCount: number }>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Rolls back an open transaction and returns the connection. */
  close(): Promise<void>;
}

export interface SessionManagerPort {
  /**
   * The session bound to the current `runInSession` scope, or a new session
   * the caller must close.
   */
  getSession(): Session;
  runInSession<T>(fn: (session: Session) => Promise<T>): Promise<T>;
  /** Closes the current scope's session, if any. */
  removeSession(): Promise<void>;
  dispose(): Promise<void>;
}

/**
 * Replaces the password of a connection URL with `***`.
 */
export function redactUrl(url: string): string {
  return url.replace(/(\/\/[^:/@]+:)[^@]*@/, '$1***@');
}
