/**
 * gatehouse - Database Session
 *
 * A session checks a connection out of the engine on first use and keeps it
 * until `close()`. Statements issued concurrently share that one checkout.
 * Driver errors never leave the session: a failed checkout is
 * `UnavailableError`, a failed statement is `InternalError`. A closed
 * session refuses further statements.
 */

import type { Logger } from '../logging/logger';
import { InternalError, UnavailableError } from '../types';
import type { Connection, Engine, QueryResult, Row, Session } from './types';

export interface DatabaseSessionOptions {
  engine: Engine;
  /** Run `SELECT 1` on checkout and replace a dead connection once. */
  prePing: boolean;
  /** Log every statement at debug level. */
  echo: boolean;
  logger: Logger;
}

export class DatabaseSession implements Session {
  private connection: Connection | null = null;
  private pending: Promise<Connection> | null = null;
  private transaction = false;
  private isClosed = false;
  private readonly options: DatabaseSessionOptions;

  constructor(options: DatabaseSessionOptions) {
    this.options = options;
  }

  get inTransaction(): boolean {
    return this.transaction;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async query(sql: string, params: readonly unknown[] = []): Promise<Row[]> {
    const result = await this.run(sql, params);
    return result.rows;
  }

  async execute(sql: string, params: readonly unknown[] = []): Promise<{ rowCount: number }> {
    const result = await this.run(sql, params);
    return { rowCount: result.rowCount };
  }

  async begin(): Promise<void> {
    await this.run('BEGIN', []);
    this.transaction = true;
  }

  async commit(): Promise<void> {
    if (!this.transaction) return;
    try {
      await this.run('COMMIT', []);
    } finally {
      this.transaction = false;
    }
  }

  async rollback(): Promise<void> {
    if (!this.transaction) return;
    try {
      await this.run('ROLLBACK', []);
    } finally {
      this.transaction = false;
    }
  }

  async close(): Promise<void> {
    if (this.isClosed) return;

    const connection = await this.settle();
    if (!connection) {
      this.isClosed = true;
      return;
    }

    let broken = false;
    try {
      await this.rollback();
    } catch (error) {
      broken = true;
      this.options.logger.warn({ err: error }, 'rollback on close failed');
    } finally {
      this.connection = null;
      this.pending = null;
      this.isClosed = true;
      connection.release(broken);
    }
  }

  private async run(sql: string, params: readonly unknown[]): Promise<QueryResult> {
    const connection = await this.checkout();
    if (this.options.echo) {
      this.options.logger.debug({ sql, params: params.length }, 'statement');
    }
    try {
      return await connection.query(sql, params);
    } catch (error) {
      throw new InternalError(error instanceof Error ? error.message : undefined, { cause: error });
    }
  }

  private checkout(): Promise<Connection> {
    if (this.isClosed) {
      return Promise.reject(new InternalError('Session is closed'));
    }
    if (!this.pending) {
      this.pending = this.open().then(
        (connection) => {
          this.connection = connection;
          return connection;
        },
        (error: unknown) => {
          this.pending = null;
          throw error;
        }
      );
    }
    return this.pending;
  }

  /** Waits for an in-flight checkout; `null` when none succeeded. */
  private async settle(): Promise<Connection | null> {
    if (this.connection || !this.pending) {
      return this.connection;
    }
    try {
      return await this.pending;
    } catch (error) {
      this.options.logger.debug({ err: error }, 'checkout failed before close');
      return null;
    }
  }

  private async open(): Promise<Connection> {
    let connection = await this.connect();
    if (this.options.prePing) {
      try {
        await connection.query('SELECT 1', []);
      } catch (error) {
        this.options.logger.debug({ err: error }, 'pre-ping failed, replacing connection');
        connection.release(true);
        connection = await this.connect();
      }
    }
    return connection;
  }

  private async connect(): Promise<Connection> {
    try {
      return await this.options.engine.connect();
    } catch (error) {
      throw new UnavailableError('database', { cause: error });
    }
  }
}
