/**
 * gatehouse - Session Manager
 *
 * Validates a database configuration against a backend, builds the engine,
 * and hands out sessions. `runInSession` binds one session to the async
 * context, so every `getSession()` call made inside the callback (however
 * deeply nested) sees the same session.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { DatabaseConfig, describeValue, isDatabaseKind, parseConfig } from '../config';
import { createChildLogger, Logger } from '../logging/logger';
import { ConfigurationError } from '../types';
import { DatabaseSession } from './session';
import { DatabaseBackend, Engine, redactUrl, Session, SessionManagerPort } from './types';

export interface SessionManagerOptions {
  logger?: Logger;
}

export class SessionManager<C extends DatabaseConfig> implements SessionManagerPort {
  readonly config: C;
  readonly engine: Engine;

  private readonly scope = new AsyncLocalStorage<DatabaseSession>();
  private readonly logger: Logger;
  private disposed = false;

  constructor(backend: DatabaseBackend<C>, config: unknown, options: SessionManagerOptions = {}) {
    const expected = backend.expectedConfigType();

    if (config !== null && typeof config === 'object' && !Array.isArray(config)) {
      const kind: unknown = Reflect.get(config, 'kind');
      if (isDatabaseKind(kind) && kind !== expected.kind) {
        throw new ConfigurationError(expected.name, describeValue(config));
      }
    }

    this.config = parseConfig(expected.schema, expected.name, config);
    this.logger = (options.logger ?? createChildLogger({ component: 'database' })).child({ kind: expected.kind });

    const url = backend.buildUrl(this.config);
    this.engine = backend.createEngine(url, this.config, this.logger);
    this.logger.info({ url: redactUrl(url) }, 'database engine created');
  }

  getSession(): Session {
    return this.current() ?? this.createSession();
  }

  async runInSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const current = this.current();
    if (current) {
      return fn(current);
    }

    const session = this.createSession();
    return this.scope.run(session, async () => {
      try {
        return await fn(session);
      } finally {
        await session.close();
      }
    });
  }

  /** Closes the scoped session; later calls in the scope get a fresh one. */
  async removeSession(): Promise<void> {
    const current = this.current();
    if (current) {
      await current.close();
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.engine.end();
    this.logger.info('database engine disposed');
  }

  private current(): DatabaseSession | undefined {
    const session = this.scope.getStore();
    return session && !session.closed ? session : undefined;
  }

  private createSession(): DatabaseSession {
    return new DatabaseSession({
      engine: this.engine,
      prePing: this.config.poolPrePing,
      echo: this.config.echo,
      logger: this.logger,
    });
  }
}
