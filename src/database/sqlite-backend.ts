/**
 * gatehouse - SQLite Backend
 *
 * A file database opens one `better-sqlite3` handle per checkout and closes it
 * on release, so each session has its own transaction state. An in-memory
 * database exists only inside its handle, so `:memory:` keeps one shared
 * handle for the life of the engine and its sessions share transactions.
 * Pool settings are accepted and ignored.
 */

import Database from 'better-sqlite3';
import { SqliteConfig, sqliteConfigSchema } from '../config';
import { Connection, DatabaseBackend, Engine, isRow } from './types';

const MEMORY = ':memory:';

function toConnection(db: Database.Database, release: () => void): Connection {
  return {
    async query(sql, params) {
      const statement = db.prepare(sql);
      if (statement.reader) {
        const rows = statement.all(...params).filter(isRow);
        return { rows, rowCount: rows.length };
      }
      const info = statement.run(...params);
      return { rows: [], rowCount: info.changes };
    },
    release,
  };
}

class SqliteEngine implements Engine {
  readonly url: string;
  private shared: Database.Database | null = null;
  private readonly handles = new Set<Database.Database>();

  constructor(url: string, private readonly filename: string) {
    this.url = url;
  }

  async connect(): Promise<Connection> {
    if (this.filename === MEMORY) {
      if (!this.shared) {
        this.shared = new Database(MEMORY);
      }
      // the handle lives until the engine ends
      return toConnection(this.shared, () => undefined);
    }

    const db = new Database(this.filename);
    this.handles.add(db);
    return toConnection(db, () => {
      if (this.handles.delete(db)) {
        db.close();
      }
    });
  }

  async end(): Promise<void> {
    for (const db of this.handles) {
      db.close();
    }
    this.handles.clear();
    this.shared?.close();
    this.shared = null;
  }
}

export function createSqliteBackend(): DatabaseBackend<SqliteConfig> {
  return {
    expectedConfigType: () => ({ name: 'SqliteConfig', kind: 'sqlite', schema: sqliteConfigSchema }),

    buildUrl(config) {
      return `sqlite:///${config.database}`;
    },

    createEngine(url, config, logger) {
      logger.debug({ database: config.database }, 'sqlite ignores pool settings');
      return new SqliteEngine(url, config.database);
    },
  };
}

export const sqliteBackend = createSqliteBackend();
