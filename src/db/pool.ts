import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { DatabaseConfig } from '../config';
import { RepositoryError } from '../errors';
import { silentLogger, type Logger } from '../lib/logger';
import { applySchema } from './schema';

interface PooledConnection {
  db: Database.Database;
  openedAt: number;
}

export interface PoolOptions {
  logger?: Logger;
  now?: () => number;
}

const sleep = (ms: number) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const ACQUIRE_POLL_MS = 10;
const MEMORY_FILE = ':memory:';

/**
 * Bounded set of SQLite handles on one database file. Handles are leased with
 * `acquire`/`release` (or `withConnection`) and closed once older than
 * `connectionMaxAgeMs`, so no caller keeps a stale handle across transactions.
 */
export class ConnectionPool {
  private readonly idle: PooledConnection[] = [];
  private readonly leased = new Set<PooledConnection>();
  private schemaReady = false;
  private closed = false;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly config: DatabaseConfig, options: PoolOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.idle.length + this.leased.size;
  }

  /** Every handle on `:memory:` is its own empty database, so it gets exactly one that never retires. */
  private get inMemory(): boolean {
    return this.config.file === MEMORY_FILE;
  }

  get capacity(): number {
    return this.inMemory ? 1 : this.config.poolSize;
  }

  private connect(): Database.Database {
    try {
      return new Database(this.config.file, { timeout: this.config.busyTimeoutMs });
    } catch (error) {
      throw new RepositoryError(`Unable to open database ${this.config.file}`, { cause: error });
    }
  }

  private open(): PooledConnection {
    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(path.resolve(this.config.file)), { recursive: true });
    }
    const db = this.connect();
    try {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      if (!this.schemaReady) {
        applySchema(db);
        this.schemaReady = true;
      }
    } catch (error) {
      db.close();
      throw new RepositoryError(`Unable to prepare database ${this.config.file}`, { cause: error });
    }
    this.logger.debug('connection opened', { file: this.config.file });
    return { db, openedAt: this.now() };
  }

  private expired(conn: PooledConnection): boolean {
    return (
      !this.inMemory && this.config.connectionMaxAgeMs > 0 && this.now() - conn.openedAt >= this.config.connectionMaxAgeMs
    );
  }

  private takeIdle(): PooledConnection | undefined {
    let conn = this.idle.pop();
    while (conn && this.expired(conn)) {
      conn.db.close();
      this.logger.debug('connection retired', { file: this.config.file });
      conn = this.idle.pop();
    }
    return conn;
  }

  async acquire(): Promise<Database.Database> {
    const deadline = this.now() + this.config.busyTimeoutMs;
    while (true) {
      if (this.closed) {
        throw new RepositoryError('Connection pool is closed');
      }
      const conn = this.takeIdle() ?? (this.size < this.capacity ? this.open() : undefined);
      if (conn) {
        this.leased.add(conn);
        return conn.db;
      }
      if (this.now() >= deadline) {
        throw new RepositoryError(`No database connection free within ${this.config.busyTimeoutMs}ms`, {
          code: 'POOL_EXHAUSTED',
        });
      }
      await sleep(ACQUIRE_POLL_MS);
    }
  }

  release(db: Database.Database): void {
    const conn = [...this.leased].find((c) => c.db === db);
    if (!conn) return;
    this.leased.delete(conn);
    if (this.closed || this.expired(conn) || db.inTransaction) {
      db.close();
      return;
    }
    this.idle.push(conn);
  }

  async withConnection<T>(fn: (db: Database.Database) => T | Promise<T>): Promise<T> {
    const db = await this.acquire();
    try {
      return await fn(db);
    } finally {
      this.release(db);
    }
  }

  close(): void {
    this.closed = true;
    for (const conn of this.idle.splice(0)) {
      conn.db.close();
    }
  }
}
