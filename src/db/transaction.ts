import type Database from 'better-sqlite3';
import { isAppError, RepositoryError } from '../errors';
import { silentLogger, type Logger } from '../lib/logger';
import type { ConnectionPool } from './pool';

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
}

export interface RetryInfo {
  label: string;
  attempt: number;
  delayMs: number;
  code: string;
}

export interface TransactionRunnerOptions {
  retry: RetryPolicy;
  logger?: Logger;
  onRetry?: (info: RetryInfo) => void;
}

const sleep = (ms: number) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const sqliteCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const isContentionError = (error: unknown): boolean => {
  const code = sqliteCode(error);
  return code !== undefined && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
};

export type Work<T> = (db: Database.Database) => T;

/**
 * Runs units of work against the pool. Writes take SQLite's write lock up
 * front (`BEGIN IMMEDIATE`); reads run in a deferred transaction so every
 * statement sees the same committed state.
 */
export class TransactionRunner {
  private readonly logger: Logger;

  constructor(private readonly pool: ConnectionPool, private readonly options: TransactionRunnerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  write<T>(label: string, work: Work<T>): Promise<T> {
    return this.run(label, (db) => db.transaction(() => work(db)).immediate());
  }

  read<T>(label: string, work: Work<T>): Promise<T> {
    return this.run(label, (db) => db.transaction(() => work(db)).deferred());
  }

  private async run<T>(label: string, work: Work<T>): Promise<T> {
    const { attempts, backoffMs } = this.options.retry;
    let attempt = 0;

    while (true) {
      try {
        return await this.pool.withConnection(work);
      } catch (error) {
        if (isAppError(error)) throw error;

        const code = sqliteCode(error) ?? 'UNKNOWN';
        if (isContentionError(error)) {
          if (attempt < attempts) {
            const delayMs = backoffMs * 2 ** attempt;
            attempt += 1;
            this.logger.warn('database busy, retrying', { label, attempt, delayMs, code });
            this.options.onRetry?.({ label, attempt, delayMs, code });
            await sleep(delayMs);
            continue;
          }
          this.logger.error('database busy, giving up', { label, attempts: attempt + 1, code });
          throw new RepositoryError(`${label}: database is locked by another writer`, { cause: error, code });
        }

        this.logger.error('transaction failed', { label, code, error });
        throw new RepositoryError(`${label}: storage operation failed`, { cause: error, code });
      }
    }
  }
}
