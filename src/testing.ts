import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AppConfig, DatabaseConfig } from './config';
import { ConnectionPool } from './db/pool';
import { TransactionRunner, type TransactionRunnerOptions } from './db/transaction';
import { createLogger, type Logger } from './lib/logger';

// Shared fixtures for the Jest suites. Each suite gets its own database file.

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'ledgerbook-'));

export const removeDir = (dir: string): void => fs.rmSync(dir, { recursive: true, force: true });

export function testDbConfig(dir: string, overrides: Partial<DatabaseConfig> = {}): DatabaseConfig {
  return {
    file: path.join(dir, 'ledger.db'),
    busyTimeoutMs: 200,
    retryAttempts: 0,
    retryBackoffMs: 1,
    poolSize: 2,
    connectionMaxAgeMs: 0,
    ...overrides,
  };
}

export function testConfig(dir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: 'test',
    port: 0,
    logLevel: 'silent',
    db: testDbConfig(dir),
    startingCash: '10000.00',
    timezone: 'America/New_York',
    holidays: ['2026-11-26', '2026-12-25'],
    missingPricePolicy: 'skip',
    gemini: { model: 'test-model' },
    ...overrides,
  };
}

export interface Harness {
  pool: ConnectionPool;
  tx: TransactionRunner;
  close(): void;
}

export function createHarness(
  dir: string,
  db: Partial<DatabaseConfig> = {},
  retry: Partial<TransactionRunnerOptions> = {}
): Harness {
  const config = testDbConfig(dir, db);
  const pool = new ConnectionPool(config);
  const tx = new TransactionRunner(pool, {
    retry: { attempts: config.retryAttempts, backoffMs: config.retryBackoffMs },
    ...retry,
  });
  return { pool, tx, close: () => pool.close() };
}

export interface CapturedLine {
  level: string;
  entry: Record<string, unknown>;
}

/** Logger at debug level that keeps every parsed JSON line in `lines`. */
export function captureLogger(scope = 'test'): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger(scope, {
    level: 'debug',
    sink: (level, line) => {
      const entry: unknown = JSON.parse(line);
      if (typeof entry === 'object' && entry !== null) {
        lines.push({ level, entry: Object.fromEntries(Object.entries(entry)) });
      }
    },
  });
  return { logger, lines };
}

export const eventsOf = (lines: CapturedLine[], name: string): Record<string, unknown>[] =>
  lines.filter((l) => l.entry.event === name).map((l) => l.entry);
