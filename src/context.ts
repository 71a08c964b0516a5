import type { AppConfig } from './config';
import { ConnectionPool } from './db/pool';
import { TransactionRunner } from './db/transaction';
import { createLogger, type Logger, type LogSink } from './lib/logger';
import { TradingCalendar, zonedClock, type Clock } from './services/calendar';
import { createExporter, type Exporter } from './services/exportService';
import { createLedger, type Ledger } from './services/ledgerService';
import { createSnapshotEngine, type SnapshotEngine } from './services/snapshotService';
import { FallbackPriceSource, GenAiPriceSource, ManualPriceSource, type PriceSource } from './services/stockService';

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  pool: ConnectionPool;
  tx: TransactionRunner;
  clock: Clock;
  calendar: TradingCalendar;
  /** Overrides consulted before any feed. Owned by this context only. */
  manualPrices: ManualPriceSource;
  ledger: Ledger;
  engine: SnapshotEngine;
  exporter: Exporter;
  close(): void;
}

export interface ContextOverrides {
  clock?: Clock;
  /** Feeds tried after the manual overrides; defaults to GenAI when a key is configured. */
  feeds?: PriceSource[];
  logSink?: LogSink;
}

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = createLogger('ledger', { level: config.logLevel, sink: overrides.logSink });
  const pool = new ConnectionPool(config.db, { logger: logger.child('db') });
  const tx = new TransactionRunner(pool, {
    retry: { attempts: config.db.retryAttempts, backoffMs: config.db.retryBackoffMs },
    logger: logger.child('tx'),
  });
  const clock = overrides.clock ?? zonedClock(config.timezone);
  const calendar = new TradingCalendar(config.holidays);

  const manualPrices = new ManualPriceSource();
  const feeds =
    overrides.feeds ??
    (config.gemini.apiKey
      ? [new GenAiPriceSource({ apiKey: config.gemini.apiKey, model: config.gemini.model, logger: logger.child('prices') })]
      : []);
  const prices = new FallbackPriceSource([manualPrices, ...feeds], logger.child('prices'));

  const ledger = createLedger({ tx, clock, logger: logger.child('ledger') });
  const engine = createSnapshotEngine({
    tx,
    calendar,
    clock,
    prices,
    missingPricePolicy: config.missingPricePolicy,
    backfillMinExistingDays: config.backfillMinExistingDays,
    production: config.env === 'production',
    logger: logger.child('snapshot'),
  });

  return {
    config,
    logger,
    pool,
    tx,
    clock,
    calendar,
    manualPrices,
    ledger,
    engine,
    exporter: createExporter(ledger, engine),
    close: () => pool.close(),
  };
}
