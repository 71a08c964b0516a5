import type Decimal from 'decimal.js';
import type { MissingPricePolicy } from '../config';
import {
  countHistoryDays,
  deleteHistoryExcept,
  readCash,
  readHistory,
  readPositions,
  readTradeSidesOn,
  replaceHistoryDate,
  type DateRangeFilter,
} from '../db/queries';
import { TOTAL_TICKER } from '../db/schema';
import type { TransactionRunner } from '../db/transaction';
import { ConfigError, MarketDataError, ValidationError } from '../errors';
import { AuditLog, silentLogger, type Logger } from '../lib/logger';
import { formatMoney, Money, round2, sum, toMoney } from '../lib/money';
import type { IsoDate, PortfolioHistoryRow, Position, SnapshotAction, SnapshotResult } from '../types';
import { shiftDay, type Clock, type TradingCalendar } from './calendar';
import { isStopLossBreached } from './analyzer';
import { resolvePrices, type PriceSource } from './stockService';
import { basePositionsSchema, dateRangeSchema, isoDateSchema, parseInput } from './validation';

/**
 * Values every position at `prices` and appends the TOTAL row. Tickers without
 * a price get a NO_PRICE row with empty valuation and are left out of the sums.
 */
export function computeSnapshot(
  date: IsoDate,
  positions: Position[],
  cash: Decimal,
  prices: Map<string, Decimal | null>,
  actions: Map<string, SnapshotAction> = new Map()
): PortfolioHistoryRow[] {
  const rows: PortfolioHistoryRow[] = [...positions]
    .sort((a, b) => a.ticker.localeCompare(b.ticker))
    .map((p): PortfolioHistoryRow => {
      const price = prices.get(p.ticker) ?? null;
      const base = {
        date,
        ticker: p.ticker,
        shares: p.shares,
        costBasis: p.costBasis,
        stopLoss: p.stopLoss,
        cashBalance: null,
        totalEquity: null,
      };
      if (price === null) {
        return { ...base, currentPrice: null, totalValue: null, pnl: null, action: 'NO_PRICE' };
      }
      return {
        ...base,
        currentPrice: price,
        totalValue: round2(price.times(p.shares)),
        pnl: round2(price.minus(p.buyPrice).times(p.shares)),
        action: actions.get(p.ticker) ?? 'HOLD',
      };
    });

  const valued = rows.filter((r) => r.totalValue !== null);
  const totalValue = sum(valued.map((r) => r.totalValue ?? toMoney(0)));
  const totalPnl = sum(valued.map((r) => r.pnl ?? toMoney(0)));
  const cashBalance = round2(cash);

  rows.push({
    date,
    ticker: TOTAL_TICKER,
    shares: null,
    costBasis: null,
    stopLoss: null,
    currentPrice: null,
    totalValue,
    pnl: totalPnl,
    action: null,
    cashBalance,
    totalEquity: totalValue.plus(cashBalance),
  });
  return rows;
}

export interface BasePosition {
  ticker: string;
  shares: number;
  buyPrice: number | string;
  stopLoss?: number | string | null;
}

export interface BackfillOptions {
  daysBack: number;
  basePositions: BasePosition[];
  basePrices: Record<string, number | string>;
  cash: number | string;
  /** Skip generation when at least this many past days are already stored. */
  minExistingDays?: number;
  seed?: number;
}

export type BackfillResult =
  | { status: 'skipped'; existingDays: number; threshold: number }
  | { status: 'generated'; days: IsoDate[]; removedRows: number };

export const SYNTHETIC_DEFAULTS = {
  basePositions: [
    { ticker: 'SYNAAA', shares: 100, buyPrice: '5.00', stopLoss: '4.50' },
    { ticker: 'SYNBBB', shares: 50, buyPrice: '8.00', stopLoss: '7.25' },
  ],
  basePrices: { SYNAAA: '5.00', SYNBBB: '8.00' },
  cash: '10000.00',
} satisfies Omit<BackfillOptions, 'daysBack'>;

const DAILY_TREND = 0.02;
const VOLATILITY = 0.15;

/** Small seeded PRNG (mulberry32) so synthetic history is reproducible. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface SnapshotEngineDeps {
  tx: TransactionRunner;
  calendar: TradingCalendar;
  clock: Clock;
  prices: PriceSource;
  missingPricePolicy?: MissingPricePolicy;
  /** Default for `BackfillOptions.minExistingDays`. */
  backfillMinExistingDays?: number;
  production?: boolean;
  logger?: Logger;
}

export interface SnapshotOptions {
  /** Write even when `date` is not a trading day. */
  force?: boolean;
}

export function createSnapshotEngine({
  tx,
  calendar,
  clock,
  prices,
  missingPricePolicy = 'skip',
  backfillMinExistingDays,
  production = false,
  logger = silentLogger,
}: SnapshotEngineDeps) {
  const audit = new AuditLog(logger);

  return {
    async createSnapshot(date?: IsoDate, options: SnapshotOptions = {}): Promise<SnapshotResult> {
      const day = date === undefined ? clock.today() : parseInput(isoDateSchema, date, 'snapshot date');

      if (!options.force && !calendar.isTradingDay(day)) {
        audit.event('snapshot.skipped', { date: day, reason: 'non_trading_day' });
        return { status: 'skipped', date: day, reason: 'non_trading_day' };
      }

      const held = await tx.read('snapshot.positions', (db) => readPositions(db).map((p) => p.ticker));
      const quotes = await resolvePrices(prices, held, day);

      const result = await tx.write('createSnapshot', (db) => {
        const positions = readPositions(db);
        const missing = positions.filter((p) => !quotes.get(p.ticker)).map((p) => p.ticker);
        if (missing.length > 0 && missingPricePolicy === 'defer') {
          throw new MarketDataError(`No price for ${missing.join(', ')} on ${day}; snapshot deferred`, missing);
        }
        const rows = computeSnapshot(day, positions, readCash(db), quotes, readTradeSidesOn(db, day));
        const removed = replaceHistoryDate(db, day, rows);
        return { rows, replaced: removed > 0, missing };
      });

      for (const row of result.rows.filter(isStopLossBreached)) {
        audit.event('risk.stop_loss_breached', {
          date: day,
          ticker: row.ticker,
          shares: row.shares,
          price: row.currentPrice?.toString(),
          stopLoss: row.stopLoss?.toString(),
        });
      }

      const total = result.rows[result.rows.length - 1];
      audit.event('snapshot.created', {
        date: day,
        forced: Boolean(options.force),
        replaced: result.replaced,
        tickers: result.rows.length - 1,
        unpriced: result.missing,
        totalValue: total.totalValue ? formatMoney(total.totalValue) : null,
        totalEquity: total.totalEquity ? formatMoney(total.totalEquity) : null,
      });
      return { status: 'created', date: day, rows: result.rows, replaced: result.replaced };
    },

    /**
     * Fills the days before today with deterministic synthetic snapshots for
     * demo and test environments. Today's rows are never touched.
     */
    async backfillSynthetic(options: BackfillOptions): Promise<BackfillResult> {
      if (production) {
        throw new ConfigError('Synthetic backfill is disabled in production');
      }
      if (!Number.isInteger(options.daysBack) || options.daysBack < 1) {
        throw new ValidationError('daysBack must be a positive integer');
      }
      const today = clock.today();
      const threshold = options.minExistingDays ?? backfillMinExistingDays ?? Math.max(1, Math.floor(options.daysBack / 2));
      const positions: Position[] = parseInput(basePositionsSchema, options.basePositions, 'base positions').map(
        (p) => ({
          ticker: p.ticker,
          shares: p.shares,
          buyPrice: p.buyPrice,
          stopLoss: p.stopLoss ?? null,
          costBasis: round2(p.buyPrice.times(p.shares)),
        })
      );
      const cash = toMoney(options.cash);
      const random = seededRandom(options.seed ?? 42);

      const result = await tx.write('backfillSynthetic', (db): BackfillResult => {
        const existingDays = countHistoryDays(db, today);
        if (existingDays >= threshold) {
          return { status: 'skipped', existingDays, threshold };
        }
        const removedRows = deleteHistoryExcept(db, today);
        const days: IsoDate[] = [];
        for (let i = options.daysBack; i >= 1; i--) {
          const day = shiftDay(today, -i);
          if (!calendar.isTradingDay(day)) continue;
          const trend = 1 + (options.daysBack - i) * DAILY_TREND;
          const quotes = new Map<string, Decimal | null>();
          for (const p of positions) {
            const base = toMoney(options.basePrices[p.ticker] ?? p.buyPrice);
            const noise = 1 - VOLATILITY + random() * 2 * VOLATILITY;
            const floor = p.buyPrice.times(0.5);
            const price = Money.max(base.times(trend).times(noise), floor).toDecimalPlaces(4);
            quotes.set(p.ticker, price);
          }
          replaceHistoryDate(db, day, computeSnapshot(day, positions, cash, quotes));
          days.push(day);
        }
        return { status: 'generated', days, removedRows };
      });

      if (result.status === 'generated') {
        audit.event('backfill.completed', { days: result.days.length, removedRows: result.removedRows });
      } else {
        logger.info('backfill skipped', { existingDays: result.existingDays, threshold: result.threshold });
      }
      return result;
    },

    async getHistory(range?: DateRangeFilter): Promise<PortfolioHistoryRow[]> {
      const filter = parseInput(dateRangeSchema, range ?? {}, 'date range');
      return tx.read('getHistory', (db) => readHistory(db, filter));
    },

    async getSnapshot(date: IsoDate): Promise<PortfolioHistoryRow[]> {
      const day = parseInput(isoDateSchema, date, 'snapshot date');
      return tx.read('getSnapshot', (db) => readHistory(db, { from: day, to: day }));
    },
  };
}

export type SnapshotEngine = ReturnType<typeof createSnapshotEngine>;
