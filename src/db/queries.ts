import type Database from 'better-sqlite3';
import type Decimal from 'decimal.js';
import { formatMoney, ZERO, toMoney } from '../lib/money';
import type {
  CashAdjustment,
  IsoDate,
  PortfolioHistoryRow,
  Position,
  TradeLogEntry,
  TradeSide,
} from '../types';
import {
  fromHistoryRow,
  storeMoney,
  storePrice,
  toCashAdjustment,
  toHistoryRow,
  toPosition,
  toTradeLogEntry,
} from './mappers';
import type {
  CashAdjustmentRecord,
  CashRecord,
  HistoryRecord,
  PositionRecord,
  TradeLogRecord,
} from './schema';

type Db = Database.Database;

interface RangeParams {
  from: IsoDate | null;
  to: IsoDate | null;
}

export interface DateRangeFilter {
  from?: IsoDate;
  to?: IsoDate;
}

const rangeParams = (range: DateRangeFilter = {}): RangeParams => ({
  from: range.from ?? null,
  to: range.to ?? null,
});

const IN_RANGE = '(@from IS NULL OR date >= @from) AND (@to IS NULL OR date <= @to)';

export function readPositions(db: Db): Position[] {
  return db
    .prepare<[], PositionRecord>('SELECT ticker, shares, buy_price, stop_loss, cost_basis FROM positions ORDER BY ticker')
    .all()
    .map(toPosition);
}

export function readPosition(db: Db, ticker: string): Position | null {
  const row = db
    .prepare<[string], PositionRecord>(
      'SELECT ticker, shares, buy_price, stop_loss, cost_basis FROM positions WHERE ticker = ?'
    )
    .get(ticker);
  return row ? toPosition(row) : null;
}

export function writePosition(db: Db, position: Position): void {
  db.prepare(
    `INSERT INTO positions (ticker, shares, buy_price, stop_loss, cost_basis)
     VALUES (@ticker, @shares, @buy_price, @stop_loss, @cost_basis)
     ON CONFLICT(ticker) DO UPDATE SET
       shares = excluded.shares,
       buy_price = excluded.buy_price,
       stop_loss = excluded.stop_loss,
       cost_basis = excluded.cost_basis`
  ).run({
    ticker: position.ticker,
    shares: position.shares,
    buy_price: storePrice(position.buyPrice),
    stop_loss: storePrice(position.stopLoss),
    cost_basis: storeMoney(position.costBasis),
  });
}

export function deletePosition(db: Db, ticker: string): void {
  db.prepare('DELETE FROM positions WHERE ticker = ?').run(ticker);
}

/** Null when the cash row has never been written. */
export function readCashRow(db: Db): Decimal | null {
  const row = db.prepare<[], CashRecord>('SELECT balance FROM cash WHERE id = 0').get();
  return row ? toMoney(row.balance) : null;
}

export const readCash = (db: Db): Decimal => readCashRow(db) ?? ZERO;

export function writeCash(db: Db, balance: Decimal): void {
  db.prepare(
    'INSERT INTO cash (id, balance) VALUES (0, ?) ON CONFLICT(id) DO UPDATE SET balance = excluded.balance'
  ).run(formatMoney(balance));
}

export type NewTradeLogEntry = Omit<TradeLogEntry, 'id'>;

export function appendTradeLog(db: Db, entry: NewTradeLogEntry): TradeLogEntry {
  const result = db
    .prepare(
      `INSERT INTO trade_log (date, ticker, shares_bought, buy_price, cost_basis, pnl, reason, shares_sold, sell_price)
       VALUES (@date, @ticker, @shares_bought, @buy_price, @cost_basis, @pnl, @reason, @shares_sold, @sell_price)`
    )
    .run({
      date: entry.date,
      ticker: entry.ticker,
      shares_bought: entry.sharesBought,
      buy_price: storePrice(entry.buyPrice),
      cost_basis: storeMoney(entry.costBasis),
      pnl: storeMoney(entry.pnl),
      reason: entry.reason,
      shares_sold: entry.sharesSold,
      sell_price: storePrice(entry.sellPrice),
    });
  return { ...entry, id: Number(result.lastInsertRowid) };
}

export function readTradeLog(db: Db, range?: DateRangeFilter): TradeLogEntry[] {
  return db
    .prepare<RangeParams, TradeLogRecord>(
      `SELECT id, date, ticker, shares_bought, buy_price, cost_basis, pnl, reason, shares_sold, sell_price
       FROM trade_log WHERE ${IN_RANGE} ORDER BY id`
    )
    .all(rangeParams(range))
    .map(toTradeLogEntry);
}

export function appendCashAdjustment(db: Db, date: IsoDate, amount: Decimal, reason: string): CashAdjustment {
  const result = db
    .prepare('INSERT INTO cash_adjustments (date, amount, reason) VALUES (?, ?, ?)')
    .run(date, formatMoney(amount), reason);
  return { id: Number(result.lastInsertRowid), date, amount, reason };
}

export function readCashAdjustments(db: Db, range?: DateRangeFilter): CashAdjustment[] {
  return db
    .prepare<RangeParams, CashAdjustmentRecord>(
      `SELECT id, date, amount, reason FROM cash_adjustments WHERE ${IN_RANGE} ORDER BY id`
    )
    .all(rangeParams(range))
    .map(toCashAdjustment);
}

const HISTORY_COLUMNS =
  'date, ticker, shares, cost_basis, stop_loss, current_price, total_value, pnl, action, cash_balance, total_equity';

export function readHistory(db: Db, range?: DateRangeFilter): PortfolioHistoryRow[] {
  return db
    .prepare<RangeParams, HistoryRecord>(
      `SELECT ${HISTORY_COLUMNS} FROM portfolio_history WHERE ${IN_RANGE}
       ORDER BY date, CASE WHEN ticker = 'TOTAL' THEN 1 ELSE 0 END, ticker`
    )
    .all(rangeParams(range))
    .map(toHistoryRow);
}

/** Swaps the stored row set of `date` for `rows`; returns how many rows were replaced. */
export function replaceHistoryDate(db: Db, date: IsoDate, rows: PortfolioHistoryRow[]): number {
  const removed = db.prepare('DELETE FROM portfolio_history WHERE date = ?').run(date).changes;
  const insert = db.prepare(
    `INSERT INTO portfolio_history (${HISTORY_COLUMNS})
     VALUES (@date, @ticker, @shares, @cost_basis, @stop_loss, @current_price, @total_value, @pnl, @action, @cash_balance, @total_equity)`
  );
  for (const row of rows) {
    insert.run(fromHistoryRow(row));
  }
  return removed;
}

export function countHistoryDays(db: Db, excluding: IsoDate): number {
  const row = db
    .prepare<[IsoDate], { days: number }>(
      "SELECT COUNT(DISTINCT date) AS days FROM portfolio_history WHERE date != ? AND ticker != 'TOTAL'"
    )
    .get(excluding);
  return row?.days ?? 0;
}

export function deleteHistoryExcept(db: Db, keep: IsoDate): number {
  return db.prepare('DELETE FROM portfolio_history WHERE date != ?').run(keep).changes;
}

/** Side of the last trade per ticker on `date`. */
export function readTradeSidesOn(db: Db, date: IsoDate): Map<string, TradeSide> {
  const rows = db
    .prepare<[IsoDate], { ticker: string; shares_sold: number }>(
      'SELECT ticker, shares_sold FROM trade_log WHERE date = ? ORDER BY id'
    )
    .all(date);
  const sides = new Map<string, TradeSide>();
  for (const row of rows) {
    sides.set(row.ticker, row.shares_sold > 0 ? 'SELL' : 'BUY');
  }
  return sides;
}
