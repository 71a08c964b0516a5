import type Decimal from 'decimal.js';
import { formatMoney, Money, parseStored } from '../lib/money';
import type {
  CashAdjustment,
  PortfolioHistoryRow,
  Position,
  SnapshotAction,
  TradeLogEntry,
} from '../types';
import type {
  CashAdjustmentRecord,
  HistoryRecord,
  PositionRecord,
  TradeLogRecord,
} from './schema';

const required = (value: string): Decimal => new Money(value);

const SNAPSHOT_ACTIONS: readonly SnapshotAction[] = ['HOLD', 'BUY', 'SELL', 'NO_PRICE'];

const toAction = (value: string | null): SnapshotAction | null =>
  SNAPSHOT_ACTIONS.find((a) => a === value) ?? null;

/** Prices keep their own precision; money columns are written with two places. */
export const storePrice = (value: Decimal | null): string | null => (value === null ? null : value.toString());
export const storeMoney = (value: Decimal | null): string | null => (value === null ? null : formatMoney(value));

export const toPosition = (r: PositionRecord): Position => ({
  ticker: r.ticker,
  shares: r.shares,
  buyPrice: required(r.buy_price),
  stopLoss: parseStored(r.stop_loss),
  costBasis: required(r.cost_basis),
});

export const toTradeLogEntry = (r: TradeLogRecord): TradeLogEntry => ({
  id: r.id,
  date: r.date,
  ticker: r.ticker,
  sharesBought: r.shares_bought,
  buyPrice: parseStored(r.buy_price),
  costBasis: required(r.cost_basis),
  pnl: required(r.pnl),
  reason: r.reason,
  sharesSold: r.shares_sold,
  sellPrice: parseStored(r.sell_price),
});

export const toCashAdjustment = (r: CashAdjustmentRecord): CashAdjustment => ({
  id: r.id,
  date: r.date,
  amount: required(r.amount),
  reason: r.reason,
});

export const toHistoryRow = (r: HistoryRecord): PortfolioHistoryRow => ({
  date: r.date,
  ticker: r.ticker,
  shares: r.shares,
  costBasis: parseStored(r.cost_basis),
  stopLoss: parseStored(r.stop_loss),
  currentPrice: parseStored(r.current_price),
  totalValue: parseStored(r.total_value),
  pnl: parseStored(r.pnl),
  action: toAction(r.action),
  cashBalance: parseStored(r.cash_balance),
  totalEquity: parseStored(r.total_equity),
});

export const fromHistoryRow = (row: PortfolioHistoryRow): HistoryRecord => ({
  date: row.date,
  ticker: row.ticker,
  shares: row.shares,
  cost_basis: storeMoney(row.costBasis),
  stop_loss: storePrice(row.stopLoss),
  current_price: storePrice(row.currentPrice),
  total_value: storeMoney(row.totalValue),
  pnl: storeMoney(row.pnl),
  action: row.action,
  cash_balance: storeMoney(row.cashBalance),
  total_equity: storeMoney(row.totalEquity),
});
