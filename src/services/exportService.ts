import type Decimal from 'decimal.js';
import type { DateRangeFilter } from '../db/queries';
import { formatMoney } from '../lib/money';
import type { PortfolioHistoryRow, TradeLogEntry } from '../types';
import type { Ledger } from './ledgerService';
import type { SnapshotEngine } from './snapshotService';

type Cell = string | number | null;

const escapeCell = (value: Cell): string => {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function toCsv(header: string[], rows: Cell[][]): string {
  return [header, ...rows].map((row) => row.map(escapeCell).join(',')).join('\n') + '\n';
}

const money = (value: Decimal | null): string | null => (value === null ? null : formatMoney(value));
const price = (value: Decimal | null): string | null => (value === null ? null : value.toString());

export const HISTORY_HEADER = [
  'Date',
  'Ticker',
  'Shares',
  'Cost Basis',
  'Stop Loss',
  'Current Price',
  'Total Value',
  'PnL',
  'Action',
  'Cash Balance',
  'Total Equity',
];

export const TRADE_LOG_HEADER = [
  'Id',
  'Date',
  'Ticker',
  'Shares Bought',
  'Buy Price',
  'Cost Basis',
  'PnL',
  'Reason',
  'Shares Sold',
  'Sell Price',
];

export function historyToCsv(rows: PortfolioHistoryRow[]): string {
  return toCsv(
    HISTORY_HEADER,
    rows.map((r) => [
      r.date,
      r.ticker,
      r.shares,
      money(r.costBasis),
      price(r.stopLoss),
      price(r.currentPrice),
      money(r.totalValue),
      money(r.pnl),
      r.action,
      money(r.cashBalance),
      money(r.totalEquity),
    ])
  );
}

export function tradeLogToCsv(entries: TradeLogEntry[]): string {
  return toCsv(
    TRADE_LOG_HEADER,
    entries.map((e) => [
      e.id,
      e.date,
      e.ticker,
      e.sharesBought,
      price(e.buyPrice),
      money(e.costBasis),
      money(e.pnl),
      e.reason,
      e.sharesSold,
      price(e.sellPrice),
    ])
  );
}

export function createExporter(ledger: Ledger, engine: SnapshotEngine) {
  return {
    async exportHistoryCsv(range?: DateRangeFilter): Promise<string> {
      return historyToCsv(await engine.getHistory(range));
    },

    async exportTradeLogCsv(range?: DateRangeFilter): Promise<string> {
      return tradeLogToCsv(await ledger.getTradeLog(range));
    },
  };
}

export type Exporter = ReturnType<typeof createExporter>;
