import type Decimal from 'decimal.js';

export type IsoDate = string;

export interface Position {
  ticker: string;
  shares: number;
  buyPrice: Decimal;
  stopLoss: Decimal | null;
  costBasis: Decimal;
}

export interface LedgerState {
  positions: Position[];
  cash: Decimal;
  isFirstTime: boolean;
}

export type TradeSide = 'BUY' | 'SELL';

export interface TradeLogEntry {
  id: number;
  date: IsoDate;
  ticker: string;
  sharesBought: number;
  buyPrice: Decimal | null;
  costBasis: Decimal;
  pnl: Decimal;
  reason: string;
  sharesSold: number;
  sellPrice: Decimal | null;
}

export interface CashAdjustment {
  id: number;
  date: IsoDate;
  amount: Decimal;
  reason: string;
}

export type SnapshotAction = 'HOLD' | 'BUY' | 'SELL' | 'NO_PRICE';

export interface PortfolioHistoryRow {
  date: IsoDate;
  ticker: string;
  shares: number | null;
  costBasis: Decimal | null;
  stopLoss: Decimal | null;
  currentPrice: Decimal | null;
  totalValue: Decimal | null;
  pnl: Decimal | null;
  action: SnapshotAction | null;
  cashBalance: Decimal | null;
  totalEquity: Decimal | null;
}

export interface TradeResult {
  entry: TradeLogEntry;
  /** Position after the trade; null once fully sold. */
  position: Position | null;
  cash: Decimal;
}

export interface CashResult {
  adjustment: CashAdjustment;
  cash: Decimal;
}

/** Every durable record, read in one transaction so the parts agree. */
export interface Journal {
  tradeLog: TradeLogEntry[];
  adjustments: CashAdjustment[];
  history: PortfolioHistoryRow[];
  positions: Position[];
  cash: Decimal;
}

export type SnapshotResult =
  | { status: 'created'; date: IsoDate; rows: PortfolioHistoryRow[]; replaced: boolean }
  | { status: 'skipped'; date: IsoDate; reason: 'non_trading_day' };
