import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = '0002';

export const TOTAL_TICKER = 'TOTAL';

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS schema_version (
    version TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE TABLE IF NOT EXISTS positions (
    ticker TEXT PRIMARY KEY,
    shares INTEGER NOT NULL CHECK (shares > 0),
    buy_price TEXT NOT NULL,
    stop_loss TEXT,
    cost_basis TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS cash (
    id INTEGER PRIMARY KEY CHECK (id = 0),
    balance TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS trade_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    ticker TEXT NOT NULL,
    shares_bought INTEGER NOT NULL DEFAULT 0,
    buy_price TEXT,
    cost_basis TEXT NOT NULL,
    pnl TEXT NOT NULL,
    reason TEXT NOT NULL,
    shares_sold INTEGER NOT NULL DEFAULT 0,
    sell_price TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE TABLE IF NOT EXISTS cash_adjustments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount TEXT NOT NULL,
    reason TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE TABLE IF NOT EXISTS portfolio_history (
    date TEXT NOT NULL,
    ticker TEXT NOT NULL,
    shares INTEGER,
    cost_basis TEXT,
    stop_loss TEXT,
    current_price TEXT,
    total_value TEXT,
    pnl TEXT,
    action TEXT,
    cash_balance TEXT,
    total_equity TEXT,
    PRIMARY KEY (date, ticker)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_trade_log_ticker_date ON trade_log(ticker, date)`,
  `CREATE INDEX IF NOT EXISTS idx_trade_log_date ON trade_log(date)`,
  `CREATE INDEX IF NOT EXISTS idx_cash_adjustments_date ON cash_adjustments(date)`,
  `CREATE TRIGGER IF NOT EXISTS trade_log_no_update BEFORE UPDATE ON trade_log
    BEGIN SELECT RAISE(ABORT, 'trade_log is append-only'); END`,
  `CREATE TRIGGER IF NOT EXISTS trade_log_no_delete BEFORE DELETE ON trade_log
    BEGIN SELECT RAISE(ABORT, 'trade_log is append-only'); END`,
  `CREATE TRIGGER IF NOT EXISTS cash_adjustments_no_update BEFORE UPDATE ON cash_adjustments
    BEGIN SELECT RAISE(ABORT, 'cash_adjustments is append-only'); END`,
  `CREATE TRIGGER IF NOT EXISTS cash_adjustments_no_delete BEFORE DELETE ON cash_adjustments
    BEGIN SELECT RAISE(ABORT, 'cash_adjustments is append-only'); END`,
];

/** Idempotent; safe to run on every start. */
export function applySchema(db: Database.Database): void {
  db.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) {
      db.prepare(statement).run();
    }
    db.prepare('INSERT OR IGNORE INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }).immediate();
}

export interface PositionRecord {
  ticker: string;
  shares: number;
  buy_price: string;
  stop_loss: string | null;
  cost_basis: string;
}

export interface CashRecord {
  balance: string;
}

export interface TradeLogRecord {
  id: number;
  date: string;
  ticker: string;
  shares_bought: number;
  buy_price: string | null;
  cost_basis: string;
  pnl: string;
  reason: string;
  shares_sold: number;
  sell_price: string | null;
}

export interface CashAdjustmentRecord {
  id: number;
  date: string;
  amount: string;
  reason: string;
}

export interface HistoryRecord {
  date: string;
  ticker: string;
  shares: number | null;
  cost_basis: string | null;
  stop_loss: string | null;
  current_price: string | null;
  total_value: string | null;
  pnl: string | null;
  action: string | null;
  cash_balance: string | null;
  total_equity: string | null;
}
