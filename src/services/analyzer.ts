import type Decimal from 'decimal.js';
import { TOTAL_TICKER } from '../db/schema';
import { Money, round2, sum, tradeAmount, weightedAverage, ZERO } from '../lib/money';
import type { CashAdjustment, IsoDate, PortfolioHistoryRow, Position, TradeLogEntry } from '../types';

export interface CashPoint {
  date: IsoDate;
  /** End-of-day balance. */
  cash: Decimal;
}

const byDateThenId = <T extends { date: IsoDate; id: number }>(a: T, b: T) =>
  a.date === b.date ? a.id - b.id : a.date < b.date ? -1 : 1;

const HUNDRED = new Money(100);
const TRADING_DAYS_PER_YEAR = 252;

const byDate = <T extends { date: IsoDate }>(a: T, b: T) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0);

const percentChange = (value: Decimal, base: Decimal): Decimal | null =>
  base.isZero() ? null : value.dividedBy(base).minus(1).times(HUNDRED);

const mean = (values: Decimal[]): Decimal =>
  values.length === 0 ? ZERO : sum(values).dividedBy(values.length);

/** Cash moved by one trade log entry: negative for a buy, positive for a sell. */
export function cashDelta(entry: TradeLogEntry): Decimal {
  let delta = ZERO;
  if (entry.sharesBought > 0 && entry.buyPrice) {
    delta = delta.minus(tradeAmount(entry.sharesBought, entry.buyPrice));
  }
  if (entry.sharesSold > 0 && entry.sellPrice) {
    delta = delta.plus(tradeAmount(entry.sharesSold, entry.sellPrice));
  }
  return delta;
}

interface CashMove {
  date: IsoDate;
  id: number;
  delta: Decimal;
}

/** Trade and adjustment moves in replay order: by date, then id. */
function cashMoves(tradeLog: TradeLogEntry[], adjustments: CashAdjustment[]): CashMove[] {
  return [
    ...tradeLog.map((e) => ({ date: e.date, id: e.id, delta: cashDelta(e) })),
    ...adjustments.map((a) => ({ date: a.date, id: a.id, delta: a.amount })),
  ].sort(byDateThenId);
}

/**
 * Replays the trade log and cash adjustments on top of `initialCash`.
 * Returns one point per date that saw activity, in date order.
 */
export function reconstructCash(
  tradeLog: TradeLogEntry[],
  initialCash: Decimal.Value,
  adjustments: CashAdjustment[] = []
): CashPoint[] {
  const points: CashPoint[] = [];
  let cash: Decimal = new Money(initialCash);
  for (const move of cashMoves(tradeLog, adjustments)) {
    cash = cash.plus(move.delta);
    const last = points[points.length - 1];
    if (last && last.date === move.date) {
      last.cash = cash;
    } else {
      points.push({ date: move.date, cash });
    }
  }
  return points;
}

const prefixSums = (deltas: Decimal[]): Decimal[] =>
  deltas.reduce<Decimal[]>((acc, d) => [...acc, acc[acc.length - 1].plus(d)], [ZERO]);

/**
 * Every balance the account can have held during `date`. Trades and
 * adjustments each keep their own id order, but the two tables do not say how
 * they interleave, so any prefix of one combined with any prefix of the other
 * counts. The last element is the close of the day.
 */
export function intradayBalances(
  tradeLog: TradeLogEntry[],
  date: IsoDate,
  initialCash: Decimal.Value,
  adjustments: CashAdjustment[] = []
): Decimal[] {
  const before = cashMoves(tradeLog, adjustments).filter((m) => m.date < date);
  const opening = new Money(initialCash).plus(sum(before.map((m) => m.delta)));
  const trades = prefixSums(
    [...tradeLog].filter((e) => e.date === date).sort((a, b) => a.id - b.id).map(cashDelta)
  );
  const moves = prefixSums(
    [...adjustments].filter((a) => a.date === date).sort((a, b) => a.id - b.id).map((a) => a.amount)
  );
  return moves.flatMap((m) => trades.map((t) => opening.plus(t).plus(m)));
}

export interface CashMismatch {
  date: IsoDate;
  stored: Decimal;
  /** Replayed close of the day. */
  replayed: Decimal;
  difference: Decimal;
}

export interface CashAudit {
  checked: number;
  mismatches: CashMismatch[];
}

/**
 * Compares each stored TOTAL cash balance with the replay. A snapshot may be
 * taken between two trades of its day, so any balance the account held that
 * day counts as a match.
 */
export function auditCash(
  tradeLog: TradeLogEntry[],
  history: PortfolioHistoryRow[],
  initialCash: Decimal.Value,
  adjustments: CashAdjustment[] = []
): CashAudit {
  const totals = history.filter((r) => r.ticker === TOTAL_TICKER && r.cashBalance !== null);
  const mismatches: CashMismatch[] = [];
  for (const row of totals) {
    const stored = row.cashBalance ?? ZERO;
    const balances = intradayBalances(tradeLog, row.date, initialCash, adjustments).map(round2);
    if (!balances.some((b) => b.equals(stored))) {
      const replayed = balances[balances.length - 1];
      mismatches.push({ date: row.date, stored, replayed, difference: stored.minus(replayed) });
    }
  }
  return { checked: totals.length, mismatches };
}

export interface DrawdownPoint {
  date: IsoDate;
  totalValue: Decimal;
  peak: Decimal;
  drawdownAbs: Decimal;
  /** Percent below the running peak; 0 while the peak is 0. */
  drawdownPct: Decimal;
}

export interface Drawdown {
  points: DrawdownPoint[];
  maxDrawdownAbs: Decimal;
  maxDrawdownPct: Decimal;
}

/** Running-peak drawdown over one ticker's history. Rows without a value are ignored. */
export function computeDrawdown(tickerHistory: PortfolioHistoryRow[]): Drawdown {
  const rows = tickerHistory
    .filter((r): r is PortfolioHistoryRow & { totalValue: Decimal } => r.totalValue !== null)
    .sort(byDate);

  const points: DrawdownPoint[] = [];
  let peak: Decimal | null = null;
  let maxDrawdownAbs = ZERO;
  let maxDrawdownPct = ZERO;
  for (const row of rows) {
    peak = peak === null ? row.totalValue : Money.max(peak, row.totalValue);
    const drawdownAbs = row.totalValue.minus(peak);
    const drawdownPct = peak.isZero() ? ZERO : drawdownAbs.dividedBy(peak).times(100);
    points.push({ date: row.date, totalValue: row.totalValue, peak, drawdownAbs, drawdownPct });
    maxDrawdownAbs = Money.min(maxDrawdownAbs, drawdownAbs);
    maxDrawdownPct = Money.min(maxDrawdownPct, drawdownPct);
  }
  return { points, maxDrawdownAbs, maxDrawdownPct };
}

export interface TickerDrawdown {
  ticker: string;
  days: number;
  maxDrawdownAbs: Decimal;
  maxDrawdownPct: Decimal;
}

/** Maximum drawdown for every ticker in `history`, TOTAL included, sorted by ticker with TOTAL last. */
export function computeAllDrawdowns(history: PortfolioHistoryRow[]): TickerDrawdown[] {
  const byTicker = new Map<string, PortfolioHistoryRow[]>();
  for (const row of history) {
    const rows = byTicker.get(row.ticker) ?? [];
    rows.push(row);
    byTicker.set(row.ticker, rows);
  }
  return [...byTicker]
    .map(([ticker, rows]) => {
      const dd = computeDrawdown(rows);
      return { ticker, days: dd.points.length, maxDrawdownAbs: dd.maxDrawdownAbs, maxDrawdownPct: dd.maxDrawdownPct };
    })
    .sort((a, b) => {
      if (a.ticker === TOTAL_TICKER) return 1;
      if (b.ticker === TOTAL_TICKER) return -1;
      return a.ticker.localeCompare(b.ticker);
    });
}

export interface StockRoi {
  ticker: string;
  sharesBought: number;
  sharesHeld: number;
  /** Cash paid for every buy. */
  costBasis: Decimal;
  /** Cash received from every sell. */
  proceeds: Decimal;
  /** Shares still held at the latest snapshot price; 0 once closed or never priced. */
  marketValue: Decimal;
  netGain: Decimal;
  roiPct: Decimal;
}

/**
 * Return on every ticker ever bought: `(proceeds + marketValue - costBasis) /
 * costBasis`. Sorted best first.
 */
export function computeStockRoi(tradeLog: TradeLogEntry[], history: PortfolioHistoryRow[]): StockRoi[] {
  const latestPrice = new Map<string, { date: IsoDate; price: Decimal }>();
  for (const row of history) {
    if (row.ticker === TOTAL_TICKER || row.currentPrice === null) continue;
    const seen = latestPrice.get(row.ticker);
    if (!seen || row.date >= seen.date) latestPrice.set(row.ticker, { date: row.date, price: row.currentPrice });
  }

  const byTicker = new Map<string, StockRoi>();
  for (const entry of tradeLog) {
    const roi = byTicker.get(entry.ticker) ?? {
      ticker: entry.ticker,
      sharesBought: 0,
      sharesHeld: 0,
      costBasis: ZERO,
      proceeds: ZERO,
      marketValue: ZERO,
      netGain: ZERO,
      roiPct: ZERO,
    };
    if (entry.sharesBought > 0 && entry.buyPrice) {
      roi.sharesBought += entry.sharesBought;
      roi.sharesHeld += entry.sharesBought;
      roi.costBasis = roi.costBasis.plus(tradeAmount(entry.sharesBought, entry.buyPrice));
    }
    if (entry.sharesSold > 0 && entry.sellPrice) {
      roi.sharesHeld -= entry.sharesSold;
      roi.proceeds = roi.proceeds.plus(tradeAmount(entry.sharesSold, entry.sellPrice));
    }
    byTicker.set(entry.ticker, roi);
  }

  return [...byTicker.values()]
    .filter((roi) => roi.costBasis.greaterThan(0))
    .map((roi) => {
      const latest = latestPrice.get(roi.ticker);
      const marketValue = roi.sharesHeld > 0 && latest ? round2(latest.price.times(roi.sharesHeld)) : ZERO;
      const netGain = roi.proceeds.plus(marketValue).minus(roi.costBasis);
      return { ...roi, marketValue, netGain, roiPct: netGain.dividedBy(roi.costBasis).times(HUNDRED) };
    })
    .sort((a, b) => b.roiPct.comparedTo(a.roiPct) || a.ticker.localeCompare(b.ticker));
}

export interface WinLoss {
  total: number;
  winning: number;
  losing: number;
  breakeven: number;
  winRatePct: Decimal;
  avgWinPct: Decimal;
  avgLossPct: Decimal;
  best: StockRoi | null;
  worst: StockRoi | null;
}

export function computeWinLoss(rois: StockRoi[]): WinLoss {
  const wins = rois.filter((r) => r.roiPct.greaterThan(0));
  const losses = rois.filter((r) => r.roiPct.lessThan(0));
  const ranked = [...rois].sort((a, b) => b.roiPct.comparedTo(a.roiPct));
  return {
    total: rois.length,
    winning: wins.length,
    losing: losses.length,
    breakeven: rois.length - wins.length - losses.length,
    winRatePct: rois.length === 0 ? ZERO : new Money(wins.length).dividedBy(rois.length).times(HUNDRED),
    avgWinPct: mean(wins.map((r) => r.roiPct)),
    avgLossPct: mean(losses.map((r) => r.roiPct)),
    best: ranked[0] ?? null,
    worst: ranked[ranked.length - 1] ?? null,
  };
}

export interface RoiPoint {
  ticker: string;
  date: IsoDate;
  roiPct: Decimal;
}

/** Unrealised return of each held ticker on each snapshot day, against that day's cost basis. */
export function computeRoiOverTime(history: PortfolioHistoryRow[]): RoiPoint[] {
  const points: RoiPoint[] = [];
  for (const row of history) {
    if (row.ticker === TOTAL_TICKER || row.totalValue === null || row.costBasis === null) continue;
    const roiPct = percentChange(row.totalValue, row.costBasis);
    if (roiPct !== null) points.push({ ticker: row.ticker, date: row.date, roiPct });
  }
  return points.sort((a, b) => a.ticker.localeCompare(b.ticker) || byDate(a, b));
}

export interface DailyPerformance {
  date: IsoDate;
  totalEquity: Decimal;
  /** Null on the first day. */
  dailyReturnPct: Decimal | null;
  cumulativeReturnPct: Decimal | null;
}

/** Day-over-day and cumulative change of TOTAL equity. */
export function computeDailyPerformance(history: PortfolioHistoryRow[]): DailyPerformance[] {
  const totals = history
    .filter((r): r is PortfolioHistoryRow & { totalEquity: Decimal } => r.ticker === TOTAL_TICKER && r.totalEquity !== null)
    .sort(byDate);
  return totals.map((row, i) => ({
    date: row.date,
    totalEquity: row.totalEquity,
    dailyReturnPct: i === 0 ? null : percentChange(row.totalEquity, totals[i - 1].totalEquity),
    cumulativeReturnPct: percentChange(row.totalEquity, totals[0].totalEquity),
  }));
}

export interface RiskMetrics {
  returns: number;
  avgDailyReturnPct: Decimal;
  /** Sample standard deviation of the daily returns. */
  dailyVolatilityPct: Decimal;
  annualizedVolatilityPct: Decimal;
  sharpeRatio: Decimal;
  /** Null while no day closed down. */
  sortinoRatio: Decimal | null;
  maxConsecutiveWins: number;
  maxConsecutiveLosses: number;
}

/** Volatility, Sharpe and Sortino (risk-free rate 0) and win/loss streaks of the daily returns. */
export function computeRiskMetrics(performance: DailyPerformance[]): RiskMetrics {
  const returns = performance.flatMap((p) => (p.dailyReturnPct === null ? [] : [p.dailyReturnPct]));
  const avg = mean(returns);
  const variance =
    returns.length < 2 ? ZERO : sum(returns.map((r) => r.minus(avg).pow(2))).dividedBy(returns.length - 1);
  const volatility = variance.sqrt();
  const annualize = new Money(TRADING_DAYS_PER_YEAR).sqrt();

  const downside = returns.filter((r) => r.isNegative());
  const downsideDeviation = mean(downside.map((r) => r.pow(2))).sqrt();

  let wins = 0;
  let losses = 0;
  let maxConsecutiveWins = 0;
  let maxConsecutiveLosses = 0;
  for (const r of returns) {
    wins = r.greaterThan(0) ? wins + 1 : 0;
    losses = r.lessThan(0) ? losses + 1 : 0;
    maxConsecutiveWins = Math.max(maxConsecutiveWins, wins);
    maxConsecutiveLosses = Math.max(maxConsecutiveLosses, losses);
  }

  return {
    returns: returns.length,
    avgDailyReturnPct: avg,
    dailyVolatilityPct: volatility,
    annualizedVolatilityPct: volatility.times(annualize),
    sharpeRatio: volatility.isZero() ? ZERO : avg.dividedBy(volatility).times(annualize),
    sortinoRatio: downside.length === 0 ? null : avg.dividedBy(downsideDeviation),
    maxConsecutiveWins,
    maxConsecutiveLosses,
  };
}

/** Priced at or below its stop loss. */
export const isStopLossBreached = (row: PortfolioHistoryRow): boolean =>
  row.stopLoss !== null && row.currentPrice !== null && row.currentPrice.lessThanOrEqualTo(row.stopLoss);

export interface StopLossBreach {
  date: IsoDate;
  ticker: string;
  shares: number | null;
  currentPrice: Decimal;
  stopLoss: Decimal;
}

export function findStopLossBreaches(history: PortfolioHistoryRow[]): StopLossBreach[] {
  return history.flatMap((row) =>
    isStopLossBreached(row) && row.currentPrice && row.stopLoss
      ? [{ date: row.date, ticker: row.ticker, shares: row.shares, currentPrice: row.currentPrice, stopLoss: row.stopLoss }]
      : []
  );
}

export interface TotalsProblem {
  date: IsoDate;
  problems: string[];
}

/** Dates whose TOTAL row disagrees with its per-ticker rows, or has none. */
export function verifySnapshotTotals(history: PortfolioHistoryRow[]): TotalsProblem[] {
  const days = new Map<IsoDate, PortfolioHistoryRow[]>();
  for (const row of history) {
    const rows = days.get(row.date) ?? [];
    rows.push(row);
    days.set(row.date, rows);
  }

  const out: TotalsProblem[] = [];
  for (const [date, rows] of [...days].sort(([a], [b]) => (a < b ? -1 : 1))) {
    const totals = rows.filter((r) => r.ticker === TOTAL_TICKER);
    const tickers = rows.filter((r) => r.ticker !== TOTAL_TICKER);
    const problems: string[] = [];
    if (totals.length !== 1) {
      problems.push(`expected one ${TOTAL_TICKER} row, found ${totals.length}`);
    } else {
      const total = totals[0];
      const value = sum(tickers.flatMap((r) => (r.totalValue ? [r.totalValue] : [])));
      const pnl = sum(tickers.flatMap((r) => (r.pnl ? [r.pnl] : [])));
      if (!total.totalValue || !total.totalValue.equals(value)) {
        problems.push(`totalValue ${total.totalValue?.toFixed(2) ?? 'null'} != sum ${value.toFixed(2)}`);
      }
      if (!total.pnl || !total.pnl.equals(pnl)) {
        problems.push(`pnl ${total.pnl?.toFixed(2) ?? 'null'} != sum ${pnl.toFixed(2)}`);
      }
      if (!total.cashBalance || !total.totalEquity || !total.totalEquity.equals(value.plus(total.cashBalance))) {
        problems.push('totalEquity != totalValue + cashBalance');
      }
    }
    if (problems.length > 0) out.push({ date, problems });
  }
  return out;
}

export interface Holding {
  ticker: string;
  shares: number;
  buyPrice: Decimal;
  costBasis: Decimal;
  realizedPnl: Decimal;
}

/**
 * Rebuilds holdings from the trade log alone. Buys move the average price,
 * sells realise pnl against it. Fully closed tickers stay in the result when
 * they realised anything.
 */
export function reconstructPositions(tradeLog: TradeLogEntry[]): Holding[] {
  const holdings = new Map<string, Holding>();
  for (const entry of [...tradeLog].sort(byDateThenId)) {
    const h = holdings.get(entry.ticker) ?? {
      ticker: entry.ticker,
      shares: 0,
      buyPrice: ZERO,
      costBasis: ZERO,
      realizedPnl: ZERO,
    };
    if (entry.sharesBought > 0 && entry.buyPrice) {
      h.buyPrice =
        h.shares === 0 ? entry.buyPrice : weightedAverage(h.buyPrice, h.shares, entry.buyPrice, entry.sharesBought);
      h.shares += entry.sharesBought;
    }
    if (entry.sharesSold > 0 && entry.sellPrice) {
      h.realizedPnl = h.realizedPnl.plus(round2(entry.sellPrice.minus(h.buyPrice).times(entry.sharesSold)));
      h.shares -= entry.sharesSold;
    }
    h.costBasis = round2(h.buyPrice.times(h.shares));
    holdings.set(entry.ticker, h);
  }
  return [...holdings.values()]
    .filter((h) => h.shares > 0 || !h.realizedPnl.isZero())
    .sort((a, b) => a.ticker.localeCompare(b.ticker));
}

export interface PositionMismatch {
  ticker: string;
  stored: { shares: number; buyPrice: string } | null;
  replayed: { shares: number; buyPrice: string } | null;
}

/** Stored positions that the trade log does not account for, and vice versa. */
export function auditPositions(tradeLog: TradeLogEntry[], positions: Position[]): PositionMismatch[] {
  const replayed = new Map(
    reconstructPositions(tradeLog)
      .filter((h) => h.shares > 0)
      .map((h) => [h.ticker, { shares: h.shares, buyPrice: h.buyPrice.toFixed(2) }])
  );
  const stored = new Map(positions.map((p) => [p.ticker, { shares: p.shares, buyPrice: p.buyPrice.toFixed(2) }]));
  const tickers = [...new Set([...replayed.keys(), ...stored.keys()])].sort();
  const out: PositionMismatch[] = [];
  for (const ticker of tickers) {
    const s = stored.get(ticker) ?? null;
    const r = replayed.get(ticker) ?? null;
    if (!s || !r || s.shares !== r.shares || s.buyPrice !== r.buyPrice) {
      out.push({ ticker, stored: s, replayed: r });
    }
  }
  return out;
}
