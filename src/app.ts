import express, { type NextFunction, type Request, type Response } from 'express';
import type Decimal from 'decimal.js';
import { z } from 'zod';
import type { AppContext } from './context';
import { isAppError, statusForError, ValidationError } from './errors';
import { newCorrelationId, withCorrelationId } from './lib/logger';
import { formatMoney } from './lib/money';
import {
  auditCash,
  auditPositions,
  computeAllDrawdowns,
  computeDailyPerformance,
  computeRiskMetrics,
  computeRoiOverTime,
  computeStockRoi,
  computeWinLoss,
  findStopLossBreaches,
  isStopLossBreached,
  reconstructPositions,
  verifySnapshotTotals,
  type StockRoi,
} from './services/analyzer';
import { SYNTHETIC_DEFAULTS } from './services/snapshotService';
import { dateRangeSchema, isoDateSchema, parseInput, priceSchema } from './services/validation';
import type { CashAdjustment, PortfolioHistoryRow, Position, TradeLogEntry } from './types';

const CORRELATION_HEADER = 'x-correlation-id';

const money = (value: Decimal | null) => (value === null ? null : formatMoney(value));
const price = (value: Decimal | null) => (value === null ? null : value.toString());
const pct = (value: Decimal | null) => (value === null ? null : value.toFixed(2));
const ratio = (value: Decimal | null) => (value === null ? null : value.toFixed(4));

const positionView = (p: Position) => ({
  ticker: p.ticker,
  shares: p.shares,
  buyPrice: price(p.buyPrice),
  stopLoss: price(p.stopLoss),
  costBasis: money(p.costBasis),
});

const tradeView = (e: TradeLogEntry) => ({
  id: e.id,
  date: e.date,
  ticker: e.ticker,
  sharesBought: e.sharesBought,
  buyPrice: price(e.buyPrice),
  costBasis: money(e.costBasis),
  pnl: money(e.pnl),
  reason: e.reason,
  sharesSold: e.sharesSold,
  sellPrice: price(e.sellPrice),
});

const adjustmentView = (a: CashAdjustment) => ({ id: a.id, date: a.date, amount: money(a.amount), reason: a.reason });

const historyView = (r: PortfolioHistoryRow) => ({
  date: r.date,
  ticker: r.ticker,
  shares: r.shares,
  costBasis: money(r.costBasis),
  stopLoss: price(r.stopLoss),
  currentPrice: price(r.currentPrice),
  totalValue: money(r.totalValue),
  pnl: money(r.pnl),
  action: r.action,
  cashBalance: money(r.cashBalance),
  totalEquity: money(r.totalEquity),
  stopLossBreached: isStopLossBreached(r),
});

const roiView = (r: StockRoi) => ({
  ticker: r.ticker,
  sharesBought: r.sharesBought,
  sharesHeld: r.sharesHeld,
  costBasis: money(r.costBasis),
  proceeds: money(r.proceeds),
  marketValue: money(r.marketValue),
  netGain: money(r.netGain),
  roiPct: pct(r.roiPct),
});

const snapshotBodySchema = z.object({
  date: isoDateSchema.optional(),
  force: z.boolean().optional(),
});

const backfillBodySchema = z.object({
  daysBack: z.number().int().min(1).max(366),
  seed: z.number().int().optional(),
  minExistingDays: z.number().int().min(0).optional(),
});

const priceBodySchema = z.object({ price: priceSchema });

type Handler = (req: Request, res: Response) => Promise<void>;

const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

const rangeOf = (req: Request) => parseInput(dateRangeSchema, req.query, 'date range');

export function createApp(ctx: AppContext) {
  const { ledger, engine, exporter, manualPrices } = ctx;
  const log = ctx.logger.child('http');
  const app = express();

  app.use((req, res, next) => {
    const incoming = req.header(CORRELATION_HEADER);
    const id = incoming && incoming.length <= 128 ? incoming : newCorrelationId();
    res.setHeader(CORRELATION_HEADER, id);
    withCorrelationId(id, () => next());
  });
  app.use(express.json());

  app.get(
    '/api/state',
    route(async (_req, res) => {
      const state = await ledger.loadState();
      res.json({ positions: state.positions.map(positionView), cash: money(state.cash), isFirstTime: state.isFirstTime });
    })
  );

  app.post(
    '/api/trades/buy',
    route(async (req, res) => {
      const result = await ledger.applyBuy(req.body);
      res.status(201).json({
        entry: tradeView(result.entry),
        position: result.position ? positionView(result.position) : null,
        cash: money(result.cash),
      });
    })
  );

  app.post(
    '/api/trades/sell',
    route(async (req, res) => {
      const result = await ledger.applySell(req.body);
      res.status(201).json({
        entry: tradeView(result.entry),
        position: result.position ? positionView(result.position) : null,
        cash: money(result.cash),
      });
    })
  );

  app.post(
    '/api/cash',
    route(async (req, res) => {
      const result = await ledger.adjustCash(req.body);
      res.status(201).json({ adjustment: adjustmentView(result.adjustment), cash: money(result.cash) });
    })
  );

  app.get(
    '/api/trades',
    route(async (req, res) => {
      const entries = await ledger.getTradeLog(rangeOf(req));
      res.json(entries.map(tradeView));
    })
  );

  app.post(
    '/api/snapshots',
    route(async (req, res) => {
      const body = parseInput(snapshotBodySchema, req.body ?? {}, 'snapshot request');
      const result = await engine.createSnapshot(body.date, { force: body.force });
      if (result.status === 'skipped') {
        res.json(result);
        return;
      }
      res.status(201).json({ ...result, rows: result.rows.map(historyView) });
    })
  );

  app.get(
    '/api/history',
    route(async (req, res) => {
      const rows = await engine.getHistory(rangeOf(req));
      res.json(rows.map(historyView));
    })
  );

  app.get(
    '/api/export/history.csv',
    route(async (req, res) => {
      const csv = await exporter.exportHistoryCsv(rangeOf(req));
      res.type('text/csv').attachment('portfolio_history.csv').send(csv);
    })
  );

  app.get(
    '/api/export/trades.csv',
    route(async (req, res) => {
      const csv = await exporter.exportTradeLogCsv(rangeOf(req));
      res.type('text/csv').attachment('trade_log.csv').send(csv);
    })
  );

  app.get(
    '/api/analysis/drawdown',
    route(async (req, res) => {
      const history = await engine.getHistory(rangeOf(req));
      res.json(
        computeAllDrawdowns(history).map((d) => ({
          ticker: d.ticker,
          days: d.days,
          maxDrawdownAbs: formatMoney(d.maxDrawdownAbs),
          maxDrawdownPct: pct(d.maxDrawdownPct),
        }))
      );
    })
  );

  app.get(
    '/api/analysis/cash-audit',
    route(async (_req, res) => {
      const { tradeLog, adjustments, history, positions } = await ledger.readJournal();
      // Opening balance is itself a recorded adjustment.
      const cash = auditCash(tradeLog, history, 0, adjustments);
      res.json({
        checked: cash.checked,
        cashMismatches: cash.mismatches.map((m) => ({
          date: m.date,
          stored: money(m.stored),
          replayed: money(m.replayed),
          difference: money(m.difference),
        })),
        positionMismatches: auditPositions(tradeLog, positions),
        snapshotProblems: verifySnapshotTotals(history),
        realizedPnl: reconstructPositions(tradeLog).map((h) => ({
          ticker: h.ticker,
          shares: h.shares,
          realizedPnl: money(h.realizedPnl),
        })),
      });
    })
  );

  app.get(
    '/api/analysis/roi',
    route(async (_req, res) => {
      const { tradeLog, history } = await ledger.readJournal();
      const stocks = computeStockRoi(tradeLog, history);
      const winLoss = computeWinLoss(stocks);
      res.json({
        stocks: stocks.map(roiView),
        winLoss: {
          ...winLoss,
          winRatePct: pct(winLoss.winRatePct),
          avgWinPct: pct(winLoss.avgWinPct),
          avgLossPct: pct(winLoss.avgLossPct),
          best: winLoss.best ? roiView(winLoss.best) : null,
          worst: winLoss.worst ? roiView(winLoss.worst) : null,
        },
      });
    })
  );

  app.get(
    '/api/analysis/roi-over-time',
    route(async (req, res) => {
      const history = await engine.getHistory(rangeOf(req));
      res.json(computeRoiOverTime(history).map((p) => ({ ticker: p.ticker, date: p.date, roiPct: pct(p.roiPct) })));
    })
  );

  app.get(
    '/api/analysis/performance',
    route(async (req, res) => {
      const daily = computeDailyPerformance(await engine.getHistory(rangeOf(req)));
      const risk = computeRiskMetrics(daily);
      res.json({
        daily: daily.map((d) => ({
          date: d.date,
          totalEquity: money(d.totalEquity),
          dailyReturnPct: pct(d.dailyReturnPct),
          cumulativeReturnPct: pct(d.cumulativeReturnPct),
        })),
        risk: {
          ...risk,
          avgDailyReturnPct: ratio(risk.avgDailyReturnPct),
          dailyVolatilityPct: ratio(risk.dailyVolatilityPct),
          annualizedVolatilityPct: ratio(risk.annualizedVolatilityPct),
          sharpeRatio: ratio(risk.sharpeRatio),
          sortinoRatio: ratio(risk.sortinoRatio),
        },
      });
    })
  );

  app.get(
    '/api/analysis/stop-loss',
    route(async (req, res) => {
      const history = await engine.getHistory(rangeOf(req));
      res.json(
        findStopLossBreaches(history).map((b) => ({
          date: b.date,
          ticker: b.ticker,
          shares: b.shares,
          currentPrice: price(b.currentPrice),
          stopLoss: price(b.stopLoss),
        }))
      );
    })
  );

  app.put(
    '/api/prices/:ticker',
    route(async (req, res) => {
      const body = parseInput(priceBodySchema, req.body, 'price');
      const value = manualPrices.set(req.params.ticker, body.price.toString());
      res.json({ ticker: req.params.ticker.trim().toUpperCase(), price: value.toString() });
    })
  );

  app.delete(
    '/api/prices/:ticker',
    route(async (req, res) => {
      if (!manualPrices.remove(req.params.ticker)) {
        res.status(404).json({ error: { kind: 'not_found', message: `No manual price for ${req.params.ticker}` } });
        return;
      }
      res.status(204).end();
    })
  );

  app.get(
    '/api/prices',
    route(async (_req, res) => {
      res.json(manualPrices.all());
    })
  );

  app.post(
    '/api/backfill',
    route(async (req, res) => {
      const body = parseInput(backfillBodySchema, req.body, 'backfill request');
      const result = await engine.backfillSynthetic({ ...SYNTHETIC_DEFAULTS, ...body });
      res.json(result);
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: { kind: 'not_found', message: 'Route not found' } });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: { kind: 'validation', message: 'Request body is not valid JSON' } });
      return;
    }
    const status = statusForError(error);
    if (status >= 500) {
      log.error('request failed', { status, error });
    }
    const message = isAppError(error) || status < 500 ? errorMessage(error) : 'Internal server error';
    res.status(status).json({
      error: {
        kind: isAppError(error) ? error.kind : 'internal',
        message,
        ...(error instanceof ValidationError && error.issues.length > 0 ? { issues: error.issues } : {}),
      },
    });
  });

  return app;
}

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
