import type { Server } from 'http';
import type { Express } from 'express';
import { createApp } from './app';
import type { AppConfig } from './config';
import { createContext, type AppContext } from './context';
import { fixedClock } from './services/calendar';
import { makeTempDir, removeDir, testConfig } from './testing';

const TODAY = '2026-10-19';

const listen = (app: Express) =>
  new Promise<Server>((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
  });

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

describe('http api', () => {
  let dir: string;
  let ctx: AppContext;
  let server: Server;
  let base: string;

  const start = async (overrides: Partial<AppConfig> = {}) => {
    ctx = createContext(testConfig(dir, overrides), { clock: fixedClock(TODAY), feeds: [] });
    await ctx.ledger.seedDefaults(ctx.config.startingCash);
    server = await listen(createApp(ctx));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${address.port}`;
  };

  const call = async (method: string, path: string, body?: unknown, headers: Record<string, string> = {}) => {
    const res = await fetch(`${base}${path}`, {
      method,
      headers: { 'content-type': 'application/json', ...headers },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    const text = await res.text();
    const json: unknown = res.headers.get('content-type')?.includes('application/json') ? JSON.parse(text) : undefined;
    return { status: res.status, headers: res.headers, text, json };
  };

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(async () => {
    await closeServer(server);
    ctx.close();
    removeDir(dir);
  });

  it('reports ledger state with a correlation id', async () => {
    await start();
    const res = await call('GET', '/api/state');
    expect(res.status).toBe(200);
    expect(res.json).toEqual({ positions: [], cash: '10000.00', isFirstTime: false });
    expect(res.headers.get('x-correlation-id')).toMatch(/^[0-9a-f-]{36}$/);

    const traced = await call('GET', '/api/state', undefined, { 'x-correlation-id': 'test-correlation' });
    expect(traced.headers.get('x-correlation-id')).toBe('test-correlation');
  });

  it('applies trades and maps failures to status codes', async () => {
    await start();
    const bought = await call('POST', '/api/trades/buy', { ticker: 'aapl', shares: 10, price: 50 });
    expect(bought.status).toBe(201);
    expect(bought.json).toMatchObject({
      cash: '9500.00',
      position: { ticker: 'AAPL', shares: 10, buyPrice: '50', stopLoss: null, costBasis: '500.00' },
      entry: { id: 1, reason: 'MANUAL BUY - New position' },
    });

    const invalid = await call('POST', '/api/trades/buy', { ticker: 'AAPL', shares: 0, price: 50 });
    expect(invalid.status).toBe(400);
    expect(invalid.json).toMatchObject({ error: { kind: 'validation', issues: ['shares: Shares must be positive'] } });

    const missing = await call('POST', '/api/trades/sell', { ticker: 'TSLA', shares: 1, price: 10 });
    expect(missing.status).toBe(404);
    expect(missing.json).toEqual({ error: { kind: 'not_found', message: 'No position in TSLA' } });

    const oversold = await call('POST', '/api/trades/sell', { ticker: 'AAPL', shares: 11, price: 50 });
    expect(oversold.status).toBe(404);
    expect(oversold.json).toEqual({
      error: { kind: 'not_found', message: 'Trying to sell 11 shares of AAPL but only own 10' },
    });

    const malformed = await call('POST', '/api/cash', '{"amount": ');
    expect(malformed.status).toBe(400);

    const badRange = await call('GET', '/api/trades?from=2026-10-20&to=2026-10-01');
    expect(badRange.status).toBe(400);

    const trades = await call('GET', '/api/trades');
    expect(trades.json).toMatchObject([{ id: 1, ticker: 'AAPL', sharesBought: 10 }]);
  });

  it('snapshots with manual prices and audits the result', async () => {
    await start();
    await call('POST', '/api/trades/buy', { ticker: 'AAPL', shares: 10, price: 50 });

    const priced = await call('PUT', '/api/prices/aapl', { price: 55 });
    expect(priced.json).toEqual({ ticker: 'AAPL', price: '55' });

    const snap = await call('POST', '/api/snapshots', {});
    expect(snap.status).toBe(201);
    expect(snap.json).toMatchObject({
      status: 'created',
      date: TODAY,
      rows: [
        { ticker: 'AAPL', currentPrice: '55', totalValue: '550.00', pnl: '50.00', action: 'BUY' },
        { ticker: 'TOTAL', totalValue: '550.00', cashBalance: '9500.00', totalEquity: '10050.00' },
      ],
    });

    const weekend = await call('POST', '/api/snapshots', { date: '2026-10-17' });
    expect(weekend.json).toEqual({ status: 'skipped', date: '2026-10-17', reason: 'non_trading_day' });

    const audit = await call('GET', '/api/analysis/cash-audit');
    expect(audit.json).toEqual({
      checked: 1,
      cashMismatches: [],
      positionMismatches: [],
      snapshotProblems: [],
      realizedPnl: [{ ticker: 'AAPL', shares: 10, realizedPnl: '0.00' }],
    });

    const drawdown = await call('GET', '/api/analysis/drawdown');
    expect(drawdown.json).toEqual([
      { ticker: 'AAPL', days: 1, maxDrawdownAbs: '0.00', maxDrawdownPct: '0.00' },
      { ticker: 'TOTAL', days: 1, maxDrawdownAbs: '0.00', maxDrawdownPct: '0.00' },
    ]);

    expect((await call('DELETE', '/api/prices/AAPL')).status).toBe(204);
    expect((await call('DELETE', '/api/prices/AAPL')).status).toBe(404);
  });

  it('audits a snapshot taken between two trades of the day and reports returns', async () => {
    await start();
    await call('POST', '/api/trades/buy', { ticker: 'AAPL', shares: 10, price: 50, stopLoss: 52 });
    await call('PUT', '/api/prices/AAPL', { price: 51 });
    const snap = await call('POST', '/api/snapshots', {});
    expect(snap.json).toMatchObject({ rows: [{ ticker: 'AAPL', stopLossBreached: true }, { ticker: 'TOTAL' }] });
    await call('POST', '/api/trades/buy', { ticker: 'AAPL', shares: 10, price: 50 });

    const audit = await call('GET', '/api/analysis/cash-audit');
    expect(audit.json).toMatchObject({ checked: 1, cashMismatches: [], positionMismatches: [] });

    const aapl = {
      ticker: 'AAPL',
      sharesBought: 20,
      sharesHeld: 20,
      costBasis: '1000.00',
      proceeds: '0.00',
      marketValue: '1020.00',
      netGain: '20.00',
      roiPct: '2.00',
    };
    const roi = await call('GET', '/api/analysis/roi');
    expect(roi.json).toEqual({
      stocks: [aapl],
      winLoss: {
        total: 1,
        winning: 1,
        losing: 0,
        breakeven: 0,
        winRatePct: '100.00',
        avgWinPct: '2.00',
        avgLossPct: '0.00',
        best: aapl,
        worst: aapl,
      },
    });

    const performance = await call('GET', '/api/analysis/performance');
    expect(performance.json).toEqual({
      daily: [{ date: TODAY, totalEquity: '10010.00', dailyReturnPct: null, cumulativeReturnPct: '0.00' }],
      risk: {
        returns: 0,
        avgDailyReturnPct: '0.0000',
        dailyVolatilityPct: '0.0000',
        annualizedVolatilityPct: '0.0000',
        sharpeRatio: '0.0000',
        sortinoRatio: null,
        maxConsecutiveWins: 0,
        maxConsecutiveLosses: 0,
      },
    });

    const stops = await call('GET', '/api/analysis/stop-loss');
    expect(stops.json).toEqual([{ date: TODAY, ticker: 'AAPL', shares: 10, currentPrice: '51', stopLoss: '52' }]);
  });

  it('exports csv', async () => {
    await start();
    await call('POST', '/api/trades/buy', { ticker: 'AAPL', shares: 1, price: 50 });
    const res = await call('GET', `/api/export/trades.csv?from=${TODAY}&to=${TODAY}`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('text/csv');
    expect(res.text.split('\n')).toEqual([
      'Id,Date,Ticker,Shares Bought,Buy Price,Cost Basis,PnL,Reason,Shares Sold,Sell Price',
      `1,${TODAY},AAPL,1,50,50.00,0.00,MANUAL BUY - New position,0,`,
      '',
    ]);
  });

  it('backfills outside production only', async () => {
    await start();
    const res = await call('POST', '/api/backfill', { daysBack: 3 });
    expect(res.json).toEqual({ status: 'generated', days: ['2026-10-16'], removedRows: 0 });
  });

  it('refuses backfill in production', async () => {
    await start({ env: 'production' });
    const res = await call('POST', '/api/backfill', { daysBack: 3 });
    expect(res.status).toBe(500);
    expect(res.json).toMatchObject({ error: { kind: 'config' } });
  });

  it('answers unknown routes with 404', async () => {
    await start();
    expect((await call('GET', '/api/nope')).status).toBe(404);
  });
});
