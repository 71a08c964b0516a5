import { toMoney } from '../lib/money';
import type { TradeLogEntry } from '../types';
import { historyToCsv, toCsv, tradeLogToCsv } from './exportService';
import { computeSnapshot } from './snapshotService';

describe('csv export', () => {
  it('quotes cells that carry separators or quotes', () => {
    expect(toCsv(['a', 'b'], [['x,y', 'say "hi"'], [null, 3]])).toBe('a,b\n"x,y","say ""hi"""\n,3\n');
  });

  it('writes history rows with fixed money columns', () => {
    const rows = computeSnapshot(
      '2026-10-19',
      [{ ticker: 'AAPL', shares: 10, buyPrice: toMoney(50), stopLoss: toMoney(45), costBasis: toMoney(500) }],
      toMoney(100),
      new Map([['AAPL', toMoney('55.5')]])
    );
    expect(historyToCsv(rows).split('\n')).toEqual([
      'Date,Ticker,Shares,Cost Basis,Stop Loss,Current Price,Total Value,PnL,Action,Cash Balance,Total Equity',
      '2026-10-19,AAPL,10,500.00,45,55.5,555.00,55.00,HOLD,,',
      '2026-10-19,TOTAL,,,,,555.00,55.00,,100.00,655.00',
      '',
    ]);
  });

  it('writes the trade log with one line per entry', () => {
    const entry: TradeLogEntry = {
      id: 7,
      date: '2026-10-19',
      ticker: 'MSFT',
      sharesBought: 0,
      buyPrice: toMoney('100'),
      costBasis: toMoney(400),
      pnl: toMoney(40),
      reason: 'Trim, after earnings',
      sharesSold: 4,
      sellPrice: toMoney(110),
    };
    expect(tradeLogToCsv([entry])).toBe(
      'Id,Date,Ticker,Shares Bought,Buy Price,Cost Basis,PnL,Reason,Shares Sold,Sell Price\n' +
        '7,2026-10-19,MSFT,0,100,400.00,40.00,"Trim, after earnings",4,110\n'
    );
  });
});
