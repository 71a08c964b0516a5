import { ValidationError } from '../errors';
import { buySchema, cashSchema, dateRangeSchema, isoDateSchema, parseInput, sellSchema } from './validation';

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ValidationError');
};

describe('input validation', () => {
  it('normalises tickers and keeps price precision', () => {
    const cmd = parseInput(buySchema, { ticker: ' aapl ', shares: 10, price: '50.1234' }, 'buy');
    expect(cmd.ticker).toBe('AAPL');
    expect(cmd.price.toString()).toBe('50.1234');
    expect(cmd.stopLoss).toBeUndefined();
  });

  it('accepts a null stop loss', () => {
    const cmd = parseInput(buySchema, { ticker: 'MSFT', shares: 1, price: 10, stopLoss: null }, 'buy');
    expect(cmd.stopLoss).toBeNull();
  });

  it('rejects prices with more than four decimals', () => {
    expect(issuesOf(() => parseInput(buySchema, { ticker: 'AAPL', shares: 1, price: '1.23456' }, 'buy'))).toEqual([
      'price: Price allows at most 4 decimals',
    ]);
  });

  it('rejects fractional and non-positive shares', () => {
    expect(issuesOf(() => parseInput(sellSchema, { ticker: 'AAPL', shares: 1.5, price: 1 }, 'sell'))).toEqual([
      'shares: Shares must be an integer',
    ]);
    expect(issuesOf(() => parseInput(sellSchema, { ticker: 'AAPL', shares: 0, price: 1 }, 'sell'))).toEqual([
      'shares: Shares must be positive',
    ]);
  });

  it('reserves the TOTAL ticker', () => {
    expect(issuesOf(() => parseInput(buySchema, { ticker: 'total', shares: 1, price: 1 }, 'buy'))).toEqual([
      'ticker: TOTAL is reserved',
    ]);
    expect(issuesOf(() => parseInput(buySchema, { ticker: '1ABC', shares: 1, price: 1 }, 'buy'))).toEqual([
      'ticker: Invalid ticker format',
    ]);
  });

  it('prefixes the message with what was being parsed', () => {
    expect(() => parseInput(cashSchema, { amount: 0 }, 'cash adjustment')).toThrow(
      'Invalid cash adjustment: amount: Amount must not be zero'
    );
  });

  it('parses signed cash amounts', () => {
    expect(parseInput(cashSchema, { amount: '-100.50' }, 'cash').amount.toString()).toBe('-100.5');
  });

  it('checks calendar dates and range order', () => {
    expect(isoDateSchema.safeParse('2026-02-30').success).toBe(false);
    expect(isoDateSchema.safeParse('2026-02-28').success).toBe(true);
    expect(issuesOf(() => parseInput(dateRangeSchema, { from: '2026-03-10', to: '2026-03-01' }, 'range'))).toEqual([
      'from must not be after to',
    ]);
  });
});
