import type Decimal from 'decimal.js';
import {
  appendCashAdjustment,
  appendTradeLog,
  deletePosition,
  readCash,
  readCashAdjustments,
  readCashRow,
  readHistory,
  readPosition,
  readPositions,
  readTradeLog,
  writeCash,
  writePosition,
  type DateRangeFilter,
} from '../db/queries';
import type { TransactionRunner } from '../db/transaction';
import { isAppError, NotFoundError, ValidationError } from '../errors';
import { AuditLog, silentLogger, type LogFields, type Logger } from '../lib/logger';
import { formatMoney, round2, toMoney, tradeAmount, weightedAverage, ZERO } from '../lib/money';
import type { CashAdjustment, CashResult, Journal, LedgerState, Position, TradeLogEntry, TradeResult } from '../types';
import type { Clock } from './calendar';
import {
  buySchema,
  cashSchema,
  dateRangeSchema,
  parseInput,
  sellSchema,
  type BuyInput,
  type CashInput,
  type SellInput,
} from './validation';

export const BUY_REASON_NEW = 'MANUAL BUY - New position';
export const BUY_REASON_ADD = 'MANUAL BUY - Add to position';
export const SELL_REASON_DEFAULT = 'MANUAL SELL - User';
export const INITIAL_DEPOSIT_REASON = 'INITIAL DEPOSIT';

export interface LedgerDeps {
  tx: TransactionRunner;
  clock: Clock;
  logger?: Logger;
}

const positionFields = (position: Position | null): LogFields =>
  position
    ? { shares: position.shares, buyPrice: position.buyPrice.toString(), costBasis: formatMoney(position.costBasis) }
    : { shares: 0 };

export function createLedger({ tx, clock, logger = silentLogger }: LedgerDeps) {
  const audit = new AuditLog(logger);

  const audited = async <T>(action: string, attrs: LogFields, work: () => Promise<T>): Promise<T> => {
    try {
      return await work();
    } catch (error) {
      const kind = isAppError(error) ? error.kind : 'unknown';
      const reason = error instanceof Error ? error.message : String(error);
      audit.event(kind === 'validation' ? 'validation.failed' : 'trade.rejected', { action, kind, reason, ...attrs });
      throw error;
    }
  };

  return {
    /**
     * Buys into `ticker`, merging into an existing position at the weighted
     * average price. Position, cash and trade log are written in one transaction.
     */
    applyBuy(input: BuyInput): Promise<TradeResult> {
      return audited('buy', { ticker: input.ticker, shares: input.shares }, async () => {
        const cmd = parseInput(buySchema, input, 'buy');
        const date = cmd.date ?? clock.today();
        const amount = tradeAmount(cmd.shares, cmd.price);

        const result = await tx.write('applyBuy', (db): TradeResult => {
          const cash = readCash(db);
          if (amount.greaterThan(cash)) {
            throw new ValidationError(
              `Insufficient cash for this trade: need ${formatMoney(amount)}, have ${formatMoney(cash)}`
            );
          }

          const existing = readPosition(db, cmd.ticker);
          let position: Position;
          if (existing) {
            const shares = existing.shares + cmd.shares;
            const buyPrice = weightedAverage(existing.buyPrice, existing.shares, cmd.price, cmd.shares);
            position = {
              ticker: cmd.ticker,
              shares,
              buyPrice,
              stopLoss: cmd.stopLoss === undefined ? existing.stopLoss : cmd.stopLoss,
              costBasis: round2(buyPrice.times(shares)),
            };
          } else {
            position = {
              ticker: cmd.ticker,
              shares: cmd.shares,
              buyPrice: cmd.price,
              stopLoss: cmd.stopLoss ?? null,
              costBasis: amount,
            };
          }
          writePosition(db, position);

          const balance = cash.minus(amount);
          writeCash(db, balance);

          const entry = appendTradeLog(db, {
            date,
            ticker: cmd.ticker,
            sharesBought: cmd.shares,
            buyPrice: cmd.price,
            costBasis: amount,
            pnl: ZERO,
            reason: cmd.reason ?? (existing ? BUY_REASON_ADD : BUY_REASON_NEW),
            sharesSold: 0,
            sellPrice: null,
          });
          return { entry, position, cash: balance };
        });

        audit.event('trade.applied', {
          action: 'buy',
          ticker: cmd.ticker,
          price: cmd.price.toString(),
          tradeId: result.entry.id,
          cash: formatMoney(result.cash),
          position: positionFields(result.position),
        });
        return result;
      });
    },

    /** Sells from an existing position; removes it when no shares remain. */
    applySell(input: SellInput): Promise<TradeResult> {
      return audited('sell', { ticker: input.ticker, shares: input.shares }, async () => {
        const cmd = parseInput(sellSchema, input, 'sell');
        const date = cmd.date ?? clock.today();
        const amount = tradeAmount(cmd.shares, cmd.price);

        const result = await tx.write('applySell', (db): TradeResult => {
          const existing = readPosition(db, cmd.ticker);
          if (!existing) {
            throw new NotFoundError(`No position in ${cmd.ticker}`);
          }
          if (cmd.shares > existing.shares) {
            throw new NotFoundError(
              `Trying to sell ${cmd.shares} shares of ${cmd.ticker} but only own ${existing.shares}`
            );
          }

          const pnl = round2(cmd.price.minus(existing.buyPrice).times(cmd.shares));
          const remaining = existing.shares - cmd.shares;
          let position: Position | null = null;
          if (remaining === 0) {
            deletePosition(db, cmd.ticker);
          } else {
            position = { ...existing, shares: remaining, costBasis: round2(existing.buyPrice.times(remaining)) };
            writePosition(db, position);
          }

          const balance = readCash(db).plus(amount);
          writeCash(db, balance);

          const entry = appendTradeLog(db, {
            date,
            ticker: cmd.ticker,
            sharesBought: 0,
            buyPrice: existing.buyPrice,
            costBasis: round2(existing.buyPrice.times(cmd.shares)),
            pnl,
            reason: cmd.reason ?? SELL_REASON_DEFAULT,
            sharesSold: cmd.shares,
            sellPrice: cmd.price,
          });
          return { entry, position, cash: balance };
        });

        audit.event('trade.applied', {
          action: 'sell',
          ticker: cmd.ticker,
          price: cmd.price.toString(),
          tradeId: result.entry.id,
          pnl: formatMoney(result.entry.pnl),
          cash: formatMoney(result.cash),
          position: positionFields(result.position),
        });
        return result;
      });
    },

    /** Deposit (positive) or withdrawal (negative). Withdrawals may not overdraw. */
    adjustCash(input: CashInput): Promise<CashResult> {
      return audited('cash', { amount: String(input.amount) }, async () => {
        const cmd = parseInput(cashSchema, input, 'cash adjustment');
        const date = cmd.date ?? clock.today();
        const reason = cmd.reason ?? (cmd.amount.isPositive() ? 'DEPOSIT' : 'WITHDRAWAL');

        const result = await tx.write('adjustCash', (db): CashResult => {
          const balance = readCash(db).plus(cmd.amount);
          if (balance.isNegative()) {
            throw new ValidationError(`Insufficient cash for withdrawal of ${formatMoney(cmd.amount.abs())}`);
          }
          writeCash(db, balance);
          const adjustment = appendCashAdjustment(db, date, cmd.amount, reason);
          return { adjustment, cash: balance };
        });

        audit.event('cash.adjusted', {
          amount: formatMoney(cmd.amount),
          reason,
          cash: formatMoney(result.cash),
        });
        return result;
      });
    },

    loadState(): Promise<LedgerState> {
      return tx.read('loadState', (db) => {
        const positions = readPositions(db);
        const cashRow = readCashRow(db);
        return {
          positions,
          cash: cashRow ?? ZERO,
          isFirstTime: positions.length === 0 && cashRow === null,
        };
      });
    },

    /** Writes the opening balance of a brand-new ledger. Returns false if the ledger was already initialised. */
    async seedDefaults(startingCash: Decimal.Value): Promise<boolean> {
      const amount = toMoney(startingCash);
      if (amount.isNegative()) {
        throw new ValidationError('Starting cash must not be negative');
      }
      const seeded = await tx.write('seedDefaults', (db) => {
        if (readCashRow(db) !== null || readPositions(db).length > 0) return false;
        writeCash(db, amount);
        if (!amount.isZero()) {
          appendCashAdjustment(db, clock.today(), amount, INITIAL_DEPOSIT_REASON);
        }
        return true;
      });
      if (seeded) {
        audit.event('cash.adjusted', { amount: formatMoney(amount), reason: INITIAL_DEPOSIT_REASON, cash: formatMoney(amount) });
      }
      return seeded;
    },

    async getTradeLog(range?: DateRangeFilter): Promise<TradeLogEntry[]> {
      const filter = parseInput(dateRangeSchema, range ?? {}, 'date range');
      return tx.read('getTradeLog', (db) => readTradeLog(db, filter));
    },

    async getCashAdjustments(range?: DateRangeFilter): Promise<CashAdjustment[]> {
      const filter = parseInput(dateRangeSchema, range ?? {}, 'date range');
      return tx.read('getCashAdjustments', (db) => readCashAdjustments(db, filter));
    },

    /** Input for the audits. A trade committing meanwhile is either wholly in or wholly out. */
    readJournal(): Promise<Journal> {
      return tx.read('readJournal', (db) => ({
        tradeLog: readTradeLog(db),
        adjustments: readCashAdjustments(db),
        history: readHistory(db),
        positions: readPositions(db),
        cash: readCash(db),
      }));
    },
  };
}

export type Ledger = ReturnType<typeof createLedger>;
