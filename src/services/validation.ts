import type Decimal from 'decimal.js';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { Money, PRICE_INPUT_DECIMALS } from '../lib/money';
import { TOTAL_TICKER } from '../db/schema';

export const TICKER_PATTERN = /^[A-Z][A-Z0-9.]{0,9}$/;

export const tickerSchema = z
  .string({ invalid_type_error: 'Ticker must be a string' })
  .transform((t) => t.trim().toUpperCase())
  .refine((t) => TICKER_PATTERN.test(t), 'Invalid ticker format')
  .refine((t) => t !== TOTAL_TICKER, `${TOTAL_TICKER} is reserved`);

export const sharesSchema = z
  .number({ invalid_type_error: 'Shares must be a number' })
  .int('Shares must be an integer')
  .positive('Shares must be positive')
  .max(Number.MAX_SAFE_INTEGER);

const decimalText = z.union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Not a decimal number')]);

const toDecimal = (value: number | string): Decimal => new Money(value);

export const priceSchema = decimalText
  .refine((v) => typeof v !== 'number' || Number.isFinite(v), 'Price must be finite')
  .transform(toDecimal)
  .refine((d) => d.greaterThan(0), 'Price must be positive')
  .refine((d) => d.decimalPlaces() <= PRICE_INPUT_DECIMALS, `Price allows at most ${PRICE_INPUT_DECIMALS} decimals`);

export const stopLossSchema = priceSchema.nullable().optional();

export const amountSchema = decimalText
  .refine((v) => typeof v !== 'number' || Number.isFinite(v), 'Amount must be finite')
  .transform(toDecimal)
  .refine((d) => !d.isZero(), 'Amount must not be zero')
  .refine((d) => d.decimalPlaces() <= 2, 'Amount allows at most 2 decimals');

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine((d) => !Number.isNaN(Date.parse(`${d}T00:00:00Z`)) && new Date(`${d}T00:00:00Z`).toISOString().startsWith(d), 'Invalid calendar date');

export const reasonSchema = z.string().trim().min(1).max(200);

export const buySchema = z.object({
  ticker: tickerSchema,
  shares: sharesSchema,
  price: priceSchema,
  stopLoss: stopLossSchema,
  date: isoDateSchema.optional(),
  reason: reasonSchema.optional(),
});

export const sellSchema = z.object({
  ticker: tickerSchema,
  shares: sharesSchema,
  price: priceSchema,
  reason: reasonSchema.optional(),
  date: isoDateSchema.optional(),
});

export const cashSchema = z.object({
  amount: amountSchema,
  reason: reasonSchema.optional(),
  date: isoDateSchema.optional(),
});

export const basePositionsSchema = z
  .array(
    z.object({
      ticker: tickerSchema,
      shares: sharesSchema,
      buyPrice: priceSchema,
      stopLoss: stopLossSchema,
    })
  )
  .refine((ps) => new Set(ps.map((p) => p.ticker)).size === ps.length, 'Duplicate ticker');

export const dateRangeSchema = z
  .object({
    from: isoDateSchema.optional(),
    to: isoDateSchema.optional(),
  })
  .refine((r) => !r.from || !r.to || r.from <= r.to, 'from must not be after to');

export type BuyInput = z.input<typeof buySchema>;
export type SellInput = z.input<typeof sellSchema>;
export type CashInput = z.input<typeof cashSchema>;

/** Parses `input` or throws a ValidationError listing every issue. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
