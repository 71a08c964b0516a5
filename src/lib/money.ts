import Decimal from 'decimal.js';

export const Money = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });
export type Money = Decimal;

export const MONEY_DECIMALS = 2;
export const PRICE_INPUT_DECIMALS = 4;

export const ZERO = new Money(0);

export function toMoney(value: Decimal.Value): Decimal {
  return new Money(value);
}

export function round2(value: Decimal): Decimal {
  return new Money(value).toDecimalPlaces(MONEY_DECIMALS, Decimal.ROUND_HALF_UP);
}

/** Cash moved by a trade. Ledger and replay both go through here. */
export function tradeAmount(shares: number, price: Decimal): Decimal {
  return round2(price.times(shares));
}

/**
 * Merged buy price, rounded half-up to the finer of the two input prices
 * (at least cents, at most the input price precision).
 */
export function weightedAverage(
  oldPrice: Decimal,
  oldShares: number,
  price: Decimal,
  shares: number
): Decimal {
  const total = oldShares + shares;
  const places = Math.min(
    PRICE_INPUT_DECIMALS,
    Math.max(MONEY_DECIMALS, oldPrice.decimalPlaces(), price.decimalPlaces())
  );
  return new Money(oldPrice.times(oldShares).plus(price.times(shares)).dividedBy(total)).toDecimalPlaces(
    places,
    Decimal.ROUND_HALF_UP
  );
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), ZERO);
}

/** Fixed two-place text used for storage and CSV. */
export function formatMoney(value: Decimal): string {
  return round2(value).toFixed(MONEY_DECIMALS);
}

export function parseStored(value: string | number | null): Decimal | null {
  if (value === null || value === '') return null;
  return new Money(value);
}
