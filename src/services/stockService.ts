import { GoogleGenAI } from '@google/genai';
import type Decimal from 'decimal.js';
import { z } from 'zod';
import { ConfigError, MarketDataError } from '../errors';
import { silentLogger, type Logger } from '../lib/logger';
import { Money } from '../lib/money';
import type { IsoDate } from '../types';
import { parseInput, priceSchema, tickerSchema } from './validation';

/** Market-data collaborator. `null` means no price is available for that day. */
export interface PriceSource {
  readonly name: string;
  getPrice(ticker: string, date: IsoDate): Promise<Decimal | null>;
  getPrices?(tickers: string[], date: IsoDate): Promise<Map<string, Decimal>>;
}

export async function resolvePrices(
  source: PriceSource,
  tickers: string[],
  date: IsoDate
): Promise<Map<string, Decimal | null>> {
  const out = new Map<string, Decimal | null>();
  if (tickers.length === 0) return out;
  if (source.getPrices) {
    const found = await source.getPrices(tickers, date);
    for (const t of tickers) out.set(t, found.get(t) ?? null);
    return out;
  }
  for (const t of tickers) {
    out.set(t, await source.getPrice(t, date));
  }
  return out;
}

/**
 * Caller-owned price overrides, used when a feed has no quote for a ticker.
 * Each app context holds its own instance; nothing here is process-wide.
 */
export class ManualPriceSource implements PriceSource {
  readonly name = 'manual';
  private readonly prices = new Map<string, Decimal>();

  constructor(initial: Record<string, number | string> = {}) {
    for (const [ticker, price] of Object.entries(initial)) {
      this.set(ticker, price);
    }
  }

  set(ticker: string, price: number | string): Decimal {
    const symbol = parseInput(tickerSchema, ticker, 'ticker');
    const value = parseInput(priceSchema, price, 'price');
    this.prices.set(symbol, value);
    return value;
  }

  remove(ticker: string): boolean {
    return this.prices.delete(ticker.trim().toUpperCase());
  }

  all(): Record<string, string> {
    return Object.fromEntries([...this.prices].map(([t, p]) => [t, p.toString()]));
  }

  async getPrice(ticker: string): Promise<Decimal | null> {
    return this.prices.get(ticker.trim().toUpperCase()) ?? null;
  }
}

/** Asks each source in turn; the first non-null answer wins. */
export class FallbackPriceSource implements PriceSource {
  readonly name: string;

  constructor(private readonly sources: PriceSource[], private readonly logger: Logger = silentLogger) {
    this.name = sources.map((s) => s.name).join('>');
  }

  async getPrice(ticker: string, date: IsoDate): Promise<Decimal | null> {
    const prices = await this.getPrices([ticker], date);
    return prices.get(ticker) ?? null;
  }

  async getPrices(tickers: string[], date: IsoDate): Promise<Map<string, Decimal>> {
    const found = new Map<string, Decimal>();
    let pending = [...tickers];
    for (const source of this.sources) {
      if (pending.length === 0) break;
      let prices: Map<string, Decimal | null>;
      try {
        prices = await resolvePrices(source, pending, date);
      } catch (error) {
        if (!(error instanceof MarketDataError)) throw error;
        this.logger.warn('price source failed', { source: source.name, tickers: pending, error });
        continue;
      }
      for (const [ticker, price] of prices) {
        if (price) found.set(ticker, price);
      }
      pending = pending.filter((t) => !found.has(t));
    }
    if (pending.length > 0) {
      this.logger.info('no price available', { date, tickers: pending });
    }
    return found;
  }
}

const quoteSchema = z.object({
  symbol: z.string(),
  price: z.number().positive().finite(),
});

/** Pulls the first JSON array of `{ symbol, price }` out of a model reply, tolerating markdown fences. */
export function parseQuoteReply(text: string): Map<string, Decimal> {
  const match = text.match(/\[\s*\{[\s\S]*\}\s*\]/) ?? text.match(/\[[\s\S]*\]/);
  let data: unknown;
  try {
    data = JSON.parse(match ? match[0] : text);
  } catch {
    throw new MarketDataError('Price reply is not valid JSON');
  }
  if (!Array.isArray(data)) {
    throw new MarketDataError('Price reply is not a JSON array');
  }
  const out = new Map<string, Decimal>();
  for (const item of data) {
    const quote = quoteSchema.safeParse(item);
    if (quote.success) {
      out.set(quote.data.symbol.trim().toUpperCase(), new Money(quote.data.price));
    }
  }
  return out;
}

export type GenerateText = (prompt: string) => Promise<string>;

export interface GenAiPriceSourceOptions {
  apiKey?: string;
  model: string;
  logger?: Logger;
  /** Overrides the model call; the default goes through `@google/genai` with search grounding. */
  generate?: GenerateText;
}

const buildPrompt = (tickers: string[], date: IsoDate) =>
  `Search for the closing market price on ${date} (or the latest price if that session is still open) of these stock tickers: ${tickers.join(', ')}.
Use Google Search and reliable sources such as the exchange or a major financial portal.
Return the data as a JSON array of objects and nothing else.
Example: [{"symbol": "AAPL", "price": 189.25}]
Leave out any ticker whose price you cannot find.`;

export class GenAiPriceSource implements PriceSource {
  readonly name = 'genai';
  private readonly generate: GenerateText;
  private readonly logger: Logger;

  constructor(options: GenAiPriceSourceOptions) {
    this.logger = options.logger ?? silentLogger;
    if (options.generate) {
      this.generate = options.generate;
    } else {
      if (!options.apiKey) {
        throw new ConfigError('GEMINI_API_KEY is required for the GenAI price source');
      }
      const ai = new GoogleGenAI({ apiKey: options.apiKey });
      this.generate = async (prompt) => {
        const response = await ai.models.generateContent({
          model: options.model,
          contents: prompt,
          config: { tools: [{ googleSearch: {} }] },
        });
        return response.text ?? '';
      };
    }
  }

  async getPrice(ticker: string, date: IsoDate): Promise<Decimal | null> {
    const prices = await this.getPrices([ticker], date);
    return prices.get(ticker.toUpperCase()) ?? null;
  }

  async getPrices(tickers: string[], date: IsoDate): Promise<Map<string, Decimal>> {
    if (tickers.length === 0) return new Map();
    this.logger.debug('fetching prices', { tickers, date });
    let text: string;
    try {
      text = await this.generate(buildPrompt(tickers, date));
    } catch (error) {
      throw new MarketDataError(
        `Price request failed: ${error instanceof Error ? error.message : String(error)}`,
        tickers
      );
    }
    const quotes = parseQuoteReply(text);
    const wanted = new Set(tickers.map((t) => t.toUpperCase()));
    return new Map([...quotes].filter(([t]) => wanted.has(t)));
  }
}
