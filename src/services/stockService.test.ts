import type Decimal from 'decimal.js';
import { ConfigError, MarketDataError, ValidationError } from '../errors';
import {
  FallbackPriceSource,
  GenAiPriceSource,
  ManualPriceSource,
  parseQuoteReply,
  resolvePrices,
  type PriceSource,
} from './stockService';

const asText = (prices: Map<string, Decimal | null>) =>
  Object.fromEntries([...prices].map(([t, p]) => [t, p?.toString() ?? null]));

const failingSource: PriceSource = {
  name: 'down',
  getPrice: () => Promise.reject(new MarketDataError('feed unavailable')),
};

describe('parseQuoteReply', () => {
  it('extracts quotes from a fenced reply and drops malformed items', () => {
    const reply = 'Here you go:\n```json\n[{"symbol": "aapl", "price": 189.25}, {"symbol": "MSFT", "price": "n/a"}]\n```';
    expect(asText(parseQuoteReply(reply))).toEqual({ AAPL: '189.25' });
  });

  it('rejects replies without a JSON array', () => {
    expect(() => parseQuoteReply('no prices today')).toThrow('Price reply is not valid JSON');
    expect(() => parseQuoteReply('{"symbol": "AAPL"}')).toThrow('Price reply is not a JSON array');
  });
});

describe('ManualPriceSource', () => {
  it('stores validated overrides by upper-case ticker', async () => {
    const prices = new ManualPriceSource({ aapl: '10.5' });
    expect((await prices.getPrice('AAPL'))?.toString()).toBe('10.5');
    expect(prices.set('msft', 20).toString()).toBe('20');
    expect(prices.all()).toEqual({ AAPL: '10.5', MSFT: '20' });
    expect(prices.remove('msft')).toBe(true);
    expect(await prices.getPrice('MSFT')).toBeNull();
  });

  it('rejects bad prices', () => {
    expect(() => new ManualPriceSource().set('AAPL', '1.23456')).toThrow(ValidationError);
    expect(() => new ManualPriceSource().set('AAPL', -1)).toThrow(ValidationError);
  });
});

describe('FallbackPriceSource', () => {
  it('skips failing feeds and fills gaps from later sources', async () => {
    const manual = new ManualPriceSource({ AAPL: 11 });
    const backup = new ManualPriceSource({ AAPL: 99, MSFT: 22 });
    const source = new FallbackPriceSource([failingSource, manual, backup]);

    expect(source.name).toBe('down>manual>manual');
    const prices = await resolvePrices(source, ['AAPL', 'MSFT', 'TSLA'], '2026-10-19');
    expect(asText(prices)).toEqual({ AAPL: '11', MSFT: '22', TSLA: null });
  });

  it('propagates errors that are not market data failures', async () => {
    const broken: PriceSource = { name: 'broken', getPrice: () => Promise.reject(new TypeError('bug')) };
    await expect(new FallbackPriceSource([broken]).getPrice('AAPL', '2026-10-19')).rejects.toThrow(TypeError);
  });
});

describe('GenAiPriceSource', () => {
  it('needs an API key unless a generator is supplied', () => {
    expect(() => new GenAiPriceSource({ model: 'test-model' })).toThrow(ConfigError);
  });

  it('keeps only the requested tickers', async () => {
    const prompts: string[] = [];
    const source = new GenAiPriceSource({
      model: 'test-model',
      generate: async (prompt) => {
        prompts.push(prompt);
        return '[{"symbol":"AAPL","price":190.1},{"symbol":"GOOG","price":150}]';
      },
    });

    const prices = await source.getPrices(['AAPL', 'MSFT'], '2026-10-19');
    expect(asText(prices)).toEqual({ AAPL: '190.1' });
    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain('AAPL, MSFT');
    expect(prompts[0]).toContain('2026-10-19');
  });

  it('turns generator failures into market data errors', async () => {
    const source = new GenAiPriceSource({ model: 'test-model', generate: () => Promise.reject(new Error('quota')) });
    await expect(source.getPrice('AAPL', '2026-10-19')).rejects.toThrow('Price request failed: quota');
  });
});
