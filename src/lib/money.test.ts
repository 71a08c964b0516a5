import { formatMoney, parseStored, round2, sum, toMoney, tradeAmount, weightedAverage } from './money';

describe('money', () => {
  it('rounds half away from zero to two places', () => {
    expect(round2(toMoney('2.345')).toFixed(2)).toBe('2.35');
    expect(round2(toMoney('-2.345')).toFixed(2)).toBe('-2.35');
    expect(round2(toMoney('2.344')).toFixed(2)).toBe('2.34');
  });

  it('prices a trade to the cent', () => {
    expect(tradeAmount(3, toMoney('1.005')).toFixed(2)).toBe('3.02');
    expect(tradeAmount(100, toMoney(50)).toFixed(2)).toBe('5000.00');
  });

  it('rounds the weighted average buy price', () => {
    expect(weightedAverage(toMoney(50), 100, toMoney(60), 50).toString()).toBe('53.33');
    expect(weightedAverage(toMoney(10), 1, toMoney(20), 1).toString()).toBe('15');
  });

  it('keeps sub-cent precision of the inputs when averaging', () => {
    expect(weightedAverage(toMoney('0.0050'), 1000, toMoney('0.0050'), 1000).toString()).toBe('0.005');
    expect(weightedAverage(toMoney('0.0051'), 1, toMoney('0.0052'), 2).toString()).toBe('0.0052');
    expect(weightedAverage(toMoney('1.125'), 1, toMoney(2), 2).toString()).toBe('1.708');
  });

  it('adds without binary float drift', () => {
    expect(sum([toMoney('0.1'), toMoney('0.2')]).toString()).toBe('0.3');
    expect(sum([]).isZero()).toBe(true);
  });

  it('formats with two fixed places', () => {
    expect(formatMoney(toMoney(12500))).toBe('12500.00');
    expect(formatMoney(toMoney('0.005'))).toBe('0.01');
  });

  it('reads stored text back as decimals', () => {
    expect(parseStored(null)).toBeNull();
    expect(parseStored('')).toBeNull();
    expect(parseStored('1.50')?.toString()).toBe('1.5');
  });
});
