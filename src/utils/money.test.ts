import { describe, expect, it } from 'vitest';
import { addAmounts, formatAmount, percentOf, roundTo, subtractAmounts, sumAmounts } from './money';

describe('money', () => {
  it('sums exactly', () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
    expect(sumAmounts([19.99, 0.01, 80])).toBe(100);
    expect(sumAmounts([])).toBe(0);
  });

  it('keeps precision finer than cents', () => {
    expect(sumAmounts([1.125, 0.005])).toBe(1.13);
    expect(addAmounts(0.001, 0.002)).toBe(0.003);
    expect(subtractAmounts(1.2, 1.125)).toBe(0.075);
  });

  it('computes unrounded percentages and rounds on request', () => {
    expect(percentOf(80.004, 100)).toBe(80.004);
    expect(roundTo(80.004, 2)).toBe(80);
    expect(roundTo(2 / 3 * 100, 2)).toBe(66.67);
  });

  it('formats with grouping and two decimals', () => {
    expect(formatAmount(1234.5)).toBe('1,234.50');
  });
});
