import { describe, it, expect } from 'vitest';
import { parseAmount } from '../services/currency.ts';

describe('parseAmount', () => {
  it.each([
    ['3억 8,000만원', 380_000_000],
    ['8,500', 85_000_000],
    ['7.5억', 750_000_000],
    ['320000000원', 320_000_000],
    ['3억2천', 320_000_000],
    ['3억 5,000', 350_000_000],
    ['12억', 1_200_000_000],
    ['9,000만', 90_000_000],
    ['5천만', 50_000_000],
    ['2천', 20_000_000],
  ])('%s → %d', (input, expected) => {
    expect(parseAmount(input)).toBe(expected);
  });

  it('returns null for empty or missing input', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('   ')).toBeNull();
    expect(parseAmount(null)).toBeNull();
    expect(parseAmount(undefined)).toBeNull();
    expect(parseAmount('원')).toBeNull();
  });

  it('returns null for text without an amount', () => {
    expect(parseAmount('가격협의')).toBeNull();
    expect(parseAmount('-')).toBeNull();
  });

  it('rounds fractional eok to whole won', () => {
    expect(parseAmount('1.23456789억')).toBe(123_456_789);
  });

  it('always yields a non-negative integer', () => {
    for (const s of ['1억', '1억 1만', '0', '0원', '3.3억 300만']) {
      const v = parseAmount(s);
      expect(v).not.toBeNull();
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
    }
  });
});
