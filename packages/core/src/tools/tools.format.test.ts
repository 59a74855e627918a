import { describe, it, expect } from 'vitest';
import { daysAgo, isoDate, pct, percentChange, shortAddress, usd } from './tools.format.js';

describe('tools.format', () => {
  it('formats dollars with separators and fixed decimals', () => {
    expect(usd(1234567.891)).toBe('$1,234,567.89');
    expect(usd(0.0001234, 6)).toBe('$0.000123');
  });

  it('formats percentages and changes', () => {
    expect(pct(12.3456)).toBe('12.35%');
    expect(percentChange(100, 150)).toBe(50);
    expect(percentChange(0, 10)).toBe(0);
  });

  it('formats dates in UTC', () => {
    expect(isoDate(Date.UTC(2024, 0, 31, 23, 59))).toBe('2024-01-31');
    expect(daysAgo(2, Date.UTC(2024, 2, 3)).toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('shortens long addresses only', () => {
    expect(shortAddress('0x1111222233334444555566667777888899990000')).toBe('0x1111...0000');
    expect(shortAddress('0xabc')).toBe('0xabc');
  });
});
