import { describe, expect, it } from 'vitest';

import { formatDuration, formatTimestamp } from '../../src/format';

describe('formatDuration', () => {
  it('lists each non-zero unit', () => {
    expect(formatDuration(90_061_001)).toBe('1 day 1 hour 1 minute 1 second 1 millisecond');
  });

  it('pluralises and skips empty units', () => {
    expect(formatDuration(2 * 86_400_000 + 3 * 1000)).toBe('2 days 3 seconds');
    expect(formatDuration(5000)).toBe('5 seconds');
    expect(formatDuration(250)).toBe('250 milliseconds');
  });

  it('prints sub-millisecond spans with four decimals', () => {
    expect(formatDuration(0.5)).toBe('0.5000 milliseconds');
    expect(formatDuration(0)).toBe('0.0000 milliseconds');
  });
});

describe('formatTimestamp', () => {
  it('uses a zero-padded 12-hour clock', () => {
    expect(formatTimestamp(new Date(2026, 0, 15, 13, 5, 9, 7))).toBe('01:05:09.007 PM');
    expect(formatTimestamp(new Date(2026, 0, 15, 9, 30, 0, 120))).toBe('09:30:00.120 AM');
  });

  it('shows midnight and noon as 12', () => {
    expect(formatTimestamp(new Date(2026, 0, 15, 0, 0, 0, 0))).toBe('12:00:00.000 AM');
    expect(formatTimestamp(new Date(2026, 0, 15, 12, 0, 0, 0))).toBe('12:00:00.000 PM');
  });
});
