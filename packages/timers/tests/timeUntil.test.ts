import { describe, expect, it } from 'vitest';

import { timeUntil, timeUntilMidnight } from '../src/time/timeUntil';

describe('timeUntil', () => {
  const now = () => 5_000;

  it('returns zero for instants in the past', () => {
    expect(timeUntil(4_000, now)).toBe(0);
    expect(timeUntil(new Date(0), now)).toBe(0);
  });

  it('returns zero for the current instant', () => {
    expect(timeUntil(5_000, now)).toBe(0);
  });

  it('returns the remaining milliseconds for future instants', () => {
    expect(timeUntil(15_000, now)).toBe(10_000);
    expect(timeUntil(new Date(6_500), now)).toBe(1_500);
  });
});

describe('timeUntilMidnight', () => {
  const lateEvening = () => new Date(2026, 0, 15, 22, 30, 0).getTime();

  it('measures up to the next local midnight', () => {
    expect(timeUntilMidnight(0, lateEvening)).toBe(90 * 60 * 1000);
  });

  it('adds the requested hours past midnight', () => {
    expect(timeUntilMidnight(1, lateEvening)).toBe(150 * 60 * 1000);
  });
});
