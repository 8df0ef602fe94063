import { describe, it, expect } from 'vitest';

import { isSameTradingDay, tradingDayKey, tradingDayStart } from './tradingDay';

describe('tradingDayKey', () => {
  it('uses the UTC calendar date by default', () => {
    expect(tradingDayKey(Date.UTC(2024, 0, 15, 23, 30))).toBe('2024-01-15');
    expect(tradingDayKey(Date.UTC(2024, 0, 16, 0, 0))).toBe('2024-01-16');
  });

  it('follows the configured exchange zone', () => {
    // 03:00 UTC is still the previous evening in New York
    expect(tradingDayKey(Date.UTC(2024, 0, 16, 3, 0), 'America/New_York')).toBe('2024-01-15');
  });
});

describe('tradingDayStart', () => {
  it('returns midnight UTC for UTC days', () => {
    expect(tradingDayStart('2024-01-15')).toBe(Date.UTC(2024, 0, 15));
  });

  it('returns local midnight across DST', () => {
    expect(tradingDayStart('2024-01-15', 'America/New_York')).toBe(Date.UTC(2024, 0, 15, 5));
    expect(tradingDayStart('2024-07-01', 'America/New_York')).toBe(Date.UTC(2024, 6, 1, 4));
  });
});

describe('isSameTradingDay', () => {
  it('compares calendar days in the zone', () => {
    const evening = Date.UTC(2024, 0, 15, 22, 0);
    const lateNight = Date.UTC(2024, 0, 16, 2, 0);

    expect(isSameTradingDay(evening, lateNight)).toBe(false);
    expect(isSameTradingDay(evening, lateNight, 'America/New_York')).toBe(true);
  });
});
