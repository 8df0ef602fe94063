/**
 * Trading-day boundaries.
 * Risk limits reset when the calendar date changes in the configured zone
 * (UTC for round-the-clock crypto venues, an exchange zone otherwise).
 */

import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Calendar key (YYYY-MM-DD) of the trading day containing `tsMs` in `timeZone`.
 *
 * @example
 * tradingDayKey(Date.UTC(2024, 0, 15, 23, 30), 'UTC'); // "2024-01-15"
 * tradingDayKey(Date.UTC(2024, 0, 16, 3, 0), 'America/New_York'); // "2024-01-15"
 */
export function tradingDayKey(tsMs: number, timeZone: string = 'UTC'): string {
  return formatInTimeZone(new Date(tsMs), timeZone, 'yyyy-MM-dd');
}

/**
 * UTC timestamp of the first instant of the trading day `dayKey` in `timeZone`.
 */
export function tradingDayStart(dayKey: string, timeZone: string = 'UTC'): number {
  return fromZonedTime(`${dayKey}T00:00:00`, timeZone).getTime();
}

export function isSameTradingDay(aMs: number, bMs: number, timeZone: string = 'UTC'): boolean {
  return tradingDayKey(aMs, timeZone) === tradingDayKey(bMs, timeZone);
}
