import type { CalculationDate } from '../domain/types.js';

/**
 * Returns the local calendar date of an instant as a CalculationDate.
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param utcOffsetMinutes - Local time minus UTC, in minutes
 *
 * @example
 * // 2024-06-14T22:30:00Z is already June 15 in Mecca (UTC+3)
 * toCalculationDate(Date.parse('2024-06-14T22:30:00Z'), 180)
 * // { year: 2024, month: 6, day: 15, utcOffsetMinutes: 180 }
 */
export function toCalculationDate(
  tsMs: number,
  utcOffsetMinutes: number,
): CalculationDate {
  // Shifting by the offset lets the UTC getters read local wall-clock fields
  const local = new Date(tsMs + utcOffsetMinutes * 60000);

  return {
    year: local.getUTCFullYear(),
    month: local.getUTCMonth() + 1,
    day: local.getUTCDate(),
    utcOffsetMinutes,
  };
}

/**
 * Local wall-clock time of an instant, in minutes since local midnight.
 * Seconds and milliseconds are kept as a fraction.
 */
export function minutesIntoLocalDay(tsMs: number, utcOffsetMinutes: number): number {
  const local = new Date(tsMs + utcOffsetMinutes * 60000);

  return (
    local.getUTCHours() * 60 +
    local.getUTCMinutes() +
    local.getUTCSeconds() / 60 +
    local.getUTCMilliseconds() / 60000
  );
}
