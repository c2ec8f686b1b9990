import type { PrayerName, PrayerTimeEntry, PrayerTimes } from '../domain/types.js';
import { mapPrayerTimes } from './times.js';

/**
 * Display clock: 24-hour ("16:05") or 12-hour ("4:05 PM").
 */
export type ClockFormat = '24h' | '12h';

/**
 * Rendered in place of a NoSolution entry.
 */
export const NO_SOLUTION_LABEL = '--:--';

const MINUTES_PER_DAY = 1440;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats minutes since local midnight as a clock time.
 * Rounds to the nearest minute and wraps into a single day.
 *
 * @example
 * formatMinutes(250.44) // '04:10'
 * formatMinutes(1144.23, '12h') // '7:04 PM'
 * formatMinutes(1445) // '00:05'
 */
export function formatMinutes(minutes: number, clock: ClockFormat = '24h'): string {
  const rounded = Math.round(minutes);
  const minuteOfDay =
    ((rounded % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(minuteOfDay / 60);
  const mins = minuteOfDay % 60;

  if (clock === '24h') {
    return `${pad2(hours)}:${pad2(mins)}`;
  }

  const period = hours >= 12 ? 'PM' : 'AM';
  const displayHours = hours % 12 || 12;
  return `${displayHours}:${pad2(mins)} ${period}`;
}

export function formatPrayerTime(
  entry: PrayerTimeEntry,
  clock: ClockFormat = '24h',
): string {
  return entry.kind === 'time' ? formatMinutes(entry.minutes, clock) : NO_SOLUTION_LABEL;
}

export function formatPrayerTimes(
  times: PrayerTimes,
  clock: ClockFormat = '24h',
): Readonly<Record<PrayerName, string>> {
  return mapPrayerTimes(times, (entry) => formatPrayerTime(entry, clock));
}
