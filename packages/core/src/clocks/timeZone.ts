/**
 * Computes the UTC offset of an IANA timezone at a given instant.
 * DST is handled by Intl: the offset is the one in effect at tsMs.
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param timeZone - IANA timezone string (e.g., "America/New_York")
 * @returns Local time minus UTC, in minutes (e.g., -240 for New York in summer)
 * @throws RangeError if the timezone is not recognized
 */
export function utcOffsetMinutesForTimeZone(tsMs: number, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hourCycle: 'h23',
  });

  const parts = formatter.formatToParts(new Date(tsMs));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value || '0', 10);

  // Wall-clock fields read back as if they were UTC. Date.UTC would map
  // years 0-99 to 1900-1999, so the year is set on its own.
  const wallClock = new Date(0);
  wallClock.setUTCFullYear(part('year'), part('month') - 1, part('day'));
  wallClock.setUTCHours(part('hour'), part('minute'), part('second'), 0);
  const wallClockMs = wallClock.getTime();

  // Intl drops milliseconds, so compare against the whole second
  const wholeSecondMs = Math.floor(tsMs / 1000) * 1000;

  return Math.round((wallClockMs - wholeSecondMs) / 60000);
}
