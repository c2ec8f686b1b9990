/**
 * Julian Day Number at 2000-01-01 12:00 UTC (epoch J2000.0).
 */
export const J2000 = 2451545.0;

/**
 * Number of days in a Julian century.
 */
export const DAYS_PER_JULIAN_CENTURY = 36525;

/**
 * Converts a proleptic Gregorian calendar date and UTC hour to a Julian Date.
 *
 * January and February count as months 13 and 14 of the previous year, and the
 * Gregorian leap-year correction is applied. The function is total for year >= 1;
 * callers validate the date itself.
 *
 * @param year - Gregorian year (>= 1)
 * @param month - Month in range [1, 12]
 * @param day - Day of month
 * @param utcHour - Fractional hour of day in UTC; values outside [0, 24) roll into adjacent days
 * @returns Julian Date (one unit = one mean solar day)
 *
 * @example
 * toJulianDate(2000, 1, 1, 12) // 2451545 (J2000.0)
 * toJulianDate(2024, 6, 15, 0) // 2460476.5
 */
export function toJulianDate(
  year: number,
  month: number,
  day: number,
  utcHour: number,
): number {
  let y = year;
  let m = month;
  if (m <= 2) {
    y -= 1;
    m += 12;
  }

  const a = Math.floor(y / 100);
  const b = 2 - a + Math.floor(a / 4);

  return (
    Math.floor(365.25 * (y + 4716)) +
    Math.floor(30.6001 * (m + 1)) +
    day +
    b -
    1524.5 +
    utcHour / 24
  );
}

/**
 * Julian centuries elapsed since J2000.0.
 */
export function julianCenturiesSinceJ2000(julianDate: number): number {
  return (julianDate - J2000) / DAYS_PER_JULIAN_CENTURY;
}
