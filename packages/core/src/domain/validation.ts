/**
 * Zod validation schemas for calculation inputs.
 */

import { z } from 'zod';
import type { AsrJuristic, CalculationDate, GeoCoordinate } from './types.js';

/**
 * Largest UTC offset in use (UTC+14 / UTC-12), widened symmetrically.
 */
export const MAX_UTC_OFFSET_MINUTES = 14 * 60;

/**
 * Proleptic Gregorian leap-year rule.
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a month of the proleptic Gregorian calendar.
 *
 * @param year - Gregorian year
 * @param month - Month in range [1, 12]
 */
export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

/**
 * Schema for GeoCoordinate (latitude in [-90, 90], longitude in [-180, 180]).
 */
export const geoCoordinateSchema: z.ZodType<GeoCoordinate> = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

/**
 * Schema for CalculationDate.
 * Validates the day against the month length, leap years included.
 */
export const calculationDateSchema: z.ZodType<CalculationDate> = z
  .object({
    year: z.number().int().min(1),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
    utcOffsetMinutes: z
      .number()
      .min(-MAX_UTC_OFFSET_MINUTES)
      .max(MAX_UTC_OFFSET_MINUTES),
  })
  .refine((data) => data.day <= daysInMonth(data.year, data.month), {
    message: 'day does not exist in the given month',
    path: ['day'],
  });

/**
 * Schema for AsrJuristic.
 */
export const asrJuristicSchema: z.ZodType<AsrJuristic> = z.enum([
  'shafii',
  'hanafi',
]);
