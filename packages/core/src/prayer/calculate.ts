import type { z } from 'zod';
import { PrayerTimesError, isPrayerTimesError } from '../domain/errors.js';
import type {
  AsrJuristic,
  CalculationDate,
  GeoCoordinate,
  PrayerTimes,
} from '../domain/types.js';
import {
  asrJuristicSchema,
  calculationDateSchema,
  geoCoordinateSchema,
} from '../domain/validation.js';
import { methodFor, parametersFor } from '../methods/registry.js';
import { composePrayerTimes } from './compose.js';

/**
 * Result of safeCalculatePrayerTimes (discriminated union on success).
 */
export type PrayerTimesResult =
  | { readonly success: true; readonly times: PrayerTimes }
  | { readonly success: false; readonly error: PrayerTimesError };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

/**
 * Calculates the daily prayer times for a location, date and method.
 *
 * Boundary checks run before any astronomy. Markers without a solution at
 * high latitudes are returned as NoSolution entries rather than failing the call.
 *
 * @param coordinate - Observer position
 * @param date - Local calendar date and UTC offset
 * @param methodId - Registered calculation method identifier
 * @param asrChoice - Asr convention (default: shafii)
 * @returns PrayerTimes in minutes since local midnight
 * @throws PrayerTimesError with code InvalidCoordinate, InvalidDate, InvalidAsrChoice or UnknownMethod
 *
 * @example
 * const times = calculatePrayerTimes(
 *   { latitude: 21.4225, longitude: 39.8262 },
 *   { year: 2024, month: 6, day: 15, utcOffsetMinutes: 180 },
 *   'ummAlQura',
 * );
 * formatPrayerTime(times.fajr) // '04:10'
 */
export function calculatePrayerTimes(
  coordinate: GeoCoordinate,
  date: CalculationDate,
  methodId: string,
  asrChoice: AsrJuristic = 'shafii',
): PrayerTimes {
  const parsedCoordinate = geoCoordinateSchema.safeParse(coordinate);
  if (!parsedCoordinate.success) {
    throw new PrayerTimesError(
      'InvalidCoordinate',
      `Invalid coordinate: ${describeIssues(parsedCoordinate.error)}`,
    );
  }

  const parsedDate = calculationDateSchema.safeParse(date);
  if (!parsedDate.success) {
    throw new PrayerTimesError(
      'InvalidDate',
      `Invalid calculation date: ${describeIssues(parsedDate.error)}`,
    );
  }

  // Untyped callers can pass any string; an unknown factor would surface as NoSolution
  const parsedAsrChoice = asrJuristicSchema.safeParse(asrChoice);
  if (!parsedAsrChoice.success) {
    throw new PrayerTimesError(
      'InvalidAsrChoice',
      `Unknown Asr convention: ${String(asrChoice)}`,
    );
  }

  const method = methodFor(methodId);
  const parameters = parametersFor(method.id, parsedAsrChoice.data);

  return composePrayerTimes(
    parsedCoordinate.data,
    parsedDate.data,
    parameters,
    method.adjustments,
  );
}

/**
 * Same as calculatePrayerTimes, but reports boundary errors as a value.
 * Errors other than PrayerTimesError are rethrown.
 */
export function safeCalculatePrayerTimes(
  coordinate: GeoCoordinate,
  date: CalculationDate,
  methodId: string,
  asrChoice: AsrJuristic = 'shafii',
): PrayerTimesResult {
  try {
    return {
      success: true,
      times: calculatePrayerTimes(coordinate, date, methodId, asrChoice),
    };
  } catch (error) {
    if (isPrayerTimesError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}
