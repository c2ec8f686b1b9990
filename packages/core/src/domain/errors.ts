/**
 * Call-level failures. Per-marker NoSolution is not an error; see PrayerTimeEntry.
 */
export type PrayerTimesErrorCode =
  | 'InvalidCoordinate'
  | 'InvalidDate'
  | 'UnknownMethod'
  | 'InvalidAsrChoice';

/**
 * Error raised at the calculation boundary before any astronomy is done.
 */
export class PrayerTimesError extends Error {
  readonly code: PrayerTimesErrorCode;

  constructor(code: PrayerTimesErrorCode, message: string) {
    super(message);
    this.name = 'PrayerTimesError';
    this.code = code;
  }
}

/**
 * Type guard for PrayerTimesError, optionally narrowed to one code.
 */
export function isPrayerTimesError(
  error: unknown,
  code?: PrayerTimesErrorCode,
): error is PrayerTimesError {
  return (
    error instanceof PrayerTimesError &&
    (code === undefined || error.code === code)
  );
}
