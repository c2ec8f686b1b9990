import { describe, it, expect } from 'vitest';
import { PrayerTimesError } from '../domain/errors.js';
import type { AsrJuristic, CalculationDate, GeoCoordinate } from '../domain/types.js';
import { parametersFor } from '../methods/registry.js';
import { calculatePrayerTimes, safeCalculatePrayerTimes } from './calculate.js';
import { composePrayerTimes } from './compose.js';
import { formatPrayerTimes } from './format.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('calculatePrayerTimes', () => {
  const mecca: GeoCoordinate = { latitude: 21.4225, longitude: 39.8262 };
  const date: CalculationDate = { year: 2024, month: 6, day: 15, utcOffsetMinutes: 180 };

  it('composes times for a registered method', () => {
    const times = calculatePrayerTimes(mecca, date, 'ummAlQura');
    expect(times).toEqual(composePrayerTimes(mecca, date, parametersFor('ummAlQura')));
    expect(formatPrayerTimes(times).fajr).toBe('04:10');
  });

  it('defaults to the Shafi\'i Asr convention', () => {
    const shafii = calculatePrayerTimes(mecca, date, 'ummAlQura');
    const explicit = calculatePrayerTimes(mecca, date, 'ummAlQura', 'shafii');
    const hanafi = calculatePrayerTimes(mecca, date, 'ummAlQura', 'hanafi');
    expect(explicit).toEqual(shafii);
    expect(formatPrayerTimes(hanafi).asr).toBe('17:00');
  });

  it('rejects out-of-range coordinates with InvalidCoordinate', () => {
    const error = captureError(() =>
      calculatePrayerTimes({ latitude: 91, longitude: 0 }, date, 'isna'),
    );
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('InvalidCoordinate');
      expect(error.message).toMatch(/^Invalid coordinate: latitude: /);
    }
  });

  it('rejects non-finite coordinates with InvalidCoordinate', () => {
    const error = captureError(() =>
      calculatePrayerTimes({ latitude: 10, longitude: Number.NaN }, date, 'isna'),
    );
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('InvalidCoordinate');
    }
  });

  it('rejects impossible dates with InvalidDate', () => {
    const error = captureError(() =>
      calculatePrayerTimes(mecca, { ...date, month: 2, day: 30 }, 'isna'),
    );
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('InvalidDate');
      expect(error.message).toBe(
        'Invalid calculation date: day: day does not exist in the given month',
      );
    }
  });

  it('rejects unknown methods with UnknownMethod', () => {
    const error = captureError(() => calculatePrayerTimes(mecca, date, 'moonsighting'));
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('UnknownMethod');
      expect(error.message).toBe('Unknown calculation method: moonsighting');
    }
  });

  it('rejects an unknown Asr convention with InvalidAsrChoice', () => {
    const error = captureError(() =>
      calculatePrayerTimes(mecca, date, 'ummAlQura', 'maliki' as unknown as AsrJuristic),
    );
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('InvalidAsrChoice');
      expect(error.message).toBe('Unknown Asr convention: maliki');
    }
  });

  it('validates the Asr convention before the method', () => {
    const error = captureError(() =>
      calculatePrayerTimes(mecca, date, 'moonsighting', 'maliki' as unknown as AsrJuristic),
    );
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('InvalidAsrChoice');
    }
  });

  it('validates the coordinate before the method', () => {
    const error = captureError(() =>
      calculatePrayerTimes({ latitude: 0, longitude: 181 }, date, 'moonsighting'),
    );
    expect(error).toBeInstanceOf(PrayerTimesError);
    if (error instanceof PrayerTimesError) {
      expect(error.code).toBe('InvalidCoordinate');
    }
  });

  it('returns per-marker NoSolution instead of failing at high latitude', () => {
    const times = calculatePrayerTimes(
      { latitude: 78, longitude: 15 },
      { year: 2024, month: 6, day: 21, utcOffsetMinutes: 60 },
      'muslimWorldLeague',
    );
    expect(times.isha).toEqual({ kind: 'noSolution' });
    expect(times.dhuhr.kind).toBe('time');
  });
});

describe('safeCalculatePrayerTimes', () => {
  const coordinate: GeoCoordinate = { latitude: 30.0444, longitude: 31.2357 };
  const date: CalculationDate = { year: 2024, month: 6, day: 15, utcOffsetMinutes: 180 };

  it('returns the times on success', () => {
    const result = safeCalculatePrayerTimes(coordinate, date, 'egypt');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(formatPrayerTimes(result.times)).toEqual({
        fajr: '04:08',
        sunrise: '05:54',
        dhuhr: '12:56',
        asr: '16:31',
        maghrib: '19:58',
        isha: '21:31',
      });
    }
  });

  it('returns the error instead of throwing', () => {
    const result = safeCalculatePrayerTimes(coordinate, date, 'unknown');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('UnknownMethod');
    }
  });

  it('reports an unknown Asr convention instead of a NoSolution Asr', () => {
    const mecca: GeoCoordinate = { latitude: 21.4225, longitude: 39.8262 };
    const result = safeCalculatePrayerTimes(
      mecca,
      date,
      'ummAlQura',
      'maliki' as unknown as AsrJuristic,
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('InvalidAsrChoice');
      expect(result.error.message).toBe('Unknown Asr convention: maliki');
    }
  });
});
