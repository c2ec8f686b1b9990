/**
 * User settings supplied by the settings store, parsed at the boundary.
 */

import { z } from 'zod';
import type { AsrJuristic } from '../domain/types.js';
import { asrJuristicSchema } from '../domain/validation.js';
import type { MethodId } from '../methods/types.js';
import { methodIdSchema } from '../methods/validation.js';
import type { ClockFormat } from '../prayer/format.js';
import type { IqamaOffsets } from '../prayer/iqama.js';

export interface PrayerSettings {
  readonly methodId: MethodId;
  readonly asrJuristic: AsrJuristic;
  readonly iqamaOffsets: IqamaOffsets;
  readonly clockFormat: ClockFormat;
}

export const DEFAULT_PRAYER_SETTINGS: PrayerSettings = Object.freeze<PrayerSettings>({
  methodId: 'muslimWorldLeague',
  asrJuristic: 'shafii',
  iqamaOffsets: Object.freeze({}),
  clockFormat: '24h',
});

/**
 * Iqama offsets are whole minutes within two hours of the adhan.
 */
const iqamaMinutesSchema = z.number().int().min(-120).max(120);

export const iqamaOffsetsSchema: z.ZodType<IqamaOffsets> = z
  .object({
    fajr: iqamaMinutesSchema.optional(),
    sunrise: iqamaMinutesSchema.optional(),
    dhuhr: iqamaMinutesSchema.optional(),
    asr: iqamaMinutesSchema.optional(),
    maghrib: iqamaMinutesSchema.optional(),
    isha: iqamaMinutesSchema.optional(),
  })
  .strict();

export const clockFormatSchema: z.ZodType<ClockFormat> = z.enum(['24h', '12h']);

/**
 * Schema for a complete settings payload.
 */
export const prayerSettingsSchema: z.ZodType<PrayerSettings> = z.object({
  methodId: methodIdSchema,
  asrJuristic: asrJuristicSchema,
  iqamaOffsets: iqamaOffsetsSchema,
  clockFormat: clockFormatSchema,
});

const storedRecordSchema = z.record(z.string(), z.unknown());

function parseField<T>(
  record: Record<string, unknown>,
  key: keyof PrayerSettings,
  schema: z.ZodType<T>,
  fallback: T,
): T {
  const value = record[key];
  if (value === undefined) {
    return fallback;
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    console.warn(
      `[parsePrayerSettings] Invalid ${key}: ${JSON.stringify(value)}, using default ${JSON.stringify(fallback)}`,
    );
    return fallback;
  }
  return result.data;
}

/**
 * Parses a stored settings payload, falling back to defaults field by field.
 * Missing fields take their default silently; invalid ones are logged.
 *
 * @param raw - Whatever the settings store returned (possibly undefined)
 */
export function parsePrayerSettings(raw: unknown): PrayerSettings {
  if (raw === undefined || raw === null) {
    return DEFAULT_PRAYER_SETTINGS;
  }

  const stored = storedRecordSchema.safeParse(raw);
  if (!stored.success) {
    console.warn(
      `[parsePrayerSettings] Expected a settings object, got ${typeof raw}; using defaults`,
    );
    return DEFAULT_PRAYER_SETTINGS;
  }

  const record = stored.data;
  return Object.freeze({
    methodId: parseField(record, 'methodId', methodIdSchema, DEFAULT_PRAYER_SETTINGS.methodId),
    asrJuristic: parseField(
      record,
      'asrJuristic',
      asrJuristicSchema,
      DEFAULT_PRAYER_SETTINGS.asrJuristic,
    ),
    iqamaOffsets: parseField(
      record,
      'iqamaOffsets',
      iqamaOffsetsSchema,
      DEFAULT_PRAYER_SETTINGS.iqamaOffsets,
    ),
    clockFormat: parseField(
      record,
      'clockFormat',
      clockFormatSchema,
      DEFAULT_PRAYER_SETTINGS.clockFormat,
    ),
  });
}
