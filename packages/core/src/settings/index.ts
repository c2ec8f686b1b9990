export type { PrayerSettings } from './settings.js';
export {
  DEFAULT_PRAYER_SETTINGS,
  iqamaOffsetsSchema,
  clockFormatSchema,
  prayerSettingsSchema,
  parsePrayerSettings,
} from './settings.js';
