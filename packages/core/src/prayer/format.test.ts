import { describe, it, expect } from 'vitest';
import { NO_SOLUTION, timeOfDay } from '../domain/types.js';
import type { PrayerTimes } from '../domain/types.js';
import {
  NO_SOLUTION_LABEL,
  formatMinutes,
  formatPrayerTime,
  formatPrayerTimes,
} from './format.js';

describe('formatMinutes', () => {
  it('formats 24-hour times with zero padding', () => {
    expect(formatMinutes(0)).toBe('00:00');
    expect(formatMinutes(250.44)).toBe('04:10');
    expect(formatMinutes(1439)).toBe('23:59');
  });

  it('rounds to the nearest minute', () => {
    expect(formatMinutes(250.5)).toBe('04:11');
    expect(formatMinutes(250.49)).toBe('04:10');
    expect(formatMinutes(1439.6)).toBe('00:00');
  });

  it('wraps values outside a single day', () => {
    expect(formatMinutes(1445)).toBe('00:05');
    expect(formatMinutes(-10)).toBe('23:50');
    expect(formatMinutes(-0.2)).toBe('00:00');
  });

  it('formats 12-hour times', () => {
    expect(formatMinutes(0, '12h')).toBe('12:00 AM');
    expect(formatMinutes(250.44, '12h')).toBe('4:10 AM');
    expect(formatMinutes(720, '12h')).toBe('12:00 PM');
    expect(formatMinutes(1144.23, '12h')).toBe('7:04 PM');
  });
});

describe('formatPrayerTime', () => {
  it('renders NoSolution as a placeholder', () => {
    expect(formatPrayerTime(NO_SOLUTION)).toBe(NO_SOLUTION_LABEL);
    expect(formatPrayerTime(NO_SOLUTION, '12h')).toBe('--:--');
  });

  it('renders time entries', () => {
    expect(formatPrayerTime(timeOfDay(741.29))).toBe('12:21');
  });
});

describe('formatPrayerTimes', () => {
  it('formats all six markers', () => {
    const times: PrayerTimes = {
      fajr: timeOfDay(300),
      sunrise: timeOfDay(390),
      dhuhr: timeOfDay(750),
      asr: timeOfDay(960),
      maghrib: NO_SOLUTION,
      isha: timeOfDay(1230),
    };
    expect(formatPrayerTimes(times, '12h')).toEqual({
      fajr: '5:00 AM',
      sunrise: '6:30 AM',
      dhuhr: '12:30 PM',
      asr: '4:00 PM',
      maghrib: '--:--',
      isha: '8:30 PM',
    });
  });
});
