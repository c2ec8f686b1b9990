import { describe, it, expect } from 'vitest';
import { minutesIntoLocalDay, toCalculationDate } from './localDate.js';

describe('toCalculationDate', () => {
  it('should use the UTC date when the offset is zero', () => {
    const tsMs = new Date('2024-06-15T12:00:00Z').getTime();
    expect(toCalculationDate(tsMs, 0)).toEqual({
      year: 2024,
      month: 6,
      day: 15,
      utcOffsetMinutes: 0,
    });
  });

  it('should roll forward for positive offsets', () => {
    const tsMs = new Date('2024-06-14T22:30:00Z').getTime();
    expect(toCalculationDate(tsMs, 180)).toEqual({
      year: 2024,
      month: 6,
      day: 15,
      utcOffsetMinutes: 180,
    });
  });

  it('should roll back across a year boundary for negative offsets', () => {
    const tsMs = new Date('2024-01-01T03:00:00Z').getTime();
    expect(toCalculationDate(tsMs, -300)).toEqual({
      year: 2023,
      month: 12,
      day: 31,
      utcOffsetMinutes: -300,
    });
  });
});

describe('minutesIntoLocalDay', () => {
  it('should apply the offset to the UTC time of day', () => {
    const tsMs = new Date('2024-06-15T12:00:00Z').getTime();
    expect(minutesIntoLocalDay(tsMs, 0)).toBe(720);
    expect(minutesIntoLocalDay(tsMs, 180)).toBe(900);
    expect(minutesIntoLocalDay(tsMs, -300)).toBe(420);
  });

  it('should wrap at local midnight', () => {
    const tsMs = new Date('2024-06-14T22:30:00Z').getTime();
    expect(minutesIntoLocalDay(tsMs, 180)).toBe(90);
  });

  it('should keep seconds as a fraction', () => {
    const tsMs = new Date('2024-06-15T12:00:30Z').getTime();
    expect(minutesIntoLocalDay(tsMs, 0)).toBe(720.5);
  });
});
