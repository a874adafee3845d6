import { describe, expect, it } from 'vitest';

import {
  daysInMonth,
  formatIsoDate,
  isIsoDate,
  monthStart,
  parseIsoDate,
  shiftMonths,
} from '@/common/calendar.js';

describe('calendar', () => {
  describe('parseIsoDate', () => {
    it('parses a strict YYYY-MM-DD date', () => {
      expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    });

    it('rejects impossible dates', () => {
      expect(parseIsoDate('2023-02-29')).toBeUndefined();
      expect(parseIsoDate('2023-02-30')).toBeUndefined();
      expect(parseIsoDate('2023-13-01')).toBeUndefined();
      expect(parseIsoDate('2023-00-10')).toBeUndefined();
    });

    it('rejects other formats', () => {
      expect(parseIsoDate('2023-1-01')).toBeUndefined();
      expect(parseIsoDate('01/01/2023')).toBeUndefined();
      expect(parseIsoDate('2023-01-01T00:00:00Z')).toBeUndefined();
      expect(isIsoDate('')).toBe(false);
    });
  });

  it('counts days in month including leap years', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2023, 12)).toBe(31);
  });

  it('formats with zero padding', () => {
    expect(formatIsoDate({ year: 999, month: 3, day: 7 })).toBe('0999-03-07');
    expect(monthStart(2015, 1)).toBe('2015-01-01');
  });

  describe('shiftMonths', () => {
    it('moves across year boundaries', () => {
      expect(shiftMonths('1999-01-01', -12)).toBe('1998-01-01');
      expect(shiftMonths('2023-11-15', 3)).toBe('2024-02-15');
      expect(shiftMonths('2024-01-01', -1)).toBe('2023-12-01');
    });

    it('clamps the day to the target month', () => {
      expect(shiftMonths('2024-03-31', -1)).toBe('2024-02-29');
      expect(shiftMonths('2024-02-29', -12)).toBe('2023-02-28');
    });

    it('returns undefined for malformed input', () => {
      expect(shiftMonths('2024-02-30', 1)).toBeUndefined();
    });
  });
});
