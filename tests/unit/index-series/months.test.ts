import { describe, expect, it } from 'vitest';

import { parseEurostatMonth, parseMonthToken } from '@/modules/index-series/index.js';

describe('parseMonthToken', () => {
  it('reads month-year tokens', () => {
    expect(parseMonthToken('Jan-15')).toBe('2015-01-01');
    expect(parseMonthToken(' sep-24 ')).toBe('2024-09-01');
  });

  it('places two-digit years around the pivot', () => {
    expect(parseMonthToken('Dec-98')).toBe('1998-12-01');
    expect(parseMonthToken('Dec-50')).toBe('1950-12-01');
    expect(parseMonthToken('Dec-49')).toBe('2049-12-01');
  });

  it('rejects anything else', () => {
    expect(parseMonthToken('Foo-15')).toBeUndefined();
    expect(parseMonthToken('Jan-2015')).toBeUndefined();
    expect(parseMonthToken('')).toBeUndefined();
  });
});

describe('parseEurostatMonth', () => {
  it('accepts both period spellings', () => {
    expect(parseEurostatMonth('2024M03')).toBe('2024-03-01');
    expect(parseEurostatMonth('2024-11')).toBe('2024-11-01');
  });

  it('rejects impossible months and yearly periods', () => {
    expect(parseEurostatMonth('2024M13')).toBeUndefined();
    expect(parseEurostatMonth('2024-00')).toBeUndefined();
    expect(parseEurostatMonth('2024')).toBeUndefined();
  });
});
