/**
 * Calendar helpers for ISO `YYYY-MM-DD` date strings.
 * Dates stay strings throughout the pipeline; no time zones are involved.
 */

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (n: number, width: number): string => String(n).padStart(width, '0');

export const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

/**
 * Parses a strict `YYYY-MM-DD` string; rejects impossible dates like 2023-02-30.
 */
export const parseIsoDate = (value: string): CalendarDate | undefined => {
  const match = ISO_DATE_RE.exec(value);
  if (match === null) return undefined;

  const [, y, m, d] = match;
  if (y === undefined || m === undefined || d === undefined) return undefined;

  const year = Number.parseInt(y, 10);
  const month = Number.parseInt(m, 10);
  const day = Number.parseInt(d, 10);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;

  return { year, month, day };
};

export const isIsoDate = (value: string): boolean => parseIsoDate(value) !== undefined;

export const formatIsoDate = ({ year, month, day }: CalendarDate): string =>
  `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;

/**
 * First day of the given month.
 */
export const monthStart = (year: number, month: number): string =>
  formatIsoDate({ year, month, day: 1 });

/**
 * Moves a date by whole months, clamping the day to the target month's length.
 * Returns undefined for a malformed date.
 */
export const shiftMonths = (date: string, months: number): string | undefined => {
  const parsed = parseIsoDate(date);
  if (parsed === undefined) return undefined;

  const index = parsed.year * 12 + (parsed.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  return formatIsoDate({ year, month, day: Math.min(parsed.day, daysInMonth(year, month)) });
};
