import { monthStart } from '@/common/calendar.js';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const MONTH_TOKEN_RE = /^([A-Za-z]{3})-(\d{2})$/;
const EUROSTAT_MONTH_RE = /^(\d{4})(?:-|M)(\d{2})$/;

/** Two-digit years at or above this belong to the 1900s */
export const TWO_DIGIT_YEAR_PIVOT = 50;

/**
 * "Jan-15" -> "2015-01-01", "Dec-98" -> "1998-12-01".
 */
export const parseMonthToken = (token: string): string | undefined => {
  const match = MONTH_TOKEN_RE.exec(token.trim());
  const name = match?.[1];
  const yy = match?.[2];
  if (name === undefined || yy === undefined) return undefined;

  const month = MONTHS.indexOf(name.toLowerCase()) + 1;
  if (month === 0) return undefined;

  const twoDigit = Number.parseInt(yy, 10);
  const year = twoDigit >= TWO_DIGIT_YEAR_PIVOT ? 1900 + twoDigit : 2000 + twoDigit;
  return monthStart(year, month);
};

/**
 * "2024-01" or "2024M01" -> "2024-01-01".
 */
export const parseEurostatMonth = (label: string): string | undefined => {
  const match = EUROSTAT_MONTH_RE.exec(label.trim());
  const yyyy = match?.[1];
  const mm = match?.[2];
  if (yyyy === undefined || mm === undefined) return undefined;

  const month = Number.parseInt(mm, 10);
  if (month < 1 || month > 12) return undefined;
  return monthStart(Number.parseInt(yyyy, 10), month);
};
