/**
 * Where the weights block sits inside a published workbook.
 * Row and column numbers are 1-based, as in the spreadsheet UI.
 */

import { OVERALL_INDEX_CODE } from './categories.js';

export type SheetCell = string | number | null;

/**
 * Read-only access to a worksheet's cell values.
 */
export interface SheetReader {
  cell(row: number, column: number): SheetCell;
}

/**
 * How year labels are found above the year columns.
 * - header: the header cell itself is the year ("2024", 2024); first column wins on duplicates
 * - labelled: a separate label row holds free text containing a 4-digit year
 *   ("2015 Q1"); last column wins on duplicates
 */
export type YearLabelLayout = { kind: 'header' } | { kind: 'labelled'; row: number };

export interface WeightsSheetLayout {
  sheetName: string;
  /** First column of the block; holds category codes */
  firstColumn: string;
  /** Last year column of the block */
  lastColumn: string;
  headerRow: number;
  /** Row of the overall index; categories follow */
  firstDataRow: number;
  /** Data rows to read, overall index included */
  rowCount: number;
  yearLabels: YearLabelLayout;
  /** Leading code token of the overall index row */
  overallIndexCode: string;
}

/**
 * ONS "Annex A" weights workbook, sheet W1-CPI: header on row 5, overall index
 * plus 12 divisions on rows 6-18, code/description/years across B:AB.
 */
export const ONS_CPI_WEIGHTS_LAYOUT: WeightsSheetLayout = {
  sheetName: 'W1-CPI',
  firstColumn: 'B',
  lastColumn: 'AB',
  headerRow: 5,
  firstDataRow: 6,
  rowCount: 13,
  yearLabels: { kind: 'header' },
  overallIndexCode: OVERALL_INDEX_CODE,
};

const COLUMN_RE = /^[A-Z]+$/;

/**
 * 'A' -> 1, 'Z' -> 26, 'AB' -> 28. Returns undefined for anything that is not a column name.
 */
export const columnNumber = (letters: string): number | undefined => {
  const normalized = letters.trim().toUpperCase();
  if (!COLUMN_RE.test(normalized)) return undefined;

  let n = 0;
  for (const ch of normalized) {
    n = n * 26 + (ch.charCodeAt(0) - 64);
  }
  return n;
};

/**
 * 1 -> 'A', 28 -> 'AB'
 */
export const columnLetters = (column: number): string => {
  let n = column;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
};
