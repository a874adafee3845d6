import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createDataValidationError, type DataValidationError } from '@/common/types/errors.js';

import {
  columnLetters,
  columnNumber,
  type SheetCell,
  type SheetReader,
  type WeightsSheetLayout,
} from './workbook-layout.js';

import type { CanonicalWeightRow } from './types.js';

const SOURCE = 'ons-workbook';

const OVERALL_INDEX_VALUE = 1000;
const OVERALL_INDEX_TOLERANCE = 0.1;

const HEADER_YEAR_RE = /^(\d{4})/;
const LABEL_YEAR_RE = /(\d{4})/;
const NUMERIC_RE = /^-?\d+(?:\.\d+)?$/;

interface YearColumn {
  year: number;
  column: number;
}

const cellText = (cell: SheetCell): string => {
  if (cell === null) return '';
  return typeof cell === 'number' ? String(cell) : cell.trim();
};

const cellNumber = (cell: SheetCell): Decimal | null | 'invalid' => {
  if (cell === null) return null;
  if (typeof cell === 'number') return Number.isFinite(cell) ? new Decimal(cell) : 'invalid';

  const text = cell.trim();
  if (text === '') return null;
  return NUMERIC_RE.test(text) ? new Decimal(text) : 'invalid';
};

const headerYear = (cell: SheetCell): number | undefined => {
  if (typeof cell === 'number') {
    return Number.isInteger(cell) && cell >= 1000 && cell <= 9999 ? cell : undefined;
  }
  const digits = HEADER_YEAR_RE.exec(cellText(cell))?.[1];
  return digits !== undefined ? Number.parseInt(digits, 10) : undefined;
};

const labelYear = (cell: SheetCell): number | undefined => {
  const digits = LABEL_YEAR_RE.exec(cellText(cell))?.[1];
  return digits !== undefined ? Number.parseInt(digits, 10) : undefined;
};

/**
 * Maps year columns to years. Header layouts keep the first column of a
 * repeated year; labelled layouts keep the last.
 */
const resolveYearColumns = (
  sheet: SheetReader,
  layout: WeightsSheetLayout,
  firstYearColumn: number,
  lastYearColumn: number
): YearColumn[] => {
  const columnByYear = new Map<number, number>();

  for (let column = firstYearColumn; column <= lastYearColumn; column++) {
    if (layout.yearLabels.kind === 'header') {
      const year = headerYear(sheet.cell(layout.headerRow, column));
      if (year !== undefined && !columnByYear.has(year)) {
        columnByYear.set(year, column);
      }
    } else {
      const year = labelYear(sheet.cell(layout.yearLabels.row, column));
      if (year !== undefined) {
        columnByYear.set(year, column);
      }
    }
  }

  return [...columnByYear.entries()]
    .map(([year, column]) => ({ year, column }))
    .sort((a, b) => a.year - b.year);
};

/**
 * Extracts category weights from a wide weights table (categories down,
 * years across) and reshapes them into one row per category and year.
 *
 * The first data row must be the overall index at 1000; anything else means
 * the published layout has shifted and the block cannot be trusted.
 */
export const parseWeightsSheet = (
  sheet: SheetReader,
  layout: WeightsSheetLayout,
  country: string
): Result<CanonicalWeightRow[], DataValidationError> => {
  const codeColumn = columnNumber(layout.firstColumn);
  const lastColumn = columnNumber(layout.lastColumn);
  if (codeColumn === undefined || lastColumn === undefined || lastColumn < codeColumn + 2) {
    return err(
      createDataValidationError(SOURCE, 'Sheet layout does not describe a weights block', [
        `columns ${layout.firstColumn}:${layout.lastColumn}`,
      ])
    );
  }

  const descriptionColumn = codeColumn + 1;
  const yearColumns = resolveYearColumns(sheet, layout, codeColumn + 2, lastColumn);
  const latest = yearColumns.at(-1);
  if (latest === undefined) {
    return err(
      createDataValidationError(SOURCE, `No year columns found in ${layout.sheetName}`, [
        `row ${String(layout.headerRow)}, columns ${columnLetters(codeColumn + 2)}:${layout.lastColumn}`,
      ])
    );
  }

  const overallCode = cellText(sheet.cell(layout.firstDataRow, codeColumn));
  const overallValue = cellNumber(sheet.cell(layout.firstDataRow, latest.column));
  if (
    !overallCode.startsWith(layout.overallIndexCode) ||
    overallValue === null ||
    overallValue === 'invalid' ||
    overallValue.minus(OVERALL_INDEX_VALUE).abs().gt(OVERALL_INDEX_TOLERANCE)
  ) {
    return err(
      createDataValidationError(
        SOURCE,
        `First row is not the expected overall index with value ${String(OVERALL_INDEX_VALUE)}`,
        [
          `code: '${overallCode}'`,
          `${String(latest.year)} value: ${overallValue === null || overallValue === 'invalid' ? 'missing' : overallValue.toString()}`,
        ]
      )
    );
  }

  interface CategoryRow {
    row: number;
    code: string;
    description: string;
  }

  const categories: CategoryRow[] = [];
  const issues: string[] = [];
  const lastDataRow = layout.firstDataRow + layout.rowCount - 1;

  for (let row = layout.firstDataRow; row <= lastDataRow; row++) {
    const code = cellText(sheet.cell(row, codeColumn));
    const description = cellText(sheet.cell(row, descriptionColumn));

    if (code.startsWith(layout.overallIndexCode)) continue;
    if (code === '' && description === '') continue;
    if (code === '') {
      issues.push(`${columnLetters(codeColumn)}${String(row)}: missing category code`);
      continue;
    }

    categories.push({ row, code, description });
  }

  const rows: CanonicalWeightRow[] = [];

  for (const { year, column } of yearColumns) {
    for (const category of categories) {
      const value = cellNumber(sheet.cell(category.row, column));
      if (value === null) continue;
      if (value === 'invalid') {
        issues.push(
          `${columnLetters(column)}${String(category.row)}: '${cellText(sheet.cell(category.row, column))}' is not a number`
        );
        continue;
      }

      rows.push({
        categoryCode: category.code,
        categoryDescription: category.description,
        year,
        weight: value,
        source: 'ONS',
        country,
      });
    }
  }

  if (issues.length > 0) {
    return err(
      createDataValidationError(SOURCE, `Failed to parse ${layout.sheetName} weights block`, issues)
    );
  }

  return ok(rows);
};
