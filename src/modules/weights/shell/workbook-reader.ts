/**
 * Loads xlsx workbooks with ExcelJS and exposes sheets as plain cell grids.
 */

import ExcelJS, { type CellFormulaValue, type CellValue, type Worksheet } from 'exceljs';
import { err, ok, type Result } from 'neverthrow';

import { createDataValidationError, type DataValidationError } from '@/common/types/errors.js';

import type { SheetCell, SheetReader } from '../core/workbook-layout.js';

const SOURCE = 'ons-workbook';

type FormulaResult = NonNullable<CellFormulaValue['result']>;

const scalar = (value: FormulaResult | string | number | boolean | Date): SheetCell => {
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return value.toISOString();
  // Error cells ("#N/A", "#REF!") keep their code so the parser can report them
  return value.error;
};

/**
 * Flattens an ExcelJS cell value: formulas resolve to their cached result,
 * rich text and hyperlinks to their text.
 */
export const toSheetCell = (value: CellValue): SheetCell => {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'object' || value instanceof Date) return scalar(value);

  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('hyperlink' in value) {
    return typeof value.text === 'string' ? value.text : value.hyperlink;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : scalar(value.result);
  }
  if ('error' in value) {
    return value.error;
  }
  return null;
};

export const worksheetReader = (worksheet: Worksheet): SheetReader => ({
  cell: (row, column) => toSheetCell(worksheet.getCell(row, column).value),
});

/**
 * Opens a workbook and returns a reader for the named sheet.
 */
export const loadWorksheet = async (
  buffer: Buffer,
  sheetName: string
): Promise<Result<SheetReader, DataValidationError>> => {
  const workbook = new ExcelJS.Workbook();
  try {
    // Copy into a plain ArrayBuffer, which is what the loader is typed against
    await workbook.xlsx.load(new Uint8Array(buffer).buffer);
  } catch (cause) {
    return err(
      createDataValidationError(SOURCE, 'Downloaded file is not a readable xlsx workbook', [
        cause instanceof Error ? cause.message : String(cause),
      ])
    );
  }

  const worksheet = workbook.getWorksheet(sheetName);
  if (worksheet === undefined) {
    return err(
      createDataValidationError(SOURCE, `Sheet '${sheetName}' not found in workbook`, [
        `available: ${workbook.worksheets.map((sheet) => sheet.name).join(', ')}`,
      ])
    );
  }

  return ok(worksheetReader(worksheet));
};
