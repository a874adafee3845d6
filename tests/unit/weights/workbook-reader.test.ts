import { describe, expect, it } from 'vitest';

import { loadWorksheet, toSheetCell } from '@/modules/weights/index.js';

import { makeWeightsWorkbook } from '../../fixtures/builders.js';

describe('toSheetCell', () => {
  it('keeps plain numbers and strings', () => {
    expect(toSheetCell(42.5)).toBe(42.5);
    expect(toSheetCell('CHZR')).toBe('CHZR');
    expect(toSheetCell(null)).toBeNull();
  });

  it('flattens booleans and dates to text', () => {
    expect(toSheetCell(true)).toBe('TRUE');
    expect(toSheetCell(new Date(Date.UTC(2024, 0, 1)))).toBe('2024-01-01T00:00:00.000Z');
  });

  it('uses the cached result of formulas', () => {
    expect(toSheetCell({ formula: 'SUM(D7:D18)', result: 1000, date1904: false })).toBe(1000);
    expect(toSheetCell({ formula: 'SUM(D7:D18)', date1904: false })).toBeNull();
  });

  it('joins rich text runs', () => {
    expect(toSheetCell({ richText: [{ text: '01 ' }, { text: 'Food' }] })).toBe('01 Food');
  });

  it('uses hyperlink text', () => {
    expect(toSheetCell({ text: 'Annex A', hyperlink: 'https://ons.test/annex' })).toBe('Annex A');
  });

  it('keeps error codes', () => {
    expect(toSheetCell({ error: '#N/A' })).toBe('#N/A');
  });
});

describe('loadWorksheet', () => {
  it('reads cells from the named sheet', async () => {
    const buffer = await makeWeightsWorkbook({ years: [2024] });

    const sheet = (await loadWorksheet(buffer, 'W1-CPI'))._unsafeUnwrap();

    expect(sheet.cell(5, 4)).toBe(2024);
    expect(sheet.cell(6, 2)).toBe('CHZQ');
    expect(sheet.cell(7, 4)).toBe(110);
    expect(sheet.cell(30, 30)).toBeNull();
  });

  it('lists available sheets when the named one is missing', async () => {
    const buffer = await makeWeightsWorkbook({ sheetName: 'W3-CPIH' });

    const error = (await loadWorksheet(buffer, 'W1-CPI'))._unsafeUnwrapErr();

    expect(error.message).toBe("Sheet 'W1-CPI' not found in workbook");
    expect(error.issues).toEqual(['available: W3-CPIH']);
  });

  it('rejects bytes that are not an xlsx file', async () => {
    const error = (await loadWorksheet(Buffer.from('not a workbook'), 'W1-CPI'))._unsafeUnwrapErr();

    expect(error.source).toBe('ons-workbook');
    expect(error.message).toBe('Downloaded file is not a readable xlsx workbook');
  });
});
