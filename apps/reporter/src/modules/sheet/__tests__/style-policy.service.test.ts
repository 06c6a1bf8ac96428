import { describe, it, expect, beforeEach } from 'vitest';
import { createDataset } from '@sheetreport/shared';
import type { CellValue, WorksheetModel } from '@sheetreport/shared';
import { SheetPopulatorService } from '../sheet-populator.service';
import { StylePolicyService } from '../style-policy.service';

describe('StylePolicyService', () => {
  const populator = new SheetPopulatorService();
  let policy: StylePolicyService;

  function sheetOf(columns: string[], rows: CellValue[][]): WorksheetModel {
    const sheet = populator.createSheet('Data');
    populator.populate(sheet, createDataset(columns, rows));
    return sheet;
  }

  beforeEach(() => {
    policy = new StylePolicyService();
  });

  it('returns independent copies of position formats', () => {
    const header = policy.styleFor('header');
    header.bold = false;
    expect(policy.styleFor('header').bold).toBe(true);
  });

  it('styles the header row and borders every used cell', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100]]);
    policy.format(sheet);

    expect(sheet.formats['A1']).toMatchObject({
      bold: true,
      fontColor: '#FFFFFF',
      bgColor: '#366092',
      alignment: 'center',
      verticalAlignment: 'middle',
    });
    expect(sheet.formats['B2']?.border?.left).toEqual({ style: 'thin' });
    expect(sheet.formats['B2']?.bold).toBeUndefined();
    expect(sheet.formats['C1']).toBeUndefined();
    expect(sheet.styleState).toEqual({ headerStyled: true, bordersApplied: true });
  });

  it('sizes columns to the longest value plus padding', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100], ['South', 50]]);
    policy.format(sheet);
    expect(sheet.columnWidths).toEqual({ 0: 8, 1: 8 });
  });

  it('caps widths at 50 characters', () => {
    const sheet = sheetOf(['note'], [['x'.repeat(60)]]);
    policy.format(sheet);
    expect(sheet.columnWidths[0]).toBe(50);
  });

  it('never makes a column narrower than its header label', () => {
    const header = 'h'.repeat(55);
    const sheet = sheetOf([header], [['short']]);
    policy.format(sheet);
    expect(sheet.columnWidths[0]).toBe(55);
  });

  it('measures dates in their rendered form', () => {
    const sheet = sheetOf(['when'], [[new Date(2024, 0, 15, 9, 30, 0)]]);
    policy.format(sheet);
    // "2024-01-15 09:30:00" is 19 characters
    expect(sheet.columnWidths[0]).toBe(21);
  });

  it('measures malformed cells as empty', () => {
    const sheet = sheetOf(['when'], [[new Date(Number.NaN)]]);
    policy.format(sheet);
    expect(sheet.columnWidths[0]).toBe(6);
  });

  it('is idempotent', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100]]);
    policy.format(sheet);
    const formats = structuredClone(sheet.formats);
    const widths = { ...sheet.columnWidths };

    policy.format(sheet);
    expect(sheet.formats).toEqual(formats);
    expect(sheet.columnWidths).toEqual(widths);
  });

  it('leaves the first row of a freeform sheet unstyled', () => {
    const sheet = populator.createSheet('Summary', 'freeform');
    populator.writeCell(sheet, 0, 0, 'Label: value');
    policy.format(sheet);

    expect(sheet.formats['A1']).toEqual({
      border: {
        top: { style: 'thin' },
        right: { style: 'thin' },
        bottom: { style: 'thin' },
        left: { style: 'thin' },
      },
    });
    expect(sheet.styleState.headerStyled).toBe(false);
    expect(sheet.columnWidths[0]).toBe(14);
  });

  it('borders every cell of a merged range', () => {
    const sheet = populator.createSheet('Summary', 'freeform');
    populator.writeCell(sheet, 0, 0, 'Title');
    sheet.merges.push({ startRow: 0, startCol: 0, endRow: 0, endCol: 2 });
    policy.format(sheet);

    expect(Object.keys(sheet.formats).sort()).toEqual(['A1', 'B1', 'C1']);
    expect(sheet.formats['C1']?.border?.right).toEqual({ style: 'thin' });
    expect(sheet.columnWidths).toEqual({ 0: 7 });
  });

  it('handles a sheet with nothing written', () => {
    const sheet = populator.createSheet('Blank');
    policy.format(sheet);
    expect(sheet.formats).toEqual({});
    expect(sheet.columnWidths).toEqual({});
    expect(sheet.styleState).toEqual({ headerStyled: false, bordersApplied: true });
  });
});
