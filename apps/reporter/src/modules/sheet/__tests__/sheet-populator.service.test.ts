import { describe, it, expect, beforeEach } from 'vitest';
import { createDataset } from '@sheetreport/shared';
import { SheetPopulatorService } from '../sheet-populator.service';

describe('SheetPopulatorService', () => {
  let populator: SheetPopulatorService;

  beforeEach(() => {
    populator = new SheetPopulatorService();
  });

  it('creates an empty tabular sheet by default', () => {
    const sheet = populator.createSheet('Sales');
    expect(sheet.name).toBe('Sales');
    expect(sheet.layout).toBe('tabular');
    expect(sheet.rows).toEqual([]);
    expect(sheet.styleState).toEqual({ headerStyled: false, bordersApplied: false });
  });

  it('writes column names as the first row and records below', () => {
    const sheet = populator.createSheet('Sales');
    populator.populate(sheet, createDataset(['region', 'amount'], [['North', 100], ['South', 50]]));

    expect(sheet.headers).toEqual(['region', 'amount']);
    expect(sheet.rows).toEqual([
      ['region', 'amount'],
      ['North', 100],
      ['South', 50],
    ]);
  });

  it('keeps cell types, including dates and nulls', () => {
    const when = new Date(2024, 0, 15);
    const sheet = populator.createSheet('Typed');
    populator.populate(sheet, createDataset(['date', 'amount'], [[when, null]]));

    const [, first] = sheet.rows;
    expect(first?.[0]).toBe(when);
    expect(first?.[1]).toBeNull();
  });

  it('writes only the header row for an empty dataset', () => {
    const sheet = populator.createSheet('Empty');
    populator.populate(sheet, createDataset(['a', 'b'], []));
    expect(sheet.rows).toEqual([['a', 'b']]);
  });

  it('grows the grid when writing a single cell', () => {
    const sheet = populator.createSheet('Free', 'freeform');
    populator.writeCell(sheet, 2, 1, 'x');
    expect(sheet.rows).toEqual([[], [], [null, 'x']]);
  });

  it('stores the format of a written cell under its A1 reference', () => {
    const sheet = populator.createSheet('Free', 'freeform');
    populator.writeCell(sheet, 0, 0, 'Title', { bold: true, fontSize: 16 });
    populator.writeCell(sheet, 0, 0, 'Title', { fontColor: '#FF0000' });
    expect(sheet.formats['A1']).toEqual({ bold: true, fontSize: 16, fontColor: '#FF0000' });
  });
});
