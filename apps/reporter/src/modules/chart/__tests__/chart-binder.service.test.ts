import { describe, it, expect, beforeEach } from 'vitest';
import { createDataset } from '@sheetreport/shared';
import type { CellValue, WorksheetModel } from '@sheetreport/shared';
import { SheetPopulatorService } from '../../sheet/sheet-populator.service';
import { ChartBinderService } from '../chart-binder.service';

describe('ChartBinderService', () => {
  const populator = new SheetPopulatorService();
  let binder: ChartBinderService;

  function sheetOf(columns: string[], rows: CellValue[][]): WorksheetModel {
    const sheet = populator.createSheet('Sales');
    populator.populate(sheet, createDataset(columns, rows));
    return sheet;
  }

  beforeEach(() => {
    binder = new ChartBinderService();
  });

  it('binds columns A..B over every row by default, anchored right of the data', () => {
    const sheet = sheetOf(['region', 'amount', 'units'], [['North', 100, 3], ['South', 50, 1]]);
    const binding = binder.bind(sheet, 'bar', undefined, 'Sales by region');

    expect(binding).toEqual({
      status: 'bound',
      chart: {
        kind: 'bar',
        title: 'Sales by region',
        source: { sheetName: 'Sales', startCol: 0, endCol: 1, startRow: 0, endRow: 2 },
        anchor: 'E2',
        titlesFromData: true,
        style: 10,
      },
    });
    expect(sheet.charts).toHaveLength(1);
  });

  it('honours an explicit range and anchor', () => {
    const sheet = sheetOf(['region', 'amount', 'units'], [['North', 100, 3], ['South', 50, 1]]);
    const binding = binder.bind(
      sheet,
      'line',
      { startCol: 0, endCol: 2, startRow: 0, endRow: 1 },
      'Trend',
      'H10',
    );

    expect(binding.status).toBe('bound');
    expect(sheet.charts[0]?.source).toEqual({
      sheetName: 'Sales',
      startCol: 0,
      endCol: 2,
      startRow: 0,
      endRow: 1,
    });
    expect(sheet.charts[0]?.anchor).toBe('H10');
  });

  it('narrows the default range on a single-column sheet', () => {
    const sheet = sheetOf(['amount'], [[1], [2]]);
    const binding = binder.bind(sheet, 'line', undefined, 'Amounts');
    expect(binding.status === 'bound' && binding.chart.source.endCol).toBe(0);
  });

  it('skips unsupported chart kinds', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100]]);
    const binding = binder.bind(sheet, 'pie', undefined, 'Share');
    expect(binding).toEqual({ status: 'skipped', reason: 'Unsupported chart kind "pie"' });
    expect(sheet.charts).toEqual([]);
  });

  it('skips sheets without data rows', () => {
    const sheet = sheetOf(['region', 'amount'], []);
    const binding = binder.bind(sheet, 'bar', undefined, 'Empty');
    expect(binding).toEqual({ status: 'skipped', reason: "Sheet 'Sales' has no data rows to chart" });
  });

  it('skips ranges outside the written data', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100]]);
    const binding = binder.bind(sheet, 'bar', { startCol: 0, endCol: 3, startRow: 0, endRow: 1 }, 'Wide');
    expect(binding).toEqual({ status: 'skipped', reason: "Range A1:D2 is outside sheet 'Sales'" });
  });

  it('skips ranges holding only the title row', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100]]);
    const binding = binder.bind(sheet, 'bar', { startCol: 0, endCol: 1, startRow: 1, endRow: 1 }, 'Flat');
    expect(binding).toEqual({ status: 'skipped', reason: 'Range has a title row but no values' });
  });

  it('skips malformed anchors', () => {
    const sheet = sheetOf(['region', 'amount'], [['North', 100]]);
    const binding = binder.bind(sheet, 'bar', undefined, 'Anchored', 'e2');
    expect(binding).toEqual({ status: 'skipped', reason: 'Invalid chart anchor "e2"' });
  });
});
