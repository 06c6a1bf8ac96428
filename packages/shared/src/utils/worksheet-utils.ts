import type { CellFormat } from '../types/cell-types';
import type { SheetLayout, WorksheetModel } from '../types/workbook-types';

/** Empty worksheet model, as created before population */
export function createWorksheet(name: string, layout: SheetLayout = 'tabular'): WorksheetModel {
  return {
    name,
    layout,
    headers: [],
    rows: [],
    formats: {},
    merges: [],
    columnWidths: {},
    styleState: { headerStyled: false, bordersApplied: false },
    charts: [],
  };
}

/** Used range size: written rows × the widest written row */
export function sheetDimensions(sheet: WorksheetModel): { rowCount: number; colCount: number } {
  return {
    rowCount: sheet.rows.length,
    colCount: sheet.rows.reduce((max, row) => Math.max(max, row.length), 0),
  };
}

/** Merge a format into the one already stored for a cell */
export function mergeCellFormat(sheet: WorksheetModel, ref: string, format: CellFormat): void {
  sheet.formats[ref] = { ...sheet.formats[ref], ...format };
}
