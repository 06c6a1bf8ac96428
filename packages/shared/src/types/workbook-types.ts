import type { CellFormat, CellValue, MergeRange } from './cell-types';
import type { ChartSpec } from './chart-types';

/**
 * Sheet layouts. Tabular sheets carry a header row; freeform sheets hold
 * label/value lines written directly (the executive summary).
 */
export const SHEET_LAYOUTS = ['tabular', 'freeform'] as const;
export type SheetLayout = (typeof SHEET_LAYOUTS)[number];

export interface SheetStyleState {
  headerStyled: boolean;
  bordersApplied: boolean;
}

/** Sheet in the in-memory workbook model */
export interface WorksheetModel {
  name: string;
  layout: SheetLayout;
  headers: string[];
  /** Row-major grid; index 0 is sheet row 1 */
  rows: CellValue[][];
  /** Formats keyed by A1 reference */
  formats: Record<string, CellFormat>;
  merges: MergeRange[];
  /** 0-based column index → width in character units */
  columnWidths: Record<number, number>;
  styleState: SheetStyleState;
  charts: ChartSpec[];
}

export interface WorkbookProperties {
  title: string;
  creator: string;
  created: Date;
}

/** Assembled, write-once workbook */
export interface WorkbookModel {
  sheets: WorksheetModel[];
  properties: WorkbookProperties;
}
