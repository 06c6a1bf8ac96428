import type { CellValue } from './cell-types';

/** One dataset row: a value (possibly null) for every declared column */
export type DatasetRow = Record<string, CellValue>;

/**
 * Ordered tabular input. Column names are unique and their order is the
 * order columns are written to a sheet.
 */
export interface Dataset {
  columns: string[];
  rows: DatasetRow[];
}

/** A dataset paired with the name of the sheet it becomes */
export interface NamedDataset {
  name: string;
  dataset: Dataset;
}
