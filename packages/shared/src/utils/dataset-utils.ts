import type { CellValue } from '../types/cell-types';
import type { Dataset, DatasetRow } from '../types/dataset-types';

/**
 * Build a Dataset from positional rows. Short rows are padded with null and
 * extra trailing values are dropped, so every row covers every column.
 */
export function createDataset(columns: string[], rows: CellValue[][]): Dataset {
  return {
    columns: [...columns],
    rows: rows.map((values) => {
      const row: DatasetRow = {};
      columns.forEach((column, i) => {
        row[column] = values[i] ?? null;
      });
      return row;
    }),
  };
}

export function hasColumn(dataset: Dataset, column: string): boolean {
  return dataset.columns.includes(column);
}

/** Values of one column in row order; null where a row lacks the key */
export function columnValues(dataset: Dataset, column: string): CellValue[] {
  return dataset.rows.map((row) => row[column] ?? null);
}

/** Rows as positional arrays aligned to `dataset.columns` */
export function toPositionalRows(dataset: Dataset): CellValue[][] {
  return dataset.rows.map((row) => dataset.columns.map((column) => row[column] ?? null));
}
