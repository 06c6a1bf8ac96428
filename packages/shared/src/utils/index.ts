export {
  colIndexToLetter,
  letterToColIndex,
  parseCellRef,
  buildCellRef,
  buildAbsoluteRef,
  buildAbsoluteRange,
  sanitizeSheetName,
  uniqueSheetName,
  stringifyCell,
  measureCell,
} from './cell-utils';

export {
  CELL_DATE_PATTERN,
  CELL_DATE_NUMBER_FORMAT,
  isValidDate,
  formatCellDate,
  formatDisplayDate,
  formatTimestamp,
  monthBucket,
  parseDateInput,
} from './date-utils';

export {
  createDataset,
  hasColumn,
  columnValues,
  toPositionalRows,
} from './dataset-utils';

export {
  createWorksheet,
  sheetDimensions,
  mergeCellFormat,
} from './worksheet-utils';
