export type {
  CellValue,
  Alignment,
  VerticalAlignment,
  BorderEdge,
  BorderConfig,
  CellFormat,
  CellRange,
  MergeRange,
} from './cell-types';
export { ALIGNMENTS, VERTICAL_ALIGNMENTS } from './cell-types';

export type { Dataset, DatasetRow, NamedDataset } from './dataset-types';

export type {
  NumericColumnSummary,
  DateRange,
  SummaryStats,
  RankingEntry,
  RankingResult,
  TrendEntry,
  TrendResult,
} from './analysis-types';

export type {
  ChartKind,
  ChartRange,
  ChartSpec,
  ChartBinding,
  ChartRequest,
} from './chart-types';
export { CHART_KINDS } from './chart-types';

export type {
  SheetLayout,
  SheetStyleState,
  WorksheetModel,
  WorkbookProperties,
  WorkbookModel,
} from './workbook-types';
export { SHEET_LAYOUTS } from './workbook-types';

export type {
  ReportConfig,
  ReportErrorCode,
  ReportFailure,
  SaveSuccess,
  SaveResult,
  ReportSuccess,
  ReportOutcome,
} from './report-types';
export { REPORT_ERROR_CODES } from './report-types';
