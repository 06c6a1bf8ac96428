import type { CellValue } from './cell-types';

/** Descriptive statistics for one numeric column */
export interface NumericColumnSummary {
  count: number;
  mean: number;
  /** Sample standard deviation; null with fewer than two values */
  std: number | null;
  min: number;
  p25: number;
  p50: number;
  p75: number;
  max: number;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export interface SummaryStats {
  totalRecords: number;
  /** Null when the date column is missing or holds no dates */
  dateRange: DateRange | null;
  /** Null when the dataset has no numeric column */
  numericSummary: Record<string, NumericColumnSummary> | null;
}

export interface RankingEntry {
  key: CellValue;
  total: number;
}

/** Grouped sums, descending, truncated to N */
export interface RankingResult {
  groupColumn: string;
  valueColumn: string;
  entries: RankingEntry[];
}

export interface TrendEntry {
  /** Calendar month label, `yyyy-MM` */
  period: string;
  periodStart: Date;
  total: number;
  /** Percent change against the previous entry; null for the first */
  growthRate: number | null;
}

export interface TrendResult {
  dateColumn: string;
  valueColumn: string;
  entries: TrendEntry[];
}
