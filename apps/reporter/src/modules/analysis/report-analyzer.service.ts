import { Injectable, Logger } from '@nestjs/common';
import type {
  CellValue,
  Dataset,
  DateRange,
  NumericColumnSummary,
  RankingEntry,
  RankingResult,
  SummaryStats,
  TrendEntry,
  TrendResult,
} from '@sheetreport/shared';
import {
  REPORT_DEFAULTS,
  columnValues,
  createDataset,
  hasColumn,
  isValidDate,
  monthBucket,
} from '@sheetreport/shared';

function isNumber(value: CellValue): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

/** Non-numeric cells contribute nothing to a sum */
function toAmount(value: CellValue): number {
  return isNumber(value) ? value : 0;
}

/** Linear-interpolated quantile of an ascending, non-empty array */
function quantile(sorted: number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return low + (high - low) * (pos - lo);
}

/** Identity of a group key: 1 and "1" are different groups */
function groupId(key: Exclude<CellValue, null>): string {
  return key instanceof Date ? `date:${key.getTime()}` : `${typeof key}:${key}`;
}

function keyRank(key: Exclude<CellValue, null>): number {
  if (typeof key === 'number') return 0;
  return key instanceof Date ? 1 : 2;
}

/** Ascending key order; numbers sort before dates, dates before strings */
function compareKeys(a: Exclude<CellValue, null>, b: Exclude<CellValue, null>): number {
  const rank = keyRank(a) - keyRank(b);
  if (rank !== 0) return rank;
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (left < right) return -1;
  return left > right ? 1 : 0;
}

/**
 * Pure aggregations over a Dataset. Missing columns never raise: they yield
 * an empty or partial result.
 */
@Injectable()
export class ReportAnalyzerService {
  private readonly logger = new Logger(ReportAnalyzerService.name);

  summaryStats(dataset: Dataset, dateColumn: string = REPORT_DEFAULTS.SUMMARY_DATE_COLUMN): SummaryStats {
    return {
      totalRecords: dataset.rows.length,
      dateRange: this.dateRange(dataset, dateColumn),
      numericSummary: this.numericSummary(dataset),
    };
  }

  /** Group by `groupColumn`, sum `valueColumn`, keep the top `n` by total */
  topPerformers(dataset: Dataset, groupColumn: string, valueColumn: string, n: number): RankingResult {
    const result: RankingResult = { groupColumn, valueColumn, entries: [] };
    if (!hasColumn(dataset, groupColumn) || !hasColumn(dataset, valueColumn)) {
      this.logger.warn(`Ranking skipped: columns "${groupColumn}"/"${valueColumn}" not both present`);
      return result;
    }
    if (n <= 0) return result;

    const groups = new Map<string, RankingEntry>();
    for (const row of dataset.rows) {
      const key = row[groupColumn] ?? null;
      if (key === null) continue;
      const id = groupId(key);
      let entry = groups.get(id);
      if (!entry) {
        entry = { key, total: 0 };
        groups.set(id, entry);
      }
      entry.total += toAmount(row[valueColumn] ?? null);
    }

    // Array#sort is stable: equal totals keep first-seen group order
    result.entries = [...groups.values()].sort((a, b) => b.total - a.total).slice(0, n);
    return result;
  }

  /** Month-bucketed sums in chronological order with percent growth */
  trend(dataset: Dataset, dateColumn: string, valueColumn: string): TrendResult {
    const result: TrendResult = { dateColumn, valueColumn, entries: [] };
    if (!hasColumn(dataset, dateColumn) || !hasColumn(dataset, valueColumn)) {
      this.logger.warn(`Trend skipped: columns "${dateColumn}"/"${valueColumn}" not both present`);
      return result;
    }

    const buckets = new Map<string, TrendEntry>();
    for (const row of dataset.rows) {
      const date = row[dateColumn];
      if (!isValidDate(date)) continue;
      const { period, periodStart } = monthBucket(date);
      let entry = buckets.get(period);
      if (!entry) {
        entry = { period, periodStart, total: 0, growthRate: null };
        buckets.set(period, entry);
      }
      entry.total += toAmount(row[valueColumn] ?? null);
    }

    const entries = [...buckets.values()].sort(
      (a, b) => a.periodStart.getTime() - b.periodStart.getTime(),
    );
    entries.forEach((entry, i) => {
      const previous = entries[i - 1];
      entry.growthRate = previous && previous.total !== 0
        ? ((entry.total - previous.total) / previous.total) * 100
        : null;
    });

    result.entries = entries;
    return result;
  }

  /**
   * Per-group sums of several value columns, groups in ascending key order.
   * Value columns absent from the dataset are left out.
   */
  groupTotals(dataset: Dataset, groupColumn: string, valueColumns: string[]): Dataset {
    if (!hasColumn(dataset, groupColumn)) {
      this.logger.warn(`Group totals skipped: column "${groupColumn}" not present`);
      return createDataset([], []);
    }
    const present = valueColumns.filter((column) => hasColumn(dataset, column));

    const groups = new Map<string, { key: Exclude<CellValue, null>; totals: number[] }>();
    for (const row of dataset.rows) {
      const key = row[groupColumn] ?? null;
      if (key === null) continue;
      const id = groupId(key);
      let group = groups.get(id);
      if (!group) {
        group = { key, totals: present.map(() => 0) };
        groups.set(id, group);
      }
      const totals = group.totals;
      present.forEach((column, i) => {
        totals[i] = (totals[i] ?? 0) + toAmount(row[column] ?? null);
      });
    }

    return createDataset(
      [groupColumn, ...present],
      [...groups.values()]
        .sort((a, b) => compareKeys(a.key, b.key))
        .map((g) => [g.key, ...g.totals]),
    );
  }

  rankingToDataset(ranking: RankingResult): Dataset {
    return createDataset(
      [ranking.groupColumn, ranking.valueColumn],
      ranking.entries.map((e) => [e.key, e.total]),
    );
  }

  trendToDataset(trend: TrendResult): Dataset {
    return createDataset(
      ['period', trend.valueColumn, 'growth_rate'],
      trend.entries.map((e) => [e.period, e.total, e.growthRate]),
    );
  }

  private dateRange(dataset: Dataset, dateColumn: string): DateRange | null {
    if (!hasColumn(dataset, dateColumn)) return null;

    let range: DateRange | null = null;
    for (const value of columnValues(dataset, dateColumn)) {
      if (!isValidDate(value)) continue;
      if (!range) {
        range = { start: value, end: value };
        continue;
      }
      if (value.getTime() < range.start.getTime()) range.start = value;
      if (value.getTime() > range.end.getTime()) range.end = value;
    }
    return range;
  }

  /**
   * A column is numeric when it holds at least one number and nothing but
   * numbers besides empty cells.
   */
  private numericSummary(dataset: Dataset): Record<string, NumericColumnSummary> | null {
    const summary: Record<string, NumericColumnSummary> = {};

    for (const column of dataset.columns) {
      const values = columnValues(dataset, column).filter((v) => v !== null);
      if (values.length === 0) continue;
      const numbers = values.filter(isNumber);
      const allNumeric = values.every((v) => typeof v === 'number');
      if (!allNumeric || numbers.length === 0) continue;
      summary[column] = this.describe(numbers);
    }

    return Object.keys(summary).length > 0 ? summary : null;
  }

  private describe(values: number[]): NumericColumnSummary {
    const sorted = [...values].sort((a, b) => a - b);
    const count = sorted.length;
    const mean = sorted.reduce((a, b) => a + b, 0) / count;
    const std = count < 2
      ? null
      : Math.sqrt(sorted.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (count - 1));

    return {
      count,
      mean,
      std,
      min: sorted[0] ?? 0,
      p25: quantile(sorted, 0.25),
      p50: quantile(sorted, 0.5),
      p75: quantile(sorted, 0.75),
      max: sorted[count - 1] ?? 0,
    };
  }
}
