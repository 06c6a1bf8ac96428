/** Chart kinds the engine can render */
export const CHART_KINDS = ['bar', 'line'] as const;
export type ChartKind = (typeof CHART_KINDS)[number];

/** Source range of a chart, 0-based and inclusive */
export interface ChartRange {
  sheetName: string;
  startCol: number;
  endCol: number;
  startRow: number;
  endRow: number;
}

/** Chart bound to exactly one worksheet */
export interface ChartSpec {
  kind: ChartKind;
  title: string;
  source: ChartRange;
  /** Top-left cell the chart is drawn from, e.g. "E2" */
  anchor: string;
  /** First row of the source range holds the series titles */
  titlesFromData: true;
  style: number;
}

/** Outcome of binding a chart: bound, or skipped with the reason */
export type ChartBinding =
  | { status: 'bound'; chart: ChartSpec }
  | { status: 'skipped'; reason: string };

/** Chart requested by report configuration */
export interface ChartRequest {
  sheet: string;
  kind: string;
  title: string;
  range?: Omit<ChartRange, 'sheetName'>;
  anchor?: string;
}
