import type { ChartRequest } from './chart-types';

/** Report-level configuration; frozen once handed to the engine */
export interface ReportConfig {
  title: string;
  outputPath: string;
  includeCharts: boolean;
  includeSummary: boolean;
  autoFormat: boolean;
  companyName: string;
  /** Dataset the executive summary analyzes. Defaults to the first one. */
  summarySourceSheet?: string;
  summaryDateColumn: string;
  charts: ChartRequest[];
}

export const REPORT_ERROR_CODES = [
  'INVALID_INPUT',
  'SERIALIZATION_FAILED',
  'OUTPUT_UNWRITABLE',
  'REPORT_FAILED',
] as const;
export type ReportErrorCode = (typeof REPORT_ERROR_CODES)[number];

export interface ReportFailure {
  success: false;
  error: {
    code: ReportErrorCode;
    message: string;
    details?: unknown;
  };
}

export interface SaveSuccess {
  success: true;
  outputPath: string;
  bytesWritten: number;
}

export type SaveResult = SaveSuccess | ReportFailure;

export interface ReportSuccess {
  success: true;
  outputPath: string;
  sheetNames: string[];
  chartsBound: number;
  chartsSkipped: number;
}

export type ReportOutcome = ReportSuccess | ReportFailure;
