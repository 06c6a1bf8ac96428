/** Sheet dimension limits (Excel-compatible) */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
  MAX_COLS: 16_384,
  MAX_NAME_LENGTH: 31,
} as const;

/** Column auto-width rules, in character units */
export const COLUMN_WIDTH = {
  PADDING: 2,
  MAX: 50,
} as const;

/** Report-level defaults */
export const REPORT_DEFAULTS = {
  COMPANY_NAME: 'Company XYZ',
  SUMMARY_SHEET_NAME: 'Executive Summary',
  SUMMARY_DATE_COLUMN: 'date',
  /** Columns the summary title is merged across (A..E) */
  SUMMARY_TITLE_SPAN: 5,
  CREATOR: 'sheetreport',
  TOP_N: 5,
} as const;

/** Chart placement and appearance defaults */
export const CHART_DEFAULTS = {
  STYLE: 10,
  /** Default source columns: A..B */
  START_COL: 0,
  END_COL: 1,
  /** Anchor row index (0-based): the second sheet row */
  ANCHOR_ROW: 1,
  /** Blank columns kept between the data and the chart */
  ANCHOR_GAP_COLS: 1,
  WIDTH_COLS: 8,
  HEIGHT_ROWS: 15,
} as const;
