export {
  SHEET_LIMITS,
  COLUMN_WIDTH,
  REPORT_DEFAULTS,
  CHART_DEFAULTS,
} from './limits';

export {
  REPORT_COLORS,
  HEADER_FORMAT,
  THIN_BORDER_FORMAT,
  TITLE_FORMAT,
  SECTION_FORMAT,
} from './style';
