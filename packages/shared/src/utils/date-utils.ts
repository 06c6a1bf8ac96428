import { format, isValid, parseISO, startOfMonth } from 'date-fns';

/** Cell date rendering, also used to measure date cells */
export const CELL_DATE_PATTERN = 'yyyy-MM-dd HH:mm:ss';
/** Same pattern in spreadsheet number-format syntax */
export const CELL_DATE_NUMBER_FORMAT = 'yyyy-mm-dd hh:mm:ss';

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && isValid(value);
}

export function formatCellDate(date: Date): string {
  return format(date, CELL_DATE_PATTERN);
}

/** dd/MM/yyyy */
export function formatDisplayDate(date: Date): string {
  return format(date, 'dd/MM/yyyy');
}

/** dd/MM/yyyy HH:mm */
export function formatTimestamp(date: Date): string {
  return format(date, 'dd/MM/yyyy HH:mm');
}

/** Calendar-month bucket of a date, in local time */
export function monthBucket(date: Date): { period: string; periodStart: Date } {
  return { period: format(date, 'yyyy-MM'), periodStart: startOfMonth(date) };
}

/**
 * Parse a date cell from an input file. Strings must be ISO 8601; a
 * date-only or offset-less string is read in local time. Numbers are epoch
 * milliseconds. Returns null for anything else.
 */
export function parseDateInput(value: string | number): Date | null {
  const date = typeof value === 'number' ? new Date(value) : parseISO(value);
  return isValid(date) ? date : null;
}
