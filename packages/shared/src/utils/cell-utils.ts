import { SHEET_LIMITS } from '../constants/limits';
import { formatCellDate, isValidDate } from './date-utils';

/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Convert Excel column letter(s) to 0-based index: A→0, Z→25, AA→26
 */
export function letterToColIndex(letter: string): number {
  let result = 0;
  for (let i = 0; i < letter.length; i++) {
    result = result * 26 + (letter.charCodeAt(i) - 64);
  }
  return result - 1;
}

/**
 * Parse cell reference like "A1" into { col: 0, row: 0 }
 */
export function parseCellRef(ref: string): { col: number; row: number } {
  const match = ref.match(/^([A-Z]{1,3})(\d{1,7})$/);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid cell reference: ${ref}`);
  }
  return {
    col: letterToColIndex(match[1]),
    row: parseInt(match[2], 10) - 1,
  };
}

/**
 * Build cell reference from col/row indices: (0, 0) → "A1"
 */
export function buildCellRef(col: number, row: number): string {
  return `${colIndexToLetter(col)}${row + 1}`;
}

function quoteSheetName(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

/** Build an absolute cell reference: ('Data', 1, 0) → 'Data'!$B$1 */
export function buildAbsoluteRef(sheetName: string, col: number, row: number): string {
  return `${quoteSheetName(sheetName)}!$${colIndexToLetter(col)}$${row + 1}`;
}

/** Build an absolute range reference: ('Data', 0, 0, 1, 9) → 'Data'!$A$1:$B$10 */
export function buildAbsoluteRange(
  sheetName: string,
  startCol: number,
  startRow: number,
  endCol: number,
  endRow: number,
): string {
  const start = `$${colIndexToLetter(startCol)}$${startRow + 1}`;
  const end = `$${colIndexToLetter(endCol)}$${endRow + 1}`;
  return `${quoteSheetName(sheetName)}!${start}:${end}`;
}

/**
 * Sanitize sheet name: remove invalid characters, limit length
 */
export function sanitizeSheetName(name: string): string {
  return name
    .replace(/[\\/*?[\]:]/g, '_')
    .slice(0, SHEET_LIMITS.MAX_NAME_LENGTH)
    .trim() || 'Sheet';
}

/**
 * Sanitize a sheet name and suffix it with " (2)", " (3)"... until it does
 * not collide (case-insensitively) with `existing`.
 */
export function uniqueSheetName(name: string, existing: Iterable<string>): string {
  const taken = new Set([...existing].map((n) => n.toLowerCase()));
  const base = sanitizeSheetName(name);
  if (!taken.has(base.toLowerCase())) return base;

  for (let i = 2; ; i++) {
    const suffix = ` (${i})`;
    const candidate = `${base.slice(0, SHEET_LIMITS.MAX_NAME_LENGTH - suffix.length)}${suffix}`;
    if (!taken.has(candidate.toLowerCase())) return candidate;
  }
}

/**
 * Stringify a cell value the way it is measured for column widths.
 * Returns null when the value cannot be stringified (invalid date, objects,
 * symbols); callers treat that as an empty cell.
 */
export function stringifyCell(value: unknown): string | null {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return isValidDate(value) ? formatCellDate(value) : null;
  }
  return null;
}

/** Character length of a cell for width computation; 0 when malformed */
export function measureCell(value: unknown): number {
  return stringifyCell(value)?.length ?? 0;
}
