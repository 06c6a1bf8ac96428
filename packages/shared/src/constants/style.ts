import type { CellFormat } from '../types/cell-types';

/** Report palette (hex, `#RRGGBB`) */
export const REPORT_COLORS = {
  HEADER_BG: '#366092',
  HEADER_TEXT: '#FFFFFF',
  BORDER: '#000000',
} as const;

export const HEADER_FORMAT: Readonly<CellFormat> = {
  bold: true,
  fontColor: REPORT_COLORS.HEADER_TEXT,
  bgColor: REPORT_COLORS.HEADER_BG,
  alignment: 'center',
  verticalAlignment: 'middle',
};

export const THIN_BORDER_FORMAT: Readonly<CellFormat> = {
  border: {
    top: { style: 'thin' },
    right: { style: 'thin' },
    bottom: { style: 'thin' },
    left: { style: 'thin' },
  },
};

export const TITLE_FORMAT: Readonly<CellFormat> = { bold: true, fontSize: 16 };

export const SECTION_FORMAT: Readonly<CellFormat> = { bold: true };
