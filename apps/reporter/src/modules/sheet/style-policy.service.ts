import { Injectable, Logger } from '@nestjs/common';
import type { CellFormat, WorksheetModel } from '@sheetreport/shared';
import {
  COLUMN_WIDTH,
  HEADER_FORMAT,
  SECTION_FORMAT,
  THIN_BORDER_FORMAT,
  TITLE_FORMAT,
  buildCellRef,
  measureCell,
  mergeCellFormat,
  sheetDimensions,
} from '@sheetreport/shared';

/** Positions the style policy knows how to format */
export type CellPosition = 'header' | 'body' | 'title' | 'section';

const POSITION_FORMATS: Record<CellPosition, Readonly<CellFormat>> = {
  header: HEADER_FORMAT,
  body: THIN_BORDER_FORMAT,
  title: TITLE_FORMAT,
  section: SECTION_FORMAT,
};

@Injectable()
export class StylePolicyService {
  private readonly logger = new Logger(StylePolicyService.name);

  /** Formatting directive for a sheet position */
  styleFor(position: CellPosition): CellFormat {
    return structuredClone(POSITION_FORMATS[position]);
  }

  /**
   * Apply header styling, borders and column widths. Merged ranges are
   * bordered in full, also past the last written column. Idempotent: formats
   * are merged into existing cell formats with the same values each time.
   */
  format(sheet: WorksheetModel): void {
    const { rowCount, colCount } = sheetDimensions(sheet);
    const styleHeader = sheet.layout === 'tabular' && rowCount > 0;

    if (styleHeader) {
      for (let col = 0; col < sheet.headers.length; col++) {
        mergeCellFormat(sheet, buildCellRef(col, 0), this.styleFor('header'));
      }
    }

    for (let row = 0; row < rowCount; row++) {
      for (let col = 0; col < colCount; col++) {
        mergeCellFormat(sheet, buildCellRef(col, row), this.styleFor('body'));
      }
    }

    for (const merge of sheet.merges) {
      for (let row = merge.startRow; row <= merge.endRow; row++) {
        for (let col = merge.startCol; col <= merge.endCol; col++) {
          mergeCellFormat(sheet, buildCellRef(col, row), this.styleFor('body'));
        }
      }
    }

    for (let col = 0; col < colCount; col++) {
      sheet.columnWidths[col] = this.columnWidth(sheet, col);
    }

    sheet.styleState = { headerStyled: styleHeader, bordersApplied: true };
    this.logger.log(`Formatting applied to sheet '${sheet.name}'`);
  }

  /**
   * min(longest + padding, max), floored at the header label's own length.
   * Cells that cannot be stringified measure as zero.
   */
  columnWidth(sheet: WorksheetModel, col: number): number {
    let longest = 0;
    for (const row of sheet.rows) {
      longest = Math.max(longest, measureCell(row[col]));
    }
    const headerLength = sheet.layout === 'tabular' ? measureCell(sheet.headers[col]) : 0;
    return Math.max(Math.min(longest + COLUMN_WIDTH.PADDING, COLUMN_WIDTH.MAX), headerLength);
  }
}
