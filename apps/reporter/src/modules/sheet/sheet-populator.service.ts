import { Injectable, Logger } from '@nestjs/common';
import type { CellFormat, CellValue, Dataset, SheetLayout, WorksheetModel } from '@sheetreport/shared';
import { buildCellRef, createWorksheet, mergeCellFormat } from '@sheetreport/shared';

@Injectable()
export class SheetPopulatorService {
  private readonly logger = new Logger(SheetPopulatorService.name);

  createSheet(name: string, layout: SheetLayout = 'tabular'): WorksheetModel {
    return createWorksheet(name, layout);
  }

  /**
   * Write a dataset into a sheet: column names as row 1, then one row per
   * record in column order. Cell values keep their types.
   */
  populate(sheet: WorksheetModel, data: Dataset): void {
    sheet.headers = [...data.columns];
    sheet.rows = [
      [...data.columns],
      ...data.rows.map((row) => data.columns.map((column) => row[column] ?? null)),
    ];
    this.logger.log(`Sheet '${sheet.name}' populated with ${data.rows.length} records`);
  }

  /**
   * Write one cell of a freeform sheet (0-based row/col), growing the grid
   * with empty cells as needed.
   */
  writeCell(
    sheet: WorksheetModel,
    row: number,
    col: number,
    value: CellValue,
    format?: CellFormat,
  ): void {
    while (sheet.rows.length <= row) {
      sheet.rows.push([]);
    }
    const cells = sheet.rows[row] ?? [];
    while (cells.length < col) {
      cells.push(null);
    }
    cells[col] = value;
    sheet.rows[row] = cells;

    if (format) {
      mergeCellFormat(sheet, buildCellRef(col, row), format);
    }
  }
}
