import { Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import type { CellFormat, CellValue, WorkbookModel, WorksheetModel } from '@sheetreport/shared';
import { CELL_DATE_NUMBER_FORMAT, isValidDate } from '@sheetreport/shared';

function toArgb(hex: string): string {
  return hex.replace('#', 'FF');
}

@Injectable()
export class XlsxExportService {
  private readonly logger = new Logger(XlsxExportService.name);

  /** Encode the workbook model as an XLSX buffer (no disk writes, no charts) */
  async exportToBuffer(model: WorkbookModel): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    workbook.title = model.properties.title;
    workbook.creator = model.properties.creator;
    workbook.created = model.properties.created;
    workbook.modified = model.properties.created;

    for (const sheet of model.sheets) {
      this.writeSheet(workbook.addWorksheet(sheet.name), sheet);
    }

    const buffer = await workbook.xlsx.writeBuffer();
    this.logger.debug(`XLSX encoded (${model.sheets.length} sheets, ${buffer.byteLength} bytes)`);
    return Buffer.from(buffer);
  }

  private writeSheet(ws: ExcelJS.Worksheet, sheet: WorksheetModel): void {
    // Set column widths
    for (const [colIdx, width] of Object.entries(sheet.columnWidths)) {
      ws.getColumn(parseInt(colIdx, 10) + 1).width = width;
    }

    // Write cells
    sheet.rows.forEach((row, rowIdx) => {
      row.forEach((value, colIdx) => {
        this.writeValue(ws.getCell(rowIdx + 1, colIdx + 1), value);
      });
    });

    for (const [ref, format] of Object.entries(sheet.formats)) {
      this.applyFormat(ws.getCell(ref), format);
    }

    // Apply merges
    for (const merge of sheet.merges) {
      ws.mergeCells(
        merge.startRow + 1, merge.startCol + 1,
        merge.endRow + 1, merge.endCol + 1,
      );
    }
  }

  private writeValue(wsCell: ExcelJS.Cell, value: CellValue): void {
    if (value === null) return;
    if (value instanceof Date) {
      if (!isValidDate(value)) {
        this.logger.warn(`Invalid date left empty at ${wsCell.address}`);
        return;
      }
      wsCell.value = value;
      wsCell.numFmt = CELL_DATE_NUMBER_FORMAT;
      return;
    }
    wsCell.value = value;
  }

  private applyFormat(wsCell: ExcelJS.Cell, format: CellFormat): void {
    const { bold, fontSize, fontColor, bgColor, alignment, verticalAlignment, border, numberFormat } = format;

    if (bold || fontSize || fontColor) {
      wsCell.font = {
        bold,
        size: fontSize,
        color: fontColor ? { argb: toArgb(fontColor) } : undefined,
      };
    }
    if (bgColor) {
      wsCell.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: toArgb(bgColor) },
      };
    }
    if (alignment || verticalAlignment) {
      wsCell.alignment = { horizontal: alignment, vertical: verticalAlignment };
    }
    if (border) {
      const edge = (e: typeof border.top) =>
        e ? { style: e.style, color: e.color ? { argb: toArgb(e.color) } : undefined } : undefined;
      wsCell.border = {
        top: edge(border.top),
        right: edge(border.right),
        bottom: edge(border.bottom),
        left: edge(border.left),
      };
    }
    if (numberFormat) {
      wsCell.numFmt = numberFormat;
    }
  }
}
