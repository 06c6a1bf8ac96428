import { Injectable, Logger } from '@nestjs/common';
import type { ReportConfig, SummaryStats, WorksheetModel } from '@sheetreport/shared';
import { REPORT_DEFAULTS, formatDisplayDate, formatTimestamp } from '@sheetreport/shared';
import { SheetPopulatorService } from '../sheet/sheet-populator.service';
import { StylePolicyService } from '../sheet/style-policy.service';

export interface SummaryContext {
  generatedAt: Date;
  /** Data sheets in the workbook, the summary itself excluded */
  sheetCount: number;
  /** Sheet the statistics were computed from */
  sourceSheet: string;
}

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Builds the executive summary: a freeform sheet of labeled lines rather
 * than a table, formatted with borders and widths but no header row.
 */
@Injectable()
export class SummaryComposerService {
  private readonly logger = new Logger(SummaryComposerService.name);

  constructor(
    private readonly populator: SheetPopulatorService,
    private readonly stylePolicy: StylePolicyService,
  ) {}

  compose(
    stats: SummaryStats,
    config: ReportConfig,
    context: SummaryContext,
    name: string = REPORT_DEFAULTS.SUMMARY_SHEET_NAME,
  ): WorksheetModel {
    const sheet = this.populator.createSheet(name, 'freeform');

    this.populator.writeCell(
      sheet, 0, 0,
      `EXECUTIVE REPORT - ${config.companyName}`,
      this.stylePolicy.styleFor('title'),
    );
    sheet.merges.push({
      startRow: 0,
      startCol: 0,
      endRow: 0,
      endCol: REPORT_DEFAULTS.SUMMARY_TITLE_SPAN - 1,
    });
    this.populator.writeCell(sheet, 1, 0, config.title);
    this.populator.writeCell(sheet, 2, 0, `Generated at: ${formatTimestamp(context.generatedAt)}`);

    let row = 4;
    this.populator.writeCell(sheet, row, 0, 'GENERAL STATISTICS', this.stylePolicy.styleFor('section'));
    this.populator.writeCell(sheet, ++row, 0, `Source Sheet: ${context.sourceSheet}`);
    this.populator.writeCell(sheet, ++row, 0, `Total Records: ${stats.totalRecords}`);
    if (stats.dateRange) {
      const { start, end } = stats.dateRange;
      this.populator.writeCell(
        sheet, ++row, 0,
        `Period: ${formatDisplayDate(start)} to ${formatDisplayDate(end)}`,
      );
    }
    this.populator.writeCell(sheet, ++row, 0, `Sheets in Report: ${context.sheetCount}`);

    if (stats.numericSummary) {
      row += 2;
      this.populator.writeCell(sheet, row, 0, 'NUMERIC COLUMNS', this.stylePolicy.styleFor('section'));
      for (const [column, s] of Object.entries(stats.numericSummary)) {
        this.populator.writeCell(
          sheet, ++row, 0,
          `${column}: mean ${amountFormat.format(s.mean)}, min ${amountFormat.format(s.min)}, max ${amountFormat.format(s.max)}`,
        );
      }
    }

    this.stylePolicy.format(sheet);
    this.logger.log(`Summary sheet '${name}' composed from '${context.sourceSheet}'`);
    return sheet;
  }
}
