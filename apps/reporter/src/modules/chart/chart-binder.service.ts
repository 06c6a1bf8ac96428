import { Injectable, Logger } from '@nestjs/common';
import type {
  CellRange,
  ChartBinding,
  ChartKind,
  ChartSpec,
  WorksheetModel,
} from '@sheetreport/shared';
import {
  CHART_DEFAULTS,
  CHART_KINDS,
  buildCellRef,
  cellRefSchema,
  sheetDimensions,
} from '@sheetreport/shared';

function isChartKind(kind: string): kind is ChartKind {
  return CHART_KINDS.some((k) => k === kind);
}

/**
 * Binds chart definitions to sheet ranges. Charts are decoration: anything
 * that cannot be bound is skipped with a reason, never raised.
 */
@Injectable()
export class ChartBinderService {
  private readonly logger = new Logger(ChartBinderService.name);

  /**
   * @param range - 0-based source range; defaults to columns A..B over every
   *   written row. Its first row holds the series titles.
   * @param anchor - top-left cell of the chart; defaults to the second row,
   *   one blank column right of the data.
   */
  bind(
    sheet: WorksheetModel,
    kind: string,
    range: CellRange | undefined,
    title: string,
    anchor?: string,
  ): ChartBinding {
    if (!isChartKind(kind)) {
      return this.skip(sheet, `Unsupported chart kind "${kind}"`);
    }

    const { rowCount, colCount } = sheetDimensions(sheet);
    if (rowCount < 2 || colCount === 0) {
      return this.skip(sheet, `Sheet '${sheet.name}' has no data rows to chart`);
    }

    const source = range ?? {
      startCol: CHART_DEFAULTS.START_COL,
      endCol: Math.min(CHART_DEFAULTS.END_COL, colCount - 1),
      startRow: 0,
      endRow: rowCount - 1,
    };
    if (source.endCol >= colCount || source.endRow >= rowCount) {
      return this.skip(
        sheet,
        `Range ${buildCellRef(source.startCol, source.startRow)}:${buildCellRef(source.endCol, source.endRow)} is outside sheet '${sheet.name}'`,
      );
    }
    if (source.endRow === source.startRow) {
      return this.skip(sheet, 'Range has a title row but no values');
    }

    const chartAnchor = anchor ?? buildCellRef(colCount + CHART_DEFAULTS.ANCHOR_GAP_COLS, CHART_DEFAULTS.ANCHOR_ROW);
    if (!cellRefSchema.safeParse(chartAnchor).success) {
      return this.skip(sheet, `Invalid chart anchor "${chartAnchor}"`);
    }

    const chart: ChartSpec = {
      kind,
      title,
      source: { sheetName: sheet.name, ...source },
      anchor: chartAnchor,
      titlesFromData: true,
      style: CHART_DEFAULTS.STYLE,
    };
    sheet.charts.push(chart);
    this.logger.log(`Chart '${kind}' bound to sheet '${sheet.name}' at ${chartAnchor}`);
    return { status: 'bound', chart };
  }

  private skip(sheet: WorksheetModel, reason: string): ChartBinding {
    this.logger.warn(`Chart skipped on sheet '${sheet.name}': ${reason}`);
    return { status: 'skipped', reason };
  }
}
