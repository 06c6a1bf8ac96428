import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  NamedDataset,
  ReportConfig,
  ReportOutcome,
  WorkbookModel,
  WorksheetModel,
} from '@sheetreport/shared';
import { REPORT_DEFAULTS, uniqueSheetName } from '@sheetreport/shared';
import { SheetPopulatorService } from '../sheet/sheet-populator.service';
import { StylePolicyService } from '../sheet/style-policy.service';
import { ChartBinderService } from '../chart/chart-binder.service';
import { ReportAnalyzerService } from '../analysis/report-analyzer.service';
import { SummaryComposerService } from '../summary/summary-composer.service';
import { ReportWriterService } from '../export/report-writer.service';
import { ClockService } from '../../common/services/clock.service';
import { errorMessage, toReportFailure } from '../../common/errors/report-errors';

interface ChartTally {
  bound: number;
  skipped: number;
}

/**
 * Assembles a complete report: one sheet per dataset in the order given,
 * optional charts, the executive summary last, then a single save.
 */
@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  constructor(
    private readonly populator: SheetPopulatorService,
    private readonly stylePolicy: StylePolicyService,
    private readonly chartBinder: ChartBinderService,
    private readonly analyzer: ReportAnalyzerService,
    private readonly summaryComposer: SummaryComposerService,
    private readonly writer: ReportWriterService,
    private readonly clock: ClockService,
    private readonly config: ConfigService,
  ) {}

  /** Never throws: every failure comes back as `{ success: false }` */
  async generate(reportConfig: ReportConfig, datasets: NamedDataset[]): Promise<ReportOutcome> {
    const config: Readonly<ReportConfig> = Object.freeze({ ...reportConfig, charts: [...reportConfig.charts] });

    try {
      const workbook = this.createWorkbook(config);
      const sheetsByDataset = new Map<string, WorksheetModel>();

      for (const { name, dataset } of datasets) {
        const sheet = this.addSheet(workbook, name);
        this.populator.populate(sheet, dataset);
        if (config.autoFormat) {
          this.stylePolicy.format(sheet);
        }
        // A repeated name stays bound to its first sheet
        if (!sheetsByDataset.has(name)) {
          sheetsByDataset.set(name, sheet);
        }
      }

      const charts = config.includeCharts
        ? this.bindCharts(config, sheetsByDataset)
        : { bound: 0, skipped: 0 };

      if (config.includeSummary && datasets.length > 0) {
        this.addSummary(workbook, config, datasets, sheetsByDataset);
      } else if (config.includeSummary) {
        this.logger.warn('No datasets supplied; summary sheet skipped');
      }

      const saved = await this.writer.save(workbook, config.outputPath);
      if (!saved.success) {
        return saved;
      }

      this.logger.log(`Report '${config.title}' generated with ${workbook.sheets.length} sheets`);
      return {
        success: true,
        outputPath: saved.outputPath,
        sheetNames: workbook.sheets.map((s) => s.name),
        chartsBound: charts.bound,
        chartsSkipped: charts.skipped,
      };
    } catch (err) {
      this.logger.error(`Report generation failed: ${errorMessage(err)}`);
      return toReportFailure(err);
    }
  }

  private createWorkbook(config: Readonly<ReportConfig>): WorkbookModel {
    const workbook: WorkbookModel = {
      sheets: [],
      properties: {
        title: config.title,
        creator: this.config.get<string>('REPORT_CREATOR') ?? REPORT_DEFAULTS.CREATOR,
        created: this.clock.now(),
      },
    };
    this.logger.log('Workbook created');
    return workbook;
  }

  private addSheet(workbook: WorkbookModel, requested: string): WorksheetModel {
    const name = uniqueSheetName(requested, workbook.sheets.map((s) => s.name));
    if (name !== requested) {
      this.logger.warn(`Sheet name '${requested}' stored as '${name}'`);
    }
    const sheet = this.populator.createSheet(name);
    workbook.sheets.push(sheet);
    return sheet;
  }

  private bindCharts(
    config: Readonly<ReportConfig>,
    sheetsByDataset: Map<string, WorksheetModel>,
  ): ChartTally {
    const tally: ChartTally = { bound: 0, skipped: 0 };
    for (const request of config.charts) {
      const sheet = sheetsByDataset.get(request.sheet);
      if (!sheet) {
        this.logger.warn(`Chart '${request.title}' skipped: no sheet '${request.sheet}'`);
        tally.skipped++;
        continue;
      }
      const binding = this.chartBinder.bind(sheet, request.kind, request.range, request.title, request.anchor);
      if (binding.status === 'bound') tally.bound++;
      else tally.skipped++;
    }
    return tally;
  }

  private addSummary(
    workbook: WorkbookModel,
    config: Readonly<ReportConfig>,
    datasets: NamedDataset[],
    sheetsByDataset: Map<string, WorksheetModel>,
  ): void {
    const source = this.resolveSummarySource(config, datasets);
    const stats = this.analyzer.summaryStats(source.dataset, config.summaryDateColumn);
    const name = uniqueSheetName(REPORT_DEFAULTS.SUMMARY_SHEET_NAME, workbook.sheets.map((s) => s.name));

    const summary = this.summaryComposer.compose(
      stats,
      config,
      {
        generatedAt: this.clock.now(),
        sheetCount: workbook.sheets.length,
        sourceSheet: sheetsByDataset.get(source.name)?.name ?? source.name,
      },
      name,
    );
    workbook.sheets.push(summary);
  }

  /** The configured summary source, falling back to the first dataset */
  private resolveSummarySource(config: Readonly<ReportConfig>, datasets: NamedDataset[]): NamedDataset {
    const [first, ...rest] = datasets;
    if (!first) {
      throw new Error('Summary requested without datasets');
    }
    if (!config.summarySourceSheet) return first;

    const match = [first, ...rest].find((d) => d.name === config.summarySourceSheet);
    if (!match) {
      this.logger.warn(`Summary source '${config.summarySourceSheet}' not found; using '${first.name}'`);
      return first;
    }
    return match;
  }
}
