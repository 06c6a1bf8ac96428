import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { format } from 'date-fns';
import type {
  CellValue,
  Dataset,
  DatasetInput,
  DerivedSheetInput,
  NamedDataset,
  ReportConfig,
  ReportDefinitionInput,
} from '@sheetreport/shared';
import { REPORT_DEFAULTS, createDataset, parseDateInput, reportDefinitionSchema } from '@sheetreport/shared';
import { ReportAnalyzerService } from '../analysis/report-analyzer.service';
import { ClockService } from '../../common/services/clock.service';
import { InvalidInputError, errorMessage } from '../../common/errors/report-errors';

export interface LoadedReport {
  config: ReportConfig;
  datasets: NamedDataset[];
}

export interface LoadOptions {
  /** Takes precedence over the definition's own outputPath */
  outputPath?: string;
}

/** Lowercase, underscore-separated file stem for a report title */
export function reportFileStem(title: string): string {
  const stem = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return stem || 'report';
}

/**
 * Reads a report definition file and turns it into engine input: the config
 * with every default resolved, plus the datasets in sheet order with derived
 * sheets after the ones they come from.
 */
@Injectable()
export class ReportInputService {
  private readonly logger = new Logger(ReportInputService.name);

  constructor(
    private readonly analyzer: ReportAnalyzerService,
    private readonly clock: ClockService,
    private readonly config: ConfigService,
  ) {}

  async load(definitionPath: string, options: LoadOptions = {}): Promise<LoadedReport> {
    let raw: string;
    try {
      raw = await readFile(definitionPath, 'utf8');
    } catch (err) {
      throw new InvalidInputError(`Cannot read report definition ${definitionPath}: ${errorMessage(err)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new InvalidInputError(`Report definition ${definitionPath} is not valid JSON: ${errorMessage(err)}`);
    }

    const loaded = this.fromDefinition(json, options);
    this.logger.log(`Loaded definition '${loaded.config.title}' with ${loaded.datasets.length} datasets`);
    return loaded;
  }

  /** Validate an already-parsed definition */
  fromDefinition(json: unknown, options: LoadOptions = {}): LoadedReport {
    const parsed = reportDefinitionSchema.safeParse(json);
    if (!parsed.success) {
      throw InvalidInputError.fromZod('Report definition', parsed.error);
    }
    const definition = parsed.data;

    const datasets = definition.datasets.map((input) => ({
      name: input.name,
      dataset: this.toDataset(input),
    }));

    return {
      config: this.resolveConfig(definition.config, options),
      datasets: this.appendDerived(datasets, definition.derived),
    };
  }

  private resolveConfig(input: ReportDefinitionInput['config'], options: LoadOptions): ReportConfig {
    const outputPath = options.outputPath ?? input.outputPath ?? this.defaultOutputPath(input.title);
    const companyName = input.companyName
      ?? this.config.get<string>('REPORT_COMPANY_NAME')
      ?? REPORT_DEFAULTS.COMPANY_NAME;

    return {
      title: input.title,
      outputPath,
      includeCharts: input.includeCharts,
      includeSummary: input.includeSummary,
      autoFormat: input.autoFormat,
      companyName,
      summarySourceSheet: input.summarySourceSheet,
      summaryDateColumn: input.summaryDateColumn,
      charts: input.charts,
    };
  }

  private defaultOutputPath(title: string): string {
    const dir = this.config.get<string>('REPORT_OUTPUT_DIR') ?? 'reports';
    const stamp = format(this.clock.now(), 'yyyyMMdd_HHmmss');
    return path.join(dir, `${reportFileStem(title)}_${stamp}.xlsx`);
  }

  /** Positional JSON rows to a Dataset, reviving the declared date columns */
  private toDataset(input: DatasetInput): Dataset {
    const dateIndexes = new Set(input.dateColumns.map((c) => input.columns.indexOf(c)));
    const issues: Array<{ path: string; message: string }> = [];

    const rows = input.rows.map((values, rowIdx) =>
      values.map((value, colIdx): CellValue => {
        if (!dateIndexes.has(colIdx) || value === null) return value;
        const date = parseDateInput(value);
        if (!date) {
          issues.push({
            path: `datasets.${input.name}.rows.${rowIdx}.${colIdx}`,
            message: `"${value}" is not a date`,
          });
        }
        return date;
      }),
    );

    if (issues.length > 0) {
      const formatted = issues.map((i) => `  ${i.path}: ${i.message}`).join('\n');
      throw new InvalidInputError(`Dataset '${input.name}' has invalid dates:\n${formatted}`, issues);
    }
    return createDataset(input.columns, rows);
  }

  private appendDerived(datasets: NamedDataset[], derived: DerivedSheetInput[]): NamedDataset[] {
    const result = [...datasets];
    for (const sheet of derived) {
      const source = datasets.find((d) => d.name === sheet.source);
      if (!source) {
        throw new InvalidInputError(`Derived sheet '${sheet.name}' has unknown source '${sheet.source}'`);
      }
      result.push({ name: sheet.name, dataset: this.derive(source.dataset, sheet) });
    }
    return result;
  }

  private derive(dataset: Dataset, sheet: DerivedSheetInput): Dataset {
    switch (sheet.type) {
      case 'top':
        return this.analyzer.rankingToDataset(
          this.analyzer.topPerformers(dataset, sheet.groupColumn, sheet.valueColumn, sheet.n),
        );
      case 'trend':
        return this.analyzer.trendToDataset(
          this.analyzer.trend(dataset, sheet.dateColumn, sheet.valueColumn),
        );
      case 'groupTotals':
        return this.analyzer.groupTotals(dataset, sheet.groupColumn, sheet.valueColumns);
    }
  }
}
