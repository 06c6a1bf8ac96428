import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { SaveResult, WorkbookModel } from '@sheetreport/shared';
import { XlsxExportService } from './xlsx-export.service';
import { ChartPartWriterService } from './chart-part-writer.service';
import {
  OutputUnwritableError,
  SerializationError,
  errorMessage,
  toReportFailure,
} from '../../common/errors/report-errors';

/**
 * Persistence sink: encodes a workbook and writes it to disk. The file
 * appears at the target path only once it is complete.
 */
@Injectable()
export class ReportWriterService {
  private readonly logger = new Logger(ReportWriterService.name);

  constructor(
    private readonly xlsxExport: XlsxExportService,
    private readonly chartParts: ChartPartWriterService,
  ) {}

  async save(workbook: WorkbookModel, outputPath: string): Promise<SaveResult> {
    const target = path.resolve(outputPath);
    try {
      const bytes = await this.serialize(workbook);
      await this.writeAtomically(target, bytes);
      this.logger.log(`Report saved to ${target} (${bytes.length} bytes)`);
      return { success: true, outputPath: target, bytesWritten: bytes.length };
    } catch (err) {
      this.logger.error(`Failed to save report to ${target}: ${errorMessage(err)}`);
      return toReportFailure(err);
    }
  }

  async serialize(workbook: WorkbookModel): Promise<Buffer> {
    try {
      const xlsx = await this.xlsxExport.exportToBuffer(workbook);
      return await this.chartParts.embedCharts(xlsx, workbook.sheets);
    } catch (err) {
      throw new SerializationError(`Workbook serialization failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Write to a sibling temp file, then rename it over the target */
  private async writeAtomically(target: string, bytes: Buffer): Promise<void> {
    const dir = path.dirname(target);
    const tempPath = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, target);
    } catch (err) {
      await this.removeTemp(tempPath);
      throw new OutputUnwritableError(target, `Cannot write report to ${target}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (err) {
      this.logger.warn(`Could not remove temp file ${tempPath}: ${errorMessage(err)}`);
    }
  }
}
