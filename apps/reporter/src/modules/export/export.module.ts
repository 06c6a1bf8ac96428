import { Module } from '@nestjs/common';
import { XlsxExportService } from './xlsx-export.service';
import { ChartPartWriterService } from './chart-part-writer.service';
import { ReportWriterService } from './report-writer.service';

@Module({
  providers: [XlsxExportService, ChartPartWriterService, ReportWriterService],
  exports: [ReportWriterService],
})
export class ExportModule {}
