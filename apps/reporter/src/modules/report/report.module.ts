import { Module } from '@nestjs/common';
import { SheetModule } from '../sheet/sheet.module';
import { ChartModule } from '../chart/chart.module';
import { AnalysisModule } from '../analysis/analysis.module';
import { SummaryModule } from '../summary/summary.module';
import { ExportModule } from '../export/export.module';
import { ClockService } from '../../common/services/clock.service';
import { ReportService } from './report.service';

@Module({
  imports: [SheetModule, ChartModule, AnalysisModule, SummaryModule, ExportModule],
  providers: [ReportService, ClockService],
  exports: [ReportService],
})
export class ReportModule {}
