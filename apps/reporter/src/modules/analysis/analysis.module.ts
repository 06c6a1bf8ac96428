import { Module } from '@nestjs/common';
import { ReportAnalyzerService } from './report-analyzer.service';

@Module({
  providers: [ReportAnalyzerService],
  exports: [ReportAnalyzerService],
})
export class AnalysisModule {}
