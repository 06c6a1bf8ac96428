import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { ClockService } from '../../common/services/clock.service';
import { ReportInputService } from './report-input.service';

@Module({
  imports: [AnalysisModule],
  providers: [ReportInputService, ClockService],
  exports: [ReportInputService],
})
export class InputModule {}
