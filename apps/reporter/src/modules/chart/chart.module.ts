import { Module } from '@nestjs/common';
import { ChartBinderService } from './chart-binder.service';

@Module({
  providers: [ChartBinderService],
  exports: [ChartBinderService],
})
export class ChartModule {}
