import { Module } from '@nestjs/common';
import { SheetModule } from '../sheet/sheet.module';
import { SummaryComposerService } from './summary-composer.service';

@Module({
  imports: [SheetModule],
  providers: [SummaryComposerService],
  exports: [SummaryComposerService],
})
export class SummaryModule {}
