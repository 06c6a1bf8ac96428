import { Module } from '@nestjs/common';
import { SheetPopulatorService } from './sheet-populator.service';
import { StylePolicyService } from './style-policy.service';

@Module({
  providers: [SheetPopulatorService, StylePolicyService],
  exports: [SheetPopulatorService, StylePolicyService],
})
export class SheetModule {}
