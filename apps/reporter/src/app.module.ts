import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { ReportModule } from './modules/report/report.module';
import { InputModule } from './modules/input/input.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ReportModule,
    InputModule,
  ],
})
export class AppModule { }
