#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { parseArgs } from 'util';
import { AppModule } from './app.module';
import { LOG_LEVELS, enabledLogLevels, type LogLevelName } from './config/env.config';
import { ReportInputService } from './modules/input/report-input.service';
import { ReportService } from './modules/report/report.service';
import { toReportFailure } from './common/errors/report-errors';

const USAGE = 'Usage: reporter <definition.json> [--output <path>]';

function isLogLevel(value: string | undefined): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: { output: { type: 'string', short: 'o' } },
    allowPositionals: true,
  });
  const [definitionPath] = positionals;
  if (!definitionPath) {
    logger.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const level = process.env['LOG_LEVEL'];
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: enabledLogLevels(isLogLevel(level) ? level : 'log'),
  });

  try {
    const input = app.get(ReportInputService);
    const reports = app.get(ReportService);

    const outcome = await input
      .load(definitionPath, { outputPath: values.output })
      .then(({ config, datasets }) => reports.generate(config, datasets))
      .catch(toReportFailure);

    if (outcome.success) {
      logger.log(
        `Wrote ${outcome.outputPath} (${outcome.sheetNames.length} sheets, `
        + `${outcome.chartsBound} charts, ${outcome.chartsSkipped} skipped)`,
      );
    } else {
      logger.error(`[${outcome.error.code}] ${outcome.error.message}`);
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed:', err);
  process.exit(1);
});
