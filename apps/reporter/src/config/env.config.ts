import { z } from 'zod';
import { REPORT_DEFAULTS } from '@sheetreport/shared';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  REPORT_OUTPUT_DIR: z.string().min(1).default('reports'),
  REPORT_COMPANY_NAME: z.string().min(1).default(REPORT_DEFAULTS.COMPANY_NAME),
  REPORT_CREATOR: z.string().min(1).default(REPORT_DEFAULTS.CREATOR),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}

/** Levels enabled for a configured minimum level, most severe first */
export function enabledLogLevels(level: LogLevelName): LogLevelName[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
