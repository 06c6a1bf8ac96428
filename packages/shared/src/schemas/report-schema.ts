import { z } from 'zod';
import { REPORT_DEFAULTS } from '../constants/limits';
import { cellRangeSchema, cellRefSchema } from './cell-schema';
import { datasetInputSchema } from './dataset-schema';

/**
 * `kind` is an open string: unsupported kinds are skipped when
 * the chart is bound, not rejected here.
 */
export const chartRequestSchema = z.object({
  sheet: z.string().min(1),
  kind: z.string().min(1),
  title: z.string(),
  range: cellRangeSchema.optional(),
  anchor: cellRefSchema.optional(),
});

export const reportConfigSchema = z.object({
  title: z.string().min(1),
  outputPath: z.string().min(1),
  includeCharts: z.boolean().default(true),
  includeSummary: z.boolean().default(true),
  autoFormat: z.boolean().default(true),
  companyName: z.string().min(1).default(REPORT_DEFAULTS.COMPANY_NAME),
  summarySourceSheet: z.string().min(1).optional(),
  summaryDateColumn: z.string().min(1).default(REPORT_DEFAULTS.SUMMARY_DATE_COLUMN),
  charts: z.array(chartRequestSchema).default([]),
});

/** Sheets computed from another dataset of the same definition */
export const derivedSheetSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('top'),
    name: z.string().min(1),
    source: z.string().min(1),
    groupColumn: z.string().min(1),
    valueColumn: z.string().min(1),
    n: z.number().int().min(1).default(REPORT_DEFAULTS.TOP_N),
  }),
  z.object({
    type: z.literal('trend'),
    name: z.string().min(1),
    source: z.string().min(1),
    dateColumn: z.string().min(1),
    valueColumn: z.string().min(1),
  }),
  z.object({
    type: z.literal('groupTotals'),
    name: z.string().min(1),
    source: z.string().min(1),
    groupColumn: z.string().min(1),
    valueColumns: z.array(z.string().min(1)).min(1),
  }),
]);

/** Report definition file: config, the datasets, and sheets derived from them */
export const reportDefinitionSchema = z.object({
  config: reportConfigSchema.extend({
    outputPath: z.string().min(1).optional(),
    companyName: z.string().min(1).optional(),
  }),
  datasets: z.array(datasetInputSchema),
  derived: z.array(derivedSheetSchema).default([]),
}).superRefine((definition, ctx) => {
  const names = new Set<string>();
  definition.datasets.forEach((dataset, i) => {
    if (names.has(dataset.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['datasets', i, 'name'],
        message: `Duplicate dataset name "${dataset.name}"`,
      });
    }
    names.add(dataset.name);
  });
  definition.derived.forEach((sheet, i) => {
    if (!definition.datasets.some((d) => d.name === sheet.source)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['derived', i, 'source'],
        message: `Unknown source dataset "${sheet.source}"`,
      });
    }
    if (names.has(sheet.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['derived', i, 'name'],
        message: `Duplicate sheet name "${sheet.name}"`,
      });
    }
    names.add(sheet.name);
  });
});

export type ChartRequestInput = z.infer<typeof chartRequestSchema>;
export type ReportConfigInput = z.input<typeof reportConfigSchema>;
export type DerivedSheetInput = z.infer<typeof derivedSheetSchema>;
export type ReportDefinitionInput = z.infer<typeof reportDefinitionSchema>;
