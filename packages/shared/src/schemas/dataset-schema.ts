import { z } from 'zod';
import { cellValueSchema, jsonCellValueSchema } from './cell-schema';

const columnsSchema = z.array(z.string().min(1)).superRefine((columns, ctx) => {
  const seen = new Set<string>();
  columns.forEach((column, i) => {
    if (seen.has(column)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i],
        message: `Duplicate column name "${column}"`,
      });
    }
    seen.add(column);
  });
});

/** In-memory Dataset: every row carries every declared column */
export const datasetSchema = z.object({
  columns: columnsSchema,
  rows: z.array(z.record(z.string(), cellValueSchema)),
}).superRefine((dataset, ctx) => {
  dataset.rows.forEach((row, rowIdx) => {
    for (const column of dataset.columns) {
      if (!(column in row)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', rowIdx, column],
          message: `Row is missing column "${column}"`,
        });
      }
    }
  });
});

/**
 * Dataset in a report definition file. Rows are positional; values of the
 * `dateColumns` are ISO 8601 strings or epoch milliseconds.
 */
export const datasetInputSchema = z.object({
  name: z.string().min(1),
  columns: columnsSchema,
  rows: z.array(z.array(jsonCellValueSchema)).default([]),
  dateColumns: z.array(z.string().min(1)).default([]),
}).superRefine((input, ctx) => {
  input.rows.forEach((row, rowIdx) => {
    if (row.length !== input.columns.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rows', rowIdx],
        message: `Expected ${input.columns.length} values, received ${row.length}`,
      });
    }
  });
  input.dateColumns.forEach((column, i) => {
    if (!input.columns.includes(column)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dateColumns', i],
        message: `Unknown date column "${column}"`,
      });
    }
  });
});

export type DatasetSchemaInput = z.infer<typeof datasetSchema>;
export type DatasetInput = z.infer<typeof datasetInputSchema>;
