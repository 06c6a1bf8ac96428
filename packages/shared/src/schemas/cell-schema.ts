import { z } from 'zod';

/** In-memory cell value: dates are real `Date` instances */
export const cellValueSchema = z.union([z.string(), z.number(), z.date(), z.null()]);

/** Cell value as it appears in a JSON input file */
export const jsonCellValueSchema = z.union([z.string(), z.number(), z.null()]);

export const cellRangeSchema = z.object({
  startRow: z.number().int().min(0),
  startCol: z.number().int().min(0),
  endRow: z.number().int().min(0),
  endCol: z.number().int().min(0),
}).refine(
  (r) => r.endRow >= r.startRow && r.endCol >= r.startCol,
  { message: 'End must be >= start in range' },
);

export const cellRefSchema = z.string().regex(/^[A-Z]{1,3}\d{1,7}$/, 'Expected an A1-style cell reference');

export type CellValueInput = z.infer<typeof cellValueSchema>;
export type JsonCellValueInput = z.infer<typeof jsonCellValueSchema>;
export type CellRangeInput = z.infer<typeof cellRangeSchema>;
