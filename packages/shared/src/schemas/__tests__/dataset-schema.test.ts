import { describe, it, expect } from 'vitest';
import { datasetSchema, datasetInputSchema } from '../dataset-schema';

describe('datasetSchema', () => {
  it('accepts a complete dataset', () => {
    const result = datasetSchema.safeParse({
      columns: ['region', 'amount'],
      rows: [{ region: 'North', amount: 100 }, { region: null, amount: null }],
    });
    expect(result.success).toBe(true);
  });

  it('rejects duplicate column names', () => {
    const result = datasetSchema.safeParse({ columns: ['a', 'a'], rows: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Duplicate column name "a"');
      expect(result.error.issues[0]?.path).toEqual(['columns', 1]);
    }
  });

  it('rejects rows missing a declared column', () => {
    const result = datasetSchema.safeParse({ columns: ['a', 'b'], rows: [{ a: 1 }] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['rows', 0, 'b']);
    }
  });
});

describe('datasetInputSchema', () => {
  it('defaults rows and dateColumns', () => {
    const result = datasetInputSchema.parse({ name: 'Empty', columns: ['a'] });
    expect(result.rows).toEqual([]);
    expect(result.dateColumns).toEqual([]);
  });

  it('rejects rows whose length differs from the column count', () => {
    const result = datasetInputSchema.safeParse({ name: 'Sales', columns: ['a', 'b'], rows: [['x']] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Expected 2 values, received 1');
    }
  });

  it('rejects unknown date columns', () => {
    const result = datasetInputSchema.safeParse({
      name: 'Sales',
      columns: ['amount'],
      rows: [[1]],
      dateColumns: ['date'],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['dateColumns', 0]);
    }
  });
});
