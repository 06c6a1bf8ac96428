import { describe, it, expect } from 'vitest';
import { createDataset, hasColumn, columnValues, toPositionalRows } from '../dataset-utils';

describe('createDataset', () => {
  it('maps positional rows onto columns', () => {
    const dataset = createDataset(['region', 'amount'], [['North', 100], ['South', 50]]);
    expect(dataset.rows).toEqual([
      { region: 'North', amount: 100 },
      { region: 'South', amount: 50 },
    ]);
  });

  it('pads short rows with null and drops extra values', () => {
    const dataset = createDataset(['a', 'b'], [['x'], ['y', 2, 'extra']]);
    expect(dataset.rows).toEqual([
      { a: 'x', b: null },
      { a: 'y', b: 2 },
    ]);
  });

  it('copies the column list', () => {
    const columns = ['a'];
    const dataset = createDataset(columns, []);
    columns.push('b');
    expect(dataset.columns).toEqual(['a']);
  });
});

describe('column helpers', () => {
  const dataset = createDataset(['region', 'amount'], [['North', 100], ['South', null]]);

  it('checks column presence', () => {
    expect(hasColumn(dataset, 'amount')).toBe(true);
    expect(hasColumn(dataset, 'date')).toBe(false);
  });

  it('reads one column in row order', () => {
    expect(columnValues(dataset, 'amount')).toEqual([100, null]);
    expect(columnValues(dataset, 'missing')).toEqual([null, null]);
  });

  it('returns positional rows in column order', () => {
    expect(toPositionalRows(dataset)).toEqual([['North', 100], ['South', null]]);
  });
});
