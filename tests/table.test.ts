import { describe, expect, it } from 'vitest';
import { ColumnCollisionError } from '../src/errors.js';
import { Table } from '../src/table.js';

describe('Table', () => {
  it('builds from records with columns in first-seen order', () => {
    const t = Table.fromRecords([{ a: 1 }, { b: 2, a: 3 }]);
    expect(t.columns).toEqual(['a', 'b']);
    expect(t.length).toBe(2);
  });

  it('fills missing values with null', () => {
    const t = Table.fromRecords([{ a: 1 }, { b: 2 }]);
    expect(t.records()).toEqual([
      { a: 1, b: null },
      { a: null, b: 2 },
    ]);
  });

  it('rejects duplicate column names', () => {
    expect(() => new Table(['a', 'a'], [])).toThrow(ColumnCollisionError);
  });

  it('empty table has rows but no columns', () => {
    const t = Table.empty(3);
    expect(t.length).toBe(3);
    expect(t.columns).toEqual([]);
    expect(t.records()).toEqual([{}, {}, {}]);
  });

  it('returns copies of rows', () => {
    const t = Table.fromRecords([{ a: 1 }]);
    const row = t.row(0);
    row.a = 99;
    expect(t.row(0)).toEqual({ a: 1 });
  });

  it('throws for out-of-range rows and unknown columns', () => {
    const t = Table.fromRecords([{ a: 1 }]);
    expect(() => t.row(1)).toThrow(RangeError);
    expect(() => t.column('b')).toThrow("Column 'b' not found");
  });

  it('drop ignores unknown columns', () => {
    const t = Table.fromRecords([{ a: 1, b: 2 }]);
    expect(t.drop(['b', 'zzz']).columns).toEqual(['a']);
  });

  it('rename ignores unknown sources', () => {
    const t = Table.fromRecords([{ a: 1 }]);
    expect(t.rename({ x: 'y' }).records()).toEqual([{ a: 1 }]);
  });

  it('rename can swap two columns', () => {
    const t = Table.fromRecords([{ a: 1, b: 2 }]);
    expect(t.rename({ a: 'b', b: 'a' }).records()).toEqual([{ b: 1, a: 2 }]);
  });

  it('a renamed column replaces an unrenamed column of the same name', () => {
    const t = Table.fromRecords([{ a: 1, b: 2 }]);
    const renamed = t.rename(new Map([['a', 'b']]));
    expect(renamed.columns).toEqual(['b']);
    expect(renamed.records()).toEqual([{ b: 1 }]);
  });

  it('sortBy is stable and numeric', () => {
    const t = Table.fromRecords([
      { n: 10, v: 'x' },
      { n: 2, v: 'y' },
      { n: 10, v: 'z' },
    ]);
    expect(t.sortBy('n').column('v')).toEqual(['y', 'x', 'z']);
  });

  it('concat aligns rows by position', () => {
    const left = Table.fromRecords([{ a: 1 }, { a: 2 }]);
    const right = Table.fromRecords([{ b: 'x' }, { b: 'y' }]);
    expect(left.concat(right).records()).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: 'y' },
    ]);
  });

  it('concat pads the shorter table with nulls', () => {
    const left = Table.fromRecords([{ a: 1 }, { a: 2 }]);
    const right = Table.fromRecords([{ b: 'x' }]);
    expect(left.concat(right).records()).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: null },
    ]);
  });

  it('concat rejects shared columns', () => {
    const left = Table.fromRecords([{ a: 1, b: 1 }]);
    const right = Table.fromRecords([{ b: 2 }]);
    expect(() => left.concat(right)).toThrow(new ColumnCollisionError(['b']));
  });
});
