/**
 * Table: an ordered, row-indexed set of records.
 *
 * Row position is the row index assigned at load time and is the join key for every merge.
 * Tables are immutable; each operation returns a new Table.
 */

import { ColumnCollisionError } from './errors.js';
import { setOwn } from './records.js';

/** One row's column -> value mapping. */
export type Row = Record<string, unknown>;

export class Table {
  readonly columns: readonly string[];
  private readonly rows: readonly Row[];

  /**
   * Every row is normalized to carry exactly `columns`; missing values become null.
   */
  constructor(columns: readonly string[], rows: readonly Row[]) {
    const seen = new Set<string>();
    const dups = new Set<string>();
    for (const c of columns) {
      if (seen.has(c)) dups.add(c);
      seen.add(c);
    }
    if (dups.size > 0) {
      throw new ColumnCollisionError([...dups]);
    }
    this.columns = [...columns];
    this.rows = rows.map((r) => {
      const normalized: Row = {};
      for (const c of columns) {
        setOwn(normalized, c, Object.hasOwn(r, c) ? r[c] : null);
      }
      return normalized;
    });
  }

  /**
   * Build a table from records. Columns are ordered by first appearance.
   */
  static fromRecords(records: readonly Row[]): Table {
    const columns: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
    }
    return new Table(columns, records);
  }

  /**
   * A table with `length` rows and no columns.
   */
  static empty(length = 0): Table {
    return new Table(
      [],
      Array.from({ length }, () => ({})),
    );
  }

  get length(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  column(name: string): unknown[] {
    if (!this.hasColumn(name)) {
      throw new Error(`Column '${name}' not found`);
    }
    return this.rows.map((r) => r[name]);
  }

  row(index: number): Row {
    const r = this.rows[index];
    if (r === undefined) {
      throw new RangeError(`Row ${index} out of range (table has ${this.rows.length} rows)`);
    }
    return { ...r };
  }

  /** Shallow copies of every row, in row order. */
  records(): Row[] {
    return this.rows.map((r) => ({ ...r }));
  }

  /**
   * Drop columns. Names that are not present are ignored.
   */
  drop(columns: Iterable<string>): Table {
    const toDrop = new Set(columns);
    return this.select(this.columns.filter((c) => !toDrop.has(c)));
  }

  /**
   * Keep only the given columns, in the given order.
   */
  select(columns: readonly string[]): Table {
    const missing = columns.filter((c) => !this.hasColumn(c));
    if (missing.length > 0) {
      throw new Error(`Columns not found: ${JSON.stringify(missing)}`);
    }
    return new Table(columns, this.rows);
  }

  /**
   * Rename columns by a source -> destination mapping.
   *
   * Sources that are not present have no effect. When a renamed column lands on the name of a
   * column that is not itself renamed, that column is dropped.
   */
  rename(mapping: ReadonlyMap<string, string> | Readonly<Record<string, string>>): Table {
    const entries = mapping instanceof Map ? mapping : new Map(Object.entries(mapping));
    return this.renameWith((c) => entries.get(c) ?? c);
  }

  /**
   * Rename every column through `fn`.
   */
  renameWith(fn: (column: string) => string): Table {
    const targets = this.columns.map((c) => [c, fn(c)] as const);
    const renamedTargets = new Set(targets.filter(([from, to]) => from !== to).map(([, to]) => to));

    const kept = targets.filter(([from, to]) => from !== to || !renamedTargets.has(to));
    const newNames = kept.map(([, to]) => to);
    const rows = this.rows.map((r) => {
      const out: Row = {};
      for (const [from, to] of kept) {
        setOwn(out, to, r[from]);
      }
      return out;
    });
    return new Table(newNames, rows);
  }

  /**
   * Stable sort of rows by a numeric column.
   */
  sortBy(column: string): Table {
    const values = this.column(column);
    const order = values.map((v, i) => ({ key: Number(v), i }));
    order.sort((a, b) => a.key - b.key || a.i - b.i);
    return new Table(
      this.columns,
      order.map(({ i }) => this.rows[i] ?? {}),
    );
  }

  /**
   * Column names present in both tables.
   */
  sharedColumns(other: Table): string[] {
    return this.columns.filter((c) => other.hasColumn(c));
  }

  /**
   * Horizontally concatenate `other` to the right of this table, aligning rows by position.
   * The shorter table is padded with nulls. Shared column names raise ColumnCollisionError.
   */
  concat(other: Table): Table {
    const shared = this.sharedColumns(other);
    if (shared.length > 0) {
      throw new ColumnCollisionError(shared);
    }
    const length = Math.max(this.length, other.length);
    const rows: Row[] = [];
    for (let i = 0; i < length; i++) {
      rows.push({ ...(this.rows[i] ?? {}), ...(other.rows[i] ?? {}) });
    }
    return new Table([...this.columns, ...other.columns], rows);
  }
}
