/**
 * JSON Lines dataset loading.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DataLoadError, toError } from '../errors.js';
import { type Row, Table } from '../table.js';

/** Each line must hold a JSON object. */
export const recordSchema = z.record(z.string(), z.unknown());

/**
 * Load a JSON Lines file into a Table. Row index follows record order.
 */
export function loadJsonl(path: string): Table {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new DataLoadError(path, toError(e).message, { cause: e });
  }
  return parseJsonl(content, path);
}

/**
 * Parse JSON Lines text into a Table. Blank lines are skipped; records missing a
 * column get null for it.
 *
 * @param source - name used in error messages
 */
export function parseJsonl(content: string, source = '<string>'): Table {
  const records: Row[] = [];
  const lines = content.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    if (line.trim() === '') continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (e) {
      throw new DataLoadError(source, toError(e).message, { lineNumber: index, cause: e });
    }

    if (!isRecord(value)) {
      throw new DataLoadError(source, `expected a JSON object, got ${describe(value)}`, {
        lineNumber: index,
      });
    }
    records.push(value);
  }

  return Table.fromRecords(records);
}

// The parsed object is kept as-is: zod's output omits a `__proto__` key.
function isRecord(value: unknown): value is Row {
  return recordSchema.safeParse(value).success;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}
