/**
 * Aggregate metrics over merged evaluator outputs.
 */

import { OUTPUTS_COLUMN_PREFIX } from '../mapping/column-mapping.js';
import { setOwn } from '../records.js';
import type { Table } from '../table.js';

/**
 * Mean of every numeric column, keyed by column name without the `outputs.` prefix.
 *
 * Nulls and NaN are skipped. A column counts as numeric when all of its other values are numbers,
 * or all are booleans (averaged as a pass rate). Any other column is left out.
 */
export function calculateMean(table: Table): Record<string, number> {
  const metrics: Record<string, number> = {};
  for (const column of table.columns) {
    const values = table.column(column).filter((v) => v !== null && v !== undefined && !Number.isNaN(v));
    const mean = numericMean(values);
    if (mean !== null) {
      const name = column.startsWith(OUTPUTS_COLUMN_PREFIX)
        ? column.slice(OUTPUTS_COLUMN_PREFIX.length)
        : column;
      setOwn(metrics, name, mean);
    }
  }
  return metrics;
}

function numericMean(values: unknown[]): number | null {
  if (values.length === 0) return null;

  let numbers: number[];
  if (values.every((v): v is number => typeof v === 'number')) {
    numbers = values;
  } else if (values.every((v): v is boolean => typeof v === 'boolean')) {
    numbers = values.map((v) => (v ? 1 : 0));
  } else {
    return null;
  }
  return numbers.reduce((sum, v) => sum + v, 0) / numbers.length;
}
