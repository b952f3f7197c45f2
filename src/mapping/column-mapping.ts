/**
 * Column mappings: `${data.<column>}` and `${run.outputs.<column>}` references that wire
 * dataset columns and previous-run outputs into a function's parameters.
 */

import { InvalidMappingReferenceError } from '../errors.js';
import type { Table } from '../table.js';

/** Destination parameter name -> mapping expression. */
export type ColumnMapping = Record<string, string>;

export const DATA_PREFIX = 'data.';
export const RUN_OUTPUTS_PREFIX = 'run.outputs.';
export const OUTPUTS_COLUMN_PREFIX = 'outputs.';
export const INPUTS_COLUMN_PREFIX = 'inputs.';

const REFERENCE_PATTERN = /^\$\{([^{}]+)\}$/;

/**
 * A parsed mapping expression.
 */
export type MappingReference =
  | { kind: 'data'; field: string }
  | { kind: 'run.outputs'; field: string }
  | { kind: 'literal'; value: string };

/**
 * Parse a mapping expression.
 *
 * Strings that are not of the form `${...}` are literals. A reference to any namespace
 * other than `data.` or `run.outputs.` raises InvalidMappingReferenceError.
 */
export function parseMappingExpression(expression: string): MappingReference {
  const match = REFERENCE_PATTERN.exec(expression);
  if (match === null) {
    return { kind: 'literal', value: expression };
  }
  const pattern = match[1] ?? '';
  if (pattern.startsWith(DATA_PREFIX)) {
    return { kind: 'data', field: pattern.slice(DATA_PREFIX.length) };
  }
  if (pattern.startsWith(RUN_OUTPUTS_PREFIX)) {
    return { kind: 'run.outputs', field: pattern.slice(RUN_OUTPUTS_PREFIX.length) };
  }
  throw new InvalidMappingReferenceError(expression);
}

/**
 * Format a reference to a previous run's output column.
 */
export function runOutputsReference(column: string): string {
  return `\${${RUN_OUTPUTS_PREFIX}${column}}`;
}

/**
 * Apply a column mapping to a table, as used for pre-validation of a function's inputs.
 *
 * - `${data.X}` renames column `X` to the destination.
 * - `${run.outputs.X}` renames `outputs.X` if the table has it, otherwise `X`. A column already
 *   named like the destination is dropped, unless it is itself being renamed.
 * - Literals do not touch the table.
 *
 * Renaming a column the table does not have has no effect; missing inputs are reported
 * by the signature check afterwards.
 */
export function applyColumnMapping(table: Table, mapping: ColumnMapping | null | undefined): Table {
  if (!mapping || Object.keys(mapping).length === 0) {
    return table;
  }

  const renames = new Map<string, string>();
  const toDrop = new Set<string>();

  for (const [dest, expression] of Object.entries(mapping)) {
    const ref = parseMappingExpression(expression);
    if (ref.kind === 'data') {
      renames.set(ref.field, dest);
    } else if (ref.kind === 'run.outputs') {
      const prefixed = `${OUTPUTS_COLUMN_PREFIX}${ref.field}`;
      // A target output that collided with a dataset column keeps its `outputs.` prefix.
      const source = table.hasColumn(prefixed) ? prefixed : ref.field;
      if (table.hasColumn(dest)) {
        toDrop.add(dest);
      }
      renames.set(source, dest);
    }
  }

  for (const source of renames.keys()) {
    toDrop.delete(source);
  }

  return table.drop(toDrop).rename(renames);
}
