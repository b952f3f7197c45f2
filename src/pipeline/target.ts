/**
 * Target application: run the target over the dataset and merge its outputs back onto it.
 */

import { RunExecutionError } from '../errors.js';
import type { RowFunction } from '../functions/base.js';
import { INPUTS_COLUMN_PREFIX, OUTPUTS_COLUMN_PREFIX } from '../mapping/column-mapping.js';
import { type BatchRunner, LINE_NUMBER, type Run } from '../runs/types.js';
import type { Table } from '../table.js';

export interface TargetApplication {
  /** Target outputs followed by the original dataset columns. */
  table: Table;
  /** Fields the target produced, without the `outputs.` prefix. */
  generatedColumns: Set<string>;
  run: Run;
}

/**
 * Run `target` once per row of `data` and concatenate its outputs with the dataset.
 *
 * Output columns lose their `outputs.` prefix, except where the dataset already has a column
 * of the same name: there the prefix stays, so the target never overwrites an input value.
 * Such a field still counts as generated.
 */
export async function applyTargetToData(opts: {
  runner: BatchRunner;
  target: RowFunction;
  data: Table;
  dataPath: string | null;
  evaluationName?: string | null;
  signal?: AbortSignal;
}): Promise<TargetApplication> {
  const run = await opts.runner.submit({
    fn: opts.target,
    data: opts.data,
    dataPath: opts.dataPath,
    name: opts.evaluationName ?? null,
    signal: opts.signal,
  });
  const targetOutput = await opts.runner.getResults(run);
  if (run.status !== 'completed') {
    throw new RunExecutionError(null, run, targetOutput);
  }

  const renames = new Map<string, string>();
  for (const column of targetOutput.columns) {
    if (column.startsWith(OUTPUTS_COLUMN_PREFIX)) {
      renames.set(column, column.slice(OUTPUTS_COLUMN_PREFIX.length));
    }
  }
  const generatedColumns = new Set(renames.values());
  for (const column of opts.data.columns) {
    if (generatedColumns.has(column)) {
      renames.delete(`${OUTPUTS_COLUMN_PREFIX}${column}`);
    }
  }

  const lineNumberColumn = `${INPUTS_COLUMN_PREFIX}${LINE_NUMBER}`;
  const sorted = targetOutput.length > 0 ? targetOutput.sortBy(lineNumberColumn) : targetOutput;
  const outputsOnly = sorted
    .drop(sorted.columns.filter((c) => c.startsWith(INPUTS_COLUMN_PREFIX)))
    .rename(renames);

  return {
    table: outputsOnly.concat(opts.data),
    generatedColumns,
    run,
  };
}
