/**
 * Batch run contract: submit a function over a table, then fetch its index-aligned results.
 */

import type { RowFunction } from '../functions/base.js';
import type { ColumnMapping } from '../mapping/column-mapping.js';
import type { Table } from '../table.js';

/** Column carrying the row index in run results, under the `inputs.` prefix. */
export const LINE_NUMBER = 'line_number';

export type RunStatus = 'completed' | 'failed' | 'canceled';

/**
 * A line that raised while the function was running.
 */
export interface LineFailure {
  lineNumber: number;
  errorMessage: string;
  errorStacktrace: string;
}

/**
 * Handle of a finished batch run. Runs are never modified after they complete.
 */
export interface Run {
  id: string;
  name: string;
  functionName: string;
  status: RunStatus;
  /** Path of the dataset the run read, when it came from a file. */
  dataPath: string | null;
  previousRunId: string | null;
  columnMapping: ColumnMapping | null;
  lineCount: number;
  failures: LineFailure[];
  /** Sum of the metrics recorded with incrementRunMetric() across lines. */
  metrics: Record<string, number>;
  startedAt: Date;
  endedAt: Date;
}

export interface RunRequest {
  fn: RowFunction;
  /** Dataset the `${data.X}` references read from. */
  data: Table;
  dataPath?: string | null;
  /** Run whose outputs the `${run.outputs.X}` references read from. */
  previousRun?: Run | null;
  columnMapping?: ColumnMapping | null;
  /** Display name of the run. Defaults to the function name. */
  name?: string | null;
  signal?: AbortSignal;
}

/**
 * Executes functions over tables.
 *
 * Results carry an `inputs.line_number` column, `inputs.<param>` columns for the values the
 * function received, and `outputs.<field>` columns for what it returned.
 */
export interface BatchRunner {
  submit(request: RunRequest): Promise<Run>;
  getResults(run: Run): Promise<Table>;
}
