/**
 * Evaluator orchestration: one independent batch run per evaluator, merged by row position.
 */

import pLimit from 'p-limit';
import { DuplicateColumnError, RunExecutionError } from '../errors.js';
import type { RowFunction } from '../functions/base.js';
import { type Logger, silentLogger } from '../logger.js';
import { setOwn } from '../records.js';
import { INPUTS_COLUMN_PREFIX, OUTPUTS_COLUMN_PREFIX } from '../mapping/column-mapping.js';
import { type EvaluatorConfig, mappingFor } from '../mapping/evaluator-config.js';
import { type BatchRunner, LINE_NUMBER, type Run } from '../runs/types.js';
import { Table } from '../table.js';

/** What to do when an evaluator run fails or is canceled. */
export type EvaluatorErrorPolicy = 'continue' | 'raise';

export interface EvaluatorRunsResult {
  /** `outputs.<evaluator>.<field>` columns of every evaluator that completed. */
  table: Table;
  runs: Record<string, Run>;
  /** Evaluators left out of `table`, with the error that removed them. */
  failures: Record<string, RunExecutionError>;
}

type EvaluatorOutcome =
  | { name: string; run: Run; table: Table }
  | { name: string; run: Run; error: RunExecutionError };

/**
 * Run every evaluator against the dataset and merge their namespaced outputs.
 *
 * Evaluators run concurrently (bounded by `maxConcurrency`) and each only reads the dataset and
 * the optional target run. Results are merged in the order of `evaluators`, whatever order the
 * runs finish in.
 */
export async function runEvaluators(opts: {
  runner: BatchRunner;
  evaluators: Readonly<Record<string, RowFunction>>;
  config: EvaluatorConfig;
  data: Table;
  dataPath: string | null;
  targetRun?: Run | null;
  maxConcurrency?: number;
  onError?: EvaluatorErrorPolicy;
  signal?: AbortSignal;
  logger?: Logger;
}): Promise<EvaluatorRunsResult> {
  const logger = opts.logger ?? silentLogger;
  const onError = opts.onError ?? 'continue';
  const limit = pLimit(opts.maxConcurrency ?? Infinity);

  const outcomes = await Promise.all(
    Object.entries(opts.evaluators).map(([name, evaluator]) =>
      limit(async (): Promise<EvaluatorOutcome> => {
        const run = await opts.runner.submit({
          fn: evaluator,
          data: opts.data,
          dataPath: opts.dataPath,
          previousRun: opts.targetRun ?? null,
          columnMapping: mappingFor(opts.config, name),
          name,
          signal: opts.signal,
        });
        const results = await opts.runner.getResults(run);
        if (run.status !== 'completed') {
          return { name, run, error: new RunExecutionError(name, run, results) };
        }
        return { name, run, table: namespaceEvaluatorOutputs(name, results) };
      }),
    ),
  );

  const runs: Record<string, Run> = {};
  const failures: Record<string, RunExecutionError> = {};
  let merged: Table | null = null;
  let mergedFrom: string[] = [];

  for (const outcome of outcomes) {
    setOwn(runs, outcome.name, outcome.run);
    if ('error' in outcome) {
      if (onError === 'raise') throw outcome.error;
      logger.warn(`${outcome.error.message} Its columns are left out of the results.`);
      setOwn(failures, outcome.name, outcome.error);
      continue;
    }

    if (merged === null) {
      merged = outcome.table;
      mergedFrom = [outcome.name];
      continue;
    }
    const shared = merged.sharedColumns(outcome.table);
    if (shared.length > 0) {
      const owners = mergedFrom.filter((n) => shared.some((c) => ownsColumn(n, c)));
      throw new DuplicateColumnError(shared, [...owners, outcome.name]);
    }
    merged = merged.concat(outcome.table);
    mergedFrom.push(outcome.name);
  }

  return { table: merged ?? Table.empty(opts.data.length), runs, failures };
}

/**
 * Drop the `inputs.` columns of an evaluator run and rename every output field to
 * `outputs.<evaluator>.<field>`.
 */
export function namespaceEvaluatorOutputs(evaluatorName: string, results: Table): Table {
  const lineNumberColumn = `${INPUTS_COLUMN_PREFIX}${LINE_NUMBER}`;
  const sorted = results.hasColumn(lineNumberColumn) ? results.sortBy(lineNumberColumn) : results;
  return sorted
    .drop(sorted.columns.filter((c) => c.startsWith(INPUTS_COLUMN_PREFIX)))
    .renameWith((c) => {
      const field = c.startsWith(OUTPUTS_COLUMN_PREFIX) ? c.slice(OUTPUTS_COLUMN_PREFIX.length) : c;
      return `${OUTPUTS_COLUMN_PREFIX}${evaluatorName}.${field}`;
    });
}

function ownsColumn(evaluatorName: string, column: string): boolean {
  return column.startsWith(`${OUTPUTS_COLUMN_PREFIX}${evaluatorName}.`);
}
