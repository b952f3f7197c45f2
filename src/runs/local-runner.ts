/**
 * In-process batch runner.
 */

import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import { withRowContext } from '../context.js';
import { MissingRequiredInputsError, toError } from '../errors.js';
import type { RowFunction, RowInputs } from '../functions/base.js';
import { type Logger, silentLogger } from '../logger.js';
import {
  type ColumnMapping,
  INPUTS_COLUMN_PREFIX,
  OUTPUTS_COLUMN_PREFIX,
  parseMappingExpression,
} from '../mapping/column-mapping.js';
import { ownValue, setOwn } from '../records.js';
import { type Row, Table } from '../table.js';
import { withSpan } from '../tracing.js';
import { type BatchRunner, LINE_NUMBER, type LineFailure, type Run, type RunRequest } from './types.js';

export interface LocalBatchRunnerOptions {
  /** Maximum number of lines executed at once. Defaults to 4. */
  maxWorkers?: number;
  logger?: Logger;
}

interface LineResult {
  row: Row;
  metrics: Record<string, number>;
  failure: LineFailure | null;
  /** The run was aborted before this line started. */
  skipped: boolean;
}

const LINE_NUMBER_COLUMN = `${INPUTS_COLUMN_PREFIX}${LINE_NUMBER}`;

/**
 * Runs functions line by line in the current process.
 */
export class LocalBatchRunner implements BatchRunner {
  private readonly maxWorkers: number;
  private readonly logger: Logger;
  private readonly results = new Map<string, Table>();

  constructor(opts?: LocalBatchRunnerOptions) {
    const maxWorkers = opts?.maxWorkers ?? 4;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
    this.logger = opts?.logger ?? silentLogger;
  }

  async submit(request: RunRequest): Promise<Run> {
    const id = randomUUID();
    const name = request.name ?? request.fn.getName();

    return withSpan(
      `run ${name}`,
      { 'run.id': id, 'run.lines': request.data.length },
      async (span) => {
        const previousOutputs = request.previousRun
          ? outputsByLine(await this.getResults(request.previousRun))
          : new Map<number, Row>();

        const signal = request.signal ?? new AbortController().signal;

        const limit = pLimit(this.maxWorkers);
        const startedAt = new Date();
        const lineResults = await Promise.all(
          Array.from({ length: request.data.length }, (_, lineNumber) =>
            limit(() =>
              this.runLine(request, {
                id,
                name,
                lineNumber,
                signal,
                previousOutputs: previousOutputs.get(lineNumber) ?? {},
              }),
            ),
          ),
        );

        const failures = lineResults.flatMap((r) => (r.failure ? [r.failure] : []));
        const metrics: Record<string, number> = {};
        for (const r of lineResults) {
          for (const [k, v] of Object.entries(r.metrics)) {
            setOwn(metrics, k, (ownValue(metrics, k) ?? 0) + v);
          }
        }

        const run: Run = {
          id,
          name,
          functionName: request.fn.getName(),
          status: lineResults.some((r) => r.skipped)
            ? 'canceled'
            : failures.length > 0
              ? 'failed'
              : 'completed',
          dataPath: request.dataPath ?? null,
          previousRunId: request.previousRun?.id ?? null,
          columnMapping: request.columnMapping ? { ...request.columnMapping } : null,
          lineCount: request.data.length,
          failures,
          metrics,
          startedAt,
          endedAt: new Date(),
        };

        const table = Table.fromRecords(lineResults.map((r) => r.row));
        this.results.set(id, table.length > 0 ? table.sortBy(LINE_NUMBER_COLUMN) : table);
        span.setAttribute('run.status', run.status);
        this.logger.debug(
          `Run '${name}' ${run.status}: ${run.lineCount - failures.length}/${run.lineCount} lines succeeded`,
        );
        return run;
      },
    );
  }

  async getResults(run: Run): Promise<Table> {
    const table = this.results.get(run.id);
    if (!table) {
      throw new Error(`Run '${run.name}' (${run.id}) not found`);
    }
    return table;
  }

  /**
   * Forget the results of a run. Later getResults() calls for it, and runs chained on it,
   * fail.
   */
  release(run: Run): void {
    this.results.delete(run.id);
  }

  private async runLine(
    request: RunRequest,
    line: {
      id: string;
      name: string;
      lineNumber: number;
      signal: AbortSignal;
      previousOutputs: Row;
    },
  ): Promise<LineResult> {
    const row: Row = {};
    if (line.signal.aborted) {
      row[LINE_NUMBER_COLUMN] = line.lineNumber;
      return { row, metrics: {}, failure: null, skipped: true };
    }

    try {
      const inputs = resolveInputs(
        request.fn,
        request.data.row(line.lineNumber),
        line.previousOutputs,
        request.columnMapping ?? null,
      );
      for (const [k, v] of Object.entries(inputs)) {
        row[`${INPUTS_COLUMN_PREFIX}${k}`] = v;
      }
      row[LINE_NUMBER_COLUMN] = line.lineNumber;

      const { result, metrics } = await withRowContext(
        { runId: line.id, runName: line.name, lineNumber: line.lineNumber, signal: line.signal },
        async () => await request.fn.call(inputs),
      );
      for (const [k, v] of Object.entries(toOutputFields(result))) {
        row[`${OUTPUTS_COLUMN_PREFIX}${k}`] = v;
      }
      return { row, metrics, failure: null, skipped: false };
    } catch (e) {
      row[LINE_NUMBER_COLUMN] = line.lineNumber;
      const error = toError(e);
      return {
        row,
        metrics: {},
        skipped: false,
        failure: {
          lineNumber: line.lineNumber,
          errorMessage: `${error.name}: ${error.message}`,
          errorStacktrace: error.stack ?? '',
        },
      };
    }
  }
}

/**
 * Build the inputs of one call.
 *
 * Mapped parameters read `${data.X}` from the dataset row, `${run.outputs.X}` from the previous
 * run's outputs for the same line, and take any other string literally. Unmapped parameters
 * read the dataset column of the same name.
 */
export function resolveInputs(
  fn: RowFunction,
  dataRow: Row,
  previousOutputs: Row,
  mapping: ColumnMapping | null,
): RowInputs {
  const inputs: RowInputs = {};
  const declared = fn.getParameters().filter((p) => !p.variadic);
  const declaredNames = new Set(declared.map((p) => p.name));

  const resolve = (expression: string): { found: boolean; value?: unknown } => {
    const ref = parseMappingExpression(expression);
    if (ref.kind === 'literal') return { found: true, value: ref.value };
    const source = ref.kind === 'data' ? dataRow : previousOutputs;
    return Object.hasOwn(source, ref.field)
      ? { found: true, value: source[ref.field] }
      : { found: false };
  };

  for (const param of declared) {
    const expression = mapping ? ownValue(mapping, param.name) : undefined;
    if (expression !== undefined) {
      const { found, value } = resolve(expression);
      if (found) setOwn(inputs, param.name, value);
    } else if (Object.hasOwn(dataRow, param.name)) {
      setOwn(inputs, param.name, dataRow[param.name]);
    }
  }

  if (mapping && fn.acceptsExtraInputs()) {
    for (const [dest, expression] of Object.entries(mapping)) {
      if (declaredNames.has(dest)) continue;
      const { found, value } = resolve(expression);
      if (found) setOwn(inputs, dest, value);
    }
  }

  const missing = fn.requiredInputs().filter((name) => !Object.hasOwn(inputs, name));
  if (missing.length > 0) {
    throw new MissingRequiredInputsError(fn.getName(), missing);
  }
  return inputs;
}

function toOutputFields(result: unknown): Row {
  if (typeof result === 'object' && result !== null && !Array.isArray(result)) {
    return { ...result };
  }
  return { output: result ?? null };
}

function outputsByLine(results: Table): Map<number, Row> {
  const byLine = new Map<number, Row>();
  for (const record of results.records()) {
    const outputs: Row = {};
    for (const [k, v] of Object.entries(record)) {
      if (k.startsWith(OUTPUTS_COLUMN_PREFIX)) {
        setOwn(outputs, k.slice(OUTPUTS_COLUMN_PREFIX.length), v);
      }
    }
    byLine.set(Number(record[LINE_NUMBER_COLUMN]), outputs);
  }
  return byLine;
}
