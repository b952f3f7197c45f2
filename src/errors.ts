/**
 * Error taxonomy for batch evaluation.
 *
 * Errors carry the target/evaluator label and the column names involved.
 */

import type { Run } from './runs/types.js';
import type { Table } from './table.js';

/**
 * Base class for every error raised by this package.
 */
export class EvaluationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvaluationError';
  }
}

/**
 * The caller passed structurally invalid arguments or a mapping with a disallowed reference.
 * Raised before any run starts.
 */
export class ConfigurationError extends EvaluationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A mapping expression references a namespace other than `data.` or `run.outputs.`.
 */
export class InvalidMappingReferenceError extends ConfigurationError {
  readonly expression: string;

  constructor(expression: string) {
    super(
      `Invalid column mapping reference '${expression}'. ` +
        'Only ${data.<column>} and ${run.outputs.<column>} can be resolved.',
    );
    this.name = 'InvalidMappingReferenceError';
    this.expression = expression;
  }
}

/**
 * The input file is missing or is not valid JSON Lines.
 */
export class DataLoadError extends EvaluationError {
  readonly path: string;
  readonly lineNumber: number | null;

  constructor(path: string, message: string, opts?: { lineNumber?: number; cause?: unknown }) {
    const where = opts?.lineNumber !== undefined ? ` (line ${opts.lineNumber + 1})` : '';
    super(
      `Failed to load data from ${path}${where}. Please validate it is a valid jsonl data. Error: ${message}`,
      { cause: opts?.cause },
    );
    this.name = 'DataLoadError';
    this.path = path;
    this.lineNumber = opts?.lineNumber ?? null;
  }
}

/**
 * A required parameter of a target or evaluator has no column to read from.
 */
export class MissingRequiredInputsError extends EvaluationError {
  /** Evaluator name, or null for the target. */
  readonly label: string | null;
  readonly missing: string[];

  constructor(label: string | null, missing: string[]) {
    const subject = label === null ? 'target' : `evaluator ${label}`;
    super(`Missing required inputs for ${subject} : ${JSON.stringify(missing)}.`);
    this.name = 'MissingRequiredInputsError';
    this.label = label;
    this.missing = missing;
  }
}

/**
 * Two tables merged by row position share column names.
 */
export class ColumnCollisionError extends EvaluationError {
  readonly columns: string[];

  constructor(columns: string[], message?: string) {
    super(message ?? `Cannot merge tables, duplicate columns: ${JSON.stringify(columns)}.`);
    this.name = 'ColumnCollisionError';
    this.columns = columns;
  }
}

/**
 * Two evaluators produced the same namespaced output column.
 */
export class DuplicateColumnError extends ColumnCollisionError {
  readonly evaluators: string[];

  constructor(columns: string[], evaluators: string[]) {
    super(
      columns,
      `Evaluators ${evaluators.map((e) => `'${e}'`).join(' and ')} produced duplicate columns: ` +
        `${JSON.stringify(columns)}.`,
    );
    this.name = 'DuplicateColumnError';
    this.evaluators = evaluators;
  }
}

/**
 * A batch run of a target or evaluator failed or was canceled.
 * Carries whatever rows the run produced.
 */
export class RunExecutionError extends EvaluationError {
  /** Evaluator name, or null for the target. */
  readonly label: string | null;
  readonly run: Run;
  readonly partialResults: Table | null;

  constructor(label: string | null, run: Run, partialResults: Table | null) {
    const subject = label === null ? 'target' : `evaluator ${label}`;
    const detail =
      run.status === 'canceled'
        ? 'was canceled'
        : `failed on ${run.failures.length} of ${run.lineCount} lines`;
    const first = run.failures[0];
    super(
      `Run '${run.name}' for ${subject} ${detail}` +
        (first ? `; line ${first.lineNumber}: ${first.errorMessage}` : '') +
        '.',
    );
    this.name = 'RunExecutionError';
    this.label = label;
    this.run = run;
    this.partialResults = partialResults;
  }
}

/**
 * The evaluation result could not be written to its destination.
 */
export class OutputWriteError extends EvaluationError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write evaluation results to ${path}: ${reason}`, { cause });
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

/**
 * Normalize a thrown value to an Error.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
