/**
 * Signature checks: every required parameter of a function must be satisfiable from a table.
 */

import { MissingRequiredInputsError } from '../errors.js';
import { applyColumnMapping } from '../mapping/column-mapping.js';
import { type EvaluatorConfig, mappingFor } from '../mapping/evaluator-config.js';
import type { Table } from '../table.js';
import type { RowFunction } from './base.js';

/**
 * Throw MissingRequiredInputsError if any required parameter of `fn` is not a column of `table`.
 *
 * @param label - evaluator name, or null when checking the target
 */
export function validateInputs(fn: RowFunction, table: Table, label: string | null): void {
  const missing = fn.requiredInputs().filter((name) => !table.hasColumn(name));
  if (missing.length > 0) {
    throw new MissingRequiredInputsError(label, missing);
  }
}

/**
 * Check that every column needed by the target or the evaluators is present.
 *
 * With a target, only the target is checked against the raw dataset: what it produces is
 * unknown until it runs. Without one, each evaluator is checked against the dataset after
 * its column mapping is applied.
 */
export function validateColumns(
  table: Table,
  evaluators: Readonly<Record<string, RowFunction>>,
  target: RowFunction | null,
  config: EvaluatorConfig,
): void {
  if (target) {
    validateInputs(target, table, null);
    return;
  }
  for (const [name, evaluator] of Object.entries(evaluators)) {
    const mapped = applyColumnMapping(table, mappingFor(config, name));
    validateInputs(evaluator, mapped, name);
  }
}
