/**
 * Per-evaluator column mapping configuration.
 *
 * Callers write `${target.<field>}` and `${data.<field>}`; target references are rewritten to
 * `${run.outputs.<field>}` before any run starts.
 */

import { ConfigurationError } from '../errors.js';
import { ownValue, setOwn } from '../records.js';
import { type ColumnMapping, runOutputsReference } from './column-mapping.js';

/** Evaluator name (or `default`) -> column mapping. */
export type EvaluatorConfig = Record<string, ColumnMapping>;

export const DEFAULT_MAPPING_KEY = 'default';

const UNEXPECTED_REFERENCE = /\$\{(?!target\.|data\.).+?\}/;

/**
 * Check every mapping value for disallowed references and rewrite `${target.` to
 * `${run.outputs.`. Returns a new config; the input is not modified.
 */
export function processEvaluatorConfig(
  config: EvaluatorConfig | null | undefined,
): EvaluatorConfig {
  const processed: EvaluatorConfig = {};
  if (!config) return processed;

  for (const [evaluatorName, mapping] of Object.entries(config)) {
    const rewritten: ColumnMapping = {};
    for (const [dest, expression] of Object.entries(mapping)) {
      if (UNEXPECTED_REFERENCE.test(expression)) {
        throw new ConfigurationError(
          `Unexpected references detected in 'evaluatorConfig' for '${evaluatorName}.${dest}': ` +
            `'${expression}'. Ensure only \${target.} and \${data.} are used.`,
        );
      }
      setOwn(rewritten, dest, expression.replaceAll('${target.', '${run.outputs.'));
    }
    setOwn(processed, evaluatorName, rewritten);
  }
  return processed;
}

/**
 * The mapping that applies to an evaluator: its own entry, else the default, else none.
 */
export function mappingFor(config: EvaluatorConfig, evaluatorName: string): ColumnMapping | null {
  return ownValue(config, evaluatorName) ?? ownValue(config, DEFAULT_MAPPING_KEY) ?? null;
}

/**
 * Wire target-generated columns into every mapping that does not already use them.
 *
 * The `default` entry is always present in the result. A column is skipped for a mapping
 * when the caller already maps a parameter of that name, or already points some parameter
 * at the column's run output.
 */
export function addTargetGeneratedMappings(
  config: EvaluatorConfig,
  generatedColumns: Iterable<string>,
): EvaluatorConfig {
  const result: EvaluatorConfig = {};
  for (const [name, mapping] of Object.entries(config)) {
    setOwn(result, name, { ...mapping });
  }
  if (!Object.hasOwn(result, DEFAULT_MAPPING_KEY)) {
    setOwn(result, DEFAULT_MAPPING_KEY, {});
  }

  const columns = [...generatedColumns];
  for (const mapping of Object.values(result)) {
    const mappedTo = new Set(Object.values(mapping));
    for (const column of columns) {
      const reference = runOutputsReference(column);
      if (!Object.hasOwn(mapping, column) && !mappedTo.has(reference)) {
        setOwn(mapping, column, reference);
      }
    }
  }
  return result;
}
