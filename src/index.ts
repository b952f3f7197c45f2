/**
 * batch-evals: batch evaluation of datasets with target and evaluator functions.
 *
 * @example
 * ```ts
 * import { defineFunction, evaluate } from 'batch-evals';
 *
 * const exactMatch = defineFunction({
 *   name: 'exactMatch',
 *   parameters: ['answer', 'expected'],
 *   fn: ({ answer, expected }) => ({ score: answer === expected ? 1 : 0 }),
 * });
 *
 * const result = await evaluate({
 *   data: 'answers.jsonl',
 *   evaluators: { exact: exactMatch },
 * });
 * result.print();
 * ```
 */

// Evaluation
export type { EvaluateOptions } from './evaluate.js';
export { evaluate } from './evaluate.js';

// Functions
export type { DefineFunctionOptions, ParameterDecl, ParameterSpec, RowInputs } from './functions/base.js';
export { defineFunction, RESERVED_PARAMETER_NAMES, RowFunction } from './functions/base.js';
export { validateColumns, validateInputs } from './functions/validation.js';
export type { RowContext } from './context.js';
export { getRowContext, incrementRunMetric } from './context.js';

// Data
export type { Row } from './table.js';
export { Table } from './table.js';
export { loadJsonl, parseJsonl } from './data/loader.js';

// Column mapping
export type { ColumnMapping, MappingReference } from './mapping/column-mapping.js';
export {
  applyColumnMapping,
  parseMappingExpression,
  runOutputsReference,
} from './mapping/column-mapping.js';
export type { EvaluatorConfig } from './mapping/evaluator-config.js';
export {
  addTargetGeneratedMappings,
  DEFAULT_MAPPING_KEY,
  mappingFor,
  processEvaluatorConfig,
} from './mapping/evaluator-config.js';

// Runs
export type { LocalBatchRunnerOptions } from './runs/local-runner.js';
export { LocalBatchRunner, resolveInputs } from './runs/local-runner.js';
export type { BatchRunner, LineFailure, Run, RunRequest, RunStatus } from './runs/types.js';
export { LINE_NUMBER } from './runs/types.js';

// Pipeline stages
export { calculateMean } from './pipeline/aggregate.js';
export type { EvaluatorErrorPolicy, EvaluatorRunsResult } from './pipeline/evaluators.js';
export { namespaceEvaluatorOutputs, runEvaluators } from './pipeline/evaluators.js';
export { renameColumnsConditionally } from './pipeline/normalize.js';
export type { TargetApplication } from './pipeline/target.js';
export { applyTargetToData } from './pipeline/target.js';

// Reporting
export type {
  EvaluationResult,
  EvaluationResultDocument,
  ProjectScope,
  RendererOptions,
  ResultsTracker,
  TrackerPayload,
} from './reporting/index.js';
export {
  createEvaluationResult,
  DEFAULT_OUTPUT_FILE_NAME,
  renderResult,
  writeOutput,
} from './reporting/index.js';

// Configuration
export type { ConfigFormat, EvaluationConfig, LoadConfigOptions } from './config/index.js';
export {
  evaluateOptionsSchema,
  evaluationConfigFileSchema,
  loadEvaluationConfigFromFile,
  loadEvaluationConfigFromObject,
  loadEvaluationConfigFromText,
} from './config/index.js';

// Logging
export type { ConsoleLoggerOptions, Logger, LogLevel } from './logger.js';
export { createConsoleLogger, silentLogger } from './logger.js';

// Errors
export {
  ColumnCollisionError,
  ConfigurationError,
  DataLoadError,
  DuplicateColumnError,
  EvaluationError,
  InvalidMappingReferenceError,
  MissingRequiredInputsError,
  OutputWriteError,
  RunExecutionError,
} from './errors.js';
