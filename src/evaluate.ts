/**
 * evaluate(): run an optional target and one or more evaluators over a JSON Lines dataset and
 * merge every column, with aggregate metrics, into one result.
 */

import { evaluateOptionsSchema, parseOrThrow } from './config/schema.js';
import { loadJsonl } from './data/loader.js';
import type { RowFunction } from './functions/base.js';
import { validateColumns } from './functions/validation.js';
import { createConsoleLogger, type Logger } from './logger.js';
import {
  addTargetGeneratedMappings,
  type EvaluatorConfig,
  processEvaluatorConfig,
} from './mapping/evaluator-config.js';
import { calculateMean } from './pipeline/aggregate.js';
import { type EvaluatorErrorPolicy, runEvaluators } from './pipeline/evaluators.js';
import { renameColumnsConditionally } from './pipeline/normalize.js';
import { applyTargetToData } from './pipeline/target.js';
import { setOwn } from './records.js';
import { type ProjectScope, type ResultsTracker, writeOutput } from './reporting/output.js';
import { createEvaluationResult, type EvaluationResult } from './reporting/report.js';
import { LocalBatchRunner } from './runs/local-runner.js';
import type { BatchRunner, Run } from './runs/types.js';
import { withSpan } from './tracing.js';

export interface EvaluateOptions {
  /** Display name of the evaluation; also names the target run. */
  evaluationName?: string | null;
  /** Function run over the dataset before the evaluators; its outputs become columns. */
  target?: RowFunction | null;
  /** Path to the JSON Lines dataset. */
  data: string;
  /** Evaluator name -> evaluator. At least one is required. */
  evaluators: Record<string, RowFunction>;
  /** Evaluator name (or `default`) -> column mapping using `${data.X}` and `${target.X}`. */
  evaluatorConfig?: EvaluatorConfig | null;
  /** External project results are logged to; needed to obtain `studioUrl`. */
  project?: ProjectScope | null;
  /** File or directory the result document is written to. */
  outputPath?: string | null;
  /** Executes the runs. Defaults to a LocalBatchRunner. */
  runner?: BatchRunner;
  /** Logs results to the external project. */
  tracker?: ResultsTracker;
  /** Maximum number of evaluators running at once. Defaults to all of them. */
  maxConcurrency?: number;
  /** Lines executed at once by the default runner. */
  maxWorkers?: number;
  /** Defaults to `continue`: a failed evaluator is left out of the result and reported. */
  onEvaluatorError?: EvaluatorErrorPolicy;
  /** Cancels the remaining lines of every run. */
  signal?: AbortSignal;
  /** Cancels the evaluation after this many milliseconds. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Evaluate a dataset.
 *
 * @example
 * ```ts
 * const answerer = defineFunction({
 *   name: 'answerer',
 *   parameters: ['question'],
 *   fn: async ({ question }) => ({ answer: await ask(String(question)) }),
 * });
 * const length = defineFunction({
 *   name: 'length',
 *   parameters: ['answer'],
 *   fn: ({ answer }) => ({ chars: String(answer).length }),
 * });
 *
 * const result = await evaluate({
 *   data: 'questions.jsonl',
 *   target: answerer,
 *   evaluators: { length },
 *   evaluatorConfig: { default: { answer: '${target.answer}' } },
 * });
 * result.metrics; // { 'length.chars': 42.5 }
 * ```
 */
export async function evaluate(opts: EvaluateOptions): Promise<EvaluationResult> {
  parseOrThrow(evaluateOptionsSchema, opts, 'evaluate options');
  const logger = opts.logger ?? createConsoleLogger();
  const evaluationName = opts.evaluationName ?? null;

  return withSpan('evaluate', { 'evaluation.name': evaluationName ?? '' }, async () => {
    const initialData = loadJsonl(opts.data);
    logger.info(`Loaded ${initialData.length} rows from ${opts.data}`);

    let config = processEvaluatorConfig(opts.evaluatorConfig);
    const target = opts.target ?? null;
    validateColumns(initialData, opts.evaluators, target, config);

    const runner = opts.runner ?? new LocalBatchRunner({ maxWorkers: opts.maxWorkers, logger });
    const signal = combineSignals(opts.signal, opts.timeoutMs);

    let data = initialData;
    let generatedColumns = new Set<string>();
    let targetRun: Run | null = null;
    if (target) {
      logger.info(`Running target '${target.getName()}'`);
      const applied = await applyTargetToData({
        runner,
        target,
        data: initialData,
        dataPath: opts.data,
        evaluationName,
        signal,
      });
      data = applied.table;
      generatedColumns = applied.generatedColumns;
      targetRun = applied.run;

      config = addTargetGeneratedMappings(config, generatedColumns);
      // Evaluator mappings may reference target outputs that did not exist at the first check.
      validateColumns(data, opts.evaluators, null, config);
    }

    const evaluatorNames = Object.keys(opts.evaluators);
    logger.info(`Running ${evaluatorNames.length} evaluators: ${evaluatorNames.join(', ')}`);
    const evaluatorResults = await runEvaluators({
      runner,
      evaluators: opts.evaluators,
      config,
      data: initialData,
      dataPath: opts.data,
      targetRun,
      maxConcurrency: opts.maxConcurrency,
      onError: opts.onEvaluatorError,
      signal,
      logger,
    });

    const resultTable = renameColumnsConditionally(data, generatedColumns).concat(
      evaluatorResults.table,
    );
    const metrics = calculateMean(evaluatorResults.table);

    let studioUrl: string | null = null;
    if (opts.project) {
      if (opts.tracker) {
        studioUrl = await opts.tracker.logResults({
          project: opts.project,
          evaluationName,
          metrics,
          table: resultTable,
          targetRun,
          dataPath: opts.data,
        });
      } else {
        logger.warn('A project was given without a tracker; results are not logged remotely.');
      }
    }

    const failedEvaluators: Record<string, string> = {};
    for (const [name, error] of Object.entries(evaluatorResults.failures)) {
      setOwn(failedEvaluators, name, error.message);
    }

    const result = createEvaluationResult({
      name: evaluationName,
      rows: resultTable.records(),
      metrics,
      studioUrl,
      failedEvaluators,
      targetRun,
      evaluatorRuns: evaluatorResults.runs,
    });

    if (opts.outputPath) {
      const written = writeOutput(opts.outputPath, result);
      logger.info(`Wrote evaluation results to ${written}`);
    }
    return result;
  });
}

function combineSignals(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortSignal | undefined {
  if (timeoutMs === undefined) return signal;
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
