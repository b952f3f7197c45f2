/**
 * EvaluationResult: the merged rows, aggregate metrics and report reference of one evaluation.
 */

import type { Run } from '../runs/types.js';
import type { Row } from '../table.js';
import { type RendererOptions, renderResult } from './renderer.js';

/**
 * The result of a single `evaluate` call. Built once, never updated.
 */
export interface EvaluationResult {
  name: string | null;
  /** One record per dataset line, keyed `inputs.<col>`, `outputs.<col>` and `outputs.<evaluator>.<field>`. */
  rows: Row[];
  /** Evaluator metric name (`<evaluator>.<field>`) -> mean value. */
  metrics: Record<string, number>;
  /** Reference to the externally logged report, when one was obtained. */
  studioUrl: string | null;
  /** Evaluators whose runs failed and whose columns are absent from `rows`. */
  failedEvaluators: Record<string, string>;
  targetRun: Run | null;
  evaluatorRuns: Record<string, Run>;

  /** The document written to output sinks. */
  toJSON(): EvaluationResultDocument;
  /** Render the metrics and rows as tables. */
  render(opts?: RendererOptions): string;
  /** Print the rendered result to the console. */
  print(opts?: RendererOptions): void;
}

/**
 * Serialized form of an EvaluationResult.
 */
export interface EvaluationResultDocument {
  rows: Row[];
  metrics: Record<string, number>;
  studio_url: string | null;
  failed_evaluators?: Record<string, string>;
}

export function createEvaluationResult(opts: {
  name?: string | null;
  rows: Row[];
  metrics: Record<string, number>;
  studioUrl?: string | null;
  failedEvaluators?: Record<string, string>;
  targetRun?: Run | null;
  evaluatorRuns?: Record<string, Run>;
}): EvaluationResult {
  const result: EvaluationResult = {
    name: opts.name ?? null,
    rows: opts.rows,
    metrics: opts.metrics,
    studioUrl: opts.studioUrl ?? null,
    failedEvaluators: opts.failedEvaluators ?? {},
    targetRun: opts.targetRun ?? null,
    evaluatorRuns: opts.evaluatorRuns ?? {},

    toJSON() {
      const doc: EvaluationResultDocument = {
        rows: result.rows,
        metrics: result.metrics,
        studio_url: result.studioUrl,
      };
      if (Object.keys(result.failedEvaluators).length > 0) {
        doc.failed_evaluators = result.failedEvaluators;
      }
      return doc;
    },

    render(renderOpts) {
      return renderResult(result, renderOpts);
    },

    print(renderOpts) {
      // eslint-disable-next-line no-console
      console.log(result.render(renderOpts));
    },
  };

  return result;
}
