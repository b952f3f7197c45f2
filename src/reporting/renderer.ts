/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { defaultRenderDuration, defaultRenderNumber } from './render-numbers.js';
import type { EvaluationResult } from './report.js';

export interface RendererOptions {
  /** Render the per-row table. Defaults to true. */
  includeRows?: boolean;
  /** Render `inputs.*` columns in the row table. Defaults to true. */
  includeInputs?: boolean;
  /** Maximum number of rows rendered. Defaults to all. */
  maxRows?: number;
  /** Render run durations. Defaults to true. */
  includeDurations?: boolean;
}

/**
 * Render an EvaluationResult as a metrics table followed by a row table.
 */
export function renderResult(result: EvaluationResult, opts?: RendererOptions): string {
  const includeRows = opts?.includeRows ?? true;
  const includeDurations = opts?.includeDurations ?? true;

  const sections: string[] = [`Evaluation Summary: ${result.name ?? 'evaluation'}`];

  const metrics = new Table({ head: [chalk.bold('Metric'), 'Value'], style: { head: [], border: [] } });
  for (const [name, value] of Object.entries(result.metrics)) {
    metrics.push([name, defaultRenderNumber(value)]);
  }
  if (metrics.length === 0) {
    metrics.push([chalk.italic('no numeric metrics'), '-']);
  }
  sections.push(metrics.toString());

  const failed = Object.entries(result.failedEvaluators);
  if (failed.length > 0) {
    sections.push(
      ['Failed evaluators:', ...failed.map(([name, message]) => `  ${chalk.red('✘')} ${name}: ${message}`)].join(
        '\n',
      ),
    );
  }

  if (includeDurations) {
    const runs = [
      ...(result.targetRun ? [['target', result.targetRun] as const] : []),
      ...Object.entries(result.evaluatorRuns),
    ];
    if (runs.length > 0) {
      const lines = runs.map(
        ([label, run]) =>
          `  ${label}: ${run.status}, ${defaultRenderDuration((run.endedAt.getTime() - run.startedAt.getTime()) / 1000)}`,
      );
      sections.push(['Runs:', ...lines].join('\n'));
    }
  }

  if (includeRows && result.rows.length > 0) {
    sections.push(renderRows(result, opts));
  }

  return sections.join('\n');
}

function renderRows(result: EvaluationResult, opts?: RendererOptions): string {
  const includeInputs = opts?.includeInputs ?? true;
  const rows = opts?.maxRows !== undefined ? result.rows.slice(0, opts.maxRows) : result.rows;

  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key) && (includeInputs || !key.startsWith('inputs.'))) {
        columns.push(key);
      }
    }
  }

  const table = new Table({
    head: [chalk.bold('#'), ...columns],
    style: { head: [], border: [] },
  });
  rows.forEach((row, i) => {
    table.push([String(i), ...columns.map((c) => formatValue(row[c]))]);
  });

  const omitted = result.rows.length - rows.length;
  return omitted > 0 ? `${table.toString()}\n  ... ${omitted} more rows` : table.toString();
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '-';
  if (typeof value === 'number') return defaultRenderNumber(value);
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
