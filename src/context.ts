/**
 * AsyncLocalStorage-based context for the line currently being executed by a batch run.
 *
 * Lets a target or evaluator find out which line it is processing, observe cancellation
 * through the run's AbortSignal, and record run-level metrics with incrementRunMetric().
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ownValue, setOwn } from './records.js';

export interface RowContext {
  runId: string;
  runName: string;
  /** 0-based row index of the line being executed. */
  lineNumber: number;
  /** Aborted when the run is canceled or times out. */
  signal: AbortSignal;
}

interface RowState {
  context: RowContext;
  metrics: Record<string, number>;
}

const rowStorage = new AsyncLocalStorage<RowState>();

/**
 * Run a function within a row context.
 * Returns the result along with the metrics recorded while it ran.
 */
export async function withRowContext<T>(
  context: RowContext,
  fn: () => Promise<T>,
): Promise<{ result: T; metrics: Record<string, number> }> {
  const state: RowState = { context, metrics: {} };
  const result = await rowStorage.run(state, fn);
  return { result, metrics: state.metrics };
}

/**
 * The context of the line being executed, or null outside of a batch run.
 */
export function getRowContext(): RowContext | null {
  return rowStorage.getStore()?.context ?? null;
}

/**
 * Increment a metric on the current run. Values are summed across lines.
 * No-op if called outside of a batch run.
 */
export function incrementRunMetric(name: string, amount: number): void {
  const state = rowStorage.getStore();
  if (state) {
    const currentValue = ownValue(state.metrics, name) ?? 0;
    const newValue = currentValue + amount;
    // Avoid recording a metric that is always zero
    if (currentValue === 0 && newValue === 0) return;
    setOwn(state.metrics, name, newValue);
  }
}
