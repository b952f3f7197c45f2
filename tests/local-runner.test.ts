import { describe, expect, it } from 'vitest';
import { getRowContext, incrementRunMetric } from '../src/context.js';
import { MissingRequiredInputsError } from '../src/errors.js';
import { defineFunction } from '../src/functions/base.js';
import { LocalBatchRunner, resolveInputs } from '../src/runs/local-runner.js';
import { Table } from '../src/table.js';

const data = Table.fromRecords([{ n: 1 }, { n: 2 }, { n: 3 }]);

const double = defineFunction({
  name: 'double',
  parameters: ['n'],
  fn: ({ n }) => ({ doubled: Number(n) * 2 }),
});

describe('LocalBatchRunner', () => {
  it('rejects a non-positive worker count', () => {
    expect(() => new LocalBatchRunner({ maxWorkers: 0 })).toThrow('maxWorkers must be a positive integer');
  });

  it('produces namespaced inputs and outputs per line', async () => {
    const runner = new LocalBatchRunner();
    const run = await runner.submit({ fn: double, data, dataPath: 'data.jsonl' });

    expect(run.status).toBe('completed');
    expect(run.name).toBe('double');
    expect(run.functionName).toBe('double');
    expect(run.dataPath).toBe('data.jsonl');
    expect(run.lineCount).toBe(3);
    expect(run.failures).toEqual([]);

    const results = await runner.getResults(run);
    expect(results.records()).toEqual([
      { 'inputs.n': 1, 'inputs.line_number': 0, 'outputs.doubled': 2 },
      { 'inputs.n': 2, 'inputs.line_number': 1, 'outputs.doubled': 4 },
      { 'inputs.n': 3, 'inputs.line_number': 2, 'outputs.doubled': 6 },
    ]);
  });

  it('keeps line order whatever order lines finish in', async () => {
    const slowFirst = defineFunction({
      name: 'slowFirst',
      parameters: ['n'],
      fn: async ({ n }) => {
        await new Promise((resolve) => setTimeout(resolve, n === 1 ? 30 : 0));
        return { n };
      },
    });
    const runner = new LocalBatchRunner({ maxWorkers: 3 });
    const run = await runner.submit({ fn: slowFirst, data });
    const results = await runner.getResults(run);
    expect(results.column('outputs.n')).toEqual([1, 2, 3]);
    expect(results.column('inputs.line_number')).toEqual([0, 1, 2]);
  });

  it('stores non-object return values under output', async () => {
    const scalar = defineFunction({ name: 'scalar', parameters: ['n'], fn: ({ n }) => (n === 2 ? undefined : 'ok') });
    const runner = new LocalBatchRunner();
    const results = await runner.getResults(await runner.submit({ fn: scalar, data }));
    expect(results.column('outputs.output')).toEqual(['ok', null, 'ok']);
  });

  it('records failed lines and marks the run failed', async () => {
    const flaky = defineFunction({
      name: 'flaky',
      parameters: ['n'],
      fn: ({ n }) => {
        if (n === 2) throw new Error('boom');
        return { ok: true };
      },
    });
    const runner = new LocalBatchRunner();
    const run = await runner.submit({ fn: flaky, data });

    expect(run.status).toBe('failed');
    expect(run.failures).toHaveLength(1);
    expect(run.failures[0]?.lineNumber).toBe(1);
    expect(run.failures[0]?.errorMessage).toBe('Error: boom');

    const results = await runner.getResults(run);
    expect(results.length).toBe(3);
    expect(results.column('outputs.ok')).toEqual([true, null, true]);
  });

  it('does not run any line when the signal is already aborted', async () => {
    const calls: unknown[] = [];
    const fn = defineFunction({
      name: 'record',
      parameters: ['n'],
      fn: ({ n }) => {
        calls.push(n);
        return { n };
      },
    });
    const controller = new AbortController();
    controller.abort();
    const runner = new LocalBatchRunner();
    const run = await runner.submit({ fn, data, signal: controller.signal });

    expect(run.status).toBe('canceled');
    expect(calls).toEqual([]);
    expect((await runner.getResults(run)).records()).toEqual([
      { 'inputs.line_number': 0 },
      { 'inputs.line_number': 1 },
      { 'inputs.line_number': 2 },
    ]);
  });

  it('skips the lines after an abort and keeps finished ones', async () => {
    const controller = new AbortController();
    const abortOnSecond = defineFunction({
      name: 'abortOnSecond',
      parameters: ['n'],
      fn: ({ n }) => {
        if (n === 2) controller.abort();
        return { n };
      },
    });
    const runner = new LocalBatchRunner({ maxWorkers: 1 });
    const run = await runner.submit({ fn: abortOnSecond, data, signal: controller.signal });

    expect(run.status).toBe('canceled');
    expect(run.failures).toEqual([]);
    const results = await runner.getResults(run);
    expect(results.column('outputs.n')).toEqual([1, 2, null]);
    expect(results.column('inputs.line_number')).toEqual([0, 1, 2]);
  });

  it('completes when the signal fires after the last line started', async () => {
    const controller = new AbortController();
    const abortOnLast = defineFunction({
      name: 'abortOnLast',
      parameters: ['n'],
      fn: ({ n }) => {
        if (n === 3) controller.abort();
        return { n };
      },
    });
    const runner = new LocalBatchRunner({ maxWorkers: 1 });
    const run = await runner.submit({ fn: abortOnLast, data, signal: controller.signal });

    expect(run.status).toBe('completed');
    expect((await runner.getResults(run)).column('outputs.n')).toEqual([1, 2, 3]);
  });

  it('forgets released runs', async () => {
    const runner = new LocalBatchRunner();
    const run = await runner.submit({ fn: double, data });
    runner.release(run);
    await expect(runner.getResults(run)).rejects.toThrow(`Run 'double' (${run.id}) not found`);
  });

  it('sums metrics whose names are Object.prototype keys', async () => {
    const fn = defineFunction({
      name: 'protoMetric',
      parameters: [],
      fn: () => {
        incrementRunMetric('constructor', 2);
        return null;
      },
    });
    const runner = new LocalBatchRunner();
    const run = await runner.submit({ fn, data });
    expect(run.metrics).toEqual({ constructor: 6 });
  });

  it('exposes the row context and sums run metrics', async () => {
    const seen: Array<number | undefined> = [];
    const counting = defineFunction({
      name: 'counting',
      parameters: ['n'],
      fn: ({ n }) => {
        seen.push(getRowContext()?.lineNumber);
        incrementRunMetric('tokens', Number(n));
        incrementRunMetric('unused', 0);
        return { n };
      },
    });
    const runner = new LocalBatchRunner({ maxWorkers: 1 });
    const run = await runner.submit({ fn: counting, data, name: 'count run' });

    expect(seen).toEqual([0, 1, 2]);
    expect(run.name).toBe('count run');
    expect(run.metrics).toEqual({ tokens: 6 });
    expect(getRowContext()).toBeNull();
  });

  it('reads run outputs of a previous run for the same line', async () => {
    const runner = new LocalBatchRunner();
    const first = await runner.submit({ fn: double, data });
    const plusOne = defineFunction({
      name: 'plusOne',
      parameters: ['value'],
      fn: ({ value }) => ({ result: Number(value) + 1 }),
    });
    const second = await runner.submit({
      fn: plusOne,
      data,
      previousRun: first,
      columnMapping: { value: '${run.outputs.doubled}' },
    });

    expect(second.previousRunId).toBe(first.id);
    expect(second.columnMapping).toEqual({ value: '${run.outputs.doubled}' });
    expect((await runner.getResults(second)).column('outputs.result')).toEqual([3, 5, 7]);
  });

  it('handles an empty dataset', async () => {
    const runner = new LocalBatchRunner();
    const run = await runner.submit({ fn: double, data: Table.fromRecords([]) });
    expect(run.status).toBe('completed');
    expect((await runner.getResults(run)).length).toBe(0);
  });

  it('rejects results of an unknown run', async () => {
    const runner = new LocalBatchRunner();
    const run = await new LocalBatchRunner().submit({ fn: double, data });
    await expect(runner.getResults(run)).rejects.toThrow(`Run 'double' (${run.id}) not found`);
  });
});

describe('resolveInputs', () => {
  const fn = defineFunction({ name: 'f', parameters: ['question', 'answer'], fn: () => null });

  it('reads unmapped parameters from the same-named column', () => {
    expect(resolveInputs(fn, { question: 'q', answer: 'a', other: 1 }, {}, null)).toEqual({
      question: 'q',
      answer: 'a',
    });
  });

  it('resolves data and run output references', () => {
    const mapping = { question: '${data.prompt}', answer: '${run.outputs.response}' };
    expect(resolveInputs(fn, { prompt: 'p' }, { response: 'r' }, mapping)).toEqual({
      question: 'p',
      answer: 'r',
    });
  });

  it('passes literals through', () => {
    expect(resolveInputs(fn, { question: 'q' }, {}, { answer: 'fixed' })).toEqual({
      question: 'q',
      answer: 'fixed',
    });
  });

  it('passes extra mapped columns to a variadic parameter', () => {
    const variadic = defineFunction({
      name: 'v',
      parameters: ['question', { name: 'rest', variadic: true }],
      fn: () => null,
    });
    expect(resolveInputs(variadic, { question: 'q', ctx: 'c' }, {}, { context: '${data.ctx}' })).toEqual({
      question: 'q',
      context: 'c',
    });
  });

  it('omits optional parameters that cannot be resolved', () => {
    const optional = defineFunction({
      name: 'o',
      parameters: ['question', { name: 'answer', hasDefault: true }],
      fn: () => null,
    });
    expect(resolveInputs(optional, { question: 'q' }, {}, null)).toEqual({ question: 'q' });
  });

  it('reads parameters named like Object.prototype keys from the data', () => {
    const proto = defineFunction({ name: 'proto', parameters: ['constructor'], fn: () => null });
    expect(resolveInputs(proto, { constructor: 'data-value' }, {}, {})).toEqual({ constructor: 'data-value' });

    const missing = defineFunction({ name: 'missing', parameters: ['toString'], fn: () => null });
    expect(() => resolveInputs(missing, {}, {}, null)).toThrow(
      'Missing required inputs for evaluator missing : ["toString"].',
    );
  });

  it('throws for missing required parameters', () => {
    expect(() => resolveInputs(fn, { question: 'q' }, {}, null)).toThrow(MissingRequiredInputsError);
    expect(() => resolveInputs(fn, { question: 'q' }, {}, null)).toThrow(
      'Missing required inputs for evaluator f : ["answer"].',
    );
  });
});
