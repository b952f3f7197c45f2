import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadJsonl, parseJsonl } from '../src/data/loader.js';
import { DataLoadError } from '../src/errors.js';

describe('parseJsonl', () => {
  it('parses one record per line in order', () => {
    const t = parseJsonl('{"question":"q1"}\n{"question":"q2"}\n');
    expect(t.columns).toEqual(['question']);
    expect(t.column('question')).toEqual(['q1', 'q2']);
  });

  it('skips blank lines and handles CRLF', () => {
    const t = parseJsonl('{"a":1}\r\n\r\n{"a":2}\r\n');
    expect(t.column('a')).toEqual([1, 2]);
  });

  it('normalizes missing fields to null', () => {
    const t = parseJsonl('{"a":1}\n{"b":2}');
    expect(t.records()).toEqual([
      { a: 1, b: null },
      { a: null, b: 2 },
    ]);
  });

  it('keeps structured values', () => {
    const t = parseJsonl('{"ctx":{"docs":["x","y"]}}');
    expect(t.row(0)).toEqual({ ctx: { docs: ['x', 'y'] } });
  });

  it('keeps a __proto__ field as a regular column', () => {
    const t = parseJsonl('{"__proto__":5,"a":1}');
    expect(t.columns).toEqual(['__proto__', 'a']);
    expect(t.column('__proto__')).toEqual([5]);
    const record = t.records()[0] ?? {};
    expect(Object.getOwnPropertyDescriptor(record, '__proto__')?.value).toBe(5);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
  });

  it('rejects invalid JSON with the line number', () => {
    let error: unknown;
    try {
      parseJsonl('{"a":1}\n{oops', 'data.jsonl');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(DataLoadError);
    if (!(error instanceof DataLoadError)) return;
    expect(error.lineNumber).toBe(1);
    expect(error.path).toBe('data.jsonl');
    expect(error.message).toContain('Failed to load data from data.jsonl (line 2)');
  });

  it('rejects lines that are not objects', () => {
    expect(() => parseJsonl('[1,2]')).toThrow('expected a JSON object, got an array');
    expect(() => parseJsonl('42')).toThrow('expected a JSON object, got a number');
    expect(() => parseJsonl('null')).toThrow('expected a JSON object, got null');
  });

  it('returns an empty table for empty content', () => {
    expect(parseJsonl('').length).toBe(0);
  });
});

describe('loadJsonl', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'batch-evals-loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a file', () => {
    const path = join(dir, 'data.jsonl');
    writeFileSync(path, '{"x":1}\n{"x":2}\n');
    expect(loadJsonl(path).column('x')).toEqual([1, 2]);
  });

  it('raises DataLoadError for a missing file', () => {
    const path = join(dir, 'missing.jsonl');
    expect(() => loadJsonl(path)).toThrow(DataLoadError);
  });
});
