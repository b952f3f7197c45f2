/**
 * Output sinks: a local JSON file, and an external tracker that hosts the report.
 */

import { mkdirSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { OutputWriteError } from '../errors.js';
import type { Run } from '../runs/types.js';
import type { Table } from '../table.js';
import type { EvaluationResult } from './report.js';

/** File name used when the output path is a directory. */
export const DEFAULT_OUTPUT_FILE_NAME = 'evaluation_results.json';

/**
 * Reference to the external project results are logged to. Its shape belongs to the tracker.
 */
export type ProjectScope = Record<string, unknown>;

export interface TrackerPayload {
  project: ProjectScope;
  evaluationName: string | null;
  metrics: Record<string, number>;
  /** Fully namespaced result table. */
  table: Table;
  targetRun: Run | null;
  dataPath: string;
}

/**
 * Destination that stores the metrics and rows of an evaluation and returns a link to them.
 */
export interface ResultsTracker {
  logResults(payload: TrackerPayload): Promise<string | null>;
}

/**
 * Write the result document as JSON. A directory path gets `evaluation_results.json` inside it;
 * any other path is written as-is, creating parent directories.
 *
 * @returns the path of the written file
 */
export function writeOutput(path: string, result: EvaluationResult): string {
  let filePath = path;
  try {
    if (isDirectory(path)) filePath = join(path, DEFAULT_OUTPUT_FILE_NAME);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, `${JSON.stringify(result.toJSON(), null, 2)}\n`, 'utf-8');
  } catch (e) {
    throw new OutputWriteError(filePath, e);
  }
  return filePath;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
