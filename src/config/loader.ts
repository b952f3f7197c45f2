/**
 * YAML/JSON loading of evaluation config files.
 *
 * A config file holds everything about an evaluation that is plain data; the target and
 * evaluators are code and are passed next to it:
 *
 * ```ts
 * const config = loadEvaluationConfigFromFile('eval.yaml');
 * const result = await evaluate({ ...config, evaluators: { relevance: new Relevance() } });
 * ```
 */

import { readFileSync } from 'node:fs';
import { basename, dirname, extname, isAbsolute, resolve } from 'node:path';
import YAML from 'yaml';
import { ConfigurationError, toError } from '../errors.js';
import type { EvaluateOptions } from '../evaluate.js';
import { evaluationConfigFileSchema, parseOrThrow } from './schema.js';

export type ConfigFormat = 'yaml' | 'json';

/** The data-only part of EvaluateOptions a config file can provide. */
export type EvaluationConfig = Partial<
  Pick<
    EvaluateOptions,
    | 'evaluationName'
    | 'data'
    | 'outputPath'
    | 'evaluatorConfig'
    | 'project'
    | 'maxConcurrency'
    | 'maxWorkers'
    | 'timeoutMs'
    | 'onEvaluatorError'
  >
>;

export interface LoadConfigOptions {
  /** File format. If not specified, inferred from the file extension. */
  fmt?: ConfigFormat;
  /** Directory relative `data` and `output_path` are resolved against. */
  baseDir?: string;
}

/**
 * Load an evaluation config from a file. Relative paths inside it are resolved against the
 * file's directory.
 */
export function loadEvaluationConfigFromFile(
  path: string,
  opts?: Pick<LoadConfigOptions, 'fmt'>,
): EvaluationConfig {
  const fmt = opts?.fmt ?? inferFormat(path);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigurationError(`Failed to read evaluation config ${path}: ${toError(e).message}`, {
      cause: e,
    });
  }
  return loadEvaluationConfigFromText(content, { fmt, baseDir: dirname(resolve(path)) });
}

/**
 * Load an evaluation config from a string. Defaults to YAML.
 */
export function loadEvaluationConfigFromText(
  content: string,
  opts?: LoadConfigOptions,
): EvaluationConfig {
  const fmt = opts?.fmt ?? 'yaml';
  let raw: unknown;
  try {
    raw = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  } catch (e) {
    throw new ConfigurationError(`Evaluation config is not valid ${fmt}: ${toError(e).message}`, {
      cause: e,
    });
  }
  return loadEvaluationConfigFromObject(raw, opts);
}

/**
 * Load an evaluation config from a plain object (after parsing YAML/JSON).
 */
export function loadEvaluationConfigFromObject(
  data: unknown,
  opts?: Pick<LoadConfigOptions, 'baseDir'>,
): EvaluationConfig {
  const parsed = parseOrThrow(evaluationConfigFileSchema, data ?? {}, 'evaluation config');
  const resolvePath = (p: string): string =>
    opts?.baseDir && !isAbsolute(p) ? resolve(opts.baseDir, p) : p;

  const config: EvaluationConfig = {};
  if (parsed.evaluation_name !== undefined) config.evaluationName = parsed.evaluation_name;
  if (parsed.data !== undefined) config.data = resolvePath(parsed.data);
  if (parsed.output_path !== undefined) config.outputPath = resolvePath(parsed.output_path);
  if (parsed.evaluator_config !== undefined) config.evaluatorConfig = parsed.evaluator_config;
  if (parsed.project !== undefined) config.project = parsed.project;
  if (parsed.max_concurrency !== undefined) config.maxConcurrency = parsed.max_concurrency;
  if (parsed.max_workers !== undefined) config.maxWorkers = parsed.max_workers;
  if (parsed.timeout_ms !== undefined) config.timeoutMs = parsed.timeout_ms;
  if (parsed.on_evaluator_error !== undefined) config.onEvaluatorError = parsed.on_evaluator_error;
  return config;
}

function inferFormat(path: string): ConfigFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new ConfigurationError(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}
