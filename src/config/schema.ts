/**
 * Zod schemas for evaluation options and evaluation config files.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { RowFunction } from '../functions/base.js';

/** Evaluator name (or `default`) -> destination parameter -> mapping expression. */
export const evaluatorConfigSchema = z.record(z.string(), z.record(z.string(), z.string()));

export const projectScopeSchema = z.record(z.string(), z.unknown());

export const evaluatorErrorPolicySchema = z.enum(['continue', 'raise']);

/**
 * Runtime check of the options passed to `evaluate`. Collaborator objects (runner, tracker,
 * logger, signal) are typed by their interfaces and not inspected here.
 */
export const evaluateOptionsSchema = z
  .object({
    evaluationName: z.string().nullish(),
    target: z.instanceof(RowFunction, { message: 'target must be a RowFunction.' }).nullish(),
    data: z.string({
      required_error: 'data must be provided for evaluation.',
      invalid_type_error: 'data must be a string.',
    }),
    evaluators: z
      .record(z.string(), z.instanceof(RowFunction, { message: 'evaluators must be RowFunctions.' }), {
        required_error: 'evaluators must be provided for evaluation.',
        invalid_type_error: 'evaluators must be a mapping of names to RowFunctions.',
      })
      .refine((evaluators) => Object.keys(evaluators).length > 0, {
        message: 'at least one evaluator must be provided.',
      }),
    evaluatorConfig: evaluatorConfigSchema.nullish(),
    project: projectScopeSchema.nullish(),
    outputPath: z.string({ invalid_type_error: 'outputPath must be a string.' }).nullish(),
    maxConcurrency: z.number().int().positive().optional(),
    maxWorkers: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    onEvaluatorError: evaluatorErrorPolicySchema.optional(),
  })
  .passthrough();

/**
 * Schema of an evaluation config file (YAML or JSON).
 */
export const evaluationConfigFileSchema = z
  .object({
    $schema: z.string().optional(),
    evaluation_name: z.string().optional(),
    data: z.string().optional(),
    output_path: z.string().optional(),
    evaluator_config: evaluatorConfigSchema.optional(),
    project: projectScopeSchema.optional(),
    max_concurrency: z.number().int().positive().optional(),
    max_workers: z.number().int().positive().optional(),
    timeout_ms: z.number().int().positive().optional(),
    on_evaluator_error: evaluatorErrorPolicySchema.optional(),
  })
  .strict();

export type EvaluationConfigFile = z.infer<typeof evaluationConfigFileSchema>;

/**
 * Parse `value` with `schema`, raising ConfigurationError with every issue on failure.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  subject: string,
): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${subject}: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
