export type { ProjectScope, ResultsTracker, TrackerPayload } from './output.js';
export { DEFAULT_OUTPUT_FILE_NAME, writeOutput } from './output.js';
export { defaultRenderDuration, defaultRenderNumber } from './render-numbers.js';
export type { RendererOptions } from './renderer.js';
export { renderResult } from './renderer.js';
export type { EvaluationResult, EvaluationResultDocument } from './report.js';
export { createEvaluationResult } from './report.js';
