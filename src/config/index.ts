export type { ConfigFormat, EvaluationConfig, LoadConfigOptions } from './loader.js';
export {
  loadEvaluationConfigFromFile,
  loadEvaluationConfigFromObject,
  loadEvaluationConfigFromText,
} from './loader.js';
export type { EvaluationConfigFile } from './schema.js';
export {
  evaluateOptionsSchema,
  evaluationConfigFileSchema,
  evaluatorConfigSchema,
} from './schema.js';
