// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  DatabaseConfigSchema,
  EmbeddingsConfigSchema,
  LlmConfigSchema,
  SearchConfigSchema,
  EvaluationConfigSchema,
  RrfConfigSchema,
  ParamRangeSchema,
} from './schema.js';

export type {
  AppConfig,
  DatabaseConfig,
  EmbeddingsConfig,
  LlmConfig,
  SearchConfig,
  EvaluationConfig,
  RrfConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { CONFIG_ENV_VAR, loadConfig, resolveConfigPath, resolveEnvVars, deepMerge } from './loader.js';
