// src/core/config/index.ts
// Configuration system exports

export {
  type ElaborateConfig,
  type EvalConfig,
  type LogConfig,
  type CovenantConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_EVAL_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  MAX_REASONABLE_FLOW_STEPS,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
