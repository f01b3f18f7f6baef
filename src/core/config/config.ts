// src/core/config/config.ts
// Configuration for the elaborator, the evaluator and logging

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../../adapters/logging";

// =========================================================================
// Configuration Types
// =========================================================================

export type ElaborateConfig = {
  /** Directory imports may not escape; defaults to the root file's directory */
  sandboxRoot?: string;
};

export type EvalConfig = {
  /** Steps a single flow execution may take before it is aborted */
  maxFlowSteps: number;
};

export type LogConfig = {
  level: LogLevel;
};

export type CovenantConfig = {
  elaborate: ElaborateConfig;
  eval: EvalConfig;
  log: LogConfig;
};

export type PartialConfig = {
  elaborate?: Partial<ElaborateConfig>;
  eval?: Partial<EvalConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_EVAL_CONFIG: EvalConfig = {
  maxFlowSteps: 1000,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: CovenantConfig = {
  elaborate: {},
  eval: DEFAULT_EVAL_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const CONFIG_FILE_NAMES = ["covenant.config.json", ".covenantrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "COVENANT", env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: PartialConfig = {};

  const sandboxRoot = env[`${prefix}_SANDBOX_ROOT`];
  if (sandboxRoot) config.elaborate = { sandboxRoot };

  const maxFlowSteps = parseInt(env[`${prefix}_MAX_FLOW_STEPS`] || "", 10);
  if (Number.isFinite(maxFlowSteps)) config.eval = { maxFlowSteps };

  const level = env[`${prefix}_LOG_LEVEL`];
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`${prefix}_LOG_LEVEL: unknown log level '${level}'`);
    }
    config.log = { level };
  }

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file ${filePath} must contain a JSON object`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object. Keys may be camelCase or snake_case.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const config: PartialConfig = {};
  const elaborateData = section(data, "elaborate");
  const evalData = section(data, "eval");
  const logData = section(data, "log");

  const sandboxRoot = pick(elaborateData, "sandboxRoot", "sandbox_root");
  if (typeof sandboxRoot === "string") config.elaborate = { sandboxRoot };

  const maxFlowSteps = pick(evalData, "maxFlowSteps", "max_flow_steps");
  if (typeof maxFlowSteps === "number") config.eval = { maxFlowSteps };

  const level = logData.level;
  if (typeof level === "string") {
    if (!isLogLevel(level)) {
      throw new Error(`log.level: unknown log level '${level}'`);
    }
    config.log = { level };
  }

  return config;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): CovenantConfig {
  const result: CovenantConfig = {
    elaborate: { ...DEFAULT_CONFIG.elaborate },
    eval: { ...DEFAULT_CONFIG.eval },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    if (cfg.elaborate) {
      result.elaborate = { ...result.elaborate, ...cfg.elaborate };
    }
    if (cfg.eval) {
      result.eval = { ...result.eval, ...cfg.eval };
    }
    if (cfg.log) {
      result.log = { ...result.log, ...cfg.log };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): CovenantConfig {
  const layers: PartialConfig[] = [configFromEnv("COVENANT", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        layers.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export const MAX_REASONABLE_FLOW_STEPS = 1_000_000;

export function validateConfig(config: CovenantConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isSafeInteger(config.eval.maxFlowSteps) || config.eval.maxFlowSteps < 1) {
    errors.push(`eval.maxFlowSteps must be a positive integer, got ${config.eval.maxFlowSteps}`);
  } else if (config.eval.maxFlowSteps > MAX_REASONABLE_FLOW_STEPS) {
    warnings.push(`eval.maxFlowSteps is very large (${config.eval.maxFlowSteps})`);
  }

  if (!isLogLevel(config.log.level)) {
    errors.push(`log.level must be one of debug, info, warn, error, silent`);
  }

  if (config.elaborate.sandboxRoot !== undefined && config.elaborate.sandboxRoot.trim() === "") {
    errors.push("elaborate.sandboxRoot must not be empty");
  }

  return { valid: errors.length === 0, errors, warnings };
}

// =========================================================================
// Helpers
// =========================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}
