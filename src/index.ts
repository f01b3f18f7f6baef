// src/index.ts
// Public API: elaborate contract sources into interchange bundles and
// evaluate bundles against facts.

// ═══════════════════════════════════════════════════════════════════════════════
// INTERCHANGE
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./interchange";

// ═══════════════════════════════════════════════════════════════════════════════
// ELABORATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./elaborate";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./eval";

// ═══════════════════════════════════════════════════════════════════════════════
// NUMERICS
// ═══════════════════════════════════════════════════════════════════════════════

export { Decimal, DecimalParseError } from "./numeric/decimal";
export { INT_MAX, INT_MIN } from "./numeric/bounds";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES, DIAGNOSTICS, CONFIG, LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
export * from "./core/config";
export { nullTraceSink, type TraceEvent, type TraceSink } from "./ports/trace";
export {
  collectingTraceSink,
  createLogger,
  isLogLevel,
  loggingTraceSink,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogWriter,
} from "./adapters/logging";
