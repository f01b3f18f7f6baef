import type { TraceEvent, TraceSink } from "../ports/trace";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogWriter = (line: string) => void;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

/**
 * Console logger. Lines go to stderr so stdout stays free for command output.
 */
export function createLogger(
  level: LogLevel,
  name = "covenant",
  write: LogWriter = line => console.error(line)
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const log = (lvl: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(lvl) < threshold) return;
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    write(`[${name}] ${lvl}: ${message}${suffix}`);
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
  };
}

/**
 * Wrap a logger as a trace sink. Pass timings and flow steps log at debug,
 * verdicts and operations at info, rejections at warn.
 */
export function loggingTraceSink(logger: Logger): TraceSink {
  return {
    emit(event: TraceEvent): void {
      switch (event.tag) {
        case "E_PassCompleted":
          logger.debug(`pass ${event.pass} (${event.name}) completed`, { durationMs: event.durationMs });
          return;
        case "E_FactsAssembled":
          logger.info(`assembled ${event.count} facts`, { defaulted: event.defaulted });
          return;
        case "E_VerdictProduced":
          logger.info(`verdict ${event.verdictType} produced by ${event.ruleId}`, { stratum: event.stratum });
          return;
        case "E_OperationExecuted":
          logger.info(`operation ${event.operationId} -> ${event.outcome}`, { persona: event.persona, effects: event.effects });
          return;
        case "E_OperationRejected":
          logger.warn(`operation ${event.operationId} rejected: ${event.reason}`, { persona: event.persona });
          return;
        case "E_FlowStep":
          logger.debug(`flow ${event.flowId} step ${event.stepId} (${event.stepType}): ${event.result}`);
          return;
        case "E_FlowCompleted":
          logger.info(`flow ${event.flowId} ${event.status}: ${event.outcome}`, { steps: event.steps });
          return;
      }
    },
  };
}

/**
 * Sink that keeps every event, in order.
 */
export function collectingTraceSink(): TraceSink & { events: TraceEvent[] } {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent): void {
      events.push(event);
    },
  };
}
