import { describe, it, expect } from "vitest";
import { collectingTraceSink, createLogger, isLogLevel, loggingTraceSink } from "../../src/adapters/logging";

function capture(level: Parameters<typeof createLogger>[0]) {
  const lines: string[] = [];
  const logger = createLogger(level, "test", line => lines.push(line));
  return { lines, logger };
}

describe("createLogger", () => {
  it("drops messages below the threshold", () => {
    const { lines, logger } = capture("warn");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e", { code: 1 });
    expect(lines).toEqual(["[test] warn: w", '[test] error: e {"code":1}']);
  });

  it("writes nothing when silent", () => {
    const { lines, logger } = capture("silent");
    logger.error("e");
    expect(lines).toEqual([]);
  });

  it("leaves out empty data", () => {
    const { lines, logger } = capture("debug");
    logger.debug("d", {});
    expect(lines).toEqual(["[test] debug: d"]);
  });
});

describe("isLogLevel", () => {
  it("knows the five levels", () => {
    expect(["debug", "info", "warn", "error", "silent", "trace"].filter(isLogLevel)).toEqual([
      "debug",
      "info",
      "warn",
      "error",
      "silent",
    ]);
  });
});

describe("loggingTraceSink", () => {
  it("logs each event at its level", () => {
    const { lines, logger } = capture("debug");
    const sink = loggingTraceSink(logger);
    sink.emit({ tag: "E_PassCompleted", pass: 4, name: "typecheck", durationMs: 2 });
    sink.emit({ tag: "E_OperationRejected", operationId: "ship", persona: "clerk", reason: "no" });
    sink.emit({ tag: "E_FlowStep", flowId: "f", stepId: "s1", stepType: "branch", result: "true" });
    sink.emit({ tag: "E_FlowCompleted", flowId: "f", outcome: "done", status: "completed", steps: 3 });
    expect(lines).toEqual([
      '[test] debug: pass 4 (typecheck) completed {"durationMs":2}',
      '[test] warn: operation ship rejected: no {"persona":"clerk"}',
      "[test] debug: flow f step s1 (branch): true",
      '[test] info: flow f completed: done {"steps":3}',
    ]);
  });
});

describe("collectingTraceSink", () => {
  it("keeps events in order", () => {
    const sink = collectingTraceSink();
    sink.emit({ tag: "E_FactsAssembled", count: 0, defaulted: [] });
    sink.emit({ tag: "E_VerdictProduced", verdictType: "V", ruleId: "r", stratum: 1 });
    expect(sink.events.map(e => e.tag)).toEqual(["E_FactsAssembled", "E_VerdictProduced"]);
  });
});
