import { describe, it, expect } from "vitest";
import { collectingTraceSink } from "../../src/adapters/logging";
import { EntityStates } from "../../src/eval/entities";
import { formatEvalError, formatOperationError } from "../../src/eval/errors";
import { evaluateOperation } from "../../src/eval/evaluate";
import { executeOperation } from "../../src/eval/operation";
import { VerdictSet } from "../../src/eval/verdicts";
import type { Effect, OperationConstruct } from "../../src/interchange";
import { unwrap, type Outcome } from "../../src/outcome";
import { invoiceBundle } from "../helpers/contracts";

const bundle = invoiceBundle();

function run(operationId: string, persona: string, amount: number, states?: EntityStates, bindings?: Map<string, string>) {
  return unwrap(evaluateOperation(bundle, { amount }, operationId, persona, { states, bindings }), formatEvalError);
}

function errorOf<A, E>(o: Outcome<A, E>): E {
  if (o.tag === "Done") throw new Error("expected the operation to be rejected");
  return o.error;
}

function op(id: string, effects: Effect[], outcomes: string[] = ["done"]): OperationConstruct {
  return {
    id,
    kind: "Operation",
    provenance: { file: "ops.cov", line: 1 },
    allowed_personas: ["clerk"],
    precondition: { literal: true, type: { base: "Bool" } },
    effects,
    outcomes,
    error_contract: [],
  };
}

const noFacts = { facts: new Map(), verdicts: VerdictSet.EMPTY };
const initial = () =>
  new EntityStates([
    { entity_id: "Invoice", instance_id: "_default", state: "draft" },
    { entity_id: "Shipment", instance_id: "_default", state: "pending" },
  ]);

describe("evaluateOperation", () => {
  it("applies effects and records provenance", () => {
    const { operation, states } = run("submit", "clerk", 1200);
    const effects = [{ entity_id: "Invoice", instance_id: "_default", from: "draft", to: "submitted" }];
    expect(operation).toEqual({
      tag: "Done",
      value: {
        outcome: "submitted",
        effects,
        provenance: {
          operation_id: "submit",
          persona: "clerk",
          outcome: "submitted",
          effects,
          facts_used: ["amount"],
          verdicts_used: [],
        },
      },
      meta: {},
    });
    expect(states.get("Invoice")).toBe("submitted");
  });

  it("checks the persona before anything else", () => {
    const { operation, states } = run("submit", "manager", 1200);
    const error = errorOf(operation);
    expect(error).toEqual({ tag: "persona_rejected", operationId: "submit", persona: "manager" });
    expect(formatOperationError(error)).toBe("persona 'manager' not authorized for operation 'submit'");
    expect(states.get("Invoice")).toBe("draft");
  });

  it("reports a false precondition", () => {
    expect(formatOperationError(errorOf(run("submit", "clerk", 0).operation))).toBe(
      "precondition failed for operation 'submit': precondition evaluated to false"
    );
  });

  it("reads verdicts from the same evaluation", () => {
    const submitted = new EntityStates([{ entity_id: "Invoice", instance_id: "_default", state: "submitted" }]);
    const result = run("approve", "manager", 1200, submitted);
    expect(result.operation.tag).toBe("Done");
    expect(result.verdicts.has("WithinLimit")).toBe(true);
    expect(errorOf(run("approve", "manager", 9000).operation).tag).toBe("precondition_failed");
  });

  it("picks the first outcome whose effects match the current state", () => {
    const submitted = new EntityStates([{ entity_id: "Invoice", instance_id: "_default", state: "submitted" }]);
    const { operation, states } = run("decide", "manager", 1200, submitted);
    expect(unwrap(operation).outcome).toBe("approved");
    expect(states.get("Invoice")).toBe("approved");
  });

  it("reports the first outcome's mismatch when none applies", () => {
    const error = errorOf(run("decide", "manager", 1200).operation);
    expect(formatOperationError(error)).toBe("entity 'Invoice' instance '_default' in state 'draft', expected 'submitted'");
  });

  it("targets bound instances", () => {
    const states = new EntityStates([{ entity_id: "Invoice", instance_id: "inv-7", state: "draft" }]);
    const { operation } = run("submit", "clerk", 1200, states, new Map([["Invoice", "inv-7"]]));
    expect(unwrap(operation).effects).toEqual([{ entity_id: "Invoice", instance_id: "inv-7", from: "draft", to: "submitted" }]);
    expect(states.entries()).toEqual([{ entity_id: "Invoice", instance_id: "inv-7", state: "submitted" }]);

    const missing = run("submit", "clerk", 1200, states, new Map([["Invoice", "inv-9"]]));
    expect(formatOperationError(errorOf(missing.operation))).toBe(
      "entity 'Invoice' instance 'inv-9' not found in state map"
    );
  });

  it("fails as a whole for an unknown operation", () => {
    expect(evaluateOperation(bundle, { amount: 1 }, "pay", "clerk")).toEqual({
      tag: "Fail",
      error: { tag: "malformed_bundle", message: "operation 'pay' is not in the bundle" },
      meta: {},
    });
  });
});

describe("executeOperation", () => {
  it("applies no effect when a later one fails", () => {
    const states = initial();
    const both = op("both", [
      { entity_id: "Invoice", from: "draft", to: "submitted" },
      { entity_id: "Shipment", from: "shipped", to: "pending" },
    ]);
    expect(errorOf(executeOperation(both, "clerk", noFacts, states))).toEqual({
      tag: "invalid_entity_state",
      entityId: "Shipment",
      instanceId: "_default",
      expected: "shipped",
      actual: "pending",
    });
    expect(states.get("Invoice")).toBe("draft");
  });

  it("lets each effect see the ones before it", () => {
    const states = initial();
    const chain = op("chain", [
      { entity_id: "Invoice", from: "draft", to: "submitted" },
      { entity_id: "Invoice", from: "submitted", to: "approved" },
    ]);
    expect(unwrap(executeOperation(chain, "clerk", noFacts, states)).effects).toHaveLength(2);
    expect(states.get("Invoice")).toBe("approved");
  });

  it("turns evaluation failures into an evaluation error", () => {
    const broken = { ...op("broken", []), precondition: { fact_ref: "ghost" } };
    const error = errorOf(executeOperation(broken, "clerk", noFacts, initial()));
    expect(error).toEqual({ tag: "evaluation_error", error: { tag: "unknown_fact", factId: "ghost" } });
    expect(formatOperationError(error)).toBe("evaluation error: unknown fact: ghost");
  });

  it("traces executions and rejections", () => {
    const sink = collectingTraceSink();
    const submit = op("submit", [{ entity_id: "Invoice", from: "draft", to: "submitted" }], ["submitted"]);
    executeOperation(submit, "clerk", noFacts, initial(), { trace: sink });
    executeOperation(submit, "auditor", noFacts, initial(), { trace: sink });
    expect(sink.events).toEqual([
      { tag: "E_OperationExecuted", operationId: "submit", persona: "clerk", outcome: "submitted", effects: 1 },
      {
        tag: "E_OperationRejected",
        operationId: "submit",
        persona: "auditor",
        reason: "persona 'auditor' not authorized for operation 'submit'",
      },
    ]);
  });
});
