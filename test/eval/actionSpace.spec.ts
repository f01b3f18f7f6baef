import { describe, it, expect } from "vitest";
import { verdictRefs } from "../../src/eval/actionSpace";
import { EntityStates } from "../../src/eval/entities";
import { formatEvalError } from "../../src/eval/errors";
import { evaluateActionSpace, type ActionSpaceOptions } from "../../src/eval/evaluate";
import type { Expr } from "../../src/interchange";
import { unwrap } from "../../src/outcome";
import { bundleOf, invoiceBundle } from "../helpers/contracts";

const invoice = invoiceBundle();

const closing = bundleOf(`
persona manager
fact amount { type: Int(min: 0, max: 100), source: "s.amount" }
entity Doc { states: [open, done], initial: open, transitions: [(open, done)] }
rule small { stratum: 0, when: amount < 10, produce: verdict Small { payload: Int(min: 0, max: 100) = amount } }
operation close { allowed_personas: [manager], precondition: verdict_present(Small), effects: [(Doc, open -> done)], outcomes: [closed] }
flow closing { entry: c, steps: { c: OperationStep { op: close, persona: manager, outcomes: { closed: Terminal(closed) }, on_failure: Terminate(outcome: not_closed) } } }
`);

function closingSpace(amount: number, options: ActionSpaceOptions = {}) {
  return unwrap(evaluateActionSpace(closing, { amount }, "manager", options), formatEvalError);
}

const docs = (...entries: [string, string][]) =>
  new EntityStates(entries.map(([instance_id, state]) => ({ entity_id: "Doc", instance_id, state })));

describe("evaluateActionSpace", () => {
  it("lists the flows a persona can start", () => {
    const space = unwrap(evaluateActionSpace(invoice, { amount: 1200 }, "clerk"), formatEvalError);
    expect(space.actions.map(a => a.flow_id)).toEqual(["compensating_flow", "escalating_flow", "invoice_flow", "ship_only"]);
    expect(space.actions[2]).toEqual({
      flow_id: "invoice_flow",
      persona_id: "clerk",
      entry_operation_id: "submit",
      enabling_verdicts: [],
      affected_entities: [{ entity_id: "Invoice", current_state: "draft", possible_transitions: ["submitted"] }],
      description: "Execute invoice_flow: submit transitions Invoice from draft to submitted",
      instance_bindings: { Invoice: ["_default"] },
    });
    expect(space.current_verdicts).toEqual([{ verdict_type: "WithinLimit", payload: true, producing_rule: "within_limit", stratum: 0 }]);
    expect(space.blocked_actions).toEqual([]);
  });

  it("blocks flows the persona may not start", () => {
    const space = unwrap(evaluateActionSpace(invoice, { amount: 1200 }, "manager"), formatEvalError);
    expect(space.actions).toEqual([]);
    expect(space.blocked_actions.map(b => [b.flow_id, b.reason.type])).toEqual([
      ["compensating_flow", "PersonaNotAuthorized"],
      ["escalating_flow", "PersonaNotAuthorized"],
      ["invoice_flow", "PersonaNotAuthorized"],
      ["ship_only", "PersonaNotAuthorized"],
    ]);
  });

  it("names the verdicts that enable an action", () => {
    expect(closingSpace(5).actions[0].enabling_verdicts).toEqual([
      { verdict_type: "Small", payload: 5, producing_rule: "small", stratum: 0 },
    ]);
  });

  it("names the verdicts a failed precondition is missing", () => {
    expect(closingSpace(50).blocked_actions).toEqual([
      { flow_id: "closing", reason: { type: "PreconditionNotMet", missing_verdicts: ["Small"] }, instance_bindings: {} },
    ]);
  });

  it("blocks when no instance is in the source state", () => {
    expect(closingSpace(5, { states: docs(["_default", "done"]) }).blocked_actions).toEqual([
      {
        flow_id: "closing",
        reason: { type: "EntityNotInSourceState", entity_id: "Doc", current_state: "done", required_state: "open" },
        instance_bindings: { Doc: ["_default"] },
      },
    ]);
    expect(closingSpace(5, { states: new EntityStates() }).blocked_actions[0].reason).toEqual({
      type: "EntityNotInSourceState",
      entity_id: "Doc",
      current_state: "(unknown)",
      required_state: "open",
    });
  });

  it("binds the instances that are ready", () => {
    const states = docs(["d1", "open"], ["d2", "done"], ["d3", "open"]);
    const [action] = closingSpace(5, { states }).actions;
    expect(action.instance_bindings).toEqual({ Doc: ["d1", "d3"] });
    expect(action.affected_entities).toEqual([{ entity_id: "Doc", current_state: "open", possible_transitions: ["done"] }]);
    expect(states.get("Doc", "d1")).toBe("open");
  });
});

describe("verdictRefs", () => {
  it("collects each verdict once, in order of mention", () => {
    const expr: Expr = {
      left: { op: "not", operand: { verdict_present: "B" } },
      op: "or",
      right: { left: { verdict_present: "A" }, op: "and", right: { verdict_present: "B" } },
    };
    expect(verdictRefs(expr)).toEqual(["B", "A"]);
  });
});
