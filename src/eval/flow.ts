import type { FailureHandler, FlowStep, ParallelStep, StepTarget } from "../interchange/bundle";
import { isTerminal } from "../interchange/bundle";
import { nullTraceSink, type TraceSink } from "../ports/trace";
import type { FactSet } from "./assemble";
import { flowOf, operationOf, type Contract } from "./contract";
import type { EntityStates, InstanceBindings } from "./entities";
import { evalFail, formatOperationError } from "./errors";
import { executeOperation, type EffectRecord } from "./operation";
import { evalCondition } from "./predicate";
import { ProvenanceCollector } from "./provenance";
import type { VerdictSet } from "./verdicts";

// =========================================================================
// Types
// =========================================================================

/**
 * Facts and verdicts taken once when a flow starts. Sub-flows and parallel
 * branches read the same snapshot; nothing in a flow recomputes it.
 */
export interface Snapshot {
  readonly facts: FactSet;
  readonly verdicts: VerdictSet;
}

export function takeSnapshot(facts: FactSet, verdicts: VerdictSet): Snapshot {
  return Object.freeze({ facts, verdicts });
}

export type StepType = "operation" | "branch" | "handoff" | "sub_flow" | "parallel" | "compensation" | "escalation";

export interface StepRecord {
  step_id: string;
  step_type: StepType;
  result: string;
}

export type FlowStatus = "completed" | "failed";

export interface FlowResult {
  flow_id: string;
  outcome: string;
  status: FlowStatus;
  steps: StepRecord[];
  effects: EffectRecord[];
  initiating_persona?: string;
}

export interface FlowOptions {
  /** Recorded on the result; step personas come from the flow itself. */
  persona?: string;
  bindings?: InstanceBindings;
  maxSteps?: number;
  trace?: TraceSink;
}

export const DEFAULT_MAX_FLOW_STEPS = 1000;

type Route = { tag: "Step"; id: string } | { tag: "End"; outcome: string; status: FlowStatus };

function routeTo(target: StepTarget): Route {
  return isTerminal(target) ? { tag: "End", outcome: target.outcome, status: "completed" } : { tag: "Step", id: target };
}

function failedWith(outcome: string): Route {
  return { tag: "End", outcome, status: "failed" };
}

/** Mutable trail of one run: its step records and applied effects. */
interface Trail {
  readonly steps: StepRecord[];
  readonly effects: EffectRecord[];
}

// =========================================================================
// Runner
// =========================================================================

class FlowRunner {
  private readonly trace: TraceSink;
  private readonly maxSteps: number;

  constructor(
    private readonly contract: Contract,
    private readonly snapshot: Snapshot,
    private readonly options: FlowOptions
  ) {
    this.trace = options.trace ?? nullTraceSink;
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_FLOW_STEPS;
  }

  /**
   * Run a step graph from `entry` until it reaches a terminal. `flowId`
   * labels errors and trace events; parallel branches use `flow.branch`.
   */
  run(flowId: string, steps: readonly FlowStep[], entry: string, states: EntityStates): FlowResult {
    const byId = new Map(steps.map((s): [string, FlowStep] => [s.id, s]));
    const trail: Trail = { steps: [], effects: [] };
    let route: Route = { tag: "Step", id: entry };
    let count = 0;

    while (route.tag === "Step") {
      if (count >= this.maxSteps) {
        evalFail({ tag: "flow_error", flowId, message: `exceeded maximum step count (${this.maxSteps})` });
      }
      count++;
      const step = byId.get(route.id);
      if (!step) return evalFail({ tag: "flow_error", flowId, message: `step '${route.id}' not found` });
      route = this.step(flowId, step, states, trail);
    }

    this.trace.emit({
      tag: "E_FlowCompleted",
      flowId,
      outcome: route.outcome,
      status: route.status,
      steps: trail.steps.length,
    });
    return { flow_id: flowId, outcome: route.outcome, status: route.status, steps: trail.steps, effects: trail.effects };
  }

  private record(flowId: string, trail: Trail, rec: StepRecord): void {
    trail.steps.push(rec);
    this.trace.emit({ tag: "E_FlowStep", flowId, stepId: rec.step_id, stepType: rec.step_type, result: rec.result });
  }

  private step(flowId: string, step: FlowStep, states: EntityStates, trail: Trail): Route {
    switch (step.kind) {
      case "OperationStep": {
        const op = operationOf(this.contract, step.op);
        const result = executeOperation(op, step.persona, this.snapshot, states, {
          bindings: this.options.bindings,
          trace: this.trace,
        });
        if (result.tag === "Fail") {
          // evaluation failures are contract violations, not routine rejections
          if (result.error.tag === "evaluation_error") return evalFail(result.error.error);
          this.record(flowId, trail, { step_id: step.id, step_type: "operation", result: `error: ${formatOperationError(result.error)}` });
          return this.handleFailure(flowId, step.id, step.on_failure, states, trail);
        }
        this.record(flowId, trail, { step_id: step.id, step_type: "operation", result: result.value.outcome });
        trail.effects.push(...result.value.effects);
        const outcome = result.value.outcome;
        const target = Object.prototype.hasOwnProperty.call(step.outcomes, outcome) ? step.outcomes[outcome] : undefined;
        if (target === undefined) {
          return evalFail({
            tag: "flow_error",
            flowId,
            message: `step '${step.id}' has no route for outcome '${outcome}'`,
          });
        }
        return routeTo(target);
      }

      case "BranchStep": {
        const taken = evalCondition(step.condition, this.snapshot, new ProvenanceCollector());
        this.record(flowId, trail, { step_id: step.id, step_type: "branch", result: String(taken) });
        return routeTo(taken ? step.if_true : step.if_false);
      }

      case "HandoffStep":
        this.record(flowId, trail, {
          step_id: step.id,
          step_type: "handoff",
          result: `${step.from_persona} -> ${step.to_persona}`,
        });
        return { tag: "Step", id: step.next };

      case "SubFlowStep": {
        const sub = flowOf(this.contract, step.flow);
        const result = this.run(sub.id, sub.steps, sub.entry, states);
        trail.effects.push(...result.effects);
        this.record(flowId, trail, { step_id: step.id, step_type: "sub_flow", result: `${sub.id}: ${result.outcome}` });
        return result.status === "completed"
          ? routeTo(step.on_success)
          : this.handleFailure(flowId, step.id, step.on_failure, states, trail);
      }

      case "ParallelStep":
        return this.parallel(flowId, step, states, trail);
    }
  }

  /**
   * Every branch runs on its own copy of the entity state, so no branch sees
   * another's effects. Branches touch disjoint entities, so whatever each one
   * committed is merged back once all of them have ended, failed or not.
   */
  private parallel(flowId: string, step: ParallelStep, states: EntityStates, trail: Trail): Route {
    const results = step.branches.map(branch => ({
      id: branch.id,
      result: this.run(`${flowId}.${branch.id}`, branch.steps, branch.entry, states.clone()),
    }));

    this.record(flowId, trail, {
      step_id: step.id,
      step_type: "parallel",
      result: results.map(b => `${b.id}:${b.result.outcome}`).join(", "),
    });

    for (const { result } of results) {
      trail.steps.push(...result.steps);
      for (const effect of result.effects) states.set(effect.entity_id, effect.instance_id, effect.to);
      trail.effects.push(...result.effects);
    }

    const { join } = step;
    const failed = results.some(b => b.result.status === "failed");
    if (!failed && join.on_all_success !== undefined) return routeTo(join.on_all_success);
    if (failed && join.on_any_failure !== undefined) {
      return this.handleFailure(flowId, step.id, join.on_any_failure, states, trail);
    }
    if (join.on_all_complete !== undefined) return routeTo(join.on_all_complete);
    return evalFail({ tag: "flow_error", flowId, message: `parallel step '${step.id}' has no applicable join route` });
  }

  private handleFailure(flowId: string, stepId: string, handler: FailureHandler, states: EntityStates, trail: Trail): Route {
    switch (handler.kind) {
      case "Terminate":
        return failedWith(handler.outcome);

      case "Compensate":
        for (const comp of handler.steps) {
          const op = operationOf(this.contract, comp.op);
          const result = executeOperation(op, comp.persona, this.snapshot, states, {
            bindings: this.options.bindings,
            trace: this.trace,
          });
          const rec: StepRecord = { step_id: `comp:${comp.op}`, step_type: "compensation", result: "" };
          if (result.tag === "Fail") {
            this.record(flowId, trail, { ...rec, result: `error: ${formatOperationError(result.error)}` });
            return failedWith(comp.on_failure.outcome);
          }
          this.record(flowId, trail, { ...rec, result: result.value.outcome });
          trail.effects.push(...result.value.effects);
        }
        return failedWith(handler.then.outcome);

      case "Escalate":
        this.record(flowId, trail, { step_id: stepId, step_type: "escalation", result: `escalated to ${handler.to_persona}` });
        return { tag: "Step", id: handler.next };
    }
  }
}

// =========================================================================
// Entry point
// =========================================================================

/**
 * Run flow `flowId` against a snapshot taken by the caller. `states` is
 * updated in place as operations commit. Throws an EvalException for flow
 * errors and contract violations; routine operation failures are routed
 * through the flow's failure handlers.
 */
export function executeFlow(
  contract: Contract,
  flowId: string,
  snapshot: Snapshot,
  states: EntityStates,
  options: FlowOptions = {}
): FlowResult {
  const flow = flowOf(contract, flowId);
  const result = new FlowRunner(contract, snapshot, options).run(flow.id, flow.steps, flow.entry, states);
  return options.persona === undefined ? result : { ...result, initiating_persona: options.persona };
}
