import type { Bundle } from "../interchange/bundle";
import { attempt } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import { nullTraceSink, type TraceSink } from "../ports/trace";
import { computeActionSpace, type ActionSpace } from "./actionSpace";
import { assembleFacts, type FactInputs, type FactSet } from "./assemble";
import { contractOf, operationOf, type Contract } from "./contract";
import { EntityStates, type InstanceBindings } from "./entities";
import { recogniseEval, type EvalError, type OperationError } from "./errors";
import { executeFlow, takeSnapshot, type FlowResult, type Snapshot } from "./flow";
import { executeOperation, type OperationResult } from "./operation";
import { evalStrata } from "./rules";
import type { VerdictSet } from "./verdicts";

// =========================================================================
// Public evaluation API
// =========================================================================

export interface EvaluateOptions {
  trace?: TraceSink;
}

export interface EvalResult {
  facts: FactSet;
  verdicts: VerdictSet;
}

function readPath(contract: Contract, inputs: FactInputs, trace: TraceSink): Snapshot {
  const facts = assembleFacts(contract.facts, inputs, trace);
  return takeSnapshot(facts, evalStrata(contract.rules, facts, trace));
}

/**
 * Assemble facts and run the stratified rules. Pure: nothing outside the
 * returned value changes.
 */
export function evaluate(bundle: Bundle, inputs: FactInputs, options: EvaluateOptions = {}): Outcome<EvalResult, EvalError> {
  const trace = options.trace ?? nullTraceSink;
  return attempt(() => readPath(contractOf(bundle), inputs, trace), recogniseEval);
}

export interface FlowEvalOptions extends EvaluateOptions {
  persona?: string;
  bindings?: InstanceBindings;
  maxSteps?: number;
  /** Starting entity state; every entity's initial state when omitted. Updated in place. */
  states?: EntityStates;
}

export interface FlowEvalResult {
  verdicts: VerdictSet;
  flow: FlowResult;
  states: EntityStates;
}

/**
 * Evaluate the read path once, freeze it as the flow's snapshot, and run
 * flow `flowId` over it.
 */
export function evaluateFlow(
  bundle: Bundle,
  inputs: FactInputs,
  flowId: string,
  options: FlowEvalOptions = {}
): Outcome<FlowEvalResult, EvalError> {
  const trace = options.trace ?? nullTraceSink;
  return attempt(() => {
    const contract = contractOf(bundle);
    const snapshot = readPath(contract, inputs, trace);
    const states = options.states ?? EntityStates.initial(contract.entities);
    const flow = executeFlow(contract, flowId, snapshot, states, {
      persona: options.persona,
      bindings: options.bindings,
      maxSteps: options.maxSteps,
      trace,
    });
    return { verdicts: snapshot.verdicts, flow, states };
  }, recogniseEval);
}

export interface OperationEvalOptions extends EvaluateOptions {
  bindings?: InstanceBindings;
  states?: EntityStates;
}

export interface OperationEvalResult {
  verdicts: VerdictSet;
  operation: Outcome<OperationResult, OperationError>;
  states: EntityStates;
}

/**
 * Evaluate the read path, then execute one operation outside any flow. A
 * rejected operation is a value in `operation`, not a failure.
 */
export function evaluateOperation(
  bundle: Bundle,
  inputs: FactInputs,
  operationId: string,
  persona: string,
  options: OperationEvalOptions = {}
): Outcome<OperationEvalResult, EvalError> {
  const trace = options.trace ?? nullTraceSink;
  return attempt(() => {
    const contract = contractOf(bundle);
    const snapshot = readPath(contract, inputs, trace);
    const states = options.states ?? EntityStates.initial(contract.entities);
    const op = operationOf(contract, operationId);
    const operation = executeOperation(op, persona, snapshot, states, { bindings: options.bindings, trace });
    return { verdicts: snapshot.verdicts, operation, states };
  }, recogniseEval);
}

export interface ActionSpaceOptions extends EvaluateOptions {
  /** Current entity state; every entity's initial state when omitted. Never changed. */
  states?: EntityStates;
}

/** Evaluate the read path and list the flows `persona` can start from `states`. */
export function evaluateActionSpace(
  bundle: Bundle,
  inputs: FactInputs,
  persona: string,
  options: ActionSpaceOptions = {}
): Outcome<ActionSpace, EvalError> {
  const trace = options.trace ?? nullTraceSink;
  return attempt(() => {
    const contract = contractOf(bundle);
    const snapshot = readPath(contract, inputs, trace);
    return computeActionSpace(contract, snapshot, options.states ?? EntityStates.initial(contract.entities), persona);
  }, recogniseEval);
}
