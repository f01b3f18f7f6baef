import type { Effect, OperationConstruct } from "../interchange/bundle";
import { done, fail } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import { nullTraceSink, type TraceSink } from "../ports/trace";
import type { FactSet } from "./assemble";
import { instanceFor, type EntityStates, type InstanceBindings } from "./entities";
import { formatOperationError, isEvalException, type OperationError } from "./errors";
import { evalCondition } from "./predicate";
import { ProvenanceCollector } from "./provenance";
import type { VerdictSet } from "./verdicts";

// =========================================================================
// Operation execution
// =========================================================================

export interface EffectRecord {
  entity_id: string;
  instance_id: string;
  from: string;
  to: string;
}

export interface OperationProvenance {
  operation_id: string;
  persona: string;
  outcome: string;
  effects: EffectRecord[];
  facts_used: string[];
  verdicts_used: string[];
}

export interface OperationResult {
  outcome: string;
  effects: EffectRecord[];
  provenance: OperationProvenance;
}

export interface ExecuteOptions {
  bindings?: InstanceBindings;
  trace?: TraceSink;
}

/** The facts and verdicts an operation's precondition reads. */
export interface OperationContext {
  readonly facts: FactSet;
  readonly verdicts: VerdictSet;
}

/**
 * Walk `effects` over the current state without touching it. Each effect
 * sees the state left by the ones before it.
 */
function plan(
  effects: readonly Effect[],
  states: EntityStates,
  bindings: InstanceBindings | undefined
): Outcome<EffectRecord[], OperationError> {
  const staged = new Map<string, string>();
  const records: EffectRecord[] = [];

  for (const effect of effects) {
    const instanceId = instanceFor(bindings, effect.entity_id);
    const key = JSON.stringify([effect.entity_id, instanceId]);
    const current = staged.get(key) ?? states.get(effect.entity_id, instanceId);
    if (current === undefined) {
      return fail({ tag: "entity_not_found", entityId: effect.entity_id, instanceId });
    }
    if (current !== effect.from) {
      return fail({
        tag: "invalid_entity_state",
        entityId: effect.entity_id,
        instanceId,
        expected: effect.from,
        actual: current,
      });
    }
    staged.set(key, effect.to);
    records.push({ entity_id: effect.entity_id, instance_id: instanceId, from: effect.from, to: effect.to });
  }
  return done(records);
}

/**
 * Outcome and effects to apply. Single-outcome operations apply every
 * effect; otherwise the first declared outcome whose effects all match the
 * current state wins, and when none does the first outcome's mismatch is
 * reported.
 */
function determine(
  op: OperationConstruct,
  states: EntityStates,
  bindings: InstanceBindings | undefined
): Outcome<{ outcome: string; effects: EffectRecord[] }, OperationError> {
  const labelled = op.effects.some(e => e.outcome !== undefined);
  if (op.outcomes.length <= 1 || !labelled) {
    const planned = plan(op.effects, states, bindings);
    if (planned.tag === "Fail") return planned;
    return done({ outcome: op.outcomes[0] ?? "success", effects: planned.value });
  }

  let firstFailure: OperationError | undefined;
  for (const outcome of op.outcomes) {
    const planned = plan(op.effects.filter(e => e.outcome === outcome), states, bindings);
    if (planned.tag === "Done") return done({ outcome, effects: planned.value });
    firstFailure ??= planned.error;
  }
  return fail(
    firstFailure ?? {
      tag: "precondition_failed",
      operationId: op.id,
      reason: "multi-outcome operation has no effect-to-outcome mapping",
    }
  );
}

/**
 * The five steps, in order: persona check, precondition, outcome
 * determination, effect application, provenance. Either every effect of
 * the chosen outcome is applied to `states` or none is.
 */
export function executeOperation(
  op: OperationConstruct,
  persona: string,
  ctx: OperationContext,
  states: EntityStates,
  options: ExecuteOptions = {}
): Outcome<OperationResult, OperationError> {
  const trace = options.trace ?? nullTraceSink;
  const reject = (error: OperationError): Outcome<OperationResult, OperationError> => {
    trace.emit({ tag: "E_OperationRejected", operationId: op.id, persona, reason: formatOperationError(error) });
    return fail(error);
  };

  if (!op.allowed_personas.includes(persona)) {
    return reject({ tag: "persona_rejected", operationId: op.id, persona });
  }

  const collector = new ProvenanceCollector();
  let met: boolean;
  try {
    met = evalCondition(op.precondition, ctx, collector);
  } catch (e) {
    if (isEvalException(e)) return reject({ tag: "evaluation_error", error: e.error });
    throw e;
  }
  if (!met) {
    return reject({ tag: "precondition_failed", operationId: op.id, reason: "precondition evaluated to false" });
  }

  const chosen = determine(op, states, options.bindings);
  if (chosen.tag === "Fail") return reject(chosen.error);

  const { outcome, effects } = chosen.value;
  for (const effect of effects) states.set(effect.entity_id, effect.instance_id, effect.to);

  trace.emit({ tag: "E_OperationExecuted", operationId: op.id, persona, outcome, effects: effects.length });
  return done({
    outcome,
    effects,
    provenance: { operation_id: op.id, persona, outcome, effects, ...collector.usage() },
  });
}
