import type { Effect, Expr, FlowConstruct, OperationConstruct } from "../interchange/bundle";
import type { Contract } from "./contract";
import { DEFAULT_INSTANCE, type EntityStates } from "./entities";
import type { Snapshot } from "./flow";
import { evalCondition } from "./predicate";
import { ProvenanceCollector } from "./provenance";
import { valueToJson, type JsonValue } from "./values";
import type { VerdictInstance } from "./verdicts";

// =========================================================================
// Types
// =========================================================================

export interface VerdictSummary {
  verdict_type: string;
  payload: JsonValue;
  producing_rule: string;
  stratum: number;
}

export interface EntitySummary {
  entity_id: string;
  current_state: string;
  possible_transitions: string[];
}

/** Entity id → instance ids, each list sorted. */
export type InstanceSets = Record<string, string[]>;

/** A flow the persona can start now. */
export interface Action {
  flow_id: string;
  persona_id: string;
  entry_operation_id: string;
  enabling_verdicts: VerdictSummary[];
  affected_entities: EntitySummary[];
  description: string;
  /** Instances in the source state of the entry operation's effects. */
  instance_bindings: InstanceSets;
}

export type BlockedReason =
  | { type: "PersonaNotAuthorized" }
  | { type: "PreconditionNotMet"; missing_verdicts: string[] }
  | { type: "EntityNotInSourceState"; entity_id: string; current_state: string; required_state: string };

export interface BlockedAction {
  flow_id: string;
  reason: BlockedReason;
  /** Instances that block the action; empty unless the reason is entity state. */
  instance_bindings: InstanceSets;
}

export interface ActionSpace {
  persona_id: string;
  actions: Action[];
  current_verdicts: VerdictSummary[];
  blocked_actions: BlockedAction[];
}

const UNKNOWN_STATE = "(unknown)";

// =========================================================================
// Helpers
// =========================================================================

function summarize(v: VerdictInstance): VerdictSummary {
  return {
    verdict_type: v.type,
    payload: valueToJson(v.payload),
    producing_rule: v.provenance.rule_id,
    stratum: v.provenance.stratum,
  };
}

/** Verdict types an expression mentions, first mention first. */
export function verdictRefs(e: Expr, out: string[] = []): string[] {
  if ("verdict_present" in e) {
    if (!out.includes(e.verdict_present)) out.push(e.verdict_present);
    return out;
  }
  if ("quantifier" in e) return verdictRefs(e.body, out);
  if ("fact_ref" in e || "field_ref" in e || "literal" in e) return out;
  if ("operand" in e) return verdictRefs(e.operand, out);
  verdictRefs(e.left, out);
  return verdictRefs(e.right, out);
}

/** The first effect on each entity; later ones chain from it. */
function leadingEffects(effects: readonly Effect[]): Effect[] {
  const seen = new Set<string>();
  return effects.filter(e => {
    if (seen.has(e.entity_id)) return false;
    seen.add(e.entity_id);
    return true;
  });
}

function describeAction(flowId: string, op: OperationConstruct): string {
  if (op.effects.length === 0) return `Execute ${flowId}: ${op.id}`;
  const moves = op.effects.map(e => `${e.entity_id} from ${e.from} to ${e.to}`);
  return `Execute ${flowId}: ${op.id} transitions ${moves.join(", ")}`;
}

function entryOperation(contract: Contract, flow: FlowConstruct): OperationConstruct | undefined {
  const entry = flow.steps.find(s => s.id === flow.entry);
  if (!entry || entry.kind !== "OperationStep") return undefined;
  return contract.operations.get(entry.op);
}

type EntityCheck = { tag: "Ready"; valid: InstanceSets } | { tag: "Blocked"; blocked: BlockedAction };

function checkEntities(flowId: string, op: OperationConstruct, states: EntityStates): EntityCheck {
  const all = states.entries();
  const valid: InstanceSets = {};
  for (const effect of leadingEffects(op.effects)) {
    const instances = all.filter(s => s.entity_id === effect.entity_id);
    const ready = instances.filter(s => s.state === effect.from).map(s => s.instance_id);
    if (ready.length > 0) {
      valid[effect.entity_id] = ready;
      continue;
    }
    const reason: BlockedReason = {
      type: "EntityNotInSourceState",
      entity_id: effect.entity_id,
      current_state: instances.length > 0 ? instances[0].state : UNKNOWN_STATE,
      required_state: effect.from,
    };
    const blocking = instances.length > 0 ? instances.map(s => s.instance_id) : [DEFAULT_INSTANCE];
    return { tag: "Blocked", blocked: { flow_id: flowId, reason, instance_bindings: { [effect.entity_id]: blocking } } };
  }
  return { tag: "Ready", valid };
}

function affectedEntities(contract: Contract, op: OperationConstruct, states: EntityStates, valid: InstanceSets): EntitySummary[] {
  return leadingEffects(op.effects).map(effect => {
    const instance = valid[effect.entity_id]?.[0] ?? DEFAULT_INSTANCE;
    const current = states.get(effect.entity_id, instance) ?? UNKNOWN_STATE;
    const entity = contract.entities.find(e => e.id === effect.entity_id);
    return {
      entity_id: effect.entity_id,
      current_state: current,
      possible_transitions: entity ? entity.transitions.filter(t => t.from === current).map(t => t.to) : [],
    };
  });
}

// =========================================================================
// Entry point
// =========================================================================

/**
 * What `persona` can start right now, and why the rest is out of reach.
 * Only flows whose entry step is an operation are considered; checks run
 * persona, then precondition, then entity state, and the first one that
 * fails blocks the flow. Reads `states` without changing it.
 */
export function computeActionSpace(
  contract: Contract,
  snapshot: Snapshot,
  states: EntityStates,
  persona: string
): ActionSpace {
  const { verdicts } = snapshot;
  const actions: Action[] = [];
  const blocked: BlockedAction[] = [];

  for (const flow of contract.flows.values()) {
    const op = entryOperation(contract, flow);
    if (!op) continue;

    if (!op.allowed_personas.includes(persona)) {
      blocked.push({ flow_id: flow.id, reason: { type: "PersonaNotAuthorized" }, instance_bindings: {} });
      continue;
    }

    const refs = verdictRefs(op.precondition);
    if (!evalCondition(op.precondition, snapshot, new ProvenanceCollector())) {
      const missing = refs.filter(v => !verdicts.has(v));
      blocked.push({ flow_id: flow.id, reason: { type: "PreconditionNotMet", missing_verdicts: missing }, instance_bindings: {} });
      continue;
    }

    const check = checkEntities(flow.id, op, states);
    if (check.tag === "Blocked") {
      blocked.push(check.blocked);
      continue;
    }

    actions.push({
      flow_id: flow.id,
      persona_id: persona,
      entry_operation_id: op.id,
      enabling_verdicts: refs.flatMap(v => {
        const instance = verdicts.get(v);
        return instance ? [summarize(instance)] : [];
      }),
      affected_entities: affectedEntities(contract, op, states, check.valid),
      description: describeAction(flow.id, op),
      instance_bindings: check.valid,
    });
  }

  return {
    persona_id: persona,
    actions,
    current_verdicts: verdicts.items.map(summarize),
    blocked_actions: blocked,
  };
}
