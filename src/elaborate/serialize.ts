import type {
  Bundle,
  CompensateHandler,
  Construct,
  EntityConstruct,
  FactConstruct,
  FailureHandler,
  FlowConstruct,
  FlowStep,
  JoinPolicy,
  OperationConstruct,
  RuleConstruct,
  SourceConstruct,
  StepTarget,
  TerminalTarget,
} from "../interchange/bundle";
import { provenance } from "../interchange/meta";
import { compareBytes } from "../interchange/order";
import { BUNDLE_FORMAT_VERSION, COVENANT_VERSION } from "../interchange/version";
import type { RawHandler, RawJoin, RawOf, RawStep, RawTarget } from "../syntax/ast";
import type { TypedContract } from "./typecheck";

// =========================================================================
// Pass 6: canonical bundle
// =========================================================================

/** Raised when validated input is missing something validation guarantees. */
export class SerializeInvariantError extends Error {
  constructor(what: string) {
    super(`internal error: ${what} missing after validation`);
    this.name = "SerializeInvariantError";
  }
}

function present<T>(value: T | undefined, what: string): T {
  if (value === undefined) throw new SerializeInvariantError(what);
  return value;
}

function byId<T extends { id: string }>(items: Iterable<T>): T[] {
  return [...items].sort((a, b) => compareBytes(a.id, b.id));
}

/**
 * Constructs in the fixed group order: personas, sources, facts, entities,
 * rules (by stratum, then id), operations, flows. Type aliases are gone.
 */
export function serialize(contract: TypedContract, bundleId: string): Bundle {
  const { index } = contract;
  const constructs: Construct[] = [
    ...byId(index.personas.values()).map(p => ({ id: p.id, kind: "Persona" as const, provenance: provenance(p.file, p.line) })),
    ...byId(index.sources.values()).map(sourceConstruct),
    ...byId(index.facts.values()).map(f => factConstruct(f, contract)),
    ...byId(index.entities.values()).map(entityConstruct),
    ...[...index.rules.values()]
      .sort((a, b) => a.stratum - b.stratum || compareBytes(a.id, b.id))
      .map(r => ruleConstruct(r, contract)),
    ...byId(index.operations.values()).map(o => operationConstruct(o, contract)),
    ...byId(index.flows.values()).map(f => flowConstruct(f, contract)),
  ];

  return {
    constructs,
    covenant: COVENANT_VERSION,
    covenant_version: BUNDLE_FORMAT_VERSION,
    id: bundleId,
    kind: "Bundle",
  };
}

function sourceConstruct(s: RawOf<"Source">): SourceConstruct {
  const out: SourceConstruct = {
    fields: Object.fromEntries(s.fields),
    id: s.id,
    kind: "Source",
    protocol: s.protocol,
    provenance: provenance(s.file, s.line),
  };
  if (s.description !== undefined) out.description = s.description;
  return out;
}

function factConstruct(f: RawOf<"Fact">, contract: TypedContract): FactConstruct {
  const typed = present(contract.facts.get(f.id), `type of fact '${f.id}'`);
  const out: FactConstruct = {
    id: f.id,
    kind: "Fact",
    provenance: provenance(f.file, f.line),
    source: typed.source,
    type: typed.type,
  };
  if (typed.default) out.default = typed.default;
  return out;
}

function entityConstruct(e: RawOf<"Entity">): EntityConstruct {
  const out: EntityConstruct = {
    id: e.id,
    initial: e.initial,
    kind: "Entity",
    provenance: provenance(e.file, e.line),
    states: [...e.states],
    transitions: e.transitions.map(t => ({ from: t.from, to: t.to })),
  };
  if (e.parent !== undefined) out.parent = e.parent;
  return out;
}

function ruleConstruct(r: RawOf<"Rule">, contract: TypedContract): RuleConstruct {
  const typed = present(contract.rules.get(r.id), `body of rule '${r.id}'`);
  return {
    body: {
      produce: { payload: { type: typed.payloadType, value: typed.payloadValue }, verdict_type: r.verdictType },
      when: typed.when,
    },
    id: r.id,
    kind: "Rule",
    provenance: provenance(r.file, r.line),
    stratum: r.stratum,
  };
}

function operationConstruct(o: RawOf<"Operation">, contract: TypedContract): OperationConstruct {
  return {
    allowed_personas: [...o.allowedPersonas],
    effects: o.effects.map(e => {
      const effect = { entity_id: e.entity, from: e.from, to: e.to };
      return e.outcome === undefined ? effect : { ...effect, outcome: e.outcome };
    }),
    error_contract: [...o.errorContract],
    id: o.id,
    kind: "Operation",
    outcomes: [...o.outcomes],
    precondition: present(contract.preconditions.get(o.id), `precondition of operation '${o.id}'`),
    provenance: provenance(o.file, o.line),
  };
}

// =========================================================================
// Flows
// =========================================================================

function terminal(outcome: string): TerminalTarget {
  return { kind: "Terminal", outcome };
}

function target(t: RawTarget): StepTarget {
  return t.tag === "Step" ? t.id : terminal(t.outcome);
}

function handler(h: RawHandler): FailureHandler {
  switch (h.tag) {
    case "Terminate":
      return { kind: "Terminate", outcome: h.outcome };
    case "Compensate": {
      const out: CompensateHandler = {
        kind: "Compensate",
        steps: h.steps.map(s => ({ on_failure: terminal(s.onFailure), op: s.op, persona: s.persona })),
        then: terminal(h.then),
      };
      return out;
    }
    case "Escalate":
      return { kind: "Escalate", next: h.next, to_persona: h.toPersona };
  }
}

function join(j: RawJoin): JoinPolicy {
  const out: JoinPolicy = {};
  if (j.onAllSuccess) out.on_all_success = target(j.onAllSuccess);
  if (j.onAnyFailure) out.on_any_failure = handler(j.onAnyFailure);
  if (j.onAllComplete) out.on_all_complete = target(j.onAllComplete);
  return out;
}

function step(s: RawStep, contract: TypedContract): FlowStep {
  switch (s.tag) {
    case "OperationStep":
      return {
        id: s.id,
        kind: "OperationStep",
        on_failure: handler(present(s.onFailure, `on_failure of step '${s.id}'`)),
        op: s.op,
        outcomes: Object.fromEntries(s.outcomes.map((o): [string, StepTarget] => [o.label, target(o.target)])),
        persona: s.persona,
      };
    case "BranchStep":
      return {
        condition: present(contract.conditions.get(s.condition), `condition of step '${s.id}'`),
        id: s.id,
        if_false: target(s.ifFalse),
        if_true: target(s.ifTrue),
        kind: "BranchStep",
        persona: s.persona,
      };
    case "HandoffStep":
      return { from_persona: s.fromPersona, id: s.id, kind: "HandoffStep", next: s.next, to_persona: s.toPersona };
    case "SubFlowStep":
      return {
        flow: s.flow,
        id: s.id,
        kind: "SubFlowStep",
        on_failure: handler(present(s.onFailure, `on_failure of step '${s.id}'`)),
        on_success: target(s.onSuccess),
        persona: s.persona,
      };
    case "ParallelStep":
      return {
        branches: s.branches.map(b => ({ entry: b.entry, id: b.id, steps: b.steps.map(x => step(x, contract)) })),
        id: s.id,
        join: join(s.join),
        kind: "ParallelStep",
      };
  }
}

function flowConstruct(f: RawOf<"Flow">, contract: TypedContract): FlowConstruct {
  return {
    entry: f.entry,
    id: f.id,
    kind: "Flow",
    provenance: provenance(f.file, f.line),
    snapshot: "at_initiation",
    steps: f.steps.map(s => step(s, contract)),
  };
}
