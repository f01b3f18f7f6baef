import type { RawHandler, RawOf, RawStep, RawTarget } from "../../syntax/ast";
import { elabError, siteOf } from "../errors";
import { findCycle, topoSort } from "../graph";
import type { ConstructIndex } from "../indexer";
import { validateVerdictRefs, type Producers } from "./rule";

const PASS = 5;

type Flow = RawOf<"Flow">;

/** One step namespace: the flow itself or a parallel branch. */
interface StepScope {
  steps: RawStep[];
  entry: string;
  entryField: string;
  entryLine: number;
  /** Field path prefix for steps in this scope, ending in `.`. */
  prefix: string;
}

interface StepRef {
  id: string;
  field: string;
  line: number;
}

export function validateFlow(flow: Flow, index: ConstructIndex, producers: Producers): void {
  validateScope(flow, index, producers, {
    steps: flow.steps,
    entry: flow.entry,
    entryField: "entry",
    entryLine: flow.lines.entry ?? flow.line,
    prefix: "steps.",
  });
}

function validateScope(flow: Flow, index: ConstructIndex, producers: Producers, scope: StepScope): void {
  const fail = (field: string, line: number, message: string) =>
    elabError(PASS, siteOf(flow, line), field, message);
  const ids = new Set(scope.steps.map(s => s.id));
  const p = scope.prefix;

  if (!ids.has(scope.entry)) {
    throw fail(scope.entryField, scope.entryLine, `entry step '${scope.entry}' is not declared in steps`);
  }

  for (const step of scope.steps) {
    if ((step.tag === "OperationStep" || step.tag === "SubFlowStep") && !step.onFailure) {
      throw fail(`${p}${step.id}.on_failure`, step.line, `${step.tag} '${step.id}' must declare a FailureHandler`);
    }
    if (step.tag === "ParallelStep" && !step.join.onAllSuccess && !step.join.onAnyFailure && !step.join.onAllComplete) {
      throw fail(
        `${p}${step.id}.join`,
        step.join.line,
        `ParallelStep '${step.id}' join must declare at least one of on_all_success, on_any_failure, on_all_complete`
      );
    }
  }

  for (const step of scope.steps) {
    for (const ref of stepRefs(step, p)) {
      if (!ids.has(ref.id)) throw fail(ref.field, ref.line, `step reference '${ref.id}' is not declared in steps`);
    }
  }

  for (const step of scope.steps) {
    validateStepTargets(flow, step, p, index, producers);
  }

  const successors = new Map(scope.steps.map((s): [string, string[]] => [s.id, stepRefs(s, p).map(r => r.id)]));
  const { blocked } = topoSort([...ids], id => successors.get(id) ?? []);
  if (blocked.length > 0) {
    const first = scope.steps.find(s => s.id === blocked[0]);
    throw fail(
      p.slice(0, -1),
      first?.line ?? flow.line,
      `flow step graph is not acyclic: cycle detected involving steps [${blocked.join(", ")}]`
    );
  }

  for (const step of scope.steps) {
    if (step.tag !== "ParallelStep") continue;
    const branchIds = new Set<string>();
    for (const branch of step.branches) {
      const at = `${p}${step.id}.branches.${branch.id}`;
      if (branchIds.has(branch.id)) throw fail(`${p}${step.id}.branches`, branch.line, `duplicate branch id '${branch.id}'`);
      branchIds.add(branch.id);
      validateScope(flow, index, producers, {
        steps: branch.steps,
        entry: branch.entry,
        entryField: `${at}.entry`,
        entryLine: branch.line,
        prefix: `${at}.steps.`,
      });
    }
  }
}

function targetRef(target: RawTarget | undefined, field: string): StepRef[] {
  return target && target.tag === "Step" ? [{ id: target.id, field, line: target.line }] : [];
}

function handlerRefs(handler: RawHandler | undefined, field: string): StepRef[] {
  return handler && handler.tag === "Escalate" ? [{ id: handler.next, field, line: handler.line }] : [];
}

/** Step ids a step can continue to, each with the field that names it. */
function stepRefs(step: RawStep, p: string): StepRef[] {
  const at = `${p}${step.id}`;
  switch (step.tag) {
    case "OperationStep":
      return [
        ...step.outcomes.flatMap(o => targetRef(o.target, `${at}.outcomes.${o.label}`)),
        ...handlerRefs(step.onFailure, `${at}.on_failure`),
      ];
    case "BranchStep":
      return [...targetRef(step.ifTrue, `${at}.if_true`), ...targetRef(step.ifFalse, `${at}.if_false`)];
    case "HandoffStep":
      return [{ id: step.next, field: `${at}.next`, line: step.line }];
    case "SubFlowStep":
      return [...targetRef(step.onSuccess, `${at}.on_success`), ...handlerRefs(step.onFailure, `${at}.on_failure`)];
    case "ParallelStep":
      return [
        ...targetRef(step.join.onAllSuccess, `${at}.join.on_all_success`),
        ...targetRef(step.join.onAllComplete, `${at}.join.on_all_complete`),
        ...handlerRefs(step.join.onAnyFailure, `${at}.join.on_any_failure`),
      ];
  }
}

function validateStepTargets(flow: Flow, step: RawStep, p: string, index: ConstructIndex, producers: Producers): void {
  const at = `${p}${step.id}`;
  const fail = (field: string, line: number, message: string) =>
    elabError(PASS, siteOf(flow, line), field, message);
  const persona = (name: string, field: string, line: number) => {
    if (!index.personas.has(name)) throw fail(field, line, `undeclared persona '${name}'`);
  };
  const handler = (h: RawHandler | undefined, field: string) => {
    if (!h) return;
    if (h.tag === "Escalate") persona(h.toPersona, field, h.line);
    if (h.tag === "Compensate") {
      for (const comp of h.steps) {
        if (!index.operations.has(comp.op)) {
          throw fail(field, comp.line, `compensation step references undeclared operation '${comp.op}'`);
        }
        persona(comp.persona, field, comp.line);
      }
    }
  };

  switch (step.tag) {
    case "OperationStep": {
      persona(step.persona, `${at}.persona`, step.line);
      handler(step.onFailure, `${at}.on_failure`);
      const op = index.operations.get(step.op);
      if (!op) throw fail(`${at}.op`, step.line, `OperationStep '${step.id}' references undeclared operation '${step.op}'`);
      const routed = new Set(step.outcomes.map(o => o.label));
      for (const o of step.outcomes) {
        if (!op.outcomes.includes(o.label)) {
          throw fail(`${at}.outcomes`, o.target.line, `outcome label '${o.label}' is not declared by operation '${op.id}'`);
        }
      }
      for (const outcome of op.outcomes) {
        if (!routed.has(outcome)) {
          throw fail(`${at}.outcomes`, step.line, `OperationStep '${step.id}' does not route outcome '${outcome}' of operation '${op.id}'`);
        }
      }
      return;
    }
    case "BranchStep":
      persona(step.persona, `${at}.persona`, step.line);
      validateVerdictRefs(step.condition, producers, siteOf(flow, step.line), `${at}.condition`);
      return;
    case "HandoffStep":
      persona(step.fromPersona, `${at}.from_persona`, step.line);
      persona(step.toPersona, `${at}.to_persona`, step.line);
      return;
    case "SubFlowStep":
      persona(step.persona, `${at}.persona`, step.line);
      handler(step.onFailure, `${at}.on_failure`);
      if (!index.flows.has(step.flow)) {
        throw fail(`${at}.flow`, step.line, `SubFlowStep '${step.id}' references undeclared flow '${step.flow}'`);
      }
      return;
    case "ParallelStep":
      handler(step.join.onAnyFailure, `${at}.join.on_any_failure`);
      return;
  }
}

// =========================================================================
// Cross-flow checks
// =========================================================================

/** Every step of `steps`, descending into parallel branches. */
function allSteps(steps: RawStep[]): RawStep[] {
  return steps.flatMap(s => (s.tag === "ParallelStep" ? [s, ...s.branches.flatMap(b => allSteps(b.steps))] : [s]));
}

export function validateFlowReferences(index: ConstructIndex): void {
  const ids = [...index.flows.keys()].sort();
  const calls = (id: string): string[] => {
    const flow = index.flows.get(id);
    if (!flow) return [];
    return allSteps(flow.steps).flatMap(s => (s.tag === "SubFlowStep" ? [s.flow] : []));
  };
  const cycle = findCycle(ids, calls);
  if (!cycle) return;

  const from = index.flows.get(cycle[cycle.length - 2]);
  if (!from) return;
  const to = cycle[cycle.length - 1];
  const step = allSteps(from.steps).find(s => s.tag === "SubFlowStep" && s.flow === to);
  throw elabError(
    PASS,
    siteOf(from, step?.line),
    step ? `steps.${step.id}.flow` : "steps",
    `flow reference cycle detected: ${cycle.join(" → ")}`
  );
}

/** Entity to how it is reached: undefined when directly, else the sub-flow path. */
type EntityEffects = Map<string, string | undefined>;

export function validateParallelBranches(index: ConstructIndex): void {
  for (const flow of index.flows.values()) {
    checkParallel(flow, flow.steps, "steps.", index);
  }
}

function checkParallel(flow: Flow, steps: RawStep[], p: string, index: ConstructIndex): void {
  for (const step of steps) {
    if (step.tag !== "ParallelStep") continue;
    const effects = step.branches.map(b => ({ id: b.id, effects: branchEffects(b.steps, index, new Set([flow.id])) }));

    for (let i = 0; i < effects.length; i++) {
      for (let j = i + 1; j < effects.length; j++) {
        const a = effects[i];
        const b = effects[j];
        for (const entity of [...a.effects.keys()].sort()) {
          if (!b.effects.has(entity)) continue;
          const traceA = a.effects.get(entity);
          const traceB = b.effects.get(entity);
          let message = `parallel branches '${a.id}' and '${b.id}' both declare effects on entity '${entity}'; parallel branch entity effect sets must be disjoint`;
          if (traceA !== undefined || traceB !== undefined) {
            const [via, trace] = traceA !== undefined ? [a.id, traceA] : [b.id, traceB];
            message = `parallel branches '${a.id}' and '${b.id}' both affect entity '${entity}' (${via} transitively through ${trace}); parallel branch entity effect sets must be disjoint`;
          }
          throw elabError(PASS, siteOf(flow, step.line), `${p}${step.id}.branches`, message);
        }
      }
    }

    for (const branch of step.branches) {
      checkParallel(flow, branch.steps, `${p}${step.id}.branches.${branch.id}.steps.`, index);
    }
  }
}

function operationEntities(opId: string, index: ConstructIndex): string[] {
  return index.operations.get(opId)?.effects.map(e => e.entity) ?? [];
}

function handlerOps(h: RawHandler | undefined): string[] {
  return h && h.tag === "Compensate" ? h.steps.map(c => c.op) : [];
}

/** Operations a run of `steps` may invoke, following sub-flows. */
function reachableOps(steps: RawStep[], index: ConstructIndex, visiting: Set<string>): { op: string; via?: string }[] {
  const out: { op: string; via?: string }[] = [];
  for (const step of allSteps(steps)) {
    if (step.tag === "OperationStep") {
      for (const op of [step.op, ...handlerOps(step.onFailure)]) out.push({ op });
    } else if (step.tag === "SubFlowStep") {
      for (const op of handlerOps(step.onFailure)) out.push({ op });
      const sub = index.flows.get(step.flow);
      if (!sub || visiting.has(sub.id)) continue;
      visiting.add(sub.id);
      for (const inner of reachableOps(sub.steps, index, visiting)) {
        out.push({ op: inner.op, via: inner.via ?? `SubFlowStep → ${sub.id} → ${inner.op}` });
      }
      visiting.delete(sub.id);
    } else if (step.tag === "ParallelStep") {
      for (const op of handlerOps(step.join.onAnyFailure)) out.push({ op });
    }
  }
  return out;
}

function branchEffects(steps: RawStep[], index: ConstructIndex, visiting: Set<string>): EntityEffects {
  const effects: EntityEffects = new Map();
  for (const { op, via } of reachableOps(steps, index, visiting)) {
    for (const entity of operationEntities(op, index)) {
      if (!effects.has(entity) || (via === undefined && effects.get(entity) !== undefined)) {
        effects.set(entity, via);
      }
    }
  }
  return effects;
}
