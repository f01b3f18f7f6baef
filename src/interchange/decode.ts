import type {
  ArithOp,
  Bundle,
  CompareExpr,
  CompensationStep,
  Construct,
  DecimalValue,
  DurationType,
  Effect,
  EntityConstruct,
  Expr,
  FactConstruct,
  FactDefault,
  FactRefExpr,
  FactSource,
  FieldRefExpr,
  FailureHandler,
  FlowStep,
  IntType,
  JoinPolicy,
  LiteralValue,
  MoneyValue,
  ParallelBranch,
  SourceConstruct,
  StepTarget,
  TerminalTarget,
  Transition,
  TypeSpec,
} from "./bundle";
import { COMPARE_OPS, DURATION_UNITS } from "./bundle";
import type { Provenance } from "./meta";

export class BundleDecodeError extends Error {
  constructor(message: string, readonly path: string) {
    super(`${path}: ${message}`);
    this.name = "BundleDecodeError";
  }
}

type JsonObject = Record<string, unknown>;

// =========================================================================
// Primitive readers
// =========================================================================

function fail(path: string, message: string): never {
  throw new BundleDecodeError(message, path);
}

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asObject(v: unknown, path: string, allowed: readonly string[]): JsonObject {
  if (!isObject(v)) fail(path, "expected an object");
  for (const key of Object.keys(v)) {
    if (!allowed.includes(key)) fail(path, `unexpected key '${key}'`);
  }
  return v;
}

function asString(v: unknown, path: string): string {
  if (typeof v !== "string") fail(path, "expected a string");
  return v;
}

function asInt(v: unknown, path: string): number {
  if (typeof v !== "number" || !Number.isSafeInteger(v)) fail(path, "expected an integer");
  return v;
}

function asArray(v: unknown, path: string): unknown[] {
  if (!Array.isArray(v)) fail(path, "expected an array");
  return v;
}

function str(o: JsonObject, key: string, path: string): string {
  return asString(o[key], `${path}.${key}`);
}

function int(o: JsonObject, key: string, path: string): number {
  return asInt(o[key], `${path}.${key}`);
}

function strings(o: JsonObject, key: string, path: string): string[] {
  return asArray(o[key], `${path}.${key}`).map((v, i) => asString(v, `${path}.${key}[${i}]`));
}

function has(o: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(o, key);
}

function literal<T extends string>(o: JsonObject, key: string, expected: T, path: string): T {
  const v = o[key];
  if (v !== expected) fail(`${path}.${key}`, `expected "${expected}"`);
  return expected;
}

function provenanceOf(o: JsonObject, path: string): Provenance {
  const p = asObject(o.provenance, `${path}.provenance`, ["file", "line"]);
  return { file: str(p, "file", `${path}.provenance`), line: int(p, "line", `${path}.provenance`) };
}

function stringMap(v: unknown, path: string): Record<string, string> {
  if (!isObject(v)) fail(path, "expected an object");
  const out: Record<string, string> = {};
  for (const [k, item] of Object.entries(v)) out[k] = asString(item, `${path}.${k}`);
  return out;
}

// =========================================================================
// Types and values
// =========================================================================

export function decodeType(v: unknown, path: string): TypeSpec {
  if (!isObject(v)) fail(path, "expected a type object");
  const base = v.base;
  switch (base) {
    case "Bool":
      asObject(v, path, ["base"]);
      return { base };
    case "Date":
      asObject(v, path, ["base"]);
      return { base };
    case "DateTime":
      asObject(v, path, ["base"]);
      return { base };
    case "Int": {
      const o = asObject(v, path, ["base", "min", "max"]);
      const t: IntType = { base };
      if (has(o, "min")) t.min = int(o, "min", path);
      if (has(o, "max")) t.max = int(o, "max", path);
      return t;
    }
    case "Decimal": {
      const o = asObject(v, path, ["base", "precision", "scale"]);
      return { base, precision: int(o, "precision", path), scale: int(o, "scale", path) };
    }
    case "Text": {
      const o = asObject(v, path, ["base", "max_length"]);
      return has(o, "max_length") ? { base, max_length: int(o, "max_length", path) } : { base };
    }
    case "Enum": {
      const o = asObject(v, path, ["base", "values"]);
      return { base, values: strings(o, "values", path) };
    }
    case "Money": {
      const o = asObject(v, path, ["base", "currency"]);
      return { base, currency: str(o, "currency", path) };
    }
    case "Duration": {
      const o = asObject(v, path, ["base", "unit", "min", "max"]);
      const unitText = str(o, "unit", path);
      const unit = DURATION_UNITS.find(u => u === unitText);
      if (!unit) fail(`${path}.unit`, `unknown duration unit '${unitText}'`);
      const t: DurationType = { base, unit };
      if (has(o, "min")) t.min = int(o, "min", path);
      if (has(o, "max")) t.max = int(o, "max", path);
      return t;
    }
    case "Record": {
      const o = asObject(v, path, ["base", "fields"]);
      return { base, fields: typeMap(o.fields, `${path}.fields`) };
    }
    case "List": {
      const o = asObject(v, path, ["base", "element_type", "max"]);
      return {
        base,
        element_type: decodeType(o.element_type, `${path}.element_type`),
        max: int(o, "max", path),
      };
    }
    case "TaggedUnion": {
      const o = asObject(v, path, ["base", "variants"]);
      return { base, variants: typeMap(o.variants, `${path}.variants`) };
    }
    default:
      return fail(`${path}.base`, `unknown base type ${JSON.stringify(base)}`);
  }
}

function typeMap(v: unknown, path: string): Record<string, TypeSpec> {
  if (!isObject(v)) fail(path, "expected an object");
  const out: Record<string, TypeSpec> = {};
  for (const [k, t] of Object.entries(v)) out[k] = decodeType(t, `${path}.${k}`);
  return out;
}

function decimalValue(v: unknown, path: string): DecimalValue {
  const o = asObject(v, path, ["kind", "precision", "scale", "value"]);
  return {
    kind: literal(o, "kind", "decimal_value", path),
    precision: int(o, "precision", path),
    scale: int(o, "scale", path),
    value: str(o, "value", path),
  };
}

function moneyValue(v: unknown, path: string): MoneyValue {
  const o = asObject(v, path, ["amount", "currency", "kind"]);
  return {
    amount: decimalValue(o.amount, `${path}.amount`),
    currency: str(o, "currency", path),
    kind: literal(o, "kind", "money_value", path),
  };
}

function factDefault(v: unknown, path: string): FactDefault {
  if (!isObject(v)) fail(path, "expected a typed default value");
  switch (v.kind) {
    case "bool_literal": {
      const o = asObject(v, path, ["kind", "value"]);
      if (typeof o.value !== "boolean") fail(`${path}.value`, "expected a boolean");
      return { kind: "bool_literal", value: o.value };
    }
    case "int_literal": {
      const o = asObject(v, path, ["kind", "value"]);
      return { kind: "int_literal", value: int(o, "value", path) };
    }
    case "text_literal": {
      const o = asObject(v, path, ["kind", "value"]);
      return { kind: "text_literal", value: str(o, "value", path) };
    }
    case "decimal_value":
      return decimalValue(v, path);
    case "money_value":
      return moneyValue(v, path);
    default:
      return fail(`${path}.kind`, `unknown default kind ${JSON.stringify(v.kind)}`);
  }
}

function literalValue(v: unknown, path: string): LiteralValue {
  if (typeof v === "boolean" || typeof v === "string") return v;
  if (typeof v === "number") return asInt(v, path);
  if (isObject(v) && v.kind === "decimal_value") return decimalValue(v, path);
  if (isObject(v) && v.kind === "money_value") return moneyValue(v, path);
  return fail(path, "expected a literal value");
}

// =========================================================================
// Expressions
// =========================================================================

const ARITH_OPS: readonly ArithOp[] = ["+", "-", "*"];

function isDomain(e: Expr): e is FactRefExpr | FieldRefExpr {
  return "fact_ref" in e || "field_ref" in e;
}

export function decodeExpr(v: unknown, path: string): Expr {
  if (!isObject(v)) fail(path, "expected an expression object");

  if (has(v, "verdict_present")) {
    const o = asObject(v, path, ["verdict_present"]);
    return { verdict_present: str(o, "verdict_present", path) };
  }
  if (has(v, "fact_ref")) {
    const o = asObject(v, path, ["fact_ref"]);
    return { fact_ref: str(o, "fact_ref", path) };
  }
  if (has(v, "field_ref")) {
    const o = asObject(v, path, ["field_ref"]);
    const ref = asObject(o.field_ref, `${path}.field_ref`, ["field", "var"]);
    return { field_ref: { field: str(ref, "field", `${path}.field_ref`), var: str(ref, "var", `${path}.field_ref`) } };
  }
  if (has(v, "quantifier")) {
    const o = asObject(v, path, ["body", "domain", "quantifier", "variable", "variable_type"]);
    const quantifier = o.quantifier;
    if (quantifier !== "forall" && quantifier !== "exists") {
      fail(`${path}.quantifier`, "expected \"forall\" or \"exists\"");
    }
    const domain = decodeExpr(o.domain, `${path}.domain`);
    if (!isDomain(domain)) {
      fail(`${path}.domain`, "quantifier domain must be a fact or field reference");
    }
    return {
      body: decodeExpr(o.body, `${path}.body`),
      domain,
      quantifier,
      variable: str(o, "variable", path),
      variable_type: decodeType(o.variable_type, `${path}.variable_type`),
    };
  }
  if (has(v, "op")) {
    const op = v.op;
    if (op === "and" || op === "or") {
      const o = asObject(v, path, ["left", "op", "right"]);
      return { left: decodeExpr(o.left, `${path}.left`), op, right: decodeExpr(o.right, `${path}.right`) };
    }
    if (op === "not") {
      const o = asObject(v, path, ["op", "operand"]);
      return { op, operand: decodeExpr(o.operand, `${path}.operand`) };
    }
    const cmp = COMPARE_OPS.find(c => c === op);
    if (cmp) {
      const o = asObject(v, path, ["comparison_type", "left", "op", "right"]);
      const expr: CompareExpr = { left: decodeExpr(o.left, `${path}.left`), op: cmp, right: decodeExpr(o.right, `${path}.right`) };
      if (has(o, "comparison_type")) {
        return { comparison_type: decodeType(o.comparison_type, `${path}.comparison_type`), ...expr };
      }
      return expr;
    }
    const arith = ARITH_OPS.find(a => a === op);
    if (arith) {
      const o = asObject(v, path, ["left", "op", "result_type", "right"]);
      return {
        left: decodeExpr(o.left, `${path}.left`),
        op: arith,
        result_type: decodeType(o.result_type, `${path}.result_type`),
        right: decodeExpr(o.right, `${path}.right`),
      };
    }
    return fail(`${path}.op`, `unknown operator ${JSON.stringify(op)}`);
  }
  if (has(v, "literal")) {
    const o = asObject(v, path, ["literal", "type"]);
    return { literal: literalValue(o.literal, `${path}.literal`), type: decodeType(o.type, `${path}.type`) };
  }
  return fail(path, "unrecognized expression");
}

// =========================================================================
// Flow steps
// =========================================================================

function terminal(v: unknown, path: string): TerminalTarget {
  const o = asObject(v, path, ["kind", "outcome"]);
  return { kind: literal(o, "kind", "Terminal", path), outcome: str(o, "outcome", path) };
}

function stepTarget(v: unknown, path: string): StepTarget {
  if (typeof v === "string") return v;
  return terminal(v, path);
}

function failureHandler(v: unknown, path: string): FailureHandler {
  if (!isObject(v)) fail(path, "expected a failure handler");
  switch (v.kind) {
    case "Terminate": {
      const o = asObject(v, path, ["kind", "outcome"]);
      return { kind: "Terminate", outcome: str(o, "outcome", path) };
    }
    case "Compensate": {
      const o = asObject(v, path, ["kind", "steps", "then"]);
      const steps = asArray(o.steps, `${path}.steps`).map((s, i): CompensationStep => {
        const sp = `${path}.steps[${i}]`;
        const so = asObject(s, sp, ["on_failure", "op", "persona"]);
        return { on_failure: terminal(so.on_failure, `${sp}.on_failure`), op: str(so, "op", sp), persona: str(so, "persona", sp) };
      });
      return { kind: "Compensate", steps, then: terminal(o.then, `${path}.then`) };
    }
    case "Escalate": {
      const o = asObject(v, path, ["kind", "next", "to_persona"]);
      return { kind: "Escalate", next: str(o, "next", path), to_persona: str(o, "to_persona", path) };
    }
    default:
      return fail(`${path}.kind`, `unknown failure handler ${JSON.stringify(v.kind)}`);
  }
}

function decodeStep(v: unknown, path: string): FlowStep {
  if (!isObject(v)) fail(path, "expected a flow step");
  switch (v.kind) {
    case "OperationStep": {
      const o = asObject(v, path, ["id", "kind", "on_failure", "op", "outcomes", "persona"]);
      if (!isObject(o.outcomes)) fail(`${path}.outcomes`, "expected an object");
      const outcomes: Record<string, StepTarget> = {};
      for (const [label, t] of Object.entries(o.outcomes)) outcomes[label] = stepTarget(t, `${path}.outcomes.${label}`);
      return {
        id: str(o, "id", path),
        kind: "OperationStep",
        on_failure: failureHandler(o.on_failure, `${path}.on_failure`),
        op: str(o, "op", path),
        outcomes,
        persona: str(o, "persona", path),
      };
    }
    case "BranchStep": {
      const o = asObject(v, path, ["condition", "id", "if_false", "if_true", "kind", "persona"]);
      return {
        condition: decodeExpr(o.condition, `${path}.condition`),
        id: str(o, "id", path),
        if_false: stepTarget(o.if_false, `${path}.if_false`),
        if_true: stepTarget(o.if_true, `${path}.if_true`),
        kind: "BranchStep",
        persona: str(o, "persona", path),
      };
    }
    case "HandoffStep": {
      const o = asObject(v, path, ["from_persona", "id", "kind", "next", "to_persona"]);
      return {
        from_persona: str(o, "from_persona", path),
        id: str(o, "id", path),
        kind: "HandoffStep",
        next: str(o, "next", path),
        to_persona: str(o, "to_persona", path),
      };
    }
    case "SubFlowStep": {
      const o = asObject(v, path, ["flow", "id", "kind", "on_failure", "on_success", "persona"]);
      return {
        flow: str(o, "flow", path),
        id: str(o, "id", path),
        kind: "SubFlowStep",
        on_failure: failureHandler(o.on_failure, `${path}.on_failure`),
        on_success: stepTarget(o.on_success, `${path}.on_success`),
        persona: str(o, "persona", path),
      };
    }
    case "ParallelStep": {
      const o = asObject(v, path, ["branches", "id", "join", "kind"]);
      const branches = asArray(o.branches, `${path}.branches`).map((b, i): ParallelBranch => {
        const bp = `${path}.branches[${i}]`;
        const bo = asObject(b, bp, ["entry", "id", "steps"]);
        return {
          entry: str(bo, "entry", bp),
          id: str(bo, "id", bp),
          steps: asArray(bo.steps, `${bp}.steps`).map((s, j) => decodeStep(s, `${bp}.steps[${j}]`)),
        };
      });
      const jp = `${path}.join`;
      const jo = asObject(o.join, jp, ["on_all_complete", "on_all_success", "on_any_failure"]);
      const join: JoinPolicy = {};
      if (has(jo, "on_all_success")) join.on_all_success = stepTarget(jo.on_all_success, `${jp}.on_all_success`);
      if (has(jo, "on_any_failure")) join.on_any_failure = failureHandler(jo.on_any_failure, `${jp}.on_any_failure`);
      if (has(jo, "on_all_complete")) join.on_all_complete = stepTarget(jo.on_all_complete, `${jp}.on_all_complete`);
      return { branches, id: str(o, "id", path), join, kind: "ParallelStep" };
    }
    default:
      return fail(`${path}.kind`, `unknown step kind ${JSON.stringify(v.kind)}`);
  }
}

// =========================================================================
// Constructs
// =========================================================================

function factSource(v: unknown, path: string): FactSource {
  if (isObject(v) && has(v, "source_id")) {
    const o = asObject(v, path, ["path", "source_id"]);
    return { path: str(o, "path", path), source_id: str(o, "source_id", path) };
  }
  const o = asObject(v, path, ["field", "system"]);
  return { field: str(o, "field", path), system: str(o, "system", path) };
}

function decodeConstruct(v: unknown, path: string): Construct {
  if (!isObject(v)) fail(path, "expected a construct object");
  switch (v.kind) {
    case "Persona": {
      const o = asObject(v, path, ["id", "kind", "provenance"]);
      return { id: str(o, "id", path), kind: "Persona", provenance: provenanceOf(o, path) };
    }
    case "Source": {
      const o = asObject(v, path, ["description", "fields", "id", "kind", "protocol", "provenance"]);
      const c: SourceConstruct = {
        fields: stringMap(o.fields, `${path}.fields`),
        id: str(o, "id", path),
        kind: "Source",
        protocol: str(o, "protocol", path),
        provenance: provenanceOf(o, path),
      };
      return has(o, "description") ? { description: str(o, "description", path), ...c } : c;
    }
    case "Fact": {
      const o = asObject(v, path, ["default", "id", "kind", "provenance", "source", "type"]);
      const c: FactConstruct = {
        id: str(o, "id", path),
        kind: "Fact",
        provenance: provenanceOf(o, path),
        source: factSource(o.source, `${path}.source`),
        type: decodeType(o.type, `${path}.type`),
      };
      return has(o, "default") ? { default: factDefault(o.default, `${path}.default`), ...c } : c;
    }
    case "Entity": {
      const o = asObject(v, path, ["id", "initial", "kind", "parent", "provenance", "states", "transitions"]);
      const transitions = asArray(o.transitions, `${path}.transitions`).map((t, i): Transition => {
        const tp = `${path}.transitions[${i}]`;
        const to = asObject(t, tp, ["from", "to"]);
        return { from: str(to, "from", tp), to: str(to, "to", tp) };
      });
      const c: EntityConstruct = {
        id: str(o, "id", path),
        initial: str(o, "initial", path),
        kind: "Entity",
        provenance: provenanceOf(o, path),
        states: strings(o, "states", path),
        transitions,
      };
      return has(o, "parent") ? { ...c, parent: str(o, "parent", path) } : c;
    }
    case "Rule": {
      const o = asObject(v, path, ["body", "id", "kind", "provenance", "stratum"]);
      const bp = `${path}.body`;
      const body = asObject(o.body, bp, ["produce", "when"]);
      const pp = `${bp}.produce`;
      const produce = asObject(body.produce, pp, ["payload", "verdict_type"]);
      const payload = asObject(produce.payload, `${pp}.payload`, ["type", "value"]);
      return {
        body: {
          produce: {
            payload: {
              type: decodeType(payload.type, `${pp}.payload.type`),
              value: decodeExpr(payload.value, `${pp}.payload.value`),
            },
            verdict_type: str(produce, "verdict_type", pp),
          },
          when: decodeExpr(body.when, `${bp}.when`),
        },
        id: str(o, "id", path),
        kind: "Rule",
        provenance: provenanceOf(o, path),
        stratum: int(o, "stratum", path),
      };
    }
    case "Operation": {
      const o = asObject(v, path, [
        "allowed_personas", "effects", "error_contract", "id", "kind", "outcomes", "precondition", "provenance",
      ]);
      const effects = asArray(o.effects, `${path}.effects`).map((e, i): Effect => {
        const ep = `${path}.effects[${i}]`;
        const eo = asObject(e, ep, ["entity_id", "from", "outcome", "to"]);
        const effect: Effect = { entity_id: str(eo, "entity_id", ep), from: str(eo, "from", ep), to: str(eo, "to", ep) };
        if (has(eo, "outcome")) effect.outcome = str(eo, "outcome", ep);
        return effect;
      });
      return {
        allowed_personas: strings(o, "allowed_personas", path),
        effects,
        error_contract: strings(o, "error_contract", path),
        id: str(o, "id", path),
        kind: "Operation",
        outcomes: strings(o, "outcomes", path),
        precondition: decodeExpr(o.precondition, `${path}.precondition`),
        provenance: provenanceOf(o, path),
      };
    }
    case "Flow": {
      const o = asObject(v, path, ["entry", "id", "kind", "provenance", "snapshot", "steps"]);
      return {
        entry: str(o, "entry", path),
        id: str(o, "id", path),
        kind: "Flow",
        provenance: provenanceOf(o, path),
        snapshot: literal(o, "snapshot", "at_initiation", path),
        steps: asArray(o.steps, `${path}.steps`).map((s, i) => decodeStep(s, `${path}.steps[${i}]`)),
      };
    }
    default:
      return fail(`${path}.kind`, `unknown construct kind ${JSON.stringify(v.kind)}`);
  }
}

export function decodeBundleValue(v: unknown): Bundle {
  const o = asObject(v, "$", ["constructs", "covenant", "covenant_version", "id", "kind"]);
  return {
    constructs: asArray(o.constructs, "$.constructs").map((c, i) => decodeConstruct(c, `$.constructs[${i}]`)),
    covenant: str(o, "covenant", "$"),
    covenant_version: str(o, "covenant_version", "$"),
    id: str(o, "id", "$"),
    kind: literal(o, "kind", "Bundle", "$"),
  };
}
