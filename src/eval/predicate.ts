import type { ArithExpr, CompareExpr, CompareOp, Expr, FieldRefExpr, QuantifierExpr } from "../interchange/bundle";
import { formatType } from "../interchange/format";
import { compareBytes } from "../interchange/order";
import { intBounds } from "../numeric/bounds";
import { Decimal } from "../numeric/decimal";
import type { FactSet } from "./assemble";
import { evalFail } from "./errors";
import type { ProvenanceCollector } from "./provenance";
import { literalToValue, typeName, VAbsent, vbool, type Value } from "./values";
import type { VerdictSet } from "./verdicts";

// =========================================================================
// Predicate evaluation
// =========================================================================

/** What an expression may read. Bindings hold quantifier variables. */
export interface EvalContext {
  readonly facts: FactSet;
  readonly verdicts: VerdictSet;
  readonly bindings?: ReadonlyMap<string, Value>;
}

/** Scale Money results are rounded to after multiplication. */
export const MONEY_SCALE = 2;

/**
 * Absent coerces to false; any non-Bool is an error.
 */
export function truthy(v: Value): boolean {
  if (v.tag === "Bool") return v.b;
  if (v.tag === "Absent") return false;
  return evalFail({ tag: "type_error", message: `expected Bool, got ${typeName(v)}` });
}

export function evalCondition(e: Expr, ctx: EvalContext, collector: ProvenanceCollector): boolean {
  return truthy(evalExpr(e, ctx, collector));
}

export function evalExpr(e: Expr, ctx: EvalContext, collector: ProvenanceCollector): Value {
  if ("fact_ref" in e) return lookup(e.fact_ref, ctx, collector);
  if ("field_ref" in e) return fieldValue(e, ctx, collector);
  if ("verdict_present" in e) {
    collector.recordVerdict(e.verdict_present);
    return vbool(ctx.verdicts.has(e.verdict_present));
  }
  if ("quantifier" in e) return quantify(e, ctx, collector);
  if ("literal" in e) return literalToValue(e.literal, e.type);

  switch (e.op) {
    case "and":
      return vbool(evalCondition(e.left, ctx, collector) && evalCondition(e.right, ctx, collector));
    case "or":
      return vbool(evalCondition(e.left, ctx, collector) || evalCondition(e.right, ctx, collector));
    case "not":
      return vbool(!evalCondition(e.operand, ctx, collector));
    case "+":
    case "-":
    case "*":
      return arith(e, ctx, collector);
    default:
      return compare(e, ctx, collector);
  }
}

// =========================================================================
// References
// =========================================================================

function lookup(name: string, ctx: EvalContext, collector: ProvenanceCollector): Value {
  const bound = ctx.bindings?.get(name);
  if (bound) return bound;
  const fact = ctx.facts.get(name);
  if (!fact) return evalFail({ tag: "unknown_fact", factId: name });
  collector.recordFact(name);
  return fact;
}

function fieldValue(e: FieldRefExpr, ctx: EvalContext, collector: ProvenanceCollector): Value {
  const { var: name, field } = e.field_ref;
  const bound = ctx.bindings?.get(name);
  let owner = bound;
  if (!owner) {
    owner = ctx.facts.get(name);
    if (!owner) return evalFail({ tag: "unbound_variable", name });
    collector.recordFact(name);
  }

  switch (owner.tag) {
    case "Record": {
      const value = owner.fields.get(field);
      if (!value) {
        return evalFail({ tag: "not_a_record", message: `field '${field}' not found in record variable '${name}'` });
      }
      return value;
    }
    case "Tagged":
      return owner.variant === field ? owner.value : VAbsent;
    case "Absent":
      return VAbsent;
    default:
      return evalFail({ tag: "not_a_record", message: `variable '${name}' is not a Record, got ${typeName(owner)}` });
  }
}

function quantify(e: QuantifierExpr, ctx: EvalContext, collector: ProvenanceCollector): Value {
  const domain = evalExpr(e.domain, ctx, collector);
  if (domain.tag === "Absent") return vbool(false);
  if (domain.tag !== "List") {
    return evalFail({ tag: "type_error", message: `${e.quantifier} domain must be a List, got ${typeName(domain)}` });
  }

  for (const item of domain.items) {
    const bindings = new Map(ctx.bindings ?? []);
    bindings.set(e.variable, item);
    const holds = evalCondition(e.body, { ...ctx, bindings }, collector);
    if (e.quantifier === "forall" && !holds) return vbool(false);
    if (e.quantifier === "exists" && holds) return vbool(true);
  }
  return vbool(e.quantifier === "forall");
}

// =========================================================================
// Arithmetic
// =========================================================================

function decimalOf(v: Value): Decimal {
  if (v.tag === "Decimal") return v.d;
  if (v.tag === "Int") return Decimal.fromInteger(v.n);
  return evalFail({ tag: "type_error", message: `arithmetic requires a numeric operand, got ${typeName(v)}` });
}

function combine(op: ArithExpr["op"], a: Decimal, b: Decimal): Decimal {
  switch (op) {
    case "+":
      return a.add(b);
    case "-":
      return a.sub(b);
    case "*":
      return a.mul(b);
  }
}

function arith(e: ArithExpr, ctx: EvalContext, collector: ProvenanceCollector): Value {
  const left = evalExpr(e.left, ctx, collector);
  const right = evalExpr(e.right, ctx, collector);
  if (left.tag === "Absent" || right.tag === "Absent") return VAbsent;

  const rt = e.result_type;
  switch (rt.base) {
    case "Int": {
      if (left.tag !== "Int" || right.tag !== "Int") {
        return evalFail({ tag: "type_error", message: `Int arithmetic on ${typeName(left)} and ${typeName(right)}` });
      }
      const n = e.op === "+" ? left.n + right.n : e.op === "-" ? left.n - right.n : left.n * right.n;
      const [min, max] = intBounds(rt);
      if (n < min || n > max) return evalFail({ tag: "overflow", message: `result ${n} is outside ${formatType(rt)}` });
      return { tag: "Int", n };
    }

    case "Decimal": {
      const d = combine(e.op, decimalOf(left), decimalOf(right)).rescale(rt.scale);
      if (!d.fits(rt.precision, rt.scale)) {
        return evalFail({ tag: "overflow", message: `result ${d.toString()} does not fit ${formatType(rt)}` });
      }
      return { tag: "Decimal", d };
    }

    case "Money": {
      if (e.op === "*") {
        const money = left.tag === "Money" ? left : right;
        const factor = left.tag === "Money" ? right : left;
        if (money.tag !== "Money") {
          return evalFail({ tag: "type_error", message: "Money multiplication requires a Money operand" });
        }
        return { tag: "Money", amount: money.amount.mul(decimalOf(factor)).rescale(MONEY_SCALE), currency: money.currency };
      }
      if (left.tag !== "Money" || right.tag !== "Money") {
        return evalFail({ tag: "type_error", message: `Money arithmetic on ${typeName(left)} and ${typeName(right)}` });
      }
      if (left.currency !== right.currency) {
        return evalFail({ tag: "type_error", message: `cannot combine ${left.currency} with ${right.currency}` });
      }
      return { tag: "Money", amount: combine(e.op, left.amount, right.amount), currency: left.currency };
    }

    default:
      return evalFail({ tag: "invalid_operator", op: `${e.op} on ${rt.base}` });
  }
}

// =========================================================================
// Comparison
// =========================================================================

function holds(op: CompareOp, order: number): boolean {
  switch (op) {
    case "=":
      return order === 0;
    case "!=":
      return order !== 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

function sign(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function instant(text: string): number {
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? evalFail({ tag: "type_error", message: `invalid DateTime '${text}'` }) : ms;
}

/**
 * Ordering of two values, or an error when they cannot be ordered by `op`.
 */
export function orderOf(op: CompareOp, left: Value, right: Value): number {
  const mismatch = (): never =>
    evalFail({ tag: "type_error", message: `cannot compare ${typeName(left)} with ${typeName(right)}` });
  const equalityOnly = (): void => {
    if (op !== "=" && op !== "!=") evalFail({ tag: "invalid_operator", op: `${op} on ${typeName(left)}` });
  };

  if ((left.tag === "Int" || left.tag === "Decimal") && (right.tag === "Int" || right.tag === "Decimal")) {
    if (left.tag === "Int" && right.tag === "Int") return sign(left.n, right.n);
    return decimalOf(left).compare(decimalOf(right));
  }

  switch (left.tag) {
    case "Bool":
      if (right.tag !== "Bool") return mismatch();
      equalityOnly();
      return left.b === right.b ? 0 : 1;
    case "Enum":
      if (right.tag !== "Enum") return mismatch();
      equalityOnly();
      return left.s === right.s ? 0 : 1;
    case "Money":
      if (right.tag !== "Money") return mismatch();
      if (left.currency !== right.currency) {
        return evalFail({ tag: "type_error", message: `cannot compare ${left.currency} with ${right.currency}` });
      }
      return left.amount.compare(right.amount);
    case "Duration":
      if (right.tag !== "Duration") return mismatch();
      if (left.unit !== right.unit) {
        return evalFail({ tag: "type_error", message: `cannot compare Duration(${left.unit}) with Duration(${right.unit})` });
      }
      return sign(left.n, right.n);
    case "Text":
    case "Date":
      if ((right.tag !== "Text" && right.tag !== "Date") || right.tag !== left.tag) return mismatch();
      return compareBytes(left.s, right.s);
    case "DateTime": {
      if (right.tag !== "DateTime") return mismatch();
      const a = instant(left.s);
      const b = instant(right.s);
      return a < b ? -1 : a > b ? 1 : 0;
    }
    default:
      return evalFail({ tag: "type_error", message: `${typeName(left)} values are not comparable` });
  }
}

function compare(e: CompareExpr, ctx: EvalContext, collector: ProvenanceCollector): Value {
  const left = evalExpr(e.left, ctx, collector);
  const right = evalExpr(e.right, ctx, collector);
  if (left.tag === "Absent" || right.tag === "Absent") return vbool(false);
  return vbool(holds(e.op, orderOf(e.op, left, right)));
}
