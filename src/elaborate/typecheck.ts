import type {
  CompareExpr,
  DecimalValue,
  Expr,
  FactDefault,
  FactSource,
  FactRefExpr,
  FieldRefExpr,
  LiteralExpr,
  MoneyValue,
  TypeSpec,
} from "../interchange/bundle";
import { formatType } from "../interchange/format";
import { inIntRange } from "../numeric/bounds";
import { Decimal, literalShape } from "../numeric/decimal";
import { isIsoDate, isIsoDateTime } from "../numeric/temporal";
import { isDone } from "../outcome/outcome";
import type { RawDomain, RawExpr, RawLiteral, RawOf, RawStep, RawType } from "../syntax/ast";
import { isRawLiteral } from "../syntax/ast";
import { elabError, siteOf, type ElabError, type ErrorSite } from "./errors";
import type { ConstructIndex } from "./indexer";
import { arithType, assignable, comparisonType, type Promotion } from "./promotion";
import type { TypeEnv } from "./typeEnv";
import { materializeType } from "./types";

// =========================================================================
// Pass 4: expression type checking and materialization
// =========================================================================

export interface TypedFact {
  type: TypeSpec;
  source: FactSource;
  default?: FactDefault;
}

export interface TypedRule {
  when: Expr;
  payloadType: TypeSpec;
  payloadValue: Expr;
}

/**
 * Typed annotations over the index. Structure stays in the raw constructs;
 * everything with a type is resolved here.
 */
export interface TypedContract {
  index: ConstructIndex;
  facts: ReadonlyMap<string, TypedFact>;
  rules: ReadonlyMap<string, TypedRule>;
  preconditions: ReadonlyMap<string, Expr>;
  /** Branch-step conditions keyed by their parsed expression. */
  conditions: ReadonlyMap<RawExpr, Expr>;
}

const PASS = 4;

export function typecheck(index: ConstructIndex, env: TypeEnv): TypedContract {
  const lookup = (name: string) => env.get(name);
  const materialize = (raw: RawType, site: ErrorSite, field: string) =>
    materializeType(raw, { pass: PASS, site, field, lookup });

  const factTypes = new Map<string, TypeSpec>();
  const facts = new Map<string, TypedFact>();
  for (const fact of index.facts.values()) {
    const type = materialize(fact.type, siteOf(fact), "type");
    factTypes.set(fact.id, type);
    const typed: TypedFact = { type, source: factSource(fact, index) };
    if (fact.default) typed.default = factDefault(fact, type, fact.default);
    facts.set(fact.id, typed);
  }

  const rules = new Map<string, TypedRule>();
  for (const rule of index.rules.values()) {
    const when = new ExprChecker(factTypes, siteOf(rule), "body.when").condition(rule.when);
    const payloadField = "body.produce.payload";
    const payloadType = materialize(rule.payloadType, siteOf(rule), payloadField);
    const payload = new ExprChecker(factTypes, siteOf(rule), payloadField).payload(rule.payloadValue, payloadType);
    rules.set(rule.id, { when, payloadType, payloadValue: payload });
  }

  const preconditions = new Map<string, Expr>();
  for (const op of index.operations.values()) {
    preconditions.set(op.id, new ExprChecker(factTypes, siteOf(op), "precondition").condition(op.precondition));
  }

  const conditions = new Map<RawExpr, Expr>();
  for (const flow of index.flows.values()) {
    const visit = (steps: RawStep[]) => {
      for (const step of steps) {
        if (step.tag === "BranchStep") {
          const checker = new ExprChecker(factTypes, siteOf(flow), `steps.${step.id}.condition`);
          conditions.set(step.condition, checker.condition(step.condition));
        } else if (step.tag === "ParallelStep") {
          for (const branch of step.branches) visit(branch.steps);
        }
      }
    };
    visit(flow.steps);
  }

  return { index, facts, rules, preconditions, conditions };
}

// =========================================================================
// Facts
// =========================================================================

function factSource(fact: RawOf<"Fact">, index: ConstructIndex): FactSource {
  const src = fact.source;
  if (src.tag === "Freetext") {
    const dot = src.text.indexOf(".");
    return dot < 0
      ? { system: src.text, field: "" }
      : { system: src.text.slice(0, dot), field: src.text.slice(dot + 1) };
  }
  if (!index.sources.has(src.sourceId)) {
    throw elabError(
      PASS,
      siteOf(fact, fact.lines.source),
      "source",
      `fact '${fact.id}' references undeclared source '${src.sourceId}'`
    );
  }
  return { source_id: src.sourceId, path: src.path };
}

function describeLiteral(lit: RawLiteral): string {
  switch (lit.tag) {
    case "Bool":
      return String(lit.value);
    case "Int":
      return String(lit.value);
    case "Dec":
      return lit.text;
    case "Str":
      return `"${lit.value}"`;
    case "Money":
      return `Money { amount: "${lit.amount}", currency: "${lit.currency}" }`;
  }
}

function factDefault(fact: RawOf<"Fact">, type: TypeSpec, lit: RawLiteral): FactDefault {
  const fail = (message: string): ElabError =>
    elabError(PASS, siteOf(fact, fact.lines.default ?? lit.line), "default", message);
  const mismatch = () =>
    fail(`type error: default value ${describeLiteral(lit)} does not match declared type ${formatType(type)}`);

  switch (type.base) {
    case "Bool":
      if (lit.tag !== "Bool") throw mismatch();
      return { kind: "bool_literal", value: lit.value };

    case "Int":
      if (lit.tag !== "Int") throw mismatch();
      if (!inIntRange(type, BigInt(lit.value))) {
        throw fail(`type error: default value ${lit.value} is out of range for ${formatType(type)}`);
      }
      return { kind: "int_literal", value: lit.value };

    case "Decimal": {
      if (lit.tag !== "Int" && lit.tag !== "Dec") throw mismatch();
      const value = lit.tag === "Int" ? Decimal.fromInteger(lit.value) : Decimal.parse(lit.text);
      if (!value.fits(type.precision, type.scale)) {
        throw fail(`type error: default value ${describeLiteral(lit)} does not fit ${formatType(type)}`);
      }
      return { kind: "decimal_value", precision: type.precision, scale: type.scale, value: value.rescale(type.scale).toString() };
    }

    case "Money": {
      if (lit.tag !== "Money") throw mismatch();
      const money = moneyValue(lit, message => fail(message));
      if (money.currency !== type.currency) throw mismatch();
      return money;
    }

    case "Text":
      if (lit.tag !== "Str") throw mismatch();
      if (type.max_length !== undefined && [...lit.value].length > type.max_length) {
        throw fail(`type error: default value ${describeLiteral(lit)} exceeds ${formatType(type)}`);
      }
      return { kind: "text_literal", value: lit.value };

    case "Enum":
      if (lit.tag !== "Str") throw mismatch();
      if (!type.values.includes(lit.value)) {
        throw fail(`type error: default value '${lit.value}' is not a member of ${formatType(type)}`);
      }
      return { kind: "text_literal", value: lit.value };

    case "Date":
    case "DateTime":
      if (lit.tag !== "Str") throw mismatch();
      if (!(type.base === "Date" ? isIsoDate(lit.value) : isIsoDateTime(lit.value))) {
        throw fail(`type error: default value ${describeLiteral(lit)} is not a valid ${type.base}`);
      }
      return { kind: "text_literal", value: lit.value };

    default:
      throw fail(`type error: fact '${fact.id}' of type ${formatType(type)} cannot declare a default`);
  }
}

// =========================================================================
// Literals
// =========================================================================

function decimalValue(text: string): DecimalValue {
  const shape = literalShape(text);
  return { kind: "decimal_value", precision: shape.precision, scale: shape.scale, value: Decimal.parse(text).toString() };
}

const CURRENCY = /^[A-Z]{3}$/;

function moneyValue(lit: Extract<RawLiteral, { tag: "Money" }>, fail: (message: string) => ElabError): MoneyValue {
  if (!Decimal.isDecimalText(lit.amount)) throw fail(`type error: invalid Money amount '${lit.amount}'`);
  if (!CURRENCY.test(lit.currency)) {
    throw fail(`type error: currency '${lit.currency}' must be a three-letter ISO 4217 code`);
  }
  return { kind: "money_value", amount: decimalValue(lit.amount), currency: lit.currency };
}

// =========================================================================
// Expressions
// =========================================================================

interface Typed {
  expr: Expr;
  type: TypeSpec;
  /** Value of an Int or Decimal literal, for multiplication. */
  literal?: Decimal;
}

type Scope = ReadonlyMap<string, TypeSpec>;

const BOOL: TypeSpec = { base: "Bool" };

class ExprChecker {
  constructor(
    private readonly facts: ReadonlyMap<string, TypeSpec>,
    private readonly site: ErrorSite,
    private readonly field: string
  ) {}

  /** Check `e` in a position that needs a truth value. */
  condition(e: RawExpr): Expr {
    return this.bool(e, new Map());
  }

  /** Check a verdict payload value against its declared type. */
  payload(e: RawExpr, declared: TypeSpec): Expr {
    const typed = this.term(e, new Map(), declared);
    if (!assignable(typed.type, declared)) {
      const what = e.tag === "Arith" && e.op === "*" ? "product range" : "value type";
      throw this.err(
        e.line,
        `type error: ${what} ${formatType(typed.type)} is not contained in declared verdict payload type ${formatType(declared)}`
      );
    }
    return typed.expr;
  }

  private err(line: number, message: string): ElabError {
    return elabError(PASS, { ...this.site, line }, this.field, message);
  }

  private need<T>(p: Promotion<T>, line: number): T {
    if (isDone(p)) return p.value;
    throw this.err(line, p.error);
  }

  private bool(e: RawExpr, scope: Scope): Expr {
    switch (e.tag) {
      case "And":
        return { op: "and", left: this.bool(e.left, scope), right: this.bool(e.right, scope) };
      case "Or":
        return { op: "or", left: this.bool(e.left, scope), right: this.bool(e.right, scope) };
      case "Not":
        return { op: "not", operand: this.bool(e.operand, scope) };
      case "VerdictPresent":
        return { verdict_present: e.id };
      case "Quantifier":
        return this.quantifier(e, scope);
      case "Compare":
        return this.compare(e, scope);
      default: {
        const typed = this.term(e, scope);
        if (typed.type.base !== "Bool") {
          throw this.err(e.line, `type error: expression of type ${formatType(typed.type)} used as a condition; expected Bool`);
        }
        return typed.expr;
      }
    }
  }

  private quantifier(e: Extract<RawExpr, { tag: "Quantifier" }>, scope: Scope): Expr {
    if (this.facts.has(e.variable)) {
      throw this.err(e.line, `quantifier variable '${e.variable}' shadows fact '${e.variable}'`);
    }
    if (scope.has(e.variable)) {
      throw this.err(e.line, `quantifier variable '${e.variable}' is already bound`);
    }
    const domain = this.domain(e.domain, scope);
    if (domain.type.base !== "List") {
      const name = e.domain.tag === "Ref" ? e.domain.name : `${e.domain.base}.${e.domain.field}`;
      throw this.err(
        e.line,
        `type error: quantifier domain '${name}' has type ${formatType(domain.type)}; domain must be List-typed`
      );
    }
    const inner = new Map(scope);
    inner.set(e.variable, domain.type.element_type);
    return {
      quantifier: e.quantifier,
      variable: e.variable,
      variable_type: domain.type.element_type,
      domain: domain.expr,
      body: this.bool(e.body, inner),
    };
  }

  private domain(d: RawDomain, scope: Scope): { expr: FactRefExpr | FieldRefExpr; type: TypeSpec } {
    return d.tag === "Ref" ? this.ref(d.name, d.line, scope) : this.fieldRef(d.base, d.field, d.line, scope);
  }

  private compare(e: Extract<RawExpr, { tag: "Compare" }>, scope: Scope): Expr {
    let left: Typed;
    let right: Typed;
    // a string literal takes its type from the other side
    if (e.left.tag === "Str" && e.right.tag !== "Str") {
      right = this.term(e.right, scope);
      left = this.term(e.left, scope, right.type);
    } else {
      left = this.term(e.left, scope);
      right = this.term(e.right, scope, left.type);
    }
    const common = this.need(comparisonType(e.op, left.type, right.type), e.line);
    const out: CompareExpr = { op: e.op, left: left.expr, right: right.expr };
    if (common) out.comparison_type = common;
    return out;
  }

  private term(e: RawExpr, scope: Scope, expected?: TypeSpec): Typed {
    if (isRawLiteral(e)) return this.literal(e, expected);
    switch (e.tag) {
      case "Ref":
        return this.ref(e.name, e.line, scope);
      case "Field":
        return this.fieldRef(e.base, e.field, e.line, scope);
      case "Arith": {
        const left = this.term(e.left, scope);
        const right = this.term(e.right, scope);
        const type = this.need(arithType(e.op, left, right), e.line);
        return { expr: { op: e.op, left: left.expr, right: right.expr, result_type: type }, type };
      }
      default:
        return { expr: this.bool(e, scope), type: BOOL };
    }
  }

  private ref(name: string, line: number, scope: Scope): { expr: FactRefExpr; type: TypeSpec } {
    const type = scope.get(name) ?? this.facts.get(name);
    if (!type) throw this.err(line, `unresolved fact reference: '${name}' is not declared in this contract`);
    return { expr: { fact_ref: name }, type };
  }

  private fieldRef(base: string, field: string, line: number, scope: Scope): { expr: FieldRefExpr; type: TypeSpec } {
    const owner = this.ref(base, line, scope).type;
    let type: TypeSpec | undefined;
    if (owner.base === "Record") type = owner.fields[field];
    else if (owner.base === "TaggedUnion") type = owner.variants[field];
    else {
      throw this.err(
        line,
        `type error: '${base}' has type ${formatType(owner)}; field access requires a Record or TaggedUnion`
      );
    }
    if (!type) throw this.err(line, `type error: '${base}' has no field '${field}'`);
    return { expr: { field_ref: { var: base, field } }, type };
  }

  private literal(lit: RawLiteral, expected?: TypeSpec): Typed {
    const typed = (literal: LiteralExpr["literal"], type: TypeSpec, value?: Decimal): Typed => {
      const out: Typed = { expr: { literal, type }, type };
      if (value) out.literal = value;
      return out;
    };

    switch (lit.tag) {
      case "Bool":
        return typed(lit.value, BOOL);
      case "Int":
        return typed(lit.value, { base: "Int", min: lit.value, max: lit.value }, Decimal.fromInteger(lit.value));
      case "Dec": {
        const value = decimalValue(lit.text);
        return typed(value, { base: "Decimal", precision: value.precision, scale: value.scale }, Decimal.parse(lit.text));
      }
      case "Money": {
        const money = moneyValue(lit, message => this.err(lit.line, message));
        return typed(money, { base: "Money", currency: money.currency });
      }
      case "Str":
        return this.stringLiteral(lit.value, lit.line, expected, typed);
    }
  }

  private stringLiteral(
    value: string,
    line: number,
    expected: TypeSpec | undefined,
    typed: (literal: string, type: TypeSpec) => Typed
  ): Typed {
    if (!expected) return typed(value, { base: "Text", max_length: [...value].length });
    switch (expected.base) {
      case "Enum":
        if (!expected.values.includes(value)) {
          throw this.err(line, `type error: '${value}' is not a member of ${formatType(expected)}`);
        }
        return typed(value, expected);
      case "Date":
        if (!isIsoDate(value)) throw this.err(line, `type error: '${value}' is not a valid Date`);
        return typed(value, expected);
      case "DateTime":
        if (!isIsoDateTime(value)) throw this.err(line, `type error: '${value}' is not a valid DateTime`);
        return typed(value, expected);
      default:
        return typed(value, { base: "Text", max_length: [...value].length });
    }
  }
}
