import type { ArithOp, CompareOp, DecimalType, IntType, TypeSpec } from "../interchange/bundle";
import { formatType } from "../interchange/format";
import { encodeCanonical } from "../interchange/codec";
import { intBounds } from "../numeric/bounds";
import { Decimal, digitsForRange, literalShape } from "../numeric/decimal";
import { done, fail } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";

// =========================================================================
// Numeric promotion at the type level
// =========================================================================

/** An arithmetic operand: its type, and its value when it is a numeric literal. */
export interface Operand {
  type: TypeSpec;
  literal?: Decimal;
}

export type Promotion<T> = Outcome<T, string>;

function safeBound(n: bigint): number | undefined {
  return n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(n) : undefined;
}

function intType(min: bigint | undefined, max: bigint | undefined): IntType {
  const t: IntType = { base: "Int" };
  const lo = min === undefined ? undefined : safeBound(min);
  const hi = max === undefined ? undefined : safeBound(max);
  if (lo !== undefined) t.min = lo;
  if (hi !== undefined) t.max = hi;
  return t;
}

/** Smallest Decimal with scale 0 that holds every value of `t`. */
export function intAsDecimal(t: IntType): DecimalType {
  const [min, max] = intBounds(t);
  return { base: "Decimal", precision: digitsForRange(min, max), scale: 0 };
}

function integralDigits(t: DecimalType): number {
  return t.precision - t.scale;
}

function decimalSum(a: DecimalType, b: DecimalType): DecimalType {
  const scale = Math.max(a.scale, b.scale);
  const whole = Math.max(integralDigits(a), integralDigits(b)) + 1;
  return { base: "Decimal", precision: whole + scale, scale };
}

function asDecimal(t: TypeSpec): DecimalType | undefined {
  if (t.base === "Decimal") return t;
  if (t.base === "Int") return intAsDecimal(t);
  return undefined;
}

function additive(op: "+" | "-", l: TypeSpec, r: TypeSpec): Promotion<TypeSpec> {
  if (l.base === "Int" && r.base === "Int") {
    if (op === "+") {
      const min = l.min !== undefined && r.min !== undefined ? BigInt(l.min) + BigInt(r.min) : undefined;
      const max = l.max !== undefined && r.max !== undefined ? BigInt(l.max) + BigInt(r.max) : undefined;
      return done(intType(min, max));
    }
    const min = l.min !== undefined && r.max !== undefined ? BigInt(l.min) - BigInt(r.max) : undefined;
    const max = l.max !== undefined && r.min !== undefined ? BigInt(l.max) - BigInt(r.min) : undefined;
    return done(intType(min, max));
  }

  if (l.base === "Money" || r.base === "Money") {
    if (l.base === "Money" && r.base === "Money") {
      if (l.currency !== r.currency) {
        return fail(
          `type error: cannot combine ${formatType(l)} with ${formatType(r)}; Money arithmetic requires identical currency codes`
        );
      }
      return done(l);
    }
    return fail(`type error: operator '${op}' not defined for ${formatType(l)} and ${formatType(r)}`);
  }

  const ld = asDecimal(l);
  const rd = asDecimal(r);
  if (ld && rd) return done(decimalSum(ld, rd));
  return fail(`type error: operator '${op}' not defined for ${formatType(l)} and ${formatType(r)}`);
}

function scaled(t: TypeSpec, lit: Decimal): Promotion<TypeSpec> {
  const isInt = lit.isInteger() && lit.scale === 0;
  switch (t.base) {
    case "Int": {
      if (isInt) {
        const n = lit.toBigInt();
        if (n === 0n) return done(intType(0n, 0n));
        const a = t.min === undefined ? undefined : BigInt(t.min) * n;
        const b = t.max === undefined ? undefined : BigInt(t.max) * n;
        return done(n > 0n ? intType(a, b) : intType(b, a));
      }
      const shape = literalShape(lit.toString());
      return done({ base: "Decimal", precision: intAsDecimal(t).precision + shape.precision, scale: shape.scale });
    }
    case "Decimal": {
      if (isInt) {
        const n = lit.toBigInt();
        return done({ base: "Decimal", precision: t.precision + digitsForRange(n, n), scale: t.scale });
      }
      const shape = literalShape(lit.toString());
      return done({ base: "Decimal", precision: t.precision + shape.precision, scale: t.scale + shape.scale });
    }
    case "Money":
      return done(t);
    default:
      return fail(`type error: operator '*' not defined for ${formatType(t)}`);
  }
}

/**
 * Result type of `left op right`. Multiplication needs a numeric literal on
 * at least one side.
 */
export function arithType(op: ArithOp, left: Operand, right: Operand): Promotion<TypeSpec> {
  if (op !== "*") return additive(op, left.type, right.type);
  if (right.literal) return scaled(left.type, right.literal);
  if (left.literal) return scaled(right.type, left.literal);
  return fail(
    "type error: variable × variable multiplication is not permitted in PredicateExpression; only variable × literal_numeric is allowed"
  );
}

// =========================================================================
// Comparison
// =========================================================================

const EQUALITY: readonly CompareOp[] = ["=", "!="];

function unitName(t: TypeSpec): string {
  return t.base === "Duration" ? `${t.base}(${t.unit})` : t.base;
}

/**
 * Checks `left op right` and returns the common type both sides are promoted
 * to when they differ (Int against Decimal), otherwise undefined.
 */
export function comparisonType(op: CompareOp, l: TypeSpec, r: TypeSpec): Promotion<TypeSpec | undefined> {
  const mismatch = (): Promotion<TypeSpec | undefined> =>
    fail(`type error: cannot compare ${formatType(l)} with ${formatType(r)}`);

  if (l.base === "Int" && r.base === "Int") return done(undefined);
  if (l.base === "Decimal" && r.base === "Decimal") return done(undefined);

  if ((l.base === "Int" && r.base === "Decimal") || (l.base === "Decimal" && r.base === "Int")) {
    const dec = l.base === "Decimal" ? l : r;
    const int = l.base === "Int" ? l : r;
    if (dec.base !== "Decimal" || int.base !== "Int") return mismatch();
    const whole = Math.max(intAsDecimal(int).precision, integralDigits(dec));
    return done({ base: "Decimal", precision: whole + dec.scale, scale: dec.scale });
  }

  if (l.base !== r.base) return mismatch();

  switch (l.base) {
    case "Bool":
    case "Enum":
      if (!EQUALITY.includes(op)) {
        return fail(`type error: operator '${op}' not defined for ${l.base}; ${l.base} supports only = and ≠`);
      }
      return done(undefined);
    case "Money":
      if (r.base === "Money" && l.currency !== r.currency) {
        return fail(
          `type error: cannot compare Money(currency: ${l.currency}) with Money(currency: ${r.currency}); Money comparisons require identical currency codes`
        );
      }
      return done(undefined);
    case "Duration":
      if (r.base === "Duration" && l.unit !== r.unit) {
        return fail(`type error: cannot compare ${unitName(l)} with ${unitName(r)}`);
      }
      return done(undefined);
    case "Text":
    case "Date":
    case "DateTime":
      return done(undefined);
    case "Record":
    case "List":
    case "TaggedUnion":
      return fail(`type error: ${l.base} values are not comparable`);
    default:
      return mismatch();
  }
}

// =========================================================================
// Assignability
// =========================================================================

export function sameType(a: TypeSpec, b: TypeSpec): boolean {
  return encodeCanonical(a) === encodeCanonical(b);
}

/**
 * Whether every value of type `value` is a value of `target`. Numeric types
 * are checked by range, everything else structurally.
 */
export function assignable(value: TypeSpec, target: TypeSpec): boolean {
  if (value.base === "Int" && target.base === "Int") {
    const [vmin, vmax] = intBounds(value);
    const [tmin, tmax] = intBounds(target);
    return vmin >= tmin && vmax <= tmax;
  }
  if (value.base === "Int" && target.base === "Decimal") {
    return assignable(intAsDecimal(value), target);
  }
  if (value.base === "Decimal" && target.base === "Decimal") {
    return value.scale <= target.scale && integralDigits(value) <= integralDigits(target);
  }
  if (value.base === "Text" && target.base === "Text") {
    return target.max_length === undefined || (value.max_length !== undefined && value.max_length <= target.max_length);
  }
  if (value.base === "Enum" && target.base === "Enum") {
    return value.values.every(v => target.values.includes(v));
  }
  return sameType(value, target);
}
