import type { DurationUnit, LiteralValue, TypeSpec } from "../interchange/bundle";
import { Decimal } from "../numeric/decimal";

// =========================================================================
// Runtime values
// =========================================================================

export type RecordVal = { tag: "Record"; fields: ReadonlyMap<string, Value> };
export type ListVal = { tag: "List"; items: readonly Value[] };
export type TaggedVal = { tag: "Tagged"; variant: string; value: Value };

/**
 * A value of one of the twelve base types, or `Absent`: what a TaggedUnion
 * field access yields when the active variant is a different one.
 */
export type Value =
  | { tag: "Bool"; b: boolean }
  | { tag: "Int"; n: bigint }
  | { tag: "Decimal"; d: Decimal }
  | { tag: "Money"; amount: Decimal; currency: string }
  | { tag: "Text"; s: string }
  | { tag: "Enum"; s: string }
  | { tag: "Date"; s: string }
  | { tag: "DateTime"; s: string }
  | { tag: "Duration"; n: bigint; unit: DurationUnit }
  | RecordVal
  | ListVal
  | TaggedVal
  | { tag: "Absent" };

export const VTrue: Value = { tag: "Bool", b: true };
export const VFalse: Value = { tag: "Bool", b: false };
export const VAbsent: Value = { tag: "Absent" };

export function vbool(b: boolean): Value {
  return b ? VTrue : VFalse;
}

/** Name used in error messages. */
export function typeName(v: Value): string {
  return v.tag === "Tagged" ? "TaggedUnion" : v.tag;
}

/**
 * Runtime value of an expression literal. Strings take their meaning from
 * the literal's type.
 */
export function literalToValue(literal: LiteralValue, type: TypeSpec): Value {
  if (typeof literal === "boolean") return vbool(literal);
  if (typeof literal === "number") return { tag: "Int", n: BigInt(literal) };
  if (typeof literal === "string") {
    switch (type.base) {
      case "Enum":
        return { tag: "Enum", s: literal };
      case "Date":
        return { tag: "Date", s: literal };
      case "DateTime":
        return { tag: "DateTime", s: literal };
      default:
        return { tag: "Text", s: literal };
    }
  }
  if (literal.kind === "decimal_value") return { tag: "Decimal", d: Decimal.parse(literal.value) };
  return { tag: "Money", amount: Decimal.parse(literal.amount.value), currency: literal.currency };
}

// =========================================================================
// JSON projection
// =========================================================================

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

function intJson(n: bigint): number | string {
  return n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(n) : n.toString();
}

/**
 * Plain JSON form of a value, the same shapes fact inputs use. Decimals are
 * strings; Absent is null.
 */
export function valueToJson(v: Value): JsonValue {
  switch (v.tag) {
    case "Bool":
      return v.b;
    case "Int":
      return intJson(v.n);
    case "Decimal":
      return v.d.toString();
    case "Money":
      return { amount: v.amount.toString(), currency: v.currency };
    case "Text":
    case "Enum":
    case "Date":
    case "DateTime":
      return v.s;
    case "Duration":
      return { unit: v.unit, value: intJson(v.n) };
    case "Record": {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, field] of v.fields) out[k] = valueToJson(field);
      return out;
    }
    case "List":
      return v.items.map(valueToJson);
    case "Tagged":
      return { tag: v.variant, value: valueToJson(v.value) };
    case "Absent":
      return null;
  }
}
