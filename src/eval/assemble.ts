import type { FactConstruct, FactDefault, TypeSpec } from "../interchange/bundle";
import { formatType } from "../interchange/format";
import { intBounds } from "../numeric/bounds";
import { Decimal } from "../numeric/decimal";
import { isIsoDate, isIsoDateTime } from "../numeric/temporal";
import { nullTraceSink, type TraceSink } from "../ports/trace";
import { evalFail } from "./errors";
import type { Value } from "./values";

// =========================================================================
// Fact assembly
// =========================================================================

/** Immutable fact values keyed by fact id. */
export type FactSet = ReadonlyMap<string, Value>;

/** Raw fact inputs as parsed from JSON, keyed by fact id. */
export type FactInputs = Readonly<Record<string, unknown>>;

/**
 * Build the FactSet for `facts`: every declared fact takes its input value,
 * or its default, or the assembly fails. Keys nobody declared are ignored.
 * No partial FactSet is ever returned.
 */
export function assembleFacts(facts: readonly FactConstruct[], inputs: FactInputs, trace: TraceSink = nullTraceSink): FactSet {
  const out = new Map<string, Value>();
  const defaulted: string[] = [];

  for (const fact of facts) {
    if (hasOwn(inputs, fact.id)) {
      out.set(fact.id, parseFactValue(fact.id, inputs[fact.id], fact.type));
    } else if (fact.default) {
      out.set(fact.id, defaultValue(fact.default, fact.type));
      defaulted.push(fact.id);
    } else {
      evalFail({ tag: "missing_fact", factId: fact.id });
    }
  }

  trace.emit({ tag: "E_FactsAssembled", count: out.size, defaulted });
  return out;
}

function defaultValue(d: FactDefault, type: TypeSpec): Value {
  switch (d.kind) {
    case "bool_literal":
      return { tag: "Bool", b: d.value };
    case "int_literal":
      return { tag: "Int", n: BigInt(d.value) };
    case "decimal_value":
      return { tag: "Decimal", d: Decimal.parse(d.value) };
    case "money_value":
      return { tag: "Money", amount: Decimal.parse(d.amount.value), currency: d.currency };
    case "text_literal":
      switch (type.base) {
        case "Enum":
          return { tag: "Enum", s: d.value };
        case "Date":
          return { tag: "Date", s: d.value };
        case "DateTime":
          return { tag: "DateTime", s: d.value };
        default:
          return { tag: "Text", s: d.value };
      }
  }
}

// =========================================================================
// Input parsing
// =========================================================================

function jsonTypeName(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function hasOwn(o: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(o, key);
}

function decimalInput(v: unknown): Decimal | undefined {
  if (typeof v === "string" && Decimal.isDecimalText(v)) return Decimal.parse(v);
  if (typeof v === "number" && Number.isFinite(v)) {
    const text = String(v);
    // exponent notation is not decimal text
    return Decimal.isDecimalText(text) ? Decimal.parse(text) : undefined;
  }
  if (isObject(v) && "value" in v) return decimalInput(v.value);
  return undefined;
}

function integerInput(v: unknown): bigint | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) ? BigInt(v) : undefined;
}

/**
 * Parse one input against its declared type. `id` names the fact, or the
 * path inside it for nested record fields and list elements.
 */
export function parseFactValue(id: string, raw: unknown, type: TypeSpec): Value {
  const mismatch = (got: string = jsonTypeName(raw)): never =>
    evalFail({ tag: "type_mismatch", factId: id, expected: formatType(type), got });

  switch (type.base) {
    case "Bool":
      return typeof raw === "boolean" ? { tag: "Bool", b: raw } : mismatch();

    case "Int": {
      const n = integerInput(raw);
      if (n === undefined) return mismatch();
      const [min, max] = intBounds(type);
      if (n < min || n > max) return mismatch(n.toString());
      return { tag: "Int", n };
    }

    case "Decimal": {
      const d = decimalInput(raw);
      if (!d) return mismatch();
      const rounded = d.rescale(type.scale);
      if (!rounded.fits(type.precision, type.scale)) return mismatch(d.toString());
      return { tag: "Decimal", d: rounded };
    }

    case "Money": {
      if (!isObject(raw)) return mismatch();
      const amount = decimalInput(raw.amount);
      if (!amount || typeof raw.currency !== "string") return mismatch();
      if (raw.currency !== type.currency) return mismatch(`Money(currency: ${raw.currency})`);
      return { tag: "Money", amount, currency: raw.currency };
    }

    case "Text": {
      if (typeof raw !== "string") return mismatch();
      const length = [...raw].length;
      if (type.max_length !== undefined && length > type.max_length) return mismatch(`text of length ${length}`);
      return { tag: "Text", s: raw };
    }

    case "Enum":
      if (typeof raw !== "string") return mismatch();
      if (!type.values.includes(raw)) {
        return evalFail({ tag: "invalid_enum", factId: id, value: raw, variants: [...type.values] });
      }
      return { tag: "Enum", s: raw };

    case "Date":
      if (typeof raw !== "string") return mismatch();
      if (!isIsoDate(raw)) {
        return evalFail({
          tag: "type_error",
          message: `fact '${id}': invalid Date format '${raw}', expected ISO 8601 (YYYY-MM-DD)`,
        });
      }
      return { tag: "Date", s: raw };

    case "DateTime":
      if (typeof raw !== "string") return mismatch();
      if (!isIsoDateTime(raw)) {
        return evalFail({
          tag: "type_error",
          message: `fact '${id}': invalid DateTime format '${raw}', expected ISO 8601 (YYYY-MM-DDTHH:MM:SSZ)`,
        });
      }
      return { tag: "DateTime", s: raw };

    case "Duration": {
      if (!isObject(raw)) return mismatch();
      const n = integerInput(raw.value);
      if (n === undefined) return mismatch();
      if (raw.unit !== type.unit) return mismatch(`unit ${String(raw.unit)}`);
      if ((type.min !== undefined && n < BigInt(type.min)) || (type.max !== undefined && n > BigInt(type.max))) {
        return mismatch(`${n} ${type.unit}`);
      }
      return { tag: "Duration", n, unit: type.unit };
    }

    case "Record": {
      if (!isObject(raw)) return mismatch();
      const fields = new Map<string, Value>();
      for (const [name, fieldType] of Object.entries(type.fields)) {
        if (!hasOwn(raw, name)) return mismatch(`record without field '${name}'`);
        fields.set(name, parseFactValue(`${id}.${name}`, raw[name], fieldType));
      }
      return { tag: "Record", fields };
    }

    case "List": {
      if (!Array.isArray(raw)) return mismatch();
      if (raw.length > type.max) {
        return evalFail({ tag: "list_overflow", factId: id, max: type.max, actual: raw.length });
      }
      return { tag: "List", items: raw.map((item: unknown, i: number) => parseFactValue(`${id}[${i}]`, item, type.element_type)) };
    }

    case "TaggedUnion": {
      if (!isObject(raw) || typeof raw.tag !== "string") return mismatch();
      const variantType = hasOwn(type.variants, raw.tag) ? type.variants[raw.tag] : undefined;
      if (!variantType) return mismatch(`variant '${raw.tag}'`);
      return { tag: "Tagged", variant: raw.tag, value: parseFactValue(`${id}.${raw.tag}`, raw.value, variantType) };
    }
  }
}
