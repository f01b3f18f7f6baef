import type { DurationType, IntType, TypeSpec } from "../interchange/bundle";
import type { RawField, RawType } from "../syntax/ast";
import { elabError, type ElabError, type ErrorSite } from "./errors";

export interface TypeContext {
  pass: number;
  site: ErrorSite;
  field: string;
  /** Resolved alias, or undefined when `name` is not a declared type. */
  lookup(name: string): TypeSpec | undefined;
}

const CURRENCY = /^[A-Z]{3}$/;

/**
 * Turn a parsed type into its interchange form, inlining aliases and checking
 * the type's own parameters.
 */
export function materializeType(raw: RawType, ctx: TypeContext): TypeSpec {
  const fail = (message: string): ElabError =>
    elabError(ctx.pass, { ...ctx.site, line: raw.line }, ctx.field, message);

  switch (raw.tag) {
    case "Bool":
    case "Date":
    case "DateTime":
      return { base: raw.tag };

    case "Int": {
      if (raw.min !== undefined && raw.max !== undefined && raw.min > raw.max) {
        throw fail(`type error: Int min ${raw.min} exceeds max ${raw.max}`);
      }
      const t: IntType = { base: "Int" };
      if (raw.min !== undefined) t.min = raw.min;
      if (raw.max !== undefined) t.max = raw.max;
      return t;
    }

    case "Decimal":
      if (raw.precision < 1) throw fail(`type error: Decimal precision must be at least 1, got ${raw.precision}`);
      if (raw.scale < 0 || raw.scale > raw.precision) {
        throw fail(`type error: Decimal scale must be between 0 and precision ${raw.precision}, got ${raw.scale}`);
      }
      return { base: "Decimal", precision: raw.precision, scale: raw.scale };

    case "Text":
      if (raw.max_length !== undefined && raw.max_length < 0) {
        throw fail(`type error: Text max_length must be non-negative, got ${raw.max_length}`);
      }
      return raw.max_length === undefined ? { base: "Text" } : { base: "Text", max_length: raw.max_length };

    case "Enum": {
      if (raw.values.length === 0) throw fail("type error: Enum must declare at least one value");
      const dup = raw.values.find((v, i) => raw.values.indexOf(v) !== i);
      if (dup !== undefined) throw fail(`type error: duplicate Enum value '${dup}'`);
      return { base: "Enum", values: [...raw.values] };
    }

    case "Money":
      if (!CURRENCY.test(raw.currency)) {
        throw fail(`type error: currency '${raw.currency}' must be a three-letter ISO 4217 code`);
      }
      return { base: "Money", currency: raw.currency };

    case "Duration": {
      if (raw.min !== undefined && raw.max !== undefined && raw.min > raw.max) {
        throw fail(`type error: Duration min ${raw.min} exceeds max ${raw.max}`);
      }
      const t: DurationType = { base: "Duration", unit: raw.unit };
      if (raw.min !== undefined) t.min = raw.min;
      if (raw.max !== undefined) t.max = raw.max;
      return t;
    }

    case "Record":
      return { base: "Record", fields: materializeFields(raw.fields, ctx) };

    case "TaggedUnion":
      if (raw.variants.length === 0) throw fail("type error: TaggedUnion must declare at least one variant");
      return { base: "TaggedUnion", variants: materializeFields(raw.variants, ctx) };

    case "List":
      if (raw.max < 0) throw fail(`type error: List max must be non-negative, got ${raw.max}`);
      return { base: "List", element_type: materializeType(raw.element, ctx), max: raw.max };

    case "Named": {
      const resolved = ctx.lookup(raw.name);
      if (!resolved) throw fail(`unknown type reference '${raw.name}'`);
      return resolved;
    }
  }
}

function materializeFields(fields: RawField[], ctx: TypeContext): Record<string, TypeSpec> {
  const out: Record<string, TypeSpec> = {};
  for (const f of fields) {
    out[f.name] = materializeType(f.type, ctx);
  }
  return out;
}

/** Alias names a parsed type mentions, in order of appearance. */
export function namedRefs(raw: RawType): string[] {
  switch (raw.tag) {
    case "Named":
      return [raw.name];
    case "Record":
      return raw.fields.flatMap(f => namedRefs(f.type));
    case "TaggedUnion":
      return raw.variants.flatMap(f => namedRefs(f.type));
    case "List":
      return namedRefs(raw.element);
    default:
      return [];
  }
}
