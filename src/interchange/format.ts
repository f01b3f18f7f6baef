import type { TypeSpec } from "./bundle";

function bounds(min?: number, max?: number): string[] {
  const parts: string[] = [];
  if (min !== undefined) parts.push(`min: ${min}`);
  if (max !== undefined) parts.push(`max: ${max}`);
  return parts;
}

/**
 * Render a type the way it is written in source, e.g. `Int(min: 0, max: 10)`.
 */
export function formatType(t: TypeSpec): string {
  switch (t.base) {
    case "Bool":
    case "Date":
    case "DateTime":
      return t.base;
    case "Int": {
      const parts = bounds(t.min, t.max);
      return parts.length > 0 ? `Int(${parts.join(", ")})` : "Int";
    }
    case "Decimal":
      return `Decimal(precision: ${t.precision}, scale: ${t.scale})`;
    case "Text":
      return t.max_length !== undefined ? `Text(max_length: ${t.max_length})` : "Text";
    case "Enum":
      return `Enum(values: [${t.values.join(", ")}])`;
    case "Money":
      return `Money(currency: ${t.currency})`;
    case "Duration":
      return `Duration(${[`unit: ${t.unit}`, ...bounds(t.min, t.max)].join(", ")})`;
    case "Record":
      return `Record { ${Object.entries(t.fields).map(([k, v]) => `${k}: ${formatType(v)}`).join(", ")} }`;
    case "List":
      return `List(element_type: ${formatType(t.element_type)}, max: ${t.max})`;
    case "TaggedUnion":
      return `TaggedUnion { ${Object.entries(t.variants).map(([k, v]) => `${k}: ${formatType(v)}`).join(", ")} }`;
  }
}
