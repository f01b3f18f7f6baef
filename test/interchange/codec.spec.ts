import { describe, it, expect } from "vitest";
import {
  BundleDecodeError,
  compareBytes,
  decodeBundle,
  encodeBundle,
  encodeCanonical,
  formatType,
  sortedByBytes,
} from "../../src/interchange";
import { invoiceBundle } from "../helpers/contracts";

function decodeError(json: string): BundleDecodeError {
  try {
    decodeBundle(json);
  } catch (e) {
    if (e instanceof BundleDecodeError) return e;
    throw e;
  }
  throw new Error("expected a decode error");
}

const header = { covenant: "1.0", covenant_version: "1.1.0", id: "b", kind: "Bundle" };

describe("encodeCanonical", () => {
  it("sorts keys at every depth and keeps array order", () => {
    expect(encodeCanonical({ b: 1, a: { d: [3, 1], c: true } })).toBe('{"a":{"c":true,"d":[3,1]},"b":1}');
  });

  it("drops undefined members", () => {
    expect(encodeCanonical({ a: undefined, b: "x" })).toBe('{"b":"x"}');
  });

  it("indents on request", () => {
    expect(encodeCanonical({ b: 1, a: 2 }, { indent: 2 })).toBe('{\n  "a": 2,\n  "b": 1\n}');
  });

  it("refuses values JSON cannot carry exactly", () => {
    expect(() => encodeCanonical({ n: 1n })).toThrow("canonical encoding cannot represent bigint values");
    expect(() => encodeCanonical({ n: 1.5 })).toThrow("canonical encoding only carries safe integers, got 1.5");
  });
});

describe("byte order", () => {
  it("orders by UTF-8 bytes, upper case first", () => {
    expect(sortedByBytes(["b", "B", "a", "é", "z"])).toEqual(["B", "a", "b", "z", "é"]);
    expect(compareBytes("ab", "a")).toBeGreaterThan(0);
    expect(compareBytes("x", "x")).toBe(0);
  });
});

describe("decodeBundle", () => {
  it("reads back what it wrote", () => {
    const bundle = invoiceBundle();
    const text = encodeBundle(bundle, { indent: 2 });
    const decoded = decodeBundle(text);
    expect(decoded).toEqual(bundle);
    expect(encodeBundle(decoded)).toBe(encodeBundle(bundle));
  });

  it("reports invalid JSON at the root", () => {
    const err = decodeError("{");
    expect(err.path).toBe("$");
    expect(err.message.startsWith("$: invalid JSON: ")).toBe(true);
  });

  it("rejects unknown top-level keys", () => {
    expect(decodeError(JSON.stringify({ ...header, constructs: [], extra: 1 })).message).toBe(
      "$: unexpected key 'extra'"
    );
  });

  it("rejects a wrong document kind", () => {
    expect(decodeError(JSON.stringify({ ...header, constructs: [], kind: "Other" })).message).toBe(
      '$.kind: expected "Bundle"'
    );
  });

  it("points at the failing construct", () => {
    const persona = { id: "p", kind: "Persona", provenance: { file: "a.cov", line: "one" } };
    expect(decodeError(JSON.stringify({ ...header, constructs: [persona] })).message).toBe(
      "$.constructs[0].provenance.line: expected an integer"
    );
  });

  it("rejects unknown construct kinds and types", () => {
    expect(decodeError(JSON.stringify({ ...header, constructs: [{ kind: "Widget" }] })).message).toBe(
      '$.constructs[0].kind: unknown construct kind "Widget"'
    );
    const fact = {
      id: "f",
      kind: "Fact",
      provenance: { file: "a.cov", line: 1 },
      source: { field: "x", system: "s" },
      type: { base: "Float" },
    };
    expect(decodeError(JSON.stringify({ ...header, constructs: [fact] })).message).toBe(
      '$.constructs[0].type.base: unknown base type "Float"'
    );
  });

  it("rejects unknown expression operators", () => {
    const op = {
      allowed_personas: ["p"],
      effects: [],
      error_contract: [],
      id: "o",
      kind: "Operation",
      outcomes: ["ok"],
      precondition: { left: { fact_ref: "a" }, op: "%", right: { fact_ref: "b" } },
      provenance: { file: "a.cov", line: 1 },
    };
    expect(decodeError(JSON.stringify({ ...header, constructs: [op] })).message).toBe(
      '$.constructs[0].precondition.op: unknown operator "%"'
    );
  });
});

describe("formatType", () => {
  it("renders types the way they are written", () => {
    expect(formatType({ base: "Int", min: 0, max: 10 })).toBe("Int(min: 0, max: 10)");
    expect(formatType({ base: "Int" })).toBe("Int");
    expect(formatType({ base: "Decimal", precision: 10, scale: 2 })).toBe("Decimal(precision: 10, scale: 2)");
    expect(formatType({ base: "List", element_type: { base: "Text", max_length: 4 }, max: 3 })).toBe(
      "List(element_type: Text(max_length: 4), max: 3)"
    );
    expect(formatType({ base: "Record", fields: { a: { base: "Bool" }, b: { base: "Date" } } })).toBe(
      "Record { a: Bool, b: Date }"
    );
  });
});
