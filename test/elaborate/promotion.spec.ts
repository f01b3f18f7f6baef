import { describe, it, expect } from "vitest";
import { arithType, assignable, comparisonType, intAsDecimal } from "../../src/elaborate/promotion";
import type { TypeSpec } from "../../src/interchange";
import { Decimal } from "../../src/numeric/decimal";

const int = (min: number, max: number): TypeSpec => ({ base: "Int", min, max });
const dec = (precision: number, scale: number): TypeSpec => ({ base: "Decimal", precision, scale });
const usd: TypeSpec = { base: "Money", currency: "USD" };
const eur: TypeSpec = { base: "Money", currency: "EUR" };
const lit = (text: string) => Decimal.parse(text);

describe("arithType", () => {
  it("adds Int ranges", () => {
    expect(arithType("+", { type: int(0, 10) }, { type: int(0, 5) })).toMatchObject({ tag: "Done", value: int(0, 15) });
  });

  it("subtracts Int ranges crosswise", () => {
    expect(arithType("-", { type: int(0, 10) }, { type: int(0, 5) })).toMatchObject({ tag: "Done", value: int(-5, 10) });
  });

  it("drops a bound it cannot compute", () => {
    expect(arithType("+", { type: { base: "Int", min: 0 } }, { type: int(1, 2) })).toMatchObject({
      tag: "Done",
      value: { base: "Int", min: 1 },
    });
  });

  it("widens Decimal sums by one integral digit", () => {
    expect(arithType("+", { type: dec(5, 2) }, { type: dec(4, 1) })).toMatchObject({ tag: "Done", value: dec(6, 2) });
  });

  it("promotes Int operands of a Decimal sum", () => {
    expect(arithType("+", { type: int(0, 999) }, { type: dec(4, 2) })).toMatchObject({ tag: "Done", value: dec(6, 2) });
  });

  it("scales an Int range by a negative literal", () => {
    expect(arithType("*", { type: int(0, 10) }, { type: int(-2, -2), literal: lit("-2") })).toMatchObject({
      tag: "Done",
      value: int(-20, 0),
    });
  });

  it("accepts the literal on either side", () => {
    expect(arithType("*", { type: int(3, 3), literal: lit("3") }, { type: int(1, 4) })).toMatchObject({
      tag: "Done",
      value: int(3, 12),
    });
  });

  it("adds precision and scale for a decimal literal", () => {
    expect(arithType("*", { type: dec(5, 2) }, { type: dec(2, 1), literal: lit("1.5") })).toMatchObject({
      tag: "Done",
      value: dec(7, 3),
    });
  });

  it("keeps Money as Money", () => {
    expect(arithType("*", { type: usd }, { type: dec(2, 1), literal: lit("0.5") })).toMatchObject({
      tag: "Done",
      value: usd,
    });
    expect(arithType("+", { type: usd }, { type: usd })).toMatchObject({ tag: "Done", value: usd });
  });

  it("refuses to mix currencies", () => {
    expect(arithType("+", { type: usd }, { type: eur })).toEqual({
      tag: "Fail",
      error:
        "type error: cannot combine Money(currency: USD) with Money(currency: EUR); Money arithmetic requires identical currency codes",
      meta: {},
    });
  });

  it("refuses variable times variable", () => {
    expect(arithType("*", { type: int(0, 1) }, { type: int(0, 1) }).tag).toBe("Fail");
  });
});

describe("comparisonType", () => {
  it("needs no common type for like types", () => {
    expect(comparisonType("<", int(0, 1), int(5, 9))).toEqual({ tag: "Done", value: undefined, meta: {} });
  });

  it("promotes Int against Decimal", () => {
    expect(comparisonType("<", dec(10, 2), int(5, 5))).toMatchObject({ tag: "Done", value: dec(10, 2) });
    expect(comparisonType(">", int(0, 1000000000), dec(4, 2))).toMatchObject({ tag: "Done", value: dec(12, 2) });
  });

  it("compares Money only within one currency", () => {
    expect(comparisonType("=", usd, eur)).toMatchObject({
      tag: "Fail",
      error:
        "type error: cannot compare Money(currency: USD) with Money(currency: EUR); Money comparisons require identical currency codes",
    });
  });

  it("compares Durations only within one unit", () => {
    expect(comparisonType("<", { base: "Duration", unit: "days" }, { base: "Duration", unit: "hours" })).toMatchObject({
      tag: "Fail",
      error: "type error: cannot compare Duration(days) with Duration(hours)",
    });
  });

  it("only tests enums for equality", () => {
    const e: TypeSpec = { base: "Enum", values: ["a", "b"] };
    expect(comparisonType("!=", e, e).tag).toBe("Done");
    expect(comparisonType(">", e, e)).toMatchObject({
      error: "type error: operator '>' not defined for Enum; Enum supports only = and ≠",
    });
  });

  it("rejects structured values", () => {
    const list: TypeSpec = { base: "List", element_type: { base: "Bool" }, max: 3 };
    expect(comparisonType("=", list, list)).toMatchObject({ error: "type error: List values are not comparable" });
  });
});

describe("assignable", () => {
  it("checks Int ranges by containment", () => {
    expect(assignable(int(0, 5), int(0, 10))).toBe(true);
    expect(assignable(int(0, 11), int(0, 10))).toBe(false);
    expect(assignable({ base: "Int" }, int(0, 10))).toBe(false);
  });

  it("lets an Int fill a wide enough Decimal", () => {
    expect(assignable(int(0, 999), dec(5, 2))).toBe(true);
    expect(assignable(int(0, 9999), dec(5, 2))).toBe(false);
  });

  it("checks Decimal scale and integral digits", () => {
    expect(assignable(dec(4, 1), dec(5, 2))).toBe(true);
    expect(assignable(dec(4, 3), dec(5, 2))).toBe(false);
  });

  it("checks Text length and Enum membership", () => {
    expect(assignable({ base: "Text", max_length: 3 }, { base: "Text", max_length: 5 })).toBe(true);
    expect(assignable({ base: "Text" }, { base: "Text", max_length: 5 })).toBe(false);
    expect(assignable({ base: "Enum", values: ["a"] }, { base: "Enum", values: ["a", "b"] })).toBe(true);
  });

  it("compares everything else structurally", () => {
    expect(assignable(usd, usd)).toBe(true);
    expect(assignable(usd, eur)).toBe(false);
  });
});

describe("intAsDecimal", () => {
  it("sizes the Decimal to the widest bound", () => {
    expect(intAsDecimal({ base: "Int", min: -100, max: 5 })).toEqual(dec(3, 0));
  });
});
