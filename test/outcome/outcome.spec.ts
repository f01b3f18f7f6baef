import { describe, it, expect } from "vitest";
import { isDone, isFail, type Outcome } from "../../src/outcome/outcome";
import { formatDiagnostic } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic, passCode } from "../../src/outcome/codes";
import { attempt, done, fail } from "../../src/outcome/constructors";
import { flatMapOutcome, mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";

class Refused extends Error {}

const recogniseRefused = (e: unknown): string | undefined => (e instanceof Refused ? e.message : undefined);

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const outcome = done("value", { durationMs: 12 });
    expect(outcome).toEqual({ tag: "Done", value: "value", meta: { durationMs: 12 } });
  });

  it("constructs Fail outcomes with empty metadata by default", () => {
    expect(fail("boom")).toEqual({ tag: "Fail", error: "boom", meta: {} });
  });

  it("type guards discriminate outcome variants", () => {
    const doneOutcome: Outcome<number, string> = done(1);
    const failOutcome: Outcome<number, string> = fail("bad");
    expect(isDone(doneOutcome)).toBe(true);
    expect(isFail(doneOutcome)).toBe(false);
    expect(isFail(failOutcome)).toBe(true);
  });

  it("pattern matches outcomes exhaustively", () => {
    const show = (o: Outcome<string, string>) =>
      match(o, {
        done: d => `done:${d.value}`,
        fail: f => `fail:${f.error}`,
      });
    expect(show(done("ok"))).toBe("done:ok");
    expect(show(fail("bad input"))).toBe("fail:bad input");
  });

  it("maps and flatMaps over successful outcomes only", () => {
    const half = (n: number): Outcome<number, string> => (n % 2 === 0 ? done(n / 2) : fail(`${n} is odd`));
    expect(mapOutcome(done(2), n => n * 2)).toEqual(done(4));
    expect(flatMapOutcome(done(6), half)).toEqual(done(3));
    expect(flatMapOutcome(done(3), half)).toEqual(fail("3 is odd"));

    const failed: Outcome<number, string> = fail("early");
    expect(mapOutcome(failed, (n: number) => n + 1)).toBe(failed);
    expect(flatMapOutcome(failed, half)).toBe(failed);
  });

  it("unwraps values and describes errors", () => {
    expect(unwrap(done(5))).toBe(5);
    expect(() => unwrap(fail({ code: 7 }), e => `code ${e.code}`)).toThrow("code 7");
    expect(unwrapOr(fail("x"), 9)).toBe(9);
  });
});

describe("attempt", () => {
  it("captures recognised exceptions", () => {
    expect(
      attempt(() => {
        throw new Refused("no");
      }, recogniseRefused)
    ).toEqual({ tag: "Fail", error: "no", meta: {} });
    expect(attempt(() => 3, recogniseRefused)).toEqual(done(3));
  });

  it("rethrows anything else", () => {
    expect(() =>
      attempt(() => {
        throw new TypeError("internal");
      }, recogniseRefused)
    ).toThrow(TypeError);
  });
});

describe("diagnostics", () => {
  it("maps elaboration passes to codes", () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(passCode)).toEqual(["C0000", "C0100", "C0200", "C0300", "C0400", "C0500", "C0600"]);
  });

  it("fills message templates from parameters", () => {
    const diag = makeDiagnostic("C1001", { message: "$.id: expected a string" });
    expect(diag).toEqual({
      code: "C1001",
      severity: "error",
      message: "Malformed bundle: $.id: expected a string",
      span: undefined,
      data: { message: "$.id: expected a string" },
    });
    expect(DIAGNOSTIC_CODES.W1100.severity).toBe("warning");
  });

  it("formats with and without a location", () => {
    expect(formatDiagnostic(makeDiagnostic("C0400", { message: "type error" }, { file: "a.cov", line: 3 }))).toBe(
      "a.cov:3: error[C0400]: type error"
    );
    expect(formatDiagnostic(makeDiagnostic("W1100", { message: "large" }))).toBe("warning[W1100]: large");
  });
});
