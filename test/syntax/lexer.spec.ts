import { describe, it, expect } from "vitest";
import { describeTok, tokenize } from "../../src/syntax/lexer";
import { ElabError } from "../../src/elaborate/errors";

function lexError(src: string): ElabError {
  try {
    tokenize(src, "a.cov");
  } catch (e) {
    if (e instanceof ElabError) return e;
    throw e;
  }
  throw new Error("expected a lexical error");
}

describe("tokenize", () => {
  it("splits a declaration header into words and punctuation", () => {
    expect(tokenize("fact x { }", "a.cov")).toEqual([
      { tag: "Word", s: "fact", line: 1 },
      { tag: "Word", s: "x", line: 1 },
      { tag: "Punct", p: "{", line: 1 },
      { tag: "Punct", p: "}", line: 1 },
      { tag: "EOF", line: 1 },
    ]);
  });

  it("maps the logical symbols onto their keyword forms", () => {
    const toks = tokenize("a ∧ b ∨ ¬c", "a.cov");
    expect(toks.map(t => (t.tag === "Punct" ? t.p : t.tag === "Word" ? t.s : t.tag))).toEqual([
      "a", "and", "b", "or", "not", "c", "EOF",
    ]);
  });

  it("treats and, or and not as operators", () => {
    const toks = tokenize("x and not y", "a.cov");
    expect(toks[1]).toEqual({ tag: "Punct", p: "and", line: 1 });
    expect(toks[2]).toEqual({ tag: "Punct", p: "not", line: 1 });
  });

  it("reads a minus after a term as subtraction", () => {
    expect(tokenize("x - 1", "a.cov").slice(0, 3)).toEqual([
      { tag: "Word", s: "x", line: 1 },
      { tag: "Punct", p: "-", line: 1 },
      { tag: "Int", n: 1, line: 1 },
    ]);
  });

  it("reads a minus before a digit elsewhere as a sign", () => {
    expect(tokenize("(-1)", "a.cov")[1]).toEqual({ tag: "Int", n: -1, line: 1 });
    expect(tokenize("= -2.50", "a.cov")[1]).toEqual({ tag: "Dec", s: "-2.50", line: 1 });
  });

  it("keeps decimal literals as text", () => {
    expect(tokenize("1.50", "a.cov")[0]).toEqual({ tag: "Dec", s: "1.50", line: 1 });
  });

  it("recognises two-character operators", () => {
    const toks = tokenize("a != b <= c >= d -> e", "a.cov");
    expect(toks.filter(t => t.tag === "Punct").map(t => (t.tag === "Punct" ? t.p : ""))).toEqual(["!=", "<=", ">=", "->"]);
  });

  it("drops comments and counts lines through them", () => {
    const toks = tokenize("// first\n/* a\nb */ x", "a.cov");
    expect(toks[0]).toEqual({ tag: "Word", s: "x", line: 3 });
  });

  it("unescapes string literals", () => {
    expect(tokenize(String.raw`"a\"b\\c"`, "a.cov")[0]).toEqual({ tag: "Str", s: "a\"b\\c", line: 1 });
  });

  it("reports an unterminated string at its opening line", () => {
    const err = lexError("\n\"abc");
    expect(err.pass).toBe(0);
    expect(err.line).toBe(2);
    expect(err.message).toBe("unterminated string literal");
  });

  it("reports an unterminated block comment", () => {
    expect(lexError("x /* never closed").message).toBe("unterminated block comment");
  });

  it("rejects characters outside the language", () => {
    expect(lexError("fact @").message).toBe("unexpected character '@'");
  });

  it("rejects integers beyond the safe range", () => {
    expect(lexError("9007199254740993").message).toBe("integer literal out of range: 9007199254740993");
  });
});

describe("describeTok", () => {
  it("names tokens the way parse errors quote them", () => {
    expect(describeTok({ tag: "Word", s: "fact", line: 1 })).toBe("'fact'");
    expect(describeTok({ tag: "Str", s: "x", line: 1 })).toBe("string \"x\"");
    expect(describeTok({ tag: "Int", n: 3, line: 1 })).toBe("integer 3");
    expect(describeTok({ tag: "EOF", line: 1 })).toBe("end of input");
  });
});
