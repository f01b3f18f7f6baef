import { ElabError } from "../elaborate/errors";

export type Tok =
  | { tag: "Word"; s: string; line: number }
  | { tag: "Str"; s: string; line: number }
  | { tag: "Int"; n: number; line: number }
  | { tag: "Dec"; s: string; line: number }
  | { tag: "Punct"; p: Punct; line: number }
  | { tag: "EOF"; line: number };

export type Punct =
  | "{" | "}" | "[" | "]" | "(" | ")"
  | ":" | "," | "."
  | "=" | "!=" | "<" | "<=" | ">" | ">="
  | "*" | "+" | "-" | "->"
  | "and" | "or" | "not" | "forall" | "exists" | "in";

const SINGLE: Record<string, Punct> = {
  "{": "{", "}": "}", "[": "[", "]": "]", "(": "(", ")": ")",
  ":": ":", ",": ",", ".": ".", "=": "=", "*": "*", "+": "+",
  "→": "->",
  "∧": "and",
  "∨": "or",
  "¬": "not",
  "∀": "forall",
  "∃": "exists",
  "∈": "in",
};

const isDigit = (c: string | undefined) => c !== undefined && c >= "0" && c <= "9";
const isIdentStart = (c: string) => /[A-Za-z_]/.test(c);
const isIdentPart = (c: string | undefined) => c !== undefined && /[A-Za-z0-9_]/.test(c);

/** A `-` directly before a digit is a sign unless the previous token ends a term. */
function endsTerm(t: Tok | undefined): boolean {
  if (!t) return false;
  switch (t.tag) {
    case "Word":
    case "Str":
    case "Int":
    case "Dec":
      return true;
    case "Punct":
      return t.p === ")" || t.p === "]" || t.p === "}";
    case "EOF":
      return false;
  }
}

/**
 * Split source text into tokens. Comments and whitespace are dropped; every
 * token carries the line it starts on.
 */
export function tokenize(src: string, file: string): Tok[] {
  const toks: Tok[] = [];
  const chars = Array.from(src);
  let i = 0;
  let line = 1;

  const fail = (at: number, message: string) =>
    new ElabError({ pass: 0, file, line: at, message });

  while (i < chars.length) {
    const c = chars[i];

    // comments
    if (c === "/" && chars[i + 1] === "/") {
      while (i < chars.length && chars[i] !== "\n") i++;
      continue;
    }
    if (c === "/" && chars[i + 1] === "*") {
      const start = line;
      i += 2;
      while (true) {
        if (i >= chars.length) throw fail(start, "unterminated block comment");
        if (chars[i] === "\n") line++;
        if (chars[i] === "*" && chars[i + 1] === "/") { i += 2; break; }
        i++;
      }
      continue;
    }

    if (/\s/.test(c)) {
      if (c === "\n") line++;
      i++;
      continue;
    }

    const at = line;

    if (c === "\"") {
      i++;
      let s = "";
      while (true) {
        const d = chars[i];
        if (d === undefined || d === "\n") throw fail(at, "unterminated string literal");
        if (d === "\"") { i++; break; }
        if (d === "\\") {
          const e = chars[i + 1];
          if (e === undefined) throw fail(at, "unterminated string literal");
          if (e === "\"") s += "\"";
          else if (e === "\\") s += "\\";
          else if (e === "n") s += "\n";
          else if (e === "t") s += "\t";
          else s += "\\" + e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      toks.push({ tag: "Str", s, line: at });
      continue;
    }

    if (isDigit(c) || (c === "-" && isDigit(chars[i + 1]) && !endsTerm(toks[toks.length - 1]))) {
      const start = i;
      if (c === "-") i++;
      while (isDigit(chars[i])) i++;
      if (chars[i] === "." && isDigit(chars[i + 1])) {
        i++;
        while (isDigit(chars[i])) i++;
        toks.push({ tag: "Dec", s: chars.slice(start, i).join(""), line: at });
      } else {
        const text = chars.slice(start, i).join("");
        const n = Number(text);
        if (!Number.isSafeInteger(n)) throw fail(at, `integer literal out of range: ${text}`);
        toks.push({ tag: "Int", n, line: at });
      }
      continue;
    }

    if (isIdentStart(c)) {
      const start = i;
      while (isIdentPart(chars[i])) i++;
      const s = chars.slice(start, i).join("");
      if (s === "and" || s === "or" || s === "not") {
        toks.push({ tag: "Punct", p: s, line: at });
      } else {
        toks.push({ tag: "Word", s, line: at });
      }
      continue;
    }

    const two = c + (chars[i + 1] ?? "");
    if (two === "!=" || two === "<=" || two === ">=" || two === "->") {
      toks.push({ tag: "Punct", p: two, line: at });
      i += 2;
      continue;
    }
    if (c === "<" || c === ">" || c === "-") {
      toks.push({ tag: "Punct", p: c, line: at });
      i++;
      continue;
    }

    const p = SINGLE[c];
    if (p === undefined) throw fail(at, `unexpected character '${c}'`);
    toks.push({ tag: "Punct", p, line: at });
    i++;
  }

  toks.push({ tag: "EOF", line });
  return toks;
}

export function describeTok(t: Tok): string {
  switch (t.tag) {
    case "Word": return `'${t.s}'`;
    case "Str": return `string "${t.s}"`;
    case "Int": return `integer ${t.n}`;
    case "Dec": return `decimal ${t.s}`;
    case "Punct": return `'${t.p}'`;
    case "EOF": return "end of input";
  }
}
