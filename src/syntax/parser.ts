import { ElabError } from "../elaborate/errors";
import { DURATION_UNITS, type CompareOp, type DurationUnit } from "../interchange/bundle";
import { describeTok, tokenize, type Punct, type Tok } from "./lexer";
import type {
  FieldLines,
  RawBranch,
  RawCompStep,
  RawConstruct,
  RawDomain,
  RawEffect,
  RawExpr,
  RawFactSource,
  RawField,
  RawHandler,
  RawIntType,
  RawJoin,
  RawLiteral,
  RawStep,
  RawTarget,
  RawTextType,
  RawType,
} from "./ast";

/**
 * Pass 0: read one source file into raw constructs.
 */
export function parseSource(src: string, file: string): RawConstruct[] {
  return new Parser(tokenize(src, file), file).parseFile();
}

const COMPARE_PUNCTS: readonly Punct[] = ["=", "!=", "<", "<=", ">", ">="];

function isCompareOp(p: Punct): p is CompareOp {
  return COMPARE_PUNCTS.includes(p);
}

function isDurationUnit(s: string): s is DurationUnit {
  return DURATION_UNITS.some(u => u === s);
}

type Context = { kind: string; id: string } | undefined;

class Parser {
  private i = 0;
  private context: Context;

  constructor(private readonly toks: Tok[], private readonly file: string) {}

  // =========================================================================
  // Cursor
  // =========================================================================

  private peek(offset = 0): Tok {
    return this.toks[Math.min(this.i + offset, this.toks.length - 1)];
  }

  private advance(): Tok {
    const t = this.peek();
    if (this.i < this.toks.length - 1) this.i++;
    return t;
  }

  private line(): number {
    return this.peek().line;
  }

  private err(message: string, line = this.line()): ElabError {
    return new ElabError({
      pass: 0,
      construct_kind: this.context?.kind,
      construct_id: this.context?.id,
      file: this.file,
      line,
      message,
    });
  }

  private isPunct(p: Punct, offset = 0): boolean {
    const t = this.peek(offset);
    return t.tag === "Punct" && t.p === p;
  }

  private isWord(w: string, offset = 0): boolean {
    const t = this.peek(offset);
    return t.tag === "Word" && t.s === w;
  }

  private expect(p: Punct): void {
    if (!this.isPunct(p)) {
      throw this.err(`expected '${p}', got ${describeTok(this.peek())}`);
    }
    this.advance();
  }

  private accept(p: Punct): boolean {
    if (this.isPunct(p)) {
      this.advance();
      return true;
    }
    return false;
  }

  private word(): string {
    const t = this.peek();
    if (t.tag !== "Word") throw this.err(`expected identifier, got ${describeTok(t)}`);
    this.advance();
    return t.s;
  }

  private str(): string {
    const t = this.peek();
    if (t.tag !== "Str") throw this.err(`expected string, got ${describeTok(t)}`);
    this.advance();
    return t.s;
  }

  private int(): number {
    const t = this.peek();
    if (t.tag !== "Int") throw this.err(`expected integer, got ${describeTok(t)}`);
    this.advance();
    return t.n;
  }

  private wordOrStr(): string {
    return this.peek().tag === "Str" ? this.str() : this.word();
  }

  /** `{ key: value ... }` with optional commas; `onField` consumes each value. */
  private fields(owner: string, onField: (key: string, line: number) => void): FieldLines {
    const lines: FieldLines = {};
    this.expect("{");
    while (!this.isPunct("}")) {
      const line = this.line();
      const key = this.word();
      if (key in lines) throw this.err(`duplicate ${owner} field '${key}'`, line);
      lines[key] = line;
      this.expect(":");
      onField(key, line);
      this.accept(",");
    }
    this.expect("}");
    return lines;
  }

  /** `( key: value, ... )` argument lists. */
  private namedArgs(owner: string, onArg: (key: string) => void): void {
    const seen = new Set<string>();
    this.expect("(");
    while (!this.isPunct(")")) {
      const key = this.word();
      if (seen.has(key)) throw this.err(`duplicate ${owner} argument '${key}'`);
      seen.add(key);
      this.expect(":");
      onArg(key);
      if (!this.accept(",")) break;
    }
    this.expect(")");
  }

  private list<T>(item: () => T): T[] {
    const out: T[] = [];
    this.expect("[");
    while (!this.isPunct("]")) {
      out.push(item());
      if (!this.accept(",")) break;
    }
    this.expect("]");
    return out;
  }

  private required<T>(value: T | undefined, kind: string, field: string, line: number): T {
    if (value === undefined) throw this.err(`${kind} missing '${field}'`, line);
    return value;
  }

  // =========================================================================
  // File
  // =========================================================================

  parseFile(): RawConstruct[] {
    const out: RawConstruct[] = [];
    while (this.peek().tag !== "EOF") {
      this.context = undefined;
      out.push(this.construct());
    }
    return out;
  }

  private construct(): RawConstruct {
    const t = this.peek();
    const line = t.line;
    if (t.tag !== "Word") throw this.err(`expected a declaration, got ${describeTok(t)}`);

    switch (t.s) {
      case "import": {
        this.advance();
        return { tag: "Import", path: this.str(), file: this.file, line };
      }
      case "persona": {
        this.advance();
        return { tag: "Persona", id: this.word(), file: this.file, line };
      }
      case "source":
        return this.source(line);
      case "type":
        return this.typeDecl(line);
      case "fact":
        return this.fact(line);
      case "entity":
        return this.entity(line);
      case "rule":
        return this.rule(line);
      case "operation":
        return this.operation(line);
      case "flow":
        return this.flow(line);
      default:
        throw this.err(`unknown declaration '${t.s}'`);
    }
  }

  private enter(kind: string): string {
    this.advance();
    const id = this.word();
    this.context = { kind, id };
    return id;
  }

  // =========================================================================
  // Constructs
  // =========================================================================

  private source(line: number): RawConstruct {
    const id = this.enter("Source");
    let protocol: string | undefined;
    let description: string | undefined;
    const extra: [string, string][] = [];

    this.fields("Source", key => {
      if (key === "protocol") {
        protocol = this.word();
        while (this.accept(".")) protocol += "." + this.word();
      } else if (key === "description") {
        description = this.str();
      } else {
        extra.push([key, this.wordOrStr()]);
      }
    });

    return {
      tag: "Source",
      id,
      protocol: this.required(protocol, "Source", "protocol", line),
      description,
      fields: extra,
      file: this.file,
      line,
    };
  }

  private typeDecl(line: number): RawConstruct {
    const id = this.enter("TypeDecl");
    let type: RawType;
    if (this.accept("=")) {
      type = this.type();
      if (type.tag !== "Record" && type.tag !== "TaggedUnion") {
        throw this.err(`type alias '${id}' must be a Record or TaggedUnion`, line);
      }
    } else {
      type = { tag: "Record", fields: this.fieldTypes("Record"), line };
    }
    return { tag: "TypeDecl", id, type, file: this.file, line };
  }

  private fact(line: number): RawConstruct {
    const id = this.enter("Fact");
    let type: RawType | undefined;
    let source: RawFactSource | undefined;
    let dflt: RawLiteral | undefined;

    const lines = this.fields("Fact", key => {
      switch (key) {
        case "type":
          type = this.type();
          return;
        case "source":
          source = this.factSource();
          return;
        case "default":
          dflt = this.literal();
          return;
        default:
          throw this.err(`unknown Fact field '${key}'`);
      }
    });

    return {
      tag: "Fact",
      id,
      type: this.required(type, "Fact", "type", line),
      source: this.required(source, "Fact", "source", line),
      default: dflt,
      lines,
      file: this.file,
      line,
    };
  }

  private factSource(): RawFactSource {
    if (this.peek().tag === "Str") {
      return { tag: "Freetext", text: this.str() };
    }
    const sourceId = this.word();
    let path: string | undefined;
    const line = this.line();
    this.fields("source", key => {
      if (key !== "path") throw this.err(`unknown source field '${key}'`);
      path = this.str();
    });
    return { tag: "Structured", sourceId, path: this.required(path, "source", "path", line) };
  }

  private entity(line: number): RawConstruct {
    const id = this.enter("Entity");
    let states: string[] | undefined;
    let initial: string | undefined;
    let parent: string | undefined;
    const transitions: { from: string; to: string; line: number }[] = [];

    const lines = this.fields("Entity", key => {
      switch (key) {
        case "states":
          states = this.list(() => this.word());
          return;
        case "initial":
          initial = this.word();
          return;
        case "parent":
          parent = this.word();
          return;
        case "transitions":
          for (const t of this.list(() => this.transition())) transitions.push(t);
          return;
        default:
          throw this.err(`unknown Entity field '${key}'`);
      }
    });

    return {
      tag: "Entity",
      id,
      states: this.required(states, "Entity", "states", line),
      initial: this.required(initial, "Entity", "initial", line),
      transitions,
      parent,
      lines,
      file: this.file,
      line,
    };
  }

  private transition(): { from: string; to: string; line: number } {
    const line = this.line();
    this.expect("(");
    const from = this.word();
    if (!this.accept("->")) this.expect(",");
    const to = this.word();
    this.expect(")");
    return { from, to, line };
  }

  private rule(line: number): RawConstruct {
    const id = this.enter("Rule");
    let stratum: number | undefined;
    let when: RawExpr | undefined;
    let produce: { verdictType: string; payloadType: RawType; payloadValue: RawExpr } | undefined;

    const lines = this.fields("Rule", key => {
      switch (key) {
        case "stratum":
          stratum = this.int();
          return;
        case "when":
          when = this.expr();
          return;
        case "produce":
          produce = this.produce();
          return;
        default:
          throw this.err(`unknown Rule field '${key}'`);
      }
    });

    const p = this.required(produce, "Rule", "produce", line);
    return {
      tag: "Rule",
      id,
      stratum: this.required(stratum, "Rule", "stratum", line),
      when: this.required(when, "Rule", "when", line),
      verdictType: p.verdictType,
      payloadType: p.payloadType,
      payloadValue: p.payloadValue,
      lines,
      file: this.file,
      line,
    };
  }

  private produce(): { verdictType: string; payloadType: RawType; payloadValue: RawExpr } {
    if (!this.isWord("verdict")) throw this.err(`expected 'verdict', got ${describeTok(this.peek())}`);
    this.advance();
    const verdictType = this.word();
    const line = this.line();
    let payload: { payloadType: RawType; payloadValue: RawExpr } | undefined;
    this.fields("produce", key => {
      if (key !== "payload") throw this.err(`unknown produce field '${key}'`);
      const payloadType = this.type();
      this.expect("=");
      payload = { payloadType, payloadValue: this.sum() };
    });
    const { payloadType, payloadValue } = this.required(payload, "produce", "payload", line);
    return { verdictType, payloadType, payloadValue };
  }

  private operation(line: number): RawConstruct {
    const id = this.enter("Operation");
    let allowedPersonas: string[] = [];
    let precondition: RawExpr | undefined;
    let effects: RawEffect[] = [];
    let errorContract: string[] = [];
    let outcomes: string[] = [];

    const lines = this.fields("Operation", key => {
      switch (key) {
        case "allowed_personas":
          allowedPersonas = this.list(() => this.word());
          return;
        case "precondition":
          precondition = this.expr();
          return;
        case "effects":
          effects = this.list(() => this.effect());
          return;
        case "error_contract":
          errorContract = this.list(() => this.word());
          return;
        case "outcomes":
          outcomes = this.list(() => this.word());
          return;
        default:
          throw this.err(`unknown Operation field '${key}'`);
      }
    });

    return {
      tag: "Operation",
      id,
      allowedPersonas,
      precondition: this.required(precondition, "Operation", "precondition", line),
      effects,
      errorContract,
      outcomes,
      lines,
      file: this.file,
      line,
    };
  }

  private effect(): RawEffect {
    const line = this.line();
    this.expect("(");
    const entity = this.word();
    this.expect(",");
    const from = this.word();
    if (!this.accept("->")) this.expect(",");
    const to = this.word();
    let outcome: string | undefined;
    if (this.accept(",")) outcome = this.word();
    this.expect(")");
    return { entity, from, to, outcome, line };
  }

  private flow(line: number): RawConstruct {
    const id = this.enter("Flow");
    let entry: string | undefined;
    let steps: RawStep[] | undefined;

    const lines = this.fields("Flow", key => {
      switch (key) {
        case "snapshot": {
          const mode = this.word();
          if (mode !== "at_initiation") {
            throw this.err(`unsupported snapshot '${mode}'; only at_initiation is supported`);
          }
          return;
        }
        case "entry":
          entry = this.word();
          return;
        case "steps":
          steps = this.steps();
          return;
        default:
          throw this.err(`unknown Flow field '${key}'`);
      }
    });

    return {
      tag: "Flow",
      id,
      entry: this.required(entry, "Flow", "entry", line),
      steps: this.required(steps, "Flow", "steps", line),
      lines,
      file: this.file,
      line,
    };
  }

  // =========================================================================
  // Flow steps
  // =========================================================================

  private steps(): RawStep[] {
    const out: RawStep[] = [];
    const seen = new Set<string>();
    this.expect("{");
    while (!this.isPunct("}")) {
      const line = this.line();
      const id = this.word();
      if (seen.has(id)) throw this.err(`duplicate step id '${id}'`, line);
      seen.add(id);
      this.expect(":");
      out.push(this.step(id, line));
      this.accept(",");
    }
    this.expect("}");
    return out;
  }

  private step(id: string, line: number): RawStep {
    const kind = this.word();
    switch (kind) {
      case "OperationStep": {
        let op: string | undefined;
        let persona: string | undefined;
        let outcomes: { label: string; target: RawTarget }[] | undefined;
        let onFailure: RawHandler | undefined;
        this.fields(kind, key => {
          if (key === "op") op = this.word();
          else if (key === "persona") persona = this.word();
          else if (key === "outcomes") outcomes = this.outcomeMap();
          else if (key === "on_failure") onFailure = this.handler();
          else throw this.err(`unknown OperationStep field '${key}'`);
        });
        return {
          tag: "OperationStep",
          id,
          op: this.required(op, kind, "op", line),
          persona: this.required(persona, kind, "persona", line),
          outcomes: this.required(outcomes, kind, "outcomes", line),
          onFailure,
          line,
        };
      }
      case "BranchStep": {
        let condition: RawExpr | undefined;
        let persona: string | undefined;
        let ifTrue: RawTarget | undefined;
        let ifFalse: RawTarget | undefined;
        this.fields(kind, key => {
          if (key === "condition") condition = this.expr();
          else if (key === "persona") persona = this.word();
          else if (key === "if_true") ifTrue = this.target();
          else if (key === "if_false") ifFalse = this.target();
          else throw this.err(`unknown BranchStep field '${key}'`);
        });
        return {
          tag: "BranchStep",
          id,
          condition: this.required(condition, kind, "condition", line),
          persona: this.required(persona, kind, "persona", line),
          ifTrue: this.required(ifTrue, kind, "if_true", line),
          ifFalse: this.required(ifFalse, kind, "if_false", line),
          line,
        };
      }
      case "HandoffStep": {
        let fromPersona: string | undefined;
        let toPersona: string | undefined;
        let next: string | undefined;
        this.fields(kind, key => {
          if (key === "from_persona") fromPersona = this.word();
          else if (key === "to_persona") toPersona = this.word();
          else if (key === "next") next = this.word();
          else throw this.err(`unknown HandoffStep field '${key}'`);
        });
        return {
          tag: "HandoffStep",
          id,
          fromPersona: this.required(fromPersona, kind, "from_persona", line),
          toPersona: this.required(toPersona, kind, "to_persona", line),
          next: this.required(next, kind, "next", line),
          line,
        };
      }
      case "SubFlowStep": {
        let flow: string | undefined;
        let persona: string | undefined;
        let onSuccess: RawTarget | undefined;
        let onFailure: RawHandler | undefined;
        this.fields(kind, key => {
          if (key === "flow") flow = this.word();
          else if (key === "persona") persona = this.word();
          else if (key === "on_success") onSuccess = this.target();
          else if (key === "on_failure") onFailure = this.handler();
          else throw this.err(`unknown SubFlowStep field '${key}'`);
        });
        return {
          tag: "SubFlowStep",
          id,
          flow: this.required(flow, kind, "flow", line),
          persona: this.required(persona, kind, "persona", line),
          onSuccess: this.required(onSuccess, kind, "on_success", line),
          onFailure,
          line,
        };
      }
      case "ParallelStep": {
        let branches: RawBranch[] | undefined;
        let join: RawJoin | undefined;
        this.fields(kind, key => {
          if (key === "branches") branches = this.list(() => this.branch());
          else if (key === "join") join = this.join();
          else throw this.err(`unknown ParallelStep field '${key}'`);
        });
        return {
          tag: "ParallelStep",
          id,
          branches: this.required(branches, kind, "branches", line),
          join: this.required(join, kind, "join", line),
          line,
        };
      }
      default:
        throw this.err(`unknown step kind '${kind}'`);
    }
  }

  private outcomeMap(): { label: string; target: RawTarget }[] {
    const out: { label: string; target: RawTarget }[] = [];
    this.fields("outcomes", key => {
      out.push({ label: key, target: this.target() });
    });
    return out;
  }

  private branch(): RawBranch {
    const line = this.line();
    if (!this.isWord("Branch")) throw this.err(`expected 'Branch', got ${describeTok(this.peek())}`);
    this.advance();
    let id: string | undefined;
    let entry: string | undefined;
    let steps: RawStep[] | undefined;
    this.fields("Branch", key => {
      if (key === "id") id = this.word();
      else if (key === "entry") entry = this.word();
      else if (key === "steps") steps = this.steps();
      else throw this.err(`unknown Branch field '${key}'`);
    });
    return {
      id: this.required(id, "Branch", "id", line),
      entry: this.required(entry, "Branch", "entry", line),
      steps: this.required(steps, "Branch", "steps", line),
      line,
    };
  }

  private join(): RawJoin {
    const line = this.line();
    if (!this.isWord("JoinPolicy")) throw this.err(`expected 'JoinPolicy', got ${describeTok(this.peek())}`);
    this.advance();
    const join: RawJoin = { line };
    this.fields("JoinPolicy", key => {
      if (key === "on_all_success") join.onAllSuccess = this.target();
      else if (key === "on_any_failure") join.onAnyFailure = this.handler();
      else if (key === "on_all_complete") join.onAllComplete = this.target();
      else throw this.err(`unknown JoinPolicy field '${key}'`);
    });
    return join;
  }

  private target(): RawTarget {
    const line = this.line();
    if (this.isWord("Terminal") && this.isPunct("(", 1)) {
      return { tag: "Terminal", outcome: this.terminalOutcome(), line };
    }
    return { tag: "Step", id: this.word(), line };
  }

  /** `Terminal(x)` or `Terminal(outcome: x)`; returns x. */
  private terminalOutcome(): string {
    if (!this.isWord("Terminal")) throw this.err(`expected 'Terminal', got ${describeTok(this.peek())}`);
    this.advance();
    this.expect("(");
    if (this.isWord("outcome") && this.isPunct(":", 1)) {
      this.advance();
      this.advance();
    }
    const outcome = this.word();
    this.expect(")");
    return outcome;
  }

  private handler(): RawHandler {
    const line = this.line();
    const kind = this.word();
    switch (kind) {
      case "Terminate": {
        let outcome: string | undefined;
        if (this.isPunct("(") && this.peek(1).tag === "Word" && this.isPunct(")", 2)) {
          this.advance();
          outcome = this.word();
          this.advance();
        } else {
          this.namedArgs(kind, key => {
            if (key !== "outcome") throw this.err(`unknown Terminate argument '${key}'`);
            outcome = this.word();
          });
        }
        return { tag: "Terminate", outcome: this.required(outcome, kind, "outcome", line), line };
      }
      case "Compensate": {
        let steps: RawCompStep[] | undefined;
        let then: string | undefined;
        this.namedArgs(kind, key => {
          if (key === "steps") steps = this.list(() => this.compStep());
          else if (key === "then") then = this.terminalOutcome();
          else throw this.err(`unknown Compensate argument '${key}'`);
        });
        return {
          tag: "Compensate",
          steps: this.required(steps, kind, "steps", line),
          then: this.required(then, kind, "then", line),
          line,
        };
      }
      case "Escalate": {
        let toPersona: string | undefined;
        let next: string | undefined;
        this.namedArgs(kind, key => {
          if (key === "to" || key === "to_persona") toPersona = this.word();
          else if (key === "next") next = this.word();
          else throw this.err(`unknown Escalate argument '${key}'`);
        });
        return {
          tag: "Escalate",
          toPersona: this.required(toPersona, kind, "to", line),
          next: this.required(next, kind, "next", line),
          line,
        };
      }
      default:
        throw this.err(`unknown failure handler '${kind}'`, line);
    }
  }

  private compStep(): RawCompStep {
    const line = this.line();
    let op: string | undefined;
    let persona: string | undefined;
    let onFailure: string | undefined;
    this.fields("compensation step", key => {
      if (key === "op") op = this.word();
      else if (key === "persona") persona = this.word();
      else if (key === "on_failure") onFailure = this.terminalOutcome();
      else throw this.err(`unknown compensation step field '${key}'`);
    });
    return {
      op: this.required(op, "compensation step", "op", line),
      persona: this.required(persona, "compensation step", "persona", line),
      onFailure: this.required(onFailure, "compensation step", "on_failure", line),
      line,
    };
  }

  // =========================================================================
  // Types
  // =========================================================================

  private type(): RawType {
    const line = this.line();
    const name = this.word();

    switch (name) {
      case "Bool":
      case "Date":
      case "DateTime":
        return { tag: name, line };

      case "Int": {
        const t: RawIntType = { tag: "Int", line };
        if (!this.isPunct("(")) return t;
        if (this.peek(1).tag === "Int") {
          this.expect("(");
          t.min = this.int();
          this.expect(",");
          t.max = this.int();
          this.expect(")");
          return t;
        }
        this.namedArgs(name, key => {
          if (key === "min") t.min = this.int();
          else if (key === "max") t.max = this.int();
          else throw this.err(`unknown Int argument '${key}'`);
        });
        return t;
      }

      case "Decimal": {
        let precision: number | undefined;
        let scale: number | undefined;
        if (this.isPunct("(") && this.peek(1).tag === "Int") {
          this.expect("(");
          precision = this.int();
          this.expect(",");
          scale = this.int();
          this.expect(")");
        } else {
          this.namedArgs(name, key => {
            if (key === "precision") precision = this.int();
            else if (key === "scale") scale = this.int();
            else throw this.err(`unknown Decimal argument '${key}'`);
          });
        }
        return {
          tag: "Decimal",
          precision: this.required(precision, name, "precision", line),
          scale: this.required(scale, name, "scale", line),
          line,
        };
      }

      case "Text": {
        const t: RawTextType = { tag: "Text", line };
        if (!this.isPunct("(")) return t;
        if (this.peek(1).tag === "Int") {
          this.expect("(");
          t.max_length = this.int();
          this.expect(")");
          return t;
        }
        this.namedArgs(name, key => {
          if (key !== "max_length") throw this.err(`unknown Text argument '${key}'`);
          t.max_length = this.int();
        });
        return t;
      }

      case "Money": {
        let currency: string | undefined;
        this.namedArgs(name, key => {
          if (key !== "currency") throw this.err(`unknown Money argument '${key}'`);
          currency = this.wordOrStr();
        });
        return { tag: "Money", currency: this.required(currency, name, "currency", line), line };
      }

      case "Duration": {
        let unit: DurationUnit | undefined;
        let min: number | undefined;
        let max: number | undefined;
        this.namedArgs(name, key => {
          if (key === "unit") {
            const u = this.wordOrStr();
            if (!isDurationUnit(u)) throw this.err(`unknown Duration unit '${u}'`);
            unit = u;
          } else if (key === "min") min = this.int();
          else if (key === "max") max = this.int();
          else throw this.err(`unknown Duration argument '${key}'`);
        });
        return { tag: "Duration", unit: this.required(unit, name, "unit", line), min, max, line };
      }

      case "Enum": {
        let values: string[] | undefined;
        this.namedArgs(name, key => {
          if (key !== "values") throw this.err(`unknown Enum argument '${key}'`);
          values = this.list(() => this.wordOrStr());
        });
        return { tag: "Enum", values: this.required(values, name, "values", line), line };
      }

      case "List": {
        let element: RawType | undefined;
        let max: number | undefined;
        this.namedArgs(name, key => {
          if (key === "element_type") element = this.type();
          else if (key === "max") max = this.int();
          else throw this.err(`unknown List argument '${key}'`);
        });
        return {
          tag: "List",
          element: this.required(element, name, "element_type", line),
          max: this.required(max, name, "max", line),
          line,
        };
      }

      case "Record": {
        if (this.isPunct("{")) return { tag: "Record", fields: this.fieldTypes("Record"), line };
        let fields: RawField[] | undefined;
        this.namedArgs(name, key => {
          if (key !== "fields") throw this.err(`unknown Record argument '${key}'`);
          fields = this.fieldTypes("Record");
        });
        return { tag: "Record", fields: this.required(fields, name, "fields", line), line };
      }

      case "TaggedUnion":
        return { tag: "TaggedUnion", variants: this.fieldTypes("TaggedUnion"), line };

      default:
        return { tag: "Named", name, line };
    }
  }

  private fieldTypes(owner: string): RawField[] {
    const out: RawField[] = [];
    this.fields(owner, (name, line) => {
      out.push({ name, type: this.type(), line });
    });
    return out;
  }

  // =========================================================================
  // Expressions
  // =========================================================================

  private expr(): RawExpr {
    let left = this.conj();
    while (this.isPunct("or")) {
      const line = this.advance().line;
      left = { tag: "Or", left, right: this.conj(), line };
    }
    return left;
  }

  private conj(): RawExpr {
    let left = this.unary();
    while (this.isPunct("and")) {
      const line = this.advance().line;
      left = { tag: "And", left, right: this.unary(), line };
    }
    return left;
  }

  private unary(): RawExpr {
    if (this.isPunct("not")) {
      const line = this.advance().line;
      return { tag: "Not", operand: this.unary(), line };
    }
    return this.atom();
  }

  private atom(): RawExpr {
    const line = this.line();
    const quantifier = this.quantifierWord();
    if (quantifier) return this.quantifier(quantifier, line);

    const left = this.sum();
    const t = this.peek();
    if (t.tag === "Punct" && isCompareOp(t.p)) {
      this.advance();
      return { tag: "Compare", op: t.p, left, right: this.sum(), line };
    }
    return left;
  }

  private quantifierWord(): "forall" | "exists" | undefined {
    if (this.isPunct("forall")) return "forall";
    if (this.isPunct("exists")) return "exists";
    // word forms need the `v in` lookahead so facts may still be named forall/exists
    if (this.peek(1).tag === "Word" && (this.isPunct("in", 2) || this.isWord("in", 2))) {
      if (this.isWord("forall")) return "forall";
      if (this.isWord("exists")) return "exists";
    }
    return undefined;
  }

  private quantifier(quantifier: "forall" | "exists", line: number): RawExpr {
    this.advance();
    const variable = this.word();
    if (!this.accept("in")) {
      if (!this.isWord("in")) throw this.err("expected ∈ after quantifier variable");
      this.advance();
    }
    const domainLine = this.line();
    const base = this.word();
    let domain: RawDomain = { tag: "Ref", name: base, line: domainLine };
    // `base.field . body` unless the word after the dot is the variable itself
    if (
      this.isPunct(".") &&
      this.peek(1).tag === "Word" &&
      !this.isWord(variable, 1) &&
      this.isPunct(".", 2)
    ) {
      this.advance();
      domain = { tag: "Field", base, field: this.word(), line: domainLine };
    }
    if (!this.accept(".")) throw this.err("expected '.' after quantifier domain");
    const body = this.expr();
    return { tag: "Quantifier", quantifier, variable, domain, body, line };
  }

  private sum(): RawExpr {
    let left = this.product();
    while (this.isPunct("+") || this.isPunct("-")) {
      const t = this.advance();
      const op = t.tag === "Punct" && t.p === "+" ? "+" : "-";
      left = { tag: "Arith", op, left, right: this.product(), line: t.line };
    }
    return left;
  }

  private product(): RawExpr {
    let left = this.primary();
    while (this.isPunct("*")) {
      const line = this.advance().line;
      left = { tag: "Arith", op: "*", left, right: this.primary(), line };
    }
    return left;
  }

  private primary(): RawExpr {
    const t = this.peek();
    const line = t.line;

    if (t.tag === "Punct" && t.p === "(") {
      this.advance();
      const inner = this.expr();
      this.expect(")");
      return inner;
    }

    if (t.tag === "Word" && t.s === "verdict_present") {
      this.advance();
      this.expect("(");
      const id = this.word();
      this.expect(")");
      return { tag: "VerdictPresent", id, line };
    }

    if (t.tag === "Word" && t.s !== "true" && t.s !== "false" && t.s !== "Money") {
      this.advance();
      if (this.isPunct(".") && this.peek(1).tag === "Word") {
        this.advance();
        return { tag: "Field", base: t.s, field: this.word(), line };
      }
      return { tag: "Ref", name: t.s, line };
    }

    return this.literal();
  }

  private literal(): RawLiteral {
    const t = this.peek();
    const line = t.line;
    switch (t.tag) {
      case "Int":
        this.advance();
        return { tag: "Int", value: t.n, line };
      case "Dec":
        this.advance();
        return { tag: "Dec", text: t.s, line };
      case "Str":
        this.advance();
        return { tag: "Str", value: t.s, line };
      case "Word":
        if (t.s === "true" || t.s === "false") {
          this.advance();
          return { tag: "Bool", value: t.s === "true", line };
        }
        if (t.s === "Money") return this.money();
        // bare words stand for enum members in defaults
        this.advance();
        return { tag: "Str", value: t.s, line };
      default:
        throw this.err(`expected a value, got ${describeTok(t)}`);
    }
  }

  private money(): RawLiteral {
    const line = this.line();
    this.advance();
    let amount: string | undefined;
    let currency: string | undefined;
    this.fields("Money", key => {
      if (key === "amount") {
        const t = this.peek();
        if (t.tag === "Int") amount = String(this.int());
        else if (t.tag === "Dec") { this.advance(); amount = t.s; }
        else amount = this.str();
      } else if (key === "currency") {
        currency = this.wordOrStr();
      } else {
        throw this.err(`unknown Money key '${key}'`);
      }
    });
    return {
      tag: "Money",
      amount: this.required(amount, "Money", "amount", line),
      currency: this.required(currency, "Money", "currency", line),
      line,
    };
  }
}
