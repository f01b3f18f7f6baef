// Raw syntax tree produced by the parser. Names are unresolved and types may
// still refer to aliases; every node keeps the line it was read from.

import type { ArithOp, CompareOp, DurationUnit } from "../interchange/bundle";

// =========================================================================
// Types
// =========================================================================

export type RawIntType = { tag: "Int"; min?: number; max?: number; line: number };
export type RawTextType = { tag: "Text"; max_length?: number; line: number };

export type RawType =
  | { tag: "Bool"; line: number }
  | { tag: "Date"; line: number }
  | { tag: "DateTime"; line: number }
  | RawIntType
  | { tag: "Decimal"; precision: number; scale: number; line: number }
  | RawTextType
  | { tag: "Enum"; values: string[]; line: number }
  | { tag: "Money"; currency: string; line: number }
  | { tag: "Duration"; unit: DurationUnit; min?: number; max?: number; line: number }
  | { tag: "Record"; fields: RawField[]; line: number }
  | { tag: "List"; element: RawType; max: number; line: number }
  | { tag: "TaggedUnion"; variants: RawField[]; line: number }
  | { tag: "Named"; name: string; line: number };

export interface RawField {
  name: string;
  type: RawType;
  line: number;
}

// =========================================================================
// Expressions
// =========================================================================

export type RawLiteral =
  | { tag: "Bool"; value: boolean; line: number }
  | { tag: "Int"; value: number; line: number }
  | { tag: "Dec"; text: string; line: number }
  | { tag: "Str"; value: string; line: number }
  | { tag: "Money"; amount: string; currency: string; line: number };

export type RawRef = { tag: "Ref"; name: string; line: number };
export type RawFieldRef = { tag: "Field"; base: string; field: string; line: number };
export type RawDomain = RawRef | RawFieldRef;

export type RawExpr =
  | RawLiteral
  | RawRef
  | RawFieldRef
  | { tag: "Arith"; op: ArithOp; left: RawExpr; right: RawExpr; line: number }
  | { tag: "Compare"; op: CompareOp; left: RawExpr; right: RawExpr; line: number }
  | { tag: "And"; left: RawExpr; right: RawExpr; line: number }
  | { tag: "Or"; left: RawExpr; right: RawExpr; line: number }
  | { tag: "Not"; operand: RawExpr; line: number }
  | { tag: "VerdictPresent"; id: string; line: number }
  | {
      tag: "Quantifier";
      quantifier: "forall" | "exists";
      variable: string;
      domain: RawDomain;
      body: RawExpr;
      line: number;
    };

export function isRawLiteral(e: RawExpr): e is RawLiteral {
  return e.tag === "Bool" || e.tag === "Int" || e.tag === "Dec" || e.tag === "Str" || e.tag === "Money";
}

// =========================================================================
// Flows
// =========================================================================

export type RawTarget =
  | { tag: "Step"; id: string; line: number }
  | { tag: "Terminal"; outcome: string; line: number };

export interface RawCompStep {
  op: string;
  persona: string;
  onFailure: string;
  line: number;
}

export type RawHandler =
  | { tag: "Terminate"; outcome: string; line: number }
  | { tag: "Compensate"; steps: RawCompStep[]; then: string; line: number }
  | { tag: "Escalate"; toPersona: string; next: string; line: number };

export type RawStep =
  | {
      tag: "OperationStep";
      id: string;
      op: string;
      persona: string;
      outcomes: { label: string; target: RawTarget }[];
      onFailure?: RawHandler;
      line: number;
    }
  | {
      tag: "BranchStep";
      id: string;
      condition: RawExpr;
      persona: string;
      ifTrue: RawTarget;
      ifFalse: RawTarget;
      line: number;
    }
  | { tag: "HandoffStep"; id: string; fromPersona: string; toPersona: string; next: string; line: number }
  | {
      tag: "SubFlowStep";
      id: string;
      flow: string;
      persona: string;
      onSuccess: RawTarget;
      onFailure?: RawHandler;
      line: number;
    }
  | { tag: "ParallelStep"; id: string; branches: RawBranch[]; join: RawJoin; line: number };

export interface RawBranch {
  id: string;
  entry: string;
  steps: RawStep[];
  line: number;
}

export interface RawJoin {
  onAllSuccess?: RawTarget;
  onAnyFailure?: RawHandler;
  onAllComplete?: RawTarget;
  line: number;
}

// =========================================================================
// Constructs
// =========================================================================

/** Line of each field keyword inside a construct body. */
export type FieldLines = Record<string, number>;

export type RawFactSource =
  | { tag: "Freetext"; text: string }
  | { tag: "Structured"; sourceId: string; path: string };

export interface RawEffect {
  entity: string;
  from: string;
  to: string;
  outcome?: string;
  line: number;
}

export type RawConstruct =
  | { tag: "Import"; path: string; file: string; line: number }
  | { tag: "Persona"; id: string; file: string; line: number }
  | {
      tag: "Source";
      id: string;
      protocol: string;
      description?: string;
      fields: [string, string][];
      file: string;
      line: number;
    }
  | { tag: "TypeDecl"; id: string; type: RawType; file: string; line: number }
  | {
      tag: "Fact";
      id: string;
      type: RawType;
      source: RawFactSource;
      default?: RawLiteral;
      lines: FieldLines;
      file: string;
      line: number;
    }
  | {
      tag: "Entity";
      id: string;
      states: string[];
      initial: string;
      transitions: { from: string; to: string; line: number }[];
      parent?: string;
      lines: FieldLines;
      file: string;
      line: number;
    }
  | {
      tag: "Rule";
      id: string;
      stratum: number;
      when: RawExpr;
      verdictType: string;
      payloadType: RawType;
      payloadValue: RawExpr;
      lines: FieldLines;
      file: string;
      line: number;
    }
  | {
      tag: "Operation";
      id: string;
      allowedPersonas: string[];
      precondition: RawExpr;
      effects: RawEffect[];
      errorContract: string[];
      outcomes: string[];
      lines: FieldLines;
      file: string;
      line: number;
    }
  | {
      tag: "Flow";
      id: string;
      entry: string;
      steps: RawStep[];
      lines: FieldLines;
      file: string;
      line: number;
    };

export type RawConstructTag = RawConstruct["tag"];

export type RawOf<T extends RawConstructTag> = Extract<RawConstruct, { tag: T }>;

/** Constructs that carry an id (everything but imports). */
export type RawDeclaration = Exclude<RawConstruct, { tag: "Import" }>;
