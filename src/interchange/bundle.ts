import type { Provenance } from "./meta";

// =========================================================================
// Bundle
// =========================================================================

export interface Bundle {
  constructs: Construct[];
  covenant: string;
  covenant_version: string;
  id: string;
  kind: "Bundle";
}

export type Construct =
  | PersonaConstruct
  | SourceConstruct
  | FactConstruct
  | EntityConstruct
  | RuleConstruct
  | OperationConstruct
  | FlowConstruct;

export type ConstructKind = Construct["kind"];

// =========================================================================
// Types
// =========================================================================

export type DurationUnit = "seconds" | "minutes" | "hours" | "days";

export const DURATION_UNITS: readonly DurationUnit[] = ["seconds", "minutes", "hours", "days"];

export type TypeSpec =
  | BoolType
  | IntType
  | DecimalType
  | TextType
  | EnumType
  | DateType
  | DateTimeType
  | MoneyType
  | DurationType
  | RecordType
  | ListType
  | TaggedUnionType;

export interface BoolType { base: "Bool" }
export interface DateType { base: "Date" }
export interface DateTimeType { base: "DateTime" }

export interface IntType {
  base: "Int";
  min?: number;
  max?: number;
}

export interface DecimalType {
  base: "Decimal";
  precision: number;
  scale: number;
}

export interface TextType {
  base: "Text";
  max_length?: number;
}

export interface EnumType {
  base: "Enum";
  values: string[];
}

export interface MoneyType {
  base: "Money";
  currency: string;
}

export interface DurationType {
  base: "Duration";
  unit: DurationUnit;
  min?: number;
  max?: number;
}

export interface RecordType {
  base: "Record";
  fields: Record<string, TypeSpec>;
}

export interface ListType {
  base: "List";
  element_type: TypeSpec;
  max: number;
}

export interface TaggedUnionType {
  base: "TaggedUnion";
  variants: Record<string, TypeSpec>;
}

// =========================================================================
// Typed literal values
// =========================================================================

export interface DecimalValue {
  kind: "decimal_value";
  precision: number;
  scale: number;
  value: string;
}

export interface MoneyValue {
  amount: DecimalValue;
  currency: string;
  kind: "money_value";
}

export interface BoolLiteral {
  kind: "bool_literal";
  value: boolean;
}

export interface IntLiteral {
  kind: "int_literal";
  value: number;
}

export interface TextLiteral {
  kind: "text_literal";
  value: string;
}

export type FactDefault = BoolLiteral | IntLiteral | DecimalValue | MoneyValue | TextLiteral;

/** Literal payload inside an expression `{literal, type}` node. */
export type LiteralValue = boolean | number | string | DecimalValue | MoneyValue;

// =========================================================================
// Expressions
// =========================================================================

export type CompareOp = "=" | "!=" | "<" | "<=" | ">" | ">=";
export type ArithOp = "+" | "-" | "*";

export const COMPARE_OPS: readonly CompareOp[] = ["=", "!=", "<", "<=", ">", ">="];

export interface FactRefExpr { fact_ref: string }

export interface FieldRefExpr {
  field_ref: { field: string; var: string };
}

export interface LiteralExpr {
  literal: LiteralValue;
  type: TypeSpec;
}

export interface ArithExpr {
  left: Expr;
  op: ArithOp;
  result_type: TypeSpec;
  right: Expr;
}

export interface CompareExpr {
  comparison_type?: TypeSpec;
  left: Expr;
  op: CompareOp;
  right: Expr;
}

export interface AndExpr {
  left: Expr;
  op: "and";
  right: Expr;
}

export interface OrExpr {
  left: Expr;
  op: "or";
  right: Expr;
}

export interface NotExpr {
  op: "not";
  operand: Expr;
}

export interface VerdictPresentExpr { verdict_present: string }

export interface QuantifierExpr {
  body: Expr;
  domain: FactRefExpr | FieldRefExpr;
  quantifier: "forall" | "exists";
  variable: string;
  variable_type: TypeSpec;
}

export type Expr =
  | FactRefExpr
  | FieldRefExpr
  | LiteralExpr
  | ArithExpr
  | CompareExpr
  | AndExpr
  | OrExpr
  | NotExpr
  | VerdictPresentExpr
  | QuantifierExpr;

// =========================================================================
// Constructs
// =========================================================================

export interface PersonaConstruct {
  id: string;
  kind: "Persona";
  provenance: Provenance;
}

export interface SourceConstruct {
  description?: string;
  fields: Record<string, string>;
  id: string;
  kind: "Source";
  protocol: string;
  provenance: Provenance;
}

export interface FreetextSource {
  field: string;
  system: string;
}

export interface StructuredSource {
  path: string;
  source_id: string;
}

export type FactSource = FreetextSource | StructuredSource;

export interface FactConstruct {
  default?: FactDefault;
  id: string;
  kind: "Fact";
  provenance: Provenance;
  source: FactSource;
  type: TypeSpec;
}

export interface Transition {
  from: string;
  to: string;
}

export interface EntityConstruct {
  id: string;
  initial: string;
  kind: "Entity";
  parent?: string;
  provenance: Provenance;
  states: string[];
  transitions: Transition[];
}

export interface ProduceClause {
  payload: { type: TypeSpec; value: Expr };
  verdict_type: string;
}

export interface RuleConstruct {
  body: { produce: ProduceClause; when: Expr };
  id: string;
  kind: "Rule";
  provenance: Provenance;
  stratum: number;
}

export interface Effect {
  entity_id: string;
  from: string;
  outcome?: string;
  to: string;
}

export interface OperationConstruct {
  allowed_personas: string[];
  effects: Effect[];
  error_contract: string[];
  id: string;
  kind: "Operation";
  outcomes: string[];
  precondition: Expr;
  provenance: Provenance;
}

// =========================================================================
// Flows
// =========================================================================

export interface TerminalTarget {
  kind: "Terminal";
  outcome: string;
}

export type StepTarget = string | TerminalTarget;

export interface CompensationStep {
  on_failure: TerminalTarget;
  op: string;
  persona: string;
}

export interface TerminateHandler {
  kind: "Terminate";
  outcome: string;
}

export interface CompensateHandler {
  kind: "Compensate";
  steps: CompensationStep[];
  then: TerminalTarget;
}

export interface EscalateHandler {
  kind: "Escalate";
  next: string;
  to_persona: string;
}

export type FailureHandler = TerminateHandler | CompensateHandler | EscalateHandler;

export interface OperationStep {
  id: string;
  kind: "OperationStep";
  on_failure: FailureHandler;
  op: string;
  outcomes: Record<string, StepTarget>;
  persona: string;
}

export interface BranchStep {
  condition: Expr;
  id: string;
  if_false: StepTarget;
  if_true: StepTarget;
  kind: "BranchStep";
  persona: string;
}

export interface HandoffStep {
  from_persona: string;
  id: string;
  kind: "HandoffStep";
  next: string;
  to_persona: string;
}

export interface SubFlowStep {
  flow: string;
  id: string;
  kind: "SubFlowStep";
  on_failure: FailureHandler;
  on_success: StepTarget;
  persona: string;
}

export interface ParallelBranch {
  entry: string;
  id: string;
  steps: FlowStep[];
}

/** Routes taken once every branch has ended; `on_all_complete` is the fallback. */
export interface JoinPolicy {
  on_all_complete?: StepTarget;
  on_all_success?: StepTarget;
  on_any_failure?: FailureHandler;
}

export interface ParallelStep {
  branches: ParallelBranch[];
  id: string;
  join: JoinPolicy;
  kind: "ParallelStep";
}

export type FlowStep = OperationStep | BranchStep | HandoffStep | SubFlowStep | ParallelStep;

export interface FlowConstruct {
  entry: string;
  id: string;
  kind: "Flow";
  provenance: Provenance;
  snapshot: "at_initiation";
  steps: FlowStep[];
}

// =========================================================================
// Helpers
// =========================================================================

export function isTerminal(target: StepTarget): target is TerminalTarget {
  return typeof target !== "string";
}

export function constructsOfKind<K extends ConstructKind>(
  bundle: Bundle,
  kind: K
): Extract<Construct, { kind: K }>[] {
  const out: Extract<Construct, { kind: K }>[] = [];
  for (const c of bundle.constructs) {
    if (isKind(c, kind)) out.push(c);
  }
  return out;
}

function isKind<K extends ConstructKind>(c: Construct, kind: K): c is Extract<Construct, { kind: K }> {
  return c.kind === kind;
}
