// =========================================================================
// Evaluation errors
// =========================================================================

export type EvalError =
  | { tag: "missing_fact"; factId: string }
  | { tag: "type_mismatch"; factId: string; expected: string; got: string }
  | { tag: "overflow"; message: string }
  | { tag: "invalid_operator"; op: string }
  | { tag: "unknown_fact"; factId: string }
  | { tag: "unknown_verdict"; verdictType: string }
  | { tag: "type_error"; message: string }
  | { tag: "list_overflow"; factId: string; max: number; actual: number }
  | { tag: "invalid_enum"; factId: string; value: string; variants: string[] }
  | { tag: "not_a_record"; message: string }
  | { tag: "unbound_variable"; name: string }
  | { tag: "flow_error"; flowId: string; message: string }
  | { tag: "malformed_bundle"; message: string };

export type EvalErrorTag = EvalError["tag"];

export function formatEvalError(e: EvalError): string {
  switch (e.tag) {
    case "missing_fact":
      return `missing required fact: ${e.factId}`;
    case "type_mismatch":
      return `type mismatch for fact '${e.factId}': expected ${e.expected}, got ${e.got}`;
    case "overflow":
      return `numeric overflow: ${e.message}`;
    case "invalid_operator":
      return `invalid operator: ${e.op}`;
    case "unknown_fact":
      return `unknown fact: ${e.factId}`;
    case "unknown_verdict":
      return `unknown verdict: ${e.verdictType}`;
    case "type_error":
      return `type error: ${e.message}`;
    case "list_overflow":
      return `list fact '${e.factId}' has ${e.actual} elements, max is ${e.max}`;
    case "invalid_enum":
      return `invalid enum value '${e.value}' for fact '${e.factId}', valid: [${e.variants.map(v => `"${v}"`).join(", ")}]`;
    case "not_a_record":
      return `not a record: ${e.message}`;
    case "unbound_variable":
      return `unbound variable: ${e.name}`;
    case "flow_error":
      return `flow error in '${e.flowId}': ${e.message}`;
    case "malformed_bundle":
      return `malformed bundle: ${e.message}`;
  }
}

/**
 * Carries an EvalError out of the recursive evaluators. Converted back to a
 * value at the public API.
 */
export class EvalException extends Error {
  constructor(readonly error: EvalError) {
    super(formatEvalError(error));
    this.name = "EvalException";
  }
}

export function evalFail(error: EvalError): never {
  throw new EvalException(error);
}

export function isEvalException(e: unknown): e is EvalException {
  return e instanceof EvalException;
}

/** For `attempt`: recognise an EvalException, ignore everything else. */
export function recogniseEval(e: unknown): EvalError | undefined {
  return isEvalException(e) ? e.error : undefined;
}

// =========================================================================
// Operation errors
// =========================================================================

/** Routine rejections an operation can produce; flows route on these. */
export type OperationError =
  | { tag: "persona_rejected"; operationId: string; persona: string }
  | { tag: "precondition_failed"; operationId: string; reason: string }
  | { tag: "invalid_entity_state"; entityId: string; instanceId: string; expected: string; actual: string }
  | { tag: "entity_not_found"; entityId: string; instanceId: string }
  | { tag: "evaluation_error"; error: EvalError };

export function formatOperationError(e: OperationError): string {
  switch (e.tag) {
    case "persona_rejected":
      return `persona '${e.persona}' not authorized for operation '${e.operationId}'`;
    case "precondition_failed":
      return `precondition failed for operation '${e.operationId}': ${e.reason}`;
    case "invalid_entity_state":
      return `entity '${e.entityId}' instance '${e.instanceId}' in state '${e.actual}', expected '${e.expected}'`;
    case "entity_not_found":
      return `entity '${e.entityId}' instance '${e.instanceId}' not found in state map`;
    case "evaluation_error":
      return `evaluation error: ${formatEvalError(e.error)}`;
  }
}
