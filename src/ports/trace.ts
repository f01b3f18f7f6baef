/**
 * Trace events emitted by the elaborator and evaluator.
 */
export type TraceEvent =
  | { tag: "E_PassCompleted"; pass: number; name: string; durationMs: number }
  | { tag: "E_FactsAssembled"; count: number; defaulted: string[] }
  | { tag: "E_VerdictProduced"; verdictType: string; ruleId: string; stratum: number }
  | { tag: "E_OperationExecuted"; operationId: string; persona: string; outcome: string; effects: number }
  | { tag: "E_OperationRejected"; operationId: string; persona: string; reason: string }
  | { tag: "E_FlowStep"; flowId: string; stepId: string; stepType: string; result: string }
  | { tag: "E_FlowCompleted"; flowId: string; outcome: string; status: string; steps: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullTraceSink: TraceSink = {
  emit(): void {
    /* discard */
  },
};
