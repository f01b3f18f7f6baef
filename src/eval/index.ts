export {
  computeActionSpace,
  verdictRefs,
  type Action,
  type ActionSpace,
  type BlockedAction,
  type BlockedReason,
  type EntitySummary,
  type InstanceSets,
  type VerdictSummary,
} from "./actionSpace";
export { assembleFacts, parseFactValue, type FactInputs, type FactSet } from "./assemble";
export { contractOf, type Contract } from "./contract";
export { DEFAULT_INSTANCE, EntityStates, instanceFor, type EntityStateEntry, type InstanceBindings } from "./entities";
export {
  EvalException,
  formatEvalError,
  formatOperationError,
  isEvalException,
  type EvalError,
  type EvalErrorTag,
  type OperationError,
} from "./errors";
export {
  evaluate,
  evaluateActionSpace,
  evaluateFlow,
  evaluateOperation,
  type ActionSpaceOptions,
  type EvalResult,
  type EvaluateOptions,
  type FlowEvalOptions,
  type FlowEvalResult,
  type OperationEvalOptions,
  type OperationEvalResult,
} from "./evaluate";
export {
  DEFAULT_MAX_FLOW_STEPS,
  executeFlow,
  takeSnapshot,
  type FlowOptions,
  type FlowResult,
  type FlowStatus,
  type Snapshot,
  type StepRecord,
  type StepType,
} from "./flow";
export {
  executeOperation,
  type EffectRecord,
  type ExecuteOptions,
  type OperationContext,
  type OperationProvenance,
  type OperationResult,
} from "./operation";
export { evalCondition, evalExpr, orderOf, truthy, type EvalContext } from "./predicate";
export { ProvenanceCollector, type UsageRecord } from "./provenance";
export { evalStrata } from "./rules";
export { literalToValue, typeName, valueToJson, VAbsent, VFalse, VTrue, type JsonValue, type Value } from "./values";
export { VerdictSet, type VerdictInstance, type VerdictJson, type VerdictProvenance } from "./verdicts";
