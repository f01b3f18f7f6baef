import type {
  Bundle,
  EntityConstruct,
  FactConstruct,
  FlowConstruct,
  OperationConstruct,
  RuleConstruct,
} from "../interchange/bundle";
import { evalFail } from "./errors";

/**
 * Read-only lookup view over a bundle. Arrays keep bundle order, which for
 * rules is stratum then id.
 */
export interface Contract {
  readonly bundleId: string;
  readonly facts: readonly FactConstruct[];
  readonly entities: readonly EntityConstruct[];
  readonly rules: readonly RuleConstruct[];
  readonly operations: ReadonlyMap<string, OperationConstruct>;
  readonly flows: ReadonlyMap<string, FlowConstruct>;
}

export function contractOf(bundle: Bundle): Contract {
  const facts: FactConstruct[] = [];
  const entities: EntityConstruct[] = [];
  const rules: RuleConstruct[] = [];
  const operations = new Map<string, OperationConstruct>();
  const flows = new Map<string, FlowConstruct>();

  for (const c of bundle.constructs) {
    switch (c.kind) {
      case "Fact":
        facts.push(c);
        break;
      case "Entity":
        entities.push(c);
        break;
      case "Rule":
        rules.push(c);
        break;
      case "Operation":
        operations.set(c.id, c);
        break;
      case "Flow":
        flows.set(c.id, c);
        break;
      case "Persona":
      case "Source":
        break;
    }
  }

  return { bundleId: bundle.id, facts, entities, rules, operations, flows };
}

export function operationOf(contract: Contract, id: string): OperationConstruct {
  const op = contract.operations.get(id);
  if (!op) evalFail({ tag: "malformed_bundle", message: `operation '${id}' is not in the bundle` });
  return op;
}

export function flowOf(contract: Contract, id: string): FlowConstruct {
  const flow = contract.flows.get(id);
  if (!flow) evalFail({ tag: "malformed_bundle", message: `flow '${id}' is not in the bundle` });
  return flow;
}
