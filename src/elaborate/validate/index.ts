import type { ConstructIndex } from "../indexer";
import { validateEntity, validateEntityHierarchy } from "./entity";
import { validateFlow, validateFlowReferences, validateParallelBranches } from "./flow";
import { validateOperation } from "./operation";
import { collectProducers, validateRule } from "./rule";
import { validateSource } from "./source";

// =========================================================================
// Pass 5: structural validation. Never mutates; the first violation throws.
// =========================================================================

export function validate(index: ConstructIndex): void {
  const producers = collectProducers(index);

  for (const c of index.all) {
    switch (c.tag) {
      case "Entity": validateEntity(c); break;
      case "Rule": validateRule(c, producers); break;
      case "Operation": validateOperation(c, index, producers); break;
      case "Flow": validateFlow(c, index, producers); break;
      case "Source": validateSource(c); break;
      case "Persona":
      case "TypeDecl":
      case "Fact":
        break;
    }
  }

  validateEntityHierarchy(index);
  validateFlowReferences(index);
  validateParallelBranches(index);
}
