import type { RawDeclaration, RawOf } from "../syntax/ast";
import { elabError } from "./errors";

// =========================================================================
// Pass 2: construct index keyed by (kind, id)
// =========================================================================

/**
 * Read-only lookup tables over the assembled declarations. Ids are unique
 * within a kind; the same id may name constructs of different kinds.
 */
export interface ConstructIndex {
  readonly all: readonly RawDeclaration[];
  readonly personas: ReadonlyMap<string, RawOf<"Persona">>;
  readonly sources: ReadonlyMap<string, RawOf<"Source">>;
  readonly types: ReadonlyMap<string, RawOf<"TypeDecl">>;
  readonly facts: ReadonlyMap<string, RawOf<"Fact">>;
  readonly entities: ReadonlyMap<string, RawOf<"Entity">>;
  readonly rules: ReadonlyMap<string, RawOf<"Rule">>;
  readonly operations: ReadonlyMap<string, RawOf<"Operation">>;
  readonly flows: ReadonlyMap<string, RawOf<"Flow">>;
}

function insert<T extends RawDeclaration>(table: Map<string, T>, c: T): void {
  const first = table.get(c.id);
  if (first) {
    throw elabError(
      2,
      { kind: c.tag, id: c.id, file: c.file, line: c.line },
      "id",
      `duplicate ${c.tag} id '${c.id}': first declared at line ${first.line}`
    );
  }
  table.set(c.id, c);
}

export function buildIndex(constructs: readonly RawDeclaration[]): ConstructIndex {
  const personas = new Map<string, RawOf<"Persona">>();
  const sources = new Map<string, RawOf<"Source">>();
  const types = new Map<string, RawOf<"TypeDecl">>();
  const facts = new Map<string, RawOf<"Fact">>();
  const entities = new Map<string, RawOf<"Entity">>();
  const rules = new Map<string, RawOf<"Rule">>();
  const operations = new Map<string, RawOf<"Operation">>();
  const flows = new Map<string, RawOf<"Flow">>();

  for (const c of constructs) {
    switch (c.tag) {
      case "Persona": insert(personas, c); break;
      case "Source": insert(sources, c); break;
      case "TypeDecl": insert(types, c); break;
      case "Fact": insert(facts, c); break;
      case "Entity": insert(entities, c); break;
      case "Rule": insert(rules, c); break;
      case "Operation": insert(operations, c); break;
      case "Flow": insert(flows, c); break;
    }
  }

  return { all: constructs, personas, sources, types, facts, entities, rules, operations, flows };
}
