import type { RawOf } from "../../syntax/ast";
import { elabError, siteOf } from "../errors";
import { findCycle } from "../graph";
import type { ConstructIndex } from "../indexer";

const PASS = 5;

export function validateEntity(entity: RawOf<"Entity">): void {
  const states = new Set<string>();
  for (const state of entity.states) {
    if (states.has(state)) {
      throw elabError(PASS, siteOf(entity, entity.lines.states), "states", `duplicate state '${state}'`);
    }
    states.add(state);
  }
  const listed = `[${entity.states.join(", ")}]`;

  if (!states.has(entity.initial)) {
    throw elabError(
      PASS,
      siteOf(entity, entity.lines.initial),
      "initial",
      `initial state '${entity.initial}' is not declared in states: ${listed}`
    );
  }

  for (const t of entity.transitions) {
    for (const endpoint of [t.from, t.to]) {
      if (!states.has(endpoint)) {
        throw elabError(
          PASS,
          siteOf(entity, t.line),
          "transitions",
          `transition endpoint '${endpoint}' is not declared in states: ${listed}`
        );
      }
    }
  }
}

/** Parents must exist and the parent relation must be acyclic. */
export function validateEntityHierarchy(index: ConstructIndex): void {
  const entities = [...index.entities.values()];
  for (const entity of entities) {
    if (entity.parent !== undefined && !index.entities.has(entity.parent)) {
      throw elabError(
        PASS,
        siteOf(entity, entity.lines.parent),
        "parent",
        `parent entity '${entity.parent}' is not declared`
      );
    }
  }

  const ids = entities.map(e => e.id).sort();
  const cycle = findCycle(ids, id => {
    const parent = index.entities.get(id)?.parent;
    return parent === undefined ? [] : [parent];
  });
  if (!cycle) return;

  const at = index.entities.get(cycle[cycle.length - 2]);
  if (!at) return;
  throw elabError(
    PASS,
    siteOf(at, at.lines.parent),
    "parent",
    `entity hierarchy cycle detected: ${cycle.join(" → ")}`
  );
}
