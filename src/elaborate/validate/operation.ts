import type { RawEffect, RawOf } from "../../syntax/ast";
import { elabError, siteOf } from "../errors";
import type { ConstructIndex } from "../indexer";
import { validateVerdictRefs, type Producers } from "./rule";

const PASS = 5;

function effectName(e: RawEffect): string {
  return `(${e.entity}, ${e.from}, ${e.to})`;
}

export function validateOperation(op: RawOf<"Operation">, index: ConstructIndex, producers: Producers): void {
  const outcomesLine = op.lines.outcomes;
  const seen = new Set<string>();
  for (const outcome of op.outcomes) {
    if (seen.has(outcome)) {
      throw elabError(
        PASS,
        siteOf(op, outcomesLine),
        "outcomes",
        `duplicate outcome '${outcome}'; outcome labels must be unique within an Operation`
      );
    }
    seen.add(outcome);
  }
  if (op.outcomes.length === 0) {
    throw elabError(PASS, siteOf(op, outcomesLine), "outcomes", "outcomes must be non-empty; an Operation must declare at least one outcome");
  }

  const personasLine = op.lines.allowed_personas;
  if (op.allowedPersonas.length === 0) {
    throw elabError(
      PASS,
      siteOf(op, personasLine),
      "allowed_personas",
      "allowed_personas must be non-empty; an Operation with no allowed personas can never be invoked"
    );
  }
  for (const persona of op.allowedPersonas) {
    if (!index.personas.has(persona)) {
      throw elabError(PASS, siteOf(op, personasLine), "allowed_personas", `undeclared persona '${persona}' in allowed_personas`);
    }
  }

  validateVerdictRefs(op.precondition, producers, siteOf(op, op.lines.precondition), "precondition");

  for (const effect of op.effects) {
    if (!index.entities.has(effect.entity)) {
      throw elabError(PASS, siteOf(op, effect.line), "effects", `effect references undeclared entity '${effect.entity}'`);
    }
  }

  validateOutcomeMapping(op);

  for (const ec of op.errorContract) {
    if (seen.has(ec)) {
      throw elabError(
        PASS,
        siteOf(op, outcomesLine),
        "outcomes",
        `outcome '${ec}' conflicts with error_contract; outcomes and error_contract must be disjoint`
      );
    }
  }

  for (const effect of op.effects) {
    const entity = index.entities.get(effect.entity);
    if (!entity) continue;
    if (!entity.transitions.some(t => t.from === effect.from && t.to === effect.to)) {
      const declared = entity.transitions.map(t => `(${t.from}, ${t.to})`).join(", ");
      throw elabError(
        PASS,
        siteOf(op, effect.line),
        "effects",
        `effect ${effectName(effect)} is not a declared transition in entity ${entity.id}; declared transitions are: [${declared}]`
      );
    }
  }
}

/**
 * With several outcomes every effect names the outcome it belongs to and
 * every outcome owns at least one effect. A single outcome owns all effects.
 */
function validateOutcomeMapping(op: RawOf<"Operation">): void {
  const declared = `[${op.outcomes.join(", ")}]`;
  const multi = op.outcomes.length >= 2;

  for (const effect of op.effects) {
    if (effect.outcome === undefined) {
      if (!multi) continue;
      throw elabError(
        PASS,
        siteOf(op, effect.line),
        "effects",
        `effect ${effectName(effect)} is missing an outcome label; multi-outcome operations require every effect to specify which outcome it belongs to`
      );
    }
    if (!op.outcomes.includes(effect.outcome)) {
      throw elabError(
        PASS,
        siteOf(op, effect.line),
        "effects",
        `effect ${effectName(effect)} references undeclared outcome '${effect.outcome}'; declared outcomes are: ${declared}`
      );
    }
  }

  if (!multi || op.effects.length === 0) return;
  for (const outcome of op.outcomes) {
    if (!op.effects.some(e => e.outcome === outcome)) {
      throw elabError(
        PASS,
        siteOf(op, op.lines.effects),
        "effects",
        `outcome '${outcome}' has no effects; multi-outcome operations must map every outcome to at least one effect`
      );
    }
  }
}
