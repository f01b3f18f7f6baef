import type { RuleConstruct } from "../interchange/bundle";
import { nullTraceSink, type TraceSink } from "../ports/trace";
import type { FactSet } from "./assemble";
import { evalCondition, evalExpr } from "./predicate";
import { ProvenanceCollector } from "./provenance";
import { VerdictSet, type VerdictInstance } from "./verdicts";

// =========================================================================
// Stratified rule evaluation
// =========================================================================

function strata(rules: readonly RuleConstruct[]): Map<number, RuleConstruct[]> {
  const byStratum = new Map<number, RuleConstruct[]>();
  for (const rule of rules) {
    const layer = byStratum.get(rule.stratum);
    if (layer) layer.push(rule);
    else byStratum.set(rule.stratum, [rule]);
  }
  return byStratum;
}

function fire(rule: RuleConstruct, facts: FactSet, verdicts: VerdictSet): VerdictInstance | undefined {
  const collector = new ProvenanceCollector();
  const ctx = { facts, verdicts };
  if (!evalCondition(rule.body.when, ctx, collector)) return undefined;

  const payload = evalExpr(rule.body.produce.payload.value, ctx, collector);
  return {
    type: rule.body.produce.verdict_type,
    payload,
    provenance: { rule_id: rule.id, stratum: rule.stratum, ...collector.usage() },
  };
}

/**
 * One forward fold over strata 0..max. Every rule of stratum N sees the
 * verdicts of strata below N and nothing else; the verdicts it produces are
 * added once the whole stratum has been evaluated.
 */
export function evalStrata(rules: readonly RuleConstruct[], facts: FactSet, trace: TraceSink = nullTraceSink): VerdictSet {
  const layers = strata(rules);
  const levels = [...layers.keys()].sort((a, b) => a - b);

  let verdicts = VerdictSet.EMPTY;
  for (const level of levels) {
    const produced: VerdictInstance[] = [];
    for (const rule of layers.get(level) ?? []) {
      const verdict = fire(rule, facts, verdicts);
      if (!verdict) continue;
      produced.push(verdict);
      trace.emit({ tag: "E_VerdictProduced", verdictType: verdict.type, ruleId: rule.id, stratum: level });
    }
    verdicts = verdicts.with(produced);
  }
  return verdicts;
}
