import type { RawExpr, RawOf } from "../../syntax/ast";
import { elabError, siteOf, type ErrorSite } from "../errors";
import type { ConstructIndex } from "../indexer";
import { verdictRefs } from "./verdicts";

const PASS = 5;

/** Verdict type to the one rule that produces it. */
export type Producers = ReadonlyMap<string, RawOf<"Rule">>;

export function collectProducers(index: ConstructIndex): Producers {
  const producers = new Map<string, RawOf<"Rule">>();
  for (const rule of index.rules.values()) {
    const first = producers.get(rule.verdictType);
    if (first) {
      throw elabError(
        PASS,
        siteOf(rule, rule.lines.produce),
        "produce",
        `VerdictType '${rule.verdictType}' is already produced by rule '${first.id}'. Each VerdictType may be produced by at most one rule.`
      );
    }
    producers.set(rule.verdictType, rule);
  }
  return producers;
}

export function validateRule(rule: RawOf<"Rule">, producers: Producers): void {
  if (!Number.isInteger(rule.stratum) || rule.stratum < 0) {
    throw elabError(
      PASS,
      siteOf(rule, rule.lines.stratum),
      "stratum",
      `stratum must be a non-negative integer; got ${rule.stratum}`
    );
  }

  const check = (e: RawExpr, field: string) => {
    for (const ref of verdictRefs(e)) {
      const producer = requireProducer(ref.id, producers, siteOf(rule, ref.line), field);
      if (producer.stratum >= rule.stratum) {
        throw elabError(
          PASS,
          siteOf(rule, ref.line),
          field,
          `stratum violation: rule '${rule.id}' at stratum ${rule.stratum} references verdict '${ref.id}' produced by rule '${producer.id}' at stratum ${producer.stratum}; verdict_refs must reference strata strictly less than the referencing rule's stratum`
        );
      }
    }
  };
  check(rule.when, "body.when");
  check(rule.payloadValue, "body.produce.payload");
}

/** Verdict references outside rules only need a producer. */
export function validateVerdictRefs(e: RawExpr, producers: Producers, site: ErrorSite, field: string): void {
  for (const ref of verdictRefs(e)) {
    requireProducer(ref.id, producers, { ...site, line: ref.line }, field);
  }
}

function requireProducer(id: string, producers: Producers, site: ErrorSite, field: string): RawOf<"Rule"> {
  const producer = producers.get(id);
  if (!producer) {
    throw elabError(
      PASS,
      site,
      field,
      `unresolved VerdictType reference: '${id}' is not produced by any rule in this contract`
    );
  }
  return producer;
}
