/** Facts and verdicts read while evaluating one rule or precondition. */
export interface UsageRecord {
  facts_used: string[];
  verdicts_used: string[];
}

/** Collects references in first-use order, without repeats. */
export class ProvenanceCollector {
  private readonly facts: string[] = [];
  private readonly verdicts: string[] = [];

  recordFact(id: string): void {
    if (!this.facts.includes(id)) this.facts.push(id);
  }

  recordVerdict(type: string): void {
    if (!this.verdicts.includes(type)) this.verdicts.push(type);
  }

  usage(): UsageRecord {
    return { facts_used: [...this.facts], verdicts_used: [...this.verdicts] };
  }
}
