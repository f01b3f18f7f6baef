import type { JsonValue, Value } from "./values";
import { valueToJson } from "./values";

export interface VerdictProvenance {
  rule_id: string;
  stratum: number;
  facts_used: string[];
  verdicts_used: string[];
}

export interface VerdictInstance {
  readonly type: string;
  readonly payload: Value;
  readonly provenance: VerdictProvenance;
}

export interface VerdictJson {
  type: string;
  payload: JsonValue;
  provenance: VerdictProvenance;
}

/**
 * Verdicts in production order. Persistent: `with` returns a new set and
 * leaves the receiver untouched.
 */
export class VerdictSet {
  static readonly EMPTY = new VerdictSet([]);

  private readonly byType: ReadonlyMap<string, VerdictInstance>;

  private constructor(readonly items: readonly VerdictInstance[]) {
    this.byType = new Map(items.map((v): [string, VerdictInstance] => [v.type, v]));
  }

  get size(): number {
    return this.items.length;
  }

  has(type: string): boolean {
    return this.byType.has(type);
  }

  get(type: string): VerdictInstance | undefined {
    return this.byType.get(type);
  }

  with(produced: readonly VerdictInstance[]): VerdictSet {
    return produced.length === 0 ? this : new VerdictSet([...this.items, ...produced]);
  }

  toJSON(): VerdictJson[] {
    return this.items.map(v => ({ type: v.type, payload: valueToJson(v.payload), provenance: v.provenance }));
  }
}
