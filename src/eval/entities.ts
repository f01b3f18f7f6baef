import type { EntityConstruct } from "../interchange/bundle";
import { compareBytes } from "../interchange/order";

export const DEFAULT_INSTANCE = "_default";

/** Entity id → instance id for the entities an operation touches. */
export type InstanceBindings = ReadonlyMap<string, string>;

export function instanceFor(bindings: InstanceBindings | undefined, entityId: string): string {
  return bindings?.get(entityId) ?? DEFAULT_INSTANCE;
}

export interface EntityStateEntry {
  entity_id: string;
  instance_id: string;
  state: string;
}

/**
 * Live entity state keyed by (entity id, instance id). The only mutable
 * structure in evaluation; owned by one operation or flow run at a time.
 */
export class EntityStates {
  private readonly states: Map<string, Map<string, string>>;

  constructor(entries: Iterable<EntityStateEntry> = []) {
    this.states = new Map();
    for (const e of entries) this.set(e.entity_id, e.instance_id, e.state);
  }

  /** Every entity in its initial state under the default instance. */
  static initial(entities: readonly EntityConstruct[]): EntityStates {
    return new EntityStates(entities.map(e => ({ entity_id: e.id, instance_id: DEFAULT_INSTANCE, state: e.initial })));
  }

  get(entityId: string, instanceId: string = DEFAULT_INSTANCE): string | undefined {
    return this.states.get(entityId)?.get(instanceId);
  }

  set(entityId: string, instanceId: string, state: string): void {
    let instances = this.states.get(entityId);
    if (!instances) {
      instances = new Map();
      this.states.set(entityId, instances);
    }
    instances.set(instanceId, state);
  }

  clone(): EntityStates {
    return new EntityStates(this.entries());
  }

  /** Sorted by entity id, then instance id. */
  entries(): EntityStateEntry[] {
    const out: EntityStateEntry[] = [];
    const byKey = <T>(a: [string, T], b: [string, T]) => compareBytes(a[0], b[0]);
    for (const [entityId, instances] of [...this.states].sort(byKey)) {
      for (const [instanceId, state] of [...instances].sort(byKey)) {
        out.push({ entity_id: entityId, instance_id: instanceId, state });
      }
    }
    return out;
  }

  toJSON(): EntityStateEntry[] {
    return this.entries();
  }
}
