import { compareBytes } from "../interchange/order";

// =========================================================================
// Graph utilities shared by the import, alias, hierarchy and flow checks
// =========================================================================

/** Outgoing edges of a node. Unknown targets are ignored by both walks. */
export type EdgeFn = (node: string) => readonly string[];

/**
 * Depth-first search for a cycle. Nodes are visited in the order given.
 * Returns the closed path (`[a, b, a]`) of the first cycle found.
 */
export function findCycle(nodes: readonly string[], edges: EdgeFn): string[] | undefined {
  const known = new Set(nodes);
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (node: string): string[] | undefined => {
    if (onStack.has(node)) {
      return [...stack.slice(stack.indexOf(node)), node];
    }
    if (done.has(node)) return undefined;

    stack.push(node);
    onStack.add(node);
    for (const next of edges(node)) {
      if (!known.has(next)) continue;
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    stack.pop();
    onStack.delete(node);
    done.add(node);
    return undefined;
  };

  for (const node of nodes) {
    const cycle = visit(node);
    if (cycle) return cycle;
  }
  return undefined;
}

export interface TopoResult {
  /** Nodes in dependency order; ties broken by byte order of the id. */
  ordered: string[];
  /** Nodes left with incoming edges, i.e. on or behind a cycle. Sorted. */
  blocked: string[];
}

/**
 * Kahn's algorithm over `nodes`, edges pointing from a node to its successors.
 */
export function topoSort(nodes: readonly string[], edges: EdgeFn): TopoResult {
  const indegree = new Map<string, number>();
  for (const node of nodes) indegree.set(node, 0);

  for (const node of nodes) {
    for (const target of edges(node)) {
      const current = indegree.get(target);
      if (current !== undefined) indegree.set(target, current + 1);
    }
  }

  const ready = nodes.filter(n => indegree.get(n) === 0).sort(compareBytes);
  const ordered: string[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) break;
    ordered.push(next);

    for (const target of edges(next)) {
      const current = indegree.get(target);
      if (current === undefined) continue;
      indegree.set(target, current - 1);
      if (current - 1 === 0) {
        ready.push(target);
        ready.sort(compareBytes);
      }
    }
  }

  const seen = new Set(ordered);
  const blocked = nodes.filter(n => !seen.has(n)).sort(compareBytes);
  return { ordered, blocked };
}
