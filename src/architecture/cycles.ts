import type { ModuleId } from '../contracts/types.js';
import type { DependencyEdge } from './validator.js';

type Adjacency = Map<ModuleId, Set<ModuleId>>;

function successors(graph: Adjacency, module: ModuleId): Iterator<ModuleId> {
  return (graph.get(module) ?? new Set<ModuleId>()).values();
}

/**
 * Groups of modules that reach each other through dependencies: the
 * strongly connected components with more than one member (Kosaraju, with
 * explicit stacks). Self-dependencies are not cycles.
 *
 * Members are listed in the order they first appear in `edges`, and cycles
 * by their first member.
 */
export function findDependencyCycles(edges: readonly DependencyEdge[]): ModuleId[][] {
  const rank = new Map<ModuleId, number>();
  const forward: Adjacency = new Map();
  const backward: Adjacency = new Map();

  for (const [source, target] of edges) {
    for (const module of [source, target]) {
      if (rank.has(module)) continue;
      rank.set(module, rank.size);
      forward.set(module, new Set());
      backward.set(module, new Set());
    }
    if (source === target) continue;
    forward.get(source)?.add(target);
    backward.get(target)?.add(source);
  }

  const finished: ModuleId[] = [];
  const visited = new Set<ModuleId>();
  for (const start of rank.keys()) {
    if (visited.has(start)) continue;
    visited.add(start);

    const stack: Array<[ModuleId, Iterator<ModuleId>]> = [[start, successors(forward, start)]];
    while (stack.length > 0) {
      const [module, pending] = stack[stack.length - 1];
      const next = pending.next();
      if (next.done) {
        stack.pop();
        finished.push(module);
      } else if (!visited.has(next.value)) {
        visited.add(next.value);
        stack.push([next.value, successors(forward, next.value)]);
      }
    }
  }

  const byRank = (a: ModuleId, b: ModuleId) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0);
  const assigned = new Set<ModuleId>();
  const cycles: ModuleId[][] = [];

  for (const root of finished.reverse()) {
    if (assigned.has(root)) continue;
    assigned.add(root);

    const component = [root];
    const stack = [root];
    for (let module = stack.pop(); module !== undefined; module = stack.pop()) {
      for (const predecessor of backward.get(module) ?? []) {
        if (assigned.has(predecessor)) continue;
        assigned.add(predecessor);
        component.push(predecessor);
        stack.push(predecessor);
      }
    }

    if (component.length > 1) {
      cycles.push(component.sort(byRank));
    }
  }

  return cycles.sort((a, b) => byRank(a[0], b[0]));
}
