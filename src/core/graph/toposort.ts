import { CyclicGraphError } from '../../utils/errors.js';
import { dependencyLists, getNode } from './graph.js';
import type { Graph, NodeId } from './types.js';

/**
 * Order the nodes so that every node comes after the nodes it depends on.
 *
 * Kahn's algorithm; among nodes that are ready at the same time the one added
 * to the graph first goes first, so the order only depends on the graph.
 *
 * @throws CyclicGraphError naming the nodes of one cycle
 */
export function toposort(graph: Graph): NodeId[] {
  const dependencies = dependencyLists(graph);
  const pending = dependencies.map(list => list.length);
  const dependents: NodeId[][] = graph.nodes.map(() => []);
  dependencies.forEach((list, id) => {
    for (const dependency of list) {
      dependents[dependency]?.push(id);
    }
  });

  const ready: NodeId[] = [];
  pending.forEach((count, id) => {
    if (count === 0) ready.push(id);
  });

  const order: NodeId[] = [];
  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);
    for (const dependent of dependents[id] ?? []) {
      const remaining = (pending[dependent] ?? 0) - 1;
      pending[dependent] = remaining;
      if (remaining === 0) {
        insertSorted(ready, dependent);
      }
    }
  }

  if (order.length < graph.nodes.length) {
    const emitted = new Set(order);
    const stuck = graph.nodes.map(node => node.id).filter(id => !emitted.has(id));
    throw cycleError(graph, dependencies, new Set(stuck));
  }
  return order;
}

function insertSorted(queue: NodeId[], id: NodeId): void {
  const index = queue.findIndex(other => other > id);
  if (index === -1) {
    queue.push(id);
  } else {
    queue.splice(index, 0, id);
  }
}

/**
 * Every node Kahn's algorithm could not release still waits on another such
 * node, so following those edges from any of them must come back around.
 */
function cycleError(graph: Graph, dependencies: NodeId[][], stuck: Set<NodeId>): CyclicGraphError {
  const path: NodeId[] = [];
  const seenAt = new Map<NodeId, number>();
  let current = Math.min(...stuck);

  while (!seenAt.has(current)) {
    seenAt.set(current, path.length);
    path.push(current);
    const next = (dependencies[current] ?? []).find(id => stuck.has(id));
    if (next === undefined) break;
    current = next;
  }

  const cycle = path.slice(seenAt.get(current) ?? 0);
  return new CyclicGraphError(cycle, cycle.map(id => getNode(graph, id).name));
}

/**
 * A path of dependency edges from `start` to `target`, both included, or
 * nothing when `target` is unreachable.
 */
export function findPath(dependencies: NodeId[][], start: NodeId, target: NodeId): NodeId[] | undefined {
  const visited = new Set<NodeId>();

  const visit = (id: NodeId): NodeId[] | undefined => {
    if (id === target) return [id];
    if (visited.has(id)) return undefined;
    visited.add(id);
    for (const next of dependencies[id] ?? []) {
      const rest = visit(next);
      if (rest) return [id, ...rest];
    }
    return undefined;
  };

  return visit(start);
}
