import { ValidationError } from '../../utils/errors.js';
import { KeySet } from '../keys/key-set.js';
import type { ArgumentEdge, Graph, GraphNode, NodeId } from './types.js';

export function getNode(graph: Graph, id: NodeId): GraphNode {
  const node = graph.nodes[id];
  if (!node) {
    throw new ValidationError(`unknown node ${id}`, { nodeId: id });
  }
  return node;
}

/**
 * Argument edges leaving `id`, by position.
 */
export function argumentEdgesOf(graph: Graph, id: NodeId): ArgumentEdge[] {
  return graph.edges
    .filter((edge): edge is ArgumentEdge => edge.kind === 'argument' && edge.from === id)
    .sort((a, b) => a.position - b.position);
}

/** Call arguments of `id`, in call order (excludes an app's base). */
export function argumentsOf(graph: Graph, id: NodeId): NodeId[] {
  return argumentEdgesOf(graph, id)
    .filter(edge => edge.position > 0)
    .map(edge => edge.to);
}

export function dataDependenciesOf(graph: Graph, id: NodeId): NodeId[] {
  return graph.edges
    .filter(edge => edge.kind === 'data' && edge.from === id)
    .map(edge => edge.to);
}

/**
 * For every node, the distinct nodes it depends on, in edge insertion order.
 */
export function dependencyLists(graph: Graph): NodeId[][] {
  const lists: NodeId[][] = graph.nodes.map(() => []);
  for (const edge of graph.edges) {
    const list = lists[edge.from];
    if (!list) {
      throw new ValidationError(`edge from unknown node ${edge.from}`, { nodeId: edge.from });
    }
    if (!graph.nodes[edge.to]) {
      throw new ValidationError(`edge to unknown node ${edge.to}`, { nodeId: edge.to });
    }
    if (!list.includes(edge.to)) {
      list.push(edge.to);
    }
  }
  return lists;
}

/** Every key any configurable of the graph uses. */
export function graphKeys(graph: Graph): KeySet {
  return KeySet.unionAll(
    graph.nodes.flatMap(node => (node.kind === 'configurable' ? [node.keys] : []))
  );
}
