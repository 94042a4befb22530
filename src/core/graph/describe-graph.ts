import type { GraphEvaluation, KeyEvaluation, ValueEvaluation } from './evaluate.js';
import { argumentEdgesOf, argumentsOf, dataDependenciesOf, getNode } from './graph.js';
import { printLiteral } from './literal.js';
import type { Graph, GraphNode, NodeId } from './types.js';

const INDENT = '    ';

function heading(node: GraphNode): string {
  switch (node.kind) {
    case 'vertex':
      return `[${node.id}] ${node.name} (vertex)`;
    case 'configurable':
      return `[${node.id}] ${node.name} (configurable ${node.moduleName})`;
    case 'app':
      return `[${node.id}] ${node.name} (app)`;
  }
}

function nodeRefs(graph: Graph, ids: NodeId[]): string {
  return ids.map(id => `[${id}] ${getNode(graph, id).name}`).join(', ');
}

function keyLine({ key, value, source }: KeyEvaluation): string {
  const { descriptor } = key;
  if (!value.some) {
    return `${INDENT}${key.name} = unset (default ${descriptor.print(key.defaultValue)})`;
  }
  const marker = source === 'default' ? ' (default)' : '';
  return `${INDENT}${key.name} = ${descriptor.print(value.value)}${marker}`;
}

function valueLine({ name, value }: ValueEvaluation): string {
  return `${INDENT}${name} := ${value.some ? printLiteral(value.value) : 'unknown'}`;
}

/**
 * Human-readable account of `graph` and what `evaluation` resolved, one block
 * per node in evaluation order:
 *
 * ```
 * [0] http (configurable Http)
 *     port = 8080 (default)
 *     log_level = unset (default info)
 * ```
 *
 * Keys bound to their default during evaluation are marked `(default)`; keys
 * a partial evaluation could not resolve show as `unset` with their default.
 */
export function describeGraph(graph: Graph, evaluation: GraphEvaluation): string {
  const lines = [`keygraph: ${graph.nodes.length} node(s), ${evaluation.mode} evaluation`];
  for (const id of evaluation.order) {
    const node = getNode(graph, id);
    lines.push(heading(node));

    if (node.kind === 'app') {
      const base = argumentEdgesOf(graph, id).find(edge => edge.primary);
      if (base) {
        lines.push(`${INDENT}applies: ${nodeRefs(graph, [base.to])}`);
      }
    }
    const args = argumentsOf(graph, id);
    if (args.length > 0) {
      lines.push(`${INDENT}arguments: ${nodeRefs(graph, args)}`);
    }
    const after = dataDependenciesOf(graph, id);
    if (after.length > 0) {
      lines.push(`${INDENT}after: ${nodeRefs(graph, after)}`);
    }

    const evaluated = evaluation.nodes.get(id);
    for (const key of evaluated?.keys ?? []) {
      lines.push(keyLine(key));
    }
    for (const value of evaluated?.values ?? []) {
      lines.push(valueLine(value));
    }
  }
  return `${lines.join('\n')}\n`;
}
