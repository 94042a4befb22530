import { DOT_STYLE } from '../../constants/index.js';
import { printLiteral } from './literal.js';
import type { GraphEvaluation } from './evaluate.js';
import type { Graph, GraphEdge, GraphNode } from './types.js';

function escapeDot(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function shapeOf(node: GraphNode): string {
  switch (node.kind) {
    case 'vertex':
      return DOT_STYLE.VERTEX_SHAPE;
    case 'configurable':
      return DOT_STYLE.CONFIGURABLE_SHAPE;
    case 'app':
      return DOT_STYLE.APP_SHAPE;
  }
}

function labelLines(node: GraphNode, evaluation?: GraphEvaluation): string[] {
  if (node.kind !== 'configurable') {
    return [node.name];
  }
  const lines = node.moduleName === node.name ? [node.name] : [node.name, node.moduleName];
  const evaluated = evaluation?.nodes.get(node.id);
  for (const { key, value } of evaluated?.keys ?? []) {
    if (value.some) {
      lines.push(`${key.name}=${key.descriptor.print(value.value)}`);
    }
  }
  for (const { name, value } of evaluated?.values ?? []) {
    if (value.some) {
      lines.push(`${name}=${printLiteral(value.value)}`);
    }
  }
  return lines;
}

function edgeAttributes(edge: GraphEdge): string {
  if (edge.kind === 'data') {
    return `style=${DOT_STYLE.DATA_EDGE}`;
  }
  if (edge.primary) {
    return `style=${DOT_STYLE.PRIMARY_EDGE}`;
  }
  return `style=${DOT_STYLE.ARGUMENT_EDGE}, label="${edge.position}"`;
}

/**
 * Dot description of `graph`.
 *
 * Vertices are circles, configurables boxes and apps diamonds. An app's edge
 * to the node it applies is bold, other argument edges are solid and labelled
 * with their position, data dependencies are dashed. When an evaluation is
 * given, configurables list the key values it resolved.
 */
export function renderDot(graph: Graph, evaluation?: GraphEvaluation): string {
  const lines = [`digraph ${DOT_STYLE.GRAPH_NAME} {`, '  node [fontname="monospace"];'];
  for (const node of graph.nodes) {
    const label = labelLines(node, evaluation).map(escapeDot).join('\\n');
    lines.push(`  n${node.id} [label="${label}", shape=${shapeOf(node)}];`);
  }
  for (const edge of graph.edges) {
    lines.push(`  n${edge.from} -> n${edge.to} [${edgeAttributes(edge)}];`);
  }
  lines.push('}');
  return `${lines.join('\n')}\n`;
}
