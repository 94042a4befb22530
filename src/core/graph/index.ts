export type {
  NodeId,
  VertexNode,
  NamedValue,
  ConfigurableNode,
  AppNode,
  GraphNode,
  ArgumentEdge,
  DataEdge,
  GraphEdge,
  Graph,
  EvaluationMode
} from './types.js';
export { getNode, argumentEdgesOf, argumentsOf, dataDependenciesOf, dependencyLists, graphKeys } from './graph.js';
export { toposort, findPath } from './toposort.js';
export type { VertexSpec, ConfigurableSpec, AppSpec } from './graph-builder.js';
export { GraphBuilder } from './graph-builder.js';
export type { KeyEvaluation, ValueEvaluation, NodeEvaluation, GraphEvaluation } from './evaluate.js';
export { evaluateGraph, isLiteral } from './evaluate.js';
export { printLiteral } from './literal.js';
export { renderDot } from './render-dot.js';
export { generateSource } from './generate-source.js';
export { describeGraph } from './describe-graph.js';
