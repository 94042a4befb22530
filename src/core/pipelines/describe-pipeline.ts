import { describeGraph } from '../graph/describe-graph.js';
import { evaluateGraph, type GraphEvaluation } from '../graph/evaluate.js';
import { graphKeys } from '../graph/graph.js';
import { renderDot } from '../graph/render-dot.js';
import type { Graph } from '../graph/types.js';
import { EvalContext } from '../keys/eval-context.js';
import { buildGraph, type ConfigDefinition } from '../session.js';
import { bindKeyArguments } from './key-arguments.js';

export interface DescribeOptions {
  /** Key arguments, e.g. `['--port', '9000']` */
  argv?: readonly string[];
  /** Fill defaults and evaluate everything instead of peeking at given values */
  fullEval?: boolean;
  /** Render dot instead of text */
  dot?: boolean;
}

export interface DescribeResult {
  graph: Graph;
  evaluation: GraphEvaluation;
  output: string;
}

/**
 * Build the graph of `definition` and describe it, as text or dot, with the
 * key values given in `argv`.
 *
 * @throws KeyParseError if any key value fails to parse
 */
export function describeConfiguration(definition: ConfigDefinition, options: DescribeOptions = {}): DescribeResult {
  const { graph } = buildGraph(definition);
  const ctx = new EvalContext();
  bindKeyArguments(ctx, graphKeys(graph), options.argv ?? []);

  const evaluation = evaluateGraph(graph, ctx, options.fullEval ? 'full' : 'partial');
  const output = options.dot ? renderDot(graph, evaluation) : describeGraph(graph, evaluation);
  return { graph, evaluation, output };
}
