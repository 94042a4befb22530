import { evaluateGraph, type GraphEvaluation } from '../graph/evaluate.js';
import { generateSource } from '../graph/generate-source.js';
import { graphKeys } from '../graph/graph.js';
import type { Graph } from '../graph/types.js';
import { EvalContext } from '../keys/eval-context.js';
import { buildGraph, type ConfigDefinition } from '../session.js';
import { bindKeyArguments } from './key-arguments.js';

export interface ConfigureOptions {
  argv?: readonly string[];
}

export interface ConfigureResult {
  graph: Graph;
  evaluation: GraphEvaluation;
  /** Generated module text */
  source: string;
}

/**
 * Resolve every key of `definition` (arguments first, then defaults) and
 * generate the module instantiating its graph.
 *
 * @throws KeyParseError if any key value fails to parse
 */
export function configureApplication(definition: ConfigDefinition, options: ConfigureOptions = {}): ConfigureResult {
  const { graph } = buildGraph(definition);
  const ctx = new EvalContext();
  bindKeyArguments(ctx, graphKeys(graph), options.argv ?? []);

  const evaluation = evaluateGraph(graph, ctx, 'full');
  const source = generateSource(graph, ctx);
  return { graph, evaluation, source };
}
