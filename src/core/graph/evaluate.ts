import { some, type Literal, type Option } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { BindingSource, EvalContext } from '../keys/eval-context.js';
import { evalValue, peek } from '../keys/interpret.js';
import type { AnyKey } from '../keys/key.js';
import { value, type ValueExpr } from '../keys/value.js';
import { getNode, graphKeys } from './graph.js';
import { toposort } from './toposort.js';
import type { EvaluationMode, Graph, NodeId } from './types.js';

export interface KeyEvaluation {
  key: AnyKey;
  value: Option<unknown>;
  source?: BindingSource;
}

export interface ValueEvaluation {
  name: string;
  value: Option<Literal>;
}

export interface NodeEvaluation {
  id: NodeId;
  keys: KeyEvaluation[];
  values: ValueEvaluation[];
}

export interface GraphEvaluation {
  mode: EvaluationMode;
  /** Topological order the nodes were evaluated in */
  order: NodeId[];
  nodes: ReadonlyMap<NodeId, NodeEvaluation>;
  /** Names of the keys bound to their default by this evaluation */
  defaulted: string[];
}

export function isLiteral(candidate: unknown): candidate is Literal {
  switch (typeof candidate) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(candidate);
    case 'object':
      return candidate === null || (Array.isArray(candidate) && candidate.every(isLiteral));
    default:
      return false;
  }
}

/**
 * Evaluate every key and value of every configurable in `graph`.
 *
 * - 'partial' only uses what is already bound in `ctx`; anything depending on
 *   an unbound key is left unknown.
 * - 'full' first binds every unbound key of the graph to its default, then
 *   evaluates everything.
 *
 * @throws CyclicGraphError if the graph has a cycle
 * @throws UnresolvedKeyError if a full evaluation meets an unbound key
 */
export function evaluateGraph(graph: Graph, ctx: EvalContext, mode: EvaluationMode): GraphEvaluation {
  const order = toposort(graph);
  const defaulted = mode === 'full'
    ? ctx.fillDefaults(graphKeys(graph)).map(key => key.name)
    : [];

  const resolve = <T>(expr: ValueExpr<T>, nodeId: NodeId): Option<T> =>
    mode === 'full' ? some(evalValue(expr, ctx, { nodeId })) : peek(expr, ctx);

  const nodes = new Map<NodeId, NodeEvaluation>();
  for (const id of order) {
    const node = getNode(graph, id);
    if (node.kind !== 'configurable') {
      nodes.set(id, { id, keys: [], values: [] });
      continue;
    }

    const keys = node.keys.toArray().map(key => ({
      key,
      value: resolve(value(key), id),
      source: ctx.sourceOf(key)
    }));
    const values = node.values.map(({ name, expr }): ValueEvaluation => {
      const result = resolve(expr, id);
      if (result.some && !isLiteral(result.value)) {
        throw new ValidationError(`value '${name}' of '${node.name}' is not a literal`, { nodeId: id });
      }
      return { name, value: result };
    });
    nodes.set(id, { id, keys, values });
  }

  logger.info(`Evaluated ${order.length} node(s) (${mode})`, defaulted.length > 0 ? { defaulted } : undefined);
  return { mode, order, nodes, defaulted };
}
