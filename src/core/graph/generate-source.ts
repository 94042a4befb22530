import { GENERATED_SOURCE } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { propertyName, toIdentifier } from '../../utils/identifier.js';
import type { EvalContext } from '../keys/eval-context.js';
import { evalValue } from '../keys/interpret.js';
import { isRuntime } from '../keys/key.js';
import { serializeKey } from '../keys/key-output.js';
import { isLiteral } from './evaluate.js';
import { argumentEdgesOf, argumentsOf, getNode, graphKeys } from './graph.js';
import { printLiteral } from './literal.js';
import { toposort } from './toposort.js';
import type { ConfigurableNode, Graph, GraphNode, NodeId } from './types.js';

function bindingName(node: GraphNode): string {
  return `${toIdentifier(node.name)}_${node.id}`;
}

function importLines(graph: Graph): string[] {
  const bySpecifier = new Map<string, Set<string>>();
  for (const node of graph.nodes) {
    if (node.kind !== 'configurable' || node.importFrom === undefined) continue;
    const root = node.moduleName.split('.')[0] ?? node.moduleName;
    const names = bySpecifier.get(node.importFrom) ?? new Set<string>();
    names.add(root);
    bySpecifier.set(node.importFrom, names);
  }
  return [...bySpecifier.keys()]
    .sort()
    .map(specifier => {
      const names = [...(bySpecifier.get(specifier) ?? [])].sort();
      return `import { ${names.join(', ')} } from ${JSON.stringify(specifier)};`;
    });
}

function runtimeKeysLine(graph: Graph, ctx: EvalContext): string | undefined {
  const keys = graphKeys(graph).filter(isRuntime);
  if (keys.size === 0) return undefined;
  const entries = keys.toArray().map(key => `${propertyName(key.identifier)}: ${serializeKey(key, ctx)}`);
  return `export const ${GENERATED_SOURCE.RUNTIME_KEYS_EXPORT} = { ${entries.join(', ')} };`;
}

function settingsObject(node: ConfigurableNode, ctx: EvalContext): string | undefined {
  const entries = node.keys.toArray().map(key => `${propertyName(key.identifier)}: ${serializeKey(key, ctx, node.id)}`);
  for (const { name, expr } of node.values) {
    const result: unknown = evalValue(expr, ctx, { nodeId: node.id });
    if (!isLiteral(result)) {
      throw new ValidationError(`value '${name}' of '${node.name}' is not a literal`, { nodeId: node.id });
    }
    entries.push(`${propertyName(name)}: ${printLiteral(result)}`);
  }
  return entries.length > 0 ? `{ ${entries.join(', ')} }` : undefined;
}

function initializer(graph: Graph, node: GraphNode, ctx: EvalContext, bindings: Map<NodeId, string>): string {
  const bound = (id: NodeId): string => bindings.get(id) ?? bindingName(getNode(graph, id));
  const args = argumentsOf(graph, node.id).map(bound);

  switch (node.kind) {
    case 'vertex':
      return node.expression;
    case 'configurable': {
      const settings = settingsObject(node, ctx);
      return `${node.moduleName}(${[...args, ...(settings ? [settings] : [])].join(', ')})`;
    }
    case 'app': {
      const base = argumentEdgesOf(graph, node.id).find(edge => edge.primary);
      if (!base) {
        throw new ValidationError(`app '${node.name}' has nothing to apply`, { nodeId: node.id });
      }
      return `${bound(base.to)}(${args.join(', ')})`;
    }
  }
}

/**
 * JavaScript module instantiating `graph` with the values bound in `ctx`.
 *
 * One `const` per node in topological order, each calling its module with the
 * bindings of its arguments (in order) and its settings; run-stage keys are
 * also exported as `runtimeKeys`. The module's default export is the last
 * node. The output depends only on the graph and the bound values.
 *
 * @throws UnresolvedKeyError if a key of the graph is unbound
 */
export function generateSource(graph: Graph, ctx: EvalContext): string {
  const order = toposort(graph);
  const last = order[order.length - 1];
  if (last === undefined) {
    throw new ValidationError('cannot generate source for an empty graph');
  }

  const sections: string[] = [[GENERATED_SOURCE.HEADER, ...importLines(graph)].join('\n')];

  const runtimeKeys = runtimeKeysLine(graph, ctx);
  if (runtimeKeys) {
    sections.push(runtimeKeys);
  }

  const bindings = new Map<NodeId, string>();
  const lines: string[] = [];
  for (const id of order) {
    const node = getNode(graph, id);
    const name = bindingName(node);
    lines.push(`const ${name} = ${initializer(graph, node, ctx, bindings)};`);
    bindings.set(id, name);
  }
  sections.push(lines.join('\n'));
  sections.push(`export default ${bindings.get(last) ?? bindingName(getNode(graph, last))};`);

  return `${sections.join('\n\n')}\n`;
}
