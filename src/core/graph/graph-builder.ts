import type { Literal } from '../../types/index.js';
import { CyclicGraphError, ValidationError } from '../../utils/errors.js';
import { isIdentifier } from '../../utils/identifier.js';
import { logger } from '../../utils/logger.js';
import { deps } from '../keys/interpret.js';
import type { AnyKey } from '../keys/key.js';
import { KeySet } from '../keys/key-set.js';
import type { ValueExpr } from '../keys/value.js';
import { dependencyLists } from './graph.js';
import { findPath, toposort } from './toposort.js';
import type { Graph, GraphEdge, GraphNode, NamedValue, NodeId } from './types.js';

const MODULE_PATH_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*(\.[A-Za-z_$][A-Za-z0-9_$]*)*$/;

export interface VertexSpec {
  name: string;
  /** Source expression; defaults to the quoted name */
  expression?: string;
}

export interface ConfigurableSpec {
  name: string;
  /** Callee in generated code, e.g. `Http` or `Http.make`; defaults to `name` */
  moduleName?: string;
  importFrom?: string;
  keys?: Iterable<AnyKey>;
  values?: Record<string, ValueExpr<Literal>>;
  /** Argument nodes, in call order */
  args?: readonly NodeId[];
  /** Nodes that must be evaluated first without being passed in */
  dataDeps?: readonly NodeId[];
}

export interface AppSpec {
  name?: string;
  base: NodeId;
  args: readonly NodeId[];
}

/**
 * Assembles a graph node by node. Nodes can only refer to nodes added before
 * them, so only `addDataDependency` can close a cycle, and it refuses to.
 */
export class GraphBuilder {
  private readonly nodes: GraphNode[] = [];
  private readonly edges: GraphEdge[] = [];
  /** Imported root name -> module specifier */
  private readonly imports = new Map<string, string>();

  addVertex(spec: VertexSpec): NodeId {
    const id = this.nodes.length;
    this.nodes.push({
      kind: 'vertex',
      id,
      name: spec.name,
      expression: spec.expression ?? JSON.stringify(spec.name)
    });
    return id;
  }

  addConfigurable(spec: ConfigurableSpec): NodeId {
    const moduleName = spec.moduleName ?? spec.name;
    if (!MODULE_PATH_PATTERN.test(moduleName)) {
      throw new ValidationError(`'${moduleName}' is not a valid module name`, { node: spec.name });
    }
    const args = spec.args ?? [];
    const dataDeps = spec.dataDeps ?? [];
    [...args, ...dataDeps].forEach(target => this.requireNode(target));

    const declared = new KeySet(spec.keys ?? []);
    const values = this.namedValues(spec.name, spec.values ?? {});
    const keys = KeySet.unionAll([declared, ...values.map(value => deps(value.expr))]);
    const keyIdentifiers = new Set(keys.toArray().map(key => key.identifier));
    for (const { name } of values) {
      if (keyIdentifiers.has(name)) {
        throw new ValidationError(`value name '${name}' of '${spec.name}' clashes with a key`);
      }
    }
    if (spec.importFrom !== undefined) {
      this.claimImport(spec.name, moduleName, spec.importFrom);
    }

    const id = this.nodes.length;
    this.nodes.push({
      kind: 'configurable',
      id,
      name: spec.name,
      moduleName,
      importFrom: spec.importFrom,
      keys,
      values
    });
    args.forEach((to, index) => {
      this.edges.push({ kind: 'argument', from: id, to, position: index + 1, primary: false });
    });
    dataDeps.forEach(to => {
      this.edges.push({ kind: 'data', from: id, to });
    });
    logger.debug(`Added configurable '${spec.name}' (#${id})`, { keys: keys.names(), args: [...args] });
    return id;
  }

  addApp(spec: AppSpec): NodeId {
    this.requireNode(spec.base);
    spec.args.forEach(target => this.requireNode(target));

    const id = this.nodes.length;
    this.nodes.push({ kind: 'app', id, name: spec.name ?? 'app' });
    this.edges.push({ kind: 'argument', from: id, to: spec.base, position: 0, primary: true });
    spec.args.forEach((to, index) => {
      this.edges.push({ kind: 'argument', from: id, to, position: index + 1, primary: false });
    });
    return id;
  }

  /**
   * Make `from` depend on `to` without passing it as an argument.
   * @throws CyclicGraphError when `to` already depends on `from`
   */
  addDataDependency(from: NodeId, to: NodeId): void {
    this.requireNode(from);
    this.requireNode(to);
    const back = findPath(dependencyLists(this.snapshot()), to, from);
    if (back) {
      // back runs to -> ... -> from; the new edge closes it
      const cycle = [from, ...back.slice(0, -1)];
      throw new CyclicGraphError(cycle, cycle.map(id => this.nodeName(id)));
    }
    this.edges.push({ kind: 'data', from, to });
  }

  get size(): number {
    return this.nodes.length;
  }

  /** The graph as it stands, unchecked. */
  snapshot(): Graph {
    return { nodes: [...this.nodes], edges: [...this.edges] };
  }

  /**
   * @throws CyclicGraphError if the edges form a cycle
   */
  build(): Graph {
    const graph = this.snapshot();
    toposort(graph);
    return Object.freeze(graph);
  }

  private requireNode(id: NodeId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.nodes.length) {
      throw new ValidationError(`unknown node ${id}`, { nodeId: id });
    }
  }

  /**
   * Generated modules import each root name once, so it must always come
   * from the same specifier.
   */
  private claimImport(node: string, moduleName: string, specifier: string): void {
    const root = moduleName.split('.')[0] ?? moduleName;
    const existing = this.imports.get(root);
    if (existing !== undefined && existing !== specifier) {
      throw new ValidationError(`'${root}' of '${node}' is imported from '${specifier}' but already from '${existing}'`, {
        node,
        root
      });
    }
    this.imports.set(root, specifier);
  }

  private nodeName(id: NodeId): string {
    return this.nodes[id]?.name ?? String(id);
  }

  private namedValues(node: string, values: Record<string, ValueExpr<Literal>>): NamedValue[] {
    return Object.entries(values).map(([name, expr]) => {
      if (!isIdentifier(name)) {
        throw new ValidationError(`value name '${name}' of '${node}' is not an identifier`);
      }
      return { name, expr };
    });
  }
}
