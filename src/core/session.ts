/**
 * Configuration session
 *
 * One session owns the key registry and the graph builder for a single
 * configuration run. A configuration module is a function receiving the
 * session; everything it needs hangs off it, so the module imports nothing.
 */

import type { Stage } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { GraphBuilder, type AppSpec, type ConfigurableSpec, type VertexSpec } from './graph/graph-builder.js';
import type { Graph, NodeId } from './graph/types.js';
import {
  boolDescriptor,
  intDescriptor,
  listDescriptor,
  stringDescriptor,
  type Descriptor
} from './keys/descriptor.js';
import { createDoc } from './keys/doc.js';
import type { Key } from './keys/key.js';
import { KeyRegistry } from './keys/key-registry.js';
import { app, lift2, map, pure, value } from './keys/value.js';

export interface SessionKeyOptions<T> {
  defaultValue: T;
  stage?: Stage;
  /** Help text */
  doc?: string;
  /** Value placeholder in help; defaults to the upper-cased name */
  docv?: string;
  /** Help section */
  docs?: string;
  /** Single-letter alias */
  short?: string;
}

const descriptors = Object.freeze({
  string: stringDescriptor,
  int: intDescriptor,
  bool: boolDescriptor,
  list: listDescriptor
});

const expr = Object.freeze({ pure, value, app, map, lift2 });

export class ConfigSession {
  readonly registry = new KeyRegistry();
  readonly builder = new GraphBuilder();
  readonly descriptors = descriptors;
  readonly expr = expr;

  key<T>(name: string, descriptor: Descriptor<T>, options: SessionKeyOptions<T>): Key<T> {
    if (options.short === undefined && options.docv === undefined && options.docs === undefined) {
      return this.registry.create(name, descriptor, options);
    }
    const names = options.short === undefined ? [name] : [options.short, name];
    const doc = createDoc(
      {
        doc: options.doc,
        docs: options.docs,
        docv: options.docv ?? name.toUpperCase().replace(/-/g, '_')
      },
      names
    );
    return this.registry.createRaw(name, descriptor, {
      doc,
      stage: options.stage ?? 'both',
      defaultValue: options.defaultValue
    });
  }

  vertex(spec: VertexSpec): NodeId {
    return this.builder.addVertex(spec);
  }

  configurable(spec: ConfigurableSpec): NodeId {
    return this.builder.addConfigurable(spec);
  }

  app(spec: AppSpec): NodeId {
    return this.builder.addApp(spec);
  }

  dependsOn(from: NodeId, to: NodeId): void {
    this.builder.addDataDependency(from, to);
  }
}

export type ConfigDefinition = (session: ConfigSession) => void;

export interface BuiltConfiguration {
  session: ConfigSession;
  graph: Graph;
}

/**
 * Run `definition` against a fresh session and freeze the graph it built.
 */
export function buildGraph(definition: ConfigDefinition): BuiltConfiguration {
  const session = new ConfigSession();
  definition(session);
  const graph = session.builder.build();
  logger.info(`Built graph with ${graph.nodes.length} node(s) and ${session.registry.size} key(s)`);
  return { session, graph };
}
