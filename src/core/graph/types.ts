/**
 * Types for the component graph.
 *
 * Nodes live in an arena and are addressed by their index. Edges point from a
 * node to a node it depends on.
 */

import type { Literal } from '../../types/index.js';
import type { KeySet } from '../keys/key-set.js';
import type { ValueExpr } from '../keys/value.js';

export type NodeId = number;

/** Opaque leaf data, emitted as the given source expression. */
export interface VertexNode {
  readonly kind: 'vertex';
  readonly id: NodeId;
  readonly name: string;
  readonly expression: string;
}

export interface NamedValue {
  readonly name: string;
  readonly expr: ValueExpr<Literal>;
}

/**
 * A component with its own keys, instantiated by calling `moduleName` with its
 * argument nodes (in order) and its resolved settings.
 */
export interface ConfigurableNode {
  readonly kind: 'configurable';
  readonly id: NodeId;
  readonly name: string;
  readonly moduleName: string;
  /** Module specifier `moduleName` is imported from, if any */
  readonly importFrom?: string;
  /** Declared keys plus every key its values depend on */
  readonly keys: KeySet;
  readonly values: readonly NamedValue[];
}

/** Applies the node behind its primary edge to its other argument nodes. */
export interface AppNode {
  readonly kind: 'app';
  readonly id: NodeId;
  readonly name: string;
}

export type GraphNode = VertexNode | ConfigurableNode | AppNode;

/**
 * Position 0 is the applied node itself (an app's base, always primary);
 * call arguments are numbered from 1.
 */
export interface ArgumentEdge {
  readonly kind: 'argument';
  readonly from: NodeId;
  readonly to: NodeId;
  readonly position: number;
  readonly primary: boolean;
}

/** Ordering-only dependency; never appears in generated calls. */
export interface DataEdge {
  readonly kind: 'data';
  readonly from: NodeId;
  readonly to: NodeId;
}

export type GraphEdge = ArgumentEdge | DataEdge;

export interface Graph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
}

export type EvaluationMode = 'partial' | 'full';
