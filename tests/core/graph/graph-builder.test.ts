import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { intDescriptor, stringDescriptor } from '../../../src/core/keys/descriptor.js';
import { KeyRegistry } from '../../../src/core/keys/key-registry.js';
import { lift2, value } from '../../../src/core/keys/value.js';
import { GraphBuilder } from '../../../src/core/graph/graph-builder.js';
import { argumentsOf, dataDependenciesOf, getNode, graphKeys } from '../../../src/core/graph/graph.js';
import { toposort } from '../../../src/core/graph/toposort.js';
import type { Graph } from '../../../src/core/graph/types.js';
import { CyclicGraphError, ValidationError } from '../../../src/utils/errors.js';

function chain() {
  const builder = new GraphBuilder();
  const a = builder.addConfigurable({ name: 'A' });
  const b = builder.addConfigurable({ name: 'B', args: [a] });
  const c = builder.addConfigurable({ name: 'C', args: [b] });
  return { builder, a, b, c };
}

describe('GraphBuilder', () => {
  it('numbers nodes in insertion order and keeps argument order', () => {
    const builder = new GraphBuilder();
    const a = builder.addConfigurable({ name: 'a' });
    const b = builder.addConfigurable({ name: 'b' });
    const c = builder.addConfigurable({ name: 'c' });
    const d = builder.addConfigurable({ name: 'd', args: [c, a, b] });
    const graph = builder.build();

    assert.deepEqual([a, b, c, d], [0, 1, 2, 3]);
    assert.deepEqual(argumentsOf(graph, d), [2, 0, 1]);
  });

  it('gives a configurable the keys of its values as well as its declared keys', () => {
    const registry = new KeyRegistry();
    const host = registry.create('host', stringDescriptor, { defaultValue: 'localhost' });
    const port = registry.create('port', intDescriptor, { defaultValue: 8080 });
    const debug = registry.create('debug', stringDescriptor, { defaultValue: 'off' });

    const builder = new GraphBuilder();
    const id = builder.addConfigurable({
      name: 'http',
      keys: [debug],
      values: { url: lift2((h: string, p: number) => `${h}:${p}`, value(host), value(port)) }
    });
    const graph = builder.build();
    const node = getNode(graph, id);

    assert.equal(node.kind, 'configurable');
    if (node.kind === 'configurable') {
      assert.deepEqual(node.keys.names(), ['debug', 'host', 'port']);
      assert.deepEqual(node.values.map(named => named.name), ['url']);
    }
    assert.deepEqual(graphKeys(graph).names(), ['debug', 'host', 'port']);
  });

  it('rejects references to nodes that do not exist yet', () => {
    const builder = new GraphBuilder();
    assert.throws(() => builder.addConfigurable({ name: 'a', args: [0] }), ValidationError);
    assert.throws(() => builder.addApp({ base: 3, args: [] }), ValidationError);
  });

  it('rejects module names that are not dotted identifiers', () => {
    const builder = new GraphBuilder();
    assert.throws(() => builder.addConfigurable({ name: 'x', moduleName: 'not valid' }), ValidationError);
    assert.doesNotThrow(() => builder.addConfigurable({ name: 'y', moduleName: 'Http.make' }));
  });

  it('rejects value names that clash with a key', () => {
    const registry = new KeyRegistry();
    const port = registry.create('port', intDescriptor, { defaultValue: 8080 });
    const builder = new GraphBuilder();
    assert.throws(
      () => builder.addConfigurable({ name: 'x', values: { port: value(port) } }),
      ValidationError
    );
  });

  it('imports each module root from a single place', () => {
    const builder = new GraphBuilder();
    builder.addConfigurable({ name: 'front', moduleName: 'Http', importFrom: './a.js' });
    assert.doesNotThrow(() => builder.addConfigurable({ name: 'back', moduleName: 'Http.make', importFrom: './a.js' }));
    assert.throws(
      () => builder.addConfigurable({ name: 'other', moduleName: 'Http', importFrom: './b.js' }),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message === "Validation error: 'Http' of 'other' is imported from './b.js' but already from './a.js'"
    );
    assert.equal(builder.size, 2);
  });

  it('records data dependencies apart from arguments', () => {
    const { builder, a, c } = chain();
    const d = builder.addConfigurable({ name: 'D', dataDeps: [c] });
    builder.addDataDependency(d, a);
    const graph = builder.build();

    assert.deepEqual(argumentsOf(graph, d), []);
    assert.deepEqual(dataDependenciesOf(graph, d), [c, a]);
  });

  it('refuses a data dependency that closes a cycle, naming its nodes', () => {
    const { builder, a, c } = chain();
    assert.throws(
      () => builder.addDataDependency(a, c),
      (error: unknown) =>
        error instanceof CyclicGraphError &&
        [...error.nodeNames].sort().join(',') === 'A,B,C' &&
        error.message === 'Cyclic graph: A -> C -> B -> A'
    );
    // the refused edge was not added
    assert.doesNotThrow(() => builder.build());
  });

  it('refuses a node depending on itself', () => {
    const { builder, a } = chain();
    assert.throws(() => builder.addDataDependency(a, a), CyclicGraphError);
  });
});

describe('toposort', () => {
  it('puts dependencies first and otherwise keeps insertion order', () => {
    const graph: Graph = {
      nodes: [
        { kind: 'vertex', id: 0, name: 'x', expression: '0' },
        { kind: 'vertex', id: 1, name: 'y', expression: '1' },
        { kind: 'vertex', id: 2, name: 'z', expression: '2' }
      ],
      edges: [{ kind: 'data', from: 0, to: 2 }]
    };
    assert.deepEqual(toposort(graph), [1, 2, 0]);
  });

  it('fails on a cycle and names the nodes on it', () => {
    const graph: Graph = {
      nodes: [
        { kind: 'vertex', id: 0, name: 'A', expression: '0' },
        { kind: 'vertex', id: 1, name: 'B', expression: '1' },
        { kind: 'vertex', id: 2, name: 'C', expression: '2' },
        { kind: 'vertex', id: 3, name: 'D', expression: '3' }
      ],
      edges: [
        { kind: 'argument', from: 1, to: 0, position: 1, primary: false },
        { kind: 'argument', from: 2, to: 1, position: 1, primary: false },
        { kind: 'data', from: 0, to: 2 },
        { kind: 'data', from: 3, to: 0 }
      ]
    };
    assert.throws(
      () => toposort(graph),
      (error: unknown) =>
        error instanceof CyclicGraphError &&
        error.nodeIds.join(',') === '0,2,1' &&
        error.nodeNames.join(',') === 'A,C,B'
    );
  });

  it('rejects edges to unknown nodes', () => {
    const graph: Graph = {
      nodes: [{ kind: 'vertex', id: 0, name: 'x', expression: '0' }],
      edges: [{ kind: 'data', from: 0, to: 5 }]
    };
    assert.throws(() => toposort(graph), ValidationError);
  });
});
