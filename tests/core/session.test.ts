import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildGraph, ConfigSession, type ConfigDefinition } from '../../src/core/session.js';
import { docFlags } from '../../src/core/keys/doc.js';
import { evalValue } from '../../src/core/keys/interpret.js';
import { EvalContext } from '../../src/core/keys/eval-context.js';
import { DuplicateKeyNameError, CyclicGraphError } from '../../src/utils/errors.js';

describe('ConfigSession', () => {
  it('creates keys with an optional short flag and help section', () => {
    const session = new ConfigSession();
    const port = session.key('port', session.descriptors.int, {
      defaultValue: 8080,
      stage: 'configure',
      short: 'p',
      doc: 'HTTP port',
      docs: 'NETWORK'
    });

    assert.equal(docFlags(port.doc), '-p, --port <PORT>');
    assert.equal(port.doc.section, 'NETWORK');
    assert.equal(port.stage, 'configure');
  });

  it('offers the expression helpers', () => {
    const session = new ConfigSession();
    const { value, lift2 } = session.expr;
    const host = session.key('host', session.descriptors.string, { defaultValue: 'localhost' });
    const port = session.key('port', session.descriptors.int, { defaultValue: 8080 });
    const ctx = new EvalContext();
    ctx.fillDefaults([host, port]);

    assert.equal(evalValue(lift2((h: string, p: number) => `${h}:${p}`, value(host), value(port)), ctx), 'localhost:8080');
  });
});

describe('buildGraph', () => {
  const definition: ConfigDefinition = session => {
    const level = session.key('log_level', session.descriptors.string, { defaultValue: 'info' });
    const log = session.configurable({ name: 'log', keys: [level] });
    const app = session.configurable({ name: 'server', args: [log] });
    session.dependsOn(app, session.vertex({ name: 'clock' }));
  };

  it('returns the session and the frozen graph', () => {
    const { session, graph } = buildGraph(definition);
    assert.equal(session.registry.size, 1);
    assert.deepEqual(graph.nodes.map(node => node.name), ['log', 'server', 'clock']);
    assert.ok(Object.isFrozen(graph));
  });

  it('starts every build with a fresh registry', () => {
    buildGraph(definition);
    assert.doesNotThrow(() => buildGraph(definition));
  });

  it('propagates construction errors', () => {
    assert.throws(
      () =>
        buildGraph(session => {
          session.key('port', session.descriptors.int, { defaultValue: 1 });
          session.key('port', session.descriptors.int, { defaultValue: 2 });
        }),
      DuplicateKeyNameError
    );
    assert.throws(
      () =>
        buildGraph(session => {
          const a = session.configurable({ name: 'a' });
          const b = session.configurable({ name: 'b', args: [a] });
          session.dependsOn(a, b);
        }),
      CyclicGraphError
    );
  });
});
