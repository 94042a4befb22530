import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { intDescriptor, stringDescriptor } from '../../../src/core/keys/descriptor.js';
import { EvalContext } from '../../../src/core/keys/eval-context.js';
import { deps, evalValue, peek } from '../../../src/core/keys/interpret.js';
import { KeyRegistry } from '../../../src/core/keys/key-registry.js';
import { app, lift2, map, pure, value } from '../../../src/core/keys/value.js';
import { UnresolvedKeyError } from '../../../src/utils/errors.js';

function fixture() {
  const registry = new KeyRegistry();
  const host = registry.create('host', stringDescriptor, { defaultValue: 'localhost' });
  const port = registry.create('port', intDescriptor, { defaultValue: 8080 });
  const url = lift2((h: string, p: number) => `http://${h}:${p}`, value(host), value(port));
  return { host, port, url };
}

describe('deps', () => {
  it('is empty for constants', () => {
    assert.equal(deps(pure(1)).size, 0);
  });

  it('collects both sides of an application', () => {
    const { url } = fixture();
    assert.deepEqual(deps(url).names(), ['host', 'port']);
  });

  it('finds keys at any depth, once each', () => {
    const { host, port } = fixture();
    const nested = map(
      (s: string) => s.length,
      app(map((p: number) => (h: string) => `${h}${p}`, map((p: number) => p + 1, value(port))), value(host))
    );
    const twice = lift2((a: number, b: number) => a + b, value(port), value(port));

    assert.deepEqual(deps(nested).names(), ['host', 'port']);
    assert.deepEqual(deps(twice).names(), ['port']);
  });
});

describe('peek', () => {
  it('yields nothing while a key is unbound', () => {
    const { host, url } = fixture();
    const ctx = new EvalContext();
    ctx.bind(host, 'example.org');
    assert.deepEqual(peek(url, ctx), { some: false });
  });

  it('never consults defaults', () => {
    const { port } = fixture();
    assert.deepEqual(peek(value(port), new EvalContext()), { some: false });
  });

  it('computes once every key is bound', () => {
    const { host, port, url } = fixture();
    const ctx = new EvalContext();
    ctx.bind(host, 'example.org');
    ctx.bind(port, 443);
    assert.deepEqual(peek(url, ctx), { some: true, value: 'http://example.org:443' });
  });
});

describe('evalValue', () => {
  it('evaluates applications', () => {
    const { host, port, url } = fixture();
    const ctx = new EvalContext();
    ctx.bind(host, 'localhost');
    ctx.bind(port, 8080);
    assert.equal(evalValue(url, ctx), 'http://localhost:8080');
  });

  it('names the missing key and the node being evaluated', () => {
    const { host, url } = fixture();
    const ctx = new EvalContext();
    ctx.bind(host, 'localhost');
    assert.throws(
      () => evalValue(url, ctx, { nodeId: 4 }),
      (error: unknown) =>
        error instanceof UnresolvedKeyError &&
        error.keyName === 'port' &&
        error.nodeId === 4 &&
        error.message === "Internal error: key 'port' has no resolved value (node 4)"
    );
  });
});
