import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { intDescriptor, stringDescriptor } from '../../../src/core/keys/descriptor.js';
import { EvalContext } from '../../../src/core/keys/eval-context.js';
import type { AnyKey } from '../../../src/core/keys/key.js';
import { KeyRegistry } from '../../../src/core/keys/key-registry.js';
import { ValidationError } from '../../../src/utils/errors.js';

function keys() {
  const registry = new KeyRegistry();
  return {
    port: registry.create('port', intDescriptor, { defaultValue: 8080 }),
    host: registry.create('host', stringDescriptor, { defaultValue: 'localhost' })
  };
}

describe('EvalContext', () => {
  it('binds each key once', () => {
    const { port } = keys();
    const ctx = new EvalContext();
    ctx.bind(port, 9000, 'cli');
    assert.throws(
      () => ctx.bind(port, 9001),
      (error: unknown) =>
        error instanceof ValidationError && error.message === "Validation error: key 'port' is already bound (from cli)"
    );
    assert.deepEqual(ctx.lookup(port), { some: true, value: 9000 });
  });

  it('refuses values of the wrong type', () => {
    const { port } = keys();
    const loose: AnyKey = port;
    const ctx = new EvalContext();
    assert.throws(() => ctx.bind(loose, 'nine thousand'), ValidationError);
    assert.equal(ctx.has(port), false);
  });

  it('records where each value came from', () => {
    const { port, host } = keys();
    const ctx = new EvalContext();
    ctx.bind(port, 9000, 'cli');
    const filled = ctx.fillDefaults([port, host]);

    assert.deepEqual(filled.map(key => key.name), ['host']);
    assert.equal(ctx.sourceOf(port), 'cli');
    assert.equal(ctx.sourceOf('host'), 'default');
    assert.equal(ctx.isUserSet(port), true);
    assert.equal(ctx.isUserSet(host), false);
    assert.deepEqual(ctx.lookup(host), { some: true, value: 'localhost' });
    assert.deepEqual(ctx.names(), ['host', 'port']);
  });

  it('leaves bound keys alone when filling defaults', () => {
    const { port } = keys();
    const ctx = new EvalContext();
    ctx.bind(port, 1);
    assert.deepEqual(ctx.fillDefaults([port]), []);
    assert.deepEqual(ctx.lookup(port), { some: true, value: 1 });
  });
});
