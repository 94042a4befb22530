import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  boolDescriptor,
  intDescriptor,
  listDescriptor,
  stringDescriptor,
  type Descriptor
} from '../../../src/core/keys/descriptor.js';
import { ValidationError } from '../../../src/utils/errors.js';

function roundTrips<T>(descriptor: Descriptor<T>, value: T): void {
  assert.deepEqual(descriptor.parse(descriptor.print(value)), { ok: true, value });
}

describe('descriptors', () => {
  it('read back what they print', () => {
    roundTrips(stringDescriptor, 'info');
    roundTrips(stringDescriptor, '');
    roundTrips(intDescriptor, 8080);
    roundTrips(intDescriptor, -3);
    roundTrips(boolDescriptor, true);
    roundTrips(boolDescriptor, false);
    roundTrips(listDescriptor(intDescriptor), [1, 2, 3]);
    roundTrips(listDescriptor(intDescriptor), []);
    roundTrips(listDescriptor(stringDescriptor, ':'), ['a', 'b']);
  });

  describe('int', () => {
    it('accepts surrounding whitespace and a sign', () => {
      assert.deepEqual(intDescriptor.parse(' 42 '), { ok: true, value: 42 });
      assert.deepEqual(intDescriptor.parse('+7'), { ok: true, value: 7 });
    });

    it('rejects anything but digits', () => {
      assert.deepEqual(intDescriptor.parse('4.2'), { ok: false, error: "'4.2' is not an integer" });
      assert.deepEqual(intDescriptor.parse('abc'), { ok: false, error: "'abc' is not an integer" });
    });

    it('rejects integers it cannot represent exactly', () => {
      assert.deepEqual(intDescriptor.parse('99999999999999999999'), {
        ok: false,
        error: "'99999999999999999999' is out of range"
      });
    });

    it('recognises its own values', () => {
      assert.equal(intDescriptor.accepts(3), true);
      assert.equal(intDescriptor.accepts(1.5), false);
      assert.equal(intDescriptor.accepts('3'), false);
    });
  });

  describe('bool', () => {
    it('is case-insensitive', () => {
      assert.deepEqual(boolDescriptor.parse('TRUE'), { ok: true, value: true });
      assert.deepEqual(boolDescriptor.parse('False'), { ok: true, value: false });
    });

    it('rejects other words', () => {
      assert.deepEqual(boolDescriptor.parse('yes'), {
        ok: false,
        error: "'yes' is not a boolean (expected true or false)"
      });
    });
  });

  describe('list', () => {
    const ints = listDescriptor(intDescriptor);

    it('describes itself by its element type', () => {
      assert.equal(ints.description, 'integer list');
    });

    it('points at the element that failed', () => {
      assert.deepEqual(ints.parse('1,x'), { ok: false, error: "element 2: 'x' is not an integer" });
    });

    it('serializes to an array literal', () => {
      assert.equal(ints.serialize([1, 2]), '[1, 2]');
      assert.equal(listDescriptor(stringDescriptor).serialize(['a', 'b']), '["a", "b"]');
    });

    it('escapes separators and backslashes inside elements', () => {
      const strings = listDescriptor(stringDescriptor);
      assert.equal(strings.print(['a,b', 'c']), 'a\\,b,c');
      assert.equal(strings.print(['C:\\tmp']), 'C:\\\\tmp');
      assert.deepEqual(strings.parse('a\\,b,c'), { ok: true, value: ['a,b', 'c'] });
      roundTrips(strings, ['a,b', 'x\\', '']);
      roundTrips(listDescriptor(stringDescriptor, '::'), ['a::b', 'c']);
    });

    it('keeps a backslash that escapes nothing', () => {
      assert.deepEqual(listDescriptor(stringDescriptor).parse('C:\\tmp,d'), { ok: true, value: ['C:\\tmp', 'd'] });
    });

    it('reads the empty string as the empty list', () => {
      assert.deepEqual(listDescriptor(stringDescriptor).parse(''), { ok: true, value: [] });
    });

    it('needs a separator without backslashes', () => {
      assert.throws(() => listDescriptor(stringDescriptor, ''), ValidationError);
      assert.throws(() => listDescriptor(stringDescriptor, '\\'), ValidationError);
    });

    it('only accepts arrays of valid elements', () => {
      assert.equal(ints.accepts([1, 2]), true);
      assert.equal(ints.accepts([1, 'two']), false);
      assert.equal(ints.accepts(1), false);
    });
  });

  it('serializes strings as quoted literals', () => {
    assert.equal(stringDescriptor.serialize('say "hi"'), '"say \\"hi\\""');
  });
});
