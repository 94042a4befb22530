import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isIdentifier, propertyName, toIdentifier } from '../../src/utils/identifier.js';
import { IllegalIdentifierError } from '../../src/utils/errors.js';

describe('toIdentifier', () => {
  it('replaces dashes with underscores', () => {
    assert.equal(toIdentifier('log-level'), 'log_level');
  });

  it('drops characters that cannot appear in an identifier', () => {
    assert.equal(toIdentifier('a.b c'), 'abc');
    assert.equal(toIdentifier('http:server'), 'httpserver');
  });

  it('keeps names that are already identifiers', () => {
    assert.equal(toIdentifier('port'), 'port');
    assert.equal(toIdentifier('_private2'), '_private2');
  });

  it('rejects names that leave nothing usable', () => {
    assert.throws(() => toIdentifier('...'), IllegalIdentifierError);
    assert.throws(() => toIdentifier(''), IllegalIdentifierError);
  });

  it('rejects names starting with a digit', () => {
    assert.throws(() => toIdentifier('9lives'), {
      name: 'IllegalIdentifierError',
      message: "'9lives' cannot be turned into an identifier"
    });
  });
});

describe('propertyName', () => {
  it('leaves identifiers bare and quotes anything else', () => {
    assert.equal(isIdentifier('log_level'), true);
    assert.equal(propertyName('log_level'), 'log_level');
    assert.equal(propertyName('a-b'), '"a-b"');
  });
});
