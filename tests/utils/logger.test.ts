import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { levelForVerbosity, logger } from '../../src/utils/logger.js';
import { LogLevel } from '../../src/types/index.js';

describe('logger', () => {
  const initial = logger.getLevel();

  afterEach(() => {
    logger.setLevel(initial);
  });

  it('maps -v counts to levels', () => {
    assert.equal(levelForVerbosity(0), LogLevel.WARN);
    assert.equal(levelForVerbosity(1), LogLevel.INFO);
    assert.equal(levelForVerbosity(2), LogLevel.DEBUG);
    assert.equal(levelForVerbosity(5), LogLevel.DEBUG);
  });

  it('changes level at run time', () => {
    logger.setLevel(LogLevel.ERROR);
    assert.equal(logger.getLevel(), LogLevel.ERROR);
  });
});
