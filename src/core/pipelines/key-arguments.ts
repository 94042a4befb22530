import type { Stage } from '../../types/index.js';
import { KeyParseError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { applyTermResult, term, type TermResult } from '../keys/cli-term.js';
import type { EvalContext } from '../keys/eval-context.js';
import type { KeySet } from '../keys/key-set.js';

/**
 * Read the values of `keys` from `argv` and bind them into `ctx`.
 *
 * Every key is read before anything is bound; if any value fails to parse,
 * nothing is bound and all failures are raised together.
 */
export function bindKeyArguments(
  ctx: EvalContext,
  keys: KeySet,
  argv: readonly string[],
  stage?: Stage
): TermResult {
  const result = term(stage, keys).parse(argv);
  if (result.failures.length > 0) {
    throw new KeyParseError(result.failures);
  }
  applyTermResult(ctx, result);
  if (result.bindings.length > 0) {
    logger.info(`Read ${result.bindings.length} key value(s) from arguments`, {
      keys: result.bindings.map(binding => binding.key.name)
    });
  }
  return result;
}
