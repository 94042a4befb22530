import { UnresolvedKeyError } from '../../utils/errors.js';
import { emitDoc } from './doc.js';
import type { EvalContext } from './eval-context.js';
import type { AnyKey } from './key.js';

/**
 * Source text reconstructing the value `key` is bound to in `ctx`
 * (not its default).
 */
export function serializeKey(key: AnyKey, ctx: EvalContext, nodeId?: number): string {
  const bound = ctx.lookup(key);
  if (!bound.some) {
    throw new UnresolvedKeyError(key.name, nodeId);
  }
  return key.descriptor.serialize(bound.value);
}

/**
 * One-line summary of a key. With a context, also shows the value it is bound
 * to and where that value came from.
 *
 * `port (integer, configure) default: 8080, value: 9000 (cli); HTTP port`
 */
export function describeKey(key: AnyKey, ctx?: EvalContext): string {
  const { descriptor } = key;
  const parts = [`default: ${descriptor.print(key.defaultValue)}`];
  if (ctx) {
    const bound = ctx.lookup(key);
    parts.push(bound.some ? `value: ${descriptor.print(bound.value)} (${ctx.sourceOf(key)})` : 'value: unset');
  }
  const summary = `${key.name} (${descriptor.description}, ${key.stage}) ${parts.join(', ')}`;
  return key.doc.help ? `${summary}; ${key.doc.help}` : summary;
}

/**
 * Help entry for a key:
 *
 * ```
 * --port=PORT
 *     HTTP port
 *     type: integer, stage: configure, default: 8080
 * ```
 */
export function emitKey(key: AnyKey): string {
  const details = `type: ${key.descriptor.description}, stage: ${key.stage}, default: ${key.descriptor.print(key.defaultValue)}`;
  return `${emitDoc(key.doc)}\n    ${details}`;
}
