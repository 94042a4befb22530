/**
 * Interpreters for value expressions: a structural one (`deps`) and two
 * evaluating ones (`peek`, `evalValue`).
 */

import { none, some, type Option } from '../../types/index.js';
import { UnresolvedKeyError } from '../../utils/errors.js';
import type { EvalContext } from './eval-context.js';
import { KeySet } from './key-set.js';
import type { ValueExpr } from './value.js';

const depsCache = new WeakMap<ValueExpr<unknown>, KeySet>();

/**
 * Every key referenced anywhere in `expr`.
 */
export function deps<T>(expr: ValueExpr<T>): KeySet {
  const cached = depsCache.get(expr);
  if (cached) return cached;
  const result = collectDeps(expr);
  depsCache.set(expr, result);
  return result;
}

function collectDeps<T>(expr: ValueExpr<T>): KeySet {
  switch (expr.kind) {
    case 'const':
      return KeySet.empty;
    case 'key':
      return KeySet.of(expr.key);
    case 'apply':
      return expr.open(<A>(fn: ValueExpr<(arg: A) => T>, arg: ValueExpr<A>) => deps(fn).union(deps(arg)));
  }
}

/**
 * Evaluate `expr` using only keys already bound in `ctx`. Yields nothing when
 * a reachable key is unbound; defaults are never consulted.
 */
export function peek<T>(expr: ValueExpr<T>, ctx: EvalContext): Option<T> {
  switch (expr.kind) {
    case 'const':
      return some(expr.value);
    case 'key':
      return ctx.lookup(expr.key);
    case 'apply':
      return expr.open(<A>(fn: ValueExpr<(arg: A) => T>, arg: ValueExpr<A>): Option<T> => {
        const f = peek(fn, ctx);
        if (!f.some) return none;
        const x = peek(arg, ctx);
        if (!x.some) return none;
        return some(f.value(x.value));
      });
  }
}

export interface EvalOrigin {
  nodeId?: number;
}

/**
 * Evaluate `expr`; every reachable key must already be bound.
 * @throws UnresolvedKeyError when one is not
 */
export function evalValue<T>(expr: ValueExpr<T>, ctx: EvalContext, origin: EvalOrigin = {}): T {
  switch (expr.kind) {
    case 'const':
      return expr.value;
    case 'key': {
      const bound = ctx.lookup(expr.key);
      if (!bound.some) {
        throw new UnresolvedKeyError(expr.key.name, origin.nodeId);
      }
      return bound.value;
    }
    case 'apply':
      return expr.open(<A>(fn: ValueExpr<(arg: A) => T>, arg: ValueExpr<A>): T =>
        evalValue(fn, ctx, origin)(evalValue(arg, ctx, origin))
      );
  }
}
