/**
 * Value expressions over keys.
 *
 * An expression is a constant, a reference to a key, or the application of an
 * expression yielding a function to an expression yielding its argument. The
 * shape alone tells which keys an expression needs, so the argument surface
 * can be built before any value is known. Interpreters live in interpret.ts.
 */

import type { Key } from './key.js';

export interface ConstExpr<T> {
  readonly kind: 'const';
  readonly value: T;
}

export interface KeyRefExpr<T> {
  readonly kind: 'key';
  readonly key: Key<T>;
}

/**
 * Receives the two halves of an application. Generic in the argument type,
 * which the application itself does not expose.
 */
export type ApplyVisitor<T, R> = <A>(fn: ValueExpr<(arg: A) => T>, arg: ValueExpr<A>) => R;

export interface ApplyExpr<T> {
  readonly kind: 'apply';
  open<R>(visit: ApplyVisitor<T, R>): R;
}

export type ValueExpr<T> = ConstExpr<T> | KeyRefExpr<T> | ApplyExpr<T>;

export function pure<T>(value: T): ValueExpr<T> {
  const expr: ConstExpr<T> = { kind: 'const', value };
  return Object.freeze(expr);
}

export function value<T>(key: Key<T>): ValueExpr<T> {
  const expr: KeyRefExpr<T> = { kind: 'key', key };
  return Object.freeze(expr);
}

export function app<A, B>(fn: ValueExpr<(arg: A) => B>, arg: ValueExpr<A>): ValueExpr<B> {
  const expr: ApplyExpr<B> = {
    kind: 'apply',
    open<R>(visit: ApplyVisitor<B, R>): R {
      return visit<A>(fn, arg);
    }
  };
  return Object.freeze(expr);
}

export const ap = app;

export function map<A, B>(f: (arg: A) => B, expr: ValueExpr<A>): ValueExpr<B> {
  return app(pure(f), expr);
}

export function lift2<A, B, C>(
  f: (a: A, b: B) => C,
  a: ValueExpr<A>,
  b: ValueExpr<B>
): ValueExpr<C> {
  return app(map((x: A) => (y: B) => f(x, y), a), b);
}
