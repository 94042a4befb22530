import type { Stage } from '../../types/index.js';
import type { Descriptor } from './descriptor.js';
import type { Doc } from './doc.js';

/**
 * A named, typed, staged configuration setting.
 *
 * Keys are immutable; the value a key resolves to during a run lives in an
 * `EvalContext`. Two keys are the same key when their names are equal.
 */
export interface Key<T> {
  readonly name: string;
  /** `name` as a source identifier */
  readonly identifier: string;
  readonly stage: Stage;
  readonly defaultValue: T;
  readonly doc: Doc;
  readonly descriptor: Descriptor<T>;
}

export type AnyKey = Key<unknown>;

export function keyName(key: AnyKey): string {
  return key.name;
}

export function keyStage(key: AnyKey): Stage {
  return key.stage;
}

export function isRuntime(key: AnyKey): boolean {
  return key.stage === 'run' || key.stage === 'both';
}

export function isConfigure(key: AnyKey): boolean {
  return key.stage === 'configure' || key.stage === 'both';
}

export function sameKey(a: AnyKey, b: AnyKey): boolean {
  return a.name === b.name;
}

/** Code-point order on names; independent of locale. */
export function compareKeys(a: AnyKey, b: AnyKey): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Whether `key` belongs to the argument surface of `stage`.
 * `both` (or no filter) selects every key.
 */
export function matchesStage(key: AnyKey, stage: Stage | undefined): boolean {
  switch (stage) {
    case 'configure':
      return isConfigure(key);
    case 'run':
      return isRuntime(key);
    default:
      return true;
  }
}
