import { none, some, type Option } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { AnyKey, Key } from './key.js';

/**
 * Where a bound value came from.
 * - 'cli'      => read from command-line arguments
 * - 'default'  => the key's default, filled before full evaluation
 * - 'explicit' => bound programmatically
 */
export type BindingSource = 'cli' | 'default' | 'explicit';

interface Cell {
  value: unknown;
  source: BindingSource;
}

/**
 * Resolved key values for one evaluation run. Each key is bound at most once.
 */
export class EvalContext {
  private readonly cells = new Map<string, Cell>();

  bind<T>(key: Key<T>, value: T, source: BindingSource = 'explicit'): void {
    const existing = this.cells.get(key.name);
    if (existing) {
      throw new ValidationError(`key '${key.name}' is already bound (from ${existing.source})`, { keyName: key.name });
    }
    if (!key.descriptor.accepts(value)) {
      throw new ValidationError(`value for key '${key.name}' is not a valid ${key.descriptor.description}`, { keyName: key.name });
    }
    this.cells.set(key.name, { value, source });
  }

  lookup<T>(key: Key<T>): Option<T> {
    const cell = this.cells.get(key.name);
    if (!cell) return none;
    const { value } = cell;
    if (!key.descriptor.accepts(value)) {
      // Same name bound through a key of another type
      throw new ValidationError(`value bound to '${key.name}' is not a valid ${key.descriptor.description}`, { keyName: key.name });
    }
    return some(value);
  }

  has(key: AnyKey | string): boolean {
    return this.cells.has(typeof key === 'string' ? key : key.name);
  }

  sourceOf(key: AnyKey | string): BindingSource | undefined {
    return this.cells.get(typeof key === 'string' ? key : key.name)?.source;
  }

  /** Bound by the user rather than by default filling. */
  isUserSet(key: AnyKey | string): boolean {
    const source = this.sourceOf(key);
    return source === 'cli' || source === 'explicit';
  }

  /**
   * Bind every unbound key in `keys` to its default.
   * @returns the keys that were filled
   */
  fillDefaults(keys: Iterable<AnyKey>): AnyKey[] {
    const filled: AnyKey[] = [];
    for (const key of keys) {
      if (this.cells.has(key.name)) continue;
      this.bind(key, key.defaultValue, 'default');
      filled.push(key);
    }
    if (filled.length > 0) {
      logger.debug(`Filled defaults for ${filled.length} key(s)`, { keys: filled.map(key => key.name) });
    }
    return filled;
  }

  names(): string[] {
    return [...this.cells.keys()].sort();
  }
}
