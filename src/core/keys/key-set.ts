import type { AnyKey } from './key.js';
import { compareKeys } from './key.js';

/**
 * Immutable set of keys, deduplicated by name and iterated in name order.
 * The first key seen for a name wins.
 */
export class KeySet implements Iterable<AnyKey> {
  static readonly empty = new KeySet([]);

  private readonly byName: ReadonlyMap<string, AnyKey>;
  private readonly ordered: readonly AnyKey[];

  constructor(keys: Iterable<AnyKey>) {
    const byName = new Map<string, AnyKey>();
    for (const key of keys) {
      if (!byName.has(key.name)) {
        byName.set(key.name, key);
      }
    }
    this.byName = byName;
    this.ordered = [...byName.values()].sort(compareKeys);
  }

  static of(...keys: AnyKey[]): KeySet {
    return new KeySet(keys);
  }

  get size(): number {
    return this.ordered.length;
  }

  has(key: AnyKey | string): boolean {
    return this.byName.has(typeof key === 'string' ? key : key.name);
  }

  get(name: string): AnyKey | undefined {
    return this.byName.get(name);
  }

  union(other: KeySet): KeySet {
    if (other.size === 0) return this;
    if (this.size === 0) return other;
    return new KeySet([...this.ordered, ...other.ordered]);
  }

  filter(predicate: (key: AnyKey) => boolean): KeySet {
    return new KeySet(this.ordered.filter(predicate));
  }

  names(): string[] {
    return this.ordered.map(key => key.name);
  }

  toArray(): AnyKey[] {
    return [...this.ordered];
  }

  [Symbol.iterator](): Iterator<AnyKey> {
    return this.ordered[Symbol.iterator]();
  }

  static unionAll(sets: Iterable<KeySet>): KeySet {
    let result = KeySet.empty;
    for (const set of sets) {
      result = result.union(set);
    }
    return result;
  }
}
