import { RESERVED_FLAGS } from '../../constants/index.js';
import type { Stage } from '../../types/index.js';
import { DuplicateKeyNameError, ValidationError } from '../../utils/errors.js';
import { toIdentifier } from '../../utils/identifier.js';
import { logger } from '../../utils/logger.js';
import type { Descriptor } from './descriptor.js';
import { createDoc, toOption, type Doc } from './doc.js';
import type { AnyKey, Key } from './key.js';
import { KeySet } from './key-set.js';

export interface CreateKeyOptions<T> {
  doc?: string;
  stage?: Stage;
  defaultValue: T;
}

export interface CreateRawKeyOptions<T> {
  doc: Doc;
  stage: Stage;
  defaultValue: T;
}

/**
 * The keys of one configuration session.
 *
 * Names are unique within a registry. Each session creates its own registry,
 * so independent sessions (and tests) never see each other's keys. Beyond the
 * name, no two keys may share a flag, a parsed option attribute or a source
 * identifier, since each of those must lead back to exactly one key.
 */
export class KeyRegistry {
  private readonly keys = new Map<string, AnyKey>();
  private readonly flags = new Map<string, string>();
  private readonly attributes = new Map<string, string>();
  private readonly identifiers = new Map<string, string>();

  /**
   * Create a key whose only flag is its name.
   */
  create<T>(name: string, descriptor: Descriptor<T>, options: CreateKeyOptions<T>): Key<T> {
    const doc = createDoc({ doc: options.doc, docv: name.toUpperCase().replace(/-/g, '_') }, [name]);
    return this.createRaw(name, descriptor, {
      doc,
      stage: options.stage ?? 'both',
      defaultValue: options.defaultValue
    });
  }

  createRaw<T>(name: string, descriptor: Descriptor<T>, options: CreateRawKeyOptions<T>): Key<T> {
    if (this.keys.has(name)) {
      throw new DuplicateKeyNameError(name);
    }
    if (!descriptor.accepts(options.defaultValue)) {
      throw new ValidationError(`default value of key '${name}' is not a valid ${descriptor.description}`, { keyName: name });
    }
    this.checkDefaultReadsBack(name, descriptor, options.defaultValue);

    const identifier = toIdentifier(name);
    const attribute = toOption(options.doc).attributeName();
    for (const flag of options.doc.names) {
      if (RESERVED_FLAGS.includes(flag)) {
        throw new ValidationError(`flag '${flag}' of key '${name}' is reserved by keygraph`, { keyName: name, flag });
      }
      this.checkFree(this.flags, flag, name, `flag '${flag}'`);
    }
    this.checkFree(this.attributes, attribute, name, `option attribute '${attribute}'`);
    this.checkFree(this.identifiers, identifier, name, `identifier '${identifier}'`);

    const key: Key<T> = Object.freeze({
      name,
      identifier,
      stage: options.stage,
      defaultValue: options.defaultValue,
      doc: options.doc,
      descriptor
    });
    this.keys.set(name, key);
    options.doc.names.forEach(flag => this.flags.set(flag, name));
    this.attributes.set(attribute, name);
    this.identifiers.set(identifier, name);
    logger.debug(`Registered key '${name}' (${descriptor.description}, stage ${options.stage})`);
    return key;
  }

  has(name: string): boolean {
    return this.keys.has(name);
  }

  get(name: string): AnyKey | undefined {
    return this.keys.get(name);
  }

  get size(): number {
    return this.keys.size;
  }

  all(): KeySet {
    return new KeySet(this.keys.values());
  }

  private checkFree(taken: Map<string, string>, value: string, name: string, what: string): void {
    const owner = taken.get(value);
    if (owner !== undefined) {
      throw new ValidationError(`${what} of key '${name}' is already used by key '${owner}'`, { keyName: name, owner });
    }
  }

  // Comparing serialized source avoids a structural equality per type
  private checkDefaultReadsBack<T>(name: string, descriptor: Descriptor<T>, defaultValue: T): void {
    const printed = descriptor.print(defaultValue);
    const parsed = descriptor.parse(printed);
    if (!parsed.ok || descriptor.serialize(parsed.value) !== descriptor.serialize(defaultValue)) {
      throw new ValidationError(`default value of key '${name}' does not read back from '${printed}'`, { keyName: name });
    }
  }
}
