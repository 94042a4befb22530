/**
 * Command-line presentation of a key: the section it is listed under, the
 * placeholder shown for its value, its help text and its flag names.
 */

import { Option } from 'commander';
import { DEFAULT_DOCV, DOC_SECTIONS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';

export interface Doc {
  readonly section: string;
  readonly docv: string;
  readonly help?: string;
  readonly names: readonly string[];
}

export interface DocOptions {
  docs?: string;
  docv?: string;
  doc?: string;
}

export function createDoc(options: DocOptions, names: readonly string[]): Doc {
  if (names.length === 0) {
    throw new ValidationError('a doc needs at least one flag name');
  }
  const short = names.filter(name => name.length === 1);
  const long = names.filter(name => name.length > 1);
  // commander takes one short and one long flag per option
  if (short.length > 1 || long.length > 1) {
    throw new ValidationError(`too many flag names: ${names.join(', ')}`, { names: [...names] });
  }
  for (const name of names) {
    if (!/^[A-Za-z0-9][A-Za-z0-9_-]*$/.test(name)) {
      throw new ValidationError(`'${name}' is not a valid flag name`);
    }
  }
  return Object.freeze({
    section: options.docs ?? DOC_SECTIONS.KEYS,
    docv: options.docv ?? DEFAULT_DOCV,
    help: options.doc,
    names: Object.freeze([...short, ...long])
  });
}

/** `-p, --port <PORT>` */
export function docFlags(doc: Doc): string {
  const flags = doc.names.map(name => (name.length === 1 ? `-${name}` : `--${name}`));
  return `${flags.join(', ')} <${doc.docv}>`;
}

export function toOption(doc: Doc): Option {
  return new Option(docFlags(doc), doc.help ?? '');
}

/**
 * Documentation text for a doc, in the layout of a manual page entry.
 */
export function emitDoc(doc: Doc): string {
  const head = doc.names
    .map(name => (name.length === 1 ? `-${name} ${doc.docv}` : `--${name}=${doc.docv}`))
    .join(', ');
  return doc.help ? `${head}\n    ${doc.help}` : head;
}
