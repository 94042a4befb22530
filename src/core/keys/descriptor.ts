/**
 * Value-type descriptors.
 *
 * A descriptor is everything keygraph knows about the type of a key: how to
 * read it from the command line, how to show it back, how to write it as
 * JavaScript source, and how to recognise one of its values at run time.
 */

import { ValidationError } from '../../utils/errors.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface Converter<T> {
  parse(raw: string): ParseResult<T>;
  print(value: T): string;
}

export interface Descriptor<T> extends Converter<T> {
  readonly description: string;
  /** Source text that evaluates to `value`. */
  serialize(value: T): string;
  accepts(value: unknown): value is T;
}

export interface DescriptorOptions<T> {
  serialize: (value: T) => string;
  converter: Converter<T>;
  description: string;
  accepts: (value: unknown) => value is T;
}

export function createDescriptor<T>(options: DescriptorOptions<T>): Descriptor<T> {
  const { serialize, converter, description, accepts } = options;
  return Object.freeze({
    description,
    parse: (raw: string) => converter.parse(raw),
    print: (value: T) => converter.print(value),
    serialize,
    accepts
  });
}

export const stringDescriptor: Descriptor<string> = createDescriptor<string>({
  description: 'string',
  serialize: value => JSON.stringify(value),
  converter: {
    parse: raw => ({ ok: true, value: raw }),
    print: value => value
  },
  accepts: (value: unknown): value is string => typeof value === 'string'
});

export const intDescriptor: Descriptor<number> = createDescriptor<number>({
  description: 'integer',
  serialize: value => String(value),
  converter: {
    parse: raw => {
      const trimmed = raw.trim();
      if (!/^[+-]?\d+$/.test(trimmed)) {
        return { ok: false, error: `'${raw}' is not an integer` };
      }
      const value = Number(trimmed);
      if (!Number.isSafeInteger(value)) {
        return { ok: false, error: `'${raw}' is out of range` };
      }
      return { ok: true, value };
    },
    print: value => String(value)
  },
  accepts: (value: unknown): value is number => typeof value === 'number' && Number.isSafeInteger(value)
});

export const boolDescriptor: Descriptor<boolean> = createDescriptor<boolean>({
  description: 'boolean',
  serialize: value => String(value),
  converter: {
    parse: raw => {
      switch (raw.trim().toLowerCase()) {
        case 'true':
          return { ok: true, value: true };
        case 'false':
          return { ok: true, value: false };
        default:
          return { ok: false, error: `'${raw}' is not a boolean (expected true or false)` };
      }
    },
    print: value => String(value)
  },
  accepts: (value: unknown): value is boolean => typeof value === 'boolean'
});

const ESCAPE = '\\';

function escapeElement(text: string, separator: string): string {
  return text.split(ESCAPE).join(ESCAPE + ESCAPE).split(separator).join(ESCAPE + separator);
}

/**
 * Split on unescaped separators. A backslash escapes a separator or another
 * backslash; before anything else it is kept as it is.
 */
function splitElements(raw: string, separator: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let index = 0;
  while (index < raw.length) {
    if (raw.startsWith(ESCAPE + ESCAPE, index)) {
      current += ESCAPE;
      index += 2;
    } else if (raw.startsWith(ESCAPE + separator, index)) {
      current += separator;
      index += 1 + separator.length;
    } else if (raw.startsWith(separator, index)) {
      tokens.push(current);
      current = '';
      index += separator.length;
    } else {
      current += raw.charAt(index);
      index += 1;
    }
  }
  tokens.push(current);
  return tokens;
}

/**
 * Sequence of `element` values, read from `separator`-delimited tokens.
 * The empty string reads as the empty list; `\,` stands for a literal
 * separator inside an element.
 */
export function listDescriptor<T>(element: Descriptor<T>, separator: string = ','): Descriptor<T[]> {
  if (separator === '' || separator.includes(ESCAPE)) {
    throw new ValidationError(`'${separator}' cannot separate list elements`);
  }
  return createDescriptor<T[]>({
    description: `${element.description} list`,
    serialize: values => `[${values.map(value => element.serialize(value)).join(', ')}]`,
    converter: {
      parse: raw => {
        if (raw === '') return { ok: true, value: [] };
        const values: T[] = [];
        for (const [index, token] of splitElements(raw, separator).entries()) {
          const parsed = element.parse(token);
          if (!parsed.ok) {
            return { ok: false, error: `element ${index + 1}: ${parsed.error}` };
          }
          values.push(parsed.value);
        }
        return { ok: true, value: values };
      },
      print: values => values.map(value => escapeElement(element.print(value), separator)).join(separator)
    },
    accepts: (value: unknown): value is T[] => Array.isArray(value) && value.every(item => element.accepts(item))
  });
}
