import type { Literal } from '../../types/index.js';

/** JavaScript source for a literal value. */
export function printLiteral(value: Literal): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
      return String(value);
    default:
      return `[${value.map(printLiteral).join(', ')}]`;
  }
}
