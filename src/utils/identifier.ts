import { IllegalIdentifierError } from './errors.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Turn a key or node name into a source identifier: characters outside
 * `[A-Za-z0-9_-]` are dropped and `-` becomes `_`.
 */
export function toIdentifier(input: string): string {
  const cleaned = input.replace(/[^A-Za-z0-9_-]/g, '').replace(/-/g, '_');
  if (cleaned.length === 0 || /^[0-9]/.test(cleaned)) {
    throw new IllegalIdentifierError(input);
  }
  return cleaned;
}

export function isIdentifier(input: string): boolean {
  return IDENTIFIER_PATTERN.test(input);
}

/** Property name as it may appear in an object literal. */
export function propertyName(name: string): string {
  return isIdentifier(name) ? name : JSON.stringify(name);
}
