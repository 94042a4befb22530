/**
 * Common types and interfaces for keygraph
 */

// Key stages
export type Stage = 'configure' | 'run' | 'both';

/**
 * An optional value. Used instead of `T | undefined` wherever a resolved value
 * may itself legitimately be `undefined`.
 */
export type Option<T> = { some: true; value: T } | { some: false };

export const none: Option<never> = { some: false };

export function some<T>(value: T): Option<T> {
  return { some: true, value };
}

/**
 * Values a configurable may compute from its keys. Restricted to what the
 * source generator can print back as a literal.
 */
export type Literal = string | number | boolean | null | readonly Literal[];

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class KeygraphError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'KeygraphError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DUPLICATE_KEY_NAME = 'DUPLICATE_KEY_NAME',
  CYCLIC_GRAPH = 'CYCLIC_GRAPH',
  PARSE_FAILURE = 'PARSE_FAILURE',
  UNRESOLVED_KEY = 'UNRESOLVED_KEY',
  ILLEGAL_IDENTIFIER = 'ILLEGAL_IDENTIFIER',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
