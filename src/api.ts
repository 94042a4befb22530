/**
 * Library entry point: what configuration modules and build glue import.
 */

export type { Stage, Literal, Option, CommandResult } from './types/index.js';
export { KeygraphError, ErrorCodes, LogLevel, none, some } from './types/index.js';
export {
  DuplicateKeyNameError,
  CyclicGraphError,
  ParseFailureError,
  KeyParseError,
  UnresolvedKeyError,
  IllegalIdentifierError,
  ValidationError,
  ConfigError,
  FileSystemError,
  handleError
} from './utils/errors.js';
export { toIdentifier } from './utils/identifier.js';

export * from './core/keys/index.js';
export * from './core/graph/index.js';
export * from './core/pipelines/index.js';
export type { SessionKeyOptions, ConfigDefinition, BuiltConfiguration } from './core/session.js';
export { ConfigSession, buildGraph } from './core/session.js';
export { loadConfigDefinition } from './cli/config-loader.js';
export * from './core/ports/index.js';
