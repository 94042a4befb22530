import { KeygraphError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failures keygraph distinguishes
 */

export class DuplicateKeyNameError extends KeygraphError {
  constructor(keyName: string) {
    super(`Key '${keyName}' is already defined`, ErrorCodes.DUPLICATE_KEY_NAME, { keyName });
    this.name = 'DuplicateKeyNameError';
  }
}

export class CyclicGraphError extends KeygraphError {
  readonly nodeIds: number[];
  readonly nodeNames: string[];

  /**
   * @param nodeIds - the nodes of the cycle, in edge order, without repeating the first
   */
  constructor(nodeIds: number[], nodeNames: string[]) {
    const path = [...nodeNames, nodeNames[0] ?? ''].join(' -> ');
    super(`Cyclic graph: ${path}`, ErrorCodes.CYCLIC_GRAPH, { nodeIds, nodeNames });
    this.name = 'CyclicGraphError';
    this.nodeIds = nodeIds;
    this.nodeNames = nodeNames;
  }
}

export class ParseFailureError extends KeygraphError {
  readonly keyName: string;
  readonly input: string;
  readonly reason: string;

  constructor(keyName: string, input: string, reason: string) {
    super(`Invalid value for key '${keyName}': ${reason}`, ErrorCodes.PARSE_FAILURE, { keyName, input, reason });
    this.name = 'ParseFailureError';
    this.keyName = keyName;
    this.input = input;
    this.reason = reason;
  }
}

/**
 * Raised once all keys have been read, carrying every per-key failure.
 */
export class KeyParseError extends KeygraphError {
  readonly failures: ParseFailureError[];

  constructor(failures: ParseFailureError[]) {
    const names = failures.map(failure => failure.keyName).join(', ');
    super(`Could not parse ${failures.length} key value(s): ${names}`, ErrorCodes.PARSE_FAILURE, { keys: names });
    this.name = 'KeyParseError';
    this.failures = failures;
  }
}

/**
 * An expression reached a key with no bound value after defaults were filled.
 * Always a defect in graph construction, never a user error.
 */
export class UnresolvedKeyError extends KeygraphError {
  readonly keyName: string;
  readonly nodeId?: number;

  constructor(keyName: string, nodeId?: number) {
    const where = nodeId === undefined ? '' : ` (node ${nodeId})`;
    super(`Internal error: key '${keyName}' has no resolved value${where}`, ErrorCodes.UNRESOLVED_KEY, { keyName, nodeId });
    this.name = 'UnresolvedKeyError';
    this.keyName = keyName;
    this.nodeId = nodeId;
  }
}

export class IllegalIdentifierError extends KeygraphError {
  constructor(input: string) {
    super(`'${input}' cannot be turned into an identifier`, ErrorCodes.ILLEGAL_IDENTIFIER, { input });
    this.name = 'IllegalIdentifierError';
  }
}

export class ValidationError extends KeygraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends KeygraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class FileSystemError extends KeygraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof UnresolvedKeyError) {
    // Defects are logged loudly regardless of verbosity
    logger.error(error.message, { code: error.code, details: error.details, stack: error.stack });
    return { success: false, error: error.message };
  }
  if (error instanceof KeyParseError) {
    logger.debug(error.message, { code: error.code });
    return {
      success: false,
      error: error.failures.map(failure => failure.message).join('\n')
    };
  }
  if (error instanceof KeygraphError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return { success: false, error: error.message };
  }
  if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return { success: false, error: error.message };
  }
  logger.debug('Unknown error occurred', { error });
  return { success: false, error: 'An unknown error occurred' };
}

/**
 * Wrap a command action so any failure prints one line to stderr and exits 1
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
