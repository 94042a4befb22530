/**
 * Shared constants for keygraph
 */

export const KEYGRAPH_VERSION = '0.1.0';

export const ENV_VARS = {
  VERBOSE: 'KEYGRAPH_VERBOSE'
} as const;

export const STAGES = {
  CONFIGURE: 'configure',
  RUN: 'run',
  BOTH: 'both'
} as const;

export const DOC_SECTIONS = {
  /** Section used for keys created without an explicit one */
  KEYS: 'APPLICATION OPTIONS'
} as const;

export const DEFAULT_DOCV = 'VALUE';

/** Flags read by the keygraph commands themselves; keys cannot take them */
export const RESERVED_FLAGS: readonly string[] = [
  'h', 'help', 'v', 'verbose', 'V', 'version', 'f', 'file', 'o', 'output', 'eval', 'dot', 'stage'
];

export const GENERATED_SOURCE = {
  HEADER: '// Generated by keygraph. Do not edit.',
  RUNTIME_KEYS_EXPORT: 'runtimeKeys'
} as const;

export const DOT_STYLE = {
  GRAPH_NAME: 'keygraph',
  VERTEX_SHAPE: 'circle',
  CONFIGURABLE_SHAPE: 'box',
  APP_SHAPE: 'diamond',
  PRIMARY_EDGE: 'bold',
  ARGUMENT_EDGE: 'solid',
  DATA_EDGE: 'dashed'
} as const;
