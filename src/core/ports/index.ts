/**
 * Core Ports
 *
 * Re-exports the port interfaces and default implementations that sit
 * between the pipelines and the terminal.
 */

export type { OutputPort } from './output.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
