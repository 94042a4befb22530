/**
 * Console Output Adapter
 *
 * Written text goes to stdout untouched so it can be piped; status messages
 * go to stderr.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  write(text: string): void {
    process.stdout.write(text);
  },

  message(message: string): void {
    console.error(message);
  },

  success(message: string): void {
    console.error(`✓ ${message}`);
  },

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  error(message: string): void {
    console.error(`✗ ${message}`);
  },
};
