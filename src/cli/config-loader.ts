/**
 * Loading configuration modules
 *
 * A configuration module is an ES module whose default export is a
 * `ConfigDefinition`. It is named explicitly on the command line; nothing is
 * discovered.
 */

import { resolve } from 'path';
import { pathToFileURL } from 'url';
import type { ConfigDefinition, ConfigSession } from '../core/session.js';
import { ConfigError } from '../utils/errors.js';
import { isFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export async function loadConfigDefinition(file: string, cwd: string = process.cwd()): Promise<ConfigDefinition> {
  const path = resolve(cwd, file);
  if (!(await isFile(path))) {
    throw new ConfigError(`Configuration file not found: ${path}`, { path });
  }

  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(path).href);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load configuration ${path}: ${reason}`, { path });
  }

  const definition = typeof loaded === 'object' && loaded !== null && 'default' in loaded ? loaded.default : undefined;
  if (typeof definition !== 'function') {
    throw new ConfigError(`${path} must export a configuration function as its default export`, { path });
  }
  logger.debug(`Loaded configuration from ${path}`);

  return (session: ConfigSession): void => {
    const result: unknown = definition(session);
    if (result instanceof Promise) {
      throw new ConfigError(`The configuration function of ${path} must not be async`, { path });
    }
  };
}
