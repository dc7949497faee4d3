/**
 * Config Directory Resolution
 *
 * Resolves the quarterscope config directory in order:
 * 1. QUARTERSCOPE_HOME environment variable
 * 2. ~/.quarterscope/ (default)
 *
 * quarterscope only reads from this directory; it never creates it.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const DEFAULT_DIR_NAME = '.quarterscope';

/**
 * Resolve the quarterscope config directory path.
 */
export function resolveConfigDir(): string {
  const envDir = process.env['QUARTERSCOPE_HOME'];
  if (envDir) {
    return envDir;
  }
  return join(homedir(), DEFAULT_DIR_NAME);
}

/** Resolve path to settings.json */
export function settingsPath(): string {
  return join(resolveConfigDir(), 'settings.json');
}

/** Default location of the dataset database when nothing else is configured. */
export function defaultDatasetPath(): string {
  return join(resolveConfigDir(), 'dataset.db');
}
