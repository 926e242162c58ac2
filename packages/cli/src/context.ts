/**
 * Configuration for CLI commands
 */

import { ConfigError, defaultConfig, loadConfig, type WaypostConfig } from '@waypost/core';
import { printError } from './output.js';

/**
 * Config from the working directory, or the defaults. Returns null after
 * reporting an invalid file.
 */
export async function loadCliConfig(cwd: string = process.cwd()): Promise<WaypostConfig | null> {
  try {
    return (await loadConfig(cwd)) ?? defaultConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      printError(`${err.message}${err.issues.length > 0 ? `:\n  ${err.issues.join('\n  ')}` : ''}`);
      return null;
    }
    throw err;
  }
}
