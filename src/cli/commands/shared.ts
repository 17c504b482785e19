import { loadConfig } from '../../config/config.js';
import type { Config } from '../../types/index.js';

export interface ConfigOption {
  config?: string;
}

/**
 * Load the configuration named by `-c/--config` (or the default file).
 * Prints the error and sets a failing exit code when it cannot be loaded.
 */
export function loadCliConfig(options: ConfigOption): Config | null {
  const result = loadConfig(options.config);
  if (!result.success) {
    console.error(`Error: ${result.error.message}`);
    process.exitCode = 1;
    return null;
  }
  return result.data;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
