/**
 * Resolves the node configuration from defaults, environment and flags.
 *
 * Precedence, lowest first: built-in defaults, `P2PDROP_*` environment
 * variables, command-line flags.
 *
 * @module cli/utils/config
 */

import { loadConfigFromEnv, mergeWithDefaults } from '../../engine/config/index.js';
import type { DropConfig, PartialDropConfig } from '../../engine/types.js';
import { expandPath } from '../../utils/platform.js';

/**
 * Flags that override configuration.
 */
export interface ConfigFlags {
  listen?: string[];
  downloadPath?: string;
  timeout?: number;
  logFile?: string;
}

export function resolveConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env
): DropConfig {
  const overrides: PartialDropConfig = { ...loadConfigFromEnv(env) };

  if (flags.listen && flags.listen.length > 0) {
    overrides.listenAddresses = flags.listen;
  }
  if (flags.downloadPath) {
    overrides.downloadPath = expandPath(flags.downloadPath);
  }
  if (flags.timeout !== undefined && Number.isInteger(flags.timeout) && flags.timeout > 0) {
    overrides.streamTimeoutMs = flags.timeout;
  }
  if (flags.logFile) {
    overrides.logFile = expandPath(flags.logFile);
  }

  return mergeWithDefaults(overrides);
}
