/**
 * Default configuration values for a p2pdrop node.
 *
 * @module engine/config/defaults
 */

import type { DropConfig, PartialDropConfig } from '../types.js';
import { expandPath } from '../../utils/platform.js';

/**
 * Default node configuration.
 *
 * - Listen on every IPv4 interface on a random TCP port
 * - Give a stalled remote 30 seconds before a stream is abandoned
 * - Refresh the status display once per second, keeping the last 10 lines
 * - Save received files to the current working directory
 */
export const DEFAULT_CONFIG: DropConfig = {
  listenAddresses: ['/ip4/0.0.0.0/tcp/0'],

  streamTimeoutMs: 30_000,

  statusIntervalMs: 1000,

  logCapacity: 10,

  /** Resolved when the defaults are merged, so a chdir before startup is honoured */
  downloadPath: '.',

  mdnsIntervalMs: 5000,
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(partialConfig?: PartialDropConfig): DropConfig {
  const merged: DropConfig = {
    ...DEFAULT_CONFIG,
    ...partialConfig,
    listenAddresses: [...(partialConfig?.listenAddresses ?? DEFAULT_CONFIG.listenAddresses)],
  };

  if (merged.downloadPath === DEFAULT_CONFIG.downloadPath) {
    merged.downloadPath = process.cwd();
  }

  return merged;
}

/**
 * Parses a strictly positive integer, or returns undefined.
 */
function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

/**
 * Reads configuration overrides from environment variables.
 *
 * | Variable                      | Field             |
 * |-------------------------------|-------------------|
 * | `P2PDROP_LISTEN`              | `listenAddresses` (comma-separated) |
 * | `P2PDROP_STREAM_TIMEOUT_MS`   | `streamTimeoutMs` |
 * | `P2PDROP_STATUS_INTERVAL_MS`  | `statusIntervalMs` |
 * | `P2PDROP_LOG_CAPACITY`        | `logCapacity`     |
 * | `P2PDROP_LOG_FILE`            | `logFile`         |
 * | `P2PDROP_DOWNLOAD_PATH`       | `downloadPath`    |
 * | `P2PDROP_MDNS_INTERVAL_MS`    | `mdnsIntervalMs`  |
 *
 * Numeric values that are not positive integers are ignored.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PartialDropConfig {
  const config: PartialDropConfig = {};

  const listen = env.P2PDROP_LISTEN
    ?.split(',')
    .map((addr) => addr.trim())
    .filter((addr) => addr.length > 0);
  if (listen && listen.length > 0) {
    config.listenAddresses = listen;
  }

  const numericFields = [
    ['P2PDROP_STREAM_TIMEOUT_MS', 'streamTimeoutMs'],
    ['P2PDROP_STATUS_INTERVAL_MS', 'statusIntervalMs'],
    ['P2PDROP_LOG_CAPACITY', 'logCapacity'],
    ['P2PDROP_MDNS_INTERVAL_MS', 'mdnsIntervalMs'],
  ] as const;

  for (const [variable, field] of numericFields) {
    const value = parsePositiveInt(env[variable]);
    if (value !== undefined) {
      config[field] = value;
    }
  }

  if (env.P2PDROP_LOG_FILE) {
    config.logFile = expandPath(env.P2PDROP_LOG_FILE);
  }

  if (env.P2PDROP_DOWNLOAD_PATH) {
    config.downloadPath = expandPath(env.P2PDROP_DOWNLOAD_PATH);
  }

  return config;
}
