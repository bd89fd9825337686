/**
 * Tests for configuration defaults and environment overrides.
 */

import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { resolve } from 'path';
import {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  mergeWithDefaults,
} from '../../src/engine/config/index.js';

describe('mergeWithDefaults', () => {
  it('fills every field from the defaults', () => {
    const config = mergeWithDefaults();
    expect(config.listenAddresses).toEqual(['/ip4/0.0.0.0/tcp/0']);
    expect(config.streamTimeoutMs).toBe(30_000);
    expect(config.statusIntervalMs).toBe(1000);
    expect(config.logCapacity).toBe(10);
    expect(config.mdnsIntervalMs).toBe(5000);
    expect(config.logFile).toBeUndefined();
  });

  it('resolves the default download path to the working directory', () => {
    expect(mergeWithDefaults().downloadPath).toBe(process.cwd());
  });

  it('keeps explicit values', () => {
    const config = mergeWithDefaults({ downloadPath: '/tmp/in', streamTimeoutMs: 50 });
    expect(config.downloadPath).toBe('/tmp/in');
    expect(config.streamTimeoutMs).toBe(50);
    expect(config.logCapacity).toBe(10);
  });

  it('does not share the listen address array with the defaults', () => {
    const config = mergeWithDefaults();
    config.listenAddresses.push('/ip4/127.0.0.1/tcp/4001');
    expect(DEFAULT_CONFIG.listenAddresses).toEqual(['/ip4/0.0.0.0/tcp/0']);
  });
});

describe('loadConfigFromEnv', () => {
  it('returns nothing for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it('reads every supported variable', () => {
    const config = loadConfigFromEnv({
      P2PDROP_LISTEN: '/ip4/127.0.0.1/tcp/4001, /ip6/::1/tcp/4001',
      P2PDROP_STREAM_TIMEOUT_MS: '2500',
      P2PDROP_STATUS_INTERVAL_MS: '250',
      P2PDROP_LOG_CAPACITY: '20',
      P2PDROP_LOG_FILE: '/var/tmp/drop.log',
      P2PDROP_DOWNLOAD_PATH: '/srv/incoming',
      P2PDROP_MDNS_INTERVAL_MS: '1000',
    });

    expect(config).toEqual({
      listenAddresses: ['/ip4/127.0.0.1/tcp/4001', '/ip6/::1/tcp/4001'],
      streamTimeoutMs: 2500,
      statusIntervalMs: 250,
      logCapacity: 20,
      logFile: '/var/tmp/drop.log',
      downloadPath: '/srv/incoming',
      mdnsIntervalMs: 1000,
    });
  });

  it('ignores numbers that are not positive integers', () => {
    const config = loadConfigFromEnv({
      P2PDROP_STREAM_TIMEOUT_MS: 'soon',
      P2PDROP_LOG_CAPACITY: '0',
      P2PDROP_STATUS_INTERVAL_MS: '-5',
      P2PDROP_MDNS_INTERVAL_MS: '1.5',
    });
    expect(config).toEqual({});
  });

  it('ignores an empty listen list', () => {
    expect(loadConfigFromEnv({ P2PDROP_LISTEN: ' , ' })).toEqual({});
  });

  it('expands ~ in paths', () => {
    const config = loadConfigFromEnv({ P2PDROP_DOWNLOAD_PATH: '~/Downloads' });
    expect(config.downloadPath).toBe(resolve(homedir(), 'Downloads'));
  });
});
