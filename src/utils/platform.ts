/**
 * Platform-specific utilities.
 *
 * Provides home-directory path expansion and the local user/host identity
 * announced to remote peers.
 *
 * @module utils/platform
 */

import { homedir, hostname, userInfo } from 'os';
import { resolve } from 'path';
import type { LocalIdentity } from '../engine/types.js';

/**
 * Expands a path that may contain ~ to the user's home directory.
 *
 * @param path - Path that may start with ~/ or ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  if (path.startsWith('~')) {
    return resolve(homedir(), path.slice(1));
  }
  return path;
}

/**
 * Gets the current user name.
 *
 * `os.userInfo()` throws when the uid has no passwd entry (common in
 * containers), in which case the USER/USERNAME variables are used.
 */
export function getUserName(env: NodeJS.ProcessEnv = process.env): string {
  try {
    return userInfo().username;
  } catch {
    return env.USER ?? env.USERNAME ?? 'unknown';
  }
}

/**
 * Gets the identity this machine announces: user name and host name.
 */
export function getLocalIdentity(): LocalIdentity {
  return {
    displayName: getUserName(),
    hostLabel: hostname(),
  };
}
