/**
 * Send command for the p2pdrop CLI.
 *
 * Offers one file to every peer on the local network and serves it to
 * whoever asks, until interrupted.
 *
 * @module cli/commands/send
 */

import React from 'react';
import { render } from 'ink';
import type { Stats } from 'fs';
import { stat } from 'fs/promises';
import { basename, resolve } from 'path';
import { App } from '../../ui/App.js';
import type { DropNode } from '../../engine/DropNode.js';
import {
  IOError,
  UserInputError,
  toError,
  type DropConfig,
  type LocalOffer,
} from '../../engine/types.js';
import { expandPath } from '../../utils/platform.js';
import { exitWithError, launchNode, stopOnExit } from '../utils/node.js';

// =============================================================================
// Types
// =============================================================================

export interface SendCommandOptions {
  /** Path of the file to offer */
  path: string;
  config: DropConfig;
}

// =============================================================================
// Offer Preparation
// =============================================================================

/**
 * Resolves `path` and checks that it names a readable regular file.
 *
 * The offer is declared under the file's base name.
 *
 * @throws {IOError} If the file cannot be inspected
 * @throws {UserInputError} If the path is not a regular file
 */
export async function prepareOffer(path: string): Promise<LocalOffer> {
  const resolved = resolve(expandPath(path));

  let stats: Stats;
  try {
    stats = await stat(resolved);
  } catch (err) {
    throw new IOError(`cannot read ${path}: ${toError(err).message}`, resolved, { cause: err });
  }

  if (!stats.isFile()) {
    throw new UserInputError(`${path} is not a regular file`, path);
  }

  return {
    path: resolved,
    fileName: basename(resolved),
    sizeBytes: stats.size,
  };
}

// =============================================================================
// Command Implementation
// =============================================================================

/**
 * Run the send command
 */
export async function runSend(options: SendCommandOptions): Promise<void> {
  const { config } = options;

  let node: DropNode;
  try {
    const offer = await prepareOffer(options.path);
    node = await launchNode(config, offer);
  } catch (err) {
    exitWithError(toError(err).message);
  }

  const instance = render(
    <App node={node} statusIntervalMs={config.statusIntervalMs} maxLogEntries={config.logCapacity} />,
    { exitOnCtrlC: true }
  );
  stopOnExit(node, instance);
}
