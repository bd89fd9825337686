/**
 * Recv command for the p2pdrop CLI.
 *
 * Lists the offers announced on the local network and fetches the one the
 * operator picks by number. Exits after the first successful transfer, or
 * when standard input ends.
 *
 * @module cli/commands/recv
 */

import React from 'react';
import { render } from 'ink';
import { createInterface } from 'readline';
import { pushable } from 'it-pushable';
import { App } from '../../ui/App.js';
import type { DropNode } from '../../engine/DropNode.js';
import { toError, type DropConfig, type TransferResult } from '../../engine/types.js';
import { exitWithError, launchNode, stopOnExit } from '../utils/node.js';
import { errorMessage, formatTransferSummary, successMessage } from '../utils/output.js';

// =============================================================================
// Types
// =============================================================================

export interface RecvCommandOptions {
  config: DropConfig;
}

// =============================================================================
// Command Implementation
// =============================================================================

/**
 * Run the recv command
 *
 * With a terminal on stdin the selection is typed into the TUI's prompt;
 * otherwise stdin is read line by line.
 */
export async function runRecv(options: RecvCommandOptions): Promise<void> {
  const { config } = options;

  let node: DropNode;
  try {
    node = await launchNode(config);
  } catch (err) {
    exitWithError(toError(err).message);
  }

  const interactive = process.stdin.isTTY === true;
  const typed = pushable<string>({ objectMode: true });
  const reader = interactive ? null : createInterface({ input: process.stdin, crlfDelay: Infinity });

  const instance = render(
    <App
      node={node}
      statusIntervalMs={config.statusIntervalMs}
      maxLogEntries={config.logCapacity}
      onLine={interactive ? (line) => typed.push(line) : undefined}
    />,
    { exitOnCtrlC: true }
  );

  let result: TransferResult | null = null;
  let failure: Error | null = null;

  stopOnExit(node, instance, () => {
    reader?.close();
    if (failure) {
      process.stderr.write(`${errorMessage(failure.message)}\n`);
      process.exit(1);
    }
    if (result) {
      process.stdout.write(`${successMessage(formatTransferSummary(result))}\n`);
    }
    process.exit(0);
  });

  node
    .receive(reader ?? typed)
    .then((received) => {
      result = received;
      instance.unmount();
    })
    .catch((err: unknown) => {
      failure = toError(err);
      instance.unmount();
    });
}
