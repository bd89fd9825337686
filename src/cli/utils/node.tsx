/**
 * Shared startup and shutdown for the send and recv commands.
 *
 * @module cli/utils/node
 */

import React from 'react';
import { Box, Text, render, type Instance } from 'ink';
import { DropNode } from '../../engine/DropNode.js';
import { ActivityLog } from '../../engine/log.js';
import { Libp2pTransport } from '../../engine/transport/libp2p.js';
import { toError, type DropConfig, type LocalOffer } from '../../engine/types.js';
import { getLocalIdentity } from '../../utils/platform.js';
import { APP_NAME } from '../../shared/constants.js';
import { errorMessage } from './output.js';

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
export function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">{APP_NAME} --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

/**
 * Shows an error and exits with status 1.
 */
export function exitWithError(message: string): never {
  render(<ErrorDisplay message={message} />);
  process.exit(1);
}

// =============================================================================
// Node Lifecycle
// =============================================================================

/**
 * Creates the libp2p transport and a node on top of it, and starts it.
 *
 * @throws {TransportInitError} If the transport cannot be created or started
 */
export async function launchNode(config: DropConfig, offer?: LocalOffer): Promise<DropNode> {
  const log = new ActivityLog({ capacity: config.logCapacity, logFile: config.logFile });
  const transport = await Libp2pTransport.create(config, log);
  const node = new DropNode({
    transport,
    identity: getLocalIdentity(),
    offer,
    config,
    log,
  });

  await node.start();
  for (const address of transport.addresses) {
    log.info(`listening on ${address}`);
  }
  return node;
}

/**
 * Stops the node once the TUI exits, whether through Ctrl+C in raw mode,
 * SIGINT, SIGTERM or `instance.unmount()`.
 *
 * @param onStopped - Runs after the node has stopped; exits with 0 when omitted
 */
export function stopOnExit(
  node: DropNode,
  instance: Instance,
  onStopped: () => void = () => process.exit(0)
): void {
  const unmount = () => instance.unmount();
  process.once('SIGINT', unmount);
  process.once('SIGTERM', unmount);

  instance
    .waitUntilExit()
    .then(() => node.stop())
    .then(onStopped)
    .catch((err: unknown) => {
      process.stderr.write(`${errorMessage(`error while stopping: ${toError(err).message}`)}\n`);
      process.exit(1);
    });
}
