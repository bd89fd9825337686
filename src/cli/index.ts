#!/usr/bin/env node
/**
 * p2pdrop CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the appropriate command implementations.
 *
 * @module cli
 */

import meow from 'meow';
import { APP_NAME, VERSION } from '../shared/constants.js';
import { runRecv, runSend } from './commands/index.js';
import { resolveConfig } from './utils/config.js';
import { exitWithError } from './utils/node.js';
import { errorMessage } from './utils/output.js';
import { toError } from '../engine/types.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ ${APP_NAME} <command> [options]

  Commands
    send <path>         Offer a file to peers on the local network
    recv                List offers and fetch one by number

  Options
    --version, -v       Show version
    --help, -h          Show help
    --download-path, -o Directory received files are saved to (recv)
    --listen, -l        Listen multiaddr (repeatable)
    --timeout, -t       Stream timeout in milliseconds
    --log-file          Append every log line to a file

  Environment
    P2PDROP_LISTEN, P2PDROP_STREAM_TIMEOUT_MS, P2PDROP_STATUS_INTERVAL_MS,
    P2PDROP_LOG_CAPACITY, P2PDROP_LOG_FILE, P2PDROP_DOWNLOAD_PATH,
    P2PDROP_MDNS_INTERVAL_MS

  Examples
    $ ${APP_NAME} send ./report.pdf
    $ ${APP_NAME} recv
    $ ${APP_NAME} recv -o ~/Downloads
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      downloadPath: {
        type: 'string',
        shortFlag: 'o',
      },
      listen: {
        type: 'string',
        shortFlag: 'l',
        isMultiple: true,
      },
      timeout: {
        type: 'number',
        shortFlag: 't',
      },
      logFile: {
        type: 'string',
      },
    },
  }
);

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Route the command to the appropriate handler
 */
async function routeCommand(): Promise<void> {
  const [command, ...args] = cli.input;
  const flags = cli.flags;

  // Handle version flag
  if (flags.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (!command) {
    cli.showHelp(0);
    return;
  }

  const config = resolveConfig({
    listen: flags.listen,
    downloadPath: flags.downloadPath,
    timeout: flags.timeout,
    logFile: flags.logFile,
  });

  switch (command.toLowerCase()) {
    case 'send': {
      const path = args[0];
      if (!path) {
        exitWithError('Missing file path. Use \'p2pdrop send <path>\'');
      }
      await runSend({ path, config });
      break;
    }

    case 'recv':
    case 'receive': {
      await runRecv({ config });
      break;
    }

    default: {
      exitWithError(`Unknown command: ${command}`);
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand().catch((err: unknown) => {
  process.stderr.write(`${errorMessage(toError(err).message)}\n`);
  process.exit(1);
});
