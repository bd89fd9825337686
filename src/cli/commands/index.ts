/**
 * CLI Commands Index
 *
 * Exports all CLI command implementations.
 *
 * @module cli/commands
 */

// Send command
export { runSend, prepareOffer, type SendCommandOptions } from './send.js';

// Recv command
export { runRecv, type RecvCommandOptions } from './recv.js';
