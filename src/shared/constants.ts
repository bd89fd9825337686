/**
 * Constants shared by the engine, the UI and the CLI.
 *
 * @module shared/constants
 */

/** Application name, shown in the status display title */
export const APP_NAME = 'p2pdrop';

/** Current release */
export const VERSION = '0.1.0';

/** Common prefix of every sub-protocol this application speaks */
export const PROTOCOL_PREFIX = '/p2pdrop/1.0.0';

/** Sub-protocol used to exchange offer descriptors when a connection opens */
export const ANNOUNCE_PROTOCOL = `${PROTOCOL_PREFIX}/hello`;

/** Sub-protocol used to request and stream a file's bytes */
export const TRANSFER_PROTOCOL = `${PROTOCOL_PREFIX}/get`;
