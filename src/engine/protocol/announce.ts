/**
 * Announcement protocol.
 *
 * When a connection opens, each side sends the other its offer descriptor
 * on a short-lived stream. The receiving side decodes it and, depending on
 * its role, either logs it (offering side) or registers it (discovering
 * side). Failures are logged and confined to the stream they happened on;
 * the connection itself is left alone.
 *
 * @module engine/protocol/announce
 */

import { ANNOUNCE_PROTOCOL } from '../../shared/constants.js';
import type { OfferLog } from '../offer/registry.js';
import {
  MAX_ANNOUNCEMENT_BYTES,
  decodeAnnouncement,
  describeOffer,
  encodeAnnouncement,
  isEmptyOffer,
} from '../offer/descriptor.js';
import {
  DropError,
  SerializationError,
  toError,
  type OfferDescriptor,
  type RegistryEntry,
} from '../types.js';
import type { PeerStream } from '../transport/types.js';
import {
  IdleWatchdog,
  closeStream,
  openStreamWithDeadline,
  readUntil,
  type ProtocolContext,
} from './stream.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What became of an inbound announcement.
 */
export type AnnouncementOutcome =
  | { kind: 'rejected'; error: Error }
  | { kind: 'ignored'; descriptor: OfferDescriptor }
  | { kind: 'logged'; descriptor: OfferDescriptor }
  | { kind: 'registered'; descriptor: OfferDescriptor; entry: RegistryEntry };

const NEWLINE = 0x0a;

// =============================================================================
// Outbound
// =============================================================================

/**
 * Sends the local descriptor to a newly connected peer.
 *
 * @returns true if the announcement was written and the stream closed
 */
export async function sendAnnouncement(
  context: ProtocolContext,
  peerId: string,
  descriptor: OfferDescriptor
): Promise<boolean> {
  const { transport, log, timeoutMs } = context;

  let stream: PeerStream;
  try {
    stream = await openStreamWithDeadline(transport, peerId, ANNOUNCE_PROTOCOL, timeoutMs);
  } catch (err) {
    log.error(`error opening stream: ${toError(err).message}`);
    return false;
  }

  const watchdog = new IdleWatchdog(stream, peerId, timeoutMs, 'announcement');
  try {
    await stream.sink([encodeAnnouncement(descriptor)]);
    await stream.close();
    return true;
  } catch (err) {
    const error = toError(err);
    stream.abort(error);
    log.error(`error writing announcement: ${error.message}`);
    return false;
  } finally {
    watchdog.stop();
  }
}

// =============================================================================
// Inbound
// =============================================================================

/**
 * Handles an inbound announcement stream.
 *
 * With a registry (discovering side) non-empty offers are appended and
 * logged with their index; empty ones are dropped silently. Without one
 * (offering side) every descriptor is only logged.
 */
export async function receiveAnnouncement(
  context: ProtocolContext,
  stream: PeerStream,
  peerId: string,
  registry?: OfferLog
): Promise<AnnouncementOutcome> {
  const { log, timeoutMs } = context;

  const watchdog = new IdleWatchdog(stream, peerId, timeoutMs, 'announcement');
  let descriptor: OfferDescriptor;
  try {
    const payload = await readUntil(stream.source, NEWLINE, MAX_ANNOUNCEMENT_BYTES);
    descriptor = decodeAnnouncement(payload);
  } catch (err) {
    const error =
      err instanceof DropError ? err : new SerializationError(toError(err).message, { cause: err });
    stream.abort(error);
    log.warn(`reading announcement: ${error.message}`);
    return { kind: 'rejected', error };
  } finally {
    watchdog.stop();
  }

  await closeStream(stream);

  if (!registry) {
    log.info(`Found someone: ${describeOffer(descriptor)}`);
    return { kind: 'logged', descriptor };
  }

  if (isEmptyOffer(descriptor)) {
    return { kind: 'ignored', descriptor };
  }

  const index = registry.append(descriptor, peerId);
  const lookup = registry.get(index);
  if (!lookup.ok) {
    // Only reachable with a registry that breaks the append/get contract
    throw lookup.error;
  }

  log.info(`${index}: ${describeOffer(descriptor)}`);
  return { kind: 'registered', descriptor, entry: lookup.entry };
}
