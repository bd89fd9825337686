/**
 * Transfer protocol.
 *
 * The requester opens a stream, sends nothing and closes its write side.
 * The offering side answers with the raw bytes of its file followed by end
 * of stream. There is no framing, no resume and no checksum.
 *
 * @module engine/protocol/transfer
 */

import { createReadStream, createWriteStream } from 'fs';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import { TRANSFER_PROTOCOL } from '../../shared/constants.js';
import { formatBytes } from '../../ui/utils/format.js';
import {
  DropError,
  IOError,
  toError,
  type LocalOffer,
  type RegistryEntry,
  type TransferResult,
} from '../types.js';
import type { PeerStream } from '../transport/types.js';
import {
  IdleWatchdog,
  closeStream,
  openStreamWithDeadline,
  tap,
  type ProtocolContext,
} from './stream.js';

/**
 * Outcome of serving one request.
 */
export type ServeOutcome = { ok: true; bytes: number } | { ok: false; error: Error };

function asTransferError(err: unknown, filePath: string): Error {
  if (err instanceof DropError) {
    return err;
  }
  return new IOError(toError(err).message, filePath, { cause: err });
}

// =============================================================================
// Offering Side
// =============================================================================

/**
 * Streams the whole offered file to the requester, then closes the stream.
 *
 * The file is opened per request, so every requester gets an independent
 * read of it. Failures abort this stream only.
 */
export async function serveFile(
  context: ProtocolContext,
  stream: PeerStream,
  peerId: string,
  offer: LocalOffer
): Promise<ServeOutcome> {
  const { log, timeoutMs } = context;
  const watchdog = new IdleWatchdog(stream, peerId, timeoutMs, 'transfer');
  let bytes = 0;

  try {
    await stream.sink(
      tap(createReadStream(offer.path), (chunk) => {
        watchdog.touch();
        bytes += chunk.byteLength;
      })
    );
  } catch (err) {
    const error = asTransferError(err, offer.path);
    stream.abort(error);
    log.error(`error sending file: ${error.message}`);
    return { ok: false, error };
  } finally {
    watchdog.stop();
  }

  await closeStream(stream);
  log.info(`sent ${offer.fileName} (${formatBytes(bytes)}) to ${peerId}`);
  return { ok: true, bytes };
}

// =============================================================================
// Requesting Side
// =============================================================================

/**
 * Fetches an offer into `downloadPath`, creating or truncating a file named
 * after the declared file name.
 *
 * A failed transfer leaves whatever was written in place.
 *
 * @throws {ConnectionError} If the stream cannot be opened
 * @throws {StreamTimeoutError} If the remote stops sending
 * @throws {IOError} If the file cannot be written or the stream breaks
 */
export async function fetchOffer(
  context: ProtocolContext,
  entry: RegistryEntry,
  downloadPath: string
): Promise<TransferResult> {
  const { transport, log, timeoutMs } = context;
  const { descriptor, originPeer } = entry;
  const destination = join(downloadPath, descriptor.fileName);

  log.info(`fetching ${descriptor.fileName} from ${descriptor.displayName}`);

  let bytes = 0;
  try {
    const stream = await openStreamWithDeadline(transport, originPeer, TRANSFER_PROTOCOL, timeoutMs);
    const watchdog = new IdleWatchdog(stream, originPeer, timeoutMs, 'transfer');

    try {
      await stream.closeWrite();
      await pipeline(
        tap(stream.source, (chunk) => {
          watchdog.touch();
          bytes += chunk.byteLength;
        }),
        createWriteStream(destination)
      );
    } catch (err) {
      const error = asTransferError(err, destination);
      stream.abort(error);
      throw error;
    } finally {
      watchdog.stop();
    }

    await closeStream(stream);
  } catch (err) {
    const error = asTransferError(err, destination);
    log.error(`transfer of ${descriptor.fileName} failed: ${error.message}`);
    throw error;
  }

  log.info(`Success! saved ${descriptor.fileName} (${formatBytes(bytes)}) to ${destination}`);
  return { entry, path: destination, bytes };
}
