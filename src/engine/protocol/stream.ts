/**
 * Stream deadline helpers shared by the protocol handlers.
 *
 * @module engine/protocol/stream
 */

import type { ActivityLog } from '../log.js';
import { ConnectionError, StreamTimeoutError, toError } from '../types.js';
import type { PeerStream, PeerTransport } from '../transport/types.js';

/**
 * What every protocol handler needs from its node.
 */
export interface ProtocolContext {
  transport: PeerTransport;
  log: ActivityLog;

  /** Deadline for opening a stream, and idle deadline once it is open */
  timeoutMs: number;
}

// =============================================================================
// Idle Watchdog
// =============================================================================

/**
 * Aborts a stream when no progress is reported for `timeoutMs`.
 *
 * Every chunk read or written calls `touch()`; a transfer that keeps moving
 * is never cut off, one that stalls fails with a `StreamTimeoutError`.
 */
export class IdleWatchdog {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private fired = false;

  constructor(
    private readonly stream: PeerStream,
    private readonly peerId: string,
    private readonly timeoutMs: number,
    private readonly label: string
  ) {
    this.touch();
  }

  /** Whether the deadline expired */
  get expired(): boolean {
    return this.fired;
  }

  touch(): void {
    if (this.fired) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.fired = true;
      this.stream.abort(
        new StreamTimeoutError(
          `${this.label} stalled for ${this.timeoutMs} ms`,
          this.peerId,
          this.timeoutMs
        )
      );
    }, this.timeoutMs);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Passes chunks through, calling `onChunk` for each one.
 */
export async function* tap(
  source: AsyncIterable<Uint8Array>,
  onChunk: (chunk: Uint8Array) => void
): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    onChunk(chunk);
    yield chunk;
  }
}

// =============================================================================
// Opening and Reading
// =============================================================================

/**
 * Opens a stream, giving up after `timeoutMs`.
 *
 * @throws {StreamTimeoutError} If the deadline expires
 * @throws {ConnectionError} If the transport reports any other failure
 */
export async function openStreamWithDeadline(
  transport: PeerTransport,
  peerId: string,
  protocol: string,
  timeoutMs: number
): Promise<PeerStream> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await transport.openStream(peerId, protocol, { signal: controller.signal });
  } catch (err) {
    if (controller.signal.aborted) {
      throw new StreamTimeoutError(
        `opening ${protocol} timed out after ${timeoutMs} ms`,
        peerId,
        timeoutMs
      );
    }
    if (err instanceof ConnectionError) {
      throw err;
    }
    throw new ConnectionError(toError(err).message, peerId, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Closes a stream, resetting it if the graceful close fails.
 */
export async function closeStream(stream: PeerStream): Promise<void> {
  try {
    await stream.close();
  } catch (err) {
    stream.abort(toError(err));
  }
}

/**
 * Reads from a stream until `delimiter`, end of stream, or `maxBytes`.
 *
 * @returns The bytes read, including the delimiter when one was found
 * @throws {Error} If more than `maxBytes` arrive before the delimiter
 */
export async function readUntil(
  source: AsyncIterable<Uint8Array>,
  delimiter: number,
  maxBytes: number
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;

  for await (const chunk of source) {
    const end = chunk.indexOf(delimiter);
    const piece = end === -1 ? chunk : chunk.subarray(0, end + 1);

    total += piece.byteLength;
    if (total > maxBytes) {
      throw new Error(`message exceeds ${maxBytes} bytes`);
    }
    chunks.push(piece);

    if (end !== -1) {
      break;
    }
  }

  return concat(chunks, total);
}

function concat(chunks: Uint8Array[], total: number): Uint8Array {
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}
