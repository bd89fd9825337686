/**
 * Core type definitions for the p2pdrop engine.
 *
 * These types describe the offers peers exchange, the entries the offer
 * registry keeps, the engine configuration and the error taxonomy shared
 * by every protocol handler.
 *
 * @module engine/types
 */

// =============================================================================
// Offers
// =============================================================================

/**
 * Describes the single file a peer is willing to share.
 *
 * A peer with nothing to offer sends an empty `fileName` and a zero
 * `sizeBytes`; such descriptors are never registered.
 */
export interface OfferDescriptor {
  /** Name of the local user announcing the offer */
  displayName: string;

  /** Host name of the announcing machine */
  hostLabel: string;

  /** Declared name of the offered file (empty when nothing is offered) */
  fileName: string;

  /** Size of the offered file in bytes */
  sizeBytes: number;
}

/**
 * A discovered offer as stored by the registry.
 */
export interface RegistryEntry {
  /** Position in the registry, assigned once at insertion */
  index: number;

  /** The decoded descriptor */
  descriptor: OfferDescriptor;

  /** Identifier of the peer the announcement stream came from */
  originPeer: string;
}

/**
 * The file served by the offering side.
 */
export interface LocalOffer {
  /** Path of the file on the local disk */
  path: string;

  /** Name declared to remote peers */
  fileName: string;

  /** Size in bytes at the time the offer was prepared */
  sizeBytes: number;
}

/**
 * Who we are, as shown to remote peers.
 */
export interface LocalIdentity {
  displayName: string;
  hostLabel: string;
}

/**
 * Lifecycle of a single transfer attempt.
 *
 *   requested -> transferring -> complete
 *        |             |
 *        +-----------> failed
 */
export enum TransferState {
  REQUESTED = 'requested',
  TRANSFERRING = 'transferring',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

/**
 * Outcome of a finished transfer on the requesting side.
 */
export interface TransferResult {
  /** The registry entry that was fetched */
  entry: RegistryEntry;

  /** Where the received bytes were written */
  path: string;

  /** Number of bytes received */
  bytes: number;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration options for a p2pdrop node.
 */
export interface DropConfig {
  /** Multiaddrs the transport listens on (default: any IPv4 address, random TCP port) */
  listenAddresses: string[];

  /** Deadline for opening a stream and idle deadline for reading or writing one, in ms */
  streamTimeoutMs: number;

  /** Interval between status display refreshes in ms */
  statusIntervalMs: number;

  /** Number of recent log lines kept for the status display */
  logCapacity: number;

  /** Optional file every log line is appended to */
  logFile?: string;

  /** Directory received files are written to */
  downloadPath: string;

  /** Interval between mDNS discovery queries in ms */
  mdnsIntervalMs: number;
}

/**
 * Partial configuration; missing fields fall back to the defaults.
 */
export type PartialDropConfig = Partial<DropConfig>;

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all p2pdrop errors.
 */
export class DropError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DropError';
  }
}

/**
 * The local identity or transport could not be started. Fatal at startup.
 */
export class TransportInitError extends DropError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportInitError';
  }
}

/**
 * Opening a stream to (or dialing) a single peer failed.
 */
export class ConnectionError extends DropError {
  /** The peer the failure concerns */
  readonly peerId: string;

  constructor(message: string, peerId: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
    this.peerId = peerId;
  }
}

/**
 * A stream deadline expired before the remote made progress.
 */
export class StreamTimeoutError extends ConnectionError {
  /** The deadline that expired, in ms */
  readonly timeoutMs: number;

  constructor(message: string, peerId: string, timeoutMs: number) {
    super(message, peerId);
    this.name = 'StreamTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An announcement could not be decoded.
 */
export class SerializationError extends DropError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

/**
 * A file or stream read/write failed during a transfer.
 */
export class IOError extends DropError {
  /** The local file involved */
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IOError';
    this.filePath = filePath;
  }
}

/**
 * The operator typed something that is not a selection.
 */
export class UserInputError extends DropError {
  /** The offending token */
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = 'UserInputError';
    this.input = input;
  }
}

/**
 * The operator selected an index the registry does not hold.
 */
export class IndexOutOfRangeError extends UserInputError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`no offer with index ${index} (${length} available)`, String(index));
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
