/**
 * Announcement wire format.
 *
 * An announcement is a single JSON object terminated by a newline:
 *
 * ```json
 * {"Name":"alice","Hostname":"laptop","File":"report.pdf","Size":4096}
 * ```
 *
 * Missing fields decode to their zero value; fields of the wrong type
 * and sizes that are not non-negative safe integers are rejected.
 *
 * @module engine/offer/descriptor
 */

import { SerializationError, toError, type LocalIdentity, type OfferDescriptor } from '../types.js';
import { formatBytes } from '../../ui/utils/format.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The announcement as it appears on the wire.
 */
export interface AnnouncementMessage {
  Name: string;
  Hostname: string;
  File: string;
  Size: number;
}

/** Upper bound on the size of an encoded announcement */
export const MAX_ANNOUNCEMENT_BYTES = 64 * 1024;

type StringField = 'Name' | 'Hostname' | 'File';

const encoder = new TextEncoder();

// =============================================================================
// Encoding
// =============================================================================

/**
 * Builds the descriptor a peer sends when it has nothing to offer.
 */
export function emptyDescriptor(identity: LocalIdentity): OfferDescriptor {
  return {
    displayName: identity.displayName,
    hostLabel: identity.hostLabel,
    fileName: '',
    sizeBytes: 0,
  };
}

/**
 * Whether a descriptor is a no-offer handshake.
 */
export function isEmptyOffer(descriptor: OfferDescriptor): boolean {
  return descriptor.fileName === '';
}

export function toMessage(descriptor: OfferDescriptor): AnnouncementMessage {
  return {
    Name: descriptor.displayName,
    Hostname: descriptor.hostLabel,
    File: descriptor.fileName,
    Size: descriptor.sizeBytes,
  };
}

/**
 * Serializes a descriptor into its newline-terminated wire form.
 *
 * @throws {SerializationError} If the size cannot be represented
 */
export function encodeAnnouncement(descriptor: OfferDescriptor): Uint8Array {
  if (!Number.isSafeInteger(descriptor.sizeBytes) || descriptor.sizeBytes < 0) {
    throw new SerializationError(`invalid offer size: ${descriptor.sizeBytes}`);
  }
  return encoder.encode(JSON.stringify(toMessage(descriptor)) + '\n');
}

// =============================================================================
// Decoding
// =============================================================================

function readString(message: object, key: StringField): string {
  if (!(key in message)) {
    return '';
  }
  const value: unknown = Reflect.get(message, key);
  if (typeof value !== 'string') {
    throw new SerializationError(`field "${key}" must be a string`);
  }
  return value;
}

function readSize(message: object): number {
  if (!('Size' in message)) {
    return 0;
  }
  const value: unknown = message.Size;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new SerializationError('field "Size" must be a non-negative integer');
  }
  return value;
}

/**
 * Decodes the first newline-terminated announcement in `bytes`.
 *
 * @throws {SerializationError} If the payload is empty, not UTF-8, not JSON,
 * or not an announcement object
 */
export function decodeAnnouncement(bytes: Uint8Array): OfferDescriptor {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new SerializationError('announcement is not valid UTF-8', { cause: err });
  }

  const newline = text.indexOf('\n');
  const line = (newline === -1 ? text : text.slice(0, newline)).trim();
  if (line.length === 0) {
    throw new SerializationError('empty announcement');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new SerializationError(`invalid JSON: ${toError(err).message}`, { cause: err });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SerializationError('announcement must be a JSON object');
  }

  return {
    displayName: readString(parsed, 'Name'),
    hostLabel: readString(parsed, 'Hostname'),
    fileName: readString(parsed, 'File'),
    sizeBytes: readSize(parsed),
  };
}

// =============================================================================
// Display
// =============================================================================

/**
 * One-line summary: `alice@laptop - report.pdf (4.0 KB)`.
 */
export function describeOffer(descriptor: OfferDescriptor): string {
  return `${descriptor.displayName}@${descriptor.hostLabel} - ${descriptor.fileName} (${formatBytes(descriptor.sizeBytes)})`;
}
