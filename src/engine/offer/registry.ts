/**
 * Offer Registry
 *
 * Append-only, order-preserving collection of the offers a discovering
 * node has heard about. Each entry keeps the index it was given at
 * insertion for the lifetime of the process; nothing is ever removed,
 * replaced or deduplicated.
 *
 * `append` and `get` run to completion without awaiting, which makes each
 * call an exclusive section with respect to every other task on the event
 * loop: the index handed out is always the length observed immediately
 * before the push.
 *
 * @module engine/offer/registry
 */

import {
  IndexOutOfRangeError,
  type OfferDescriptor,
  type RegistryEntry,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a registry lookup.
 */
export type RegistryLookup =
  | { ok: true; entry: RegistryEntry }
  | { ok: false; error: IndexOutOfRangeError };

/**
 * The contract the rest of the engine depends on. Tests may substitute
 * their own implementation.
 */
export interface OfferLog {
  /** Adds an entry and returns its index */
  append(descriptor: OfferDescriptor, originPeer: string): number;

  /** Looks up an entry without ever throwing */
  get(index: number): RegistryLookup;

  /** Number of entries appended so far */
  length(): number;

  /** Snapshot of every entry in index order */
  entries(): readonly RegistryEntry[];
}

// =============================================================================
// OfferRegistry
// =============================================================================

export class OfferRegistry implements OfferLog {
  private readonly items: RegistryEntry[] = [];

  append(descriptor: OfferDescriptor, originPeer: string): number {
    const index = this.items.length;
    this.items.push(
      Object.freeze({
        index,
        descriptor: Object.freeze({ ...descriptor }),
        originPeer,
      })
    );
    return index;
  }

  get(index: number): RegistryLookup {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return { ok: false, error: new IndexOutOfRangeError(index, this.items.length) };
    }
    return { ok: true, entry: this.items[index] };
  }

  length(): number {
    return this.items.length;
  }

  entries(): readonly RegistryEntry[] {
    return [...this.items];
  }
}
