/**
 * Typed Event Emitter System for the p2pdrop engine
 *
 * Provides type-safe event emission and subscription for all engine events.
 * Wraps Node's EventEmitter with full TypeScript type safety.
 */

import { EventEmitter } from 'events';
import type { OfferDescriptor, RegistryEntry, TransferResult } from './types.js';

// ============================================================================
// Event Payload Types
// ============================================================================

/**
 * Complete event map for a p2pdrop node
 */
export interface DropEvents {
  // Node lifecycle
  'node:started': { peerId: string };
  'node:stopped': void;

  // Connections
  'peer:connected': { peerId: string };

  // Announcements
  'announcement:received': { peerId: string; descriptor: OfferDescriptor };
  'announcement:rejected': { peerId: string; error: Error };
  'offer:registered': { entry: RegistryEntry };

  // Transfers, requesting side
  'transfer:started': { entry: RegistryEntry };
  'transfer:completed': TransferResult;
  'transfer:failed': { entry: RegistryEntry; error: Error };

  // Transfers, offering side
  'transfer:served': { peerId: string; bytes: number };
  'transfer:serve-failed': { peerId: string; error: Error };
}

type Listener<T> = T extends void ? () => void : (payload: T) => void;

// ============================================================================
// TypedEventEmitter Implementation
// ============================================================================

/**
 * Type-safe event emitter that wraps Node's EventEmitter
 *
 * @template T - Event map type defining event names and their payload types
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter<DropEvents>();
 *
 * emitter.on('offer:registered', ({ entry }) => {
 *   console.log(`${entry.index}: ${entry.descriptor.fileName}`);
 * });
 *
 * // Compile error: wrong payload type
 * emitter.emit('offer:registered', { peerId: 'abc' });
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
  }

  /**
   * Subscribe to an event
   */
  on<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first emission)
   */
  once<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.once(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event as string, ...args);
  }

  /**
   * Returns a promise that resolves when the specified event is emitted
   *
   * @param event - The event name to wait for
   * @returns Promise resolving to the event payload
   */
  waitFor<K extends keyof T>(event: K): Promise<T[K]> {
    return new Promise((resolve) => {
      this.once(event, ((payload: T[K]) => {
        resolve(payload);
      }) as Listener<T[K]>);
    });
  }
}

// ============================================================================
// Type Aliases
// ============================================================================

/**
 * Pre-configured event emitter type for p2pdrop nodes
 */
export type DropEventEmitter = TypedEventEmitter<DropEvents>;
