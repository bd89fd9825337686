/**
 * DropNode - one running peer, either offering a file or discovering offers.
 *
 * The node wires the transport's connection notifications to the
 * announcement protocol, registers the protocol handlers, and on the
 * discovering side drives the selection loop and the transfer that
 * follows it.
 *
 * @module engine/DropNode
 *
 * @example
 * ```typescript
 * const node = new DropNode({ transport, identity, config: { downloadPath: '/tmp' } });
 *
 * node.on('offer:registered', ({ entry }) => {
 *   console.log(`${entry.index}: ${entry.descriptor.fileName}`);
 * });
 *
 * await node.start();
 * const result = await node.receive(lines);
 * await node.stop();
 * ```
 */

import { mergeWithDefaults } from './config/defaults.js';
import { TypedEventEmitter, type DropEventEmitter, type DropEvents } from './events.js';
import { ActivityLog } from './log.js';
import { emptyDescriptor } from './offer/descriptor.js';
import { OfferRegistry, type OfferLog } from './offer/registry.js';
import { receiveAnnouncement, sendAnnouncement } from './protocol/announce.js';
import type { ProtocolContext } from './protocol/stream.js';
import { fetchOffer, serveFile } from './protocol/transfer.js';
import { SelectionLoop } from './selection.js';
import type { PeerStream, PeerTransport } from './transport/types.js';
import {
  TransportInitError,
  TransferState,
  toError,
  type DropConfig,
  type LocalIdentity,
  type LocalOffer,
  type OfferDescriptor,
  type PartialDropConfig,
  type RegistryEntry,
  type TransferResult,
} from './types.js';
import { ANNOUNCE_PROTOCOL, TRANSFER_PROTOCOL } from '../shared/constants.js';

// =============================================================================
// Types
// =============================================================================

export interface DropNodeOptions {
  transport: PeerTransport;
  identity: LocalIdentity;

  /** The file to serve; makes this an offering node */
  offer?: LocalOffer;

  config?: PartialDropConfig;

  /** Shared activity log; created from the config when omitted */
  log?: ActivityLog;

  /** Offer registry of a discovering node; created when omitted */
  registry?: OfferLog;
}

/**
 * Snapshot of a node for the status display.
 */
export interface NodeStatus {
  peerId: string;
  role: 'offering' | 'discovering';
  running: boolean;
  connections: number;
  offers: readonly RegistryEntry[];
  transfer: { entry: RegistryEntry; state: TransferState } | null;
}

type Listener<T> = T extends void ? () => void : (payload: T) => void;

// =============================================================================
// DropNode
// =============================================================================

export class DropNode {
  /** Recent activity, shared with the status display */
  readonly log: ActivityLog;

  /** Offers heard so far (always empty on an offering node) */
  readonly registry: OfferLog;

  private readonly events: DropEventEmitter;
  private readonly transport: PeerTransport;
  private readonly config: DropConfig;
  private readonly offer: LocalOffer | undefined;
  private readonly descriptor: OfferDescriptor;
  private readonly context: ProtocolContext;

  private running = false;
  private connections = 0;
  private unsubscribe: (() => void) | null = null;
  private selection: SelectionLoop | null = null;
  private transfer: { entry: RegistryEntry; state: TransferState } | null = null;

  constructor(options: DropNodeOptions) {
    this.events = new TypedEventEmitter<DropEvents>();
    this.transport = options.transport;
    this.config = mergeWithDefaults(options.config);
    this.offer = options.offer;
    this.log =
      options.log ??
      new ActivityLog({ capacity: this.config.logCapacity, logFile: this.config.logFile });
    this.registry = options.registry ?? new OfferRegistry();

    this.descriptor = options.offer
      ? {
          ...options.identity,
          fileName: options.offer.fileName,
          sizeBytes: options.offer.sizeBytes,
        }
      : emptyDescriptor(options.identity);

    this.context = {
      transport: this.transport,
      log: this.log,
      timeoutMs: this.config.streamTimeoutMs,
    };
  }

  get isOffering(): boolean {
    return this.offer !== undefined;
  }

  /** The descriptor this node announces */
  get localDescriptor(): OfferDescriptor {
    return { ...this.descriptor };
  }

  isRunning(): boolean {
    return this.running;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Registers the protocol handlers and starts the transport.
   *
   * @throws {TransportInitError} If the transport cannot start
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Node is already running');
    }

    try {
      await this.transport.registerStreamHandler(ANNOUNCE_PROTOCOL, (stream, peerId) =>
        this.handleAnnouncement(stream, peerId)
      );
      if (this.offer) {
        const offer = this.offer;
        await this.transport.registerStreamHandler(TRANSFER_PROTOCOL, (stream, peerId) =>
          this.handleTransferRequest(stream, peerId, offer)
        );
      }

      this.unsubscribe = this.transport.onConnectionEstablished((peerId) =>
        this.handleConnection(peerId)
      );

      await this.transport.start();
    } catch (err) {
      this.unsubscribe?.();
      this.unsubscribe = null;
      if (err instanceof TransportInitError) {
        throw err;
      }
      throw new TransportInitError(`cannot start transport: ${toError(err).message}`, {
        cause: err,
      });
    }

    this.running = true;
    this.log.info(`listening as ${this.transport.peerId}`);
    this.events.emit('node:started', { peerId: this.transport.peerId });
  }

  /**
   * Stops reading selections and shuts the transport down.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.selection?.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;

    await this.transport.stop();
    await this.log.flush();

    this.running = false;
    this.events.emit('node:stopped');
  }

  // ===========================================================================
  // Selection and Transfer
  // ===========================================================================

  /**
   * Reads selections from `lines` until one transfer succeeds or the input
   * ends. Failed transfers are logged and the next selection is awaited.
   *
   * @returns The successful transfer, or null if the input ended first
   */
  async receive(lines: AsyncIterable<string>): Promise<TransferResult | null> {
    if (this.isOffering) {
      throw new Error('An offering node does not receive');
    }
    if (this.selection) {
      throw new Error('Already receiving');
    }

    const loop = new SelectionLoop(this.registry, this.log);
    this.selection = loop;
    const reading = loop.run(lines);

    let result: TransferResult | null = null;
    try {
      for await (const entry of loop.selections) {
        result = await this.fetch(entry);
        if (result) {
          loop.stop();
          break;
        }
      }
    } finally {
      loop.stop();
      await reading;
      this.selection = null;
    }

    return result;
  }

  /**
   * Fetches one registry entry into the download directory.
   *
   * @returns The result, or null if the transfer failed
   */
  async fetch(entry: RegistryEntry): Promise<TransferResult | null> {
    this.transfer = { entry, state: TransferState.REQUESTED };
    this.events.emit('transfer:started', { entry });

    try {
      this.transfer = { entry, state: TransferState.TRANSFERRING };
      const result = await fetchOffer(this.context, entry, this.config.downloadPath);
      this.transfer = { entry, state: TransferState.COMPLETE };
      this.events.emit('transfer:completed', result);
      return result;
    } catch (err) {
      this.transfer = { entry, state: TransferState.FAILED };
      this.events.emit('transfer:failed', { entry, error: toError(err) });
      return null;
    }
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  getStatus(): NodeStatus {
    return {
      peerId: this.running ? this.transport.peerId : '',
      role: this.isOffering ? 'offering' : 'discovering',
      running: this.running,
      connections: this.connections,
      offers: this.registry.entries(),
      transfer: this.transfer ? { ...this.transfer } : null,
    };
  }

  // ===========================================================================
  // Event Methods
  // ===========================================================================

  on<K extends keyof DropEvents>(event: K, listener: Listener<DropEvents[K]>): this {
    this.events.on(event, listener);
    return this;
  }

  once<K extends keyof DropEvents>(event: K, listener: Listener<DropEvents[K]>): this {
    this.events.once(event, listener);
    return this;
  }

  off<K extends keyof DropEvents>(event: K, listener: Listener<DropEvents[K]>): this {
    this.events.off(event, listener);
    return this;
  }

  waitFor<K extends keyof DropEvents>(event: K): Promise<DropEvents[K]> {
    return this.events.waitFor(event);
  }

  // ===========================================================================
  // Handlers
  // ===========================================================================

  private handleConnection(peerId: string): void {
    this.connections++;
    this.events.emit('peer:connected', { peerId });
    // sendAnnouncement logs its own failures and never rejects
    void sendAnnouncement(this.context, peerId, this.descriptor);
  }

  private async handleAnnouncement(stream: PeerStream, peerId: string): Promise<void> {
    const registry = this.isOffering ? undefined : this.registry;
    const outcome = await receiveAnnouncement(this.context, stream, peerId, registry);

    switch (outcome.kind) {
      case 'rejected':
        this.events.emit('announcement:rejected', { peerId, error: outcome.error });
        break;
      case 'registered':
        this.events.emit('announcement:received', { peerId, descriptor: outcome.descriptor });
        this.events.emit('offer:registered', { entry: outcome.entry });
        break;
      default:
        this.events.emit('announcement:received', { peerId, descriptor: outcome.descriptor });
    }
  }

  private async handleTransferRequest(
    stream: PeerStream,
    peerId: string,
    offer: LocalOffer
  ): Promise<void> {
    const outcome = await serveFile(this.context, stream, peerId, offer);
    if (outcome.ok) {
      this.events.emit('transfer:served', { peerId, bytes: outcome.bytes });
    } else {
      this.events.emit('transfer:serve-failed', { peerId, error: outcome.error });
    }
  }
}
