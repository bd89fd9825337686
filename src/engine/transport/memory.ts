/**
 * In-process Peer Transport
 *
 * A `MemoryNetwork` hosts any number of `MemoryTransport`s. Connections are
 * established explicitly with `connect`, which raises the new-connection
 * notification on both ends, and streams are linked pairs of in-memory
 * byte queues. Used by the tests in place of libp2p.
 *
 * @module engine/transport/memory
 */

import { pushable, type Pushable } from 'it-pushable';
import { ConnectionError, TransportInitError, toError } from '../types.js';
import type {
  ConnectionListener,
  OpenStreamOptions,
  PeerStream,
  PeerTransport,
  StreamHandler,
} from './types.js';

// =============================================================================
// Streams
// =============================================================================

/** State shared by both ends of a stream pair */
interface PairState {
  error: Error | null;
}

/**
 * One end of an in-memory stream pair.
 */
export class MemoryStream implements PeerStream {
  private writeClosed = false;

  constructor(
    private readonly inbound: Pushable<Uint8Array>,
    private readonly outbound: Pushable<Uint8Array>,
    private readonly state: PairState
  ) {}

  get source(): AsyncIterable<Uint8Array> {
    return this.inbound;
  }

  async sink(source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>): Promise<void> {
    if (this.writeClosed) {
      throw new Error('stream is closed for writing');
    }
    for await (const chunk of source) {
      if (this.state.error) {
        throw this.state.error;
      }
      this.outbound.push(chunk);
    }
    await this.closeWrite();
  }

  async closeWrite(): Promise<void> {
    if (!this.writeClosed) {
      this.writeClosed = true;
      this.outbound.end();
    }
  }

  async close(): Promise<void> {
    await this.closeWrite();
    this.inbound.end();
  }

  abort(error: Error): void {
    this.state.error = error;
    this.writeClosed = true;
    this.outbound.end(error);
    this.inbound.end(error);
  }
}

/**
 * Creates two linked stream ends: bytes written to one are read from the other.
 */
export function createStreamPair(): [MemoryStream, MemoryStream] {
  const forward = pushable<Uint8Array>();
  const backward = pushable<Uint8Array>();
  const state: PairState = { error: null };
  return [new MemoryStream(backward, forward, state), new MemoryStream(forward, backward, state)];
}

// =============================================================================
// Transport
// =============================================================================

export interface MemoryTransportOptions {
  /** Makes `start` fail, for exercising startup errors */
  failStart?: boolean;
}

export class MemoryTransport implements PeerTransport {
  private started = false;
  private readonly connections = new Set<string>();
  private readonly handlers = new Map<string, StreamHandler>();
  private readonly listeners = new Set<ConnectionListener>();

  constructor(
    private readonly network: MemoryNetwork,
    readonly peerId: string,
    private readonly options: MemoryTransportOptions = {}
  ) {}

  get isRunning(): boolean {
    return this.started;
  }

  async start(): Promise<void> {
    if (this.options.failStart) {
      throw new TransportInitError(`cannot start transport for ${this.peerId}`);
    }
    this.started = true;
  }

  async stop(): Promise<void> {
    this.started = false;
    this.connections.clear();
  }

  onConnectionEstablished(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async registerStreamHandler(protocol: string, handler: StreamHandler): Promise<void> {
    this.handlers.set(protocol, handler);
  }

  async openStream(
    peerId: string,
    protocol: string,
    options: OpenStreamOptions = {}
  ): Promise<PeerStream> {
    options.signal?.throwIfAborted();

    const remote = this.connections.has(peerId) ? this.network.lookup(peerId) : undefined;
    if (!this.started || !remote || !remote.isRunning) {
      throw new ConnectionError(`not connected to ${peerId}`, peerId);
    }

    const handler = remote.handlers.get(protocol);
    if (!handler) {
      throw new ConnectionError(`${peerId} does not support ${protocol}`, peerId);
    }

    const [local, far] = createStreamPair();
    void Promise.resolve()
      .then(() => handler(far, this.peerId))
      .catch((err: unknown) => far.abort(toError(err)));
    return local;
  }

  /**
   * Records a connection to `peerId` and notifies listeners.
   */
  acceptConnection(peerId: string): void {
    if (!this.started) {
      throw new ConnectionError(`${this.peerId} is not started`, peerId);
    }
    this.connections.add(peerId);
    for (const listener of this.listeners) {
      listener(peerId);
    }
  }
}

// =============================================================================
// Network
// =============================================================================

export class MemoryNetwork {
  private readonly transports = new Map<string, MemoryTransport>();

  createTransport(peerId: string, options: MemoryTransportOptions = {}): MemoryTransport {
    if (this.transports.has(peerId)) {
      throw new Error(`peer ${peerId} already exists`);
    }
    const transport = new MemoryTransport(this, peerId, options);
    this.transports.set(peerId, transport);
    return transport;
  }

  lookup(peerId: string): MemoryTransport | undefined {
    return this.transports.get(peerId);
  }

  /**
   * Connects two started transports, notifying both ends.
   */
  connect(a: string, b: string): void {
    const left = this.lookup(a);
    const right = this.lookup(b);
    if (!left || !right) {
      throw new Error(`unknown peer: ${left ? b : a}`);
    }
    left.acceptConnection(b);
    right.acceptConnection(a);
  }
}
