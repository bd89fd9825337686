/**
 * libp2p Peer Transport
 *
 * TCP with Noise encryption and Yamux multiplexing; peers on the local
 * network are found with mDNS and dialed as soon as they are discovered.
 * The transport raises a connection notification for every connection
 * that opens, inbound or outbound, and does not deduplicate by peer.
 *
 * @module engine/transport/libp2p
 */

import { noise } from '@chainsafe/libp2p-noise';
import { yamux } from '@chainsafe/libp2p-yamux';
import type { PeerId, Stream } from '@libp2p/interface';
import { mdns } from '@libp2p/mdns';
import { tcp } from '@libp2p/tcp';
import { createLibp2p, type Libp2p } from 'libp2p';
import type { ActivityLog } from '../log.js';
import { ConnectionError, TransportInitError, toError, type DropConfig } from '../types.js';
import type {
  ConnectionListener,
  OpenStreamOptions,
  PeerStream,
  PeerTransport,
  StreamHandler,
} from './types.js';

// =============================================================================
// Stream Adapter
// =============================================================================

async function* toBytes(source: AsyncIterable<{ subarray(): Uint8Array }>): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    yield chunk.subarray();
  }
}

async function* toGenerator(
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>
): AsyncGenerator<Uint8Array> {
  yield* source;
}

/**
 * Presents a libp2p stream as a `PeerStream`.
 *
 * libp2p yields `Uint8ArrayList`s; they are flattened so handlers only ever
 * see plain byte arrays.
 */
class Libp2pStream implements PeerStream {
  readonly source: AsyncIterable<Uint8Array>;

  constructor(private readonly stream: Stream) {
    this.source = toBytes(stream.source);
  }

  async sink(source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>): Promise<void> {
    await this.stream.sink(toGenerator(source));
  }

  async closeWrite(): Promise<void> {
    await this.stream.closeWrite();
  }

  async close(): Promise<void> {
    await this.stream.close();
  }

  abort(error: Error): void {
    this.stream.abort(error);
  }
}

// =============================================================================
// Transport
// =============================================================================

export class Libp2pTransport implements PeerTransport {
  private readonly listeners = new Set<ConnectionListener>();

  /** Peer ids seen on open connections, keyed by their string form */
  private readonly peers = new Map<string, PeerId>();

  private constructor(
    private readonly node: Libp2p,
    private readonly log?: ActivityLog
  ) {
    node.addEventListener('peer:discovery', (evt) => {
      const peer = evt.detail.id;
      if (node.getConnections(peer).length > 0) {
        return;
      }
      node.dial(peer).catch((err: unknown) => {
        this.log?.warn(`dialing ${peer.toString()} failed: ${toError(err).message}`);
      });
    });

    node.addEventListener('connection:open', (evt) => {
      const peer = evt.detail.remotePeer;
      const id = peer.toString();
      this.peers.set(id, peer);
      for (const listener of this.listeners) {
        listener(id);
      }
    });
  }

  /**
   * Creates a stopped libp2p node with a fresh identity.
   *
   * @throws {TransportInitError} If the identity or configuration is rejected
   */
  static async create(
    config: Pick<DropConfig, 'listenAddresses' | 'mdnsIntervalMs'>,
    log?: ActivityLog
  ): Promise<Libp2pTransport> {
    try {
      const node = await createLibp2p({
        start: false,
        addresses: {
          listen: config.listenAddresses,
        },
        transports: [tcp()],
        connectionEncrypters: [noise()],
        streamMuxers: [yamux()],
        peerDiscovery: [mdns({ interval: config.mdnsIntervalMs })],
      });
      return new Libp2pTransport(node, log);
    } catch (err) {
      throw new TransportInitError(`cannot create node: ${toError(err).message}`, { cause: err });
    }
  }

  get peerId(): string {
    return this.node.peerId.toString();
  }

  /** Addresses the node is reachable on, once started */
  get addresses(): string[] {
    return this.node.getMultiaddrs().map((addr) => addr.toString());
  }

  async start(): Promise<void> {
    try {
      await this.node.start();
    } catch (err) {
      throw new TransportInitError(`cannot start node: ${toError(err).message}`, { cause: err });
    }
  }

  async stop(): Promise<void> {
    await this.node.stop();
    this.peers.clear();
  }

  onConnectionEstablished(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async registerStreamHandler(protocol: string, handler: StreamHandler): Promise<void> {
    await this.node.handle(protocol, ({ stream, connection }) => {
      const wrapped = new Libp2pStream(stream);
      void Promise.resolve()
        .then(() => handler(wrapped, connection.remotePeer.toString()))
        .catch((err: unknown) => wrapped.abort(toError(err)));
    });
  }

  async openStream(
    peerId: string,
    protocol: string,
    options: OpenStreamOptions = {}
  ): Promise<PeerStream> {
    const peer = this.peers.get(peerId);
    if (!peer) {
      throw new ConnectionError(`not connected to ${peerId}`, peerId);
    }

    const stream = await this.node.dialProtocol(peer, protocol, { signal: options.signal });
    return new Libp2pStream(stream);
  }
}
