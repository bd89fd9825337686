/**
 * Peer Transport Types
 *
 * The narrow contract the protocol handlers consume. Identity, encryption,
 * discovery and multiplexing all live behind it.
 *
 * @module engine/transport/types
 */

/**
 * A named, ordered, bidirectional byte stream to one peer.
 */
export interface PeerStream {
  /** Bytes sent by the remote, ending when the remote closes its write side */
  readonly source: AsyncIterable<Uint8Array>;

  /** Writes every chunk of `source`, then closes the write side */
  sink(source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>): Promise<void>;

  /** Closes the write side only */
  closeWrite(): Promise<void>;

  /** Closes both sides gracefully */
  close(): Promise<void>;

  /** Tears the stream down; pending reads and writes on both ends fail with `error` */
  abort(error: Error): void;
}

/**
 * Called for every inbound stream of a registered protocol.
 */
export type StreamHandler = (stream: PeerStream, peerId: string) => void | Promise<void>;

/**
 * Called once per newly established connection.
 */
export type ConnectionListener = (peerId: string) => void;

export interface OpenStreamOptions {
  /** Aborts the open when signalled */
  signal?: AbortSignal;
}

/**
 * Peer transport layer.
 */
export interface PeerTransport {
  /** Identifier of the local peer; available once started */
  readonly peerId: string;

  /**
   * Starts listening and discovering peers.
   *
   * @throws {TransportInitError} If the local identity or listener cannot be set up
   */
  start(): Promise<void>;

  /** Stops the transport and closes every connection */
  stop(): Promise<void>;

  /**
   * Subscribes to new-connection notifications.
   *
   * @returns Function that removes the listener
   */
  onConnectionEstablished(listener: ConnectionListener): () => void;

  /**
   * Registers the handler for inbound streams of `protocol`.
   * May be called before or after `start`.
   */
  registerStreamHandler(protocol: string, handler: StreamHandler): Promise<void>;

  /**
   * Opens an outbound stream to a peer.
   *
   * @throws {ConnectionError} If the peer cannot be reached or does not speak `protocol`
   */
  openStream(peerId: string, protocol: string, options?: OpenStreamOptions): Promise<PeerStream>;
}
