/**
 * p2pdrop engine
 *
 * Offer descriptors, the offer registry, the announcement and transfer
 * protocols and the node that ties them to a peer transport.
 *
 * @module engine
 */

// Main node class
export { DropNode, type DropNodeOptions, type NodeStatus } from './DropNode.js';

// Type definitions (canonical source for all types)
export * from './types.js';

// Event system
export {
  TypedEventEmitter,
  type DropEvents,
  type DropEventEmitter,
} from './events.js';

// Configuration
export * from './config/index.js';

// Logging
export { ActivityLog, type LogEntry, type LogLevel, type ActivityLogOptions } from './log.js';

// Offers
export * from './offer/descriptor.js';
export { OfferRegistry, type OfferLog, type RegistryLookup } from './offer/registry.js';

// Protocols
export { sendAnnouncement, receiveAnnouncement, type AnnouncementOutcome } from './protocol/announce.js';
export { serveFile, fetchOffer, type ServeOutcome } from './protocol/transfer.js';
export type { ProtocolContext } from './protocol/stream.js';

// Selection
export { SelectionLoop, parseSelection, tokenize, type ParsedSelection } from './selection.js';

// Transports
export type * from './transport/types.js';
export { MemoryNetwork, MemoryTransport, createStreamPair } from './transport/memory.js';
export { Libp2pTransport } from './transport/libp2p.js';
