/**
 * Core type definitions and interfaces for lanbeam
 */

/** Transfer status */
export enum TransferStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
  COMPLETED = 'completed',
}

/** Which side of a transfer this node is on */
export type TransferDirection = 'outgoing' | 'incoming';

/** Identity a node answers a probe with */
export interface PeerIdentity {
  name: string;
  /** IPv4 address or hostname, without port */
  address: string;
  port: number;
}

/** A peer observed on the network, keyed by `address` */
export interface Peer {
  displayName: string;
  /** host:port */
  address: string;
  lastSeenAt: number;
  online: boolean;
}

/** Metadata exchanged by the notify-transfer RPC */
export interface TransferMetadata {
  id: string;
  filename: string;
  sizeBytes: number;
  senderName: string;
  /** host:port of the sending node */
  senderAddress: string;
  /** host:port of the receiving node */
  receiverAddress: string;
}

/** One node's copy of a transfer */
export interface Transfer extends TransferMetadata {
  status: TransferStatus;
  direction: TransferDirection;
  createdAt: number;
  updatedAt: number;
  /** Last data-path failure, status unchanged */
  error?: string;
}

/** Hub event types */
export enum EventType {
  PEER_DISCOVERED = 'peer_discovered',
  PEER_OFFLINE = 'peer_offline',
  TRANSFER_REQUEST = 'transfer_request',
  TRANSFER_ACCEPTED = 'transfer_accepted',
  TRANSFER_REJECTED = 'transfer_rejected',
  TRANSFER_COMPLETED = 'transfer_completed',
  TRANSFER_FAILED = 'transfer_failed',
}

/** Payload carried by each event type */
export interface EventPayloads {
  [EventType.PEER_DISCOVERED]: Peer;
  [EventType.PEER_OFFLINE]: Peer;
  [EventType.TRANSFER_REQUEST]: Transfer;
  [EventType.TRANSFER_ACCEPTED]: Transfer;
  [EventType.TRANSFER_REJECTED]: Transfer;
  [EventType.TRANSFER_COMPLETED]: Transfer;
  [EventType.TRANSFER_FAILED]: Transfer;
}

/** Event as published to the hub and sent to observers */
export type HubEvent = {
  [K in EventType]: {
    type: K;
    payload: Readonly<EventPayloads[K]>;
    timestamp: number;
  };
}[EventType];

/** Payload for initiating a transfer */
export interface InitiateRequest {
  /** host:port, or a display name resolved through the registry */
  target: string;
  filename: string;
  data: Buffer;
}

/** Outcome of initiating a transfer */
export interface InitiateResult {
  transfer: Transfer;
  /** Set when the notify RPC could not reach the target */
  notifyError?: string;
}

/** Configuration for a node */
export interface NodeConfig {
  /** Display name announced to peers */
  name: string;
  /** Port every node listens on and probes */
  port: number;
  /** Interface the HTTP server binds to */
  host: string;
  /** Address announced to peers; defaults to the first physical IPv4 */
  advertiseAddress?: string;
  stagingDir: string;
  downloadDir: string;
  /** Run the active sweep */
  discovery: boolean;
  sweepIntervalMs: number;
  probeTimeoutMs: number;
  maxConcurrentProbes: number;
  reapIntervalMs: number;
  livenessMs: number;
  retentionMs: number;
  rpcTimeoutMs: number;
  uploadTimeoutMs: number;
  /** How long finished transfers stay listed */
  transferRetentionMs: number;
  /** Largest file accepted for sending or receiving */
  maxFileBytes: number;
  subscriberQueueSize: number;
  subscriberTimeoutMs: number;
}
