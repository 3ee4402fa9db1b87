/**
 * Core library exports
 */

// Types
export * from './types.js';
export * from './errors.js';

// Node
export { LanNode, defaultNodeConfig, DEFAULT_PORT } from './node.js';
export type { LanNodeOptions } from './node.js';

// Discovery
export { HttpDiscovery } from './discovery/http-discovery.js';
export type { HttpDiscoveryOptions, SweepResult } from './discovery/http-discovery.js';
export { PeerRegistry } from './registry/peer-registry.js';
export type { PeerRegistryOptions, ReapResult, UpsertResult } from './registry/peer-registry.js';

// Events
export { EventHub } from './events/event-hub.js';
export type { EventSink, HubEventInput, HubOptions, SubscribeOptions, Subscription } from './events/event-hub.js';
export { EventSocketBridge } from './events/ws-bridge.js';

// Transfers
export { TransferOrchestrator, canTransition } from './transfer/transfer-orchestrator.js';
export type { CompletedFile, LocalIdentity, TransferOrchestratorOptions } from './transfer/transfer-orchestrator.js';
export { StagingStore, isSafeTransferId } from './staging/staging-store.js';

// Transport
export { HttpPeerClient } from './transport/peer-client.js';
export type { HttpPeerClientOptions, PeerClient } from './transport/peer-client.js';
export { NodeServer, parseTransferMetadata } from './transport/node-server.js';

// Utilities
export {
  broadcastAddress,
  defaultDeviceName,
  formatAddress,
  formatBytes,
  generateTransferId,
  getLocalIpAddresses,
  getLocalSubnets,
  parseAddress,
  subnetHosts,
} from './utils.js';
export type { LocalSubnet } from './utils.js';
export { FileUtils } from './utils/file-utils.js';
export type { MultipartFile, MultipartForm } from './utils/file-utils.js';
export { DebugLogger, LogLevel } from './utils/logger.js';
