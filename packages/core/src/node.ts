import * as os from 'os';
import * as path from 'path';
import { HttpDiscovery } from './discovery/http-discovery.js';
import { EventHub } from './events/event-hub.js';
import { EventSocketBridge } from './events/ws-bridge.js';
import { PeerRegistry } from './registry/peer-registry.js';
import { StagingStore } from './staging/staging-store.js';
import { LocalIdentity, TransferOrchestrator } from './transfer/transfer-orchestrator.js';
import { NodeServer } from './transport/node-server.js';
import { HttpPeerClient, PeerClient } from './transport/peer-client.js';
import { EventType, NodeConfig } from './types.js';
import { DebugLogger } from './utils/logger.js';
import { defaultDeviceName, formatAddress, getLocalIpAddresses } from './utils.js';

export const DEFAULT_PORT = 8080;

/**
 * Fill in every option not given
 */
export function defaultNodeConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  const port = overrides.port ?? DEFAULT_PORT;
  return {
    name: defaultDeviceName(),
    port,
    host: '0.0.0.0',
    // One directory per port: sender and receiver stage under the same id
    stagingDir: path.join(os.tmpdir(), 'lanbeam', String(port), 'staging'),
    downloadDir: path.resolve('downloads'),
    discovery: true,
    sweepIntervalMs: 5000,
    probeTimeoutMs: 2000,
    maxConcurrentProbes: 254,
    reapIntervalMs: 10_000,
    livenessMs: 60_000,
    retentionMs: 300_000,
    rpcTimeoutMs: 10_000,
    uploadTimeoutMs: 30_000,
    transferRetentionMs: 3_600_000,
    maxFileBytes: 512 * 1024 * 1024,
    subscriberQueueSize: 256,
    subscriberTimeoutMs: 5000,
    ...overrides,
  };
}

export interface LanNodeOptions extends Partial<NodeConfig> {
  /** Replaces the HTTP client used for peer calls */
  client?: PeerClient;
}

/**
 * One node: registry, discovery, transfers and the event hub behind a
 * single HTTP port.
 */
export class LanNode {
  private readonly logger = new DebugLogger('LanNode');
  readonly config: NodeConfig;
  readonly hub: EventHub;
  readonly registry: PeerRegistry;
  readonly staging: StagingStore;
  readonly client: PeerClient;
  readonly discovery: HttpDiscovery;
  readonly transfers: TransferOrchestrator;
  private readonly events: EventSocketBridge;
  private readonly server: NodeServer;
  private started = false;

  constructor(options: LanNodeOptions = {}) {
    const { client, ...overrides } = options;
    this.config = defaultNodeConfig(overrides);

    this.hub = new EventHub({
      queueSize: this.config.subscriberQueueSize,
      timeoutMs: this.config.subscriberTimeoutMs,
    });
    this.registry = new PeerRegistry({
      livenessMs: this.config.livenessMs,
      retentionMs: this.config.retentionMs,
      reapIntervalMs: this.config.reapIntervalMs,
    });
    this.staging = new StagingStore(this.config.stagingDir);
    this.client =
      client ??
      new HttpPeerClient({
        probeTimeoutMs: this.config.probeTimeoutMs,
        rpcTimeoutMs: this.config.rpcTimeoutMs,
        uploadTimeoutMs: this.config.uploadTimeoutMs,
      });

    this.discovery = new HttpDiscovery(this.registry, this.client, {
      port: this.config.port,
      intervalMs: this.config.sweepIntervalMs,
      maxConcurrentProbes: this.config.maxConcurrentProbes,
      selfAddresses: () => [this.advertisedHost()],
    });

    this.transfers = new TransferOrchestrator({
      registry: this.registry,
      staging: this.staging,
      hub: this.hub,
      client: this.client,
      self: () => this.identity(),
      downloadDir: this.config.downloadDir,
      retentionMs: this.config.transferRetentionMs,
    });

    this.events = new EventSocketBridge(this.hub);
    this.server = new NodeServer({
      port: this.config.port,
      host: this.config.host,
      registry: this.registry,
      transfers: this.transfers,
      events: this.events,
      self: () => this.identity(),
      maxFileBytes: this.config.maxFileBytes,
    });

    this.registry.on('peer-online', peer => {
      this.hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer });
    });
    this.registry.on('peer-offline', peer => {
      this.hub.publish({ type: EventType.PEER_OFFLINE, payload: peer });
    });
  }

  /**
   * Listen, then start the reaper and, if enabled, the sweep
   * @returns the bound port
   */
  async start(): Promise<number> {
    if (this.started) {
      return this.server.getPort();
    }

    const port = await this.server.startServer();
    this.started = true;
    this.registry.start();
    this.transfers.start();
    if (this.config.discovery) {
      this.discovery.start();
    }

    this.logger.info(`${this.config.name} listening as ${this.identity().address}`);
    return port;
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    this.discovery.stop();
    this.registry.stop();
    this.transfers.stop();
    await this.transfers.drain();
    this.events.close();
    await this.server.stopServer();
    this.hub.close();
    this.logger.info(`${this.config.name} stopped`);
  }

  get port(): number {
    return this.server.getPort();
  }

  get running(): boolean {
    return this.started;
  }

  /** Name and `host:port` announced to peers */
  identity(): LocalIdentity {
    const port = this.server.getPort() || this.config.port;
    return {
      name: this.config.name,
      address: formatAddress(this.advertisedHost(), port),
    };
  }

  private advertisedHost(): string {
    return this.config.advertiseAddress || getLocalIpAddresses()[0] || '127.0.0.1';
  }
}
