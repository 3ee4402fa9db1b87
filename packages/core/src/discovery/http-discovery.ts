import { EventEmitter } from 'events';
import { PeerRegistry } from '../registry/peer-registry.js';
import { PeerClient } from '../transport/peer-client.js';
import { PeerIdentity } from '../types.js';
import { DebugLogger } from '../utils/logger.js';
import { formatAddress, getLocalSubnets, LocalSubnet, runWithConcurrency, subnetHosts } from '../utils.js';

export interface HttpDiscoveryOptions {
  /** Port every node listens on */
  port: number;
  /** @default 5000 */
  intervalMs?: number;
  /** Probes in flight at once. @default 254 */
  maxConcurrentProbes?: number;
  /** Interfaces to sweep; defaults to the machine's IPv4 interfaces */
  subnets?: () => LocalSubnet[];
  /** Extra addresses to treat as self */
  selfAddresses?: () => string[];
}

export interface SweepResult {
  candidates: number;
  responded: PeerIdentity[];
  failed: number;
}

/**
 * Peer discovery by HTTP probing.
 *
 * Every interval, each host of every local /24 (except this machine) gets a
 * `GET /discover` on the shared node port; whatever answers is upserted
 * into the registry. Any node can in turn be probed through the
 * `/discover` route of the node server.
 *
 * Discovery is one-directional: reaching a node tells it nothing about us.
 * It becomes mutual only once the other side's sweep reaches us or we call
 * its notify path. Peers on segmented or asymmetric networks may never be
 * found.
 *
 * Emits `sweep-complete` with a SweepResult.
 */
export class HttpDiscovery extends EventEmitter {
  private readonly logger = new DebugLogger('Discovery');
  private readonly port: number;
  private readonly intervalMs: number;
  private readonly maxConcurrentProbes: number;
  private readonly subnets: () => LocalSubnet[];
  private readonly selfAddresses: () => string[];
  private timer?: ReturnType<typeof setInterval>;
  private inFlight?: Promise<SweepResult>;

  constructor(
    private readonly registry: PeerRegistry,
    private readonly client: PeerClient,
    options: HttpDiscoveryOptions
  ) {
    super();
    this.port = options.port;
    this.intervalMs = options.intervalMs ?? 5000;
    this.maxConcurrentProbes = options.maxConcurrentProbes ?? 254;
    this.subnets = options.subnets ?? (() => getLocalSubnets());
    this.selfAddresses = options.selfAddresses ?? (() => []);
  }

  /**
   * Sweep now and then on every interval
   */
  start(): void {
    if (this.timer) return;
    this.logger.info(`Starting discovery sweeps every ${this.intervalMs}ms on port ${this.port}`);
    this.runSweep();
    this.timer = setInterval(() => this.runSweep(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info('Stopped discovery sweeps');
    }
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Host addresses to probe, deduplicated across interfaces
   */
  candidates(): string[] {
    const subnets = this.subnets();
    const self = new Set([...subnets.map(subnet => subnet.address), ...this.selfAddresses()]);
    const hosts = new Set<string>();
    for (const subnet of subnets) {
      for (const host of subnetHosts(subnet.address, self)) {
        hosts.add(host);
      }
    }
    return [...hosts];
  }

  /**
   * Probe every candidate once. A sweep already running is joined rather
   * than started twice.
   */
  sweep(): Promise<SweepResult> {
    if (!this.inFlight) {
      this.inFlight = this.probeAll().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private runSweep(): void {
    this.sweep().catch(err => {
      this.logger.error('Sweep failed:', err);
    });
  }

  private async probeAll(): Promise<SweepResult> {
    const hosts = this.candidates();
    this.logger.debug(`Probing ${hosts.length} address(es)`);

    const results = await runWithConcurrency(hosts, this.maxConcurrentProbes, async host => {
      const identity = await this.client.probe(host, this.port);
      this.registry.upsert({
        displayName: identity.name,
        address: formatAddress(identity.address, identity.port),
      });
      return identity;
    });

    const responded: PeerIdentity[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled') {
        responded.push(result.value);
      }
    }

    const sweepResult: SweepResult = {
      candidates: hosts.length,
      responded,
      failed: hosts.length - responded.length,
    };
    this.logger.debug(`Sweep done: ${responded.length} responded, ${sweepResult.failed} silent`);
    this.emit('sweep-complete', sweepResult);
    return sweepResult;
  }
}
