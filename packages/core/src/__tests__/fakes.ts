import { UnreachableError } from '../errors.js';
import { EventHub } from '../events/event-hub.js';
import { TransferOrchestrator } from '../transfer/transfer-orchestrator.js';
import { PeerClient } from '../transport/peer-client.js';
import { EventType, HubEvent, PeerIdentity, TransferMetadata } from '../types.js';
import { formatAddress } from '../utils.js';

type Method = keyof PeerClient;

/**
 * In-process PeerClient. RPCs go straight to the orchestrator registered
 * under the target address; probes go to `probeHandler`.
 */
export class FakePeerClient implements PeerClient {
  readonly calls: Array<{ method: Method; address: string }> = [];
  /** Methods that fail with UnreachableError */
  readonly failing = new Set<Method>();
  probeHandler: (host: string, port: number) => Promise<PeerIdentity> = async host => {
    throw new UnreachableError(`Probe of ${host} timed out`);
  };

  constructor(private readonly network: Map<string, TransferOrchestrator> = new Map()) {}

  async probe(host: string, port: number): Promise<PeerIdentity> {
    this.calls.push({ method: 'probe', address: formatAddress(host, port) });
    return this.probeHandler(host, port);
  }

  async notifyTransfer(address: string, metadata: TransferMetadata): Promise<void> {
    this.target('notifyTransfer', address).handleNotify({ ...metadata });
  }

  async acceptRemote(address: string, transferId: string): Promise<void> {
    this.target('acceptRemote', address).handleAcceptRemote(transferId);
  }

  async rejectRemote(address: string, transferId: string): Promise<void> {
    await this.target('rejectRemote', address).handleRejectRemote(transferId);
  }

  async upload(address: string, transfer: TransferMetadata, data: Buffer): Promise<void> {
    await this.target('upload', address).handleUpload(transfer.id, Buffer.from(data));
  }

  count(method: Method): number {
    return this.calls.filter(call => call.method === method).length;
  }

  private target(method: Method, address: string): TransferOrchestrator {
    this.calls.push({ method, address });
    const node = this.network.get(address);
    if (!node || this.failing.has(method)) {
      throw new UnreachableError(`Cannot reach ${address}`);
    }
    return node;
  }
}

/**
 * Subscribe to a hub and keep everything it delivers
 */
export function recordEvents(hub: EventHub): HubEvent[] {
  const events: HubEvent[] = [];
  hub.subscribe({
    send: event => {
      events.push(event);
    },
  });
  return events;
}

export function eventTypes(events: HubEvent[]): EventType[] {
  return events.map(event => event.type);
}
