import { EventEmitter } from 'events';
import { Peer } from '../types.js';
import { DebugLogger } from '../utils/logger.js';

export interface PeerRegistryOptions {
  /** Time since last contact after which a peer is offline. @default 60000 */
  livenessMs?: number;
  /** Time since last contact after which a peer is forgotten. @default 300000 */
  retentionMs?: number;
  /** How often the reaper runs. @default 10000 */
  reapIntervalMs?: number;
  clock?: () => number;
}

export interface UpsertResult {
  peer: Peer;
  /** New record, or a known record coming back online */
  created: boolean;
}

export interface ReapResult {
  offline: Peer[];
  evicted: Peer[];
}

export interface PeerRegistry {
  on(event: 'peer-online', listener: (peer: Peer) => void): this;
  on(event: 'peer-offline', listener: (peer: Peer) => void): this;
  emit(event: 'peer-online' | 'peer-offline', peer: Peer): boolean;
}

/**
 * Known peers keyed by address.
 *
 * The map is private to this class and only touched synchronously, so each
 * method is one critical section. Callers always get copies.
 *
 * Emits `peer-online` for new or returning peers and `peer-offline` once per
 * peer that goes stale.
 */
export class PeerRegistry extends EventEmitter {
  private readonly logger = new DebugLogger('PeerRegistry');
  private readonly peers = new Map<string, Peer>();
  private readonly livenessMs: number;
  private readonly retentionMs: number;
  private readonly reapIntervalMs: number;
  private readonly clock: () => number;
  private reapTimer?: ReturnType<typeof setInterval>;

  constructor(options: PeerRegistryOptions = {}) {
    super();
    this.livenessMs = options.livenessMs ?? 60_000;
    this.retentionMs = options.retentionMs ?? 300_000;
    this.reapIntervalMs = options.reapIntervalMs ?? 10_000;
    this.clock = options.clock ?? Date.now;

    if (this.retentionMs < this.livenessMs) {
      throw new Error('retentionMs must not be shorter than livenessMs');
    }
  }

  /**
   * Start the background reaper
   */
  start(): void {
    if (this.reapTimer) return;
    this.reapTimer = setInterval(() => this.reap(), this.reapIntervalMs);
  }

  stop(): void {
    if (this.reapTimer) {
      clearInterval(this.reapTimer);
      this.reapTimer = undefined;
    }
  }

  /**
   * Insert or refresh a peer, stamping it seen now
   */
  upsert(identity: { displayName: string; address: string }): UpsertResult {
    const now = this.clock();
    const existing = this.peers.get(identity.address);

    if (existing) {
      const cameBack = !existing.online;
      existing.displayName = identity.displayName;
      existing.lastSeenAt = now;
      existing.online = true;
      if (cameBack) {
        this.logger.info(`Peer back online: ${existing.displayName} (${existing.address})`);
        this.emit('peer-online', { ...existing });
      }
      return { peer: { ...existing }, created: cameBack };
    }

    const peer: Peer = {
      displayName: identity.displayName,
      address: identity.address,
      lastSeenAt: now,
      online: true,
    };
    this.peers.set(peer.address, peer);
    this.logger.info(`Peer discovered: ${peer.displayName} (${peer.address})`);
    this.emit('peer-online', { ...peer });
    return { peer: { ...peer }, created: true };
  }

  /**
   * Snapshot of online peers, in no particular order
   */
  listOnline(): Peer[] {
    return this.list().filter(peer => peer.online);
  }

  /**
   * Snapshot of every retained peer
   */
  list(): Peer[] {
    return Array.from(this.peers.values(), peer => ({ ...peer }));
  }

  get(address: string): Peer | undefined {
    const peer = this.peers.get(address);
    return peer ? { ...peer } : undefined;
  }

  /**
   * Address of the first online peer with this display name.
   * Names are not unique; first match wins.
   */
  resolve(displayName: string): string | undefined {
    for (const peer of this.peers.values()) {
      if (peer.online && peer.displayName === displayName) {
        return peer.address;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.peers.size;
  }

  /**
   * Mark stale peers offline and forget expired ones.
   * Runs on the reaper interval; public so it can be driven directly.
   */
  reap(): ReapResult {
    const now = this.clock();
    const result: ReapResult = { offline: [], evicted: [] };

    for (const [address, peer] of this.peers) {
      const age = now - peer.lastSeenAt;

      if (peer.online && age > this.livenessMs) {
        peer.online = false;
        const snapshot = { ...peer };
        result.offline.push(snapshot);
        this.logger.info(`Peer offline: ${peer.displayName} (${address})`);
        this.emit('peer-offline', snapshot);
      }

      if (age > this.retentionMs) {
        this.peers.delete(address);
        result.evicted.push({ ...peer });
        this.logger.debug(`Peer evicted: ${peer.displayName} (${address})`);
      }
    }

    return result;
  }
}
