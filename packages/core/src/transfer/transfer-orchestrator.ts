import * as path from 'path';
import {
  BadRequestError,
  errorMessage,
  InvalidStateError,
  IOFailureError,
  isLanbeamError,
  NotFoundError,
  UnreachableError,
} from '../errors.js';
import { EventHub } from '../events/event-hub.js';
import { PeerRegistry } from '../registry/peer-registry.js';
import { isSafeTransferId, StagingStore } from '../staging/staging-store.js';
import { PeerClient } from '../transport/peer-client.js';
import {
  EventType,
  InitiateRequest,
  InitiateResult,
  Transfer,
  TransferDirection,
  TransferMetadata,
  TransferStatus,
} from '../types.js';
import { DebugLogger } from '../utils/logger.js';
import { generateTransferId, parseAddress } from '../utils.js';

const TRANSITIONS: Readonly<Record<TransferStatus, readonly TransferStatus[]>> = {
  [TransferStatus.PENDING]: [TransferStatus.ACCEPTED, TransferStatus.REJECTED],
  [TransferStatus.ACCEPTED]: [TransferStatus.COMPLETED],
  [TransferStatus.REJECTED]: [],
  [TransferStatus.COMPLETED]: [],
};

/**
 * Whether `from -> to` is an edge of the transfer state machine
 */
export function canTransition(from: TransferStatus, to: TransferStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Name and `host:port` this node announces */
export interface LocalIdentity {
  name: string;
  address: string;
}

export interface TransferOrchestratorOptions {
  registry: PeerRegistry;
  staging: StagingStore;
  hub: EventHub;
  client: PeerClient;
  self: () => LocalIdentity;
  /** Where received files end up */
  downloadDir: string;
  /** Time a rejected or completed transfer is kept after its last change. @default 3600000 */
  retentionMs?: number;
  /** How often expired transfers are pruned. @default 60000 */
  pruneIntervalMs?: number;
  clock?: () => number;
}

/** A completed incoming transfer and where its bytes are */
export interface CompletedFile {
  transfer: Transfer;
  filePath: string;
}

/**
 * Owns this node's transfer table and drives the push data path:
 *
 *   sender                          receiver
 *   initiate ── notify-transfer ──▶ pending, transfer_request
 *                                   accept ─▶ accepted
 *   accepted ◀── accept-remote ──
 *   upload ─────────────────────▶ completed
 *   completed
 *
 * or `reject` on the receiver, mirrored to the sender by reject-remote.
 *
 * The table is only read and written synchronously. Every status change is
 * a check-and-set with no await in between, so concurrent callers cannot
 * both win a transition. Network and disk work happens outside it.
 */
export class TransferOrchestrator {
  private readonly logger = new DebugLogger('Transfers');
  private readonly transfers = new Map<string, Transfer>();
  private readonly savedPaths = new Map<string, string>();
  private readonly receiving = new Set<string>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly registry: PeerRegistry;
  private readonly staging: StagingStore;
  private readonly hub: EventHub;
  private readonly client: PeerClient;
  private readonly self: () => LocalIdentity;
  private readonly downloadDir: string;
  private readonly retentionMs: number;
  private readonly pruneIntervalMs: number;
  private readonly clock: () => number;
  private pruneTimer?: ReturnType<typeof setInterval>;

  constructor(options: TransferOrchestratorOptions) {
    this.registry = options.registry;
    this.staging = options.staging;
    this.hub = options.hub;
    this.client = options.client;
    this.self = options.self;
    this.downloadDir = options.downloadDir;
    this.retentionMs = options.retentionMs ?? 3_600_000;
    this.pruneIntervalMs = options.pruneIntervalMs ?? 60_000;
    this.clock = options.clock ?? Date.now;
  }

  start(): void {
    if (this.pruneTimer) return;
    this.pruneTimer = setInterval(() => this.prune(), this.pruneIntervalMs);
  }

  stop(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = undefined;
    }
  }

  /**
   * Forget rejected and completed transfers older than the retention window.
   * Files already saved to the download directory stay there.
   * @returns ids of the forgotten transfers
   */
  prune(): string[] {
    const cutoff = this.clock() - this.retentionMs;
    const removed: string[] = [];
    for (const [id, transfer] of this.transfers) {
      if (TRANSITIONS[transfer.status].length === 0 && transfer.updatedAt <= cutoff) {
        this.transfers.delete(id);
        this.savedPaths.delete(id);
        removed.push(id);
      }
    }
    if (removed.length > 0) {
      this.logger.debug(`Pruned ${removed.length} finished transfer(s)`);
    }
    return removed;
  }

  list(): Transfer[] {
    return Array.from(this.transfers.values(), transfer => ({ ...transfer }));
  }

  get(transferId: string): Transfer {
    return { ...this.require(transferId) };
  }

  /**
   * Stage a file and announce it to the target.
   * The transfer is kept as pending even when the target cannot be reached.
   */
  async initiate(request: InitiateRequest): Promise<InitiateResult> {
    const filename = path.basename(request.filename);
    if (!filename || filename === '.' || filename === '..') {
      throw new BadRequestError('A file name is required');
    }

    const receiverAddress = this.resolveTarget(request.target);
    const self = this.self();
    if (receiverAddress === self.address) {
      throw new BadRequestError('Cannot send a file to this node');
    }

    const id = generateTransferId();
    await this.staging.put(id, request.data);

    const now = this.clock();
    const transfer: Transfer = {
      id,
      filename,
      sizeBytes: request.data.length,
      senderName: self.name,
      senderAddress: self.address,
      receiverAddress,
      status: TransferStatus.PENDING,
      direction: 'outgoing',
      createdAt: now,
      updatedAt: now,
    };
    this.transfers.set(id, transfer);
    this.logger.info(`Sending ${filename} (${transfer.sizeBytes} bytes) to ${receiverAddress} as ${id}`);

    try {
      await this.client.notifyTransfer(receiverAddress, toMetadata(transfer));
      return { transfer: this.get(id) };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Could not notify ${receiverAddress} of ${id}: ${message}`);
      return { transfer: this.get(id), notifyError: message };
    }
  }

  /**
   * notify-transfer: record an incoming transfer.
   * A known id is left untouched and publishes nothing.
   */
  handleNotify(metadata: TransferMetadata): { transfer: Transfer; created: boolean } {
    if (!isSafeTransferId(metadata.id)) {
      throw new BadRequestError(`Invalid transfer id: ${metadata.id}`);
    }

    const existing = this.transfers.get(metadata.id);
    if (existing) {
      this.logger.debug(`Duplicate notify for ${metadata.id} ignored`);
      return { transfer: { ...existing }, created: false };
    }

    const now = this.clock();
    const transfer: Transfer = {
      id: metadata.id,
      filename: path.basename(metadata.filename),
      sizeBytes: metadata.sizeBytes,
      senderName: metadata.senderName,
      senderAddress: metadata.senderAddress,
      receiverAddress: metadata.receiverAddress,
      status: TransferStatus.PENDING,
      direction: 'incoming',
      createdAt: now,
      updatedAt: now,
    };
    this.transfers.set(transfer.id, transfer);

    // The sender is evidently alive; this is how discovery becomes mutual
    this.registry.upsert({ displayName: metadata.senderName, address: metadata.senderAddress });

    this.logger.info(`Incoming ${transfer.filename} (${transfer.sizeBytes} bytes) from ${transfer.senderName}`);
    const snapshot = { ...transfer };
    this.hub.publish({ type: EventType.TRANSFER_REQUEST, payload: snapshot });
    return { transfer: snapshot, created: true };
  }

  /**
   * Accept an incoming transfer and ask the sender to push the bytes
   */
  async accept(transferId: string): Promise<Transfer> {
    const accepted = this.transition(transferId, TransferStatus.ACCEPTED, 'incoming');
    this.hub.publish({ type: EventType.TRANSFER_ACCEPTED, payload: accepted });

    try {
      await this.client.acceptRemote(accepted.senderAddress, transferId);
    } catch (err) {
      this.fail(transferId, err);
      throw isLanbeamError(err)
        ? err
        : new UnreachableError(`Could not reach sender ${accepted.senderAddress}`, { cause: err });
    }

    return this.get(transferId);
  }

  /**
   * Reject an incoming transfer and tell the sender, best-effort
   */
  async reject(transferId: string): Promise<Transfer> {
    const rejected = this.transition(transferId, TransferStatus.REJECTED, 'incoming');
    this.hub.publish({ type: EventType.TRANSFER_REJECTED, payload: rejected });
    await this.discardStaged(transferId);

    try {
      await this.client.rejectRemote(rejected.senderAddress, transferId);
    } catch (err) {
      this.logger.warn(`Could not tell ${rejected.senderAddress} about rejecting ${transferId}: ${errorMessage(err)}`);
    }

    return rejected;
  }

  /**
   * accept-remote: the receiver accepted one of our transfers, start pushing
   */
  handleAcceptRemote(transferId: string): Transfer {
    const accepted = this.transition(transferId, TransferStatus.ACCEPTED, 'outgoing');
    this.hub.publish({ type: EventType.TRANSFER_ACCEPTED, payload: accepted });
    this.track(this.push(transferId));
    return accepted;
  }

  /**
   * reject-remote: the receiver turned one of our transfers down
   */
  async handleRejectRemote(transferId: string): Promise<Transfer> {
    const rejected = this.transition(transferId, TransferStatus.REJECTED, 'outgoing');
    this.hub.publish({ type: EventType.TRANSFER_REJECTED, payload: rejected });
    await this.discardStaged(transferId);
    return rejected;
  }

  /**
   * upload: the sender pushed the bytes of an accepted transfer
   */
  async handleUpload(transferId: string, data: Buffer): Promise<Transfer> {
    const transfer = this.require(transferId);
    if (transfer.direction !== 'incoming') {
      throw new InvalidStateError(`Transfer ${transferId} is not incoming`);
    }
    if (transfer.status !== TransferStatus.ACCEPTED) {
      throw new InvalidStateError(`Transfer ${transferId} is ${transfer.status}, expected ${TransferStatus.ACCEPTED}`);
    }
    if (this.receiving.has(transferId)) {
      throw new InvalidStateError(`Upload for ${transferId} already in progress`);
    }
    if (data.length !== transfer.sizeBytes) {
      throw new IOFailureError(`Expected ${transfer.sizeBytes} bytes for ${transferId}, got ${data.length}`);
    }

    this.receiving.add(transferId);
    try {
      const destination = path.join(this.downloadDir, `${transferId}_${transfer.filename}`);
      try {
        await this.staging.put(transferId, data);
        await this.staging.moveTo(transferId, destination);
      } catch (err) {
        await this.discardStaged(transferId);
        this.fail(transferId, err);
        throw err;
      }

      const completed = this.transition(transferId, TransferStatus.COMPLETED, 'incoming');
      this.savedPaths.set(transferId, destination);
      this.logger.info(`Received ${completed.filename} from ${completed.senderName}`);
      this.hub.publish({ type: EventType.TRANSFER_COMPLETED, payload: completed });
      return completed;
    } finally {
      this.receiving.delete(transferId);
    }
  }

  /**
   * Where the bytes of a completed incoming transfer were saved
   */
  completedFile(transferId: string): CompletedFile {
    const transfer = this.require(transferId);
    if (transfer.status !== TransferStatus.COMPLETED) {
      throw new InvalidStateError(`Transfer ${transferId} is ${transfer.status}, not completed`);
    }
    const filePath = this.savedPaths.get(transferId);
    if (!filePath) {
      throw new NotFoundError(`No local copy of ${transferId}`);
    }
    return { transfer: { ...transfer }, filePath };
  }

  /**
   * Wait for background pushes to settle
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.tasks]);
  }

  private async push(transferId: string): Promise<void> {
    const transfer = this.get(transferId);
    try {
      const data = await this.staging.get(transferId);
      if (!data) {
        throw new IOFailureError(`Staged bytes for ${transferId} are gone`);
      }

      this.logger.debug(`Pushing ${transferId} to ${transfer.receiverAddress}`);
      await this.client.upload(transfer.receiverAddress, toMetadata(transfer), data);
    } catch (err) {
      this.fail(transferId, err);
      return;
    }

    const completed = this.transition(transferId, TransferStatus.COMPLETED, 'outgoing');
    this.logger.info(`Delivered ${completed.filename} to ${completed.receiverAddress}`);
    this.hub.publish({ type: EventType.TRANSFER_COMPLETED, payload: completed });
    await this.discardStaged(transferId);
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch(err => {
        this.logger.error('Background transfer task failed:', err);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  private resolveTarget(target: string): string {
    if (parseAddress(target)) {
      return target;
    }
    const address = this.registry.resolve(target);
    if (!address) {
      throw new NotFoundError(`Unknown peer: ${target}`);
    }
    return address;
  }

  private require(transferId: string): Transfer {
    const transfer = this.transfers.get(transferId);
    if (!transfer) {
      throw new NotFoundError(`Transfer not found: ${transferId}`);
    }
    return transfer;
  }

  /**
   * Check-and-set of one status. Synchronous on purpose.
   */
  private transition(transferId: string, to: TransferStatus, direction: TransferDirection): Transfer {
    const transfer = this.require(transferId);
    if (transfer.direction !== direction) {
      throw new InvalidStateError(`Transfer ${transferId} is ${transfer.direction}, cannot become ${to} here`);
    }
    if (!canTransition(transfer.status, to)) {
      throw new InvalidStateError(`Transfer ${transferId} is ${transfer.status}, cannot become ${to}`);
    }
    transfer.status = to;
    transfer.updatedAt = this.clock();
    delete transfer.error;
    return { ...transfer };
  }

  private fail(transferId: string, err: unknown): void {
    const transfer = this.transfers.get(transferId);
    if (!transfer) return;
    transfer.error = errorMessage(err);
    transfer.updatedAt = this.clock();
    this.logger.error(`Transfer ${transferId} failed while ${transfer.status}: ${transfer.error}`);
    this.hub.publish({ type: EventType.TRANSFER_FAILED, payload: { ...transfer } });
  }

  private async discardStaged(transferId: string): Promise<void> {
    try {
      await this.staging.delete(transferId);
    } catch (err) {
      this.logger.warn(`Could not delete staged ${transferId}: ${errorMessage(err)}`);
    }
  }
}

function toMetadata(transfer: Transfer): TransferMetadata {
  return {
    id: transfer.id,
    filename: transfer.filename,
    sizeBytes: transfer.sizeBytes,
    senderName: transfer.senderName,
    senderAddress: transfer.senderAddress,
    receiverAddress: transfer.receiverAddress,
  };
}
