import * as fs from 'fs';
import * as http from 'http';
import { pipeline } from 'stream/promises';
import { BadRequestError, NotFoundError } from '../errors.js';
import { EventSocketBridge } from '../events/ws-bridge.js';
import { PeerRegistry } from '../registry/peer-registry.js';
import { LocalIdentity, TransferOrchestrator } from '../transfer/transfer-orchestrator.js';
import { PeerIdentity, TransferMetadata } from '../types.js';
import { FileUtils } from '../utils/file-utils.js';
import { parseAddress } from '../utils.js';
import { BaseHttpServer } from './base-http-server.js';

export interface NodeServerOptions {
  port: number;
  host: string;
  registry: PeerRegistry;
  transfers: TransferOrchestrator;
  events: EventSocketBridge;
  self: () => LocalIdentity;
  /** Largest file accepted by /api/send and /api/upload */
  maxFileBytes: number;
}

/**
 * Validate a notify-transfer body
 */
export function parseTransferMetadata(value: unknown): TransferMetadata {
  if (typeof value !== 'object' || value === null) {
    throw new BadRequestError('Transfer metadata must be an object');
  }

  const record: Record<string, unknown> = { ...value };
  const text = (field: string): string => {
    const fieldValue = record[field];
    if (typeof fieldValue !== 'string' || fieldValue === '') {
      throw new BadRequestError(`Missing or invalid field: ${field}`);
    }
    return fieldValue;
  };

  const sizeBytes = record.sizeBytes;
  if (typeof sizeBytes !== 'number' || !Number.isInteger(sizeBytes) || sizeBytes < 0) {
    throw new BadRequestError('Missing or invalid field: sizeBytes');
  }

  const metadata: TransferMetadata = {
    id: text('id'),
    filename: text('filename'),
    sizeBytes,
    senderName: text('senderName'),
    senderAddress: text('senderAddress'),
    receiverAddress: text('receiverAddress'),
  };
  if (!parseAddress(metadata.senderAddress)) {
    throw new BadRequestError(`Invalid sender address: ${metadata.senderAddress}`);
  }

  return metadata;
}

/**
 * HTTP surface of a node: the peer RPCs plus the local observer API
 */
export class NodeServer extends BaseHttpServer {
  private readonly registry: PeerRegistry;
  private readonly transfers: TransferOrchestrator;
  private readonly events: EventSocketBridge;
  private readonly self: () => LocalIdentity;
  private readonly maxFileBytes: number;

  constructor(options: NodeServerOptions) {
    super(options.port, options.host);
    this.registry = options.registry;
    this.transfers = options.transfers;
    this.events = options.events;
    this.self = options.self;
    this.maxFileBytes = options.maxFileBytes;
  }

  protected onServerCreated(server: http.Server): void {
    this.events.attach(server);
  }

  protected async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const pathname = new URL(req.url || '/', 'http://localhost').pathname;

    // Probe
    if (method === 'GET' && pathname === '/discover') {
      this.sendJson(res, 200, this.identity());
      return;
    }

    if (method === 'GET' && pathname === '/health') {
      this.sendJson(res, 200, {
        status: 'ok',
        peers: this.registry.listOnline().length,
        transfers: this.transfers.list().length,
      });
      return;
    }

    if (method === 'GET' && pathname === '/api/identity') {
      this.sendJson(res, 200, this.identity());
      return;
    }

    if (method === 'GET' && pathname === '/api/peers') {
      this.sendJson(res, 200, this.registry.listOnline());
      return;
    }

    if (method === 'GET' && pathname === '/api/transfers') {
      this.sendJson(res, 200, this.transfers.list());
      return;
    }

    if (method === 'POST' && pathname === '/api/send') {
      await this.handleSend(req, res);
      return;
    }

    if (method === 'POST' && pathname === '/api/notify-transfer') {
      const metadata = parseTransferMetadata(await FileUtils.readJson(req));
      if (metadata.sizeBytes > this.maxFileBytes) {
        throw new BadRequestError(`File exceeds ${this.maxFileBytes} bytes`);
      }
      const { created } = this.transfers.handleNotify(metadata);
      this.sendJson(res, 200, { status: created ? 'notified' : 'duplicate' });
      return;
    }

    const route = matchIdRoute(pathname);
    if (route) {
      await this.handleIdRoute(method, route.action, route.id, req, res);
      return;
    }

    throw new NotFoundError(`No route for ${method} ${pathname}`);
  }

  private async handleIdRoute(
    method: string,
    action: string,
    id: string,
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    if (method === 'GET' && action === 'transfers') {
      this.sendJson(res, 200, this.transfers.get(id));
      return;
    }

    if (method === 'GET' && action === 'download') {
      await this.handleDownload(id, res);
      return;
    }

    if (method === 'POST') {
      switch (action) {
        case 'accept':
          this.sendJson(res, 200, await this.transfers.accept(id));
          return;
        case 'reject':
          this.sendJson(res, 200, await this.transfers.reject(id));
          return;
        case 'accept-remote':
          this.sendJson(res, 202, this.transfers.handleAcceptRemote(id));
          return;
        case 'reject-remote':
          this.sendJson(res, 200, await this.transfers.handleRejectRemote(id));
          return;
        case 'upload': {
          const form = await FileUtils.readMultipart(req, this.maxFileBytes + 64 * 1024);
          const file = form.files.find(part => part.field === 'file');
          if (!file) {
            throw new BadRequestError('No file provided');
          }
          await this.transfers.handleUpload(id, file.data);
          this.sendJson(res, 200, { status: 'received' });
          return;
        }
      }
    }

    throw new NotFoundError(`No route for ${method} /api/${action}/${id}`);
  }

  /**
   * Local initiate: multipart `file` plus a `target` field
   */
  private async handleSend(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const form = await FileUtils.readMultipart(req, this.maxFileBytes + 64 * 1024);
    const file = form.files.find(part => part.field === 'file');
    const target = form.fields.target?.trim();

    if (!file) {
      throw new BadRequestError('No file provided');
    }
    if (!target) {
      throw new BadRequestError('Target required');
    }
    if (file.data.length > this.maxFileBytes) {
      throw new BadRequestError(`File exceeds ${this.maxFileBytes} bytes`);
    }

    const result = await this.transfers.initiate({ target, filename: file.filename, data: file.data });
    this.sendJson(res, result.notifyError ? 202 : 201, result);
  }

  private async handleDownload(id: string, res: http.ServerResponse): Promise<void> {
    const { transfer, filePath } = this.transfers.completedFile(id);

    let size: number;
    try {
      size = (await fs.promises.stat(filePath)).size;
    } catch (err) {
      throw new NotFoundError(`File for ${id} is no longer on disk`, { cause: err });
    }

    res.writeHead(200, {
      'Content-Length': size,
      'Content-Type': 'application/octet-stream',
      'Content-Disposition': `attachment; filename="${encodeURIComponent(transfer.filename)}"`,
    });

    try {
      await pipeline(fs.createReadStream(filePath), res);
    } catch (err) {
      if (!isClientGone(err)) {
        throw err;
      }
      this.logger.debug(`Download of ${id} aborted by the client`);
      return;
    }
    this.logger.debug(`Served ${transfer.filename} for ${id}`);
  }

  private identity(): PeerIdentity {
    const self = this.self();
    const parsed = parseAddress(self.address);
    return {
      name: self.name,
      address: parsed ? parsed.host : self.address,
      port: parsed ? parsed.port : this.port,
    };
  }

  protected getLogPrefix(): string {
    return 'NodeServer';
  }
}

const CLIENT_GONE_CODES = new Set(['ERR_STREAM_PREMATURE_CLOSE', 'ECONNRESET', 'EPIPE']);

function isClientGone(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    CLIENT_GONE_CODES.has(err.code)
  );
}

const ID_ROUTE = /^\/api\/(transfers|download|accept|reject|accept-remote|reject-remote|upload)\/([^/]+)$/;

function matchIdRoute(pathname: string): { action: string; id: string } | null {
  const match = pathname.match(ID_ROUTE);
  if (!match) {
    return null;
  }
  let id: string;
  try {
    id = decodeURIComponent(match[2]);
  } catch {
    throw new BadRequestError(`Malformed transfer id: ${match[2]}`);
  }
  return { action: match[1], id };
}
