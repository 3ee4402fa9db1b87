import { errorFromCode, FileUtils, Peer, PeerIdentity, Transfer, TransferStatus, UnreachableError } from '@lanbeam/core';
import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';

export const DEFAULT_API = 'http://127.0.0.1:8080';

export interface DownloadProgress {
  received: number;
  total: number;
}

interface SendResult {
  transfer: Transfer;
  notifyError?: string;
}

type Guard<T> = (value: unknown) => value is T;

/**
 * Client for a running node's local HTTP API
 */
export class NodeApiClient {
  private readonly base: URL;

  constructor(baseUrl: string = DEFAULT_API) {
    this.base = new URL(baseUrl);
  }

  identity(): Promise<PeerIdentity> {
    return this.json('GET', '/api/identity', isIdentity);
  }

  peers(): Promise<Peer[]> {
    return this.json('GET', '/api/peers', arrayOf(isPeer));
  }

  transfers(): Promise<Transfer[]> {
    return this.json('GET', '/api/transfers', arrayOf(isTransfer));
  }

  transfer(id: string): Promise<Transfer> {
    return this.json('GET', `/api/transfers/${encodeURIComponent(id)}`, isTransfer);
  }

  async send(filePath: string, target: string): Promise<SendResult> {
    const data = await fs.promises.readFile(filePath);
    const { body, contentType } = FileUtils.buildMultipart(
      { field: 'file', filename: path.basename(filePath), data },
      { target }
    );
    return this.json('POST', '/api/send', isSendResult, body, { 'Content-Type': contentType });
  }

  accept(id: string): Promise<Transfer> {
    return this.json('POST', `/api/accept/${encodeURIComponent(id)}`, isTransfer);
  }

  reject(id: string): Promise<Transfer> {
    return this.json('POST', `/api/reject/${encodeURIComponent(id)}`, isTransfer);
  }

  /**
   * Save a completed transfer's bytes under `outputDir`
   * @returns the written path
   */
  async download(id: string, outputDir: string, onProgress?: (progress: DownloadProgress) => void): Promise<string> {
    const transfer = await this.transfer(id);
    await fs.promises.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, path.basename(transfer.filename));

    const res = await this.open('GET', `/api/download/${encodeURIComponent(id)}`);
    if (res.statusCode !== 200) {
      throw await this.failure(res);
    }

    const total = Number(res.headers['content-length']) || transfer.sizeBytes;
    let received = 0;

    await new Promise<void>((resolve, reject) => {
      const file = fs.createWriteStream(outputPath);
      res.on('data', (chunk: Buffer) => {
        received += chunk.length;
        onProgress?.({ received, total });
      });
      res.on('error', reject);
      file.on('error', reject);
      file.on('finish', resolve);
      res.pipe(file);
    });

    return outputPath;
  }

  private async json<T>(
    method: string,
    urlPath: string,
    guard: Guard<T>,
    body?: Buffer,
    headers: Record<string, string> = {}
  ): Promise<T> {
    const res = await this.open(method, urlPath, body, headers);
    const text = (await readAll(res)).toString('utf-8');
    if (!res.statusCode || res.statusCode < 200 || res.statusCode >= 300) {
      throw parseFailure(res.statusCode || 0, text);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new Error(`Invalid JSON from ${method} ${urlPath}`, { cause: err });
    }
    if (!guard(data)) {
      throw new Error(`Unexpected response from ${method} ${urlPath}`);
    }
    return data;
  }

  private open(
    method: string,
    urlPath: string,
    body?: Buffer,
    headers: Record<string, string> = {}
  ): Promise<http.IncomingMessage> {
    const url = new URL(urlPath, this.base);
    return new Promise((resolve, reject) => {
      const req = http.request(
        url,
        { method, headers: { ...headers, 'Content-Length': body ? body.length : 0 } },
        resolve
      );
      req.on('error', err => {
        reject(new UnreachableError(`Cannot reach node at ${this.base.origin}: ${err.message}`, { cause: err }));
      });
      req.end(body);
    });
  }

  private async failure(res: http.IncomingMessage): Promise<Error> {
    return parseFailure(res.statusCode || 0, (await readAll(res)).toString('utf-8'));
  }
}

function readAll(res: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    res.on('data', (chunk: Buffer) => chunks.push(chunk));
    res.on('end', () => resolve(Buffer.concat(chunks)));
    res.on('error', reject);
  });
}

function parseFailure(statusCode: number, text: string): Error {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return new Error(`HTTP ${statusCode}: ${text}`);
  }
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return errorFromCode('code' in data ? data.code : undefined, data.message);
  }
  return new Error(`HTTP ${statusCode}`);
}

const STATUSES: ReadonlySet<string> = new Set<string>(Object.values(TransferStatus));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function arrayOf<T>(guard: Guard<T>): Guard<T[]> {
  return (value: unknown): value is T[] => Array.isArray(value) && value.every(guard);
}

function isIdentity(value: unknown): value is PeerIdentity {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.address === 'string' &&
    typeof value.port === 'number'
  );
}

function isPeer(value: unknown): value is Peer {
  return (
    isRecord(value) &&
    typeof value.displayName === 'string' &&
    typeof value.address === 'string' &&
    typeof value.lastSeenAt === 'number' &&
    typeof value.online === 'boolean'
  );
}

function isTransfer(value: unknown): value is Transfer {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.filename === 'string' &&
    typeof value.sizeBytes === 'number' &&
    typeof value.senderName === 'string' &&
    typeof value.senderAddress === 'string' &&
    typeof value.receiverAddress === 'string' &&
    typeof value.status === 'string' &&
    STATUSES.has(value.status) &&
    (value.direction === 'incoming' || value.direction === 'outgoing')
  );
}

function isSendResult(value: unknown): value is SendResult {
  return (
    isRecord(value) &&
    isTransfer(value.transfer) &&
    (value.notifyError === undefined || typeof value.notifyError === 'string')
  );
}
