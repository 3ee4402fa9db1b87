import * as http from 'http';
import { errorFromCode, errorMessage, UnreachableError } from '../errors.js';
import { PeerIdentity, TransferMetadata } from '../types.js';
import { FileUtils } from '../utils/file-utils.js';

/**
 * Calls a node makes on other nodes.
 * Every method rejects with UnreachableError when the peer cannot be
 * reached in time, or with the error class the peer reported.
 */
export interface PeerClient {
  probe(host: string, port: number): Promise<PeerIdentity>;
  notifyTransfer(address: string, metadata: TransferMetadata): Promise<void>;
  acceptRemote(address: string, transferId: string): Promise<void>;
  rejectRemote(address: string, transferId: string): Promise<void>;
  upload(address: string, transfer: TransferMetadata, data: Buffer): Promise<void>;
}

export interface HttpPeerClientOptions {
  /** @default 2000 */
  probeTimeoutMs?: number;
  /** @default 10000 */
  rpcTimeoutMs?: number;
  /** @default 30000 */
  uploadTimeoutMs?: number;
}

interface RawResponse {
  statusCode: number;
  body: Buffer;
}

/**
 * PeerClient over plain HTTP/JSON
 */
export class HttpPeerClient implements PeerClient {
  private readonly probeTimeoutMs: number;
  private readonly rpcTimeoutMs: number;
  private readonly uploadTimeoutMs: number;

  constructor(options: HttpPeerClientOptions = {}) {
    this.probeTimeoutMs = options.probeTimeoutMs ?? 2000;
    this.rpcTimeoutMs = options.rpcTimeoutMs ?? 10000;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? 30000;
  }

  async probe(host: string, port: number): Promise<PeerIdentity> {
    const res = await this.request('GET', `http://${host}:${port}/discover`, this.probeTimeoutMs);
    const data = this.parseJson(res);
    if (!isIdentity(data)) {
      throw new UnreachableError(`Unexpected probe response from ${host}:${port}`);
    }
    return { name: data.name, address: host, port };
  }

  async notifyTransfer(address: string, metadata: TransferMetadata): Promise<void> {
    const body = Buffer.from(JSON.stringify(metadata));
    await this.request('POST', `http://${address}/api/notify-transfer`, this.rpcTimeoutMs, {
      body,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async acceptRemote(address: string, transferId: string): Promise<void> {
    await this.request(
      'POST',
      `http://${address}/api/accept-remote/${encodeURIComponent(transferId)}`,
      this.rpcTimeoutMs
    );
  }

  async rejectRemote(address: string, transferId: string): Promise<void> {
    await this.request(
      'POST',
      `http://${address}/api/reject-remote/${encodeURIComponent(transferId)}`,
      this.rpcTimeoutMs
    );
  }

  async upload(address: string, transfer: TransferMetadata, data: Buffer): Promise<void> {
    const { body, contentType } = FileUtils.buildMultipart(
      { field: 'file', filename: transfer.filename, data },
      { from: transfer.senderName }
    );
    await this.request(
      'POST',
      `http://${address}/api/upload/${encodeURIComponent(transfer.id)}`,
      this.uploadTimeoutMs,
      { body, headers: { 'Content-Type': contentType } }
    );
  }

  private request(
    method: string,
    url: string,
    timeoutMs: number,
    options: { body?: Buffer; headers?: Record<string, string> } = {}
  ): Promise<RawResponse> {
    return new Promise((resolve, reject) => {
      const headers: Record<string, string | number> = {
        ...options.headers,
        'Content-Length': options.body ? options.body.length : 0,
      };

      const request = http.request(url, { method, headers }, res => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('end', () => {
          const response: RawResponse = { statusCode: res.statusCode || 0, body: Buffer.concat(chunks) };
          if (response.statusCode >= 200 && response.statusCode < 300) {
            resolve(response);
          } else {
            reject(this.remoteError(url, response));
          }
        });

        res.on('error', err => {
          reject(new UnreachableError(`${method} ${url} failed: ${err.message}`, { cause: err }));
        });
      });

      request.setTimeout(timeoutMs, () => {
        request.destroy(new Error(`timed out after ${timeoutMs}ms`));
      });

      request.on('error', err => {
        reject(new UnreachableError(`${method} ${url} failed: ${err.message}`, { cause: err }));
      });

      request.end(options.body);
    });
  }

  private parseJson(res: RawResponse): unknown {
    try {
      return JSON.parse(res.body.toString('utf-8'));
    } catch (err) {
      throw new UnreachableError(`Invalid JSON from peer: ${errorMessage(err)}`);
    }
  }

  private remoteError(url: string, res: RawResponse): Error {
    let code: unknown;
    let message = `HTTP ${res.statusCode} from ${url}`;
    try {
      const data: unknown = JSON.parse(res.body.toString('utf-8'));
      if (typeof data === 'object' && data !== null) {
        if ('code' in data) code = data.code;
        if ('message' in data && typeof data.message === 'string') {
          message = `${message}: ${data.message}`;
        }
      }
    } catch {
      return new UnreachableError(message);
    }
    return errorFromCode(code, message);
  }
}

function isIdentity(value: unknown): value is { name: string; port: number } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'port' in value &&
    typeof value.port === 'number'
  );
}
