import { FileUtils, InvalidStateError, Transfer, TransferStatus, UnreachableError } from '@lanbeam/core';
import * as fs from 'fs/promises';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { NodeApiClient } from '../utils/api-client.js';

const COMPLETED: Transfer = {
  id: 't2',
  filename: 'notes.txt',
  sizeBytes: 9,
  senderName: 'alice',
  senderAddress: '10.0.0.1:8080',
  receiverAddress: '10.0.0.2:8080',
  status: TransferStatus.COMPLETED,
  direction: 'incoming',
  createdAt: 0,
  updatedAt: 0,
};

function reply(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/** Stand-in for a node's local API */
async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  if (req.method === 'GET' && req.url === '/api/peers') {
    reply(res, 200, [{ displayName: 'bob', address: '10.0.0.2:8080', lastSeenAt: 0, online: true }]);
    return;
  }
  if (req.method === 'POST' && req.url === '/api/send') {
    const form = await FileUtils.readMultipart(req);
    const file = form.files[0];
    reply(res, 201, {
      transfer: { ...COMPLETED, id: 't1', filename: file.filename, sizeBytes: file.data.length, receiverAddress: form.fields.target },
    });
    return;
  }
  if (req.method === 'POST' && req.url === '/api/accept/t3') {
    reply(res, 409, { success: false, code: 'INVALID_STATE', message: 'Transfer t3 is rejected, cannot become accepted' });
    return;
  }
  if (req.method === 'GET' && req.url === '/api/transfers/t2') {
    reply(res, 200, COMPLETED);
    return;
  }
  if (req.method === 'GET' && req.url === '/api/transfers/t4') {
    reply(res, 200, { id: 't4', status: 'finished' });
    return;
  }
  if (req.method === 'GET' && req.url === '/api/download/t2') {
    res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Content-Length': 9 });
    res.end('hello bob');
    return;
  }
  reply(res, 404, { success: false, code: 'NOT_FOUND', message: `No route for ${req.method} ${req.url}` });
}

describe('NodeApiClient', () => {
  let server: http.Server;
  let client: NodeApiClient;
  let root: string;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'lanbeam-cli-'));
    server = http.createServer((req, res) => {
      handle(req, res).catch(err => reply(res, 500, { success: false, code: 'INTERNAL', message: String(err) }));
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    client = new NodeApiClient(`http://127.0.0.1:${port}`);
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should list peers', async () => {
    expect(await client.peers()).toEqual([{ displayName: 'bob', address: '10.0.0.2:8080', lastSeenAt: 0, online: true }]);
  });

  it('should upload a file with its target', async () => {
    const filePath = path.join(root, 'report.txt');
    await fs.writeFile(filePath, 'quarterly');

    const { transfer } = await client.send(filePath, 'bob');

    expect(transfer.filename).toBe('report.txt');
    expect(transfer.sizeBytes).toBe(9);
    expect(transfer.receiverAddress).toBe('bob');
  });

  it('should rebuild typed errors from the node', async () => {
    const failure = client.accept('t3');

    await expect(failure).rejects.toBeInstanceOf(InvalidStateError);
    await expect(failure).rejects.toThrow('Transfer t3 is rejected, cannot become accepted');
  });

  it('should refuse a transfer of the wrong shape', async () => {
    await expect(client.transfer('t4')).rejects.toThrow('Unexpected response from GET /api/transfers/t4');
  });

  it('should save a download under its transfer filename', async () => {
    const seen: number[] = [];

    const outputPath = await client.download('t2', path.join(root, 'out'), progress => seen.push(progress.received));

    expect(outputPath).toBe(path.join(root, 'out', 'notes.txt'));
    expect(await fs.readFile(outputPath, 'utf8')).toBe('hello bob');
    expect(seen[seen.length - 1]).toBe(9);
  });

  it('should report a node that is not running', async () => {
    const idle = http.createServer();
    await new Promise<void>(resolve => idle.listen(0, '127.0.0.1', resolve));
    const address = idle.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    await new Promise<void>(resolve => idle.close(() => resolve()));

    await expect(new NodeApiClient(`http://127.0.0.1:${port}`).peers()).rejects.toBeInstanceOf(UnreachableError);
  });
});
