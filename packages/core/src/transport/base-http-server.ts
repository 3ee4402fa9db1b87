import { EventEmitter } from 'events';
import * as http from 'http';
import { Socket } from 'net';
import { errorMessage, isLanbeamError } from '../errors.js';
import { DebugLogger } from '../utils/logger.js';

/**
 * Base HTTP Server class
 * Listening, connection tracking, shutdown and JSON/error replies
 */
export abstract class BaseHttpServer extends EventEmitter {
  protected logger: DebugLogger;
  protected server?: http.Server;
  protected port: number = 0;
  protected activeSockets: Set<Socket> = new Set();

  constructor(protected defaultPort: number = 0, protected host: string = '0.0.0.0') {
    super();
    this.logger = new DebugLogger(this.getLogPrefix());
  }

  /**
   * Start HTTP server
   * @returns the bound port
   */
  async startServer(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch(err => {
          this.sendError(req, res, err);
        });
      });

      server.on('connection', socket => {
        this.activeSockets.add(socket);
        socket.on('close', () => {
          this.activeSockets.delete(socket);
        });
      });

      server.once('error', reject);
      this.onServerCreated(server);
      this.server = server;

      server.listen(this.defaultPort, this.host, () => {
        server.off('error', reject);
        server.on('error', err => {
          this.logger.error('Server error:', err);
        });
        const addr = server.address();
        this.port = typeof addr === 'object' && addr ? addr.port : 0;
        this.logger.info(`HTTP server started on ${this.host}:${this.port}`);
        this.emit('server-started', this.port);
        resolve(this.port);
      });
    });
  }

  getPort(): number {
    return this.port;
  }

  /**
   * Stop the HTTP server
   */
  async stopServer(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server;
      if (!server) {
        this.cleanup();
        resolve();
        return;
      }

      this.logger.debug('Stopping server...');

      server.close(err => {
        if (err) {
          this.logger.debug('Server close error (ignoring):', err.message);
        } else {
          this.logger.debug('HTTP server stopped');
        }
        this.cleanup();
        resolve();
      });

      // Keep-alive and upgraded sockets would hold close() open
      for (const socket of this.activeSockets) {
        socket.destroy();
      }
    });
  }

  /**
   * Reply with a JSON body
   */
  protected sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
    const payload = JSON.stringify(body);
    res.writeHead(statusCode, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload),
    });
    res.end(payload);
  }

  /**
   * Map a thrown error to a JSON error reply
   */
  protected sendError(req: http.IncomingMessage, res: http.ServerResponse, err: unknown): void {
    const statusCode = isLanbeamError(err) ? err.statusCode : 500;
    const code = isLanbeamError(err) ? err.code : 'INTERNAL';

    if (statusCode >= 500) {
      this.logger.error(`${req.method} ${req.url} failed:`, err);
    } else {
      this.logger.debug(`${req.method} ${req.url} -> ${statusCode}: ${errorMessage(err)}`);
    }

    if (res.headersSent) {
      res.destroy();
      return;
    }
    this.sendJson(res, statusCode, { success: false, code, message: errorMessage(err) });
  }

  /**
   * Hook to attach extra listeners (e.g. `upgrade`) before listening
   */
  protected onServerCreated(_server: http.Server): void {}

  protected abstract handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void>;

  protected cleanup(): void {
    this.server = undefined;
    this.activeSockets.clear();
    this.emit('server-stopped');
  }

  protected abstract getLogPrefix(): string;
}
