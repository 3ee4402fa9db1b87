import * as http from 'http';
import { Duplex } from 'stream';
import { WebSocket, WebSocketServer } from 'ws';
import { HubEvent } from '../types.js';
import { DebugLogger } from '../utils/logger.js';
import { EventHub, Subscription } from './event-hub.js';

export interface EventSocketBridgeOptions {
  /** @default '/ws' */
  path?: string;
  /** @default 10000 */
  heartbeatMs?: number;
}

interface Observer {
  subscription: Subscription;
  isAlive: boolean;
}

/**
 * Serves the event hub to WebSocket observers.
 * Each connection is one hub subscription; messages are the events as JSON.
 */
export class EventSocketBridge {
  private readonly logger = new DebugLogger('EventSocket');
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly observers = new Map<WebSocket, Observer>();
  private readonly path: string;
  private readonly heartbeatMs: number;
  private heartbeat?: ReturnType<typeof setInterval>;

  constructor(private readonly hub: EventHub, options: EventSocketBridgeOptions = {}) {
    this.path = options.path ?? '/ws';
    this.heartbeatMs = options.heartbeatMs ?? 10_000;
    this.wss.on('connection', (ws: WebSocket) => this.onConnection(ws));
  }

  /**
   * Take over `upgrade` requests on the event path
   */
  attach(server: http.Server): void {
    server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
      const pathname = new URL(req.url || '/', 'http://localhost').pathname;
      if (pathname !== this.path) {
        socket.destroy();
        return;
      }
      this.wss.handleUpgrade(req, socket, head, ws => {
        this.wss.emit('connection', ws, req);
      });
    });

    if (!this.heartbeat) {
      this.heartbeat = setInterval(() => this.checkAlive(), this.heartbeatMs);
    }
  }

  close(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
    for (const [ws, observer] of this.observers) {
      this.hub.unsubscribe(observer.subscription);
      ws.terminate();
    }
    this.observers.clear();
    this.wss.close();
  }

  private onConnection(ws: WebSocket): void {
    const subscription = this.hub.subscribe({
      send: (event: HubEvent) => send(ws, event),
      close: () => ws.terminate(),
    });
    const observer: Observer = { subscription, isAlive: true };
    this.observers.set(ws, observer);
    this.logger.debug(`Observer connected (${this.observers.size} total)`);

    ws.on('pong', () => {
      observer.isAlive = true;
    });

    ws.on('error', err => {
      this.logger.debug('Observer socket error:', err.message);
    });

    ws.on('close', () => {
      this.hub.unsubscribe(subscription);
      this.observers.delete(ws);
      this.logger.debug(`Observer disconnected (${this.observers.size} left)`);
    });
  }

  private checkAlive(): void {
    for (const [ws, observer] of this.observers) {
      if (!observer.isAlive) {
        this.logger.debug('Terminating unresponsive observer');
        ws.terminate();
        continue;
      }
      observer.isAlive = false;
      ws.ping();
    }
  }
}

function send(ws: WebSocket, event: HubEvent): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ws.readyState !== WebSocket.OPEN) {
      reject(new Error('socket is not open'));
      return;
    }
    ws.send(JSON.stringify(event), err => (err ? reject(err) : resolve()));
  });
}
