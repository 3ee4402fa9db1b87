import * as http from 'http';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { WebSocket } from 'ws';
import { EventHub } from '../events/event-hub.js';
import { EventSocketBridge } from '../events/ws-bridge.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function connect(port: number, options: { autoPong?: boolean } = {}): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(`ws://127.0.0.1:${port}/ws`, options);
    socket.once('open', () => resolve(socket));
    socket.once('error', reject);
  });
}

describe('EventSocketBridge', () => {
  let hub: EventHub;
  let bridge: EventSocketBridge;
  let server: http.Server;
  let port: number;

  beforeEach(async () => {
    hub = new EventHub();
    bridge = new EventSocketBridge(hub, { heartbeatMs: 20 });
    server = http.createServer();
    bridge.attach(server);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
  });

  afterEach(async () => {
    bridge.close();
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('should keep observers that answer pings', async () => {
    const socket = await connect(port);
    await vi.waitFor(() => expect(hub.subscriberCount).toBe(1));

    await delay(120);

    expect(hub.subscriberCount).toBe(1);
    expect(socket.readyState).toBe(WebSocket.OPEN);
    socket.close();
  });

  it('should terminate an observer that misses a pong and drop its subscription', async () => {
    const socket = await connect(port, { autoPong: false });
    const closed = new Promise<number>(resolve => socket.once('close', code => resolve(code)));
    await vi.waitFor(() => expect(hub.subscriberCount).toBe(1));

    expect(await closed).toBe(1006);
    await vi.waitFor(() => expect(hub.subscriberCount).toBe(0));
  });

  it('should unsubscribe every observer on close', async () => {
    await connect(port);
    await connect(port);
    await vi.waitFor(() => expect(hub.subscriberCount).toBe(2));

    bridge.close();

    expect(hub.subscriberCount).toBe(0);
  });
});
