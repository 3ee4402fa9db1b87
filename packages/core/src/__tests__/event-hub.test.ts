import { describe, it, expect, vi } from 'vitest';
import { EventHub, EventSink, Subscription } from '../events/event-hub.js';
import { EventType, HubEvent, Peer } from '../types.js';

function peer(displayName: string): Peer {
  return { displayName, address: `10.0.0.${displayName.length}:8080`, lastSeenAt: 0, online: true };
}

function collector(): EventSink & { events: HubEvent[] } {
  const events: HubEvent[] = [];
  return {
    events,
    send: event => {
      events.push(event);
    },
  };
}

function stalled(): EventSink & { close: ReturnType<typeof vi.fn> } {
  return {
    send: () => new Promise<void>(() => undefined),
    close: vi.fn(),
  };
}

describe('EventHub', () => {
  it('should deliver events to every subscriber in publish order', async () => {
    const hub = new EventHub();
    const first = collector();
    const second = collector();
    hub.subscribe(first);
    hub.subscribe(second);

    for (const name of ['alice', 'bob', 'carol']) {
      hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer(name) });
    }

    await vi.waitFor(() => expect(second.events).toHaveLength(3));
    await vi.waitFor(() => expect(first.events).toHaveLength(3));
    expect(first.events.map(event => event.payload)).toEqual([peer('alice'), peer('bob'), peer('carol')]);
    expect(second.events.map(event => event.payload)).toEqual([peer('alice'), peer('bob'), peer('carol')]);
  });

  it('should stamp and freeze published events', () => {
    const hub = new EventHub({ clock: () => 1000 });
    const event = hub.publish({ type: EventType.PEER_OFFLINE, payload: peer('alice') });

    expect(event.timestamp).toBe(1000);
    expect(event.type).toBe(EventType.PEER_OFFLINE);
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
  });

  it('should not let a stalled subscriber delay the others', async () => {
    const hub = new EventHub({ timeoutMs: 60_000 });
    const fast = collector();
    hub.subscribe(stalled());
    hub.subscribe(fast);

    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('alice') });
    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('bob') });

    await vi.waitFor(() => expect(fast.events).toHaveLength(2));
    expect(hub.subscriberCount).toBe(2);
  });

  it('should drop a subscriber whose queue overflows', () => {
    const hub = new EventHub({ queueSize: 2, timeoutMs: 60_000 });
    const sink = stalled();
    const dropped: Array<[Subscription, string]> = [];
    hub.on('subscriber-dropped', (subscription: Subscription, reason: string) => {
      dropped.push([subscription, reason]);
    });
    const subscription = hub.subscribe(sink);

    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('alice') });
    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('bob') });
    expect(hub.subscriberCount).toBe(1);

    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('carol') });
    expect(hub.subscriberCount).toBe(0);
    expect(dropped).toEqual([[subscription, 'queue full (2 events)']]);
    expect(sink.close).toHaveBeenCalledWith('queue full (2 events)');
  });

  it('should drop a subscriber whose send fails', async () => {
    const hub = new EventHub();
    const close = vi.fn();
    hub.subscribe({
      send: () => {
        throw new Error('socket closed');
      },
      close,
    });

    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('alice') });

    await vi.waitFor(() => expect(hub.subscriberCount).toBe(0));
    expect(close).toHaveBeenCalledWith('socket closed');
  });

  it('should drop a subscriber whose send times out', async () => {
    const hub = new EventHub();
    const sink = stalled();
    hub.subscribe(sink, { timeoutMs: 20 });

    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('alice') });

    await vi.waitFor(() => expect(sink.close).toHaveBeenCalledWith('send timed out after 20ms'));
    expect(hub.subscriberCount).toBe(0);
  });

  it('should stop delivering after unsubscribe', async () => {
    const hub = new EventHub();
    const sink = collector();
    const subscription = hub.subscribe(sink);

    expect(hub.unsubscribe(subscription)).toBe(true);
    expect(hub.unsubscribe(subscription)).toBe(false);

    hub.publish({ type: EventType.PEER_DISCOVERED, payload: peer('alice') });
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(sink.events).toEqual([]);
  });

  it('should drop every subscriber on close', () => {
    const hub = new EventHub();
    const sinks = [stalled(), stalled()];
    sinks.forEach(sink => hub.subscribe(sink));

    hub.close();

    expect(hub.subscriberCount).toBe(0);
    for (const sink of sinks) {
      expect(sink.close).toHaveBeenCalledWith('hub closed');
    }
  });
});
