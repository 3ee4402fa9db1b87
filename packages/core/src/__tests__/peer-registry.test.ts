import { afterEach, describe, it, expect, vi } from 'vitest';
import { PeerRegistry } from '../registry/peer-registry.js';
import { Peer } from '../types.js';

describe('PeerRegistry', () => {
  let now = 0;
  const clock = () => now;

  afterEach(() => {
    now = 0;
    vi.useRealTimers();
  });

  it('should emit peer-online for new peers only', () => {
    const registry = new PeerRegistry({ clock });
    const online: Peer[] = [];
    registry.on('peer-online', peer => online.push(peer));

    expect(registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' }).created).toBe(true);
    now = 1000;
    expect(registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' }).created).toBe(false);

    expect(online).toEqual([{ displayName: 'alice', address: '10.0.0.2:8080', lastSeenAt: 0, online: true }]);
    expect(registry.get('10.0.0.2:8080')?.lastSeenAt).toBe(1000);
  });

  it('should keep one record per address and take the latest name', () => {
    const registry = new PeerRegistry({ clock });
    registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });
    registry.upsert({ displayName: 'alice-renamed', address: '10.0.0.2:8080' });

    expect(registry.size).toBe(1);
    expect(registry.listOnline().map(peer => peer.displayName)).toEqual(['alice-renamed']);
  });

  it('should hand out copies', () => {
    const registry = new PeerRegistry({ clock });
    const { peer } = registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });
    peer.online = false;

    expect(registry.get('10.0.0.2:8080')?.online).toBe(true);
  });

  it('should mark a stale peer offline exactly once', () => {
    const registry = new PeerRegistry({ clock, livenessMs: 60_000, retentionMs: 300_000 });
    const offline: Peer[] = [];
    registry.on('peer-offline', peer => offline.push(peer));
    registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });

    now = 60_000;
    expect(registry.reap().offline).toEqual([]);

    now = 60_001;
    expect(registry.reap().offline).toHaveLength(1);
    now = 120_000;
    expect(registry.reap().offline).toEqual([]);

    expect(offline).toEqual([{ displayName: 'alice', address: '10.0.0.2:8080', lastSeenAt: 0, online: false }]);
    expect(registry.listOnline()).toEqual([]);
    expect(registry.list()).toHaveLength(1);
  });

  it('should bring an offline peer back with peer-online', () => {
    const registry = new PeerRegistry({ clock });
    const online: string[] = [];
    registry.on('peer-online', peer => online.push(peer.displayName));
    registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });

    now = 61_000;
    registry.reap();
    const result = registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });

    expect(result.created).toBe(true);
    expect(result.peer.online).toBe(true);
    expect(online).toEqual(['alice', 'alice']);
  });

  it('should evict a peer after the retention window', () => {
    const registry = new PeerRegistry({ clock, livenessMs: 60_000, retentionMs: 300_000 });
    registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });

    now = 300_001;
    const result = registry.reap();

    expect(result.offline.map(peer => peer.address)).toEqual(['10.0.0.2:8080']);
    expect(result.evicted.map(peer => peer.address)).toEqual(['10.0.0.2:8080']);
    expect(registry.size).toBe(0);
    expect(registry.get('10.0.0.2:8080')).toBeUndefined();
  });

  it('should resolve a display name to the first online match', () => {
    const registry = new PeerRegistry({ clock });
    registry.upsert({ displayName: 'bob', address: '10.0.0.3:8080' });
    now = 50_000;
    registry.upsert({ displayName: 'bob', address: '10.0.0.4:8080' });

    now = 61_000;
    registry.reap();

    expect(registry.resolve('bob')).toBe('10.0.0.4:8080');
    expect(registry.resolve('carol')).toBeUndefined();
  });

  it('should reap on its interval once started', () => {
    vi.useFakeTimers();
    const registry = new PeerRegistry({ clock, reapIntervalMs: 10_000 });
    const offline: string[] = [];
    registry.on('peer-offline', peer => offline.push(peer.address));
    registry.upsert({ displayName: 'alice', address: '10.0.0.2:8080' });

    registry.start();
    now = 70_000;
    vi.advanceTimersByTime(10_000);
    registry.stop();

    expect(offline).toEqual(['10.0.0.2:8080']);
  });

  it('should refuse a retention window shorter than liveness', () => {
    expect(() => new PeerRegistry({ livenessMs: 60_000, retentionMs: 1000 })).toThrow('retentionMs');
  });
});
