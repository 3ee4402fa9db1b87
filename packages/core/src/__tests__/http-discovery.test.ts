import { describe, it, expect, vi } from 'vitest';
import { UnreachableError } from '../errors.js';
import { HttpDiscovery, SweepResult } from '../discovery/http-discovery.js';
import { PeerRegistry } from '../registry/peer-registry.js';
import { LocalSubnet } from '../utils.js';
import { FakePeerClient } from './fakes.js';

const SUBNET: LocalSubnet = {
  interfaceName: 'eth0',
  address: '192.168.50.200',
  netmask: '255.255.255.0',
  broadcast: '192.168.50.255',
  virtual: false,
};

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('HttpDiscovery', () => {
  it('should probe every host of the subnet except itself', () => {
    const discovery = new HttpDiscovery(new PeerRegistry(), new FakePeerClient(), {
      port: 8080,
      subnets: () => [SUBNET],
      selfAddresses: () => ['192.168.50.201'],
    });

    const candidates = discovery.candidates();

    expect(candidates).toHaveLength(252);
    expect(candidates).not.toContain('192.168.50.200');
    expect(candidates).not.toContain('192.168.50.201');
    expect(candidates[0]).toBe('192.168.50.1');
  });

  it('should deduplicate hosts across interfaces on the same /24', () => {
    const discovery = new HttpDiscovery(new PeerRegistry(), new FakePeerClient(), {
      port: 8080,
      subnets: () => [SUBNET, { ...SUBNET, interfaceName: 'wlan0', address: '192.168.50.201' }],
    });

    expect(discovery.candidates()).toHaveLength(252);
  });

  it('should sweep the /24 around the interface address on wider networks', () => {
    const discovery = new HttpDiscovery(new PeerRegistry(), new FakePeerClient(), {
      port: 8080,
      subnets: () => [
        { interfaceName: 'eth0', address: '10.0.5.7', netmask: '255.255.0.0', broadcast: '10.0.255.255', virtual: false },
      ],
    });

    const candidates = discovery.candidates();

    expect(candidates).toHaveLength(253);
    expect(candidates[0]).toBe('10.0.5.1');
    expect(candidates).toContain('10.0.5.8');
    expect(candidates).not.toContain('10.0.5.7');
  });

  it('should register responders while most probes time out and the reaper runs', async () => {
    let now = 0;
    const registry = new PeerRegistry({ livenessMs: 60_000, clock: () => now });
    registry.upsert({ displayName: 'stale', address: '10.9.9.9:8080' });
    now = 120_000;

    let sweeping = true;
    const wentOffline: Array<{ address: string; sweeping: boolean }> = [];
    registry.on('peer-offline', peer => wentOffline.push({ address: peer.address, sweeping }));

    const client = new FakePeerClient();
    const responders = new Set(Array.from({ length: 10 }, (_, i) => `192.168.50.${i * 20 + 5}`));
    client.probeHandler = async (host, port) => {
      await delay(responders.has(host) ? 2 : 15);
      if (!responders.has(host)) {
        throw new UnreachableError(`Probe of ${host} timed out`);
      }
      return { name: `peer-${host.split('.')[3]}`, address: host, port };
    };

    const discovery = new HttpDiscovery(registry, client, {
      port: 8080,
      maxConcurrentProbes: 64,
      subnets: () => [SUBNET],
    });
    const reaper = setInterval(() => registry.reap(), 1);

    const result = await discovery.sweep().finally(() => {
      sweeping = false;
      clearInterval(reaper);
    });

    expect(wentOffline).toEqual([{ address: '10.9.9.9:8080', sweeping: true }]);

    expect(result.candidates).toBe(253);
    expect(result.responded).toHaveLength(10);
    expect(result.failed).toBe(243);
    expect(client.count('probe')).toBe(253);
    expect(registry.listOnline().map(peer => peer.address).sort()).toEqual(
      [...responders].map(host => `${host}:8080`).sort()
    );
    expect(registry.resolve('peer-25')).toBe('192.168.50.25:8080');
  });

  it('should join a sweep already in flight', async () => {
    const client = new FakePeerClient();
    const discovery = new HttpDiscovery(new PeerRegistry(), client, {
      port: 8080,
      subnets: () => [SUBNET],
    });

    const [first, second] = await Promise.all([discovery.sweep(), discovery.sweep()]);

    expect(second).toBe(first);
    expect(client.count('probe')).toBe(253);
  });

  it('should emit sweep-complete and sweep on its interval', async () => {
    vi.useFakeTimers();
    try {
      const client = new FakePeerClient();
      const discovery = new HttpDiscovery(new PeerRegistry(), client, {
        port: 8080,
        intervalMs: 5000,
        subnets: () => [SUBNET],
      });
      const completed: SweepResult[] = [];
      discovery.on('sweep-complete', (result: SweepResult) => completed.push(result));

      discovery.start();
      expect(discovery.running).toBe(true);
      await vi.advanceTimersByTimeAsync(5000);
      await vi.waitFor(() => expect(completed).toHaveLength(2));
      discovery.stop();

      expect(discovery.running).toBe(false);
      expect(completed).toHaveLength(2);
      expect(client.count('probe')).toBe(506);
    } finally {
      vi.useRealTimers();
    }
  });
});
