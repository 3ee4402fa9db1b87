import * as os from 'os';
import { v1 as uuidv1 } from 'uuid';

/**
 * Generate a transfer ID.
 * UUID v1 is time-based, so ids from one node sort by creation.
 */
export function generateTransferId(): string {
  return uuidv1();
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number, decimals: number = 2): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const dm = decimals < 0 ? 0 : decimals;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];

  const absBytes = Math.abs(bytes);
  const i = Math.floor(Math.log(absBytes) / Math.log(k));

  const value = bytes / Math.pow(k, i);
  return `${value.toFixed(dm)} ${sizes[i]}`;
}

/**
 * Default display name, `user@hostname`
 */
export function defaultDeviceName(): string {
  try {
    return `${os.userInfo().username}@${os.hostname()}`;
  } catch {
    return 'Unknown Device';
  }
}

/**
 * Check if network interface name looks virtual
 */
function isVirtualInterface(name: string): boolean {
  const lowerName = name.toLowerCase();

  const virtualPatterns = [
    /^veth/,           // Docker virtual ethernet
    /^docker/,         // Docker bridge
    /^br-/,            // Docker bridge
    /^vir/,            // Hyper-V Virtual Ethernet Adapter
    /^lo/,             // Loopback
    /^wsl/,            // WSL
    /^utun/,           // macOS VPN/Tunnel
    /^tun/,            // Linux VPN/Tunnel
    /^tap/,            // TAP adapter
  ];

  if (virtualPatterns.some(pattern => pattern.test(lowerName))) {
    return true;
  }

  return ['vmware', 'virtualbox', 'hyper-v', 'virtual', 'vlan', 'bridge', 'vpn', 'default switch']
    .some(keyword => lowerName.includes(keyword));
}

/**
 * Check if IP address is loopback or link-local
 */
function isLocalOnlyAddress(address: string): boolean {
  return address.startsWith('127.') || address.startsWith('169.254.');
}

/** An IPv4 interface address with its mask */
export interface LocalSubnet {
  interfaceName: string;
  address: string;
  netmask: string;
  broadcast: string;
  virtual: boolean;
}

/**
 * Enumerate non-loopback IPv4 interfaces with their broadcast addresses.
 * Physical adapters come first.
 */
export function getLocalSubnets(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): LocalSubnet[] {
  const physical: LocalSubnet[] = [];
  const virtual: LocalSubnet[] = [];

  for (const [name, ifaces] of Object.entries(interfaces)) {
    if (!ifaces) continue;
    const isVirtual = isVirtualInterface(name);

    for (const iface of ifaces) {
      if (iface.family !== 'IPv4' || iface.internal || isLocalOnlyAddress(iface.address)) {
        continue;
      }

      const subnet: LocalSubnet = {
        interfaceName: name,
        address: iface.address,
        netmask: iface.netmask,
        broadcast: broadcastAddress(iface.address, iface.netmask),
        virtual: isVirtual,
      };
      (isVirtual ? virtual : physical).push(subnet);
    }
  }

  return [...physical, ...virtual];
}

/**
 * Local IPv4 addresses, physical adapters first
 */
export function getLocalIpAddresses(): string[] {
  return getLocalSubnets().map(subnet => subnet.address);
}

/**
 * Compute `address | ~netmask`
 */
export function broadcastAddress(address: string, netmask: string): string {
  const ip = address.split('.').map(part => parseInt(part, 10));
  const mask = netmask.split('.').map(part => parseInt(part, 10));
  if (ip.length !== 4 || mask.length !== 4 || [...ip, ...mask].some(n => isNaN(n))) {
    throw new Error(`Invalid IPv4 address/netmask: ${address}/${netmask}`);
  }
  return ip.map((octet, i) => (octet | (~mask[i] & 0xff)) & 0xff).join('.');
}

/**
 * Host addresses .1 to .254 of the /24 containing `address`, minus `exclude`.
 * Wider networks are swept only around the interface's own address.
 */
export function subnetHosts(address: string, exclude: Iterable<string> = []): string[] {
  const base = address.slice(0, address.lastIndexOf('.'));
  const skip = new Set(exclude);
  const hosts: string[] = [];
  for (let i = 1; i < 255; i++) {
    const host = `${base}.${i}`;
    if (!skip.has(host)) {
      hosts.push(host);
    }
  }
  return hosts;
}

/**
 * Join host and port into a peer address
 */
export function formatAddress(host: string, port: number): string {
  return `${host}:${port}`;
}

/**
 * Split a `host:port` peer address
 * @returns null when the value has no numeric port
 */
export function parseAddress(address: string): { host: string; port: number } | null {
  const separator = address.lastIndexOf(':');
  if (separator <= 0) {
    return null;
  }
  const host = address.slice(0, separator);
  const portText = address.slice(separator + 1);
  if (!/^\d+$/.test(portText)) {
    return null;
  }
  const port = parseInt(portText, 10);
  if (port <= 0 || port > 65535) {
    return null;
  }
  return { host, port };
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index]) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}

/**
 * Reject with `message` if `promise` has not settled within `ms`
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(message)), ms);
    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      err => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
