/**
 * Network Utilities
 * CIDR ranges for blacklistIPs and literal addresses for hosts
 */

import { BlockList, isIP } from 'net';
import type { IPNet } from '../types/index.js';

/**
 * Parse "10.0.0.0/8" or "fd00::/8"; throws on anything else
 */
export function parseCIDR(text: string): IPNet {
  const slash = text.indexOf('/');
  if (slash < 0) {
    throw new Error(`invalid CIDR address: ${text}`);
  }

  const ip = text.slice(0, slash);
  const prefixText = text.slice(slash + 1);
  const family = isIP(ip);
  if (family !== 4 && family !== 6) {
    throw new Error(`invalid CIDR address: ${text}`);
  }

  const maxPrefix = family === 4 ? 32 : 128;
  const prefix = Number(prefixText);
  if (!/^\d+$/.test(prefixText) || prefix > maxPrefix) {
    throw new Error(`invalid CIDR address: ${text}`);
  }

  return Object.freeze({ ip, prefix, family });
}

export function formatCIDR(net: IPNet): string {
  return `${net.ip}/${net.prefix}`;
}

export function ipNetContains(net: IPNet, ip: string): boolean {
  const family = isIP(ip);
  if (family === 0) {
    return false;
  }
  const list = new BlockList();
  list.addSubnet(net.ip, net.prefix, net.family === 4 ? 'ipv4' : 'ipv6');
  return list.check(ip, family === 4 ? 'ipv4' : 'ipv6');
}

export function isBlacklisted(nets: readonly IPNet[] | undefined, ip: string): boolean {
  return (nets ?? []).some((net) => ipNetContains(net, ip));
}
