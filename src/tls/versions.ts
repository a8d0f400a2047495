/**
 * TLS Version Ranges
 * Accepts {"min": "tls1.0", "max": "tls1.2"}, "tls1.2" or "" and always
 * writes the object form back
 */

import type { SecureVersion } from 'tls';
import { OptionsDecodeError, TLSConfigError } from '../core/errors.js';
import type { TLSVersion, TLSVersions, TLSVersionsJSON } from '../types/index.js';

export const TLS_VERSION_SSL30: TLSVersion = 0x0300;
export const TLS_VERSION_TLS10: TLSVersion = 0x0301;
export const TLS_VERSION_TLS11: TLSVersion = 0x0302;
export const TLS_VERSION_TLS12: TLSVersion = 0x0303;

/** name -> version */
export const SUPPORTED_TLS_VERSIONS: ReadonlyMap<string, TLSVersion> = new Map<string, TLSVersion>([
  ['ssl3.0', TLS_VERSION_SSL30],
  ['tls1.0', TLS_VERSION_TLS10],
  ['tls1.1', TLS_VERSION_TLS11],
  ['tls1.2', TLS_VERSION_TLS12],
]);

const NAMES_BY_VERSION: ReadonlyMap<TLSVersion, string> = new Map(
  Array.from(SUPPORTED_TLS_VERSIONS, ([name, version]): [TLSVersion, string] => [version, name])
);

const NODE_VERSIONS: ReadonlyMap<TLSVersion, SecureVersion> = new Map<TLSVersion, SecureVersion>([
  [TLS_VERSION_TLS10, 'TLSv1'],
  [TLS_VERSION_TLS11, 'TLSv1.1'],
  [TLS_VERSION_TLS12, 'TLSv1.2'],
]);

export const UNCONSTRAINED_TLS_VERSIONS: TLSVersions = Object.freeze({ min: 0, max: 0 });

/**
 * Resolve a version name; "" is the open end of a range
 */
export function tlsVersionFromName(name: string): TLSVersion {
  if (name === '') {
    return 0;
  }
  const version = SUPPORTED_TLS_VERSIONS.get(name);
  if (version === undefined) {
    throw new OptionsDecodeError(`unsupported TLS version: ${name}`, 'tlsVersion', name);
  }
  return version;
}

export function tlsVersionName(version: TLSVersion): string {
  if (version === 0) {
    return '';
  }
  const name = NAMES_BY_VERSION.get(version);
  if (name === undefined) {
    throw new TLSConfigError(`unsupported TLS version 0x${version.toString(16)}`);
  }
  return name;
}

export function decodeTLSVersions(raw: string | TLSVersionsJSON): TLSVersions {
  if (typeof raw === 'string') {
    const version = tlsVersionFromName(raw);
    return Object.freeze({ min: version, max: version });
  }
  return Object.freeze({
    min: tlsVersionFromName(raw.min ?? ''),
    max: tlsVersionFromName(raw.max ?? ''),
  });
}

export function encodeTLSVersions(versions: TLSVersions): Required<TLSVersionsJSON> {
  return {
    min: tlsVersionName(versions.min),
    max: tlsVersionName(versions.max),
  };
}

export function isUnconstrained(versions: TLSVersions): boolean {
  return versions.min === 0 && versions.max === 0;
}

export function containsVersion(versions: TLSVersions, version: TLSVersion): boolean {
  return (versions.min === 0 || version >= versions.min) && (versions.max === 0 || version <= versions.max);
}

/**
 * Map a range onto Node's minVersion/maxVersion.
 *
 * Node ships without SSL 3.0: a lower bound of ssl3.0 falls back to TLSv1,
 * an upper bound of ssl3.0 leaves nothing to negotiate.
 */
export function toNodeVersionRange(versions: TLSVersions): {
  minVersion?: SecureVersion;
  maxVersion?: SecureVersion;
} {
  if (versions.max === TLS_VERSION_SSL30) {
    throw new TLSConfigError('ssl3.0 is not available in the Node.js TLS stack');
  }

  const range: { minVersion?: SecureVersion; maxVersion?: SecureVersion } = {};
  if (versions.min === TLS_VERSION_SSL30) {
    range.minVersion = 'TLSv1';
  } else if (versions.min !== 0) {
    range.minVersion = NODE_VERSIONS.get(versions.min);
  }
  if (versions.max !== 0) {
    range.maxVersion = NODE_VERSIONS.get(versions.max);
  }
  return range;
}
