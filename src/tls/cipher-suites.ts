/**
 * TLS Cipher Suites
 * Canonical suite names, their ids, and the OpenSSL spelling Node expects
 */

import { OptionsDecodeError, TLSConfigError } from '../core/errors.js';
import type { TLSCipherSuites } from '../types/index.js';

interface CipherSuite {
  name: string;
  id: number;
  openssl: string;
}

const CIPHER_SUITES: readonly CipherSuite[] = [
  { name: 'TLS_RSA_WITH_RC4_128_SHA', id: 0x0005, openssl: 'RC4-SHA' },
  { name: 'TLS_RSA_WITH_3DES_EDE_CBC_SHA', id: 0x000a, openssl: 'DES-CBC3-SHA' },
  { name: 'TLS_RSA_WITH_AES_128_CBC_SHA', id: 0x002f, openssl: 'AES128-SHA' },
  { name: 'TLS_RSA_WITH_AES_256_CBC_SHA', id: 0x0035, openssl: 'AES256-SHA' },
  { name: 'TLS_RSA_WITH_AES_128_CBC_SHA256', id: 0x003c, openssl: 'AES128-SHA256' },
  { name: 'TLS_RSA_WITH_AES_128_GCM_SHA256', id: 0x009c, openssl: 'AES128-GCM-SHA256' },
  { name: 'TLS_RSA_WITH_AES_256_GCM_SHA384', id: 0x009d, openssl: 'AES256-GCM-SHA384' },
  { name: 'TLS_ECDHE_ECDSA_WITH_RC4_128_SHA', id: 0xc007, openssl: 'ECDHE-ECDSA-RC4-SHA' },
  { name: 'TLS_ECDHE_ECDSA_WITH_AES_128_CBC_SHA', id: 0xc009, openssl: 'ECDHE-ECDSA-AES128-SHA' },
  { name: 'TLS_ECDHE_ECDSA_WITH_AES_256_CBC_SHA', id: 0xc00a, openssl: 'ECDHE-ECDSA-AES256-SHA' },
  { name: 'TLS_ECDHE_RSA_WITH_RC4_128_SHA', id: 0xc011, openssl: 'ECDHE-RSA-RC4-SHA' },
  { name: 'TLS_ECDHE_RSA_WITH_3DES_EDE_CBC_SHA', id: 0xc012, openssl: 'ECDHE-RSA-DES-CBC3-SHA' },
  { name: 'TLS_ECDHE_RSA_WITH_AES_128_CBC_SHA', id: 0xc013, openssl: 'ECDHE-RSA-AES128-SHA' },
  { name: 'TLS_ECDHE_RSA_WITH_AES_256_CBC_SHA', id: 0xc014, openssl: 'ECDHE-RSA-AES256-SHA' },
  { name: 'TLS_ECDHE_ECDSA_WITH_AES_128_CBC_SHA256', id: 0xc023, openssl: 'ECDHE-ECDSA-AES128-SHA256' },
  { name: 'TLS_ECDHE_RSA_WITH_AES_128_CBC_SHA256', id: 0xc027, openssl: 'ECDHE-RSA-AES128-SHA256' },
  { name: 'TLS_ECDHE_RSA_WITH_AES_128_GCM_SHA256', id: 0xc02f, openssl: 'ECDHE-RSA-AES128-GCM-SHA256' },
  { name: 'TLS_ECDHE_ECDSA_WITH_AES_128_GCM_SHA256', id: 0xc02b, openssl: 'ECDHE-ECDSA-AES128-GCM-SHA256' },
  { name: 'TLS_ECDHE_RSA_WITH_AES_256_GCM_SHA384', id: 0xc030, openssl: 'ECDHE-RSA-AES256-GCM-SHA384' },
  { name: 'TLS_ECDHE_ECDSA_WITH_AES_256_GCM_SHA384', id: 0xc02c, openssl: 'ECDHE-ECDSA-AES256-GCM-SHA384' },
  { name: 'TLS_ECDHE_RSA_WITH_CHACHA20_POLY1305', id: 0xcca8, openssl: 'ECDHE-RSA-CHACHA20-POLY1305' },
  { name: 'TLS_ECDHE_ECDSA_WITH_CHACHA20_POLY1305', id: 0xcca9, openssl: 'ECDHE-ECDSA-CHACHA20-POLY1305' },
];

/** name -> id */
export const SUPPORTED_TLS_CIPHER_SUITES: ReadonlyMap<string, number> = new Map(
  CIPHER_SUITES.map((suite): [string, number] => [suite.name, suite.id])
);

const SUITES_BY_ID: ReadonlyMap<number, CipherSuite> = new Map(
  CIPHER_SUITES.map((suite): [number, CipherSuite] => [suite.id, suite])
);

export function cipherSuiteId(name: string): number {
  const id = SUPPORTED_TLS_CIPHER_SUITES.get(name);
  if (id === undefined) {
    throw new OptionsDecodeError(`unsupported cipher suite: ${name}`, 'tlsCipherSuites', name);
  }
  return id;
}

export function cipherSuiteName(id: number): string {
  return lookupId(id).name;
}

export function decodeCipherSuites(names: readonly string[]): TLSCipherSuites {
  return Object.freeze(names.map(cipherSuiteId));
}

export function encodeCipherSuites(suites: TLSCipherSuites): string[] {
  return suites.map(cipherSuiteName);
}

/**
 * Render suites as an OpenSSL cipher list for tls.connect()
 */
export function toOpenSSLCipherList(suites: TLSCipherSuites): string {
  return suites.map((id) => lookupId(id).openssl).join(':');
}

function lookupId(id: number): CipherSuite {
  const suite = SUITES_BY_ID.get(id);
  if (!suite) {
    throw new TLSConfigError(`unsupported cipher suite id 0x${id.toString(16).padStart(4, '0')}`);
  }
  return suite;
}
