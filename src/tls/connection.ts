/**
 * TLS Connection Options
 * Turns the TLS fields of merged options into tls.connect() parameters
 */

import type { ConnectionOptions } from 'tls';
import type { Options } from '../types/index.js';
import { findTLSAuth } from './auth.js';
import { toOpenSSLCipherList } from './cipher-suites.js';
import { toNodeVersionRange } from './versions.js';

/**
 * Parameters for a TLS connection to `host`.
 *
 * Absent options are left out so Node applies its own defaults. The client
 * certificate is the first tlsAuth entry matching the host.
 */
export function buildTLSConnectionOptions(options: Options, host: string): ConnectionOptions {
  const connection: ConnectionOptions = {
    servername: host,
    rejectUnauthorized: !options.insecureSkipTLSVerify.orElse(false),
  };

  if (options.tlsCipherSuites && options.tlsCipherSuites.length > 0) {
    connection.ciphers = toOpenSSLCipherList(options.tlsCipherSuites);
  }

  if (options.tlsVersion) {
    Object.assign(connection, toNodeVersionRange(options.tlsVersion));
  }

  const auth = findTLSAuth(options.tlsAuth, host);
  if (auth) {
    const certificate = auth.certificate();
    connection.cert = certificate.cert;
    connection.key = certificate.key;
  }

  return connection;
}
