/**
 * TLS Client Authentication
 * Certificate/key bundles selected per host by domain pattern
 */

import { X509Certificate, createPrivateKey, type KeyObject } from 'crypto';
import { CertificateError, errorMessage } from '../core/errors.js';
import type { TLSAuthFields, TLSAuthJSON } from '../types/index.js';

export interface TLSCertificate {
  /** Leaf certificate, the first block of the PEM text */
  readonly x509: X509Certificate;
  readonly privateKey: KeyObject;
  /** PEM text as configured, chain included, for tls.connect() */
  readonly cert: string;
  readonly key: string;
}

export class TLSAuth {
  readonly fields: TLSAuthFields;
  private parsed: TLSCertificate | null = null;

  constructor(fields: TLSAuthFields) {
    this.fields = Object.freeze({
      domains: Object.freeze([...fields.domains]),
      cert: fields.cert,
      key: fields.key,
    });
  }

  static fromJSON(json: TLSAuthJSON): TLSAuth {
    return new TLSAuth({ domains: json.domains ?? [], cert: json.cert, key: json.key });
  }

  /**
   * Parse the PEM bundle on first use and keep the result.
   * Failures are thrown every time; only a usable pair is cached.
   */
  certificate(): TLSCertificate {
    if (this.parsed) {
      return this.parsed;
    }

    const { domains, cert, key } = this.fields;

    let x509: X509Certificate;
    try {
      x509 = new X509Certificate(cert);
    } catch (error) {
      throw new CertificateError(`invalid certificate: ${errorMessage(error)}`, domains);
    }

    let privateKey: KeyObject;
    try {
      privateKey = createPrivateKey(key);
    } catch (error) {
      throw new CertificateError(`invalid private key: ${errorMessage(error)}`, domains);
    }

    if (!x509.checkPrivateKey(privateKey)) {
      throw new CertificateError('private key does not match certificate', domains);
    }

    this.parsed = Object.freeze({ x509, privateKey, cert, key });
    return this.parsed;
  }

  matches(host: string): boolean {
    return this.fields.domains.some((pattern) => matchDomain(pattern, host));
  }

  toJSON(): TLSAuthJSON {
    return {
      domains: [...this.fields.domains],
      cert: this.fields.cert,
      key: this.fields.key,
    };
  }
}

/**
 * "*.example.com" matches "a.example.com" and "a.b.example.com",
 * never "example.com" itself. Anything else must match exactly.
 */
export function matchDomain(pattern: string, host: string): boolean {
  const normalizedPattern = pattern.toLowerCase();
  const normalizedHost = host.toLowerCase();

  if (normalizedPattern.startsWith('*.')) {
    const suffix = normalizedPattern.slice(1);
    return normalizedHost.length > suffix.length && normalizedHost.endsWith(suffix);
  }
  return normalizedPattern === normalizedHost;
}

/**
 * First entry whose domains match the host
 */
export function findTLSAuth(entries: readonly TLSAuth[] | undefined, host: string): TLSAuth | undefined {
  return entries?.find((entry) => entry.matches(host));
}

/**
 * Parse every bundle up front so shared options never parse lazily
 */
export function prepareCertificates(entries: readonly TLSAuth[] | undefined): void {
  for (const entry of entries ?? []) {
    entry.certificate();
  }
}
