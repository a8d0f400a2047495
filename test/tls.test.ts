import { describe, it, expect } from 'vitest';
import { CertificateError, OptionsDecodeError, TLSConfigError } from '../src/core/errors.js';
import { boolFrom } from '../src/core/nullable.js';
import { createOptions, emptyOptions } from '../src/core/options.js';
import { TLSAuth, findTLSAuth, matchDomain } from '../src/tls/auth.js';
import {
  SUPPORTED_TLS_CIPHER_SUITES,
  cipherSuiteId,
  cipherSuiteName,
  toOpenSSLCipherList,
} from '../src/tls/cipher-suites.js';
import { buildTLSConnectionOptions } from '../src/tls/connection.js';
import {
  TLS_VERSION_SSL30,
  TLS_VERSION_TLS10,
  TLS_VERSION_TLS11,
  TLS_VERSION_TLS12,
  containsVersion,
  decodeTLSVersions,
  isUnconstrained,
  toNodeVersionRange,
} from '../src/tls/versions.js';
import { PRIMARY, SECONDARY } from './helpers.js';

describe('cipher suites', () => {
  it('knows every suite by a unique name and id', () => {
    expect(SUPPORTED_TLS_CIPHER_SUITES.size).toBe(22);
    expect(new Set(SUPPORTED_TLS_CIPHER_SUITES.values()).size).toBe(22);
  });

  it('maps names to ids and back', () => {
    expect(cipherSuiteId('TLS_ECDHE_RSA_WITH_AES_128_GCM_SHA256')).toBe(0xc02f);
    expect(cipherSuiteName(0xc02f)).toBe('TLS_ECDHE_RSA_WITH_AES_128_GCM_SHA256');
  });

  it('rejects unknown names and ids', () => {
    expect(() => cipherSuiteId('TLS_FAKE')).toThrow(OptionsDecodeError);
    expect(() => cipherSuiteName(0x1234)).toThrow(new TLSConfigError('unsupported cipher suite id 0x1234'));
  });

  it('builds an OpenSSL cipher list', () => {
    expect(toOpenSSLCipherList([0xc02f, 0x009c])).toBe('ECDHE-RSA-AES128-GCM-SHA256:AES128-GCM-SHA256');
  });
});

describe('TLS versions', () => {
  it('leaves a missing end open', () => {
    const versions = decodeTLSVersions({ min: 'tls1.0' });
    expect(versions).toEqual({ min: TLS_VERSION_TLS10, max: 0 });
    expect(isUnconstrained(versions)).toBe(false);
    expect(isUnconstrained(decodeTLSVersions(''))).toBe(true);
  });

  it('checks whether a version is in range', () => {
    const versions = { min: TLS_VERSION_TLS11, max: TLS_VERSION_TLS12 };
    expect(containsVersion(versions, TLS_VERSION_TLS12)).toBe(true);
    expect(containsVersion(versions, TLS_VERSION_TLS10)).toBe(false);
    expect(containsVersion({ min: 0, max: 0 }, TLS_VERSION_SSL30)).toBe(true);
  });

  it('maps ranges onto Node version names', () => {
    expect(toNodeVersionRange({ min: TLS_VERSION_TLS11, max: TLS_VERSION_TLS12 })).toEqual({
      minVersion: 'TLSv1.1',
      maxVersion: 'TLSv1.2',
    });
    expect(toNodeVersionRange({ min: TLS_VERSION_SSL30, max: 0 })).toEqual({ minVersion: 'TLSv1' });
    expect(toNodeVersionRange({ min: 0, max: 0 })).toEqual({});
  });

  it('refuses an ssl3.0 ceiling', () => {
    expect(() => toNodeVersionRange({ min: TLS_VERSION_SSL30, max: TLS_VERSION_SSL30 })).toThrow(TLSConfigError);
  });
});

describe('TLSAuth', () => {
  it('parses the certificate and key', () => {
    const { x509, cert, key } = new TLSAuth(PRIMARY).certificate();
    expect(x509.subject).toBe('CN=primary.client.test');
    expect(cert).toBe(PRIMARY.cert);
    expect(key).toBe(PRIMARY.key);
  });

  it('parses once', () => {
    const auth = new TLSAuth(PRIMARY);
    expect(auth.certificate()).toBe(auth.certificate());
  });

  it('reports a broken certificate every time', () => {
    const auth = new TLSAuth({ domains: ['example.com'], cert: 'not a certificate', key: PRIMARY.key });
    expect(() => auth.certificate()).toThrow(CertificateError);
    expect(() => auth.certificate()).toThrow(/^tlsAuth \[example\.com\]: invalid certificate: /);
  });

  it('reports a broken key', () => {
    const auth = new TLSAuth({ domains: ['example.com'], cert: PRIMARY.cert, key: 'not a key' });
    expect(() => auth.certificate()).toThrow(/^tlsAuth \[example\.com\]: invalid private key: /);
  });

  it('reports a key from another pair', () => {
    const auth = new TLSAuth({ domains: ['example.com'], cert: PRIMARY.cert, key: SECONDARY.key });
    expect(() => auth.certificate()).toThrow('tlsAuth [example.com]: private key does not match certificate');
  });

  it('keeps its own copy of the domains', () => {
    const domains = ['example.com'];
    const auth = new TLSAuth({ domains, cert: PRIMARY.cert, key: PRIMARY.key });
    domains.push('other.test');
    expect(auth.fields.domains).toEqual(['example.com']);
  });
});

describe('matchDomain', () => {
  it.each([
    ['*.example.com', 'sub.example.com', true],
    ['*.example.com', 'a.b.example.com', true],
    ['*.example.com', 'example.com', false],
    ['*.example.com', 'badexample.com', false],
    ['example.com', 'example.com', true],
    ['example.com', 'sub.example.com', false],
    ['Example.COM', 'example.com', true],
  ])('%s against %s', (pattern, host, expected) => {
    expect(matchDomain(pattern, host)).toBe(expected);
  });
});

describe('findTLSAuth', () => {
  const entries = [new TLSAuth(PRIMARY), new TLSAuth(SECONDARY)];

  it('picks the first matching entry', () => {
    expect(findTLSAuth(entries, 'sub.example.com')).toBe(entries[0]);
    expect(findTLSAuth([entries[1], entries[0]], 'sub.example.com')).toBe(entries[1]);
  });

  it('finds nothing for other hosts', () => {
    expect(findTLSAuth(entries, 'other.test')).toBeUndefined();
    expect(findTLSAuth(undefined, 'example.com')).toBeUndefined();
  });
});

describe('buildTLSConnectionOptions', () => {
  it('uses Node defaults for empty options', () => {
    expect(buildTLSConnectionOptions(emptyOptions(), 'api.example.com')).toEqual({
      servername: 'api.example.com',
      rejectUnauthorized: true,
    });
  });

  it('carries every TLS option over', () => {
    const options = createOptions({
      insecureSkipTLSVerify: boolFrom(true),
      tlsCipherSuites: [0xc02f, 0x009c],
      tlsVersion: { min: TLS_VERSION_TLS11, max: TLS_VERSION_TLS12 },
      tlsAuth: [new TLSAuth(SECONDARY), new TLSAuth(PRIMARY)],
    });

    expect(buildTLSConnectionOptions(options, 'api.example.com')).toEqual({
      servername: 'api.example.com',
      rejectUnauthorized: false,
      ciphers: 'ECDHE-RSA-AES128-GCM-SHA256:AES128-GCM-SHA256',
      minVersion: 'TLSv1.1',
      maxVersion: 'TLSv1.2',
      cert: PRIMARY.cert,
      key: PRIMARY.key,
    });
  });

  it('leaves ciphers out for an empty suite list', () => {
    const options = createOptions({ tlsCipherSuites: [] });
    expect(buildTLSConnectionOptions(options, 'example.com').ciphers).toBeUndefined();
  });
});
