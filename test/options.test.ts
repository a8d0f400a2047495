import { describe, it, expect } from 'vitest';
import { CertificateError } from '../src/core/errors.js';
import {
  NULL_INT,
  boolFrom,
  durationFrom,
  intFrom,
  stringFrom,
} from '../src/core/nullable.js';
import { applyOptions, createOptions, emptyOptions, mergeOptions, prepareOptions } from '../src/core/options.js';
import { TLSAuth } from '../src/tls/auth.js';
import { SUPPORTED_TLS_CIPHER_SUITES } from '../src/tls/cipher-suites.js';
import { TLS_VERSION_SSL30, TLS_VERSION_TLS10, TLS_VERSION_TLS12 } from '../src/tls/versions.js';
import { Minute, Second, formatDuration } from '../src/utils/duration.js';
import { parseCIDR } from '../src/utils/network.js';
import type { Options } from '../src/types/index.js';
import { PRIMARY, SECONDARY } from './helpers.js';

function fullOptions(): Options {
  return createOptions({
    paused: boolFrom(true),
    vus: intFrom(10),
    vusMax: intFrom(20),
    duration: durationFrom(2 * Minute),
    iterations: intFrom(100),
    stages: [{ duration: durationFrom(Second), target: intFrom(5) }],
    linger: boolFrom(true),
    noUsageReport: boolFrom(true),
    maxRedirects: intFrom(3),
    insecureSkipTLSVerify: boolFrom(true),
    tlsCipherSuites: [0xc02f],
    tlsVersion: { min: TLS_VERSION_TLS10, max: TLS_VERSION_TLS12 },
    tlsAuth: [new TLSAuth(PRIMARY)],
    noConnectionReuse: boolFrom(true),
    userAgent: stringFrom('bench/1.0'),
    throw: boolFrom(true),
    thresholds: { http_req_duration: { thresholds: [{ source: 'p(95)<500', abortOnFail: false }] } },
    blacklistIPs: [parseCIDR('10.0.0.0/8')],
    hosts: { 'api.example.com': '192.0.2.10' },
    external: { cloud: { project: 'demo' } },
  });
}

describe('applyOptions', () => {
  it('leaves the base alone when the override is empty', () => {
    const base = fullOptions();
    expect(applyOptions(base, emptyOptions())).toEqual(base);
  });

  it('takes every field the override provides', () => {
    const override = fullOptions();
    expect(applyOptions(emptyOptions(), override)).toEqual(override);
  });

  it('applies paused', () => {
    const opts = applyOptions(emptyOptions(), createOptions({ paused: boolFrom(true) }));
    expect(opts.paused.valid).toBe(true);
    expect(opts.paused.value).toBe(true);
  });

  it('applies vus', () => {
    const opts = applyOptions(emptyOptions(), createOptions({ vus: intFrom(64) }));
    expect(opts.vus).toEqual(intFrom(64));
  });

  it('applies duration', () => {
    const opts = applyOptions(emptyOptions(), createOptions({ duration: durationFrom(2 * Minute) }));
    expect(opts.duration.valid).toBe(true);
    expect(formatDuration(opts.duration.value)).toBe('2m0s');
  });

  it('applies stages', () => {
    const opts = applyOptions(
      emptyOptions(),
      createOptions({ stages: [{ duration: durationFrom(Second), target: NULL_INT }] })
    );
    expect(opts.stages).toHaveLength(1);
    expect(opts.stages?.[0].duration.value).toBe(Second);
  });

  it('applies a zero value over a non-zero base', () => {
    const opts = applyOptions(createOptions({ maxRedirects: intFrom(10) }), createOptions({ maxRedirects: intFrom(0) }));
    expect(opts.maxRedirects).toEqual(intFrom(0));
  });

  it('applies userAgent', () => {
    const opts = applyOptions(emptyOptions(), createOptions({ userAgent: stringFrom('bench/1.0') }));
    expect(opts.userAgent).toEqual(stringFrom('bench/1.0'));
  });

  it.each(Array.from(SUPPORTED_TLS_CIPHER_SUITES))('applies cipher suite %s', (_name, id) => {
    const opts = applyOptions(emptyOptions(), createOptions({ tlsCipherSuites: [id] }));
    expect(opts.tlsCipherSuites).toEqual([id]);
  });

  it('applies tlsVersion', () => {
    const versions = { min: TLS_VERSION_SSL30, max: TLS_VERSION_TLS12 };
    const opts = applyOptions(emptyOptions(), createOptions({ tlsVersion: versions }));
    expect(opts.tlsVersion).toEqual(versions);
  });

  it('applies tlsAuth as the same list', () => {
    const tlsAuth = [new TLSAuth(PRIMARY), new TLSAuth(SECONDARY)];
    const opts = applyOptions(emptyOptions(), createOptions({ tlsAuth }));
    expect(opts.tlsAuth).toBe(tlsAuth);
  });

  it('applies hosts', () => {
    const opts = applyOptions(emptyOptions(), createOptions({ hosts: { 'test.example.com': '192.0.2.1' } }));
    expect(opts.hosts).toEqual({ 'test.example.com': '192.0.2.1' });
  });

  it('applies thresholds', () => {
    const thresholds = { checks: { thresholds: [{ source: 'rate>0.99', abortOnFail: true }] } };
    const opts = applyOptions(emptyOptions(), createOptions({ thresholds }));
    expect(opts.thresholds).toBe(thresholds);
  });

  it('copies ext values', () => {
    const external = { cloud: { project: 'demo' } };
    const opts = applyOptions(emptyOptions(), createOptions({ external }));
    expect(opts.external).toEqual(external);
    expect(opts.external).not.toBe(external);
    expect(Object.isFrozen(opts.external)).toBe(true);
  });

  it('replaces lists and maps as a whole', () => {
    const base = createOptions({
      stages: [
        { duration: durationFrom(Second), target: intFrom(1) },
        { duration: durationFrom(2 * Second), target: intFrom(2) },
      ],
      hosts: { 'a.example.com': '192.0.2.1' },
    });
    const override = createOptions({
      stages: [{ duration: durationFrom(3 * Second), target: intFrom(3) }],
      hosts: { 'b.example.com': '192.0.2.2' },
    });

    const opts = applyOptions(base, override);
    expect(opts.stages).toEqual([{ duration: durationFrom(3 * Second), target: intFrom(3) }]);
    expect(opts.hosts).toEqual({ 'b.example.com': '192.0.2.2' });
  });

  it('keeps base stages and tlsAuth when the override lists are empty', () => {
    const base = fullOptions();
    const opts = applyOptions(base, createOptions({ stages: [], tlsAuth: [] }));
    expect(opts.stages).toBe(base.stages);
    expect(opts.tlsAuth).toBe(base.tlsAuth);
  });

  it('replaces cipher suites with an empty list', () => {
    const opts = applyOptions(fullOptions(), createOptions({ tlsCipherSuites: [] }));
    expect(opts.tlsCipherSuites).toEqual([]);
  });

  it('does not modify its operands', () => {
    const base = createOptions({ vus: intFrom(1) });
    const override = createOptions({ vus: intFrom(2) });
    const merged = applyOptions(base, override);

    expect(base.vus).toEqual(intFrom(1));
    expect(override.vus).toEqual(intFrom(2));
    expect(merged.vus).toEqual(intFrom(2));
    expect(Object.isFrozen(merged)).toBe(true);
  });
});

describe('mergeOptions', () => {
  it('lets later layers win field by field', () => {
    const merged = mergeOptions(
      createOptions({ vus: intFrom(1), vusMax: intFrom(1) }),
      createOptions({ vus: intFrom(5), duration: durationFrom(10 * Second) }),
      createOptions({ vus: intFrom(7) })
    );
    expect(merged.vus).toEqual(intFrom(7));
    expect(merged.vusMax).toEqual(intFrom(1));
    expect(merged.duration).toEqual(durationFrom(10 * Second));
  });

  it('is empty with no layers', () => {
    expect(mergeOptions()).toEqual(emptyOptions());
  });
});

describe('prepareOptions', () => {
  it('parses certificates up front', () => {
    const options = createOptions({ tlsAuth: [new TLSAuth(PRIMARY)] });
    expect(prepareOptions(options)).toBe(options);
  });

  it('throws for a broken bundle', () => {
    const options = createOptions({ tlsAuth: [new TLSAuth({ domains: ['example.com'], cert: 'nope', key: 'nope' })] });
    expect(() => prepareOptions(options)).toThrow(CertificateError);
  });
});
