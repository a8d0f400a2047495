/**
 * Options Aggregate
 * Construction and whole-value merging of run options
 */

import { cloneDeep } from 'lodash-es';
import type { Options, OptionsInit } from '../types/index.js';
import { prepareCertificates } from '../tls/auth.js';
import { NULL_BOOL, NULL_DURATION, NULL_INT, NULL_STRING, applyNullable } from './nullable.js';

const EMPTY_OPTIONS: Options = Object.freeze({
  paused: NULL_BOOL,
  vus: NULL_INT,
  vusMax: NULL_INT,
  duration: NULL_DURATION,
  iterations: NULL_INT,
  linger: NULL_BOOL,
  noUsageReport: NULL_BOOL,
  maxRedirects: NULL_INT,
  insecureSkipTLSVerify: NULL_BOOL,
  noConnectionReuse: NULL_BOOL,
  userAgent: NULL_STRING,
  throw: NULL_BOOL,
});

/**
 * Options with every field absent
 */
export function emptyOptions(): Options {
  return EMPTY_OPTIONS;
}

/**
 * Build options from the fields given; the rest stay absent
 */
export function createOptions(fields: OptionsInit = {}): Options {
  const options: Options = { ...EMPTY_OPTIONS };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      Object.assign(options, { [key]: value });
    }
  }
  return Object.freeze(options);
}

/**
 * Combine two option sets field by field.
 *
 * A field the override provides replaces the base field as a whole: lists
 * and maps are never merged element-wise, so an override can swap out an
 * entire ramp profile or auth set. Neither operand is modified.
 */
export function applyOptions(base: Options, override: Options): Options {
  const merged: Options = {
    paused: applyNullable(base.paused, override.paused),
    vus: applyNullable(base.vus, override.vus),
    vusMax: applyNullable(base.vusMax, override.vusMax),
    duration: applyNullable(base.duration, override.duration),
    iterations: applyNullable(base.iterations, override.iterations),
    stages: nonEmpty(override.stages) ?? base.stages,
    linger: applyNullable(base.linger, override.linger),
    noUsageReport: applyNullable(base.noUsageReport, override.noUsageReport),
    maxRedirects: applyNullable(base.maxRedirects, override.maxRedirects),
    insecureSkipTLSVerify: applyNullable(base.insecureSkipTLSVerify, override.insecureSkipTLSVerify),
    tlsCipherSuites: override.tlsCipherSuites ?? base.tlsCipherSuites,
    tlsVersion: override.tlsVersion ?? base.tlsVersion,
    tlsAuth: nonEmpty(override.tlsAuth) ?? base.tlsAuth,
    noConnectionReuse: applyNullable(base.noConnectionReuse, override.noConnectionReuse),
    userAgent: applyNullable(base.userAgent, override.userAgent),
    throw: applyNullable(base.throw, override.throw),
    thresholds: override.thresholds ?? base.thresholds,
    blacklistIPs: override.blacklistIPs ?? base.blacklistIPs,
    hosts: override.hosts ?? base.hosts,
    // extension values are arbitrary and may be mutable
    external: override.external ? Object.freeze(cloneDeep(override.external)) : base.external,
  };
  return createOptions(merged);
}

/**
 * Fold layers left to right; later layers win
 */
export function mergeOptions(...layers: Options[]): Options {
  return layers.reduce(applyOptions, EMPTY_OPTIONS);
}

/**
 * Parse every TLS client certificate now rather than on first connection.
 * Throws the first CertificateError.
 */
export function prepareOptions(options: Options): Options {
  prepareCertificates(options.tlsAuth);
  return options;
}

function nonEmpty<T>(list: readonly T[] | undefined): readonly T[] | undefined {
  return list && list.length > 0 ? list : undefined;
}
