/**
 * Options Codec
 * Reads and writes the JSON form of options. Absent fields are omitted on
 * the way out; on the way in only the fields present in the payload are
 * laid over the base.
 */

import { cloneDeep, mapValues } from 'lodash-es';
import type {
  IPNet,
  Options,
  OptionsInit,
  OptionsJSON,
  Stage,
  StageJSON,
  ThresholdJSON,
  ThresholdSet,
} from '../types/index.js';
import { TLSAuth } from '../tls/auth.js';
import { decodeCipherSuites, encodeCipherSuites } from '../tls/cipher-suites.js';
import { decodeTLSVersions, encodeTLSVersions } from '../tls/versions.js';
import { formatDuration, parseDuration, type Duration } from '../utils/duration.js';
import { formatCIDR, parseCIDR } from '../utils/network.js';
import { formatValidationErrors, validateOptions } from '../utils/validator.js';
import { DurationParseError, OptionsDecodeError, errorMessage } from './errors.js';
import {
  NULL_DURATION,
  NULL_INT,
  boolFrom,
  durationFrom,
  intFrom,
  stringFrom,
  type NullDuration,
  type NullInt,
} from './nullable.js';
import { createOptions, emptyOptions } from './options.js';

/**
 * Decode a parsed payload on top of `base`.
 *
 * Every field is decoded before anything is applied, so a failure leaves
 * the caller with `base` as it was.
 */
export function decodeOptions(data: unknown, base: Options = emptyOptions()): Options {
  const result = validateOptions(data);
  if (!result.valid) {
    throw new OptionsDecodeError(formatValidationErrors(result.errors));
  }
  const json = result.value;
  const decoded: OptionsInit = {};

  if (isSet(json.paused)) decoded.paused = boolFrom(json.paused);
  if (isSet(json.vus)) decoded.vus = decodeInt('vus', json.vus);
  if (isSet(json.vusMax)) decoded.vusMax = decodeInt('vusMax', json.vusMax);
  if (isSet(json.duration)) decoded.duration = decodeDuration('duration', json.duration);
  if (isSet(json.iterations)) decoded.iterations = decodeInt('iterations', json.iterations);
  if (isSet(json.stages)) decoded.stages = Object.freeze(json.stages.map(decodeStage));
  if (isSet(json.linger)) decoded.linger = boolFrom(json.linger);
  if (isSet(json.noUsageReport)) decoded.noUsageReport = boolFrom(json.noUsageReport);
  if (isSet(json.maxRedirects)) decoded.maxRedirects = decodeInt('maxRedirects', json.maxRedirects);
  if (isSet(json.insecureSkipTLSVerify)) {
    decoded.insecureSkipTLSVerify = boolFrom(json.insecureSkipTLSVerify);
  }
  if (isSet(json.tlsCipherSuites)) decoded.tlsCipherSuites = decodeCipherSuites(json.tlsCipherSuites);
  if (isSet(json.tlsVersion)) decoded.tlsVersion = decodeTLSVersions(json.tlsVersion);
  if (isSet(json.tlsAuth)) decoded.tlsAuth = Object.freeze(json.tlsAuth.map(TLSAuth.fromJSON));
  if (isSet(json.noConnectionReuse)) decoded.noConnectionReuse = boolFrom(json.noConnectionReuse);
  if (isSet(json.userAgent)) decoded.userAgent = stringFrom(json.userAgent);
  if (isSet(json.throw)) decoded.throw = boolFrom(json.throw);
  if (isSet(json.thresholds)) decoded.thresholds = Object.freeze(mapValues(json.thresholds, decodeThresholds));
  if (isSet(json.blacklistIPs)) decoded.blacklistIPs = Object.freeze(json.blacklistIPs.map(decodeIPNet));
  if (isSet(json.hosts)) decoded.hosts = Object.freeze({ ...json.hosts });
  if (isSet(json.ext)) decoded.external = Object.freeze(cloneDeep(json.ext));

  return createOptions({ ...base, ...decoded });
}

/**
 * Parse JSON text and decode it on top of `base`
 */
export function parseOptions(text: string, base?: Options): Options {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new OptionsDecodeError(`malformed JSON: ${errorMessage(error)}`);
  }
  return decodeOptions(data, base);
}

export function encodeOptions(options: Options): OptionsJSON {
  const json: OptionsJSON = {};

  if (options.paused.valid) json.paused = options.paused.value;
  if (options.vus.valid) json.vus = options.vus.value;
  if (options.vusMax.valid) json.vusMax = options.vusMax.value;
  if (options.duration.valid) json.duration = formatDuration(options.duration.value);
  if (options.iterations.valid) json.iterations = options.iterations.value;
  if (options.stages) json.stages = options.stages.map(encodeStage);
  if (options.linger.valid) json.linger = options.linger.value;
  if (options.noUsageReport.valid) json.noUsageReport = options.noUsageReport.value;
  if (options.maxRedirects.valid) json.maxRedirects = options.maxRedirects.value;
  if (options.insecureSkipTLSVerify.valid) json.insecureSkipTLSVerify = options.insecureSkipTLSVerify.value;
  if (options.tlsCipherSuites) json.tlsCipherSuites = encodeCipherSuites(options.tlsCipherSuites);
  if (options.tlsVersion) json.tlsVersion = encodeTLSVersions(options.tlsVersion);
  if (options.tlsAuth) json.tlsAuth = options.tlsAuth.map((auth) => auth.toJSON());
  if (options.noConnectionReuse.valid) json.noConnectionReuse = options.noConnectionReuse.value;
  if (options.userAgent.valid) json.userAgent = options.userAgent.value;
  if (options.throw.valid) json.throw = options.throw.value;
  if (options.thresholds) json.thresholds = mapValues(options.thresholds, encodeThresholds);
  if (options.blacklistIPs) json.blacklistIPs = options.blacklistIPs.map(formatCIDR);
  if (options.hosts) json.hosts = { ...options.hosts };
  if (options.external) json.ext = cloneDeep(options.external);

  return json;
}

export function stringifyOptions(options: Options, space?: number): string {
  return JSON.stringify(encodeOptions(options), null, space);
}

function isSet<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null;
}

function decodeInt(field: string, value: number): NullInt {
  if (!Number.isSafeInteger(value)) {
    throw new OptionsDecodeError(`${value} is out of range`, field, String(value));
  }
  return intFrom(value);
}

function decodeDuration(field: string, text: string): NullDuration {
  let duration: Duration;
  try {
    duration = parseDuration(text);
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new OptionsDecodeError(error.message, field, text);
    }
    throw error;
  }
  return durationFrom(duration);
}

function decodeStage(json: StageJSON, index: number): Stage {
  const field = `stages[${index}]`;
  return Object.freeze({
    duration: isSet(json.duration) ? decodeDuration(`${field}.duration`, json.duration) : NULL_DURATION,
    target: isSet(json.target) ? decodeInt(`${field}.target`, json.target) : NULL_INT,
  });
}

function encodeStage(stage: Stage): StageJSON {
  const json: StageJSON = {};
  if (stage.duration.valid) json.duration = formatDuration(stage.duration.value);
  if (stage.target.valid) json.target = stage.target.value;
  return json;
}

function decodeThresholds(list: ThresholdJSON[]): ThresholdSet {
  return Object.freeze({
    thresholds: Object.freeze(
      list.map((item) =>
        typeof item === 'string'
          ? { source: item, abortOnFail: false }
          : { source: item.threshold, abortOnFail: item.abortOnFail ?? false }
      )
    ),
  });
}

function encodeThresholds(set: ThresholdSet): ThresholdJSON[] {
  return set.thresholds.map((threshold) =>
    threshold.abortOnFail ? { threshold: threshold.source, abortOnFail: true } : threshold.source
  );
}

function decodeIPNet(text: string, index: number): IPNet {
  try {
    return parseCIDR(text);
  } catch (error) {
    throw new OptionsDecodeError(errorMessage(error), `blacklistIPs[${index}]`, text);
  }
}
