/**
 * Options Types
 * In-memory and wire shapes of the options of a load-test run
 */

import type { NullBool, NullDuration, NullInt, NullString } from '../core/nullable.js';
import type { TLSAuth } from '../tls/auth.js';

/**
 * One segment of a ramp profile: spend `duration` moving the number of
 * active VUs toward `target`. Without a target the level is held.
 */
export interface Stage {
  readonly duration: NullDuration;
  readonly target: NullInt;
}

/** Protocol version numbers as sent on the wire; 0 leaves an end open */
export type TLSVersion = 0 | 0x0300 | 0x0301 | 0x0302 | 0x0303;

/** Inclusive version range. `{ min: 0, max: 0 }` means no constraint. */
export interface TLSVersions {
  readonly min: TLSVersion;
  readonly max: TLSVersion;
}

/** Cipher suite ids, in preference order */
export type TLSCipherSuites = readonly number[];

export interface TLSAuthFields {
  /** Exact hostnames or "*.suffix" wildcards */
  readonly domains: readonly string[];
  /** PEM certificate, optionally followed by its chain */
  readonly cert: string;
  /** PEM private key */
  readonly key: string;
}

export interface Threshold {
  /** Expression text, kept as written */
  readonly source: string;
  readonly abortOnFail: boolean;
}

export interface ThresholdSet {
  readonly thresholds: readonly Threshold[];
}

/** An address range such as 10.0.0.0/8 */
export interface IPNet {
  readonly ip: string;
  readonly prefix: number;
  readonly family: 4 | 6;
}

export interface Options {
  /** Start the run paused */
  readonly paused: NullBool;
  readonly vus: NullInt;
  readonly vusMax: NullInt;
  readonly duration: NullDuration;
  readonly iterations: NullInt;
  readonly stages?: readonly Stage[];

  /** Keep the process alive after the run ends */
  readonly linger: NullBool;
  readonly noUsageReport: NullBool;

  readonly maxRedirects: NullInt;
  readonly insecureSkipTLSVerify: NullBool;
  readonly tlsCipherSuites?: TLSCipherSuites;
  readonly tlsVersion?: TLSVersions;
  readonly tlsAuth?: readonly TLSAuth[];
  readonly noConnectionReuse: NullBool;
  readonly userAgent: NullString;

  /** Throw on failed requests instead of returning them */
  readonly throw: NullBool;

  readonly thresholds?: Readonly<Record<string, ThresholdSet>>;
  readonly blacklistIPs?: readonly IPNet[];

  /** hostname -> literal IP, overriding DNS */
  readonly hosts?: Readonly<Record<string, string>>;

  /** Free-form settings owned by extensions */
  readonly external?: Readonly<Record<string, unknown>>;
}

export type OptionsField = keyof Options;

/** Fields to build options from; whatever is left out stays absent */
export type OptionsInit = { -readonly [K in OptionsField]?: Options[K] };

// Wire format

export interface StageJSON {
  duration?: string | null;
  target?: number | null;
}

export interface TLSVersionsJSON {
  min?: string;
  max?: string;
}

export interface TLSAuthJSON {
  domains?: string[];
  cert: string;
  key: string;
}

export type ThresholdJSON = string | { threshold: string; abortOnFail?: boolean };

/**
 * Options as read from and written to a file. Absent fields are omitted;
 * `null` is read as absent.
 */
export interface OptionsJSON {
  paused?: boolean | null;
  vus?: number | null;
  vusMax?: number | null;
  duration?: string | null;
  iterations?: number | null;
  stages?: StageJSON[] | null;
  linger?: boolean | null;
  noUsageReport?: boolean | null;
  maxRedirects?: number | null;
  insecureSkipTLSVerify?: boolean | null;
  tlsCipherSuites?: string[] | null;
  tlsVersion?: string | TLSVersionsJSON | null;
  tlsAuth?: TLSAuthJSON[] | null;
  noConnectionReuse?: boolean | null;
  userAgent?: string | null;
  throw?: boolean | null;
  thresholds?: Record<string, ThresholdJSON[]> | null;
  blacklistIPs?: string[] | null;
  hosts?: Record<string, string> | null;
  ext?: Record<string, unknown> | null;
}
