/**
 * loadopts
 * Options model for load-test runs
 */

export type * from './types/index.js';

export {
  Nullable,
  NULL_BOOL,
  NULL_INT,
  NULL_STRING,
  NULL_DURATION,
  boolFrom,
  intFrom,
  stringFrom,
  durationFrom,
  applyNullable,
  type NullBool,
  type NullInt,
  type NullString,
  type NullDuration,
} from './core/nullable.js';
export { emptyOptions, createOptions, applyOptions, mergeOptions, prepareOptions } from './core/options.js';
export { decodeOptions, parseOptions, encodeOptions, stringifyOptions } from './core/options-codec.js';
export {
  DEFAULT_ENV_PREFIX,
  bindEnvironment,
  envVarName,
  listEnvBindings,
  type EnvBinding,
  type EnvKind,
} from './core/env-binding.js';
export {
  DEFAULT_OPTIONS,
  OptionsMerger,
  loadOptions,
  findOptionsFile,
  detectFormat,
} from './core/config-merger.js';
export {
  OptionsDecodeError,
  EnvBindingError,
  DurationParseError,
  StageParseError,
  CertificateError,
  TLSConfigError,
} from './core/errors.js';

export { TLSAuth, matchDomain, findTLSAuth, type TLSCertificate } from './tls/auth.js';
export {
  SUPPORTED_TLS_CIPHER_SUITES,
  cipherSuiteId,
  cipherSuiteName,
  toOpenSSLCipherList,
} from './tls/cipher-suites.js';
export {
  SUPPORTED_TLS_VERSIONS,
  TLS_VERSION_SSL30,
  TLS_VERSION_TLS10,
  TLS_VERSION_TLS11,
  TLS_VERSION_TLS12,
  UNCONSTRAINED_TLS_VERSIONS,
  containsVersion,
  isUnconstrained,
} from './tls/versions.js';
export { buildTLSConnectionOptions } from './tls/connection.js';

export {
  Nanosecond,
  Microsecond,
  Millisecond,
  Second,
  Minute,
  Hour,
  parseDuration,
  formatDuration,
  durationToMilliseconds,
  type Duration,
} from './utils/duration.js';
export { parseStages, formatStages, totalStagesDuration } from './utils/stages.js';
export { parseCIDR, formatCIDR, ipNetContains, isBlacklisted } from './utils/network.js';
export { generateOptionsSummary } from './reporters/options-summary.js';
