/**
 * loadopts Type Definitions
 * Central export for all types
 */

// Options types
export type {
  Stage,
  TLSVersion,
  TLSVersions,
  TLSCipherSuites,
  TLSAuthFields,
  Threshold,
  ThresholdSet,
  IPNet,
  Options,
  OptionsField,
  OptionsInit,
  StageJSON,
  TLSVersionsJSON,
  TLSAuthJSON,
  ThresholdJSON,
  OptionsJSON,
} from './options.types.js';

// Loader types
export type {
  Environment,
  OptionsFormat,
  OptionsLoadOptions,
  OptionsSource,
  LoadedOptions,
} from './loader.types.js';
