/**
 * Loader Types
 * Layered options loading: defaults → file → environment → overrides
 */

import type { Options } from './options.types.js';

export type OptionsFormat = 'json' | 'yaml';

/** Snapshot of process.env or a stand-in for it */
export type Environment = Readonly<Record<string, string | undefined>>;

export interface OptionsLoadOptions {
  /** Options file (.json, .yaml or .yml); must exist when given */
  optionsPath?: string;

  /** Variables to bind; defaults to process.env */
  env?: Environment;

  /** Variable name prefix, LOADOPTS unless set */
  envPrefix?: string;

  /** Applied last, over every other layer */
  overrides?: Options;

  /** Leave the compiled-in defaults out */
  skipDefaults?: boolean;

  /** Leave environment variables out */
  skipEnv?: boolean;
}

export type OptionsSource = 'defaults' | 'file' | 'environment' | 'overrides';

export interface LoadedOptions {
  options: Options;

  /** Layers that were applied, in order */
  layers: Array<{ source: OptionsSource; path?: string }>;
}
