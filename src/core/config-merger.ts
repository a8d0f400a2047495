/**
 * Options Merger
 * Handles layered options: defaults → options file → environment → overrides
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join, dirname, extname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import type {
  Environment,
  LoadedOptions,
  Options,
  OptionsFormat,
  OptionsLoadOptions,
  OptionsSource,
} from '../types/index.js';
import { bindEnvironment, DEFAULT_ENV_PREFIX } from './env-binding.js';
import { OptionsDecodeError, errorMessage } from './errors.js';
import { boolFrom, intFrom } from './nullable.js';
import { decodeOptions } from './options-codec.js';
import { applyOptions, createOptions, emptyOptions } from './options.js';

/**
 * Default run options
 */
export const DEFAULT_OPTIONS: Options = createOptions({
  paused: boolFrom(false),
  vus: intFrom(1),
  vusMax: intFrom(1),
  linger: boolFrom(false),
  noUsageReport: boolFrom(false),
  maxRedirects: intFrom(10),
  insecureSkipTLSVerify: boolFrom(false),
  noConnectionReuse: boolFrom(false),
  throw: boolFrom(false),
});

const OPTIONS_FILE_NAMES = ['loadopts.json', '.loadopts.json', 'loadopts.yaml', 'loadopts.yml'];

/**
 * Options merger class
 */
export class OptionsMerger {
  private baseOptions: Options;

  constructor(baseOptions?: Options) {
    this.baseOptions = baseOptions ? applyOptions(DEFAULT_OPTIONS, baseOptions) : DEFAULT_OPTIONS;
  }

  /**
   * Load and merge all option layers
   */
  async loadOptions(options: OptionsLoadOptions = {}): Promise<LoadedOptions> {
    const loaded: LoadedOptions = { options: emptyOptions(), layers: [] };

    if (!options.skipDefaults) {
      this.push(loaded, this.baseOptions, 'defaults');
    }

    // Options file, explicit paths must exist
    if (options.optionsPath) {
      const path = resolve(options.optionsPath);
      if (!existsSync(path)) {
        throw new Error(`Options file not found: ${path}`);
      }
      this.push(loaded, await this.loadFile(path), 'file', path);
    }

    if (!options.skipEnv) {
      const env: Environment = options.env ?? process.env;
      this.push(loaded, bindEnvironment(env, options.envPrefix ?? DEFAULT_ENV_PREFIX), 'environment');
    }

    if (options.overrides) {
      this.push(loaded, options.overrides, 'overrides');
    }

    return loaded;
  }

  /**
   * Load a JSON or YAML options file as a single layer
   */
  async loadFile(path: string): Promise<Options> {
    const content = await readFile(path, 'utf-8');
    const data = this.parseContent(content, detectFormat(path), path);
    try {
      return decodeOptions(data);
    } catch (error) {
      if (error instanceof OptionsDecodeError) {
        throw new OptionsDecodeError(error.reason, error.field, error.token, path);
      }
      throw error;
    }
  }

  private push(loaded: LoadedOptions, layer: Options, source: OptionsSource, path?: string): void {
    loaded.options = applyOptions(loaded.options, layer);
    loaded.layers.push(path ? { source, path } : { source });
  }

  private parseContent(content: string, format: OptionsFormat, path: string): unknown {
    try {
      return format === 'yaml' ? (parseYaml(content) ?? {}) : JSON.parse(content);
    } catch (error) {
      throw new OptionsDecodeError(`malformed ${format.toUpperCase()}: ${errorMessage(error)}`, undefined, undefined, path);
    }
  }
}

export function detectFormat(path: string): OptionsFormat {
  const extension = extname(path).toLowerCase();
  return extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
}

/**
 * Convenience function to load options with defaults
 */
export async function loadOptions(options: OptionsLoadOptions = {}): Promise<Options> {
  const merger = new OptionsMerger();
  const loaded = await merger.loadOptions(options);
  return loaded.options;
}

/**
 * Find an options file by walking up the directory tree
 */
export function findOptionsFile(startDir: string): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const name of OPTIONS_FILE_NAMES) {
      const candidate = join(currentDir, name);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}
