/**
 * Environment Binding
 * Reads scalar options from LOADOPTS_* variables.
 *
 * An unset variable and an empty one both leave the option absent; only a
 * non-empty value is parsed and marked present. Structured options (TLS,
 * hosts, thresholds, ext) come from files only.
 */

import type { Environment, Options, OptionsInit, Stage } from '../types/index.js';
import { parseDuration } from '../utils/duration.js';
import { parseStages } from '../utils/stages.js';
import { EnvBindingError, errorMessage } from './errors.js';
import { boolFrom, durationFrom, intFrom, stringFrom } from './nullable.js';
import { createOptions } from './options.js';

export const DEFAULT_ENV_PREFIX = 'LOADOPTS';

const BOOL_FIELDS = [
  'paused',
  'linger',
  'noUsageReport',
  'insecureSkipTLSVerify',
  'noConnectionReuse',
  'throw',
] as const;
const INT_FIELDS = ['vus', 'vusMax', 'iterations', 'maxRedirects'] as const;
const DURATION_FIELDS = ['duration'] as const;
const STRING_FIELDS = ['userAgent'] as const;
const STAGE_FIELDS = ['stages'] as const;

export type EnvKind = 'bool' | 'int' | 'duration' | 'string' | 'stages';

export interface EnvBinding {
  field: keyof Options;
  variable: string;
  kind: EnvKind;
}

// Accepted boolean spellings
const TRUE_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

/**
 * vusMax → LOADOPTS_VUS_MAX, insecureSkipTLSVerify → LOADOPTS_INSECURE_SKIP_TLS_VERIFY
 */
export function envVarName(field: string, prefix: string = DEFAULT_ENV_PREFIX): string {
  const snake = field
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toUpperCase();
  return prefix ? `${prefix}_${snake}` : snake;
}

/**
 * Every bound option with its variable name, in declaration order
 */
export function listEnvBindings(prefix: string = DEFAULT_ENV_PREFIX): EnvBinding[] {
  const groups: Array<[readonly (keyof Options)[], EnvKind]> = [
    [BOOL_FIELDS, 'bool'],
    [INT_FIELDS, 'int'],
    [DURATION_FIELDS, 'duration'],
    [STRING_FIELDS, 'string'],
    [STAGE_FIELDS, 'stages'],
  ];
  return groups.flatMap(([fields, kind]) =>
    fields.map((field) => ({ field, variable: envVarName(field, prefix), kind }))
  );
}

/**
 * Build options from environment variables.
 * Throws EnvBindingError on the first value that does not parse.
 */
export function bindEnvironment(env: Environment = process.env, prefix: string = DEFAULT_ENV_PREFIX): Options {
  const bound: OptionsInit = {};

  for (const field of BOOL_FIELDS) {
    const value = bindVariable(env, envVarName(field, prefix), parseBool);
    if (value !== undefined) bound[field] = boolFrom(value);
  }
  for (const field of INT_FIELDS) {
    const value = bindVariable(env, envVarName(field, prefix), parseInteger);
    if (value !== undefined) bound[field] = intFrom(value);
  }
  for (const field of DURATION_FIELDS) {
    const value = bindVariable(env, envVarName(field, prefix), parseDuration);
    if (value !== undefined) bound[field] = durationFrom(value);
  }
  for (const field of STRING_FIELDS) {
    const value = bindVariable(env, envVarName(field, prefix), (raw) => raw);
    if (value !== undefined) bound[field] = stringFrom(value);
  }
  for (const field of STAGE_FIELDS) {
    const value = bindVariable<Stage[]>(env, envVarName(field, prefix), parseStages);
    if (value !== undefined) bound[field] = Object.freeze(value);
  }

  return createOptions(bound);
}

function bindVariable<T>(env: Environment, variable: string, parse: (raw: string) => T): T | undefined {
  const raw = env[variable];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  try {
    return parse(raw);
  } catch (error) {
    throw new EnvBindingError(variable, raw, errorMessage(error));
  }
}

function parseBool(raw: string): boolean {
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new Error('expected true or false');
}

function parseInteger(raw: string): number {
  const value = Number(raw);
  if (!/^[-+]?\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new Error('expected an integer');
  }
  return value;
}
