/**
 * JSON Schema Validator
 * Checks the shape of raw options payloads before they are decoded
 */

import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import type { OptionsJSON } from '../types/index.js';

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const SCHEMAS_DIR = join(__dirname, '../../schemas');

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: ValidationError[] };

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

export class Validator {
  private ajv: InstanceType<typeof Ajv>;
  private optionsValidator: ValidateFunction<OptionsJSON> | null = null;

  constructor(private readonly schemasDir: string = SCHEMAS_DIR) {
    this.ajv = new Ajv({
      allErrors: true,
      verbose: true,
      strict: true,
    });
    addFormats(this.ajv);
  }

  /**
   * Compile the options schema; later calls are no-ops
   */
  initialize(): void {
    if (this.optionsValidator) return;

    const schemaPath = join(this.schemasDir, 'options.schema.json');
    const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));
    this.optionsValidator = this.ajv.compile<OptionsJSON>(schema);
  }

  validateOptions(data: unknown): ValidationResult<OptionsJSON> {
    this.initialize();
    const validator = this.optionsValidator;
    if (!validator) {
      throw new Error(`Options schema not loaded from ${this.schemasDir}`);
    }

    if (validator(data)) {
      return { valid: true, value: data, errors: [] };
    }
    return { valid: false, errors: this.formatErrors(validator.errors ?? []) };
  }

  private formatErrors(errors: ErrorObject[]): ValidationError[] {
    return errors.map((error) => ({
      path: error.instancePath || '/',
      message: this.formatErrorMessage(error),
      keyword: error.keyword,
      params: error.params,
    }));
  }

  private formatErrorMessage(error: ErrorObject): string {
    const { keyword, params, message } = error;

    switch (keyword) {
      case 'required':
        return `Missing required property: ${String(params.missingProperty)}`;
      case 'type':
        return `Expected ${String(params.type)}, got ${describeType(error.data)}`;
      case 'format':
        return `Value does not match format: ${String(params.format)}`;
      case 'minLength':
        return `String must be at least ${String(params.limit)} character(s)`;
      case 'additionalProperties':
        return `Unknown property: ${String(params.additionalProperty)}`;
      default:
        return message || `Validation failed: ${keyword}`;
    }
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

let defaultValidator: Validator | null = null;

export function getValidator(): Validator {
  if (!defaultValidator) {
    defaultValidator = new Validator();
    defaultValidator.initialize();
  }
  return defaultValidator;
}

export function validateOptions(data: unknown): ValidationResult<OptionsJSON> {
  return getValidator().validateOptions(data);
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: readonly ValidationError[]): string {
  if (errors.length === 0) return 'Validation passed';

  const lines = ['Validation failed:'];
  for (const error of errors) {
    lines.push(`  - ${error.path}: ${error.message}`);
  }
  return lines.join('\n');
}
