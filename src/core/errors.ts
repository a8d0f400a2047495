/**
 * Error Types
 * Failures raised while decoding, binding and preparing options
 */

/**
 * Raised when a file or script payload cannot be turned into options.
 * Decoding is all-or-nothing: nothing is applied when this is thrown.
 */
export class OptionsDecodeError extends Error {
  constructor(
    public readonly reason: string,
    public readonly field?: string,
    public readonly token?: string,
    public readonly source?: string
  ) {
    super([source, field, reason].filter(Boolean).join(': '));
    this.name = 'OptionsDecodeError';
  }
}

/**
 * Raised when an environment variable holds a value its option cannot take.
 */
export class EnvBindingError extends Error {
  constructor(
    public readonly variable: string,
    public readonly value: string,
    reason: string
  ) {
    super(`invalid value "${value}" for ${variable}: ${reason}`);
    this.name = 'EnvBindingError';
  }
}

export class DurationParseError extends Error {
  constructor(public readonly input: string) {
    super(`invalid duration "${input}"`);
    this.name = 'DurationParseError';
  }
}

export class StageParseError extends Error {
  constructor(
    public readonly segment: string,
    reason: string
  ) {
    super(`invalid stage "${segment}": ${reason}`);
    this.name = 'StageParseError';
  }
}

/**
 * Raised by TLSAuth.certificate() when the PEM bundle cannot be used.
 */
export class CertificateError extends Error {
  constructor(
    message: string,
    public readonly domains: readonly string[]
  ) {
    super(`tlsAuth [${domains.join(', ')}]: ${message}`);
    this.name = 'CertificateError';
  }
}

/**
 * Raised when options cannot be expressed as Node TLS parameters.
 */
export class TLSConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TLSConfigError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
