/**
 * Nullable Option Values
 * Scalar wrapper that tells "not provided" apart from "provided as zero"
 */

import type { Duration } from '../utils/duration.js';

/**
 * A value paired with a presence flag.
 *
 * When `valid` is false the value is only a placeholder and must not be
 * used for decisions; read it through `orElse()` instead.
 */
export class Nullable<T> {
  private constructor(
    readonly value: T,
    readonly valid: boolean
  ) {
    Object.freeze(this);
  }

  static of<T>(value: T): Nullable<T> {
    return new Nullable(value, true);
  }

  static empty<T>(placeholder: T): Nullable<T> {
    return new Nullable(placeholder, false);
  }

  orElse(fallback: T): T {
    return this.valid ? this.value : fallback;
  }

  equals(other: Nullable<T>): boolean {
    return this.valid === other.valid && this.value === other.value;
  }

  toString(): string {
    return this.valid ? String(this.value) : '';
  }
}

export type NullBool = Nullable<boolean>;
export type NullInt = Nullable<number>;
export type NullString = Nullable<string>;
export type NullDuration = Nullable<Duration>;

export const NULL_BOOL: NullBool = Nullable.empty(false);
export const NULL_INT: NullInt = Nullable.empty(0);
export const NULL_STRING: NullString = Nullable.empty('');
export const NULL_DURATION: NullDuration = Nullable.empty(0);

export function boolFrom(value: boolean): NullBool {
  return Nullable.of(value);
}

/**
 * Integers are kept as numbers, so anything past 2^53 is refused
 */
export function intFrom(value: number): NullInt {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${value} is not a safe integer`);
  }
  return Nullable.of(value);
}

export function stringFrom(value: string): NullString {
  return Nullable.of(value);
}

export function durationFrom(value: Duration): NullDuration {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${value}ns is not a whole number of nanoseconds`);
  }
  return Nullable.of(value);
}

/**
 * Pick the override when it was provided, otherwise keep the base
 */
export function applyNullable<T>(base: Nullable<T>, override: Nullable<T>): Nullable<T> {
  return override.valid ? override : base;
}
