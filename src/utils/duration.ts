/**
 * Duration Utilities
 * Durations are whole nanoseconds, written as "1h2m3.5s", "250ms", "0s"
 */

import { DurationParseError } from '../core/errors.js';

/** Signed span of time in nanoseconds */
export type Duration = number;

export const Nanosecond: Duration = 1;
export const Microsecond: Duration = 1_000 * Nanosecond;
export const Millisecond: Duration = 1_000 * Microsecond;
export const Second: Duration = 1_000 * Millisecond;
export const Minute: Duration = 60 * Second;
export const Hour: Duration = 60 * Minute;

const UNITS: Readonly<Record<string, Duration>> = {
  ns: Nanosecond,
  us: Microsecond,
  'µs': Microsecond, // U+00B5
  'μs': Microsecond, // U+03BC
  ms: Millisecond,
  s: Second,
  m: Minute,
  h: Hour,
};

// Longer units first so "ms" is not read as "m" followed by garbage
const COMPONENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parse a duration string to nanoseconds
 * Supports: "300ms", "1.5h", "2h45m", "-1m30s", "0"
 */
export function parseDuration(input: string): Duration {
  let rest = input;
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest[0] === '-' ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new DurationParseError(input);
  }

  let total = 0;
  while (rest.length > 0) {
    const match = COMPONENT.exec(rest);
    if (!match) {
      throw new DurationParseError(input);
    }
    total += componentValue(match[1], UNITS[match[2]]);
    rest = rest.slice(match[0].length);
  }

  const result = sign * total;
  if (!Number.isSafeInteger(result)) {
    throw new DurationParseError(input);
  }
  return result === 0 ? 0 : result;
}

/**
 * Format nanoseconds in compound unit form
 * Output: "2m0s", "1h0m10s", "1.5s", "250ms", "0s"
 */
export function formatDuration(duration: Duration): string {
  if (duration === 0) {
    return '0s';
  }

  const sign = duration < 0 ? '-' : '';
  let remaining = Math.abs(duration);

  if (remaining < Second) {
    if (remaining < Microsecond) {
      return `${sign}${remaining}ns`;
    }
    if (remaining < Millisecond) {
      return `${sign}${withFraction(remaining, Microsecond)}µs`;
    }
    return `${sign}${withFraction(remaining, Millisecond)}ms`;
  }

  const hours = Math.floor(remaining / Hour);
  remaining -= hours * Hour;
  const minutes = Math.floor(remaining / Minute);
  remaining -= minutes * Minute;

  let text = `${withFraction(remaining, Second)}s`;
  if (hours > 0 || minutes > 0) {
    text = `${minutes}m${text}`;
  }
  if (hours > 0) {
    text = `${hours}h${text}`;
  }
  return sign + text;
}

/**
 * Convert to whole milliseconds, e.g. for timers
 */
export function durationToMilliseconds(duration: Duration): number {
  return Math.trunc(duration / Millisecond);
}

// Fractions below a nanosecond are dropped: "1.5ns" is 1ns
function componentValue(number: string, unit: Duration): Duration {
  const [whole, fraction = ''] = number.split('.');
  const value = Number(whole || '0') * unit;
  if (fraction === '') {
    return value;
  }
  return value + Math.trunc(Number(fraction) * (unit / 10 ** fraction.length));
}

function withFraction(value: number, unit: Duration): string {
  const whole = Math.floor(value / unit);
  const fraction = value % unit;
  if (fraction === 0) {
    return String(whole);
  }
  const digits = String(unit).length - 1;
  return `${whole}.${String(fraction).padStart(digits, '0').replace(/0+$/, '')}`;
}
