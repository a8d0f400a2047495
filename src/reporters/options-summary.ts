/**
 * Options Summary Reporter
 * Generates a compact ASCII table of effective options for console output
 */

import type { Options } from '../types/index.js';
import type { Nullable } from '../core/nullable.js';
import { formatDuration } from '../utils/duration.js';
import { formatCIDR } from '../utils/network.js';
import { formatStages } from '../utils/stages.js';
import { tlsVersionName } from '../tls/versions.js';

// ANSI color codes for terminal output
const ANSI = {
  cyan: '\x1b[36m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
};

const ABSENT = '-';

export interface SummaryOptions {
  /** Emit ANSI colors (default true) */
  colors?: boolean;
}

/**
 * Pad string to width, handling ANSI codes
 */
function padString(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

/**
 * Build a row separator
 */
function buildSeparator(widths: number[], type: 'top' | 'middle' | 'bottom'): string {
  const chars = {
    top: { left: '┌', middle: '┬', right: '┐' },
    middle: { left: '├', middle: '┼', right: '┤' },
    bottom: { left: '└', middle: '┴', right: '┘' },
  };
  const c = chars[type];
  return c.left + widths.map((w) => '─'.repeat(w + 2)).join(c.middle) + c.right;
}

function buildRow(cells: string[], widths: number[]): string {
  return '│ ' + cells.map((cell, i) => padString(cell, widths[i])).join(' │ ') + ' │';
}

function nullable<T>(value: Nullable<T>, format: (value: T) => string = String): string {
  return value.valid ? format(value.value) : ABSENT;
}

function counted(count: number | undefined, noun: string): string {
  if (count === undefined) return ABSENT;
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One [label, value] pair per option, absent options shown as "-"
 */
export function summarizeOptions(options: Options): Array<[string, string]> {
  const { tlsVersion } = options;

  return [
    ['paused', nullable(options.paused)],
    ['vus', nullable(options.vus)],
    ['vusMax', nullable(options.vusMax)],
    ['duration', nullable(options.duration, formatDuration)],
    ['iterations', nullable(options.iterations)],
    ['stages', options.stages ? formatStages(options.stages) || '(none)' : ABSENT],
    ['linger', nullable(options.linger)],
    ['noUsageReport', nullable(options.noUsageReport)],
    ['maxRedirects', nullable(options.maxRedirects)],
    ['insecureSkipTLSVerify', nullable(options.insecureSkipTLSVerify)],
    ['tlsCipherSuites', counted(options.tlsCipherSuites?.length, 'suite')],
    [
      'tlsVersion',
      tlsVersion
        ? `${tlsVersionName(tlsVersion.min) || 'any'} - ${tlsVersionName(tlsVersion.max) || 'any'}`
        : ABSENT,
    ],
    ['tlsAuth', counted(options.tlsAuth?.length, 'bundle')],
    ['noConnectionReuse', nullable(options.noConnectionReuse)],
    ['userAgent', nullable(options.userAgent, (agent) => JSON.stringify(agent))],
    ['throw', nullable(options.throw)],
    ['thresholds', counted(options.thresholds && Object.keys(options.thresholds).length, 'metric')],
    ['blacklistIPs', options.blacklistIPs ? options.blacklistIPs.map(formatCIDR).join(', ') || '(none)' : ABSENT],
    ['hosts', counted(options.hosts && Object.keys(options.hosts).length, 'host')],
    ['ext', options.external ? Object.keys(options.external).join(', ') || '(none)' : ABSENT],
  ];
}

/**
 * Generate the options table
 */
export function generateOptionsSummary(options: Options, summaryOptions: SummaryOptions = {}): string {
  const useColors = summaryOptions.colors ?? true;
  const paint = (code: string, text: string) => (useColors ? `${code}${text}${ANSI.reset}` : text);

  const rows = summarizeOptions(options);
  const widths = [
    Math.max('Option'.length, ...rows.map(([label]) => label.length)),
    Math.max('Value'.length, ...rows.map(([, value]) => value.length)),
  ];

  const lines: string[] = [];
  lines.push(buildSeparator(widths, 'top'));
  lines.push(buildRow([paint(ANSI.bold, 'Option'), paint(ANSI.bold, 'Value')], widths));
  lines.push(buildSeparator(widths, 'middle'));

  for (const [label, value] of rows) {
    lines.push(buildRow([paint(ANSI.cyan, label), value === ABSENT ? paint(ANSI.dim, value) : value], widths));
  }

  lines.push(buildSeparator(widths, 'bottom'));
  return lines.join('\n');
}

/**
 * Print summary directly to console
 */
export function printOptionsSummary(options: Options): void {
  console.log(generateOptionsSummary(options));
}
