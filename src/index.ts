#!/usr/bin/env node
/**
 * loadopts CLI
 * Inspect, validate and resolve load-test options
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { stringify as yamlStringify } from 'yaml';
import { OptionsMerger, findOptionsFile } from './core/config-merger.js';
import { DEFAULT_ENV_PREFIX, listEnvBindings } from './core/env-binding.js';
import { errorMessage } from './core/errors.js';
import { encodeOptions } from './core/options-codec.js';
import { printOptionsSummary } from './reporters/options-summary.js';
import { buildTLSConnectionOptions } from './tls/connection.js';
import { findTLSAuth } from './tls/auth.js';
import type { LoadedOptions, OptionsFormat } from './types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface LayerFlags {
  defaults: boolean;
  env: boolean;
  prefix: string;
  quiet?: boolean;
}

interface ResolveFlags extends LayerFlags {
  format: OptionsFormat;
}

// Load package.json for version
async function getVersion(): Promise<string> {
  try {
    const pkgPath = join(__dirname, '../package.json');
    const pkg: { version?: string } = JSON.parse(await readFile(pkgPath, 'utf-8'));
    return pkg.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function main() {
  const version = await getVersion();

  const program = new Command()
    .name('loadopts')
    .description('Resolve and inspect load-test run options')
    .version(version);

  const withLayerFlags = (command: Command) =>
    command
      .option('--no-defaults', 'Leave out built-in defaults')
      .option('--no-env', 'Ignore environment variables')
      .option('--prefix <prefix>', 'Environment variable prefix', DEFAULT_ENV_PREFIX)
      .option('-q, --quiet', 'Print only the result');

  withLayerFlags(
    program
      .command('resolve [file]')
      .description('Print the effective options after merging all layers')
      .option('-f, --format <format>', 'Output format (json, yaml)', 'json')
  ).action(async (file: string | undefined, options: ResolveFlags) => {
    await resolveCommand(file, options);
  });

  withLayerFlags(
    program.command('summary [file]').description('Show the effective options as a table')
  ).action(async (file: string | undefined, options: LayerFlags) => {
    await summaryCommand(file, options);
  });

  withLayerFlags(
    program.command('tls <host> [file]').description('Show the TLS parameters used for a host')
  ).action(async (host: string, file: string | undefined, options: LayerFlags) => {
    await tlsCommand(host, file, options);
  });

  program
    .command('validate <file>')
    .description('Decode an options file and report problems')
    .action(async (file: string) => {
      await validateCommand(file);
    });

  program
    .command('env')
    .description('List the environment variables options are read from')
    .option('--prefix <prefix>', 'Environment variable prefix', DEFAULT_ENV_PREFIX)
    .action((options: { prefix: string }) => {
      envCommand(options.prefix);
    });

  await program.parseAsync(process.argv);
}

/**
 * Merge defaults, options file and environment as the flags ask
 */
async function loadLayers(file: string | undefined, flags: LayerFlags): Promise<LoadedOptions> {
  const optionsPath = file ?? findOptionsFile(process.cwd()) ?? undefined;
  if (!flags.quiet) {
    console.log(chalk.gray(optionsPath ? `Loading options: ${optionsPath}` : 'No options file found'));
  }

  const merger = new OptionsMerger();
  const loaded = await merger.loadOptions({
    optionsPath,
    skipDefaults: !flags.defaults,
    skipEnv: !flags.env,
    envPrefix: flags.prefix,
  });

  if (!flags.quiet) {
    const layers = loaded.layers.map((layer) => layer.source).join(' → ');
    console.log(chalk.gray(`Layers: ${layers || 'none'}\n`));
  }
  return loaded;
}

/**
 * Resolve command implementation
 */
async function resolveCommand(file: string | undefined, flags: ResolveFlags) {
  try {
    if (flags.format !== 'json' && flags.format !== 'yaml') {
      throw new Error(`Unknown format: ${String(flags.format)} (expected json or yaml)`);
    }
    const { options } = await loadLayers(file, flags);
    const encoded = encodeOptions(options);
    console.log(flags.format === 'yaml' ? yamlStringify(encoded) : JSON.stringify(encoded, null, 2));
  } catch (error) {
    console.log(chalk.red(`\n❌ Error: ${errorMessage(error)}\n`));
    process.exit(1);
  }
}

/**
 * Summary command implementation
 */
async function summaryCommand(file: string | undefined, flags: LayerFlags) {
  try {
    const { options } = await loadLayers(file, flags);
    printOptionsSummary(options);
  } catch (error) {
    console.log(chalk.red(`\n❌ Error: ${errorMessage(error)}\n`));
    process.exit(1);
  }
}

/**
 * TLS command implementation
 */
async function tlsCommand(host: string, file: string | undefined, flags: LayerFlags) {
  try {
    const { options } = await loadLayers(file, flags);
    const connection = buildTLSConnectionOptions(options, host);
    const auth = findTLSAuth(options.tlsAuth, host);

    console.log(chalk.blue(`🔐 TLS parameters for ${host}:\n`));
    console.log(`   Verify peer:  ${connection.rejectUnauthorized ? chalk.green('yes') : chalk.yellow('no')}`);
    console.log(`   Versions:     ${chalk.white(`${connection.minVersion ?? 'default'} - ${connection.maxVersion ?? 'default'}`)}`);
    console.log(`   Ciphers:      ${chalk.white(connection.ciphers ?? 'default')}`);

    if (auth) {
      const { x509 } = auth.certificate();
      console.log(`   Client cert:  ${chalk.cyan(x509.subject.replace(/\n/g, ', '))}`);
      console.log(chalk.gray(`                 domains: ${auth.fields.domains.join(', ')}`));
      console.log(chalk.gray(`                 valid to: ${x509.validTo}`));
    } else {
      console.log(`   Client cert:  ${chalk.gray('none')}`);
    }
    console.log('');
  } catch (error) {
    console.log(chalk.red(`\n❌ Error: ${errorMessage(error)}\n`));
    process.exit(1);
  }
}

/**
 * Validate command implementation
 */
async function validateCommand(file: string) {
  console.log(chalk.blue('🔍 Validating options file...\n'));

  try {
    const merger = new OptionsMerger();
    const options = await merger.loadFile(file);
    const present = Object.keys(encodeOptions(options));

    console.log(chalk.green('✓ Options decoded'));
    console.log(chalk.gray(`  Fields set: ${present.length > 0 ? present.join(', ') : 'none'}`));

    for (const [index, auth] of (options.tlsAuth ?? []).entries()) {
      auth.certificate();
      console.log(chalk.green(`✓ tlsAuth[${index}] certificate matches its key`));
    }

    console.log(chalk.green('\n✅ Options are valid!\n'));
  } catch (error) {
    console.log(chalk.red(`\n❌ Validation failed: ${errorMessage(error)}\n`));
    process.exit(1);
  }
}

/**
 * Env command implementation
 */
function envCommand(prefix: string) {
  console.log(chalk.blue('📋 Environment variables:\n'));

  for (const binding of listEnvBindings(prefix)) {
    const value = process.env[binding.variable];
    const shown = value === undefined ? chalk.gray('(unset)') : value === '' ? chalk.gray('(empty)') : chalk.white(value);
    console.log(`  ${chalk.green(binding.variable.padEnd(36))} ${chalk.gray(binding.kind.padEnd(9))} ${shown}`);
  }
  console.log('');
}

// Run CLI
main().catch((error: unknown) => {
  console.error(chalk.red(`Fatal error: ${errorMessage(error)}`));
  process.exit(1);
});
