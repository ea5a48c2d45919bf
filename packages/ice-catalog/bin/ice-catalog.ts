#!/usr/bin/env tsx
/**
 * Ice Catalog CLI Entry Point
 *
 * Keeps the sea-ice chart catalogs in step with the upstream archive:
 * `sync` for the incremental run, `merge` to re-collapse the grouped catalog,
 * `stats` to inspect either catalog.
 *
 * @module ice-catalog-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, type IceCatalogConfig } from '../src/config/config.js';
import { logger } from '../src/core/utils/logger.js';
import { runMerge, runStats, runSync, type CatalogName } from '../src/cli/commands/index.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../src/cli/exit-codes.js';

// ============================================================================
// CLI Setup
// ============================================================================

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  dryRun?: boolean;
  config?: string;
  styleUrl?: string;
}

const packageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parseYear(value: string): number {
  const year = Number(value);
  if (!/^\d{4}$/.test(value) || !Number.isInteger(year)) {
    throw new InvalidArgumentError('Year must be four digits.');
  }
  return year;
}

function parseCatalogName(value: string): CatalogName {
  if (value !== 'grouped' && value !== 'zip') {
    throw new InvalidArgumentError('Catalog must be "grouped" or "zip".');
  }
  return value;
}

function resolveConfig(program: Command, year?: number): IceCatalogConfig {
  const options = program.opts<GlobalOptions>();
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dryRun: options.dryRun,
      styleUrl: options.styleUrl,
      year,
    },
  });

  logger.configure({
    level: config.verbose ? 'debug' : 'info',
    pretty: !config.json,
  });
  logger.debug('Configuration loaded', { configPath: config.configPath, year: config.sources.year });

  return config;
}

/**
 * Run a command body and exit with its code, mapping thrown errors
 */
async function execute(body: () => Promise<ExitCode>): Promise<void> {
  let code: ExitCode;
  try {
    code = await body();
  } catch (error) {
    code = exitCodeFor(error);
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Command failed', { error: message, exitCode: code });
  }
  process.exitCode = code;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('ice-catalog')
    .description('Sea-ice chart catalog synchronization and per-day merge')
    .version(getVersion())
    .option('-v, --verbose', 'Enable debug logging')
    .option('--json', 'Machine-readable output')
    .option('--dry-run', 'Do everything except writing catalogs')
    .option('-c, --config <path>', 'Config file path')
    .option('--style-url <url>', 'Style endpoint to link from every item');

  program
    .command('sync')
    .description('Discover new folders and update both catalogs')
    .option('--list <path>', 'Read folder names from a {"list": [...]} JSON file')
    .option('--year <yyyy>', 'Archive year to scan', parseYear)
    .action(async (options: { list?: string; year?: number }) => {
      await execute(() => {
        const config = resolveConfig(program, options.year);
        return runSync(config, { listPath: options.list });
      });
    });

  program
    .command('merge')
    .description('Re-merge the grouped catalog to one item per day')
    .action(async () => {
      await execute(() => runMerge(resolveConfig(program)));
    });

  program
    .command('stats')
    .description('Summarize a stored catalog')
    .option('--catalog <name>', 'grouped or zip', parseCatalogName, 'grouped')
    .action(async (options: { catalog: CatalogName }) => {
      await execute(() => runStats(resolveConfig(program), options.catalog));
    });

  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(EXIT_CODES.ERRORS);
});
