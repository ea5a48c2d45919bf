/**
 * Ice Catalog Configuration Management
 *
 * Loads configuration from .ice-catalogrc (YAML) with environment variable
 * overrides and sensible defaults. The result is one explicit record handed
 * to the orchestrator at startup; core functions never read it.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ICE_CATALOG_*, then the legacy unprefixed names)
 * 3. Config file (.ice-catalogrc or --config path)
 * 4. Default values
 *
 * @module config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export const configSchema = z.object({
  version: z.number().int().positive(),

  paths: z.object({
    /** Grouped (per-day) catalog Parquet file */
    groupedCatalog: z.string().min(1),
    /** Zip (per-folder) catalog Parquet file */
    zipCatalog: z.string().min(1),
    /** Where converted .fgb files are written */
    flatgeobufDir: z.string().min(1),
    /** Where repackaged .zip files are written */
    zipDir: z.string().min(1),
  }),

  sources: z.object({
    /** Archive root; the release year is appended */
    shapefileBaseUrl: z.string().url(),
    year: z.number().int().min(1900).max(9999),
  }),

  assets: z.object({
    /** Public prefix of published .fgb files */
    fgbBaseUrl: z.string().url(),
    /** Public prefix of published .zip files */
    zipBaseUrl: z.string().url(),
  }),

  style: z.object({
    /** Style endpoint; absent means no style links are attached */
    url: z.string().url().nullable(),
  }),

  http: z.object({
    timeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),

  merge: z.object({
    onDatetimeConflict: z.enum(['warn', 'error']),
  }),

  verbose: z.boolean(),
  json: z.boolean(),
  dryRun: z.boolean(),
  configPath: z.string().nullable(),
});

export type IceCatalogConfig = z.infer<typeof configSchema>;

/**
 * Config file structure (YAML)
 */
const configFileSchema = z
  .object({
    version: z.number().optional(),
    paths: z
      .object({
        grouped_catalog: z.string().optional(),
        zip_catalog: z.string().optional(),
        flatgeobuf_dir: z.string().optional(),
        zip_dir: z.string().optional(),
      })
      .optional(),
    sources: z
      .object({
        shapefile_base_url: z.string().optional(),
        year: z.number().optional(),
      })
      .optional(),
    assets: z
      .object({
        fgb_base_url: z.string().optional(),
        zip_base_url: z.string().optional(),
      })
      .optional(),
    style: z
      .object({
        url: z.string().nullable().optional(),
      })
      .optional(),
    http: z
      .object({
        timeout_ms: z.number().optional(),
        user_agent: z.string().optional(),
      })
      .optional(),
    merge: z
      .object({
        on_datetime_conflict: z.enum(['warn', 'error']).optional(),
      })
      .optional(),
  })
  .passthrough();

type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  version: 1,

  paths: {
    groupedCatalog: 'daily_items.parquet',
    zipCatalog: 'zipped_assets.parquet',
    flatgeobufDir: 'flatgeobufs',
    zipDir: 'zips',
  },

  sources: {
    shapefileBaseUrl: 'https://download.dmi.dk/public/ICESERVICE/SIGRID3/',
  },

  assets: {
    fgbBaseUrl: 'https://assets.example.com/daily',
    zipBaseUrl: 'https://assets.example.com/zips',
  },

  http: {
    timeoutMs: 30000,
    userAgent: 'ice-catalog/0.1',
  },

  merge: {
    onDatetimeConflict: 'warn',
  },
} as const;

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.ice-catalogrc',
  '.ice-catalogrc.yaml',
  '.ice-catalogrc.yml',
  '.ice-catalogrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, one parser covers both
  const raw: unknown = parseYaml(content) ?? {};
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}: ${parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }
  return parsed.data;
}

/**
 * Environment variable: prefixed name first, then the legacy unprefixed one
 */
function getEnvVar(
  env: NodeJS.ProcessEnv,
  name: string,
  legacyName?: string
): string | undefined {
  const value = env[`ICE_CATALOG_${name}`] ?? (legacyName ? env[legacyName] : undefined);
  return value === '' ? undefined : value;
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvConflictPolicy(env: NodeJS.ProcessEnv): 'warn' | 'error' | undefined {
  const value = getEnvVar(env, 'ON_DATETIME_CONFLICT');
  return value === 'warn' || value === 'error' ? value : undefined;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory to search for a config file (default: process.cwd()) */
  cwd?: string;
  /** Clock for the default release year */
  now?: Date;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    dryRun?: boolean;
    year?: number;
    styleUrl?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If the config file is missing or any merged value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): IceCatalogConfig {
  const env = options.env ?? process.env;
  const now = options.now ?? new Date();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};

  const merged = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      groupedCatalog:
        getEnvVar(env, 'GROUPED_CATALOG', 'GROUPED_PARQUET_PATH') ??
        fileConfig.paths?.grouped_catalog ??
        DEFAULT_CONFIG.paths.groupedCatalog,
      zipCatalog:
        getEnvVar(env, 'ZIP_CATALOG', 'ZIP_PARQUET_PATH') ??
        fileConfig.paths?.zip_catalog ??
        DEFAULT_CONFIG.paths.zipCatalog,
      flatgeobufDir:
        getEnvVar(env, 'FLATGEOBUF_DIR', 'FLATGEOBUF_DIR') ??
        fileConfig.paths?.flatgeobuf_dir ??
        DEFAULT_CONFIG.paths.flatgeobufDir,
      zipDir:
        getEnvVar(env, 'ZIP_DIR', 'ZIPPED_DIR') ??
        fileConfig.paths?.zip_dir ??
        DEFAULT_CONFIG.paths.zipDir,
    },

    sources: {
      shapefileBaseUrl:
        getEnvVar(env, 'SHAPEFILE_BASE_URL', 'SHAPEFILE_BASE_URL') ??
        fileConfig.sources?.shapefile_base_url ??
        DEFAULT_CONFIG.sources.shapefileBaseUrl,
      year:
        overrides.year ??
        getEnvNumber(env, 'YEAR') ??
        fileConfig.sources?.year ??
        now.getUTCFullYear(),
    },

    assets: {
      fgbBaseUrl:
        getEnvVar(env, 'ASSET_BASE_URL_FGB', 'ASSET_BASE_URL_FGB') ??
        fileConfig.assets?.fgb_base_url ??
        DEFAULT_CONFIG.assets.fgbBaseUrl,
      zipBaseUrl:
        getEnvVar(env, 'ASSET_BASE_URL_ZIP', 'ASSET_BASE_URL_ZIP') ??
        fileConfig.assets?.zip_base_url ??
        DEFAULT_CONFIG.assets.zipBaseUrl,
    },

    style: {
      url:
        overrides.styleUrl ??
        getEnvVar(env, 'STYLE_URL', 'STYLE_URL') ??
        fileConfig.style?.url ??
        null,
    },

    http: {
      timeoutMs:
        getEnvNumber(env, 'TIMEOUT_MS') ??
        fileConfig.http?.timeout_ms ??
        DEFAULT_CONFIG.http.timeoutMs,
      userAgent:
        fileConfig.http?.user_agent ?? DEFAULT_CONFIG.http.userAgent,
    },

    merge: {
      onDatetimeConflict:
        getEnvConflictPolicy(env) ??
        fileConfig.merge?.on_datetime_conflict ??
        DEFAULT_CONFIG.merge.onDatetimeConflict,
    },

    verbose: overrides.verbose ?? false,
    json: overrides.json ?? false,
    dryRun: overrides.dryRun ?? false,
    configPath,
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }

  return result.data;
}
