/**
 * CLI Configuration Management
 *
 * Loads runtime settings from .pcoderc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PCODE_*)
 * 3. Config file (.pcoderc or --rc path)
 * 4. Default values
 *
 * Paths in a config file are resolved against the file's directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { PcodeSetupError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type OutputFormat = 'table' | 'json';

export interface CLIConfig {
  /** Admin level configuration file (YAML) */
  readonly adminConfigPath: string | null;
  /** P-code length table (CSV) */
  readonly pcodeFormatsPath: string | null;
  readonly adminLevel: number;
  readonly fuzzy: boolean;
  /** Context recorded with every diagnostic */
  readonly context: string;
  readonly format: OutputFormat;
  readonly verbose: boolean;
  /** Resolved rc file path */
  readonly rcPath: string | null;
}

const RcFileSchema = z
  .object({
    admin_config: z.string().min(1).optional(),
    pcode_formats: z.string().min(1).optional(),
    admin_level: z.number().int().positive().optional(),
    fuzzy: z.boolean().optional(),
    context: z.string().min(1).optional(),
    format: z.enum(['table', 'json']).optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

type RcFile = z.infer<typeof RcFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'rcPath'> = {
  adminConfigPath: null,
  pcodeFormatsPath: null,
  adminLevel: 1,
  fuzzy: true,
  context: 'cli',
  format: 'table',
  verbose: false,
};

// ============================================================================
// Configuration Loading
// ============================================================================

const RC_FILE_NAMES = ['.pcoderc', '.pcoderc.yaml', '.pcoderc.yml', '.pcoderc.json'];

/**
 * Find rc file in the start directory or its parents
 */
function findRcFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of RC_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse rc file content (YAML parses JSON too)
 */
function parseRcFile(filePath: string): RcFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new PcodeSetupError(`Cannot parse ${filePath}`, 'config', [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = RcFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw PcodeSetupError.fromZodError(`Invalid config file ${filePath}`, 'config', parsed.error);
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = env[`PCODE_${name}`];
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = env[`PCODE_${name}`];
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvFormat(env: Env): OutputFormat | undefined {
  const value = env.PCODE_FORMAT;
  return value === 'table' || value === 'json' ? value : undefined;
}

export interface LoadConfigOptions {
  /** Explicit rc file path */
  rcPath?: string;
  /** Directory to start the rc file search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    adminConfigPath?: string;
    pcodeFormatsPath?: string;
    adminLevel?: number;
    fuzzy?: boolean;
    context?: string;
    format?: OutputFormat;
    verbose?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws PcodeSetupError if an explicit rc file is missing or any rc file is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let rcPath: string | null = null;
  let fileConfig: RcFile = {};

  const explicitPath = options.rcPath ?? env.PCODE_RC;
  if (explicitPath) {
    rcPath = resolve(cwd, explicitPath);
    if (!existsSync(rcPath)) {
      throw new PcodeSetupError(`Config file not found: ${rcPath}`, 'config');
    }
    fileConfig = parseRcFile(rcPath);
  } else {
    rcPath = findRcFile(cwd);
    if (rcPath) {
      fileConfig = parseRcFile(rcPath);
    }
  }

  const rcDir = rcPath ? dirname(rcPath) : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(rcDir, path);
  const fromCwd = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(cwd, path);

  const overrides = options.overrides ?? {};

  return {
    adminConfigPath:
      fromCwd(overrides.adminConfigPath) ??
      fromCwd(env.PCODE_ADMIN_CONFIG) ??
      fromFile(fileConfig.admin_config) ??
      DEFAULT_CONFIG.adminConfigPath,
    pcodeFormatsPath:
      fromCwd(overrides.pcodeFormatsPath) ??
      fromCwd(env.PCODE_FORMATS) ??
      fromFile(fileConfig.pcode_formats) ??
      DEFAULT_CONFIG.pcodeFormatsPath,
    adminLevel:
      overrides.adminLevel ??
      getEnvNumber(env, 'ADMIN_LEVEL') ??
      fileConfig.admin_level ??
      DEFAULT_CONFIG.adminLevel,
    fuzzy: overrides.fuzzy ?? getEnvBool(env, 'FUZZY') ?? fileConfig.fuzzy ?? DEFAULT_CONFIG.fuzzy,
    context: overrides.context ?? env.PCODE_CONTEXT ?? fileConfig.context ?? DEFAULT_CONFIG.context,
    format: overrides.format ?? getEnvFormat(env) ?? fileConfig.format ?? DEFAULT_CONFIG.format,
    verbose:
      overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? fileConfig.verbose ?? DEFAULT_CONFIG.verbose,
    rcPath,
  };
}
