/**
 * Resolve Command
 *
 * Resolve names or p-codes of one country against a configured registry.
 *
 * Usage:
 *   pcode-resolver resolve <iso3> <inputs...> [options]
 *
 * Options:
 *   --config <path>    Admin configuration file (YAML)
 *   --formats <path>   P-code length table (CSV)
 *   --level <n>        Admin level of the registry
 *   --no-fuzzy         Exact matching only
 *   --context <name>   Context recorded with diagnostics
 *   --parent <pcode>   Restrict name matching to children of a parent p-code
 *   --format <fmt>     Output format: table|json
 *
 * Exit codes: 0 all resolved, 2 some unresolved, 3 configuration error.
 */

import type { Command } from 'commander';
import { PcodeSetupError } from '../../core/errors.js';
import { Logger } from '../../core/utils/logger.js';
import { loadAdminConfig, loadPcodeLengths } from '../../loaders/admin-config-loader.js';
import { AdminLevel } from '../../resolution/admin-level.js';
import { formatError, formatIgnored, formatMatch } from '../../resolution/diagnostics.js';
import { type OutputFormat, loadConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatTable, formatters, type TableColumn } from '../lib/output.js';

// ============================================================================
// Types
// ============================================================================

interface ResolveCliOptions {
  readonly config?: string;
  readonly formats?: string;
  readonly level?: number;
  readonly fuzzy?: boolean;
  readonly context?: string;
  readonly parent?: string;
  readonly format?: string;
}

type GlobalCliOptions = {
  readonly rc?: string;
  readonly verbose?: boolean;
};

export interface ResolveSettings {
  readonly adminConfigPath: string;
  readonly pcodeFormatsPath?: string | null;
  readonly adminLevel: number;
  readonly fuzzy: boolean;
  readonly context: string;
  readonly parent?: string;
  readonly logger?: Logger;
}

export type ResolvedRow = {
  readonly input: string;
  readonly pcode: string | undefined;
  readonly name: string | undefined;
  readonly exact: boolean;
};

export interface ResolveRun {
  readonly rows: readonly ResolvedRow[];
  /** Formatted match, ignore and error lines */
  readonly diagnostics: readonly string[];
  readonly exitCode: ExitCode;
}

const COLUMNS: readonly TableColumn[] = [
  { key: 'input', header: 'Input' },
  { key: 'pcode', header: 'P-code', formatter: formatters.optional },
  { key: 'name', header: 'Name', formatter: formatters.optional },
  { key: 'exact', header: 'Exact', formatter: formatters.yesNo },
];

// ============================================================================
// Execution
// ============================================================================

/**
 * Build an engine from the configured files and resolve every input
 *
 * @throws PcodeSetupError if a configuration file is missing or invalid
 */
export function runResolve(countryIso3: string, inputs: readonly string[], settings: ResolveSettings): ResolveRun {
  const loaded = loadAdminConfig(settings.adminConfigPath);

  const engine = new AdminLevel(loaded.config, {
    adminLevel: settings.adminLevel,
    adminLevelOverrides: loaded.adminLevelOverrides,
    logger: settings.logger,
  });
  engine.setupFromAdminInfo(loaded.adminInfo);

  if (settings.pcodeFormatsPath) {
    engine.loadPcodeFormats(loadPcodeLengths(settings.pcodeFormatsPath));
  }

  const rows = inputs.map((input): ResolvedRow => {
    const { pcode, exact } = engine.resolve(countryIso3, input, {
      fuzzy: settings.fuzzy,
      context: settings.context,
      parent: settings.parent,
    });
    return { input, pcode, name: pcode === undefined ? undefined : engine.getName(pcode), exact };
  });

  const diagnostics = [
    ...engine.drainMatches().map(formatMatch),
    ...engine.drainIgnored().map(formatIgnored),
    ...engine.drainErrors().map(formatError),
  ];

  const unresolved = rows.some((row) => row.pcode === undefined);
  return {
    rows,
    diagnostics,
    exitCode: unresolved ? EXIT_CODES.UNRESOLVED : EXIT_CODES.SUCCESS,
  };
}

/**
 * Render a run for the terminal
 */
export function renderResolve(run: ResolveRun, format: OutputFormat): string {
  if (format === 'json') {
    return formatJson({ results: run.rows, diagnostics: run.diagnostics });
  }

  const table = formatTable(run.rows, COLUMNS);
  return run.diagnostics.length > 0 ? `${table}\n\n${run.diagnostics.join('\n')}` : table;
}

function parseFormat(format: string | undefined): OutputFormat | undefined {
  if (format === undefined) return undefined;
  if (format === 'table' || format === 'json') return format;
  throw new PcodeSetupError(`Invalid format: ${format}. Must be one of: table, json`, 'config');
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Register the resolve command
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve admin names or p-codes to registered p-codes')
    .argument('<iso3>', 'Country ISO3 code')
    .argument('<inputs...>', 'Names or p-codes to resolve')
    .option('--config <path>', 'Admin configuration file (YAML)')
    .option('--formats <path>', 'P-code length table (CSV)')
    .option('--level <n>', 'Admin level of the registry', (value: string) => parseInt(value, 10))
    .option('--fuzzy', 'Try approximate name matching')
    .option('--no-fuzzy', 'Exact matching only')
    .option('--context <name>', 'Context recorded with diagnostics')
    .option('--parent <pcode>', 'Restrict name matching to children of a parent p-code')
    .option('--format <fmt>', 'Output format: table|json')
    .action(async (iso3: string, inputs: string[], options: ResolveCliOptions, command: Command) => {
      process.exitCode = await executeResolve(iso3, inputs, options, command.optsWithGlobals<GlobalCliOptions>());
    });
}

async function executeResolve(
  iso3: string,
  inputs: readonly string[],
  options: ResolveCliOptions,
  globals: GlobalCliOptions
): Promise<ExitCode> {
  try {
    const config = await loadConfig({
      rcPath: globals.rc,
      overrides: {
        adminConfigPath: options.config,
        pcodeFormatsPath: options.formats,
        adminLevel: options.level,
        fuzzy: options.fuzzy,
        context: options.context,
        format: parseFormat(options.format),
        verbose: globals.verbose,
      },
    });

    if (config.adminConfigPath === null) {
      throw new PcodeSetupError('No admin configuration file (use --config or .pcoderc)', 'config');
    }

    const logger = new Logger({
      level: config.verbose ? 'debug' : 'info',
      pretty: config.format !== 'json',
      fields: { component: 'cli', context: config.context },
    });

    const run = runResolve(iso3, inputs, {
      adminConfigPath: config.adminConfigPath,
      pcodeFormatsPath: config.pcodeFormatsPath,
      adminLevel: config.adminLevel,
      fuzzy: config.fuzzy,
      context: config.context,
      parent: options.parent,
      logger,
    });

    console.log(renderResolve(run, config.format));
    return run.exitCode;
  } catch (error) {
    if (error instanceof PcodeSetupError) {
      console.error(error.getSummary());
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }
}
