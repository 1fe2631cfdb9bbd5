/**
 * Normalize Command
 *
 * Print the lookup form of admin names, optionally with the replacement
 * form configured in an admin configuration file.
 *
 * Usage:
 *   pcode-resolver normalize <names...> [--config <path>] [--format table|json]
 */

import type { Command } from 'commander';
import { PcodeSetupError } from '../../core/errors.js';
import { loadAdminConfig } from '../../loaders/admin-config-loader.js';
import { applyReplacements, normalizeName } from '../../matching/name-normalizer.js';
import { EXIT_CODES } from '../lib/exit-codes.js';
import { formatOutput, type TableColumn } from '../lib/output.js';

interface NormalizeCliOptions {
  readonly config?: string;
  readonly format?: string;
}

export type NormalizedRow = {
  readonly input: string;
  readonly normalized: string;
  readonly replaced: string;
};

const COLUMNS: readonly TableColumn[] = [
  { key: 'input', header: 'Input' },
  { key: 'normalized', header: 'Normalized' },
  { key: 'replaced', header: 'Replaced' },
];

/**
 * Primary and replacement forms of each name
 */
export function normalizeNames(
  names: readonly string[],
  replacements: Readonly<Record<string, string>> = {}
): NormalizedRow[] {
  return names.map((input) => {
    const normalized = normalizeName(input);
    return { input, normalized, replaced: applyReplacements(normalized, replacements) };
  });
}

/**
 * Register the normalize command
 */
export function registerNormalizeCommand(program: Command): void {
  program
    .command('normalize')
    .description('Print normalized forms of admin names')
    .argument('<names...>', 'Names to normalize')
    .option('--config <path>', 'Admin configuration file supplying name replacements')
    .option('--format <fmt>', 'Output format: table|json', 'table')
    .action((names: string[], options: NormalizeCliOptions) => {
      try {
        const replacements = options.config
          ? loadAdminConfig(options.config).config.adminNameReplacements
          : undefined;
        const rows = normalizeNames(names, replacements);
        console.log(formatOutput(rows, options.format === 'json' ? 'json' : 'table', COLUMNS));
      } catch (error) {
        if (!(error instanceof PcodeSetupError)) throw error;
        console.error(error.getSummary());
        process.exitCode = EXIT_CODES.CONFIG_ERROR;
      }
    });
}
