/**
 * Soundex Command
 *
 * Print refined soundex codes of names, and with --compare the phonetic
 * distance of each name to a reference name.
 *
 * Usage:
 *   pcode-resolver soundex <names...> [--compare <name>] [--format table|json]
 */

import type { Command } from 'commander';
import { normalizeName } from '../../matching/name-normalizer.js';
import { phoneticDistance, refinedSoundex } from '../../matching/refined-soundex.js';
import { formatOutput, formatters, type TableColumn } from '../lib/output.js';

interface SoundexCliOptions {
  readonly compare?: string;
  readonly format?: string;
}

export type SoundexRow = {
  readonly input: string;
  readonly code: string;
  readonly distance: number | undefined;
};

/**
 * Codes of the normalized names, with the distance to `compare` when given
 */
export function soundexCodes(names: readonly string[], compare?: string): SoundexRow[] {
  const reference = compare === undefined ? undefined : normalizeName(compare);
  return names.map((input) => {
    const normalized = normalizeName(input);
    return {
      input,
      code: refinedSoundex(normalized),
      distance: reference === undefined ? undefined : phoneticDistance(normalized, reference),
    };
  });
}

/**
 * Register the soundex command
 */
export function registerSoundexCommand(program: Command): void {
  program
    .command('soundex')
    .description('Print refined soundex codes of names')
    .argument('<names...>', 'Names to encode')
    .option('--compare <name>', 'Print the phonetic distance of each name to this one')
    .option('--format <fmt>', 'Output format: table|json', 'table')
    .action((names: string[], options: SoundexCliOptions) => {
      const columns: TableColumn[] = [
        { key: 'input', header: 'Input' },
        { key: 'code', header: 'Code', formatter: formatters.optional },
      ];
      if (options.compare !== undefined) {
        columns.push({ key: 'distance', header: 'Distance', align: 'right', formatter: formatters.optional });
      }
      const rows = soundexCodes(names, options.compare);
      console.log(formatOutput(rows, options.format === 'json' ? 'json' : 'table', columns));
    });
}
