#!/usr/bin/env tsx
/**
 * P-code Resolver CLI Entry Point
 *
 * @module pcode-resolver-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';

import { registerNormalizeCommand } from '../src/cli/commands/normalize.js';
import { registerResolveCommand } from '../src/cli/commands/resolve.js';
import { registerSoundexCommand } from '../src/cli/commands/soundex.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

export { EXIT_CODES };

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error) {
    console.error(`Cannot read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('pcode-resolver')
    .description('Resolve administrative names and p-codes to registered p-codes')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--rc <path>', 'Path to config file (default: .pcoderc)');

  registerResolveCommand(program);
  registerNormalizeCommand(program);
  registerSoundexCommand(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
