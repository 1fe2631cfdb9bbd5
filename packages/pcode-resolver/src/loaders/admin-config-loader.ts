/**
 * Admin Configuration Loader
 *
 * Reads an admin level configuration file (YAML) and p-code length tables
 * (CSV) from disk. Keys in the file are snake_case and map onto
 * AdminLevelConfig:
 *
 * ```yaml
 * admin_info:
 *   - { iso3: YEM, pcode: YE30, name: Ad Dali }
 * countries_fuzzy_try: [YEM]
 * admin_name_mappings: { "Dhale": YE30 }
 * admin_name_replacements: { " governorate": "" }
 * admin_fuzzy_dont: [nord]
 * name_transforms: [{ prefix: "al ", replacement: "ad " }]
 * phonetic_threshold: 2
 * admin_level_overrides: { YEM: 2 }
 * ```
 *
 * Every key is optional. Omitted matching keys keep the engine defaults.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { AdminLevelConfig } from '../core/config.js';
import { PcodeSetupError } from '../core/errors.js';
import { AdminInfoRowSchema } from '../core/registry/pcode-registry.js';
import type { AdminInfoRow, PcodeFormatRow } from '../core/types.js';
import { parsePcodeLengthsCsv } from '../grammar/pcode-grammar.js';

// ============================================================================
// Schema
// ============================================================================

const Iso3Schema = z
  .string()
  .regex(/^[A-Za-z]{3}$/, 'must be an ISO3 code')
  .transform((iso3) => iso3.toUpperCase());

const NameTransformSchema = z.object({
  prefix: z.string().min(1),
  replacement: z.string(),
});

export const AdminConfigFileSchema = z
  .object({
    admin_info: z.array(AdminInfoRowSchema).default([]),
    countries_fuzzy_try: z.array(Iso3Schema).optional(),
    admin_name_mappings: z.record(z.string()).optional(),
    admin_name_replacements: z.record(z.string()).optional(),
    admin_fuzzy_dont: z.array(z.string().transform((name) => name.toLowerCase())).optional(),
    name_transforms: z.array(NameTransformSchema).optional(),
    phonetic_threshold: z.number().int().nonnegative().optional(),
    admin_level_overrides: z.record(z.number().int().positive()).optional(),
  })
  .strict();

export type AdminConfigFile = z.infer<typeof AdminConfigFileSchema>;

/**
 * Loaded configuration, ready for an AdminLevel engine
 */
export interface LoadedAdminConfig {
  readonly config: Partial<AdminLevelConfig>;
  readonly adminInfo: readonly AdminInfoRow[];
  readonly adminLevelOverrides: Readonly<Record<string, number>>;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse configuration file content
 *
 * @throws PcodeSetupError if the YAML is invalid or a key has the wrong shape
 */
export function parseAdminConfig(text: string): LoadedAdminConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new PcodeSetupError('Admin configuration is not valid YAML', 'config', [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = AdminConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw PcodeSetupError.fromZodError('Invalid admin configuration', 'config', parsed.error);
  }

  const file = parsed.data;
  const config: Partial<AdminLevelConfig> = {
    ...(file.countries_fuzzy_try ? { countriesFuzzyTry: file.countries_fuzzy_try } : {}),
    ...(file.admin_name_mappings ? { adminNameMappings: file.admin_name_mappings } : {}),
    ...(file.admin_name_replacements ? { adminNameReplacements: file.admin_name_replacements } : {}),
    ...(file.admin_fuzzy_dont ? { adminFuzzyDont: file.admin_fuzzy_dont } : {}),
    ...(file.name_transforms ? { nameTransforms: file.name_transforms } : {}),
    ...(file.phonetic_threshold !== undefined ? { phoneticThreshold: file.phonetic_threshold } : {}),
  };

  const adminLevelOverrides: Record<string, number> = {};
  for (const [iso3, level] of Object.entries(file.admin_level_overrides ?? {})) {
    adminLevelOverrides[iso3.toUpperCase()] = level;
  }

  return {
    config,
    adminInfo: file.admin_info,
    adminLevelOverrides,
  };
}

// ============================================================================
// File Access
// ============================================================================

function readText(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new PcodeSetupError(`Cannot read ${filePath}`, 'config', [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

/**
 * Load an admin configuration file
 *
 * @throws PcodeSetupError if the file is missing or invalid
 */
export function loadAdminConfig(filePath: string): LoadedAdminConfig {
  return parseAdminConfig(readText(filePath));
}

/**
 * Load a p-code length table
 *
 * @throws PcodeSetupError if the file is missing or malformed
 */
export function loadPcodeLengths(filePath: string): PcodeFormatRow[] {
  return parsePcodeLengthsCsv(readText(filePath));
}
