/**
 * P-code Resolver
 *
 * Resolves administrative area names and p-codes of varying format to
 * registered p-codes, one engine per admin level.
 */

// Engine
export { AdminLevel } from './resolution/admin-level.js';
export type { AdminLevelOptions, FuzzyPcodeOptions } from './resolution/admin-level.js';

// Configuration
export {
  DEFAULT_NAME_TRANSFORMS,
  DEFAULT_PHONETIC_THRESHOLD,
  getDefaultAdminLevelConfig,
  mergeAdminLevelConfig,
} from './core/config.js';
export type { AdminLevelConfig, NameTransformRule } from './core/config.js';
export { loadAdminConfig, loadPcodeLengths, parseAdminConfig } from './loaders/admin-config-loader.js';
export type { LoadedAdminConfig } from './loaders/admin-config-loader.js';

// Types
export type {
  AdminInfoRow,
  ErrorRecord,
  IgnoreRecord,
  MatchMethod,
  MatchRecord,
  PcodeFormatRow,
  ResolveOptions,
  ResolveResult,
} from './core/types.js';

// Errors
export { PcodeSetupError, isPcodeSetupError } from './core/errors.js';
export type { SetupStage } from './core/errors.js';

// Building blocks
export { PcodeRegistry, createRegistry } from './core/registry/pcode-registry.js';
export { CountryCodeTable, loadCountryCodeTable } from './core/registry/iso-3166-countries.js';
export type { CountryCodeLookup, CountryEntry } from './core/registry/iso-3166-countries.js';
export { PCODE_SHAPE, PcodeGrammarTable, parsePcodeLengthsCsv } from './grammar/pcode-grammar.js';
export { LengthRepairEngine } from './grammar/length-repair.js';
export { FuzzyNameMatcher, matchPhonetically, prefixTransform } from './matching/fuzzy-matcher.js';
export type { NameTransform } from './matching/fuzzy-matcher.js';
export { applyReplacements, normalizeName } from './matching/name-normalizer.js';
export { levenshteinDistance, phoneticDistance, refinedSoundex } from './matching/refined-soundex.js';
export { DiagnosticsLog, formatError, formatIgnored, formatMatch } from './resolution/diagnostics.js';

// Logging
export { Logger, createLogger } from './core/utils/logger.js';
export type { LogFields, LogLevel, LoggerOptions } from './core/utils/logger.js';
