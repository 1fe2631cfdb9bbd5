/**
 * Admin Level Resolver
 *
 * One engine per admin level. Owns the registry of that level, the optional
 * p-code grammar, the optional parent-level p-code sets and the diagnostics
 * log, and resolves free-form names or p-codes to registered p-codes.
 *
 * RESOLUTION ORDER:
 * 1. Literal name mapping (configured overrides)
 * 2. Unknown country → error, no match
 * 3. Registered p-code of the country, as written
 * 4. P-code shaped input → verbatim or repaired p-code (never falls through)
 * 5. Exact normalized name
 * 6. Fuzzy pipeline (substring, phonetic) when enabled
 *
 * USAGE:
 * ```typescript
 * const admin1 = new AdminLevel({ countriesFuzzyTry: ['YEM'] });
 * admin1.setupFromAdminInfo(rows);
 * admin1.resolve('YEM', 'Al Dali', { context: 'ingest' });
 * // { pcode: 'YE30', exact: false }
 * ```
 */

import { type AdminLevelConfig, mergeAdminLevelConfig } from '../core/config.js';
import { PcodeSetupError } from '../core/errors.js';
import { type CountryCodeLookup, loadCountryCodeTable } from '../core/registry/iso-3166-countries.js';
import { PcodeRegistry, type RegisterRowsOptions } from '../core/registry/pcode-registry.js';
import type { ErrorRecord, IgnoreRecord, MatchRecord, ResolveOptions, ResolveResult } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { LengthRepairEngine } from '../grammar/length-repair.js';
import { PCODE_SHAPE, PcodeGrammarTable, parsePcodeLengthsCsv } from '../grammar/pcode-grammar.js';
import { FuzzyNameMatcher } from '../matching/fuzzy-matcher.js';
import { normalizeName } from '../matching/name-normalizer.js';
import { DiagnosticsLog, formatError, formatIgnored, formatMatch } from './diagnostics.js';

// ============================================================================
// Options
// ============================================================================

export interface AdminLevelOptions {
  /** Admin level of the registered p-codes (default: 1) */
  readonly adminLevel?: number;
  /** Per-country admin level, for countries whose data sits at another level */
  readonly adminLevelOverrides?: Readonly<Record<string, number>>;
  /** Country code lookup (default: a table loaded from the bundled ISO 3166-1 data) */
  readonly countries?: CountryCodeLookup;
  readonly logger?: Logger;
}

export interface FuzzyPcodeOptions {
  readonly context?: string;
  /** Restrict candidates to children of this parent p-code */
  readonly parent?: string;
}

// ============================================================================
// Engine
// ============================================================================

export class AdminLevel {
  readonly adminLevel: number;
  readonly config: AdminLevelConfig;

  private readonly adminLevelOverrides: ReadonlyMap<string, number>;
  private readonly nameMappings: ReadonlyMap<string, string>;
  private readonly registry = new PcodeRegistry();
  private readonly diagnostics = new DiagnosticsLog();
  private readonly repairEngine: LengthRepairEngine;
  private readonly matcher: FuzzyNameMatcher;
  private readonly logger: Logger;
  private grammar: PcodeGrammarTable | undefined;

  constructor(config: Partial<AdminLevelConfig> = {}, options: AdminLevelOptions = {}) {
    this.config = mergeAdminLevelConfig(config);
    this.adminLevel = options.adminLevel ?? 1;
    this.adminLevelOverrides = new Map(
      Object.entries(options.adminLevelOverrides ?? {}).map(
        ([iso3, level]): [string, number] => [iso3.toUpperCase(), level]
      )
    );
    this.nameMappings = new Map(Object.entries(this.config.adminNameMappings));
    this.logger = (options.logger ?? createLogger()).child({
      component: 'admin-level',
      adminLevel: this.adminLevel,
    });

    this.repairEngine = new LengthRepairEngine({
      registry: this.registry,
      countries: options.countries ?? loadCountryCodeTable(),
      diagnostics: this.diagnostics,
      adminLevelFor: (countryIso3) => this.getAdminLevel(countryIso3),
    });
    this.matcher = new FuzzyNameMatcher(this.registry, this.config, this.diagnostics);
  }

  // ==========================================================================
  // Setup
  // ==========================================================================

  /**
   * Register admin info rows
   *
   * @returns Number of rows registered by this call
   * @throws PcodeSetupError if a row is malformed or the registry is still empty
   */
  setupFromAdminInfo(rows: readonly unknown[], options: RegisterRowsOptions = {}): number {
    const registered = this.registry.registerRows(rows, options);

    if (this.registry.size === 0) {
      throw new PcodeSetupError('No admin info rows registered', 'admin-info');
    }

    this.grammar?.deriveZeroPositions(this.registry);

    this.logger.debug('Registered admin info', {
      registered,
      total: this.registry.size,
    });
    return registered;
  }

  /**
   * Load p-code grammar rows and derive zero positions from the registry
   *
   * @throws PcodeSetupError if any row is malformed
   */
  loadPcodeFormats(rows: readonly unknown[]): void {
    const grammar = new PcodeGrammarTable(rows);
    grammar.deriveZeroPositions(this.registry);
    this.grammar = grammar;
    this.repairEngine.setGrammar(grammar);

    this.logger.debug('Loaded p-code formats', { countries: grammar.countries().length });
  }

  /**
   * @throws PcodeSetupError if the table is malformed
   */
  loadPcodeFormatsFromCsv(text: string): void {
    this.loadPcodeFormats(parsePcodeLengthsCsv(text));
  }

  /**
   * Valid p-codes per parent level, admin 1 first
   */
  setParentAdmins(parentAdmins: readonly Iterable<string>[]): void {
    this.repairEngine.setParentAdmins(parentAdmins.map((pcodes) => new Set(pcodes)));
  }

  /**
   * Take parent p-code sets from the engines of the levels above
   */
  setParentAdminsFromLevels(levels: readonly AdminLevel[]): void {
    this.setParentAdmins(levels.map((level) => level.getPcodeList()));
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  getPcodeList(): readonly string[] {
    return this.registry.pcodes();
  }

  getPcodeLength(countryIso3: string): number | undefined {
    return this.registry.pcodeLength(countryIso3.toUpperCase());
  }

  getAdminLevel(countryIso3: string): number {
    return this.adminLevelOverrides.get(countryIso3.toUpperCase()) ?? this.adminLevel;
  }

  /**
   * Registered display name of a p-code
   */
  getName(pcode: string): string | undefined {
    return this.registry.lookupExact(pcode);
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  /**
   * Repair a p-code whose country segment or zero padding differs from the
   * registered scheme
   *
   * @returns Registered p-code or undefined
   */
  convertAdminPcodeLength(countryIso3: string, pcode: string, context?: string): string | undefined {
    return this.repairEngine.repair(countryIso3.toUpperCase(), pcode, context);
  }

  /**
   * Run the fuzzy pipeline directly
   */
  fuzzyPcode(countryIso3: string, name: string, options: FuzzyPcodeOptions = {}): ResolveResult {
    const iso3 = countryIso3.toUpperCase();
    const candidates =
      options.parent === undefined ? undefined : this.registry.namesFor(iso3, options.parent);
    return this.matcher.match({ countryIso3: iso3, name, candidates, context: options.context });
  }

  /**
   * Resolve a name or p-code to a registered p-code
   */
  resolve(countryIso3: string, input: string, options: ResolveOptions = {}): ResolveResult {
    const iso3 = countryIso3.toUpperCase();
    const { fuzzy = true, context, parent } = options;

    const mapped = this.nameMappings.get(input);
    if (
      mapped !== undefined &&
      this.registry.countryOf(mapped) === iso3 &&
      (parent === undefined || this.registry.parentOf(mapped) === parent)
    ) {
      return { pcode: mapped, exact: true };
    }

    if (!this.registry.hasCountry(iso3)) {
      if (context !== undefined) this.diagnostics.recordError({ context, countryIso3: iso3 });
      return { pcode: undefined, exact: true };
    }

    if (this.registry.has(input) && this.registry.countryOf(input) === iso3) {
      return { pcode: input, exact: true };
    }

    if (PCODE_SHAPE.test(input)) {
      const pcode = input.toUpperCase();
      if (this.registry.has(pcode)) {
        return { pcode, exact: true };
      }
      return { pcode: this.repairEngine.repair(iso3, pcode, context), exact: true };
    }

    const byName = this.registry.namesFor(iso3, parent)?.get(normalizeName(input));
    if (byName !== undefined) {
      return { pcode: byName, exact: true };
    }

    if (!fuzzy) {
      return { pcode: undefined, exact: true };
    }

    return this.fuzzyPcode(iso3, input, { context, parent });
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  drainMatches(): MatchRecord[] {
    return this.diagnostics.drainMatches();
  }

  drainIgnored(): IgnoreRecord[] {
    return this.diagnostics.drainIgnored();
  }

  drainErrors(): ErrorRecord[] {
    return this.diagnostics.drainErrors();
  }

  resetDiagnostics(): void {
    this.diagnostics.reset();
  }

  /**
   * Formatted match lines, logged at info; the log is kept
   */
  outputMatches(): string[] {
    const lines = this.diagnostics.peekMatches().map(formatMatch);
    for (const line of lines) this.logger.info(line);
    return lines;
  }

  outputIgnored(): string[] {
    const lines = this.diagnostics.peekIgnored().map(formatIgnored);
    for (const line of lines) this.logger.info(line);
    return lines;
  }

  outputErrors(): string[] {
    const lines = this.diagnostics.peekErrors().map(formatError);
    for (const line of lines) this.logger.error(line);
    return lines;
  }

  /**
   * @example "FCT (Abuja): Federal Capital Territory (NG015)"
   */
  outputAdminNameMappings(): string[] {
    const lines = [...this.nameMappings].map(
      ([name, pcode]) => `${name}: ${this.registry.lookupExact(pcode) ?? '?'} (${pcode})`
    );
    for (const line of lines) this.logger.info(line);
    return lines;
  }

  /**
   * @example " oblast: "
   */
  outputAdminNameReplacements(): string[] {
    const lines = Object.entries(this.config.adminNameReplacements).map(
      ([text, replacement]) => `${text}: ${replacement}`
    );
    for (const line of lines) this.logger.info(line);
    return lines;
  }
}
