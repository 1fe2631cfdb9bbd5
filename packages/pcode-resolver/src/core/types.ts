/**
 * Core P-code Types
 *
 * Shared types for registry rows, grammar rows, diagnostics records and
 * resolution results.
 *
 * TYPE SAFETY: All records are immutable once created.
 */

// ============================================================================
// Setup Input
// ============================================================================

/**
 * One parsed registry row
 *
 * @example { iso3: 'AFG', pcode: 'AF01', name: 'Kabul' }
 */
export interface AdminInfoRow {
  readonly iso3: string;
  readonly pcode: string;
  readonly name: string;
  /** P-code of the enclosing unit one admin level up */
  readonly parent?: string;
}

/**
 * Per-country p-code grammar row
 *
 * `segmentLengths[0]` is the country segment length, then one entry per
 * admin level. e.g. NGA `[2, 3, 3]` describes `NG015001`.
 */
export interface PcodeFormatRow {
  readonly iso3: string;
  readonly segmentLengths: readonly number[];
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * How a non-verbatim input was resolved
 */
export type MatchMethod =
  | 'pcode length conversion'
  | 'pcode length conversion-country'
  | `pcode length conversion-admins ${string}`
  | 'normalized'
  | 'substring'
  | 'fuzzy';

/**
 * Successful non-verbatim resolution
 */
export interface MatchRecord {
  readonly context: string;
  readonly countryIso3: string;
  readonly input: string;
  readonly pcode: string;
  /** Registered display name of the matched p-code */
  readonly name: string;
  readonly method: MatchMethod;
  readonly exact: boolean;
}

/**
 * Input deliberately skipped by fuzzy-eligibility or deny-list policy.
 * `input` is absent when the whole country is excluded.
 */
export interface IgnoreRecord {
  readonly context: string;
  readonly countryIso3: string;
  readonly input?: string;
}

/**
 * Attempted resolution where no candidate qualified.
 * `input` is absent when the country has no registered names.
 */
export interface ErrorRecord {
  readonly context: string;
  readonly countryIso3: string;
  readonly input?: string;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Result of resolving one input
 *
 * `exact` is false only when approximate matching (substring or phonetic)
 * was attempted.
 */
export interface ResolveResult {
  readonly pcode: string | undefined;
  readonly exact: boolean;
}

/**
 * Per-call resolution options
 */
export interface ResolveOptions {
  /** Try approximate name matching (default: true) */
  readonly fuzzy?: boolean;
  /** Caller context recorded in diagnostics. Nothing is recorded without it. */
  readonly context?: string;
  /** Restrict name matching to children of this parent p-code */
  readonly parent?: string;
}
