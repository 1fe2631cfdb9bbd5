/**
 * P-code Registry
 *
 * Owns the controlled gazetteer for one admin level: every registered p-code,
 * its display name, owning country and (optionally) parent p-code, plus the
 * per-country normalized-name index used by name matching.
 *
 * ORDERING: Codes and names keep registration order. Substring and phonetic
 * matching take the first qualifying candidate, so iteration order is part
 * of the resolution result.
 */

import { z } from 'zod';
import type { AdminInfoRow } from '../types.js';
import { PcodeSetupError } from '../errors.js';
import { normalizeName } from '../../matching/name-normalizer.js';

// ============================================================================
// Row Validation
// ============================================================================

export const AdminInfoRowSchema = z.object({
  iso3: z.string().trim().regex(/^[A-Za-z]{3}$/, 'iso3 must be 3 letters'),
  pcode: z.string().trim().min(1, 'pcode must not be empty'),
  name: z.string().min(1, 'name must not be empty'),
  parent: z.string().trim().min(1).optional(),
});

/**
 * Options for bulk registration
 */
export interface RegisterRowsOptions {
  /** Only register rows for these countries (case insensitive) */
  readonly countryIso3s?: readonly string[];
}

interface NameEntry {
  readonly normalizedName: string;
  readonly pcode: string;
}

// ============================================================================
// Registry
// ============================================================================

export class PcodeRegistry {
  private readonly codes = new Set<string>();
  private readonly pcodeToName = new Map<string, string>();
  private readonly pcodeToIso3 = new Map<string, string>();
  private readonly pcodeToParent = new Map<string, string>();
  private readonly pcodeLengths = new Map<string, number>();
  /** Every (normalized name, p-code) pair per country, duplicates included */
  private readonly nameEntries = new Map<string, NameEntry[]>();
  /** First-write-wins name index per country */
  private readonly nameToPcode = new Map<string, Map<string, string>>();

  /**
   * Register one p-code
   *
   * Registering a known p-code again replaces its display name and keeps
   * its position.
   */
  register(countryIso3: string, pcode: string, name: string, parent?: string): void {
    this.codes.add(pcode);
    this.pcodeToName.set(pcode, name);
    this.pcodeToIso3.set(pcode, countryIso3);
    this.pcodeLengths.set(countryIso3, pcode.length);
    if (parent !== undefined) {
      this.pcodeToParent.set(pcode, parent);
    }

    const normalizedName = normalizeName(name);
    let entries = this.nameEntries.get(countryIso3);
    if (!entries) {
      entries = [];
      this.nameEntries.set(countryIso3, entries);
    }
    entries.push({ normalizedName, pcode });

    let names = this.nameToPcode.get(countryIso3);
    if (!names) {
      names = new Map();
      this.nameToPcode.set(countryIso3, names);
    }
    if (!names.has(normalizedName)) {
      names.set(normalizedName, pcode);
    }
  }

  /**
   * Validate and register parsed rows
   *
   * @returns Number of rows registered
   * @throws PcodeSetupError if any row is malformed
   */
  registerRows(rows: readonly unknown[], options: RegisterRowsOptions = {}): number {
    const parsed = z.array(AdminInfoRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw PcodeSetupError.fromZodError('Malformed admin info rows', 'admin-info', parsed.error);
    }

    const allowed = options.countryIso3s
      ? new Set(options.countryIso3s.map((iso3) => iso3.toUpperCase()))
      : undefined;

    let registered = 0;
    for (const row of parsed.data) {
      const countryIso3 = row.iso3.toUpperCase();
      if (allowed && !allowed.has(countryIso3)) continue;
      this.register(countryIso3, row.pcode, row.name, row.parent);
      registered++;
    }
    return registered;
  }

  has(pcode: string): boolean {
    return this.codes.has(pcode);
  }

  lookupExact(pcode: string): string | undefined {
    return this.pcodeToName.get(pcode);
  }

  lookupByCountryName(countryIso3: string, normalizedName: string): string | undefined {
    return this.nameToPcode.get(countryIso3)?.get(normalizedName);
  }

  countryOf(pcode: string): string | undefined {
    return this.pcodeToIso3.get(pcode);
  }

  parentOf(pcode: string): string | undefined {
    return this.pcodeToParent.get(pcode);
  }

  hasCountry(countryIso3: string): boolean {
    return this.nameToPcode.has(countryIso3);
  }

  /**
   * Observed p-code length for a country (length of its last registered code)
   */
  pcodeLength(countryIso3: string): number | undefined {
    return this.pcodeLengths.get(countryIso3);
  }

  /**
   * Normalized name → p-code for a country, in registration order
   *
   * With `parent`, only children of that parent are included, and a name
   * shared by units under different parents resolves within the parent.
   */
  namesFor(countryIso3: string, parent?: string): ReadonlyMap<string, string> | undefined {
    if (parent === undefined) {
      return this.nameToPcode.get(countryIso3);
    }

    const entries = this.nameEntries.get(countryIso3);
    if (!entries) return undefined;

    const names = new Map<string, string>();
    for (const { normalizedName, pcode } of entries) {
      if (this.pcodeToParent.get(pcode) !== parent) continue;
      if (!names.has(normalizedName)) {
        names.set(normalizedName, pcode);
      }
    }
    return names;
  }

  /**
   * All registered p-codes in registration order
   */
  pcodes(): readonly string[] {
    return [...this.codes];
  }

  get size(): number {
    return this.codes.size;
  }
}

/**
 * Build a registry from rows in one step
 */
export function createRegistry(
  rows: readonly AdminInfoRow[],
  options: RegisterRowsOptions = {}
): PcodeRegistry {
  const registry = new PcodeRegistry();
  registry.registerRows(rows, options);
  return registry;
}
