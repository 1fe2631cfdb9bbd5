/**
 * ISO 3166-1 Country Code Table
 *
 * Converts between alpha-2 and alpha-3 country codes, which is all the
 * p-code engine needs to swap a p-code's country segment ("YEM30" → "YE30").
 *
 * DATA SOURCE:
 * - ISO 3166-1 alpha-2 / alpha-3 codes for the 193 UN member states plus
 *   the 2 observer states, bundled in `src/data/iso-3166-countries.json`
 *
 * USAGE:
 * ```typescript
 * const countries = loadCountryCodeTable();
 * countries.iso2FromIso3('NGA'); // 'NG'
 * countries.iso3FromIso2('ne');  // 'NER'
 * ```
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PcodeSetupError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Country code lookup consumed by the length repair engine
 */
export interface CountryCodeLookup {
  iso2FromIso3(iso3: string): string | undefined;
  iso3FromIso2(iso2: string): string | undefined;
}

const CountryEntrySchema = z.object({
  iso2: z.string().regex(/^[A-Z]{2}$/),
  iso3: z.string().regex(/^[A-Z]{3}$/),
  numeric: z.string().regex(/^\d{3}$/),
  name: z.string().min(1),
});

/**
 * Country table entry
 */
export type CountryEntry = z.infer<typeof CountryEntrySchema>;

// ============================================================================
// Table
// ============================================================================

/**
 * In-memory alpha-2 ↔ alpha-3 table
 */
export class CountryCodeTable implements CountryCodeLookup {
  private readonly byIso2 = new Map<string, CountryEntry>();
  private readonly byIso3 = new Map<string, CountryEntry>();

  constructor(entries: readonly CountryEntry[]) {
    for (const entry of entries) {
      this.byIso2.set(entry.iso2, entry);
      this.byIso3.set(entry.iso3, entry);
    }
  }

  iso2FromIso3(iso3: string): string | undefined {
    return this.byIso3.get(iso3.toUpperCase())?.iso2;
  }

  iso3FromIso2(iso2: string): string | undefined {
    return this.byIso2.get(iso2.toUpperCase())?.iso3;
  }

  get size(): number {
    return this.byIso3.size;
  }
}

/**
 * Load the bundled ISO 3166-1 table
 *
 * Each call builds a fresh table; callers own its lifetime.
 */
export function loadCountryCodeTable(
  dataUrl: URL = new URL('../../data/iso-3166-countries.json', import.meta.url)
): CountryCodeTable {
  const raw: unknown = JSON.parse(readFileSync(dataUrl, 'utf-8'));
  const parsed = z.array(CountryEntrySchema).safeParse(raw);

  if (!parsed.success) {
    throw PcodeSetupError.fromZodError('Invalid country code table', 'config', parsed.error);
  }

  return new CountryCodeTable(parsed.data);
}
