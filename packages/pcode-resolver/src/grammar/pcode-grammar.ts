/**
 * P-code Grammar Table
 *
 * Per-country segment lengths `[country, admin1, admin2, ...]` and the zero
 * positions derived from registered p-codes.
 *
 * FORMAT (p-code length table, CSV):
 *   Location,Country Length,Admin 1 Length,Admin 2 Length,Admin 3 Length
 *   NGA,2,3,3,
 *   AFG,2,2,2|3,
 *
 * An empty admin length ends the row. A length containing `|` means the
 * country mixes lengths at that level, so the grammar stops before it.
 */

import { z } from 'zod';
import type { PcodeFormatRow } from '../core/types.js';
import { PcodeSetupError } from '../core/errors.js';
import type { PcodeRegistry } from '../core/registry/pcode-registry.js';

/** 2 to 3 letters followed by digits */
export const PCODE_SHAPE = /^([A-Za-z]{2,3})(\d+)$/;

export const PcodeFormatRowSchema = z.object({
  iso3: z.string().trim().regex(/^[A-Za-z]{3}$/, 'iso3 must be 3 letters'),
  segmentLengths: z
    .array(z.number().int().positive())
    .min(1, 'country length is required'),
});

const LENGTH_CELL = /^\d+$/;

/**
 * Parse a p-code length table
 *
 * @throws PcodeSetupError if the header or any country length is missing or invalid
 */
export function parsePcodeLengthsCsv(text: string): PcodeFormatRow[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const header = lines[0]?.split(',').map((cell) => cell.trim());
  if (!header || header[0] !== 'Location' || header[1] !== 'Country Length') {
    throw new PcodeSetupError('P-code length table has no Location/Country Length header', 'pcode-formats');
  }

  const adminColumns: number[] = [];
  header.forEach((cell, index) => {
    if (/^Admin \d+ Length$/.test(cell)) adminColumns.push(index);
  });

  const rows: PcodeFormatRow[] = [];
  const issues: string[] = [];

  lines.slice(1).forEach((line, index) => {
    const cells = line.split(',').map((cell) => cell.trim());
    const iso3 = cells[0] ?? '';
    const countryLength = cells[1] ?? '';

    if (!LENGTH_CELL.test(countryLength)) {
      issues.push(`line ${index + 2} (${iso3 || '?'}): country length "${countryLength}" is not a number`);
      return;
    }

    const segmentLengths = [parseInt(countryLength, 10)];
    for (const column of adminColumns) {
      const cell = cells[column] ?? '';
      if (cell === '' || cell.includes('|')) break;
      if (!LENGTH_CELL.test(cell)) {
        issues.push(`line ${index + 2} (${iso3}): admin length "${cell}" is not a number`);
        return;
      }
      segmentLengths.push(parseInt(cell, 10));
    }

    rows.push({ iso3: iso3.toUpperCase(), segmentLengths });
  });

  if (issues.length > 0) {
    throw new PcodeSetupError('Malformed p-code length table', 'pcode-formats', issues);
  }

  return rows;
}

/**
 * Grammar for every country with a known p-code format
 */
export class PcodeGrammarTable {
  private readonly formats = new Map<string, readonly number[]>();
  private readonly zeroes = new Map<string, Set<number>>();

  /**
   * @throws PcodeSetupError if any row is malformed
   */
  constructor(rows: readonly unknown[]) {
    const parsed = z.array(PcodeFormatRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw PcodeSetupError.fromZodError('Malformed p-code format rows', 'pcode-formats', parsed.error);
    }

    for (const row of parsed.data) {
      this.formats.set(row.iso3.toUpperCase(), row.segmentLengths);
    }
  }

  /**
   * Record segment-start offsets holding a zero in registered p-codes
   */
  deriveZeroPositions(registry: PcodeRegistry): void {
    this.zeroes.clear();

    for (const pcode of registry.pcodes()) {
      const countryIso3 = registry.countryOf(pcode);
      if (countryIso3 === undefined) continue;
      const format = this.formats.get(countryIso3);
      if (!format) continue;

      let positions = this.zeroes.get(countryIso3);
      if (!positions) {
        positions = new Set();
        this.zeroes.set(countryIso3, positions);
      }

      let offset = 0;
      for (const length of format) {
        if (offset >= pcode.length) break;
        if (pcode[offset] === '0') positions.add(offset);
        offset += length;
      }
    }
  }

  formatFor(countryIso3: string): readonly number[] | undefined {
    return this.formats.get(countryIso3);
  }

  zeroPositions(countryIso3: string): ReadonlySet<number> {
    return this.zeroes.get(countryIso3) ?? new Set();
  }

  countries(): readonly string[] {
    return [...this.formats.keys()];
  }
}
