/**
 * P-code Length Repair Engine
 *
 * Reshapes a p-code-looking input that is not registered verbatim into a
 * registered p-code, fixing two kinds of drift between data sources:
 * - country segment written as ISO3 instead of ISO2 (or the reverse)
 * - a zero added to or dropped from an admin segment
 *
 * With a grammar for the country, segments are repaired level by level,
 * optionally checked against parent-level p-codes. Without one, admin 1
 * p-codes fall back to a length-offset heuristic.
 *
 * LIMITATION: at most one zero is inserted or removed per admin level per
 * call. "NG151" does not become "NG015001".
 */

import type { PcodeRegistry } from '../core/registry/pcode-registry.js';
import type { CountryCodeLookup } from '../core/registry/iso-3166-countries.js';
import type { MatchMethod } from '../core/types.js';
import type { DiagnosticsLog } from '../resolution/diagnostics.js';
import { PCODE_SHAPE, type PcodeGrammarTable } from './pcode-grammar.js';

export interface LengthRepairDependencies {
  readonly registry: PcodeRegistry;
  readonly countries: CountryCodeLookup;
  readonly diagnostics: DiagnosticsLog;
  /** Admin level resolved for a country */
  readonly adminLevelFor: (countryIso3: string) => number;
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export class LengthRepairEngine {
  private grammar: PcodeGrammarTable | undefined;
  /** Valid p-codes per parent level, index 0 = admin 1 */
  private parentAdmins: readonly ReadonlySet<string>[] = [];

  constructor(private readonly deps: LengthRepairDependencies) {}

  setGrammar(grammar: PcodeGrammarTable | undefined): void {
    this.grammar = grammar;
  }

  setParentAdmins(parentAdmins: readonly ReadonlySet<string>[]): void {
    this.parentAdmins = parentAdmins;
  }

  hasGrammar(): boolean {
    return this.grammar !== undefined;
  }

  /**
   * Repair a p-code for a country
   *
   * @param pcode - Uppercased input that matches the p-code shape
   * @param context - Caller context for diagnostics (nothing recorded without it)
   * @returns Registered p-code or undefined
   */
  repair(countryIso3: string, pcode: string, context?: string): string | undefined {
    if (this.deps.registry.has(pcode)) {
      return pcode;
    }

    const match = PCODE_SHAPE.exec(pcode);
    if (!match) {
      return undefined;
    }

    const format = this.grammar?.formatFor(countryIso3);
    if (!format) {
      if (this.deps.adminLevelFor(countryIso3) === 1) {
        return this.repairAdmin1ByLength(countryIso3, pcode, context);
      }
      return undefined;
    }

    return this.repairByGrammar(countryIso3, pcode, match[1] ?? '', match[2] ?? '', format, context);
  }

  /**
   * Segment-by-segment repair driven by the country's grammar
   */
  private repairByGrammar(
    countryIso3: string,
    input: string,
    letters: string,
    digits: string,
    format: readonly number[],
    context: string | undefined
  ): string | undefined {
    const { registry, countries } = this.deps;
    const countryLength = format[0] ?? 0;

    let countrySegment: string | undefined = letters;
    if (letters.length > countryLength) {
      countrySegment = countries.iso2FromIso3(countryIso3);
    } else if (letters.length < countryLength) {
      countrySegment = countryIso3;
    }
    if (countrySegment === undefined) {
      return undefined;
    }

    const parts: string[] = [countrySegment, digits];
    let candidate = parts.join('');
    if (registry.has(candidate)) {
      this.recordMatch(context, countryIso3, input, candidate, 'pcode length conversion-country');
      return candidate;
    }

    const adminLevel = this.deps.adminLevelFor(countryIso3);
    if (format.length <= adminLevel) {
      return undefined;
    }

    const totalLength = sum(format.slice(0, adminLevel + 1));
    const zeroes = this.grammar?.zeroPositions(countryIso3) ?? new Set<number>();
    const adminChanges: number[] = [];

    for (let adminNo = 1; adminNo <= adminLevel; adminNo++) {
      if (candidate.length === totalLength) break;

      const adminLength = format[adminNo] ?? 0;
      const position = sum(format.slice(0, adminNo));
      const isLastLevel = adminNo === adminLevel;
      let part = parts[adminNo] ?? '';

      if (candidate.length < totalLength) {
        if (zeroes.has(position)) {
          const padded = `0${part}`;
          if (this.isPlausibleParent(parts, adminNo, adminLevel, padded.slice(0, adminLength))) {
            part = padded;
            adminChanges.push(adminNo);
          }
        }
      } else if (part.startsWith('0') && (isLastLevel || adminLength <= 2)) {
        const stripped = part.slice(1);
        if (this.isPlausibleParent(parts, adminNo, adminLevel, stripped.slice(0, adminLength))) {
          part = stripped;
          adminChanges.push(adminNo);
        }
      }

      if (isLastLevel) {
        parts[adminNo] = part;
      } else {
        parts[adminNo] = part.slice(0, adminLength);
        parts.push(part.slice(adminLength));
      }
      candidate = parts.join('');
    }

    if (registry.has(candidate)) {
      this.recordMatch(
        context,
        countryIso3,
        input,
        candidate,
        `pcode length conversion-admins ${adminChanges.join(',')}`
      );
      return candidate;
    }
    return undefined;
  }

  /**
   * Would the p-code prefix ending at this segment be a valid parent?
   *
   * Only levels below the current one are checked, and only when parent
   * p-codes were supplied.
   */
  private isPlausibleParent(
    parts: readonly string[],
    adminNo: number,
    adminLevel: number,
    segment: string
  ): boolean {
    if (adminNo >= adminLevel) return true;
    const validParents = this.parentAdmins[adminNo - 1];
    if (!validParents) return true;
    const prefix = parts.slice(0, adminNo).join('') + segment;
    return validParents.has(prefix);
  }

  /**
   * Admin 1 fallback from the country's observed p-code length
   *
   * Covers the common drift patterns between 4, 5 and 6 character p-codes:
   * ISO2 ↔ ISO3 country segment, with or without a padding zero.
   */
  private repairAdmin1ByLength(
    countryIso3: string,
    pcode: string,
    context: string | undefined
  ): string | undefined {
    const { registry, countries } = this.deps;
    const countryPcodeLength = registry.pcodeLength(countryIso3);
    const length = pcode.length;

    if (countryPcodeLength === undefined) return undefined;
    if (length === countryPcodeLength || length < 4 || length > 6) return undefined;

    let candidate: string | undefined;
    switch (countryPcodeLength) {
      case 4:
        candidate = withCountry(countries.iso2FromIso3(pcode.slice(0, 3)), pcode.slice(-2));
        break;
      case 5:
        candidate =
          length === 4
            ? `${pcode.slice(0, 2)}0${pcode.slice(-2)}`
            : withCountry(countries.iso2FromIso3(pcode.slice(0, 3)), pcode.slice(-3));
        break;
      case 6:
        candidate =
          length === 4
            ? withCountry(countries.iso3FromIso2(pcode.slice(0, 2)), `0${pcode.slice(-2)}`)
            : withCountry(countries.iso3FromIso2(pcode.slice(0, 2)), pcode.slice(-3));
        break;
      default:
        candidate = undefined;
    }

    if (candidate !== undefined && registry.has(candidate)) {
      this.recordMatch(context, countryIso3, pcode, candidate, 'pcode length conversion');
      return candidate;
    }
    return undefined;
  }

  private recordMatch(
    context: string | undefined,
    countryIso3: string,
    input: string,
    pcode: string,
    method: MatchMethod
  ): void {
    if (context === undefined) return;
    this.deps.diagnostics.recordMatch({
      context,
      countryIso3,
      input,
      pcode,
      name: this.deps.registry.lookupExact(pcode) ?? pcode,
      method,
      exact: true,
    });
  }
}

function withCountry(country: string | undefined, rest: string): string | undefined {
  return country === undefined ? undefined : `${country}${rest}`;
}
