/**
 * Fuzzy Admin Name Matcher
 *
 * Resolves a name that has no exact normalized match through an ordered
 * pipeline, stopping at the first stage that yields a p-code:
 *
 * 1. Exact lookup of the normalized name and of its replacement form
 * 2. Deny-list (names that must never be approximated)
 * 3. Substring: first registered name containing the input
 * 4. Phonetic: smallest refined soundex distance, within the threshold
 *
 * TIE-BREAKING: Candidates are scanned in registration order and the first
 * candidate reaching the minimum wins.
 */

import type { AdminLevelConfig, NameTransformRule } from '../core/config.js';
import type { PcodeRegistry } from '../core/registry/pcode-registry.js';
import type { MatchMethod, ResolveResult } from '../core/types.js';
import type { DiagnosticsLog } from '../resolution/diagnostics.js';
import { applyReplacements, normalizeName } from './name-normalizer.js';
import { phoneticDistance } from './refined-soundex.js';

/**
 * Candidate name rewrite; undefined means "not applicable to this name"
 */
export type NameTransform = (name: string) => string | undefined;

/**
 * Build a transform from a prefix rewrite rule
 */
export function prefixTransform(rule: NameTransformRule): NameTransform {
  return (name) =>
    name.startsWith(rule.prefix) ? `${rule.replacement}${name.slice(rule.prefix.length)}` : undefined;
}

/**
 * Phonetic match options
 */
export interface PhoneticMatchOptions {
  readonly alternativeName?: string;
  readonly transforms?: readonly NameTransform[];
  readonly threshold: number;
}

/**
 * Index of the phonetically closest possible name
 *
 * Each possible name is compared untransformed, then through each transform.
 * The minimum only moves on a strictly smaller distance.
 *
 * @returns Index into possibleNames, or undefined if nothing is within the threshold
 */
export function matchPhonetically(
  possibleNames: readonly string[],
  name: string,
  options: PhoneticMatchOptions
): number | undefined {
  const transforms: NameTransform[] = [(possibleName) => possibleName, ...(options.transforms ?? [])];
  const namesToMatch = options.alternativeName ? [name, options.alternativeName] : [name];

  let minDistance: number | undefined;
  let matchingIndex: number | undefined;

  possibleNames.forEach((possibleName, index) => {
    for (const transform of transforms) {
      const transformed = transform(possibleName);
      if (!transformed) continue;

      for (const nameToMatch of namesToMatch) {
        const distance = phoneticDistance(nameToMatch, transformed);
        if (distance === undefined) continue;
        if (minDistance === undefined || distance < minDistance) {
          minDistance = distance;
          matchingIndex = index;
        }
      }
    }
  });

  if (minDistance === undefined || minDistance > options.threshold) {
    return undefined;
  }
  return matchingIndex;
}

/**
 * First candidate containing the needle; empty needles never match
 */
function findSubstring(names: ReadonlyMap<string, string>, needle: string): string | undefined {
  if (needle === '') return undefined;
  for (const [mapName, pcode] of names) {
    if (mapName.includes(needle)) return pcode;
  }
  return undefined;
}

export interface FuzzyMatchRequest {
  readonly countryIso3: string;
  readonly name: string;
  /** Candidate names; defaults to every registered name of the country */
  readonly candidates?: ReadonlyMap<string, string>;
  readonly context?: string;
}

export class FuzzyNameMatcher {
  private readonly transforms: readonly NameTransform[];

  constructor(
    private readonly registry: PcodeRegistry,
    private readonly config: AdminLevelConfig,
    private readonly diagnostics: DiagnosticsLog
  ) {
    this.transforms = config.nameTransforms.map(prefixTransform);
  }

  /**
   * Run the fuzzy pipeline for one name
   *
   * @returns Matched p-code and whether the hit was exact; pcode undefined on no match
   */
  match(request: FuzzyMatchRequest): ResolveResult {
    const { countryIso3, name, context } = request;
    const { countriesFuzzyTry } = this.config;

    if (countriesFuzzyTry !== undefined && !countriesFuzzyTry.includes(countryIso3)) {
      if (context !== undefined) this.diagnostics.recordIgnored({ context, countryIso3 });
      return { pcode: undefined, exact: false };
    }

    const candidates = request.candidates ?? this.registry.namesFor(countryIso3);
    if (!candidates || candidates.size === 0) {
      if (context !== undefined) this.diagnostics.recordError({ context, countryIso3, input: name });
      return { pcode: undefined, exact: false };
    }

    const primary = normalizeName(name);
    const secondary = applyReplacements(primary, this.config.adminNameReplacements);

    const exactPcode = candidates.get(primary) ?? candidates.get(secondary);
    if (exactPcode !== undefined) {
      this.record(context, countryIso3, name, exactPcode, 'normalized', true);
      return { pcode: exactPcode, exact: true };
    }

    if (this.config.adminFuzzyDont.includes(name.toLowerCase())) {
      if (context !== undefined) this.diagnostics.recordIgnored({ context, countryIso3, input: name });
      return { pcode: undefined, exact: false };
    }

    const substringPcode = findSubstring(candidates, primary) ?? findSubstring(candidates, secondary);
    if (substringPcode !== undefined) {
      this.record(context, countryIso3, name, substringPcode, 'substring', false);
      return { pcode: substringPcode, exact: false };
    }

    const mapNames = [...candidates.keys()];
    const matchingIndex = matchPhonetically(mapNames, primary, {
      alternativeName: secondary,
      transforms: this.transforms,
      threshold: this.config.phoneticThreshold,
    });
    const mapName = matchingIndex === undefined ? undefined : mapNames[matchingIndex];
    const phoneticPcode = mapName === undefined ? undefined : candidates.get(mapName);

    if (phoneticPcode === undefined) {
      if (context !== undefined) this.diagnostics.recordError({ context, countryIso3, input: name });
      return { pcode: undefined, exact: false };
    }

    this.record(context, countryIso3, name, phoneticPcode, 'fuzzy', false);
    return { pcode: phoneticPcode, exact: false };
  }

  private record(
    context: string | undefined,
    countryIso3: string,
    input: string,
    pcode: string,
    method: MatchMethod,
    exact: boolean
  ): void {
    if (context === undefined) return;
    this.diagnostics.recordMatch({
      context,
      countryIso3,
      input,
      pcode,
      name: this.registry.lookupExact(pcode) ?? pcode,
      method,
      exact,
    });
  }
}
