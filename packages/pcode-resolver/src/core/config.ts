/**
 * Admin Level Resolver Configuration
 *
 * Per-engine matching policy: which countries may be fuzzy matched, literal
 * name overrides, textual replacements for the secondary name form, names
 * never to fuzzy match, and the phonetic acceptance threshold.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

/**
 * Prefix rewrite applied to candidate names before phonetic comparison
 *
 * @example { prefix: 'al ', replacement: 'ad ' } turns "al bayda" into "ad bayda"
 */
export interface NameTransformRule {
  readonly prefix: string;
  readonly replacement: string;
}

/**
 * Admin level resolver configuration
 */
export interface AdminLevelConfig {
  /** ISO3 codes eligible for fuzzy matching. Undefined means all countries. */
  readonly countriesFuzzyTry?: readonly string[];

  /** Literal name → p-code overrides, for names fuzzy matching gets wrong */
  readonly adminNameMappings: Readonly<Record<string, string>>;

  /** Textual replacements producing the secondary normalized form */
  readonly adminNameReplacements: Readonly<Record<string, string>>;

  /** Lowercased names that must never be fuzzy matched */
  readonly adminFuzzyDont: readonly string[];

  /** Candidate name rewrites tried in order during phonetic matching */
  readonly nameTransforms: readonly NameTransformRule[];

  /** Maximum refined soundex distance accepted as a phonetic match */
  readonly phoneticThreshold: number;
}

/**
 * Default candidate rewrites: Arabic article variants ("al" ↔ "ad", or dropped)
 */
export const DEFAULT_NAME_TRANSFORMS: readonly NameTransformRule[] = [
  { prefix: 'al ', replacement: 'ad ' },
  { prefix: 'al ', replacement: '' },
];

export const DEFAULT_PHONETIC_THRESHOLD = 2;

/**
 * Default admin level configuration
 */
export function getDefaultAdminLevelConfig(): AdminLevelConfig {
  return {
    countriesFuzzyTry: undefined,
    adminNameMappings: {},
    adminNameReplacements: {},
    adminFuzzyDont: [],
    nameTransforms: DEFAULT_NAME_TRANSFORMS,
    phoneticThreshold: DEFAULT_PHONETIC_THRESHOLD,
  };
}

/**
 * Merge partial configuration with defaults
 *
 * Each call returns fresh objects so engines never share mutable state.
 */
export function mergeAdminLevelConfig(
  partial: Partial<AdminLevelConfig> = {}
): AdminLevelConfig {
  const defaults = getDefaultAdminLevelConfig();

  return {
    countriesFuzzyTry: partial.countriesFuzzyTry
      ? partial.countriesFuzzyTry.map((iso3) => iso3.toUpperCase())
      : defaults.countriesFuzzyTry,
    adminNameMappings: { ...(partial.adminNameMappings ?? defaults.adminNameMappings) },
    adminNameReplacements: {
      ...(partial.adminNameReplacements ?? defaults.adminNameReplacements),
    },
    adminFuzzyDont: (partial.adminFuzzyDont ?? defaults.adminFuzzyDont).map((name) => name.toLowerCase()),
    nameTransforms: [...(partial.nameTransforms ?? defaults.nameTransforms)],
    phoneticThreshold: partial.phoneticThreshold ?? defaults.phoneticThreshold,
  };
}
