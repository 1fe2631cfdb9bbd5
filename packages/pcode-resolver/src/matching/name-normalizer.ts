/**
 * Admin Name Normalizer
 *
 * Normalizes admin unit names so that spellings from different sources
 * compare equal: "Ad Ḍāliʿ", "AD DALI" and "ad  dali" all become "ad dali".
 *
 * PHILOSOPHY:
 * - Deterministic normalization (same input → same output)
 * - Idempotent: normalizeName(normalizeName(s)) === normalizeName(s)
 * - No locale dependence beyond Unicode canonical decomposition
 */

/** Combining marks left behind by NFD decomposition */
const COMBINING_MARKS = /\p{M}/gu;

/** Anything outside printable ASCII, except the whitespace controls */
const NON_ASCII = /[^\x20-\x7E\t\n\v\f\r]/g;

/** Whitespace, control separators and forward slash collapse to one space */
const SEPARATOR_RUNS = /[\t\n\v\f\r /]+/g;

/**
 * Normalize an admin name for lookup
 *
 * Characters with no ASCII decomposition (Arabic script, "ß", ...) are dropped,
 * not substituted.
 */
export function normalizeName(name: string): string {
  return name
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(NON_ASCII, '')
    .toLowerCase()
    .replace(SEPARATOR_RUNS, ' ')
    .trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Apply textual replacements simultaneously
 *
 * Keys are tried longest first at every position, and replaced text is
 * never rescanned.
 *
 * @example applyReplacements('chernihiv oblast', { ' oblast': '' }) === 'chernihiv'
 */
export function applyReplacements(
  text: string,
  replacements: Readonly<Record<string, string>>
): string {
  const keys = Object.keys(replacements).filter((key) => key.length > 0);
  if (keys.length === 0) {
    return text;
  }

  const pattern = new RegExp(
    [...keys].sort((a, b) => b.length - a.length).map(escapeRegExp).join('|'),
    'gs'
  );

  return text.replace(pattern, (found) => replacements[found] ?? found);
}
