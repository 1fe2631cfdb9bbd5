/**
 * Refined Soundex
 *
 * Phonetic codes for transliterated place names. Two names that sound alike
 * ("al dhale'e", "ad dali") get codes a small edit distance apart.
 *
 * CODE: first letter, then one digit per letter with runs of the same digit
 * squeezed. H and W carry no sound and are skipped.
 *
 *   A E I O U Y → 0    B P → 1      F V → 2    C K S → 3
 *   G J → 4            Q X Z → 5    D T → 6    L → 7
 *   M N → 8            R → 9
 */

const LETTER_CODES: Readonly<Record<string, string>> = {
  A: '0', E: '0', I: '0', O: '0', U: '0', Y: '0',
  B: '1', P: '1',
  F: '2', V: '2',
  C: '3', K: '3', S: '3',
  G: '4', J: '4',
  Q: '5', X: '5', Z: '5',
  D: '6', T: '6',
  L: '7',
  M: '8', N: '8',
  R: '9',
};

/**
 * Refined soundex code of a word
 *
 * @returns Code, or an empty string when the word has no Latin letters
 */
export function refinedSoundex(word: string): string {
  const letters = word
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toUpperCase()
    .replace(/[^A-Z]/g, '');

  const firstLetter = letters.charAt(0);
  if (firstLetter === '') return '';

  let tail = '';
  for (const letter of letters) {
    const code = LETTER_CODES[letter];
    if (code === undefined) continue;
    if (tail.endsWith(code)) continue;
    tail += code;
  }

  return firstLetter + tail;
}

/**
 * Calculate Levenshtein edit distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous: number[] = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current: number[] = [i];
    for (let j = 1; j <= a.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current.push(Math.min(substitution, insertion, deletion));
    }
    previous = current;
  }

  return previous[a.length] ?? 0;
}

/**
 * Edit distance between the refined soundex codes of two names
 *
 * @returns Distance, or undefined if either name has no phonetic code
 */
export function phoneticDistance(a: string, b: string): number | undefined {
  const codeA = refinedSoundex(a);
  const codeB = refinedSoundex(b);
  if (codeA === '' || codeB === '') return undefined;
  return levenshteinDistance(codeA, codeB);
}
