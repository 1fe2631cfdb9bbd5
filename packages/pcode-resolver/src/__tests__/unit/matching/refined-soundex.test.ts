/**
 * Refined Soundex Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  levenshteinDistance,
  phoneticDistance,
  refinedSoundex,
} from '../../../matching/refined-soundex.js';

describe('refinedSoundex', () => {
  it('keeps the first letter and encodes every letter', () => {
    expect(refinedSoundex('ad dali')).toBe('A06070');
    expect(refinedSoundex('al dali')).toBe('A076070');
    expect(refinedSoundex('al bayda')).toBe('A071060');
  });

  it('skips H and W and squeezes repeated codes', () => {
    expect(refinedSoundex('harare')).toBe('H09090');
    expect(refinedSoundex('bulawayo')).toBe('B1070');
    expect(refinedSoundex("al dhale'e")).toBe('A076070');
  });

  it('ignores case and diacritics', () => {
    expect(refinedSoundex('AD DALI')).toBe(refinedSoundex('ad dāli'));
  });

  it('has no code for a word without letters', () => {
    expect(refinedSoundex('')).toBe('');
    expect(refinedSoundex("'-' 42")).toBe('');
  });
});

describe('levenshteinDistance', () => {
  it('counts edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('A06070', 'A076070')).toBe(1);
  });

  it('handles empty strings', () => {
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('abc', '')).toBe(3);
  });

  it('is zero for equal strings', () => {
    expect(levenshteinDistance('abc', 'abc')).toBe(0);
  });
});

describe('phoneticDistance', () => {
  it('compares soundex codes', () => {
    expect(phoneticDistance('al dali', 'ad dali')).toBe(1);
    expect(phoneticDistance('al dali', 'al bayda')).toBe(2);
  });

  it('is undefined when either name has no code', () => {
    expect(phoneticDistance('abc', '123')).toBeUndefined();
    expect(phoneticDistance('', 'abc')).toBeUndefined();
  });
});
