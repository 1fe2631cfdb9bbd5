/**
 * P-code Grammar Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { PcodeSetupError } from '../../../core/errors.js';
import { createRegistry } from '../../../core/registry/pcode-registry.js';
import { PCODE_SHAPE, PcodeGrammarTable, parsePcodeLengthsCsv } from '../../../grammar/pcode-grammar.js';
import { parseAdminConfig } from '../../../loaders/admin-config-loader.js';
import { readFixture } from '../../utils/fixtures.js';

describe('PCODE_SHAPE', () => {
  it('accepts two or three letters followed by digits', () => {
    expect(PCODE_SHAPE.test('YE30')).toBe(true);
    expect(PCODE_SHAPE.test('ner004')).toBe(true);
  });

  it('rejects names and other layouts', () => {
    expect(PCODE_SHAPE.test('ABCDEFGH')).toBe(false);
    expect(PCODE_SHAPE.test('Y30')).toBe(false);
    expect(PCODE_SHAPE.test('YE30A')).toBe(false);
    expect(PCODE_SHAPE.test('YEMEN30')).toBe(false);
  });
});

describe('parsePcodeLengthsCsv', () => {
  it('reads segment lengths per country', () => {
    const rows = parsePcodeLengthsCsv(readFixture('pcode-lengths.csv'));

    expect(rows).toHaveLength(6);
    expect(rows[0]).toEqual({ iso3: 'YEM', segmentLengths: [2, 2, 2, 2] });
    expect(rows[1]).toEqual({ iso3: 'NGA', segmentLengths: [2, 3, 3] });
  });

  it('stops at an ambiguous length', () => {
    const rows = parsePcodeLengthsCsv(readFixture('pcode-lengths.csv'));

    expect(rows.find((row) => row.iso3 === 'AFG')).toEqual({ iso3: 'AFG', segmentLengths: [2, 2] });
  });

  it('requires the header', () => {
    expect(() => parsePcodeLengthsCsv('NGA,2,3,3\n')).toThrow(PcodeSetupError);
  });

  it('rejects a missing or non-numeric country length', () => {
    const text = 'Location,Country Length,Admin 1 Length\nNGA,x,3\nNER,,3\n';

    try {
      parsePcodeLengthsCsv(text);
      throw new Error('expected failure');
    } catch (error) {
      expect(error).toBeInstanceOf(PcodeSetupError);
      if (error instanceof PcodeSetupError) {
        expect(error.stage).toBe('pcode-formats');
        expect(error.issues).toEqual([
          'line 2 (NGA): country length "x" is not a number',
          'line 3 (NER): country length "" is not a number',
        ]);
      }
    }
  });
});

describe('PcodeGrammarTable', () => {
  it('rejects rows without a country length', () => {
    try {
      new PcodeGrammarTable([{ iso3: 'NGA', segmentLengths: [] }]);
      throw new Error('expected failure');
    } catch (error) {
      expect(error).toBeInstanceOf(PcodeSetupError);
      if (error instanceof PcodeSetupError) {
        expect(error.issues).toEqual(['0.segmentLengths: country length is required']);
      }
    }
  });

  it('derives zero positions at segment starts', () => {
    const { adminInfo } = parseAdminConfig(readFixture('adminlevel2.yaml'));
    const registry = createRegistry(adminInfo);
    const grammar = new PcodeGrammarTable(parsePcodeLengthsCsv(readFixture('pcode-lengths.csv')));

    grammar.deriveZeroPositions(registry);

    expect([...grammar.zeroPositions('NGA')].sort()).toEqual([2, 5]);
    expect([...grammar.zeroPositions('YEM')]).toEqual([4]);
    expect([...grammar.zeroPositions('COL')]).toEqual([2]);
    expect(grammar.zeroPositions('ZWE').size).toBe(0);
  });

  it('looks up formats by country', () => {
    const grammar = new PcodeGrammarTable([{ iso3: 'col', segmentLengths: [2, 2, 3] }]);

    expect(grammar.formatFor('COL')).toEqual([2, 2, 3]);
    expect(grammar.formatFor('NGA')).toBeUndefined();
    expect(grammar.countries()).toEqual(['COL']);
  });
});
