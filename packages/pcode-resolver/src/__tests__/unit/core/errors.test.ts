/**
 * Setup Error Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { PcodeSetupError, isPcodeSetupError } from '../../../core/errors.js';

describe('PcodeSetupError', () => {
  it('is an Error with a stage', () => {
    const error = new PcodeSetupError('No admin info rows registered', 'admin-info');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PcodeSetupError');
    expect(error.stage).toBe('admin-info');
    expect(error.issues).toEqual([]);
    expect(isPcodeSetupError(error)).toBe(true);
    expect(isPcodeSetupError(new Error('other'))).toBe(false);
  });

  it('converts zod issues to path messages', () => {
    const result = z.object({ iso3: z.string() }).safeParse({ iso3: 3 });
    expect(result.success).toBe(false);
    if (result.success) return;

    const error = PcodeSetupError.fromZodError('Bad rows', 'config', result.error);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.startsWith('iso3: ')).toBe(true);
  });

  it('labels root issues', () => {
    const result = z.array(z.string()).safeParse('not an array');
    if (result.success) throw new Error('expected failure');

    const error = PcodeSetupError.fromZodError('Bad rows', 'config', result.error);
    expect(error.issues[0]?.startsWith('(root): ')).toBe(true);
  });

  it('summarizes at most ten issues', () => {
    const issues = Array.from({ length: 12 }, (_, i) => `row ${i}`);
    const summary = new PcodeSetupError('Malformed table', 'pcode-formats', issues).getSummary();
    const lines = summary.split('\n');

    expect(lines[0]).toBe('Malformed table [pcode-formats]');
    expect(lines[1]).toBe('  - row 0');
    expect(lines).toHaveLength(12);
    expect(lines[11]).toBe('  ... and 2 more issues');
  });
});
