/**
 * CLI Configuration Unit Tests
 *
 * Each test writes its rc file into a fresh temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../../cli/lib/config.js';
import { PcodeSetupError } from '../../../core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pcode-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads .pcoderc and resolves paths against its directory', async () => {
    writeFileSync(
      join(dir, '.pcoderc'),
      ['admin_config: data/admin1.yaml', 'pcode_formats: data/lengths.csv', 'admin_level: 2', 'fuzzy: false'].join('\n')
    );

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.rcPath).toBe(join(dir, '.pcoderc'));
    expect(config.adminConfigPath).toBe(join(dir, 'data', 'admin1.yaml'));
    expect(config.pcodeFormatsPath).toBe(join(dir, 'data', 'lengths.csv'));
    expect(config.adminLevel).toBe(2);
    expect(config.fuzzy).toBe(false);
    expect(config.context).toBe('cli');
    expect(config.format).toBe('table');
  });

  it('finds the rc file in a parent directory', async () => {
    writeFileSync(join(dir, '.pcoderc.json'), JSON.stringify({ context: 'nightly' }));
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.rcPath).toBe(join(dir, '.pcoderc.json'));
    expect(config.context).toBe('nightly');
  });

  it('lets environment variables override the rc file', async () => {
    writeFileSync(join(dir, '.pcoderc'), ['admin_level: 2', 'format: table'].join('\n'));

    const config = await loadConfig({
      cwd: dir,
      env: { PCODE_ADMIN_LEVEL: '3', PCODE_FORMAT: 'json', PCODE_FUZZY: '0', PCODE_CONTEXT: 'env' },
    });

    expect(config.adminLevel).toBe(3);
    expect(config.format).toBe('json');
    expect(config.fuzzy).toBe(false);
    expect(config.context).toBe('env');
  });

  it('lets flags override the environment', async () => {
    writeFileSync(join(dir, '.pcoderc'), 'admin_level: 2\n');

    const config = await loadConfig({
      cwd: dir,
      env: { PCODE_ADMIN_LEVEL: '3', PCODE_ADMIN_CONFIG: 'env.yaml' },
      overrides: { adminLevel: 1, adminConfigPath: 'flag.yaml' },
    });

    expect(config.adminLevel).toBe(1);
    expect(config.adminConfigPath).toBe(join(dir, 'flag.yaml'));
  });

  it('reads an explicit rc path', async () => {
    const rcPath = join(dir, 'custom.yaml');
    writeFileSync(rcPath, 'verbose: true\n');

    const config = await loadConfig({ rcPath, cwd: dir, env: {} });

    expect(config.rcPath).toBe(rcPath);
    expect(config.verbose).toBe(true);
  });

  it('rejects a missing explicit rc path', async () => {
    await expect(loadConfig({ rcPath: join(dir, 'missing.yaml'), env: {} })).rejects.toThrow(PcodeSetupError);
  });

  it('rejects unknown rc keys', async () => {
    writeFileSync(join(dir, '.pcoderc'), 'timeout: 30\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(PcodeSetupError);
  });
});
