/**
 * Logger Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '../../../core/utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:00.000Z'));
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('writes pretty lines with bound fields', () => {
    const logger = new Logger({ level: 'info', pretty: true }).child({ component: 'admin-level', adminLevel: 2 });

    logger.info('Registered admin info', { total: 9 });

    expect(vi.mocked(console.info)).toHaveBeenCalledWith(
      '[2024-05-01T10:00:00.000Z] INFO: Registered admin info (component=admin-level adminLevel=2 total=9)'
    );
  });

  it('omits the field list when there are no fields', () => {
    new Logger({ level: 'error', pretty: true }).error('No admin info');

    expect(vi.mocked(console.error)).toHaveBeenCalledWith('[2024-05-01T10:00:00.000Z] ERROR: No admin info');
  });

  it('writes JSON lines without undefined fields', () => {
    const logger = new Logger({ level: 'debug', pretty: false, fields: { component: 'cli', context: undefined } });

    logger.debug('Loaded p-code formats', { countries: 6 });

    expect(vi.mocked(console.debug)).toHaveBeenCalledWith(
      JSON.stringify({
        timestamp: '2024-05-01T10:00:00.000Z',
        level: 'debug',
        message: 'Loaded p-code formats',
        component: 'cli',
        countries: 6,
      })
    );
  });

  it('drops entries below its level', () => {
    const logger = new Logger({ level: 'error', pretty: true });

    logger.debug('hidden');
    logger.info('hidden');

    expect(vi.mocked(console.debug)).not.toHaveBeenCalled();
    expect(vi.mocked(console.info)).not.toHaveBeenCalled();
  });

  it('lets entry fields override bound ones', () => {
    const logger = new Logger({ level: 'info', pretty: true, fields: { context: 'cli' } });

    logger.info('Resolved', { context: 'nightly' });

    expect(vi.mocked(console.info)).toHaveBeenCalledWith('[2024-05-01T10:00:00.000Z] INFO: Resolved (context=nightly)');
  });
});
