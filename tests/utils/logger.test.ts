import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../../src/utils/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below its level and routes the rest by severity', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.debug('debug line');
    logger.info('info line');
    logger.warn('warn line');
    logger.error('error line', new Error('boom'));

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/ WARN  warn line$/);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][1])).toMatch(/^Error: boom/);
  });

  it('falls back to info for an unknown level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger('verbose');

    logger.debug('hidden');
    logger.info('shown');

    expect(log).toHaveBeenCalledTimes(1);
  });
});
