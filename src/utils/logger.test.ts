import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from './logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    logger.setVerbosity(1);
  });

  it('prints only errors at verbosity 0', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setVerbosity(0);

    logger.info('progress');
    logger.warn('careful');
    logger.error('boom', new Error('bad'));

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^\[.+\] ERROR: boom \{"error":\{"name":"Error","message":"bad"/);
  });

  it('prints debug lines only at verbosity 2', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.setVerbosity(1);
    logger.debug('hidden');
    logger.setVerbosity(2);
    logger.debug('shown', { step: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/\] DEBUG: shown \{"step":1\}$/);
  });
});
