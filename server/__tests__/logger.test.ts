import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, isLogLevel, log, setLogLevel } from '../logger';

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope and level', () => {
    setLogLevel('debug');
    const logger = createLogger('Dispatch');

    logger.debug('looking up player');
    logger.info('ready');
    logger.warn('slow listener');

    expect(console.log).toHaveBeenNthCalledWith(1, '[Dispatch:debug] looking up player');
    expect(console.log).toHaveBeenNthCalledWith(2, '[Dispatch] ready');
    expect(console.warn).toHaveBeenCalledWith('[Dispatch:warn] slow listener');
  });

  it('drops messages below the threshold', () => {
    setLogLevel('warn');
    const logger = createLogger('Dispatch');

    logger.debug('hidden');
    logger.info('hidden');

    expect(console.log).not.toHaveBeenCalled();
  });

  it('always logs errors', () => {
    setLogLevel('error');
    const logger = createLogger('Dispatch');
    const failure = new Error('boom');

    logger.error('lookup failed', failure);
    logger.error('no cause');

    expect(console.error).toHaveBeenNthCalledWith(1, '[Dispatch:error] lookup failed', failure);
    expect(console.error).toHaveBeenNthCalledWith(2, '[Dispatch:error] no cause', '');
  });

  it('stamps lifecycle lines with a time and source', () => {
    log('serving HTTP on 0.0.0.0:8095', 'gateway');

    expect(console.log).toHaveBeenCalledWith(
      expect.stringMatching(/^\d{1,2}:\d{2}:\d{2}\s[AP]M \[gateway\] serving HTTP on 0\.0\.0\.0:8095$/)
    );
  });

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
