import { describe, it, expect, afterEach, vi } from 'vitest';
import { createConsoleLogger, isLogLevel } from './logger';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages and passes extra arguments through', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failure = new Error('down');

    createConsoleLogger({ prefix: '[cache]' }).warn('remote tier unavailable', failure);

    expect(warn).toHaveBeenCalledWith('[cache] remote tier unavailable', failure);
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger({ level: 'error' });
    logger.debug?.('miss');
    logger.info?.('connected');
    logger.error('broken');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[repolens] broken');
  });

  it('stays quiet at the silent level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleLogger({ level: 'silent' }).error('broken');
    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('recognizes the known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
