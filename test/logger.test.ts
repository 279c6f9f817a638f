import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../src/logger.js';

describe('createLogger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('prefixes lines with the tag', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('info');
    createLogger('sim').info('loop started', 60);
    expect(log).toHaveBeenCalledWith('[sim]', 'loop started', 60);
  });

  it('filters by level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');
    const log = createLogger('net');
    log.debug('hidden');
    log.warn('shown');
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[net]', 'shown');
    setLogLevel('silent');
    log.error('hidden too');
    expect(error).not.toHaveBeenCalled();
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
