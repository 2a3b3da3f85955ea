import { afterEach, describe, expect, it, vi } from 'vitest';
import { isLogLevel, logger, setLogLevel } from '../src/index.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('error');
  });

  it('should write a timestamped line with its data as JSON', () => {
    setLogLevel('info');
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    logger.info('Session closed', { sessionId: 'session-1', acceptedCount: 3 });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO: Session closed \{"sessionId":"session-1","acceptedCount":3\}$/
    );
  });

  it('should omit the data part when there is none', () => {
    setLogLevel('debug');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    logger.debug('Step sent');

    expect(debug.mock.calls[0]?.[0]).toMatch(/\] DEBUG: Step sent$/);
  });

  it('should drop messages below the minimum level', () => {
    setLogLevel('warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
