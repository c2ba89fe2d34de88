import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isDebugEnabled } from '../src/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages and routes levels to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger({ debug: false });
    logger.info('started', 3000);
    logger.warn('careful');
    logger.error('failed', 'details');
    logger.debug('hidden');

    expect(log.mock.calls).toEqual([['[DualAgent] started', 3000]]);
    expect(warn.mock.calls).toEqual([['[DualAgent] careful']]);
    expect(error.mock.calls).toEqual([['[DualAgent] failed', 'details']]);
  });

  it('prints debug output when enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger({ debug: true, prefix: '[Test]' }).debug('tool call');
    expect(log).toHaveBeenCalledWith('[Test] tool call');
  });

  it('reads DUAL_AGENT_DEBUG', () => {
    expect(isDebugEnabled({ DUAL_AGENT_DEBUG: 'true' })).toBe(true);
    expect(isDebugEnabled({ DUAL_AGENT_DEBUG: '1' })).toBe(true);
    expect(isDebugEnabled({ DUAL_AGENT_DEBUG: 'yes' })).toBe(false);
    expect(isDebugEnabled({})).toBe(false);
  });
});
