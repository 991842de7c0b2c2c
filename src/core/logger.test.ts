import { afterEach, describe, expect, it, vi } from 'vitest';

import { createConsoleLogger, formatLogLine } from './logger.js';

describe('formatLogLine', () => {
  it('prefixes a UTC timestamp and pads the level', () => {
    expect(formatLogLine('INFO', 'hello', new Date('2026-03-04T05:06:07.890Z'))).toBe(
      '[2026-03-04 05:06:07] INFO  hello\n'
    );
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags lines by level and hides debug unless verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createConsoleLogger(false);

    log('INFO', 'started');
    log('WARN', 'careful');
    log('DEBUG', 'noise');

    expect(spy.mock.calls).toEqual([['[sync] started'], ['[sync warn] careful']]);
  });

  it('prints debug lines when verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleLogger(true)('DEBUG', 'detail');
    expect(spy).toHaveBeenCalledWith('[sync debug] detail');
  });
});
