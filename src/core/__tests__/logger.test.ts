import { describe, it, expect } from 'vitest';
import { bytesToSizeString, getLogger } from '../logger.js';

describe('bytesToSizeString', () => {
  it('uses the largest whole unit', () => {
    expect(bytesToSizeString(10 * 1024 * 1024)).toBe('10m');
    expect(bytesToSizeString(2 * 1024 * 1024 * 1024)).toBe('2g');
    expect(bytesToSizeString(1536)).toBe('1k');
    expect(bytesToSizeString(512)).toBe('512');
  });
});

describe('getLogger', () => {
  it('returns a warn-level fallback before initLogger', () => {
    const log = getLogger('test');
    expect(log.level).toBe('warn');
    expect(log.bindings()).toEqual({ subsystem: 'test' });
  });
});
