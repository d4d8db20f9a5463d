import { describe, it, expect } from 'vitest';
import { resolveListRange } from '../period.js';
import { normalizeTags, splitTagArgs } from '../tags.js';
import { WorklogError } from '../../errors.js';

const now = new Date(2026, 9, 19, 15, 30, 0);

describe('resolveListRange', () => {
  it('resolves today to local midnight through now', () => {
    expect(resolveListRange({ today: true }, now)).toEqual({
      start: new Date(2026, 9, 19, 0, 0, 0),
      end: now,
    });
  });

  it('resolves days to now minus N calendar days', () => {
    expect(resolveListRange({ days: 7 }, now)).toEqual({
      start: new Date(2026, 9, 12, 15, 30, 0),
      end: now,
    });
  });

  it('is unbounded without options', () => {
    expect(resolveListRange({}, now)).toEqual({});
  });

  it('rejects negative day counts', () => {
    expect(() => resolveListRange({ days: -3 }, now)).toThrow(WorklogError);
  });
});

describe('normalizeTags', () => {
  it('drops empties and duplicates, keeping first-seen order', () => {
    expect(normalizeTags(['Web', 'api', ' WEB ', '', 'API', 'ops'])).toEqual(['web', 'api', 'ops']);
  });
});

describe('splitTagArgs', () => {
  it('splits comma-separated arguments', () => {
    expect(splitTagArgs(['api,backend', 'ops'])).toEqual(['api', 'backend', 'ops']);
  });
});
