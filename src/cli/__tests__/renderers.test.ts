/**
 * Human renderer output, with colors off.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { setColorsEnabled, detectColorSupport } from '../renderers/colors.js';
import {
  renderDelete,
  renderList,
  renderSearch,
  renderStart,
  renderStats,
  renderStatus,
  renderStop,
} from '../renderers/sessions.js';
import { renderDayReport, renderSummaryReport } from '../renderers/report.js';
import { flattenConfig, renderConfigGet } from '../renderers/config.js';
import type { Session } from '../../types/session.js';

function session(overrides: Partial<Session> = {}): Session {
  return {
    id: 1,
    description: 'Fix login bug',
    startTime: '2026-10-18T14:30:00.000',
    endTime: '2026-10-18T16:00:00.000',
    durationMinutes: 90,
    notes: null,
    createdAt: '2026-10-18T14:30:00.000',
    tags: ['api', 'auth'],
    ...overrides,
  };
}

const active = session({
  id: 2,
  description: 'Write docs',
  startTime: '2026-10-19T09:05:00.000',
  endTime: null,
  durationMinutes: null,
  createdAt: '2026-10-19T09:05:00.000',
  tags: [],
});

describe('human renderers', () => {
  beforeAll(() => {
    setColorsEnabled(false);
  });

  afterAll(() => {
    setColorsEnabled(detectColorSupport());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('renders a started session', () => {
    expect(renderStart(session({ startTime: '2026-10-19T10:00:00.000' }), false)).toBe([
      '✓ Session started at 10:00 AM',
      '  Task: Fix login bug',
      '  Tags: api, auth',
      '',
      'Stop this session with: worklog stop',
    ].join('\n'));
  });

  it('renders only the id when quiet', () => {
    expect(renderStart(session({ id: 12 }), true)).toBe('12');
  });

  it('renders a stopped session with notes', () => {
    expect(renderStop(session({ notes: 'fixed the redirect' }), false)).toBe([
      '✓ Session stopped',
      '  Task: Fix login bug',
      '  Duration: 1h 30m',
      '  Notes: fixed the redirect',
    ].join('\n'));
  });

  it('renders the idle status', () => {
    expect(renderStatus({ active: false, session: null, elapsedMinutes: null }, false)).toBe([
      'No active session',
      '',
      'Start a session with: worklog start "Your task description"',
    ].join('\n'));
  });

  it('renders the active status', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2026, 9, 19, 9, 50, 0));

    expect(renderStatus({ active: true, session: session({ ...active, tags: ['docs'] }), elapsedMinutes: 45 }, false)).toBe([
      'Active Session',
      '  Task: Write docs',
      '  Started: 45 minutes ago',
      '  Duration: 45m',
      '  Tags: docs',
    ].join('\n'));
  });

  it('renders the session table', () => {
    expect(renderList({ sessions: [active, session()], count: 2, limit: 20 }, false)).toBe([
      'ID  Date    Time         Duration  Description    Tags',
      '--  ------  --------  -----------  -------------  ---------',
      ' 2  Oct 19  09:05 AM  In progress  Write docs',
      ' 1  Oct 18  02:30 PM       1h 30m  Fix login bug  api, auth',
    ].join('\n'));
  });

  it('hints at --limit when the list is full', () => {
    const text = renderList({ sessions: [session()], count: 1, limit: 1 }, false);
    expect(text.split('\n').at(-1)).toBe('Showing 1 most recent sessions. Use --limit to see more.');
  });

  it('renders an empty list', () => {
    expect(renderList({ sessions: [], count: 0, limit: 20 }, false)).toBe('No sessions found');
  });

  it('renders search results', () => {
    expect(renderSearch({ term: 'login', sessions: [session({ notes: 'redirect loop' })], count: 1 }, false)).toBe([
      "Found 1 session(s) matching 'login':",
      '',
      '• Oct 18, 02:30 PM - 1h 30m',
      '  Fix login bug',
      '  Tags: api, auth',
      '  Notes: redirect loop',
    ].join('\n'));
  });

  it('renders an empty search', () => {
    expect(renderSearch({ term: 'zzz', sessions: [], count: 0 }, false)).toBe("No sessions found matching 'zzz'");
  });

  it('renders delete and stats', () => {
    expect(renderDelete({ id: 7, deleted: true }, false)).toBe('✓ Session 7 deleted');
    expect(renderStats({
      periodDescription: 'Last 7 Days',
      totalMinutes: 150,
      sessionCount: 4,
      avgMinutes: 37.5,
      totalIncludingActive: 5,
    }, false)).toBe([
      'Statistics - Last 7 Days',
      '  Completed sessions: 4',
      '  Total time: 2h 30m',
      '  Average session: 38m',
      '  Sessions including active: 5',
    ].join('\n'));
  });

  it('renders a summary report', () => {
    const text = renderSummaryReport({
      periodDescription: 'Last 7 Days',
      period: { start: '2026-10-12T12:00:00.000', end: '2026-10-19T12:00:00.000' },
      sessionCount: 2,
      totalMinutes: 120,
      averageMinutes: 60,
      byTag: [{ tag: 'api', sessionCount: 2, totalMinutes: 90, percentage: 75 }],
      byDay: [{ date: '2026-10-18', sessionCount: 2, totalMinutes: 120 }],
    }, false);

    expect(text).toBe([
      'Worklog Report - Last 7 Days',
      '='.repeat(60),
      '',
      'Total Sessions: 2',
      'Total Time: 2h',
      'Average Session: 1h',
      '',
      'Time by Tag:',
      '-'.repeat(60),
      '  api                      1h 30m (2 sessions, 75.0%)',
      '',
      'Time by Day:',
      '-'.repeat(60),
      '  2026-10-18          2h (2 sessions)',
    ].join('\n'));
  });

  it('renders recent sessions in a summary', () => {
    const text = renderSummaryReport({
      periodDescription: 'All Time',
      period: { start: null, end: null },
      sessionCount: 1,
      totalMinutes: 42,
      averageMinutes: 42,
      recentSessions: [{
        id: 1,
        startTime: '2026-10-19T10:00:00.000',
        durationMinutes: 42,
        description: 'Review PR',
        tags: ['review'],
      }],
    }, false);

    expect(text.split('\n').slice(-3)).toEqual([
      'Recent Sessions:',
      '-'.repeat(60),
      '  Oct 19, 10:00 AM -    42m - Review PR [review]',
    ]);
  });

  it('renders a day report', () => {
    const text = renderDayReport({
      date: '2026-10-19',
      sessionCount: 1,
      totalMinutes: 60,
      sessions: [{
        id: 3,
        startTime: '2026-10-19T09:00:00.000',
        endTime: '2026-10-19T10:00:00.000',
        durationMinutes: 60,
        description: 'Morning',
        tags: ['api'],
        notes: 'shipped',
      }],
    }, false);

    expect(text).toBe([
      'Daily Report - Monday, October 19, 2026',
      '='.repeat(60),
      '',
      'Sessions: 1',
      'Total Time: 1h',
      '',
      'Sessions:',
      '-'.repeat(60),
      '',
      '  09:00 AM - 10:00 AM',
      '  Duration: 1h',
      '  Task: Morning',
      '  Tags: api',
      '  Notes: shipped',
    ].join('\n'));
  });

  it('renders an empty day', () => {
    const text = renderDayReport({ date: '2026-10-19', sessionCount: 0, totalMinutes: 0, sessions: [] }, false);
    expect(text.split('\n').at(-1)).toBe('No completed sessions for this day.');
  });

  it('renders config values', () => {
    expect(renderConfigGet({ key: 'list.defaultLimit', value: 20, source: 'default' }, false))
      .toBe('list.defaultLimit = 20 (default)');
    expect(flattenConfig({ output: { showColor: true }, list: { defaultLimit: 5 } })).toEqual([
      ['output.showColor', true],
      ['list.defaultLimit', 5],
    ]);
  });
});
