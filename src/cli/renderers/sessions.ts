/**
 * Human-readable renderers for session commands.
 *
 * Each renderer takes the same data the JSON envelope carries and returns
 * the text to print. Quiet mode drops hints and secondary lines.
 */

import { getSessionStatus } from '../../types/session.js';
import type { Session, SessionStats, SessionStatusView } from '../../types/session.js';
import { formatClock, formatDateTime, formatDuration, formatShortDate, formatTimeAgo, truncate } from '../../core/format.js';
import { parseLocalIso } from '../../core/time.js';
import { bold, cyan, dim, green, CHECK } from './colors.js';

/** Result of `list`. */
export interface SessionListResult {
  sessions: Session[];
  count: number;
  limit: number;
}

/** Result of `search`. */
export interface SessionSearchResult {
  term: string;
  sessions: Session[];
  count: number;
}

/** Result of `delete`. */
export interface SessionDeleteResult {
  id: number;
  deleted: boolean;
}

/** Result of `stats`. */
export interface SessionStatsResult extends SessionStats {
  periodDescription: string;
}

/** Width of the description column in `list`. */
const LIST_DESCRIPTION_WIDTH = 50;

function tagLine(tags: readonly string[]): string | null {
  return tags.length > 0 ? dim(`  Tags: ${tags.join(', ')}`) : null;
}

function durationLabel(session: Session): string {
  if (getSessionStatus(session) === 'active') return 'In progress';
  return formatDuration(session.durationMinutes ?? 0);
}

function lines(...parts: Array<string | null | false>): string {
  return parts.filter((p): p is string => typeof p === 'string').join('\n');
}

export function renderStart(session: Session, quiet: boolean): string {
  if (quiet) return String(session.id);
  return lines(
    bold(green(`${CHECK} Session started at ${formatClock(parseLocalIso(session.startTime))}`)),
    `  Task: ${session.description}`,
    tagLine(session.tags),
    '',
    dim('Stop this session with: worklog stop'),
  );
}

export function renderStop(session: Session, quiet: boolean): string {
  const duration = formatDuration(session.durationMinutes ?? 0);
  if (quiet) return duration;
  return lines(
    bold(green(`${CHECK} Session stopped`)),
    `  Task: ${session.description}`,
    bold(`  Duration: ${duration}`),
    session.notes !== null && dim(`  Notes: ${session.notes}`),
  );
}

export function renderStatus(view: SessionStatusView, quiet: boolean): string {
  if (!view.session) {
    if (quiet) return '';
    return lines(
      dim('No active session'),
      '',
      dim('Start a session with: worklog start "Your task description"'),
    );
  }

  const { session } = view;
  const duration = formatDuration(view.elapsedMinutes ?? 0);
  if (quiet) return `${session.id} ${duration}`;

  return lines(
    bold(cyan('Active Session')),
    `  Task: ${session.description}`,
    `  Started: ${formatTimeAgo(parseLocalIso(session.startTime))}`,
    bold(`  Duration: ${duration}`),
    tagLine(session.tags),
  );
}

export function renderList(result: SessionListResult, quiet: boolean): string {
  if (result.sessions.length === 0) {
    return quiet ? '' : dim('No sessions found');
  }

  const header = ['ID', 'Date', 'Time', 'Duration', 'Description', 'Tags'];
  const rows = result.sessions.map((s) => {
    const start = parseLocalIso(s.startTime);
    return [
      String(s.id),
      formatShortDate(start),
      formatClock(start),
      durationLabel(s),
      truncate(s.description, LIST_DESCRIPTION_WIDTH),
      s.tags.join(', '),
    ];
  });

  const widths = header.map((h, col) =>
    Math.max(h.length, ...rows.map(row => (row[col] ?? '').length)),
  );
  const formatRow = (cells: string[]): string =>
    cells
      .map((cell, col) => {
        const width = widths[col] ?? cell.length;
        // Right-align ID and Duration.
        return col === 0 || col === 3 ? cell.padStart(width) : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  const table = [
    bold(formatRow(header)),
    dim(widths.map(w => '-'.repeat(w)).join('  ')),
    ...rows.map(formatRow),
  ];

  if (!quiet && result.sessions.length >= result.limit) {
    table.push('', dim(`Showing ${result.limit} most recent sessions. Use --limit to see more.`));
  }
  return table.join('\n');
}

export function renderSearch(result: SessionSearchResult, quiet: boolean): string {
  if (result.sessions.length === 0) {
    return quiet ? '' : dim(`No sessions found matching '${result.term}'`);
  }

  const out: string[] = [];
  if (!quiet) {
    out.push(bold(`Found ${result.count} session(s) matching '${result.term}':`), '');
  }

  for (const session of result.sessions) {
    out.push(cyan(`• ${formatDateTime(parseLocalIso(session.startTime))} - ${durationLabel(session)}`));
    out.push(`  ${session.description}`);
    const tags = tagLine(session.tags);
    if (tags) out.push(tags);
    if (session.notes) out.push(dim(`  Notes: ${session.notes}`));
    out.push('');
  }
  return out.join('\n').trimEnd();
}

export function renderDelete(result: SessionDeleteResult, quiet: boolean): string {
  if (quiet) return '';
  return bold(green(`${CHECK} Session ${result.id} deleted`));
}

export function renderStats(stats: SessionStatsResult, quiet: boolean): string {
  if (quiet) return formatDuration(stats.totalMinutes);
  return lines(
    bold(`Statistics - ${stats.periodDescription}`),
    `  Completed sessions: ${stats.sessionCount}`,
    `  Total time: ${formatDuration(stats.totalMinutes)}`,
    `  Average session: ${formatDuration(stats.avgMinutes)}`,
    dim(`  Sessions including active: ${stats.totalIncludingActive}`),
  );
}
