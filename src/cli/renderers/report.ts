/**
 * Human-readable renderers for summary and day reports.
 */

import type { DayReport, SummaryReport } from '../../types/report.js';
import { formatClock, formatDateTime, formatDuration, formatLongDate } from '../../core/format.js';
import { parseLocalIso } from '../../core/time.js';
import { bold, dim, hRule } from './colors.js';

function sectionHeader(title: string): string[] {
  return [bold(title), hRule(60, '-')];
}

export function renderSummaryReport(report: SummaryReport, quiet: boolean): string {
  if (quiet) return formatDuration(report.totalMinutes);

  const average = report.sessionCount > 0 ? formatDuration(report.averageMinutes) : '0m';
  const out: string[] = [
    bold(`Worklog Report - ${report.periodDescription}`),
    hRule(60),
    '',
    `Total Sessions: ${report.sessionCount}`,
    `Total Time: ${formatDuration(report.totalMinutes)}`,
    `Average Session: ${average}`,
  ];

  if (report.byTag && report.byTag.length > 0) {
    out.push('', ...sectionHeader('Time by Tag:'));
    for (const row of report.byTag) {
      out.push(
        `  ${row.tag.padEnd(20)} ${formatDuration(row.totalMinutes).padStart(10)} ` +
        `(${row.sessionCount} sessions, ${row.percentage.toFixed(1)}%)`,
      );
    }
  }

  if (report.recentSessions && report.recentSessions.length > 0) {
    out.push('', ...sectionHeader('Recent Sessions:'));
    for (const line of report.recentSessions) {
      const tags = line.tags.length > 0 ? dim(` [${line.tags.join(', ')}]`) : '';
      out.push(
        `  ${formatDateTime(parseLocalIso(line.startTime))} - ` +
        `${formatDuration(line.durationMinutes).padStart(6)} - ${line.description}${tags}`,
      );
    }
  }

  if (report.byDay && report.byDay.length > 0) {
    out.push('', ...sectionHeader('Time by Day:'));
    for (const day of report.byDay) {
      out.push(
        `  ${day.date}  ${formatDuration(day.totalMinutes).padStart(10)} ` +
        `(${day.sessionCount} sessions)`,
      );
    }
  }

  return out.join('\n');
}

export function renderDayReport(report: DayReport, quiet: boolean): string {
  if (quiet) return formatDuration(report.totalMinutes);

  const day = parseLocalIso(`${report.date}T00:00:00.000`);
  const out: string[] = [
    bold(`Daily Report - ${formatLongDate(day)}`),
    hRule(60),
    '',
    `Sessions: ${report.sessionCount}`,
    `Total Time: ${formatDuration(report.totalMinutes)}`,
    '',
  ];

  if (report.sessions.length === 0) {
    out.push(dim('No completed sessions for this day.'));
    return out.join('\n');
  }

  out.push(...sectionHeader('Sessions:'));
  for (const session of report.sessions) {
    let range = formatClock(parseLocalIso(session.startTime));
    if (session.endTime) {
      range += ` - ${formatClock(parseLocalIso(session.endTime))}`;
    }
    out.push(
      '',
      `  ${range}`,
      `  Duration: ${formatDuration(session.durationMinutes)}`,
      `  Task: ${session.description}`,
    );
    if (session.tags.length > 0) out.push(`  Tags: ${session.tags.join(', ')}`);
    if (session.notes) out.push(`  Notes: ${session.notes}`);
  }

  return out.join('\n');
}
