/**
 * CLI report command - summary over a period, or a detailed day report.
 */

import { Command } from 'commander';
import { buildDayReport, buildSummaryReport } from '../../core/reports/index.js';
import { WorklogError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ReportPeriod } from '../../types/report.js';
import { endOfDay, parseDateString } from '../../core/time.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderDayReport, renderSummaryReport } from '../renderers/report.js';
import { getCliStore } from '../context.js';
import { parsePositiveInt } from '../parsers.js';

/** Period flags accepted by `report`. */
export interface ReportPeriodOptions {
  today?: boolean;
  week?: boolean;
  month?: boolean;
  days?: number;
  from?: string;
  to?: string;
}

interface ReportOptions extends ReportPeriodOptions {
  byTag?: boolean;
  byDay?: boolean;
}

/**
 * Turn report flags into a period.
 * --today/--week/--month/--days are exclusive with each other and with
 * --from/--to. --to covers the whole named day.
 */
export function resolveReportPeriod(opts: ReportPeriodOptions, now: Date = new Date()): ReportPeriod {
  const dayFlags: Array<[string, number | undefined]> = [
    ['--today', opts.today ? 1 : undefined],
    ['--week', opts.week ? 7 : undefined],
    ['--month', opts.month ? 30 : undefined],
    ['--days', opts.days],
  ];
  const chosen = dayFlags.filter(([, days]) => days !== undefined);
  const hasRange = opts.from !== undefined || opts.to !== undefined;

  if (chosen.length > 1 || (chosen.length === 1 && hasRange)) {
    const names = [...chosen.map(([flag]) => flag), ...(hasRange ? ['--from/--to'] : [])];
    throw new WorklogError(
      ExitCode.INVALID_INPUT,
      `Conflicting period options: ${names.join(', ')}`,
      { fix: 'Choose one of --today, --week, --month, --days, or a --from/--to range' },
    );
  }

  const days = chosen[0]?.[1];
  if (days !== undefined) {
    return { kind: 'days', days };
  }

  if (hasRange) {
    const start = opts.from !== undefined ? parseDateString(opts.from, now) : undefined;
    const end = opts.to !== undefined ? endOfDay(parseDateString(opts.to, now)) : undefined;
    if (start && end && start.getTime() > end.getTime()) {
      throw new WorklogError(
        ExitCode.INVALID_INPUT,
        `--from (${opts.from}) is after --to (${opts.to})`,
      );
    }
    return { kind: 'range', start, end };
  }

  return { kind: 'all' };
}

/**
 * Register the report command and its day subcommand.
 */
export function registerReportCommand(program: Command): void {
  const report = program
    .command('report')
    .description('Generate productivity reports')
    .option('--today', 'Report for today')
    .option('--week', 'Report for the last 7 days')
    .option('--month', 'Report for the last 30 days')
    .option('-d, --days <n>', 'Report for the last N days', parsePositiveInt)
    .option('--from <date>', 'Start date (YYYY-MM-DD, today, yesterday)')
    .option('--to <date>', 'End date, inclusive (YYYY-MM-DD, today, yesterday)')
    .option('--by-tag', 'Group time by tag')
    .option('--by-day', 'Break time down by day')
    .action((opts: ReportOptions) => {
      try {
        const summary = buildSummaryReport({
          period: resolveReportPeriod(opts),
          byTag: opts.byTag,
          byDay: opts.byDay,
        }, getCliStore());
        cliOutput(summary, { operation: 'reports.summary', render: renderSummaryReport });
      } catch (err) {
        if (err instanceof WorklogError) {
          cliError(err);
          process.exitCode = err.code;
          return;
        }
        throw err;
      }
    });

  report
    .command('day [date]')
    .description('Detailed report for one day (default: today)')
    .action((date: string | undefined) => {
      try {
        const day = parseDateString(date ?? 'today');
        const result = buildDayReport(day, getCliStore());
        cliOutput(result, { operation: 'reports.day', render: renderDayReport });
      } catch (err) {
        if (err instanceof WorklogError) {
          cliError(err);
          process.exitCode = err.code;
          return;
        }
        throw err;
      }
    });
}
