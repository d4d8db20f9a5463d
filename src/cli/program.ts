/**
 * worklog commander program: global options, startup hooks and commands.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { registerStartCommand } from './commands/start.js';
import { registerStopCommand } from './commands/stop.js';
import { registerStatusCommand } from './commands/status.js';
import { registerListCommand } from './commands/list.js';
import { registerSearchCommand } from './commands/search.js';
import { registerReportCommand } from './commands/report.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerDeleteCommand } from './commands/delete.js';
import { registerConfigCommand } from './commands/config.js';
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { setColorsEnabled } from './renderers/colors.js';
import { setCliRuntime } from './context.js';
import { initLogger, getLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getWorklogHome } from '../core/paths.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  // Same relative location from src/cli and dist/cli.
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (raw !== null && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

export interface ProgramOptions {
  /** Start the rotating file logger before each command (off in tests). */
  fileLogging?: boolean;
}

/**
 * Build the CLI program. Errors thrown by the startup hook reject
 * parseAsync(); commands report their own WorklogErrors.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const { fileLogging = true } = options;
  const program = new Command();

  program
    .name('worklog')
    .description('Track work sessions and report where the time went')
    .version(getPackageVersion())
    .option('--json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format (default)')
    .option('--quiet', 'Suppress non-essential output for scripting')
    .option('--db <path>', 'Database file to use');

  registerStartCommand(program);
  registerStopCommand(program);
  registerStatusCommand(program);
  registerListCommand(program);
  registerSearchCommand(program);
  registerReportCommand(program);
  registerStatsCommand(program);
  registerDeleteCommand(program);
  registerConfigCommand(program);

  // Load configuration, start logging and resolve the output format before any command.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    const config = await loadConfig();

    if (fileLogging) {
      initLogger(getWorklogHome(), config.logging);
    }

    setFormatContext(resolveFormat(opts, config.output.defaultFormat));
    setColorsEnabled(config.output.showColor);

    const dbFlag: unknown = opts['db'];
    setCliRuntime(config, typeof dbFlag === 'string' ? dbFlag : undefined);

    getLogger('cli').debug({ command: actionCommand.name() }, 'Command start');
  });

  return program;
}
