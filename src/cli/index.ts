#!/usr/bin/env node
/**
 * worklog CLI entry point.
 */

import { createProgram } from './program.js';
import { WorklogError } from '../core/errors.js';
import { cliError } from './renderers/index.js';
import { closeDb } from '../store/sqlite.js';
import { closeLogger } from '../core/logger.js';

// Startup guard: fail fast if Node.js version is below minimum
import { getNodeVersionInfo, MINIMUM_NODE_MAJOR } from '../core/platform.js';

const nodeInfo = getNodeVersionInfo();
if (!nodeInfo.meetsMinimum) {
  process.stderr.write(
    `\nError: worklog requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${nodeInfo.version}\n\n`,
  );
  process.exit(1);
}

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  if (!(err instanceof WorklogError)) throw err;
  cliError(err);
  process.exitCode = err.code;
} finally {
  closeDb();
  closeLogger();
}
