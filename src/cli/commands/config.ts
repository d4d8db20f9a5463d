/**
 * CLI config command - configuration management.
 */

import { Command } from 'commander';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderConfigGet, renderConfigList, renderConfigSet } from '../renderers/config.js';
import { WorklogError } from '../../core/errors.js';
import { getConfigValue, getNestedValue, loadConfig, setConfigValue } from '../../core/config.js';
import { getConfigPath } from '../../core/paths.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key);
        cliOutput({
          key,
          value: resolved.value,
          source: resolved.source,
        }, { operation: 'config.get', render: renderConfigGet });
      } catch (err) {
        if (err instanceof WorklogError) {
          cliError(err);
          process.exitCode = err.code;
          return;
        }
        throw err;
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value in the config file')
    .action(async (key: string, value: string) => {
      try {
        const updated = await setConfigValue(key, value);
        cliOutput({
          key,
          value: getNestedValue(updated, key),
          path: getConfigPath(),
        }, { operation: 'config.set', render: renderConfigSet });
      } catch (err) {
        if (err instanceof WorklogError) {
          cliError(err);
          process.exitCode = err.code;
          return;
        }
        throw err;
      }
    });

  config
    .command('list')
    .description('Show all resolved configuration')
    .action(async () => {
      try {
        const resolved = await loadConfig();
        cliOutput({ config: resolved }, { operation: 'config.list', render: renderConfigList });
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
