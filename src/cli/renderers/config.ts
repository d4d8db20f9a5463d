/**
 * Human-readable renderers for the config command.
 */

import type { ConfigSource, WorklogConfig } from '../../types/config.js';
import { bold, dim, green, CHECK } from './colors.js';

/** Result of `config get`. */
export interface ConfigGetResult {
  key: string;
  value: unknown;
  source: ConfigSource;
}

/** Result of `config set`. */
export interface ConfigSetResult {
  key: string;
  value: unknown;
  path: string;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '(unset)';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Flatten nested settings into dotted keys, in declaration order. */
export function flattenConfig(value: unknown, prefix: string = ''): Array<[string, unknown]> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return [[prefix, value]];
  }
  return Object.entries(value).flatMap(([key, child]) =>
    flattenConfig(child, prefix ? `${prefix}.${key}` : key),
  );
}

export function renderConfigGet(result: ConfigGetResult, quiet: boolean): string {
  if (quiet) return formatValue(result.value);
  return `${result.key} = ${formatValue(result.value)} ${dim(`(${result.source})`)}`;
}

export function renderConfigSet(result: ConfigSetResult, quiet: boolean): string {
  if (quiet) return '';
  return `${green(CHECK)} Set ${bold(result.key)} = ${formatValue(result.value)} ${dim(`in ${result.path}`)}`;
}

export function renderConfigList(result: { config: WorklogConfig }, quiet: boolean): string {
  return flattenConfig(result.config)
    .map(([key, value]) => (quiet ? `${key}=${formatValue(value)}` : `${key} = ${formatValue(value)}`))
    .join('\n');
}
