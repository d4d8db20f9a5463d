/**
 * Configuration engine for worklog.
 *
 * Resolution priority: Environment vars > Config file > Defaults
 */

import { worklogConfigSchema } from '../types/config.js';
import type { ResolvedValue, WorklogConfig } from '../types/config.js';
import { readJson, saveJson } from '../store/json.js';
import { getConfigPath } from './paths.js';
import { WorklogError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Environment variable to config path mapping. */
export const ENV_MAP: Record<string, string> = {
  'WORKLOG_FORMAT': 'output.defaultFormat',
  'WORKLOG_SHOW_COLOR': 'output.showColor',
  'WORKLOG_DB_PATH': 'storage.dbPath',
  'WORKLOG_LIST_LIMIT': 'list.defaultLimit',
  'WORKLOG_SEARCH_LIMIT': 'search.defaultLimit',
  'WORKLOG_LOG_LEVEL': 'logging.level',
  'WORKLOG_LOG_FILE': 'logging.filePath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
export function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (!last) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Parse a string value (env var or CLI argument) to the appropriate type.
 */
export function parseValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/** Keys whose values stay strings even when they look numeric. */
const STRING_KEYS = new Set(['storage.dbPath', 'logging.filePath']);

/** Convert a raw string to the type stored at a config path. */
function coerceValue(path: string, value: string): unknown {
  return STRING_KEYS.has(path) ? value : parseValue(value);
}

/** Validate a raw config object, applying defaults. */
export function validateConfig(raw: unknown, source: string): WorklogConfig {
  const result = worklogConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new WorklogError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration in ${source}: ${issues}`,
      { fix: `Edit ${getConfigPath()} or unset the offending WORKLOG_* variable` },
    );
  }
  return result.data;
}

/** Read the config file as a plain object (empty when missing). */
async function readConfigFile(): Promise<Record<string, unknown>> {
  const path = getConfigPath();
  const raw = await readJson(path);
  if (raw === null) return {};
  if (!isRecord(raw)) {
    throw new WorklogError(ExitCode.CONFIG_ERROR, `Config file must contain a JSON object: ${path}`);
  }
  return raw;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < config file < environment vars
 */
export async function loadConfig(): Promise<WorklogConfig> {
  const merged = structuredClone(await readConfigFile());

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, coerceValue(configPath, envValue));
    }
  }

  return validateConfig(merged, 'configuration');
}

/** Config keys that may be unset and therefore have no default. */
const OPTIONAL_KEYS = new Set(['storage.dbPath']);

/** Check whether a dotted path names a config setting. */
export function isKnownConfigKey(path: string): boolean {
  if (OPTIONAL_KEYS.has(path)) return true;
  const value = getNestedValue(worklogConfigSchema.parse({}), path);
  return value !== undefined && !isRecord(value);
}

function assertKnownKey(path: string): void {
  if (!isKnownConfigKey(path)) {
    throw new WorklogError(
      ExitCode.INVALID_INPUT,
      `Unknown config key: ${path}`,
      { fix: "Run 'worklog config list' to see available keys" },
    );
  }
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(path: string): Promise<ResolvedValue<unknown>> {
  assertKnownKey(path);

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: coerceValue(path, envValue), source: 'env' };
    }
  }

  const fileValue = getNestedValue(await readConfigFile(), path);
  if (fileValue !== undefined) {
    return { value: fileValue, source: 'file' };
  }

  const value = getNestedValue(worklogConfigSchema.parse({}), path);
  return { value: value ?? null, source: 'default' };
}

/**
 * Set a config value in the config file.
 * The whole file is validated before it is written.
 */
export async function setConfigValue(path: string, rawValue: string): Promise<WorklogConfig> {
  assertKnownKey(path);

  const existing = await readConfigFile();
  setNestedValue(existing, path, coerceValue(path, rawValue));

  const validated = validateConfig(existing, getConfigPath());
  await saveJson(getConfigPath(), existing);
  return validated;
}
