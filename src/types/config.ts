/**
 * Configuration schema for worklog.
 *
 * The zod schema is the single source of truth: defaults live here and the
 * inferred type is what the rest of the code sees.
 */

import { z } from 'zod';

/** Output format options. */
export const OUTPUT_FORMATS = ['human', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Log levels accepted by pino. */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const outputSchema = z.object({
  defaultFormat: z.enum(OUTPUT_FORMATS).default('human'),
  showColor: z.boolean().default(true),
});

const storageSchema = z.object({
  /** Absolute path of the database file. Defaults to <home>/worklog.db. */
  dbPath: z.string().min(1).optional(),
});

const limitSchema = z.object({
  defaultLimit: z.number().int().positive().default(20),
});

const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  /** Relative to the worklog home directory. */
  filePath: z.string().min(1).default('logs/worklog.log'),
  maxFileSize: z.number().int().positive().default(10 * 1024 * 1024),
  maxFiles: z.number().int().positive().default(5),
});

export const worklogConfigSchema = z.object({
  output: outputSchema.default({}),
  storage: storageSchema.default({}),
  list: limitSchema.default({}),
  search: limitSchema.default({}),
  logging: loggingSchema.default({}),
});

export type WorklogConfig = z.infer<typeof worklogConfigSchema>;
export type LoggerConfig = WorklogConfig['logging'];

/** Where a resolved config value came from. */
export type ConfigSource = 'env' | 'file' | 'default';

/** A config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
