/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the commander preAction hook; read by cliOutput() and renderers.
 */

import type { OutputFormat } from '../types/config.js';

/** Where the resolved format came from. */
export type FormatSource = 'flag' | 'config' | 'default';

/** Resolved output format for one invocation. */
export interface FormatResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
}

/**
 * Current resolved format for this CLI invocation.
 * Defaults to human output until resolved by the preAction hook.
 */
let currentResolution: FormatResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
};

/**
 * Set the resolved format for this CLI invocation.
 */
export function setFormatContext(resolution: FormatResolution): void {
  currentResolution = resolution;
}

/**
 * Get the current resolved format.
 */
export function getFormatContext(): FormatResolution {
  return currentResolution;
}
