/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars, then
 * the output.showColor setting. Falls back to plain text when color is off.
 */

/** Detect whether ANSI colors should be used for this process. */
export function detectColorSupport(): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
}

let colorsEnabled: boolean = detectColorSupport();

/**
 * Turn colors on or off. The preAction hook passes output.showColor here;
 * the environment and terminal checks still apply.
 */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled && detectColorSupport();
}

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

const NC = '\x1b[0m';

function paint(code: string): (text: string) => string {
  return (text: string) => (colorsEnabled ? `${code}${text}${NC}` : text);
}

export const bold = paint('\x1b[1m');
export const dim = paint('\x1b[2m');
export const red = paint('\x1b[0;31m');
export const green = paint('\x1b[0;32m');
export const cyan = paint('\x1b[0;36m');

/** Success/failure marks used at the start of result lines. */
export const CHECK = '✓';
export const CROSS = '✗';

/** Create a horizontal rule. */
export function hRule(width: number = 60, char: string = '='): string {
  return char.repeat(width);
}

