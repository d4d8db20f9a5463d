/**
 * Runtime compatibility checks.
 */

/** Minimum supported Node.js major version. */
export const MINIMUM_NODE_MAJOR = 20;

/** Get Node.js version info. */
export function getNodeVersionInfo(version: string = process.version): {
  version: string;
  major: number;
  minor: number;
  patch: number;
  meetsMinimum: boolean;
} {
  const clean = version.replace('v', '');
  const [major = 0, minor = 0, patch = 0] = clean.split('.').map(Number);

  return {
    version: clean,
    major,
    minor,
    patch,
    meetsMinimum: major >= MINIMUM_NODE_MAJOR,
  };
}
