/**
 * DSL version parsing and skew detection.
 *
 * Versions follow `MAJOR.MINOR.PATCH`, optionally with a pre-release and
 * build suffix. Pre-release and build metadata are accepted but ignored when
 * comparing.
 */

import { CURRENT_DSL_VERSION } from './constants.js';

export interface DslVersion {
  major: number;
  minor: number;
  patch: number;
}

export type VersionSkew = 'newer' | 'major-older' | 'minor-older' | 'compatible';

const VERSION_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export function parseDslVersion(version: string): DslVersion | undefined {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) return undefined;
  return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

export function compareDslVersions(a: DslVersion, b: DslVersion): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  return a.patch - b.patch;
}

/** Classify an imported version against the current DSL version. */
export function detectVersionSkew(imported: DslVersion, current: string = CURRENT_DSL_VERSION): VersionSkew {
  const currentVersion = parseDslVersion(current);
  if (!currentVersion) {
    throw new Error(`Current DSL version is malformed: ${current}`);
  }
  if (compareDslVersions(imported, currentVersion) > 0) return 'newer';
  if (imported.major < currentVersion.major) return 'major-older';
  if (imported.minor < currentVersion.minor) return 'minor-older';
  return 'compatible';
}
