import type { FilingVersion } from '../types.js';

const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?/i;

/**
 * Parses a header version tag such as "8.3", "3.00" or "P3.00".
 * Returns `undefined` when no major.minor pair can be read.
 */
export function parseFilingVersion(value: string | undefined): FilingVersion | undefined {
  if (value === undefined) {
    return undefined;
  }
  const raw = value.trim();
  // Paper filings prefix the version with "P".
  const match = raw.replace(/^P/i, '').match(VERSION_PATTERN);
  if (!match) {
    return undefined;
  }
  return Object.freeze({
    major: Number.parseInt(match[1], 10),
    minor: match[2] === undefined ? 0 : Number.parseInt(match[2], 10),
    raw,
  });
}

export function compareVersions(a: FilingVersion, b: FilingVersion): number {
  return a.major !== b.major ? a.major - b.major : a.minor - b.minor;
}

export function formatVersion(version: FilingVersion): string {
  return `${version.major}.${version.minor}`;
}
