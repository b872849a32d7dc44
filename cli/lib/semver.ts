/**
 * Semantic version arithmetic (MAJOR.MINOR.PATCH)
 *
 * PURE LIB: no I/O.
 */
import { InvalidVersionFormatError } from './errors.js';
import type { BumpSeverity, SemanticVersion } from './types/plugin.js';

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Strip the tolerated `v` marker and discard any pre-release tag
 */
function normalizeVersionText(text: string): string {
  let version = text.trim();
  if (version.startsWith('v')) version = version.slice(1);
  const dash = version.indexOf('-');
  return dash === -1 ? version : version.slice(0, dash);
}

/**
 * Parse version text, or null when it is not X.Y.Z
 */
export function tryParseVersion(text: string): SemanticVersion | null {
  const match = normalizeVersionText(text).match(VERSION_PATTERN);
  if (!match) return null;

  const [major, minor, patch] = [match[1], match[2], match[3]].map(n => parseInt(n, 10));
  if (![major, minor, patch].every(Number.isSafeInteger)) return null;
  return { major, minor, patch };
}

/**
 * Parse version text
 * @param source - Where the text came from, for the error message
 * @throws InvalidVersionFormatError
 */
export function parseVersion(text: string, source?: string): SemanticVersion {
  const parsed = tryParseVersion(text);
  if (!parsed) throw new InvalidVersionFormatError(text, source);
  return parsed;
}

export function isValidVersion(text: string): boolean {
  return tryParseVersion(text) !== null;
}

export function formatVersion(v: SemanticVersion): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
  for (const key of ['major', 'minor', 'patch'] as const) {
    if (a[key] < b[key]) return -1;
    if (a[key] > b[key]) return 1;
  }
  return 0;
}

export function incrementMajor(v: SemanticVersion): SemanticVersion {
  return { major: v.major + 1, minor: 0, patch: 0 };
}

export function incrementMinor(v: SemanticVersion): SemanticVersion {
  return { major: v.major, minor: v.minor + 1, patch: 0 };
}

export function incrementPatch(v: SemanticVersion): SemanticVersion {
  return { major: v.major, minor: v.minor, patch: v.patch + 1 };
}

/**
 * Apply a bump severity ('none' returns the version unchanged)
 */
export function applyBump(v: SemanticVersion, severity: BumpSeverity): SemanticVersion {
  switch (severity) {
    case 'major':
      return incrementMajor(v);
    case 'minor':
      return incrementMinor(v);
    case 'patch':
      return incrementPatch(v);
    case 'none':
      return v;
  }
}
