/**
 * Bump severity calculation
 *
 * Maps changelog categories to a severity and folds severities across plugins.
 * PURE LIB: no I/O.
 */
import type { BumpSeverity, ChangeCategory, ChangelogDocument } from './types/plugin.js';

export const SEVERITIES: readonly BumpSeverity[] = ['none', 'patch', 'minor', 'major'];

/**
 * Static category → severity table (not configurable)
 */
const CATEGORY_SEVERITY: Record<ChangeCategory, BumpSeverity> = {
  Removed: 'major',
  Changed: 'major',
  Added: 'minor',
  Deprecated: 'minor',
  Fixed: 'patch',
  Security: 'patch'
};

export function severityRank(severity: BumpSeverity): number {
  return SEVERITIES.indexOf(severity);
}

export function categorySeverity(category: ChangeCategory): BumpSeverity {
  return CATEGORY_SEVERITY[category];
}

export function maxSeverity(a: BumpSeverity, b: BumpSeverity): BumpSeverity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

/**
 * Fold severities with max; 'none' is the identity, so [] → 'none'
 */
export function aggregateSeverity(severities: Iterable<BumpSeverity>): BumpSeverity {
  let result: BumpSeverity = 'none';
  for (const severity of severities) {
    result = maxSeverity(result, severity);
  }
  return result;
}

/**
 * Highest severity among categories with at least one entry in Unreleased
 */
export function documentSeverity(doc: ChangelogDocument): BumpSeverity {
  const present: BumpSeverity[] = [];
  for (const [category, entries] of doc.unreleased) {
    if (entries.length > 0) present.push(categorySeverity(category));
  }
  return aggregateSeverity(present);
}
