/**
 * Plugin, version and changelog types
 */

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export type BumpSeverity = 'none' | 'patch' | 'minor' | 'major';

export const CHANGE_CATEGORIES = ['Added', 'Changed', 'Fixed', 'Removed', 'Deprecated', 'Security'] as const;

export type ChangeCategory = (typeof CHANGE_CATEGORIES)[number];

export type UnreleasedEntries = Map<ChangeCategory, string[]>;

export interface ChangelogDocument {
  /** Full document, one element per line (no line terminators) */
  lines: string[];
  /** Index of the `## [Unreleased]` header line */
  unreleasedIndex: number;
  /** Index one past the last Unreleased body line */
  unreleasedEnd: number;
  unreleased: UnreleasedEntries;
}

/**
 * The three places a plugin's version is persisted
 */
export type VersionLocationId = 'manifest' | 'descriptor' | 'registry';

export const VERSION_LOCATIONS: readonly VersionLocationId[] = ['manifest', 'descriptor', 'registry'];

export interface PluginPaths {
  dir: string;
  manifest: string;
  descriptor: string;
  changelog: string;
  registry: string;
}

export interface Plugin {
  name: string;
  paths: PluginPaths;
}

export interface LoadedPlugin extends Plugin {
  changelogText: string;
  changelog: ChangelogDocument;
}
