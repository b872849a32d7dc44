/**
 * Version management - the three version locations of a plugin
 *
 *   manifest   → <plugin>/plugin.json            .version (canonical read path)
 *   descriptor → <plugin>/skills/<name>/SKILL.md  frontmatter metadata.version
 *   registry   → marketplace.json                plugins[name].version
 *
 * Each location has an extractor (read) and a bumper (write). A sync writes
 * every location, then re-reads all of them from disk and requires each to
 * hold the new version. There is no rollback: a mismatch is reported as a
 * ConsistencyViolationError naming every location and its observed value.
 */
import path from 'path';
import { loadJson, saveJson, loadText, saveText } from './fileio-manager.js';
import { readMetadataVersion, setMetadataVersion } from '../lib/markdown.js';
import { formatVersion, parseVersion } from '../lib/semver.js';
import { ConsistencyViolationError, InvalidVersionFormatError, errorMessage } from '../lib/errors.js';
import type { ObservedVersion } from '../lib/errors.js';
import { silentLogger } from '../lib/log.js';
import type { Logger } from '../lib/log.js';
import { VERSION_LOCATIONS } from '../lib/types/plugin.js';
import type { Plugin, SemanticVersion, VersionLocationId } from '../lib/types/plugin.js';

export interface ExtractorResult extends ObservedVersion {
  /** False when the location does not exist for this plugin (unpublished registry record) */
  present: boolean;
}

export interface BumperResult {
  location: VersionLocationId;
  success: boolean;
  skipped?: boolean;
  oldVersion?: string | null;
  newVersion: string;
  source: string;
  error?: string;
}

export interface SyncOptions {
  /** Compute the writes without touching any file */
  dryRun?: boolean;
  logger?: Logger;
}

export interface SyncResult {
  plugin: string;
  version: string;
  dryRun: boolean;
  writes: BumperResult[];
  /** Post-write observations (projected from the computed writes on dry run) */
  verified: ExtractorResult[];
}

export interface ConsistencyReport {
  plugin: string;
  consistent: boolean;
  observed: ExtractorResult[];
  divergent: VersionLocationId[];
}

interface RegistryRecord {
  name: string;
  version?: unknown;
  [key: string]: unknown;
}

type Extractor = (plugin: Plugin) => ExtractorResult;
type Bumper = (plugin: Plugin, newVersion: string, dryRun: boolean) => BumperResult;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRegistryRecord(value: unknown): value is RegistryRecord {
  return isRecord(value) && typeof value.name === 'string';
}

function asVersionString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

type RegistryLookup =
  | { ok: true; records: RegistryRecord[] }
  | { ok: false; error: string };

/**
 * Every record named `name`. An empty list means the plugin is unpublished;
 * a registry without a plugins array is an error, not an empty registry.
 */
function findRegistryRecords(data: unknown, name: string): RegistryLookup {
  if (!isRecord(data) || !Array.isArray(data.plugins)) {
    return { ok: false, error: 'registry has no plugins array' };
  }
  return { ok: true, records: data.plugins.filter(isRegistryRecord).filter(r => r.name === name) };
}

function sourceOf(file: string, field: string): string {
  return `${path.basename(file)}:${field}`;
}

// ============================================================================
// EXTRACTORS
// ============================================================================

const extractors: Record<VersionLocationId, Extractor> = {
  manifest: (plugin) => {
    const file = plugin.paths.manifest;
    const source = sourceOf(file, 'version');
    try {
      const loaded = loadJson(file);
      if (!loaded) return { location: 'manifest', source, version: null, present: true, error: 'file not found' };
      const version = isRecord(loaded.data) ? asVersionString(loaded.data.version) : null;
      return { location: 'manifest', source, version, present: true };
    } catch (e) {
      return { location: 'manifest', source, version: null, present: true, error: errorMessage(e) };
    }
  },

  descriptor: (plugin) => {
    const file = plugin.paths.descriptor;
    const source = sourceOf(file, 'metadata.version');
    try {
      const content = loadText(file);
      if (content === null) return { location: 'descriptor', source, version: null, present: true, error: 'file not found' };
      return { location: 'descriptor', source, version: readMetadataVersion(content), present: true };
    } catch (e) {
      return { location: 'descriptor', source, version: null, present: true, error: errorMessage(e) };
    }
  },

  registry: (plugin) => {
    const file = plugin.paths.registry;
    const source = sourceOf(file, `plugins[${plugin.name}].version`);
    try {
      const loaded = loadJson(file);
      if (!loaded) return { location: 'registry', source, version: null, present: true, error: 'file not found' };
      const lookup = findRegistryRecords(loaded.data, plugin.name);
      if (!lookup.ok) return { location: 'registry', source, version: null, present: true, error: lookup.error };
      if (lookup.records.length === 0) return { location: 'registry', source, version: null, present: false };

      const versions = [...new Set(lookup.records.map(r => asVersionString(r.version)))];
      if (versions.length > 1) {
        const listed = versions.map(v => v ?? '(missing)').join(', ');
        return { location: 'registry', source, version: null, present: true, error: `duplicate records disagree: ${listed}` };
      }
      return { location: 'registry', source, version: versions[0], present: true };
    } catch (e) {
      return { location: 'registry', source, version: null, present: true, error: errorMessage(e) };
    }
  }
};

// ============================================================================
// BUMPERS
// ============================================================================

const bumpers: Record<VersionLocationId, Bumper> = {
  // JSON manifest - top-level version field
  manifest: (plugin, newVersion, dryRun) => {
    const file = plugin.paths.manifest;
    const base = { location: 'manifest' as const, newVersion, source: sourceOf(file, 'version') };
    const loaded = loadJson(file);
    if (!loaded) return { ...base, success: false, error: `File not found: ${file}` };
    if (!isRecord(loaded.data)) return { ...base, success: false, error: 'Manifest is not a JSON object' };

    const oldVersion = asVersionString(loaded.data.version);
    if (!dryRun) saveJson(file, { ...loaded.data, version: newVersion }, loaded.content);
    return { ...base, success: true, oldVersion };
  },

  // Markdown descriptor - only the metadata.version frontmatter line changes
  descriptor: (plugin, newVersion, dryRun) => {
    const file = plugin.paths.descriptor;
    const base = { location: 'descriptor' as const, newVersion, source: sourceOf(file, 'metadata.version') };
    const content = loadText(file);
    if (content === null) return { ...base, success: false, error: `File not found: ${file}` };

    const edit = setMetadataVersion(content, newVersion);
    if (!edit.replaced) {
      return { ...base, success: false, error: 'version field not found in frontmatter metadata section' };
    }
    if (!dryRun) saveText(file, edit.content);
    return { ...base, success: true, oldVersion: edit.previous };
  },

  // Registry - every record with the plugin's name, rewritten in place
  registry: (plugin, newVersion, dryRun) => {
    const file = plugin.paths.registry;
    const base = { location: 'registry' as const, newVersion, source: sourceOf(file, `plugins[${plugin.name}].version`) };
    const loaded = loadJson(file);
    if (!loaded) return { ...base, success: false, error: `File not found: ${file}` };

    const lookup = findRegistryRecords(loaded.data, plugin.name);
    if (!lookup.ok) return { ...base, success: false, error: lookup.error };
    if (lookup.records.length === 0) return { ...base, success: true, skipped: true };

    const oldVersion = asVersionString(lookup.records[0].version);
    for (const record of lookup.records) record.version = newVersion;
    if (!dryRun) saveJson(file, loaded.data, loaded.content);
    return { ...base, success: true, oldVersion };
  }
};

function runBumper(location: VersionLocationId, plugin: Plugin, newVersion: string, dryRun: boolean): BumperResult {
  try {
    return bumpers[location](plugin, newVersion, dryRun);
  } catch (e) {
    return {
      location,
      success: false,
      newVersion,
      source: location,
      error: `Bump failed: ${errorMessage(e)}`
    };
  }
}

// ============================================================================
// READS
// ============================================================================

/**
 * Read every version location of a plugin
 */
export function readLocations(plugin: Plugin): ExtractorResult[] {
  return VERSION_LOCATIONS.map(location => extractors[location](plugin));
}

/**
 * Current version from the manifest (the canonical read path)
 * @throws InvalidVersionFormatError when missing or malformed
 */
export function currentVersion(plugin: Plugin): SemanticVersion {
  const result = extractors.manifest(plugin);
  const source = `${plugin.name} ${result.source}`;
  if (result.version === null) {
    throw new InvalidVersionFormatError(result.error ? `(${result.error})` : '(missing)', source);
  }
  return parseVersion(result.version, source);
}

/**
 * Locations whose value differs from the expected one, or from the canonical
 * manifest value when no expectation is given. Absent locations are ignored.
 */
export function findDivergent(observed: ExtractorResult[], expected?: string): VersionLocationId[] {
  const present = observed.filter(o => o.present);
  const reference = expected ?? present.find(o => o.location === 'manifest')?.version ?? null;
  if (reference === null) return present.map(o => o.location);
  return present.filter(o => o.version !== reference).map(o => o.location);
}

/**
 * Read-only consistency check across all locations
 */
export function checkConsistency(plugin: Plugin): ConsistencyReport {
  const observed = readLocations(plugin);
  const divergent = findDivergent(observed);
  return { plugin: plugin.name, consistent: divergent.length === 0, observed, divergent };
}

// ============================================================================
// SYNCHRONIZATION
// ============================================================================

// What a re-read would observe had the computed writes landed
function projectWrites(observed: ExtractorResult[], writes: BumperResult[]): ExtractorResult[] {
  return observed.map(o => {
    const write = writes.find(w => w.location === o.location);
    if (!write?.success || write.skipped) return o;
    return { location: o.location, source: o.source, present: o.present, version: write.newVersion };
  });
}

/**
 * Write the new version to every location, then verify from disk.
 * A dry run computes the same writes and verifies their projection instead.
 * @throws InvalidVersionFormatError for a malformed target version
 * @throws ConsistencyViolationError when the re-read locations disagree
 */
export function updateLocations(
  plugin: Plugin,
  newVersion: SemanticVersion | string,
  { dryRun = false, logger = silentLogger }: SyncOptions = {}
): SyncResult {
  const version = typeof newVersion === 'string'
    ? formatVersion(parseVersion(newVersion, `${plugin.name} target version`))
    : formatVersion(newVersion);

  const writes = VERSION_LOCATIONS.map(location => runBumper(location, plugin, version, dryRun));

  for (const write of writes) {
    if (write.skipped) {
      logger.warn(`Plugin '${plugin.name}' has no registry entry (unpublished), skipping ${write.source}`);
    } else if (!write.success) {
      logger.error(`Plugin '${plugin.name}': ${write.location} write failed: ${write.error}`);
    } else {
      logger.debug(`${plugin.name}: ${write.source} ${write.oldVersion ?? '(none)'} → ${version}${dryRun ? ' (dry run)' : ''}`);
    }
  }

  const after = dryRun ? projectWrites(readLocations(plugin), writes) : readLocations(plugin);
  const verified = after.map(observed => {
    const failed = writes.find(w => w.location === observed.location && !w.success);
    return failed && !observed.error ? { ...observed, error: failed.error } : observed;
  });

  const divergent = findDivergent(verified, version);
  if (divergent.length > 0) {
    throw new ConsistencyViolationError(plugin.name, verified, divergent);
  }

  return { plugin: plugin.name, version, dryRun, writes, verified };
}

// ============================================================================
// REGISTRY-WIDE VERSION
// ============================================================================

/**
 * Registry's own version (metadata.version), null if absent
 */
export function readRegistryVersion(registryPath: string): string | null {
  const loaded = loadJson(registryPath);
  if (!loaded || !isRecord(loaded.data) || !isRecord(loaded.data.metadata)) return null;
  return asVersionString(loaded.data.metadata.version);
}

/**
 * Set the registry's own version (creates metadata when missing)
 */
export function updateRegistryVersion(registryPath: string, version: SemanticVersion, { dryRun = false }: SyncOptions = {}): string {
  const text = formatVersion(version);
  if (dryRun) return text;

  const loaded = loadJson(registryPath);
  if (!loaded || !isRecord(loaded.data)) {
    throw new InvalidVersionFormatError('(missing)', `${registryPath} metadata.version`);
  }
  const metadata = isRecord(loaded.data.metadata) ? loaded.data.metadata : {};
  saveJson(registryPath, { ...loaded.data, metadata: { ...metadata, version: text } }, loaded.content);

  const written = readRegistryVersion(registryPath);
  if (written !== text) {
    throw new ConsistencyViolationError('(registry)', [
      { location: 'registry', source: `${path.basename(registryPath)}:metadata.version`, version: written }
    ], ['registry']);
  }
  return text;
}
