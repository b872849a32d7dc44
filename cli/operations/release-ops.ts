/**
 * Release Operations - One release run over every plugin
 *
 *   discover → evaluate → synchronize → roll_changelogs → aggregate_notes → handoff → done
 *
 * EVALUATE failures abort before any write. A SYNCHRONIZE failure leaves the
 * plugins already processed at their new versions and names them in the error.
 * A dry run takes the same path with every write turned into a no-op.
 */
import path from 'path';
import { aggregateSeverity, documentSeverity } from '../lib/bump.js';
import {
  changelogWarnings,
  extractVersionSection,
  renderChangelog,
  rollUnreleasedToVersion
} from '../lib/changelog.js';
import { InvalidVersionFormatError, SynchronizationAbortedError, errorMessage } from '../lib/errors.js';
import { buildHandoffRequest } from '../lib/handoff.js';
import { silentLogger } from '../lib/log.js';
import type { Logger } from '../lib/log.js';
import { renderReleaseNotes } from '../lib/notes.js';
import { applyBump, formatVersion, parseVersion } from '../lib/semver.js';
import { ReleaseStateMachine } from '../lib/state-machine/machine.js';
import { ReleasePhase } from '../lib/state-machine/states.js';
import type { ReleaseConfig } from '../lib/types/config.js';
import type { BumpSeverity, ChangelogDocument, LoadedPlugin, Plugin, SemanticVersion } from '../lib/types/plugin.js';
import type { PluginRelease, RegistryRelease, ReleaseCollaborator, ReleaseResult } from '../lib/types/release.js';
import { getRegistryPath } from '../managers/core-manager.js';
import { loadJson, saveText } from '../managers/fileio-manager.js';
import { discoverPlugins, findPlugin, loadPlugin, parsePluginChangelog, readChangelog } from '../managers/plugin-manager.js';
import {
  checkConsistency,
  currentVersion,
  readRegistryVersion,
  updateLocations,
  updateRegistryVersion
} from '../managers/version-manager.js';
import type { ConsistencyReport, SyncOptions, SyncResult } from '../managers/version-manager.js';

// ============================================================================
// PREPARE RELEASE
// ============================================================================

export type Synchronizer = (plugin: Plugin, version: SemanticVersion, options: SyncOptions) => SyncResult;

export interface PrepareReleaseOptions {
  projectRoot: string;
  config: ReleaseConfig;
  dryRun?: boolean;
  /** Base branch of the release PR (defaults to release.target_branch) */
  targetBranch?: string;
  /** Release date, YYYY-MM-DD (defaults to today from `now`) */
  date?: string;
  now?: () => Date;
  logger?: Logger;
  /** Receives the hand-off request on a real run */
  collaborator?: ReleaseCollaborator;
  synchronize?: Synchronizer;
}

interface Candidate {
  plugin: LoadedPlugin;
  severity: BumpSeverity;
  current: SemanticVersion;
  next: SemanticVersion;
}

interface Evaluation {
  candidates: Candidate[];
  excluded: string[];
  registryPath: string;
  registryCurrent: SemanticVersion | null;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatReleaseDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function discover(options: PrepareReleaseOptions, logger: Logger): { found: Array<{ plugin: Plugin; text: string }>; skipped: string[] } {
  const found: Array<{ plugin: Plugin; text: string }> = [];
  const skipped: string[] = [];

  for (const plugin of discoverPlugins(options.projectRoot, options.config)) {
    const text = readChangelog(plugin);
    if (text === null) {
      logger.warn(`No changelog found for plugin '${plugin.name}', skipping`);
      skipped.push(plugin.name);
      continue;
    }
    found.push({ plugin, text });
  }
  return { found, skipped };
}

function evaluate(
  found: Array<{ plugin: Plugin; text: string }>,
  options: PrepareReleaseOptions,
  logger: Logger
): Evaluation {
  // Parse everything first: a malformed changelog anywhere aborts the run
  const loaded = found.map(({ plugin, text }) => parsePluginChangelog(plugin, text));

  const candidates: Candidate[] = [];
  const excluded: string[] = [];
  for (const plugin of loaded) {
    for (const warning of changelogWarnings(plugin.changelog)) {
      logger.warn(`${plugin.name}: ${warning}`);
    }

    const severity = documentSeverity(plugin.changelog);
    if (severity === 'none') {
      logger.info(`Plugin '${plugin.name}': no unreleased changes, skipping`);
      excluded.push(plugin.name);
      continue;
    }

    const current = currentVersion(plugin);
    const drift = checkConsistency(plugin);
    if (!drift.consistent) {
      const observed = drift.observed.map(o => `${o.location}=${o.version ?? '(missing)'}`).join(', ');
      logger.warn(`Plugin '${plugin.name}' has diverging versions (${observed}); all will be set to the new version`);
    }
    candidates.push({ plugin, severity, current, next: applyBump(current, severity) });
  }

  const registryPath = getRegistryPath(options.projectRoot, options.config);
  if (candidates.length === 0) {
    return { candidates, excluded, registryPath, registryCurrent: null };
  }

  const source = `${path.basename(registryPath)}:metadata.version`;
  const registryText = readRegistryVersion(registryPath);
  if (registryText === null) {
    throw new InvalidVersionFormatError(loadJson(registryPath) === null ? '(file not found)' : '(missing)', source);
  }
  return { candidates, excluded, registryPath, registryCurrent: parseVersion(registryText, source) };
}

function nothingToRelease(options: PrepareReleaseOptions, date: string, targetBranch: string, skipped: string[], excluded: string[]): ReleaseResult {
  return {
    status: 'nothing-to-release',
    dryRun: options.dryRun ?? false,
    date,
    targetBranch,
    plugins: [],
    excluded,
    skipped,
    notes: '',
    registry: null,
    phases: []
  };
}

/**
 * Run one release over every plugin under paths.plugins
 * @throws MalformedChangelogError, InvalidVersionFormatError (before any write)
 * @throws SynchronizationAbortedError (after some plugins were written)
 */
export async function prepareRelease(options: PrepareReleaseOptions): Promise<ReleaseResult> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const machine = new ReleaseStateMachine(logger, now);

  try {
    return await runRelease(machine, options, logger, now);
  } catch (e) {
    machine.fail(errorMessage(e));
    throw e;
  }
}

async function runRelease(
  machine: ReleaseStateMachine,
  options: PrepareReleaseOptions,
  logger: Logger,
  now: () => Date
): Promise<ReleaseResult> {
  const dryRun = options.dryRun ?? false;
  const date = options.date ?? formatReleaseDate(now());
  const targetBranch = options.targetBranch ?? options.config.release.target_branch;
  const synchronize = options.synchronize ?? updateLocations;

  // DISCOVER
  const { found, skipped } = discover(options, logger);
  machine.transition(ReleasePhase.EVALUATE, `${found.length} plugin(s) with a changelog`);

  // EVALUATE
  const { candidates, excluded, registryPath, registryCurrent } = evaluate(found, options, logger);
  if (candidates.length === 0 || registryCurrent === null) {
    machine.transition(ReleasePhase.DONE, 'nothing to release');
    logger.warn('No plugins have unreleased changes. Nothing to release.');
    return { ...nothingToRelease(options, date, targetBranch, skipped, excluded), phases: machine.path() };
  }
  machine.transition(ReleasePhase.SYNCHRONIZE, `${candidates.length} eligible plugin(s)`);

  // SYNCHRONIZE
  const completed: string[] = [];
  for (const candidate of candidates) {
    const { name } = candidate.plugin;
    try {
      synchronize(candidate.plugin, candidate.next, { dryRun, logger });
    } catch (e) {
      const failure = e instanceof Error ? e : new Error(String(e));
      throw new SynchronizationAbortedError([...completed], name, failure);
    }
    completed.push(name);
    logger.success(`Plugin '${name}': ${formatVersion(candidate.current)} → ${formatVersion(candidate.next)} (${candidate.severity})`);
  }
  machine.transition(ReleasePhase.ROLL_CHANGELOGS);

  // ROLL_CHANGELOGS
  const rolled = new Map<string, ChangelogDocument>();
  for (const candidate of candidates) {
    const doc = rollUnreleasedToVersion(candidate.plugin.changelog, candidate.next, date);
    if (!dryRun) saveText(candidate.plugin.paths.changelog, renderChangelog(doc));
    rolled.set(candidate.plugin.name, doc);
    logger.debug(`${candidate.plugin.name}: changelog rolled to ${formatVersion(candidate.next)}${dryRun ? ' (dry run)' : ''}`);
  }
  machine.transition(ReleasePhase.AGGREGATE_NOTES);

  // AGGREGATE_NOTES
  const notes = renderReleaseNotes(candidates.map(({ plugin, next }) => {
    const doc = rolled.get(plugin.name);
    const section = doc ? extractVersionSection(doc, next) : null;
    return { plugin: plugin.name, version: formatVersion(next), body: section?.body ?? '' };
  }));
  machine.transition(ReleasePhase.HANDOFF);

  // HANDOFF
  const severity = aggregateSeverity(candidates.map(c => c.severity));
  const registryNext = applyBump(registryCurrent, severity);
  updateRegistryVersion(registryPath, registryNext, { dryRun });
  const registry: RegistryRelease = {
    previousVersion: formatVersion(registryCurrent),
    newVersion: formatVersion(registryNext),
    severity
  };
  logger.info(`Registry version: ${registry.previousVersion} → ${registry.newVersion} (${severity})`);

  const plugins: PluginRelease[] = candidates.map(c => ({
    name: c.plugin.name,
    previousVersion: formatVersion(c.current),
    newVersion: formatVersion(c.next),
    severity: c.severity
  }));

  const result: ReleaseResult = {
    status: dryRun ? 'dry-run' : 'released',
    dryRun,
    date,
    targetBranch,
    plugins,
    excluded,
    skipped,
    notes,
    registry,
    phases: []
  };

  if (options.collaborator && !dryRun) {
    result.handoff = await options.collaborator.handOff(buildHandoffRequest(result, options.config));
  }

  machine.transition(ReleasePhase.DONE);
  return { ...result, phases: machine.path() };
}

// ============================================================================
// PLAN / CHECK
// ============================================================================

export interface PluginPlan {
  name: string;
  severity: BumpSeverity;
  currentVersion: string;
  /** Same as currentVersion when severity is 'none' */
  nextVersion: string;
  warnings: string[];
}

/**
 * Severity and projected version of one plugin, read-only
 * @returns null when the plugin does not exist
 * @throws MalformedChangelogError, InvalidVersionFormatError
 */
export function planPlugin(projectRoot: string, config: ReleaseConfig, name: string): PluginPlan | null {
  const plugin = findPlugin(projectRoot, config, name);
  if (!plugin) return null;

  const loaded = loadPlugin(plugin);
  const current = currentVersion(plugin);
  const severity = loaded ? documentSeverity(loaded.changelog) : 'none';
  return {
    name,
    severity,
    currentVersion: formatVersion(current),
    nextVersion: formatVersion(applyBump(current, severity)),
    warnings: loaded ? changelogWarnings(loaded.changelog) : ['No changelog file']
  };
}

/**
 * Three-location consistency report for every plugin
 */
export function checkVersions(projectRoot: string, config: ReleaseConfig): ConsistencyReport[] {
  return discoverPlugins(projectRoot, config).map(plugin => checkConsistency(plugin));
}
