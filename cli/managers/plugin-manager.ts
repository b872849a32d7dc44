/**
 * Plugin Manager - Plugin discovery and changelog loading
 *
 * MANAGER: Reads the plugins directory; never writes.
 */
import { listDirs } from '../lib/fs-utils.js';
import { parseChangelog } from '../lib/changelog.js';
import { getPluginPaths, getPluginsDir } from './core-manager.js';
import { loadText } from './fileio-manager.js';
import type { ReleaseConfig } from '../lib/types/config.js';
import type { LoadedPlugin, Plugin } from '../lib/types/plugin.js';

/**
 * All plugin directories, name-sorted
 */
export function discoverPlugins(projectRoot: string, config: ReleaseConfig): Plugin[] {
  return listDirs(getPluginsDir(projectRoot, config))
    .map(name => ({ name, paths: getPluginPaths(projectRoot, config, name) }));
}

export function findPlugin(projectRoot: string, config: ReleaseConfig, name: string): Plugin | null {
  return discoverPlugins(projectRoot, config).find(p => p.name === name) ?? null;
}

/**
 * Raw changelog text, null when the file does not exist
 */
export function readChangelog(plugin: Plugin): string | null {
  return loadText(plugin.paths.changelog);
}

/**
 * Parse an already read changelog
 * @throws MalformedChangelogError when it has no Unreleased section
 */
export function parsePluginChangelog(plugin: Plugin, changelogText: string): LoadedPlugin {
  const changelog = parseChangelog(changelogText, { plugin: plugin.name, file: plugin.paths.changelog });
  return { ...plugin, changelogText, changelog };
}

/**
 * Read and parse a plugin's changelog (null when it has none)
 */
export function loadPlugin(plugin: Plugin): LoadedPlugin | null {
  const changelogText = readChangelog(plugin);
  return changelogText === null ? null : parsePluginChangelog(plugin, changelogText);
}
