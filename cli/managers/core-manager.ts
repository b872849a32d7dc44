/**
 * Core Manager - Project root detection and path resolution
 *
 * Handles:
 * - Project root (explicit --root, RELEASE_PROJECT env, or cwd)
 * - Placeholder resolution in configured paths (${plugin}, ${project})
 * - Per-plugin path sets
 *
 * MANAGER: Orchestrates config access for path computation.
 */
import path from 'path';
import type { ReleaseConfig } from '../lib/types/config.js';
import type { PluginPaths } from '../lib/types/plugin.js';

let _projectRoot: string | null = null;

/**
 * Set project root explicitly (--root flag)
 */
export function setProjectRoot(root: string): void {
  _projectRoot = path.resolve(root);
}

/**
 * Project root: explicit root, then RELEASE_PROJECT, then cwd
 */
export function findProjectRoot(): string {
  if (_projectRoot) return _projectRoot;
  const fromEnv = process.env.RELEASE_PROJECT;
  if (fromEnv) return path.resolve(fromEnv);
  return process.cwd();
}

/**
 * Resolve ${name} placeholders; unknown placeholders are kept as-is
 */
export function resolvePlaceholders(template: string, values: Record<string, string>): string {
  return template.replace(/\$\{([a-z_]+)\}/g, (match, name: string) => values[name] ?? match);
}

function resolveIn(base: string, template: string, values: Record<string, string>): string {
  const resolved = resolvePlaceholders(template, values);
  return path.isAbsolute(resolved) ? resolved : path.join(base, resolved);
}

export function getPluginsDir(projectRoot: string, config: ReleaseConfig): string {
  return resolveIn(projectRoot, config.paths.plugins, { project: projectRoot });
}

export function getRegistryPath(projectRoot: string, config: ReleaseConfig): string {
  return resolveIn(projectRoot, config.paths.registry, { project: projectRoot });
}

/**
 * All files a plugin's release touches
 */
export function getPluginPaths(projectRoot: string, config: ReleaseConfig, name: string): PluginPaths {
  const dir = path.join(getPluginsDir(projectRoot, config), name);
  const values = { project: projectRoot, plugin: name };
  return {
    dir,
    manifest: resolveIn(dir, config.paths.manifest, values),
    descriptor: resolveIn(dir, config.paths.descriptor, values),
    changelog: resolveIn(dir, config.paths.changelog, values),
    registry: getRegistryPath(projectRoot, config)
  };
}

/**
 * Print JSON to stdout
 */
export function jsonOut(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
