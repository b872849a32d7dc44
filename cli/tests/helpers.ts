/**
 * Test fixtures - throwaway plugin registries under os.tmpdir()
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Logger } from '../lib/log.js';
import { getPluginPaths } from '../managers/core-manager.js';
import { loadConfig } from '../managers/config-manager.js';
import type { Plugin } from '../lib/types/plugin.js';

export interface FixturePlugin {
  name: string;
  version: string;
  /** Descriptor metadata.version; null writes a metadata block without one */
  descriptorVersion?: string | null;
  /** Registry record version; null leaves the plugin out of the registry */
  registryVersion?: string | null;
  /** Text after the `## [Unreleased]` header; null writes no changelog */
  unreleased?: string | null;
}

export const REGISTRY_FILE = path.join('.claude-plugin', 'marketplace.json');

export function makeTempDir(prefix = 'plugin-release-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function descriptorText(name: string, version: string | null): string {
  const metadata = version === null ? '  author: test' : `  author: test\n  version: "${version}"`;
  return `---\nname: ${name}\ndescription: Test plugin ${name}\nmetadata:\n${metadata}\n---\n\n# ${name}\n`;
}

export function writePlugin(root: string, plugin: FixturePlugin): void {
  const dir = path.join(root, 'plugins', plugin.name);
  fs.mkdirSync(path.join(dir, 'skills', plugin.name), { recursive: true });
  fs.writeFileSync(
    path.join(dir, 'plugin.json'),
    JSON.stringify({ name: plugin.name, version: plugin.version }, null, 2) + '\n'
  );
  fs.writeFileSync(
    path.join(dir, 'skills', plugin.name, 'SKILL.md'),
    descriptorText(plugin.name, plugin.descriptorVersion === undefined ? plugin.version : plugin.descriptorVersion)
  );
  const unreleased = plugin.unreleased === undefined ? '' : plugin.unreleased;
  if (unreleased !== null) {
    fs.writeFileSync(path.join(dir, 'CHANGELOG.md'), `# Changelog\n\n## [Unreleased]\n${unreleased}`);
  }
}

export function writeRegistry(root: string, plugins: FixturePlugin[], registryVersion: string | null = '1.0.0'): void {
  const records = plugins
    .filter(p => p.registryVersion !== null)
    .map(p => ({ name: p.name, source: `./plugins/${p.name}`, version: p.registryVersion ?? p.version }));
  const registry = registryVersion === null
    ? { name: 'test-registry', plugins: records }
    : { name: 'test-registry', metadata: { version: registryVersion }, plugins: records };
  fs.mkdirSync(path.join(root, '.claude-plugin'), { recursive: true });
  fs.writeFileSync(path.join(root, REGISTRY_FILE), JSON.stringify(registry, null, 2) + '\n');
}

/**
 * Project root with the given plugins (written in array order) and registry
 */
export function createProject(plugins: FixturePlugin[], registryVersion: string | null = '1.0.0'): string {
  const root = makeTempDir();
  for (const plugin of plugins) writePlugin(root, plugin);
  writeRegistry(root, plugins, registryVersion);
  return root;
}

export function pluginRef(root: string, name: string): Plugin {
  return { name, paths: getPluginPaths(root, loadConfig(root), name) };
}

export function readText(root: string, ...parts: string[]): string {
  return fs.readFileSync(path.join(root, ...parts), 'utf8');
}

export function readJson(root: string, ...parts: string[]): unknown {
  return JSON.parse(readText(root, ...parts));
}

/**
 * Every file under a directory with its content, for before/after comparisons
 */
export function snapshotTree(root: string): Record<string, string> {
  const files: Record<string, string> = {};
  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else files[path.relative(root, full)] = fs.readFileSync(full, 'utf8');
    }
  };
  walk(root);
  return files;
}

export interface RecordingLogger extends Logger {
  messages: Record<'debug' | 'info' | 'success' | 'warn' | 'error', string[]>;
}

export function recordingLogger(): RecordingLogger {
  const messages: RecordingLogger['messages'] = { debug: [], info: [], success: [], warn: [], error: [] };
  return {
    messages,
    debug: (m) => { messages.debug.push(m); },
    info: (m) => { messages.info.push(m); },
    success: (m) => { messages.success.push(m); },
    warn: (m) => { messages.warn.push(m); },
    error: (m) => { messages.error.push(m); }
  };
}
