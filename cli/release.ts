#!/usr/bin/env node
/**
 * plugin-release CLI - Release automation for a plugin registry
 *
 * Commands:
 *   plugin-release prepare [--dry-run] [--target-branch <b>] [--date <d>] [--open-pr] [--json]
 *   plugin-release check [--json]
 *   plugin-release plan <plugin> [--json]
 *   plugin-release config [--json]
 *
 * Project root detection:
 *   1. --root <path> flag (highest priority)
 *   2. RELEASE_PROJECT environment variable
 *   3. Current directory
 *
 * Config overrides:
 *   --with-config key=value              # Override any config value (repeatable)
 *
 * Environment:
 *   DRY_RUN=true          default for --dry-run
 *   TARGET_BRANCH=<b>     default for --target-branch
 *
 * Exit code: 0 on success or nothing to release, 1 on any failure.
 */
import fs from 'fs';
import { program } from 'commander';
import { setProjectRoot } from './managers/core-manager.js';
import { setConfigOverrides, parseConfigOverride } from './managers/config-manager.js';
import type { ConfigKey } from './managers/config-manager.js';
import type { ConfigValue } from './lib/types/config.js';
import { errorMessage } from './lib/errors.js';
import { registerReleaseCommands } from './commands/release.js';
import { registerCheckCommands } from './commands/check.js';
import { registerConfigCommands } from './commands/config.js';

const args = process.argv.slice(2);

// Extract --root flag manually (before commander parses)
const rootIdx = args.indexOf('--root');
if (rootIdx !== -1) {
  const rootPath = args[rootIdx + 1];
  if (!rootPath) {
    console.error('--root requires a path');
    process.exit(1);
  }
  setProjectRoot(rootPath);
  args.splice(rootIdx, 2);
}

// Extract --with-config flags (repeatable)
const configOverrides: Partial<Record<ConfigKey, ConfigValue>> = {};
let configIdx = args.indexOf('--with-config');
while (configIdx !== -1) {
  const raw = args[configIdx + 1];
  if (!raw) {
    console.error('--with-config requires a value (e.g., --with-config release.target_branch=develop)');
    process.exit(1);
  }
  const parsed = parseConfigOverride(raw);
  if (!parsed) process.exit(1);
  configOverrides[parsed.key] = parsed.value;
  args.splice(configIdx, 2);
  configIdx = args.indexOf('--with-config');
}

if (Object.keys(configOverrides).length > 0) {
  setConfigOverrides(configOverrides);
}

function cliVersion(): string {
  // Source (cli/) and build (dist/cli/) sit at different depths
  for (const rel of ['../package.json', '../../package.json']) {
    const file = new URL(rel, import.meta.url);
    if (!fs.existsSync(file)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

program
  .name('plugin-release')
  .description('Release automation for a plugin registry: version sync, changelog roll, release notes')
  .version(cliVersion())
  .addHelpText('after', `
Global Options (before command):
  --root <path>              Project root directory (overrides RELEASE_PROJECT)
  --with-config <key=value>  Override config value (repeatable)
`);

registerReleaseCommands(program);
registerCheckCommands(program);
registerConfigCommands(program);

if (args.length === 0) {
  program.help();
}

program.parseAsync(['node', 'plugin-release', ...args]).catch((e: unknown) => {
  console.error(`✗ ${errorMessage(e)}`);
  process.exit(1);
});
