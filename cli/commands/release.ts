/**
 * Release commands - prepare a release, plan one plugin
 */
import type { Command } from 'commander';
import { isReleaseDate } from '../lib/changelog.js';
import { ConfigError } from '../lib/errors.js';
import { ConsoleLogger } from '../lib/log.js';
import { GitForgeCollaborator } from '../lib/pr.js';
import type { ReleaseResult } from '../lib/types/release.js';
import { loadConfig } from '../managers/config-manager.js';
import { findProjectRoot, jsonOut } from '../managers/core-manager.js';
import { planPlugin, prepareRelease } from '../operations/release-ops.js';

interface PrepareOptions {
  dryRun?: boolean;
  targetBranch?: string;
  date?: string;
  json?: boolean;
  openPr?: boolean;
}

function envFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

function printResult(result: ReleaseResult): void {
  if (result.status === 'nothing-to-release') {
    console.log('Nothing to release.');
    return;
  }

  const heading = result.dryRun ? 'Changes that would be made:' : 'Released:';
  console.log(`\n${heading}`);
  for (const plugin of result.plugins) {
    console.log(`  - ${plugin.name}: ${plugin.previousVersion} → ${plugin.newVersion} (${plugin.severity})`);
  }
  if (result.registry) {
    console.log(`  - Registry: ${result.registry.previousVersion} → ${result.registry.newVersion} (${result.registry.severity})`);
  }
  console.log(`\nTarget branch: ${result.targetBranch}`);
  if (result.handoff) {
    console.log(`Release branch: ${result.handoff.branch}`);
    if (result.handoff.url) console.log(`Pull request: ${result.handoff.url}`);
  }
  if (result.dryRun) {
    console.log('\nRelease notes preview:\n');
    console.log(result.notes);
  }
}

/**
 * Register release commands
 */
export function registerReleaseCommands(program: Command): void {
  program.command('prepare')
    .description('Bump every plugin with unreleased changes, roll changelogs, aggregate release notes')
    .option('--dry-run', 'Compute and report without writing (env: DRY_RUN=true)')
    .option('--target-branch <branch>', 'Base branch of the release PR (env: TARGET_BRANCH)')
    .option('--date <date>', 'Release date YYYY-MM-DD (default: today)')
    .option('--open-pr', 'Create the release branch, commit, push and open a PR')
    .option('--json', 'JSON output')
    .action(async (options: PrepareOptions) => {
      if (options.date !== undefined && !isReleaseDate(options.date)) {
        throw new ConfigError(`Invalid --date: "${options.date}". Expected YYYY-MM-DD`);
      }

      const projectRoot = findProjectRoot();
      const config = loadConfig(projectRoot);
      const logger = new ConsoleLogger({ level: config.logging.level, stderrOnly: options.json });
      const dryRun = options.dryRun ?? envFlag(process.env.DRY_RUN);

      const collaborator = options.openPr && !dryRun
        ? new GitForgeCollaborator(projectRoot, undefined, logger)
        : undefined;
      if (collaborator && !(await collaborator.checkCli())) {
        throw new ConfigError('GitHub CLI (gh) not found; install it or drop --open-pr');
      }

      const result = await prepareRelease({
        projectRoot,
        config,
        dryRun,
        targetBranch: options.targetBranch ?? (process.env.TARGET_BRANCH || undefined),
        date: options.date,
        logger,
        collaborator
      });

      if (options.json) {
        jsonOut(result);
        return;
      }
      printResult(result);
    });

  program.command('plan <plugin>')
    .description('Show the bump severity and projected version of one plugin')
    .option('--json', 'JSON output')
    .action((name: string, options: { json?: boolean }) => {
      const projectRoot = findProjectRoot();
      const plan = planPlugin(projectRoot, loadConfig(projectRoot), name);
      if (!plan) throw new ConfigError(`Plugin not found: ${name}`);

      if (options.json) {
        jsonOut(plan);
        return;
      }
      for (const warning of plan.warnings) console.error(`⚠ ${warning}`);
      if (plan.severity === 'none') {
        console.log(`${plan.name}: ${plan.currentVersion} (no unreleased changes)`);
      } else {
        console.log(`${plan.name}: ${plan.currentVersion} → ${plan.nextVersion} (${plan.severity})`);
      }
    });
}
