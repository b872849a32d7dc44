/**
 * Hand-off request assembly
 *
 * PURE LIB: turns a finished release run into branch, commit and PR data.
 */
import type { ReleaseConfig } from './types/config.js';
import type { HandoffRequest, ReleaseResult } from './types/release.js';

export function releaseBranchName(config: ReleaseConfig, registryVersion: string): string {
  return `${config.release.branch_prefix}${registryVersion}`;
}

/**
 * Commit message: subject, the per-plugin bumps, then the registry bump
 */
export function buildCommitMessage(result: ReleaseResult): string {
  if (!result.registry) throw new Error('No registry version to release');
  const { newVersion, severity } = result.registry;
  return [
    `chore: prepare release v${newVersion}`,
    '',
    'Automated version bumps:',
    ...result.plugins.map(p => `- ${p.name}: ${p.newVersion} (${p.severity})`),
    '',
    `Registry version: ${newVersion} (${severity})`
  ].join('\n');
}

/**
 * @throws Error when the run released nothing
 */
export function buildHandoffRequest(result: ReleaseResult, config: ReleaseConfig): HandoffRequest {
  if (!result.registry || result.plugins.length === 0) {
    throw new Error(`Nothing to hand off (status: ${result.status})`);
  }
  const registryVersion = result.registry.newVersion;
  return {
    branch: releaseBranchName(config, registryVersion),
    baseBranch: result.targetBranch,
    commitMessage: buildCommitMessage(result),
    title: `Release v${registryVersion}`,
    body: result.notes,
    labels: [...config.release.labels],
    plugins: result.plugins,
    registryVersion
  };
}
