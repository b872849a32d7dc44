/**
 * Pull Request Hand-off
 *
 * Branch, commit, push and open the release PR with git and the GitHub CLI.
 */
import { execa } from 'execa';
import { errorMessage } from './errors.js';
import { silentLogger } from './log.js';
import type { Logger } from './log.js';
import type { HandoffOutcome, HandoffRequest, ReleaseCollaborator } from './types/release.js';

export interface CommandResult {
  stdout: string;
}

export type CommandRunner = (file: string, args: string[], options: { cwd: string }) => Promise<CommandResult>;

export const execaRunner: CommandRunner = async (file, args, { cwd }) => {
  const { stdout } = await execa(file, args, { cwd });
  return { stdout };
};

/**
 * gh invocation for `gh pr create`
 */
export function prCreateArgs(request: HandoffRequest): string[] {
  return [
    'pr', 'create',
    '--base', request.baseBranch,
    '--head', request.branch,
    '--title', request.title,
    '--body', request.body,
    ...request.labels.flatMap(label => ['--label', label])
  ];
}

export class GitForgeCollaborator implements ReleaseCollaborator {
  constructor(
    private readonly cwd: string,
    private readonly run: CommandRunner = execaRunner,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Check the GitHub CLI is installed
   */
  async checkCli(): Promise<boolean> {
    try {
      await this.run('gh', ['--version'], { cwd: this.cwd });
      return true;
    } catch {
      return false;
    }
  }

  async handOff(request: HandoffRequest): Promise<HandoffOutcome> {
    this.logger.info(`Creating release branch: ${request.branch}`);
    await this.git('checkout', '-b', request.branch);
    await this.git('add', '-A');
    await this.git('commit', '-m', request.commitMessage);

    this.logger.info('Pushing release branch...');
    await this.git('push', '-u', 'origin', request.branch);

    await this.ensureLabels(request.labels);

    this.logger.info('Creating pull request...');
    const { stdout } = await this.run('gh', prCreateArgs(request), { cwd: this.cwd });
    const url = stdout.trim();
    return url ? { branch: request.branch, url } : { branch: request.branch };
  }

  private async git(...args: string[]): Promise<void> {
    await this.run('git', args, { cwd: this.cwd });
  }

  // `gh label create` fails when the label exists; that is expected
  private async ensureLabels(labels: string[]): Promise<void> {
    for (const label of labels) {
      try {
        await this.run('gh', ['label', 'create', label], { cwd: this.cwd });
      } catch (e) {
        this.logger.debug(`label '${label}' not created: ${errorMessage(e)}`);
      }
    }
  }
}
