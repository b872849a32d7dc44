/**
 * Release run result and hand-off types
 */
import type { ReleasePhase } from '../state-machine/states.js';
import type { BumpSeverity } from './plugin.js';

export type ReleaseStatus = 'released' | 'dry-run' | 'nothing-to-release';

export interface PluginRelease {
  name: string;
  previousVersion: string;
  newVersion: string;
  severity: BumpSeverity;
}

export interface RegistryRelease {
  previousVersion: string;
  newVersion: string;
  severity: BumpSeverity;
}

export interface ReleaseResult {
  status: ReleaseStatus;
  dryRun: boolean;
  /** Release date written into rolled changelog headers (YYYY-MM-DD) */
  date: string;
  targetBranch: string;
  /** Eligible plugins, name-sorted */
  plugins: PluginRelease[];
  /** Plugins with a changelog but nothing to release */
  excluded: string[];
  /** Plugin directories without a changelog */
  skipped: string[];
  /** Aggregated release notes ('' when nothing is released) */
  notes: string;
  registry: RegistryRelease | null;
  phases: ReleasePhase[];
  handoff?: HandoffOutcome;
}

/**
 * Everything the VCS/PR side needs, as plain data
 */
export interface HandoffRequest {
  branch: string;
  baseBranch: string;
  commitMessage: string;
  title: string;
  body: string;
  labels: string[];
  plugins: PluginRelease[];
  registryVersion: string;
}

export interface HandoffOutcome {
  branch: string;
  url?: string;
}

export interface ReleaseCollaborator {
  handOff(request: HandoffRequest): Promise<HandoffOutcome>;
}
