import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { prepareRelease, planPlugin, checkVersions, formatReleaseDate } from '../operations/release-ops.js';
import type { PrepareReleaseOptions } from '../operations/release-ops.js';
import {
  ConsistencyViolationError,
  InvalidDocumentError,
  InvalidVersionFormatError,
  MalformedChangelogError,
  SynchronizationAbortedError
} from '../lib/errors.js';
import { loadConfig } from '../managers/config-manager.js';
import { updateLocations } from '../managers/version-manager.js';
import type { HandoffRequest, ReleaseCollaborator } from '../lib/types/release.js';
import type { FixturePlugin } from './helpers.js';
import {
  REGISTRY_FILE,
  createProject,
  makeTempDir,
  pluginRef,
  readJson,
  readText,
  recordingLogger,
  removeDir,
  snapshotTree,
  writePlugin,
  writeRegistry
} from './helpers.js';

const DATE = '2026-10-19';

const ALPHA: FixturePlugin = { name: 'alpha', version: '1.2.3', unreleased: '### Added\n- x\n### Fixed\n- y\n' };
const BETA: FixturePlugin = { name: 'beta', version: '2.0.0', unreleased: '### Removed\n- z\n' };
const GAMMA: FixturePlugin = { name: 'gamma', version: '0.1.0', unreleased: '' };
const DELTA: FixturePlugin = { name: 'delta', version: '0.0.1', unreleased: null };

const EXPECTED_NOTES = [
  '# Release Notes',
  '',
  '## alpha (1.3.0)',
  '',
  '### Added',
  '- x',
  '### Fixed',
  '- y',
  '',
  '## beta (3.0.0)',
  '',
  '### Removed',
  '- z',
  ''
].join('\n');

const roots: string[] = [];

function project(plugins: FixturePlugin[], registryVersion: string | null = '1.0.0'): string {
  const root = createProject(plugins, registryVersion);
  roots.push(root);
  return root;
}

function options(root: string, extra: Partial<PrepareReleaseOptions> = {}): PrepareReleaseOptions {
  return { projectRoot: root, config: loadConfig(root), date: DATE, ...extra };
}

class RecordingCollaborator implements ReleaseCollaborator {
  requests: HandoffRequest[] = [];

  async handOff(request: HandoffRequest) {
    this.requests.push(request);
    return { branch: request.branch, url: 'https://forge.example.test/pulls/1' };
  }
}

afterEach(() => {
  for (const root of roots.splice(0)) removeDir(root);
});

describe('prepareRelease', () => {
  it('releases every plugin with pending changes', async () => {
    const root = project([ALPHA, BETA, GAMMA, DELTA]);
    const gammaBefore = readText(root, 'plugins', 'gamma', 'CHANGELOG.md');
    const logger = recordingLogger();

    const result = await prepareRelease(options(root, { logger }));

    expect(result.status).toBe('released');
    expect(result.plugins).toEqual([
      { name: 'alpha', previousVersion: '1.2.3', newVersion: '1.3.0', severity: 'minor' },
      { name: 'beta', previousVersion: '2.0.0', newVersion: '3.0.0', severity: 'major' }
    ]);
    expect(result.excluded).toEqual(['gamma']);
    expect(result.skipped).toEqual(['delta']);
    expect(result.registry).toEqual({ previousVersion: '1.0.0', newVersion: '2.0.0', severity: 'major' });
    expect(result.notes).toBe(EXPECTED_NOTES);
    expect(result.targetBranch).toBe('main');
    expect(result.phases).toEqual([
      'discover', 'evaluate', 'synchronize', 'roll_changelogs', 'aggregate_notes', 'handoff', 'done'
    ]);
    expect(logger.messages.warn).toEqual(["No changelog found for plugin 'delta', skipping"]);

    expect(readText(root, 'plugins', 'alpha', 'CHANGELOG.md')).toBe(
      `# Changelog\n\n## [Unreleased]\n\n## [1.3.0] - ${DATE}\n### Added\n- x\n### Fixed\n- y\n`
    );
    expect(readText(root, 'plugins', 'gamma', 'CHANGELOG.md')).toBe(gammaBefore);
    expect(readJson(root, 'plugins', 'beta', 'plugin.json')).toEqual({ name: 'beta', version: '3.0.0' });
    expect(readJson(root, REGISTRY_FILE)).toEqual({
      name: 'test-registry',
      metadata: { version: '2.0.0' },
      plugins: [
        { name: 'alpha', source: './plugins/alpha', version: '1.3.0' },
        { name: 'beta', source: './plugins/beta', version: '3.0.0' },
        { name: 'gamma', source: './plugins/gamma', version: '0.1.0' },
        { name: 'delta', source: './plugins/delta', version: '0.0.1' }
      ]
    });
  });

  it('bumps 1.2.3 to 1.3.0 for Added + Fixed and 2.0.0 to 3.0.0 for Removed', async () => {
    const root = project([ALPHA, BETA]);
    await prepareRelease(options(root));
    expect(readJson(root, 'plugins', 'alpha', 'plugin.json')).toEqual({ name: 'alpha', version: '1.3.0' });
    expect(readText(root, 'plugins', 'alpha', 'skills', 'alpha', 'SKILL.md')).toContain('  version: "1.3.0"\n');
    expect(readJson(root, 'plugins', 'beta', 'plugin.json')).toEqual({ name: 'beta', version: '3.0.0' });
  });

  it('hands plain data to the collaborator', async () => {
    const root = project([ALPHA, BETA]);
    const collaborator = new RecordingCollaborator();

    const result = await prepareRelease(options(root, { collaborator, targetBranch: 'develop' }));

    expect(result.handoff).toEqual({ branch: 'release/v2.0.0', url: 'https://forge.example.test/pulls/1' });
    expect(collaborator.requests).toHaveLength(1);
    const [request] = collaborator.requests;
    expect(request.branch).toBe('release/v2.0.0');
    expect(request.baseBranch).toBe('develop');
    expect(request.title).toBe('Release v2.0.0');
    expect(request.body).toBe(EXPECTED_NOTES);
    expect(request.labels).toEqual(['release', 'autogenerated']);
    expect(request.registryVersion).toBe('2.0.0');
    expect(request.commitMessage).toBe([
      'chore: prepare release v2.0.0',
      '',
      'Automated version bumps:',
      '- alpha: 1.3.0 (minor)',
      '- beta: 3.0.0 (major)',
      '',
      'Registry version: 2.0.0 (major)'
    ].join('\n'));
  });

  it('reports nothing to release when every Unreleased section is empty', async () => {
    const root = project([GAMMA]);
    const before = snapshotTree(root);
    const collaborator = new RecordingCollaborator();

    const result = await prepareRelease(options(root, { collaborator }));

    expect(result.status).toBe('nothing-to-release');
    expect(result.plugins).toEqual([]);
    expect(result.excluded).toEqual(['gamma']);
    expect(result.registry).toBeNull();
    expect(result.notes).toBe('');
    expect(result.phases).toEqual(['discover', 'evaluate', 'done']);
    expect(collaborator.requests).toEqual([]);
    expect(snapshotTree(root)).toEqual(before);
  });

  it('overwrites stale version locations with the computed version', async () => {
    const root = project([
      { name: 'alpha', version: '1.0.0', descriptorVersion: '1.0.0', registryVersion: '1.0.1', unreleased: '### Added\n- x\n' }
    ]);

    const result = await prepareRelease(options(root));

    expect(result.plugins[0].newVersion).toBe('1.1.0');
    expect(readJson(root, REGISTRY_FILE)).toMatchObject({
      plugins: [{ name: 'alpha', version: '1.1.0' }]
    });
  });

  it('aborts on a malformed changelog before writing anything', async () => {
    const root = project([ALPHA, BETA]);
    fs.writeFileSync(path.join(root, 'plugins', 'beta', 'CHANGELOG.md'), '# Changelog\n\n## [2.0.0] - 2025-01-01\n### Added\n- initial\n');
    const before = snapshotTree(root);

    await expect(prepareRelease(options(root))).rejects.toThrow(MalformedChangelogError);
    await expect(prepareRelease(options(root))).rejects.toThrow("Malformed changelog for plugin 'beta'");
    expect(snapshotTree(root)).toEqual(before);
  });

  it('aborts on a malformed current version before writing anything', async () => {
    const root = project([{ ...ALPHA, version: 'latest' }, BETA]);
    const before = snapshotTree(root);

    await expect(prepareRelease(options(root))).rejects.toThrow(InvalidVersionFormatError);
    expect(snapshotTree(root)).toEqual(before);
  });

  it('requires a registry version when something is released', async () => {
    const root = project([ALPHA], null);
    const before = snapshotTree(root);

    await expect(prepareRelease(options(root))).rejects.toThrow(
      'Invalid semantic version format: "(missing)" (marketplace.json:metadata.version). Expected X.Y.Z'
    );
    expect(snapshotTree(root)).toEqual(before);
  });

  it('stops before any write when the registry file is missing', async () => {
    const root = project([ALPHA, BETA]);
    fs.rmSync(path.join(root, REGISTRY_FILE));
    const before = snapshotTree(root);

    await expect(prepareRelease(options(root))).rejects.toThrow(
      'Invalid semantic version format: "(file not found)" (marketplace.json:metadata.version). Expected X.Y.Z'
    );
    expect(snapshotTree(root)).toEqual(before);
  });

  it('reports a missing registry file as a consistency violation when synchronizing', () => {
    const root = project([ALPHA]);
    fs.rmSync(path.join(root, REGISTRY_FILE));

    let caught: unknown;
    try {
      updateLocations(pluginRef(root, 'alpha'), '1.3.0');
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ConsistencyViolationError);
    if (!(caught instanceof ConsistencyViolationError)) return;
    expect(caught.divergent).toEqual(['registry']);
    expect(caught.observed[2].error).toBe('file not found');
  });

  it('names the registry file when it is not valid JSON', async () => {
    const root = project([ALPHA]);
    const registryPath = path.join(root, REGISTRY_FILE);
    fs.writeFileSync(registryPath, '{\n  "name": "test-registry",\n  "metadata": {');
    const before = snapshotTree(root);

    await expect(prepareRelease(options(root))).rejects.toThrow(InvalidDocumentError);
    await expect(prepareRelease(options(root))).rejects.toThrow(`Invalid JSON document ${registryPath}: `);
    expect(snapshotTree(root)).toEqual(before);
  });

  it('names the synchronized plugins when synchronization aborts', async () => {
    const root = project([ALPHA, { ...BETA, descriptorVersion: null }, { name: 'gamma', version: '0.1.0', unreleased: '### Fixed\n- g\n' }]);

    let caught: unknown;
    try {
      await prepareRelease(options(root));
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(SynchronizationAbortedError);
    if (!(caught instanceof SynchronizationAbortedError)) return;
    expect(caught.completed).toEqual(['alpha']);
    expect(caught.failedPlugin).toBe('beta');
    expect(caught.failure).toBeInstanceOf(ConsistencyViolationError);

    // alpha stays at its new version, nothing is rolled, gamma is untouched
    expect(readJson(root, 'plugins', 'alpha', 'plugin.json')).toEqual({ name: 'alpha', version: '1.3.0' });
    expect(readText(root, 'plugins', 'alpha', 'CHANGELOG.md')).toBe(
      '# Changelog\n\n## [Unreleased]\n### Added\n- x\n### Fixed\n- y\n'
    );
    expect(readJson(root, 'plugins', 'gamma', 'plugin.json')).toEqual({ name: 'gamma', version: '0.1.0' });
    expect(readJson(root, REGISTRY_FILE)).toMatchObject({ metadata: { version: '1.0.0' } });
  });

  it('wraps any synchronizer failure', async () => {
    const root = project([ALPHA, BETA]);
    const synchronize: PrepareReleaseOptions['synchronize'] = (plugin, version, syncOptions) => {
      if (plugin.name === 'beta') throw new Error('disk full');
      return updateLocations(plugin, version, syncOptions);
    };

    await expect(prepareRelease(options(root, { synchronize }))).rejects.toThrow(
      "Synchronization aborted at plugin 'beta': disk full\nAlready synchronized (left at new versions): alpha"
    );
  });

  describe('dry run', () => {
    it('reports the same plan and notes without writing', async () => {
      const root = project([ALPHA, BETA, GAMMA, DELTA]);
      const before = snapshotTree(root);
      const collaborator = new RecordingCollaborator();

      const result = await prepareRelease(options(root, { dryRun: true, collaborator }));

      expect(result.status).toBe('dry-run');
      expect(result.notes).toBe(EXPECTED_NOTES);
      expect(result.registry).toEqual({ previousVersion: '1.0.0', newVersion: '2.0.0', severity: 'major' });
      expect(result.plugins.map(p => p.newVersion)).toEqual(['1.3.0', '3.0.0']);
      expect(collaborator.requests).toEqual([]);
      expect(snapshotTree(root)).toEqual(before);
    });

    it('fails in synchronization where a real run would, without writing', async () => {
      const root = project([ALPHA, { ...BETA, descriptorVersion: null }]);
      const before = snapshotTree(root);

      let caught: unknown;
      try {
        await prepareRelease(options(root, { dryRun: true }));
      } catch (e) {
        caught = e;
      }

      expect(caught).toBeInstanceOf(SynchronizationAbortedError);
      if (!(caught instanceof SynchronizationAbortedError)) return;
      expect(caught.completed).toEqual(['alpha']);
      expect(caught.failedPlugin).toBe('beta');
      expect(caught.failure).toBeInstanceOf(ConsistencyViolationError);
      expect(snapshotTree(root)).toEqual(before);
    });

    it('produces byte-identical notes regardless of directory creation order', async () => {
      const forward = makeTempDir();
      const backward = makeTempDir();
      roots.push(forward, backward);
      const plugins = [ALPHA, BETA, GAMMA];
      for (const plugin of plugins) writePlugin(forward, plugin);
      for (const plugin of [...plugins].reverse()) writePlugin(backward, plugin);
      writeRegistry(forward, plugins);
      writeRegistry(backward, plugins);

      const first = await prepareRelease(options(forward, { dryRun: true }));
      const second = await prepareRelease(options(backward, { dryRun: true }));
      const again = await prepareRelease(options(forward, { dryRun: true }));

      expect(second.notes).toBe(first.notes);
      expect(again.notes).toBe(first.notes);
      expect(first.notes).toBe(EXPECTED_NOTES);
    });
  });

  it('defaults the release date to the injected clock', async () => {
    const root = project([{ ...ALPHA }]);
    const result = await prepareRelease({
      projectRoot: root,
      config: loadConfig(root),
      now: () => new Date(2026, 0, 5, 12, 0, 0)
    });
    expect(result.date).toBe('2026-01-05');
    expect(readText(root, 'plugins', 'alpha', 'CHANGELOG.md')).toContain('## [1.3.0] - 2026-01-05\n');
  });
});

describe('formatReleaseDate', () => {
  it('zero-pads month and day', () => {
    expect(formatReleaseDate(new Date(2026, 2, 7))).toBe('2026-03-07');
  });
});

describe('planPlugin', () => {
  it('projects the next version without writing', () => {
    const root = project([ALPHA, GAMMA]);
    const before = snapshotTree(root);
    const config = loadConfig(root);

    expect(planPlugin(root, config, 'alpha')).toEqual({
      name: 'alpha',
      severity: 'minor',
      currentVersion: '1.2.3',
      nextVersion: '1.3.0',
      warnings: []
    });
    expect(planPlugin(root, config, 'gamma')?.nextVersion).toBe('0.1.0');
    expect(planPlugin(root, config, 'missing')).toBeNull();
    expect(snapshotTree(root)).toEqual(before);
  });
});

describe('checkVersions', () => {
  it('reports every plugin in name order', () => {
    const root = project([BETA, { ...ALPHA, registryVersion: '1.2.2' }]);
    const reports = checkVersions(root, loadConfig(root));
    expect(reports.map(r => [r.plugin, r.consistent, r.divergent])).toEqual([
      ['alpha', false, ['registry']],
      ['beta', true, []]
    ]);
  });
});
