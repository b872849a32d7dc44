/**
 * Check command - three-location version consistency
 */
import type { Command } from 'commander';
import { loadConfig } from '../managers/config-manager.js';
import { findProjectRoot, jsonOut } from '../managers/core-manager.js';
import { checkVersions } from '../operations/release-ops.js';

export function registerCheckCommands(program: Command): void {
  program.command('check')
    .description('Verify manifest, descriptor and registry versions agree for every plugin')
    .option('--json', 'JSON output')
    .action((options: { json?: boolean }) => {
      const projectRoot = findProjectRoot();
      const reports = checkVersions(projectRoot, loadConfig(projectRoot));
      const drift = reports.filter(r => !r.consistent);

      if (options.json) {
        jsonOut({ consistent: drift.length === 0, plugins: reports });
      } else {
        for (const report of reports) {
          const symbol = report.consistent ? '✓' : '✗';
          const versions = report.observed
            .map(o => `${o.location}=${o.present ? (o.version ?? '(missing)') : '(unpublished)'}`)
            .join(' ');
          console.log(`${symbol} ${report.plugin}  ${versions}`);
          for (const o of report.observed) {
            if (o.error) console.log(`    ${o.location}: ${o.error}`);
          }
        }
        console.log(drift.length === 0
          ? `\nAll ${reports.length} plugin(s) consistent`
          : `\n${drift.length} plugin(s) with version drift: ${drift.map(r => r.plugin).join(', ')}`);
      }

      if (drift.length > 0) process.exitCode = 1;
    });
}
