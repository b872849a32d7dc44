/**
 * Config command - effective configuration
 */
import fs from 'fs';
import type { Command } from 'commander';
import type { ConfigDisplayItem } from '../lib/types/config.js';
import { getConfigDisplay, getConfigPath } from '../managers/config-manager.js';
import { findProjectRoot, jsonOut } from '../managers/core-manager.js';

export function registerConfigCommands(program: Command): void {
  program.command('config')
    .description('Show effective configuration (defaults ← release.yaml ← --with-config)')
    .option('--json', 'JSON output')
    .action((options: { json?: boolean }) => {
      const projectRoot = findProjectRoot();
      const configFile = getConfigPath(projectRoot);
      const configExists = fs.existsSync(configFile);
      const settings = getConfigDisplay(projectRoot);

      if (options.json) {
        jsonOut({ projectRoot, configFile, configExists, settings });
        return;
      }

      // YAML-style output
      console.log('# Release Configuration\n');
      console.log(`# project_root: ${projectRoot}`);
      console.log(`# config_file: ${configFile} ${configExists ? '✓' : '(using defaults)'}`);

      const sections = new Map<string, ConfigDisplayItem[]>();
      for (const item of settings) {
        const [section] = item.key.split('.');
        sections.set(section, [...(sections.get(section) ?? []), item]);
      }

      for (const [section, items] of sections) {
        console.log(`\n${section}:`);
        for (const item of items) {
          const keyName = item.key.split('.').slice(1).join('.');
          const marker = item.isDefault ? '' : '  # (custom)';
          const valuesHint = item.values ? ` [${item.values.join('|')}]` : '';
          console.log(`  # ${item.description}${valuesHint}`);
          console.log(`  ${keyName}: ${item.value}${marker}`);
        }
      }
    });
}
