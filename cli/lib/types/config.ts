/**
 * Shared config-related types
 */
import type { LogLevel } from '../log.js';

export type ConfigValue = string | number | boolean;

export interface ConfigSchemaEntry {
  type: 'string' | 'enum' | 'boolean' | 'number';
  default: ConfigValue;
  description: string;
  values?: readonly string[];
}

export interface ConfigDisplayItem {
  key: string;
  value: ConfigValue;
  default: ConfigValue;
  description: string;
  type: string;
  values?: readonly string[];
  isDefault: boolean;
}

export interface ReleaseConfig {
  paths: {
    /** Directory holding one sub-directory per plugin (project-relative) */
    plugins: string;
    /** Shared registry document (project-relative) */
    registry: string;
    /** Per-plugin manifest (plugin-relative) */
    manifest: string;
    /** Per-plugin descriptor with metadata frontmatter (plugin-relative, ${plugin} placeholder) */
    descriptor: string;
    /** Per-plugin changelog (plugin-relative) */
    changelog: string;
  };
  release: {
    target_branch: string;
    branch_prefix: string;
    labels: string[];
  };
  logging: {
    level: LogLevel;
  };
}
