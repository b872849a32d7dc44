/**
 * Config Manager - Configuration schema, loading, validation and overrides
 *
 * Handles:
 * - Configuration schema definition (single source of truth)
 * - release.yaml loading and merging with defaults
 * - Config validation against schema (invalid values fall back to default)
 * - CLI config overrides (--with-config key=value)
 *
 * MANAGER: Has file access, no knowledge of plugins.
 */
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { isLogLevel } from '../lib/log.js';
import { errorMessage } from '../lib/errors.js';
import type { ConfigDisplayItem, ConfigSchemaEntry, ConfigValue, ReleaseConfig } from '../lib/types/config.js';

export const CONFIG_FILE = 'release.yaml';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

export const CONFIG_SCHEMA = {
  'paths.plugins': {
    type: 'string',
    default: 'plugins',
    description: 'Directory containing one sub-directory per plugin'
  },
  'paths.registry': {
    type: 'string',
    default: '.claude-plugin/marketplace.json',
    description: 'Shared plugin registry (plugins[].version, metadata.version)'
  },
  'paths.manifest': {
    type: 'string',
    default: 'plugin.json',
    description: 'Per-plugin manifest, relative to the plugin directory (canonical version)'
  },
  'paths.descriptor': {
    type: 'string',
    default: 'skills/${plugin}/SKILL.md',
    description: 'Per-plugin descriptor with metadata.version frontmatter'
  },
  'paths.changelog': {
    type: 'string',
    default: 'CHANGELOG.md',
    description: 'Per-plugin changelog, relative to the plugin directory'
  },
  'release.target_branch': {
    type: 'string',
    default: 'main',
    description: 'Branch the release pull request targets'
  },
  'release.branch_prefix': {
    type: 'string',
    default: 'release/v',
    description: 'Release branch name prefix (registry version is appended)'
  },
  'release.labels': {
    type: 'string',
    default: 'release,autogenerated',
    description: 'Comma-separated labels for the release pull request'
  },
  'logging.level': {
    type: 'enum',
    default: 'info',
    values: ['debug', 'info', 'warn', 'error'],
    description: 'Minimum log level'
  }
} satisfies Record<string, ConfigSchemaEntry>;

export type ConfigKey = keyof typeof CONFIG_SCHEMA;

function isConfigKey(key: string): key is ConfigKey {
  return key in CONFIG_SCHEMA;
}

const CONFIG_KEYS: ConfigKey[] = Object.keys(CONFIG_SCHEMA).filter(isConfigKey);

function schemaEntry(key: ConfigKey): ConfigSchemaEntry {
  return CONFIG_SCHEMA[key];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// CONFIG OVERRIDES
// ============================================================================

let _configOverrides: Partial<Record<ConfigKey, ConfigValue>> = {};

/**
 * Set config overrides from CLI flag
 * Called early in release.ts before any config is loaded
 */
export function setConfigOverrides(overrides: Partial<Record<ConfigKey, ConfigValue>>): void {
  _configOverrides = { ..._configOverrides, ...overrides };
}

export function clearConfigOverrides(): void {
  _configOverrides = {};
}

/**
 * Parse a config override string: "key=value"
 * Handles type coercion based on schema
 */
export function parseConfigOverride(override: string): { key: ConfigKey; value: ConfigValue } | null {
  const match = override.match(/^([^=]+)=(.*)$/);
  if (!match) {
    console.error(`Invalid config override format: ${override}`);
    console.error(`Expected: key=value (e.g., release.target_branch=develop)`);
    return null;
  }

  const [, key, rawValue] = match;
  if (!isConfigKey(key)) {
    console.error(`Unknown config key: ${key}`);
    console.error(`Available keys: ${CONFIG_KEYS.join(', ')}`);
    return null;
  }

  const schema = schemaEntry(key);
  switch (schema.type) {
    case 'boolean':
      return { key, value: rawValue.toLowerCase() === 'true' || rawValue === '1' };
    case 'number': {
      const value = parseInt(rawValue, 10);
      if (isNaN(value)) {
        console.error(`Invalid number for ${key}: ${rawValue}`);
        return null;
      }
      return { key, value };
    }
    case 'enum':
      if (schema.values && !schema.values.includes(rawValue)) {
        console.error(`Invalid value for ${key}: ${rawValue}`);
        console.error(`Valid values: ${schema.values.join(', ')}`);
        return null;
      }
      return { key, value: rawValue };
    default:
      return { key, value: rawValue };
  }
}

// ============================================================================
// CONFIG NESTED ACCESS
// ============================================================================

/**
 * Get nested value from object using dot notation
 */
export function getNestedValue(obj: unknown, key: string): unknown {
  let value: unknown = obj;
  for (const part of key.split('.')) {
    if (!isRecord(value)) return undefined;
    value = value[part];
  }
  return value;
}

// ============================================================================
// CONFIG LOADING & VALIDATION
// ============================================================================

export function getConfigPath(projectRoot: string): string {
  return path.join(projectRoot, CONFIG_FILE);
}

function readUserConfig(configPath: string): unknown {
  if (!fs.existsSync(configPath)) return {};
  try {
    return yaml.load(fs.readFileSync(configPath, 'utf8')) ?? {};
  } catch (e) {
    console.error(`Warning: Could not parse ${CONFIG_FILE}: ${errorMessage(e)}`);
    return {};
  }
}

/**
 * Validate one value against its schema entry (undefined when invalid)
 */
function validateValue(key: ConfigKey, value: unknown): ConfigValue | undefined {
  const schema = schemaEntry(key);
  switch (schema.type) {
    case 'boolean':
      if (typeof value === 'boolean') return value;
      console.error(`Warning: ${key} should be boolean, got ${typeof value}`);
      return undefined;
    case 'number':
      if (typeof value === 'number' && value >= 0) return value;
      console.error(`Warning: ${key} should be positive number, got ${String(value)}`);
      return undefined;
    case 'string':
      if (typeof value === 'string' && value.trim() !== '') return value;
      console.error(`Warning: ${key} should be non-empty string, got ${typeof value}`);
      return undefined;
    case 'enum':
      if (typeof value === 'string' && schema.values?.includes(value)) return value;
      console.error(`Warning: ${key} should be one of [${schema.values?.join(', ')}], got ${String(value)}`);
      return undefined;
  }
}

/**
 * Effective value of one key: default ← release.yaml ← CLI override
 */
function effectiveValue(userConfig: unknown, key: ConfigKey): ConfigValue {
  const override = _configOverrides[key];
  if (override !== undefined) return override;

  const raw = getNestedValue(userConfig, key);
  const validated = raw === undefined ? undefined : validateValue(key, raw);
  return validated ?? schemaEntry(key).default;
}

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Load configuration for a project root
 */
export function loadConfig(projectRoot: string): ReleaseConfig {
  const userConfig = readUserConfig(getConfigPath(projectRoot));
  const value = (key: ConfigKey): string => String(effectiveValue(userConfig, key));
  const level = value('logging.level');

  return {
    paths: {
      plugins: value('paths.plugins'),
      registry: value('paths.registry'),
      manifest: value('paths.manifest'),
      descriptor: value('paths.descriptor'),
      changelog: value('paths.changelog')
    },
    release: {
      target_branch: value('release.target_branch'),
      branch_prefix: value('release.branch_prefix'),
      labels: splitList(value('release.labels'))
    },
    logging: {
      level: isLogLevel(level) ? level : 'info'
    }
  };
}

/**
 * Config display for the `config` command
 */
export function getConfigDisplay(projectRoot: string): ConfigDisplayItem[] {
  const userConfig = readUserConfig(getConfigPath(projectRoot));
  return CONFIG_KEYS.map(key => {
    const schema = schemaEntry(key);
    const value = effectiveValue(userConfig, key);
    return {
      key,
      value,
      default: schema.default,
      description: schema.description,
      type: schema.type,
      values: schema.values,
      isDefault: value === schema.default
    };
  });
}
