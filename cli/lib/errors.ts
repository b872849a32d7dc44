/**
 * Release error taxonomy
 *
 * Every fatal error names the plugin and the location(s) involved.
 * PURE LIB: no I/O.
 */
import type { VersionLocationId } from './types/plugin.js';

export type ReleaseErrorCode =
  | 'INVALID_VERSION_FORMAT'
  | 'MALFORMED_CHANGELOG'
  | 'CONSISTENCY_VIOLATION'
  | 'SYNCHRONIZATION_ABORTED'
  | 'ILLEGAL_TRANSITION'
  | 'INVALID_DOCUMENT'
  | 'CONFIG_ERROR';

export class ReleaseError extends Error {
  constructor(
    public readonly code: ReleaseErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ReleaseError';
  }
}

export class InvalidVersionFormatError extends ReleaseError {
  constructor(
    public readonly text: string,
    public readonly source?: string
  ) {
    super(
      'INVALID_VERSION_FORMAT',
      `Invalid semantic version format: "${text}"${source ? ` (${source})` : ''}. Expected X.Y.Z`
    );
    this.name = 'InvalidVersionFormatError';
  }
}

export class MalformedChangelogError extends ReleaseError {
  constructor(
    public readonly plugin: string,
    public readonly file: string,
    reason = "missing '## [Unreleased]' section"
  ) {
    super('MALFORMED_CHANGELOG', `Malformed changelog for plugin '${plugin}': ${reason} (${file})`);
    this.name = 'MalformedChangelogError';
  }
}

export interface ObservedVersion {
  location: VersionLocationId;
  source: string;
  version: string | null;
  /** Read or write failure at this location */
  error?: string;
}

export class ConsistencyViolationError extends ReleaseError {
  constructor(
    public readonly plugin: string,
    public readonly observed: ObservedVersion[],
    public readonly divergent: VersionLocationId[]
  ) {
    super(
      'CONSISTENCY_VIOLATION',
      `Version mismatch for plugin '${plugin}' (divergent: ${divergent.join(', ')}):\n` +
        observed.map(o => `  ${o.location} [${o.source}]: ${o.version ?? '(missing)'}${o.error ? ` (${o.error})` : ''}`).join('\n')
    );
    this.name = 'ConsistencyViolationError';
  }
}

export class SynchronizationAbortedError extends ReleaseError {
  constructor(
    public readonly completed: string[],
    public readonly failedPlugin: string,
    public readonly failure: Error
  ) {
    super(
      'SYNCHRONIZATION_ABORTED',
      `Synchronization aborted at plugin '${failedPlugin}': ${failure.message}\n` +
        `Already synchronized (left at new versions): ${completed.length ? completed.join(', ') : '(none)'}`
    );
    this.name = 'SynchronizationAbortedError';
  }
}

export class InvalidDocumentError extends ReleaseError {
  constructor(
    public readonly file: string,
    reason: string
  ) {
    super('INVALID_DOCUMENT', `Invalid JSON document ${file}: ${reason}`);
    this.name = 'InvalidDocumentError';
  }
}

export class ConfigError extends ReleaseError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

export class IllegalTransitionError extends ReleaseError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    allowed: readonly string[]
  ) {
    super(
      'ILLEGAL_TRANSITION',
      `Illegal release phase transition '${from}' → '${to}'` +
        (allowed.length ? ` (allowed: ${allowed.join(', ')})` : ' (terminal phase)')
    );
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
