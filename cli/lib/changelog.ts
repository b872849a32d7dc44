/**
 * Changelog parsing - Keep a Changelog layout, fixed category taxonomy
 *
 * Sections are found by exact header match with a small line scanner:
 *   before → unreleased → after
 * Only `## [Unreleased]` content is interpreted; released history is carried
 * through untouched.
 *
 * PURE LIB: no I/O.
 */
import { MalformedChangelogError } from './errors.js';
import { formatVersion } from './semver.js';
import { CHANGE_CATEGORIES } from './types/plugin.js';
import type { ChangeCategory, ChangelogDocument, SemanticVersion, UnreleasedEntries } from './types/plugin.js';

export const UNRELEASED_HEADER = '## [Unreleased]';
const SECTION_PREFIX = '## [';
const CHANGELOG_TITLE = '# Changelog';
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface ChangelogSource {
  plugin: string;
  file: string;
}

export interface SectionContent {
  header: string;
  entries: UnreleasedEntries;
  /** Section body without surrounding blank lines */
  body: string;
}

function normalizeLine(line: string): string {
  return line.trimEnd();
}

function isSectionHeader(line: string): boolean {
  return normalizeLine(line).startsWith(SECTION_PREFIX);
}

function isCategory(name: string): name is ChangeCategory {
  return CHANGE_CATEGORIES.some(category => category === name);
}

/**
 * Category name of a `### X` sub-header, '' for an unrecognized one,
 * null when the line is not a sub-header at all
 */
function subHeaderCategory(line: string): ChangeCategory | '' | null {
  const match = normalizeLine(line).match(/^###\s+(.+)$/);
  if (!match) return null;
  const name = match[1].trim();
  return isCategory(name) ? name : '';
}

/**
 * Group the non-blank lines of a section body by category sub-header.
 * Lines before any sub-header or under an unknown one are dropped;
 * a repeated sub-header appends to the existing list.
 */
export function collectEntries(body: readonly string[]): UnreleasedEntries {
  const entries: UnreleasedEntries = new Map();
  let current: ChangeCategory | null = null;

  for (const raw of body) {
    const line = normalizeLine(raw);
    if (!line.trim()) continue;

    const category = subHeaderCategory(line);
    if (category !== null) {
      current = category === '' ? null : category;
      if (current && !entries.has(current)) entries.set(current, []);
      continue;
    }

    if (current) entries.get(current)?.push(line);
  }

  return entries;
}

/**
 * End index (exclusive) of the section whose header is at `headerIndex`
 */
function sectionEnd(lines: readonly string[], headerIndex: number): number {
  for (let i = headerIndex + 1; i < lines.length; i++) {
    if (isSectionHeader(lines[i])) return i;
  }
  return lines.length;
}

function trimBlankEdges(lines: readonly string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start].trim()) start++;
  while (end > start && !lines[end - 1].trim()) end--;
  return lines.slice(start, end).map(normalizeLine);
}

/**
 * Parse a changelog document
 * @throws MalformedChangelogError when the Unreleased header is missing
 */
export function parseChangelog(
  text: string,
  source: ChangelogSource = { plugin: '(unknown)', file: 'CHANGELOG.md' }
): ChangelogDocument {
  const lines = text.split('\n');
  let state: 'before' | 'unreleased' | 'after' = 'before';
  let unreleasedIndex = -1;
  let unreleasedEnd = lines.length;

  for (let i = 0; i < lines.length && state !== 'after'; i++) {
    const line = normalizeLine(lines[i]);
    if (state === 'before') {
      if (line === UNRELEASED_HEADER) {
        unreleasedIndex = i;
        state = 'unreleased';
      }
    } else if (line.startsWith(SECTION_PREFIX)) {
      unreleasedEnd = i;
      state = 'after';
    }
  }

  if (unreleasedIndex === -1) {
    throw new MalformedChangelogError(source.plugin, source.file);
  }

  return {
    lines,
    unreleasedIndex,
    unreleasedEnd,
    unreleased: collectEntries(lines.slice(unreleasedIndex + 1, unreleasedEnd))
  };
}

export function renderChangelog(doc: ChangelogDocument): string {
  return doc.lines.join('\n');
}

/**
 * Categories and entry lines pending in the Unreleased section
 */
export function extractUnreleased(text: string, source?: ChangelogSource): UnreleasedEntries {
  return parseChangelog(text, source).unreleased;
}

export function unreleasedLines(doc: ChangelogDocument): string[] {
  return doc.lines.slice(doc.unreleasedIndex + 1, doc.unreleasedEnd);
}

/**
 * True iff at least one line sits under a recognized category
 */
export function hasPendingChanges(doc: ChangelogDocument): boolean {
  for (const entries of doc.unreleased.values()) {
    if (entries.length > 0) return true;
  }
  return false;
}

export function isReleaseDate(text: string): boolean {
  return DATE_PATTERN.test(text);
}

/**
 * Move Unreleased content into a new dated version section.
 *
 * Result: `## [Unreleased]`, a blank line, `## [X.Y.Z] - date`, then the former
 * Unreleased body verbatim. Returns the same document when the body is blank.
 */
export function rollUnreleasedToVersion(
  doc: ChangelogDocument,
  version: SemanticVersion,
  date: string
): ChangelogDocument {
  if (!isReleaseDate(date)) {
    throw new Error(`Invalid release date: "${date}". Expected YYYY-MM-DD`);
  }

  const body = unreleasedLines(doc);
  if (!body.some(line => line.trim())) return doc;

  // Inserted lines take the line ending of the Unreleased header (CRLF or LF)
  const cr = doc.lines[doc.unreleasedIndex].endsWith('\r') ? '\r' : '';
  const header = doc.lines.slice(0, doc.unreleasedIndex);
  const history = doc.lines.slice(doc.unreleasedEnd);
  const lines = [
    ...header,
    UNRELEASED_HEADER + cr,
    cr,
    `${SECTION_PREFIX}${formatVersion(version)}] - ${date}${cr}`,
    ...body,
    ...history
  ];

  return {
    lines,
    unreleasedIndex: header.length,
    unreleasedEnd: header.length + 2,
    unreleased: new Map()
  };
}

/**
 * Content of a released `## [X.Y.Z]` section, null if absent
 */
export function extractVersionSection(
  docOrText: ChangelogDocument | string,
  version: SemanticVersion | string
): SectionContent | null {
  const lines = typeof docOrText === 'string' ? docOrText.split('\n') : docOrText.lines;
  const label = typeof version === 'string' ? version : formatVersion(version);
  const prefix = `${SECTION_PREFIX}${label}]`;

  const index = lines.findIndex(line => normalizeLine(line).startsWith(prefix));
  if (index === -1) return null;

  const body = lines.slice(index + 1, sectionEnd(lines, index));
  return {
    header: normalizeLine(lines[index]),
    entries: collectEntries(body),
    body: trimBlankEdges(body).join('\n')
  };
}

/**
 * Non-fatal layout warnings
 */
export function changelogWarnings(doc: ChangelogDocument): string[] {
  const warnings: string[] = [];
  if (!doc.lines.some(line => normalizeLine(line) === CHANGELOG_TITLE)) {
    warnings.push(`Changelog should start with '${CHANGELOG_TITLE}' header`);
  }
  return warnings;
}
