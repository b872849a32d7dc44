/**
 * FileIO Manager - JSON and markdown document I/O
 *
 * MANAGER: File access for the version locations and changelogs.
 * Every write goes through writeFileAtomic.
 */
import { InvalidDocumentError, errorMessage } from '../lib/errors.js';
import { readFile, writeFileAtomic } from '../lib/fs-utils.js';

export interface LoadedJson {
  data: unknown;
  /** Raw content as read, used to keep indentation on save */
  content: string;
  filepath: string;
}

/**
 * Load a JSON file (null if missing)
 * @throws InvalidDocumentError naming the file when the content is not JSON
 */
export function loadJson(filepath: string): LoadedJson | null {
  const content = readFile(filepath);
  if (content === null) return null;
  try {
    return { data: JSON.parse(content), content, filepath };
  } catch (e) {
    throw new InvalidDocumentError(filepath, errorMessage(e));
  }
}

/**
 * Detect the indentation unit of a JSON document (defaults to 2)
 */
export function detectIndent(content: string): string | number {
  const indent = content.match(/^[ \t]+/m)?.[0];
  if (!indent) return 2;
  return indent.startsWith('\t') ? '\t' : indent.length;
}

/**
 * Save JSON keeping the original indentation and trailing newline
 */
export function saveJson(filepath: string, data: unknown, original?: string): void {
  const indent = original === undefined ? 2 : detectIndent(original);
  const trailing = original === undefined || original.endsWith('\n') ? '\n' : '';
  writeFileAtomic(filepath, JSON.stringify(data, null, indent) + trailing);
}

/**
 * Load a text document (null if missing)
 */
export function loadText(filepath: string): string | null {
  return readFile(filepath);
}

export function saveText(filepath: string, content: string): void {
  writeFileAtomic(filepath, content);
}
