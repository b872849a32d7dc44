/**
 * Markdown utilities - Pure functions for frontmatter parsing and editing
 *
 * NO I/O, NO CONFIG, NO PATHS - pure transformations only
 *
 * Reads go through gray-matter (full YAML parse). Writes never re-serialize the
 * YAML: only the `version:` line nested under `metadata:` is replaced, so the
 * rest of the descriptor stays byte-for-byte identical.
 */
import matter from 'gray-matter';

export interface ParsedDoc {
  data: Record<string, unknown>;
  body: string;
}

export interface MetadataEdit {
  content: string;
  previous: string | null;
  replaced: boolean;
}

const FENCE = '---';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse markdown content with frontmatter
 * Returns { data, body } where data is the frontmatter object
 */
export function parseMarkdown(content: string): ParsedDoc {
  const { data, content: body } = matter(content);
  return { data: isRecord(data) ? data : {}, body };
}

/**
 * Read `metadata.version` from frontmatter (null if absent)
 */
export function readMetadataVersion(content: string): string | null {
  const { data } = parseMarkdown(content);
  const metadata = data.metadata;
  if (!isRecord(metadata)) return null;
  const version = metadata.version;
  if (typeof version === 'string') return version;
  if (typeof version === 'number') return String(version);
  return null;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  const match = trimmed.match(/^(["'])(.*)\1$/);
  return match ? match[2] : trimmed;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Rewrite `metadata.version` in the frontmatter block.
 *
 * Scanner states: start → frontmatter → metadata → frontmatter … → done.
 * The value keeps its quoting style (double quotes when unquoted).
 */
export function setMetadataVersion(content: string, version: string): MetadataEdit {
  const lines = content.split('\n');
  let state: 'start' | 'frontmatter' | 'metadata' | 'done' = 'start';
  let childIndent = -1;
  let previous: string | null = null;
  let replaced = false;

  for (let i = 0; i < lines.length && state !== 'done'; i++) {
    const line = lines[i].replace(/\r$/, '');
    const eol = lines[i].endsWith('\r') ? '\r' : '';

    if (state === 'start') {
      if (line.trimEnd() !== FENCE) break;
      state = 'frontmatter';
      continue;
    }

    if (line.trimEnd() === FENCE) {
      state = 'done';
      continue;
    }

    if (state === 'frontmatter') {
      if (/^metadata:\s*$/.test(line)) {
        state = 'metadata';
        childIndent = -1;
      }
      continue;
    }

    // state === 'metadata'
    if (!line.trim()) continue;
    const indent = indentOf(line);
    if (indent === 0) {
      state = /^metadata:\s*$/.test(line) ? 'metadata' : 'frontmatter';
      continue;
    }
    if (childIndent === -1) childIndent = indent;
    if (indent !== childIndent || replaced) continue;

    const match = line.match(/^(\s+)version:(\s*)(.*?)(\s+#.*)?$/);
    if (!match) continue;

    const [, lead, gap, rawValue, comment = ''] = match;
    const value = rawValue.trim();
    const quote = value.startsWith("'") ? "'" : '"';
    previous = unquote(value);
    lines[i] = `${lead}version:${gap || ' '}${quote}${version}${quote}${comment}${eol}`;
    replaced = true;
  }

  return { content: lines.join('\n'), previous, replaced };
}
