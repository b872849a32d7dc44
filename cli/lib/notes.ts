/**
 * Release notes assembly
 *
 * PURE LIB: no I/O.
 */

export interface NotesSection {
  plugin: string;
  version: string;
  body: string;
}

export const NOTES_TITLE = '# Release Notes';

/**
 * One document, one `## <plugin> (<version>)` section per plugin.
 * Sections are sorted by plugin name so the output never depends on input order.
 */
export function renderReleaseNotes(sections: readonly NotesSection[]): string {
  const sorted = [...sections].sort((a, b) => (a.plugin < b.plugin ? -1 : a.plugin > b.plugin ? 1 : 0));
  const parts = [NOTES_TITLE, ''];
  for (const section of sorted) {
    parts.push(`## ${section.plugin} (${section.version})`, '');
    if (section.body) parts.push(section.body, '');
  }
  return parts.join('\n');
}
