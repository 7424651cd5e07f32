/**
 * @fileoverview Reader for the sectioned key/value text format used by
 * desktop entry files.
 *
 * ```
 * # comment
 * [Desktop Entry]
 * Name=Firefox
 * Name[de]=Firefox
 * Exec=firefox %u
 * ```
 */

export type EntrySection = ReadonlyMap<string, string>;

export type DesktopEntryParseResult =
  | { ok: true; sections: ReadonlyMap<string, EntrySection> }
  | { ok: false; line: number; error: string };

export const DESKTOP_ENTRY_SECTION = 'Desktop Entry';

/**
 * Parse the text of a desktop entry file into its sections.
 *
 * Blank lines and `#` comments are skipped. Keys keep their locale suffix,
 * so `Name[de]` never shadows `Name`. The first occurrence of a key in a
 * section wins.
 */
export function parseDesktopEntry(content: string): DesktopEntryParseResult {
  const sections = new Map<string, Map<string, string>>();
  let current: Map<string, string> | null = null;

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const trimmed = line.trim();
    const lineNumber = i + 1;

    if (trimmed.length === 0 || trimmed.startsWith('#')) {
      continue;
    }

    if (trimmed.startsWith('[')) {
      if (!trimmed.endsWith(']') || trimmed.length < 3) {
        return { ok: false, line: lineNumber, error: 'malformed section header' };
      }
      const name = trimmed.slice(1, -1);
      const existing = sections.get(name);
      if (existing) {
        current = existing;
      } else {
        current = new Map<string, string>();
        sections.set(name, current);
      }
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      return { ok: false, line: lineNumber, error: 'expected key=value' };
    }
    if (current === null) {
      return { ok: false, line: lineNumber, error: 'key outside of any section' };
    }

    const key = line.slice(0, separator).trim();
    if (key.length === 0) {
      return { ok: false, line: lineNumber, error: 'empty key' };
    }
    if (!current.has(key)) {
      current.set(key, line.slice(separator + 1).trim());
    }
  }

  return { ok: true, sections };
}
