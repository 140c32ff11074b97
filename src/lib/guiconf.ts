/**
 * Checks the staged GUI helper configuration for the settings the helper
 * reads at startup. The helper exits when any of them is missing.
 */

/**
 * Settings the helper requires, as section -> keys.
 * `gui_stop` may be empty (the helper then kills the GUI process tree),
 * but the key must be present.
 */
export const REQUIRED_GUI_SETTINGS: Readonly<Record<string, readonly string[]>> = {
  Paths: ['wake_persistent'],
  Commands: ['gui_load', 'gui_stop', 'shutdown'],
};

export type IniSections = Map<string, Map<string, string>>;

/**
 * Parses INI text into sections of key/value pairs.
 *
 * Section names keep their case; keys are lowercased. `=` and `:` both
 * separate keys from values. Lines starting with `#` or `;` are comments,
 * and indented lines continue the previous value.
 */
export function parseIni(text: string): IniSections {
  const sections: IniSections = new Map();
  let current: Map<string, string> | null = null;
  let lastKey: string | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      const name = header[1].trim();
      current = sections.get(name) ?? new Map<string, string>();
      sections.set(name, current);
      lastKey = null;
      continue;
    }

    if (current === null) {
      continue;
    }

    if (/^\s/.test(rawLine) && lastKey !== null) {
      current.set(lastKey, `${current.get(lastKey) ?? ''}\n${line}`);
      continue;
    }

    const sep = line.search(/[=:]/);
    if (sep === -1) {
      // bare key: present, empty value
      lastKey = line.toLowerCase();
      current.set(lastKey, '');
      continue;
    }

    lastKey = line.slice(0, sep).trim().toLowerCase();
    current.set(lastKey, line.slice(sep + 1).trim());
  }

  return sections;
}

export interface GuiConfigCheck {
  ok: boolean;
  /** Missing settings as `Section.key` */
  missing: string[];
}

/** Section whose keys every other section inherits. */
export const DEFAULT_SECTION = 'DEFAULT';

/**
 * A setting counts as present when its section exists and holds the key
 * itself or inherits it from `[DEFAULT]`.
 */
export function checkGuiConfig(text: string): GuiConfigCheck {
  const sections = parseIni(text);
  const defaults = sections.get(DEFAULT_SECTION);
  const missing: string[] = [];

  for (const [section, keys] of Object.entries(REQUIRED_GUI_SETTINGS)) {
    const values = sections.get(section);
    for (const key of keys) {
      if (!values || !(values.has(key) || defaults?.has(key))) {
        missing.push(`${section}.${key}`);
      }
    }
  }

  return { ok: missing.length === 0, missing };
}
