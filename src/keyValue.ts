// Reader for the INI-like `key = value` files used by `.copyright` and
// `.copyright_meta`. Keys that appear before any `[section]` header belong to
// an implicit `root` section.

export const ROOT_SECTION = 'root';

export type KeyValueSection = Record<string, string>;

export class KeyValueSyntaxError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.name = 'KeyValueSyntaxError';
    this.line = line;
  }
}

export function parseKeyValue(text: string): Map<string, KeyValueSection> {
  const sections = new Map<string, KeyValueSection>();
  let current: KeyValueSection | undefined;
  let currentKey: string | undefined;
  // blank lines seen since the last value line; kept only if the value continues
  let pendingBlanks = 0;

  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  lines.forEach((line, index) => {
    const lineNo = index + 1;
    const trimmed = line.trim();
    if (!trimmed) {
      if (currentKey !== undefined) pendingBlanks += 1;
      return;
    }
    if (trimmed.startsWith('#') || trimmed.startsWith(';')) return;

    // indented lines continue the previous value
    if (/^\s/.test(line) && current && currentKey !== undefined) {
      const previous = current[currentKey];
      current[currentKey] = previous ? `${previous}${'\n'.repeat(pendingBlanks + 1)}${trimmed}` : trimmed;
      pendingBlanks = 0;
      return;
    }
    pendingBlanks = 0;

    const header = line.match(/^\[([^\]]+)\]\s*$/);
    if (header) {
      const name = header[1].trim();
      if (sections.has(name)) throw new KeyValueSyntaxError(lineNo, `duplicate section '${name}'`);
      current = {};
      sections.set(name, current);
      currentKey = undefined;
      return;
    }

    const delimiter = trimmed.search(/[=:]/);
    if (delimiter <= 0) {
      throw new KeyValueSyntaxError(lineNo, `expected 'key = value', got '${trimmed}'`);
    }
    const key = trimmed.slice(0, delimiter).trim().toLowerCase();
    const value = trimmed.slice(delimiter + 1).trim();

    if (!current) {
      current = {};
      sections.set(ROOT_SECTION, current);
    }
    if (Object.prototype.hasOwnProperty.call(current, key)) {
      throw new KeyValueSyntaxError(lineNo, `duplicate key '${key}'`);
    }
    current[key] = value;
    currentKey = key;
  });

  return sections;
}

/**
 * Descriptors only ever use their first section; any later ones
 * (e.g. `license_urls`) are ignored by callers.
 */
export function firstSection(sections: Map<string, KeyValueSection>): KeyValueSection {
  for (const section of sections.values()) return section;
  return {};
}

export function optionalValue(section: KeyValueSection, key: string): string | undefined {
  const value = section[key];
  return value !== undefined && value.trim() ? value : undefined;
}
