/**
 * Minimal reader for freedesktop `.desktop` files: only the keys the launcher
 * needs from the `[Desktop Entry]` group.
 */

export interface DesktopEntry {
  type: string;
  name: string;
  exec: string;
  terminal: boolean;
  noDisplay: boolean;
  hidden: boolean;
}

const MAIN_GROUP = 'Desktop Entry';

function unescapeValue(value: string): string {
  return value.replace(/\\(.)/g, (_match, ch: string) => {
    if (ch === 's') return ' ';
    if (ch === 'n') return '\n';
    if (ch === 't') return '\t';
    if (ch === 'r') return '\r';
    return ch === '\\' ? '\\' : `\\${ch}`;
  });
}

function parseBoolean(value: string | undefined): boolean {
  return String(value || '').trim().toLowerCase() === 'true';
}

export function parseDesktopEntry(content: string): DesktopEntry | null {
  const values = new Map<string, string>();
  let inMainGroup = false;
  let sawMainGroup = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    if (line.startsWith('[') && line.endsWith(']')) {
      inMainGroup = line.slice(1, -1) === MAIN_GROUP;
      if (inMainGroup) sawMainGroup = true;
      continue;
    }
    if (!inMainGroup) continue;

    const separator = line.indexOf('=');
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim();
    // Localized keys (Name[de]) are ignored; first occurrence wins.
    if (key.includes('[') || values.has(key)) continue;
    values.set(key, unescapeValue(line.slice(separator + 1).trim()));
  }

  if (!sawMainGroup) return null;

  return {
    type: values.get('Type') || '',
    name: values.get('Name') || '',
    exec: values.get('Exec') || '',
    terminal: parseBoolean(values.get('Terminal')),
    noDisplay: parseBoolean(values.get('NoDisplay')),
    hidden: parseBoolean(values.get('Hidden')),
  };
}
