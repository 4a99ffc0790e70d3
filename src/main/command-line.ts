/**
 * Splits an Exec line into argv, following the desktop-entry quoting rules
 * (double quotes, backslash escapes inside them, single quotes taken
 * literally) and dropping `%f`-style field codes.
 */

const FIELD_CODE_REGEX = /^%[a-zA-Z]$/;

export function splitCommandLine(commandLine: string): string[] {
  const args: string[] = [];
  let current = '';
  let hasToken = false;
  let quote: '"' | "'" | null = null;

  const source = String(commandLine || '');
  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && i + 1 < source.length) {
        i += 1;
        current += source[i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      hasToken = true;
      continue;
    }
    if (ch === '\\' && i + 1 < source.length) {
      i += 1;
      current += source[i];
      hasToken = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (hasToken) args.push(current);
      current = '';
      hasToken = false;
      continue;
    }
    current += ch;
    hasToken = true;
  }

  if (hasToken) args.push(current);
  return args;
}

export function parseExecCommand(exec: string): string[] {
  return splitCommandLine(exec)
    .filter((arg) => !FIELD_CODE_REGEX.test(arg))
    .map((arg) => arg.replace(/%%/g, '%'));
}
