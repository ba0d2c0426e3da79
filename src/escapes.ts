// Characters allowed after a backslash inside quoted strings
const ESCAPED_CHARS = new Map<string, string>([
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['0', '\0'],
  ['\\', '\\'],
  ['"', '"'],
]);

const QUOTED_CHARS = new Map<string, string>(
  [...ESCAPED_CHARS.entries()].map(([escape, char]) => [char, `\\${escape}`])
);

export function resolveEscape(escapeChar: string): string | undefined {
  return ESCAPED_CHARS.get(escapeChar);
}

export function quoteString(value: string): string {
  let quoted = '"';
  for (const char of value) {
    quoted += QUOTED_CHARS.get(char) ?? char;
  }
  return `${quoted}"`;
}
