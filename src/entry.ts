/**
 * TomlEntry - a single value read from the source, with its location and tag
 */

import { TomlType } from './types';
import { quoteString } from './escapes';

export const KEY_SEPARATOR = '.';

const KEY_SEGMENT_REGEX = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export function isKeySegment(text: string): boolean {
  return KEY_SEGMENT_REGEX.test(text);
}

export class TomlEntry {
  readonly group: string;
  readonly name: string;
  readonly lineNumber: number;
  readonly position: number;
  readonly parsedType: TomlType;
  private readonly text: string;

  constructor(group: string, name: string, sourceText: string, lineNumber: number, position: number, parsedType: TomlType) {
    this.group = group;
    this.name = name;
    this.text = sourceText;
    this.lineNumber = lineNumber;
    this.position = position;
    this.parsedType = parsedType;
  }

  /** Literal text; for strings the escape sequences are already resolved. */
  get sourceText(): string {
    return this.text;
  }

  get fullName(): string {
    return joinKey(this.group, this.name);
  }

  toString(): string {
    return this.parsedType === 'string' ? quoteString(this.sourceText) : this.sourceText;
  }
}

export function joinKey(prefix: string, key: string): string {
  return prefix ? `${prefix}${KEY_SEPARATOR}${key}` : key;
}

export function splitKey(path: string): string[] {
  return path.split(KEY_SEPARATOR);
}
