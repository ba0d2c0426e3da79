/**
 * TomlLexer - line-by-line state machine turning source text into entries
 *
 * One cursor (line, column, mode, open-array stack) is advanced by the
 * transition function of the current mode until the line is used up, then
 * the end-of-line transition runs. Strings, multi-line strings and arrays
 * carry their state from one line to the next.
 */

import { LineSource, SourceLine } from './source';
import { TomlEntry, isKeySegment, splitKey } from './entry';
import { ARRAY_END, ARRAY_SEPARATOR, ARRAY_START, TomlArray } from './array';
import { GROUP_END } from './group';
import { TomlInvalidOperationError, TomlParseError } from './errors';
import { TomlType } from './types';
import { parseDateTimeLiteral } from './datetime';
import { resolveEscape } from './escapes';

export type LexerMode =
  | 'scanning'
  | 'readingValueName'
  | 'searchingForValueSeparator'
  | 'readingValue'
  | 'readingStringValue'
  | 'readingMultiLineStringValue'
  | 'searchingForArraySeparator'
  | 'readingArrayEnd';

export type LexerEvent =
  | { kind: 'group'; key: string; lineNumber: number; position: number; lineText: string }
  | { kind: 'value'; entry: TomlEntry; lineText: string };

const COMMENT = '#';
const VALUE_SEPARATOR = '=';
const QUOTE = '"';
const TRIPLE_QUOTE = '"""';
const ESCAPE = '\\';

const TOKEN_TERMINATORS = new Set([' ', '\t', ARRAY_SEPARATOR, ARRAY_END, COMMENT, ARRAY_START]);

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch) || ch === '-';
}

export class TomlLexer {
  private readonly source: LineSource;
  private started = false;

  private mode: LexerMode = 'scanning';
  private line = '';
  private lineNumber = 0;
  private column = 0;

  private groupKey = '';
  private readonly arrays: TomlArray[] = [];

  // Key being read, and where the value it names will be stored
  private keyText = '';
  private keyStart = 0;
  private keyLineText = '';
  private keyEnd = 0;
  private valueGroup = '';
  private valueName = '';

  // Quoted values in progress
  private buffer = '';
  private escaping = false;
  private continuation = false;
  private openedOnLine = false;
  private valueLine = 0;
  private valueColumn = 0;

  private valueCompletedOnLine = false;

  constructor(source: LineSource) {
    this.source = source;
  }

  get currentMode(): LexerMode {
    return this.mode;
  }

  get arrayDepth(): number {
    return this.arrays.length;
  }

  /**
   * Lazily yields a group event for every header and a value event for every
   * completed top-level value. The sequence can be consumed once.
   */
  *tokens(): Generator<LexerEvent> {
    if (this.started) {
      throw new TomlInvalidOperationError('Token sequence has already been consumed');
    }
    this.started = true;

    for (const sourceLine of this.source.lines()) {
      this.beginLine(sourceLine);
      while (this.column < this.line.length) {
        const event = this.step();
        if (event) {
          yield event;
        }
      }
      this.endOfLine();
    }
    this.finish();
  }

  private beginLine(sourceLine: SourceLine): void {
    this.line = sourceLine.text;
    this.lineNumber = sourceLine.lineNumber;
    this.column = 0;
    this.valueCompletedOnLine = false;
    this.openedOnLine = false;
  }

  private step(): LexerEvent | null {
    switch (this.mode) {
      case 'scanning':
        return this.scan();
      case 'readingValueName':
        return this.readValueName();
      case 'searchingForValueSeparator':
        return this.searchForValueSeparator();
      case 'readingValue':
        return this.readValue();
      case 'readingStringValue':
        return this.readStringValue();
      case 'readingMultiLineStringValue':
        return this.readMultiLineStringValue();
      case 'searchingForArraySeparator':
        return this.searchForArraySeparator();
      case 'readingArrayEnd':
        return this.readArrayEnd();
    }
  }

  private endOfLine(): void {
    switch (this.mode) {
      case 'scanning':
      case 'searchingForArraySeparator':
      case 'readingArrayEnd':
        return;
      case 'readingValueName':
        this.fail('identifier cannot span multiple lines');
      case 'searchingForValueSeparator':
        this.fail(`expected value separator '${VALUE_SEPARATOR}'`, this.keyEnd);
      case 'readingValue':
        if (this.arrays.length === 0) {
          this.fail('expected value');
        }
        return;
      case 'readingStringValue':
        this.fail('unexpected newline in string');
      case 'readingMultiLineStringValue':
        if (!this.continuation && !(this.openedOnLine && this.buffer === '')) {
          this.buffer += '\n';
        }
        return;
    }
  }

  private finish(): void {
    if (this.mode === 'scanning') {
      return;
    }
    let construct: string;
    if (this.mode === 'readingMultiLineStringValue') {
      construct = 'unterminated multi-line string';
    } else if (this.mode === 'readingStringValue') {
      construct = 'unterminated string';
    } else if (this.arrays.length > 0) {
      construct = 'unterminated array';
    } else {
      construct = 'pending key';
    }
    this.fail(`incomplete token: ${construct}`, this.line.length);
  }

  // ==========================================================================
  // Keys and group headers
  // ==========================================================================

  private scan(): LexerEvent | null {
    const ch = this.peek();
    if (isWhitespace(ch)) {
      this.column += 1;
      return null;
    }
    if (ch === COMMENT) {
      this.column = this.line.length;
      return null;
    }
    if (ch === ARRAY_END) {
      this.fail('unexpected array terminator');
    }
    if (this.valueCompletedOnLine) {
      this.fail('expected end of line after value');
    }
    if (ch === ARRAY_START) {
      return this.readGroupHeader();
    }
    if (isIdentifierStart(ch)) {
      this.keyText = '';
      this.keyStart = this.column;
      this.keyLineText = this.line;
      this.mode = 'readingValueName';
      return null;
    }
    if (isDigit(ch)) {
      this.fail('identifier cannot start with a digit');
    }
    this.fail(`invalid character in identifier: '${ch}'`);
  }

  private readGroupHeader(): LexerEvent {
    const start = this.column;
    const end = this.line.indexOf(GROUP_END, start + 1);
    if (end === -1) {
      this.fail('group name cannot span multiple lines');
    }
    const raw = this.line.slice(start + 1, end);
    const key = raw.trim();
    if (!key) {
      this.fail('identifier cannot be empty', start + 1);
    }
    this.validateKey(key, start + 1 + raw.indexOf(key));
    this.groupKey = key;
    this.column = end + 1;
    return { kind: 'group', key, lineNumber: this.lineNumber, position: start, lineText: this.line };
  }

  private readValueName(): null {
    const ch = this.peek();
    if (isIdentifierChar(ch) || ch === '.') {
      this.keyText += ch;
      this.column += 1;
      return null;
    }
    if (isWhitespace(ch)) {
      this.endKey();
      this.mode = 'searchingForValueSeparator';
      return null;
    }
    if (ch === VALUE_SEPARATOR) {
      this.endKey();
      this.column += 1;
      this.mode = 'readingValue';
      return null;
    }
    if (ch === COMMENT) {
      this.fail('comment before value separator');
    }
    this.fail(`invalid character in identifier: '${ch}'`);
  }

  private searchForValueSeparator(): null {
    const ch = this.peek();
    if (isWhitespace(ch)) {
      this.column += 1;
      return null;
    }
    if (ch === VALUE_SEPARATOR) {
      this.column += 1;
      this.mode = 'readingValue';
      return null;
    }
    this.fail(`expected value separator '${VALUE_SEPARATOR}'`, this.keyEnd);
  }

  private endKey(): void {
    this.keyEnd = this.column;
    this.validateKey(this.keyText, this.keyStart);
    const segments = splitKey(this.keyText);
    this.valueName = segments.pop() ?? '';
    this.valueGroup = [this.groupKey, ...segments].filter(part => part !== '').join('.');
  }

  private validateKey(key: string, column: number): void {
    let offset = column;
    for (const segment of splitKey(key)) {
      if (!segment) {
        this.fail('identifier cannot be empty', offset);
      }
      if (isDigit(segment.charAt(0))) {
        this.fail('identifier cannot start with a digit', offset);
      }
      if (!isKeySegment(segment)) {
        const bad = [...segment].findIndex(ch => !isIdentifierChar(ch));
        this.fail(`invalid character in identifier: '${segment.charAt(bad)}'`, offset + Math.max(bad, 0));
      }
      offset += segment.length + 1;
    }
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  private readValue(): LexerEvent | null {
    const ch = this.peek();
    if (isWhitespace(ch)) {
      this.column += 1;
      return null;
    }
    if (ch === COMMENT) {
      if (this.arrays.length === 0) {
        this.fail('expected value');
      }
      this.column = this.line.length;
      return null;
    }
    if (ch === ARRAY_START) {
      this.openArray();
      return null;
    }
    if (ch === ARRAY_END) {
      this.mode = 'readingArrayEnd';
      return null;
    }
    if (ch === QUOTE) {
      return this.startString();
    }
    if (ch === 't' || ch === 'T' || ch === 'f' || ch === 'F') {
      return this.readBoolean();
    }
    if (isDigit(ch) || ch === '-') {
      return this.readNumberOrDateTime();
    }
    this.fail(`invalid value: '${ch}'`);
  }

  private openArray(): void {
    const { group, name } = this.nextValueName();
    const array = new TomlArray(group, name, this.lineNumber, this.column);
    const parent = this.currentArray();
    if (parent) {
      parent.addEntry(array);
    }
    this.arrays.push(array);
    this.column += 1;
  }

  private readBoolean(): LexerEvent | null {
    const start = this.column;
    const end = this.tokenEnd(start);
    const text = this.line.slice(start, end);
    const lowered = text.toLowerCase();
    if (lowered !== 'true' && lowered !== 'false') {
      this.fail(`invalid boolean literal: '${text}'`, start);
    }
    this.column = end;
    return this.completeValue(this.createEntry(text, 'boolean', this.lineNumber, start));
  }

  /**
   * Reads an integer, a float, or hands a date-time over to the date-time
   * parser once a date separator follows the first four digits.
   */
  private readNumberOrDateTime(): LexerEvent | null {
    const start = this.column;
    let index = start;
    let digits = 0;
    let digitsBeforeDot = -1;

    while (index < this.line.length) {
      const ch = this.line.charAt(index);
      if (TOKEN_TERMINATORS.has(ch)) {
        break;
      }
      if (isDigit(ch)) {
        digits += 1;
        index += 1;
        continue;
      }
      if (ch === '-') {
        if (index === start) {
          index += 1;
          continue;
        }
        if (digits === 4 && digitsBeforeDot === -1 && index === start + 4) {
          return this.readDateTime(start);
        }
        this.fail('invalid numeric literal', index);
      }
      if (ch === '.') {
        if (digitsBeforeDot !== -1) {
          this.fail('numeric literal can only contain one decimal point', index);
        }
        if (digits === 0) {
          this.fail('invalid numeric literal', index);
        }
        digitsBeforeDot = digits;
        index += 1;
        continue;
      }
      this.fail(`invalid character in numeric literal: '${ch}'`, index);
    }

    if (digits === 0 || digits === digitsBeforeDot) {
      this.fail('invalid numeric literal', start);
    }

    const type: TomlType = digitsBeforeDot === -1 ? 'int' : 'float';
    this.column = index;
    return this.completeValue(this.createEntry(this.line.slice(start, index), type, this.lineNumber, start));
  }

  private readDateTime(start: number): LexerEvent | null {
    const end = this.tokenEnd(start);
    const text = this.line.slice(start, end);
    if (!parseDateTimeLiteral(text)) {
      this.fail(`invalid date-time literal: '${text}'`, start);
    }
    this.column = end;
    return this.completeValue(this.createEntry(text, 'datetime', this.lineNumber, start));
  }

  private startString(): LexerEvent | null {
    this.valueLine = this.lineNumber;
    this.valueColumn = this.column;
    this.buffer = '';
    this.escaping = false;

    if (this.line.startsWith(TRIPLE_QUOTE, this.column)) {
      this.column += TRIPLE_QUOTE.length;
      this.continuation = false;
      this.openedOnLine = true;
      this.mode = 'readingMultiLineStringValue';
      return null;
    }
    if (this.line.startsWith(QUOTE + QUOTE, this.column)) {
      this.column += 2;
      return this.completeValue(this.createEntry('', 'string', this.valueLine, this.valueColumn));
    }
    this.column += 1;
    this.mode = 'readingStringValue';
    return null;
  }

  private readStringValue(): LexerEvent | null {
    while (this.column < this.line.length) {
      const ch = this.peek();
      this.column += 1;
      if (this.escaping) {
        this.buffer += this.unescape(ch);
        this.escaping = false;
      } else if (ch === ESCAPE) {
        this.escaping = true;
      } else if (ch === QUOTE) {
        return this.completeValue(this.createEntry(this.buffer, 'string', this.valueLine, this.valueColumn));
      } else {
        this.buffer += ch;
      }
    }
    return null;
  }

  private readMultiLineStringValue(): LexerEvent | null {
    while (this.column < this.line.length) {
      const ch = this.peek();
      if (this.continuation) {
        if (isWhitespace(ch)) {
          this.column += 1;
          continue;
        }
        this.continuation = false;
      }
      if (this.escaping) {
        this.buffer += this.unescape(ch);
        this.escaping = false;
        this.column += 1;
        continue;
      }
      if (ch === ESCAPE) {
        if (this.column === this.line.length - 1) {
          this.continuation = true;
        } else {
          this.escaping = true;
        }
        this.column += 1;
        continue;
      }
      if (this.line.startsWith(TRIPLE_QUOTE, this.column)) {
        this.column += TRIPLE_QUOTE.length;
        return this.completeValue(this.createEntry(this.buffer, 'string', this.valueLine, this.valueColumn));
      }
      this.buffer += ch;
      this.column += 1;
    }
    return null;
  }

  private unescape(ch: string): string {
    const resolved = resolveEscape(ch);
    if (resolved === undefined) {
      this.fail(`invalid escape character: '${ch}'`, this.column - 1);
    }
    return resolved;
  }

  // ==========================================================================
  // Arrays
  // ==========================================================================

  private searchForArraySeparator(): null {
    const ch = this.peek();
    if (isWhitespace(ch)) {
      this.column += 1;
      return null;
    }
    if (ch === COMMENT) {
      this.column = this.line.length;
      return null;
    }
    if (ch === ARRAY_SEPARATOR) {
      this.column += 1;
      this.mode = 'readingValue';
      return null;
    }
    if (ch === ARRAY_END) {
      this.mode = 'readingArrayEnd';
      return null;
    }
    this.fail('expected array separator');
  }

  private readArrayEnd(): LexerEvent | null {
    const array = this.arrays.pop();
    if (!array) {
      this.fail('unexpected array terminator');
    }
    array.close();
    this.column += 1;
    if (this.arrays.length > 0) {
      this.mode = 'searchingForArraySeparator';
      return null;
    }
    return this.finishTopLevelValue(array);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private currentArray(): TomlArray | undefined {
    return this.arrays[this.arrays.length - 1];
  }

  private nextValueName(): { group: string; name: string } {
    const parent = this.currentArray();
    if (parent) {
      return { group: parent.elementGroup, name: parent.nextElementName };
    }
    return { group: this.valueGroup, name: this.valueName };
  }

  private createEntry(text: string, type: TomlType, lineNumber: number, position: number): TomlEntry {
    const { group, name } = this.nextValueName();
    return new TomlEntry(group, name, text, lineNumber, position, type);
  }

  private completeValue(entry: TomlEntry): LexerEvent | null {
    const parent = this.currentArray();
    if (parent) {
      parent.addEntry(entry);
      this.mode = 'searchingForArraySeparator';
      return null;
    }
    return this.finishTopLevelValue(entry);
  }

  private finishTopLevelValue(entry: TomlEntry): LexerEvent {
    this.mode = 'scanning';
    this.valueCompletedOnLine = true;
    return { kind: 'value', entry, lineText: this.keyLineText };
  }

  private tokenEnd(from: number): number {
    let index = from;
    while (index < this.line.length && !TOKEN_TERMINATORS.has(this.line.charAt(index))) {
      index += 1;
    }
    return index;
  }

  private peek(): string {
    return this.line.charAt(this.column);
  }

  private fail(message: string, column: number = this.column): never {
    throw new TomlParseError(message, {
      source: this.source.name,
      row: this.lineNumber,
      column,
      lineText: this.line,
    });
  }
}
