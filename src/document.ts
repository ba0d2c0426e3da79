/**
 * TomlDocument - root of a parsed source, with typed accessors
 */

import { TomlGroup } from './group';
import { TomlEntry } from './entry';
import { TomlArray } from './array';
import { ValueConverter } from './convert';
import { ArrayType, ConversionResult } from './types';
import { TomlConversionError, TomlInvalidOperationError } from './errors';

export class TomlDocument extends TomlGroup {
  constructor() {
    super('', null);
  }

  getValue(path: string): TomlEntry {
    return this.getEntry(path);
  }

  tryGetValue(path: string): TomlEntry | undefined {
    return this.tryGetEntry(path);
  }

  getFieldValue<T>(path: string, converter: ValueConverter<T>): T {
    const entry = this.getValue(path);
    return convertEntry(entry, converter);
  }

  tryGetFieldValue<T>(path: string, converter: ValueConverter<T>): ConversionResult<T> {
    const entry = this.tryGetValue(path);
    if (!entry) {
      return { success: false, reason: `Key not found: ${path}` };
    }
    return converter.tryConvert(entry.sourceText);
  }

  getArrayValue<T>(path: string, converter: ValueConverter<T>): T[] {
    return this.getArray(path).children.map(child => convertEntry(child, converter));
  }

  getArrayType(path: string): ArrayType {
    return this.getArray(path).getArrayType();
  }

  getArray(path: string): TomlArray {
    const entry = this.getValue(path);
    if (!(entry instanceof TomlArray)) {
      throw new TomlInvalidOperationError(`${path} is not an array (found ${entry.parsedType})`, {
        row: entry.lineNumber,
        column: entry.position,
      });
    }
    return entry;
  }
}

function convertEntry<T>(entry: TomlEntry, converter: ValueConverter<T>): T {
  const result = converter.tryConvert(entry.sourceText);
  if (!result.success) {
    throw new TomlConversionError(entry.fullName, converter.name, result.reason, {
      row: entry.lineNumber,
      column: entry.position,
    });
  }
  return result.value;
}
