/**
 * Schema-driven writer producing document text from plain objects
 *
 * Fields are written in three passes: scalars, then arrays, then nested
 * groups, each group under its own `[parent.child]` header.
 */

import { TomlSerializationError } from './errors';
import { quoteString } from './escapes';
import { ARRAY_END, ARRAY_SEPARATOR, ARRAY_START } from './array';
import { GROUP_END, GROUP_START } from './group';
import { KEY_SEPARATOR, isKeySegment, joinKey, splitKey } from './entry';

export type ScalarFieldSchema = { kind: 'string' | 'int' | 'float' | 'boolean' | 'datetime' };

export type FieldSchema =
  | ScalarFieldSchema
  | { kind: 'array'; element: FieldSchema }
  | { kind: 'group'; schema: TomlSchema };

export interface TomlSchema {
  readonly [field: string]: FieldSchema;
}

export type SerializableValue = Readonly<Record<string, unknown>>;

export function serialize(value: SerializableValue, schema: TomlSchema, rootKeyGroup = ''): string {
  const lines: string[] = [];
  const keyGroup = trimKeyGroup(rootKeyGroup);
  if (keyGroup) {
    splitKey(keyGroup).forEach(checkKeyName);
  }
  writeGroup(lines, value, schema, keyGroup);
  return lines.map(line => `${line}\n`).join('');
}

function trimKeyGroup(keyGroup: string): string {
  let trimmed = keyGroup.trim();
  while (trimmed.startsWith(GROUP_START) || trimmed.startsWith(KEY_SEPARATOR)) {
    trimmed = trimmed.slice(1);
  }
  while (trimmed.endsWith(GROUP_END) || trimmed.endsWith(KEY_SEPARATOR)) {
    trimmed = trimmed.slice(0, -1);
  }
  return trimmed;
}

function writeGroup(lines: string[], value: SerializableValue, schema: TomlSchema, keyGroup: string): void {
  if (keyGroup) {
    lines.push(`${GROUP_START}${keyGroup}${GROUP_END}`);
  }

  const fields = Object.entries(schema).filter(([name]) => value[name] !== undefined && value[name] !== null);
  fields.forEach(([name]) => checkKeyName(name));

  for (const [name, field] of fields) {
    if (field.kind !== 'array' && field.kind !== 'group') {
      lines.push(`${name} = ${formatScalar(field, value[name], name)}`);
    }
  }

  for (const [name, field] of fields) {
    if (field.kind === 'array') {
      lines.push(`${name} = ${formatArray(field.element, value[name], name)}`);
    }
  }

  for (const [name, field] of fields) {
    if (field.kind === 'group') {
      const nested = value[name];
      if (!isRecord(nested)) {
        throw new TomlSerializationError(`Expected an object for ${name}`);
      }
      lines.push('');
      writeGroup(lines, nested, field.schema, joinKey(keyGroup, name));
    }
  }
}

function formatArray(element: FieldSchema, value: unknown, name: string): string {
  if (!Array.isArray(value)) {
    throw new TomlSerializationError(`Expected an array for ${name}`);
  }
  if (element.kind === 'group') {
    throw new TomlSerializationError(`Cannot serialize complex types in an array: ${name}`);
  }
  const items = value.map((item: unknown, index: number) => {
    const itemName = `${name}[${index}]`;
    return element.kind === 'array' ? formatArray(element.element, item, itemName) : formatScalar(element, item, itemName);
  });
  return `${ARRAY_START}${items.join(`${ARRAY_SEPARATOR} `)}${ARRAY_END}`;
}

function formatScalar(field: ScalarFieldSchema, value: unknown, name: string): string {
  switch (field.kind) {
    case 'string':
      if (typeof value === 'string') return quoteString(value);
      break;
    case 'int':
      if (typeof value === 'bigint') return value.toString();
      if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
      break;
    case 'float':
      if (typeof value === 'number' && Number.isFinite(value)) {
        const text = String(value);
        if (/e/i.test(text)) {
          throw new TomlSerializationError(`Cannot write ${name} without an exponent: ${text}`);
        }
        return /^-?\d+$/.test(text) ? `${text}.0` : text;
      }
      break;
    case 'boolean':
      if (typeof value === 'boolean') return String(value);
      break;
    case 'datetime':
      if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
      break;
  }
  throw new TomlSerializationError(`Expected a ${field.kind} value for ${name}`);
}

function checkKeyName(name: string): void {
  if (!isKeySegment(name)) {
    throw new TomlSerializationError(`Invalid key name: '${name}'`);
  }
}

function isRecord(value: unknown): value is SerializableValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
