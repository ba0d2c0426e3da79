/**
 * Type definitions shared by the lexer, the document model and the accessors
 */

import type { Logger } from 'pino';

// Tag the lexer assigns to every value it reads
export type TomlType = 'string' | 'int' | 'float' | 'datetime' | 'boolean' | 'array';

// Scalar tags plus the fallback used when an array's children cannot be unified
export type ScalarElementType = Exclude<TomlType, 'array'> | 'opaque';

export interface ArrayType {
  readonly element: ElementType;
}

export type ElementType = ScalarElementType | ArrayType;

export interface ArrayDimensions {
  depth: number;
  length: number;
}

export type ConversionResult<T> =
  | { success: true; value: T }
  | { success: false; reason: string };

// Parser configuration options
export interface TomlParserOptions {
  /** Name reported in error locations when parsing in-memory content. */
  sourceName?: string | undefined;
  logger?: Logger | undefined;
}

export function isArrayType(type: ElementType): type is ArrayType {
  return typeof type === 'object';
}

export function sameElementType(a: ElementType, b: ElementType): boolean {
  if (isArrayType(a) && isArrayType(b)) {
    return sameElementType(a.element, b.element);
  }
  return a === b;
}

export function describeType(type: ElementType): string {
  if (isArrayType(type)) {
    return `${describeType(type.element)}[]`;
  }
  return type;
}
