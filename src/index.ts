/**
 * toml-groups
 * Parser and document model for a TOML-like configuration format
 */

export { TomlParser, load, loads, tokenize } from './parser';
export { TomlLexer } from './lexer';
export type { LexerEvent, LexerMode } from './lexer';
export { TomlDocument } from './document';
export { TomlGroup } from './group';
export { TomlEntry } from './entry';
export { TomlArray, foldElementType } from './array';
export { Converters, createConverter } from './convert';
export type { ValueConverter } from './convert';
export { parseDateTimeLiteral } from './datetime';
export { serialize } from './serializer';
export type { FieldSchema, ScalarFieldSchema, TomlSchema, SerializableValue } from './serializer';
export { stringSource, fileSource } from './source';
export type { LineSource, SourceLine } from './source';
export { logger, configureLogger } from './logger';
export {
  TomlError,
  TomlParseError,
  TomlKeyNotFoundError,
  TomlDuplicateKeyError,
  TomlInvalidOperationError,
  TomlConversionError,
  TomlSerializationError,
} from './errors';
export type { SourceLocation } from './errors';
export { describeType, isArrayType } from './types';
export type {
  TomlType,
  ScalarElementType,
  ElementType,
  ArrayType,
  ArrayDimensions,
  ConversionResult,
  TomlParserOptions,
} from './types';

// Default export for convenience
export { load as default } from './parser';
