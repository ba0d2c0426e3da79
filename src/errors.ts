export interface SourceLocation {
  source?: string | undefined;
  row?: number | undefined;
  column?: number | undefined;
  lineText?: string | undefined;
}

export class TomlError extends Error {
  source?: string | undefined;
  row?: number | undefined;
  column?: number | undefined;
  lineText?: string | undefined;

  constructor(message: string, location: SourceLocation = {}) {
    super(TomlError.locate(message, location));
    this.name = 'TomlError';
    this.source = location.source;
    this.row = location.row;
    this.column = location.column;
    this.lineText = location.lineText;
  }

  /** `source:row:column - message`, then the offending line indented by four spaces. */
  private static locate(message: string, { source, row, column, lineText }: SourceLocation): string {
    const where: string[] = source ? [source] : [];
    if (row !== undefined) {
      where.push(column === undefined ? `${row}` : `${row}:${column}`);
    }
    const located = where.length > 0 ? `${where.join(':')} - ${message}` : message;
    const line = lineText?.replace(/\r?\n$/, '');
    return line ? `${located}\n    ${line}` : located;
  }
}

/**
 * Raised by the lexer for any lexical or structural problem. Parsing never
 * continues past one of these.
 */
export class TomlParseError extends TomlError {
  readonly detail: string;

  constructor(detail: string, location: SourceLocation & { row: number; column: number; lineText: string }) {
    super(detail, location);
    this.name = 'TomlParseError';
    this.detail = detail;
  }
}

export class TomlKeyNotFoundError extends TomlError {
  readonly path: string;

  constructor(path: string, missing: string = path) {
    super(`Key not found: ${missing}${missing === path ? '' : ` (resolving ${path})`}`);
    this.name = 'TomlKeyNotFoundError';
    this.path = path;
  }
}

export class TomlDuplicateKeyError extends TomlError {
  readonly path: string;

  constructor(path: string, location: SourceLocation = {}) {
    super(`Duplicate key: ${path}`, location);
    this.name = 'TomlDuplicateKeyError';
    this.path = path;
  }
}

export class TomlInvalidOperationError extends TomlError {
  constructor(message: string, location: SourceLocation = {}) {
    super(message, location);
    this.name = 'TomlInvalidOperationError';
  }
}

export class TomlConversionError extends TomlError {
  readonly path: string;
  readonly converter: string;
  readonly reason: string;

  constructor(path: string, converter: string, reason: string, location: SourceLocation = {}) {
    super(`Cannot convert ${path} to ${converter}: ${reason}`, location);
    this.name = 'TomlConversionError';
    this.path = path;
    this.converter = converter;
    this.reason = reason;
  }
}

export class TomlSerializationError extends TomlError {
  constructor(message: string) {
    super(message);
    this.name = 'TomlSerializationError';
  }
}
