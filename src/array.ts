/**
 * TomlArray - an entry owning an ordered, possibly nested, list of entries
 *
 * The element type of an array is found by folding the tags of its children
 * in source order. A single pair that cannot be folded makes the whole array
 * `opaque`; there is no partial result.
 */

import { TomlEntry } from './entry';
import { TomlInvalidOperationError } from './errors';
import {
  ArrayDimensions,
  ArrayType,
  ElementType,
  ScalarElementType,
  TomlType,
  sameElementType,
} from './types';

export const ARRAY_START = '[';
export const ARRAY_END = ']';
export const ARRAY_SEPARATOR = ',';

export class TomlArray extends TomlEntry {
  private readonly content: TomlEntry[] = [];
  private closed = false;

  constructor(group: string, name: string, lineNumber: number, position: number) {
    super(group, name, '', lineNumber, position, 'array');
  }

  get children(): readonly TomlEntry[] {
    return this.content;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  override get sourceText(): string {
    return `${ARRAY_START}${this.content.map(c => c.sourceText).join(ARRAY_SEPARATOR)}${ARRAY_END}`;
  }

  /** Group path given to the children of this array. */
  get elementGroup(): string {
    return this.fullName;
  }

  /** Name the next appended child takes: its index. */
  get nextElementName(): string {
    return String(this.content.length);
  }

  addEntry(entry: TomlEntry): void {
    if (this.closed) {
      throw new TomlInvalidOperationError(`Cannot add to closed array ${this.fullName}`, {
        row: entry.lineNumber,
        column: entry.position,
      });
    }
    this.content.push(entry);
  }

  close(): void {
    this.closed = true;
  }

  getDimensions(): ArrayDimensions {
    let childDepth = 0;
    let childLength = 0;
    for (const child of this.childArrays()) {
      const dimensions = child.getDimensions();
      childDepth = Math.max(childDepth, dimensions.depth);
      childLength = Math.max(childLength, dimensions.length);
    }
    return {
      depth: 1 + childDepth,
      length: Math.max(this.content.length, childLength),
    };
  }

  getArrayType(): ArrayType {
    return { element: this.getElementType() };
  }

  getElementType(): ElementType {
    if (this.content.length === 0) {
      return 'opaque';
    }

    const [head, ...rest] = this.childArrays();
    if (head) {
      if (rest.length + 1 !== this.content.length) {
        return 'opaque';
      }
      const first = head.getArrayType();
      return rest.every(child => sameElementType(child.getArrayType(), first)) ? first : 'opaque';
    }

    let current: ScalarElementType | undefined;
    for (const child of this.content) {
      const folded = foldElementType(current, toElementType(child.parsedType));
      if (folded === null) {
        return 'opaque';
      }
      current = folded;
    }
    return current ?? 'opaque';
  }

  override toString(): string {
    return `${ARRAY_START}${this.content.map(c => c.toString()).join(`${ARRAY_SEPARATOR} `)}${ARRAY_END}`;
  }

  private childArrays(): TomlArray[] {
    return this.content.filter((child): child is TomlArray => child instanceof TomlArray);
  }
}

export function toElementType(type: TomlType): ScalarElementType {
  switch (type) {
    case 'int':
    case 'float':
    case 'boolean':
    case 'datetime':
    case 'string':
      return type;
    case 'array':
      return 'opaque';
  }
}

/**
 * Folds `next` into the type established so far. Returns `null` when the two
 * cannot share an element type.
 */
export function foldElementType(current: ScalarElementType | undefined, next: ScalarElementType): ScalarElementType | null {
  switch (next) {
    case 'int':
      if (current === undefined || current === 'int') return 'int';
      if (current === 'float') return 'float';
      return null;
    case 'float':
      if (current === undefined || current === 'float' || current === 'int') return 'float';
      return null;
    case 'boolean':
      if (current === undefined || current === 'boolean') return 'boolean';
      return null;
    case 'datetime':
      if (current === undefined || current === 'datetime') return 'datetime';
      if (current === 'string') return 'string';
      return null;
    case 'string':
      if (current === undefined || current === 'string' || current === 'datetime') return 'string';
      return null;
    case 'opaque':
      return null;
  }
}
