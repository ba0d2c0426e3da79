import { loads } from '../src/index';
import { TomlArray, foldElementType } from '../src/array';
import { TomlEntry } from '../src/entry';
import { TomlInvalidOperationError } from '../src/errors';
import { describeType } from '../src/types';

function elementType(literal: string): string {
  const doc = loads(`a = ${literal}`);
  return describeType(doc.getArray('a').getElementType());
}

describe('TomlArray', () => {
  describe('Element type folding', () => {
    test('should keep a single scalar type', () => {
      expect(elementType('[1, 2, 3]')).toBe('int');
      expect(elementType('[true, false]')).toBe('boolean');
      expect(elementType('[2020-01-01, 2021-02-03]')).toBe('datetime');
      expect(elementType('["a", "b"]')).toBe('string');
    });

    test('should promote integers to floats in either order', () => {
      expect(elementType('[1, 2.0]')).toBe('float');
      expect(elementType('[2.0, 1]')).toBe('float');
    });

    test('should never fold booleans with other types', () => {
      expect(elementType('[true, 1]')).toBe('opaque');
      expect(elementType('[1, true]')).toBe('opaque');
      expect(elementType('["x", true]')).toBe('opaque');
      expect(elementType('[true, "x"]')).toBe('opaque');
    });

    test('should let strings absorb date-times', () => {
      expect(elementType('["x", 2020-01-01]')).toBe('string');
      expect(elementType('[2020-01-01, "x"]')).toBe('string');
    });

    test('should not mix strings and numbers', () => {
      expect(elementType('[1, "x"]')).toBe('opaque');
      expect(elementType('["x", 1.5]')).toBe('opaque');
    });

    test('should fall back to opaque for an empty array', () => {
      expect(elementType('[]')).toBe('opaque');
    });

    test('should fold nested arrays recursively', () => {
      expect(elementType('[[1, 2], [3, 4]]')).toBe('int[]');
      expect(elementType('[[1, 2.5], [3.0]]')).toBe('float[]');
      expect(elementType('[[1], [2.0]]')).toBe('opaque');
      expect(elementType('[[1], ["x"]]')).toBe('opaque');
      expect(elementType('[[1], 2]')).toBe('opaque');
      expect(elementType('[[[1]], [[2]]]')).toBe('int[][]');
    });

    test('should describe the array type itself', () => {
      const doc = loads('matrix = [[1, 2], [3, 4]]\nflags = [true, 1]');

      expect(describeType(doc.getArrayType('matrix'))).toBe('int[][]');
      expect(describeType(doc.getArrayType('flags'))).toBe('opaque[]');
    });

    test('should reject any pair involving an opaque type', () => {
      expect(foldElementType(undefined, 'opaque')).toBeNull();
      expect(foldElementType('string', 'opaque')).toBeNull();
      expect(foldElementType('boolean', 'string')).toBeNull();
      expect(foldElementType('datetime', 'string')).toBe('string');
      expect(foldElementType('string', 'datetime')).toBe('string');
      expect(foldElementType('int', 'datetime')).toBeNull();
    });
  });

  describe('Dimensions', () => {
    test('should report depth and length', () => {
      const doc = loads([
        'flat = [1, 2, 3]',
        'matrix = [[1, 2], [3, 4]]',
        'wide = [[1, 2, 3]]',
        'deep = [1, [2, [3]]]',
        'empty = []',
      ].join('\n'));

      expect(doc.getArray('flat').getDimensions()).toEqual({ depth: 1, length: 3 });
      expect(doc.getArray('matrix').getDimensions()).toEqual({ depth: 2, length: 2 });
      expect(doc.getArray('wide').getDimensions()).toEqual({ depth: 2, length: 3 });
      expect(doc.getArray('deep').getDimensions()).toEqual({ depth: 3, length: 2 });
      expect(doc.getArray('empty').getDimensions()).toEqual({ depth: 1, length: 0 });
    });
  });

  describe('Construction', () => {
    test('should refuse children once closed', () => {
      const array = new TomlArray('', 'ports', 1, 8);
      array.addEntry(new TomlEntry(array.elementGroup, array.nextElementName, '80', 1, 9, 'int'));
      array.close();

      expect(array.sourceText).toBe('[80]');
      expect(array.children[0]?.fullName).toBe('ports.0');
      expect(array.nextElementName).toBe('1');
      expect(() => array.addEntry(new TomlEntry('ports', '1', '81', 1, 13, 'int'))).toThrow(TomlInvalidOperationError);
    });
  });
});
