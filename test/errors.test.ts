import { TomlConversionError, TomlError, TomlKeyNotFoundError } from '../src/errors';

describe('TomlError', () => {
  test('should prefix the message with whatever location is known', () => {
    expect(new TomlError('bad').message).toBe('bad');
    expect(new TomlError('bad', { source: 'app.toml' }).message).toBe('app.toml - bad');
    expect(new TomlError('bad', { row: 3 }).message).toBe('3 - bad');
    expect(new TomlError('bad', { source: 'app.toml', row: 3, column: 7 }).message).toBe('app.toml:3:7 - bad');
  });

  test('should append the offending line without its line break', () => {
    const err = new TomlError('bad', { row: 1, column: 0, lineText: 'x = ?\r\n' });

    expect(err.message).toBe('1:0 - bad\n    x = ?');
    expect(err.lineText).toBe('x = ?\r\n');
  });

  test('should describe lookup and conversion failures', () => {
    expect(new TomlKeyNotFoundError('a.b').message).toBe('Key not found: a.b');
    expect(new TomlKeyNotFoundError('a.b.c', 'a.b').message).toBe('Key not found: a.b (resolving a.b.c)');
    expect(new TomlConversionError('port', 'int', 'not an integer literal: x', { row: 2, column: 7 }).message).toBe(
      '2:7 - Cannot convert port to int: not an integer literal: x'
    );
  });
});
