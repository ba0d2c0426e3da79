import { Converters, createConverter } from '../src/convert';
import { parseDateTimeLiteral } from '../src/datetime';

describe('Converters', () => {
  test('should convert integers within the safe range', () => {
    expect(Converters.int.tryConvert('42')).toEqual({ success: true, value: 42 });
    expect(Converters.int.tryConvert('-7')).toEqual({ success: true, value: -7 });
    expect(Converters.int.tryConvert('1.5').success).toBe(false);
    expect(Converters.int.tryConvert('9007199254740993')).toEqual({
      success: false,
      reason: 'integer out of safe range: 9007199254740993',
    });
  });

  test('should convert 64-bit integers to bigint', () => {
    expect(Converters.bigint.tryConvert('9223372036854775807')).toEqual({
      success: true,
      value: 9223372036854775807n,
    });
    expect(Converters.bigint.tryConvert('9223372036854775808').success).toBe(false);
    expect(Converters.bigint.tryConvert('abc').success).toBe(false);
  });

  test('should convert floats and booleans', () => {
    expect(Converters.float.tryConvert('3.25')).toEqual({ success: true, value: 3.25 });
    expect(Converters.float.tryConvert('3')).toEqual({ success: true, value: 3 });
    expect(Converters.float.tryConvert('three').success).toBe(false);
    expect(Converters.boolean.tryConvert('TRUE')).toEqual({ success: true, value: true });
    expect(Converters.boolean.tryConvert('false')).toEqual({ success: true, value: false });
    expect(Converters.boolean.tryConvert('yes').success).toBe(false);
  });

  test('should convert date-times and UUIDs', () => {
    const result = Converters.datetime.tryConvert('1979-05-27T07:32:00Z');
    expect(result.success && result.value.getTime()).toBe(Date.UTC(1979, 4, 27, 7, 32, 0));
    expect(Converters.datetime.tryConvert('1979-05-27 07:32').success).toBe(false);
    expect(Converters.uuid.tryConvert('00000000-0000-0000-0000-00000000ABCD')).toEqual({
      success: true,
      value: '00000000-0000-0000-0000-00000000abcd',
    });
    expect(Converters.uuid.tryConvert('not-a-uuid').success).toBe(false);
  });

  test('should accept custom converters', () => {
    const port = createConverter<number>('port', text => {
      const value = Number(text);
      return value > 0 && value < 65536 ? { success: true, value } : { success: false, reason: `bad port ${text}` };
    });

    expect(port.name).toBe('port');
    expect(port.tryConvert('8080')).toEqual({ success: true, value: 8080 });
    expect(port.tryConvert('70000')).toEqual({ success: false, reason: 'bad port 70000' });
  });
});

describe('parseDateTimeLiteral', () => {
  test('should read dates as UTC midnight', () => {
    expect(parseDateTimeLiteral('2020-02-29')?.getTime()).toBe(Date.UTC(2020, 1, 29));
    expect(parseDateTimeLiteral('2021-02-29')).toBeUndefined();
    expect(parseDateTimeLiteral('2021-04-31')).toBeUndefined();
  });

  test('should apply offsets and fractional seconds', () => {
    expect(parseDateTimeLiteral('1979-05-27T00:32:00-07:00')?.getTime()).toBe(Date.UTC(1979, 4, 27, 7, 32, 0));
    expect(parseDateTimeLiteral('1979-05-27T00:32:00.999999-07:00')?.getTime()).toBe(
      Date.UTC(1979, 4, 27, 7, 32, 0, 999)
    );
    expect(parseDateTimeLiteral('1979-05-27t07:32:00z')?.getTime()).toBe(Date.UTC(1979, 4, 27, 7, 32, 0));
  });

  test('should keep years below 100 as written', () => {
    expect(parseDateTimeLiteral('0050-01-01')?.toISOString()).toBe('0050-01-01T00:00:00.000Z');
    expect(parseDateTimeLiteral('0000-02-29')?.toISOString()).toBe('0000-02-29T00:00:00.000Z');
    expect(parseDateTimeLiteral('0099-12-31T23:00:00-02:00')?.toISOString()).toBe('0100-01-01T01:00:00.000Z');
    expect(parseDateTimeLiteral('0100-02-29')).toBeUndefined();
  });

  test('should reject out-of-range fields and other text', () => {
    expect(parseDateTimeLiteral('2020-01-01T25:00:00')).toBeUndefined();
    expect(parseDateTimeLiteral('2020-01-01T10:60:00')).toBeUndefined();
    expect(parseDateTimeLiteral('2020-1-01')).toBeUndefined();
    expect(parseDateTimeLiteral('hello')).toBeUndefined();
  });
});
