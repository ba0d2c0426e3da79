/**
 * Converters from raw literal text to typed values, used by the document's
 * typed accessors. A converter reports failure through its result and never
 * throws.
 */

import { ConversionResult } from './types';
import { parseDateTimeLiteral } from './datetime';

export interface ValueConverter<T> {
  readonly name: string;
  tryConvert(text: string): ConversionResult<T>;
}

const INT_REGEX = /^-?\d+$/;
const FLOAT_REGEX = /^-?\d+(\.\d+)?$/;
const UUID_REGEX = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function ok<T>(value: T): ConversionResult<T> {
  return { success: true, value };
}

function fail<T>(reason: string): ConversionResult<T> {
  return { success: false, reason };
}

export function createConverter<T>(name: string, tryConvert: (text: string) => ConversionResult<T>): ValueConverter<T> {
  return { name, tryConvert };
}

export const Converters = {
  string: createConverter<string>('string', text => ok(text)),

  int: createConverter<number>('int', text => {
    if (!INT_REGEX.test(text)) {
      return fail(`not an integer literal: ${text}`);
    }
    const value = Number(text);
    return Number.isSafeInteger(value) ? ok(value) : fail(`integer out of safe range: ${text}`);
  }),

  bigint: createConverter<bigint>('bigint', text => {
    if (!INT_REGEX.test(text)) {
      return fail(`not an integer literal: ${text}`);
    }
    const value = BigInt(text);
    return value >= INT64_MIN && value <= INT64_MAX ? ok(value) : fail(`integer out of 64-bit range: ${text}`);
  }),

  float: createConverter<number>('float', text => {
    if (!FLOAT_REGEX.test(text)) {
      return fail(`not a decimal literal: ${text}`);
    }
    return ok(Number(text));
  }),

  boolean: createConverter<boolean>('boolean', text => {
    const lowered = text.toLowerCase();
    if (lowered === 'true') return ok(true);
    if (lowered === 'false') return ok(false);
    return fail(`not a boolean literal: ${text}`);
  }),

  datetime: createConverter<Date>('datetime', text => {
    const value = parseDateTimeLiteral(text);
    return value ? ok(value) : fail(`not a date-time literal: ${text}`);
  }),

  uuid: createConverter<string>('uuid', text => {
    return UUID_REGEX.test(text) ? ok(text.toLowerCase()) : fail(`not a UUID: ${text}`);
  }),
};
