// src/framers/window-values.ts

import { DataType, FRAME } from '../constants/constants.js';
import { DataTypeError, OutOfRangeError } from '../errors.js';

/**
 * Logic windows take a boolean or the integers 0/1.
 * @throws OutOfRangeError for any other integer
 * @throws DataTypeError for any other type
 */
export function logicToString(value: unknown): string {
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    if (value === 0) return '0';
    if (value === 1) return '1';
    throw new OutOfRangeError(`Logic value must be boolean, 0 or 1, got ${value}`);
  }
  throw new DataTypeError(`Logic value must be boolean or integer, got ${describeType(value)}`);
}

/**
 * Numeric windows take an integer (rendered `%06d`) or a pre-formatted string
 * such as an exponential pressure set point.
 * @throws OutOfRangeError for an integer beyond the safe integer range
 * @throws DataTypeError for any other type
 */
export function numericToString(value: unknown): string {
  if (typeof value === 'number' && Number.isInteger(value)) {
    if (!Number.isSafeInteger(value)) {
      throw new OutOfRangeError(`Numeric value ${value} is not a safe integer`);
    }
    const digits = Math.abs(value).toString();
    // %06d: the sign counts toward the width
    return value < 0
      ? `-${digits.padStart(FRAME.NUMERIC_WIDTH - 1, '0')}`
      : digits.padStart(FRAME.NUMERIC_WIDTH, '0');
  }
  if (typeof value === 'string') {
    return value;
  }
  throw new DataTypeError(`Numeric value must be integer or string, got ${describeType(value)}`);
}

export function alphanumericToString(value: unknown): string {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  throw new DataTypeError(`Alphanumeric value must be a string, got ${describeType(value)}`);
}

/**
 * Converts a value to the ASCII payload of a window of the given type.
 */
export function encodeWindowValue(datatype: DataType, value: unknown): string {
  switch (datatype) {
    case DataType.Logic:
      return logicToString(value);
    case DataType.Numeric:
      return numericToString(value);
    case DataType.Alphanumeric:
      return alphanumericToString(value);
    default:
      throw new DataTypeError(`Unsupported data type: ${String(datatype)}`);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return Number.isFinite(value) ? `non-integer ${value}` : String(value);
  return typeof value;
}
