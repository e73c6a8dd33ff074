// src/drivers/common.ts

import { DataType } from '../constants/constants.js';
import { DataTypeError } from '../errors.js';
import { defineWindow } from '../framers/window-descriptor.js';

/** Status and error windows are shared by both controller families */
export const STATUS_WINDOW = defineWindow(205, false, DataType.Numeric, 'Pump status');
export const ERROR_CODE_WINDOW = defineWindow(206, false, DataType.Numeric, 'Error code');

type NumericEnum = Record<string, string | number>;

/**
 * Lists the names of the flags set in `flags`; an empty list means no error.
 */
export function describeErrorFlags(flags: number, table: NumericEnum): string[] {
  const names: string[] = [];
  for (const [name, bit] of Object.entries(table)) {
    if (typeof bit === 'number' && bit !== 0 && (flags & bit) === bit) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Narrows a status integer to a member of a numeric enum.
 * @throws DataTypeError for a value the enum does not define
 */
export function toEnumMember<T extends number>(
  value: number,
  table: NumericEnum,
  label: string
): T {
  if (!isEnumMember<T>(value, table)) {
    throw new DataTypeError(`Unknown ${label}: ${value}`);
  }
  return value;
}

function isEnumMember<T extends number>(value: number, table: NumericEnum): value is T {
  return typeof table[String(value)] === 'string';
}
