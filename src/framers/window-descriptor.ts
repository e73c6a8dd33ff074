// src/framers/window-descriptor.ts

import { DataType, WINDOW_RANGE } from '../constants/constants.js';
import { ConfigError } from '../errors.js';
import type { WindowDescriptor } from '../types/window-types.js';

/**
 * Creates a frozen catalog entry.
 * @throws ConfigError for a window number outside 0-999
 */
export function defineWindow(
  win: number,
  writable: boolean,
  datatype: DataType,
  description: string
): WindowDescriptor {
  if (!Number.isInteger(win) || win < WINDOW_RANGE.MIN || win > WINDOW_RANGE.MAX) {
    throw new ConfigError(`Window number must be between 0-999, got ${win}`);
  }
  return Object.freeze({ win, writable, datatype, description });
}

/** Orders descriptors by window number */
export function compareWindows(a: WindowDescriptor, b: WindowDescriptor): number {
  return a.win - b.win;
}
