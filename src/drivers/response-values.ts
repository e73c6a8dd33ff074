// src/drivers/response-values.ts

import { DataTypeError } from '../errors.js';
import type { DataResponse, Response } from '../types/window-types.js';
import { latin1Decode } from '../utils/utils.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
// 1.5E-07, 5.0E-09, 12, -0.5
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(E[+-]?\d+)?$/i;

function payload(response: Response): { text: string; response: DataResponse } {
  if (response.kind !== 'data') {
    throw new DataTypeError(`Control reply carries no data (result code 0x${response.resultCode.toString(16)})`);
  }
  return { text: latin1Decode(response.data).trim(), response };
}

/**
 * @throws DataTypeError unless the payload is `0` or `1`
 */
export function toLogic(response: Response): boolean {
  const { text, response: data } = payload(response);
  if (text === '1') return true;
  if (text === '0') return false;
  throw new DataTypeError(`Window ${data.win}: expected logic 0/1, got "${text}"`);
}

export function toInteger(response: Response): number {
  const { text, response: data } = payload(response);
  if (!INTEGER_PATTERN.test(text)) {
    throw new DataTypeError(`Window ${data.win}: expected integer, got "${text}"`);
  }
  return parseInt(text, 10);
}

export function toFloat(response: Response): number {
  const { text, response: data } = payload(response);
  if (!FLOAT_PATTERN.test(text)) {
    throw new DataTypeError(`Window ${data.win}: expected number, got "${text}"`);
  }
  return parseFloat(text);
}

/** Payload as text, surrounding blanks removed */
export function toText(response: Response): string {
  return payload(response).text;
}
