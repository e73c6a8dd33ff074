// src/utils/checksum.ts

import { FRAME } from '../constants/constants.js';

/**
 * Calculates the 8-bit XOR checksum of a frame.
 * A leading STX is not part of the checksummed range.
 *
 * XOR folding is order independent and catches every single-bit error,
 * but two flipped bits in the same position cancel out. It is a line-noise
 * check, not an integrity guarantee.
 * @param message - frame bytes, optionally starting with STX
 * @returns checksum 0x00-0xFF
 */
export function calcChecksum(message: Uint8Array): number {
  const start = message[0] === FRAME.STX ? 1 : 0;
  let result = 0;
  for (let i = start; i < message.length; i++) {
    result ^= message[i] ?? 0;
  }
  return result;
}

/**
 * Renders a checksum as two uppercase hex ASCII bytes.
 */
export function formatChecksum(checksum: number): Uint8Array {
  const text = (checksum & 0xff).toString(16).toUpperCase().padStart(FRAME.CHECKSUM_LENGTH, '0');
  return new Uint8Array([text.charCodeAt(0), text.charCodeAt(1)]);
}

/**
 * Parses two hex ASCII bytes, or returns null when they are not hex.
 */
export function parseChecksum(digits: Uint8Array): number | null {
  if (digits.length !== FRAME.CHECKSUM_LENGTH) return null;
  const text = String.fromCharCode(...digits);
  if (!/^[0-9A-Fa-f]{2}$/.test(text)) return null;
  return parseInt(text, 16);
}

/**
 * Validates a frame that carries its two checksum digits at the end.
 * @param message - frame bytes including the trailing hex checksum
 * @returns true if the checksum is valid; false for a wrong or unparsable checksum
 */
export function validateChecksum(message: Uint8Array): boolean {
  if (message.length < FRAME.CHECKSUM_LENGTH + 1) return false;
  const received = parseChecksum(message.subarray(message.length - FRAME.CHECKSUM_LENGTH));
  if (received === null) return false;
  return calcChecksum(message.subarray(0, message.length - FRAME.CHECKSUM_LENGTH)) === received;
}
