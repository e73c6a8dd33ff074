// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view on a slice of the input array (shares the underlying buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number, fill: number = 0): Uint8Array {
  const arr: Uint8Array = new Uint8Array(size);
  if (fill !== 0) {
    arr.fill(fill);
  }
  return arr;
}

/**
 * Converts a Uint8Array to a space separated hex dump, for logs.
 */
export function toHex(uint8arr: Uint8Array): string {
  const parts: string[] = [];
  for (const b of uint8arr) {
    parts.push((HEX_TABLE[(b >> 4) & 0xf] ?? '0') + (HEX_TABLE[b & 0xf] ?? '0'));
  }
  return parts.join(' ');
}

/**
 * Index of the first occurrence of `byte`, or -1.
 */
export function indexOfByte(arr: Uint8Array, byte: number, fromIndex: number = 0): number {
  return arr.indexOf(byte, fromIndex);
}

/**
 * Encodes a string as ISO-8859-1, one byte per character.
 * @throws RangeError if a character lies above U+00FF
 */
export function latin1Encode(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) {
      throw new RangeError(`Character U+${code.toString(16).padStart(4, '0')} is not ISO-8859-1`);
    }
    out[i] = code;
  }
  return out;
}

export function latin1Decode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}
