// src/framers/window-framer.ts

import {
  ADDRESS_RANGE,
  FRAME,
  ResultCode,
  WINDOW_RANGE,
  isResultCode,
} from '../constants/constants.js';
import {
  ChecksumMismatchError,
  DataTypeError,
  IncompleteFrameError,
  InvalidAddressError,
  MalformedFrameError,
  UnknownWindowError,
  UnrecognizedResultCodeError,
  WinDisabledError,
  errorForResultCode,
} from '../errors.js';
import type {
  ControlResponse,
  DataResponse,
  DecodeOptions,
  EncodeOptions,
  Response,
  WindowDescriptor,
} from '../types/window-types.js';
import { calcChecksum, formatChecksum, parseChecksum } from '../utils/checksum.js';
import { concatUint8Arrays, indexOfByte, latin1Encode, toHex } from '../utils/utils.js';
import { encodeWindowValue } from './window-values.js';

/**
 * Biases a device address into the 0x80-0x9F range.
 * @throws InvalidAddressError outside 0-31
 */
export function encodeAddress(address: number): number {
  if (!Number.isInteger(address) || address < ADDRESS_RANGE.MIN || address > ADDRESS_RANGE.MAX) {
    throw new InvalidAddressError(address);
  }
  return address + FRAME.ADDRESS_BIAS;
}

export function decodeAddress(byte: number): number {
  return byte - FRAME.ADDRESS_BIAS;
}

function formatWindow(win: number): string {
  if (!Number.isInteger(win) || win < WINDOW_RANGE.MIN || win > WINDOW_RANGE.MAX) {
    throw new UnknownWindowError(`Window number must be between 0-999, got ${win}`);
  }
  return win.toString().padStart(FRAME.WINDOW_DIGITS, '0');
}

function payloadBytes(text: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = latin1Encode(text);
  } catch (err: unknown) {
    throw new DataTypeError(err instanceof Error ? err.message : String(err));
  }
  if (bytes.includes(FRAME.STX) || bytes.includes(FRAME.ETX)) {
    throw new DataTypeError('Payload must not contain STX or ETX');
  }
  return bytes;
}

/**
 * Builds a request frame: `<STX><ADDR><WIN><RW>[DATA]<ETX><CRC>`.
 * @param descriptor - target window
 * @param options - value, device address (default 0) and access mode (default read)
 * @returns frame bytes ready for the transport
 * @throws WinDisabledError on a write to a read-only window
 * @throws DataTypeError on a write without value or with a value of the wrong type
 * @throws OutOfRangeError on a logic write outside 0/1
 */
export function encodeRequest(descriptor: WindowDescriptor, options: EncodeOptions = {}): Uint8Array {
  const { value, address = 0, write = false } = options;
  const addrByte = encodeAddress(address);
  const win = formatWindow(descriptor.win);

  let body: string;
  if (write) {
    if (!descriptor.writable) {
      throw new WinDisabledError(`Window ${win} (${descriptor.description}) is read only`);
    }
    if (value === undefined || value === null) {
      throw new DataTypeError(`Write to window ${win} without value, ${descriptor.datatype} expected`);
    }
    body = `${win}1${encodeWindowValue(descriptor.datatype, value)}`;
  } else {
    body = `${win}0`;
  }

  const message = concatUint8Arrays([
    new Uint8Array([FRAME.STX, addrByte]),
    payloadBytes(body),
    new Uint8Array([FRAME.ETX]),
  ]);
  return concatUint8Arrays([message, formatChecksum(calcChecksum(message))]);
}

function verifyTrailer(buffer: Uint8Array, etxIndex: number): void {
  const calculated = calcChecksum(buffer.subarray(0, etxIndex + 1));
  const calculatedHex = calculated.toString(16).toUpperCase().padStart(2, '0');
  const trailer = buffer.subarray(etxIndex + 1, etxIndex + 1 + FRAME.CHECKSUM_LENGTH);
  if (trailer.length < FRAME.CHECKSUM_LENGTH) {
    throw new ChecksumMismatchError(null, calculatedHex);
  }
  const received = parseChecksum(trailer);
  if (received !== calculated) {
    throw new ChecksumMismatchError(String.fromCharCode(...trailer), calculatedHex);
  }
}

function isAsciiDigit(byte: number | undefined): boolean {
  return byte !== undefined && byte >= 0x30 && byte <= 0x39;
}

/**
 * Parses a reply frame.
 * @param buffer - reply bytes from STX through the checksum
 * @returns ACK control response or data response
 * @throws IncompleteFrameError if no ETX is present
 * @throws ChecksumMismatchError if the trailing checksum is missing or wrong
 * @throws MalformedFrameError if the bytes do not form a reply
 * @throws UnrecognizedResultCodeError for an unknown control code
 * @throws NackError, UnknownWindowError, DataTypeError, OutOfRangeError, WinDisabledError for negative control replies
 */
export function decodeResponse(buffer: Uint8Array, options: DecodeOptions = {}): Response {
  const { verifyChecksum = true } = options;

  const etxIndex = indexOfByte(buffer, FRAME.ETX);
  if (etxIndex === -1) {
    throw new IncompleteFrameError(buffer.length);
  }

  if (verifyChecksum) {
    verifyTrailer(buffer, etxIndex);
  }

  const message = buffer.subarray(0, etxIndex);
  if (message.length < FRAME.CONTROL_MESSAGE_LENGTH || message[0] !== FRAME.STX) {
    throw new MalformedFrameError('missing STX or too short', buffer);
  }

  const addrByte = message[1] ?? 0;
  const addr = decodeAddress(addrByte);
  if (addr < ADDRESS_RANGE.MIN || addr > ADDRESS_RANGE.MAX) {
    throw new MalformedFrameError(`address byte 0x${addrByte.toString(16)} out of range`, buffer);
  }

  if (message.length === FRAME.CONTROL_MESSAGE_LENGTH) {
    const code = message[2] ?? 0;
    if (!isResultCode(code)) {
      throw new UnrecognizedResultCodeError(code);
    }
    if (code !== ResultCode.ACK) {
      throw errorForResultCode(code);
    }
    const control: ControlResponse = { kind: 'control', addr, resultCode: code, write: true };
    return Object.freeze(control);
  }

  if (message.length < FRAME.MIN_DATA_MESSAGE_LENGTH) {
    throw new MalformedFrameError(`data reply of ${message.length} bytes before ETX`, buffer);
  }
  if (!isAsciiDigit(message[2]) || !isAsciiDigit(message[3]) || !isAsciiDigit(message[4])) {
    throw new MalformedFrameError('window number is not 3 ASCII digits', buffer);
  }
  const rw = message[5];
  if (rw !== FRAME.WRITE_FLAG && rw !== FRAME.READ_FLAG) {
    throw new MalformedFrameError(`read/write flag 0x${(rw ?? 0).toString(16)}`, buffer);
  }

  const response: DataResponse = {
    kind: 'data',
    addr,
    win: parseInt(String.fromCharCode(...message.subarray(2, 5)), 10),
    write: rw === FRAME.WRITE_FLAG,
    data: message.slice(FRAME.MIN_DATA_MESSAGE_LENGTH),
  };
  return Object.freeze(response);
}

/**
 * One-line description of a frame for logs.
 */
export function describeFrame(frame: Uint8Array): string {
  return `${toHex(frame)} (${frame.length} bytes)`;
}
