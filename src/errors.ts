// src/errors.ts

import { ResultCode, RESULT_CODE_MESSAGES } from './constants/constants.js';

export type WindowErrorKind =
  | 'checksum-mismatch'
  | 'incomplete-frame'
  | 'malformed-frame'
  | 'unrecognized-result-code'
  | 'nack'
  | 'unknown-window'
  | 'data-type'
  | 'out-of-range'
  | 'win-disabled'
  | 'invalid-address'
  | 'transport'
  | 'config';

/**
 * Base class for all Window Protocol errors
 */
export class WindowProtocolError extends Error {
  readonly kind: WindowErrorKind;

  constructor(kind: WindowErrorKind, message: string) {
    super(message);
    this.name = 'WindowProtocolError';
    this.kind = kind;
  }
}

export function isWindowProtocolError(err: unknown): err is WindowProtocolError {
  return err instanceof WindowProtocolError;
}

// --- Frame integrity ---

/**
 * Error class for a checksum that does not match the framed bytes
 */
export class ChecksumMismatchError extends WindowProtocolError {
  readonly received: string | null;
  readonly calculated: string;

  constructor(received: string | null, calculated: string) {
    super(
      'checksum-mismatch',
      received === null
        ? `Checksum missing, calculated ${calculated}`
        : `Checksum mismatch: received ${received}, calculated ${calculated}`
    );
    this.name = 'ChecksumMismatchError';
    this.received = received;
    this.calculated = calculated;
  }
}

/**
 * Error class for a buffer without ETX
 */
export class IncompleteFrameError extends WindowProtocolError {
  constructor(length: number) {
    super('incomplete-frame', `Missing ETX, response frame is not complete (${length} bytes)`);
    this.name = 'IncompleteFrameError';
  }
}

/**
 * Error class for a frame that arrived intact but in an unexpected shape
 */
export class MalformedFrameError extends WindowProtocolError {
  constructor(reason: string, rawData?: Uint8Array) {
    super(
      'malformed-frame',
      rawData
        ? `Malformed frame (${reason}): ${Buffer.from(rawData).toString('hex')}`
        : `Malformed frame (${reason})`
    );
    this.name = 'MalformedFrameError';
  }
}

/**
 * Error class for a control reply carrying an unknown status byte
 */
export class UnrecognizedResultCodeError extends WindowProtocolError {
  readonly code: number;

  constructor(code: number) {
    super('unrecognized-result-code', `Unrecognized result code: 0x${code.toString(16)}`);
    this.name = 'UnrecognizedResultCodeError';
    this.code = code;
  }
}

// --- Negative acknowledgements ---

export class NackError extends WindowProtocolError {
  readonly resultCode = ResultCode.NACK;

  constructor(message: string = RESULT_CODE_MESSAGES[ResultCode.NACK]) {
    super('nack', message);
    this.name = 'NackError';
  }
}

export class UnknownWindowError extends WindowProtocolError {
  readonly resultCode = ResultCode.UNKNOWN_WINDOW;

  constructor(message: string = RESULT_CODE_MESSAGES[ResultCode.UNKNOWN_WINDOW]) {
    super('unknown-window', message);
    this.name = 'UnknownWindowError';
  }
}

export class DataTypeError extends WindowProtocolError {
  readonly resultCode = ResultCode.DATA_TYPE_ERROR;

  constructor(message: string = RESULT_CODE_MESSAGES[ResultCode.DATA_TYPE_ERROR]) {
    super('data-type', message);
    this.name = 'DataTypeError';
  }
}

export class OutOfRangeError extends WindowProtocolError {
  readonly resultCode = ResultCode.OUT_OF_RANGE;

  constructor(message: string = RESULT_CODE_MESSAGES[ResultCode.OUT_OF_RANGE]) {
    super('out-of-range', message);
    this.name = 'OutOfRangeError';
  }
}

export class WinDisabledError extends WindowProtocolError {
  readonly resultCode = ResultCode.WIN_DISABLED;

  constructor(message: string = RESULT_CODE_MESSAGES[ResultCode.WIN_DISABLED]) {
    super('win-disabled', message);
    this.name = 'WinDisabledError';
  }
}

export type NegativeAcknowledgeError =
  | NackError
  | UnknownWindowError
  | DataTypeError
  | OutOfRangeError
  | WinDisabledError;

/**
 * Maps a non-ACK result code to the error the controller reported
 */
export function errorForResultCode(
  code: Exclude<ResultCode, ResultCode.ACK>
): NegativeAcknowledgeError {
  switch (code) {
    case ResultCode.NACK:
      return new NackError();
    case ResultCode.UNKNOWN_WINDOW:
      return new UnknownWindowError();
    case ResultCode.DATA_TYPE_ERROR:
      return new DataTypeError();
    case ResultCode.OUT_OF_RANGE:
      return new OutOfRangeError();
    case ResultCode.WIN_DISABLED:
      return new WinDisabledError();
  }
}

// --- Validation ---

/**
 * Error class for a device address outside the 5-bit field
 */
export class InvalidAddressError extends WindowProtocolError {
  constructor(address: number) {
    super('invalid-address', `Invalid device address: ${address}. Address must be between 0-31.`);
    this.name = 'InvalidAddressError';
  }
}

export class ConfigError extends WindowProtocolError {
  constructor(message: string = 'Configuration error') {
    super('config', message);
    this.name = 'ConfigError';
  }
}

// --- Transports ---

/**
 * Base class for all channel-level faults
 */
export class TransportError extends WindowProtocolError {
  constructor(message: string) {
    super('transport', message);
    this.name = 'TransportError';
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string = 'Read timeout') {
    super(message);
    this.name = 'TransportTimeoutError';
  }
}

export class TransportFlushError extends TransportError {
  constructor(message: string = 'Read interrupted by transport flush') {
    super(message);
    this.name = 'TransportFlushError';
  }
}

export class NotConnectedError extends TransportError {
  constructor(message: string = 'Transport is not connected') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

export class RequestAbortedError extends TransportError {
  constructor(message: string = 'Request aborted') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}

export class SerialTransportError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialTransportError';
  }
}

export class TcpTransportError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'TcpTransportError';
  }
}
