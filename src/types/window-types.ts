// src/types/window-types.ts

import type { DataType, ResultCode } from '../constants/constants.js';

// !=============================================================================
// ! Windows and values
// !=============================================================================

/** Addressable controller attribute */
export interface WindowDescriptor {
  readonly win: number;
  readonly writable: boolean;
  readonly datatype: DataType;
  readonly description: string;
}

/** Values accepted on the write path */
export type WindowValue = boolean | number | string;

// !=============================================================================
// ! Responses
// !=============================================================================

/** 3-byte reply: ACK for writes (error codes are raised, never returned) */
export interface ControlResponse {
  readonly kind: 'control';
  readonly addr: number;
  readonly resultCode: ResultCode;
  readonly write: true;
}

/** Reply carrying a window payload */
export interface DataResponse {
  readonly kind: 'data';
  readonly addr: number;
  readonly win: number;
  readonly write: boolean;
  readonly data: Uint8Array;
}

export type Response = ControlResponse | DataResponse;

// !=============================================================================
// ! Codec options
// !=============================================================================

export interface EncodeOptions {
  value?: WindowValue;
  /** RS485 device address, 0 for RS232/LAN */
  address?: number;
  write?: boolean;
}

export interface DecodeOptions {
  /** Validate the two hex digits that follow ETX (default: true) */
  verifyChecksum?: boolean;
}

// !=============================================================================
// ! Transport
// !=============================================================================

export type TransportKind = 'serial' | 'tcp' | 'emulator';

/** Byte channel to a single controller line */
export interface Transport {
  readonly isOpen: boolean;
  readonly kind: TransportKind;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /** Resolves with exactly `length` bytes */
  read(length: number, timeout?: number): Promise<Uint8Array>;
  /** Resolves with every byte up to and including the first `delimiter` */
  readUntil(delimiter: number, timeout?: number): Promise<Uint8Array>;
  /** Drops buffered bytes and rejects pending reads */
  flush(): Promise<void>;
}

export interface TransportSessionOptions {
  /** Read timeout per request (ms); the transport default when omitted */
  readTimeout?: number;
  /** Bytes expected after ETX (default: 2, the checksum) */
  trailerLength?: number;
  logger?: LoggerInstance;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
}

export interface NodeTcpTransportOptions {
  readTimeout?: number;
  connectTimeout?: number;
  maxBufferSize?: number;
}

export type TransportConfig =
  | ({ type: 'serial'; path: string } & NodeSerialTransportOptions)
  | ({ type: 'tcp'; host: string; port?: number } & NodeTcpTransportOptions);

// !=============================================================================
// ! Client
// !=============================================================================

export interface WindowClientOptions {
  /** Default device address for requests (default: 0) */
  address?: number;
  readTimeout?: number;
  trailerLength?: number;
  diagnostics?: boolean;
  logger?: LoggerInstance;
}

export interface DispatchOptions extends EncodeOptions, SendOptions {}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  addr?: number;
  win?: number;
  resultCode?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | null | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsStats {
  totalRequests: number;
  successfulResponses: number;
  errorResponses: number;
  errorsByKind: Record<string, number>;
  totalDataSent: number;
  totalDataReceived: number;
  lastResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  lastErrorMessage: string | null;
  uptimeSeconds: number;
}
