// src/controller-emulator/controller-emulator.ts

import { DataType, FRAME, ResultCode } from '../constants/constants.js';
import { NotConnectedError, UnknownWindowError } from '../errors.js';
import { decodeAddress, encodeAddress } from '../framers/window-framer.js';
import { encodeWindowValue } from '../framers/window-values.js';
import { createLogger } from '../logger.js';
import type {
  LoggerInstance,
  Transport,
  TransportKind,
  WindowDescriptor,
  WindowValue,
} from '../types/window-types.js';
import { calcChecksum, formatChecksum, validateChecksum } from '../utils/checksum.js';
import { concatUint8Arrays, latin1Decode, latin1Encode, toHex } from '../utils/utils.js';
import { ReadBuffer } from '../transport/read-buffer.js';

export type ForcedResultCode = Exclude<ResultCode, ResultCode.ACK>;

export interface ControllerEmulatorOptions {
  loggerEnabled?: boolean;
}

interface EmulatedWindow {
  descriptor: WindowDescriptor;
  value: WindowValue;
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(E[+-]?\d+)?$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * In-process controller answering Window Protocol requests from a window table.
 */
export class ControllerEmulator {
  readonly address: number;
  private readonly windows: Map<number, EmulatedWindow> = new Map();
  private readonly forced: Map<number, ForcedResultCode> = new Map();
  private loggerEnabled: boolean;
  private readonly logger: LoggerInstance;
  public connected: boolean = false;

  constructor(address: number = 0, options: ControllerEmulatorOptions = {}) {
    encodeAddress(address);
    this.address = address;
    this.loggerEnabled = !!options.loggerEnabled;
    this.logger = createLogger('emulator');
    this.logger.setLevel(this.loggerEnabled ? 'info' : 'error');
  }

  enableLogger(): void {
    this.loggerEnabled = true;
    this.logger.setLevel('info');
  }

  disableLogger(): void {
    this.loggerEnabled = false;
    this.logger.setLevel('error');
  }

  async connect(): Promise<void> {
    this.connected = true;
    this.logger.info('Connected', { addr: this.address });
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.logger.info('Disconnected', { addr: this.address });
  }

  // --- Window table ---

  /**
   * Adds a window; `initial` must suit its data type.
   * @throws DataTypeError, OutOfRangeError for an unsuitable initial value
   */
  defineWindow(descriptor: WindowDescriptor, initial: WindowValue): void {
    encodeWindowValue(descriptor.datatype, initial);
    this.windows.set(descriptor.win, { descriptor, value: initial });
  }

  /**
   * @throws UnknownWindowError if the window is not defined
   */
  setValue(win: number, value: WindowValue): void {
    const entry = this.getEntry(win);
    encodeWindowValue(entry.descriptor.datatype, value);
    entry.value = value;
  }

  /**
   * @throws UnknownWindowError if the window is not defined
   */
  getValue(win: number): WindowValue {
    return this.getEntry(win).value;
  }

  /**
   * Makes every request to `win` fail with `code`; `null` restores normal replies.
   */
  setResultCode(win: number, code: ForcedResultCode | null): void {
    if (code === null) {
      this.forced.delete(win);
    } else {
      this.forced.set(win, code);
    }
  }

  private getEntry(win: number): EmulatedWindow {
    const entry = this.windows.get(win);
    if (!entry) {
      throw new UnknownWindowError(`Window ${win} is not defined in the emulator`);
    }
    return entry;
  }

  // --- Request handling ---

  /**
   * Answers a request frame.
   * @returns reply frame, or null when the frame is not addressed to this controller
   */
  handleRequest(frame: Uint8Array): Uint8Array | null {
    if (!this.connected) {
      this.logger.warn('Received request but emulator not connected', { addr: this.address });
      return null;
    }

    const etxIndex = frame.indexOf(FRAME.ETX);
    if (frame[0] !== FRAME.STX || etxIndex < 2) {
      this.logger.debug(`Frame ignored, no STX/ETX: ${toHex(frame)}`);
      return null;
    }
    const addrByte = frame[1] ?? 0;
    if (decodeAddress(addrByte) !== this.address) {
      this.logger.debug('Frame ignored, wrong address', { addr: decodeAddress(addrByte) });
      return null;
    }

    if (!validateChecksum(frame.subarray(0, etxIndex + 1 + FRAME.CHECKSUM_LENGTH))) {
      this.logger.warn(`Checksum mismatch: ${toHex(frame)}`, { addr: this.address });
      return this.controlReply(ResultCode.NACK);
    }

    const body = latin1Decode(frame.subarray(2, etxIndex));
    const match = /^(\d{3})([01])(.*)$/s.exec(body);
    if (!match) {
      return this.controlReply(ResultCode.NACK);
    }
    const [, winDigits = '', rw = '', data = ''] = match;
    const win = parseInt(winDigits, 10);
    const write = rw === '1';

    this.logger.info(`Request ${write ? 'write' : 'read'}`, { addr: this.address, win });

    const entry = this.windows.get(win);
    if (!entry) {
      return this.controlReply(ResultCode.UNKNOWN_WINDOW);
    }
    const forced = this.forced.get(win);
    if (forced !== undefined) {
      return this.controlReply(forced);
    }

    if (!write) {
      return this.dataReply(winDigits, encodeWindowValue(entry.descriptor.datatype, entry.value));
    }

    if (!entry.descriptor.writable) {
      return this.controlReply(ResultCode.WIN_DISABLED);
    }
    const parsed = parseWritePayload(entry.descriptor.datatype, data);
    if (parsed.ok) {
      entry.value = parsed.value;
      return this.controlReply(ResultCode.ACK);
    }
    return this.controlReply(parsed.code);
  }

  private controlReply(code: ResultCode): Uint8Array {
    const message = new Uint8Array([FRAME.STX, encodeAddress(this.address), code, FRAME.ETX]);
    this.logger.debug(`Reply 0x${code.toString(16)}`, { addr: this.address, resultCode: code });
    return withChecksum(message);
  }

  private dataReply(winDigits: string, text: string): Uint8Array {
    const message = concatUint8Arrays([
      new Uint8Array([FRAME.STX, encodeAddress(this.address)]),
      latin1Encode(`${winDigits}0${text}`),
      new Uint8Array([FRAME.ETX]),
    ]);
    return withChecksum(message);
  }
}

type ParsedPayload = { ok: true; value: WindowValue } | { ok: false; code: ForcedResultCode };

function parseWritePayload(datatype: DataType, data: string): ParsedPayload {
  switch (datatype) {
    case DataType.Logic:
      if (data === '1') return { ok: true, value: true };
      if (data === '0') return { ok: true, value: false };
      return /^\d+$/.test(data)
        ? { ok: false, code: ResultCode.OUT_OF_RANGE }
        : { ok: false, code: ResultCode.DATA_TYPE_ERROR };
    case DataType.Numeric:
      if (INTEGER_PATTERN.test(data)) return { ok: true, value: parseInt(data, 10) };
      if (NUMERIC_PATTERN.test(data)) return { ok: true, value: data };
      return { ok: false, code: ResultCode.DATA_TYPE_ERROR };
    case DataType.Alphanumeric:
      return { ok: true, value: data };
  }
}

function withChecksum(message: Uint8Array): Uint8Array {
  return concatUint8Arrays([message, formatChecksum(calcChecksum(message))]);
}

export interface EmulatorTransportOptions {
  /** Delay before the reply becomes readable (ms, default: 0) */
  replyDelay?: number;
  readTimeout?: number;
}

/**
 * Transport wired to a ControllerEmulator instead of a line.
 */
export class EmulatorTransport implements Transport {
  readonly kind: TransportKind = 'emulator';
  /** Frames written so far */
  readonly written: Uint8Array[] = [];
  private readonly readBuffer: ReadBuffer = new ReadBuffer();
  private readonly options: Required<EmulatorTransportOptions>;
  private readonly timers: Set<NodeJS.Timeout> = new Set();
  private _isOpen: boolean = false;

  constructor(
    readonly emulator: ControllerEmulator,
    options: EmulatorTransportOptions = {}
  ) {
    this.options = { replyDelay: 0, readTimeout: 1000, ...options };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    await this.emulator.connect();
    this._isOpen = true;
  }

  async disconnect(): Promise<void> {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this._isOpen = false;
    this.readBuffer.flush();
    await this.emulator.disconnect();
  }

  /**
   * Puts raw bytes on the line as if the controller had sent them.
   */
  inject(bytes: Uint8Array): void {
    this.readBuffer.push(bytes);
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this._isOpen) throw new NotConnectedError('Emulator transport is not connected');
    this.written.push(buffer.slice());
    const reply = this.emulator.handleRequest(buffer);
    if (!reply) return;
    if (this.options.replyDelay <= 0) {
      this.readBuffer.push(reply);
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.readBuffer.push(reply);
    }, this.options.replyDelay);
    this.timers.add(timer);
  }

  private _closedGuard = (): Error | null =>
    this._isOpen ? null : new NotConnectedError('Emulator transport closed');

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!this._isOpen) throw new NotConnectedError('Emulator transport is not connected');
    return this.readBuffer.read(length, timeout, this._closedGuard);
  }

  async readUntil(delimiter: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!this._isOpen) throw new NotConnectedError('Emulator transport is not connected');
    return this.readBuffer.readUntil(delimiter, timeout, this._closedGuard);
  }

  async flush(): Promise<void> {
    this.readBuffer.flush();
  }
}
