// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { createLogger } from '../../logger.js';
import { NotConnectedError, SerialTransportError } from '../../errors.js';
import type {
  NodeSerialTransportOptions,
  Transport,
  TransportKind,
} from '../../types/window-types.js';
import { ReadBuffer } from '../read-buffer.js';

const NODE_SERIAL_CONSTANTS = {
  DEFAULT_MAX_BUFFER_SIZE: 4096,
  POLL_INTERVAL_MS: 10,
} as const;

const logger = createLogger('node-serial');
logger.setLevel('info');

function toSerialError(err: Error): SerialTransportError {
  const message = err.message.toLowerCase();
  if (message.includes('permission')) return new SerialTransportError('Permission denied');
  if (message.includes('busy')) return new SerialTransportError('Serial port is busy');
  if (message.includes('no such file')) return new SerialTransportError('Serial port does not exist');
  return new SerialTransportError(err.message);
}

/**
 * RS232/RS485 line to a controller through the `serialport` package.
 * Defaults match the controllers' factory setting: 9600 8N1.
 */
export class NodeSerialTransport implements Transport {
  readonly kind: TransportKind = 'serial';
  private readonly path: string;
  private readonly options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readonly readBuffer: ReadBuffer;
  private _isOpen: boolean = false;
  private readonly _writeMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: options.baudRate ?? 9600,
      dataBits: options.dataBits ?? 8,
      stopBits: options.stopBits ?? 1,
      parity: options.parity ?? 'none',
      readTimeout: options.readTimeout ?? 1000,
      maxBufferSize: options.maxBufferSize ?? NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
    };
    this.readBuffer = new ReadBuffer(
      this.options.maxBufferSize,
      NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS
    );
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    const port = new SerialPort({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          reject(toSerialError(err));
          return;
        }
        resolve();
      });
    }).catch((err: unknown) => {
      const error = err instanceof Error ? err : new SerialTransportError(String(err));
      logger.error(`Failed to open serial port ${this.path}: ${error.message}`);
      throw error;
    });

    this.port = port;
    this._isOpen = true;
    this.readBuffer.flush();
    port.on('data', (data: Buffer) => this._onData(data));
    port.on('error', (err: Error) => this._onError(err));
    port.on('close', () => this._onClose());
    logger.info(`Serial port ${this.path} opened`, { transport: 'serial' });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    if (!this.readBuffer.push(chunk)) {
      logger.warn(
        `Read buffer overflow on ${this.path}: dropped ${chunk.length} bytes (limit ${this.options.maxBufferSize})`
      );
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    if (!this._isOpen) return;
    logger.info(`Serial port ${this.path} closed`);
    this._isOpen = false;
    this.port = null;
  }

  private _closedGuard = (): Error | null =>
    this._isOpen ? null : new NotConnectedError(`Serial port ${this.path} closed`);

  async flush(): Promise<void> {
    this.readBuffer.flush();
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this._isOpen || !port) throw new NotConnectedError(`Serial port ${this.path} is not open`);
    const release = await this._writeMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), (err: Error | null | undefined) => {
          if (err) {
            reject(new SerialTransportError(err.message));
            return;
          }
          port.drain((drainErr: Error | null) => {
            if (drainErr) {
              reject(new SerialTransportError(drainErr.message));
              return;
            }
            resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!this._isOpen) throw new NotConnectedError(`Serial port ${this.path} is not open`);
    return this.readBuffer.read(length, timeout, this._closedGuard);
  }

  async readUntil(delimiter: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!this._isOpen) throw new NotConnectedError(`Serial port ${this.path} is not open`);
    return this.readBuffer.readUntil(delimiter, timeout, this._closedGuard);
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this._isOpen = false;
    this.port = null;
    this.readBuffer.flush();
    if (!port || !port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) {
          reject(new SerialTransportError(err.message));
          return;
        }
        resolve();
      });
    });
    logger.info(`Serial port ${this.path} closed by user`);
  }
}
