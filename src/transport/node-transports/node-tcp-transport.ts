// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { createLogger } from '../../logger.js';
import { NotConnectedError, TcpTransportError } from '../../errors.js';
import type { NodeTcpTransportOptions, Transport, TransportKind } from '../../types/window-types.js';
import { toHex } from '../../utils/utils.js';
import { ReadBuffer } from '../read-buffer.js';

const logger = createLogger('node-tcp');
logger.setLevel('info');

/** Telnet port of the controllers' LAN interface */
export const DEFAULT_TCP_PORT = 23;

/**
 * LAN line to a controller over a raw TCP socket.
 */
export class NodeTcpTransport implements Transport {
  readonly kind: TransportKind = 'tcp';
  private readonly host: string;
  private readonly port: number;
  private readonly options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readonly readBuffer: ReadBuffer;
  private _isOpen: boolean = false;
  private _isConnecting: boolean = false;
  private readonly _writeMutex: Mutex = new Mutex();

  constructor(host: string, port: number = DEFAULT_TCP_PORT, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      readTimeout: options.readTimeout ?? 2000,
      connectTimeout: options.connectTimeout ?? 5000,
      maxBufferSize: options.maxBufferSize ?? 8192,
    };
    this.readBuffer = new ReadBuffer(this.options.maxBufferSize);
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isConnecting || this._isOpen) return;
    this._isConnecting = true;
    logger.info(`Connecting to ${this.host}:${this.port}...`);

    try {
      await new Promise<void>((resolve, reject) => {
        const socket = net.connect({ host: this.host, port: this.port });
        this.socket = socket;

        const onConnectError = (err: Error): void => {
          socket.destroy();
          reject(new TcpTransportError(`Connection to ${this.host}:${this.port} failed: ${err.message}`));
        };

        socket.setTimeout(this.options.connectTimeout);
        socket.once('timeout', () => {
          if (this._isOpen) return;
          onConnectError(new Error(`timeout after ${this.options.connectTimeout}ms`));
        });
        socket.once('error', onConnectError);

        socket.once('connect', () => {
          socket.removeListener('error', onConnectError);
          socket.setTimeout(0);
          socket.setNoDelay(true);
          socket.on('data', (data: Buffer) => this._onData(data));
          socket.on('error', (err: Error) => this._onError(err));
          socket.on('close', () => this._onClose());
          this._isOpen = true;
          this.readBuffer.flush();
          resolve();
        });
      });
      logger.info(`Connected to ${this.host}:${this.port}`, { transport: 'tcp' });
    } catch (err: unknown) {
      this.socket = null;
      const error = err instanceof Error ? err : new TcpTransportError(String(err));
      logger.error(error.message);
      throw error;
    } finally {
      this._isConnecting = false;
    }
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    logger.trace(`RX ${toHex(chunk)}`, { transport: 'tcp' });
    if (!this.readBuffer.push(chunk)) {
      logger.warn(`Read buffer overflow: dropped ${chunk.length} bytes`);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Socket error: ${err.message}`);
  }

  private _onClose(): void {
    if (!this._isOpen) return;
    logger.info(`Connection to ${this.host}:${this.port} closed`);
    this._isOpen = false;
    this.socket = null;
  }

  private _closedGuard = (): Error | null =>
    this._isOpen ? null : new NotConnectedError(`Connection to ${this.host}:${this.port} closed`);

  async write(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this._isOpen || !socket) throw new NotConnectedError(`Not connected to ${this.host}:${this.port}`);
    const release = await this._writeMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        socket.write(buffer, (err?: Error | null) => {
          if (err) {
            reject(new TcpTransportError(err.message));
            return;
          }
          resolve();
        });
      });
    } finally {
      release();
    }
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!this._isOpen) throw new NotConnectedError(`Not connected to ${this.host}:${this.port}`);
    return this.readBuffer.read(length, timeout, this._closedGuard);
  }

  async readUntil(delimiter: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!this._isOpen) throw new NotConnectedError(`Not connected to ${this.host}:${this.port}`);
    return this.readBuffer.readUntil(delimiter, timeout, this._closedGuard);
  }

  async flush(): Promise<void> {
    this.readBuffer.flush();
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    this._isOpen = false;
    this.socket = null;
    this.readBuffer.flush();
    if (!socket) return;
    await new Promise<void>(resolve => {
      socket.end(() => resolve());
    });
    socket.destroy();
  }
}
