// src/client.ts

import { MalformedFrameError } from './errors.js';
import { decodeResponse, encodeAddress, encodeRequest } from './framers/window-framer.js';
import { createLogger } from './logger.js';
import { TransportSession } from './transport/transport-session.js';
import type {
  DataResponse,
  DiagnosticsStats,
  DispatchOptions,
  LoggerInstance,
  LogLevel,
  Response,
  SendOptions,
  Transport,
  WindowClientOptions,
  WindowDescriptor,
  WindowValue,
} from './types/window-types.js';
import { Diagnostics } from './utils/diagnostics.js';

const defaultLogger = createLogger('client');
defaultLogger.setLevel('error');

export type ReadOptions = SendOptions & { address?: number };

/**
 * Window Protocol client for one controller line.
 * Requests are serialized through a TransportSession; each call sends exactly one frame.
 */
export class WindowClient {
  readonly transport: Transport;
  private readonly logger: LoggerInstance;
  private readonly session: TransportSession;
  /** Device address used when a request names none */
  readonly address: number;
  private readonly diagnosticsEnabled: boolean;
  private readonly diagnostics: Diagnostics;

  constructor(transport: Transport, options: WindowClientOptions = {}) {
    this.address = options.address ?? 0;
    encodeAddress(this.address);

    this.transport = transport;
    this.logger = options.logger ?? defaultLogger;
    this.session = new TransportSession(transport, {
      readTimeout: options.readTimeout,
      trailerLength: options.trailerLength,
      logger: options.logger,
    });
    this.diagnosticsEnabled = !!options.diagnostics;
    this.diagnostics = new Diagnostics({ loggerName: 'client-diagnostics', address: this.address });
  }

  /**
   * Enables the client logger
   */
  enableLogger(level: LogLevel = 'info'): void {
    this.logger.setLevel(level);
  }

  /**
   * Disables the client logger (errors only)
   */
  disableLogger(): void {
    this.logger.setLevel('error');
  }

  /** True while a request holds the line */
  get isBusy(): boolean {
    return this.session.isBusy;
  }

  /** Requests waiting for the line */
  get pendingCount(): number {
    return this.session.pendingCount;
  }

  async connect(): Promise<void> {
    if (!this.transport.isOpen) {
      await this.transport.connect();
    }
    this.logger.info('Client is ready', { addr: this.address, transport: this.transport.kind });
  }

  async disconnect(): Promise<void> {
    await this.transport.disconnect();
    this.logger.info('Client disconnected', { addr: this.address, transport: this.transport.kind });
  }

  /**
   * Sends one request and returns the decoded reply.
   * Nothing is written when the request fails local validation.
   * @throws WindowProtocolError subclasses for local validation, transport faults,
   *   malformed replies and negative acknowledgements
   */
  async dispatch(descriptor: WindowDescriptor, options: DispatchOptions = {}): Promise<Response> {
    const { signal, ...encodeOptions } = options;
    const address = encodeOptions.address ?? this.address;
    const frame = encodeRequest(descriptor, { ...encodeOptions, address });
    const context = { addr: address, win: descriptor.win };

    if (this.diagnosticsEnabled) {
      this.diagnostics.recordRequest();
      this.diagnostics.recordDataSent(frame.length);
    }
    this.logger.debug(`${encodeOptions.write ? 'Write' : 'Read'} ${descriptor.description}`, context);

    const startTime = Date.now();
    try {
      const reply = await this.session.send(frame, { signal });
      if (this.diagnosticsEnabled) {
        this.diagnostics.recordDataReceived(reply.length);
      }

      const response = decodeResponse(reply);
      if (response.addr !== address) {
        throw new MalformedFrameError(`reply from address ${response.addr}, expected ${address}`, reply);
      }
      if (response.kind === 'data' && response.win !== descriptor.win) {
        throw new MalformedFrameError(`reply for window ${response.win}, expected ${descriptor.win}`, reply);
      }

      const elapsed = Date.now() - startTime;
      if (this.diagnosticsEnabled) {
        this.diagnostics.recordSuccess(elapsed);
      }
      this.logger.info('Response received', {
        ...context,
        responseTime: elapsed,
        resultCode: response.kind === 'control' ? response.resultCode : undefined,
      });
      return response;
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (this.diagnosticsEnabled) {
        this.diagnostics.recordError(error, descriptor.win);
      }
      this.logger.warn(`Request failed: ${error.message}`, context);
      throw err;
    }
  }

  /**
   * Reads a window.
   * @throws MalformedFrameError if the controller answers with a control reply
   */
  async read(descriptor: WindowDescriptor, options: ReadOptions = {}): Promise<DataResponse> {
    const response = await this.dispatch(descriptor, { ...options, write: false });
    if (response.kind !== 'data') {
      throw new MalformedFrameError(`control reply to a read of window ${descriptor.win}`);
    }
    return response;
  }

  /**
   * Writes a window; resolves with the ACK (or the echoed data reply some firmware sends).
   */
  async write(
    descriptor: WindowDescriptor,
    value: WindowValue,
    options: ReadOptions = {}
  ): Promise<Response> {
    return this.dispatch(descriptor, { ...options, value, write: true });
  }

  getDiagnostics(): DiagnosticsStats {
    return this.diagnostics.getStats();
  }

  resetDiagnostics(): void {
    this.diagnostics.reset();
  }
}
