// src/transport/transport-session.ts

import { Mutex, type MutexInterface } from 'async-mutex';
import { FRAME } from '../constants/constants.js';
import { ConfigError, RequestAbortedError } from '../errors.js';
import { describeFrame } from '../framers/window-framer.js';
import { createLogger } from '../logger.js';
import type {
  LoggerInstance,
  SendOptions,
  Transport,
  TransportSessionOptions,
} from '../types/window-types.js';
import { concatUint8Arrays } from '../utils/utils.js';

/**
 * One request/reply exchange at a time over a transport.
 *
 * Requests queue on a FIFO gate. Holding the gate, a request drops stale inbound
 * bytes, writes its frame, reads through ETX and then the checksum trailer.
 * The gate is released on every exit path, aborts included.
 */
export class TransportSession {
  private readonly gate: Mutex = new Mutex();
  private readonly readTimeout: number | undefined;
  private readonly trailerLength: number;
  private readonly logger: LoggerInstance;
  private waiting: number = 0;

  constructor(
    readonly transport: Transport,
    options: TransportSessionOptions = {}
  ) {
    const { readTimeout, trailerLength = FRAME.CHECKSUM_LENGTH } = options;
    if (readTimeout !== undefined && !(readTimeout > 0)) {
      throw new ConfigError(`readTimeout must be a positive number of ms, got ${readTimeout}`);
    }
    if (!Number.isInteger(trailerLength) || trailerLength < 0) {
      throw new ConfigError(`trailerLength must be a non-negative integer, got ${trailerLength}`);
    }
    this.readTimeout = readTimeout;
    this.trailerLength = trailerLength;
    this.logger = options.logger ?? createLogger('session');
  }

  /** True while a request holds the line */
  get isBusy(): boolean {
    return this.gate.isLocked();
  }

  /** Requests queued behind the current one */
  get pendingCount(): number {
    return this.waiting;
  }

  /**
   * Sends a frame and returns the raw reply (STX through the checksum digits).
   * @throws RequestAbortedError if `signal` aborts while queued or while waiting for the reply
   * @throws TransportTimeoutError if no complete reply arrives within the read timeout
   */
  async send(frame: Uint8Array, options: SendOptions = {}): Promise<Uint8Array> {
    const { signal } = options;

    this.waiting++;
    let release: MutexInterface.Releaser;
    try {
      release = await this.acquire(signal);
    } finally {
      this.waiting--;
    }

    const onAbort = (): void => {
      this.transport.flush().catch((err: unknown) => {
        this.logger.warn('Flush on abort failed:', err instanceof Error ? err.message : String(err));
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      throwIfAborted(signal);
      await this.transport.flush();
      this.logger.debug(`TX ${describeFrame(frame)}`);
      await this.transport.write(frame);

      throwIfAborted(signal);
      const body = await this.transport.readUntil(FRAME.ETX, this.readTimeout);
      throwIfAborted(signal);
      const trailer =
        this.trailerLength > 0
          ? await this.transport.read(this.trailerLength, this.readTimeout)
          : new Uint8Array(0);

      const reply = concatUint8Arrays([body, trailer]);
      this.logger.debug(`RX ${describeFrame(reply)}`);
      return reply;
    } catch (err: unknown) {
      if (signal?.aborted && !(err instanceof RequestAbortedError)) {
        throw new RequestAbortedError('Request aborted while waiting for the reply');
      }
      throw err;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      release();
    }
  }

  private async acquire(signal?: AbortSignal): Promise<MutexInterface.Releaser> {
    if (!signal) return this.gate.acquire();
    throwIfAborted(signal);

    const acquiring = this.gate.acquire();
    return await new Promise<MutexInterface.Releaser>((resolve, reject) => {
      let abandoned = false;
      const onAbort = (): void => {
        abandoned = true;
        reject(new RequestAbortedError('Request aborted while waiting for the line'));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      acquiring.then(
        release => {
          signal.removeEventListener('abort', onAbort);
          // the queue slot is kept until reached, then handed on
          if (abandoned) {
            release();
            return;
          }
          resolve(release);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
}
