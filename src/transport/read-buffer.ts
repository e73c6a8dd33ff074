// src/transport/read-buffer.ts

import { TransportFlushError, TransportTimeoutError } from '../errors.js';
import { allocUint8Array, concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';

const POLL_INTERVAL_MS = 10;

/**
 * Inbound byte buffer shared by the transports.
 * Reads poll the buffer until enough bytes arrived, the timeout expires or a flush
 * invalidates them.
 */
export class ReadBuffer {
  private buffer: Uint8Array = allocUint8Array(0);
  private generation: number = 0;

  constructor(
    private readonly maxBufferSize: number = 4096,
    private readonly pollIntervalMs: number = POLL_INTERVAL_MS
  ) {}

  get length(): number {
    return this.buffer.length;
  }

  /**
   * Appends received bytes.
   * @returns false if the chunk would overflow the buffer (the chunk is dropped)
   */
  push(chunk: Uint8Array): boolean {
    if (this.buffer.length + chunk.length > this.maxBufferSize) {
      return false;
    }
    this.buffer = concatUint8Arrays([this.buffer, chunk]);
    return true;
  }

  /**
   * Drops buffered bytes; pending reads reject with TransportFlushError.
   */
  flush(): void {
    this.buffer = allocUint8Array(0);
    this.generation++;
  }

  read(length: number, timeout: number, guard?: () => Error | null): Promise<Uint8Array> {
    return this.wait(() => (this.buffer.length >= length ? this.take(length) : null), timeout, guard);
  }

  readUntil(delimiter: number, timeout: number, guard?: () => Error | null): Promise<Uint8Array> {
    return this.wait(
      () => {
        const index = this.buffer.indexOf(delimiter);
        return index === -1 ? null : this.take(index + 1);
      },
      timeout,
      guard
    );
  }

  private take(length: number): Uint8Array {
    const data = this.buffer.slice(0, length);
    this.buffer = sliceUint8Array(this.buffer, length);
    return data;
  }

  private wait(
    extract: () => Uint8Array | null,
    timeout: number,
    guard?: () => Error | null
  ): Promise<Uint8Array> {
    const start = Date.now();
    const generation = this.generation;
    return new Promise<Uint8Array>((resolve, reject) => {
      const check = (): void => {
        if (generation !== this.generation) return reject(new TransportFlushError());
        const failure = guard?.() ?? null;
        if (failure) return reject(failure);
        const data = extract();
        if (data !== null) return resolve(data);
        const elapsed = Date.now() - start;
        if (elapsed >= timeout) {
          return reject(new TransportTimeoutError(`Read timeout after ${elapsed}ms`));
        }
        setTimeout(check, this.pollIntervalMs);
      };
      check();
    });
  }
}
