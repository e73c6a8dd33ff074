// src/utils/diagnostics.ts

import { isWindowProtocolError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { DiagnosticsStats, LoggerInstance } from '../types/window-types.js';

export interface DiagnosticsOptions {
  loggerName?: string;
  /** Device address reported in log context */
  address?: number;
}

/**
 * Collects request statistics for a client.
 */
export class Diagnostics {
  private readonly address: number;
  private readonly logger: LoggerInstance;
  private startTime: number = Date.now();
  private totalRequests: number = 0;
  private successfulResponses: number = 0;
  private errorResponses: number = 0;
  private errorsByKind: Record<string, number> = {};
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private lastErrorMessage: string | null = null;

  constructor(options: DiagnosticsOptions = {}) {
    this.address = options.address ?? 0;
    this.logger = createLogger(options.loggerName ?? 'diagnostics');
    this.logger.setLevel('error');
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.successfulResponses = 0;
    this.errorResponses = 0;
    this.errorsByKind = {};
    this.totalDataSent = 0;
    this.totalDataReceived = 0;
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this._totalResponseTime = 0;
    this.lastErrorMessage = null;
  }

  recordRequest(): void {
    this.totalRequests++;
  }

  recordSuccess(responseTimeMs: number): void {
    this.successfulResponses++;
    this.lastResponseTime = responseTimeMs;
    this.minResponseTime =
      this.minResponseTime == null ? responseTimeMs : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null ? responseTimeMs : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
  }

  /**
   * Records a failed request, counted under the error's kind
   * (`unexpected` for errors raised outside this library).
   */
  recordError(error: Error, win?: number): void {
    this.errorResponses++;
    this.lastErrorMessage = error.message || String(error);
    const kind = isWindowProtocolError(error) ? error.kind : 'unexpected';
    this.errorsByKind[kind] = (this.errorsByKind[kind] ?? 0) + 1;
    this.logger.error(this.lastErrorMessage, { addr: this.address, win, kind });
  }

  recordDataSent(byteLength: number): void {
    this.totalDataSent += byteLength;
  }

  recordDataReceived(byteLength: number): void {
    this.totalDataReceived += byteLength;
  }

  get averageResponseTime(): number | null {
    return this.successfulResponses === 0
      ? null
      : this._totalResponseTime / this.successfulResponses;
  }

  get uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  getStats(): DiagnosticsStats {
    return {
      totalRequests: this.totalRequests,
      successfulResponses: this.successfulResponses,
      errorResponses: this.errorResponses,
      errorsByKind: { ...this.errorsByKind },
      totalDataSent: this.totalDataSent,
      totalDataReceived: this.totalDataReceived,
      lastResponseTime: this.lastResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      averageResponseTime: this.averageResponseTime,
      lastErrorMessage: this.lastErrorMessage,
      uptimeSeconds: this.uptimeSeconds,
    };
  }
}
