// src/utils/diagnostics.ts

import { CIP_SERVICE_NAMES } from '../constants/constants.js';
import { CipStatusError, EipTimeoutError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { DiagnosticsStats, LoggerInstance } from '../types/eip-types.js';

const MAX_LAST_ERRORS = 10;

/**
 * Class that collects statistics about request/reply exchanges of one client.
 */
class Diagnostics {
  private logger: LoggerInstance;
  private startTime: number = Date.now();
  private totalRequests: number = 0;
  private successfulResponses: number = 0;
  private errorResponses: number = 0;
  private timeouts: number = 0;
  private cipStatusErrors: number = 0;
  private statusCodeCounts: Record<number, number> = {};
  private serviceCallCounts: Record<number, number> = {};
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private lastErrorMessage: string | null = null;
  private lastErrors: string[] = [];

  constructor(loggerName: string = 'Diagnostics') {
    this.logger = defaultLogger.createLogger(loggerName);
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.successfulResponses = 0;
    this.errorResponses = 0;
    this.timeouts = 0;
    this.cipStatusErrors = 0;
    this.statusCodeCounts = {};
    this.serviceCallCounts = {};
    this.totalDataSent = 0;
    this.totalDataReceived = 0;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this._totalResponseTime = 0;
    this.lastErrorMessage = null;
    this.lastErrors = [];
  }

  /**
   * Records a request event.
   * @param service - CIP service code, absent for session-level commands
   */
  recordRequest(byteLength: number, service?: number): void {
    this.totalRequests++;
    this.totalDataSent += byteLength;
    if (service != null) {
      this.serviceCallCounts[service] = (this.serviceCallCounts[service] ?? 0) + 1;
    }
    this.logger.trace('Request sent', {
      service,
      serviceName: service != null ? CIP_SERVICE_NAMES[service] : undefined,
      size: byteLength,
    });
  }

  recordSuccess(responseTimeMs: number, byteLength: number): void {
    this.successfulResponses++;
    this.totalDataReceived += byteLength;
    this.minResponseTime =
      this.minResponseTime == null ? responseTimeMs : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null ? responseTimeMs : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
  }

  /**
   * Records an exchange that got no usable reply. Timeouts are also counted separately.
   */
  recordError(error: Error, responseTimeMs: number = 0): void {
    this.errorResponses++;
    this.rememberError(error);
    if (error instanceof EipTimeoutError) {
      this.timeouts++;
    }
    this.logger.debug(error.message, { responseTime: responseTimeMs });
  }

  /**
   * Records a non-zero CIP general status. The reply itself was already
   * counted by recordSuccess, so errorResponses is left alone.
   */
  recordCipStatus(error: CipStatusError): void {
    this.cipStatusErrors++;
    this.statusCodeCounts[error.generalStatus] =
      (this.statusCodeCounts[error.generalStatus] ?? 0) + 1;
    this.rememberError(error);
    this.logger.debug(error.message, { service: error.service });
  }

  private rememberError(error: Error): void {
    this.lastErrorMessage = error.message;
    this.lastErrors.push(error.message);
    if (this.lastErrors.length > MAX_LAST_ERRORS) this.lastErrors.shift();
  }

  /**
   * Returns the average response time in milliseconds for successful responses.
   */
  get averageResponseTime(): number | null {
    return this.successfulResponses === 0
      ? null
      : this._totalResponseTime / this.successfulResponses;
  }

  get recentErrors(): string[] {
    return [...this.lastErrors];
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      totalRequests: this.totalRequests,
      successfulResponses: this.successfulResponses,
      errorResponses: this.errorResponses,
      timeouts: this.timeouts,
      cipStatusErrors: this.cipStatusErrors,
      statusCodeCounts: { ...this.statusCodeCounts },
      serviceCallCounts: { ...this.serviceCallCounts },
      totalDataSent: this.totalDataSent,
      totalDataReceived: this.totalDataReceived,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      averageResponseTime: this.averageResponseTime,
      lastErrorMessage: this.lastErrorMessage,
    };
  }
}

export { Diagnostics };
