// src/errors.ts

import {
  CIP_GENERAL_STATUS_MESSAGES,
  CIP_SERVICE_NAMES,
  ENCAPSULATION_STATUS_MESSAGES,
} from './constants/constants.js';
import { toHex } from './utils/utils.js';

/**
 * Base class for all EtherNet/IP errors
 */
export class EipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EipError';
  }
}

// --- Errors for Frame Decoding ---

/**
 * Error class for buffers shorter than a structurally required field
 */
export class EipFrameDecodeError extends EipError {
  constructor(message: string = 'Malformed EtherNet/IP frame') {
    super(message);
    this.name = 'EipFrameDecodeError';
  }
}

/**
 * Error class for frames shorter than the encapsulation header
 */
export class EipFrameTooShortError extends EipFrameDecodeError {
  constructor(received: number, expected: number) {
    super(`Frame too short: received ${received} bytes, expected at least ${expected}`);
    this.name = 'EipFrameTooShortError';
  }
}

/**
 * Error class for packet items whose declared length overruns the buffer
 */
export class EipTruncatedItemError extends EipFrameDecodeError {
  constructor(index: number, declared: number, available: number) {
    super(
      `Truncated packet item #${index}: declared ${declared} bytes, ${available} available`
    );
    this.name = 'EipTruncatedItemError';
  }
}

/**
 * Error class for CIP replies shorter than their status prefix
 */
export class EipReplyTooShortError extends EipFrameDecodeError {
  constructor(received: number, expected: number) {
    super(`CIP reply too short: received ${received} bytes, expected at least ${expected}`);
    this.name = 'EipReplyTooShortError';
  }
}

/**
 * Error class for replies that answer a different command
 */
export class EipUnexpectedCommandError extends EipFrameDecodeError {
  constructor(received: number, expected: number) {
    super(
      `Unexpected command in reply: expected 0x${expected.toString(16)}, got 0x${received.toString(16)}`
    );
    this.name = 'EipUnexpectedCommandError';
  }
}

/**
 * Error class for replies that do not echo the request sender context
 */
export class EipSenderContextMismatchError extends EipFrameDecodeError {
  constructor(received: Uint8Array, expected: Uint8Array) {
    super(`Sender context mismatch: expected ${toHex(expected)}, got ${toHex(received)}`);
    this.name = 'EipSenderContextMismatchError';
  }
}

/**
 * Error class for replies without the expected packet item
 */
export class EipMissingItemError extends EipFrameDecodeError {
  constructor(typeId: number, count: number) {
    super(
      `Expected item 0x${typeId.toString(16).padStart(4, '0')} at index 1, reply carries ${count} item(s)`
    );
    this.name = 'EipMissingItemError';
  }
}

// --- Status Errors ---

/**
 * Error class for CIP replies with a non-zero general status
 */
export class CipStatusError extends EipError {
  service: number;
  generalStatus: number;
  extendedStatus: Uint8Array;

  constructor(service: number, generalStatus: number, extendedStatus: Uint8Array) {
    const statusMessage =
      CIP_GENERAL_STATUS_MESSAGES[generalStatus] ??
      `Unknown status 0x${generalStatus.toString(16)}`;
    const serviceName = CIP_SERVICE_NAMES[service] ?? 'Unknown';
    const extended = extendedStatus.length > 0 ? `, extended ${toHex(extendedStatus)}` : '';
    super(
      `CIP error: service 0x${service.toString(16)}/${serviceName}, status 0x${generalStatus.toString(16).padStart(2, '0')} (${statusMessage})${extended}`
    );
    this.name = 'CipStatusError';
    this.service = service;
    this.generalStatus = generalStatus;
    this.extendedStatus = extendedStatus;
  }
}

/**
 * Error class for a non-zero status in the encapsulation header
 */
export class EipEncapsulationStatusError extends EipError {
  status: number;

  constructor(command: number, status: number) {
    const statusMessage =
      ENCAPSULATION_STATUS_MESSAGES[status] ?? `Unknown status 0x${status.toString(16)}`;
    super(
      `Encapsulation error: command 0x${command.toString(16)}, status 0x${status.toString(16)} (${statusMessage})`
    );
    this.name = 'EipEncapsulationStatusError';
    this.status = status;
  }
}

// --- Errors for Variable Discovery ---

/**
 * Error class for variable names absent from the registry
 */
export class EipNameNotFoundError extends EipError {
  variable: string;

  constructor(variable: string) {
    super(`Variable not found: ${variable}`);
    this.name = 'EipNameNotFoundError';
    this.variable = variable;
  }
}

/**
 * Error class for data types that cannot be resolved
 */
export class EipUnresolvedTypeError extends EipError {
  dataType: number;

  constructor(dataType: number, detail: string) {
    super(`Unresolved data type 0x${dataType.toString(16).padStart(2, '0')}: ${detail}`);
    this.name = 'EipUnresolvedTypeError';
    this.dataType = dataType;
  }
}

/**
 * Error class for member chains or type nesting above the safety bound
 */
export class EipChainTooLongError extends EipError {
  limit: number;

  constructor(limit: number, startInstance: number) {
    super(
      `Type chain starting at instance ${startInstance} exceeded the limit of ${limit} links`
    );
    this.name = 'EipChainTooLongError';
    this.limit = limit;
  }
}

// --- Transport Errors ---

/**
 * Base class for all transport failures
 */
export class EipIoError extends EipError {
  constructor(message: string = 'Transport failure') {
    super(message);
    this.name = 'EipIoError';
  }
}

/**
 * Error class for reply timeout
 */
export class EipTimeoutError extends EipIoError {
  constructor(message: string = 'EtherNet/IP request timed out') {
    super(message);
    this.name = 'EipTimeoutError';
  }
}

/**
 * Error class for not connected
 */
export class EipNotConnectedError extends EipIoError {
  constructor() {
    super('Transport is not connected');
    this.name = 'EipNotConnectedError';
  }
}

/**
 * Error class for a connection closed or reset by the peer
 */
export class EipConnectionClosedError extends EipIoError {
  constructor(reason: string = 'Connection closed by peer') {
    super(reason);
    this.name = 'EipConnectionClosedError';
  }
}

// --- Errors for Usage ---

/**
 * Error class for paths that cannot be encoded
 */
export class EipPathError extends EipError {
  constructor(message: string) {
    super(message);
    this.name = 'EipPathError';
  }
}

/**
 * Error class for values that do not fit the target data type
 */
export class EipDataConversionError extends EipError {
  constructor(value: unknown, expected: string) {
    super(`Cannot convert ${describeValue(value)} to ${expected}`);
    this.name = 'EipDataConversionError';
  }
}

/**
 * Error class for invalid client configuration
 */
export class EipConfigError extends EipError {
  constructor(message: string) {
    super(message);
    this.name = 'EipConfigError';
  }
}

/**
 * Error class for missing or invalid sessions
 */
export class EipSessionError extends EipError {
  constructor(message: string) {
    super(message);
    this.name = 'EipSessionError';
  }
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) return `bytes(${value.length})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'string') return `"${value}"`;
  return String(value);
}
