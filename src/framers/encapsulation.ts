// src/framers/encapsulation.ts

import { ENCAPSULATION_HEADER_SIZE } from '../constants/constants.js';
import { EipFrameDecodeError, EipFrameTooShortError } from '../errors.js';
import type { CommandSpecificData, EncapsulationMessage } from '../types/eip-types.js';
import { readUint16LE, sliceUint8Array, viewOf } from '../utils/utils.js';

const SENDER_CONTEXT_SIZE = 8;
const COMMAND_SPECIFIC_HEADER_SIZE = 6; // interface handle (4) + timeout (2)
const MAX_PAYLOAD_LENGTH = 0xffff;

/**
 * Собирает кадр инкапсуляции.
 * Поле length всегда вычисляется из payload.
 */
export function encodeEncapsulation(message: EncapsulationMessage): Uint8Array {
  if (message.payload.length > MAX_PAYLOAD_LENGTH) {
    throw new RangeError(`Encapsulation payload too large: ${message.payload.length} bytes`);
  }
  if (message.senderContext.length !== SENDER_CONTEXT_SIZE) {
    throw new RangeError(`Sender context must be ${SENDER_CONTEXT_SIZE} bytes`);
  }

  const frame = new Uint8Array(ENCAPSULATION_HEADER_SIZE + message.payload.length);
  const view = new DataView(frame.buffer);

  view.setUint16(0, message.command, true); // Command
  view.setUint16(2, message.payload.length, true); // Length
  view.setUint32(4, message.sessionHandle >>> 0, true); // Session handle
  view.setUint32(8, message.status >>> 0, true); // Status
  frame.set(message.senderContext, 12); // Sender context (8 байт)
  view.setUint32(20, message.options >>> 0, true); // Options
  frame.set(message.payload, ENCAPSULATION_HEADER_SIZE);

  return frame;
}

/**
 * Разбирает кадр инкапсуляции.
 * Объявленная длина не сверяется с payload: транспорт доставляет ровно один кадр.
 */
export function decodeEncapsulation(frame: Uint8Array): EncapsulationMessage {
  if (frame.length < ENCAPSULATION_HEADER_SIZE) {
    throw new EipFrameTooShortError(frame.length, ENCAPSULATION_HEADER_SIZE);
  }

  const view = viewOf(frame);
  return {
    command: view.getUint16(0, true),
    sessionHandle: view.getUint32(4, true),
    status: view.getUint32(8, true),
    senderContext: frame.slice(12, 20),
    options: view.getUint32(20, true),
    payload: frame.slice(ENCAPSULATION_HEADER_SIZE),
  };
}

/**
 * Выделяет из потокового буфера один полный кадр.
 * @returns кадр и остаток буфера, либо null, если данных пока недостаточно
 */
export function extractFrame(buffer: Uint8Array): { frame: Uint8Array; rest: Uint8Array } | null {
  if (buffer.length < ENCAPSULATION_HEADER_SIZE) return null;
  const total = ENCAPSULATION_HEADER_SIZE + readUint16LE(buffer, 2);
  if (buffer.length < total) return null;
  return {
    frame: buffer.slice(0, total),
    rest: sliceUint8Array(buffer, total),
  };
}

/**
 * Собирает command specific data (interface handle, timeout, пакет CPF)
 */
export function encodeCommandSpecificData(data: CommandSpecificData): Uint8Array {
  const out = new Uint8Array(COMMAND_SPECIFIC_HEADER_SIZE + data.packet.length);
  const view = new DataView(out.buffer);
  view.setUint32(0, data.interfaceHandle >>> 0, true);
  view.setUint16(4, data.timeout, true);
  out.set(data.packet, COMMAND_SPECIFIC_HEADER_SIZE);
  return out;
}

/**
 * Разбирает command specific data
 */
export function decodeCommandSpecificData(payload: Uint8Array): CommandSpecificData {
  if (payload.length < COMMAND_SPECIFIC_HEADER_SIZE) {
    throw new EipFrameDecodeError(
      `Command specific data too short: ${payload.length} bytes, expected at least ${COMMAND_SPECIFIC_HEADER_SIZE}`
    );
  }
  const view = viewOf(payload);
  return {
    interfaceHandle: view.getUint32(0, true),
    timeout: view.getUint16(4, true),
    packet: payload.slice(COMMAND_SPECIFIC_HEADER_SIZE),
  };
}
