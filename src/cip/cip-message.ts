// src/cip/cip-message.ts

import {
  CipStatusError,
  EipFrameDecodeError,
  EipPathError,
  EipReplyTooShortError,
} from '../errors.js';
import type { CipReply, CipRequest } from '../types/eip-types.js';

const REPLY_PREFIX_SIZE = 4; // service, reserved, general status, ext status size
const MAX_PATH_WORDS = 0xff;

/**
 * Собирает CIP-запрос: service | path size (в словах) | path | data
 * @throws EipPathError - если путь нечётной длины или длиннее 255 слов
 */
export function encodeCipRequest(request: CipRequest): Uint8Array {
  const { service, path, data } = request;
  if (path.length % 2 !== 0) {
    throw new EipPathError(`Request path must have an even byte length, got ${path.length}`);
  }
  const words = path.length / 2;
  if (words > MAX_PATH_WORDS) {
    throw new EipPathError(`Request path too long: ${words} words`);
  }

  const out = new Uint8Array(2 + path.length + data.length);
  out[0] = service & 0xff;
  out[1] = words;
  out.set(path, 2);
  out.set(data, 2 + path.length);
  return out;
}

/**
 * Разбирает CIP-ответ. Ненулевой general status не является ошибкой разбора.
 * @throws EipReplyTooShortError - если ответ короче 4 + 2 * ext_status_words
 */
export function decodeCipReply(bytes: Uint8Array): CipReply {
  if (bytes.length < REPLY_PREFIX_SIZE) {
    throw new EipReplyTooShortError(bytes.length, REPLY_PREFIX_SIZE);
  }
  const extendedStatusBytes = bytes[3] * 2;
  const dataOffset = REPLY_PREFIX_SIZE + extendedStatusBytes;
  if (bytes.length < dataOffset) {
    throw new EipReplyTooShortError(bytes.length, dataOffset);
  }

  return {
    service: bytes[0],
    reserved: bytes[1],
    generalStatus: bytes[2],
    extendedStatus: bytes.slice(REPLY_PREFIX_SIZE, dataOffset),
    data: bytes.slice(dataOffset),
  };
}

/**
 * Собирает CIP-ответ (используется эмулятором контроллера)
 */
export function encodeCipReply(reply: CipReply): Uint8Array {
  if (reply.extendedStatus.length % 2 !== 0) {
    throw new RangeError('Extended status must be a whole number of words');
  }
  const out = new Uint8Array(REPLY_PREFIX_SIZE + reply.extendedStatus.length + reply.data.length);
  out[0] = reply.service;
  out[1] = reply.reserved;
  out[2] = reply.generalStatus;
  out[3] = reply.extendedStatus.length / 2;
  out.set(reply.extendedStatus, REPLY_PREFIX_SIZE);
  out.set(reply.data, REPLY_PREFIX_SIZE + reply.extendedStatus.length);
  return out;
}

/**
 * Разбирает CIP-запрос (используется эмулятором контроллера)
 */
export function decodeCipRequest(bytes: Uint8Array): CipRequest {
  const pathLength = bytes.length >= 2 ? bytes[1] * 2 : 0;
  if (bytes.length < 2 + pathLength) {
    throw new EipFrameDecodeError(
      `CIP request too short: ${bytes.length} bytes, expected at least ${2 + pathLength}`
    );
  }
  return {
    service: bytes[0],
    path: bytes.slice(2, 2 + pathLength),
    data: bytes.slice(2 + pathLength),
  };
}

/**
 * Проверяет general status ответа
 * @param requestService - код сервиса запроса, для текста ошибки
 * @throws CipStatusError - при ненулевом статусе
 */
export function assertCipSuccess(reply: CipReply, requestService: number): CipReply {
  if (reply.generalStatus !== 0) {
    throw new CipStatusError(requestService, reply.generalStatus, reply.extendedStatus);
  }
  return reply;
}
