// src/services/read-tag.ts

import { CipService } from '../constants/constants.js';
import { EipReplyTooShortError } from '../errors.js';
import type { CipRequest, ReadTagResponse } from '../types/eip-types.js';

const ELEMENT_COUNT = Uint8Array.from([0x01, 0x00]);
const RESPONSE_HEADER_SIZE = 2; // data type (1) + additional info length (1)

/**
 * Строит запрос Read Tag (0x4C), всегда на один элемент
 * @param path - символьный путь, при чтении по частям с simple data segment
 */
export function buildReadTagRequest(path: Uint8Array): CipRequest {
  return {
    service: CipService.READ_TAG,
    path,
    data: ELEMENT_COUNT.slice(),
  };
}

/**
 * Разбирает reply data ответа Read Tag:
 * data type | additional info length | additional info | value
 * @throws EipReplyTooShortError - если данных меньше заголовка
 */
export function parseReadTagResponse(data: Uint8Array): ReadTagResponse {
  if (data.length < RESPONSE_HEADER_SIZE) {
    throw new EipReplyTooShortError(data.length, RESPONSE_HEADER_SIZE);
  }
  const additionalInfoLength = data[1];
  const valueOffset = RESPONSE_HEADER_SIZE + additionalInfoLength;
  if (data.length < valueOffset) {
    throw new EipReplyTooShortError(data.length, valueOffset);
  }

  return {
    dataType: data[0],
    additionalInfo: data.slice(RESPONSE_HEADER_SIZE, valueOffset),
    data: data.slice(valueOffset),
  };
}

/**
 * Собирает reply data ответа Read Tag (используется эмулятором контроллера)
 */
export function buildReadTagResponse(response: ReadTagResponse): Uint8Array {
  const infoLength = response.additionalInfo.length;
  const out = new Uint8Array(RESPONSE_HEADER_SIZE + infoLength + response.data.length);
  out[0] = response.dataType;
  out[1] = infoLength;
  out.set(response.additionalInfo, RESPONSE_HEADER_SIZE);
  out.set(response.data, RESPONSE_HEADER_SIZE + infoLength);
  return out;
}
