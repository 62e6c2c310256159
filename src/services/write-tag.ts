// src/services/write-tag.ts

import { CipService } from '../constants/constants.js';
import { EipFrameDecodeError } from '../errors.js';
import type { CipRequest, ReadTagResponse, TagDataHeader } from '../types/eip-types.js';
import { readUint16LE } from '../utils/utils.js';

const ELEMENT_COUNT = 1;
const HEADER_SIZE = 2; // data type (1) + additional info length (1)
const COUNT_SIZE = 2;

/**
 * Строит запрос Write Tag (0x4D):
 * data type | additional info length | additional info | count (01 00) | data
 */
export function buildWriteTagRequest(
  path: Uint8Array,
  header: TagDataHeader,
  data: Uint8Array
): CipRequest {
  const info = header.additionalInfo;
  if (info.length > 0xff) {
    throw new RangeError(`Additional info too long: ${info.length} bytes`);
  }

  const payload = new Uint8Array(HEADER_SIZE + info.length + COUNT_SIZE + data.length);
  payload[0] = header.dataType;
  payload[1] = info.length;
  payload.set(info, HEADER_SIZE);
  payload[HEADER_SIZE + info.length] = ELEMENT_COUNT; // Младший байт
  payload[HEADER_SIZE + info.length + 1] = 0x00; // Старший байт
  payload.set(data, HEADER_SIZE + info.length + COUNT_SIZE);

  return { service: CipService.WRITE_TAG, path, data: payload };
}

/**
 * Разбирает request data Write Tag (используется эмулятором контроллера)
 */
export function parseWriteTagRequest(data: Uint8Array): ReadTagResponse & { count: number } {
  if (data.length < HEADER_SIZE) {
    throw new EipFrameDecodeError('Write Tag data too short');
  }
  const countOffset = HEADER_SIZE + data[1];
  if (data.length < countOffset + COUNT_SIZE) {
    throw new EipFrameDecodeError(
      `Write Tag data too short: ${data.length} bytes, expected at least ${countOffset + COUNT_SIZE}`
    );
  }
  return {
    dataType: data[0],
    additionalInfo: data.slice(HEADER_SIZE, countOffset),
    count: readUint16LE(data, countOffset),
    data: data.slice(countOffset + COUNT_SIZE),
  };
}
