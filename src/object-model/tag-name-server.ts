// src/object-model/tag-name-server.ts

import { EipFrameDecodeError } from '../errors.js';
import { decodeUtf8, encodeUtf8, readUint16LE, toHex } from '../utils/utils.js';

const CLASS_INFO_SIZE = 4; // revision (2) + instance count (2)
const NAME_LENGTH_OFFSET = 4;
const NAME_OFFSET = 5;

export interface TagNameServerInfo {
  revision: number;
  /** Количество объявленных переменных, экземпляры 1..N */
  instanceCount: number;
}

/**
 * Разбирает атрибуты экземпляра 0 Tag Name Server (0x6A)
 */
export function parseTagNameServerInfo(data: Uint8Array): TagNameServerInfo {
  if (data.length < CLASS_INFO_SIZE) {
    throw new EipFrameDecodeError(
      `Tag Name Server class attributes too short: ${data.length} bytes, expected ${CLASS_INFO_SIZE}`
    );
  }
  return {
    revision: readUint16LE(data, 0),
    instanceCount: readUint16LE(data, 2),
  };
}

/**
 * Разбирает имя переменной из атрибутов экземпляра Tag Name Server
 */
export function parseTagName(data: Uint8Array): string {
  if (data.length < NAME_OFFSET) {
    throw new EipFrameDecodeError(`Tag Name Server instance too short: ${data.length} bytes`);
  }
  const length = data[NAME_LENGTH_OFFSET];
  if (data.length < NAME_OFFSET + length) {
    throw new EipFrameDecodeError(
      `Tag name overruns the reply: declared ${length} bytes, ${data.length - NAME_OFFSET} available`
    );
  }
  return decodeObjectName(data.subarray(NAME_OFFSET, NAME_OFFSET + length), 'Tag name');
}

/**
 * Имя из атрибутов объекта. Имя уходит обратно в символьный путь,
 * поэтому невалидный UTF-8 - ошибка разбора, а не U+FFFD.
 * @throws EipFrameDecodeError
 */
export function decodeObjectName(bytes: Uint8Array, what: string): string {
  try {
    return decodeUtf8(bytes, true);
  } catch (err: unknown) {
    if (!(err instanceof TypeError)) throw err;
    throw new EipFrameDecodeError(`${what} is not valid UTF-8: ${toHex(bytes)}`);
  }
}

export function encodeTagNameServerInfo(info: TagNameServerInfo): Uint8Array {
  const out = new Uint8Array(CLASS_INFO_SIZE);
  const view = new DataView(out.buffer);
  view.setUint16(0, info.revision, true);
  view.setUint16(2, info.instanceCount, true);
  return out;
}

/**
 * Атрибуты экземпляра: 4 зарезервированных байта, длина имени, имя
 */
export function encodeTagName(name: string): Uint8Array {
  const bytes = encodeUtf8(name);
  if (bytes.length > 0xff) {
    throw new RangeError(`Tag name too long: ${bytes.length} bytes`);
  }
  const out = new Uint8Array(NAME_OFFSET + bytes.length);
  out[NAME_LENGTH_OFFSET] = bytes.length;
  out.set(bytes, NAME_OFFSET);
  return out;
}
