// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');
const strictTextDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view on a slice of the input array (shares the buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Creates a new Uint8Array of the specified size and fills it with the specified value.
 */
export function allocUint8Array(size: number, fill: number = 0): Uint8Array {
  const arr: Uint8Array = new Uint8Array(size);
  if (fill !== 0) {
    arr.fill(fill);
  }
  return arr;
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i];
    hex += HEX_TABLE[(b >> 4) & 0xf] + HEX_TABLE[b & 0xf];
  }
  return hex;
}

/**
 * 16-битное беззнаковое в LE
 */
export function uint16ToBytesLE(value: number): Uint8Array {
  const buf = new Uint8Array(2);
  new DataView(buf.buffer).setUint16(0, value, true);
  return buf;
}

/**
 * 32-битное беззнаковое в LE
 */
export function uint32ToBytesLE(value: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, value >>> 0, true);
  return buf;
}

/**
 * DataView поверх Uint8Array с учётом byteOffset
 */
export function viewOf(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Читает 16-битное беззнаковое LE
 */
export function readUint16LE(buf: Uint8Array, offset: number = 0): number {
  return viewOf(buf).getUint16(offset, true);
}

export function encodeUtf8(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * @param fatal - бросать TypeError на невалидном UTF-8 вместо подстановки U+FFFD
 */
export function decodeUtf8(bytes: Uint8Array, fatal: boolean = false): string {
  return (fatal ? strictTextDecoder : textDecoder).decode(bytes);
}

/**
 * Compares two Uint8Arrays byte by byte
 */
export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i: number = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Счётчик для sender context (8 байт, младшие 4 байта - номер запроса)
 */
export class SenderContextCounter {
  private _current: number = 0;

  next(): Uint8Array {
    this._current = (this._current + 1) % 0x100000000;
    const context = new Uint8Array(8);
    context.set(uint32ToBytesLE(this._current), 0);
    return context;
  }

  get current(): number {
    return this._current;
  }
}
