// src/cip/data-types.ts

import { CipDataType } from '../constants/constants.js';
import { EipDataConversionError, EipFrameDecodeError, EipUnresolvedTypeError } from '../errors.js';
import type {
  ArrayDescriptor,
  CipTypeDescriptor,
  CipValue,
  ScalarDescriptor,
  StringDescriptor,
} from '../types/eip-types.js';
import { concatUint8Arrays, decodeUtf8, encodeUtf8, viewOf } from '../utils/utils.js';

type ScalarCodec = 'bool' | 'int' | 'uint' | 'float' | 'bcd';

export interface ElementaryTypeInfo {
  name: string;
  width: number;
  codec: ScalarCodec;
}

/**
 * Элементарные типы: код -> имя, ширина в байтах, способ кодирования.
 * STRING сюда не входит: его размер задаётся объявлением переменной.
 */
export const ELEMENTARY_TYPES: Readonly<Record<number, ElementaryTypeInfo>> = {
  [CipDataType.BOOL]: { name: 'BOOL', width: 2, codec: 'bool' },
  [CipDataType.SINT]: { name: 'SINT', width: 1, codec: 'int' },
  [CipDataType.INT]: { name: 'INT', width: 2, codec: 'int' },
  [CipDataType.DINT]: { name: 'DINT', width: 4, codec: 'int' },
  [CipDataType.LINT]: { name: 'LINT', width: 8, codec: 'int' },
  [CipDataType.USINT]: { name: 'USINT', width: 1, codec: 'uint' },
  [CipDataType.UINT]: { name: 'UINT', width: 2, codec: 'uint' },
  [CipDataType.UDINT]: { name: 'UDINT', width: 4, codec: 'uint' },
  [CipDataType.ULINT]: { name: 'ULINT', width: 8, codec: 'uint' },
  [CipDataType.REAL]: { name: 'REAL', width: 4, codec: 'float' },
  [CipDataType.LREAL]: { name: 'LREAL', width: 8, codec: 'float' },
  [CipDataType.BYTE]: { name: 'BYTE', width: 1, codec: 'uint' },
  [CipDataType.WORD]: { name: 'WORD', width: 2, codec: 'uint' },
  [CipDataType.DWORD]: { name: 'DWORD', width: 4, codec: 'uint' },
  [CipDataType.LWORD]: { name: 'LWORD', width: 8, codec: 'uint' },
  [CipDataType.TIME]: { name: 'TIME', width: 8, codec: 'int' },
  [CipDataType.UINT_BCD]: { name: 'UINT_BCD', width: 2, codec: 'bcd' },
  [CipDataType.UDINT_BCD]: { name: 'UDINT_BCD', width: 4, codec: 'bcd' },
  [CipDataType.ULINT_BCD]: { name: 'ULINT_BCD', width: 8, codec: 'bcd' },
  [CipDataType.ENUM]: { name: 'ENUM', width: 4, codec: 'int' },
  [CipDataType.DATE_NSEC]: { name: 'DATE_NSEC', width: 8, codec: 'int' },
  [CipDataType.TIME_NSEC]: { name: 'TIME_NSEC', width: 8, codec: 'int' },
  [CipDataType.DATE_AND_TIME_NSEC]: { name: 'DATE_AND_TIME_NSEC', width: 8, codec: 'int' },
  [CipDataType.TIME_OF_DAY_NSEC]: { name: 'TIME_OF_DAY_NSEC', width: 8, codec: 'int' },
};

export function isElementaryType(code: number): boolean {
  return code in ELEMENTARY_TYPES;
}

/**
 * Имя типа для логов и сообщений об ошибках
 */
export function dataTypeName(code: number): string {
  if (code === CipDataType.STRING) return 'STRING';
  if (code === CipDataType.STRUCT) return 'STRUCT';
  if (code === CipDataType.ABBREVIATED_STRUCT) return 'ABBREVIATED_STRUCT';
  if (code === CipDataType.ARRAY) return 'ARRAY';
  if (code === CipDataType.UNION) return 'UNION';
  return ELEMENTARY_TYPES[code]?.name ?? `0x${code.toString(16).padStart(2, '0')}`;
}

function elementaryInfo(code: number): ElementaryTypeInfo {
  const info = ELEMENTARY_TYPES[code];
  if (!info) {
    throw new EipUnresolvedTypeError(code, 'not an elementary type');
  }
  return info;
}

// !=============================================================================
// ! Скаляры
// !=============================================================================

/**
 * Декодирует скаляр. Значения шириной 8 байт возвращаются как bigint.
 * @throws EipFrameDecodeError - если байтов меньше ширины типа
 */
export function decodeScalar(code: number, bytes: Uint8Array): boolean | number | bigint {
  const info = elementaryInfo(code);
  if (bytes.length < info.width) {
    throw new EipFrameDecodeError(
      `${info.name} needs ${info.width} bytes, got ${bytes.length}`
    );
  }
  const view = viewOf(bytes);

  switch (info.codec) {
    case 'bool':
      return bytes.subarray(0, info.width).some(b => b !== 0);
    case 'float':
      return info.width === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true);
    case 'bcd':
      return decodeBcd(info, bytes);
    case 'int':
      switch (info.width) {
        case 1:
          return view.getInt8(0);
        case 2:
          return view.getInt16(0, true);
        case 4:
          return view.getInt32(0, true);
        default:
          return view.getBigInt64(0, true);
      }
    case 'uint':
      switch (info.width) {
        case 1:
          return view.getUint8(0);
        case 2:
          return view.getUint16(0, true);
        case 4:
          return view.getUint32(0, true);
        default:
          return view.getBigUint64(0, true);
      }
  }
}

/**
 * Кодирует скаляр в ширину типа
 * @throws EipDataConversionError - если значение не помещается в тип
 */
export function encodeScalar(code: number, value: CipValue): Uint8Array {
  const info = elementaryInfo(code);
  const out = new Uint8Array(info.width);
  const view = new DataView(out.buffer);

  switch (info.codec) {
    case 'bool': {
      if (typeof value !== 'boolean' && value !== 0 && value !== 1) {
        throw new EipDataConversionError(value, info.name);
      }
      out[0] = value === true || value === 1 ? 1 : 0;
      return out;
    }
    case 'float': {
      if (typeof value !== 'number') {
        throw new EipDataConversionError(value, info.name);
      }
      if (info.width === 4) view.setFloat32(0, value, true);
      else view.setFloat64(0, value, true);
      return out;
    }
    case 'bcd':
      return encodeBcd(info, value);
    case 'int':
    case 'uint': {
      const signed = info.codec === 'int';
      if (info.width === 8) {
        const big = toBigInt(value, info.name);
        const fits = signed ? BigInt.asIntN(64, big) === big : BigInt.asUintN(64, big) === big;
        if (!fits) throw new EipDataConversionError(value, info.name);
        if (signed) view.setBigInt64(0, big, true);
        else view.setBigUint64(0, big, true);
        return out;
      }
      const num = toInteger(value, info.name);
      const bits = info.width * 8;
      const min = signed ? -(2 ** (bits - 1)) : 0;
      const max = signed ? 2 ** (bits - 1) - 1 : 2 ** bits - 1;
      if (num < min || num > max) {
        throw new EipDataConversionError(value, info.name);
      }
      for (let i = 0; i < info.width; i++) {
        out[i] = Math.floor(num / 2 ** (8 * i)) & 0xff;
      }
      return out;
    }
  }
}

function toInteger(value: CipValue, typeName: string): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (
    typeof value === 'bigint' &&
    value >= BigInt(Number.MIN_SAFE_INTEGER) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER)
  ) {
    return Number(value);
  }
  throw new EipDataConversionError(value, typeName);
}

function toBigInt(value: CipValue, typeName: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  throw new EipDataConversionError(value, typeName);
}

/**
 * BCD хранится little-endian, каждый полубайт - одна десятичная цифра
 */
function decodeBcd(info: ElementaryTypeInfo, bytes: Uint8Array): number | bigint {
  let digits = '';
  for (let i = info.width - 1; i >= 0; i--) {
    const high = bytes[i] >> 4;
    const low = bytes[i] & 0x0f;
    if (high > 9 || low > 9) {
      throw new EipFrameDecodeError(`Invalid ${info.name} digit in byte 0x${bytes[i].toString(16)}`);
    }
    digits += `${high}${low}`;
  }
  const result = BigInt(digits);
  return info.width === 8 ? result : Number(result);
}

function encodeBcd(info: ElementaryTypeInfo, value: CipValue): Uint8Array {
  const big = toBigInt(value, info.name);
  const digits = big.toString();
  if (big < 0n || digits.length > info.width * 2) {
    throw new EipDataConversionError(value, info.name);
  }
  const padded = digits.padStart(info.width * 2, '0');
  const out = new Uint8Array(info.width);
  for (let i = 0; i < info.width; i++) {
    const pos = padded.length - 2 * (i + 1);
    out[i] = (Number(padded[pos]) << 4) | Number(padded[pos + 1]);
  }
  return out;
}

// !=============================================================================
// ! Строки
// !=============================================================================

/**
 * Строка заканчивается на первом NUL или на границе буфера
 */
export function decodeString(bytes: Uint8Array): string {
  const end = bytes.indexOf(0);
  return decodeUtf8(end === -1 ? bytes : bytes.subarray(0, end));
}

/**
 * UTF-8 байты строкового значения без префикса длины
 * @throws EipDataConversionError - если строка длиннее maxSize
 */
export function encodeString(value: CipValue, maxSize: number): Uint8Array {
  if (typeof value !== 'string') {
    throw new EipDataConversionError(value, 'STRING');
  }
  const bytes = encodeUtf8(value);
  if (bytes.length > maxSize) {
    throw new EipDataConversionError(value, `STRING(${maxSize})`);
  }
  return bytes;
}

// !=============================================================================
// ! Значения по дескриптору
// !=============================================================================

/** Число элементов массива: произведение размерностей */
export function elementCount(descriptor: ArrayDescriptor): number {
  return descriptor.dimensions.reduce((total, dim) => total * dim.extent, 1);
}

/** Размер одного элемента массива в байтах */
export function elementSize(descriptor: ArrayDescriptor): number {
  const element = descriptor.elementType;
  if (element.kind === 'scalar') return element.width;
  if (element.kind === 'string') return element.maxSize;
  return element.size;
}

/**
 * Декодирует значение переменной по её дескриптору
 */
export function decodeValue(descriptor: CipTypeDescriptor, bytes: Uint8Array): CipValue {
  switch (descriptor.kind) {
    case 'scalar':
      return decodeScalar(descriptor.code, bytes);
    case 'string':
      return decodeString(bytes);
    case 'structure':
      return bytes.slice(0, descriptor.size);
    case 'array':
      return decodeArray(descriptor, bytes);
    case 'abbreviated-structure':
      throw new EipUnresolvedTypeError(
        CipDataType.ABBREVIATED_STRUCT,
        'abbreviated structures cannot be decoded'
      );
  }
}

function decodeArray(descriptor: ArrayDescriptor, bytes: Uint8Array): CipValue[] {
  const size = elementSize(descriptor);
  const count = elementCount(descriptor);
  if (bytes.length < size * count) {
    throw new EipFrameDecodeError(
      `Array needs ${size * count} bytes, got ${bytes.length}`
    );
  }
  const flat: CipValue[] = [];
  for (let i = 0; i < count; i++) {
    flat.push(decodeValue(descriptor.elementType, bytes.subarray(i * size, (i + 1) * size)));
  }
  return nest(flat, descriptor.dimensions.map(d => d.extent));
}

/** Раскладывает плоский список по размерностям (первая размерность - внешняя) */
function nest(flat: CipValue[], extents: number[]): CipValue[] {
  if (extents.length <= 1) return flat;
  const [outer, ...inner] = extents;
  const stride = flat.length / outer;
  const out: CipValue[] = [];
  for (let i = 0; i < outer; i++) {
    out.push(nest(flat.slice(i * stride, (i + 1) * stride), inner));
  }
  return out;
}

/**
 * Плоский список элементов из вложенного или плоского массива
 */
export function flattenArrayValue(value: CipValue): CipValue[] {
  if (!Array.isArray(value)) {
    throw new EipDataConversionError(value, 'array');
  }
  const out: CipValue[] = [];
  const walk = (items: CipValue[]): void => {
    for (const item of items) {
      if (Array.isArray(item)) walk(item);
      else out.push(item);
    }
  };
  walk(value);
  return out;
}

/**
 * Кодирует значение по дескриптору в сырые байты (без заголовка Write Tag).
 * Строка кодируется без префикса длины, элементы-строки массива дополняются нулями.
 */
export function encodeValue(descriptor: CipTypeDescriptor, value: CipValue): Uint8Array {
  switch (descriptor.kind) {
    case 'scalar':
      return encodeScalarDescriptor(descriptor, value);
    case 'string':
      return encodeString(value, descriptor.maxSize);
    case 'structure': {
      if (!(value instanceof Uint8Array) || value.length !== descriptor.size) {
        throw new EipDataConversionError(value, `${descriptor.typeName} (${descriptor.size} bytes)`);
      }
      return value;
    }
    case 'array':
      return encodeArray(descriptor, value);
    case 'abbreviated-structure':
      throw new EipUnresolvedTypeError(
        CipDataType.ABBREVIATED_STRUCT,
        'abbreviated structures cannot be encoded'
      );
  }
}

function encodeScalarDescriptor(descriptor: ScalarDescriptor, value: CipValue): Uint8Array {
  const bytes = encodeScalar(descriptor.code, value);
  if (descriptor.width <= bytes.length) return bytes;
  const out = new Uint8Array(descriptor.width);
  out.set(bytes);
  return out;
}

function padStringElement(descriptor: StringDescriptor, value: CipValue): Uint8Array {
  const out = new Uint8Array(descriptor.maxSize);
  out.set(encodeString(value, descriptor.maxSize));
  return out;
}

function encodeArray(descriptor: ArrayDescriptor, value: CipValue): Uint8Array {
  const flat = flattenArrayValue(value);
  const count = elementCount(descriptor);
  if (flat.length !== count) {
    throw new EipDataConversionError(value, `array of ${count} elements`);
  }
  const element = descriptor.elementType;
  return concatUint8Arrays(
    flat.map(item =>
      element.kind === 'string' ? padStringElement(element, item) : encodeValue(element, item)
    )
  );
}
