// src/cip/path-builder.ts

import { PATH_SEGMENT, SIMPLE_DATA_SEGMENT_WORDS } from '../constants/constants.js';
import { EipPathError } from '../errors.js';
import {
  concatUint8Arrays,
  decodeUtf8,
  encodeUtf8,
  uint16ToBytesLE,
  uint32ToBytesLE,
  viewOf,
} from '../utils/utils.js';

const MAX_SYMBOL_LENGTH = 0xff;

/** Разобранный сегмент пути */
export type PathSegment =
  | { type: 'symbolic'; name: string }
  | { type: 'class' | 'instance' | 'attribute' | 'element'; value: number }
  | { type: 'data'; offset: number; size: number };

/**
 * Символьный сегмент: 0x91 | длина | имя (UTF-8) | pad до чётной длины.
 * Байт длины содержит длину имени, а не длину с учётом pad.
 * @throws EipPathError - если имя пустое или длиннее 255 байт
 */
export function symbolicSegment(name: string): Uint8Array {
  const nameBytes = encodeUtf8(name);
  if (nameBytes.length === 0) {
    throw new EipPathError('Tag name must not be empty');
  }
  if (nameBytes.length > MAX_SYMBOL_LENGTH) {
    throw new EipPathError(
      `Tag name too long: ${nameBytes.length} bytes, maximum is ${MAX_SYMBOL_LENGTH}`
    );
  }

  const unpadded = 2 + nameBytes.length;
  const out = new Uint8Array(unpadded + (unpadded % 2));
  out[0] = PATH_SEGMENT.SYMBOLIC;
  out[1] = nameBytes.length;
  out.set(nameBytes, 2);
  return out;
}

/**
 * Логический сегмент: 8-битная форма (2 байта) или 16-битная с pad (4 байта)
 */
function logicalSegment(format8: number, format16: number, value: number, label: string): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new EipPathError(`Invalid ${label} id: ${value}`);
  }
  if (value <= 0xff) {
    return Uint8Array.from([format8, value]);
  }
  return concatUint8Arrays([Uint8Array.from([format16, 0x00]), uint16ToBytesLE(value)]);
}

/**
 * Логический путь class / instance [/ attribute], всегда чётной длины
 */
export function logicalPath(classId: number, instanceId: number, attributeId?: number): Uint8Array {
  const parts = [
    logicalSegment(PATH_SEGMENT.CLASS_8, PATH_SEGMENT.CLASS_16, classId, 'class'),
    logicalSegment(PATH_SEGMENT.INSTANCE_8, PATH_SEGMENT.INSTANCE_16, instanceId, 'instance'),
  ];
  if (attributeId !== undefined) {
    parts.push(
      logicalSegment(PATH_SEGMENT.ATTRIBUTE_8, PATH_SEGMENT.ATTRIBUTE_16, attributeId, 'attribute')
    );
  }
  return concatUint8Arrays(parts);
}

/**
 * Сегмент индекса элемента массива (0x28 / 0x29 / 0x2A)
 */
export function elementSegment(index: number): Uint8Array {
  if (!Number.isInteger(index) || index < 0 || index > 0xffffffff) {
    throw new EipPathError(`Invalid element index: ${index}`);
  }
  if (index <= 0xff) {
    return Uint8Array.from([PATH_SEGMENT.ELEMENT_8, index]);
  }
  if (index <= 0xffff) {
    return concatUint8Arrays([
      Uint8Array.from([PATH_SEGMENT.ELEMENT_16, 0x00]),
      uint16ToBytesLE(index),
    ]);
  }
  return concatUint8Arrays([Uint8Array.from([PATH_SEGMENT.ELEMENT_32, 0x00]), uint32ToBytesLE(index)]);
}

/**
 * Simple data segment: 0x80 | 3 (слова) | offset:u32 | size:u16.
 * Ограничивает чтение/запись диапазоном [offset, offset + size) байт значения.
 */
export function simpleDataSegment(offset: number, size: number): Uint8Array {
  if (!Number.isInteger(offset) || offset < 0 || offset > 0xffffffff) {
    throw new EipPathError(`Invalid data segment offset: ${offset}`);
  }
  if (!Number.isInteger(size) || size < 0 || size > 0xffff) {
    throw new EipPathError(`Invalid data segment size: ${size}`);
  }
  return concatUint8Arrays([
    Uint8Array.from([PATH_SEGMENT.SIMPLE_DATA, SIMPLE_DATA_SEGMENT_WORDS]),
    uint32ToBytesLE(offset),
    uint16ToBytesLE(size),
  ]);
}

/**
 * Путь к переменной по имени. Поддерживает члены структур и индексы:
 * `Motor.Speed`, `Buffer[3]`, `Grid[1,2].Value`.
 */
export function variablePath(name: string): Uint8Array {
  const parts = name.split('.');
  const segments: Uint8Array[] = [];

  for (const part of parts) {
    const match = /^([^[\]]+)((?:\[[^\]]*\])*)$/.exec(part);
    if (!match) {
      throw new EipPathError(`Invalid variable name: ${name}`);
    }
    segments.push(symbolicSegment(match[1]));

    const indexGroups = match[2].match(/\[[^\]]*\]/g) ?? [];
    for (const group of indexGroups) {
      for (const raw of group.slice(1, -1).split(',')) {
        const text = raw.trim();
        if (!/^\d+$/.test(text)) {
          throw new EipPathError(`Invalid element index "${text}" in ${name}`);
        }
        segments.push(elementSegment(Number(text)));
      }
    }
  }

  return concatUint8Arrays(segments);
}

/**
 * Разбирает путь на сегменты (используется эмулятором контроллера)
 * @throws EipPathError - на неизвестном или обрезанном сегменте
 */
export function parsePath(path: Uint8Array): PathSegment[] {
  const segments: PathSegment[] = [];
  const view = viewOf(path);
  let offset = 0;

  const need = (count: number): void => {
    if (offset + count > path.length) {
      throw new EipPathError(`Truncated path segment at offset ${offset}`);
    }
  };

  while (offset < path.length) {
    const marker = path[offset];
    switch (marker) {
      case PATH_SEGMENT.SYMBOLIC: {
        need(2);
        const length = path[offset + 1];
        need(2 + length);
        segments.push({
          type: 'symbolic',
          name: decodeUtf8(path.subarray(offset + 2, offset + 2 + length)),
        });
        offset += 2 + length + (length % 2);
        break;
      }
      case PATH_SEGMENT.CLASS_8:
      case PATH_SEGMENT.INSTANCE_8:
      case PATH_SEGMENT.ATTRIBUTE_8:
      case PATH_SEGMENT.ELEMENT_8:
        need(2);
        segments.push({ type: logicalType(marker), value: path[offset + 1] });
        offset += 2;
        break;
      case PATH_SEGMENT.CLASS_16:
      case PATH_SEGMENT.INSTANCE_16:
      case PATH_SEGMENT.ATTRIBUTE_16:
      case PATH_SEGMENT.ELEMENT_16:
        need(4);
        segments.push({ type: logicalType(marker), value: view.getUint16(offset + 2, true) });
        offset += 4;
        break;
      case PATH_SEGMENT.ELEMENT_32:
        need(6);
        segments.push({ type: 'element', value: view.getUint32(offset + 2, true) });
        offset += 6;
        break;
      case PATH_SEGMENT.SIMPLE_DATA:
        need(2 + SIMPLE_DATA_SEGMENT_WORDS * 2);
        segments.push({
          type: 'data',
          offset: view.getUint32(offset + 2, true),
          size: view.getUint16(offset + 6, true),
        });
        offset += 2 + SIMPLE_DATA_SEGMENT_WORDS * 2;
        break;
      default:
        throw new EipPathError(
          `Unsupported path segment 0x${marker.toString(16).padStart(2, '0')} at offset ${offset}`
        );
    }
  }

  return segments;
}

function logicalType(marker: number): 'class' | 'instance' | 'attribute' | 'element' {
  switch (marker) {
    case PATH_SEGMENT.CLASS_8:
    case PATH_SEGMENT.CLASS_16:
      return 'class';
    case PATH_SEGMENT.INSTANCE_8:
    case PATH_SEGMENT.INSTANCE_16:
      return 'instance';
    case PATH_SEGMENT.ATTRIBUTE_8:
    case PATH_SEGMENT.ATTRIBUTE_16:
      return 'attribute';
    default:
      return 'element';
  }
}
