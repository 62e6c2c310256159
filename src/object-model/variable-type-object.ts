// src/object-model/variable-type-object.ts

import { EipFrameDecodeError } from '../errors.js';
import { encodeUtf8, viewOf } from '../utils/utils.js';
import { decodeObjectName } from './tag-name-server.js';

/**
 * Атрибуты Variable Type Object (0x6C).
 * Для структуры nestingInstanceId указывает на первый член,
 * члены связаны через nextInstanceId до 0.
 */
export interface VariableTypeObjectAttributes {
  sizeInMemory: number;
  dataType: number;
  arrayDataType: number;
  extents: number[];
  numberOfMembers: number;
  crc: number;
  name: string;
  nextInstanceId: number;
  nestingInstanceId: number;
  starts: number[];
}

const HEADER_SIZE = 8;

/**
 * size:u32 | reserved | type | array type | dims | extents:u32*d | members:u16 |
 * reserved(4) | crc:u16 | name length | name | pad | next:u32 | nesting:u32 | starts:u32*d
 */
function layout(dimensions: number, nameLength: number) {
  const tail = HEADER_SIZE + dimensions * 4;
  const pad = nameLength % 2 === 0 ? 1 : 0;
  const next = tail + 9 + nameLength + pad;
  return {
    numberOfMembers: tail,
    crc: tail + 6,
    nameLength: tail + 8,
    name: tail + 9,
    next,
    nesting: next + 4,
    starts: next + 8,
    total: next + 8 + dimensions * 4,
  };
}

export function parseVariableTypeObject(data: Uint8Array): VariableTypeObjectAttributes {
  if (data.length < HEADER_SIZE) {
    throw new EipFrameDecodeError(`Variable Type Object reply too short: ${data.length} bytes`);
  }
  const dimensions = data[7];
  const nameLengthOffset = HEADER_SIZE + dimensions * 4 + 8;
  if (data.length <= nameLengthOffset) {
    throw new EipFrameDecodeError(
      `Variable Type Object reply too short: ${data.length} bytes, name length at ${nameLengthOffset}`
    );
  }
  const offsets = layout(dimensions, data[nameLengthOffset]);
  if (data.length < offsets.total) {
    throw new EipFrameDecodeError(
      `Variable Type Object reply too short: ${data.length} bytes, expected ${offsets.total}`
    );
  }

  const view = viewOf(data);
  const extents: number[] = [];
  const starts: number[] = [];
  for (let i = 0; i < dimensions; i++) {
    extents.push(view.getUint32(HEADER_SIZE + i * 4, true));
    starts.push(view.getUint32(offsets.starts + i * 4, true));
  }

  return {
    sizeInMemory: view.getUint32(0, true),
    dataType: data[5],
    arrayDataType: data[6],
    extents,
    numberOfMembers: view.getUint16(offsets.numberOfMembers, true),
    crc: view.getUint16(offsets.crc, true),
    name: decodeObjectName(
      data.subarray(offsets.name, offsets.name + data[nameLengthOffset]),
      'Variable Type Object name'
    ),
    nextInstanceId: view.getUint32(offsets.next, true),
    nestingInstanceId: view.getUint32(offsets.nesting, true),
    starts,
  };
}

/**
 * Собирает атрибуты Variable Type Object (используется эмулятором контроллера)
 */
export function encodeVariableTypeObject(attributes: VariableTypeObjectAttributes): Uint8Array {
  const dimensions = attributes.extents.length;
  if (attributes.starts.length !== dimensions) {
    throw new RangeError('extents and starts must have the same length');
  }
  const name = encodeUtf8(attributes.name);
  if (name.length > 0xff) {
    throw new RangeError(`Type name too long: ${name.length} bytes`);
  }
  const offsets = layout(dimensions, name.length);
  const out = new Uint8Array(offsets.total);
  const view = new DataView(out.buffer);

  view.setUint32(0, attributes.sizeInMemory, true);
  out[5] = attributes.dataType;
  out[6] = attributes.arrayDataType;
  out[7] = dimensions;
  attributes.extents.forEach((extent, i) => view.setUint32(HEADER_SIZE + i * 4, extent, true));
  view.setUint16(offsets.numberOfMembers, attributes.numberOfMembers, true);
  view.setUint16(offsets.crc, attributes.crc, true);
  out[offsets.nameLength] = name.length;
  out.set(name, offsets.name);
  view.setUint32(offsets.next, attributes.nextInstanceId, true);
  view.setUint32(offsets.nesting, attributes.nestingInstanceId, true);
  attributes.starts.forEach((start, i) => view.setUint32(offsets.starts + i * 4, start, true));

  return out;
}
