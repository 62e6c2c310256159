// src/object-model/variable-object.ts

import { EipFrameDecodeError } from '../errors.js';
import { viewOf } from '../utils/utils.js';

/**
 * Атрибуты Variable Object (0x6B)
 */
export interface VariableObjectAttributes {
  /** Размер значения в байтах */
  size: number;
  dataType: number;
  /** Тип элемента, если dataType = ARRAY */
  arrayDataType: number;
  /** Число элементов по каждой размерности */
  extents: number[];
  bitNumber: number;
  /** Связанный Variable Type Object, 0 если его нет */
  variableTypeInstanceId: number;
  /** Начальный индекс по каждой размерности */
  starts: number[];
}

const HEADER_SIZE = 8;

/**
 * size:u32 | type | array type | dims | pad | extents:u32*d | reserved(8) |
 * bit number | pad(3) | variable type instance:u32 | starts:u32*d
 */
function layout(dimensions: number) {
  const tail = HEADER_SIZE + dimensions * 4;
  return {
    bitNumber: tail + 8,
    variableTypeInstanceId: tail + 12,
    starts: tail + 16,
    total: tail + 16 + dimensions * 4,
  };
}

export function parseVariableObject(data: Uint8Array): VariableObjectAttributes {
  if (data.length < HEADER_SIZE) {
    throw new EipFrameDecodeError(`Variable Object reply too short: ${data.length} bytes`);
  }
  const dimensions = data[6];
  const offsets = layout(dimensions);
  if (data.length < offsets.total) {
    throw new EipFrameDecodeError(
      `Variable Object reply too short: ${data.length} bytes, expected ${offsets.total}`
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
    size: view.getUint32(0, true),
    dataType: data[4],
    arrayDataType: data[5],
    extents,
    bitNumber: data[offsets.bitNumber],
    variableTypeInstanceId: view.getUint32(offsets.variableTypeInstanceId, true),
    starts,
  };
}

/**
 * Собирает атрибуты Variable Object (используется эмулятором контроллера)
 */
export function encodeVariableObject(attributes: VariableObjectAttributes): Uint8Array {
  const dimensions = attributes.extents.length;
  if (attributes.starts.length !== dimensions) {
    throw new RangeError('extents and starts must have the same length');
  }
  const offsets = layout(dimensions);
  const out = new Uint8Array(offsets.total);
  const view = new DataView(out.buffer);

  view.setUint32(0, attributes.size, true);
  out[4] = attributes.dataType;
  out[5] = attributes.arrayDataType;
  out[6] = dimensions;
  attributes.extents.forEach((extent, i) => view.setUint32(HEADER_SIZE + i * 4, extent, true));
  out[offsets.bitNumber] = attributes.bitNumber;
  view.setUint32(offsets.variableTypeInstanceId, attributes.variableTypeInstanceId, true);
  attributes.starts.forEach((start, i) => view.setUint32(offsets.starts + i * 4, start, true));

  return out;
}
