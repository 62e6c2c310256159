// src/transfer/segmented-transfer.ts

import {
  CipDataType,
  MAX_UNCONNECTED_MESSAGE_SIZE,
  SEGMENT_READ_OVERHEAD,
  SEGMENT_WRITE_CHUNK_SIZE,
} from '../constants/constants.js';
import { decodeValue, encodeValue } from '../cip/data-types.js';
import { simpleDataSegment, variablePath } from '../cip/path-builder.js';
import { EipDataConversionError, EipFrameDecodeError, EipUnresolvedTypeError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type {
  CipTypeDescriptor,
  CipValue,
  SegmentedTransferOptions,
  TagDataHeader,
  TagService,
} from '../types/eip-types.js';
import { concatUint8Arrays, uint16ToBytesLE } from '../utils/utils.js';

const STRING_LENGTH_PREFIX = 2;

const logger = defaultLogger.createLogger('SegmentedTransfer');

/**
 * Заголовок типа для Write Tag.
 * Массив пишется с типом элемента, структура - как 0xA0 с CRC.
 */
export function writeHeaderFor(descriptor: CipTypeDescriptor): TagDataHeader {
  switch (descriptor.kind) {
    case 'scalar':
      return { dataType: descriptor.code, additionalInfo: new Uint8Array(0) };
    case 'string':
      return { dataType: CipDataType.STRING, additionalInfo: new Uint8Array(0) };
    case 'structure':
      return {
        dataType: CipDataType.ABBREVIATED_STRUCT,
        additionalInfo: uint16ToBytesLE(descriptor.crc),
      };
    case 'array':
      return writeHeaderFor(descriptor.elementType);
    case 'abbreviated-structure':
      throw new EipUnresolvedTypeError(
        CipDataType.ABBREVIATED_STRUCT,
        'abbreviated structures cannot be written'
      );
  }
}

/**
 * Чтение и запись значений, которые не помещаются в одно сообщение.
 * Скаляры идут одним Read Tag / Write Tag без simple data segment.
 */
export class SegmentedTransfer {
  private readonly tags: TagService;
  private readonly readCeiling: number;

  constructor(tags: TagService, options: SegmentedTransferOptions = {}) {
    this.tags = tags;
    const maxMessageSize = options.maxMessageSize ?? MAX_UNCONNECTED_MESSAGE_SIZE;
    this.readCeiling = maxMessageSize - SEGMENT_READ_OVERHEAD;
    if (this.readCeiling <= 0) {
      throw new RangeError(`maxMessageSize must exceed ${SEGMENT_READ_OVERHEAD}`);
    }
  }

  /** Максимальный размер одного фрагмента при чтении */
  get maxReadChunk(): number {
    return this.readCeiling;
  }

  /** Размер фрагмента при записи */
  get maxWriteChunk(): number {
    return SEGMENT_WRITE_CHUNK_SIZE;
  }

  /**
   * Читает и декодирует значение переменной
   */
  async readValue(name: string, descriptor: CipTypeDescriptor): Promise<CipValue> {
    if (descriptor.kind === 'scalar') {
      const response = await this.tags.readTag(variablePath(name));
      return decodeValue(descriptor, response.data);
    }
    const bytes = await this.readBytes(name, descriptor);
    return decodeValue(descriptor, bytes);
  }

  /**
   * Кодирует и записывает значение переменной
   */
  async writeValue(name: string, descriptor: CipTypeDescriptor, value: CipValue): Promise<void> {
    if (descriptor.kind === 'scalar') {
      await this.tags.writeTag(
        variablePath(name),
        writeHeaderFor(descriptor),
        encodeValue(descriptor, value)
      );
      return;
    }
    await this.writeBytes(name, descriptor, value);
  }

  /**
   * Читает значение по частям: offset растёт на полный потолок чтения.
   * Заголовок Read Tag снимается с каждого фрагмента, у строк ещё и префикс длины.
   * @throws EipFrameDecodeError - если собранная длина не совпадает с объявленной
   */
  async readBytes(name: string, descriptor: CipTypeDescriptor): Promise<Uint8Array> {
    if (descriptor.kind === 'abbreviated-structure') {
      throw new EipUnresolvedTypeError(
        CipDataType.ABBREVIATED_STRUCT,
        `${name}: abbreviated structures cannot be read`
      );
    }

    const basePath = variablePath(name);
    const size = descriptor.size;
    const burn = descriptor.kind === 'string' ? STRING_LENGTH_PREFIX : 0;
    const chunks: Uint8Array[] = [];

    for (let offset = 0; offset < size; offset += this.readCeiling) {
      const chunk = Math.min(size - offset, this.readCeiling);
      logger.debug('Reading segment', { variable: name, offset, size: chunk });
      const response = await this.tags.readTag(
        concatUint8Arrays([basePath, simpleDataSegment(offset, chunk)])
      );
      chunks.push(response.data.subarray(burn));
    }

    const data = concatUint8Arrays(chunks);
    const complete = descriptor.kind === 'string' ? data.length <= size : data.length === size;
    if (!complete) {
      throw new EipFrameDecodeError(
        `Segmented read of ${name} returned ${data.length} bytes, declared size is ${size}`
      );
    }
    return data;
  }

  /**
   * Пишет значение по частям фиксированного размера.
   * Строка режется по длине UTF-8 значения, каждый фрагмент несёт свой префикс длины.
   */
  async writeBytes(name: string, descriptor: CipTypeDescriptor, value: CipValue): Promise<void> {
    const header = writeHeaderFor(descriptor);
    const bytes = encodeValue(descriptor, value);
    const isString = descriptor.kind === 'string';

    if (!isString && bytes.length !== descriptor.size) {
      throw new EipDataConversionError(value, `${descriptor.size} bytes for ${name}`);
    }

    const basePath = variablePath(name);
    for (let offset = 0; offset < bytes.length; offset += SEGMENT_WRITE_CHUNK_SIZE) {
      const chunk = bytes.subarray(offset, offset + SEGMENT_WRITE_CHUNK_SIZE);
      const data = isString
        ? concatUint8Arrays([uint16ToBytesLE(chunk.length), chunk])
        : chunk;
      logger.debug('Writing segment', { variable: name, offset, size: chunk.length });
      await this.tags.writeTag(
        concatUint8Arrays([basePath, simpleDataSegment(offset, chunk.length)]),
        header,
        data
      );
    }
  }
}
