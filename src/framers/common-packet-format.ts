// src/framers/common-packet-format.ts

import { PacketItemType } from '../constants/constants.js';
import { EipTruncatedItemError } from '../errors.js';
import type { PacketItem } from '../types/eip-types.js';
import { viewOf } from '../utils/utils.js';

const ITEM_COUNT_SIZE = 2;
const ITEM_HEADER_SIZE = 4; // type id (2) + length (2)

/**
 * Собирает последовательность элементов CPF.
 * Один элемент дополняется null address item перед ним: unconnected-обмен
 * всегда несёт ровно два элемента.
 * @param options.nullAddress - false для ответов List Identity / List Services,
 *   где единственный элемент идёт без адреса
 */
export function encodeCommonPacketFormat(
  items: PacketItem[],
  { nullAddress = true }: { nullAddress?: boolean } = {}
): Uint8Array {
  const sequence: PacketItem[] =
    nullAddress && items.length === 1
      ? [{ typeId: PacketItemType.NULL_ADDRESS, data: new Uint8Array(0) }, ...items]
      : items;

  const total = sequence.reduce(
    (sum, item) => sum + ITEM_HEADER_SIZE + item.data.length,
    ITEM_COUNT_SIZE
  );
  const out = new Uint8Array(total);
  const view = new DataView(out.buffer);

  view.setUint16(0, sequence.length, true);
  let offset = ITEM_COUNT_SIZE;
  for (const item of sequence) {
    if (item.data.length > 0xffff) {
      throw new RangeError(`Packet item too large: ${item.data.length} bytes`);
    }
    view.setUint16(offset, item.typeId, true);
    view.setUint16(offset + 2, item.data.length, true);
    out.set(item.data, offset + ITEM_HEADER_SIZE);
    offset += ITEM_HEADER_SIZE + item.data.length;
  }

  return out;
}

/**
 * Разбирает последовательность элементов CPF.
 * Чтение идёт до объявленного количества или до конца буфера.
 * @throws EipTruncatedItemError - если длина элемента выходит за буфер
 */
export function decodeCommonPacketFormat(packet: Uint8Array): PacketItem[] {
  if (packet.length < ITEM_COUNT_SIZE) {
    throw new EipTruncatedItemError(0, ITEM_COUNT_SIZE, packet.length);
  }

  const view = viewOf(packet);
  const count = view.getUint16(0, true);
  const items: PacketItem[] = [];

  let offset = ITEM_COUNT_SIZE;
  while (items.length < count && offset < packet.length) {
    if (offset + ITEM_HEADER_SIZE > packet.length) {
      throw new EipTruncatedItemError(items.length, ITEM_HEADER_SIZE, packet.length - offset);
    }
    const typeId = view.getUint16(offset, true);
    const length = view.getUint16(offset + 2, true);
    const dataStart = offset + ITEM_HEADER_SIZE;
    if (dataStart + length > packet.length) {
      throw new EipTruncatedItemError(items.length, length, packet.length - dataStart);
    }
    items.push({ typeId, data: packet.slice(dataStart, dataStart + length) });
    offset = dataStart + length;
  }

  return items;
}
